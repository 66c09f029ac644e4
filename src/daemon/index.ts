#!/usr/bin/env node

import { Command } from "commander";
import { loadSettings } from "../config/settings.js";
import { runForeground } from "./daemon.js";

const program = new Command()
  .name("lms-push-daemon")
  .description("Learning activity push relay (HTTP API)")
  .option("--config <path>", "YAML settings file (default: $PUSH_CONFIG or <dataDir>/config.yaml)")
  .option("--port <port>", "Listen port (overrides PORT)")
  .option("--host <host>", "Bind address (overrides HOST)");

program.action(async (opts: { config?: string; port?: string; host?: string }) => {
  const settings = await loadSettings({
    configPath: opts.config,
    env: {
      ...process.env,
      ...(opts.port !== undefined ? { PORT: opts.port } : {}),
      ...(opts.host !== undefined ? { HOST: opts.host } : {}),
    },
  });
  await runForeground(settings);
});

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
