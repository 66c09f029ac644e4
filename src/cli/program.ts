/**
 * lms-push CLI, built with Commander.
 *
 * This module configures the Commander program with all commands registered.
 * It is separated from the entrypoint (index.ts) so tests can build a
 * program without triggering parseAsync.
 */

import { Command } from "commander";
import { loadSettings, type Env } from "../config/settings.js";
import { VERSION } from "../version.js";
import type { SettingsLoader } from "./catalog-utils.js";
import { registerDestinationCommands } from "./commands/destinations.js";
import { registerRuleCommands } from "./commands/rules.js";
import { registerServeCommand } from "./commands/serve.js";
import { registerTestFilterCommand } from "./commands/test-filter.js";

export function createProgram(env: Env = process.env): Command {
  const program = new Command()
    .name("lms-push")
    .version(VERSION)
    .description("Push learner content to learning record stores and webhooks")
    .option("--config <path>", "YAML settings file (default: $PUSH_CONFIG or <dataDir>/config.yaml)")
    .option("--data-dir <path>", "Data directory (overrides PUSH_DATA_DIR)")
    .option("--port <port>", "Listen port for serve (overrides PORT)");

  const settings: SettingsLoader = () => {
    const opts = program.opts<{ config?: string; dataDir?: string; port?: string }>();
    return loadSettings({
      configPath: opts.config,
      env: {
        ...env,
        ...(opts.dataDir !== undefined ? { PUSH_DATA_DIR: opts.dataDir } : {}),
        ...(opts.port !== undefined ? { PORT: opts.port } : {}),
      },
    });
  };

  registerServeCommand(program, settings);
  registerRuleCommands(program, settings);
  registerDestinationCommands(program, settings);
  registerTestFilterCommand(program, settings);

  return program;
}
