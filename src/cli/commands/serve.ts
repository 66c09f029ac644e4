import type { Command } from "commander";
import { runForeground } from "../../daemon/daemon.js";
import type { SettingsLoader } from "../catalog-utils.js";

export function registerServeCommand(program: Command, loadSettings: SettingsLoader): void {
  program
    .command("serve")
    .description("Run the push relay HTTP API in the foreground")
    .action(async () => {
      await runForeground(await loadSettings());
    });
}
