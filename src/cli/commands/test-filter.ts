import { readFile } from "node:fs/promises";
import type { Command } from "commander";
import { testFilter } from "../../service/push-service.js";
import { openCatalog, type SettingsLoader } from "../catalog-utils.js";

export function registerTestFilterCommand(program: Command, loadSettings: SettingsLoader): void {
  program
    .command("test-filter <content-file>")
    .description("Check whether a content record (JSON file) passes a filter rule")
    .option("--rule <id>", "Filter rule id (default: no rule)")
    .action(async (contentFile: string, opts: { rule?: string }) => {
      const catalog = await openCatalog(await loadSettings());

      let content: unknown;
      try {
        content = JSON.parse(await readFile(contentFile, "utf-8"));
      } catch (err) {
        console.error(`❌ Cannot read ${contentFile}: ${(err as Error).message}`);
        process.exitCode = 1;
        return;
      }

      try {
        const result = testFilter(catalog, content, opts.rule);
        console.log(JSON.stringify(result, null, 2));
        if (!result.matched) process.exitCode = 2;
      } catch (err) {
        console.error(`❌ ${(err as Error).message}`);
        process.exitCode = 1;
      }
    });
}
