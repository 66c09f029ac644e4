import type { Command } from "commander";
import { summarizeDestination, type DestinationSummary } from "../../schemas/destination.js";
import { openCatalog, type SettingsLoader } from "../catalog-utils.js";

export function formatDestination(summary: DestinationSummary): string {
  const auth = summary.hasAuthToken ? "token" : "no token";
  const rule = summary.ruleId ? `  rule=${summary.ruleId}` : "";
  return `${summary.name}  ${summary.kind}  ${summary.endpoint}  (${auth})${rule}`;
}

export function registerDestinationCommands(program: Command, loadSettings: SettingsLoader): void {
  const destinations = program
    .command("destinations")
    .description("Inspect configured destinations");

  destinations
    .command("list")
    .description("List destinations (credentials are not shown)")
    .option("--json", "Output as JSON", false)
    .action(async (opts: { json: boolean }) => {
      const catalog = await openCatalog(await loadSettings());
      const summaries = catalog.listDestinations().map(summarizeDestination);

      if (opts.json) {
        console.log(JSON.stringify(summaries, null, 2));
        return;
      }
      for (const summary of summaries) {
        console.log(formatDestination(summary));
      }
    });
}
