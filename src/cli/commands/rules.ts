/**
 * Filter rule commands: list and add.
 */

import type { Command } from "commander";
import type { Catalog } from "../../catalog/catalog.js";
import type { FilterRule } from "../../schemas/rule.js";
import { openCatalog, parseList, type SettingsLoader } from "../catalog-utils.js";

export interface RuleAddOptions {
  name: string;
  contentTypes?: string;
  minGrade?: string;
  tags?: string;
  groups?: string;
  inactive?: boolean;
}

export function formatRule(rule: FilterRule): string {
  const criteria: string[] = [];
  if (rule.contentTypes.length > 0) criteria.push(`types=${rule.contentTypes.join(",")}`);
  if (rule.minGrade !== undefined) criteria.push(`minGrade=${rule.minGrade}`);
  if (rule.requiredTags.length > 0) criteria.push(`tags=${rule.requiredTags.join(",")}`);
  if (rule.learnerGroups.length > 0) criteria.push(`groups=${rule.learnerGroups.join(",")}`);

  const state = rule.active ? "" : " (inactive)";
  const detail = criteria.length > 0 ? criteria.join(" ") : "matches everything";
  return `${rule.id}  ${rule.name}${state}  ${detail}`;
}

/** Build the rule input from CLI flags and store it through the catalog. */
export async function addRule(catalog: Catalog, opts: RuleAddOptions): Promise<FilterRule> {
  return catalog.createRule({
    name: opts.name,
    contentTypes: parseList(opts.contentTypes),
    minGrade: opts.minGrade,
    requiredTags: parseList(opts.tags),
    learnerGroups: parseList(opts.groups),
    active: !opts.inactive,
  });
}

export function registerRuleCommands(program: Command, loadSettings: SettingsLoader): void {
  const rules = program
    .command("rules")
    .description("Manage filter rules");

  rules
    .command("list")
    .description("List filter rules")
    .option("--json", "Output as JSON", false)
    .action(async (opts: { json: boolean }) => {
      const catalog = await openCatalog(await loadSettings());
      const all = catalog.listRules();

      if (opts.json) {
        console.log(JSON.stringify(all, null, 2));
        return;
      }
      if (all.length === 0) {
        console.log("No filter rules configured");
        return;
      }
      for (const rule of all) {
        console.log(formatRule(rule));
      }
    });

  rules
    .command("add")
    .description("Create a filter rule")
    .requiredOption("--name <name>", "Rule name")
    .option("--content-types <list>", "Comma-separated content types")
    .option("--min-grade <grade>", "Minimum letter grade (F, D, C, B, A)")
    .option("--tags <list>", "Comma-separated required tags")
    .option("--groups <list>", "Comma-separated learner groups")
    .option("--inactive", "Create the rule switched off", false)
    .action(async (opts: RuleAddOptions) => {
      const catalog = await openCatalog(await loadSettings());
      try {
        const rule = await addRule(catalog, opts);
        console.log(`✅ Rule created: ${rule.id}`);
        console.log(`   ${formatRule(rule)}`);
      } catch (err) {
        console.error(`❌ ${(err as Error).message}`);
        process.exitCode = 1;
      }
    });
}
