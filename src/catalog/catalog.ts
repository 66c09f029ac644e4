/**
 * Catalog: filter rules and destination configurations managed by
 * operators.
 *
 * Entries live in memory. When a file path is given the catalog is loaded
 * from and written back to a YAML document (write-file-atomic), so entries
 * created through the API survive restarts:
 *
 *   rules:
 *     - id: ...
 *       name: ...
 *   destinations:
 *     - name: main_lrs
 *       kind: record-store
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { ConflictError, ValidationError } from "../errors.js";
import { DestinationConfig } from "../schemas/destination.js";
import { FilterRule, FilterRuleSpec } from "../schemas/rule.js";
import type { SeedRule } from "../config/settings.js";

const CatalogFile = z.object({
  rules: z.array(FilterRule).default([]),
  destinations: z.array(DestinationConfig).default([]),
});

export interface CatalogOptions {
  /** YAML file the catalog persists to. Omit for a memory-only catalog. */
  filePath?: string;
  idFactory?: () => string;
  now?: () => Date;
}

export interface CatalogSeed {
  rules?: SeedRule[];
  destinations?: DestinationConfig[];
}

export class Catalog {
  private readonly rules = new Map<string, FilterRule>();
  private readonly destinations = new Map<string, DestinationConfig>();
  /** Entries created through the API or read from the file; only these are persisted. */
  private readonly managedRuleIds = new Set<string>();
  private readonly managedDestinations = new Set<string>();
  private readonly filePath?: string;
  private readonly idFactory: () => string;
  private readonly now: () => Date;

  constructor(opts: CatalogOptions = {}) {
    this.filePath = opts.filePath;
    this.idFactory = opts.idFactory ?? randomUUID;
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Load seeds (from settings) and then the persisted file, which wins on
   * id / name collisions.
   */
  async init(seed: CatalogSeed = {}): Promise<void> {
    for (const rule of seed.rules ?? []) {
      const stored = this.buildRule(rule, rule.id);
      this.rules.set(stored.id, stored);
    }
    for (const destination of seed.destinations ?? []) {
      this.destinations.set(destination.name, destination);
    }

    const persisted = await this.readFile();
    for (const rule of persisted.rules) {
      this.rules.set(rule.id, rule);
      this.managedRuleIds.add(rule.id);
    }
    for (const destination of persisted.destinations) {
      this.destinations.set(destination.name, destination);
      this.managedDestinations.add(destination.name);
    }
  }

  private buildRule(spec: FilterRuleSpec, id?: string): FilterRule {
    return {
      ...spec,
      id: id ?? this.idFactory(),
      createdAt: this.now().toISOString(),
    };
  }

  /** Validate and store a new rule. */
  async createRule(input: unknown): Promise<FilterRule> {
    const parsed = FilterRuleSpec.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod("filter rule", parsed.error);
    }
    const rule = this.buildRule(parsed.data);
    this.rules.set(rule.id, rule);
    this.managedRuleIds.add(rule.id);
    try {
      await this.persist();
    } catch (err) {
      this.rules.delete(rule.id);
      this.managedRuleIds.delete(rule.id);
      throw err;
    }
    return rule;
  }

  getRule(id: string): FilterRule | undefined {
    return this.rules.get(id);
  }

  listRules(): FilterRule[] {
    return [...this.rules.values()].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  /** Validate and store a destination; names are unique. */
  async createDestination(input: unknown): Promise<DestinationConfig> {
    const parsed = DestinationConfig.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod("destination", parsed.error);
    }
    const destination = parsed.data;
    if (this.destinations.has(destination.name)) {
      throw new ConflictError(`Destination already exists: ${destination.name}`);
    }
    if (destination.ruleId !== undefined && !this.rules.has(destination.ruleId)) {
      throw new ValidationError(`Unknown filter rule: ${destination.ruleId}`, [
        { path: "ruleId", message: "Unknown filter rule" },
      ]);
    }
    this.destinations.set(destination.name, destination);
    this.managedDestinations.add(destination.name);
    try {
      await this.persist();
    } catch (err) {
      // An entry that never reached the file is not kept
      this.destinations.delete(destination.name);
      this.managedDestinations.delete(destination.name);
      throw err;
    }
    return destination;
  }

  getDestination(name: string): DestinationConfig | undefined {
    return this.destinations.get(name);
  }

  listDestinations(): DestinationConfig[] {
    return [...this.destinations.values()];
  }

  private async readFile(): Promise<z.infer<typeof CatalogFile>> {
    if (!this.filePath) return { rules: [], destinations: [] };

    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return { rules: [], destinations: [] };
      }
      throw err;
    }

    const parsed = CatalogFile.safeParse(parseYaml(raw) ?? {});
    if (!parsed.success) {
      throw new Error(`Invalid catalog file ${this.filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async persist(): Promise<void> {
    if (!this.filePath) return;
    await mkdir(dirname(this.filePath), { recursive: true });
    const doc = {
      rules: this.listRules().filter((r) => this.managedRuleIds.has(r.id)),
      destinations: this.listDestinations().filter((d) => this.managedDestinations.has(d.name)),
    };
    await writeFileAtomic(this.filePath, stringifyYaml(doc));
  }
}
