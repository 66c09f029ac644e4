/**
 * Shared helpers for CLI commands that read or edit the catalog without a
 * running daemon.
 */

import { join } from "node:path";
import { Catalog } from "../catalog/catalog.js";
import type { Settings } from "../config/settings.js";

export type SettingsLoader = () => Promise<Settings>;

/** Catalog file the daemon reads in filesystem mode. */
export function catalogPath(settings: Settings): string {
  return join(settings.dataDir, "catalog.yaml");
}

/**
 * Open the catalog the daemon would see: configured seeds plus the
 * persisted catalog file.
 */
export async function openCatalog(settings: Settings): Promise<Catalog> {
  const catalog = new Catalog({ filePath: catalogPath(settings) });
  await catalog.init({ rules: settings.rules, destinations: settings.destinations });
  return catalog;
}

/** Split a comma-separated option value; empty entries are dropped. */
export function parseList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value.split(",").map((item) => item.trim()).filter((item) => item.length > 0);
}
