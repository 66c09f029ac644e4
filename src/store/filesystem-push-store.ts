/**
 * Push store: filesystem-backed, one JSON document per push:
 *   <dataDir>/pushes/<id>.json
 *
 * Every write replaces the whole file atomically (write-file-atomic), so a
 * reader sees either the previous snapshot or the next one, never a torn
 * record.
 */

import { mkdir, readdir, readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { PushRecord } from "../schemas/push.js";
import type { IPushStore, PushListFilter } from "./interfaces.js";
import {
  assertReplaceable,
  countStatuses,
  matchesFilter,
  snapshot,
  sortAndLimit,
} from "./push-record-ops.js";

const ID_PATTERN = /^[0-9a-f-]{36}$/i;

export class FilesystemPushStore implements IPushStore {
  readonly pushesDir: string;

  constructor(dataDir: string) {
    this.pushesDir = resolve(dataDir, "pushes");
  }

  async init(): Promise<void> {
    await mkdir(this.pushesDir, { recursive: true });
  }

  private pushPath(id: string): string {
    return join(this.pushesDir, `${id}.json`);
  }

  private async readRecord(filePath: string): Promise<PushRecord | undefined> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      console.error(`[PushStore] Parse error in ${filePath}: ${(err as Error).message}`);
      return undefined;
    }

    const parsed = PushRecord.safeParse(json);
    if (!parsed.success) {
      console.error(`[PushStore] Invalid push record in ${filePath}: ${parsed.error.message}`);
      return undefined;
    }
    return parsed.data;
  }

  async get(id: string): Promise<PushRecord | undefined> {
    if (!ID_PATTERN.test(id)) return undefined;
    const record = await this.readRecord(this.pushPath(id));
    return record ? snapshot(record) : undefined;
  }

  async put(record: PushRecord): Promise<PushRecord> {
    const filePath = this.pushPath(record.id);
    assertReplaceable(await this.readRecord(filePath), record);
    await writeFileAtomic(filePath, JSON.stringify(record, null, 2) + "\n");
    return snapshot(record);
  }

  private async readAll(): Promise<PushRecord[]> {
    let entries: string[];
    try {
      entries = await readdir(this.pushesDir);
    } catch {
      return []; // Directory doesn't exist
    }

    const records: PushRecord[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(".json")) continue;
      const record = await this.readRecord(join(this.pushesDir, entry));
      if (record) records.push(record);
    }
    return records;
  }

  async list(filter: PushListFilter = {}): Promise<PushRecord[]> {
    const matched = (await this.readAll()).filter((r) => matchesFilter(r, filter));
    return sortAndLimit(matched, filter.limit).map(snapshot);
  }

  async countByStatus(): Promise<Record<string, number>> {
    return countStatuses(await this.readAll());
  }

  async close(): Promise<void> {}
}
