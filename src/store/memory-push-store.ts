/**
 * In-memory push store. Process-local; contents are lost on restart.
 */

import type { PushRecord } from "../schemas/push.js";
import type { IPushStore, PushListFilter } from "./interfaces.js";
import {
  assertReplaceable,
  countStatuses,
  matchesFilter,
  snapshot,
  sortAndLimit,
} from "./push-record-ops.js";

export class MemoryPushStore implements IPushStore {
  private readonly records = new Map<string, PushRecord>();

  async init(): Promise<void> {}

  async get(id: string): Promise<PushRecord | undefined> {
    const record = this.records.get(id);
    return record ? snapshot(record) : undefined;
  }

  async put(record: PushRecord): Promise<PushRecord> {
    assertReplaceable(this.records.get(record.id), record);
    const stored = snapshot(record);
    this.records.set(record.id, stored);
    return stored;
  }

  async list(filter: PushListFilter = {}): Promise<PushRecord[]> {
    const matched = [...this.records.values()].filter((r) => matchesFilter(r, filter));
    return sortAndLimit(matched, filter.limit);
  }

  async countByStatus(): Promise<Record<string, number>> {
    return countStatuses(this.records.values());
  }

  // Records stay readable; a run that outlived the drain may still finish.
  async close(): Promise<void> {}
}
