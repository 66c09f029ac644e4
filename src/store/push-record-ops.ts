/**
 * Push record helpers shared by the store implementations.
 */

import { deepFreeze } from "../schemas/content.js";
import { isTerminal, isValidTransition, type PushRecord } from "../schemas/push.js";
import type { PushListFilter } from "./interfaces.js";

/**
 * Validate replacing `existing` with `next`.
 * Throws when the existing record is terminal or the transition is not allowed.
 */
export function assertReplaceable(existing: PushRecord | undefined, next: PushRecord): void {
  if (!existing) {
    if (next.status !== "queued") {
      throw new Error(`Cannot create push ${next.id} in status '${next.status}': pushes start queued`);
    }
    if (next.revision !== 0) {
      throw new Error(`Cannot create push ${next.id} at revision ${next.revision}`);
    }
    return;
  }

  if (isTerminal(existing.status)) {
    throw new Error(
      `Cannot update push ${next.id}: push is in terminal state '${existing.status}'`,
    );
  }

  if (!isValidTransition(existing.status, next.status)) {
    throw new Error(
      `Invalid transition for push ${next.id}: ${existing.status} → ${next.status}`,
    );
  }

  // Single writer per id: a stale revision means a second writer appeared
  if (next.revision !== existing.revision + 1) {
    throw new Error(
      `Stale write for push ${next.id}: revision ${next.revision} after ${existing.revision}`,
    );
  }
}

/** Detached, frozen copy handed to readers. */
export function snapshot(record: PushRecord): PushRecord {
  return deepFreeze(structuredClone(record));
}

export function matchesFilter(record: PushRecord, filter: PushListFilter = {}): boolean {
  if (filter.status && record.status !== filter.status) return false;
  if (filter.destination && record.destination !== filter.destination) return false;
  const createdAt = Date.parse(record.createdAt);
  if (filter.since && createdAt < filter.since.getTime()) return false;
  if (filter.until && createdAt >= filter.until.getTime()) return false;
  return true;
}

export function sortAndLimit(records: PushRecord[], limit?: number): PushRecord[] {
  const sorted = records.sort(
    (a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id),
  );
  return limit !== undefined ? sorted.slice(0, limit) : sorted;
}

export function countStatuses(records: Iterable<PushRecord>): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of records) {
    counts[record.status] = (counts[record.status] ?? 0) + 1;
  }
  return counts;
}
