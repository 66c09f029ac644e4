/**
 * IPushStore - Interface for push status storage implementations
 *
 * Defines the contract for push record persistence and retrieval.
 * Current implementations: MemoryPushStore (process-local, default and
 * tests) and FilesystemPushStore (one JSON file per push).
 */

import type { PushRecord, PushStatus } from "../schemas/push.js";

export interface PushListFilter {
  status?: PushStatus;
  destination?: string;
  /** Only pushes created at or after this instant. */
  since?: Date;
  /** Only pushes created before this instant. */
  until?: Date;
  /** Maximum number of records returned (oldest first). */
  limit?: number;
}

/**
 * Core push store interface.
 * All push storage implementations must implement this contract.
 */
export interface IPushStore {
  /**
   * Initialize the store.
   * Creates necessary directories or tables.
   */
  init(): Promise<void>;

  /**
   * Retrieve a push by exact ID.
   * Returns undefined if not found.
   */
  get(id: string): Promise<PushRecord | undefined>;

  /**
   * Replace the full record keyed by its id.
   * Rejects invalid status transitions and any write over a terminal record.
   * Returns the stored snapshot.
   */
  put(record: PushRecord): Promise<PushRecord>;

  /**
   * Time-bounded range scan, oldest first.
   */
  list(filter?: PushListFilter): Promise<PushRecord[]>;

  /**
   * Count pushes by status.
   * Returns a map of status -> count.
   */
  countByStatus(): Promise<Record<string, number>>;

  /** Release resources held by the store. */
  close(): Promise<void>;
}
