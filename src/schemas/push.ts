/**
 * Push schema: request accepted at the submission boundary and the push
 * record tracked through its lifecycle.
 */

import { z } from "zod";
import { ContentRecord } from "./content.js";

/** Push lifecycle states. */
export const PushStatus = z.enum([
  "queued",        // Accepted, waiting for its background run
  "in-progress",   // Statement generated, delivery attempts under way
  "filtered-out",  // Rejected by the destination's filter rule (not an error)
  "delivered",     // Destination acknowledged the statement
  "failed",        // Configuration error, fatal error, or retries exhausted
]);
export type PushStatus = z.infer<typeof PushStatus>;

/** Statuses from which no further transition occurs. */
export const TERMINAL_STATUSES: readonly PushStatus[] = ["filtered-out", "delivered", "failed"];

export function isTerminal(status: PushStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Valid status transitions: enforced by the push stores.
 * Key = current status, Value = allowed next statuses. `in-progress` may be
 * rewritten while retries advance the retry count.
 */
export const VALID_TRANSITIONS: Record<PushStatus, readonly PushStatus[]> = {
  "queued":       ["in-progress", "filtered-out", "failed"],
  "in-progress":  ["in-progress", "delivered", "failed"],
  "filtered-out": [],
  "delivered":    [],
  "failed":       [],
} as const;

export function isValidTransition(from: PushStatus, to: PushStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Error classification stored on a push record. */
export const PushErrorKind = z.enum(["validation", "configuration", "retryable", "fatal"]);
export type PushErrorKind = z.infer<typeof PushErrorKind>;

export const PushError = z.object({
  kind: PushErrorKind,
  message: z.string(),
  /** HTTP status returned by the destination, when there was one. */
  httpStatus: z.number().int().optional(),
});
export type PushError = z.infer<typeof PushError>;

/** Submission request. */
export const PushRequest = z.object({
  content: ContentRecord,
  destination: z.string().min(1),
  /** Bypass the filter engine for this push only. */
  force: z.boolean().default(false),
});
export type PushRequest = z.infer<typeof PushRequest>;
export type PushRequestInput = z.input<typeof PushRequest>;

export const PushRecord = z.object({
  id: z.string().uuid(),
  content: ContentRecord,
  destination: z.string(),
  force: z.boolean(),
  status: PushStatus,
  retryCount: z.number().int().nonnegative(),
  /** Write counter: 0 at submission, +1 on every store write. */
  revision: z.number().int().nonnegative(),
  lastError: PushError.optional(),
  /** Why the filter engine rejected (or admitted) the record. */
  filterReason: z.string().optional(),
  /** Identifier of the statement sent on the latest attempt. */
  statementId: z.string().optional(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  completedAt: z.string().datetime().optional(),
});
export type PushRecord = z.infer<typeof PushRecord>;
