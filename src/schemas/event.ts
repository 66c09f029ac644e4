/**
 * Event log schema: JSONL event stream for audit and metrics.
 *
 * Every push transition, delivery attempt, and catalog mutation is recorded
 * as an event. This feeds:
 * - Prometheus metrics (counters, histograms)
 * - Audit trail for operators debugging a destination
 */

import { z } from "zod";

/** Event types: exhaustive list of observable actions. */
export const EventType = z.enum([
  // Push lifecycle
  "push.submitted",
  "push.transitioned",
  "push.filtered",
  "push.delivered",
  "push.failed",

  // Delivery
  "delivery.attempted",
  "delivery.retry-scheduled",

  // Catalog
  "rule.created",
  "destination.created",

  // System
  "system.startup",
  "system.shutdown",
  "system.config-loaded",
]);
export type EventType = z.infer<typeof EventType>;

/** Base event structure. */
export const BaseEvent = z.object({
  /** Monotonic event ID (set by event logger). */
  eventId: z.number().int().positive(),
  /** Event type. */
  type: EventType,
  /** ISO-8601 timestamp. */
  timestamp: z.string().datetime(),
  /** Component or operator that caused this event. */
  actor: z.string(),
  /** Optional push ID (for push-related events). */
  pushId: z.string().optional(),
  /** Event-specific payload. */
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type BaseEvent = z.infer<typeof BaseEvent>;

/** Transition event payload. */
export const TransitionPayload = z.object({
  from: z.string(),
  to: z.string(),
  reason: z.string().optional(),
});
export type TransitionPayload = z.infer<typeof TransitionPayload>;

/** Delivery attempt payload. */
export const DeliveryPayload = z.object({
  destination: z.string(),
  attempt: z.number().int().positive(),
  outcome: z.enum(["delivered", "retryable-failure", "fatal-failure"]),
  httpStatus: z.number().int().optional(),
  durationMs: z.number().optional(),
  error: z.string().optional(),
});
export type DeliveryPayload = z.infer<typeof DeliveryPayload>;
