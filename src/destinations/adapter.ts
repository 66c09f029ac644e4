/**
 * Destination adapter interface: delivers an activity statement to one
 * configured destination.
 *
 * Core library defines the interface; one implementation exists per
 * destination kind. Adapters are stateless per call so any number of
 * concurrent deliveries may target the same destination.
 */

import type { ContentRecord } from "../schemas/content.js";
import type { DestinationConfig, DestinationKind } from "../schemas/destination.js";
import type { ActivityStatement } from "../schemas/statement.js";

export type DeliveryOutcome =
  | { kind: "delivered"; httpStatus: number }
  | { kind: "retryable-failure"; reason: string; httpStatus?: number }
  | { kind: "fatal-failure"; reason: string; httpStatus?: number };

export interface DestinationAdapter {
  /** Destination kind this adapter serves. */
  readonly kind: DestinationKind;

  /**
   * Deliver a statement. Never throws for delivery problems; every failure
   * is reported through the returned outcome.
   */
  deliver(
    statement: ActivityStatement,
    content: ContentRecord,
    destination: DestinationConfig,
  ): Promise<DeliveryOutcome>;
}

/** Map an HTTP status to a delivery outcome: 2xx ok, 4xx fatal, the rest retryable. */
export function classifyResponse(httpStatus: number, detail = ""): DeliveryOutcome {
  if (httpStatus >= 200 && httpStatus < 300) {
    return { kind: "delivered", httpStatus };
  }
  const reason = detail
    ? `HTTP ${httpStatus}: ${detail}`
    : `HTTP ${httpStatus}`;
  if (httpStatus >= 400 && httpStatus < 500) {
    return { kind: "fatal-failure", reason, httpStatus };
  }
  return { kind: "retryable-failure", reason, httpStatus };
}
