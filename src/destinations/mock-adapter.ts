/**
 * Mock adapter for testing: records every delivery and answers from a
 * scripted list of outcomes.
 */

import type { ContentRecord } from "../schemas/content.js";
import type { DestinationConfig, DestinationKind } from "../schemas/destination.js";
import type { ActivityStatement } from "../schemas/statement.js";
import type { DeliveryOutcome, DestinationAdapter } from "./adapter.js";

export interface MockDestinationAdapterOptions {
  kind?: DestinationKind;
  /** Outcomes returned in order; the last one repeats. Defaults to HTTP 200. */
  outcomes?: DeliveryOutcome[];
  /** Delay before each outcome is returned. */
  delayMs?: number;
}

export interface MockDelivery {
  statement: ActivityStatement;
  content: ContentRecord;
  destination: DestinationConfig;
}

export class MockDestinationAdapter implements DestinationAdapter {
  readonly kind: DestinationKind;
  readonly deliveries: MockDelivery[] = [];

  private outcomes: DeliveryOutcome[];
  private delayMs: number;
  private throwError?: Error;

  constructor(opts: MockDestinationAdapterOptions = {}) {
    this.kind = opts.kind ?? "record-store";
    this.outcomes = [...(opts.outcomes ?? [])];
    this.delayMs = opts.delayMs ?? 0;
  }

  async deliver(
    statement: ActivityStatement,
    content: ContentRecord,
    destination: DestinationConfig,
  ): Promise<DeliveryOutcome> {
    this.deliveries.push({ statement, content, destination });

    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.throwError) {
      throw this.throwError;
    }

    const next = this.outcomes.length > 1 ? this.outcomes.shift() : this.outcomes[0];
    return next ?? { kind: "delivered", httpStatus: 200 };
  }

  /** Replace the remaining scripted outcomes. */
  setOutcomes(outcomes: DeliveryOutcome[]): void {
    this.outcomes = [...outcomes];
  }

  /** Make every later delivery throw (simulates an adapter bug). */
  setThrow(error: Error): void {
    this.throwError = error;
  }

  setDelay(delayMs: number): void {
    this.delayMs = delayMs;
  }

  get callCount(): number {
    return this.deliveries.length;
  }

  reset(): void {
    this.deliveries.length = 0;
    this.outcomes = [];
    this.throwError = undefined;
    this.delayMs = 0;
  }
}
