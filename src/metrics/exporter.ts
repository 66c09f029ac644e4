/**
 * Prometheus metrics for the push relay using prom-client.
 *
 * Served at /metrics by the gateway.
 *
 * Metrics:
 * - lms_push_pushes{status}                                   gauge
 * - lms_push_submissions_total{destination}                   counter
 * - lms_push_terminal_total{destination,status}               counter
 * - lms_push_delivery_attempts_total{destination,outcome}     counter
 * - lms_push_delivery_duration_seconds{destination}           histogram
 * - lms_push_events_total{type}                               counter
 * - lms_push_in_flight                                        gauge
 * - lms_push_service_up                                       gauge
 */

import {
  Registry,
  Gauge,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";

export interface MetricsState {
  pushesByStatus: Record<string, number>;
  inFlight: number;
  serviceUp: boolean;
}

export class PushMetrics {
  readonly registry: Registry;

  readonly pushes: Gauge;
  readonly submissionsTotal: Counter;
  readonly terminalTotal: Counter;
  readonly deliveryAttemptsTotal: Counter;
  readonly deliveryDuration: Histogram;
  readonly eventsTotal: Counter;
  readonly inFlight: Gauge;
  readonly serviceUp: Gauge;

  constructor(opts: { defaultMetrics?: boolean } = {}) {
    this.registry = new Registry();

    // Node.js runtime metrics (GC, event loop, etc.)
    if (opts.defaultMetrics ?? true) {
      collectDefaultMetrics({ register: this.registry, prefix: "lms_push_" });
    }

    this.pushes = new Gauge({
      name: "lms_push_pushes",
      help: "Stored push records by status",
      labelNames: ["status"] as const,
      registers: [this.registry],
    });

    this.submissionsTotal = new Counter({
      name: "lms_push_submissions_total",
      help: "Accepted push submissions",
      labelNames: ["destination"] as const,
      registers: [this.registry],
    });

    this.terminalTotal = new Counter({
      name: "lms_push_terminal_total",
      help: "Pushes reaching a terminal status",
      labelNames: ["destination", "status"] as const,
      registers: [this.registry],
    });

    this.deliveryAttemptsTotal = new Counter({
      name: "lms_push_delivery_attempts_total",
      help: "Delivery attempts by outcome",
      labelNames: ["destination", "outcome"] as const,
      registers: [this.registry],
    });

    this.deliveryDuration = new Histogram({
      name: "lms_push_delivery_duration_seconds",
      help: "Destination round-trip time per delivery attempt",
      labelNames: ["destination"] as const,
      buckets: [0.05, 0.1, 0.25, 0.5, 1.0, 2.5, 5.0, 10.0, 30.0],
      registers: [this.registry],
    });

    this.eventsTotal = new Counter({
      name: "lms_push_events_total",
      help: "Events written to the audit log by type",
      labelNames: ["type"] as const,
      registers: [this.registry],
    });

    this.inFlight = new Gauge({
      name: "lms_push_in_flight",
      help: "Pushes whose background run has not finished",
      registers: [this.registry],
    });

    this.serviceUp = new Gauge({
      name: "lms_push_service_up",
      help: "Push service status (1=up, 0=down)",
      registers: [this.registry],
    });
  }

  /**
   * Update gauge metrics from current state.
   * Called before each /metrics scrape.
   */
  updateFromState(state: MetricsState): void {
    // Point-in-time gauges
    this.pushes.reset();
    for (const [status, count] of Object.entries(state.pushesByStatus)) {
      this.pushes.labels({ status }).set(count);
    }
    this.inFlight.set(state.inFlight);
    this.serviceUp.set(state.serviceUp ? 1 : 0);
  }

  recordSubmission(destination: string): void {
    this.submissionsTotal.labels({ destination }).inc();
  }

  recordTerminal(destination: string, status: string): void {
    this.terminalTotal.labels({ destination, status }).inc();
  }

  /** Record one delivery attempt. */
  recordDeliveryAttempt(destination: string, outcome: string, durationSeconds: number): void {
    this.deliveryAttemptsTotal.labels({ destination, outcome }).inc();
    this.deliveryDuration.labels({ destination }).observe(durationSeconds);
  }

  recordEvent(type: string): void {
    this.eventsTotal.labels({ type }).inc();
  }

  /** Get metrics in Prometheus text format. */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
