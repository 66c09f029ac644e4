/**
 * Push orchestrator: drives each push through its lifecycle.
 *
 *   queued ──▶ in-progress ──▶ delivered
 *     │             │  ▲
 *     │             └──┘ retryable failure (retryCount += 1, backoff)
 *     │             └──▶ failed (fatal, or retries exhausted)
 *     ├──▶ filtered-out
 *     └──▶ failed (configuration)
 *
 * `submit` records the push as queued and starts one background run per
 * push. Runs share nothing but the store; each push id is written only by
 * its own run.
 *
 * Every transition goes: store put → notifier publish → event log → metrics.
 */

import { randomUUID } from "node:crypto";
import type { Catalog } from "../catalog/catalog.js";
import type { RetryPolicy } from "../config/settings.js";
import { DEFAULT_RETRY_POLICY } from "../config/settings.js";
import type { DeliveryOutcome } from "../destinations/adapter.js";
import { resolveAdapter, type AdapterRegistry } from "../destinations/registry.js";
import { UnavailableError, ValidationError } from "../errors.js";
import type { EventLogger } from "../events/logger.js";
import type { StatusNotifier } from "../events/status-notifier.js";
import { evaluateRule } from "../filter/filter-engine.js";
import type { PushMetrics } from "../metrics/exporter.js";
import { deepFreeze } from "../schemas/content.js";
import type { EventType } from "../schemas/event.js";
import {
  isTerminal,
  PushRequest,
  type PushError,
  type PushRecord,
  type PushStatus,
} from "../schemas/push.js";
import type { FilterRule } from "../schemas/rule.js";
import { generateStatement, type GenerateOptions } from "../statement/generator.js";
import type { IPushStore } from "../store/interfaces.js";
import { computeBackoffMs, shouldRetry, sleep } from "./retry.js";

const ACTOR = "orchestrator";

export const SHUTDOWN_DURING_BACKOFF = "shutdown during backoff";

export const FORCED_FILTER_REASON = "Filter bypassed (force)";

export interface PushOrchestratorDependencies {
  store: IPushStore;
  notifier: StatusNotifier;
  catalog: Catalog;
  adapters: AdapterRegistry;
  logger?: EventLogger;
  metrics?: PushMetrics;
}

export interface PushOrchestratorConfig {
  retry?: RetryPolicy;
  /** Push id factory (defaults to randomUUID). */
  idFactory?: () => string;
  now?: () => Date;
  /** Passed to the statement generator on every attempt. */
  statement?: GenerateOptions;
}

/** Fields a run may change on a record; revision and timestamps are managed here. */
type RecordPatch = Partial<
  Pick<PushRecord, "retryCount" | "lastError" | "filterReason" | "statementId">
>;

const TERMINAL_EVENTS: Partial<Record<PushStatus, EventType>> = {
  "filtered-out": "push.filtered",
  "delivered": "push.delivered",
  "failed": "push.failed",
};

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class PushOrchestrator {
  private readonly store: IPushStore;
  private readonly notifier: StatusNotifier;
  private readonly catalog: Catalog;
  private readonly adapters: AdapterRegistry;
  private readonly logger?: EventLogger;
  private readonly metrics?: PushMetrics;
  private readonly retry: RetryPolicy;
  private readonly idFactory: () => string;
  private readonly now: () => Date;
  private readonly statementOptions: GenerateOptions;

  private readonly inFlight = new Set<Promise<void>>();
  private readonly shutdown = new AbortController();

  constructor(deps: PushOrchestratorDependencies, config: PushOrchestratorConfig = {}) {
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.catalog = deps.catalog;
    this.adapters = deps.adapters;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.retry = config.retry ?? DEFAULT_RETRY_POLICY;
    this.idFactory = config.idFactory ?? randomUUID;
    this.now = config.now ?? (() => new Date());
    this.statementOptions = config.statement ?? {};
  }

  /** Number of runs that have not finished yet. */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get accepting(): boolean {
    return !this.shutdown.signal.aborted;
  }

  /**
   * Validate a push request, record it as queued and start its run.
   *
   * @throws ValidationError when the request is malformed
   * @throws UnavailableError after shutdown has begun
   */
  async submit(input: unknown): Promise<PushRecord> {
    const parsed = PushRequest.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod("push request", parsed.error);
    }
    if (!this.accepting) {
      throw new UnavailableError("Push service is shutting down");
    }

    const request = parsed.data;
    const timestamp = this.now().toISOString();
    const queued = await this.store.put({
      id: this.idFactory(),
      content: deepFreeze(request.content),
      destination: request.destination,
      force: request.force,
      status: "queued",
      retryCount: 0,
      revision: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
    });
    this.notifier.publish(queued);
    await this.safeLog(() =>
      this.logger?.log("push.submitted", "api", {
        pushId: queued.id,
        payload: { destination: queued.destination, force: queued.force },
      }),
    );
    this.metrics?.recordSubmission(queued.destination);

    this.track(queued);
    return queued;
  }

  /**
   * Wait for in-flight runs. Resolves true when all finished within
   * `timeoutMs`, false on timeout.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = (async () => {
      // Runs started while draining are waited for as well
      while (this.inFlight.size > 0) {
        await Promise.allSettled([...this.inFlight]);
      }
      return true as const;
    })();

    try {
      return await Promise.race([settled, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Stop accepting pushes, cut backoff waits short and drain.
   * Pushes interrupted during backoff end as failed.
   */
  async stop(drainTimeoutMs: number): Promise<boolean> {
    this.shutdown.abort();
    return this.drain(drainTimeoutMs);
  }

  private track(queued: PushRecord): void {
    this.metrics?.inFlight.inc();
    const run: Promise<void> = this.run(queued)
      .catch((err: unknown) => this.handleRunError(queued.id, err))
      .finally(() => {
        this.inFlight.delete(run);
        this.metrics?.inFlight.dec();
      });
    this.inFlight.add(run);
  }

  private async run(queued: PushRecord): Promise<void> {
    let record = queued;

    const destination = this.catalog.getDestination(record.destination);
    if (!destination) {
      await this.fail(record, {
        kind: "configuration",
        message: `Unknown destination: ${record.destination}`,
      });
      return;
    }

    let rule: FilterRule | undefined;
    if (destination.ruleId !== undefined) {
      rule = this.catalog.getRule(destination.ruleId);
      if (!rule) {
        await this.fail(record, {
          kind: "configuration",
          message: `Destination ${destination.name} references unknown filter rule: ${destination.ruleId}`,
        });
        return;
      }
    }

    const adapter = resolveAdapter(this.adapters, destination.kind);
    if (!adapter) {
      await this.fail(record, {
        kind: "configuration",
        message: `No adapter registered for destination kind: ${destination.kind}`,
      });
      return;
    }

    let filterReason = FORCED_FILTER_REASON;
    if (!record.force) {
      const decision = evaluateRule(record.content, rule);
      if (!decision.matched) {
        await this.transition(record, "filtered-out", { filterReason: decision.reason }, decision.reason);
        return;
      }
      filterReason = decision.reason;
    }

    record = await this.transition(record, "in-progress", { filterReason });

    for (;;) {
      // Fresh statement (id, timestamp) per attempt
      const statement = generateStatement(record.content, this.statementOptions);
      const attempt = record.retryCount + 1;
      const started = Date.now();
      const outcome = await adapter.deliver(statement, record.content, destination);
      const durationMs = Date.now() - started;
      await this.recordAttempt(record, attempt, outcome, durationMs);

      if (outcome.kind === "delivered") {
        await this.transition(record, "delivered", { statementId: statement.id });
        return;
      }

      if (outcome.kind === "fatal-failure") {
        await this.transition(record, "failed", {
          statementId: statement.id,
          lastError: { kind: "fatal", message: outcome.reason, httpStatus: outcome.httpStatus },
        }, outcome.reason);
        return;
      }

      const retryCount = record.retryCount + 1;
      const lastError: PushError = {
        kind: "retryable",
        message: outcome.reason,
        httpStatus: outcome.httpStatus,
      };

      if (!shouldRetry(retryCount, this.retry)) {
        await this.transition(record, "failed", {
          retryCount,
          lastError,
          statementId: statement.id,
        }, `Retries exhausted: ${outcome.reason}`);
        return;
      }

      record = await this.transition(record, "in-progress", {
        retryCount,
        lastError,
        statementId: statement.id,
      }, outcome.reason);

      const delayMs = computeBackoffMs(retryCount, this.retry);
      await this.safeLog(() =>
        this.logger?.log("delivery.retry-scheduled", ACTOR, {
          pushId: record.id,
          payload: { destination: destination.name, retryCount, delayMs },
        }),
      );

      const waited = await sleep(delayMs, this.shutdown.signal);
      if (!waited) {
        await this.fail(record, { kind: "retryable", message: SHUTDOWN_DURING_BACKOFF });
        return;
      }
    }
  }

  private async fail(record: PushRecord, error: PushError): Promise<PushRecord> {
    return this.transition(record, "failed", { lastError: error }, error.message);
  }

  /**
   * Write the next snapshot of a push and announce it.
   */
  private async transition(
    current: PushRecord,
    status: PushStatus,
    patch: RecordPatch = {},
    reason?: string,
  ): Promise<PushRecord> {
    const timestamp = this.now().toISOString();
    const terminal = isTerminal(status);

    const stored = await this.store.put({
      ...current,
      ...patch,
      status,
      revision: current.revision + 1,
      updatedAt: timestamp,
      completedAt: terminal ? timestamp : undefined,
    });

    this.notifier.publish(stored);

    await this.safeLog(() =>
      this.logger?.logTransition(stored.id, current.status, status, ACTOR, reason),
    );
    const terminalEvent = TERMINAL_EVENTS[status];
    if (terminalEvent) {
      await this.safeLog(() =>
        this.logger?.log(terminalEvent, ACTOR, {
          pushId: stored.id,
          payload: {
            destination: stored.destination,
            retryCount: stored.retryCount,
            error: stored.lastError?.message,
            filterReason: status === "filtered-out" ? stored.filterReason : undefined,
          },
        }),
      );
      this.metrics?.recordTerminal(stored.destination, status);
    }

    return stored;
  }

  private async recordAttempt(
    record: PushRecord,
    attempt: number,
    outcome: DeliveryOutcome,
    durationMs: number,
  ): Promise<void> {
    await this.safeLog(() =>
      this.logger?.logDelivery(record.id, {
        destination: record.destination,
        attempt,
        outcome: outcome.kind,
        httpStatus: outcome.httpStatus,
        durationMs,
        error: outcome.kind === "delivered" ? undefined : outcome.reason,
      }),
    );
    this.metrics?.recordDeliveryAttempt(record.destination, outcome.kind, durationMs / 1000);
  }

  /** Audit log failures are reported and otherwise ignored. */
  private async safeLog(write: () => Promise<unknown> | undefined): Promise<void> {
    try {
      await write();
    } catch (err) {
      console.warn(`[push] Event log write failed: ${describeError(err)}`);
    }
  }

  /** Unexpected error inside a run (store failure, adapter bug). */
  private async handleRunError(pushId: string, err: unknown): Promise<void> {
    const message = describeError(err);
    console.error(`[push] Run for ${pushId} failed unexpectedly: ${message}`);

    try {
      const latest = await this.store.get(pushId);
      if (latest && !isTerminal(latest.status)) {
        await this.fail(latest, { kind: "fatal", message: `Internal error: ${message}` });
      }
    } catch (markErr) {
      console.error(`[push] Could not mark ${pushId} as failed: ${describeError(markErr)}`);
    }
  }
}
