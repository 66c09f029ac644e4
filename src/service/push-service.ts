import { join } from "node:path";
import { Catalog } from "../catalog/catalog.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy, type SeedRule } from "../config/settings.js";
import { createAdapterRegistry, type AdapterRegistry } from "../destinations/registry.js";
import { DrivePushRequest, toPushRequest } from "../destinations/drive-links.js";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "../destinations/http-delivery.js";
import { NotFoundError, UnavailableError, ValidationError } from "../errors.js";
import { EventLogger } from "../events/logger.js";
import { StatusNotifier, type StatusSubscription } from "../events/status-notifier.js";
import { evaluateRule, type FilterDecision, type RuleCriteria } from "../filter/filter-engine.js";
import type { PushMetrics } from "../metrics/exporter.js";
import { PushOrchestrator } from "../push/orchestrator.js";
import { ContentRecord, type ContentType, type Grade } from "../schemas/content.js";
import type { DestinationConfig } from "../schemas/destination.js";
import { PushStatus, type PushRecord } from "../schemas/push.js";
import { FilterRuleSpec, type FilterRule } from "../schemas/rule.js";
import type { GenerateOptions } from "../statement/generator.js";
import { FilesystemPushStore } from "../store/filesystem-push-store.js";
import type { IPushStore, PushListFilter } from "../store/interfaces.js";
import { MemoryPushStore } from "../store/memory-push-store.js";

/** Maximum time to wait for in-flight pushes during shutdown (ms). */
const DRAIN_TIMEOUT_MS = 10_000;

export interface PushServiceConfig {
  dataDir: string;
  /** "filesystem" persists push records and the catalog under dataDir. */
  storage?: "memory" | "filesystem";
  retry?: RetryPolicy;
  requestTimeoutMs?: number;
  drainTimeoutMs?: number;
  /** Seed destinations and rules (from settings). */
  destinations?: DestinationConfig[];
  rules?: SeedRule[];
}

export interface PushServiceDependencies {
  store?: IPushStore;
  catalog?: Catalog;
  notifier?: StatusNotifier;
  logger?: EventLogger;
  metrics?: PushMetrics;
  /** Adapter table; defaults to the HTTP adapters. */
  adapters?: AdapterRegistry;
  /** Push id factory and clock, for tests. */
  idFactory?: () => string;
  now?: () => Date;
  statement?: GenerateOptions;
}

export interface PushServiceStatus {
  running: boolean;
  startedAt?: string;
  inFlight: number;
  storage: "memory" | "filesystem";
  destinations: number;
  rules: number;
}

export interface SubmitResult {
  pushId: string;
  status: PushStatus;
}

export interface PushQuery {
  status?: string;
  destination?: string;
  /** Only pushes created within the last N hours. */
  sinceHours?: number;
  limit?: number;
}

export interface TestFilterResult extends FilterDecision {
  contentSummary: {
    contentType: ContentType;
    grade?: Grade;
    tags: string[];
  };
}

/**
 * Evaluate content against a stored rule (by id), an inline rule, or no
 * rule at all.
 *
 * @throws ValidationError for malformed content or an invalid inline rule
 * @throws NotFoundError for an unknown rule id
 */
export function testFilter(catalog: Catalog, content: unknown, rule?: unknown): TestFilterResult {
  const parsed = ContentRecord.safeParse(content);
  if (!parsed.success) {
    throw ValidationError.fromZod("content record", parsed.error);
  }
  const record = parsed.data;

  let criteria: RuleCriteria | undefined;
  if (typeof rule === "string") {
    criteria = catalog.getRule(rule);
    if (!criteria) throw new NotFoundError(`Filter rule not found: ${rule}`);
  } else if (rule !== undefined && rule !== null) {
    const inline = FilterRuleSpec.safeParse(rule);
    if (!inline.success) {
      throw ValidationError.fromZod("filter rule", inline.error);
    }
    criteria = inline.data;
  }

  return {
    ...evaluateRule(record, criteria),
    contentSummary: {
      contentType: record.contentType,
      grade: record.grade,
      tags: record.tags,
    },
  };
}

/**
 * PushService: the facade the gateway and CLI talk to.
 *
 * Owns the push store, catalog, notifier and event log. A stopped service
 * is not restarted; build a new one.
 */
export class PushService {
  readonly store: IPushStore;
  readonly catalog: Catalog;
  readonly notifier: StatusNotifier;
  readonly logger: EventLogger;
  readonly metrics?: PushMetrics;
  private readonly adapters: AdapterRegistry;
  private readonly config: PushServiceConfig;
  private readonly deps: PushServiceDependencies;

  private orchestrator?: PushOrchestrator;
  private running = false;
  private stopped = false;
  private startedAt?: string;

  constructor(deps: PushServiceDependencies, config: PushServiceConfig) {
    this.deps = deps;
    this.config = config;
    const persistent = (config.storage ?? "filesystem") === "filesystem";

    this.store = deps.store ?? (persistent
      ? new FilesystemPushStore(config.dataDir)
      : new MemoryPushStore());
    this.catalog = deps.catalog ?? new Catalog({
      filePath: persistent ? join(config.dataDir, "catalog.yaml") : undefined,
      now: deps.now,
    });
    this.notifier = deps.notifier ?? new StatusNotifier();
    const metrics = deps.metrics;
    this.logger = deps.logger ?? new EventLogger(join(config.dataDir, "events"), {
      onEvent: metrics ? (event) => metrics.recordEvent(event.type) : undefined,
    });
    this.metrics = metrics;
    this.adapters = deps.adapters ?? createAdapterRegistry({
      timeoutMs: config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    if (this.stopped) throw new Error("Push service cannot be restarted after stop");

    await this.store.init();
    await this.catalog.init({
      rules: this.config.rules,
      destinations: this.config.destinations,
    });

    this.orchestrator = new PushOrchestrator(
      {
        store: this.store,
        notifier: this.notifier,
        catalog: this.catalog,
        adapters: this.adapters,
        logger: this.logger,
        metrics: this.metrics,
      },
      {
        retry: this.config.retry ?? DEFAULT_RETRY_POLICY,
        idFactory: this.deps.idFactory,
        now: this.deps.now,
        statement: this.deps.statement,
      },
    );

    this.running = true;
    this.startedAt = new Date().toISOString();
    this.metrics?.serviceUp.set(1);

    try {
      await this.logger.logSystem("system.startup", {
        storage: this.config.storage ?? "filesystem",
        destinations: this.catalog.listDestinations().map((d) => d.name),
        rules: this.catalog.listRules().length,
      });
    } catch (err) {
      console.warn(`[push] Failed to log startup: ${(err as Error).message}`);
    }
  }

  /**
   * Stop accepting pushes and drain in-flight runs. Backoff waits are cut
   * short; those pushes end as failed.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.stopped = true;
    this.metrics?.serviceUp.set(0);

    const drainTimeoutMs = this.config.drainTimeoutMs ?? DRAIN_TIMEOUT_MS;
    const drainStart = Date.now();
    const inFlight = this.orchestrator?.inFlightCount ?? 0;

    console.info(`[push] Drain started, waiting for ${inFlight} in-flight push(es)...`);
    try {
      await this.logger.logSystem("system.shutdown", {
        drainTimeoutMs,
        inFlight,
        reason: "stop_signal",
      });
    } catch {
      // Logging errors should not block shutdown
    }

    const drained = this.orchestrator ? await this.orchestrator.stop(drainTimeoutMs) : true;
    if (drained) {
      console.info(`[push] Drain complete (${Date.now() - drainStart}ms)`);
    } else {
      console.warn(`[push] Drain timeout after ${drainTimeoutMs}ms, abandoning in-flight pushes`);
    }

    this.notifier.close();
    await this.store.close();
  }

  getStatus(): PushServiceStatus {
    return {
      running: this.running,
      startedAt: this.startedAt,
      inFlight: this.orchestrator?.inFlightCount ?? 0,
      storage: this.config.storage ?? "filesystem",
      destinations: this.catalog.listDestinations().length,
      rules: this.catalog.listRules().length,
    };
  }

  private requireOrchestrator(): PushOrchestrator {
    if (!this.running || !this.orchestrator) {
      throw new UnavailableError("Push service is not running");
    }
    return this.orchestrator;
  }

  // --- Pushes ---

  /**
   * Accept a push request. Returns once the push is recorded as queued;
   * delivery continues in the background.
   */
  async submit(input: unknown): Promise<SubmitResult> {
    const record = await this.requireOrchestrator().submit(input);
    return { pushId: record.id, status: record.status };
  }

  /** Accept content hosted on a shared drive; the share link becomes the content URL. */
  async submitFromDrive(input: unknown): Promise<SubmitResult> {
    const parsed = DrivePushRequest.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod("drive push request", parsed.error);
    }
    return this.submit(toPushRequest(parsed.data));
  }

  async getPush(id: string): Promise<PushRecord | undefined> {
    return this.store.get(id);
  }

  async listPushes(query: PushQuery = {}): Promise<PushRecord[]> {
    const filter: PushListFilter = {};

    if (query.status !== undefined) {
      const status = PushStatus.safeParse(query.status);
      if (!status.success) {
        throw new ValidationError(`Unknown push status: ${query.status}`, [
          { path: "status", message: `Expected one of ${PushStatus.options.join(", ")}` },
        ]);
      }
      filter.status = status.data;
    }
    if (query.sinceHours !== undefined) {
      if (!Number.isFinite(query.sinceHours) || query.sinceHours <= 0) {
        throw new ValidationError("sinceHours must be a positive number", [
          { path: "sinceHours", message: "Expected a positive number" },
        ]);
      }
      filter.since = new Date((this.deps.now?.() ?? new Date()).getTime() - query.sinceHours * 3_600_000);
    }
    if (query.limit !== undefined) {
      if (!Number.isInteger(query.limit) || query.limit < 0) {
        throw new ValidationError("limit must be a non-negative integer", [
          { path: "limit", message: "Expected a non-negative integer" },
        ]);
      }
      filter.limit = query.limit;
    }
    filter.destination = query.destination;

    return this.store.list(filter);
  }

  /**
   * Live snapshots of one push, ending after its terminal status.
   * Returns undefined for an unknown push.
   */
  async subscribe(pushId: string): Promise<StatusSubscription | undefined> {
    return this.notifier.subscribe(pushId, () => this.store.get(pushId));
  }

  // --- Catalog ---

  async createRule(input: unknown): Promise<FilterRule> {
    const rule = await this.catalog.createRule(input);
    await this.logCatalog("rule.created", { ruleId: rule.id, name: rule.name });
    return rule;
  }

  listRules(): FilterRule[] {
    return this.catalog.listRules();
  }

  getRule(id: string): FilterRule | undefined {
    return this.catalog.getRule(id);
  }

  async createDestination(input: unknown): Promise<DestinationConfig> {
    const destination = await this.catalog.createDestination(input);
    await this.logCatalog("destination.created", {
      name: destination.name,
      kind: destination.kind,
      ruleId: destination.ruleId,
    });
    return destination;
  }

  listDestinations(): DestinationConfig[] {
    return this.catalog.listDestinations();
  }

  /**
   * Dry-run the filter engine.
   *
   * @param rule - stored rule id, an inline rule, or nothing (no rule)
   */
  testFilter(content: unknown, rule?: unknown): TestFilterResult {
    return testFilter(this.catalog, content, rule);
  }

  private async logCatalog(
    type: "rule.created" | "destination.created",
    payload: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.logger.log(type, "api", { payload });
    } catch (err) {
      console.warn(`[push] Event log write failed: ${(err as Error).message}`);
    }
  }
}
