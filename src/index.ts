/**
 * lms-push-relay: filter learner content and push it as activity
 * statements to learning record stores and webhooks.
 */

export * from "./schemas/index.js";
export * from "./destinations/index.js";
export * from "./store/index.js";

export { evaluateRule, matches } from "./filter/filter-engine.js";
export type { FilterCheck, FilterDecision, RuleCriteria } from "./filter/filter-engine.js";

export {
  generateStatement,
  selectVerb,
  VERBS,
  ACTIVITY_TYPES,
  ACTIVITY_NAMESPACE,
  EXTENSION_KEYS,
} from "./statement/generator.js";
export type { GenerateOptions, VerbName } from "./statement/generator.js";

export { PushOrchestrator, SHUTDOWN_DURING_BACKOFF, FORCED_FILTER_REASON } from "./push/orchestrator.js";
export type { PushOrchestratorConfig, PushOrchestratorDependencies } from "./push/orchestrator.js";
export { computeBackoffMs, shouldRetry, sleep } from "./push/retry.js";

export { StatusNotifier, StatusSubscription } from "./events/status-notifier.js";
export { EventLogger } from "./events/logger.js";
export type { EventCallback, EventLoggerOptions } from "./events/logger.js";

export { Catalog } from "./catalog/catalog.js";
export type { CatalogOptions, CatalogSeed } from "./catalog/catalog.js";

export {
  Settings,
  RetryPolicy,
  SeedRule,
  DEFAULT_RETRY_POLICY,
  DEFAULT_DATA_DIR,
  loadSettings,
  resolveSettings,
  readSettingsFile,
} from "./config/settings.js";
export type { Env } from "./config/settings.js";

export { PushService, testFilter } from "./service/push-service.js";
export type {
  PushServiceConfig,
  PushServiceDependencies,
  PushServiceStatus,
  PushQuery,
  SubmitResult,
  TestFilterResult,
} from "./service/push-service.js";

export { PushMetrics } from "./metrics/exporter.js";
export type { MetricsState } from "./metrics/exporter.js";

export { createPushServer, listen, closeServer } from "./daemon/server.js";
export { startPushDaemon } from "./daemon/daemon.js";
export type { PushDaemonContext, PushDaemonOptions } from "./daemon/daemon.js";

export {
  PushRelayError,
  ValidationError,
  ConflictError,
  NotFoundError,
  UnavailableError,
} from "./errors.js";
export type { ErrorJSON, ValidationIssue } from "./errors.js";

export { SERVICE_NAME, VERSION } from "./version.js";
