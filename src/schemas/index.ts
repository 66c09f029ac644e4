/**
 * Schema barrel export: all Zod schemas for the push relay.
 */

export {
  ContentType,
  Grade,
  GRADE_SCALE,
  gradeRank,
  ContentRecord,
  deepFreeze,
} from "./content.js";
export type { ContentRecordInput } from "./content.js";

export { FilterRuleSpec, FilterRule } from "./rule.js";
export type { FilterRuleSpecInput } from "./rule.js";

export { DestinationKind, DestinationConfig, summarizeDestination } from "./destination.js";
export type { DestinationConfigInput, DestinationSummary } from "./destination.js";

export {
  LanguageMap,
  StatementActor,
  StatementVerb,
  StatementObject,
  StatementResult,
  StatementContext,
  ActivityStatement,
} from "./statement.js";

export {
  PushStatus,
  TERMINAL_STATUSES,
  isTerminal,
  VALID_TRANSITIONS,
  isValidTransition,
  PushErrorKind,
  PushError,
  PushRequest,
  PushRecord,
} from "./push.js";
export type { PushRequestInput } from "./push.js";

export {
  EventType,
  BaseEvent,
  TransitionPayload,
  DeliveryPayload,
} from "./event.js";
