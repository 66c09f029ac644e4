/**
 * Statement generator: maps a content record onto an activity statement.
 *
 * Deterministic apart from the statement id and timestamp, which are taken
 * from the injectable `idFactory` and `now` at call time.
 */

import { randomUUID } from "node:crypto";
import type { ContentRecord, ContentType } from "../schemas/content.js";
import type { ActivityStatement, StatementResult, StatementVerb } from "../schemas/statement.js";

/** Namespace for activity ids and context extension keys. */
export const ACTIVITY_NAMESPACE = "http://lms.example.com";

export const PLATFORM_NAME = "LMS Platform";
export const INSTRUCTOR_NAME = "LMS System";
export const STATEMENT_LANGUAGE = "en-US";

/** Verb vocabulary. Only `completed` is emitted today. */
export const VERBS = {
  completed: {
    id: "http://adlnet.gov/expapi/verbs/completed",
    display: { "en-US": "completed" },
  },
  submitted: {
    id: "http://adlnet.gov/expapi/verbs/answered",
    display: { "en-US": "submitted" },
  },
} as const satisfies Record<string, StatementVerb>;
export type VerbName = keyof typeof VERBS;

/** Activity-type classification per content type. */
export const ACTIVITY_TYPES: Record<ContentType, string> = {
  essay: "http://adlnet.gov/expapi/activities/essay",
  video: "http://adlnet.gov/expapi/activities/video",
  audio: "http://adlnet.gov/expapi/activities/audio",
  presentation: "http://adlnet.gov/expapi/activities/presentation",
  code: "http://adlnet.gov/expapi/activities/code",
  quiz: "http://adlnet.gov/expapi/activities/quiz",
  project: "http://adlnet.gov/expapi/activities/project",
};

export const EXTENSION_KEYS = {
  contentType: `${ACTIVITY_NAMESPACE}/content_type`,
  tags: `${ACTIVITY_NAMESPACE}/tags`,
  metadata: `${ACTIVITY_NAMESPACE}/metadata`,
  learnerGroup: `${ACTIVITY_NAMESPACE}/learner_group`,
} as const;

export interface GenerateOptions {
  idFactory?: () => string;
  now?: () => Date;
}

/** Verb selection point. Every content type completes for now. */
export function selectVerb(_contentType: ContentType): VerbName {
  return "completed";
}

/** Graded content counts as completed and successful; ungraded carries no result. */
function buildResult(content: ContentRecord): StatementResult | undefined {
  if (content.grade === undefined) return undefined;
  return {
    score: { raw: content.grade },
    completion: true,
    success: true,
  };
}

export function generateStatement(
  content: ContentRecord,
  opts: GenerateOptions = {},
): ActivityStatement {
  const idFactory = opts.idFactory ?? randomUUID;
  const now = opts.now ?? (() => new Date());
  const verb = VERBS[selectVerb(content.contentType)];

  const extensions: Record<string, unknown> = {
    [EXTENSION_KEYS.contentType]: content.contentType,
    [EXTENSION_KEYS.tags]: [...content.tags],
    [EXTENSION_KEYS.metadata]: { ...content.metadata },
  };
  if (content.learnerGroup !== undefined) {
    extensions[EXTENSION_KEYS.learnerGroup] = content.learnerGroup;
  }

  const statement: ActivityStatement = {
    id: idFactory(),
    timestamp: now().toISOString(),
    actor: {
      objectType: "Agent",
      name: content.learnerName,
      mbox: `mailto:${content.learnerEmail}`,
    },
    verb: { id: verb.id, display: { ...verb.display } },
    object: {
      objectType: "Activity",
      id: `${ACTIVITY_NAMESPACE}/content/${encodeURIComponent(content.contentId)}`,
      definition: {
        name: { [STATEMENT_LANGUAGE]: content.title },
        description: { [STATEMENT_LANGUAGE]: content.description ?? "" },
        type: ACTIVITY_TYPES[content.contentType],
      },
    },
    context: {
      instructor: { objectType: "Agent", name: INSTRUCTOR_NAME },
      platform: PLATFORM_NAME,
      language: STATEMENT_LANGUAGE,
      extensions,
    },
  };

  const result = buildResult(content);
  if (result) statement.result = result;

  return statement;
}
