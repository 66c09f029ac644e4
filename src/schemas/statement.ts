/**
 * Activity statement schema: "actor performed verb on object, with result,
 * in context". Shaped after xAPI 1.0.3 statements so record stores accept it
 * unchanged.
 *
 * Statements are generated fresh per delivery attempt and never persisted
 * as pipeline state.
 */

import { z } from "zod";

/** Language-tagged string map, e.g. { "en-US": "completed" }. */
export const LanguageMap = z.record(z.string(), z.string());
export type LanguageMap = z.infer<typeof LanguageMap>;

export const StatementActor = z.object({
  objectType: z.literal("Agent"),
  name: z.string(),
  mbox: z.string().startsWith("mailto:"),
});
export type StatementActor = z.infer<typeof StatementActor>;

export const StatementVerb = z.object({
  id: z.string().url(),
  display: LanguageMap,
});
export type StatementVerb = z.infer<typeof StatementVerb>;

export const StatementObject = z.object({
  objectType: z.literal("Activity"),
  id: z.string().url(),
  definition: z.object({
    name: LanguageMap,
    description: LanguageMap,
    type: z.string().url(),
  }),
});
export type StatementObject = z.infer<typeof StatementObject>;

export const StatementResult = z.object({
  score: z.object({ raw: z.string() }),
  completion: z.boolean(),
  success: z.boolean(),
});
export type StatementResult = z.infer<typeof StatementResult>;

export const StatementContext = z.object({
  instructor: z.object({
    objectType: z.literal("Agent"),
    name: z.string(),
  }),
  platform: z.string(),
  language: z.string(),
  extensions: z.record(z.string(), z.unknown()),
});
export type StatementContext = z.infer<typeof StatementContext>;

export const ActivityStatement = z.object({
  id: z.string().uuid(),
  timestamp: z.string().datetime(),
  actor: StatementActor,
  verb: StatementVerb,
  object: StatementObject,
  result: StatementResult.optional(),
  context: StatementContext,
});
export type ActivityStatement = z.infer<typeof ActivityStatement>;
