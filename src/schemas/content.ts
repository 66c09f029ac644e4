/**
 * Content record schema: the normalized unit of learner work handed to
 * the push pipeline by producers (LMS payload adapters, the HTTP gateway,
 * the CLI).
 *
 * Records are validated once at the submission boundary and frozen; no
 * pipeline stage mutates them afterwards.
 */

import { z } from "zod";

/** Content types the pipeline understands. */
export const ContentType = z.enum([
  "essay",
  "video",
  "audio",
  "presentation",
  "code",
  "quiz",
  "project",
]);
export type ContentType = z.infer<typeof ContentType>;

/** Letter grades, lowest first. Order matters: it is the ordinal scale. */
export const GRADE_SCALE = ["F", "D", "C", "B", "A"] as const;

/** Letter grade. Input is case-insensitive and normalized to upper case. */
export const Grade = z.preprocess(
  (input) => (typeof input === "string" ? input.trim().toUpperCase() : input),
  z.enum(GRADE_SCALE),
);
export type Grade = z.infer<typeof Grade>;

/** Position of a grade on the F..A scale (F = 0, A = 4). */
export function gradeRank(grade: Grade): number {
  return GRADE_SCALE.indexOf(grade);
}

export const ContentRecord = z.object({
  learnerId: z.string().min(1).describe("Stable learner identifier in the source system"),
  learnerName: z.string().min(1).describe("Display name"),
  learnerEmail: z.string().email().describe("Contact address, used as the statement actor mbox"),
  learnerGroup: z.string().min(1).optional().describe("Cohort / group / course section"),
  contentId: z.string().min(1),
  contentType: ContentType,
  title: z.string().min(1),
  description: z.string().optional(),
  contentUrl: z.string().min(1).describe("Location reference of the submitted work"),
  submissionDate: z.string().datetime({ offset: true }),
  grade: Grade.optional(),
  tags: z.array(z.string()).default([]),
  metadata: z.record(z.string(), z.unknown()).default({}),
});
export type ContentRecord = z.infer<typeof ContentRecord>;
/** Pre-validation shape (defaults not yet applied). */
export type ContentRecordInput = z.input<typeof ContentRecord>;

/** Recursively freeze a value so downstream stages cannot mutate it. */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
