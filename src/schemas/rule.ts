/**
 * Filter rule schema: a named predicate restricting which content records
 * may be pushed to a destination.
 */

import { z } from "zod";
import { ContentType, Grade } from "./content.js";

/** Rule body as supplied by an operator (create / diagnostic requests). */
export const FilterRuleSpec = z.object({
  name: z.string().min(1),
  /** Allowed content types; empty means every type is allowed. */
  contentTypes: z.array(ContentType).default([]),
  /** Minimum grade on the F..A scale; ungraded content fails when set. */
  minGrade: Grade.optional(),
  /** Every tag listed must be present on the record (case-sensitive). */
  requiredTags: z.array(z.string()).default([]),
  /** Allowed learner groups; empty means every group is allowed. */
  learnerGroups: z.array(z.string()).default([]),
  active: z.boolean().default(true),
});
export type FilterRuleSpec = z.infer<typeof FilterRuleSpec>;
export type FilterRuleSpecInput = z.input<typeof FilterRuleSpec>;

/** Stored rule. */
export const FilterRule = FilterRuleSpec.extend({
  id: z.string().min(1),
  createdAt: z.string().datetime(),
});
export type FilterRule = z.infer<typeof FilterRule>;
