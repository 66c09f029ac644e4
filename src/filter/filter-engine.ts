/**
 * Filter engine: decides whether a content record may be pushed under a
 * filter rule.
 *
 * Pure and synchronous: no I/O, no clock, no mutation. Checks run in a fixed
 * order and stop at the first failure:
 *   content type → grade threshold → required tags → learner group
 */

import { gradeRank, type ContentRecord } from "../schemas/content.js";
import type { FilterRuleSpec } from "../schemas/rule.js";

/** Name of the check that decided a rejection. */
export type FilterCheck = "content-type" | "grade" | "tags" | "learner-group";

export interface FilterDecision {
  matched: boolean;
  /** Human-readable explanation, shown by the diagnostic endpoint. */
  reason: string;
  /** Set when `matched` is false. */
  failedCheck?: FilterCheck;
}

/** Rule fields the engine reads; stored rules and inline specs both fit. */
export type RuleCriteria = Pick<
  FilterRuleSpec,
  "name" | "contentTypes" | "minGrade" | "requiredTags" | "learnerGroups"
> & { active?: boolean };

function reject(check: FilterCheck, reason: string): FilterDecision {
  return { matched: false, reason, failedCheck: check };
}

/**
 * Evaluate a record against a rule and explain the outcome.
 * A missing or inactive rule admits everything.
 */
export function evaluateRule(
  content: ContentRecord,
  rule: RuleCriteria | undefined,
): FilterDecision {
  if (!rule) {
    return { matched: true, reason: "No filter rule configured - allowing content" };
  }
  if (rule.active === false) {
    return { matched: true, reason: `Filter rule ${rule.name} is inactive - allowing content` };
  }

  if (rule.contentTypes.length > 0 && !rule.contentTypes.includes(content.contentType)) {
    return reject(
      "content-type",
      `Content type '${content.contentType}' not in [${rule.contentTypes.join(", ")}]`,
    );
  }

  if (rule.minGrade !== undefined) {
    if (content.grade === undefined) {
      return reject("grade", `Ungraded content does not meet minimum grade ${rule.minGrade}`);
    }
    if (gradeRank(content.grade) < gradeRank(rule.minGrade)) {
      return reject("grade", `Grade ${content.grade} is below minimum grade ${rule.minGrade}`);
    }
  }

  const missing = rule.requiredTags.filter((tag) => !content.tags.includes(tag));
  if (missing.length > 0) {
    return reject("tags", `Missing required tags: ${missing.join(", ")}`);
  }

  if (rule.learnerGroups.length > 0) {
    if (content.learnerGroup === undefined || !rule.learnerGroups.includes(content.learnerGroup)) {
      return reject(
        "learner-group",
        `Learner group '${content.learnerGroup ?? "none"}' not in [${rule.learnerGroups.join(", ")}]`,
      );
    }
  }

  return { matched: true, reason: `Matches rule: ${rule.name}` };
}

/** Boolean form of {@link evaluateRule}. */
export function matches(content: ContentRecord, rule: RuleCriteria | undefined): boolean {
  return evaluateRule(content, rule).matched;
}
