import { describe, it, expect } from "vitest";
import { evaluateRule, matches, type RuleCriteria } from "../filter-engine.js";
import { makeContent } from "../../testing/fixtures.js";

function rule(overrides: Partial<RuleCriteria> = {}): RuleCriteria {
  return {
    name: "honours",
    contentTypes: [],
    requiredTags: [],
    learnerGroups: [],
    ...overrides,
  };
}

describe("evaluateRule", () => {
  it("admits everything when no rule is configured", () => {
    const decision = evaluateRule(makeContent(), undefined);
    expect(decision).toEqual({
      matched: true,
      reason: "No filter rule configured - allowing content",
    });
  });

  it("admits everything under an inactive rule", () => {
    const decision = evaluateRule(
      makeContent({ contentType: "video" }),
      rule({ contentTypes: ["essay"], active: false }),
    );
    expect(decision.matched).toBe(true);
    expect(decision.reason).toBe("Filter rule honours is inactive - allowing content");
  });

  it("passes with the rule name when every check holds", () => {
    const content = makeContent({
      contentType: "essay",
      grade: "A",
      tags: ["capstone", "writing"],
      learnerGroup: "cohort-a",
    });
    const decision = evaluateRule(content, rule({
      contentTypes: ["essay", "project"],
      minGrade: "B",
      requiredTags: ["writing"],
      learnerGroups: ["cohort-a", "cohort-b"],
    }));
    expect(decision).toEqual({ matched: true, reason: "Matches rule: honours" });
  });

  describe("content type", () => {
    it("rejects a type outside the allowed list", () => {
      const decision = evaluateRule(
        makeContent({ contentType: "video" }),
        rule({ contentTypes: ["essay", "quiz"] }),
      );
      expect(decision).toEqual({
        matched: false,
        reason: "Content type 'video' not in [essay, quiz]",
        failedCheck: "content-type",
      });
    });

    it("allows every type when the list is empty", () => {
      expect(matches(makeContent({ contentType: "audio" }), rule())).toBe(true);
    });
  });

  describe("grade threshold", () => {
    it("A meets minimum B", () => {
      expect(matches(makeContent({ grade: "A" }), rule({ minGrade: "B" }))).toBe(true);
    });

    it("grade equal to the minimum passes", () => {
      expect(matches(makeContent({ grade: "C" }), rule({ minGrade: "C" }))).toBe(true);
    });

    it("rejects a grade below the minimum", () => {
      const decision = evaluateRule(makeContent({ grade: "D" }), rule({ minGrade: "C" }));
      expect(decision).toEqual({
        matched: false,
        reason: "Grade D is below minimum grade C",
        failedCheck: "grade",
      });
    });

    it("ungraded content fails a rule with a minimum", () => {
      const decision = evaluateRule(makeContent(), rule({ minGrade: "C" }));
      expect(decision.matched).toBe(false);
      expect(decision.reason).toBe("Ungraded content does not meet minimum grade C");
    });

    it("ungraded content passes a rule without a minimum", () => {
      expect(matches(makeContent(), rule())).toBe(true);
    });

    it("normalizes lower-case grades on input", () => {
      expect(matches(makeContent({ grade: "b" }), rule({ minGrade: "B" }))).toBe(true);
    });
  });

  describe("required tags", () => {
    it("lists every missing tag", () => {
      const decision = evaluateRule(
        makeContent({ tags: ["writing"] }),
        rule({ requiredTags: ["capstone", "writing", "final"] }),
      );
      expect(decision.reason).toBe("Missing required tags: capstone, final");
      expect(decision.failedCheck).toBe("tags");
    });

    it("matches tags case-sensitively", () => {
      expect(matches(makeContent({ tags: ["Capstone"] }), rule({ requiredTags: ["capstone"] }))).toBe(false);
    });

    it("ignores tag order and extra tags", () => {
      const content = makeContent({ tags: ["final", "extra", "capstone"] });
      expect(matches(content, rule({ requiredTags: ["capstone", "final"] }))).toBe(true);
    });
  });

  describe("learner group", () => {
    it("rejects a group outside the allowed list", () => {
      const decision = evaluateRule(
        makeContent({ learnerGroup: "cohort-c" }),
        rule({ learnerGroups: ["cohort-a"] }),
      );
      expect(decision.reason).toBe("Learner group 'cohort-c' not in [cohort-a]");
      expect(decision.failedCheck).toBe("learner-group");
    });

    it("rejects a record without a group under a group restriction", () => {
      const decision = evaluateRule(makeContent(), rule({ learnerGroups: ["cohort-a"] }));
      expect(decision.reason).toBe("Learner group 'none' not in [cohort-a]");
    });
  });

  it("reports only the first failing check", () => {
    const decision = evaluateRule(
      makeContent({ contentType: "video", grade: "F", tags: [] }),
      rule({ contentTypes: ["essay"], minGrade: "A", requiredTags: ["x"] }),
    );
    expect(decision.failedCheck).toBe("content-type");
  });

  it("does not mutate its inputs", () => {
    const content = makeContent({ tags: ["b", "a"] });
    const criteria = rule({ requiredTags: ["a"] });
    evaluateRule(content, criteria);
    expect(content.tags).toEqual(["b", "a"]);
    expect(criteria.requiredTags).toEqual(["a"]);
  });
});
