import { describe, it, expect } from "vitest";
import {
  ACTIVITY_TYPES,
  EXTENSION_KEYS,
  generateStatement,
  selectVerb,
  VERBS,
} from "../generator.js";
import { ActivityStatement } from "../../schemas/statement.js";
import { FIXED_NOW, makeContent, sequentialIds } from "../../testing/fixtures.js";

const fixedOptions = () => ({
  idFactory: sequentialIds(),
  now: () => FIXED_NOW,
});

describe("generateStatement", () => {
  it("builds a complete statement for graded content", () => {
    const content = makeContent({
      grade: "A",
      description: "Structural essay",
      tags: ["capstone"],
      metadata: { wordCount: 2400 },
      learnerGroup: "cohort-a",
    });

    const statement = generateStatement(content, fixedOptions());

    expect(statement).toEqual({
      id: "00000000-0000-4000-8000-000000000001",
      timestamp: "2025-03-01T12:00:00.000Z",
      actor: {
        objectType: "Agent",
        name: "Ada Learner",
        mbox: "mailto:ada@example.com",
      },
      verb: {
        id: "http://adlnet.gov/expapi/verbs/completed",
        display: { "en-US": "completed" },
      },
      object: {
        objectType: "Activity",
        id: "http://lms.example.com/content/essay-42",
        definition: {
          name: { "en-US": "On Bridges" },
          description: { "en-US": "Structural essay" },
          type: "http://adlnet.gov/expapi/activities/essay",
        },
      },
      result: {
        score: { raw: "A" },
        completion: true,
        success: true,
      },
      context: {
        instructor: { objectType: "Agent", name: "LMS System" },
        platform: "LMS Platform",
        language: "en-US",
        extensions: {
          "http://lms.example.com/content_type": "essay",
          "http://lms.example.com/tags": ["capstone"],
          "http://lms.example.com/metadata": { wordCount: 2400 },
          "http://lms.example.com/learner_group": "cohort-a",
        },
      },
    });
  });

  it("omits the result for ungraded content", () => {
    const statement = generateStatement(makeContent(), fixedOptions());
    expect(statement.result).toBeUndefined();
    expect("result" in statement).toBe(false);
  });

  it("uses an empty description when none is given", () => {
    const statement = generateStatement(makeContent(), fixedOptions());
    expect(statement.object.definition.description).toEqual({ "en-US": "" });
  });

  it("leaves out the learner group extension when there is no group", () => {
    const statement = generateStatement(makeContent(), fixedOptions());
    expect(Object.keys(statement.context.extensions)).toEqual([
      EXTENSION_KEYS.contentType,
      EXTENSION_KEYS.tags,
      EXTENSION_KEYS.metadata,
    ]);
  });

  it("uses the content type as the activity type for quizzes", () => {
    const statement = generateStatement(makeContent({ contentType: "quiz" }), fixedOptions());
    expect(statement.object.definition.type).toBe(ACTIVITY_TYPES.quiz);
    expect(ACTIVITY_TYPES.quiz).toBe("http://adlnet.gov/expapi/activities/quiz");
  });

  it("escapes content ids in the activity id", () => {
    const statement = generateStatement(makeContent({ contentId: "unit 3/essay" }), fixedOptions());
    expect(statement.object.id).toBe("http://lms.example.com/content/unit%203%2Fessay");
  });

  it("is deterministic apart from id and timestamp", () => {
    const content = makeContent({ grade: "B", tags: ["x"] });
    const first = generateStatement(content, { idFactory: () => "a", now: () => FIXED_NOW });
    const second = generateStatement(content, {
      idFactory: () => "b",
      now: () => new Date("2026-01-01T00:00:00.000Z"),
    });

    const { id: _id1, timestamp: _t1, ...restFirst } = first;
    const { id: _id2, timestamp: _t2, ...restSecond } = second;
    expect(restFirst).toEqual(restSecond);
  });

  it("does not share mutable state with the content record", () => {
    const content = makeContent({ tags: ["capstone"] });
    const statement = generateStatement(content, fixedOptions());
    const tags = statement.context.extensions[EXTENSION_KEYS.tags];
    expect(tags).toEqual(["capstone"]);
    expect(tags).not.toBe(content.tags);
  });

  it("produces statements that satisfy the statement schema", () => {
    const statement = generateStatement(makeContent({ grade: "C" }));
    expect(ActivityStatement.safeParse(statement).success).toBe(true);
  });
});

describe("selectVerb", () => {
  it("completes every content type", () => {
    expect(selectVerb("essay")).toBe("completed");
    expect(selectVerb("quiz")).toBe("completed");
    expect(VERBS[selectVerb("video")].id).toBe("http://adlnet.gov/expapi/verbs/completed");
  });
});
