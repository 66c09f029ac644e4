import { describe, it, expect } from "vitest";
import { ContentRecord, deepFreeze, gradeRank } from "../content.js";
import { isTerminal, isValidTransition, PushStatus } from "../push.js";
import { contentInput } from "../../testing/fixtures.js";

describe("ContentRecord", () => {
  it("normalizes grades to upper case", () => {
    const record = ContentRecord.parse(contentInput({ grade: " b " }));
    expect(record.grade).toBe("B");
  });

  it("applies defaults for tags and metadata", () => {
    const { tags: _tags, metadata: _metadata, ...bare } = contentInput();
    const record = ContentRecord.parse(bare);
    expect(record.tags).toEqual([]);
    expect(record.metadata).toEqual({});
  });

  it("rejects unknown content types and grades", () => {
    expect(ContentRecord.safeParse(contentInput({ contentType: "poem" })).success).toBe(false);
    expect(ContentRecord.safeParse(contentInput({ grade: "A+" })).success).toBe(false);
  });

  it("accepts submission dates with an offset", () => {
    const result = ContentRecord.safeParse(contentInput({ submissionDate: "2025-02-28T09:30:00+02:00" }));
    expect(result.success).toBe(true);
  });

  it("orders grades from F to A", () => {
    expect(gradeRank("F")).toBe(0);
    expect(gradeRank("C")).toBe(2);
    expect(gradeRank("A")).toBe(4);
  });
});

describe("deepFreeze", () => {
  it("freezes nested values", () => {
    const record = deepFreeze(ContentRecord.parse(contentInput({ tags: ["a"], metadata: { k: { v: 1 } } })));
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.tags)).toBe(true);
    expect(Object.isFrozen(record.metadata["k"])).toBe(true);
  });
});

describe("push state machine", () => {
  it("allows the lifecycle transitions", () => {
    expect(isValidTransition("queued", "in-progress")).toBe(true);
    expect(isValidTransition("queued", "filtered-out")).toBe(true);
    expect(isValidTransition("queued", "failed")).toBe(true);
    expect(isValidTransition("in-progress", "in-progress")).toBe(true);
    expect(isValidTransition("in-progress", "delivered")).toBe(true);
  });

  it("refuses skipping or leaving terminal states", () => {
    expect(isValidTransition("queued", "delivered")).toBe(false);
    expect(isValidTransition("in-progress", "queued")).toBe(false);
    expect(isValidTransition("delivered", "failed")).toBe(false);
  });

  it("knows the terminal statuses", () => {
    expect(PushStatus.options.filter(isTerminal)).toEqual(["filtered-out", "delivered", "failed"]);
  });
});
