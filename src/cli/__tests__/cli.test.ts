import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { contentInput } from "../../testing/fixtures.js";
import { formatDestination } from "../commands/destinations.js";
import { formatRule } from "../commands/rules.js";
import { createProgram } from "../program.js";

describe("lms-push CLI", () => {
  let tmpDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "push-cli-test-"));
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(tmpDir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<void> {
    const program = createProgram({}).exitOverride();
    await program.parseAsync(["node", "lms-push", "--data-dir", tmpDir, ...args]);
  }

  function logged(): string[] {
    return logSpy.mock.calls.map((call) => String(call[0]));
  }

  describe("rules", () => {
    it("reports an empty rule list", async () => {
      await run("rules", "list");
      expect(logged()).toEqual(["No filter rules configured"]);
    });

    it("adds a rule and lists it afterwards", async () => {
      await run(
        "rules", "add",
        "--name", "capstones",
        "--content-types", "essay,project",
        "--min-grade", "b",
        "--tags", "capstone",
      );

      const [created, detail] = logged();
      const id = created?.replace("✅ Rule created: ", "") ?? "";
      expect(created).toMatch(/^✅ Rule created: [0-9a-f-]{36}$/);
      expect(detail).toBe(`   ${id}  capstones  types=essay,project minGrade=B tags=capstone`);

      logSpy.mockClear();
      await run("rules", "list", "--json");
      const listed = JSON.parse(logged()[0] ?? "[]") as Array<{ id: string; minGrade: string }>;
      expect(listed).toHaveLength(1);
      expect(listed[0]).toMatchObject({ id, minGrade: "B" });
    });

    it("reports an invalid rule and sets the exit code", async () => {
      await run("rules", "add", "--name", "broken", "--min-grade", "E");

      expect(process.exitCode).toBe(1);
      expect(String(errorSpy.mock.calls[0]?.[0])).toMatch(/^❌ Invalid filter rule: minGrade: /);
    });
  });

  describe("destinations", () => {
    it("lists the default destinations without credentials", async () => {
      await run("destinations", "list");
      expect(logged()).toEqual([
        "main_lrs  record-store  https://lrs.example.com/xapi  (no token)",
        "analytics_webhook  webhook  https://analytics.example.com/webhook  (no token)",
      ]);
    });
  });

  describe("test-filter", () => {
    let contentFile: string;

    beforeEach(async () => {
      contentFile = join(tmpDir, "content.json");
      await writeFile(contentFile, JSON.stringify(contentInput({ grade: "C" })));
    });

    it("prints the decision without a rule", async () => {
      await run("test-filter", contentFile);

      const result = JSON.parse(logged()[0] ?? "{}") as { matched: boolean; reason: string };
      expect(result.matched).toBe(true);
      expect(result.reason).toBe("No filter rule configured - allowing content");
      expect(process.exitCode).toBeUndefined();
    });

    it("exits with 2 when the rule rejects the content", async () => {
      await run("rules", "add", "--name", "honours", "--min-grade", "A");
      const id = logged()[0]?.replace("✅ Rule created: ", "") ?? "";
      logSpy.mockClear();

      await run("test-filter", contentFile, "--rule", id);

      const result = JSON.parse(logged()[0] ?? "{}") as { matched: boolean; failedCheck: string };
      expect(result).toMatchObject({ matched: false, failedCheck: "grade" });
      expect(process.exitCode).toBe(2);
    });

    it("reports an unknown rule", async () => {
      await run("test-filter", contentFile, "--rule", "missing");

      expect(errorSpy).toHaveBeenCalledWith("❌ Filter rule not found: missing");
      expect(process.exitCode).toBe(1);
    });

    it("reports an unreadable content file", async () => {
      await run("test-filter", join(tmpDir, "absent.json"));

      expect(String(errorSpy.mock.calls[0]?.[0])).toMatch(/^❌ Cannot read .*absent\.json: /);
      expect(process.exitCode).toBe(1);
    });
  });
});

describe("formatters", () => {
  it("formats a rule without criteria", () => {
    expect(formatRule({
      id: "r1",
      name: "open",
      contentTypes: [],
      requiredTags: [],
      learnerGroups: [],
      active: false,
      createdAt: "2025-03-01T12:00:00.000Z",
    })).toBe("r1  open (inactive)  matches everything");
  });

  it("formats a destination with its rule", () => {
    expect(formatDestination({
      name: "hook",
      kind: "webhook",
      endpoint: "https://hooks.example.com/in",
      ruleId: "r1",
      hasAuthToken: true,
    })).toBe("hook  webhook  https://hooks.example.com/in  (token)  rule=r1");
  });
});
