import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Server } from "node:http";
import { MockDestinationAdapter } from "../../destinations/mock-adapter.js";
import { PushMetrics } from "../../metrics/exporter.js";
import { PushService } from "../../service/push-service.js";
import { contentInput, makeDestination } from "../../testing/fixtures.js";
import { closeServer, createPushServer, listen } from "../server.js";

interface StreamEvent {
  event: string;
  id: string;
  data: { status: string; revision: number };
}

function parseEvents(text: string): StreamEvent[] {
  return text
    .split("\n\n")
    .filter((block) => block.trim() !== "")
    .map((block) => {
      const fields = new Map<string, string>();
      for (const line of block.split("\n")) {
        const colon = line.indexOf(": ");
        fields.set(line.slice(0, colon), line.slice(colon + 2));
      }
      const data = JSON.parse(fields.get("data") ?? "{}") as StreamEvent["data"];
      return { event: fields.get("event") ?? "", id: fields.get("id") ?? "", data };
    });
}

describe("Push HTTP server", () => {
  let tmpDir: string;
  let service: PushService;
  let adapter: MockDestinationAdapter;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    tmpDir = await mkdtemp(join(tmpdir(), "push-server-test-"));
    adapter = new MockDestinationAdapter({ delayMs: 20 });
    service = new PushService(
      { adapters: { "record-store": adapter } },
      { dataDir: tmpDir, storage: "memory", destinations: [makeDestination()] },
    );
    await service.start();
    server = createPushServer({ service, metrics: new PushMetrics({ defaultMetrics: false }) });
    const address = await listen(server, 0, "127.0.0.1");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await closeServer(server, { force: true });
    await service.stop();
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("accepts a push over HTTP", async () => {
    const response = await fetch(`${baseUrl}/push-content`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ content: contentInput(), destination: "main_lrs" }),
    });

    expect(response.status).toBe(202);
    const body = (await response.json()) as { pushId: string; status: string };
    expect(body.status).toBe("queued");
  });

  it("answers 400 for a body that is not JSON", async () => {
    const response = await fetch(`${baseUrl}/push-content`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Request body is not valid JSON" });
  });

  it("answers 400 for a missing body", async () => {
    const response = await fetch(`${baseUrl}/push-content`, { method: "POST" });

    expect(response.status).toBe(400);
    const body = (await response.json()) as { error: string };
    expect(body.error).toMatch(/^Invalid push request: /);
  });

  it("serves /health and /metrics", async () => {
    const health = await fetch(`${baseUrl}/health`);
    expect(health.status).toBe(200);

    const metrics = await fetch(`${baseUrl}/metrics`);
    expect(metrics.status).toBe(200);
    expect(await metrics.text()).toContain("lms_push_service_up 1");
  });

  it("streams status snapshots until the push is terminal", async () => {
    const { pushId } = await service.submit({ content: contentInput(), destination: "main_lrs" });

    const response = await fetch(`${baseUrl}/push-status/${pushId}/events`);
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/event-stream");

    const events = parseEvents(await response.text());
    const last = events[events.length - 1];
    expect(events.every((e) => e.event === "status")).toBe(true);
    expect(last?.data.status).toBe("delivered");
    expect(last?.id).toBe("2");
    expect(events.map((e) => e.data.revision)).toEqual(events.map((e) => Number(e.id)));
  });

  it("streams a single snapshot for a finished push", async () => {
    const { pushId } = await service.submit({ content: contentInput(), destination: "main_lrs" });
    const subscription = await service.subscribe(pushId);
    if (!subscription) throw new Error("push was not stored");
    for await (const _record of subscription) {
      // wait for the terminal snapshot
    }

    const response = await fetch(`${baseUrl}/push-status/${pushId}/events`);
    const events = parseEvents(await response.text());

    expect(events).toHaveLength(1);
    expect(events[0]?.data.status).toBe("delivered");
  });

  it("answers 404 for the stream of an unknown push", async () => {
    const response = await fetch(`${baseUrl}/push-status/unknown/events`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Push not found: unknown" });
  });
});
