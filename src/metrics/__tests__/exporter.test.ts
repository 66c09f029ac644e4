import { describe, it, expect } from "vitest";
import { PushMetrics } from "../exporter.js";
import { collectMetrics } from "../collector.js";
import { MemoryPushStore } from "../../store/memory-push-store.js";
import { makeQueuedRecord } from "../../testing/fixtures.js";

describe("PushMetrics", () => {
  it("exposes point-in-time gauges from state", async () => {
    const metrics = new PushMetrics({ defaultMetrics: false });

    metrics.updateFromState({
      pushesByStatus: { "queued": 2, "delivered": 5 },
      inFlight: 2,
      serviceUp: true,
    });
    const text = await metrics.getMetrics();

    expect(text).toContain('lms_push_pushes{status="queued"} 2');
    expect(text).toContain('lms_push_pushes{status="delivered"} 5');
    expect(text).toContain("lms_push_in_flight 2");
    expect(text).toContain("lms_push_service_up 1");
  });

  it("drops statuses that disappear between scrapes", async () => {
    const metrics = new PushMetrics({ defaultMetrics: false });

    metrics.updateFromState({ pushesByStatus: { "queued": 1 }, inFlight: 1, serviceUp: true });
    metrics.updateFromState({ pushesByStatus: { "delivered": 1 }, inFlight: 0, serviceUp: false });
    const text = await metrics.getMetrics();

    expect(text).not.toContain('lms_push_pushes{status="queued"}');
    expect(text).toContain("lms_push_service_up 0");
  });

  it("counts delivery attempts and observes their duration", async () => {
    const metrics = new PushMetrics({ defaultMetrics: false });

    metrics.recordDeliveryAttempt("main_lrs", "retryable-failure", 0.2);
    metrics.recordDeliveryAttempt("main_lrs", "delivered", 0.04);
    const text = await metrics.getMetrics();

    expect(text).toContain('lms_push_delivery_attempts_total{destination="main_lrs",outcome="retryable-failure"} 1');
    expect(text).toContain('lms_push_delivery_attempts_total{destination="main_lrs",outcome="delivered"} 1');
    expect(text).toContain('lms_push_delivery_duration_seconds_count{destination="main_lrs"} 2');
  });

  it("counts audit log events by type", async () => {
    const metrics = new PushMetrics({ defaultMetrics: false });

    metrics.recordEvent("push.accepted");
    metrics.recordEvent("push.accepted");
    metrics.recordEvent("system.startup");
    const text = await metrics.getMetrics();

    expect(text).toContain('lms_push_events_total{type="push.accepted"} 2');
    expect(text).toContain('lms_push_events_total{type="system.startup"} 1');
  });

  it("includes runtime metrics by default", async () => {
    const metrics = new PushMetrics();
    expect(await metrics.getMetrics()).toContain("lms_push_process_cpu_user_seconds_total");
  });
});

describe("collectMetrics", () => {
  it("reads status counts from the store", async () => {
    const store = new MemoryPushStore();
    await store.put(makeQueuedRecord());

    const state = await collectMetrics(store, { inFlight: 1, running: true });

    expect(state).toEqual({ pushesByStatus: { queued: 1 }, inFlight: 1, serviceUp: true });
  });
});
