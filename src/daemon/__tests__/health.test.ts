import { describe, it, expect, vi, beforeEach } from "vitest";
import { getHealthStatus, type DaemonState } from "../health.js";
import { MemoryPushStore } from "../../store/memory-push-store.js";
import { makeQueuedRecord } from "../../testing/fixtures.js";

describe("Daemon Health", () => {
  let state: DaemonState;
  let store: MemoryPushStore;

  beforeEach(async () => {
    state = { running: true, uptimeMs: 60_000, inFlight: 1 };
    store = new MemoryPushStore();
    await store.put(makeQueuedRecord());
    await store.put(makeQueuedRecord());
  });

  it("returns healthy status with counts for every push status", async () => {
    const health = await getHealthStatus(state, store);

    expect(health).toEqual({
      status: "healthy",
      uptimeMs: 60_000,
      inFlight: 1,
      pushCounts: {
        "queued": 2,
        "in-progress": 0,
        "filtered-out": 0,
        "delivered": 0,
        "failed": 0,
      },
    });
  });

  it("returns unhealthy when the service is not running", async () => {
    const health = await getHealthStatus({ ...state, running: false }, store);

    expect(health.status).toBe("unhealthy");
    expect(health.error).toBe("Push service is not running");
  });

  it("returns unhealthy when the store cannot be read", async () => {
    vi.spyOn(store, "countByStatus").mockRejectedValue(new Error("disk gone"));

    const health = await getHealthStatus(state, store);

    expect(health.status).toBe("unhealthy");
    expect(health.error).toBe("Push store unavailable: disk gone");
    expect(health.pushCounts.queued).toBe(0);
  });
});
