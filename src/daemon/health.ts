import { PushStatus } from "../schemas/push.js";
import type { IPushStore } from "../store/interfaces.js";

export interface HealthStatus {
  status: "healthy" | "unhealthy";
  uptimeMs: number;
  inFlight: number;
  pushCounts: Record<PushStatus, number>;
  error?: string;
}

export interface DaemonState {
  running: boolean;
  uptimeMs: number;
  inFlight: number;
}

function emptyCounts(): Record<PushStatus, number> {
  return {
    "queued": 0,
    "in-progress": 0,
    "filtered-out": 0,
    "delivered": 0,
    "failed": 0,
  };
}

export async function getHealthStatus(
  state: DaemonState,
  store: IPushStore,
): Promise<HealthStatus> {
  // Store read doubles as the liveness probe
  const pushCounts = emptyCounts();
  let storeError: string | undefined;
  try {
    const counts = await store.countByStatus();
    for (const status of PushStatus.options) {
      pushCounts[status] = counts[status] ?? 0;
    }
  } catch (err) {
    storeError = `Push store unavailable: ${(err as Error).message}`;
  }

  const healthy = state.running && storeError === undefined;

  return {
    status: healthy ? "healthy" : "unhealthy",
    uptimeMs: state.uptimeMs,
    inFlight: state.inFlight,
    pushCounts,
    error: storeError ?? (state.running ? undefined : "Push service is not running"),
  };
}
