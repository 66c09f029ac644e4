/**
 * Metrics collector: gathers MetricsState from the push store.
 */

import type { IPushStore } from "../store/interfaces.js";
import type { MetricsState } from "./exporter.js";

/**
 * Collect current metrics state from the push store.
 */
export async function collectMetrics(
  store: IPushStore,
  service: { inFlight: number; running: boolean },
): Promise<MetricsState> {
  return {
    pushesByStatus: await store.countByStatus(),
    inFlight: service.inFlight,
    serviceUp: service.running,
  };
}
