/**
 * Adapter registry: lookup table from destination kind to adapter.
 *
 * Built once when the service starts; there is no runtime registration.
 * Tests pass their own table (see MockDestinationAdapter).
 */

import type { DestinationKind } from "../schemas/destination.js";
import type { DestinationAdapter } from "./adapter.js";
import type { HttpDeliveryOptions } from "./http-delivery.js";
import { RecordStoreAdapter } from "./record-store-adapter.js";
import { WebhookAdapter } from "./webhook-adapter.js";

export type AdapterRegistry = Readonly<Partial<Record<DestinationKind, DestinationAdapter>>>;

export function createAdapterRegistry(opts: HttpDeliveryOptions = {}): AdapterRegistry {
  return Object.freeze({
    "record-store": new RecordStoreAdapter(opts),
    "webhook": new WebhookAdapter(opts),
  });
}

export function resolveAdapter(
  registry: AdapterRegistry,
  kind: DestinationKind,
): DestinationAdapter | undefined {
  return registry[kind];
}
