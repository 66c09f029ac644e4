/**
 * Record-store adapter: POSTs statements to a learning record store's
 * statements resource.
 */

import type { ContentRecord } from "../schemas/content.js";
import type { DestinationConfig } from "../schemas/destination.js";
import type { ActivityStatement } from "../schemas/statement.js";
import type { DeliveryOutcome, DestinationAdapter } from "./adapter.js";
import { buildHeaders, postJson, type HttpDeliveryOptions } from "./http-delivery.js";

export const XAPI_VERSION = "1.0.3";

/** `<endpoint>/statements`, tolerating a trailing slash on the endpoint. */
export function statementsUrl(endpoint: string): string {
  return `${endpoint.replace(/\/+$/, "")}/statements`;
}

export class RecordStoreAdapter implements DestinationAdapter {
  readonly kind = "record-store" as const;

  constructor(private readonly opts: HttpDeliveryOptions = {}) {}

  async deliver(
    statement: ActivityStatement,
    _content: ContentRecord,
    destination: DestinationConfig,
  ): Promise<DeliveryOutcome> {
    const headers = buildHeaders(destination, {
      "X-Experience-API-Version": XAPI_VERSION,
    });
    return postJson(statementsUrl(destination.endpoint), statement, headers, this.opts);
  }
}
