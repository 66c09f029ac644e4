/**
 * Webhook adapter: POSTs the statement together with the content record to
 * an arbitrary endpoint.
 */

import type { ContentRecord } from "../schemas/content.js";
import type { DestinationConfig } from "../schemas/destination.js";
import type { ActivityStatement } from "../schemas/statement.js";
import type { DeliveryOutcome, DestinationAdapter } from "./adapter.js";
import { buildHeaders, postJson, type HttpDeliveryOptions } from "./http-delivery.js";

export interface WebhookPayload {
  statement: ActivityStatement;
  content: {
    learnerId: string;
    contentId: string;
    contentType: string;
    title: string;
    contentUrl: string;
    submissionDate: string;
    grade?: string;
    tags: string[];
    learnerGroup?: string;
  };
  sentAt: string;
}

export function buildWebhookPayload(
  statement: ActivityStatement,
  content: ContentRecord,
  now: Date = new Date(),
): WebhookPayload {
  return {
    statement,
    content: {
      learnerId: content.learnerId,
      contentId: content.contentId,
      contentType: content.contentType,
      title: content.title,
      contentUrl: content.contentUrl,
      submissionDate: content.submissionDate,
      grade: content.grade,
      tags: [...content.tags],
      learnerGroup: content.learnerGroup,
    },
    sentAt: now.toISOString(),
  };
}

export class WebhookAdapter implements DestinationAdapter {
  readonly kind = "webhook" as const;

  constructor(private readonly opts: HttpDeliveryOptions = {}) {}

  async deliver(
    statement: ActivityStatement,
    content: ContentRecord,
    destination: DestinationConfig,
  ): Promise<DeliveryOutcome> {
    const payload = buildWebhookPayload(statement, content);
    return postJson(destination.endpoint, payload, buildHeaders(destination), this.opts);
  }
}
