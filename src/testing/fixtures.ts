/**
 * Test data builders shared by unit and integration tests.
 */

import { ContentRecord, type ContentRecordInput } from "../schemas/content.js";
import type { DestinationConfig } from "../schemas/destination.js";
import type { PushRecord } from "../schemas/push.js";

export const FIXED_NOW = new Date("2025-03-01T12:00:00.000Z");

export function contentInput(overrides: Partial<ContentRecordInput> = {}): ContentRecordInput {
  return {
    learnerId: "learner-1",
    learnerName: "Ada Learner",
    learnerEmail: "ada@example.com",
    contentId: "essay-42",
    contentType: "essay",
    title: "On Bridges",
    contentUrl: "https://files.example.com/essay-42.pdf",
    submissionDate: "2025-02-28T09:30:00Z",
    tags: [],
    metadata: {},
    ...overrides,
  };
}

export function makeContent(overrides: Partial<ContentRecordInput> = {}): ContentRecord {
  return ContentRecord.parse(contentInput(overrides));
}

export function makeDestination(overrides: Partial<DestinationConfig> = {}): DestinationConfig {
  return {
    name: "main_lrs",
    kind: "record-store",
    endpoint: "https://lrs.example.com/xapi",
    headers: {},
    ...overrides,
  };
}

let sequence = 0;

/** Deterministic uuid-shaped ids: 00000000-0000-4000-8000-000000000001, ... */
export function sequentialIds(prefix = "00000000-0000-4000-8000"): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `${prefix}-${n.toString(16).padStart(12, "0")}`;
  };
}

export function makeQueuedRecord(overrides: Partial<PushRecord> = {}): PushRecord {
  sequence += 1;
  const timestamp = new Date(FIXED_NOW.getTime() + sequence * 1000).toISOString();
  return {
    id: `11111111-1111-4111-8111-${sequence.toString(16).padStart(12, "0")}`,
    content: makeContent(),
    destination: "main_lrs",
    force: false,
    status: "queued",
    retryCount: 0,
    revision: 0,
    createdAt: timestamp,
    updatedAt: timestamp,
    ...overrides,
  };
}
