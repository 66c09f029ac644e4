/**
 * Shared HTTP POST used by the record-store and webhook adapters.
 */

import type { DestinationConfig } from "../schemas/destination.js";
import { classifyResponse, type DeliveryOutcome } from "./adapter.js";

/** Longest response body excerpt kept in an error reason. */
const MAX_DETAIL_CHARS = 200;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface HttpDeliveryOptions {
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

export function buildHeaders(
  destination: DestinationConfig,
  extra: Record<string, string> = {},
): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    ...destination.headers,
    ...extra,
  };
  if (destination.authToken) {
    headers["Authorization"] = `Bearer ${destination.authToken}`;
  }
  return headers;
}

async function readDetail(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.trim().slice(0, MAX_DETAIL_CHARS);
  } catch {
    return "";
  }
}

/**
 * POST a JSON body and classify the result. Transport errors and timeouts
 * are retryable.
 */
export async function postJson(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  opts: HttpDeliveryOptions = {},
): Promise<DeliveryOutcome> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    const reason = err instanceof Error && err.name === "TimeoutError"
      ? `Request timed out after ${timeoutMs}ms`
      : `Transport error: ${err instanceof Error ? err.message : String(err)}`;
    return { kind: "retryable-failure", reason };
  }

  if (response.ok) {
    // Drain the body so the connection can be reused
    await readDetail(response);
    return classifyResponse(response.status);
  }
  return classifyResponse(response.status, await readDetail(response));
}
