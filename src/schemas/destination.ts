/**
 * Destination configuration schema: a configured external endpoint that
 * receives activity statements.
 */

import { z } from "zod";

/** Destination kinds with a registered adapter. */
export const DestinationKind = z.enum(["record-store", "webhook"]);
export type DestinationKind = z.infer<typeof DestinationKind>;

export const DestinationConfig = z.object({
  /** Lookup key used by push requests (e.g. "main_lrs"). */
  name: z.string().min(1).regex(/^[A-Za-z0-9_.-]+$/, "Invalid destination name"),
  displayName: z.string().optional(),
  kind: DestinationKind,
  endpoint: z.string().url(),
  /** Bearer credential sent with every delivery. */
  authToken: z.string().min(1).optional(),
  /** Filter rule applied to pushes aimed at this destination. */
  ruleId: z.string().min(1).optional(),
  /** Extra request headers. */
  headers: z.record(z.string(), z.string()).default({}),
});
export type DestinationConfig = z.infer<typeof DestinationConfig>;
export type DestinationConfigInput = z.input<typeof DestinationConfig>;

/** Destination as exposed to listings: the credential is never echoed back. */
export type DestinationSummary = Omit<DestinationConfig, "authToken" | "headers"> & {
  hasAuthToken: boolean;
};

export function summarizeDestination(config: DestinationConfig): DestinationSummary {
  const { authToken, headers: _headers, ...rest } = config;
  return { ...rest, hasAuthToken: authToken !== undefined };
}
