/**
 * Service settings: defaults, overlaid by an optional YAML file, overlaid
 * by environment variables. The merged result is validated with zod.
 *
 * Precedence (highest first):
 *   1. environment (PORT, HOST, PUSH_*, LRS_*, WEBHOOK_*)
 *   2. YAML file (PUSH_CONFIG, else <dataDir>/config.yaml when present)
 *   3. DEFAULT_SETTINGS
 */

import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { DestinationConfig } from "../schemas/destination.js";
import { FilterRuleSpec } from "../schemas/rule.js";

/** Retry policy defaults */
export const DEFAULT_RETRY_POLICY = {
  maxRetries: 3,
  baseDelayMs: 1_000,     // 1s, doubled per retry
  maxDelayMs: 30_000,     // 30s cap
};

export const RetryPolicy = z.object({
  /** Retryable failures tolerated before the push fails (>= 1). */
  maxRetries: z.number().int().positive().default(DEFAULT_RETRY_POLICY.maxRetries),
  baseDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
  maxDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
});
export type RetryPolicy = z.infer<typeof RetryPolicy>;

/** Rule seeded from configuration; a stable id lets destinations reference it. */
export const SeedRule = FilterRuleSpec.extend({
  id: z.string().min(1).optional(),
});
export type SeedRule = z.infer<typeof SeedRule>;

export const Settings = z.object({
  dataDir: z.string().min(1),
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().min(0).max(65535).default(8000),
  /** "memory" keeps push records in-process; "filesystem" persists them under dataDir. */
  storage: z.enum(["memory", "filesystem"]).default("filesystem"),
  retry: RetryPolicy.default({}),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  /** Drain timeout for in-flight pushes on shutdown. */
  drainTimeoutMs: z.number().int().positive().default(10_000),
  destinations: z.array(DestinationConfig).default([]),
  rules: z.array(SeedRule).default([]),
});
export type Settings = z.infer<typeof Settings>;

export type Env = Record<string, string | undefined>;

export const DEFAULT_DATA_DIR = resolve(homedir(), ".lms-push");

/** Destinations every deployment starts with, pointed through the environment. */
export function defaultDestinations(env: Env): Array<z.input<typeof DestinationConfig>> {
  return [
    {
      name: "main_lrs",
      displayName: "Main LRS",
      kind: "record-store",
      endpoint: env["LRS_ENDPOINT"] ?? "https://lrs.example.com/xapi",
      authToken: env["LRS_TOKEN"] || undefined,
    },
    {
      name: "analytics_webhook",
      displayName: "Analytics Webhook",
      kind: "webhook",
      endpoint: env["WEBHOOK_ENDPOINT"] ?? "https://analytics.example.com/webhook",
      authToken: env["WEBHOOK_TOKEN"] || undefined,
    },
  ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function envInt(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Invalid ${key}: expected an integer, got "${raw}"`);
  }
  return value;
}

/** Keep only defined values so they do not mask lower layers. */
function defined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

function envOverrides(env: Env): Record<string, unknown> {
  const storage = env["PUSH_STORAGE"];
  return defined({
    dataDir: env["PUSH_DATA_DIR"],
    host: env["HOST"],
    port: envInt(env, "PORT"),
    storage,
    requestTimeoutMs: envInt(env, "PUSH_REQUEST_TIMEOUT_MS"),
  });
}

function envRetryOverrides(env: Env): Record<string, unknown> {
  return defined({
    maxRetries: envInt(env, "PUSH_MAX_RETRIES"),
    baseDelayMs: envInt(env, "PUSH_BASE_DELAY_MS"),
    maxDelayMs: envInt(env, "PUSH_MAX_DELAY_MS"),
  });
}

/** Read a YAML settings file. Missing optional files yield {}. */
export async function readSettingsFile(
  path: string,
  opts: { optional?: boolean } = {},
): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (opts.optional && (err as NodeJS.ErrnoException).code === "ENOENT") return {};
    throw new Error(`Cannot read settings file ${path}: ${(err as Error).message}`);
  }

  const parsed: unknown = parseYaml(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Settings file ${path} must contain a mapping`);
  }
  return parsed;
}

/**
 * Merge and validate settings. Pure: takes the file contents already read.
 */
export function resolveSettings(
  fileValues: Record<string, unknown>,
  env: Env = process.env,
): Settings {
  const fileRetry = isRecord(fileValues["retry"]) ? fileValues["retry"] : {};
  const merged: Record<string, unknown> = {
    dataDir: DEFAULT_DATA_DIR,
    destinations: defaultDestinations(env),
    ...fileValues,
    ...envOverrides(env),
    retry: { ...fileRetry, ...envRetryOverrides(env) },
  };

  const result = Settings.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid settings: ${details}`);
  }

  const settings = result.data;
  if (settings.retry.maxDelayMs < settings.retry.baseDelayMs) {
    throw new Error("Invalid settings: retry.maxDelayMs must be >= retry.baseDelayMs");
  }
  return settings;
}

/**
 * Load settings from disk and environment.
 *
 * @param opts.configPath - explicit YAML path (required to exist)
 */
export async function loadSettings(opts: { configPath?: string; env?: Env } = {}): Promise<Settings> {
  const env = opts.env ?? process.env;
  const explicitPath = opts.configPath ?? env["PUSH_CONFIG"];

  let fileValues: Record<string, unknown>;
  if (explicitPath) {
    fileValues = await readSettingsFile(explicitPath);
  } else {
    const dataDir = env["PUSH_DATA_DIR"] ?? DEFAULT_DATA_DIR;
    fileValues = await readSettingsFile(join(dataDir, "config.yaml"), { optional: true });
  }

  return resolveSettings(fileValues, env);
}
