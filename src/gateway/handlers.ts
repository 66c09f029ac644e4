import { getHealthStatus } from "../daemon/health.js";
import { PushRelayError, ValidationError } from "../errors.js";
import { collectMetrics } from "../metrics/collector.js";
import type { PushMetrics } from "../metrics/exporter.js";
import { summarizeDestination } from "../schemas/destination.js";
import type { PushService } from "../service/push-service.js";
import { SERVICE_NAME, VERSION } from "../version.js";

export interface GatewayRequest {
  method: string;
  path: string;
  query?: URLSearchParams;
  /** Parsed JSON body, when the request carried one. */
  body?: unknown;
  /** Path parameters captured by the route. */
  params?: Record<string, string>;
}

export interface GatewayResponse {
  status: number;
  headers?: Record<string, string>;
  body: string;
}

export type GatewayHandler = (req: GatewayRequest) => Promise<GatewayResponse> | GatewayResponse;

export interface Route {
  method: string;
  /** Path with `:name` segments, e.g. "/push-status/:id". */
  path: string;
  handler: GatewayHandler;
}

const JSON_HEADERS = { "Content-Type": "application/json" };

export function jsonResponse(status: number, payload: unknown): GatewayResponse {
  return { status, headers: JSON_HEADERS, body: JSON.stringify(payload) };
}

const ERROR_STATUS: Record<string, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNAVAILABLE: 503,
};

/** Map an error raised by the service to an HTTP response. */
export function errorResponse(err: unknown): GatewayResponse {
  if (err instanceof ValidationError) {
    return jsonResponse(400, { error: err.message, issues: err.issues });
  }
  if (err instanceof PushRelayError) {
    return jsonResponse(ERROR_STATUS[err.code] ?? 500, { error: err.message });
  }
  console.error(`[push] Request failed: ${err instanceof Error ? err.message : String(err)}`);
  return jsonResponse(500, { error: "Internal server error" });
}

function param(req: GatewayRequest, name: string): string {
  return req.params?.[name] ?? "";
}

function optionalNumber(query: URLSearchParams | undefined, key: string): number | undefined {
  const raw = query?.get(key);
  if (raw === null || raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ValidationError(`Invalid ${key}: ${raw}`, [
      { path: key, message: "Expected a number" },
    ]);
  }
  return value;
}

function bodyField(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return Object.entries(body).find(([k]) => k === key)?.[1];
}

export function createMetricsHandler(opts: {
  metrics: PushMetrics;
  service: PushService;
}): GatewayHandler {
  return async () => {
    try {
      const status = opts.service.getStatus();
      const state = await collectMetrics(opts.service.store, {
        inFlight: status.inFlight,
        running: status.running,
      });
      opts.metrics.updateFromState(state);
      const body = await opts.metrics.getMetrics();
      return {
        status: 200,
        headers: { "Content-Type": opts.metrics.registry.contentType },
        body,
      };
    } catch (err) {
      return {
        status: 500,
        body: `Error: ${(err as Error).message}\n`,
      };
    }
  };
}

export function createStatusHandler(service: PushService): GatewayHandler {
  return () => jsonResponse(200, {
    service: SERVICE_NAME,
    version: VERSION,
    ...service.getStatus(),
  });
}

export function createHealthHandler(service: PushService, startedAtMs: number): GatewayHandler {
  return async () => {
    const status = service.getStatus();
    const health = await getHealthStatus(
      { running: status.running, inFlight: status.inFlight, uptimeMs: Date.now() - startedAtMs },
      service.store,
    );
    return jsonResponse(health.status === "healthy" ? 200 : 503, health);
  };
}

/**
 * JSON API routes. Each handler maps service errors through errorResponse.
 */
export function createRoutes(opts: {
  service: PushService;
  metrics?: PushMetrics;
  startedAtMs?: number;
}): Route[] {
  const { service } = opts;

  const routes: Route[] = [
    { method: "GET", path: "/", handler: createStatusHandler(service) },
    { method: "GET", path: "/health", handler: createHealthHandler(service, opts.startedAtMs ?? Date.now()) },

    {
      method: "POST",
      path: "/push-content",
      handler: async (req) => jsonResponse(202, await service.submit(req.body)),
    },
    {
      method: "POST",
      path: "/push-from-drive",
      handler: async (req) => jsonResponse(202, await service.submitFromDrive(req.body)),
    },
    {
      method: "GET",
      path: "/push-status/:id",
      handler: async (req) => {
        const id = param(req, "id");
        const record = await service.getPush(id);
        return record
          ? jsonResponse(200, record)
          : jsonResponse(404, { error: `Push not found: ${id}` });
      },
    },
    {
      method: "GET",
      path: "/pushes",
      handler: async (req) => {
        const pushes = await service.listPushes({
          status: req.query?.get("status") ?? undefined,
          destination: req.query?.get("destination") ?? undefined,
          sinceHours: optionalNumber(req.query, "sinceHours"),
          limit: optionalNumber(req.query, "limit"),
        });
        return jsonResponse(200, { pushes, count: pushes.length });
      },
    },

    {
      method: "GET",
      path: "/filter-rules",
      handler: () => jsonResponse(200, { rules: service.listRules() }),
    },
    {
      method: "POST",
      path: "/filter-rules",
      handler: async (req) => jsonResponse(201, await service.createRule(req.body)),
    },
    {
      method: "POST",
      path: "/test-filter",
      handler: (req) => {
        const ruleId = bodyField(req.body, "ruleId");
        const rule = ruleId !== undefined ? ruleId : bodyField(req.body, "rule");
        return jsonResponse(200, service.testFilter(bodyField(req.body, "content"), rule));
      },
    },

    {
      method: "GET",
      path: "/destinations",
      handler: () => jsonResponse(200, {
        destinations: service.listDestinations().map(summarizeDestination),
      }),
    },
    {
      method: "POST",
      path: "/destinations",
      handler: async (req) => {
        const destination = await service.createDestination(req.body);
        return jsonResponse(201, summarizeDestination(destination));
      },
    },
  ];

  if (opts.metrics) {
    routes.push({
      method: "GET",
      path: "/metrics",
      handler: createMetricsHandler({ metrics: opts.metrics, service }),
    });
  }

  return routes;
}

/** Match a concrete path against a route path; returns captured params. */
export function matchPath(pattern: string, path: string): Record<string, string> | undefined {
  const expected = pattern.split("/");
  const actual = path.split("/");
  if (expected.length !== actual.length) return undefined;

  const params: Record<string, string> = {};
  for (let i = 0; i < expected.length; i++) {
    const segment = expected[i] ?? "";
    const value = actual[i] ?? "";
    if (segment.startsWith(":")) {
      if (value === "") return undefined;
      try {
        params[segment.slice(1)] = decodeURIComponent(value);
      } catch {
        return undefined; // Malformed escape
      }
    } else if (segment !== value) {
      return undefined;
    }
  }
  return params;
}

/** Resolve a request against the route table: 404 unknown path, 405 wrong method. */
export async function handleRequest(routes: Route[], req: GatewayRequest): Promise<GatewayResponse> {
  let pathMatched = false;
  for (const route of routes) {
    const params = matchPath(route.path, req.path);
    if (!params) continue;
    pathMatched = true;
    if (route.method !== req.method) continue;

    try {
      return await route.handler({ ...req, params });
    } catch (err) {
      return errorResponse(err);
    }
  }

  return pathMatched
    ? jsonResponse(405, { error: `Method ${req.method} not allowed on ${req.path}` })
    : jsonResponse(404, { error: `Not found: ${req.path}` });
}
