import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import {
  createRoutes,
  errorResponse,
  handleRequest,
  jsonResponse,
  matchPath,
  type GatewayResponse,
  type Route,
} from "../gateway/handlers.js";
import type { PushMetrics } from "../metrics/exporter.js";
import type { PushService } from "../service/push-service.js";

/** Largest accepted request body. */
const MAX_BODY_BYTES = 1024 * 1024;

const EVENTS_PATH = "/push-status/:id/events";

export interface PushServerOptions {
  service: PushService;
  metrics?: PushMetrics;
  startedAtMs?: number;
}

class BodyError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
  }
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) {
      throw new BodyError(413, `Request body exceeds ${MAX_BODY_BYTES} bytes`);
    }
    chunks.push(buf);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (raw === "") return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    throw new BodyError(400, "Request body is not valid JSON");
  }
}

function send(res: ServerResponse, response: GatewayResponse): void {
  res.writeHead(response.status, response.headers ?? { "Content-Type": "text/plain" });
  res.end(response.body);
}

/**
 * Server-Sent Events: one `status` event per snapshot until the push is
 * terminal, then the stream closes.
 */
async function streamStatus(
  service: PushService,
  pushId: string,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  const subscription = await service.subscribe(pushId);
  if (!subscription) {
    send(res, jsonResponse(404, { error: `Push not found: ${pushId}` }));
    return;
  }

  res.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    "Connection": "keep-alive",
  });
  req.on("close", () => {
    void subscription.return();
  });

  for await (const record of subscription) {
    res.write(`event: status\nid: ${record.revision}\ndata: ${JSON.stringify(record)}\n\n`);
  }
  res.end();
}

/**
 * Create the HTTP server for the push API. The caller decides when to
 * listen (see listen()).
 */
export function createPushServer(opts: PushServerOptions): Server {
  const routes: Route[] = createRoutes({
    service: opts.service,
    metrics: opts.metrics,
    startedAtMs: opts.startedAtMs,
  });

  return createServer(async (req: IncomingMessage, res: ServerResponse) => {
    try {
      const url = new URL(req.url ?? "/", "http://localhost");
      const method = req.method ?? "GET";

      const eventParams = matchPath(EVENTS_PATH, url.pathname);
      if (eventParams && method === "GET") {
        await streamStatus(opts.service, eventParams["id"] ?? "", req, res);
        return;
      }

      const body = method === "POST" ? await readJsonBody(req) : undefined;
      const response = await handleRequest(routes, {
        method,
        path: url.pathname,
        query: url.searchParams,
        body,
      });
      send(res, response);
    } catch (err) {
      const response = err instanceof BodyError
        ? jsonResponse(err.status, { error: err.message })
        : errorResponse(err);
      if (res.headersSent) {
        res.end();
      } else {
        send(res, response);
      }
    }
  });
}

/** Start listening; resolves with the bound address (port 0 picks a free port). */
export function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Server is not bound to a TCP address"));
        return;
      }
      resolve(address);
    });
  });
}

/**
 * Stop accepting connections. Resolves once every open connection has
 * ended; pass `force` to cut event streams immediately.
 */
export function closeServer(server: Server, opts: { force?: boolean } = {}): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    if (opts.force) {
      server.closeAllConnections();
    } else {
      server.closeIdleConnections();
    }
  });
}
