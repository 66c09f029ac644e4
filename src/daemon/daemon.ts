import { join } from "node:path";
import { existsSync, mkdirSync, readFileSync, writeFileSync, unlinkSync } from "node:fs";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Settings } from "../config/settings.js";
import type { AdapterRegistry } from "../destinations/registry.js";
import { PushMetrics } from "../metrics/exporter.js";
import { PushService } from "../service/push-service.js";
import type { IPushStore } from "../store/interfaces.js";
import { closeServer, createPushServer, listen } from "./server.js";

export interface PushDaemonOptions {
  settings: Settings;
  store?: IPushStore;
  metrics?: PushMetrics;
  adapters?: AdapterRegistry;
  /** Write <dataDir>/daemon.pid and refuse to start next to a live daemon. */
  lockPidFile?: boolean;
}

export interface PushDaemonContext {
  service: PushService;
  server: Server;
  address: AddressInfo;
  /** Close the HTTP server, drain pushes, release the PID file. */
  shutdown(): Promise<void>;
}

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 checks existence
    return true;
  } catch (err) {
    // EPERM: alive, owned by another user
    return (err as NodeJS.ErrnoException).code === "EPERM";
  }
}

/** Take the PID file; returns a release function. */
export function acquirePidLock(dataDir: string): () => void {
  const lockFile = join(dataDir, "daemon.pid");

  if (existsSync(lockFile)) {
    const pid = parseInt(readFileSync(lockFile, "utf-8").trim(), 10);
    if (!isNaN(pid) && pid !== process.pid && isProcessRunning(pid)) {
      throw new Error(`Push daemon already running (PID: ${pid})`);
    }
    // Stale PID file, clean up
    unlinkSync(lockFile);
  }

  mkdirSync(dataDir, { recursive: true });
  writeFileSync(lockFile, String(process.pid));

  return () => {
    if (existsSync(lockFile)) unlinkSync(lockFile);
  };
}

export async function startPushDaemon(opts: PushDaemonOptions): Promise<PushDaemonContext> {
  const { settings } = opts;
  const release = (opts.lockPidFile ?? true) ? acquirePidLock(settings.dataDir) : () => {};
  const metrics = opts.metrics ?? new PushMetrics();
  const startedAtMs = Date.now();

  const service = new PushService(
    { store: opts.store, metrics, adapters: opts.adapters },
    {
      dataDir: settings.dataDir,
      storage: settings.storage,
      retry: settings.retry,
      requestTimeoutMs: settings.requestTimeoutMs,
      drainTimeoutMs: settings.drainTimeoutMs,
      destinations: settings.destinations,
      rules: settings.rules,
    },
  );

  let server: Server | undefined;
  try {
    await service.start();
    try {
      await service.logger.logSystem("system.config-loaded", {
        host: settings.host,
        port: settings.port,
        storage: settings.storage,
        retry: settings.retry,
        requestTimeoutMs: settings.requestTimeoutMs,
      });
    } catch (err) {
      console.warn(`[push] Failed to log settings: ${(err as Error).message}`);
    }
    server = createPushServer({ service, metrics, startedAtMs });
    const address = await listen(server, settings.port, settings.host);
    const bound = server;

    return {
      service,
      server: bound,
      address,
      async shutdown() {
        // Refuse new connections; open event streams see the final snapshots
        const closed = closeServer(bound);
        await service.stop();
        bound.closeAllConnections();
        await closed;
        release();
      },
    };
  } catch (err) {
    if (server?.listening) await closeServer(server);
    await service.stop();
    release();
    throw err;
  }
}

/**
 * Run the daemon in the foreground until SIGINT/SIGTERM, then drain and
 * exit.
 */
export async function runForeground(settings: Settings): Promise<PushDaemonContext> {
  const daemon = await startPushDaemon({ settings });
  const { address } = daemon;
  console.info(`[push] Relay listening on http://${address.address}:${address.port} (storage: ${settings.storage})`);

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.info(`[push] ${signal} received, shutting down`);
    try {
      await daemon.shutdown();
      process.exit(0);
    } catch (err) {
      console.error(`[push] Shutdown failed: ${(err as Error).message}`);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  return daemon;
}
