/**
 * Event Logger: append-only JSONL event log.
 *
 * Writes one JSON object per line to events/YYYY-MM-DD.jsonl.
 * Uses the BaseEvent schema from schemas/event.ts.
 */

import { appendFile, mkdir, symlink, unlink, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { BaseEvent, type DeliveryPayload, type EventType } from "../schemas/event.js";
import type { PushStatus } from "../schemas/push.js";

export type EventCallback = (event: BaseEvent) => void | Promise<void>;

export interface EventLoggerOptions {
  onEvent?: EventCallback;
}

export class EventLogger {
  private readonly eventsDir: string;
  private readonly onEvent?: EventCallback;
  private eventCounter: number = 0;

  constructor(eventsDir: string, options?: EventLoggerOptions) {
    this.eventsDir = eventsDir;
    this.onEvent = options?.onEvent;
  }

  /** Append an event to today's JSONL file. */
  async log(
    type: EventType,
    actor: string,
    opts?: {
      pushId?: string;
      payload?: Record<string, unknown>;
    },
  ): Promise<BaseEvent> {
    this.eventCounter += 1;

    const event: BaseEvent = {
      eventId: this.eventCounter,
      type,
      timestamp: new Date().toISOString(),
      actor,
      pushId: opts?.pushId,
      payload: opts?.payload ?? {},
    };

    const date = event.timestamp.slice(0, 10); // YYYY-MM-DD
    const filePath = join(this.eventsDir, `${date}.jsonl`);

    await mkdir(this.eventsDir, { recursive: true });
    const line = JSON.stringify(event) + "\n";
    await appendFile(filePath, line, "utf-8");

    await this.updateSymlink(date);

    if (this.onEvent) {
      await Promise.resolve(this.onEvent(event));
    }

    return event;
  }

  /** Update events.jsonl symlink to point to current day's log. */
  private async updateSymlink(date: string): Promise<void> {
    const symlinkPath = join(this.eventsDir, "events.jsonl");
    const targetFilename = `${date}.jsonl`;

    try {
      await unlink(symlinkPath);
    } catch {
      // Symlink doesn't exist yet
    }

    try {
      // Relative target so the events directory can be moved
      await symlink(targetFilename, symlinkPath);
    } catch (err) {
      console.warn(`[EventLogger] Failed to update symlink: ${(err as Error).message}`);
    }
  }

  /** Log a push state transition. */
  async logTransition(
    pushId: string,
    from: PushStatus | "none",
    to: PushStatus,
    actor: string,
    reason?: string,
  ): Promise<void> {
    await this.log("push.transitioned", actor, {
      pushId,
      payload: { from, to, reason },
    });
  }

  /** Log a delivery attempt and its outcome. */
  async logDelivery(
    pushId: string,
    payload: DeliveryPayload,
  ): Promise<void> {
    await this.log("delivery.attempted", "orchestrator", { pushId, payload });
  }

  /** Log system events. */
  async logSystem(
    type: "system.startup" | "system.shutdown" | "system.config-loaded",
    payload?: Record<string, unknown>,
  ): Promise<void> {
    await this.log(type, "system", { payload });
  }

  /**
   * Query events from the log.
   *
   * Reads all JSONL files in the events directory and filters by criteria.
   *
   * @param filter - Filter criteria (e.g., { type: "push.failed" })
   * @returns Array of matching events
   */
  async query(filter?: { type?: string; pushId?: string; actor?: string }): Promise<BaseEvent[]> {
    let files: string[];
    try {
      files = await readdir(this.eventsDir);
    } catch {
      return [];
    }
    const jsonlFiles = files.filter(f => f.endsWith('.jsonl') && f !== 'events.jsonl').sort();

    const events: BaseEvent[] = [];

    for (const file of jsonlFiles) {
      const filePath = join(this.eventsDir, file);
      const content = await readFile(filePath, 'utf-8');
      const lines = content.trim().split('\n').filter(line => line.length > 0);

      for (const line of lines) {
        try {
          const parsed = BaseEvent.safeParse(JSON.parse(line));
          if (!parsed.success) continue;
          const event = parsed.data;

          if (filter?.type && event.type !== filter.type) continue;
          if (filter?.pushId && event.pushId !== filter.pushId) continue;
          if (filter?.actor && event.actor !== filter.actor) continue;

          events.push(event);
        } catch {
          // Skip malformed lines
        }
      }
    }

    return events;
  }
}
