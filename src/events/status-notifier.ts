/**
 * StatusNotifier: per-push broadcast of status snapshots to live
 * subscribers.
 *
 * A subscription yields the push's current snapshot first, then every later
 * transition, and completes right after the terminal snapshot. Attaching to a
 * push that is already terminal yields that one snapshot and completes.
 *
 * Snapshots carry a monotonically increasing `revision`; a subscription
 * never yields a revision lower than or equal to one it already yielded, so
 * observations follow the state machine in order.
 */

import { isTerminal, type PushRecord } from "../schemas/push.js";

export type SnapshotLoader = () => Promise<PushRecord | undefined>;

/**
 * Async-iterable queue of snapshots for one subscriber.
 */
export class StatusSubscription implements AsyncIterableIterator<PushRecord> {
  readonly pushId: string;
  private readonly queue: PushRecord[] = [];
  /** Published before the initial snapshot was loaded. */
  private readonly pending: PushRecord[] = [];
  private waiter?: (result: IteratorResult<PushRecord>) => void;
  private primed = false;
  private ended = false;
  private lastRevision = -1;
  private readonly onClose: (sub: StatusSubscription) => void;

  constructor(pushId: string, onClose: (sub: StatusSubscription) => void) {
    this.pushId = pushId;
    this.onClose = onClose;
  }

  get closed(): boolean {
    return this.ended;
  }

  /** Feed the snapshot read from the store; releases anything published meanwhile. */
  prime(current: PushRecord): void {
    if (this.ended) return;
    this.primed = true;
    this.accept(current);
    for (const record of this.pending.splice(0)) {
      this.accept(record);
    }
  }

  /** Called by the notifier for every published snapshot of this push. */
  deliver(record: PushRecord): void {
    if (this.ended) return;
    if (!this.primed) {
      this.pending.push(record);
      return;
    }
    this.accept(record);
  }

  private accept(record: PushRecord): void {
    if (this.ended || record.revision <= this.lastRevision) return;
    this.lastRevision = record.revision;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve({ value: record, done: false });
    } else {
      this.queue.push(record);
    }

    if (isTerminal(record.status)) this.end();
  }

  /** Stop accepting snapshots; queued ones are still yielded. */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.pending.length = 0;
    this.onClose(this);
    if (this.waiter && this.queue.length === 0) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<PushRecord>> {
    const value = this.queue.shift();
    if (value) return Promise.resolve({ value, done: false });
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Early exit (`break` in for-await, client disconnect). */
  return(): Promise<IteratorResult<PushRecord>> {
    this.queue.length = 0;
    this.end();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<PushRecord> {
    return this;
  }
}

export class StatusNotifier {
  private readonly channels = new Map<string, Set<StatusSubscription>>();
  private closed = false;

  /**
   * Attach a subscriber to a push.
   *
   * The subscriber is registered before `load` runs, so a transition
   * published while the current snapshot is being read is not lost.
   * Returns undefined when `load` finds no such push.
   */
  async subscribe(pushId: string, load: SnapshotLoader): Promise<StatusSubscription | undefined> {
    const sub = new StatusSubscription(pushId, (s) => this.detach(s));
    if (this.closed) {
      sub.end();
    } else {
      this.attach(sub);
    }

    let current: PushRecord | undefined;
    try {
      current = await load();
    } catch (err) {
      sub.end();
      throw err;
    }

    if (!current) {
      sub.end();
      return undefined;
    }

    if (sub.closed) {
      // Notifier closed while loading: hand over the snapshot alone
      const late = new StatusSubscription(pushId, () => {});
      late.prime(current);
      late.end();
      return late;
    }

    sub.prime(current);
    return sub;
  }

  /** Fan a freshly written snapshot out to the push's subscribers. */
  publish(record: PushRecord): void {
    const subs = this.channels.get(record.id);
    if (!subs) return;
    for (const sub of [...subs]) {
      sub.deliver(record);
    }
    if (isTerminal(record.status)) {
      this.channels.delete(record.id);
    }
  }

  subscriberCount(pushId: string): number {
    return this.channels.get(pushId)?.size ?? 0;
  }

  /** End every open subscription (service shutdown). */
  close(): void {
    this.closed = true;
    for (const subs of [...this.channels.values()]) {
      for (const sub of [...subs]) sub.end();
    }
    this.channels.clear();
  }

  private attach(sub: StatusSubscription): void {
    let subs = this.channels.get(sub.pushId);
    if (!subs) {
      subs = new Set();
      this.channels.set(sub.pushId, subs);
    }
    subs.add(sub);
  }

  private detach(sub: StatusSubscription): void {
    const subs = this.channels.get(sub.pushId);
    if (!subs) return;
    subs.delete(sub);
    if (subs.size === 0) this.channels.delete(sub.pushId);
  }
}
