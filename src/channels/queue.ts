/**
 * AsyncQueue: unbounded FIFO shared between worker loops.
 *
 * One mutex guards the buffer. Blocking operations (`send`, `receive`) wait
 * for it; `trySend` / `tryReceive` only attempt it and report contention as
 * a plain `false` / `undefined`, never as an error. Receivers park on a wait
 * list (the queue's "not empty" condition) and are handed items directly by
 * the next append.
 */
import { Mutex } from "./mutex.js";
import { Logger } from "../logger.js";

interface Receiver<T> {
  deliver: (item: T) => void;
  fail: (err: Error) => void;
}

export class QueueClosedError extends Error {
  constructor(name: string) {
    super(`queue closed: ${name}`);
    this.name = "QueueClosedError";
  }
}

function abortError(): Error {
  const err = new Error("receive aborted");
  err.name = "AbortError";
  return err;
}

export class AsyncQueue<T> {
  private items: T[] = [];
  private receivers: Receiver<T>[] = [];
  private readonly lock = new Mutex();
  private closed = false;

  constructor(readonly name: string = "queue") {}

  /** Append, waiting for the lock. Resolves once the item is enqueued. */
  async send(item: T): Promise<void> {
    const release = await this.lock.acquire();
    try {
      this.append(item);
    } finally {
      release();
    }
  }

  /** Append only if the lock is free right now. */
  trySend(item: T): boolean {
    const release = this.lock.tryAcquire();
    if (!release) return false;
    try {
      return this.append(item);
    } finally {
      release();
    }
  }

  /** Wait for the head item. Rejects on abort or when the queue is closed. */
  async receive(signal?: AbortSignal): Promise<T> {
    const release = await this.lock.acquire();
    if (this.items.length > 0) {
      const item = this.shift();
      release();
      return item;
    }
    if (this.closed) {
      release();
      throw new QueueClosedError(this.name);
    }
    if (signal?.aborted) {
      release();
      throw abortError();
    }
    const pending = new Promise<T>((resolve, reject) => {
      const receiver: Receiver<T> = {
        deliver: (item) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(item);
        },
        fail: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      };
      const onAbort = () => {
        this.removeReceiver(receiver);
        reject(abortError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.receivers.push(receiver);
    });
    release();
    return pending;
  }

  /** Wait at most `ms` for the head item; `undefined` on timeout. */
  async receiveWithin(ms: number): Promise<T | undefined> {
    const immediate = this.tryReceive();
    if (immediate !== undefined) return immediate;
    if (ms <= 0) return undefined;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), ms);
    try {
      return await this.receive(controller.signal);
    } catch (e: unknown) {
      if (e instanceof Error && e.name === "AbortError") return undefined;
      throw e;
    } finally {
      clearTimeout(timer);
    }
  }

  /** Take the head item if one is available and the lock is free. */
  tryReceive(): T | undefined {
    const release = this.lock.tryAcquire();
    if (!release) return undefined;
    try {
      return this.items.length > 0 ? this.shift() : undefined;
    } finally {
      release();
    }
  }

  len(): number {
    return this.items.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Remove and return every pending item without closing. */
  drain(): T[] {
    return this.items.splice(0);
  }

  /**
   * Close the queue: pending items are dropped (and returned), parked
   * receivers are rejected, later appends are refused.
   */
  close(): T[] {
    if (this.closed) return [];
    this.closed = true;
    const dropped = this.items.splice(0);
    const receivers = this.receivers.splice(0);
    for (const r of receivers) r.fail(new QueueClosedError(this.name));
    if (dropped.length > 0) {
      Logger.debug(`[queue:${this.name}] closed with ${dropped.length} pending item(s)`);
    }
    return dropped;
  }

  private append(item: T): boolean {
    if (this.closed) {
      Logger.debug(`[queue:${this.name}] append after close dropped`);
      return false;
    }
    // Receivers only park while the buffer is empty, so handing off keeps FIFO.
    const receiver = this.receivers.shift();
    if (receiver) receiver.deliver(item);
    else this.items.push(item);
    return true;
  }

  private shift(): T {
    const [head] = this.items.splice(0, 1);
    return head;
  }

  private removeReceiver(receiver: Receiver<T>): void {
    const idx = this.receivers.indexOf(receiver);
    if (idx !== -1) this.receivers.splice(idx, 1);
  }
}
