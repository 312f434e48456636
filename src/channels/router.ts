/**
 * ResponseRouter: sole consumer of a response queue. Fans responses out to
 * per-request mailboxes keyed by `requestId`, so several drivers can share
 * the hub without reading each other's responses. Anything addressed to an
 * unknown or already-closed request is dropped and counted.
 */
import { AsyncQueue, QueueClosedError } from "./queue.js";
import { Logger } from "../logger.js";

export interface Mailbox<T> {
  readonly requestId: string;
  /** Next response for this request, or undefined once `withinMs` elapses. */
  next(withinMs: number): Promise<T | undefined>;
  /** Next response if one is already routed here. */
  tryNext(): T | undefined;
  close(): void;
}

export class ResponseRouter<T extends { requestId: string }> {
  private boxes = new Map<string, AsyncQueue<T>>();
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private discardedCount = 0;

  constructor(
    private readonly source: AsyncQueue<T>,
    private readonly label: string,
  ) {}

  get discarded(): number {
    return this.discardedCount;
  }

  open(requestId: string): Mailbox<T> {
    const box = new AsyncQueue<T>(`${this.label}:${requestId}`);
    this.boxes.set(requestId, box);
    return {
      requestId,
      next: (withinMs) => box.receiveWithin(withinMs),
      tryNext: () => box.tryReceive(),
      close: () => {
        if (this.boxes.get(requestId) === box) this.boxes.delete(requestId);
        box.close();
      },
    };
  }

  /** Start the routing loop. Calling start on a running router is a no-op. */
  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.pump(controller.signal);
  }

  /** Stop routing. Open mailboxes stay readable. */
  async stop(): Promise<void> {
    this.controller?.abort();
    const loop = this.loop;
    this.loop = null;
    this.controller = null;
    if (loop) await loop;
  }

  /** Deliver one response to its mailbox. Returns false when it was discarded. */
  async route(item: T): Promise<boolean> {
    const box = this.boxes.get(item.requestId);
    if (!box || box.isClosed()) {
      this.discardedCount++;
      Logger.debug(`[router:${this.label}] protocol_correlation_miss requestId=${item.requestId}`);
      return false;
    }
    await box.send(item);
    return true;
  }

  private async pump(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let item: T;
      try {
        item = await this.source.receive(signal);
      } catch (e: unknown) {
        if (e instanceof QueueClosedError) return;
        if (e instanceof Error && e.name === "AbortError") return;
        throw e;
      }
      await this.route(item);
    }
  }
}
