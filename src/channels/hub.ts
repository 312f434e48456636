/**
 * ChannelHub: the five queues every worker and driver talk through, plus
 * the process-wide shutdown flag and live-worker counter.
 *
 * One hub is constructed per process and passed explicitly to each worker.
 */
import { performance } from "node:perf_hooks";
import { AsyncQueue } from "./queue.js";
import { Logger } from "../logger.js";
import type { ApiRequest, ApiResponse, ToolRequest, ToolResponse, UiUpdate } from "./messages.js";

const WORKER_POLL_MS = 10;

interface HubQueues {
  apiRequest: AsyncQueue<ApiRequest>;
  apiResponse: AsyncQueue<ApiResponse>;
  toolRequest: AsyncQueue<ToolRequest>;
  toolResponse: AsyncQueue<ToolResponse>;
  uiUpdate: AsyncQueue<UiUpdate>;
}

function createQueues(): HubQueues {
  return {
    apiRequest: new AsyncQueue<ApiRequest>("apiRequest"),
    apiResponse: new AsyncQueue<ApiResponse>("apiResponse"),
    toolRequest: new AsyncQueue<ToolRequest>("toolRequest"),
    toolResponse: new AsyncQueue<ToolResponse>("toolResponse"),
    uiUpdate: new AsyncQueue<UiUpdate>("uiUpdate"),
  };
}

export class ChannelHub {
  private queues: HubQueues = createQueues();
  private shutdownRequested = false;
  private activeWorkers = 0;

  get apiRequest(): AsyncQueue<ApiRequest> { return this.queues.apiRequest; }
  get apiResponse(): AsyncQueue<ApiResponse> { return this.queues.apiResponse; }
  get toolRequest(): AsyncQueue<ToolRequest> { return this.queues.toolRequest; }
  get toolResponse(): AsyncQueue<ToolResponse> { return this.queues.toolResponse; }
  get uiUpdate(): AsyncQueue<UiUpdate> { return this.queues.uiUpdate; }

  /**
   * Replace the queues with fresh ones and reset the flag and counter.
   * The constructor starts in this state; calling it later closes the old queues.
   */
  initialize(): void {
    this.close();
    this.queues = createQueues();
    this.shutdownRequested = false;
    this.activeWorkers = 0;
  }

  /**
   * Raise the shutdown flag and post one sentinel to each request queue.
   * Idempotent: later calls send nothing.
   */
  async signalShutdown(): Promise<void> {
    if (this.shutdownRequested) return;
    this.shutdownRequested = true;
    Logger.debug("[hub] shutdown signaled");
    await this.apiRequest.send({ kind: "shutdown" });
    await this.toolRequest.send({ kind: "shutdown" });
  }

  isShutdownSignaled(): boolean {
    return this.shutdownRequested;
  }

  incrementActive(): void {
    this.activeWorkers++;
  }

  decrementActive(): void {
    if (this.activeWorkers > 0) this.activeWorkers--;
  }

  activeCount(): number {
    return this.activeWorkers;
  }

  /** Resolve true once no worker is running, false if the deadline passes first. */
  async waitForWorkers(timeoutMs: number): Promise<boolean> {
    const deadline = performance.now() + timeoutMs;
    while (this.activeWorkers > 0) {
      const remaining = deadline - performance.now();
      if (remaining <= 0) return false;
      await new Promise((resolve) => setTimeout(resolve, Math.min(WORKER_POLL_MS, remaining)));
    }
    return true;
  }

  close(): void {
    this.apiRequest.close();
    this.apiResponse.close();
    this.toolRequest.close();
    this.toolResponse.close();
    this.uiUpdate.close();
  }
}
