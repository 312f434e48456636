/**
 * Orchestrator: owns one ChannelHub and the workers around it.
 *
 *   start()    routers, API worker, N tool workers, UI consumer, `configure`
 *   runTask()  one ConversationDriver run
 *   shutdown() sentinels, bounded wait for workers, then close the hub
 */
import { setImmediate as nextTick } from "node:timers/promises";
import { Logger } from "./logger.js";
import { asError, errorLogFields, shuttleError } from "./errors.js";
import { ChannelHub } from "./channels/hub.js";
import { ResponseRouter } from "./channels/router.js";
import { QueueClosedError } from "./channels/queue.js";
import { ApiWorker } from "./workers/api-worker.js";
import { ToolWorker } from "./workers/tool-worker.js";
import { ConversationDriver } from "./core/conversation-driver.js";
import type { ApiResponse, ToolResponse, UiUpdate } from "./channels/messages.js";
import type { TransportEndpoint, TransportFactory } from "./drivers/types.js";
import type { ToolRegistry } from "./tools/registry.js";
import type { ConversationStore } from "./session.js";
import type { DriverSettings, PromptBuilder, TaskInput, TaskResult } from "./core/conversation-driver.js";
import type { Delegation } from "./core/delegation.js";

export interface OrchestratorOptions {
  transportFactory: TransportFactory;
  endpoint: TransportEndpoint;
  registry: ToolRegistry;
  toolWorkers?: number;
  shutdownTimeoutMs?: number;
  driverSettings?: Partial<DriverSettings>;
  /** Agents the `task` tool may hand sub-tasks to. */
  delegation?: Delegation;
  /** Receives every UiUpdate in order. */
  onUiUpdate?: (update: UiUpdate) => void;
}

export class Orchestrator {
  readonly hub = new ChannelHub();
  readonly apiResponses: ResponseRouter<ApiResponse>;
  readonly toolResponses: ResponseRouter<ToolResponse>;
  private workerRuns: Promise<void>[] = [];
  private uiLoop: Promise<void> | null = null;
  private started = false;

  constructor(private readonly opts: OrchestratorOptions) {
    this.apiResponses = new ResponseRouter(this.hub.apiResponse, "api");
    this.toolResponses = new ResponseRouter(this.hub.toolResponse, "tool");
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    this.apiResponses.start();
    this.toolResponses.start();
    this.uiLoop = this.consumeUi();

    const api = new ApiWorker(this.hub, { transportFactory: this.opts.transportFactory });
    this.workerRuns.push(this.supervise("api-worker", api.run()));
    const n = Math.max(1, this.opts.toolWorkers ?? 1);
    for (let i = 0; i < n; i++) {
      const worker = new ToolWorker(this.hub, this.opts.registry, n > 1 ? `tool-worker-${i + 1}` : "tool-worker");
      this.workerRuns.push(this.supervise(worker.id, worker.run()));
    }

    const { baseUrl, apiKey, model } = this.opts.endpoint;
    await this.hub.apiRequest.send({ kind: "configure", baseUrl, apiKey, model });
    Logger.telemetry(`[orchestrator] started api-worker + ${n} tool worker(s)`);
  }

  async runTask(input: TaskInput, store: ConversationStore, buildPrompt: PromptBuilder): Promise<TaskResult> {
    if (!this.started || this.hub.isShutdownSignaled()) {
      throw shuttleError("config_error", "orchestrator is not running");
    }
    const driver = new ConversationDriver({
      hub: this.hub,
      apiResponses: this.apiResponses,
      toolResponses: this.toolResponses,
      store,
      buildPrompt,
      settings: this.opts.driverSettings,
      delegation: this.opts.delegation,
    });
    return driver.run(input);
  }

  /**
   * Signal shutdown and wait up to `shutdownTimeoutMs` for every worker.
   * Resolves false when some worker was still running at the deadline.
   */
  async shutdown(): Promise<boolean> {
    await this.hub.signalShutdown();
    const stopped = await this.hub.waitForWorkers(this.opts.shutdownTimeoutMs ?? 5_000);
    if (!stopped) Logger.warn(`${this.hub.activeCount()} worker(s) still running after shutdown timeout`);

    await this.apiResponses.stop();
    await this.toolResponses.stop();
    await this.flushUi();
    this.hub.close();
    if (this.uiLoop) await this.uiLoop;
    if (stopped) await Promise.all(this.workerRuns);
    return stopped;
  }

  private supervise(name: string, run: Promise<void>): Promise<void> {
    return run.catch((e: unknown) => {
      const se = shuttleError("tool_execution_error", `${name} crashed: ${asError(e).message}`, { cause: e });
      Logger.error(se.message, errorLogFields(se));
    });
  }

  private async consumeUi(): Promise<void> {
    const sink = this.opts.onUiUpdate;
    while (true) {
      let update: UiUpdate;
      try {
        update = await this.hub.uiUpdate.receive();
      } catch (e: unknown) {
        if (e instanceof QueueClosedError) return;
        throw e;
      }
      try {
        sink?.(update);
      } catch (e: unknown) {
        Logger.warn(`UI update dropped: ${asError(e).message}`);
      }
    }
  }

  /** Let the UI consumer take everything already queued. */
  private async flushUi(): Promise<void> {
    while (this.hub.uiUpdate.len() > 0) await nextTick();
    await nextTick();
  }
}
