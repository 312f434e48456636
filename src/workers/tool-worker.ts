/**
 * Tool worker: executes `ToolRequest`s one at a time. Every outcome goes
 * back on `toolResponse` as data; nothing it throws crosses the queue.
 * Run several workers on the same hub for parallel tool execution.
 */
import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { QueueClosedError } from "../channels/queue.js";
import type { ChannelHub } from "../channels/hub.js";
import type { ToolRequest, ToolResponse } from "../channels/messages.js";
import type { ToolRegistry } from "../tools/registry.js";

type ExecuteRequest = Extract<ToolRequest, { kind: "execute" }>;

export class ToolWorker {
  private handled = 0;

  constructor(
    private readonly hub: ChannelHub,
    private readonly registry: ToolRegistry,
    readonly id: string = "tool-worker",
  ) {}

  get requestsHandled(): number {
    return this.handled;
  }

  async run(): Promise<void> {
    this.hub.incrementActive();
    Logger.telemetry(`[${this.id}] started`);
    try {
      while (true) {
        let req: ToolRequest;
        try {
          req = await this.hub.toolRequest.receive();
        } catch (e: unknown) {
          if (e instanceof QueueClosedError) break;
          throw e;
        }
        if (req.kind === "shutdown") {
          // Siblings on the same queue need their own sentinel.
          await this.hub.toolRequest.send(req);
          break;
        }
        const response = await this.execute(req);
        await this.hub.toolResponse.send(response);
      }
    } finally {
      this.hub.decrementActive();
      Logger.telemetry(`[${this.id}] stopped after ${this.handled} request(s)`);
    }
  }

  /** Run one request to a response. Never throws. */
  async execute(req: ExecuteRequest): Promise<ToolResponse> {
    const { requestId, toolName, callerAgentScope } = req;
    this.handled++;

    if (!this.registry.has(toolName)) {
      return { requestId, ok: false, error: `unknown tool '${toolName}'` };
    }
    if (!this.registry.isToolAllowed(callerAgentScope, toolName)) {
      return {
        requestId,
        ok: false,
        error: `tool '${toolName}' is not permitted for agent '${callerAgentScope.name}'`,
      };
    }

    const started = Date.now();
    try {
      const output = await this.registry.invokeTool(toolName, req.argumentsJSON);
      Logger.debug(`[${this.id}] ${toolName} ok in ${Date.now() - started}ms`);
      return { requestId, ok: true, output };
    } catch (e: unknown) {
      const err = asError(e);
      Logger.debug(`[${this.id}] ${toolName} failed in ${Date.now() - started}ms: ${err.message}`);
      return { requestId, ok: false, error: err.message };
    }
  }
}
