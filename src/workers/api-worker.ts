/**
 * API worker: owns the model transport. Takes `ApiRequest`s off the hub one
 * at a time, streams each chat completion, and reports everything back on
 * `apiResponse` as data. Exactly one terminal response (`stream_complete` or
 * `stream_error`) is sent per chat request; retrying is the caller's call.
 */
import { Logger } from "../logger.js";
import { asError, isShuttleError } from "../errors.js";
import { QueueClosedError } from "../channels/queue.js";
import { ZERO_USAGE } from "../channels/messages.js";
import { ToolCallAssembler } from "./tool-call-assembler.js";
import type { ChannelHub } from "../channels/hub.js";
import type { ApiRequest, ApiResponse, ChatRequest } from "../channels/messages.js";
import type { ChatTransport, TokenUsage, TransportEndpoint, TransportFactory } from "../drivers/types.js";

export interface ApiWorkerOptions {
  transportFactory: TransportFactory;
  /** Initial endpoint; a `configure` request replaces it. */
  endpoint?: TransportEndpoint;
}

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "0.0.0.0", "[::1]", "::1"]);

export function isLocalBaseUrl(baseUrl: string): boolean {
  try {
    return LOCAL_HOSTS.has(new URL(baseUrl).hostname);
  } catch {
    return false;
  }
}

export class ApiWorker {
  private endpoint: TransportEndpoint | null;
  private transport: ChatTransport | null = null;
  private handled = 0;

  constructor(
    private readonly hub: ChannelHub,
    private readonly opts: ApiWorkerOptions,
  ) {
    this.endpoint = opts.endpoint ?? null;
  }

  /** Number of chat requests answered so far. */
  get requestsHandled(): number {
    return this.handled;
  }

  async run(): Promise<void> {
    this.hub.incrementActive();
    Logger.telemetry("[api-worker] started");
    try {
      while (!this.hub.isShutdownSignaled()) {
        let req: ApiRequest;
        try {
          req = await this.hub.apiRequest.receive();
        } catch (e: unknown) {
          if (e instanceof QueueClosedError) break;
          throw e;
        }
        if (req.kind === "shutdown") break;
        if (req.kind === "configure") {
          this.configure(req);
          continue;
        }
        await this.handleChat(req);
      }
      await this.rejectPending();
    } finally {
      this.hub.decrementActive();
      Logger.telemetry(`[api-worker] stopped after ${this.handled} request(s)`);
    }
  }

  private configure(req: Extract<ApiRequest, { kind: "configure" }>): void {
    this.endpoint = { baseUrl: req.baseUrl, apiKey: req.apiKey, model: req.model };
    this.transport = null;
    Logger.telemetry(`[api-worker] configured ${req.baseUrl} model=${req.model}`);
  }

  private async emit(response: ApiResponse): Promise<void> {
    await this.hub.apiResponse.send(response);
  }

  private async fail(requestId: string, error: string, retryable: boolean): Promise<void> {
    await this.emit({ kind: "stream_error", requestId, error, retryable });
  }

  private async handleChat(req: ChatRequest): Promise<void> {
    const { requestId } = req;
    this.handled++;
    await this.emit({ kind: "ready", requestId });

    const endpoint = this.endpoint;
    if (!endpoint) {
      await this.fail(requestId, "API worker is not configured", false);
      return;
    }
    if (!endpoint.apiKey && !isLocalBaseUrl(endpoint.baseUrl)) {
      await this.fail(requestId, `No API key configured for ${endpoint.baseUrl}`, false);
      return;
    }

    this.transport ??= this.opts.transportFactory(endpoint);
    const assembler = new ToolCallAssembler();
    let usage: TokenUsage = ZERO_USAGE;

    try {
      const events = this.transport.stream({
        model: req.model || endpoint.model,
        messages: req.messages,
        tools: req.enableTools && req.toolSchemas.length > 0 ? req.toolSchemas : undefined,
        maxTokens: req.maxTokens,
        temperature: req.temperature,
      });
      for await (const ev of events) {
        switch (ev.type) {
          case "content":
            await this.emit({ kind: "stream_chunk", requestId, contentDelta: ev.text, toolCallDeltas: [] });
            break;
          case "tool_call_delta": {
            await this.emit({ kind: "stream_chunk", requestId, contentDelta: "", toolCallDeltas: [ev.delta] });
            const call = assembler.push(ev.delta);
            if (call) await this.emit({ kind: "tool_call_request", requestId, toolCall: call });
            break;
          }
          case "usage":
            usage = ev.usage;
            break;
        }
      }
      for (const call of assembler.flush()) {
        await this.emit({ kind: "tool_call_request", requestId, toolCall: call });
      }
      await this.emit({ kind: "stream_complete", requestId, usage });
    } catch (e: unknown) {
      const err = asError(e);
      const retryable = isShuttleError(e) ? e.retryable : false;
      Logger.debug(`[api-worker] ${requestId} failed (retryable=${retryable})`, err.stack ?? err.message);
      await this.fail(requestId, err.message, retryable);
    }
  }

  /** Answer chat requests still queued at exit so no caller waits on them. */
  private async rejectPending(): Promise<void> {
    for (const req of this.hub.apiRequest.drain()) {
      if (req.kind === "chat") await this.fail(req.requestId, "API worker shutting down", false);
    }
  }
}
