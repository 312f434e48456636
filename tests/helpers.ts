/**
 * Shared test fixtures: a scripted model transport and a hub with its
 * workers and routers running in process.
 */

import { ChannelHub } from "../src/channels/hub.js";
import { ResponseRouter } from "../src/channels/router.js";
import { ApiWorker } from "../src/workers/api-worker.js";
import { ToolWorker } from "../src/workers/tool-worker.js";
import { ToolRegistry } from "../src/tools/registry.js";
import type { ApiResponse, ToolResponse } from "../src/channels/messages.js";
import type { ChatTransport, ChatTransportRequest, StreamEvent, TransportEndpoint } from "../src/drivers/types.js";

export type TurnScript = StreamEvent[] | ((request: ChatTransportRequest) => AsyncIterable<StreamEvent>);

/** Plays one script per request, in order. Records every request it sees. */
export class ScriptedTransport implements ChatTransport {
  readonly requests: ChatTransportRequest[] = [];

  constructor(private readonly turns: TurnScript[]) {}

  async *stream(request: ChatTransportRequest): AsyncGenerator<StreamEvent> {
    const turn = this.turns[this.requests.length];
    this.requests.push(request);
    if (!turn) throw new Error(`no scripted turn ${this.requests.length}`);
    if (Array.isArray(turn)) {
      for (const ev of turn) yield ev;
    } else {
      yield* turn(request);
    }
  }
}

export function text(s: string): StreamEvent {
  return { type: "content", text: s };
}

export function toolCall(id: string, name: string, args: unknown, index = 0): StreamEvent {
  return { type: "tool_call_delta", delta: { index, id, name, argumentsFragment: JSON.stringify(args) } };
}

export function usage(inputTokens: number, outputTokens: number): StreamEvent {
  return { type: "usage", usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens } };
}

export const TEST_ENDPOINT: TransportEndpoint = {
  baseUrl: "https://llm.test",
  apiKey: "test-secret",
  model: "test-model",
};

export interface Harness {
  hub: ChannelHub;
  apiResponses: ResponseRouter<ApiResponse>;
  toolResponses: ResponseRouter<ToolResponse>;
  transport: ScriptedTransport;
  registry: ToolRegistry;
  /** Shut everything down; resolves whether the workers stopped in time. */
  stop(): Promise<boolean>;
}

export interface HarnessOptions {
  turns: TurnScript[];
  registry?: ToolRegistry;
  toolWorkers?: number;
  endpoint?: TransportEndpoint;
}

export function startHarness(opts: HarnessOptions): Harness {
  const hub = new ChannelHub();
  const transport = new ScriptedTransport(opts.turns);
  const registry = opts.registry ?? new ToolRegistry();
  const apiResponses = new ResponseRouter(hub.apiResponse, "api");
  const toolResponses = new ResponseRouter(hub.toolResponse, "tool");
  apiResponses.start();
  toolResponses.start();

  const api = new ApiWorker(hub, { transportFactory: () => transport, endpoint: opts.endpoint ?? TEST_ENDPOINT });
  const runs = [api.run()];
  for (let i = 0; i < (opts.toolWorkers ?? 1); i++) {
    runs.push(new ToolWorker(hub, registry, `tool-worker-${i + 1}`).run());
  }

  return {
    hub,
    apiResponses,
    toolResponses,
    transport,
    registry,
    async stop() {
      await hub.signalShutdown();
      const stopped = await hub.waitForWorkers(2000);
      await apiResponses.stop();
      await toolResponses.stop();
      hub.close();
      if (stopped) await Promise.all(runs);
      return stopped;
    },
  };
}
