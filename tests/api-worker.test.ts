/**
 * Tests for the API worker loop.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { ApiWorker, isLocalBaseUrl } from "../src/workers/api-worker.js";
import { ChannelHub } from "../src/channels/hub.js";
import { ResponseRouter } from "../src/channels/router.js";
import { MAIN_SCOPE, isTerminal } from "../src/channels/messages.js";
import { shuttleError } from "../src/errors.js";
import { ScriptedTransport, startHarness, text, toolCall, usage } from "./helpers.js";
import type { ApiResponse, ChatRequest } from "../src/channels/messages.js";
import type { Mailbox } from "../src/channels/router.js";
import type { ToolSchema, TransportEndpoint } from "../src/drivers/types.js";

function chat(requestId: string, overrides: Partial<ChatRequest> = {}): ChatRequest {
  return {
    kind: "chat",
    requestId,
    messages: [{ role: "user", content: "hi" }],
    model: "test-model",
    maxTokens: 100,
    temperature: 0,
    enableTools: false,
    toolSchemas: [],
    agentScope: MAIN_SCOPE,
    ...overrides,
  };
}

async function collect(box: Mailbox<ApiResponse>): Promise<ApiResponse[]> {
  const out: ApiResponse[] = [];
  while (true) {
    const r = await box.next(2000);
    if (!r) throw new Error(`no terminal response for ${box.requestId}`);
    out.push(r);
    if (isTerminal(r)) return out;
  }
}

const READ_SCHEMA: ToolSchema = {
  type: "function",
  function: { name: "read", description: "read a file", parameters: { type: "object", properties: {} } },
};

describe("ApiWorker", () => {
  test("streams ready, chunks, tool calls and completion for one request", async () => {
    const h = startHarness({
      turns: [[text("Hel"), text("lo"), toolCall("call_a", "read", { path: "x" }), usage(10, 5)]],
    });
    const box = h.apiResponses.open("r1");
    await h.hub.apiRequest.send(chat("r1"));

    assert.deepStrictEqual(await collect(box), [
      { kind: "ready", requestId: "r1" },
      { kind: "stream_chunk", requestId: "r1", contentDelta: "Hel", toolCallDeltas: [] },
      { kind: "stream_chunk", requestId: "r1", contentDelta: "lo", toolCallDeltas: [] },
      {
        kind: "stream_chunk",
        requestId: "r1",
        contentDelta: "",
        toolCallDeltas: [{ index: 0, id: "call_a", name: "read", argumentsFragment: '{"path":"x"}' }],
      },
      { kind: "tool_call_request", requestId: "r1", toolCall: { id: "call_a", functionName: "read", argumentsJSON: '{"path":"x"}' } },
      { kind: "stream_complete", requestId: "r1", usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 } },
    ]);
    assert.strictEqual(await h.stop(), true);
  });

  test("calls still incomplete at stream end are flushed before completion", async () => {
    const h = startHarness({
      turns: [[{ type: "tool_call_delta", delta: { index: 0, id: "c1", name: "list" } }]],
    });
    const box = h.apiResponses.open("r1");
    await h.hub.apiRequest.send(chat("r1"));
    const responses = await collect(box);
    assert.deepStrictEqual(responses.slice(-2), [
      { kind: "tool_call_request", requestId: "r1", toolCall: { id: "c1", functionName: "list", argumentsJSON: "{}" } },
      { kind: "stream_complete", requestId: "r1", usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 } },
    ]);
    await h.stop();
  });

  test("passes tool schemas only when tools are enabled", async () => {
    const h = startHarness({ turns: [[text("a")], [text("b")]] });
    const first = h.apiResponses.open("r1");
    await h.hub.apiRequest.send(chat("r1", { enableTools: true, toolSchemas: [READ_SCHEMA], maxTokens: 64, temperature: 0.5 }));
    await collect(first);
    const second = h.apiResponses.open("r2");
    await h.hub.apiRequest.send(chat("r2", { enableTools: false, toolSchemas: [READ_SCHEMA] }));
    await collect(second);

    assert.deepStrictEqual(h.transport.requests[0].tools, [READ_SCHEMA]);
    assert.strictEqual(h.transport.requests[0].maxTokens, 64);
    assert.strictEqual(h.transport.requests[0].temperature, 0.5);
    assert.strictEqual(h.transport.requests[1].tools, undefined);
    await h.stop();
  });

  test("a retryable transport error becomes a retryable stream_error", async () => {
    const h = startHarness({
      turns: [
        async function* () {
          yield text("partial");
          throw shuttleError("transport_error", "HTTP 503", { retryable: true });
        },
      ],
    });
    const box = h.apiResponses.open("r1");
    await h.hub.apiRequest.send(chat("r1"));
    const responses = await collect(box);
    assert.deepStrictEqual(responses.at(-1), { kind: "stream_error", requestId: "r1", error: "HTTP 503", retryable: true });
    assert.strictEqual(responses.length, 3);
    await h.stop();
  });

  test("a plain error is not retryable", async () => {
    const h = startHarness({
      turns: [
        async function* () {
          yield text("");
          throw new Error("socket hang up");
        },
      ],
    });
    const box = h.apiResponses.open("r1");
    await h.hub.apiRequest.send(chat("r1"));
    assert.deepStrictEqual((await collect(box)).at(-1), {
      kind: "stream_error",
      requestId: "r1",
      error: "socket hang up",
      retryable: false,
    });
    await h.stop();
  });

  test("a missing API key fails requests to remote endpoints", async () => {
    const h = startHarness({ turns: [], endpoint: { baseUrl: "https://llm.test", apiKey: "", model: "m" } });
    const box = h.apiResponses.open("r1");
    await h.hub.apiRequest.send(chat("r1"));
    assert.deepStrictEqual(await collect(box), [
      { kind: "ready", requestId: "r1" },
      { kind: "stream_error", requestId: "r1", error: "No API key configured for https://llm.test", retryable: false },
    ]);
    assert.strictEqual(h.transport.requests.length, 0);
    await h.stop();
  });

  test("local endpoints work without an API key", async () => {
    const h = startHarness({ turns: [[text("ok")]], endpoint: { baseUrl: "http://localhost:11434", apiKey: "", model: "m" } });
    const box = h.apiResponses.open("r1");
    await h.hub.apiRequest.send(chat("r1"));
    assert.strictEqual((await collect(box)).at(-1)?.kind, "stream_complete");
    await h.stop();
  });

  test("an unconfigured worker answers with an error; configure fixes it", async () => {
    const hub = new ChannelHub();
    const router = new ResponseRouter(hub.apiResponse, "api");
    router.start();
    const transport = new ScriptedTransport([[text("configured")]]);
    const seen: TransportEndpoint[] = [];
    const worker = new ApiWorker(hub, {
      transportFactory: (ep) => {
        seen.push(ep);
        return transport;
      },
    });
    const run = worker.run();

    const before = router.open("r1");
    await hub.apiRequest.send(chat("r1"));
    assert.deepStrictEqual((await collect(before)).at(-1), {
      kind: "stream_error",
      requestId: "r1",
      error: "API worker is not configured",
      retryable: false,
    });

    await hub.apiRequest.send({ kind: "configure", baseUrl: "https://llm.test", apiKey: "test-secret", model: "fallback-model" });
    const after = router.open("r2");
    await hub.apiRequest.send(chat("r2", { model: "" }));
    assert.strictEqual((await collect(after)).at(-1)?.kind, "stream_complete");
    assert.deepStrictEqual(seen, [{ baseUrl: "https://llm.test", apiKey: "test-secret", model: "fallback-model" }]);
    assert.strictEqual(transport.requests[0].model, "fallback-model");
    assert.strictEqual(worker.requestsHandled, 2);

    await hub.signalShutdown();
    await run;
    await router.stop();
    assert.strictEqual(hub.activeCount(), 0);
  });

  test("chat requests still queued at shutdown are answered with an error", async () => {
    const hub = new ChannelHub();
    const worker = new ApiWorker(hub, { transportFactory: () => new ScriptedTransport([]) });
    await hub.signalShutdown();
    await hub.apiRequest.send(chat("late-1"));
    await hub.apiRequest.send(chat("late-2"));
    await worker.run();

    assert.deepStrictEqual(hub.apiResponse.drain(), [
      { kind: "stream_error", requestId: "late-1", error: "API worker shutting down", retryable: false },
      { kind: "stream_error", requestId: "late-2", error: "API worker shutting down", retryable: false },
    ]);
    assert.strictEqual(hub.activeCount(), 0);
  });

  test("the worker exits when its request queue closes", async () => {
    const hub = new ChannelHub();
    const worker = new ApiWorker(hub, { transportFactory: () => new ScriptedTransport([]) });
    const run = worker.run();
    assert.strictEqual(hub.activeCount(), 1);
    hub.close();
    await run;
    assert.strictEqual(hub.activeCount(), 0);
  });
});

describe("isLocalBaseUrl", () => {
  test("loopback hosts", () => {
    assert.strictEqual(isLocalBaseUrl("http://localhost:1234/v1"), true);
    assert.strictEqual(isLocalBaseUrl("http://127.0.0.1"), true);
    assert.strictEqual(isLocalBaseUrl("http://[::1]:8080"), true);
  });

  test("remote hosts and garbage", () => {
    assert.strictEqual(isLocalBaseUrl("https://api.openai.com"), false);
    assert.strictEqual(isLocalBaseUrl("not a url"), false);
  });
});
