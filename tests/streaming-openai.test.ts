/**
 * Tests for the OpenAI-compatible streaming transport: SSE decoding, wire
 * message conversion, and a round trip against a local server.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import http from "node:http";
import {
  parseSseEvent,
  parseJsonCompletion,
  toWireMessages,
  makeStreamingOpenAiTransport,
} from "../src/drivers/streaming-openai.js";
import { isShuttleError } from "../src/errors.js";
import type { ChatMessage, ChatTransport, ChatTransportRequest, StreamEvent } from "../src/drivers/types.js";

interface Captured {
  url: string;
  authorization: string;
  body: string;
}

function startServer(
  respond: (res: http.ServerResponse) => void,
): Promise<{ baseUrl: string; captured: Captured[]; close: () => Promise<void> }> {
  const captured: Captured[] = [];
  return new Promise((resolve) => {
    const server = http.createServer((req, res) => {
      let body = "";
      req.on("data", (d: Buffer) => (body += d.toString()));
      req.on("end", () => {
        captured.push({ url: req.url ?? "", authorization: req.headers.authorization ?? "", body });
        respond(res);
      });
    });
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : 0;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        captured,
        close: () =>
          new Promise<void>((r) => {
            server.closeAllConnections();
            server.close(() => r());
          }),
      });
    });
  });
}

async function collect(transport: ChatTransport, request: ChatTransportRequest): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const ev of transport.stream(request)) events.push(ev);
  return events;
}

const REQUEST: ChatTransportRequest = {
  model: "test-model",
  messages: [{ role: "user", content: "hi" }],
  maxTokens: 100,
  temperature: 0,
};

describe("parseSseEvent", () => {
  test("content delta", () => {
    assert.deepStrictEqual(parseSseEvent('data: {"choices":[{"delta":{"content":"Hi"}}]}'), [{ type: "content", text: "Hi" }]);
  });

  test("tool call delta", () => {
    const raw = 'data: {"choices":[{"delta":{"tool_calls":[{"index":1,"id":"call_1","function":{"name":"read","arguments":"{\\"pa"}}]}}]}';
    assert.deepStrictEqual(parseSseEvent(raw), [
      { type: "tool_call_delta", delta: { index: 1, id: "call_1", name: "read", argumentsFragment: '{"pa' } },
    ]);
  });

  test("continuation fragments carry only the arguments", () => {
    const raw = 'data: {"choices":[{"delta":{"tool_calls":[{"index":0,"function":{"arguments":"th\\"}"}}]}}]}';
    assert.deepStrictEqual(parseSseEvent(raw), [
      { type: "tool_call_delta", delta: { index: 0, id: undefined, name: undefined, argumentsFragment: 'th"}' } },
    ]);
  });

  test("usage chunk", () => {
    const raw = 'data: {"choices":[],"usage":{"prompt_tokens":3,"completion_tokens":4,"total_tokens":7}}';
    assert.deepStrictEqual(parseSseEvent(raw), [{ type: "usage", usage: { inputTokens: 3, outputTokens: 4, totalTokens: 7 } }]);
  });

  test("[DONE], comments and garbage yield nothing", () => {
    assert.deepStrictEqual(parseSseEvent("data: [DONE]"), []);
    assert.deepStrictEqual(parseSseEvent(": keep-alive"), []);
    assert.deepStrictEqual(parseSseEvent("data: {bad"), []);
  });
});

describe("parseJsonCompletion", () => {
  test("non-streamed body becomes the same events", () => {
    const data = {
      choices: [{ message: { content: "Hi", tool_calls: [{ id: "c1", function: { name: "read", arguments: '{"path":"a"}' } }] } }],
      usage: { prompt_tokens: 1, completion_tokens: 2 },
    };
    assert.deepStrictEqual(parseJsonCompletion(data), [
      { type: "content", text: "Hi" },
      { type: "tool_call_delta", delta: { index: 0, id: "c1", name: "read", argumentsFragment: '{"path":"a"}' } },
      { type: "usage", usage: { inputTokens: 1, outputTokens: 2, totalTokens: 3 } },
    ]);
  });

  test("non-object body yields nothing", () => {
    assert.deepStrictEqual(parseJsonCompletion("nope"), []);
  });
});

describe("toWireMessages", () => {
  test("maps tool calls and their replies", () => {
    const messages: ChatMessage[] = [
      { role: "system", content: "s" },
      { role: "user", content: "u" },
      { role: "assistant", content: "", toolCalls: [{ id: "c1", functionName: "read", argumentsJSON: "{}" }] },
      { role: "tool", content: "r", toolCallId: "c1", name: "read" },
      { role: "assistant", content: "done" },
    ];
    assert.deepStrictEqual(toWireMessages(messages), [
      { role: "system", content: "s" },
      { role: "user", content: "u" },
      { role: "assistant", content: null, tool_calls: [{ id: "c1", type: "function", function: { name: "read", arguments: "{}" } }] },
      { role: "tool", content: "r", tool_call_id: "c1", name: "read" },
      { role: "assistant", content: "done" },
    ]);
  });

  test("unanswered calls get a placeholder reply", () => {
    const messages: ChatMessage[] = [
      { role: "assistant", content: "trying", toolCalls: [{ id: "c2", functionName: "bash", argumentsJSON: "{}" }] },
    ];
    assert.deepStrictEqual(toWireMessages(messages)[1], {
      role: "tool",
      tool_call_id: "c2",
      name: "bash",
      content: "[tool result truncated]",
    });
  });

  test("orphaned replies get a placeholder call", () => {
    const messages: ChatMessage[] = [
      { role: "user", content: "u" },
      { role: "tool", content: "r", toolCallId: "c3", name: "list" },
    ];
    assert.deepStrictEqual(toWireMessages(messages).slice(1), [
      {
        role: "assistant",
        content: "[tool invocation truncated]",
        tool_calls: [{ id: "c3", type: "function", function: { name: "list", arguments: "{}" } }],
      },
      { role: "tool", content: "r", tool_call_id: "c3", name: "list" },
    ]);
  });
});

describe("makeStreamingOpenAiTransport", () => {
  test("streams SSE events from /v1/chat/completions", async () => {
    const srv = await startServer((res) => {
      res.writeHead(200, { "content-type": "text/event-stream" });
      res.write('data: {"choices":[{"delta":{"content":"Hel"}}]}\n\n');
      res.write('data: {"choices":[{"delta":{"content":"lo"}}]}\n\n');
      res.write('data: {"choices":[],"usage":{"prompt_tokens":5,"completion_tokens":2,"total_tokens":7}}\n\n');
      res.end("data: [DONE]\n\n");
    });
    try {
      const transport = makeStreamingOpenAiTransport({ baseUrl: `${srv.baseUrl}/`, apiKey: "test-secret" });
      const events = await collect(transport, REQUEST);
      assert.deepStrictEqual(events, [
        { type: "content", text: "Hel" },
        { type: "content", text: "lo" },
        { type: "usage", usage: { inputTokens: 5, outputTokens: 2, totalTokens: 7 } },
      ]);

      const [req] = srv.captured;
      assert.strictEqual(req.url, "/v1/chat/completions");
      assert.strictEqual(req.authorization, "Bearer test-secret");
      const body: unknown = JSON.parse(req.body);
      assert.ok(typeof body === "object" && body !== null);
      assert.ok("model" in body && "stream" in body);
      assert.strictEqual(body.model, "test-model");
      assert.strictEqual(body.stream, true);
      assert.strictEqual("tools" in body, false);
    } finally {
      await srv.close();
    }
  });

  test("a /v1 base URL is not doubled and tools are sent", async () => {
    const srv = await startServer((res) => {
      res.writeHead(200, { "content-type": "application/json" });
      res.end(JSON.stringify({ choices: [{ message: { content: "plain" } }] }));
    });
    try {
      const transport = makeStreamingOpenAiTransport({ baseUrl: `${srv.baseUrl}/v1` });
      const tools = [{ type: "function" as const, function: { name: "read", description: "", parameters: {} } }];
      const events = await collect(transport, { ...REQUEST, tools });
      assert.deepStrictEqual(events, [{ type: "content", text: "plain" }]);

      const [req] = srv.captured;
      assert.strictEqual(req.url, "/v1/chat/completions");
      assert.strictEqual(req.authorization, "");
      const body: unknown = JSON.parse(req.body);
      assert.ok(typeof body === "object" && body !== null && "tool_choice" in body);
      assert.strictEqual(body.tool_choice, "auto");
    } finally {
      await srv.close();
    }
  });

  test("HTTP errors carry status and retryability", async () => {
    const srv = await startServer((res) => {
      res.writeHead(503);
      res.end("overloaded");
    });
    try {
      const transport = makeStreamingOpenAiTransport({ baseUrl: srv.baseUrl, apiKey: "test-secret" });
      await assert.rejects(collect(transport, REQUEST), (err: unknown) => {
        assert.ok(isShuttleError(err));
        assert.strictEqual(err.message, "OpenAI chat (stream) failed (503): overloaded");
        assert.strictEqual(err.status, 503);
        assert.strictEqual(err.retryable, true);
        return true;
      });
    } finally {
      await srv.close();
    }
  });

  test("client errors are not retryable", async () => {
    const srv = await startServer((res) => {
      res.writeHead(400);
      res.end("bad request");
    });
    try {
      const transport = makeStreamingOpenAiTransport({ baseUrl: srv.baseUrl, apiKey: "test-secret" });
      await assert.rejects(collect(transport, REQUEST), (err: unknown) => isShuttleError(err) && err.retryable === false);
    } finally {
      await srv.close();
    }
  });
});
