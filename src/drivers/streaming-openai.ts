/**
 * Streaming OpenAI-compatible chat transport.
 * Works with OpenAI, LM Studio, Ollama, vLLM and proxies that speak
 * `/v1/chat/completions` with server-sent events.
 */
import { Logger } from "../logger.js";
import { asError, isShuttleError, shuttleError } from "../errors.js";
import { timedFetch } from "../utils/timed-fetch.js";
import { isRetryable } from "../utils/retry.js";
import type {
  ChatMessage,
  ChatTransport,
  ChatTransportRequest,
  StreamEvent,
  TokenUsage,
} from "./types.js";

export interface OpenAiTransportConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export interface WireMessage {
  role: string;
  content: string | null;
  tool_calls?: WireToolCall[];
  tool_call_id?: string;
  name?: string;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function str(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function num(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function parseUsage(raw: unknown): TokenUsage | undefined {
  if (!isRecord(raw)) return undefined;
  const inputTokens = num(raw.prompt_tokens) ?? 0;
  const outputTokens = num(raw.completion_tokens) ?? 0;
  return { inputTokens, outputTokens, totalTokens: num(raw.total_tokens) ?? inputTokens + outputTokens };
}

/**
 * Convert history to the wire format. OpenAI requires strict tool_call/tool
 * message pairing, so orphans on either side get a placeholder partner.
 */
export function toWireMessages(messages: ChatMessage[]): WireMessage[] {
  const out: WireMessage[] = [];
  for (let i = 0; i < messages.length; i++) {
    const msg = messages[i];

    if (msg.role === "tool") {
      const prev = out[out.length - 1];
      const answered = prev?.tool_calls?.some((c) => c.id === msg.toolCallId) ?? false;
      const prevIsToolReply = prev?.role === "tool";
      if (!answered && !prevIsToolReply) {
        out.push({
          role: "assistant",
          content: "[tool invocation truncated]",
          tool_calls: [{
            id: msg.toolCallId ?? "truncated",
            type: "function",
            function: { name: msg.name ?? "unknown_tool", arguments: "{}" },
          }],
        });
      }
      out.push({ role: "tool", content: msg.content, tool_call_id: msg.toolCallId ?? "truncated", name: msg.name });
      continue;
    }

    if (msg.role === "assistant" && msg.toolCalls && msg.toolCalls.length > 0) {
      out.push({
        role: "assistant",
        content: msg.content || null,
        tool_calls: msg.toolCalls.map((c) => ({
          id: c.id,
          type: "function",
          function: { name: c.functionName, arguments: c.argumentsJSON },
        })),
      });
      const responded = new Set(
        messages.slice(i + 1).filter((m) => m.role === "tool").map((m) => m.toolCallId),
      );
      for (const call of msg.toolCalls) {
        if (!responded.has(call.id)) {
          out.push({ role: "tool", tool_call_id: call.id, name: call.functionName, content: "[tool result truncated]" });
        }
      }
      continue;
    }

    out.push({ role: msg.role, content: msg.content });
  }
  return out;
}

/** Decode one SSE event block into transport events. Unparseable blocks yield nothing. */
export function parseSseEvent(rawEvent: string): StreamEvent[] {
  const dataLines = rawEvent
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.startsWith("data:"))
    .map((l) => l.replace(/^data:\s?/, ""));
  if (!dataLines.length) return [];
  const joined = dataLines.join("\n").trim();
  if (!joined || joined === "[DONE]") return [];

  let payload: unknown;
  try {
    payload = JSON.parse(joined);
  } catch {
    Logger.debug("[openai] unparseable SSE event", joined.slice(0, 200));
    return [];
  }
  if (!isRecord(payload)) return [];

  const events: StreamEvent[] = [];
  const choices = Array.isArray(payload.choices) ? payload.choices : [];
  const first: unknown = choices[0];
  const delta = isRecord(first) ? first.delta : undefined;
  if (isRecord(delta)) {
    const content = str(delta.content);
    if (content) events.push({ type: "content", text: content });
    if (Array.isArray(delta.tool_calls)) {
      for (const item of delta.tool_calls) {
        if (!isRecord(item)) continue;
        const fn: Record<string, unknown> = isRecord(item.function) ? item.function : {};
        events.push({
          type: "tool_call_delta",
          delta: {
            index: num(item.index) ?? 0,
            id: str(item.id) || undefined,
            name: str(fn.name) || undefined,
            argumentsFragment: str(fn.arguments) || undefined,
          },
        });
      }
    }
  }

  // Final chunk when stream_options.include_usage is set
  const usage = parseUsage(payload.usage);
  if (usage) events.push({ type: "usage", usage });
  return events;
}

/** Events for a provider that answered with a plain JSON body instead of SSE. */
export function parseJsonCompletion(data: unknown): StreamEvent[] {
  if (!isRecord(data)) return [];
  const events: StreamEvent[] = [];
  const choices = Array.isArray(data.choices) ? data.choices : [];
  const first: unknown = choices[0];
  const msg: Record<string, unknown> = isRecord(first) && isRecord(first.message) ? first.message : {};
  const content = str(msg.content);
  if (content) events.push({ type: "content", text: content });
  const calls = Array.isArray(msg.tool_calls) ? msg.tool_calls : [];
  calls.forEach((call, index) => {
    if (!isRecord(call)) return;
    const fn: Record<string, unknown> = isRecord(call.function) ? call.function : {};
    events.push({
      type: "tool_call_delta",
      delta: { index, id: str(call.id), name: str(fn.name), argumentsFragment: str(fn.arguments) ?? "{}" },
    });
  });
  const usage = parseUsage(data.usage);
  if (usage) events.push({ type: "usage", usage });
  return events;
}

export function makeStreamingOpenAiTransport(cfg: OpenAiTransportConfig): ChatTransport {
  const base = cfg.baseUrl.replace(/\/+$/, "");
  const endpoint = base.endsWith("/v1") ? `${base}/chat/completions` : `${base}/v1/chat/completions`;
  const defaultTimeout = cfg.timeoutMs ?? 10 * 60 * 1000;

  async function* stream(request: ChatTransportRequest, signal?: AbortSignal): AsyncGenerator<StreamEvent> {
    const messages = toWireMessages(request.messages);
    const payloadSize = JSON.stringify(messages).length;
    const sizeMB = (payloadSize / (1024 * 1024)).toFixed(2);
    Logger.telemetry(`[API →] ${sizeMB} MB (${messages.length} messages) model=${request.model}`);

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (cfg.apiKey) headers["Authorization"] = `Bearer ${cfg.apiKey}`;

    const payload: Record<string, unknown> = {
      model: request.model,
      messages,
      stream: true,
      stream_options: { include_usage: true },
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    };
    if (request.tools && request.tools.length) {
      payload.tools = request.tools;
      payload.tool_choice = "auto";
    }

    const started = Date.now();
    const res = await timedFetch(endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify(payload),
      signal,
      where: "transport:openai:stream",
      timeoutMs: defaultTimeout,
    });

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw shuttleError("transport_error", `OpenAI chat (stream) failed (${res.status}): ${text.slice(0, 500)}`, {
        status: res.status,
        retryable: isRetryable(res.status),
        model: request.model,
        latency_ms: Date.now() - started,
      });
    }

    const ct = (res.headers.get("content-type") || "").toLowerCase();
    if (!ct.includes("text/event-stream")) {
      const data: unknown = await res.json().catch(() => ({}));
      yield* parseJsonCompletion(data);
      return;
    }

    if (!res.body) return;
    const decoder = new TextDecoder("utf-8");
    const reader = res.body.getReader();
    let buf = "";
    let received = 0;
    try {
      while (true) {
        const { value, done } = await reader.read();
        if (done) break;
        received += value.byteLength;
        buf += decoder.decode(value, { stream: true });
        let sepIdx: number;
        while ((sepIdx = buf.indexOf("\n\n")) !== -1) {
          const rawEvent = buf.slice(0, sepIdx).trim();
          buf = buf.slice(sepIdx + 2);
          if (rawEvent) yield* parseSseEvent(rawEvent);
        }
      }
      if (buf.trim()) yield* parseSseEvent(buf.trim());
    } catch (e: unknown) {
      if (isShuttleError(e)) throw e;
      const wrapped = asError(e);
      throw shuttleError("transport_error", `[stream read] ${endpoint} -> ${wrapped.name}: ${wrapped.message}`, {
        retryable: wrapped.name !== "AbortError",
        model: request.model,
        cause: e,
      });
    } finally {
      reader.cancel().catch((e: unknown) => Logger.debug("[openai] reader cancel failed", e));
    }
    Logger.telemetry(`[API ←] ${(received / (1024 * 1024)).toFixed(2)} MB in ${Date.now() - started}ms`);
  }

  return { stream };
}
