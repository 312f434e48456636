/**
 * Message variants carried by the ChannelHub queues.
 *
 * Every request and response crossing a queue is plain data; errors are
 * flattened to strings before they are sent.
 */
import { randomUUID } from "node:crypto";
import type { ChatMessage, LLMToolCall, TokenUsage, ToolCallDelta, ToolSchema } from "../drivers/types.js";

/** Which tools an agent may call. `"*"` is the main agent's full access. */
export interface AgentScope {
  name: string;
  allowedTools: string[] | "*";
}

export const MAIN_SCOPE: AgentScope = { name: "main", allowedTools: "*" };

export interface ChatRequest {
  kind: "chat";
  requestId: string;
  messages: ChatMessage[];
  model: string;
  maxTokens: number;
  temperature: number;
  enableTools: boolean;
  toolSchemas: ToolSchema[];
  agentScope: AgentScope;
}

export type ApiRequest =
  | { kind: "configure"; baseUrl: string; apiKey: string; model: string }
  | ChatRequest
  | { kind: "shutdown" };

export type ApiResponse =
  | { kind: "ready"; requestId: string }
  | { kind: "stream_chunk"; requestId: string; contentDelta: string; toolCallDeltas: ToolCallDelta[] }
  | { kind: "tool_call_request"; requestId: string; toolCall: LLMToolCall }
  | { kind: "tool_call_result"; requestId: string; toolCall: LLMToolCall; result: string }
  | { kind: "stream_complete"; requestId: string; usage: TokenUsage }
  | { kind: "stream_error"; requestId: string; error: string; retryable: boolean };

export type ToolRequest =
  | {
      kind: "execute";
      /** The model's tool-call id. */
      requestId: string;
      toolName: string;
      argumentsJSON: string;
      callerAgentScope: AgentScope;
    }
  | { kind: "shutdown" };

export type ToolResponse =
  | { requestId: string; ok: true; output: string }
  | { requestId: string; ok: false; error: string };

export type OrchestratorState = "idle" | "thinking" | "tool" | "summarizing" | "done" | "failed";

export type UiUpdate =
  | { kind: "state"; state: OrchestratorState; detail?: string }
  | { kind: "api"; response: ApiResponse }
  | { kind: "error"; message: string };

export function isTerminal(
  response: ApiResponse,
): response is Extract<ApiResponse, { kind: "stream_complete" | "stream_error" }> {
  return response.kind === "stream_complete" || response.kind === "stream_error";
}

export function newRequestId(): string {
  return `req_${randomUUID().split("-")[0]}${Date.now().toString(36)}`;
}

export const ZERO_USAGE: TokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
