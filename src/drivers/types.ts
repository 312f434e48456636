export type ChatRole = "system" | "user" | "assistant" | "tool";

/** A tool call as the model produced it, after fragment assembly. */
export interface LLMToolCall {
  id: string;
  functionName: string;
  argumentsJSON: string;
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** Assistant messages only: the calls the model asked for. */
  toolCalls?: LLMToolCall[];
  /** When role==="tool", the id of the tool call being answered. */
  toolCallId?: string;
  /** Optional: tool/function name for clarity. */
  name?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/** OpenAI-style function tool definition. */
export interface ToolSchema {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

/** One streamed fragment of a tool call. `index` is the provider's slot number. */
export interface ToolCallDelta {
  index: number;
  id?: string;
  name?: string;
  argumentsFragment?: string;
}

export type StreamEvent =
  | { type: "content"; text: string }
  | { type: "tool_call_delta"; delta: ToolCallDelta }
  | { type: "usage"; usage: TokenUsage };

export interface ChatTransportRequest {
  model: string;
  messages: ChatMessage[];
  /** Omitted when tools are disabled for the request. */
  tools?: ToolSchema[];
  maxTokens: number;
  temperature: number;
}

export interface ChatTransport {
  /**
   * Stream one completion. Errors are thrown from the iterator; a
   * `ShuttleError` carries `retryable` and the HTTP status when known.
   */
  stream(request: ChatTransportRequest, signal?: AbortSignal): AsyncIterable<StreamEvent>;
}

export interface TransportEndpoint {
  baseUrl: string;
  apiKey: string;
  model: string;
}

export type TransportFactory = (endpoint: TransportEndpoint) => ChatTransport;
