/**
 * Structured error types for shuttle.
 *
 * Workers never let these cross a queue as exceptions: they are flattened
 * into `stream_error` / `ToolResponse { ok: false }` data first. The driver
 * uses `kind` and `retryable` to decide whether a failure is turn-local or
 * ends the run.
 */

export type ShuttleErrorKind =
  | "transport_error"
  | "tool_permission_error"
  | "tool_execution_error"
  | "timeout_error"
  | "protocol_correlation_miss"
  | "config_error"
  | "mcp_error"
  | "session_error";

export interface ShuttleError extends Error {
  kind: ShuttleErrorKind;
  model?: string;
  request_id?: string;
  retryable: boolean;
  latency_ms?: number;
  status?: number;
  cause?: unknown;
}

export interface ShuttleErrorOptions {
  model?: string;
  request_id?: string;
  retryable?: boolean;
  latency_ms?: number;
  status?: number;
  cause?: unknown;
}

/**
 * Create a ShuttleError with structured fields.
 */
export function shuttleError(
  kind: ShuttleErrorKind,
  message: string,
  opts: ShuttleErrorOptions = {},
): ShuttleError {
  const err: ShuttleError = Object.assign(new Error(message), {
    kind,
    retryable: opts.retryable ?? false,
  });
  if (opts.model) err.model = opts.model;
  if (opts.request_id) err.request_id = opts.request_id;
  if (opts.latency_ms !== undefined) err.latency_ms = opts.latency_ms;
  if (opts.status !== undefined) err.status = opts.status;
  if (opts.cause !== undefined) err.cause = opts.cause;
  return err;
}

const MAX_MESSAGE = 1024;

/**
 * Normalize an unknown thrown value into an Error.
 * Handles strings, objects, nulls: the full JS throw spectrum.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e.slice(0, MAX_MESSAGE));
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e).slice(0, MAX_MESSAGE));
  } catch {
    return new Error("Unknown error");
  }
}

export function isShuttleError(e: unknown): e is ShuttleError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

/**
 * Format a ShuttleError for structured logging.
 * Returns a plain object suitable for JSON.stringify.
 */
export function errorLogFields(e: ShuttleError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.model) fields.model = e.model;
  if (e.request_id) fields.request_id = e.request_id;
  if (e.latency_ms !== undefined) fields.latency_ms = e.latency_ms;
  if (e.status !== undefined) fields.status = e.status;
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
