/**
 * Terminal renderer: turns `UiUpdate`s into streamed text on stdout and
 * tool-call markers on stderr.
 */
import { Logger, C } from "../logger.js";
import type { ApiResponse, UiUpdate } from "../channels/messages.js";

const ARG_PREVIEW = 40;
const RESULT_PREVIEW_LINES = 6;

/** `name('a', 'b')` with each argument value cut to 40 chars. */
export function formatToolCall(functionName: string, argumentsJSON: string): string {
  let args: unknown;
  try {
    args = JSON.parse(argumentsJSON || "{}");
  } catch {
    return `${functionName}(${argumentsJSON.slice(0, ARG_PREVIEW)})`;
  }
  if (typeof args !== "object" || args === null) return `${functionName}()`;
  const snippet = Object.values(args)
    .map((v: unknown) => {
      const s = typeof v === "string" ? v : JSON.stringify(v);
      return s.length > ARG_PREVIEW ? s.slice(0, ARG_PREVIEW - 3) + "..." : s;
    })
    .join(", ");
  return snippet ? `${functionName}('${snippet}')` : `${functionName}()`;
}

/** First few lines of a tool result, indented. */
export function previewResult(result: string): string {
  const lines = result.split("\n");
  const shown = lines.slice(0, RESULT_PREVIEW_LINES).map((l) => `    ${l}`);
  if (lines.length > RESULT_PREVIEW_LINES) shown.push(`    ... (${lines.length - RESULT_PREVIEW_LINES} more lines)`);
  return shown.join("\n");
}

export interface RendererOptions {
  /** Print a preview of each tool result under its call. */
  showToolOutput: boolean;
}

export class TerminalRenderer {
  private midLine = false;

  constructor(private readonly opts: RendererOptions = { showToolOutput: false }) {}

  render(update: UiUpdate): void {
    switch (update.kind) {
      case "state":
        Logger.telemetry(`[state] ${update.state}${update.detail ? ` ${update.detail}` : ""}`);
        break;
      case "error":
        this.endLine();
        process.stderr.write(C.yellow(`  ! ${update.message}`) + "\n");
        break;
      case "api":
        this.renderApi(update.response);
        break;
    }
  }

  /** Close a streamed line left open at the end of a run. */
  finish(): void {
    this.endLine();
  }

  private renderApi(response: ApiResponse): void {
    switch (response.kind) {
      case "stream_chunk":
        if (response.contentDelta) {
          Logger.streamInfo(response.contentDelta);
          this.midLine = !response.contentDelta.endsWith("\n");
        }
        break;
      case "tool_call_request":
        this.endLine();
        process.stderr.write(C.gray(`  → ${formatToolCall(response.toolCall.functionName, response.toolCall.argumentsJSON)}`) + "\n");
        break;
      case "tool_call_result":
        if (this.opts.showToolOutput) process.stderr.write(C.gray(previewResult(response.result)) + "\n");
        break;
      case "stream_complete":
      case "stream_error":
        this.endLine();
        break;
      case "ready":
        break;
    }
  }

  private endLine(): void {
    if (!this.midLine) return;
    Logger.endStreamLine();
    this.midLine = false;
  }
}
