/**
 * Artifact extraction: which files did a run touch, judged from the tool
 * calls the assistant made.
 */
import type { ChatMessage } from "../drivers/types.js";

export interface Artifacts {
  modified: string[];
  temporary: string[];
}

const TEMP_PREFIXES = ["/tmp/", "/var/tmp/"];
const WRITE_TOOLS = new Set(["create", "edit"]);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function decodeArgs(argumentsJSON: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(argumentsJSON);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export function isTemporaryPath(path: string, scratchDir?: string): boolean {
  if (TEMP_PREFIXES.some((p) => path.startsWith(p))) return true;
  if (!scratchDir) return false;
  const dir = scratchDir.endsWith("/") ? scratchDir : `${scratchDir}/`;
  return path.startsWith(dir);
}

function pathArg(args: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const v = args[key];
    if (typeof v === "string" && v) return v;
  }
  return undefined;
}

/** Sorted, de-duplicated file paths written by `create`/`edit` and saved by `fetch`. */
export function extractArtifacts(history: ChatMessage[], scratchDir?: string): Artifacts {
  const modified = new Set<string>();
  const temporary = new Set<string>();

  for (const msg of history) {
    if (msg.role !== "assistant" || !msg.toolCalls) continue;
    for (const call of msg.toolCalls) {
      const args = decodeArgs(call.argumentsJSON);
      if (WRITE_TOOLS.has(call.functionName)) {
        const path = pathArg(args, "path", "file_path");
        if (!path) continue;
        if (isTemporaryPath(path, scratchDir)) temporary.add(path);
        else modified.add(path);
      } else if (call.functionName === "fetch") {
        const path = pathArg(args, "output_path");
        if (path) temporary.add(path);
      }
    }
  }

  return { modified: [...modified].sort(), temporary: [...temporary].sort() };
}
