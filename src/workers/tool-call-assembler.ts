/**
 * Reassembles streamed tool-call fragments into whole calls.
 *
 * Providers stream a call as a sequence of deltas sharing a slot index: the
 * id and name usually arrive first, the arguments JSON in pieces after.
 * A call is released as soon as it has a name and its arguments parse as a
 * complete JSON object or array, so the caller can dispatch it before the
 * rest of the stream finishes.
 */
import { randomUUID } from "node:crypto";
import { Logger } from "../logger.js";
import type { LLMToolCall, ToolCallDelta } from "../drivers/types.js";

interface Slot {
  id: string;
  name: string;
  args: string;
  emitted: boolean;
}

/** Balanced braces/brackets outside of strings, starting with `{` or `[`. */
export function isCompleteJson(text: string): boolean {
  const s = text.trim();
  if (!s || (s[0] !== "{" && s[0] !== "[")) return false;
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (const c of s) {
    if (escaped) {
      escaped = false;
      continue;
    }
    if (c === "\\") {
      escaped = true;
      continue;
    }
    if (c === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (c === "{" || c === "[") depth++;
    else if (c === "}" || c === "]") depth--;
  }
  return depth === 0 && !inString;
}

export function isValidJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

export class ToolCallAssembler {
  private readonly slots: Slot[] = [];
  private readonly byIndex = new Map<number, Slot>();

  /** Feed one fragment. Returns the call if this fragment completed it. */
  push(delta: ToolCallDelta): LLMToolCall | null {
    let slot = this.byIndex.get(delta.index);
    // A fresh id on an occupied index starts a new call.
    if (slot && delta.id && slot.id && delta.id !== slot.id) slot = undefined;
    if (!slot) {
      slot = { id: delta.id ?? "", name: "", args: "", emitted: false };
      this.slots.push(slot);
      this.byIndex.set(delta.index, slot);
    }
    if (delta.id && !slot.id) slot.id = delta.id;
    if (delta.name) slot.name += delta.name;
    if (delta.argumentsFragment) slot.args += delta.argumentsFragment;

    if (slot.emitted) {
      Logger.debug(`[assembler] fragment after completion ignored for ${slot.name || "?"}`);
      return null;
    }
    if (slot.name && isCompleteJson(slot.args) && isValidJson(slot.args)) {
      slot.emitted = true;
      return this.toCall(slot);
    }
    return null;
  }

  /** Release every call not yet emitted. Empty arguments become `{}`. */
  flush(): LLMToolCall[] {
    const out: LLMToolCall[] = [];
    for (const slot of this.slots) {
      if (slot.emitted) continue;
      slot.emitted = true;
      if (!slot.name) {
        Logger.debug(`[assembler] dropping nameless tool call fragment: ${slot.args.slice(0, 80)}`);
        continue;
      }
      out.push(this.toCall(slot));
    }
    return out;
  }

  private toCall(slot: Slot): LLMToolCall {
    if (!slot.id) slot.id = `call_${randomUUID().split("-")[0]}`;
    return {
      id: slot.id,
      functionName: slot.name,
      argumentsJSON: slot.args.trim() ? slot.args : "{}",
    };
  }
}
