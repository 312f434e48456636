/**
 * Built-in edit tool: in-place text operations on an existing file.
 */
import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { Logger } from "../logger.js";
import { defineTool } from "./registry.js";

export type EditOperation = "replace" | "insert" | "delete" | "append" | "prepend" | "rewrite";

const editArgs = z.object({
  path: z.string().min(1),
  operation: z.enum(["replace", "insert", "delete", "append", "prepend", "rewrite"]),
  old_text: z.string().optional(),
  new_text: z.string().optional(),
  /** 1-based line the inserted text should start at. */
  line: z.number().int().positive().optional(),
});

type EditArgs = z.infer<typeof editArgs>;

function required(value: string | undefined, field: string, op: EditOperation): string {
  if (value === undefined) throw new Error(`${field} is required for ${op}`);
  return value;
}

/** Apply one edit to `content`. Pure; throws when the edit cannot apply. */
export function applyEdit(content: string, args: Omit<EditArgs, "path">): string {
  const op = args.operation;
  switch (op) {
    case "replace": {
      const oldText = required(args.old_text, "old_text", op);
      if (!oldText || !content.includes(oldText)) throw new Error("Text to replace not found in file");
      return content.split(oldText).join(required(args.new_text, "new_text", op));
    }
    case "delete": {
      const oldText = required(args.old_text, "old_text", op);
      if (!oldText || !content.includes(oldText)) throw new Error("Text to delete not found in file");
      return content.split(oldText).join("");
    }
    case "insert": {
      const newText = required(args.new_text, "new_text", op);
      if (args.line === undefined) throw new Error("line is required for insert");
      const lines = content.split("\n");
      const at = Math.min(args.line - 1, lines.length);
      lines.splice(at, 0, ...newText.split("\n"));
      return lines.join("\n");
    }
    case "append": {
      const newText = required(args.new_text, "new_text", op);
      if (!content) return newText;
      return content.endsWith("\n") ? content + newText : `${content}\n${newText}`;
    }
    case "prepend": {
      const newText = required(args.new_text, "new_text", op);
      if (!content) return newText;
      return newText.endsWith("\n") ? newText + content : `${newText}\n${content}`;
    }
    case "rewrite":
      return required(args.new_text, "new_text", op);
  }
}

export const editTool = defineTool({
  name: "edit",
  description:
    "Edit an existing file. Operations: replace/delete (old_text), insert (new_text at line), " +
    "append/prepend/rewrite (new_text).",
  parameters: {
    type: "object",
    properties: {
      path: { type: "string", description: "The file path to edit" },
      operation: { type: "string", enum: ["replace", "insert", "delete", "append", "prepend", "rewrite"] },
      old_text: { type: "string", description: "Exact text to find (replace, delete)" },
      new_text: { type: "string", description: "Text to write" },
      line: { type: "number", description: "1-based line for insert" },
    },
    required: ["path", "operation"],
  },
  args: editArgs,
  run: async (args) => {
    const path = resolve(args.path);
    const original = await readFile(path, "utf-8");
    const updated = applyEdit(original, args);
    Logger.debug(`edit: ${args.operation} ${path}`);
    if (updated !== original) await writeFile(path, updated, "utf-8");
    return JSON.stringify({
      path,
      operation: args.operation,
      changed: updated !== original,
      size: updated.length,
    });
  },
});
