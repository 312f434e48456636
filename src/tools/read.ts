/**
 * Built-in read tool: returns a file's text, optionally a 1-based line range
 * with line-number prefixes.
 */
import { readFile, stat } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { Logger } from "../logger.js";
import { defineTool } from "./registry.js";

export const DEFAULT_MAX_READ = 1_000_000;

const readArgs = z.object({
  path: z.string().min(1),
  linerange: z.string().optional(),
  max_size: z.number().int().positive().optional(),
});

/**
 * Parse "10-20", "10,20" or "[10,20]" into inclusive 1-based bounds.
 * Returns null for anything else.
 */
export function parseLineRange(range: string): { start: number; end: number } | null {
  let s = range.trim();
  if (s.startsWith("[") && s.endsWith("]")) s = s.slice(1, -1);
  const parts = s.includes(",") ? s.split(",") : s.split("-");
  if (parts.length !== 2) return null;
  const start = parseInt(parts[0].trim(), 10);
  const end = parseInt(parts[1].trim(), 10);
  if (!Number.isFinite(start) || !Number.isFinite(end) || start < 1 || end < start) return null;
  return { start, end };
}

export function extractLines(content: string, start: number, end: number): string {
  const lines = content.split("\n");
  return lines
    .slice(start - 1, Math.min(end, lines.length))
    .map((line, i) => `${start + i} | ${line}`)
    .join("\n");
}

export const readTool = defineTool({
  name: "read",
  description: "Read file contents. Use linerange (e.g. \"1-100\") for large files.",
  parameters: {
    type: "object",
    properties: {
      path: { type: "string", description: "The file path to read" },
      linerange: { type: "string", description: "Optional 1-based inclusive line range, e.g. \"1-100\"" },
      max_size: { type: "number", description: `Maximum bytes to return (default: ${DEFAULT_MAX_READ})` },
    },
    required: ["path"],
  },
  args: readArgs,
  run: async (args) => {
    const path = resolve(args.path);
    const maxSize = args.max_size ?? DEFAULT_MAX_READ;
    Logger.debug(`read: ${path}`);

    const info = await stat(path);
    if (!info.isFile()) throw new Error(`not a file: ${path}`);

    if (!args.linerange && info.size > maxSize) {
      throw new Error(`File too large (${info.size} bytes > ${maxSize}). Use linerange to read specific sections, e.g. "1-100"`);
    }

    const content = await readFile(path, "utf-8");
    if (!args.linerange) return content;

    const range = parseLineRange(args.linerange);
    if (!range) throw new Error(`invalid linerange '${args.linerange}'`);
    const excerpt = extractLines(content, range.start, range.end);
    if (excerpt.length > maxSize) {
      throw new Error(`Extracted content too large (${excerpt.length} bytes > ${maxSize}). Use a smaller line range.`);
    }
    return excerpt;
  },
});
