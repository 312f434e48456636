/**
 * Built-in list tool: directory listing with optional recursion, sorting
 * and type filtering. Returns JSON.
 */
import { lstat, readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import { Logger } from "../logger.js";
import { defineTool } from "./registry.js";

const MAX_ENTRIES = 2_000;

export type EntryType = "file" | "directory" | "link" | "other";

export interface ListEntry {
  name: string;
  path: string;
  type: EntryType;
  size: number;
  modified: number;
}

const listArgs = z.object({
  path: z.string().min(1),
  recursive: z.boolean().default(false),
  max_depth: z.number().int().min(1).max(100).default(10),
  include_hidden: z.boolean().default(false),
  sort_by: z.enum(["name", "size", "modified", "type"]).default("name"),
  sort_order: z.enum(["asc", "desc"]).default("asc"),
  filter_type: z.enum(["file", "directory", "link"]).optional(),
});

type ListArgs = z.infer<typeof listArgs>;

async function collect(dir: string, depth: number, args: ListArgs, out: ListEntry[]): Promise<void> {
  if (depth >= args.max_depth || out.length >= MAX_ENTRIES) return;
  const names = await readdir(dir);
  const entries: ListEntry[] = [];
  for (const name of names) {
    if (!args.include_hidden && name.startsWith(".")) continue;
    const path = join(dir, name);
    try {
      const info = await lstat(path);
      const type: EntryType = info.isSymbolicLink() ? "link"
        : info.isDirectory() ? "directory"
        : info.isFile() ? "file"
        : "other";
      entries.push({ name, path, type, size: info.size, modified: Math.floor(info.mtimeMs / 1000) });
    } catch (e: unknown) {
      // Entry vanished between readdir and lstat
      Logger.debug(`list: skipping ${path}`, e);
    }
  }
  out.push(...entries);
  if (!args.recursive) return;
  for (const entry of entries) {
    if (entry.type === "directory") await collect(entry.path, depth + 1, args, out);
  }
}

export function sortEntries(entries: ListEntry[], sortBy: ListArgs["sort_by"], order: ListArgs["sort_order"]): ListEntry[] {
  const sign = order === "desc" ? -1 : 1;
  return [...entries].sort((a, b) => {
    let cmp: number;
    switch (sortBy) {
      case "size": cmp = a.size - b.size; break;
      case "modified": cmp = a.modified - b.modified; break;
      case "type": cmp = a.type.localeCompare(b.type); break;
      default: cmp = a.name.toLowerCase().localeCompare(b.name.toLowerCase());
    }
    return cmp * sign;
  });
}

export const listTool = defineTool({
  name: "list",
  description: "List directory contents. Returns JSON with one entry per file or directory.",
  parameters: {
    type: "object",
    properties: {
      path: { type: "string", description: "The directory path to list" },
      recursive: { type: "boolean", description: "List subdirectories too (default: false)" },
      max_depth: { type: "number", description: "Maximum recursion depth (default: 10)" },
      include_hidden: { type: "boolean", description: "Include dotfiles (default: false)" },
      sort_by: { type: "string", enum: ["name", "size", "modified", "type"] },
      sort_order: { type: "string", enum: ["asc", "desc"] },
      filter_type: { type: "string", enum: ["file", "directory", "link"] },
    },
    required: ["path"],
  },
  args: listArgs,
  run: async (args) => {
    const path = resolve(args.path);
    Logger.debug(`list: ${path}`);
    const info = await lstat(path);
    if (!info.isDirectory()) throw new Error(`not a directory: ${path}`);

    const found: ListEntry[] = [];
    await collect(path, 0, args, found);
    const filtered = args.filter_type ? found.filter((e) => e.type === args.filter_type) : found;
    const entries = sortEntries(filtered, args.sort_by, args.sort_order);
    return JSON.stringify({
      path,
      entries,
      total_count: entries.length,
      truncated: found.length >= MAX_ENTRIES,
    });
  },
});
