/**
 * Built-in create tool: writes a new file, creating parent directories.
 */
import { mkdir, stat, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { Logger } from "../logger.js";
import { defineTool } from "./registry.js";

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export const createTool = defineTool({
  name: "create",
  description: "Create a file with the given content. Fails if the file exists unless overwrite is true.",
  parameters: {
    type: "object",
    properties: {
      path: { type: "string", description: "The file path to create" },
      content: { type: "string", description: "The content for the new file" },
      overwrite: { type: "boolean", description: "Replace an existing file (default: false)" },
    },
    required: ["path", "content"],
  },
  args: z.object({
    path: z.string().min(1),
    content: z.string(),
    overwrite: z.boolean().default(false),
  }),
  run: async (args) => {
    const path = resolve(args.path);
    const existed = await exists(path);
    if (existed && !args.overwrite) throw new Error(`file already exists: ${path}`);

    Logger.debug(`create: ${path} (${args.content.length} chars)`);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, args.content, "utf-8");
    return JSON.stringify({
      path,
      created: !existed,
      overwritten: existed,
      content_length: args.content.length,
    });
  },
});
