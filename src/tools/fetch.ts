/**
 * Built-in fetch tool: HTTP(S) GET/POST with HTML flattened to text.
 * With `output_path` the body is saved to disk and only metadata returned.
 */
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { Logger } from "../logger.js";
import { timedFetch } from "../utils/timed-fetch.js";
import { defineTool } from "./registry.js";

const DEFAULT_TIMEOUT = 30_000;
const MAX_TIMEOUT = 300_000;
const DEFAULT_MAX_SIZE = 1_000_000;
const BLOCK_TAGS = /<\/(p|div|h[1-6]|li|tr|section|article)>|<br\s*\/?>/gi;

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": "\"",
  "&#39;": "'",
  "&nbsp;": " ",
};

export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, "")
    .replace(BLOCK_TAGS, "\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (m) => ENTITIES[m] ?? m)
    .replace(/[ \t]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

const fetchArgs = z.object({
  url: z.string().url().refine((u) => /^https?:\/\//i.test(u), "must be an http(s) URL"),
  method: z.enum(["GET", "POST", "PUT", "DELETE", "HEAD", "PATCH"]).default("GET"),
  headers: z.record(z.string()).optional(),
  body: z.string().optional(),
  timeout: z.number().int().positive().max(MAX_TIMEOUT).default(DEFAULT_TIMEOUT),
  max_size: z.number().int().positive().default(DEFAULT_MAX_SIZE),
  convert_to_text: z.boolean().default(true),
  output_path: z.string().min(1).optional(),
});

export const fetchTool = defineTool({
  name: "fetch",
  description: "Fetch web content over HTTP(S). HTML is converted to text unless convert_to_text is false.",
  parameters: {
    type: "object",
    properties: {
      url: { type: "string", description: "The URL to fetch content from" },
      method: { type: "string", enum: ["GET", "POST", "PUT", "DELETE", "HEAD", "PATCH"] },
      headers: { type: "object", additionalProperties: { type: "string" } },
      body: { type: "string", description: "Request body for POST/PUT/PATCH" },
      timeout: { type: "number", description: `Timeout in milliseconds (default: ${DEFAULT_TIMEOUT})` },
      max_size: { type: "number", description: `Maximum response bytes (default: ${DEFAULT_MAX_SIZE})` },
      convert_to_text: { type: "boolean" },
      output_path: { type: "string", description: "Save the response body to this file instead of returning it" },
    },
    required: ["url"],
  },
  args: fetchArgs,
  run: async (args) => {
    Logger.debug(`fetch: ${args.method} ${args.url}`);
    const res = await timedFetch(args.url, {
      method: args.method,
      headers: { "User-Agent": "shuttle/0.1", ...args.headers },
      body: ["POST", "PUT", "PATCH"].includes(args.method) ? args.body : undefined,
      timeoutMs: args.timeout,
      where: "tool:fetch",
    });
    const raw = await res.text();
    if (raw.length > args.max_size) {
      throw new Error(`Response size exceeds limit: ${raw.length} > ${args.max_size}`);
    }
    const contentType = res.headers.get("content-type") ?? "text/plain";
    const converted = args.convert_to_text && contentType.toLowerCase().includes("text/html");
    const content = converted ? htmlToText(raw) : raw;

    if (args.output_path) {
      const out = resolve(args.output_path);
      await mkdir(dirname(out), { recursive: true });
      await writeFile(out, content, "utf-8");
      return JSON.stringify({ url: args.url, status_code: res.status, content_type: contentType, saved_to: out, bytes: content.length });
    }
    return JSON.stringify({
      url: args.url,
      status_code: res.status,
      content_type: contentType,
      converted_to_text: converted,
      content,
    });
  },
});
