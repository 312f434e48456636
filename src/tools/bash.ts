/**
 * Built-in bash tool: executes shell commands and returns output.
 * A non-zero exit is still a result: the output carries the exit code.
 */
import { exec } from "node:child_process";
import { z } from "zod";
import { Logger } from "../logger.js";
import { defineTool } from "./registry.js";

const MAX_OUTPUT = 30_000;
const DEFAULT_TIMEOUT = 120_000;
const MAX_TIMEOUT = 600_000;

export function truncate(s: string, max: number = MAX_OUTPUT): string {
  if (s.length <= max) return s;
  const half = Math.floor(max / 2);
  return s.slice(0, half) + `\n\n... (truncated ${s.length - max} chars) ...\n\n` + s.slice(-half);
}

interface ExecOutcome {
  stdout: string;
  stderr: string;
  code: number | null;
  timedOut: boolean;
}

function run(command: string, timeout: number): Promise<ExecOutcome> {
  return new Promise((resolve) => {
    exec(
      command,
      { shell: "/bin/bash", encoding: "utf-8", timeout, maxBuffer: 10 * 1024 * 1024 },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ stdout, stderr, code: 0, timedOut: false });
          return;
        }
        resolve({
          stdout,
          stderr: stderr || err.message,
          code: typeof err.code === "number" ? err.code : null,
          timedOut: err.killed === true && err.signal === "SIGTERM",
        });
      },
    );
  });
}

/** The requested timeout, capped so a command cannot outlive shutdown indefinitely. */
export function commandTimeout(requested?: number): number {
  return Math.min(requested ?? DEFAULT_TIMEOUT, MAX_TIMEOUT);
}

export async function executeBash(command: string, timeout: number = DEFAULT_TIMEOUT): Promise<string> {
  Logger.debug(`bash: ${command}`);
  const out = await run(command, timeout);
  if (out.timedOut) throw new Error(`command timed out after ${timeout}ms`);

  let result = out.stdout;
  if (out.stderr) result += (result ? "\n" : "") + out.stderr;
  if (out.code !== 0) result += `\n[exit code: ${out.code ?? "unknown"}]`;
  return truncate(result);
}

export const bashTool = defineTool({
  name: "bash",
  description: "Execute a shell command and return its output (stdout + stderr).",
  parameters: {
    type: "object",
    properties: {
      command: { type: "string", description: "The bash command to execute" },
      timeout: { type: "number", description: `Timeout in milliseconds (default: ${DEFAULT_TIMEOUT}, max: ${MAX_TIMEOUT})` },
    },
    required: ["command"],
  },
  args: z.object({
    command: z.string().min(1),
    timeout: z.number().int().positive().optional(),
  }),
  run: (args) => executeBash(args.command, commandTimeout(args.timeout)),
});
