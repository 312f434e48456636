/**
 * CLI argument parsing, configuration loading, and help text.
 *
 * Settings are layered: built-in defaults, then `config.json` in the shuttle
 * home (or `--config`), then `SHUTTLE_*` environment variables, then flags.
 * The merged result is validated once with zod.
 */

import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { Logger } from "../logger.js";
import { shuttleError, asError } from "../errors.js";
import { MAX_RETRIES, RETRY_BASE_MS } from "../utils/retry.js";
import { loadMcpConfig, mcpConfigSchema } from "../mcp/client.js";
import type { ShuttleConfig } from "../shuttle-types.js";

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_BASE_URL = "https://api.openai.com";
export const DEFAULT_AGENT = "general";

const settingsSchema = z
  .object({
    agent: z.string().min(1).default(DEFAULT_AGENT),
    model: z.string().min(1).default(DEFAULT_MODEL),
    baseUrl: z.string().url().default(DEFAULT_BASE_URL),
    apiKey: z.string().default(""),
    maxTurns: z.coerce.number().int().positive().optional(),
    turnTimeoutMs: z.coerce.number().int().positive().default(300_000),
    toolTimeoutMs: z.coerce.number().int().positive().default(120_000),
    maxRetries: z.coerce.number().int().min(0).default(MAX_RETRIES),
    retryBaseMs: z.coerce.number().int().min(0).default(RETRY_BASE_MS),
    toolWorkers: z.coerce.number().int().min(1).max(32).default(1),
    shutdownTimeoutMs: z.coerce.number().int().positive().default(5_000),
    maxTokens: z.coerce.number().int().positive().default(8192),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
    conversationDir: z.string().min(1).optional(),
    persist: z.boolean().default(true),
    verbose: z.boolean().default(false),
    outputFormat: z.enum(["text", "json"]).default("text"),
    scratchDir: z.string().min(1).optional(),
    mcpServers: mcpConfigSchema.shape.mcpServers,
  })
  .strict();

type SettingKey = keyof z.input<typeof settingsSchema>;
type Layer = Partial<Record<SettingKey, unknown>>;

const ENV_SETTINGS: ReadonlyArray<[string, SettingKey]> = [
  ["SHUTTLE_AGENT", "agent"],
  ["SHUTTLE_MODEL", "model"],
  ["SHUTTLE_BASE_URL", "baseUrl"],
  ["SHUTTLE_API_KEY", "apiKey"],
  ["SHUTTLE_MAX_TURNS", "maxTurns"],
  ["SHUTTLE_TURN_TIMEOUT_MS", "turnTimeoutMs"],
  ["SHUTTLE_TOOL_TIMEOUT_MS", "toolTimeoutMs"],
  ["SHUTTLE_MAX_RETRIES", "maxRetries"],
  ["SHUTTLE_RETRY_BASE_MS", "retryBaseMs"],
  ["SHUTTLE_TOOL_WORKERS", "toolWorkers"],
  ["SHUTTLE_OUTPUT_FORMAT", "outputFormat"],
  ["SHUTTLE_SCRATCH_DIR", "scratchDir"],
];

export type Env = Record<string, string | undefined>;

export interface ParsedArgs {
  flags: Layer;
  positional: string[];
  mcpConfigPaths: string[];
  configPath: string | null;
  resume: string | null;
  listAgents: boolean;
  listConversations: boolean;
  showHelp: boolean;
  showVersion: boolean;
}

/** Read the version from the package.json above src/ or dist/src/. */
export function getVersion(): string {
  const selfDir = dirname(fileURLToPath(import.meta.url));
  for (const p of [join(selfDir, "..", "..", "package.json"), join(selfDir, "..", "..", "..", "package.json")]) {
    if (!existsSync(p)) continue;
    try {
      const pkg: unknown = JSON.parse(readFileSync(p, "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch (e: unknown) {
      Logger.debug(`Unreadable ${p}: ${asError(e).message}`);
    }
  }
  return "unknown";
}

export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    flags: {},
    positional: [],
    mcpConfigPaths: [],
    configPath: null,
    resume: null,
    listAgents: false,
    listConversations: false,
    showHelp: false,
    showVersion: false,
  };
  const flags = parsed.flags;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = (): string => {
      const v = args[++i];
      if (v === undefined) throw shuttleError("config_error", `${arg} requires a value`);
      return v;
    };

    if (arg === "--agent" || arg === "-a") { flags.agent = value(); }
    else if (arg === "--list-agents") { parsed.listAgents = true; }
    else if (arg === "--list-conversations") { parsed.listConversations = true; }
    else if (arg === "--model" || arg === "-m") { flags.model = value(); }
    else if (arg === "--base-url") { flags.baseUrl = value(); }
    else if (arg === "--api-key") { flags.apiKey = value(); }
    else if (arg === "--max-turns") { flags.maxTurns = value(); }
    else if (arg === "--turn-timeout") { flags.turnTimeoutMs = value(); }
    else if (arg === "--tool-timeout") { flags.toolTimeoutMs = value(); }
    else if (arg === "--max-retries") { flags.maxRetries = value(); }
    else if (arg === "--retry-base-ms") { flags.retryBaseMs = value(); }
    else if (arg === "--tool-workers") { flags.toolWorkers = value(); }
    else if (arg === "--shutdown-timeout") { flags.shutdownTimeoutMs = value(); }
    else if (arg === "--max-tokens") { flags.maxTokens = value(); }
    else if (arg === "--temperature") { flags.temperature = value(); }
    else if (arg === "--conversation-dir") { flags.conversationDir = value(); }
    else if (arg === "--scratch-dir") { flags.scratchDir = value(); }
    else if (arg === "--no-persist") { flags.persist = false; }
    else if (arg === "--verbose" || arg === "-v") { flags.verbose = true; }
    else if (arg === "--output-format") { flags.outputFormat = value(); }
    else if (arg === "--mcp-config") { parsed.mcpConfigPaths.push(value()); }
    else if (arg === "--config") { parsed.configPath = value(); }
    else if (arg === "--resume" || arg === "-r") { parsed.resume = value(); }
    else if (arg === "-V" || arg === "--version") { parsed.showVersion = true; }
    else if (arg === "-h" || arg === "--help") { parsed.showHelp = true; }
    else if (arg === "--") { parsed.positional.push(...args.slice(i + 1)); break; }
    else if (!arg.startsWith("-")) { parsed.positional.push(arg); }
    else { Logger.warn(`Unknown flag: ${arg}`); }
  }
  return parsed;
}

export function shuttleHome(env: Env): string {
  return env.SHUTTLE_HOME || join(homedir(), ".shuttle");
}

function readConfigFile(path: string, required: boolean): Layer {
  if (!existsSync(path)) {
    if (required) throw shuttleError("config_error", `Config file not found: ${path}`);
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e: unknown) {
    throw shuttleError("config_error", `Failed to parse config file ${path}: ${asError(e).message}`, { cause: e });
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw shuttleError("config_error", `Config file ${path} must contain a JSON object`);
  }
  return { ...raw };
}

function envLayer(env: Env): Layer {
  const layer: Layer = {};
  for (const [name, key] of ENV_SETTINGS) {
    const v = env[name];
    if (v) layer[key] = v;
  }
  if (!layer.apiKey && env.OPENAI_API_KEY) layer.apiKey = env.OPENAI_API_KEY;
  if (env.SHUTTLE_VERBOSE === "1" || env.SHUTTLE_VERBOSE === "true") layer.verbose = true;
  return layer;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

export function loadConfig(args: string[] = process.argv.slice(2), env: Env = process.env): ShuttleConfig {
  const parsed = parseArgs(args);
  const home = shuttleHome(env);

  // --help and --version never depend on a readable config file.
  const skipFile = parsed.showHelp || parsed.showVersion;
  const explicitPath = parsed.configPath ?? env.SHUTTLE_CONFIG ?? null;
  const fileLayer = skipFile ? {} : readConfigFile(explicitPath ?? join(home, "config.json"), explicitPath !== null);

  const result = settingsSchema.safeParse({ ...fileLayer, ...envLayer(env), ...parsed.flags });
  if (!result.success) {
    throw shuttleError("config_error", `Invalid configuration: ${formatIssues(result.error)}`);
  }
  const s = result.data;

  const mcpServers = { ...s.mcpServers };
  for (const p of parsed.mcpConfigPaths) Object.assign(mcpServers, loadMcpConfig(p));

  return {
    task: parsed.positional.length ? parsed.positional.join(" ") : null,
    agent: s.agent,
    listAgents: parsed.listAgents,
    listConversations: parsed.listConversations,
    model: s.model,
    baseUrl: s.baseUrl,
    apiKey: s.apiKey,
    maxTurns: s.maxTurns ?? null,
    turnTimeoutMs: s.turnTimeoutMs,
    toolTimeoutMs: s.toolTimeoutMs,
    maxRetries: s.maxRetries,
    retryBaseMs: s.retryBaseMs,
    toolWorkers: s.toolWorkers,
    shutdownTimeoutMs: s.shutdownTimeoutMs,
    maxTokens: s.maxTokens,
    temperature: s.temperature,
    homeDir: home,
    conversationDir: s.conversationDir ?? join(home, "conversations"),
    persist: s.persist,
    verbose: s.verbose,
    outputFormat: s.outputFormat,
    mcpServers,
    scratchDir: s.scratchDir ?? null,
    resume: parsed.resume,
    showHelp: parsed.showHelp,
    showVersion: parsed.showVersion,
  };
}

export function usage(): string {
  return `shuttle ${getVersion()}: run an LLM agent on a task until it is done

usage:
  shuttle [options] "task"
  echo "task" | shuttle [options]
  shuttle --list-agents
  shuttle --list-conversations
  shuttle --resume <id> "follow-up task"

options:
  -a, --agent            agent definition to run (default: ${DEFAULT_AGENT})
  --list-agents          list available agents and exit
  --list-conversations   list saved conversations, most recent first
  -m, --model            model name (default: ${DEFAULT_MODEL}, env: SHUTTLE_MODEL)
  --base-url             OpenAI-compatible API base URL (env: SHUTTLE_BASE_URL)
  --api-key              API key (env: SHUTTLE_API_KEY or OPENAI_API_KEY)
  --max-turns            max model turns per task (default: agent setting, else 10)
  --turn-timeout         per-turn deadline in ms (default: 300000)
  --tool-timeout         per-tool-call deadline in ms (default: 120000)
  --max-retries          retries of a failed turn (default: ${MAX_RETRIES}, env: SHUTTLE_MAX_RETRIES)
  --retry-base-ms        base backoff delay in ms (default: ${RETRY_BASE_MS})
  --tool-workers         number of tool workers (default: 1)
  --shutdown-timeout     ms to wait for workers on exit (default: 5000)
  --max-tokens           max response tokens per turn (default: 8192)
  --temperature          sampling temperature (default: 0.7)
  --conversation-dir     where conversations are saved (default: ~/.shuttle/conversations)
  --scratch-dir          files under this directory count as temporary artifacts
  --no-persist           don't save the conversation
  -r, --resume           continue a saved conversation by id (see --list-conversations)
  --output-format        text | json (default: text)
  --mcp-config           load MCP servers from a JSON file (repeatable)
  --config               config file (default: ~/.shuttle/config.json, env: SHUTTLE_CONFIG)
  -v, --verbose          verbose output
  -V, --version          show version
  -h, --help             show this help

SHUTTLE_HOME overrides ~/.shuttle.`;
}
