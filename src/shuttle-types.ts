/**
 * Shared types for shuttle runtime configuration.
 */

import type { McpServerConfig } from "./mcp/client.js";

export type OutputFormat = "text" | "json";

export interface ShuttleConfig {
  /** Task text from the positional arguments; null when none was given. */
  task: string | null;
  agent: string;
  listAgents: boolean;
  listConversations: boolean;
  model: string;
  baseUrl: string;
  apiKey: string;
  /** Explicit turn budget. Null defers to the agent definition, then the driver default. */
  maxTurns: number | null;
  turnTimeoutMs: number;
  toolTimeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  toolWorkers: number;
  shutdownTimeoutMs: number;
  maxTokens: number;
  temperature: number;
  /** Root of `conversations/`, `agents/` and `config.json`. */
  homeDir: string;
  conversationDir: string;
  persist: boolean;
  verbose: boolean;
  outputFormat: OutputFormat;
  mcpServers: Record<string, McpServerConfig>;
  scratchDir: string | null;
  /** Saved conversation to continue (`--resume`). */
  resume: string | null;
  showHelp: boolean;
  showVersion: boolean;
}
