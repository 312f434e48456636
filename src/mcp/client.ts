/**
 * MCP client: connects to MCP servers over stdio, discovers their tools and
 * registers each one into the tool registry, so the tool worker calls them
 * like any built-in.
 */
import { readFileSync } from "node:fs";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { z } from "zod";
import { Logger } from "../logger.js";
import { shuttleError, asError, errorLogFields } from "../errors.js";
import type { ToolRegistry } from "../tools/registry.js";

const serverConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
  /** Tool call timeout in ms. Default: 10 minutes. */
  timeout: z.number().int().positive().optional(),
});

export const mcpConfigSchema = z.object({
  mcpServers: z.record(serverConfigSchema).default({}),
});

export type McpServerConfig = z.infer<typeof serverConfigSchema>;

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  /** Which MCP server provides this tool. */
  serverName: string;
}

interface ConnectedServer {
  name: string;
  client: Client;
  tools: McpTool[];
  timeout: number;
}

const DEFAULT_TIMEOUT = 10 * 60 * 1000;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Read a `{ "mcpServers": { ... } }` file. */
export function loadMcpConfig(path: string): Record<string, McpServerConfig> {
  try {
    return mcpConfigSchema.parse(JSON.parse(readFileSync(path, "utf-8"))).mcpServers;
  } catch (e: unknown) {
    throw shuttleError("config_error", `Invalid MCP config ${path}: ${asError(e).message}`, { cause: e });
  }
}

/** Flatten an MCP tool result's content blocks to text. */
export function flattenToolContent(content: unknown): string {
  if (!Array.isArray(content)) return JSON.stringify(content ?? null);
  return content
    .map((c: unknown) => (isRecord(c) && c.type === "text" && typeof c.text === "string" ? c.text : JSON.stringify(c)))
    .join("\n");
}

function childEnv(extra: Record<string, string> | undefined): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (v !== undefined) env[k] = v;
  }
  return { ...env, ...extra };
}

export class McpManager {
  private servers = new Map<string, ConnectedServer>();
  private configs = new Map<string, McpServerConfig>();

  /**
   * Connect to all configured MCP servers and discover their tools.
   * A server that fails to start is logged and skipped.
   */
  async connectAll(configs: Record<string, McpServerConfig>): Promise<void> {
    const entries = Object.entries(configs);
    if (entries.length === 0) return;

    Logger.debug(`Connecting to ${entries.length} MCP server(s)...`);
    await Promise.all(
      entries.map(([name, cfg]) => {
        this.configs.set(name, cfg);
        return this.connectOne(name, cfg).catch((e: unknown) => {
          const se = shuttleError("mcp_error", `MCP server "${name}" failed to connect: ${asError(e).message}`, {
            retryable: true,
            cause: e,
          });
          Logger.warn(se.message, errorLogFields(se));
        });
      }),
    );
  }

  private async connectOne(name: string, cfg: McpServerConfig): Promise<void> {
    const transport = new StdioClientTransport({
      command: cfg.command,
      args: cfg.args ?? [],
      env: childEnv(cfg.env),
      cwd: cfg.cwd,
      stderr: "pipe",
    });
    const client = new Client({ name: "shuttle", version: "0.1.0" }, { capabilities: {} });
    await client.connect(transport);

    const listed = await client.listTools();
    const tools: McpTool[] = listed.tools.map((t) => ({
      name: t.name,
      description: t.description ?? "",
      inputSchema: { ...t.inputSchema },
      serverName: name,
    }));

    this.servers.set(name, { name, client, tools, timeout: cfg.timeout ?? DEFAULT_TIMEOUT });
    Logger.debug(`MCP "${name}": ${tools.length} tool(s) available`);
  }

  private async reconnectServer(name: string): Promise<void> {
    const cfg = this.configs.get(name);
    if (!cfg) throw new Error(`No config stored for MCP server "${name}"`);
    const old = this.servers.get(name);
    if (old) {
      await old.client.close().catch((e: unknown) => Logger.debug(`MCP "${name}" close error: ${asError(e).message}`));
      this.servers.delete(name);
    }
    Logger.telemetry(`MCP "${name}": reconnecting...`);
    await this.connectOne(name, cfg);
  }

  listTools(): McpTool[] {
    return Array.from(this.servers.values()).flatMap((s) => s.tools);
  }

  /**
   * Register every discovered tool into `registry`. Names already taken by
   * a built-in are skipped with a warning. Returns the names registered.
   */
  registerTools(registry: ToolRegistry): string[] {
    const added: string[] = [];
    for (const tool of this.listTools()) {
      if (registry.has(tool.name)) {
        Logger.warn(`MCP tool "${tool.name}" (server: ${tool.serverName}) shadows an existing tool; skipped`);
        continue;
      }
      registry.register({
        name: tool.name,
        definition: {
          type: "function",
          function: {
            name: tool.name,
            description: tool.description,
            parameters: Object.keys(tool.inputSchema).length ? tool.inputSchema : { type: "object", properties: {} },
          },
        },
        execute: (args) => this.callTool(tool.name, isRecord(args) ? args : {}),
      });
      added.push(tool.name);
    }
    return added;
  }

  /**
   * Execute a tool call by routing it to the server that provides it.
   * On disconnect errors, reconnects once and retries.
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<string> {
    const server = Array.from(this.servers.values()).find((s) => s.tools.some((t) => t.name === name));
    if (!server) throw shuttleError("mcp_error", `No MCP server provides tool "${name}"`);

    const attempt = async (): Promise<string> => {
      const current = this.servers.get(server.name);
      if (!current) throw new Error("Not connected");
      const result = await current.client.callTool({ name, arguments: args }, undefined, { timeout: current.timeout });
      const text = flattenToolContent(result.content);
      if (result.isError === true) throw new Error(text);
      return text;
    };

    try {
      return await attempt();
    } catch (e: unknown) {
      const err = asError(e);
      const isDisconnect = err.message.includes("Not connected") || err.message.includes("Connection closed");
      if (!isDisconnect) {
        throw shuttleError("mcp_error", `MCP tool "${name}" (server: ${server.name}) failed: ${err.message}`, { cause: e });
      }
      Logger.warn(`MCP "${server.name}": disconnected, reconnecting and retrying ${name}...`);
      try {
        await this.reconnectServer(server.name);
        return await attempt();
      } catch (retryErr: unknown) {
        const se = shuttleError("mcp_error", `MCP tool "${name}" (server: ${server.name}) failed after reconnect: ${asError(retryErr).message}`, {
          retryable: true,
          cause: retryErr,
        });
        Logger.error(`MCP tool call failed [${server.name}/${name}]:`, errorLogFields(se));
        throw se;
      }
    }
  }

  async disconnectAll(): Promise<void> {
    for (const server of this.servers.values()) {
      try {
        await server.client.close();
      } catch (e: unknown) {
        Logger.debug(`MCP server "${server.name}" close error: ${asError(e).message}`);
      }
    }
    this.servers.clear();
  }
}
