#!/usr/bin/env node
/**
 * shuttle: runs one LLM agent on one task until it is done.
 *
 * Reads the task from argv or stdin, starts the API worker and tool workers
 * around a ChannelHub, drives the conversation to a TaskResult, and prints
 * it as text or JSON. Exit code 1 when the task failed or a worker did not
 * stop in time.
 */

import { join } from "node:path";
import { Logger, C } from "./logger.js";
import { asError, isShuttleError, errorLogFields, shuttleError } from "./errors.js";
import { loadConfig, usage, getVersion } from "./cli/config.js";
import { settleExit } from "./cli/exit.js";
import { createBuiltinRegistry } from "./tools/index.js";
import { McpManager } from "./mcp/client.js";
import { loadAgents, findAgent, builtinAgentsDir } from "./agents/agent-loader.js";
import { TASK_TOOL } from "./core/delegation.js";
import { agentScope } from "./agents/agent-definition.js";
import { buildSystemPrompt } from "./agents/system-prompt.js";
import { makeStreamingOpenAiTransport } from "./drivers/streaming-openai.js";
import { Orchestrator } from "./orchestrator.js";
import { TerminalRenderer } from "./ui/renderer.js";
import { listConversations, openConversation } from "./session.js";
import type { ShuttleConfig } from "./shuttle-types.js";
import type { AgentDefinition } from "./agents/agent-definition.js";
import type { TaskResult } from "./core/conversation-driver.js";
import type { ConversationStore } from "./session.js";

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return "";
  const chunks: Uint8Array[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8").trim();
}

function printAgents(agents: AgentDefinition[]): void {
  if (agents.length === 0) {
    Logger.info(C.gray("no agents found"));
    return;
  }
  for (const a of agents) {
    Logger.info(`${C.bold(a.name)}  ${a.description}`);
    Logger.info(C.gray(`    tools: ${a.allowedTools.join(", ")}${a.model ? `  model: ${a.model}` : ""}`));
  }
}

function printConversations(cfg: ShuttleConfig): void {
  const found = listConversations(cfg.conversationDir);
  if (found.length === 0) {
    Logger.info(C.gray(`no conversations in ${cfg.conversationDir}`));
    return;
  }
  for (const m of found) {
    Logger.info(`${m.id}  ${C.gray(m.updatedAt)}  ${m.agent} ${C.gray(`(${m.model})`)}`);
  }
}

function printResult(result: TaskResult, cfg: ShuttleConfig, store: ConversationStore): void {
  if (cfg.outputFormat === "json") {
    process.stdout.write(JSON.stringify({ ...result, conversationId: store.id }, null, 2) + "\n");
    return;
  }

  Logger.info("");
  if (result.success) {
    Logger.info(C.green("✓ task complete"));
  } else {
    Logger.error(C.red(`✗ task failed: ${result.error ?? "unknown error"}`));
  }
  if (result.summaryText) {
    Logger.info(C.bold("\nSummary"));
    Logger.info(result.summaryText);
  }
  if (result.modifiedArtifacts.length) {
    Logger.info(C.bold("\nModified files"));
    for (const p of result.modifiedArtifacts) Logger.info(`  ${p}`);
  }
  if (result.temporaryArtifacts.length) {
    Logger.info(C.bold("\nTemporary files"));
    for (const p of result.temporaryArtifacts) Logger.info(C.gray(`  ${p}`));
  }
  const saved = cfg.persist ? `, conversation ${store.id}` : "";
  Logger.info(C.gray(`\n${result.toolCallCount} tool call(s), ${result.tokensUsed} tokens${saved}`));
}

let activeOrchestrator: Orchestrator | null = null;
let workersStopped = true;

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const cfg = loadConfig(argv);

  if (cfg.showVersion) {
    Logger.info(`shuttle ${getVersion()}`);
    return 0;
  }
  if (cfg.showHelp) {
    Logger.info(usage());
    return 0;
  }

  Logger.setVerbose(cfg.verbose);
  Logger.setQuiet(cfg.outputFormat === "json");

  if (cfg.listConversations) {
    printConversations(cfg);
    return 0;
  }

  const registry = createBuiltinRegistry();
  const mcp = new McpManager();
  try {
    await mcp.connectAll(cfg.mcpServers);
    const added = mcp.registerTools(registry);
    if (added.length) Logger.telemetry(`${added.length} MCP tool(s) registered: ${added.join(", ")}`);

    const agents = loadAgents([...registry.names(), TASK_TOOL], [builtinAgentsDir(), join(cfg.homeDir, "agents")]);
    if (cfg.listAgents) {
      printAgents(agents);
      return 0;
    }

    const task = cfg.task ?? (await readStdin());
    if (!task) {
      Logger.error("shuttle: no task provided");
      Logger.error(usage());
      return 1;
    }

    const agent = findAgent(agents, cfg.agent);
    if (!agent) {
      throw shuttleError("config_error", `unknown agent '${cfg.agent}' (available: ${agents.map((a) => a.name).join(", ") || "none"})`);
    }

    const model = agent.model ?? cfg.model;
    const { store, prior } = openConversation({
      persist: cfg.persist,
      conversationDir: cfg.conversationDir,
      resume: cfg.resume,
      agent: agent.name,
      model,
    });
    if (prior.length) Logger.info(C.gray(`resuming conversation ${store.id} (${prior.length} messages)`));
    const renderer = cfg.outputFormat === "text" ? new TerminalRenderer({ showToolOutput: cfg.verbose }) : null;
    Logger.info(C.gray(`shuttle ${getVersion()}: ${agent.name} on ${model}`));

    const orchestrator = new Orchestrator({
      transportFactory: (endpoint) =>
        makeStreamingOpenAiTransport({ baseUrl: endpoint.baseUrl, apiKey: endpoint.apiKey, timeoutMs: cfg.turnTimeoutMs }),
      endpoint: { baseUrl: cfg.baseUrl, apiKey: cfg.apiKey, model },
      registry,
      toolWorkers: cfg.toolWorkers,
      shutdownTimeoutMs: cfg.shutdownTimeoutMs,
      driverSettings: {
        turnTimeoutMs: cfg.turnTimeoutMs,
        toolTimeoutMs: cfg.toolTimeoutMs,
        maxRetries: cfg.maxRetries,
        retryBaseMs: cfg.retryBaseMs,
        maxTokens: cfg.maxTokens,
        temperature: cfg.temperature,
        scratchDir: cfg.scratchDir ?? undefined,
      },
      delegation: { agents, toolSchemas: registry.getToolDefinitions() },
      onUiUpdate: renderer ? (u) => renderer.render(u) : undefined,
    });
    activeOrchestrator = orchestrator;

    await orchestrator.start();
    let stopped = false;
    let result: TaskResult;
    try {
      const scope = agentScope(agent);
      result = await orchestrator.runTask(
        {
          agentScope: scope,
          taskDescription: task,
          model,
          toolSchemas: registry.getToolDefinitions(scope),
          maxTurns: cfg.maxTurns ?? agent.maxTurns,
          priorMessages: prior,
        },
        store,
        (_scope, description) => buildSystemPrompt(agent, description),
      );
    } finally {
      activeOrchestrator = null;
      stopped = await orchestrator.shutdown();
      workersStopped = stopped;
      renderer?.finish();
    }

    printResult(result, cfg, store);
    return result.success && stopped ? 0 : 1;
  } finally {
    await mcp.disconnectAll();
  }
}

for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.once(sig, () => {
    Logger.info(C.gray(`\nreceived ${sig}, shutting down...`));
    const orchestrator = activeOrchestrator;
    if (!orchestrator) {
      process.exit(130);
    } else {
      void orchestrator.shutdown().then(
        (stopped) => process.exit(stopped ? 130 : 1),
        (e: unknown) => {
          Logger.error(C.red(`shutdown failed: ${asError(e).message}`));
          process.exit(1);
        },
      );
    }
  });
}

process.on("unhandledRejection", (reason: unknown) => {
  const err = asError(reason);
  Logger.error(C.red(`unhandled rejection: ${err.message}`));
  Logger.debug(err.stack ?? "");
});

const mainError = (e: unknown) => {
  const err = asError(e);
  if (isShuttleError(e)) Logger.debug("shuttle:", errorLogFields(e));
  else Logger.debug(err.stack ?? "");
  Logger.error(C.red(`shuttle: ${err.message}`));
  settleExit(1, workersStopped);
};

main().then((code) => settleExit(code, workersStopped), mainError);
