/**
 * The `task` tool: hands a self-contained sub-task to a named agent.
 *
 * The sub-agent runs in a ConversationDriver of its own, over the same hub
 * and workers as the caller, and the caller gets back a condensed result
 * (summary, artifacts, counts). The driver handles `task` calls itself
 * instead of sending them to a tool worker, because the sub-task's own tool
 * calls need those workers.
 */
import { z } from "zod";
import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { agentScope } from "../agents/agent-definition.js";
import { findAgent } from "../agents/agent-loader.js";
import { buildSystemPrompt } from "../agents/system-prompt.js";
import type { AgentDefinition } from "../agents/agent-definition.js";
import type { ToolSchema } from "../drivers/types.js";
import type { PromptBuilder, TaskInput, TaskResult } from "./conversation-driver.js";

export const TASK_TOOL = "task";

export const taskToolSchema: ToolSchema = {
  type: "function",
  function: {
    name: TASK_TOOL,
    description:
      "Delegate a self-contained sub-task to a specialized agent. The agent works on its own and returns " +
      "a summary plus the files it modified. Use agent_type 'list' to see the available agents.",
    parameters: {
      type: "object",
      properties: {
        agent_type: { type: "string", description: "Name of the agent to run, or 'list'" },
        description: { type: "string", description: "The sub-task, with every piece of context the agent needs" },
        estimated_complexity: { type: "string", enum: ["simple", "moderate", "complex"] },
      },
      required: ["agent_type"],
    },
  },
};

const taskArgs = z.object({
  agent_type: z.string().min(1),
  description: z.string().default(""),
  estimated_complexity: z.enum(["simple", "moderate", "complex"]).optional(),
});

export interface Delegation {
  agents: AgentDefinition[];
  /** Every schema a sub-agent may be offered; its scope picks from these. */
  toolSchemas: ToolSchema[];
  /** Turn budget for agents that set none. */
  maxTurns?: number;
}

/** Runs one sub-task to completion on a fresh driver. */
export type SubtaskRunner = (input: TaskInput, buildPrompt: PromptBuilder) => Promise<TaskResult>;

export interface DelegatedOutcome {
  /** JSON text for the tool message. */
  content: string;
  tokensUsed: number;
}

export function describeAgents(agents: readonly AgentDefinition[]): string {
  const lines = ["Available agents:", ""];
  for (const a of agents) {
    lines.push(`- ${a.name}: ${a.description}`, `  Tools: ${a.allowedTools.join(", ")}`, "");
  }
  return lines.join("\n").trimEnd();
}

function failure(error: string): DelegatedOutcome {
  return { content: JSON.stringify({ success: false, error }), tokensUsed: 0 };
}

/** Decode a `task` call and run it. Every outcome, bad arguments included, is a tool result. */
export async function runDelegatedTask(
  delegation: Delegation,
  argumentsJSON: string,
  parentModel: string,
  runSubtask: SubtaskRunner,
): Promise<DelegatedOutcome> {
  let raw: unknown;
  try {
    raw = argumentsJSON.trim() ? JSON.parse(argumentsJSON) : {};
  } catch (e: unknown) {
    return failure(`invalid JSON arguments for '${TASK_TOOL}': ${asError(e).message}`);
  }
  const parsed = taskArgs.safeParse(raw);
  if (!parsed.success) {
    return failure(`invalid arguments for '${TASK_TOOL}': ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  const args = parsed.data;

  if (args.agent_type === "list") {
    return { content: JSON.stringify({ success: true, agents: describeAgents(delegation.agents) }), tokensUsed: 0 };
  }
  const agent = findAgent(delegation.agents, args.agent_type);
  if (!agent) return failure(`Agent '${args.agent_type}' not found. Use agent_type='list' to see available agents.`);
  if (!args.description.trim()) return failure("a sub-task needs a description");

  Logger.telemetry(`[task] delegating to ${agent.name} (${args.estimated_complexity ?? "moderate"})`);
  const result = await runSubtask(
    {
      agentScope: agentScope(agent),
      taskDescription: args.description,
      model: agent.model ?? parentModel,
      toolSchemas: delegation.toolSchemas,
      maxTurns: agent.maxTurns ?? delegation.maxTurns,
    },
    (_scope, description) => buildSystemPrompt(agent, description),
  );
  Logger.telemetry(`[task] ${agent.name} finished success=${result.success} tokens=${result.tokensUsed}`);

  return {
    content: JSON.stringify({
      success: result.success,
      summary: result.summaryText,
      modified_artifacts: result.modifiedArtifacts,
      temporary_artifacts: result.temporaryArtifacts,
      tool_calls: result.toolCallCount,
      tokens_used: result.tokensUsed,
      ...(result.error === undefined ? {} : { error: result.error }),
    }),
    tokensUsed: result.tokensUsed,
  };
}
