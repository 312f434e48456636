/**
 * Tests for the task tool's argument handling and result condensing.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { runDelegatedTask, describeAgents, TASK_TOOL } from "../src/core/delegation.js";
import type { Delegation, SubtaskRunner } from "../src/core/delegation.js";
import type { AgentDefinition } from "../src/agents/agent-definition.js";
import type { TaskInput, TaskResult } from "../src/core/conversation-driver.js";

const reviewer: AgentDefinition = {
  name: "reviewer",
  description: "Reviews code",
  allowedTools: ["read", "list"],
  systemPrompt: "You review.",
  model: "review-model",
  filePath: "reviewer.md",
};

const writer: AgentDefinition = {
  name: "writer",
  description: "Writes files",
  allowedTools: ["create"],
  systemPrompt: "You write.",
  maxTurns: 4,
  filePath: "writer.md",
};

const delegation: Delegation = {
  agents: [reviewer, writer],
  toolSchemas: [],
  maxTurns: 7,
};

const notCalled: SubtaskRunner = async () => {
  throw new Error("runner should not be called");
};

function parse(content: string): unknown {
  return JSON.parse(content);
}

describe("runDelegatedTask", () => {
  test("lists the agents", async () => {
    const out = await runDelegatedTask(delegation, JSON.stringify({ agent_type: "list" }), "main-model", notCalled);
    assert.deepStrictEqual(parse(out.content), { success: true, agents: describeAgents(delegation.agents) });
    assert.strictEqual(
      describeAgents([reviewer]),
      "Available agents:\n\n- reviewer: Reviews code\n  Tools: read, list",
    );
    assert.strictEqual(out.tokensUsed, 0);
  });

  test("unknown agents and empty descriptions are refused", async () => {
    const unknown = await runDelegatedTask(delegation, JSON.stringify({ agent_type: "ghost", description: "x" }), "m", notCalled);
    assert.deepStrictEqual(parse(unknown.content), {
      success: false,
      error: "Agent 'ghost' not found. Use agent_type='list' to see available agents.",
    });
    const empty = await runDelegatedTask(delegation, JSON.stringify({ agent_type: "writer", description: "  " }), "m", notCalled);
    assert.deepStrictEqual(parse(empty.content), { success: false, error: "a sub-task needs a description" });
  });

  test("bad arguments become an error result", async () => {
    const missing = await runDelegatedTask(delegation, "{}", "m", notCalled);
    assert.deepStrictEqual(parse(missing.content), {
      success: false,
      error: `invalid arguments for '${TASK_TOOL}': agent_type: Required`,
    });

    const broken = await runDelegatedTask(delegation, "{not json", "m", notCalled);
    const result = parse(broken.content);
    assert.ok(typeof result === "object" && result !== null && "error" in result && typeof result.error === "string");
    assert.match(result.error, /^invalid JSON arguments for 'task': /);
  });

  test("runs the named agent and condenses its result", async () => {
    const seen: TaskInput[] = [];
    let prompt = "";
    const runner: SubtaskRunner = async (input, buildPrompt) => {
      seen.push(input);
      prompt = buildPrompt(input.agentScope, input.taskDescription);
      const result: TaskResult = {
        success: false,
        summaryText: "half done",
        modifiedArtifacts: ["/work/a.md"],
        temporaryArtifacts: [],
        toolCallCount: 2,
        tokensUsed: 42,
        error: "turn budget exhausted after 4 turns",
      };
      return result;
    };

    const out = await runDelegatedTask(delegation, JSON.stringify({ agent_type: "writer", description: "write a.md" }), "main-model", runner);
    assert.strictEqual(out.tokensUsed, 42);
    assert.deepStrictEqual(parse(out.content), {
      success: false,
      summary: "half done",
      modified_artifacts: ["/work/a.md"],
      temporary_artifacts: [],
      tool_calls: 2,
      tokens_used: 42,
      error: "turn budget exhausted after 4 turns",
    });
    assert.deepStrictEqual(seen, [
      {
        agentScope: { name: "writer", allowedTools: ["create"] },
        taskDescription: "write a.md",
        model: "main-model",
        toolSchemas: [],
        maxTurns: 4,
      },
    ]);
    assert.ok(prompt.startsWith("You write.\n\n## Your Assigned Task\n\nwrite a.md\n"));
  });

  test("the agent's model and the default budget apply", async () => {
    const seen: TaskInput[] = [];
    const runner: SubtaskRunner = async (input) => {
      seen.push(input);
      return { success: true, summaryText: "ok", modifiedArtifacts: [], temporaryArtifacts: [], toolCallCount: 0, tokensUsed: 3 };
    };
    await runDelegatedTask(delegation, JSON.stringify({ agent_type: "reviewer", description: "look" }), "main-model", runner);
    assert.strictEqual(seen[0].model, "review-model");
    assert.strictEqual(seen[0].maxTurns, 7);
  });
});
