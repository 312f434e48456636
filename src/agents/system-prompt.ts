import type { AgentDefinition } from "./agent-definition.js";

/** Agent prompt plus the task, the tool list and the reporting instructions. */
export function buildSystemPrompt(agent: AgentDefinition, taskDescription: string): string {
  const lines = [
    agent.systemPrompt,
    "",
    "## Your Assigned Task",
    "",
    taskDescription,
    "",
    "## Available Tools",
    "",
    ...agent.allowedTools.map((t) => `- ${t}`),
    "",
    "## Instructions",
    "",
    "Work autonomously to complete this task. When finished, provide a clear summary of:",
    "1. What you accomplished",
    "2. Files you read or created",
    "3. Key findings or results",
    "4. Any blockers or limitations",
  ];
  return lines.join("\n");
}

export const SUMMARIZER_PROMPT = [
  "You are a task result summarizer. Review the conversation and provide a concise summary including:",
  "1. What was accomplished",
  "2. Files read or created (if any)",
  "3. Key findings or results",
  "4. Any blockers or limitations",
  "",
  "Keep the summary brief (2-4 sentences) but informative.",
].join("\n");

export const SUMMARY_REQUEST = "Please provide a brief summary of what was accomplished in this task.";
