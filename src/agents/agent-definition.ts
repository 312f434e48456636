/**
 * Agent definitions are Markdown files:
 *
 *   # Coder Agent
 *   ## Description
 *   One paragraph.
 *   ## Model            (optional; "default" means the configured model)
 *   ## Max Turns        (optional)
 *   ## Allowed Tools
 *   - read
 *   - edit
 *   ## System Prompt
 *   Free text up to the next heading.
 *
 * The agent's name is the file's base name.
 */
import { basename, extname } from "node:path";
import type { AgentScope } from "../channels/messages.js";

export interface AgentDefinition {
  name: string;
  description: string;
  allowedTools: string[];
  systemPrompt: string;
  model?: string;
  maxTurns?: number;
  filePath: string;
}

export type AgentValidationError =
  | "missing_description"
  | "missing_tools"
  | "missing_prompt";

export interface AgentStatus {
  valid: boolean;
  error?: AgentValidationError;
  unknownTools: string[];
}

export const VALIDATION_MESSAGES: Record<AgentValidationError, string> = {
  missing_description: "Missing '## Description' section",
  missing_tools: "Missing '## Allowed Tools' section",
  missing_prompt: "Missing '## System Prompt' section",
};

type Section = "description" | "model" | "max_turns" | "tools" | "prompt" | null;

function sectionFor(heading: string): Section {
  switch (heading.trim().toLowerCase()) {
    case "description": return "description";
    case "model": return "model";
    case "max turns": return "max_turns";
    case "allowed tools": return "tools";
    case "system prompt": return "prompt";
    default: return null;
  }
}

export function parseAgentDefinition(markdown: string, filePath: string): AgentDefinition {
  const description: string[] = [];
  const tools: string[] = [];
  const prompt: string[] = [];
  let model = "";
  let maxTurnsRaw = "";
  let section: Section = null;

  for (const line of markdown.split(/\r?\n/)) {
    const heading = /^##\s+(.*)$/.exec(line);
    const known = heading ? sectionFor(heading[1]) : null;
    if (known) {
      section = known;
      continue;
    }
    // Other headings end the current section; the prompt keeps them as text.
    if (line.startsWith("#") && section !== "prompt") {
      section = null;
      continue;
    }
    const trimmed = line.trim();
    switch (section) {
      case "description":
        if (trimmed) description.push(trimmed);
        break;
      case "model":
        if (trimmed && !model) model = trimmed;
        break;
      case "max_turns":
        if (trimmed && !maxTurnsRaw) maxTurnsRaw = trimmed;
        break;
      case "tools":
        if (/^[-*]/.test(trimmed)) {
          const tool = trimmed.slice(1).trim();
          if (tool) tools.push(tool);
        }
        break;
      case "prompt":
        prompt.push(line);
        break;
      default:
        break;
    }
  }

  const agent: AgentDefinition = {
    name: basename(filePath, extname(filePath)),
    description: description.join(" "),
    allowedTools: tools,
    systemPrompt: prompt.join("\n").trim(),
    filePath,
  };
  if (model && model.toLowerCase() !== "default") agent.model = model;
  const maxTurns = parseInt(maxTurnsRaw, 10);
  if (Number.isFinite(maxTurns) && maxTurns > 0) agent.maxTurns = maxTurns;
  return agent;
}

export function validateAgentDefinition(agent: AgentDefinition, knownTools: readonly string[]): AgentStatus {
  if (!agent.description) return { valid: false, error: "missing_description", unknownTools: [] };
  if (agent.allowedTools.length === 0) return { valid: false, error: "missing_tools", unknownTools: [] };
  if (!agent.systemPrompt) return { valid: false, error: "missing_prompt", unknownTools: [] };
  return { valid: true, unknownTools: agent.allowedTools.filter((t) => !knownTools.includes(t)) };
}

export function agentScope(agent: AgentDefinition): AgentScope {
  return { name: agent.name, allowedTools: [...agent.allowedTools] };
}
