import { existsSync, readdirSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { parseAgentDefinition, validateAgentDefinition, VALIDATION_MESSAGES } from "./agent-definition.js";
import type { AgentDefinition } from "./agent-definition.js";

/** Built-in agents ship in `agents/` at the package root, above src/agents or dist/src/agents. */
export function builtinAgentsDir(): string {
  const candidates = ["../../agents/", "../../../agents/"].map((rel) => fileURLToPath(new URL(rel, import.meta.url)));
  return candidates.find((dir) => existsSync(dir)) ?? candidates[0];
}

export function userAgentsDir(): string {
  return join(homedir(), ".shuttle", "agents");
}

/** Parse every `*.md` in a directory. Unreadable files are skipped with a warning. */
export function loadAgentDefinitions(dir: string): AgentDefinition[] {
  if (!existsSync(dir)) return [];
  const agents: AgentDefinition[] = [];
  for (const file of readdirSync(dir).filter((f) => f.endsWith(".md")).sort()) {
    const path = join(dir, file);
    try {
      agents.push(parseAgentDefinition(readFileSync(path, "utf-8"), path));
    } catch (e: unknown) {
      Logger.warn(`Failed to load agent from ${path}: ${asError(e).message}`);
    }
  }
  return agents;
}

/**
 * Built-ins first, then user agents; a user agent replaces a built-in of
 * the same name. Invalid definitions are dropped with a warning and unknown
 * tool names are reported.
 */
export function loadAgents(
  knownTools: readonly string[],
  dirs: string[] = [builtinAgentsDir(), userAgentsDir()],
): AgentDefinition[] {
  const byName = new Map<string, AgentDefinition>();
  for (const dir of dirs) {
    for (const agent of loadAgentDefinitions(dir)) {
      const status = validateAgentDefinition(agent, knownTools);
      if (!status.valid) {
        Logger.warn(`Agent '${agent.name}' (${agent.filePath}) ignored: ${status.error ? VALIDATION_MESSAGES[status.error] : "invalid"}`);
        continue;
      }
      if (status.unknownTools.length) {
        Logger.warn(`Agent '${agent.name}' lists unknown tools: ${status.unknownTools.join(", ")}`);
      }
      byName.set(agent.name, agent);
    }
  }
  return Array.from(byName.values()).sort((a, b) => a.name.localeCompare(b.name));
}

export function findAgent(agents: AgentDefinition[], name: string): AgentDefinition | undefined {
  return agents.find((a) => a.name === name);
}
