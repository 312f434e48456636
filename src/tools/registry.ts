/**
 * Tool registry: the tool worker's view of every callable tool: built-ins
 * and anything MCP servers contribute. Also answers the permission question
 * (may this agent call that tool?) for both the driver and the worker.
 */
import { z } from "zod";
import { shuttleError } from "../errors.js";
import type { AgentScope } from "../channels/messages.js";
import type { ToolSchema } from "../drivers/types.js";

export interface RegisteredTool {
  /** Tool name (must be unique across built-ins and MCP servers). */
  name: string;
  /** OpenAI-style function tool definition. */
  definition: ToolSchema;
  /** Execute with decoded (not yet validated) arguments. Returns the result text. */
  execute: (args: unknown) => Promise<string>;
}

export interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  /** JSON Schema sent to the model. */
  parameters: Record<string, unknown>;
  /** Validates the model's arguments before `run` sees them. */
  args: S;
  run: (args: z.infer<S>) => Promise<string>;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Build a registry entry whose arguments are checked against a zod schema. */
export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): RegisteredTool {
  return {
    name: spec.name,
    definition: {
      type: "function",
      function: { name: spec.name, description: spec.description, parameters: spec.parameters },
    },
    execute: async (raw) => {
      const parsed = spec.args.safeParse(raw);
      if (!parsed.success) {
        throw shuttleError("tool_execution_error", `invalid arguments for '${spec.name}': ${describeIssues(parsed.error)}`);
      }
      return spec.run(parsed.data);
    },
  };
}

export function isToolAllowed(scope: AgentScope, toolName: string): boolean {
  if (scope.allowedTools === "*") return true;
  return scope.allowedTools.includes(toolName);
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  /** Register a tool. Throws if name already taken. */
  register(tool: RegisteredTool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered.`);
    }
    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys()).sort();
  }

  isToolAllowed(scope: AgentScope, toolName: string): boolean {
    return isToolAllowed(scope, toolName);
  }

  /** Definitions for every registered tool, or only those `scope` may call. */
  getToolDefinitions(scope?: AgentScope): ToolSchema[] {
    return Array.from(this.tools.values())
      .filter((t) => !scope || isToolAllowed(scope, t.name))
      .map((t) => t.definition);
  }

  /**
   * Decode the arguments and run the tool. Throws a `tool_execution_error`
   * for unknown tools, malformed JSON and anything the tool itself throws.
   */
  async invokeTool(name: string, argumentsJSON: string): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) throw shuttleError("tool_execution_error", `unknown tool '${name}'`);

    let args: unknown;
    try {
      args = argumentsJSON.trim() ? JSON.parse(argumentsJSON) : {};
    } catch (e: unknown) {
      throw shuttleError("tool_execution_error", `invalid arguments JSON for '${name}'`, { cause: e });
    }
    return tool.execute(args);
  }
}
