import { ToolRegistry } from "./registry.js";
import { bashTool } from "./bash.js";
import { createTool } from "./create.js";
import { editTool } from "./edit.js";
import { fetchTool } from "./fetch.js";
import { listTool } from "./list.js";
import { readTool } from "./read.js";
import { createTodolistTool } from "./todolist.js";

export const BUILTIN_TOOLS = [readTool, listTool, createTool, editTool, bashTool, fetchTool];

export const BUILTIN_TOOL_NAMES: readonly string[] = [...BUILTIN_TOOLS.map((t) => t.name), "todolist"];

/** A registry holding every built-in tool, with a todo list of its own. */
export function createBuiltinRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of BUILTIN_TOOLS) registry.register(tool);
  registry.register(createTodolistTool());
  return registry;
}
