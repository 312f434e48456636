/**
 * Built-in todolist tool: a checklist the agent keeps while it works.
 *
 * The list lives as long as the registry that holds the tool, so it carries
 * across the turns of a run. It renders as a Markdown checklist:
 *
 *   - [ ] pending        - [~] in progress
 *   - [x] completed      - [-] cancelled
 *
 * with ` (!)` marking high priority and ` (low)` low priority.
 */
import { z } from "zod";
import { defineTool } from "./registry.js";
import type { RegisteredTool } from "./registry.js";

const todoState = z.enum(["pending", "in_progress", "completed", "cancelled"]);
const todoPriority = z.enum(["high", "medium", "low"]);

export type TodoState = z.infer<typeof todoState>;
export type TodoPriority = z.infer<typeof todoPriority>;

export interface TodoItem {
  id: number;
  content: string;
  state: TodoState;
  priority: TodoPriority;
}

export type TodoDraft = Omit<TodoItem, "id">;

const CHECKBOX: Record<TodoState, string> = {
  pending: "[ ]",
  in_progress: "[~]",
  completed: "[x]",
  cancelled: "[-]",
};

const PRIORITY_SUFFIX: Record<TodoPriority, string> = { high: " (!)", medium: "", low: " (low)" };

export function formatTodoList(items: readonly TodoItem[]): string {
  return items.map((i) => `- ${CHECKBOX[i.state]} ${i.content}${PRIORITY_SUFFIX[i.priority]}`).join("\n");
}

/** Checklist lines back into drafts. Lines that are not checklist items are skipped. */
export function parseTodoMarkdown(markdown: string): TodoDraft[] {
  const drafts: TodoDraft[] = [];
  for (const line of markdown.split(/\r?\n/)) {
    const m = /^- \[([ x~-])\](.*)$/.exec(line.trim());
    if (!m) continue;
    const state: TodoState = m[1] === "x" ? "completed" : m[1] === "~" ? "in_progress" : m[1] === "-" ? "cancelled" : "pending";
    let content = m[2].trim();
    let priority: TodoPriority = "medium";
    if (content.endsWith(" (!)")) {
      priority = "high";
      content = content.slice(0, -4).trim();
    } else if (content.endsWith(" (low)")) {
      priority = "low";
      content = content.slice(0, -6).trim();
    }
    if (content) drafts.push({ content, state, priority });
  }
  return drafts;
}

export class TodoList {
  private items: TodoItem[] = [];
  private nextId = 1;

  all(): readonly TodoItem[] {
    return this.items;
  }

  add(content: string, priority: TodoPriority = "medium", state: TodoState = "pending"): TodoItem {
    const item: TodoItem = { id: this.nextId++, content, state, priority };
    this.items.push(item);
    return item;
  }

  /** False when no item has that id. */
  update(id: number, changes: Partial<TodoDraft>): boolean {
    const item = this.items.find((i) => i.id === id);
    if (!item) return false;
    Object.assign(item, changes);
    return true;
  }

  /** Replace every item. Ids keep counting up. */
  replace(drafts: readonly TodoDraft[]): void {
    this.items = [];
    for (const d of drafts) this.add(d.content, d.priority, d.state);
  }

  format(): string {
    return formatTodoList(this.items);
  }
}

const todoArgs = z.discriminatedUnion("operation", [
  z.object({ operation: z.literal("add"), content: z.string().min(1), priority: todoPriority.optional() }),
  z.object({
    operation: z.literal("update"),
    itemId: z.number().int().positive(),
    state: todoState.optional(),
    content: z.string().min(1).optional(),
    priority: todoPriority.optional(),
  }),
  z.object({ operation: z.literal("list") }),
  z.object({ operation: z.literal("show") }),
  z.object({ operation: z.literal("bulk_update"), todos: z.string() }),
]);

/** A todolist tool over its own list, or over `list` when given. */
export function createTodolistTool(list: TodoList = new TodoList()): RegisteredTool {
  return defineTool({
    name: "todolist",
    description:
      "Keep a checklist of the steps of the current task. Operations: add, update (by itemId), list/show, " +
      "bulk_update (replace the list with a Markdown checklist: '- [ ]', '- [~]', '- [x]', '- [-]').",
    parameters: {
      type: "object",
      properties: {
        operation: { type: "string", enum: ["add", "update", "list", "show", "bulk_update"] },
        content: { type: "string", description: "Item text (add, update)" },
        itemId: { type: "number", description: "Item to change (update)" },
        state: { type: "string", enum: ["pending", "in_progress", "completed", "cancelled"] },
        priority: { type: "string", enum: ["high", "medium", "low"] },
        todos: { type: "string", description: "Markdown checklist (bulk_update)" },
      },
      required: ["operation"],
    },
    args: todoArgs,
    run: async (args) => {
      switch (args.operation) {
        case "add": {
          const item = list.add(args.content, args.priority);
          return JSON.stringify({ success: true, itemId: item.id, message: `Added todo item: ${item.content}`, todoList: list.format() });
        }
        case "update": {
          const changes: Partial<TodoDraft> = {};
          if (args.state) changes.state = args.state;
          if (args.content) changes.content = args.content;
          if (args.priority) changes.priority = args.priority;
          if (!list.update(args.itemId, changes)) throw new Error(`todo item ${args.itemId} not found`);
          return JSON.stringify({ success: true, message: `Updated todo item ${args.itemId}`, todoList: list.format() });
        }
        case "list":
        case "show":
          return JSON.stringify({ success: true, todoList: list.format(), itemCount: list.all().length });
        case "bulk_update": {
          const drafts = parseTodoMarkdown(args.todos);
          list.replace(drafts);
          return JSON.stringify({ success: true, message: `Updated todo list with ${drafts.length} items`, todoList: list.format() });
        }
      }
    },
  });
}
