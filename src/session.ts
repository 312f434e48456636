import { mkdirSync, writeFileSync, readFileSync, existsSync, readdirSync, statSync, rmSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { ChatMessage, LLMToolCall } from "./drivers/types.js";
import { Logger } from "./logger.js";
import { shuttleError, asError, errorLogFields } from "./errors.js";

/**
 * Conversation persistence for shuttle.
 *
 * Layout:
 *   ~/.shuttle/
 *     conversations/
 *       <conversation-id>/
 *         messages.json  : user, assistant and tool messages in order
 *         meta.json      : conversation metadata (agent, model, timestamps)
 */

/** What the conversation driver records. The system prompt is never stored. */
export interface ConversationStore {
  readonly id: string;
  addUserMessage(content: string): void;
  addAssistantMessage(content: string, toolCalls?: LLMToolCall[]): void;
  addToolMessage(toolCallId: string, name: string, content: string): void;
  getConversationContext(): ChatMessage[];
}

export interface ConversationMeta {
  id: string;
  agent: string;
  model: string;
  createdAt: string;
  updatedAt: string;
}

const toolCallSchema = z.object({
  id: z.string(),
  functionName: z.string(),
  argumentsJSON: z.string(),
});

const messageSchema = z.object({
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string(),
  toolCalls: z.array(toolCallSchema).optional(),
  toolCallId: z.string().optional(),
  name: z.string().optional(),
});

const metaSchema = z.object({
  id: z.string(),
  agent: z.string(),
  model: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export function defaultConversationDir(): string {
  return join(homedir(), ".shuttle", "conversations");
}

/**
 * Generate a new conversation ID (short UUID prefix for readability).
 */
export function newConversationId(): string {
  return randomUUID().split("-")[0];
}

/** Keeps the conversation in memory only. Used with --no-persist and in tests. */
export class InMemoryConversationStore implements ConversationStore {
  protected messages: ChatMessage[] = [];

  constructor(readonly id: string = newConversationId()) {}

  addUserMessage(content: string): void {
    this.push({ role: "user", content });
  }

  addAssistantMessage(content: string, toolCalls?: LLMToolCall[]): void {
    this.push(toolCalls && toolCalls.length ? { role: "assistant", content, toolCalls } : { role: "assistant", content });
  }

  addToolMessage(toolCallId: string, name: string, content: string): void {
    this.push({ role: "tool", content, toolCallId, name });
  }

  getConversationContext(): ChatMessage[] {
    return [...this.messages];
  }

  protected push(msg: ChatMessage): void {
    this.messages.push(msg);
  }
}

/** Persists after every message so an interrupted run leaves a readable record. */
export class FileConversationStore extends InMemoryConversationStore {
  private readonly dir: string;
  private readonly createdAt: string;

  constructor(
    id: string,
    private readonly meta: { agent: string; model: string },
    rootDir: string = defaultConversationDir(),
    initial: ChatMessage[] = [],
    createdAt?: string,
  ) {
    super(id);
    this.dir = join(rootDir, id);
    this.messages = [...initial];
    this.createdAt = createdAt ?? new Date().toISOString();
  }

  /**
   * Load a conversation from disk. Returns null if not found or unreadable.
   * Repairs tool calls left unanswered by an interrupted run.
   */
  static load(id: string, rootDir: string = defaultConversationDir()): FileConversationStore | null {
    const dir = join(rootDir, id);
    const msgPath = join(dir, "messages.json");
    const metaPath = join(dir, "meta.json");
    if (!existsSync(msgPath) || !existsSync(metaPath)) return null;

    try {
      const messages = sanitizeToolPairs(z.array(messageSchema).parse(JSON.parse(readFileSync(msgPath, "utf-8"))));
      const meta = metaSchema.parse(JSON.parse(readFileSync(metaPath, "utf-8")));
      return new FileConversationStore(id, { agent: meta.agent, model: meta.model }, rootDir, messages, meta.createdAt);
    } catch (e: unknown) {
      const se = shuttleError("session_error", `Failed to load conversation ${id}: ${asError(e).message}`, { cause: e });
      Logger.warn(se.message, errorLogFields(se));
      return null;
    }
  }

  protected push(msg: ChatMessage): void {
    super.push(msg);
    this.save();
  }

  private save(): void {
    if (!existsSync(this.dir)) mkdirSync(this.dir, { recursive: true });
    const meta: ConversationMeta = {
      id: this.id,
      agent: this.meta.agent,
      model: this.meta.model,
      createdAt: this.createdAt,
      updatedAt: new Date().toISOString(),
    };
    try {
      writeFileSync(join(this.dir, "messages.json"), JSON.stringify(this.messages, null, 2));
      writeFileSync(join(this.dir, "meta.json"), JSON.stringify(meta, null, 2));
    } catch (e: unknown) {
      const se = shuttleError("session_error", `Failed to save conversation ${this.id}: ${asError(e).message}`, { cause: e });
      Logger.error("Conversation save failed:", errorLogFields(se));
      throw se;
    }
  }
}

export interface OpenConversationOptions {
  persist: boolean;
  conversationDir: string;
  /** Id of a saved conversation to continue, or null for a new one. */
  resume: string | null;
  agent: string;
  model: string;
}

export interface OpenedConversation {
  store: ConversationStore;
  /** Messages of the resumed conversation; empty for a new one. */
  prior: ChatMessage[];
}

/**
 * The store for one run: a resumed conversation, a new file-backed one, or
 * an in-memory one when nothing is persisted. Starting a new persisted
 * conversation first removes the ones older than 30 days.
 */
export function openConversation(opts: OpenConversationOptions): OpenedConversation {
  if (opts.resume !== null) {
    if (!opts.persist) throw shuttleError("config_error", "--resume cannot be combined with --no-persist");
    const store = FileConversationStore.load(opts.resume, opts.conversationDir);
    if (!store) throw shuttleError("session_error", `conversation '${opts.resume}' not found or unreadable in ${opts.conversationDir}`);
    return { store, prior: store.getConversationContext() };
  }
  if (!opts.persist) return { store: new InMemoryConversationStore(), prior: [] };

  const removed = cleanupOldConversations(opts.conversationDir);
  if (removed) Logger.telemetry(`removed ${removed} old conversation(s)`);
  const store = new FileConversationStore(newConversationId(), { agent: opts.agent, model: opts.model }, opts.conversationDir);
  return { store, prior: [] };
}

/**
 * Make every assistant tool call have exactly one tool reply: inject a
 * placeholder for calls an interrupted run never answered, drop replies
 * whose call is missing, and drop duplicate replies.
 */
export function sanitizeToolPairs(messages: ChatMessage[]): ChatMessage[] {
  const callIds = new Set<string>();
  const answeredIds = new Set<string>();
  for (const m of messages) {
    if (m.role === "assistant") for (const tc of m.toolCalls ?? []) callIds.add(tc.id);
    if (m.role === "tool" && m.toolCallId) answeredIds.add(m.toolCallId);
  }

  const seen = new Set<string>();
  const result: ChatMessage[] = [];
  for (const m of messages) {
    if (m.role === "tool" && m.toolCallId) {
      if (!callIds.has(m.toolCallId)) {
        Logger.debug(`Conversation repair: dropping orphaned tool reply for missing call ${m.toolCallId}`);
        continue;
      }
      if (seen.has(m.toolCallId)) {
        Logger.debug(`Conversation repair: dropping duplicate tool reply for call ${m.toolCallId}`);
        continue;
      }
      seen.add(m.toolCallId);
    }
    result.push(m);
    if (m.role !== "assistant") continue;
    for (const tc of m.toolCalls ?? []) {
      if (answeredIds.has(tc.id)) continue;
      result.push({
        role: "tool",
        content: "[Run interrupted: this tool call did not complete.]",
        toolCallId: tc.id,
        name: tc.functionName,
      });
      answeredIds.add(tc.id);
      seen.add(tc.id);
      Logger.warn(`Conversation repair: injected placeholder for unanswered call ${tc.id} (${tc.functionName})`);
    }
  }
  return result;
}

/**
 * Delete conversations older than the given age.
 * @param maxAgeMs defaults to 30 days
 * @returns Number of conversations deleted
 */
export function cleanupOldConversations(
  rootDir: string = defaultConversationDir(),
  maxAgeMs: number = 30 * 24 * 60 * 60 * 1000,
): number {
  if (!existsSync(rootDir)) return 0;
  const now = Date.now();
  let deleted = 0;

  for (const entry of readdirSync(rootDir)) {
    const dir = join(rootDir, entry);
    const metaPath = join(dir, "meta.json");
    if (!existsSync(metaPath)) continue;
    try {
      const meta = metaSchema.safeParse(JSON.parse(readFileSync(metaPath, "utf-8")));
      const createdMs = meta.success ? new Date(meta.data.createdAt).getTime() : NaN;
      // Fall back to mtime if createdAt is missing or unparseable
      const age = Number.isFinite(createdMs) ? now - createdMs : now - statSync(metaPath).mtimeMs;
      if (age > maxAgeMs) {
        rmSync(dir, { recursive: true, force: true });
        Logger.debug(`Cleanup: removed conversation ${entry} (age: ${Math.round(age / 1000 / 60)}m)`);
        deleted++;
      }
    } catch (err: unknown) {
      Logger.warn(`Cleanup: failed to process conversation ${entry}: ${asError(err).message}`);
    }
  }
  return deleted;
}

/**
 * List all conversations, most recent first.
 */
export function listConversations(rootDir: string = defaultConversationDir()): ConversationMeta[] {
  if (!existsSync(rootDir)) return [];
  const found: ConversationMeta[] = [];
  for (const entry of readdirSync(rootDir)) {
    const metaPath = join(rootDir, entry, "meta.json");
    if (!existsSync(metaPath)) continue;
    try {
      found.push(metaSchema.parse(JSON.parse(readFileSync(metaPath, "utf-8"))));
    } catch (e: unknown) {
      Logger.debug(`skipping corrupt conversation ${entry}: ${asError(e).message}`);
    }
  }
  return found.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
}
