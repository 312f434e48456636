/**
 * ConversationDriver: runs one agentic task to completion.
 *
 * Each turn sends the running history to the API worker, pumps that
 * request's responses, and dispatches any tool calls to the tool workers
 * before the next turn. The driver is the only place that decides whether
 * a failure ends the run; workers only ever report data.
 *
 * A turn dispatches each tool call as soon as it arrives, so tools start
 * while the model may still be streaming. Between tool runs the driver keeps
 * reading the same request until its stream completes, so calls that arrive
 * later in the response run before the next turn. A request that outlives
 * its deadline stays open and its usage is collected at later turns.
 */
import { performance } from "node:perf_hooks";
import { Logger } from "../logger.js";
import { asError, isShuttleError, shuttleError } from "../errors.js";
import { isTerminal, newRequestId } from "../channels/messages.js";
import { isToolAllowed } from "../tools/registry.js";
import { RETRY_BASE_MS, MAX_RETRIES, retryDelay, sleep } from "../utils/retry.js";
import { SUMMARIZER_PROMPT, SUMMARY_REQUEST } from "../agents/system-prompt.js";
import { detectCompletion } from "./completion.js";
import { extractArtifacts } from "./artifacts.js";
import { TASK_TOOL, runDelegatedTask, taskToolSchema } from "./delegation.js";
import { InMemoryConversationStore } from "../session.js";
import type { Delegation } from "./delegation.js";
import type { ShuttleErrorKind } from "../errors.js";
import type { ChannelHub } from "../channels/hub.js";
import type { Mailbox, ResponseRouter } from "../channels/router.js";
import type { AgentScope, ApiResponse, OrchestratorState, ToolResponse } from "../channels/messages.js";
import type { ChatMessage, LLMToolCall, ToolSchema } from "../drivers/types.js";
import type { ConversationStore } from "../session.js";

export interface TaskResult {
  success: boolean;
  summaryText: string;
  modifiedArtifacts: string[];
  temporaryArtifacts: string[];
  toolCallCount: number;
  tokensUsed: number;
  error?: string;
}

export interface TaskInput {
  agentScope: AgentScope;
  taskDescription: string;
  model: string;
  toolSchemas: ToolSchema[];
  maxTurns?: number;
  /** Earlier messages of a resumed conversation, placed before the task. */
  priorMessages?: ChatMessage[];
}

export interface DriverSettings {
  maxTurns: number;
  turnTimeoutMs: number;
  toolTimeoutMs: number;
  maxRetries: number;
  /** Base of the exponential backoff between retried turns. */
  retryBaseMs: number;
  maxTokens: number;
  temperature: number;
  summaryMaxTokens: number;
  /** Files under this directory count as temporary artifacts. */
  scratchDir?: string;
}

export const DEFAULT_DRIVER_SETTINGS: DriverSettings = {
  maxTurns: 10,
  turnTimeoutMs: 300_000,
  toolTimeoutMs: 120_000,
  maxRetries: MAX_RETRIES,
  retryBaseMs: RETRY_BASE_MS,
  maxTokens: 8192,
  temperature: 0.7,
  summaryMaxTokens: 2048,
};

/** Builds the first system message for a task. */
export type PromptBuilder = (scope: AgentScope, taskDescription: string) => string;

export interface ConversationDriverDeps {
  hub: ChannelHub;
  apiResponses: ResponseRouter<ApiResponse>;
  toolResponses: ResponseRouter<ToolResponse>;
  store: ConversationStore;
  buildPrompt: PromptBuilder;
  settings?: Partial<DriverSettings>;
  /** Enables the `task` tool. Sub-tasks run without it, so they cannot delegate again. */
  delegation?: Delegation;
}

/** What one model request produced. */
export interface ConversationTurn {
  requestId: string;
  text: string;
  toolCalls: LLMToolCall[];
  /** True once the request's `stream_complete` was seen. */
  terminal: boolean;
}

type PumpResult =
  | { kind: "turn"; turn: ConversationTurn }
  | { kind: "error"; error: string; retryable: boolean }
  | { kind: "timeout" };

type TurnOutcome =
  /** `mailbox` stays open while the request has not completed. */
  | { kind: "ok"; turn: ConversationTurn; mailbox: Mailbox<ApiResponse> | null }
  | { kind: "failed"; errorKind: ShuttleErrorKind; error: string };

interface ToolOutcome {
  call: LLMToolCall;
  content: string;
}

interface RunState {
  model: string;
  /** Index in the history of this run's first message. */
  runStart: number;
  tokens: number;
  toolCalls: number;
  /** Mailboxes of requests that missed their deadline before stream_complete. */
  unfinished: Mailbox<ApiResponse>[];
}

export class ConversationDriver {
  private readonly settings: DriverSettings;

  constructor(private readonly deps: ConversationDriverDeps) {
    this.settings = { ...DEFAULT_DRIVER_SETTINGS, ...deps.settings };
  }

  async run(input: TaskInput): Promise<TaskResult> {
    const maxTurns = input.maxTurns ?? this.settings.maxTurns;
    const scope = input.agentScope;
    const offered = this.deps.delegation && !input.toolSchemas.some((s) => s.function.name === TASK_TOOL)
      ? [...input.toolSchemas, taskToolSchema]
      : input.toolSchemas;
    const schemas = offered.filter((s) => isToolAllowed(scope, s.function.name));
    const prior = input.priorMessages ?? [];
    const state: RunState = { model: input.model, runStart: 1 + prior.length, tokens: 0, toolCalls: 0, unfinished: [] };
    const history: ChatMessage[] = [
      { role: "system", content: this.deps.buildPrompt(scope, input.taskDescription) },
      ...prior,
      { role: "user", content: input.taskDescription },
    ];

    Logger.telemetry(`[driver] task start agent=${scope.name} model=${input.model} maxTurns=${maxTurns}`);
    try {
      this.deps.store.addUserMessage(input.taskDescription);

      let finished = false;
      for (let turn = 1; turn <= maxTurns; turn++) {
        await this.setState("thinking", `turn ${turn}/${maxTurns}`);
        this.harvestLateUsage(state);

        const outcome = await this.requestTurn(history, scope, schemas, input.model, state);
        if (outcome.kind === "failed") return await this.fail(history, state, outcome.error, outcome.errorKind);

        const current = outcome.turn;
        if (current.toolCalls.length === 0) {
          history.push({ role: "assistant", content: current.text });
          this.deps.store.addAssistantMessage(current.text, []);
          Logger.telemetry(`[driver] turn ${turn} done, completion signal: ${detectCompletion(current.text)}`);
          finished = true;
          break;
        }

        // Tool calls always run, whatever completion language the text carries.
        const results = await this.runTurnTools(current, outcome.mailbox, scope, state);
        history.push({ role: "assistant", content: current.text, toolCalls: current.toolCalls });
        this.deps.store.addAssistantMessage(current.text, current.toolCalls);
        for (const { call, content } of results) {
          history.push({ role: "tool", content, toolCallId: call.id, name: call.functionName });
          this.deps.store.addToolMessage(call.id, call.functionName, content);
        }
      }

      if (!finished) return await this.fail(history, state, `turn budget exhausted after ${maxTurns} turns`, "timeout_error");

      await this.setState("summarizing");
      const summary = await this.summarize(history, scope, input.model, state);
      this.harvestLateUsage(state);
      const thisRun = history.slice(state.runStart);
      const artifacts = extractArtifacts(thisRun, this.settings.scratchDir);
      await this.setState("done");
      return {
        success: true,
        summaryText: summary ?? lastAssistantText(thisRun),
        modifiedArtifacts: artifacts.modified,
        temporaryArtifacts: artifacts.temporary,
        toolCallCount: state.toolCalls,
        tokensUsed: state.tokens,
      };
    } catch (e: unknown) {
      const err = asError(e);
      Logger.debug("[driver] task aborted", err.stack ?? err.message);
      return await this.fail(history, state, `Task execution failed: ${err.message}`, isShuttleError(e) ? e.kind : "tool_execution_error");
    } finally {
      for (const box of state.unfinished) box.close();
    }
  }

  /** Send one chat request, retrying retryable stream errors with backoff. */
  private async requestTurn(
    history: ChatMessage[],
    scope: AgentScope,
    schemas: ToolSchema[],
    model: string,
    state: RunState,
  ): Promise<TurnOutcome> {
    const deadline = performance.now() + this.settings.turnTimeoutMs;
    for (let attempt = 0; ; attempt++) {
      const requestId = newRequestId();
      const mailbox = this.deps.apiResponses.open(requestId);
      await this.deps.hub.apiRequest.send({
        kind: "chat",
        requestId,
        messages: [...history],
        model,
        maxTokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        enableTools: schemas.length > 0,
        toolSchemas: schemas,
        agentScope: scope,
      });

      const result = await this.pump(mailbox, deadline, state, true);
      if (result.kind === "turn") {
        if (!result.turn.terminal) return { kind: "ok", turn: result.turn, mailbox };
        mailbox.close();
        return { kind: "ok", turn: result.turn, mailbox: null };
      }
      mailbox.close();

      if (result.kind === "timeout") {
        const err = shuttleError("timeout_error", `turn timed out after ${this.settings.turnTimeoutMs}ms`, { request_id: requestId, model });
        return { kind: "failed", errorKind: err.kind, error: err.message };
      }
      if (result.retryable && attempt < this.settings.maxRetries) {
        const delay = Math.min(retryDelay(attempt, null, this.settings.retryBaseMs), Math.max(0, deadline - performance.now()));
        Logger.warn(`API error (${result.error}), retry ${attempt + 1}/${this.settings.maxRetries} in ${Math.round(delay)}ms`);
        await this.deps.hub.uiUpdate.send({ kind: "error", message: `retrying after: ${result.error}` });
        await sleep(delay);
        continue;
      }
      const err = shuttleError("transport_error", `API error: ${result.error}`, { request_id: requestId, model, retryable: result.retryable });
      return { kind: "failed", errorKind: err.kind, error: err.message };
    }
  }

  /**
   * Run a turn's tool calls in order. While the request is still streaming,
   * keep reading it after each batch and run the calls that arrive later.
   */
  private async runTurnTools(
    turn: ConversationTurn,
    mailbox: Mailbox<ApiResponse> | null,
    scope: AgentScope,
    state: RunState,
  ): Promise<ToolOutcome[]> {
    const results: ToolOutcome[] = [];
    let open = mailbox;
    let done = 0;
    try {
      while (true) {
        for (; done < turn.toolCalls.length; done++) {
          const call = turn.toolCalls[done];
          results.push({ call, content: await this.runToolCall(call, scope, turn.requestId, state) });
        }
        if (!open) return results;

        const more = await this.pump(open, performance.now() + this.settings.turnTimeoutMs, state, true, turn);
        if (more.kind === "timeout") {
          Logger.warn(`[driver] ${turn.requestId} still streaming after ${this.settings.turnTimeoutMs}ms, continuing without it`);
          state.unfinished.push(open);
          open = null;
        } else if (more.kind === "error") {
          Logger.debug(`[driver] ${turn.requestId} failed after its tool calls: ${more.error}`);
          open.close();
          open = null;
        } else if (turn.terminal) {
          open.close();
          open = null;
        }
      }
    } finally {
      open?.close();
    }
  }

  /**
   * Read one request's responses into `turn` until it is terminal or the
   * deadline passes. With `earlyExit`, return as soon as a new tool call has
   * arrived, after taking whatever is already routed for the request.
   */
  private async pump(
    mailbox: Mailbox<ApiResponse>,
    deadline: number,
    state: RunState,
    earlyExit: boolean,
    turn: ConversationTurn = { requestId: mailbox.requestId, text: "", toolCalls: [], terminal: false },
  ): Promise<PumpResult> {
    const known = turn.toolCalls.length;
    while (true) {
      const remaining = deadline - performance.now();
      if (remaining <= 0) return { kind: "timeout" };
      const response = await mailbox.next(remaining);
      if (!response) return { kind: "timeout" };

      const err = await this.absorb(response, turn, state);
      if (err) return err;
      if (turn.terminal) return { kind: "turn", turn };

      if (earlyExit && turn.toolCalls.length > known) {
        let queued = mailbox.tryNext();
        while (queued !== undefined) {
          const drainErr = await this.absorb(queued, turn, state);
          if (drainErr) return drainErr;
          if (turn.terminal) break;
          queued = mailbox.tryNext();
        }
        return { kind: "turn", turn };
      }
    }
  }

  private async absorb(
    response: ApiResponse,
    turn: ConversationTurn,
    state: RunState,
  ): Promise<Extract<PumpResult, { kind: "error" }> | null> {
    await this.deps.hub.uiUpdate.send({ kind: "api", response });
    switch (response.kind) {
      case "stream_chunk":
        turn.text += response.contentDelta;
        break;
      case "tool_call_request":
        if (!turn.toolCalls.some((c) => c.id === response.toolCall.id)) turn.toolCalls.push(response.toolCall);
        break;
      case "stream_complete":
        state.tokens += response.usage.totalTokens;
        turn.terminal = true;
        break;
      case "stream_error":
        return { kind: "error", error: response.error, retryable: response.retryable };
      case "ready":
      case "tool_call_result":
        break;
    }
    return null;
  }

  /** Collect usage from abandoned requests that have since finished. Never waits. */
  private harvestLateUsage(state: RunState): void {
    state.unfinished = state.unfinished.filter((box) => {
      let response = box.tryNext();
      while (response !== undefined) {
        if (isTerminal(response)) {
          if (response.kind === "stream_complete") state.tokens += response.usage.totalTokens;
          else Logger.debug(`[driver] late stream_error for ${box.requestId}: ${response.error}`);
          box.close();
          return false;
        }
        response = box.tryNext();
      }
      return true;
    });
  }

  private async runToolCall(
    call: LLMToolCall,
    scope: AgentScope,
    turnRequestId: string,
    state: RunState,
  ): Promise<string> {
    state.toolCalls++;
    const name = call.functionName;
    await this.setState("tool", name);

    let content: string;
    if (!isToolAllowed(scope, name)) {
      content = `Error: tool '${name}' is not permitted for agent '${scope.name}'`;
      Logger.debug(`[driver] tool_permission_error ${name} for ${scope.name}`);
    } else if (name === TASK_TOOL && this.deps.delegation) {
      const outcome = await runDelegatedTask(this.deps.delegation, call.argumentsJSON, state.model, (subInput, buildPrompt) =>
        new ConversationDriver({ ...this.deps, store: new InMemoryConversationStore(), buildPrompt, delegation: undefined }).run(subInput),
      );
      state.tokens += outcome.tokensUsed;
      content = outcome.content;
    } else {
      const mailbox = this.deps.toolResponses.open(call.id);
      try {
        await this.deps.hub.toolRequest.send({
          kind: "execute",
          requestId: call.id,
          toolName: name,
          argumentsJSON: call.argumentsJSON,
          callerAgentScope: scope,
        });
        const response = await mailbox.next(this.settings.toolTimeoutMs);
        if (!response) content = `Error: tool '${name}' timed out after ${this.settings.toolTimeoutMs}ms`;
        else content = response.ok ? response.output : `Error: ${response.error}`;
      } finally {
        mailbox.close();
      }
    }

    await this.deps.hub.uiUpdate.send({
      kind: "api",
      response: { kind: "tool_call_result", requestId: turnRequestId, toolCall: call, result: content },
    });
    return content;
  }

  /** One tool-less request for a short summary. Undefined when it fails or says nothing. */
  private async summarize(
    history: ChatMessage[],
    scope: AgentScope,
    model: string,
    state: RunState,
  ): Promise<string | undefined> {
    const requestId = newRequestId();
    const mailbox = this.deps.apiResponses.open(requestId);
    try {
      await this.deps.hub.apiRequest.send({
        kind: "chat",
        requestId,
        messages: [
          { role: "system", content: SUMMARIZER_PROMPT },
          ...history.slice(1),
          { role: "user", content: SUMMARY_REQUEST },
        ],
        model,
        maxTokens: this.settings.summaryMaxTokens,
        temperature: this.settings.temperature,
        enableTools: false,
        toolSchemas: [],
        agentScope: scope,
      });
      const result = await this.pump(mailbox, performance.now() + this.settings.turnTimeoutMs, state, false);
      if (result.kind !== "turn") {
        Logger.debug(`[driver] summary request failed: ${result.kind === "error" ? result.error : "timeout"}`);
        return undefined;
      }
      const text = result.turn.text.trim();
      return text || undefined;
    } finally {
      mailbox.close();
    }
  }

  private async fail(
    history: ChatMessage[],
    state: RunState,
    error: string,
    kind: ShuttleErrorKind = "tool_execution_error",
  ): Promise<TaskResult> {
    Logger.telemetry(`[driver] task failed (${kind}): ${error}`);
    await this.setState("failed", error);
    const thisRun = history.slice(state.runStart);
    const artifacts = extractArtifacts(thisRun, this.settings.scratchDir);
    return {
      success: false,
      summaryText: lastAssistantText(thisRun),
      modifiedArtifacts: artifacts.modified,
      temporaryArtifacts: artifacts.temporary,
      toolCallCount: state.toolCalls,
      tokensUsed: state.tokens,
      error,
    };
  }

  private async setState(next: OrchestratorState, detail?: string): Promise<void> {
    await this.deps.hub.uiUpdate.send(detail === undefined ? { kind: "state", state: next } : { kind: "state", state: next, detail });
  }
}

export function lastAssistantText(history: ChatMessage[]): string {
  for (let i = history.length - 1; i >= 0; i--) {
    const msg = history[i];
    if (msg.role === "assistant" && msg.content.trim()) return msg.content;
  }
  return "";
}
