import { toolDefinitions } from "../catalog/index.js";
import { ContextManager, type ContextStats } from "../context/context-manager.js";
import { makeDriver } from "../drivers/index.js";
import type { ChatDriver, ChatMessage, ChatToolCall } from "../drivers/types.js";
import { asError, errorLogFields, jamError, toJamError } from "../errors.js";
import type { CallRecord, ConversationTurn, JamConfig } from "../jam-types.js";
import { Logger } from "../logger.js";
import { McpSandbox } from "../sandbox/mcp-sandbox.js";
import type { ExecutionSandbox } from "../sandbox/types.js";
import { saveSnapshot, type PersistenceOptions, type SessionSnapshot } from "../session/persistence.js";
import { SessionStore, type SessionParams } from "../session/session-store.js";
import { resolveCall, type DispatchContext } from "./dispatch.js";
import { makeEvent, type EventOf, type TurnEvent, type TurnEventPayloads, type TurnEventType, type TurnResult } from "./events.js";
import { renderSystemPrompt } from "./prompts.js";

export type EngineState =
  | "idle"
  | "streaming"
  | "thinking"
  | "responding"
  | "dispatching"
  | "continuing"
  | "done"
  | "error";

export interface EngineSettings {
  /** Run generated code in the sandbox; otherwise calls end as code_generated. */
  autoExecute: boolean;
  includeThoughts: boolean;
  thinkingBudget: number;
  temperature: number;
  /** Temperature for the consolidation summary request. */
  summaryTemperature: number;
  /** Continuation passes allowed per turn. */
  maxContinuations: number;
  model?: string;
  /** When set, a snapshot is written after every completed turn. */
  persistence?: PersistenceOptions | null;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  autoExecute: true,
  includeThoughts: true,
  thinkingBudget: -1,
  temperature: 0.7,
  summaryTemperature: 0.3,
  maxContinuations: 5,
};

export interface TurnEngineOptions {
  driver: ChatDriver;
  sandbox?: ExecutionSandbox | null;
  session?: SessionStore;
  context?: ContextManager;
  settings?: Partial<EngineSettings>;
  now?: () => Date;
}

export interface RunTurnOptions {
  signal?: AbortSignal;
}

export interface EngineStats {
  sessionId: string;
  state: EngineState;
  params: SessionParams;
  layers: number;
  historyTurns: number;
  outboundMessages: number;
  context: ContextStats;
}

/** One completed user message: the turns it produced and the messages sent for it. */
interface Exchange {
  turns: ConversationTurn[];
  messages: ChatMessage[];
}

interface TurnAccumulator {
  reasoning: string;
  narrations: string[];
  calls: CallRecord[];
}

interface PassOutcome {
  narration: string;
  records: CallRecord[];
  toolCalls: ChatToolCall[];
}

function parseCallArguments(call: ChatToolCall): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(call.function.arguments || "{}");
  } catch (e: unknown) {
    throw jamError("stream_error", `Malformed arguments for call ${call.function.name}: ${asError(e).message}`, { cause: e });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw jamError("stream_error", `Arguments for call ${call.function.name} are not an object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function resultMessage(record: CallRecord): ChatMessage {
  return {
    role: "tool",
    tool_call_id: record.id,
    name: record.name,
    content: JSON.stringify(record.result),
  };
}

/**
 * Drives one conversation: classifies streamed deltas into events, resolves
 * calls against the session, runs continuation passes and keeps the context
 * window bounded. One engine owns one session and one context window and
 * processes one message at a time.
 */
export class TurnEngine {
  readonly session: SessionStore;
  readonly context: ContextManager;

  private readonly driver: ChatDriver;
  private readonly sandbox: ExecutionSandbox | null;
  private readonly settings: EngineSettings;
  private readonly now: () => Date;

  private history: ConversationTurn[] = [];
  private exchanges: Exchange[] = [];
  private inFlight = false;
  private _state: EngineState = "idle";

  constructor(opts: TurnEngineOptions) {
    this.driver = opts.driver;
    this.sandbox = opts.sandbox ?? null;
    this.now = opts.now ?? (() => new Date());
    this.session = opts.session ?? new SessionStore({ now: this.now });
    this.context = opts.context ?? new ContextManager();
    this.settings = { ...DEFAULT_ENGINE_SETTINGS, ...opts.settings };

    if (this.settings.autoExecute && !this.sandbox) {
      throw jamError("config_error", "autoExecute is enabled but no execution sandbox was provided");
    }
    if (!Number.isInteger(this.settings.maxContinuations) || this.settings.maxContinuations < 0) {
      throw jamError("config_error", `maxContinuations must be a non-negative integer, got ${this.settings.maxContinuations}`);
    }
  }

  /**
   * Build an engine from loaded configuration: Gemini driver, MCP sandbox
   * (when configured) and a context manager sized from the config.
   */
  static fromConfig(config: JamConfig, deps: Partial<Pick<TurnEngineOptions, "driver" | "sandbox" | "session" | "now">> = {}): TurnEngine {
    Logger.setVerbose(config.verbose);
    const sandbox = deps.sandbox !== undefined
      ? deps.sandbox
      : config.sandbox ? new McpSandbox({ config: config.sandbox }) : null;
    return new TurnEngine({
      driver: deps.driver ?? makeDriver(config),
      sandbox,
      session: deps.session,
      now: deps.now,
      context: new ContextManager({
        maxSize: config.maxContextSize,
        consolidationThreshold: config.consolidationThreshold,
        keepRecentTurns: config.keepRecentTurns,
      }),
      settings: {
        autoExecute: config.autoExecute,
        includeThoughts: config.includeThoughts,
        thinkingBudget: config.thinkingBudget,
        temperature: config.temperature,
        summaryTemperature: config.summaryTemperature,
        maxContinuations: config.maxContinuations,
        model: config.model,
        persistence: config.sessionPersistence ? { baseDir: config.sessionDir } : null,
      },
    });
  }

  /** Rebuild an engine from a persisted snapshot. The rolling summary is not restored. */
  static restore(snapshot: SessionSnapshot, opts: Omit<TurnEngineOptions, "session">): TurnEngine {
    const session = SessionStore.fromJSON(
      {
        sessionId: snapshot.sessionId,
        createdAt: snapshot.createdAt,
        params: snapshot.params,
        layers: snapshot.layers,
        executions: snapshot.executions,
      },
      { now: opts.now },
    );
    const engine = new TurnEngine({ ...opts, session });
    engine.loadHistory(snapshot.turns);
    return engine;
  }

  get state(): EngineState {
    return this._state;
  }

  get busy(): boolean {
    return this.inFlight;
  }

  async init(): Promise<void> {
    await this.sandbox?.init();
  }

  async shutdown(): Promise<void> {
    await this.sandbox?.shutdown();
  }

  private ev<K extends TurnEventType>(type: K, payload: TurnEventPayloads[K]): EventOf<K> {
    return makeEvent(type, payload, this.now());
  }

  private get dispatch(): DispatchContext {
    return { session: this.session, sandbox: this.sandbox, autoExecute: this.settings.autoExecute };
  }

  private requestMessages(pending: ChatMessage[]): ChatMessage[] {
    const system = renderSystemPrompt(this.session, this.context.renderContextForPrompt());
    return [
      { role: "system", content: system },
      ...this.exchanges.flatMap((ex) => ex.messages),
      ...pending,
    ];
  }

  /**
   * Summarize old turns when the window is over threshold. Failures are
   * logged and the turn proceeds unconsolidated.
   */
  private async maybeConsolidate(signal?: AbortSignal): Promise<void> {
    if (!this.context.needsConsolidation()) return;
    const request = this.context.buildConsolidationRequest();
    if (!request) return;

    const before = this.context.getStats();
    try {
      const summary = await this.driver.complete([{ role: "user", content: request }], {
        model: this.settings.model,
        temperature: this.settings.summaryTemperature,
        signal,
      });
      if (!this.context.applyConsolidation(summary)) return;
    } catch (e: unknown) {
      if (signal?.aborted) return;
      const je = toJamError("stream_error", e, "Consolidation request failed");
      Logger.warn(`Context consolidation skipped: ${je.message}`, errorLogFields(je));
      return;
    }

    const kept = new Set(this.context.turns());
    this.exchanges = this.exchanges.filter((ex) => ex.turns.some((t) => kept.has(t)));
    const after = this.context.getStats();
    Logger.info(
      `Context consolidated: ${before.turns} → ${after.turns} turns, ~${before.totalSize} → ~${after.totalSize} (approximate size)`,
    );
  }

  /**
   * Process one user message. Yields events in order and ends with exactly
   * one `done` or one `error`, unless the consumer stops iterating or the
   * signal fires, in which case nothing is recorded and no further event is
   * emitted.
   *
   * Throws a session_error when iterated while another turn is in progress.
   */
  async *runTurn(message: string, opts: RunTurnOptions = {}): AsyncGenerator<TurnEvent, void, undefined> {
    if (this.inFlight) {
      throw jamError("session_error", "A turn is already in progress for this session");
    }
    this.inFlight = true;
    const { signal } = opts;

    try {
      await this.maybeConsolidate(signal);
      if (signal?.aborted) return;

      const pending: ChatMessage[] = [{ role: "user", content: message }];
      const acc: TurnAccumulator = { reasoning: "", narrations: [], calls: [] };
      let pass = 0;

      while (true) {
        const outcome = yield* this.runPass(pass, acc, pending, signal);
        if (!outcome) return;

        if (outcome.records.length === 0) {
          if (outcome.narration) pending.push({ role: "assistant", content: outcome.narration });
          break;
        }
        if (pass >= this.settings.maxContinuations) {
          throw jamError("continuation_limit", `Turn still issuing calls after ${pass} continuation pass(es)`);
        }

        pending.push({ role: "assistant", content: outcome.narration, tool_calls: outcome.toolCalls });
        pending.push(...outcome.records.map(resultMessage));
        pass++;
        this._state = "continuing";
        Logger.telemetry(`[turn] continuation ${pass}/${this.settings.maxContinuations} after ${outcome.records.length} call(s)`);
      }

      if (signal?.aborted) return;
      const result: TurnResult = {
        response: acc.narrations.filter(Boolean).join("\n\n"),
        reasoning: acc.reasoning,
        calls: acc.calls,
        continuations: pass,
      };
      this.finalize(message, result, pending);
      this._state = "done";
      yield this.ev("done", result);
    } catch (e: unknown) {
      if (signal?.aborted) {
        Logger.debug("Turn cancelled");
        return;
      }
      const je = toJamError("stream_error", e);
      Logger.error("Turn aborted:", errorLogFields(je));
      this._state = "error";
      yield this.ev("error", { kind: je.kind, message: je.message, error: je });
    } finally {
      if (this._state !== "done" && this._state !== "error") this._state = "idle";
      this.inFlight = false;
    }
  }

  /**
   * One streamed generation. Returns null when the turn was cancelled
   * mid-pass.
   */
  private async *runPass(
    pass: number,
    acc: TurnAccumulator,
    pending: ChatMessage[],
    signal?: AbortSignal,
  ): AsyncGenerator<TurnEvent, PassOutcome | null, undefined> {
    const records: CallRecord[] = [];
    const toolCalls: ChatToolCall[] = [];
    let narration = "";
    let reasoningOpen = false;
    let narrationOpen = false;

    this._state = "streaming";
    const deltas = this.driver.stream(this.requestMessages(pending), {
      model: this.settings.model,
      tools: toolDefinitions(),
      temperature: this.settings.temperature,
      includeThoughts: this.settings.includeThoughts,
      thinkingBudget: this.settings.thinkingBudget,
      signal,
    });

    for await (const delta of deltas) {
      if (signal?.aborted) return null;

      if (delta.kind === "reasoning") {
        this._state = "thinking";
        if (!reasoningOpen) {
          reasoningOpen = true;
          yield this.ev("reasoning_started", { pass });
        }
        acc.reasoning += delta.text;
        yield this.ev("reasoning_chunk", { text: delta.text });
        continue;
      }

      if (reasoningOpen) {
        reasoningOpen = false;
        yield this.ev("reasoning_ended", { reasoning: acc.reasoning });
      }

      if (delta.kind === "narration") {
        this._state = "responding";
        if (!narrationOpen) {
          narrationOpen = true;
          yield this.ev("narration_started", { pass });
        }
        narration += delta.text;
        yield this.ev("narration_chunk", { text: delta.text });
        continue;
      }

      this._state = "dispatching";
      const { id, function: fn } = delta.call;
      yield this.ev("call_started", { id, name: fn.name });
      const args = parseCallArguments(delta.call);
      yield this.ev("call_requested", { id, name: fn.name, args });

      const record = await resolveCall({ id, name: fn.name, args }, this.dispatch);
      records.push(record);
      acc.calls.push(record);
      toolCalls.push(delta.call);
      if (signal?.aborted) return null;

      yield this.ev("call_resolved", { record });
      yield this.ev("call_ended", { id, name: fn.name, status: record.result.status });
    }

    if (reasoningOpen) yield this.ev("reasoning_ended", { reasoning: acc.reasoning });
    if (narrationOpen) yield this.ev("narration_ended", { pass, text: narration });
    acc.narrations.push(narration);
    return { narration, records, toolCalls };
  }

  private finalize(message: string, result: TurnResult, pending: ChatMessage[]): void {
    const timestamp = this.now().toISOString();
    const userTurn: ConversationTurn = {
      role: "user",
      content: message,
      calls: [],
      size: this.context.estimate(message),
      timestamp,
    };
    const agentTurn: ConversationTurn = {
      role: "agent",
      content: result.response,
      calls: result.calls,
      size: this.context.estimate(result.response + result.reasoning),
      timestamp,
    };
    if (result.reasoning) agentTurn.reasoning = result.reasoning;

    this.context.recordTurn(userTurn);
    this.context.recordTurn(agentTurn);
    this.history.push(userTurn, agentTurn);
    this.exchanges.push({ turns: [userTurn, agentTurn], messages: pending });

    if (this.settings.persistence) {
      try {
        saveSnapshot(this.snapshot(), this.settings.persistence);
      } catch (e: unknown) {
        Logger.warn(`Turn completed but the session was not saved: ${asError(e).message}`);
      }
    }
  }

  /** Drain a turn and return its result, or throw the turn's error. */
  async chat(message: string, opts: RunTurnOptions = {}): Promise<TurnResult> {
    for await (const ev of this.runTurn(message, opts)) {
      if (ev.type === "done") {
        return { response: ev.response, reasoning: ev.reasoning, calls: ev.calls, continuations: ev.continuations };
      }
      if (ev.type === "error") throw ev.error;
    }
    throw jamError("session_error", "Turn was cancelled before it completed");
  }

  private loadHistory(turns: ConversationTurn[]): void {
    this.history = structuredClone(turns);
    this.context.restore(this.history);
    this.exchanges = [];
    for (let i = 0; i < this.history.length; i++) {
      const turn = this.history[i];
      const next = this.history[i + 1];
      if (turn.role === "user" && next?.role === "agent") {
        const messages: ChatMessage[] = [{ role: "user", content: turn.content }];
        if (next.content) messages.push({ role: "assistant", content: next.content });
        this.exchanges.push({ turns: [turn, next], messages });
        i++;
      } else {
        this.exchanges.push({
          turns: [turn],
          messages: [{ role: turn.role === "user" ? "user" : "assistant", content: turn.content }],
        });
      }
    }
  }

  snapshot(): SessionSnapshot {
    const data = this.session.toJSON();
    return {
      version: 1,
      sessionId: data.sessionId,
      createdAt: data.createdAt,
      updatedAt: this.now().toISOString(),
      params: data.params,
      layers: data.layers,
      turns: structuredClone(this.history),
      executions: data.executions,
    };
  }

  /** Full turn history, including turns consolidated out of the context window. */
  turns(): ConversationTurn[] {
    return [...this.history];
  }

  /** Drop the conversation context and outbound buffer. Session state and history stay. */
  clearContext(): void {
    if (this.inFlight) throw jamError("session_error", "Cannot clear context while a turn is in progress");
    this.context.clear();
    this.exchanges = [];
  }

  /** Silence everything outside of a turn, through the same pipeline as the stop_all call. */
  async stopAll(): Promise<CallRecord> {
    if (this.inFlight) throw jamError("session_error", "Cannot stop all layers while a turn is in progress");
    return resolveCall({ id: `stop_all_${this.now().getTime()}`, name: "stop_all", args: {} }, this.dispatch);
  }

  currentCode(): string {
    return this.session.renderFullCode();
  }

  stats(): EngineStats {
    return {
      sessionId: this.session.sessionId,
      state: this._state,
      params: this.session.getParams(),
      layers: this.session.layerNames().length,
      historyTurns: this.history.length,
      outboundMessages: this.exchanges.reduce((n, ex) => n + ex.messages.length, 0),
      context: this.context.getStats(),
    };
  }
}
