import type { ToolDefinition } from "../catalog/types.js";

export type ChatRole = "system" | "user" | "assistant" | "tool";

export interface ChatToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
  /** Opaque provider token that must travel back with the call on the next request. */
  signature?: string;
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** role==="assistant": calls issued in this message. */
  tool_calls?: ChatToolCall[];
  /** role==="tool": the id of the call being answered. */
  tool_call_id?: string;
  /** role==="tool": the call name. */
  name?: string;
}

export type ModelDelta =
  | { kind: "reasoning"; text: string }
  | { kind: "narration"; text: string }
  | { kind: "call"; call: ChatToolCall };

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  reasoningTokens?: number;
}

export interface StreamOptions {
  model?: string;
  tools?: ToolDefinition[];
  /** Sampling temperature (0.0–2.0). */
  temperature?: number;
  /** Ask the provider to stream its reasoning. */
  includeThoughts?: boolean;
  /** Reasoning token budget; -1 lets the provider decide, 0 disables. */
  thinkingBudget?: number;
  signal?: AbortSignal;
  onUsage?: (usage: TokenUsage) => void;
}

export interface ChatDriver {
  /** Stream one generation as classified deltas, in arrival order. */
  stream(messages: ChatMessage[], opts?: StreamOptions): AsyncIterable<ModelDelta>;
  /** One non-streamed generation; returns the narration text only. */
  complete(messages: ChatMessage[], opts?: Omit<StreamOptions, "tools">): Promise<string>;
}
