/**
 * Shared types for jamloop: conversation turns, call records and runtime
 * configuration.
 */

import type { SessionStateView } from "./session/session-store.js";

export type CallStatus = "success" | "error" | "code_generated";

export interface CallResult {
  status: CallStatus;
  /** Generated target-runtime code. Absent when building failed or the call produces none. */
  code?: string;
  output?: string;
  error?: string;
  /** Layer names touched by the session mutation and reported by the sandbox. */
  affectedLayers: string[];
  /** get_session_state only. */
  state?: SessionStateView;
}

export interface CallRecord {
  id: string;
  name: string;
  args: Record<string, unknown>;
  result: CallResult;
}

export type TurnRole = "user" | "agent";

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  reasoning?: string;
  calls: CallRecord[];
  /** Approximate size (see SizeEstimator); never an exact token count. */
  size: number;
  timestamp: string;
}

export interface SandboxConfig {
  command: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
  /** MCP tool that executes a code string. */
  tool: string;
  /** Tool call timeout in ms. */
  timeoutMs: number;
}

export interface JamConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  /** Run generated code in the sandbox. When false results are "code_generated". */
  autoExecute: boolean;
  includeThoughts: boolean;
  /** Gemini thinking budget in tokens; -1 lets the model decide. */
  thinkingBudget: number;
  temperature: number;
  summaryTemperature: number;
  /** Soft ceiling for the context window, in estimated tokens. */
  maxContextSize: number;
  consolidationThreshold: number;
  keepRecentTurns: number;
  /** Continuation passes allowed per turn before the turn is aborted. */
  maxContinuations: number;
  requestTimeoutMs: number;
  sandbox: SandboxConfig | null;
  sessionDir: string;
  sessionPersistence: boolean;
  verbose: boolean;
}
