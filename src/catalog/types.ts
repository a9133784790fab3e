import type { z } from "zod";
import type { SessionStore } from "../session/session-store.js";

/** JSON schema subset used in call declarations. */
export interface JsonSchema {
  type: "object" | "string" | "number" | "integer" | "array" | "boolean";
  description?: string;
  enum?: readonly string[];
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  required?: readonly string[];
}

/** Declaration handed to the model alongside every streamed request. */
export interface ToolDefinition {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: JsonSchema;
  };
}

export const CALL_NAMES = [
  "play_synth",
  "play_drums",
  "set_tempo",
  "set_scale",
  "set_root",
  "stop_player",
  "stop_all",
  "modify_layer",
  "execute_code",
  "get_session_state",
] as const;

export type CallName = (typeof CALL_NAMES)[number];

/**
 * Maps validated arguments to target-runtime code. Reads the session but never
 * changes it. Returns null for calls that are answered from session state.
 */
export type CodeBuilder<A> = (args: A, session: SessionStore) => string | null;

/** Applies a call to the session. Returns the layer names it touched. */
export type SessionMutation<A> = (session: SessionStore, args: A, code: string) => string[];

export interface CallDefinition<S extends z.ZodTypeAny> {
  name: CallName;
  description: string;
  parameters: JsonSchema;
  schema: S;
  build: CodeBuilder<z.output<S>>;
  mutate: SessionMutation<z.output<S>>;
}

/**
 * Outcome of validating and building one call. `apply` runs the session
 * mutation; it is kept separate so the caller decides when the session
 * changes.
 */
export type PreparedCall =
  | { ok: true; code: string; apply: () => string[] }
  | { ok: true; code: null; apply: () => string[] }
  | { ok: false; error: string };

/** Registry entry with the argument type erased behind `prepare`. */
export interface CatalogEntry {
  name: CallName;
  declaration: ToolDefinition;
  schema: z.ZodTypeAny;
  prepare(rawArgs: unknown, session: SessionStore): PreparedCall;
}
