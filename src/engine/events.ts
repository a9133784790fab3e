import type { JamError, JamErrorKind } from "../errors.js";
import type { CallRecord, CallStatus } from "../jam-types.js";

export interface TurnResult {
  /** Narration of every pass, joined by blank lines. */
  response: string;
  reasoning: string;
  calls: CallRecord[];
  /** Continuation passes the turn needed. */
  continuations: number;
}

export interface TurnEventPayloads {
  reasoning_started: { pass: number };
  reasoning_chunk: { text: string };
  /** Carries all reasoning accumulated in the turn so far. */
  reasoning_ended: { reasoning: string };
  narration_started: { pass: number };
  narration_chunk: { text: string };
  /** Carries the narration of the pass that just ended. */
  narration_ended: { pass: number; text: string };
  call_started: { id: string; name: string };
  call_requested: { id: string; name: string; args: Record<string, unknown> };
  call_resolved: { record: CallRecord };
  call_ended: { id: string; name: string; status: CallStatus };
  error: { kind: JamErrorKind; message: string; error: JamError };
  done: TurnResult;
}

export type TurnEventType = keyof TurnEventPayloads;

export type EventOf<K extends TurnEventType> = { type: K; timestamp: string } & TurnEventPayloads[K];

export type TurnEvent = { [K in TurnEventType]: EventOf<K> }[TurnEventType];

export function makeEvent<K extends TurnEventType>(type: K, payload: TurnEventPayloads[K], now: Date = new Date()): EventOf<K> {
  return { type, timestamp: now.toISOString(), ...payload };
}
