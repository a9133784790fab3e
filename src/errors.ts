/**
 * Structured error types for jamloop.
 *
 * Error boundaries wrap failures with jamError instead of stringifying
 * e.message, so stack traces and causes survive into the logs and the
 * kind decides whether a turn is aborted or the failure is folded into
 * a call record.
 */

export type JamErrorKind =
  | "config_error"
  | "unknown_call"
  | "code_build_error"
  | "sandbox_error"
  | "stream_error"
  | "continuation_limit"
  | "session_error";

export interface JamError extends Error {
  kind: JamErrorKind;
  provider?: string;
  model?: string;
  call?: string;
  retryable: boolean;
  latency_ms?: number;
  cause?: unknown;
}

export interface JamErrorOptions {
  provider?: string;
  model?: string;
  call?: string;
  retryable?: boolean;
  latency_ms?: number;
  cause?: unknown;
}

/**
 * Create a JamError with structured fields.
 */
export function jamError(kind: JamErrorKind, message: string, opts: JamErrorOptions = {}): JamError {
  const err: JamError = Object.assign(new Error(message), {
    kind,
    retryable: opts.retryable ?? false,
  });
  if (opts.provider) err.provider = opts.provider;
  if (opts.model) err.model = opts.model;
  if (opts.call) err.call = opts.call;
  if (opts.latency_ms !== undefined) err.latency_ms = opts.latency_ms;
  if (opts.cause !== undefined) err.cause = opts.cause;
  return err;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e);
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e));
  } catch {
    return new Error("Unknown error");
  }
}

export function isJamError(e: unknown): e is JamError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

/** Wrap anything that is not already a JamError under the given kind. */
export function toJamError(kind: JamErrorKind, e: unknown, prefix?: string): JamError {
  if (isJamError(e)) return e;
  const raw = asError(e);
  return jamError(kind, prefix ? `${prefix}: ${raw.message}` : raw.message, { cause: e });
}

/**
 * Format a JamError for structured logging.
 */
export function errorLogFields(e: JamError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.provider) fields.provider = e.provider;
  if (e.model) fields.model = e.model;
  if (e.call) fields.call = e.call;
  if (e.latency_ms !== undefined) fields.latency_ms = e.latency_ms;
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
