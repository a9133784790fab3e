import { asError } from "../errors.js";
import { Logger } from "../logger.js";

export const MAX_RETRIES = 3;
export const RETRY_BASE_MS = 1000;

const RETRYABLE_STATUS = new Set([429, 502, 503, 529]);

/** Pattern matching transient network errors that should be retried */
export const TRANSIENT_ERROR_RE = /fetch timeout|fetch failed|ECONNREFUSED|ECONNRESET|ETIMEDOUT|ENETUNREACH|EAI_AGAIN|socket hang up/i;

export function isRetryable(status: number): boolean {
  return RETRYABLE_STATUS.has(status);
}

/**
 * Exponential backoff with jitter: base * 2^attempt + [0, base * 2^attempt / 2).
 * A numeric Retry-After header (seconds) wins when present.
 */
export function retryDelay(attempt: number, retryAfter?: string | null, baseMs = RETRY_BASE_MS): number {
  if (retryAfter) {
    const secs = Number(retryAfter);
    if (Number.isFinite(secs) && secs >= 0) return secs * 1000;
  }
  const base = baseMs * Math.pow(2, attempt);
  return base + Math.random() * (base / 2);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface TimedFetchOptions extends RequestInit {
  timeoutMs?: number;
  where?: string;
  fetchImpl?: FetchLike;
}

/** Wrap fetch with timeout and location context for debugging. */
export async function timedFetch(url: string, init: TimedFetchOptions = {}): Promise<Response> {
  const { timeoutMs, where, fetchImpl, signal, ...rest } = init;
  const doFetch: FetchLike = fetchImpl ?? ((u, i) => fetch(u, i));
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;
  const linkAbort = () => controller.abort();

  if (signal) {
    if (signal.aborted) controller.abort();
    else signal.addEventListener("abort", linkAbort, { once: true });
  }
  if (timeoutMs && timeoutMs > 0) {
    timer = setTimeout(() => controller.abort(), timeoutMs);
  }

  try {
    return await doFetch(url, { ...rest, signal: controller.signal });
  } catch (e: unknown) {
    const wrapped = asError(e);
    const isAbort = wrapped.name === "AbortError";
    const tag = isAbort ? "fetch timeout" : "fetch error";
    throw new Error(`[${tag}] ${where ?? ""} ${url} -> ${wrapped.name}: ${wrapped.message}`, { cause: e });
  } finally {
    if (timer) clearTimeout(timer);
    if (signal) signal.removeEventListener("abort", linkAbort);
  }
}

export interface RetryOptions {
  maxRetries?: number;
  baseMs?: number;
  /** Label used in retry warnings, e.g. "Gemini". */
  label?: string;
}

/**
 * POST-style fetch with retries on retryable statuses and transient network
 * failures. Returns the first OK response, or the last non-retryable one so
 * the caller can read its body for the error message.
 */
export async function fetchWithRetry(
  url: string,
  init: TimedFetchOptions,
  opts: RetryOptions = {},
): Promise<Response> {
  const maxRetries = opts.maxRetries ?? MAX_RETRIES;
  const label = opts.label ?? "HTTP";

  for (let attempt = 0; ; attempt++) {
    let res: Response;
    try {
      res = await timedFetch(url, init);
    } catch (fetchErr: unknown) {
      const msg = asError(fetchErr).message;
      if (init.signal?.aborted) throw fetchErr;
      if (attempt < maxRetries && TRANSIENT_ERROR_RE.test(msg)) {
        const delay = retryDelay(attempt, null, opts.baseMs);
        Logger.warn(`${label} fetch error: ${msg}, retry ${attempt + 1}/${maxRetries} in ${Math.round(delay)}ms`);
        await sleep(delay);
        continue;
      }
      throw fetchErr;
    }

    if (res.ok) return res;

    if (isRetryable(res.status) && attempt < maxRetries) {
      const delay = retryDelay(attempt, res.headers.get("retry-after"), opts.baseMs);
      Logger.warn(`${label} ${res.status}, retry ${attempt + 1}/${maxRetries} in ${Math.round(delay)}ms`);
      await res.body?.cancel().catch(() => undefined);
      await sleep(delay);
      continue;
    }
    return res;
  }
}
