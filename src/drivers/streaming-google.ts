/**
 * Streaming Google Gemini chat driver.
 * Native Gemini API, not the OpenAI compatibility shim.
 *
 * Endpoint: POST /v1beta/models/{model}:streamGenerateContent?alt=sse
 * Auth: x-goog-api-key header
 * Message format: contents[] with role (user/model) and parts[{text}]
 * Tool format: tools[{functionDeclarations}]
 */
import { z } from "zod";
import type { ToolDefinition } from "../catalog/types.js";
import { asError, jamError, toJamError } from "../errors.js";
import { Logger } from "../logger.js";
import { fetchWithRetry, isRetryable, type FetchLike } from "../utils/http.js";
import type { ChatDriver, ChatMessage, ChatToolCall, ModelDelta, StreamOptions, TokenUsage } from "./types.js";

export interface GoogleDriverConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Base backoff in ms; tests pass 0. */
  retryBaseMs?: number;
  fetchImpl?: FetchLike;
}

// --- Wire shapes ---

interface GeminiPart {
  text?: string;
  thought?: boolean;
  thoughtSignature?: string;
  functionCall?: { name: string; args: Record<string, unknown> };
  functionResponse?: { name: string; response: Record<string, unknown> };
}

export interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

const partSchema = z.object({
  text: z.string().optional(),
  thought: z.union([z.boolean(), z.string()]).optional(),
  thoughtSignature: z.string().optional(),
  functionCall: z.object({ name: z.string(), args: z.record(z.unknown()).optional() }).optional(),
});

const chunkSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(partSchema).optional() }).optional(),
        finishReason: z.string().optional(),
      }),
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      thoughtsTokenCount: z.number().optional(),
    })
    .optional(),
  error: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
});

export type GeminiChunk = z.infer<typeof chunkSchema>;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseJsonRecord(src: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(src);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function newCallId(): string {
  return `call_${Math.random().toString(36).slice(2, 10)}`;
}

// --- Message conversion ---

/**
 * Convert ChatMessage[] to Gemini contents[] + systemInstruction.
 *
 * Gemini differences from OpenAI:
 *   - role "assistant" → "model"
 *   - role "system" (first) → systemInstruction (separate field)
 *   - role "tool" → user turn with functionResponse part
 *   - tool_calls in assistant → model turn with functionCall parts
 *   - Gemini requires alternating user/model turns (merge consecutive same-role)
 */
export function convertMessages(messages: ChatMessage[]): {
  systemInstruction: GeminiContent | undefined;
  contents: GeminiContent[];
} {
  let systemInstruction: GeminiContent | undefined;
  const raw: GeminiContent[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        if (!systemInstruction) systemInstruction = { role: "user", parts: [{ text: msg.content }] };
        else if (msg.content) raw.push({ role: "user", parts: [{ text: `[System: ${msg.content}]` }] });
        break;

      case "tool":
        raw.push({
          role: "user",
          parts: [{
            functionResponse: {
              name: msg.name ?? "unknown_call",
              response: parseJsonRecord(msg.content) ?? { result: msg.content },
            },
          }],
        });
        break;

      case "assistant": {
        const parts: GeminiPart[] = [];
        if (msg.content) parts.push({ text: msg.content });
        for (const tc of msg.tool_calls ?? []) {
          parts.push({
            functionCall: { name: tc.function.name, args: parseJsonRecord(tc.function.arguments) ?? {} },
            ...(tc.signature ? { thoughtSignature: tc.signature } : {}),
          });
        }
        if (parts.length > 0) raw.push({ role: "model", parts });
        break;
      }

      case "user":
        raw.push({ role: "user", parts: [{ text: msg.content }] });
        break;
    }
  }

  const merged: GeminiContent[] = [];
  for (const turn of raw) {
    const prev = merged[merged.length - 1];
    if (prev && prev.role === turn.role) prev.parts.push(...turn.parts);
    else merged.push({ role: turn.role, parts: [...turn.parts] });
  }

  // Gemini requires conversation to start with user turn
  if (merged.length > 0 && merged[0].role === "model") {
    merged.unshift({ role: "user", parts: [{ text: "(conversation continues)" }] });
  }

  return { systemInstruction, contents: merged };
}

export function convertTools(tools: ToolDefinition[] | undefined) {
  if (!tools || tools.length === 0) return undefined;
  return [{
    functionDeclarations: tools.map((t) => ({
      name: t.function.name,
      description: t.function.description,
      parameters: t.function.parameters,
    })),
  }];
}

// --- Stream parsing ---

/** Parse one SSE event block. Returns null for keep-alives and non-data events. */
export function parseSseEvent(rawEvent: string): GeminiChunk | null {
  const dataLines = rawEvent
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.startsWith("data:"))
    .map((l) => l.replace(/^data:\s?/, ""));

  if (!dataLines.length) return null;
  const joined = dataLines.join("\n").trim();
  if (!joined || joined === "[DONE]") return null;

  let data: unknown;
  try {
    data = JSON.parse(joined);
  } catch (e: unknown) {
    Logger.debug(`Gemini: skipping malformed SSE data (${asError(e).message})`);
    return null;
  }
  const parsed = chunkSchema.safeParse(data);
  if (!parsed.success) {
    Logger.debug(`Gemini: skipping unrecognized chunk`);
    return null;
  }
  return parsed.data;
}

/** Classify the parts of one chunk: thought → reasoning, text → narration, functionCall → call. */
export function chunkToDeltas(chunk: GeminiChunk): ModelDelta[] {
  const deltas: ModelDelta[] = [];
  for (const part of chunk.candidates?.[0]?.content?.parts ?? []) {
    if (typeof part.thought === "string" && part.thought.length) {
      deltas.push({ kind: "reasoning", text: part.thought });
    } else if (typeof part.text === "string" && part.text.length) {
      deltas.push({ kind: part.thought === true ? "reasoning" : "narration", text: part.text });
    }
    if (part.functionCall) {
      const call: ChatToolCall = {
        id: newCallId(),
        type: "function",
        function: { name: part.functionCall.name, arguments: JSON.stringify(part.functionCall.args ?? {}) },
      };
      if (part.thoughtSignature) call.signature = part.thoughtSignature;
      deltas.push({ kind: "call", call });
    }
  }
  return deltas;
}

function usageOf(chunk: GeminiChunk): TokenUsage | undefined {
  const u = chunk.usageMetadata;
  if (!u) return undefined;
  return {
    inputTokens: u.promptTokenCount ?? 0,
    outputTokens: u.candidatesTokenCount ?? 0,
    ...(u.thoughtsTokenCount !== undefined ? { reasoningTokens: u.thoughtsTokenCount } : {}),
  };
}

function requestSnippet(messages: ChatMessage[]): string {
  const last = messages[messages.length - 1];
  if (!last) return "";
  if (last.role === "tool") return `${last.name ?? "call"} result`;
  const content = last.content.trim().replace(/\n+/g, " ");
  return content.length > 120 ? content.slice(0, 120) + "..." : content;
}

// --- Driver ---

export function makeGoogleDriver(cfg: GoogleDriverConfig): ChatDriver {
  const base = cfg.baseUrl.replace(/\/+$/, "");
  const defaultTimeout = cfg.timeoutMs ?? 5 * 60 * 1000;
  const provider = "google";

  function buildPayload(messages: ChatMessage[], opts: StreamOptions): Record<string, unknown> {
    const { systemInstruction, contents } = convertMessages(messages);
    const payload: Record<string, unknown> = { contents };
    if (systemInstruction) payload.systemInstruction = systemInstruction;

    const tools = convertTools(opts.tools);
    if (tools) payload.tools = tools;

    // Generation config, clamped to Google ranges
    const generationConfig: Record<string, unknown> = {};
    if (opts.temperature !== undefined) generationConfig.temperature = Math.max(0, Math.min(2, opts.temperature));
    if (opts.includeThoughts || opts.thinkingBudget !== undefined) {
      generationConfig.thinkingConfig = {
        ...(opts.includeThoughts ? { includeThoughts: true } : {}),
        ...(opts.thinkingBudget !== undefined ? { thinkingBudget: opts.thinkingBudget } : {}),
      };
    }
    if (Object.keys(generationConfig).length > 0) payload.generationConfig = generationConfig;
    return payload;
  }

  /**
   * POST with retries. The returned controller stays linked to the caller's
   * signal and the request timeout until `release` is called.
   */
  async function post(endpoint: string, payload: Record<string, unknown>, model: string, where: string, signal?: AbortSignal) {
    const controller = new AbortController();
    const linkAbort = () => controller.abort();
    if (signal) {
      if (signal.aborted) controller.abort();
      else signal.addEventListener("abort", linkAbort, { once: true });
    }
    const timer = setTimeout(() => controller.abort(), defaultTimeout);
    const release = () => {
      clearTimeout(timer);
      if (signal) signal.removeEventListener("abort", linkAbort);
    };

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (cfg.apiKey) headers["x-goog-api-key"] = cfg.apiKey;

    const started = Date.now();
    let res: Response;
    try {
      res = await fetchWithRetry(
        endpoint,
        {
          method: "POST",
          headers,
          body: JSON.stringify(payload),
          signal: controller.signal,
          where,
          fetchImpl: cfg.fetchImpl,
        },
        { maxRetries: cfg.maxRetries, baseMs: cfg.retryBaseMs, label: "Gemini" },
      );
    } catch (e: unknown) {
      release();
      throw jamError("stream_error", `Gemini request failed: ${asError(e).message}`, {
        provider, model, retryable: true, latency_ms: Date.now() - started, cause: e,
      });
    }

    if (!res.ok) {
      release();
      const text = await res.text().catch((e: unknown) => asError(e).message);
      throw jamError("stream_error", `Gemini request failed (${res.status}): ${text}`, {
        provider, model, retryable: isRetryable(res.status), latency_ms: Date.now() - started,
      });
    }
    return { res, release, signal: controller.signal };
  }

  async function* stream(messages: ChatMessage[], opts: StreamOptions = {}): AsyncGenerator<ModelDelta> {
    const model = opts.model ?? cfg.model;
    const endpoint = `${base}/v1beta/models/${model}:streamGenerateContent?alt=sse`;
    const payload = buildPayload(messages, opts);

    const sizeKB = (JSON.stringify(payload).length / 1024).toFixed(1);
    const snippet = requestSnippet(messages);
    Logger.telemetry(`[API →] ${sizeKB} KB (${messages.length} messages)${snippet ? ` <${snippet}>` : ""}`);

    const { res, release, signal } = await post(endpoint, payload, model, "driver:google:stream", opts.signal);
    let usage: TokenUsage | undefined;

    const emit = (chunk: GeminiChunk): ModelDelta[] => {
      if (chunk.error) {
        throw jamError("stream_error", `Gemini stream error: ${chunk.error.message ?? "unknown"}`, {
          provider, model, retryable: chunk.error.code !== undefined && isRetryable(chunk.error.code),
        });
      }
      usage = usageOf(chunk) ?? usage;
      return chunkToDeltas(chunk);
    };

    try {
      const ct = (res.headers.get("content-type") ?? "").toLowerCase();
      if (!ct.includes("text/event-stream") || !res.body) {
        // Non-streaming fallback
        const parsed = chunkSchema.safeParse(await res.json());
        if (parsed.success) yield* emit(parsed.data);
        return;
      }

      const reader = res.body.getReader();
      const decoder = new TextDecoder("utf-8");
      let buf = "";
      try {
        while (true) {
          const { value, done } = await reader.read();
          if (done) break;
          buf = (buf + decoder.decode(value, { stream: true })).replace(/\r\n/g, "\n");
          let sepIdx: number;
          while ((sepIdx = buf.indexOf("\n\n")) !== -1) {
            const rawEvent = buf.slice(0, sepIdx).trim();
            buf = buf.slice(sepIdx + 2);
            const chunk = rawEvent ? parseSseEvent(rawEvent) : null;
            if (chunk) yield* emit(chunk);
          }
        }
        const tail = (buf + decoder.decode()).trim();
        const chunk = tail ? parseSseEvent(tail) : null;
        if (chunk) yield* emit(chunk);
      } finally {
        await reader.cancel().catch((e: unknown) => Logger.debug(`Gemini: reader cancel failed (${asError(e).message})`));
      }

      if (usage) {
        opts.onUsage?.(usage);
        Logger.telemetry(`[API ←] ${usage.inputTokens} in / ${usage.outputTokens} out${usage.reasoningTokens ? ` / ${usage.reasoningTokens} reasoning` : ""}`);
      }
    } catch (e: unknown) {
      if (signal.aborted && !opts.signal?.aborted) {
        throw jamError("stream_error", `Gemini stream timed out after ${defaultTimeout}ms`, { provider, model, retryable: true, cause: e });
      }
      const je = toJamError("stream_error", e, "Gemini stream interrupted");
      if (!je.provider) je.provider = provider;
      if (!je.model) je.model = model;
      throw je;
    } finally {
      release();
    }
  }

  async function complete(messages: ChatMessage[], opts: Omit<StreamOptions, "tools"> = {}): Promise<string> {
    const model = opts.model ?? cfg.model;
    const endpoint = `${base}/v1beta/models/${model}:generateContent`;
    const { res, release } = await post(endpoint, buildPayload(messages, opts), model, "driver:google:complete", opts.signal);
    try {
      const parsed = chunkSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw jamError("stream_error", "Gemini returned an unrecognized response", { provider, model, cause: parsed.error });
      }
      const usage = usageOf(parsed.data);
      if (usage) opts.onUsage?.(usage);
      return chunkToDeltas(parsed.data)
        .map((d) => (d.kind === "narration" ? d.text : ""))
        .join("");
    } catch (e: unknown) {
      throw toJamError("stream_error", e, "Gemini response unreadable");
    } finally {
      release();
    }
  }

  return { stream, complete };
}
