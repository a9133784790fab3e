import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import {
  chunkToDeltas,
  convertMessages,
  convertTools,
  makeGoogleDriver,
  parseSseEvent,
} from "../src/drivers/streaming-google.js";
import type { GeminiChunk } from "../src/drivers/streaming-google.js";
import type { ChatMessage, ModelDelta, TokenUsage } from "../src/drivers/types.js";
import type { FetchLike } from "../src/utils/http.js";
import { toolDefinitions } from "../src/catalog/index.js";
import { isJamError } from "../src/errors.js";
import { Logger } from "../src/logger.js";

before(() => Logger.setSink(() => undefined));
after(() => Logger.setSink(null));

interface Captured {
  url: string;
  body: unknown;
  apiKey: string | null;
}

/** Answers each request with the next scripted response and records what was sent. */
function stubFetch(responses: Response[]): { fetchImpl: FetchLike; captured: Captured[] } {
  const captured: Captured[] = [];
  let i = 0;
  const fetchImpl: FetchLike = async (url, init) => {
    captured.push({
      url,
      body: typeof init.body === "string" ? JSON.parse(init.body) : null,
      apiKey: new Headers(init.headers).get("x-goog-api-key"),
    });
    return responses[Math.min(i++, responses.length - 1)];
  };
  return { fetchImpl, captured };
}

function sse(...events: unknown[]): Response {
  const body = events.map((e) => `data: ${JSON.stringify(e)}`).join("\r\n\r\n");
  return new Response(body, { status: 200, headers: { "content-type": "text/event-stream" } });
}

interface PartInput {
  text?: string;
  thought?: boolean | string;
  thoughtSignature?: string;
  functionCall?: { name: string; args?: Record<string, unknown> };
}

function parts(...p: PartInput[]): GeminiChunk {
  return { candidates: [{ content: { parts: p } }] };
}

function driverWith(fetchImpl: FetchLike) {
  return makeGoogleDriver({
    baseUrl: "https://model.test/",
    model: "gemini-test",
    apiKey: "test-secret",
    retryBaseMs: 0,
    fetchImpl,
  });
}

async function drain(deltas: AsyncIterable<ModelDelta>): Promise<ModelDelta[]> {
  const out: ModelDelta[] = [];
  for await (const d of deltas) out.push(d);
  return out;
}

describe("Google Gemini Driver", () => {
  describe("message conversion", () => {
    it("moves the system prompt into systemInstruction", () => {
      const { systemInstruction, contents } = convertMessages([
        { role: "system", content: "You are a producer." },
        { role: "user", content: "Hello" },
      ]);
      assert.deepEqual(systemInstruction, { role: "user", parts: [{ text: "You are a producer." }] });
      assert.deepEqual(contents, [{ role: "user", parts: [{ text: "Hello" }] }]);
    });

    it("maps calls to functionCall parts and merges results into one user turn", () => {
      const messages: ChatMessage[] = [
        { role: "user", content: "faster" },
        {
          role: "assistant",
          content: "On it.",
          tool_calls: [
            { id: "c1", type: "function", function: { name: "set_tempo", arguments: '{"bpm":140}' }, signature: "sig-1" },
          ],
        },
        { role: "tool", tool_call_id: "c1", name: "set_tempo", content: '{"status":"success"}' },
        { role: "tool", tool_call_id: "c2", name: "execute_code", content: "plain text" },
      ];
      const { contents } = convertMessages(messages);
      assert.deepEqual(contents, [
        { role: "user", parts: [{ text: "faster" }] },
        {
          role: "model",
          parts: [
            { text: "On it." },
            { functionCall: { name: "set_tempo", args: { bpm: 140 } }, thoughtSignature: "sig-1" },
          ],
        },
        {
          role: "user",
          parts: [
            { functionResponse: { name: "set_tempo", response: { status: "success" } } },
            { functionResponse: { name: "execute_code", response: { result: "plain text" } } },
          ],
        },
      ]);
    });

    it("prepends a user turn when history starts with the model", () => {
      const { contents } = convertMessages([{ role: "assistant", content: "Welcome back." }]);
      assert.deepEqual(contents, [
        { role: "user", parts: [{ text: "(conversation continues)" }] },
        { role: "model", parts: [{ text: "Welcome back." }] },
      ]);
    });

    it("converts catalog declarations into functionDeclarations", () => {
      const tools = convertTools(toolDefinitions());
      assert.ok(tools);
      assert.equal(tools[0].functionDeclarations.length, 10);
      assert.equal(tools[0].functionDeclarations[2].name, "set_tempo");
      assert.equal(convertTools([]), undefined);
    });
  });

  describe("stream parsing", () => {
    it("parses data lines and skips keep-alives", () => {
      assert.deepEqual(parseSseEvent('data: {"candidates":[]}'), { candidates: [] });
      assert.equal(parseSseEvent(": keep-alive"), null);
      assert.equal(parseSseEvent("data: [DONE]"), null);
      assert.equal(parseSseEvent("data: {broken"), null);
    });

    it("classifies thoughts, text and function calls", () => {
      const deltas = chunkToDeltas(
        parts(
          { text: "plan the groove", thought: true },
          { text: "Speeding up." },
          { functionCall: { name: "set_tempo", args: { bpm: 140 } }, thoughtSignature: "sig-2" },
        ),
      );
      assert.equal(deltas.length, 3);
      assert.deepEqual(deltas[0], { kind: "reasoning", text: "plan the groove" });
      assert.deepEqual(deltas[1], { kind: "narration", text: "Speeding up." });
      const call = deltas[2];
      assert.ok(call.kind === "call");
      assert.match(call.call.id, /^call_/);
      assert.deepEqual(call.call.function, { name: "set_tempo", arguments: '{"bpm":140}' });
      assert.equal(call.call.signature, "sig-2");
    });

    it("treats a string thought as reasoning", () => {
      assert.deepEqual(chunkToDeltas(parts({ thought: "hmm" })), [{ kind: "reasoning", text: "hmm" }]);
    });
  });

  describe("streaming requests", () => {
    it("posts to the SSE endpoint and yields deltas in order", async () => {
      const { fetchImpl, captured } = stubFetch([
        sse(
          parts({ text: "thinking", thought: true }),
          parts({ text: "Here " }),
          { ...parts({ text: "we go." }), usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 3 } },
        ),
      ]);
      let usage: TokenUsage | undefined;
      const deltas = await drain(
        driverWith(fetchImpl).stream([{ role: "system", content: "sys" }, { role: "user", content: "go" }], {
          temperature: 3,
          includeThoughts: true,
          thinkingBudget: -1,
          tools: toolDefinitions(),
          onUsage: (u) => {
            usage = u;
          },
        }),
      );

      assert.deepEqual(deltas, [
        { kind: "reasoning", text: "thinking" },
        { kind: "narration", text: "Here " },
        { kind: "narration", text: "we go." },
      ]);
      assert.deepEqual(usage, { inputTokens: 12, outputTokens: 3 });

      assert.equal(captured.length, 1);
      assert.equal(captured[0].url, "https://model.test/v1beta/models/gemini-test:streamGenerateContent?alt=sse");
      assert.equal(captured[0].apiKey, "test-secret");
      const body = captured[0].body;
      assert.ok(typeof body === "object" && body !== null && "generationConfig" in body);
      assert.deepEqual(body.generationConfig, {
        temperature: 2,
        thinkingConfig: { includeThoughts: true, thinkingBudget: -1 },
      });
    });

    it("uses the model from the call options when given", async () => {
      const { fetchImpl, captured } = stubFetch([sse(parts({ text: "ok" }))]);
      await drain(driverWith(fetchImpl).stream([{ role: "user", content: "hi" }], { model: "gemini-other" }));
      assert.equal(captured[0].url, "https://model.test/v1beta/models/gemini-other:streamGenerateContent?alt=sse");
    });

    it("a client error is a non-retryable stream_error", async () => {
      const { fetchImpl, captured } = stubFetch([new Response("bad request", { status: 400 })]);
      await assert.rejects(drain(driverWith(fetchImpl).stream([{ role: "user", content: "hi" }])), (e: unknown) => {
        assert.ok(isJamError(e));
        assert.equal(e.kind, "stream_error");
        assert.equal(e.message, "Gemini request failed (400): bad request");
        assert.equal(e.retryable, false);
        assert.equal(e.provider, "google");
        return true;
      });
      assert.equal(captured.length, 1);
    });

    it("retries a 503 before streaming", async () => {
      const { fetchImpl, captured } = stubFetch([
        new Response("busy", { status: 503 }),
        sse(parts({ text: "recovered" })),
      ]);
      const deltas = await drain(driverWith(fetchImpl).stream([{ role: "user", content: "hi" }]));
      assert.deepEqual(deltas, [{ kind: "narration", text: "recovered" }]);
      assert.equal(captured.length, 2);
    });

    it("an error chunk mid-stream becomes a stream_error", async () => {
      const { fetchImpl } = stubFetch([sse(parts({ text: "partial" }), { error: { code: 500, message: "internal" } })]);
      const seen: ModelDelta[] = [];
      await assert.rejects(
        (async () => {
          for await (const d of driverWith(fetchImpl).stream([{ role: "user", content: "hi" }])) seen.push(d);
        })(),
        (e: unknown) => isJamError(e) && e.message === "Gemini stream error: internal",
      );
      assert.deepEqual(seen, [{ kind: "narration", text: "partial" }]);
    });

    it("falls back to a JSON body when the response is not an event stream", async () => {
      const { fetchImpl } = stubFetch([
        new Response(JSON.stringify(parts({ text: "whole reply" })), { headers: { "content-type": "application/json" } }),
      ]);
      const deltas = await drain(driverWith(fetchImpl).stream([{ role: "user", content: "hi" }]));
      assert.deepEqual(deltas, [{ kind: "narration", text: "whole reply" }]);
    });
  });

  describe("complete", () => {
    it("returns the narration text only", async () => {
      const { fetchImpl, captured } = stubFetch([
        new Response(JSON.stringify(parts({ text: "notes", thought: true }, { text: "User wants " }, { text: "techno." })), {
          headers: { "content-type": "application/json" },
        }),
      ]);
      const text = await driverWith(fetchImpl).complete([{ role: "user", content: "summarize" }], { temperature: 0.3 });
      assert.equal(text, "User wants techno.");
      assert.equal(captured[0].url, "https://model.test/v1beta/models/gemini-test:generateContent");
    });
  });
});
