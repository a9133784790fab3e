/**
 * Tests for TurnEngine.
 *
 * Covers: event ordering, continuation passes, error and cancellation paths,
 * re-entrancy, consolidation, snapshots and restore
 */

import { test, describe, before, after } from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TurnEngine } from "../src/engine/turn-engine.js";
import type { TurnEngineOptions } from "../src/engine/turn-engine.js";
import type { EventOf, TurnEvent } from "../src/engine/events.js";
import { ContextManager } from "../src/context/context-manager.js";
import { defaultConfig } from "../src/config.js";
import { isJamError } from "../src/errors.js";
import { loadSnapshot } from "../src/session/persistence.js";
import { Logger } from "../src/logger.js";
import { call, narration, reasoning, RecordingSandbox, ScriptedDriver } from "./fakes.js";
import type { ScriptStep } from "./fakes.js";

before(() => Logger.setSink(() => undefined));
after(() => Logger.setSink(null));

const NOW = new Date("2026-01-01T00:00:00.000Z");
const now = () => NOW;

function engineWith(
  passes: ScriptStep[][],
  opts: Partial<TurnEngineOptions> = {},
): { engine: TurnEngine; driver: ScriptedDriver; sandbox: RecordingSandbox } {
  const driver = new ScriptedDriver(passes);
  const sandbox = new RecordingSandbox();
  const engine = new TurnEngine({ driver, sandbox, now, ...opts });
  return { engine, driver, sandbox };
}

async function collect(events: AsyncIterable<TurnEvent>): Promise<TurnEvent[]> {
  const out: TurnEvent[] = [];
  for await (const ev of events) out.push(ev);
  return out;
}

const types = (events: TurnEvent[]) => events.map((e) => e.type);

function lastError(events: TurnEvent[]): EventOf<"error"> {
  const ev = events[events.length - 1];
  assert.ok(ev && ev.type === "error", `expected an error event, got ${ev?.type}`);
  return ev;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

describe("TurnEngine construction", () => {
  test("auto-execute without a sandbox is a config error", () => {
    assert.throws(
      () => new TurnEngine({ driver: new ScriptedDriver([]) }),
      (e: unknown) => isJamError(e) && e.kind === "config_error",
    );
  });

  test("a negative continuation limit is a config error", () => {
    assert.throws(
      () => new TurnEngine({ driver: new ScriptedDriver([]), sandbox: new RecordingSandbox(), settings: { maxContinuations: -1 } }),
      (e: unknown) => isJamError(e) && e.kind === "config_error",
    );
  });

  test("init and shutdown reach the sandbox", async () => {
    const { engine, sandbox } = engineWith([]);
    await engine.init();
    assert.strictEqual(sandbox.initialized, true);
    await engine.shutdown();
    assert.strictEqual(sandbox.initialized, false);
  });
});

// ---------------------------------------------------------------------------
// Event stream
// ---------------------------------------------------------------------------

describe("TurnEngine events", () => {
  test("reasoning, narration and a call, then a continuation pass", async () => {
    const { engine } = engineWith([
      [reasoning("Think"), reasoning(" more"), narration("Setting tempo."), call("c1", "set_tempo", { bpm: 140 }), narration(" Done.")],
      [narration("Tempo is now 140.")],
    ]);
    const events = await collect(engine.runTurn("faster please"));

    assert.deepStrictEqual(types(events), [
      "reasoning_started",
      "reasoning_chunk",
      "reasoning_chunk",
      "reasoning_ended",
      "narration_started",
      "narration_chunk",
      "call_started",
      "call_requested",
      "call_resolved",
      "call_ended",
      "narration_chunk",
      "narration_ended",
      "narration_started",
      "narration_chunk",
      "narration_ended",
      "done",
    ]);

    const ended = events.filter((e): e is EventOf<"narration_ended"> => e.type === "narration_ended");
    assert.deepStrictEqual(
      ended.map((e) => [e.pass, e.text]),
      [[0, "Setting tempo. Done."], [1, "Tempo is now 140."]],
    );

    const reasoningEnded = events.find((e): e is EventOf<"reasoning_ended"> => e.type === "reasoning_ended");
    assert.strictEqual(reasoningEnded?.reasoning, "Think more");

    const requested = events.find((e): e is EventOf<"call_requested"> => e.type === "call_requested");
    assert.deepStrictEqual(requested?.args, { bpm: 140 });

    const callEnded = events.find((e): e is EventOf<"call_ended"> => e.type === "call_ended");
    assert.deepStrictEqual(callEnded && [callEnded.id, callEnded.name, callEnded.status], ["c1", "set_tempo", "success"]);

    const done = events[events.length - 1];
    assert.ok(done.type === "done");
    assert.strictEqual(done.response, "Setting tempo. Done.\n\nTempo is now 140.");
    assert.strictEqual(done.reasoning, "Think more");
    assert.strictEqual(done.continuations, 1);
    assert.strictEqual(done.calls.length, 1);
    assert.strictEqual(done.timestamp, NOW.toISOString());
    assert.strictEqual(engine.state, "done");
  });

  test("a pass with only narration needs no continuation", async () => {
    const { engine, driver } = engineWith([[narration("Hello.")]]);
    const result = await engine.chat("hi");
    assert.deepStrictEqual(result, { response: "Hello.", reasoning: "", calls: [], continuations: 0 });
    assert.strictEqual(driver.requests.length, 1);
  });

  test("requests carry the catalog and the live session state", async () => {
    const { engine, driver } = engineWith([[call("c1", "set_tempo", { bpm: 140 })], [narration("ok")]]);
    await engine.chat("faster");

    assert.strictEqual(driver.requests[0].opts?.tools?.length, 10);
    const [first, second] = driver.requests.map((r) => r.messages[0]);
    assert.strictEqual(first.role, "system");
    assert.ok(first.content.includes("**Tempo:** 120 BPM"));
    assert.ok(second.content.includes("**Tempo:** 140 BPM"));
  });

  test("continuation messages pair the calls with their results", async () => {
    const { engine, driver } = engineWith([
      [narration("On it."), call("c1", "set_tempo", { bpm: 140 }), call("c2", "launch_rocket", {})],
      [narration("Tempo set; no rockets.")],
    ]);
    await engine.chat("faster and a rocket");

    const messages = driver.requests[1].messages;
    assert.deepStrictEqual(
      messages.map((m) => m.role),
      ["system", "user", "assistant", "tool", "tool"],
    );
    assert.strictEqual(messages[2].content, "On it.");
    assert.deepStrictEqual(
      messages[2].tool_calls?.map((c) => c.id),
      ["c1", "c2"],
    );
    assert.deepStrictEqual([messages[3].tool_call_id, messages[3].name], ["c1", "set_tempo"]);
    assert.deepStrictEqual(JSON.parse(messages[3].content), {
      status: "success",
      code: "Clock.bpm = 140",
      output: "ok",
      affectedLayers: [],
    });
    assert.deepStrictEqual(JSON.parse(messages[4].content), {
      status: "error",
      error: "unknown call: launch_rocket",
      affectedLayers: [],
    });
  });

  test("set tempo, add drums, then stop everything", async () => {
    const { engine, driver, sandbox } = engineWith([
      [call("c1", "set_tempo", { bpm: 140 })],
      [narration("Tempo is 140.")],
      [call("c2", "play_drums", { player: "d1", pattern: "x-o-", description: "Backbeat" })],
      [narration("Drums in.")],
      [call("c3", "stop_all", {})],
      [narration("Silence.")],
    ]);

    await engine.chat("set the tempo to 140");
    const drums = await engine.chat("add some drums");
    assert.deepStrictEqual(drums.calls[0].result.affectedLayers, ["d1"]);
    assert.deepStrictEqual(engine.session.layerNames(), ["d1"]);

    const stop = await engine.chat("stop");
    assert.deepStrictEqual(stop.calls[0].result.affectedLayers, ["d1"]);
    assert.deepStrictEqual(engine.session.layerNames(), []);
    assert.strictEqual(engine.session.tempo, 140);

    assert.deepStrictEqual(
      sandbox.executed.map((e) => e.code),
      ["Clock.bpm = 140", 'd1 >> play("x-o-", dur=0.5, amp=0.8)', "Clock.clear()"],
    );
    assert.deepStrictEqual(
      driver.requests[4].messages.map((m) => m.role),
      ["system", "user", "assistant", "tool", "assistant", "user", "assistant", "tool", "assistant", "user"],
    );
    assert.strictEqual(engine.turns().length, 6);
    assert.strictEqual(engine.context.turnCount, 6);
  });

  test("without auto-execute calls end as code_generated", async () => {
    const driver = new ScriptedDriver([[call("c1", "set_root", { root: "A" })], [narration("Key of A.")]]);
    const engine = new TurnEngine({ driver, now, settings: { autoExecute: false } });
    const result = await engine.chat("key of A");
    assert.strictEqual(result.calls[0].result.status, "code_generated");
    assert.strictEqual(engine.session.root, "A");
  });
});

// ---------------------------------------------------------------------------
// Failure paths
// ---------------------------------------------------------------------------

describe("TurnEngine failures", () => {
  test("continuation limit ends the turn with one error and records nothing", async () => {
    const { engine } = engineWith(
      [[call("c1", "set_tempo", { bpm: 100 })], [call("c2", "set_tempo", { bpm: 110 })]],
      { settings: { maxContinuations: 1 } },
    );
    const events = await collect(engine.runTurn("keep going"));
    const err = lastError(events);
    assert.strictEqual(err.kind, "continuation_limit");
    assert.strictEqual(err.message, "Turn still issuing calls after 1 continuation pass(es)");
    assert.strictEqual(events.filter((e) => e.type === "error" || e.type === "done").length, 1);
    assert.strictEqual(engine.turns().length, 0);
    assert.strictEqual(engine.context.turnCount, 0);
    assert.strictEqual(engine.session.tempo, 110);
    assert.strictEqual(engine.state, "error");
  });

  test("a stream failure mid-reasoning emits one error and the next turn works", async () => {
    const { engine } = engineWith([[reasoning("hm"), new Error("socket hang up")], [narration("Back.")]]);
    const events = await collect(engine.runTurn("play something"));
    assert.deepStrictEqual(types(events), ["reasoning_started", "reasoning_chunk", "error"]);
    const err = lastError(events);
    assert.strictEqual(err.kind, "stream_error");
    assert.strictEqual(err.message, "socket hang up");
    assert.strictEqual(engine.turns().length, 0);
    assert.strictEqual(engine.busy, false);

    const result = await engine.chat("again");
    assert.strictEqual(result.response, "Back.");
    assert.strictEqual(engine.turns().length, 2);
  });

  test("malformed call arguments abort the turn", async () => {
    const { engine } = engineWith([
      [{ kind: "call", call: { id: "c1", type: "function", function: { name: "set_tempo", arguments: "{bpm:" } } }],
    ]);
    const events = await collect(engine.runTurn("faster"));
    assert.deepStrictEqual(types(events), ["call_started", "error"]);
    const err = lastError(events);
    assert.strictEqual(err.kind, "stream_error");
    assert.match(err.message, /^Malformed arguments for call set_tempo: /);
  });

  test("chat throws the turn's error", async () => {
    const { engine } = engineWith([[new Error("model unavailable")]]);
    await assert.rejects(engine.chat("hello"), (e: unknown) => isJamError(e) && e.message === "model unavailable");
  });
});

// ---------------------------------------------------------------------------
// Cancellation and re-entrancy
// ---------------------------------------------------------------------------

describe("TurnEngine cancellation", () => {
  test("aborting mid-stream stops events and records nothing", async () => {
    const { engine } = engineWith([[narration("a"), narration("b"), call("c1", "set_tempo", { bpm: 90 })]]);
    const controller = new AbortController();
    const events: TurnEvent[] = [];
    for await (const ev of engine.runTurn("slower", { signal: controller.signal })) {
      events.push(ev);
      if (ev.type === "narration_chunk") controller.abort();
    }
    assert.deepStrictEqual(types(events), ["narration_started", "narration_chunk"]);
    assert.strictEqual(engine.session.tempo, 120);
    assert.strictEqual(engine.turns().length, 0);
    assert.strictEqual(engine.state, "idle");
    assert.strictEqual(engine.busy, false);
  });

  test("chat on a cancelled signal throws a session error", async () => {
    const { engine } = engineWith([[narration("never")]]);
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(engine.chat("hi", { signal: controller.signal }), (e: unknown) => isJamError(e) && e.kind === "session_error");
  });

  test("a second turn while one is in flight is rejected", async () => {
    const { engine } = engineWith([[narration("x")]]);
    const first = engine.runTurn("one");
    const firstEvent = await first.next();
    assert.ok(!firstEvent.done);
    assert.strictEqual(firstEvent.value.type, "narration_started");
    assert.strictEqual(engine.busy, true);

    await assert.rejects(engine.runTurn("two").next(), (e: unknown) => isJamError(e) && e.kind === "session_error");
    await assert.rejects(engine.stopAll(), (e: unknown) => isJamError(e) && e.kind === "session_error");

    const rest = await collect({ [Symbol.asyncIterator]: () => first });
    assert.strictEqual(rest[rest.length - 1].type, "done");
    assert.strictEqual(engine.busy, false);
  });
});

// ---------------------------------------------------------------------------
// Consolidation
// ---------------------------------------------------------------------------

describe("TurnEngine consolidation", () => {
  const byLength = (text: string) => text.length;

  test("summarizes old turns and drops their messages from later requests", async () => {
    const context = new ContextManager({ maxSize: 10, consolidationThreshold: 0.5, keepRecentTurns: 2, estimator: byLength });
    const { engine, driver } = engineWith([[narration("r1")], [narration("r2")], [narration("r3")]], { context });

    await engine.chat("one");
    await engine.chat("two");
    assert.strictEqual(context.totalSize, 10);
    await engine.chat("three");

    assert.strictEqual(driver.summaryRequests.length, 1);
    assert.ok(driver.summaryRequests[0].messages[0].content.startsWith("Condense the conversation"));
    assert.strictEqual(driver.summaryRequests[0].opts?.temperature, 0.3);

    const request = driver.requests[2].messages;
    assert.deepStrictEqual(
      request.slice(1).map((m) => [m.role, m.content]),
      [["user", "two"], ["assistant", "r2"], ["user", "three"]],
    );
    assert.ok(request[0].content.includes("## Previous Conversation Summary\nSummary.\n"));
    assert.strictEqual(context.summary, "Summary.");
    assert.strictEqual(engine.turns().length, 6);
  });

  test("a failed summary request leaves the context as it was", async () => {
    const context = new ContextManager({ maxSize: 10, consolidationThreshold: 0.5, keepRecentTurns: 2, estimator: byLength });
    const driver = new ScriptedDriver([[narration("r1")], [narration("r2")], [narration("r3")]], new Error("quota"));
    const engine = new TurnEngine({ driver, sandbox: new RecordingSandbox(), context, now });

    await engine.chat("one");
    await engine.chat("two");
    const result = await engine.chat("three");
    assert.strictEqual(result.response, "r3");
    assert.strictEqual(context.summary, null);
    assert.strictEqual(context.turnCount, 6);
  });
});

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

describe("TurnEngine snapshots", () => {
  test("snapshot and restore carry session, history and outbound messages", async () => {
    const { engine } = engineWith([
      [call("c1", "play_drums", { player: "d1", pattern: "x-o-", description: "Backbeat" })],
      [narration("Drums in.")],
    ]);
    await engine.chat("add drums");
    const snap = engine.snapshot();
    assert.strictEqual(snap.version, 1);
    assert.strictEqual(snap.turns.length, 2);
    assert.strictEqual(snap.turns[1].content, "Drums in.");
    assert.strictEqual(snap.layers[0].name, "d1");

    const driver = new ScriptedDriver([[narration("Still here.")]]);
    const restored = TurnEngine.restore(snap, { driver, sandbox: new RecordingSandbox(), now });
    assert.strictEqual(restored.session.sessionId, engine.session.sessionId);
    assert.deepStrictEqual(restored.session.layerNames(), ["d1"]);
    assert.strictEqual(restored.context.turnCount, 2);

    await restored.chat("what is playing?");
    assert.deepStrictEqual(
      driver.requests[0].messages.slice(1).map((m) => [m.role, m.content]),
      [["user", "add drums"], ["assistant", "Drums in."], ["user", "what is playing?"]],
    );
  });

  test("completed turns are saved when persistence is on", async () => {
    const baseDir = mkdtempSync(join(tmpdir(), "jamloop-engine-"));
    try {
      const { engine } = engineWith([[narration("Hi.")]], { settings: { persistence: { baseDir } } });
      await engine.chat("hello");
      const saved = loadSnapshot(engine.session.sessionId, { baseDir });
      assert.strictEqual(saved?.turns.length, 2);
      assert.strictEqual(saved?.updatedAt, NOW.toISOString());
    } finally {
      rmSync(baseDir, { recursive: true, force: true });
    }
  });

  test("stopAll outside a turn silences the session", async () => {
    const { engine, sandbox } = engineWith([]);
    engine.session.upsertLayer({ name: "p1", synth: "pluck", code: "p1 >> pluck([0])", description: "Lead" });
    const record = await engine.stopAll();
    assert.strictEqual(record.result.status, "success");
    assert.deepStrictEqual(record.result.affectedLayers, ["p1"]);
    assert.deepStrictEqual(sandbox.executed.map((e) => e.code), ["Clock.clear()"]);
    assert.strictEqual(engine.currentCode().includes("p1 >>"), false);
  });

  test("clearContext drops the window but keeps history", async () => {
    const { engine, driver } = engineWith([[narration("a")], [narration("b")]]);
    await engine.chat("one");
    engine.clearContext();
    await engine.chat("two");
    assert.deepStrictEqual(
      driver.requests[1].messages.slice(1).map((m) => m.role),
      ["user"],
    );
    assert.strictEqual(engine.turns().length, 4);
    assert.strictEqual(engine.stats().historyTurns, 4);
  });
});

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

describe("TurnEngine.fromConfig", () => {
  test("builds an engine from loaded configuration with injected collaborators", async () => {
    const driver = new ScriptedDriver([[narration("Ready.")]]);
    const sandbox = new RecordingSandbox();
    const engine = TurnEngine.fromConfig(
      {
        ...defaultConfig(),
        apiKey: "test-secret",
        keepRecentTurns: 2,
        maxContinuations: 0,
        sessionPersistence: false,
      },
      { driver, sandbox, now },
    );
    assert.strictEqual(engine.context.keepRecentTurns, 2);
    const result = await engine.chat("hello");
    assert.strictEqual(result.response, "Ready.");
    assert.strictEqual(driver.requests[0].opts?.model, "gemini-2.5-flash");
    Logger.setVerbose(false);
  });
});
