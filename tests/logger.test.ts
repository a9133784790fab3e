/**
 * Tests for Logger sink routing and verbosity gates.
 */

import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { Logger } from "../src/logger.js";
import type { LogLevel } from "../src/logger.js";

type Entry = { level: LogLevel; args: unknown[] };

let entries: Entry[] = [];
let savedLevel: string | undefined;

beforeEach(() => {
  entries = [];
  savedLevel = process.env.JAMLOOP_LOG_LEVEL;
  Logger.setSink((level, args) => entries.push({ level, args }));
  Logger.setVerbose(false);
});

afterEach(() => {
  Logger.setSink(null);
  Logger.setVerbose(false);
  if (savedLevel === undefined) delete process.env.JAMLOOP_LOG_LEVEL;
  else process.env.JAMLOOP_LOG_LEVEL = savedLevel;
});

describe("Logger", () => {
  test("info, warn and error always reach the sink", () => {
    Logger.info("a");
    Logger.warn("b", 1);
    Logger.error("c");
    assert.deepStrictEqual(entries, [
      { level: "info", args: ["a"] },
      { level: "warn", args: ["b", 1] },
      { level: "error", args: ["c"] },
    ]);
  });

  test("telemetry is dropped unless verbose", () => {
    Logger.telemetry("quiet");
    assert.strictEqual(entries.length, 0);
    Logger.setVerbose(true);
    Logger.telemetry("loud");
    assert.deepStrictEqual(entries, [{ level: "telemetry", args: ["loud"] }]);
  });

  test("debug needs verbose and JAMLOOP_LOG_LEVEL=DEBUG", () => {
    process.env.JAMLOOP_LOG_LEVEL = "debug";
    Logger.debug("not verbose");
    assert.strictEqual(entries.length, 0);

    Logger.setVerbose(true);
    delete process.env.JAMLOOP_LOG_LEVEL;
    Logger.debug("no level");
    assert.strictEqual(entries.length, 0);

    process.env.JAMLOOP_LOG_LEVEL = "debug";
    Logger.debug("both");
    assert.deepStrictEqual(entries, [{ level: "debug", args: ["both"] }]);
  });

  test("isVerbose reflects setVerbose", () => {
    assert.strictEqual(Logger.isVerbose(), false);
    Logger.setVerbose(true);
    assert.strictEqual(Logger.isVerbose(), true);
  });
});
