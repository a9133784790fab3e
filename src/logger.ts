export const C = {
  reset: "\x1b[0m",
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
};

export type LogLevel = "info" | "warn" | "error" | "debug" | "telemetry";

export type LogSink = (level: LogLevel, args: unknown[]) => void;

const TINT: Partial<Record<LogLevel, (s: string) => string>> = {
  warn: C.yellow,
  error: C.red,
  debug: C.gray,
  telemetry: C.gray,
};

const consoleSink: LogSink = (level, args) => {
  const tint = process.stdout.isTTY ? TINT[level] : undefined;
  const out = tint ? args.map((a) => (typeof a === "string" ? tint(a) : a)) : args;
  if (level === "warn") console.warn(...out);
  else if (level === "error") console.error(...out);
  else console.log(...out);
};

export class Logger {
  private static _verbose = false;
  private static _sink: LogSink = consoleSink;

  static setVerbose(v: boolean) { Logger._verbose = v; }
  static isVerbose() { return Logger._verbose; }

  /** Redirect output (tests, front ends that own the terminal). Pass null to restore console output. */
  static setSink(sink: LogSink | null) { Logger._sink = sink ?? consoleSink; }

  static info(...args: unknown[]) { Logger._sink("info", args); }
  static warn(...args: unknown[]) { Logger._sink("warn", args); }
  static error(...args: unknown[]) { Logger._sink("error", args); }

  static debug(...args: unknown[]) {
    // Debug requires BOTH verbose mode AND JAMLOOP_LOG_LEVEL=DEBUG
    const debugLevel = (process.env.JAMLOOP_LOG_LEVEL ?? "").toUpperCase() === "DEBUG";
    if (Logger._verbose && debugLevel) Logger._sink("debug", args);
  }

  /** Request/response sizes, consolidation, dispatch traces. Verbose only. */
  static telemetry(...args: unknown[]) {
    if (Logger._verbose) Logger._sink("telemetry", args);
  }
}
