/**
 * Configuration loading. Layers, lowest precedence first: built-in defaults,
 * the JSON config file, JAMLOOP_* environment variables, explicit overrides.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { formatIssues } from "./catalog/define.js";
import { asError, errorLogFields, jamError } from "./errors.js";
import type { JamConfig, SandboxConfig } from "./jam-types.js";
import { Logger } from "./logger.js";
import { DEFAULT_SANDBOX_TIMEOUT_MS, DEFAULT_SANDBOX_TOOL } from "./sandbox/mcp-sandbox.js";

export const DEFAULT_MODEL = "gemini-2.5-flash";
export const DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com";

export type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  env?: Env;
  overrides?: Partial<JamConfig>;
  /** Explicit config file; it must exist. Defaults to ~/.jamloop/config.json when present. */
  configPath?: string;
}

const sandboxSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
  tool: z.string().min(1),
  timeoutMs: z.number().int().positive(),
});

const configSchema = z.object({
  apiKey: z.string().min(1, "missing API key (set JAMLOOP_API_KEY or GOOGLE_API_KEY)"),
  model: z.string().min(1, "missing model id"),
  baseUrl: z.string().url(),
  autoExecute: z.boolean(),
  includeThoughts: z.boolean(),
  thinkingBudget: z.number().int().min(-1),
  temperature: z.number().min(0).max(2),
  summaryTemperature: z.number().min(0).max(2),
  maxContextSize: z.number().int().positive(),
  consolidationThreshold: z.number().gt(0).max(1),
  keepRecentTurns: z.number().int().min(0),
  maxContinuations: z.number().int().min(0),
  requestTimeoutMs: z.number().int().positive(),
  sandbox: sandboxSchema.nullable(),
  sessionDir: z.string().min(1),
  sessionPersistence: z.boolean(),
  verbose: z.boolean(),
});

const fileSchema = configSchema
  .omit({ sandbox: true })
  .partial()
  .extend({ sandbox: sandboxSchema.partial().nullable().optional() })
  .strict();

type FileConfig = z.infer<typeof fileSchema>;

export function defaultConfig(): Omit<JamConfig, "apiKey"> {
  return {
    model: DEFAULT_MODEL,
    baseUrl: DEFAULT_BASE_URL,
    autoExecute: true,
    includeThoughts: true,
    thinkingBudget: -1,
    temperature: 0.7,
    summaryTemperature: 0.3,
    maxContextSize: 100_000,
    consolidationThreshold: 0.7,
    keepRecentTurns: 5,
    maxContinuations: 5,
    requestTimeoutMs: 5 * 60 * 1000,
    sandbox: null,
    sessionDir: join(homedir(), ".jamloop"),
    sessionPersistence: true,
    verbose: false,
  };
}

function readConfigFile(configPath: string | undefined): FileConfig {
  const path = configPath ?? join(homedir(), ".jamloop", "config.json");
  if (!existsSync(path)) {
    if (configPath) throw jamError("config_error", `Config file not found: ${configPath}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e: unknown) {
    throw jamError("config_error", `Failed to parse config ${path}: ${asError(e).message}`, { cause: e });
  }
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw jamError("config_error", `Invalid config ${path}: ${formatIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}

const TRUE_RE = /^(1|true|yes|on)$/i;
const FALSE_RE = /^(0|false|no|off)$/i;

function envString(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

function envBool(env: Env, name: string): boolean | undefined {
  const v = envString(env, name);
  if (v === undefined) return undefined;
  if (TRUE_RE.test(v)) return true;
  if (FALSE_RE.test(v)) return false;
  throw jamError("config_error", `${name} must be a boolean, got "${v}"`);
}

function envNumber(env: Env, name: string): number | undefined {
  const v = envString(env, name);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) throw jamError("config_error", `${name} must be a number, got "${v}"`);
  return n;
}

/** "a b c" or a JSON array of strings. */
function envArgs(env: Env, name: string): string[] | undefined {
  const v = envString(env, name);
  if (v === undefined) return undefined;
  if (!v.startsWith("[")) return v.split(/\s+/);
  let parsed: unknown;
  try {
    parsed = JSON.parse(v);
  } catch (e: unknown) {
    throw jamError("config_error", `${name} is not valid JSON: ${asError(e).message}`, { cause: e });
  }
  const args = z.array(z.string()).safeParse(parsed);
  if (!args.success) throw jamError("config_error", `${name} must be an array of strings`);
  return args.data;
}

function fromEnv(env: Env): { config: Partial<Omit<JamConfig, "sandbox">>; sandbox: Partial<SandboxConfig> } {
  const entries: Partial<Omit<JamConfig, "sandbox">> = {
    apiKey: envString(env, "JAMLOOP_API_KEY") ?? envString(env, "GOOGLE_API_KEY"),
    model: envString(env, "JAMLOOP_MODEL"),
    baseUrl: envString(env, "JAMLOOP_BASE_URL"),
    autoExecute: envBool(env, "JAMLOOP_AUTO_EXECUTE"),
    maxContextSize: envNumber(env, "JAMLOOP_MAX_CONTEXT"),
    keepRecentTurns: envNumber(env, "JAMLOOP_KEEP_RECENT"),
    maxContinuations: envNumber(env, "JAMLOOP_MAX_CONTINUATIONS"),
    sessionDir: envString(env, "JAMLOOP_SESSION_DIR"),
    sessionPersistence: envBool(env, "JAMLOOP_SESSION_PERSISTENCE"),
    verbose: envBool(env, "JAMLOOP_VERBOSE"),
  };
  const sandbox: Partial<SandboxConfig> = {
    command: envString(env, "JAMLOOP_SANDBOX_COMMAND"),
    args: envArgs(env, "JAMLOOP_SANDBOX_ARGS"),
    tool: envString(env, "JAMLOOP_SANDBOX_TOOL"),
  };
  return { config: definedOnly(entries), sandbox: definedOnly(sandbox) };
}

function definedOnly<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj)) {
    if (!isKeyOf(obj, key)) continue;
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

/**
 * Resolve the runtime configuration. Throws a config_error for a missing API
 * key or any invalid value.
 */
export function loadConfig(opts: LoadConfigOptions = {}): JamConfig {
  const env = opts.env ?? process.env;
  const file = readConfigFile(opts.configPath);
  const fromEnvironment = fromEnv(env);
  const { sandbox: fileSandbox, ...fileRest } = file;

  let sandbox: Partial<SandboxConfig> | null = null;
  if (fileSandbox || Object.keys(fromEnvironment.sandbox).length > 0) {
    sandbox = {
      args: [],
      tool: DEFAULT_SANDBOX_TOOL,
      timeoutMs: DEFAULT_SANDBOX_TIMEOUT_MS,
      ...(fileSandbox ?? {}),
      ...fromEnvironment.sandbox,
    };
  }

  const merged = {
    apiKey: "",
    ...defaultConfig(),
    ...fileRest,
    ...fromEnvironment.config,
    sandbox,
    ...definedOnly(opts.overrides ?? {}),
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const je = jamError("config_error", `Invalid configuration: ${formatIssues(parsed.error)}`, { cause: parsed.error });
    Logger.debug("Config validation failed", errorLogFields(je));
    throw je;
  }
  return parsed.data;
}
