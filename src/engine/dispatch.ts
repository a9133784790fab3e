import { lookupCall } from "../catalog/index.js";
import { errorLogFields, jamError, toJamError } from "../errors.js";
import type { CallRecord, CallResult } from "../jam-types.js";
import { Logger } from "../logger.js";
import type { ExecutionSandbox } from "../sandbox/types.js";
import type { SessionStore } from "../session/session-store.js";

export interface DispatchContext {
  session: SessionStore;
  /** Null or absent when execution is disabled. */
  sandbox?: ExecutionSandbox | null;
  autoExecute: boolean;
}

export interface PendingCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

const NOT_EXECUTED = "Code generated but not executed";

function failed(call: PendingCall, error: string): CallRecord {
  return { ...call, result: { status: "error", error, affectedLayers: [] } };
}

function union(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])];
}

/**
 * Resolve one call into exactly one CallRecord. Per-call failures are folded
 * into the record; this never throws.
 *
 * The session mutation runs synchronously before the sandbox is awaited, so
 * an abandoned turn never leaves a call half-applied.
 */
export async function resolveCall(call: PendingCall, ctx: DispatchContext): Promise<CallRecord> {
  const entry = lookupCall(call.name);
  if (!entry) {
    const je = jamError("unknown_call", `unknown call: ${call.name}`, { call: call.name });
    Logger.warn(je.message, errorLogFields(je));
    return failed(call, je.message);
  }

  const prepared = entry.prepare(call.args, ctx.session);
  if (!prepared.ok) {
    const je = jamError("code_build_error", `${call.name}: ${prepared.error}`, { call: call.name });
    Logger.warn(je.message);
    return failed(call, je.message);
  }

  if (prepared.code === null) {
    return { ...call, result: { status: "success", state: ctx.session.describe(), affectedLayers: [] } };
  }

  const code = prepared.code;
  const mutated = prepared.apply();
  Logger.telemetry(`[dispatch] ${call.name} → ${mutated.length ? mutated.join(",") : "global"}`);

  if (!ctx.autoExecute || !ctx.sandbox) {
    return { ...call, result: { status: "code_generated", code, output: NOT_EXECUTED, affectedLayers: mutated } };
  }

  const description = typeof call.args.description === "string" ? call.args.description : undefined;
  let result: CallResult;
  try {
    const exec = await ctx.sandbox.execute(code, description);
    ctx.session.recordExecution(code, exec.success, exec.success ? exec.output : exec.error ?? exec.output);
    result = {
      status: exec.success ? "success" : "error",
      code,
      output: exec.output,
      affectedLayers: union(mutated, exec.affectedLayers),
    };
    if (exec.error) result.error = exec.error;
  } catch (e: unknown) {
    const je = toJamError("sandbox_error", e);
    Logger.error(`Sandbox failed on ${call.name}:`, errorLogFields(je));
    ctx.session.recordExecution(code, false, je.message);
    result = { status: "error", code, output: "", error: je.message, affectedLayers: mutated };
  }
  return { ...call, result };
}
