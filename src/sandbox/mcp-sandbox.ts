/**
 * Execution sandbox backed by an MCP server. Generated code is forwarded to a
 * single tool (default `execute_code`) that owns the live runtime; the tool's
 * text content is the runtime output and `isError` marks rejected code.
 */
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { asError, errorLogFields, jamError } from "../errors.js";
import type { SandboxConfig } from "../jam-types.js";
import { Logger } from "../logger.js";
import { extractAffectedLayers, type ExecutionResult, type ExecutionSandbox } from "./types.js";

export const DEFAULT_SANDBOX_TOOL = "execute_code";
export const DEFAULT_SANDBOX_TIMEOUT_MS = 30_000;

export interface McpSandboxOptions {
  config: SandboxConfig;
  /** Supplies the transport instead of spawning `config.command` over stdio. */
  transportFactory?: () => Transport;
}

export class McpSandbox implements ExecutionSandbox {
  private client: Client | null = null;
  private readonly config: SandboxConfig;
  private readonly transportFactory: () => Transport;

  constructor(opts: McpSandboxOptions) {
    this.config = opts.config;
    this.transportFactory = opts.transportFactory ?? (() => this.stdioTransport());
  }

  private stdioTransport(): Transport {
    return new StdioClientTransport({
      command: this.config.command,
      args: this.config.args,
      env: { ...getDefaultEnvironment(), ...this.config.env },
      cwd: this.config.cwd,
      stderr: "pipe",
    });
  }

  get connected(): boolean {
    return this.client !== null;
  }

  async init(): Promise<void> {
    if (this.client) return;
    const client = new Client({ name: "jamloop", version: "0.1.0" }, { capabilities: {} });
    try {
      await client.connect(this.transportFactory());
      const { tools } = await client.listTools();
      if (!tools.some((t) => t.name === this.config.tool)) {
        throw new Error(`server does not provide tool "${this.config.tool}"`);
      }
    } catch (e: unknown) {
      await client.close().catch((closeErr: unknown) => Logger.debug(`MCP sandbox close error: ${asError(closeErr).message}`));
      const je = jamError("sandbox_error", `MCP sandbox failed to start: ${asError(e).message}`, { retryable: true, cause: e });
      Logger.error(je.message, errorLogFields(je));
      throw je;
    }
    this.client = client;
    Logger.debug(`MCP sandbox ready (tool: ${this.config.tool})`);
  }

  async execute(code: string, description?: string): Promise<ExecutionResult> {
    if (!this.client) {
      throw jamError("sandbox_error", "MCP sandbox is not initialized", { call: this.config.tool });
    }
    const affected = extractAffectedLayers(code);
    const started = Date.now();

    let raw: unknown;
    try {
      raw = await this.client.callTool(
        { name: this.config.tool, arguments: { code, description: description ?? "" } },
        undefined,
        { timeout: this.config.timeoutMs },
      );
    } catch (e: unknown) {
      throw jamError("sandbox_error", `MCP tool "${this.config.tool}" failed: ${asError(e).message}`, {
        call: this.config.tool,
        retryable: true,
        latency_ms: Date.now() - started,
        cause: e,
      });
    }

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw jamError("sandbox_error", `MCP tool "${this.config.tool}" returned an unrecognized result`, {
        call: this.config.tool,
        cause: parsed.error,
      });
    }

    const text = parsed.data.content
      .map((c) => (c.type === "text" ? c.text : ""))
      .filter(Boolean)
      .join("\n");
    const durationMs = Date.now() - started;

    if (parsed.data.isError) {
      Logger.warn(`Sandbox rejected code (${durationMs}ms): ${text.slice(0, 200)}`);
      return { success: false, output: "", error: text || "execution failed", affectedLayers: affected, durationMs };
    }
    Logger.telemetry(`[sandbox] ${affected.length ? affected.join(",") : "global"} ok in ${durationMs}ms`);
    return { success: true, output: text, affectedLayers: affected, durationMs };
  }

  async shutdown(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    try {
      await client.close();
    } catch (e: unknown) {
      Logger.debug(`MCP sandbox close error: ${asError(e).message}`);
    }
  }
}
