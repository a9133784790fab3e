export { TurnEngine, DEFAULT_ENGINE_SETTINGS } from "./engine/turn-engine.js";
export type { EngineSettings, EngineState, EngineStats, RunTurnOptions, TurnEngineOptions } from "./engine/turn-engine.js";
export { makeEvent } from "./engine/events.js";
export type { EventOf, TurnEvent, TurnEventPayloads, TurnEventType, TurnResult } from "./engine/events.js";
export { resolveCall } from "./engine/dispatch.js";
export type { DispatchContext, PendingCall } from "./engine/dispatch.js";
export { renderSystemPrompt } from "./engine/prompts.js";

export { ContextManager } from "./context/context-manager.js";
export type { ContextManagerConfig, ContextStats } from "./context/context-manager.js";
export { approximateSize, charEstimator, DEFAULT_CHARS_PER_TOKEN } from "./context/size-estimator.js";
export type { SizeEstimator } from "./context/size-estimator.js";

export { SessionStore, newSessionId } from "./session/session-store.js";
export type {
  ExecutionRecord,
  Layer,
  LayerInput,
  LayerPatch,
  LayerState,
  PitchStep,
  SessionData,
  SessionParams,
  SessionStateView,
} from "./session/session-store.js";
export * from "./session/vocabulary.js";
export {
  cleanupOldSessions,
  defaultBaseDir,
  findLatestSession,
  listSessions,
  loadSnapshot,
  saveSnapshot,
  snapshotSchema,
} from "./session/persistence.js";
export type { PersistenceOptions, SessionListing, SessionSnapshot } from "./session/persistence.js";

export * from "./catalog/index.js";

export { McpSandbox, DEFAULT_SANDBOX_TIMEOUT_MS, DEFAULT_SANDBOX_TOOL } from "./sandbox/mcp-sandbox.js";
export type { McpSandboxOptions } from "./sandbox/mcp-sandbox.js";
export { extractAffectedLayers } from "./sandbox/types.js";
export type { ExecutionResult, ExecutionSandbox } from "./sandbox/types.js";

export { makeDriver, makeGoogleDriver } from "./drivers/index.js";
export type {
  ChatDriver,
  ChatMessage,
  ChatRole,
  ChatToolCall,
  GoogleDriverConfig,
  ModelDelta,
  StreamOptions,
  TokenUsage,
} from "./drivers/index.js";

export { loadConfig, defaultConfig, DEFAULT_BASE_URL, DEFAULT_MODEL } from "./config.js";
export type { Env, LoadConfigOptions } from "./config.js";
export { jamError, asError, isJamError, toJamError, errorLogFields } from "./errors.js";
export type { JamError, JamErrorKind, JamErrorOptions } from "./errors.js";
export { Logger, C } from "./logger.js";
export type { LogLevel, LogSink } from "./logger.js";
export type { CallRecord, CallResult, CallStatus, ConversationTurn, JamConfig, SandboxConfig, TurnRole } from "./jam-types.js";
