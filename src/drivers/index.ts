import type { JamConfig } from "../jam-types.js";
import { makeGoogleDriver } from "./streaming-google.js";
import type { ChatDriver } from "./types.js";

export type { ChatDriver, ChatMessage, ChatRole, ChatToolCall, ModelDelta, StreamOptions, TokenUsage } from "./types.js";
export { makeGoogleDriver } from "./streaming-google.js";
export type { GoogleDriverConfig } from "./streaming-google.js";

/** Driver for a loaded configuration. */
export function makeDriver(cfg: Pick<JamConfig, "apiKey" | "model" | "baseUrl" | "requestTimeoutMs">): ChatDriver {
  return makeGoogleDriver({
    baseUrl: cfg.baseUrl,
    model: cfg.model,
    apiKey: cfg.apiKey,
    timeoutMs: cfg.requestTimeoutMs,
  });
}
