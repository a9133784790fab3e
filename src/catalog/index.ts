import {
  executeCode,
  getSessionState,
  modifyLayer,
  playDrums,
  playSynth,
  setRoot,
  setScale,
  setTempo,
  stopAll,
  stopPlayer,
} from "./calls.js";
import { CALL_NAMES, type CallName, type CatalogEntry, type ToolDefinition } from "./types.js";

export type { CallName, CatalogEntry, CodeBuilder, JsonSchema, PreparedCall, SessionMutation, ToolDefinition } from "./types.js";
export { CALL_NAMES } from "./types.js";
export { DRUM_DEFAULTS, MAX_BPM, MIN_BPM, SYNTH_DEFAULTS } from "./calls.js";
export { formatNotes, parseNotes } from "./notes.js";

/** Every call the model may issue, keyed by wire name. */
export const CATALOG: Readonly<Record<CallName, CatalogEntry>> = {
  play_synth: playSynth,
  play_drums: playDrums,
  set_tempo: setTempo,
  set_scale: setScale,
  set_root: setRoot,
  stop_player: stopPlayer,
  stop_all: stopAll,
  modify_layer: modifyLayer,
  execute_code: executeCode,
  get_session_state: getSessionState,
};

const NAME_SET: ReadonlySet<string> = new Set(CALL_NAMES);

export function isCallName(name: string): name is CallName {
  return NAME_SET.has(name);
}

export function lookupCall(name: string): CatalogEntry | undefined {
  return isCallName(name) ? CATALOG[name] : undefined;
}

/** Declarations in catalog order, as sent to the model. */
export function toolDefinitions(): ToolDefinition[] {
  return CALL_NAMES.map((name) => CATALOG[name].declaration);
}
