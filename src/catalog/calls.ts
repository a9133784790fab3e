import { z } from "zod";
import { jamError } from "../errors.js";
import {
  ALL_LAYER_NAMES,
  DRUM_LAYER_NAMES,
  ROOTS,
  SCALES,
  TONAL_LAYER_NAMES,
} from "../session/vocabulary.js";
import { defineCall } from "./define.js";
import {
  ampSchema,
  durSchema,
  effectsSchema,
  formatEffects,
  formatNotes,
  notesSchema,
  octSchema,
  patternSchema,
  synthSchema,
  unknownEffects,
} from "./notes.js";
import type { JsonSchema } from "./types.js";

export const SYNTH_DEFAULTS = { dur: "1", amp: 0.7, oct: 5 } as const;
export const DRUM_DEFAULTS = { dur: "0.5", amp: 0.8 } as const;

export const MIN_BPM = 40;
export const MAX_BPM = 200;

const num = (description?: string): JsonSchema => ({ type: "number", ...(description ? { description } : {}) });
const int = (description?: string): JsonSchema => ({ type: "integer", ...(description ? { description } : {}) });
const str = (description: string, values?: readonly string[]): JsonSchema => ({
  type: "string",
  description,
  ...(values ? { enum: values } : {}),
});

const TONAL_EFFECTS: Record<string, JsonSchema> = {
  room: num("Reverb amount (0-1)"),
  lpf: int("Low-pass cutoff in Hz"),
  hpf: int("High-pass cutoff in Hz"),
  vib: num("Vibrato depth"),
  slide: num("Pitch slide"),
  chop: int("Number of slices per note"),
  pan: num("Stereo position (-1 to 1)"),
};

const DRUM_EFFECTS: Record<string, JsonSchema> = {
  room: num(),
  sample: int("Sample variation index"),
  rate: num("Playback rate"),
  pan: num(),
  lpf: int(),
  coarse: int("Bit-crush amount"),
};

const ANY_EFFECTS: Record<string, JsonSchema> = { ...TONAL_EFFECTS, ...DRUM_EFFECTS };

const TONAL_EFFECT_NAMES = Object.keys(TONAL_EFFECTS);
const DRUM_EFFECT_NAMES = Object.keys(DRUM_EFFECTS);

// --- emit layers ---

const playSynthArgs = z.object({
  player: z.enum(TONAL_LAYER_NAMES),
  synth: synthSchema,
  notes: notesSchema,
  dur: durSchema.optional(),
  amp: ampSchema.optional(),
  oct: octSchema.optional(),
  description: z.string().min(1),
  effects: effectsSchema(TONAL_EFFECT_NAMES).optional(),
});

export const playSynth = defineCall({
  name: "play_synth",
  description:
    "Start (or replace) a melodic layer: melodies, bass lines, chords and pads. " +
    "Notes are scale degrees; group degrees in parentheses for a chord.",
  parameters: {
    type: "object",
    properties: {
      player: str("Layer slot: p1-p9 melody, b1-b4 bass, pad1-pad3 pads", TONAL_LAYER_NAMES),
      synth: str("Synth name, e.g. pluck, bass, keys, piano, pads, blip, saw"),
      notes: str("Degrees as a list literal, e.g. '[0, 2, 4, 7]' or '[(0,2,4), 1, 2]'"),
      dur: str("Duration pattern, e.g. '1', '[1, 0.5, 0.5]', '1/4'"),
      amp: num("Volume (0.0 to 1.0)"),
      oct: int("Octave (3-7, default 5)"),
      description: str("Short human-readable description of the layer"),
      effects: { type: "object", description: "Optional effects", properties: TONAL_EFFECTS },
    },
    required: ["player", "synth", "notes", "description"],
  },
  schema: playSynthArgs,
  build(args) {
    const params = [
      formatNotes(args.notes),
      `dur=${args.dur ?? SYNTH_DEFAULTS.dur}`,
      `amp=${args.amp ?? SYNTH_DEFAULTS.amp}`,
      `oct=${args.oct ?? SYNTH_DEFAULTS.oct}`,
      ...formatEffects(args.effects ?? {}),
    ];
    return `${args.player} >> ${args.synth}(${params.join(", ")})`;
  },
  mutate(session, args, code) {
    session.upsertLayer({
      name: args.player,
      synth: args.synth,
      code,
      description: args.description,
      notes: args.notes,
      dur: args.dur ?? SYNTH_DEFAULTS.dur,
      amp: args.amp ?? SYNTH_DEFAULTS.amp,
      oct: args.oct ?? SYNTH_DEFAULTS.oct,
      effects: args.effects,
    });
    return [args.player];
  },
});

const playDrumsArgs = z.object({
  player: z.enum(DRUM_LAYER_NAMES),
  pattern: patternSchema,
  dur: durSchema.optional(),
  amp: ampSchema.optional(),
  description: z.string().min(1),
  effects: effectsSchema(DRUM_EFFECT_NAMES).optional(),
});

export const playDrums = defineCall({
  name: "play_drums",
  description:
    "Start (or replace) a percussion layer from a sample pattern. " +
    "'x' kick, 'o' snare, '-' hi-hat, '*' clap; [] subdivides, () alternates, {} picks at random.",
  parameters: {
    type: "object",
    properties: {
      player: str("Drum slot (d1-d9)", DRUM_LAYER_NAMES),
      pattern: str("Sample pattern, e.g. 'x-o-x-o-'"),
      dur: str("Duration pattern, e.g. '0.5' or '[1, 0.5]'"),
      amp: num("Volume (0.0 to 1.0)"),
      description: str("Short human-readable description of the pattern"),
      effects: { type: "object", description: "Optional effects", properties: DRUM_EFFECTS },
    },
    required: ["player", "pattern", "description"],
  },
  schema: playDrumsArgs,
  build(args) {
    const params = [
      `"${args.pattern}"`,
      `dur=${args.dur ?? DRUM_DEFAULTS.dur}`,
      `amp=${args.amp ?? DRUM_DEFAULTS.amp}`,
      ...formatEffects(args.effects ?? {}),
    ];
    return `${args.player} >> play(${params.join(", ")})`;
  },
  mutate(session, args, code) {
    session.upsertLayer({
      name: args.player,
      synth: "play",
      code,
      description: args.description,
      pattern: args.pattern,
      dur: args.dur ?? DRUM_DEFAULTS.dur,
      amp: args.amp ?? DRUM_DEFAULTS.amp,
      effects: args.effects,
    });
    return [args.player];
  },
});

// --- global parameters ---

export const setTempo = defineCall({
  name: "set_tempo",
  description:
    `Set the tempo in BPM (${MIN_BPM}-${MAX_BPM}). Rough guide: ambient 60-90, hip-hop 85-115, ` +
    "house 120-130, techno 125-150, drum & bass 160-180.",
  parameters: {
    type: "object",
    properties: { bpm: int(`Beats per minute (${MIN_BPM}-${MAX_BPM})`) },
    required: ["bpm"],
  },
  schema: z.object({ bpm: z.number().int().min(MIN_BPM).max(MAX_BPM) }),
  build: (args) => `Clock.bpm = ${args.bpm}`,
  mutate(session, args) {
    session.setTempo(args.bpm);
    return [];
  },
});

export const setScale = defineCall({
  name: "set_scale",
  description: "Set the scale every tonal layer plays in.",
  parameters: {
    type: "object",
    properties: { scale: str("Scale name", SCALES) },
    required: ["scale"],
  },
  schema: z.object({ scale: z.enum(SCALES) }),
  build: (args) => `Scale.default = Scale.${args.scale}`,
  mutate(session, args) {
    session.setScale(args.scale);
    return [];
  },
});

export const setRoot = defineCall({
  name: "set_root",
  description: "Set the root note (key) for every tonal layer.",
  parameters: {
    type: "object",
    properties: { root: str("Root pitch class", ROOTS) },
    required: ["root"],
  },
  schema: z.object({ root: z.enum(ROOTS) }),
  build: (args) => `Root.default = "${args.root}"`,
  mutate(session, args) {
    session.setRoot(args.root);
    return [];
  },
});

// --- stopping ---

export const stopPlayer = defineCall({
  name: "stop_player",
  description: "Stop one layer.",
  parameters: {
    type: "object",
    properties: { player: str("Layer to stop (p1-p9, d1-d9, b1-b4, pad1-pad3)", ALL_LAYER_NAMES) },
    required: ["player"],
  },
  schema: z.object({ player: z.enum(ALL_LAYER_NAMES) }),
  build: (args) => `${args.player}.stop()`,
  mutate(session, args) {
    session.removeLayer(args.player);
    return [args.player];
  },
});

export const stopAll = defineCall({
  name: "stop_all",
  description: "Stop every layer. Use when the user asks for silence or a fresh start.",
  parameters: { type: "object", properties: {}, required: [] },
  schema: z.object({}),
  build: () => "Clock.clear()",
  mutate: (session) => session.clearAll(),
});

// --- editing ---

const modifyLayerArgs = z.object({
  player: z.enum(ALL_LAYER_NAMES),
  amp: ampSchema.optional(),
  oct: octSchema.optional(),
  effects: effectsSchema(Object.keys(ANY_EFFECTS)).optional(),
});

export const modifyLayer = defineCall({
  name: "modify_layer",
  description: "Change volume, octave or effects of a playing layer while keeping its notes or pattern.",
  parameters: {
    type: "object",
    properties: {
      player: str("Layer to change", ALL_LAYER_NAMES),
      amp: num("New volume"),
      oct: int("New octave"),
      effects: { type: "object", description: "Effects to add or change", properties: ANY_EFFECTS },
    },
    required: ["player"],
  },
  schema: modifyLayerArgs,
  build(args, session) {
    const layer = session.getLayer(args.player);
    if (!layer) {
      throw jamError("code_build_error", `Layer ${args.player} is not playing`, { call: "modify_layer" });
    }
    const allowed = layer.synth === "play" ? DRUM_EFFECT_NAMES : TONAL_EFFECT_NAMES;
    const misplaced = unknownEffects(args.effects ?? {}, allowed);
    if (misplaced.length > 0) {
      throw jamError(
        "code_build_error",
        `Effects ${misplaced.join(", ")} do not apply to ${args.player}; expected one of ${allowed.join(", ")}`,
        { call: "modify_layer" },
      );
    }
    const amp = args.amp ?? layer.amp;
    const oct = args.oct ?? layer.oct;
    const effects = { ...layer.effects, ...(args.effects ?? {}) };

    const params = [layer.synth === "play" ? `"${layer.pattern ?? ""}"` : formatNotes(layer.notes ?? [])];
    if (layer.dur) params.push(`dur=${layer.dur}`);
    if (amp !== undefined) params.push(`amp=${amp}`);
    if (oct !== undefined) params.push(`oct=${oct}`);
    params.push(...formatEffects(effects));
    return `${args.player} >> ${layer.synth}(${params.join(", ")})`;
  },
  mutate(session, args, code) {
    const layer = session.getLayer(args.player);
    if (!layer) return [];
    session.updateLayer(args.player, {
      code,
      amp: args.amp ?? layer.amp,
      oct: args.oct ?? layer.oct,
      effects: { ...layer.effects, ...(args.effects ?? {}) },
    });
    return [args.player];
  },
});

// --- passthrough and introspection ---

export const executeCode = defineCall({
  name: "execute_code",
  description: "Run raw live-coding code for patterns the other calls cannot express.",
  parameters: {
    type: "object",
    properties: {
      code: str("Code to run"),
      description: str("What the code does"),
    },
    required: ["code", "description"],
  },
  schema: z.object({ code: z.string().min(1), description: z.string() }),
  build: (args) => args.code,
  mutate: () => [],
});

export const getSessionState = defineCall({
  name: "get_session_state",
  description: "Read the current session: tempo, scale, root and every playing layer.",
  parameters: { type: "object", properties: {}, required: [] },
  schema: z.object({}),
  build: () => null,
  mutate: () => [],
});
