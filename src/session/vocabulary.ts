/**
 * Fixed vocabulary shared by the session store and the call catalog:
 * the player namespace (partitioned by role), scales and root notes.
 */

export const PLAYER_NAMESPACE = {
  melodic: ["p1", "p2", "p3", "p4", "p5", "p6", "p7", "p8", "p9"],
  percussive: ["d1", "d2", "d3", "d4", "d5", "d6", "d7", "d8", "d9"],
  bass: ["b1", "b2", "b3", "b4"],
  pad: ["pad1", "pad2", "pad3"],
} as const;

export type LayerRole = keyof typeof PLAYER_NAMESPACE;
export type LayerName = (typeof PLAYER_NAMESPACE)[LayerRole][number];

export const LAYER_ROLES: readonly LayerRole[] = ["melodic", "percussive", "bass", "pad"];

/** Every player name, in declaration order (melodic, percussive, bass, pad). */
export const ALL_LAYER_NAMES = [
  ...PLAYER_NAMESPACE.melodic,
  ...PLAYER_NAMESPACE.percussive,
  ...PLAYER_NAMESPACE.bass,
  ...PLAYER_NAMESPACE.pad,
] as const;

/** Names a melodic synth may play on: melody, bass and pad slots. */
export const TONAL_LAYER_NAMES = [
  ...PLAYER_NAMESPACE.melodic,
  ...PLAYER_NAMESPACE.bass,
  ...PLAYER_NAMESPACE.pad,
] as const;

export const DRUM_LAYER_NAMES = PLAYER_NAMESPACE.percussive;

const NAME_SET: ReadonlySet<string> = new Set(ALL_LAYER_NAMES);

export function isLayerName(name: string): name is LayerName {
  return NAME_SET.has(name);
}

export function roleOf(name: LayerName): LayerRole {
  for (const role of LAYER_ROLES) {
    const names: readonly string[] = PLAYER_NAMESPACE[role];
    if (names.includes(name)) return role;
  }
  throw new Error(`Unreachable: ${name} is not in the player namespace`);
}

export const SCALES = [
  "major", "minor", "dorian", "phrygian", "lydian", "mixolydian",
  "locrian", "pentatonic", "minorPentatonic", "blues", "harmonicMinor",
  "melodicMinor", "whole", "chromatic", "egyptian", "japanese", "chinese",
] as const;

export type ScaleName = (typeof SCALES)[number];

export const ROOTS = [
  "C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B",
  "Db", "Eb", "Gb", "Ab", "Bb",
] as const;

export type RootName = (typeof ROOTS)[number];

export const DEFAULT_TEMPO = 120;
export const DEFAULT_SCALE: ScaleName = "major";
export const DEFAULT_ROOT: RootName = "C";
