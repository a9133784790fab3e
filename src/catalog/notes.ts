import { z } from "zod";
import type { PitchStep } from "../session/session-store.js";

const pitchStep = z.union([z.number(), z.array(z.number()).min(1)]);
const pitchSequence = z.array(pitchStep).min(1);

const DUR_RE = /^[0-9\s.,/[\]()]+$/;
const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const PATTERN_RE = /^[^"\\\n\r]+$/;

const TRAILING_COMMA_RE = /,\s*([\])])/g;

/**
 * Parse a pitch sequence written as a list literal. Parentheses group a chord:
 * "[0, 2, (0, 2, 4)]" gives [0, 2, [0, 2, 4]], and a bare "(0, 2, 4)" is a
 * single chord step. A bare number is a one-step sequence. Trailing commas
 * are allowed.
 */
export function parseNotes(src: string): PitchStep[] | null {
  const trimmed = src.trim();
  const normalized = trimmed.replace(TRAILING_COMMA_RE, "$1").replace(/\(/g, "[").replace(/\)/g, "]");
  let raw: unknown;
  try {
    raw = JSON.parse(normalized);
  } catch {
    return null;
  }
  if (typeof raw === "number") raw = [raw];
  else if (trimmed.startsWith("(")) raw = [raw];
  const parsed = pitchSequence.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/** Render a pitch sequence with chords as tuples. */
export function formatNotes(notes: readonly PitchStep[]): string {
  const steps = notes.map((step) => (Array.isArray(step) ? `(${step.join(", ")})` : String(step)));
  return `[${steps.join(", ")}]`;
}

export function formatEffects(effects: Readonly<Record<string, number>>): string[] {
  return Object.entries(effects).map(([k, v]) => `${k}=${v}`);
}

/** Notes given either as a list literal string or as a JSON array. */
export const notesSchema = z.union([
  z.string().transform((s, ctx) => {
    const notes = parseNotes(s);
    if (!notes) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `notes must be a list of degrees or chords, got ${JSON.stringify(s)}` });
      return z.NEVER;
    }
    return notes;
  }),
  pitchSequence,
]);

/** Durations are code fragments ("1", "[1, 0.5]", "1/4"); only numeric syntax is accepted. */
export const durSchema = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .refine((s) => s.length > 0 && DUR_RE.test(s) && isWellFormedDur(s), {
    message: "dur must be a number, fraction or list of numbers",
  });

const EMPTY_ELEMENT_RE = /[[(,]\s*,|[[(]\s*[\])]|^\s*,|,\s*$/;

/** Brackets balance and no list element is empty; a trailing comma inside a list is allowed. */
export function isWellFormedDur(s: string): boolean {
  if (EMPTY_ELEMENT_RE.test(s)) return false;
  const closers: string[] = [];
  for (const ch of s) {
    if (ch === "[") closers.push("]");
    else if (ch === "(") closers.push(")");
    else if ((ch === "]" || ch === ")") && closers.pop() !== ch) return false;
  }
  return closers.length === 0;
}

export const synthSchema = z.string().regex(IDENT_RE, "synth must be an identifier");

export const patternSchema = z.string().regex(PATTERN_RE, "pattern must be a non-empty single line without quotes");

export const ampSchema = z.number().min(0).max(2);

export const octSchema = z.number().int().min(1).max(8);

/** Keys of `effects` that are not in `allowed`. */
export function unknownEffects(effects: Readonly<Record<string, number>>, allowed: readonly string[]): string[] {
  return Object.keys(effects).filter((key) => !allowed.includes(key));
}

/** Effect keyword arguments, restricted to the names a call declares. */
export function effectsSchema(allowed: readonly string[]) {
  return z.record(z.string(), z.number()).superRefine((effects, ctx) => {
    for (const key of unknownEffects(effects, allowed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `unknown effect; expected one of ${allowed.join(", ")}`,
      });
    }
  });
}
