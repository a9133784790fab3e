import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { asError, errorLogFields, jamError } from "../errors.js";
import { Logger } from "../logger.js";
import { ALL_LAYER_NAMES, ROOTS, SCALES } from "./vocabulary.js";

/**
 * Session persistence for jamloop.
 *
 * Layout:
 *   ~/.jamloop/
 *     sessions/
 *       <session-id>/
 *         session.json   — snapshot: params, layers, turn history, executions
 */

const SESSION_ID_RE = /^[A-Za-z0-9_-]+$/;
const SNAPSHOT_FILE = "session.json";

const pitchStep = z.union([z.number(), z.array(z.number())]);

const layerSchema = z.object({
  name: z.enum(ALL_LAYER_NAMES),
  synth: z.string(),
  code: z.string(),
  description: z.string(),
  state: z.enum(["active", "stopped"]),
  createdAt: z.string(),
  modifiedAt: z.string(),
  notes: z.array(pitchStep).optional(),
  pattern: z.string().optional(),
  dur: z.string().optional(),
  amp: z.number().optional(),
  oct: z.number().optional(),
  effects: z.record(z.number()),
});

const stateViewSchema = z.object({
  tempo: z.number(),
  scale: z.enum(SCALES),
  root: z.enum(ROOTS),
  layers: z.array(
    z.object({
      name: z.enum(ALL_LAYER_NAMES),
      synth: z.string(),
      description: z.string(),
      notes: z.array(pitchStep).optional(),
      pattern: z.string().optional(),
      amp: z.number().optional(),
    }),
  ),
});

const callRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  args: z.record(z.unknown()),
  result: z.object({
    status: z.enum(["success", "error", "code_generated"]),
    code: z.string().optional(),
    output: z.string().optional(),
    error: z.string().optional(),
    affectedLayers: z.array(z.string()),
    state: stateViewSchema.optional(),
  }),
});

const turnSchema = z.object({
  role: z.enum(["user", "agent"]),
  content: z.string(),
  reasoning: z.string().optional(),
  calls: z.array(callRecordSchema),
  size: z.number(),
  timestamp: z.string(),
});

export const snapshotSchema = z.object({
  version: z.literal(1),
  sessionId: z.string().regex(SESSION_ID_RE),
  createdAt: z.string(),
  updatedAt: z.string(),
  params: z.object({
    tempo: z.number().int(),
    scale: z.enum(SCALES),
    root: z.enum(ROOTS),
  }),
  layers: z.array(layerSchema),
  turns: z.array(turnSchema),
  executions: z.array(
    z.object({
      timestamp: z.string(),
      code: z.string(),
      success: z.boolean(),
      output: z.string(),
    }),
  ),
});

export type SessionSnapshot = z.infer<typeof snapshotSchema>;

export interface SessionListing {
  sessionId: string;
  createdAt: string;
  updatedAt: string;
  layers: number;
  turns: number;
}

export interface PersistenceOptions {
  /** Root directory; defaults to ~/.jamloop. */
  baseDir?: string;
}

export function defaultBaseDir(): string {
  return join(homedir(), ".jamloop");
}

function sessionsDir(opts: PersistenceOptions): string {
  return join(opts.baseDir ?? defaultBaseDir(), "sessions");
}

function sessionPath(id: string, opts: PersistenceOptions): string {
  if (!SESSION_ID_RE.test(id)) {
    throw jamError("session_error", `Invalid session id: ${JSON.stringify(id)}`);
  }
  return join(sessionsDir(opts), id);
}

/**
 * Write a snapshot to <baseDir>/sessions/<id>/session.json.
 */
export function saveSnapshot(snapshot: SessionSnapshot, opts: PersistenceOptions = {}): string {
  const dir = sessionPath(snapshot.sessionId, opts);
  const file = join(dir, SNAPSHOT_FILE);
  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(file, JSON.stringify(snapshot, null, 2));
  } catch (e: unknown) {
    const je = jamError("session_error", `Failed to save session ${snapshot.sessionId}: ${asError(e).message}`, { cause: e });
    Logger.error("Session save failed:", errorLogFields(je));
    throw je;
  }
  return file;
}

/**
 * Load a snapshot. Returns null if it does not exist or fails validation.
 */
export function loadSnapshot(id: string, opts: PersistenceOptions = {}): SessionSnapshot | null {
  const file = join(sessionPath(id, opts), SNAPSHOT_FILE);
  if (!existsSync(file)) return null;

  try {
    return snapshotSchema.parse(JSON.parse(readFileSync(file, "utf-8")));
  } catch (e: unknown) {
    const je = jamError("session_error", `Failed to load session ${id}: ${asError(e).message}`, { cause: e });
    Logger.warn(je.message, errorLogFields(je));
    return null;
  }
}

function snapshotMtimes(opts: PersistenceOptions): Array<{ id: string; file: string; mtime: number }> {
  const dir = sessionsDir(opts);
  if (!existsSync(dir)) return [];
  const found: Array<{ id: string; file: string; mtime: number }> = [];
  for (const entry of readdirSync(dir)) {
    if (!SESSION_ID_RE.test(entry)) continue;
    const file = join(dir, entry, SNAPSHOT_FILE);
    if (existsSync(file)) found.push({ id: entry, file, mtime: statSync(file).mtimeMs });
  }
  return found;
}

/**
 * Find the most recently written session.
 */
export function findLatestSession(opts: PersistenceOptions = {}): string | null {
  let latest: { id: string; mtime: number } | null = null;
  for (const s of snapshotMtimes(opts)) {
    if (!latest || s.mtime > latest.mtime) latest = s;
  }
  return latest?.id ?? null;
}

/**
 * List all readable sessions, most recent first.
 */
export function listSessions(opts: PersistenceOptions = {}): SessionListing[] {
  const listed: Array<SessionListing & { mtime: number }> = [];
  for (const s of snapshotMtimes(opts)) {
    const snap = loadSnapshot(s.id, opts);
    if (!snap) continue;
    listed.push({
      sessionId: snap.sessionId,
      createdAt: snap.createdAt,
      updatedAt: snap.updatedAt,
      layers: snap.layers.length,
      turns: snap.turns.length,
      mtime: s.mtime,
    });
  }
  listed.sort((a, b) => b.mtime - a.mtime);
  return listed.map(({ mtime: _, ...rest }) => rest);
}

/**
 * Remove sessions whose last update is older than maxAgeMs (default 48h).
 * @returns Number of sessions deleted
 */
export function cleanupOldSessions(
  maxAgeMs: number = 48 * 60 * 60 * 1000,
  opts: PersistenceOptions & { now?: number } = {},
): number {
  const now = opts.now ?? Date.now();
  let deleted = 0;

  for (const s of snapshotMtimes(opts)) {
    try {
      const raw: unknown = JSON.parse(readFileSync(s.file, "utf-8"));
      const updatedAt = z.object({ updatedAt: z.string() }).safeParse(raw);
      const updatedMs = updatedAt.success ? new Date(updatedAt.data.updatedAt).getTime() : NaN;
      // Fall back to mtime if updatedAt is missing or unparseable
      const age = Number.isFinite(updatedMs) ? now - updatedMs : now - s.mtime;

      if (age > maxAgeMs) {
        rmSync(join(sessionsDir(opts), s.id), { recursive: true, force: true });
        Logger.info(`Cleanup: removed session ${s.id} (age: ${Math.round(age / 1000 / 60)}m)`);
        deleted++;
      }
    } catch (err: unknown) {
      Logger.warn(`Cleanup: failed to process session ${s.id}: ${asError(err).message}`);
    }
  }

  return deleted;
}
