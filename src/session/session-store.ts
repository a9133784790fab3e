import { randomUUID } from "node:crypto";
import {
  DEFAULT_ROOT,
  DEFAULT_SCALE,
  DEFAULT_TEMPO,
  PLAYER_NAMESPACE,
  type LayerName,
  type LayerRole,
  type RootName,
  type ScaleName,
} from "./vocabulary.js";

export type LayerState = "active" | "stopped";

/** One step of a pitch sequence: a scale degree or a chord of degrees. */
export type PitchStep = number | number[];

export interface LayerAttributes {
  notes?: PitchStep[];
  pattern?: string;
  dur?: string;
  amp?: number;
  oct?: number;
  effects: Record<string, number>;
}

export interface Layer extends LayerAttributes {
  name: LayerName;
  /** Synth identifier ("play" for sample patterns). */
  synth: string;
  code: string;
  description: string;
  state: LayerState;
  createdAt: string;
  modifiedAt: string;
}

export interface LayerInput {
  name: LayerName;
  synth: string;
  code: string;
  description: string;
  notes?: PitchStep[];
  pattern?: string;
  dur?: string;
  amp?: number;
  oct?: number;
  effects?: Record<string, number>;
}

export type LayerPatch = Partial<Pick<Layer, "synth" | "code" | "description" | "notes" | "pattern" | "dur" | "amp" | "oct" | "effects">>;

export interface SessionParams {
  tempo: number;
  scale: ScaleName;
  root: RootName;
}

export interface ExecutionRecord {
  timestamp: string;
  code: string;
  success: boolean;
  output: string;
}

/** Flat, JSON-safe form of the store. */
export interface SessionData {
  sessionId: string;
  createdAt: string;
  params: SessionParams;
  layers: Layer[];
  executions: ExecutionRecord[];
}

/** What get_session_state hands back to the model. */
export interface SessionStateView {
  tempo: number;
  scale: ScaleName;
  root: RootName;
  layers: Array<{
    name: LayerName;
    synth: string;
    description: string;
    notes?: PitchStep[];
    pattern?: string;
    amp?: number;
  }>;
}

export interface SessionStoreOptions {
  sessionId?: string;
  /** Restored sessions keep their original creation time. */
  createdAt?: string;
  /** Clock for created/modified timestamps. */
  now?: () => Date;
}

/**
 * Generate a new session ID (short UUID prefix for readability).
 */
export function newSessionId(): string {
  return randomUUID().split("-")[0];
}

function cloneLayer(layer: Layer): Layer {
  return {
    ...layer,
    notes: layer.notes?.map((step) => (Array.isArray(step) ? [...step] : step)),
    effects: { ...layer.effects },
  };
}

/**
 * In-memory music session: global parameters plus the named layers currently
 * in effect. No I/O. Layers handed out are copies; the map is only changed
 * through the methods below.
 */
export class SessionStore {
  readonly sessionId: string;
  readonly createdAt: string;

  private params: SessionParams = { tempo: DEFAULT_TEMPO, scale: DEFAULT_SCALE, root: DEFAULT_ROOT };
  private readonly layerMap = new Map<LayerName, Layer>();
  private readonly executionLog: ExecutionRecord[] = [];
  private readonly now: () => Date;

  constructor(opts: SessionStoreOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.sessionId = opts.sessionId ?? newSessionId();
    this.createdAt = opts.createdAt ?? this.timestamp();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  get tempo(): number { return this.params.tempo; }
  get scale(): ScaleName { return this.params.scale; }
  get root(): RootName { return this.params.root; }

  getParams(): SessionParams {
    return { ...this.params };
  }

  setTempo(bpm: number): void { this.params.tempo = bpm; }
  setScale(scale: ScaleName): void { this.params.scale = scale; }
  setRoot(root: RootName): void { this.params.root = root; }

  /**
   * Insert or replace a layer. A replaced layer keeps its original createdAt.
   */
  upsertLayer(input: LayerInput): Layer {
    const ts = this.timestamp();
    const existing = this.layerMap.get(input.name);
    const layer: Layer = {
      name: input.name,
      synth: input.synth,
      code: input.code,
      description: input.description,
      state: "active",
      createdAt: existing?.createdAt ?? ts,
      modifiedAt: ts,
      notes: input.notes,
      pattern: input.pattern,
      dur: input.dur,
      amp: input.amp,
      oct: input.oct,
      effects: { ...(input.effects ?? {}) },
    };
    this.layerMap.set(input.name, layer);
    return cloneLayer(layer);
  }

  /** Merge fields into an existing layer. Returns null when the layer is absent. */
  updateLayer(name: LayerName, patch: LayerPatch): Layer | null {
    const layer = this.layerMap.get(name);
    if (!layer) return null;
    Object.assign(layer, patch);
    if (patch.effects) layer.effects = { ...patch.effects };
    layer.modifiedAt = this.timestamp();
    return cloneLayer(layer);
  }

  /** Stop and evict a layer. Idempotent: false when nothing was there. */
  removeLayer(name: LayerName): boolean {
    const layer = this.layerMap.get(name);
    if (!layer) return false;
    layer.state = "stopped";
    this.layerMap.delete(name);
    return true;
  }

  /** Stop every layer. Returns the names that were active. */
  clearAll(): LayerName[] {
    const names = [...this.layerMap.keys()];
    for (const layer of this.layerMap.values()) layer.state = "stopped";
    this.layerMap.clear();
    return names;
  }

  getLayer(name: LayerName): Layer | undefined {
    const layer = this.layerMap.get(name);
    return layer ? cloneLayer(layer) : undefined;
  }

  hasLayer(name: LayerName): boolean {
    return this.layerMap.has(name);
  }

  layers(): Layer[] {
    return [...this.layerMap.values()].map(cloneLayer);
  }

  layerNames(): LayerName[] {
    return [...this.layerMap.keys()];
  }

  /**
   * First free name for the role, in declaration order. When every slot is
   * taken the first one is returned and the caller overwrites it.
   */
  nextAvailableName(role: LayerRole): LayerName {
    const names: readonly LayerName[] = PLAYER_NAMESPACE[role];
    for (const name of names) {
      if (!this.layerMap.has(name)) return name;
    }
    return names[0];
  }

  recordExecution(code: string, success: boolean, output: string): ExecutionRecord {
    const entry: ExecutionRecord = { timestamp: this.timestamp(), code, success, output };
    this.executionLog.push(entry);
    return { ...entry };
  }

  executions(): ExecutionRecord[] {
    return this.executionLog.map((e) => ({ ...e }));
  }

  describe(): SessionStateView {
    return {
      ...this.params,
      layers: this.layers().map((l) => ({
        name: l.name,
        synth: l.synth,
        description: l.description,
        ...(l.notes ? { notes: l.notes } : {}),
        ...(l.pattern ? { pattern: l.pattern } : {}),
        ...(l.amp !== undefined ? { amp: l.amp } : {}),
      })),
    };
  }

  /** Session state as markdown, for the system prompt. */
  renderSummary(): string {
    const lines = [
      "## Current Music Session State",
      "",
      `**Tempo:** ${this.params.tempo} BPM`,
      `**Scale:** ${this.params.scale}`,
      `**Root:** ${this.params.root}`,
      "",
    ];
    if (this.layerMap.size === 0) {
      lines.push("### No active layers - silence");
      return lines.join("\n");
    }
    lines.push("### Active Layers (Currently Playing):");
    for (const layer of this.layerMap.values()) {
      let info = `- **${layer.name}** (${layer.synth}): ${layer.description}`;
      if (layer.notes) info += ` | Notes: ${JSON.stringify(layer.notes)}`;
      if (layer.pattern) info += ` | Pattern: '${layer.pattern}'`;
      if (layer.amp !== undefined) info += ` | Amp: ${layer.amp}`;
      lines.push(info);
    }
    return lines.join("\n");
  }

  /** The whole session as one runnable program. */
  renderFullCode(): string {
    const parts = [
      `# Session: ${this.sessionId}`,
      "",
      `Clock.bpm = ${this.params.tempo}`,
      `Scale.default = Scale.${this.params.scale}`,
      `Root.default = "${this.params.root}"`,
      "",
    ];
    for (const layer of this.layerMap.values()) {
      parts.push(`# ${layer.description}`, layer.code, "");
    }
    return parts.join("\n");
  }

  toJSON(): SessionData {
    return {
      sessionId: this.sessionId,
      createdAt: this.createdAt,
      params: this.getParams(),
      layers: this.layers(),
      executions: this.executions(),
    };
  }

  static fromJSON(data: SessionData, opts: Pick<SessionStoreOptions, "now"> = {}): SessionStore {
    const store = new SessionStore({ ...opts, sessionId: data.sessionId, createdAt: data.createdAt });
    store.params = { ...data.params };
    for (const layer of data.layers) {
      store.layerMap.set(layer.name, cloneLayer(layer));
    }
    store.executionLog.push(...data.executions.map((e) => ({ ...e })));
    return store;
  }
}
