import type { ConversationTurn } from "../jam-types.js";
import { Logger } from "../logger.js";
import { approximateSize, type SizeEstimator } from "./size-estimator.js";

export interface ContextManagerConfig {
  /** Soft ceiling, in estimator units. */
  maxSize?: number;
  /** Fraction of maxSize above which consolidation is requested. */
  consolidationThreshold?: number;
  /** Turns always kept verbatim. */
  keepRecentTurns?: number;
  estimator?: SizeEstimator;
}

export interface ContextStats {
  turns: number;
  totalSize: number;
  thresholdSize: number;
  maxSize: number;
  hasSummary: boolean;
  /** Sizes come from a character-based estimate, not a tokenizer. */
  approximate: true;
}

const TRANSCRIPT_CLIP = 500;

const SUMMARY_INSTRUCTION = `Condense the conversation below into a short summary. Keep:
1. Musical decisions (tempo, scale, root, instruments)
2. Preferences the user expressed
3. What the composition currently sounds like
4. Anything later requests may depend on`;

function roleLabel(role: ConversationTurn["role"]): string {
  return role === "user" ? "User" : "Agent";
}

function callNames(turn: ConversationTurn): string {
  return turn.calls.map((c) => c.name).join(", ");
}

/**
 * Conversation window with a single rolling summary.
 *
 * Turns accumulate until the running size passes the threshold; the engine
 * then asks the model to summarize everything but the last K turns and hands
 * the summary back through applyConsolidation.
 */
export class ContextManager {
  readonly maxSize: number;
  readonly consolidationThreshold: number;
  readonly keepRecentTurns: number;

  private readonly estimator: SizeEstimator;
  private turnList: ConversationTurn[] = [];
  private rollingSummary: string | null = null;
  private total = 0;

  constructor(cfg: ContextManagerConfig = {}) {
    this.maxSize = cfg.maxSize ?? 100_000;
    this.consolidationThreshold = cfg.consolidationThreshold ?? 0.7;
    this.keepRecentTurns = Math.max(0, cfg.keepRecentTurns ?? 5);
    this.estimator = cfg.estimator ?? approximateSize;
  }

  estimate(text: string): number {
    return this.estimator(text);
  }

  get summary(): string | null {
    return this.rollingSummary;
  }

  get totalSize(): number {
    return this.total;
  }

  get turnCount(): number {
    return this.turnList.length;
  }

  turns(): ConversationTurn[] {
    return [...this.turnList];
  }

  recordTurn(turn: ConversationTurn): void {
    this.turnList.push(turn);
    this.total += turn.size;
  }

  needsConsolidation(): boolean {
    return this.total > this.maxSize * this.consolidationThreshold;
  }

  /**
   * Summarization prompt covering every turn older than the last K,
   * or null when there is nothing old enough to fold away.
   */
  buildConsolidationRequest(): string | null {
    if (this.turnList.length <= this.keepRecentTurns) return null;
    const old = this.turnList.slice(0, this.turnList.length - this.keepRecentTurns);

    const lines: string[] = [];
    for (const turn of old) {
      const clipped = turn.content.length > TRANSCRIPT_CLIP
        ? turn.content.slice(0, TRANSCRIPT_CLIP) + "..."
        : turn.content;
      lines.push(`${turn.role}: ${clipped}`);
      if (turn.calls.length > 0) lines.push(`  [Calls: ${callNames(turn)}]`);
    }

    return `${SUMMARY_INSTRUCTION}

Conversation:
${lines.join("\n")}

Reply with the summary only, at most three short paragraphs.`;
  }

  /**
   * Replace the rolling summary and drop everything but the last K turns.
   * An empty summary changes nothing. Returns whether the window changed.
   */
  applyConsolidation(summaryText: string): boolean {
    const summary = summaryText.trim();
    if (!summary) {
      Logger.warn("Consolidation returned an empty summary; keeping existing context");
      return false;
    }

    const before = this.turnList.length;
    const keep = Math.min(this.keepRecentTurns, this.turnList.length);
    this.turnList = this.turnList.slice(this.turnList.length - keep);
    this.rollingSummary = summary;
    this.total = this.turnList.reduce((sum, t) => sum + t.size, 0) + this.estimator(summary);

    Logger.telemetry(
      `[context] consolidated ${before - this.turnList.length} turn(s); ~${this.total} (approx) across ${this.turnList.length} turn(s) + summary`,
    );
    return true;
  }

  renderContextForPrompt(): string {
    const parts: string[] = [];
    if (this.rollingSummary) {
      parts.push(`## Previous Conversation Summary\n${this.rollingSummary}\n`);
    }
    const recent = this.keepRecentTurns > 0 ? this.turnList.slice(-this.keepRecentTurns) : [];
    if (recent.length > 0) {
      parts.push("## Recent Conversation");
      for (const turn of recent) {
        parts.push(`**${roleLabel(turn.role)}**: ${turn.content}`);
        if (turn.calls.length > 0) parts.push(`  *[Calls: ${callNames(turn)}]*`);
      }
    }
    return parts.join("\n");
  }

  /** Replay persisted turns, e.g. after loading a session snapshot. */
  restore(turns: ConversationTurn[]): void {
    this.clear();
    for (const turn of turns) this.recordTurn(turn);
  }

  clear(): void {
    this.turnList = [];
    this.rollingSummary = null;
    this.total = 0;
  }

  getStats(): ContextStats {
    return {
      turns: this.turnList.length,
      totalSize: this.total,
      thresholdSize: this.maxSize * this.consolidationThreshold,
      maxSize: this.maxSize,
      hasSummary: this.rollingSummary !== null,
      approximate: true,
    };
  }
}
