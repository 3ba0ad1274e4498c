import { TweetCritic } from "./critic.js";
import { PriceMentionTracker } from "./price-mention-tracker.js";
import {
  StructuralRules,
  containsCatchPhrase,
  detectPriceAction,
  normalizeCandidate,
  validateStructure,
} from "./content-guard.js";
import { findNearDuplicate } from "./engagement/quality.js";

export const RECENT_HISTORY_CAPACITY = 10;

export type RejectionGate = "empty" | "catch-phrase" | "near-duplicate" | "structure" | "critique";

export interface AcceptanceResult {
  ok: boolean;
  text?: string;
  gate?: RejectionGate;
  reason?: string;
  score?: number;
}

/**
 * Bounded list of accepted post texts, oldest first.
 */
export class RecentPostHistory {
  private readonly items: string[] = [];

  constructor(private readonly capacity: number = RECENT_HISTORY_CAPACITY) {}

  add(text: string): void {
    this.items.push(text);
    while (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  list(): readonly string[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}

export function utcDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export interface AcceptancePipelineOptions {
  rules: StructuralRules;
  catchPhrase: string;
  subjectTicker: string;
  minCriticScore: number;
  critic: TweetCritic;
  priceTracker: PriceMentionTracker;
  history?: RecentPostHistory;
  now?: () => Date;
}

export class AcceptancePipeline {
  readonly history: RecentPostHistory;
  private readonly now: () => Date;
  private lastCatchPhraseDate: string | null = null;

  constructor(private readonly options: AcceptancePipelineOptions) {
    this.history = options.history ?? new RecentPostHistory();
    this.now = typeof options.now === "function" ? options.now : () => new Date();
  }

  getLastCatchPhraseDate(): string | null {
    return this.lastCatchPhraseDate;
  }

  /**
   * Runs the gate chain on a raw candidate. Side effects (history, catch-phrase day, price record)
   * happen only when every gate passes.
   */
  async evaluate(raw: string): Promise<AcceptanceResult> {
    const text = normalizeCandidate(String(raw || ""));
    if (!text) {
      return { ok: false, gate: "empty", reason: "Content is empty" };
    }

    const usesCatchPhrase = containsCatchPhrase(text, this.options.catchPhrase);
    const today = utcDateKey(this.now());
    if (usesCatchPhrase && this.lastCatchPhraseDate === today) {
      return {
        ok: false,
        gate: "catch-phrase",
        reason: `"${this.options.catchPhrase}" already used on ${today}`,
      };
    }

    const duplicate = findNearDuplicate(text, this.history.list());
    if (duplicate.isDuplicate) {
      const detail =
        duplicate.reason === "repeated-phrase"
          ? `repeated phrase "${duplicate.phrase}"`
          : `word overlap ${duplicate.overlap}`;
      return { ok: false, gate: "near-duplicate", reason: `too similar to recent post (${detail})` };
    }

    const structure = validateStructure(text, this.options.rules);
    if (!structure.ok) {
      return { ok: false, gate: "structure", reason: structure.errors.join("; ") };
    }
    if (structure.warnings.length > 0) {
      console.log(`[GUARD] ${structure.warnings.join("; ")}`);
    }

    const critique = await this.options.critic.critique(text);
    if (critique.score < this.options.minCriticScore) {
      return {
        ok: false,
        gate: "critique",
        score: critique.score,
        reason: `critic score ${critique.score}/10${critique.feedback ? `: ${critique.feedback.slice(0, 100)}` : ""}`,
      };
    }

    if (detectPriceAction(text, this.options.subjectTicker)) {
      this.options.priceTracker.recordMention();
    }
    this.history.add(text);
    if (usesCatchPhrase) {
      this.lastCatchPhraseDate = today;
      console.log(`[GUARD] catch phrase day set to ${today}`);
    }

    return { ok: true, text, score: critique.score };
  }
}
