import fs from "fs";
import path from "path";
import { describeError } from "../utils/errors.js";

const DATA_DIR = path.join(process.cwd(), "data");
const DEFAULT_DATA_PATH = path.join(DATA_DIR, "price-mentions.json");
const COOLDOWN_HOURS = 24;
const HOUR_MS = 60 * 60 * 1000;

interface PriceMentionState {
  lastMention: string | null;
}

/**
 * 24h cooldown on price-action posts. The last mention survives restarts.
 */
export class PriceMentionTracker {
  private readonly dataPath: string;
  private readonly now: () => Date;
  private lastMentionAt: Date | null;

  constructor(options?: { dataPath?: string; now?: () => Date }) {
    this.dataPath = options?.dataPath ? path.resolve(options.dataPath) : DEFAULT_DATA_PATH;
    this.now = typeof options?.now === "function" ? options.now : () => new Date();
    this.lastMentionAt = this.load();
  }

  canMentionPrice(): boolean {
    return this.hoursSinceLastMention() >= COOLDOWN_HOURS;
  }

  /**
   * Closes the gate in memory first; a failed write only costs persistence across restarts.
   */
  recordMention(): void {
    this.lastMentionAt = this.now();
    try {
      this.save();
    } catch (error) {
      console.error(`[PRICE] price mention not persisted: ${describeError(error)}`);
    }
    console.log(`[PRICE] price mention recorded at ${this.lastMentionAt.toISOString()}`);
  }

  hoursUntilAllowed(): number {
    return Math.max(0, COOLDOWN_HOURS - this.hoursSinceLastMention());
  }

  getLastMention(): Date | null {
    return this.lastMentionAt ? new Date(this.lastMentionAt.getTime()) : null;
  }

  private hoursSinceLastMention(): number {
    if (!this.lastMentionAt) return Number.POSITIVE_INFINITY;
    return (this.now().getTime() - this.lastMentionAt.getTime()) / HOUR_MS;
  }

  private load(): Date | null {
    try {
      if (!fs.existsSync(this.dataPath)) return null;
      const parsed: unknown = JSON.parse(fs.readFileSync(this.dataPath, "utf-8"));
      if (!isPriceMentionState(parsed) || !parsed.lastMention) return null;
      const date = new Date(parsed.lastMention);
      return Number.isFinite(date.getTime()) ? date : null;
    } catch (error) {
      console.log(`[WARN] price mention state unreadable, starting fresh: ${describeError(error)}`);
      return null;
    }
  }

  private save(): void {
    const state: PriceMentionState = {
      lastMention: this.lastMentionAt ? this.lastMentionAt.toISOString() : null,
    };
    fs.mkdirSync(path.dirname(this.dataPath), { recursive: true });
    fs.writeFileSync(this.dataPath, JSON.stringify(state, null, 2), "utf-8");
  }
}

function isPriceMentionState(value: unknown): value is PriceMentionState {
  if (typeof value !== "object" || value === null) return false;
  if (!("lastMention" in value)) return false;
  return typeof value.lastMention === "string" || value.lastMention === null;
}
