import { PublicMetrics } from "../types/agent.js";
import { describeError } from "../utils/errors.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MetricsSource {
  getMetrics(postId: string): Promise<PublicMetrics | null>;
}

export interface EngagementRecord extends PublicMetrics {
  postId: string;
  text: string;
  createdAt: string;
  lastMeasuredAt: string | null;
}

export interface ScoredPost {
  postId: string;
  text: string;
  score: number;
}

export function engagementScore(metrics: Pick<PublicMetrics, "likes" | "shares" | "replies">): number {
  return metrics.likes + metrics.shares * 3 + metrics.replies * 2;
}

/**
 * In-process engagement records for our own posts, keyed by platform id.
 */
export class EngagementTracker {
  private readonly records = new Map<string, EngagementRecord>();
  private readonly now: () => Date;

  constructor(
    private readonly source: MetricsSource,
    options?: { now?: () => Date }
  ) {
    this.now = typeof options?.now === "function" ? options.now : () => new Date();
  }

  track(postId: string, text: string): void {
    this.records.set(postId, {
      postId,
      text,
      createdAt: this.now().toISOString(),
      likes: 0,
      shares: 0,
      replies: 0,
      impressions: 0,
      lastMeasuredAt: null,
    });
    console.log(`[ENGAGE] tracking ${postId}`);
  }

  get size(): number {
    return this.records.size;
  }

  get(postId: string): EngagementRecord | undefined {
    const record = this.records.get(postId);
    return record ? { ...record } : undefined;
  }

  async updateMetrics(postId: string): Promise<EngagementRecord | null> {
    const record = this.records.get(postId);
    if (!record) return null;
    try {
      const metrics = await this.source.getMetrics(postId);
      if (!metrics) {
        console.warn(`[ENGAGE] no metrics for ${postId}`);
        return null;
      }
      Object.assign(record, metrics, { lastMeasuredAt: this.now().toISOString() });
      return { ...record };
    } catch (error) {
      console.error(`[ENGAGE] metrics update failed for ${postId}: ${describeError(error)}`);
      return null;
    }
  }

  async refreshAll(): Promise<number> {
    let updated = 0;
    for (const postId of [...this.records.keys()]) {
      if (await this.updateMetrics(postId)) updated += 1;
    }
    return updated;
  }

  score(postId: string): number {
    const record = this.records.get(postId);
    return record ? engagementScore(record) : 0;
  }

  getTopPerforming(limit: number = 5): ScoredPost[] {
    return [...this.records.values()]
      .map((record) => ({ postId: record.postId, text: record.text, score: engagementScore(record) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  /**
   * Exemplar block for the generator; empty until two posts are tracked.
   */
  getStyleGuidance(): string {
    if (this.records.size < 2) return "";
    const top = this.getTopPerforming(3);
    const lines = ["STYLE REFERENCE - your best performing recent posts (match the energy, do not copy):"];
    top.forEach((post, index) => {
      lines.push(`${index + 1}. "${post.text.slice(0, 100)}" (score ${post.score})`);
    });
    return lines.join("\n");
  }

  shouldAdjustStyle(): boolean {
    if (this.records.size < 5) return false;
    const recent = [...this.records.values()].slice(-5);
    const avgLikes = recent.reduce((sum, record) => sum + record.likes, 0) / recent.length;
    return avgLikes < 5;
  }

  cleanup(days: number = 7): number {
    const cutoff = this.now().getTime() - days * DAY_MS;
    let removed = 0;
    for (const [postId, record] of this.records) {
      if (new Date(record.createdAt).getTime() < cutoff) {
        this.records.delete(postId);
        removed += 1;
      }
    }
    if (removed > 0) {
      console.log(`[ENGAGE] purged ${removed} records older than ${days}d`);
    }
    return removed;
  }
}
