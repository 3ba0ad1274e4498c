import { TopicRecord } from "../types/agent.js";
import { AgentStore } from "./memory.js";

const RECENT_THREAD_WINDOW = 10;

export interface TopicInsight {
  name: string;
  usageCount: number;
  lastUsedAt: string | null;
}

export class TopicManager {
  private readonly now: () => Date;

  constructor(
    private readonly store: AgentStore,
    options?: { now?: () => Date }
  ) {
    this.now = typeof options?.now === "function" ? options.now : () => new Date();
  }

  recordUsage(category: string): TopicRecord {
    const existing = this.store.getTopic(category);
    const topic: TopicRecord = existing
      ? { ...existing, usageCount: existing.usageCount + 1, lastUsedAt: this.now().toISOString() }
      : { name: category, usageCount: 1, lastUsedAt: this.now().toISOString(), successRate: 0, avgEngagement: 0 };
    this.store.setTopic(topic);
    return topic;
  }

  /**
   * Folds one outcome into the running averages. Call once per recordUsage, after it.
   */
  updateSuccess(category: string, success: boolean, engagement: number = 0): TopicRecord | undefined {
    const topic = this.store.getTopic(category);
    if (!topic || topic.usageCount <= 0) {
      console.warn(`[TOPIC] unknown topic: ${category}`);
      return undefined;
    }
    const total = topic.usageCount;
    const previous = total - 1;
    const successes = topic.successRate * previous + (success ? 1 : 0);
    const engagementSum = topic.avgEngagement * previous + engagement;
    const updated: TopicRecord = {
      ...topic,
      successRate: Math.min(1, successes / total),
      avgEngagement: engagementSum / total,
    };
    this.store.setTopic(updated);
    return updated;
  }

  threadProbability(): number {
    const recent = this.store.getRecentPosts(RECENT_THREAD_WINDOW, "posted");
    const threadCount = recent.filter((post) => post.isThread).length;
    if (threadCount > 3) return 0.1;
    if (threadCount === 0) return 0.4;
    return 0.2;
  }

  shouldPostThread(random: () => number = Math.random): boolean {
    return random() < this.threadProbability();
  }

  /**
   * Least recently used first; never-used categories lead.
   */
  getInsights(categories: readonly string[], limit: number = 5): TopicInsight[] {
    return categories
      .map((name) => {
        const topic = this.store.getTopic(name);
        return {
          name,
          usageCount: topic?.usageCount ?? 0,
          lastUsedAt: topic?.lastUsedAt ?? null,
        };
      })
      .sort((a, b) => {
        if (a.lastUsedAt === b.lastUsedAt) return a.usageCount - b.usageCount;
        if (a.lastUsedAt === null) return -1;
        if (b.lastUsedAt === null) return 1;
        return a.lastUsedAt.localeCompare(b.lastUsedAt);
      })
      .slice(0, limit);
  }
}
