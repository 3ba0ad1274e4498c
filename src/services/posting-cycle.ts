import { ObservabilityRuntimeSettings, ScheduleRuntimeSettings } from "../types/runtime.js";
import { describeError } from "../utils/errors.js";
import { AgentStore } from "./memory.js";
import { ContentGenerator } from "./generator.js";
import { TopicManager } from "./topic-manager.js";
import { EngagementTracker } from "./engagement-tracker.js";
import { SharedReplyRateLimiter } from "./reply-rate-limiter.js";
import { PriceMentionTracker } from "./price-mention-tracker.js";
import { SocialPlatform } from "./twitter.js";
import { CommentReplyProducer, OwnPost } from "./engagement/comment-replies.js";
import { AccountMonitor } from "./engagement/account-monitor.js";
import { ReplyCycleResult } from "./engagement/types.js";
import { canPostNow, jitteredIntervalMinutes } from "./scheduler.js";
import {
  PostCycleObservabilityEvent,
  PostCycleOutcome,
  emitPostCycleObservability,
} from "./observability.js";

const MINUTE_MS = 60_000;
const CAP_RETRY_MINUTES = 30;
const STORE_DUPLICATE_HOURS = 72;
const OWN_POSTS_SCANNED = 20;

export interface PostingCycleOptions {
  platform: SocialPlatform;
  store: AgentStore;
  generator: ContentGenerator;
  topics: TopicManager;
  tracker: EngagementTracker;
  limiter: SharedReplyRateLimiter;
  priceTracker: PriceMentionTracker;
  schedule: ScheduleRuntimeSettings;
  observability: ObservabilityRuntimeSettings;
  comments?: CommentReplyProducer;
  monitor?: AccountMonitor;
  random?: () => number;
  now?: () => Date;
}

export interface PostingCycleReport {
  outcome: PostCycleOutcome;
  category?: string;
  generationAttempts: number;
  replyResults: ReplyCycleResult[];
  postIds: string[];
  reason?: string;
}

interface PublishResult {
  outcome: PostCycleOutcome;
  category?: string;
  attempts: number;
  postIds: string[];
  reason?: string;
}

/**
 * One posting cycle: monitored accounts, comment replies, engagement refresh,
 * then generate and publish one post or thread.
 */
export class PostingCycle {
  private cycle = 0;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(private readonly options: PostingCycleOptions) {
    this.random = options.random ?? Math.random;
    this.now = typeof options.now === "function" ? options.now : () => new Date();
  }

  nextIntervalMs(): number {
    return jitteredIntervalMinutes(this.options.schedule, this.random) * MINUTE_MS;
  }

  /**
   * Loop entry point: runs a cycle and returns the delay before the next one.
   */
  async tick(): Promise<number> {
    try {
      const report = await this.run();
      if (report.outcome === "rate-limited") {
        console.log(`[SCHEDULER] retrying in ${CAP_RETRY_MINUTES} minutes`);
        return CAP_RETRY_MINUTES * MINUTE_MS;
      }
      const nextMs = this.nextIntervalMs();
      console.log(`[SCHEDULER] next post in ${Math.round(nextMs / MINUTE_MS)} minutes`);
      return nextMs;
    } catch (error) {
      console.error(`[ERROR] posting cycle failed: ${describeError(error)}`);
      return this.options.schedule.postIntervalMinutes * MINUTE_MS;
    }
  }

  async run(): Promise<PostingCycleReport> {
    this.cycle += 1;
    const startedAt = Date.now();
    console.log(`[SCHEDULER] post cycle #${this.cycle} started`);

    const caps = canPostNow(this.options.store, this.options.schedule);
    if (!caps.ok) {
      console.log(`[SKIP] ${caps.reason}`);
      const report: PostingCycleReport = {
        outcome: "rate-limited",
        generationAttempts: 0,
        replyResults: [],
        postIds: [],
        reason: caps.reason,
      };
      this.emit(report, startedAt);
      return report;
    }

    const replyResults: ReplyCycleResult[] = [];
    if (this.options.monitor) {
      const result = await this.runProducer("monitor", () => this.runMonitor());
      if (result) replyResults.push(result);
    }
    if (this.options.comments) {
      const result = await this.runProducer("comments", () => this.runComments());
      if (result) replyResults.push(result);
    }

    await this.refreshEngagement();

    const published = await this.publish();
    const report: PostingCycleReport = {
      outcome: published.outcome,
      category: published.category,
      generationAttempts: published.attempts,
      replyResults,
      postIds: published.postIds,
      reason: published.reason,
    };
    this.emit(report, startedAt);
    return report;
  }

  private async runMonitor(): Promise<ReplyCycleResult | null> {
    return this.options.monitor ? this.options.monitor.run() : null;
  }

  private async runComments(): Promise<ReplyCycleResult | null> {
    if (!this.options.comments) return null;
    return this.options.comments.run(this.ownPosts());
  }

  private async runProducer(
    label: string,
    task: () => Promise<ReplyCycleResult | null>
  ): Promise<ReplyCycleResult | null> {
    try {
      return await task();
    } catch (error) {
      console.error(`[ERROR] ${label} producer failed: ${describeError(error)}`);
      return null;
    }
  }

  private ownPosts(): OwnPost[] {
    const { store } = this.options;
    const posts: OwnPost[] = [];
    for (const record of store.getRecentPosts(OWN_POSTS_SCANNED, "posted")) {
      if (record.threadId && store.getThreadHeadId(record.threadId) !== record.id) continue;
      if (record.tweetId && record.postedAt) {
        posts.push({ id: record.tweetId, text: record.content, postedAt: record.postedAt });
      }
    }
    return posts;
  }

  private async refreshEngagement(): Promise<void> {
    const { tracker, store } = this.options;
    if (tracker.size === 0) return;
    try {
      const updated = await tracker.refreshAll();
      for (const top of tracker.getTopPerforming(3)) {
        const record = tracker.get(top.postId);
        const stored = store.getPostByTweetId(top.postId);
        if (record && stored) {
          store.updatePost(stored.id, { likes: record.likes, shares: record.shares, replies: record.replies });
        }
      }
      const best = tracker.getTopPerforming(1)[0];
      console.log(
        `[ENGAGE] refreshed ${updated}/${tracker.size}` +
          (best ? ` | top ${best.postId} score=${best.score}` : "")
      );
      if (tracker.shouldAdjustStyle()) {
        console.log("[ENGAGE] recent posts are underperforming; leaning on style reference");
      }
    } catch (error) {
      console.error(`[ERROR] engagement refresh failed: ${describeError(error)}`);
    }
  }

  private async publish(): Promise<PublishResult> {
    const isThread = this.options.topics.shouldPostThread(this.random);
    return isThread ? this.publishThread() : this.publishSingle();
  }

  private async publishSingle(): Promise<PublishResult> {
    const { generator, store, platform, topics, tracker } = this.options;

    let outcome = await generator.generatePost();
    let attempts = outcome.attempts;
    if (outcome.ok && outcome.content && store.isDuplicateContent(outcome.content, STORE_DUPLICATE_HOURS)) {
      console.log("[GEN] duplicate of a post from the last 72h; regenerating once");
      outcome = await generator.generatePost({ category: outcome.category });
      attempts += outcome.attempts;
      if (outcome.ok && outcome.content && store.isDuplicateContent(outcome.content, STORE_DUPLICATE_HOURS)) {
        return { outcome: "no-content", category: outcome.category, attempts, postIds: [], reason: "duplicate" };
      }
    }

    const content = outcome.content;
    const category = outcome.category;
    if (!outcome.ok || !content || !category) {
      console.log(`[POST] no content produced: ${outcome.reason ?? "unknown"}`);
      return { outcome: "no-content", attempts, postIds: [], reason: outcome.reason };
    }

    topics.recordUsage(category);
    const record = store.createPost({ content, category });
    try {
      const posted = await platform.post(content);
      store.updatePost(record.id, { tweetId: posted.id, status: "posted", postedAt: this.now().toISOString() });
      tracker.track(posted.id, content);
      topics.updateSuccess(category, true, 0);
      console.log(`[POST] ${category} -> ${posted.id}`);
      return { outcome: "posted", category, attempts, postIds: [posted.id] };
    } catch (error) {
      const message = describeError(error);
      store.updatePost(record.id, { status: "failed", errorMessage: message });
      topics.updateSuccess(category, false);
      console.error(`[ERROR] post failed: ${message}`);
      return { outcome: "post-failed", category, attempts, postIds: [], reason: message };
    }
  }

  private async publishThread(): Promise<PublishResult> {
    const { generator, store, platform, topics, tracker } = this.options;

    const outcome = await generator.generateThread();
    const segments = outcome.content;
    const category = outcome.category;
    if (!outcome.ok || !segments || !category) {
      console.log(`[THREAD] no thread produced: ${outcome.reason ?? "unknown"}`);
      return { outcome: "no-content", attempts: outcome.attempts, postIds: [], reason: outcome.reason };
    }

    topics.recordUsage(category);
    const threadId = `thread_${this.now().getTime()}`;
    const records = segments.map((content) => store.createPost({ content, category, isThread: true, threadId }));

    let posted: { id: string }[] = [];
    let failure: string | undefined;
    try {
      posted = await platform.postThread(segments);
    } catch (error) {
      failure = describeError(error);
      console.error(`[ERROR] thread failed: ${failure}`);
    }

    const postedAt = this.now().toISOString();
    records.forEach((record, index) => {
      const tweet = posted[index];
      if (tweet) {
        store.updatePost(record.id, { tweetId: tweet.id, status: "posted", postedAt });
      } else {
        store.updatePost(record.id, { status: "failed", errorMessage: failure ?? "thread interrupted" });
      }
    });

    const head = posted[0];
    if (!head) {
      topics.updateSuccess(category, false);
      return { outcome: "post-failed", category, attempts: outcome.attempts, postIds: [], reason: failure };
    }

    tracker.track(head.id, segments[0] ?? "");
    topics.updateSuccess(category, true, 0);
    console.log(`[THREAD] ${category} -> ${posted.length}/${segments.length} posted`);
    return { outcome: "thread", category, attempts: outcome.attempts, postIds: posted.map((tweet) => tweet.id) };
  }

  private emit(report: PostingCycleReport, startedAt: number): PostCycleObservabilityEvent | null {
    const { limiter, priceTracker, store, observability } = this.options;
    return emitPostCycleObservability(
      {
        cycle: this.cycle,
        outcome: report.outcome,
        category: report.category,
        generationAttempts: report.generationAttempts,
        replyResults: report.replyResults,
        quota: limiter.getStats(),
        priceGate: {
          canMention: priceTracker.canMentionPrice(),
          hoursUntilAllowed: priceTracker.hoursUntilAllowed(),
        },
        postsLastHour: store.countPostsInWindow(1),
        postsLastDay: store.countPostsInWindow(24),
        durationMs: Date.now() - startedAt,
      },
      observability,
      this.now()
    );
  }
}
