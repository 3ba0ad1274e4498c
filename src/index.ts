import "dotenv/config";
import { loadRuntimeConfig, validateRuntimeConfig } from "./config/runtime.js";
import { loadPromptCatalog } from "./config/templates.js";
import { ClaudeTextGenerator, initClaudeClient } from "./services/llm.js";
import { DryRunPlatform, SocialPlatform, TwitterPlatform, initTwitterClient } from "./services/twitter.js";
import { SharedReplyRateLimiter } from "./services/reply-rate-limiter.js";
import { PriceMentionTracker } from "./services/price-mention-tracker.js";
import { TweetCritic } from "./services/critic.js";
import { AcceptancePipeline } from "./services/acceptance.js";
import { ContentGenerator } from "./services/generator.js";
import { MarketDataService } from "./services/market-data.js";
import { AgentStore } from "./services/memory.js";
import { TopicManager } from "./services/topic-manager.js";
import { EngagementTracker } from "./services/engagement-tracker.js";
import { LearnedContextLog } from "./services/learned-context.js";
import { PollingLoop, scheduleMaintenance } from "./services/scheduler.js";
import { PostingCycle } from "./services/posting-cycle.js";
import { ReplyProducer, ReplyWriter } from "./services/engagement/reply-producer.js";
import { CommentReplyProducer } from "./services/engagement/comment-replies.js";
import { MentionReplyProducer } from "./services/engagement/mention-replies.js";
import { AccountMonitor } from "./services/engagement/account-monitor.js";
import { ProducerName } from "./services/engagement/types.js";
import { describeError } from "./utils/errors.js";

/**
 * frogwire daemon entry point: posting loop, mention loop, maintenance cron.
 */

const MINUTE_MS = 60_000;

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const problems = validateRuntimeConfig(config);
  if (problems.length > 0) {
    for (const problem of problems) {
      console.error(`[ERROR] ${problem}`);
    }
    process.exit(1);
  }

  const store = new AgentStore();
  const claim = store.claimOwnership();
  if (!claim.ok) {
    console.error(`[ERROR] another frogwire instance owns the data directory: ${claim.reason}`);
    process.exit(1);
  }
  process.once("exit", () => store.releaseOwnership());

  console.log("=".repeat(50));
  console.log(`[INIT] frogwire starting${config.testMode ? " (TEST_MODE: nothing is sent)" : ""}`);
  console.log("=".repeat(50));

  const { content, replies, schedule } = config;
  const catalog = loadPromptCatalog(undefined, content.subjectTicker);
  const llm = new ClaudeTextGenerator(initClaudeClient(config.credentials.anthropicApiKey));

  let platform: SocialPlatform;
  if (config.testMode) {
    platform = new DryRunPlatform();
  } else {
    platform = new TwitterPlatform(initTwitterClient(config.credentials));
    const me = await platform.getMe();
    console.log(`[OK] authenticated as @${me.username}`);
  }

  const topics = new TopicManager(store);
  const tracker = new EngagementTracker(platform);
  const learnedContext = new LearnedContextLog();
  const priceTracker = new PriceMentionTracker();
  const limiter = new SharedReplyRateLimiter({ maxPerHour: replies.maxRepliesPerHour });

  const acceptance = new AcceptancePipeline({
    rules: { maxLength: content.maxTweetLength, maxHashtags: content.maxHashtags },
    catchPhrase: content.catchPhrase,
    subjectTicker: content.subjectTicker,
    minCriticScore: content.criticMinScore,
    critic: new TweetCritic(llm, catalog.criticSystemPrompt),
    priceTracker,
  });
  const generator = new ContentGenerator({
    llm,
    catalog,
    acceptance,
    priceTracker,
    settings: content,
    market: new MarketDataService({ subjectPairAddress: content.subjectPairAddress }),
    styleGuidance: tracker,
    learnedContext,
  });

  const writer = new ReplyWriter(llm, catalog.replySystemPrompt);
  const producer = (name: ProducerName) =>
    new ReplyProducer({
      name,
      platform,
      limiter,
      strictQuota: replies.strictQuota,
      maxLength: content.maxTweetLength,
      blockedUsernames: replies.blockedUsernames,
      swapProbability: replies.swapProbability,
    });

  const comments = replies.enabled
    ? new CommentReplyProducer(producer("comments"), platform, limiter, writer, replies.maxRepliesPerTweet)
    : undefined;
  const monitor =
    replies.monitoredAccounts.length > 0
      ? new AccountMonitor(
          producer("monitor"),
          platform,
          writer,
          replies.monitoredAccounts,
          schedule.postIntervalMinutes
        )
      : undefined;

  const postingCycle = new PostingCycle({
    platform,
    store,
    generator,
    topics,
    tracker,
    limiter,
    priceTracker,
    schedule,
    observability: config.observability,
    comments,
    monitor,
  });

  const firstDelayMs = postingCycle.nextIntervalMs();
  const postingLoop = new PollingLoop({
    name: "posting",
    firstDelayMs,
    errorDelayMs: schedule.postIntervalMinutes * MINUTE_MS,
    tick: () => postingCycle.tick(),
  });

  const loops: PollingLoop[] = [postingLoop];
  if (replies.enabled) {
    const mentions = new MentionReplyProducer(producer("mentions"), platform, writer, learnedContext, {
      pollMinutes: schedule.mentionPollMinutes,
      maxRepliesPerCycle: replies.maxMentionRepliesPerCycle,
    });
    const pollMs = schedule.mentionPollMinutes * MINUTE_MS;
    loops.push(
      new PollingLoop({
        name: "mentions",
        firstDelayMs: pollMs,
        errorDelayMs: pollMs,
        keepAlive: false,
        tick: async () => {
          const result = await mentions.run();
          console.log(`[MENTION] cycle done: replied=${result.replied} skipped=${result.skipped} failed=${result.failed}`);
          return pollMs;
        },
      })
    );
  }

  const jobs = scheduleMaintenance({
    tracker,
    topics,
    categories: generator.categories,
    retentionDays: config.engagement.retentionDays,
  });

  for (const loop of loops) loop.start();

  console.log(`[SCHEDULER] first post in ${Math.round(firstDelayMs / MINUTE_MS)} minutes`);
  console.log(
    `[SCHEDULER] posts ${store.countPostsInWindow(1)}/${schedule.maxPostsPerHour} last hour, ` +
      `${store.countPostsInWindow(24)}/${schedule.maxPostsPerDay} last day`
  );
  console.log(
    `[SCHEDULER] replies ${replies.enabled ? "on" : "off"} (${replies.maxRepliesPerHour}/h), ` +
      `mentions every ${schedule.mentionPollMinutes}m, monitored: ${replies.monitoredAccounts.join(", ") || "none"}`
  );
  console.log("[SCHEDULER] running (Ctrl+C to stop)");

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n[SCHEDULER] ${signal} received, stopping`);

    for (const loop of loops) loop.stop();
    for (const job of jobs) job.stop();

    for (const loop of loops) {
      const joined = await loop.join(schedule.shutdownJoinTimeoutMs);
      if (!joined) {
        console.warn(`[WARN] ${loop.name} loop did not stop within ${schedule.shutdownJoinTimeoutMs}ms`);
      }
    }

    store.close();
    console.log("[OK] frogwire stopped");
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

main().catch((error) => {
  console.error(`[ERROR] fatal: ${describeError(error)}`);
  process.exit(1);
});
