import test from "node:test";
import type { TestContext } from "node:test";
import assert from "node:assert/strict";
import fs from "fs";
import path from "path";
import { PromptCatalog } from "../src/config/templates.js";
import { DEFAULT_CONTENT_SETTINGS, DEFAULT_SCHEDULE_SETTINGS } from "../src/config/runtime.js";
import { AcceptancePipeline } from "../src/services/acceptance.js";
import { TweetCritic } from "../src/services/critic.js";
import { ContentGenerator } from "../src/services/generator.js";
import { AgentStore } from "../src/services/memory.js";
import { TopicManager } from "../src/services/topic-manager.js";
import { EngagementTracker } from "../src/services/engagement-tracker.js";
import { SharedReplyRateLimiter } from "../src/services/reply-rate-limiter.js";
import { PriceMentionTracker } from "../src/services/price-mention-tracker.js";
import { PostingCycle } from "../src/services/posting-cycle.js";
import { ReplyProducer, ReplyWriter } from "../src/services/engagement/reply-producer.js";
import { CommentReplyProducer } from "../src/services/engagement/comment-replies.js";
import { ScheduleRuntimeSettings } from "../src/types/runtime.js";
import { FakePlatform, ScriptedTextGenerator, makeTempDir, manualClock, removeDir, sourceItem } from "./helpers.js";

const CATALOG: PromptCatalog = {
  baseSystemPrompt: "you are a frog",
  criticSystemPrompt: "rate it",
  replySystemPrompt: "reply briefly",
  insightSystemPrompt: "summarise",
  templates: [{ category: "general", weight: 1, liveData: false, prompts: ["say something about the pond"] }],
};

function buildCycle(options: {
  responses: string[];
  threadRoll?: number;
  schedule?: Partial<ScheduleRuntimeSettings>;
  withComments?: boolean;
}) {
  const dir = makeTempDir("cycle");
  const clock = manualClock("2026-03-01T12:00:00.000Z");
  const platform = new FakePlatform();
  const store = new AgentStore({ dataPath: path.join(dir, "store.json"), now: clock.now });
  const topics = new TopicManager(store, { now: clock.now });
  const tracker = new EngagementTracker(platform, { now: clock.now });
  const priceTracker = new PriceMentionTracker({ dataPath: path.join(dir, "price.json"), now: clock.now });
  const limiter = new SharedReplyRateLimiter({ maxPerHour: 5, now: clock.now });
  const llm = new ScriptedTextGenerator((_request, index) => options.responses[Math.min(index, options.responses.length - 1)] ?? "");

  const generator = new ContentGenerator({
    llm,
    catalog: CATALOG,
    acceptance: new AcceptancePipeline({
      rules: { maxLength: 280, maxHashtags: 3 },
      catchPhrase: "gm",
      subjectTicker: "$FROG",
      minCriticScore: 8,
      critic: new TweetCritic(new ScriptedTextGenerator(() => "Score: 9"), "rate it"),
      priceTracker,
      now: clock.now,
    }),
    priceTracker,
    settings: DEFAULT_CONTENT_SETTINGS,
    random: () => 0,
  });

  const replyLlm = new ScriptedTextGenerator(() => "thanks fren");
  const comments = options.withComments
    ? new CommentReplyProducer(
        new ReplyProducer({
          name: "comments",
          platform,
          limiter,
          strictQuota: true,
          maxLength: 280,
          blockedUsernames: [],
          swapProbability: 0,
        }),
        platform,
        limiter,
        new ReplyWriter(replyLlm, "reply briefly"),
        2,
        { now: clock.now }
      )
    : undefined;

  const eventLogPath = path.join(dir, "metrics.ndjson");
  const cycle = new PostingCycle({
    platform,
    store,
    generator,
    topics,
    tracker,
    limiter,
    priceTracker,
    schedule: { ...DEFAULT_SCHEDULE_SETTINGS, ...options.schedule },
    observability: { enabled: true, stdoutJson: false, eventLogPath },
    comments,
    random: () => options.threadRoll ?? 0.99,
    now: clock.now,
  });

  const readEvents = (): unknown[] =>
    fs
      .readFileSync(eventLogPath, "utf-8")
      .split("\n")
      .filter(Boolean)
      .map((line): unknown => JSON.parse(line));

  const cleanup = () => {
    store.flush();
    removeDir(dir);
  };
  return { cycle, platform, store, topics, tracker, llm, clock, readEvents, cleanup };
}

function seedPosted(store: AgentStore, content: string, tweetId: string): void {
  const record = store.createPost({ content, category: "general" });
  store.updatePost(record.id, { status: "posted", tweetId, postedAt: "2026-03-01T12:00:00.000Z" });
}

function quiet(t: TestContext): void {
  t.mock.method(console, "log", () => {});
  t.mock.method(console, "warn", () => {});
  t.mock.method(console, "error", () => {});
}

test("a cycle posts one accepted post and records it everywhere", async (t) => {
  quiet(t);
  const built = buildCycle({ responses: ["the pond hums tonight"] });

  const report = await built.cycle.run();
  assert.equal(report.outcome, "posted");
  assert.equal(report.category, "general");
  assert.deepEqual(report.postIds, ["tw_1"]);
  assert.deepEqual(built.platform.posts, ["the pond hums tonight"]);

  const stored = built.store.getPostByTweetId("tw_1");
  assert.equal(stored?.status, "posted");
  assert.equal(stored?.content, "the pond hums tonight");
  assert.equal(built.store.getTopic("general")?.usageCount, 1);
  assert.equal(built.store.getTopic("general")?.successRate, 1);
  assert.equal(built.tracker.size, 1);

  const events = built.readEvents();
  assert.equal(events.length, 1);
  assert.deepEqual(events[0], {
    type: "post_cycle",
    timestamp: "2026-03-01T12:00:00.000Z",
    cycle: 1,
    outcome: "posted",
    category: "general",
    generationAttempts: 1,
    durationMs: Reflect.get(Object(events[0]), "durationMs"),
    replies: {
      comments: { replied: 0, failed: 0, skipped: 0 },
      mentions: { replied: 0, failed: 0, skipped: 0 },
      monitor: { replied: 0, failed: 0, skipped: 0 },
    },
    quota: { repliesLastHour: 0, maxPerHour: 5, remaining: 5, exhausted: false, reason: null },
    priceGate: { canMention: true, hoursUntilAllowed: 0 },
    posts: { lastHour: 1, lastDay: 1 },
  });
  built.cleanup();
});

test("hitting the hourly cap skips generation and retries in 30 minutes", async (t) => {
  quiet(t);
  const built = buildCycle({ responses: ["unused"], schedule: { maxPostsPerHour: 1 } });
  seedPosted(built.store, "earlier post", "tw_0");

  assert.equal(await built.cycle.tick(), 30 * 60_000);
  assert.equal(built.llm.calls.length, 0);
  assert.equal(built.platform.posts.length, 0);
  assert.equal(Reflect.get(Object(built.readEvents()[0]), "outcome"), "rate-limited");
  built.cleanup();
});

test("a successful cycle reschedules at a jittered interval", async (t) => {
  quiet(t);
  const built = buildCycle({ responses: ["the pond hums tonight"] });
  assert.equal(await built.cycle.tick(), 150 * 60_000);
  built.cleanup();
});

test("a post already published in the last 72 hours is regenerated once", async (t) => {
  quiet(t);
  const built = buildCycle({ responses: ["the pond hums tonight", "a different lily pad story"] });
  seedPosted(built.store, "the pond hums tonight", "tw_0");

  const report = await built.cycle.run();
  assert.equal(report.outcome, "posted");
  assert.equal(report.generationAttempts, 2);
  assert.deepEqual(built.platform.posts, ["a different lily pad story"]);
  built.cleanup();
});

test("a thread roll posts every segment under one thread id", async (t) => {
  quiet(t);
  const built = buildCycle({
    responses: ["1/ first take on ponds\n2/ second take\n3/ third take"],
    threadRoll: 0,
  });

  const report = await built.cycle.run();
  assert.equal(report.outcome, "thread");
  assert.deepEqual(report.postIds, ["tw_1", "tw_2", "tw_3"]);
  assert.deepEqual(built.platform.threads, [["first take on ponds", "second take", "third take"]]);

  const records = built.store.getRecentPosts(10, "posted");
  assert.equal(records.length, 3);
  assert.equal(new Set(records.map((record) => record.threadId)).size, 1);
  assert.ok(records.every((record) => record.isThread));
  built.cleanup();
});

test("a platform failure marks the record failed and the topic unsuccessful", async (t) => {
  quiet(t);
  const built = buildCycle({ responses: ["the pond hums tonight"] });
  built.platform.failPosts = true;

  const report = await built.cycle.run();
  assert.equal(report.outcome, "post-failed");
  const [record] = built.store.getRecentPosts(1);
  assert.equal(record?.status, "failed");
  assert.equal(record?.errorMessage, "post rejected");
  assert.equal(built.store.getTopic("general")?.successRate, 0);
  built.cleanup();
});

test("an exhausted generation budget reports no content", async (t) => {
  quiet(t);
  const built = buildCycle({ responses: ["x".repeat(300)] });

  const report = await built.cycle.run();
  assert.equal(report.outcome, "no-content");
  assert.equal(report.generationAttempts, 10);
  assert.equal(built.platform.posts.length, 0);
  built.cleanup();
});

test("comment replies on older posts run before generation and show up in the metric", async (t) => {
  quiet(t);
  const built = buildCycle({ responses: ["the pond hums tonight"], withComments: true });
  seedPosted(built.store, "an older pond post", "old1");
  built.platform.repliesByConversation.set("old1", [sourceItem({ id: "c1" })]);
  built.clock.advanceHours(2);

  const report = await built.cycle.run();
  assert.equal(report.replyResults.length, 1);
  assert.equal(report.replyResults[0]?.replied, 1);
  assert.deepEqual(built.platform.replies, [{ text: "thanks fren", inReplyToId: "c1" }]);

  const replies = Reflect.get(Object(built.readEvents()[0]), "replies");
  assert.deepEqual(Reflect.get(Object(replies), "comments"), { replied: 1, failed: 0, skipped: 0 });
  built.cleanup();
});

test("comment checks look only at the head of a posted thread", async (t) => {
  quiet(t);
  const built = buildCycle({ responses: ["the pond hums tonight"], withComments: true });
  for (const [index, tweetId] of ["th1", "th2", "th3"].entries()) {
    const record = built.store.createPost({
      content: `thread part ${index + 1}`,
      category: "general",
      isThread: true,
      threadId: "thread_1",
    });
    built.store.updatePost(record.id, { status: "posted", tweetId, postedAt: "2026-03-01T12:00:00.000Z" });
  }
  seedPosted(built.store, "a single pond post", "s1");
  for (const conversation of ["th1", "th2", "th3", "s1"]) {
    built.platform.repliesByConversation.set(conversation, [sourceItem({ id: `c_${conversation}` })]);
  }
  built.clock.advanceHours(2);

  const report = await built.cycle.run();
  assert.equal(report.replyResults[0]?.replied, 2);
  assert.deepEqual([...built.platform.searchedConversations].sort(), ["s1", "th1"]);
  assert.deepEqual(built.platform.replies.map((reply) => reply.inReplyToId).sort(), ["c_s1", "c_th1"]);
  built.cleanup();
});
