import test from "node:test";
import assert from "node:assert/strict";
import { TweetV2, UserV2 } from "twitter-api-v2";
import { DryRunPlatform, isRateLimitError, toSourceItem, withPostRetry } from "../src/services/twitter.js";

test("isRateLimitError recognises the shapes the client throws", () => {
  assert.equal(isRateLimitError({ code: 429 }), true);
  assert.equal(isRateLimitError({ data: { status: 429 } }), true);
  assert.equal(isRateLimitError({ data: { title: "Too Many Requests: Rate limit" } }), true);
  assert.equal(isRateLimitError({ code: 403, data: { title: "Forbidden" } }), false);
  assert.equal(isRateLimitError(new Error("boom")), false);
  assert.equal(isRateLimitError("429"), false);
});

test("withPostRetry backs off linearly and returns the first success", async (t) => {
  const warn = t.mock.method(console, "warn", () => {});
  const waits: number[] = [];
  let calls = 0;

  const result = await withPostRetry(
    "post",
    async () => {
      calls += 1;
      if (calls === 1) throw new Error("timeout");
      if (calls === 2) throw Object.assign(new Error("Too Many Requests"), { code: 429 });
      return "tw_1";
    },
    async (ms) => {
      waits.push(ms);
    }
  );

  assert.equal(result, "tw_1");
  assert.deepEqual(waits, [2_000, 120_000]);
  assert.equal(warn.mock.calls[0]?.arguments[0], "[WARN] post failed (attempt 1/3): timeout");
  assert.equal(
    warn.mock.calls[1]?.arguments[0],
    "[WARN] post failed (attempt 2/3) [rate limit]: Too Many Requests"
  );
});

test("withPostRetry rethrows the last error after three attempts", async (t) => {
  t.mock.method(console, "warn", () => {});
  const waits: number[] = [];
  let calls = 0;

  await assert.rejects(
    withPostRetry(
      "reply",
      async () => {
        calls += 1;
        throw new Error(`failure ${calls}`);
      },
      async (ms) => {
        waits.push(ms);
      }
    ),
    /failure 3/
  );
  assert.equal(calls, 3);
  assert.deepEqual(waits, [2_000, 4_000]);
});

test("toSourceItem joins the author and the replied-to reference", () => {
  const tweet: TweetV2 = {
    id: "t1",
    text: "ribbit ribbit",
    edit_history_tweet_ids: ["t1"],
    author_id: "u1",
    conversation_id: "c1",
    created_at: "2026-03-01T10:00:00.000Z",
    referenced_tweets: [
      { type: "quoted", id: "q1" },
      { type: "replied_to", id: "p1" },
    ],
  };
  const author: UserV2 = { id: "u1", name: "Pond Fan", username: "pondfan", public_metrics: { followers_count: 321 } };

  const item = toSourceItem(tweet, new Map([["u1", author]]));
  assert.equal(item.authorUsername, "pondfan");
  assert.equal(item.authorFollowers, 321);
  assert.equal(item.referencedPostId, "p1");
  assert.equal(item.conversationId, "c1");
  assert.equal(item.likes, 0);
  assert.equal(item.shares, 0);
});

test("toSourceItem tolerates an unknown author", () => {
  const item = toSourceItem({ id: "t2", text: "hello", edit_history_tweet_ids: ["t2"] }, new Map());
  assert.equal(item.authorId, "");
  assert.equal(item.authorUsername, "");
  assert.equal(item.authorFollowers, 0);
  assert.equal(item.referencedPostId, undefined);
});

test("DryRunPlatform chains thread segments with synthetic ids", async (t) => {
  t.mock.method(console, "log", () => {});
  const platform = new DryRunPlatform();

  const single = await platform.post("gm pond");
  const thread = await platform.postThread(["one", "two", "three"]);

  assert.equal(single.id, "test_1");
  assert.deepEqual(
    thread.map((tweet) => tweet.id),
    ["test_2", "test_3", "test_4"]
  );
  assert.deepEqual(platform.sent, [
    { text: "gm pond", inReplyToId: undefined },
    { text: "one", inReplyToId: undefined },
    { text: "two", inReplyToId: "test_2" },
    { text: "three", inReplyToId: "test_3" },
  ]);
  assert.deepEqual(await platform.getMentions(), []);
  assert.equal(await platform.getMetrics(), null);
});
