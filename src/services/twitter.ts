import { TTweetv2TweetField, TwitterApi, TweetV2, UserV2 } from "twitter-api-v2";
import { PlatformUser, PostedTweet, PublicMetrics, SourceItem } from "../types/agent.js";
import { CredentialSettings } from "../types/runtime.js";
import { describeError } from "../utils/errors.js";
import { isRecord } from "../utils/guards.js";

const POST_MAX_ATTEMPTS = 3;
const THREAD_SEGMENT_GAP_MS = 1000;
const SOURCE_TWEET_FIELDS: TTweetv2TweetField[] = [
  "created_at",
  "public_metrics",
  "conversation_id",
  "author_id",
  "referenced_tweets",
];

/**
 * Everything the agent needs from the social platform. Reads and writes throw on failure;
 * callers catch at their own boundary.
 */
export interface SocialPlatform {
  getMe(): Promise<PlatformUser>;
  post(text: string): Promise<PostedTweet>;
  reply(text: string, inReplyToId: string): Promise<PostedTweet>;
  postThread(segments: readonly string[]): Promise<PostedTweet[]>;
  searchReplies(conversationId: string): Promise<SourceItem[]>;
  getMentions(since: Date): Promise<SourceItem[]>;
  getUserRecentPosts(username: string, since: Date): Promise<SourceItem[]>;
  getMetrics(postId: string): Promise<PublicMetrics | null>;
  getPostText(postId: string): Promise<string | null>;
}

export function initTwitterClient(credentials: CredentialSettings): TwitterApi {
  return new TwitterApi({
    appKey: credentials.twitterApiKey,
    appSecret: credentials.twitterApiSecret,
    accessToken: credentials.twitterAccessToken,
    accessSecret: credentials.twitterAccessSecret,
  });
}

export function isRateLimitError(error: unknown): boolean {
  if (!isRecord(error)) return false;
  const data = isRecord(error.data) ? error.data : {};
  const title = typeof data.title === "string" ? data.title.toLowerCase() : "";
  return error.code === 429 || error.status === 429 || data.status === 429 || title.includes("rate");
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Up to three tries with linear backoff (60s steps when rate limited, 2s otherwise).
 * The last error is rethrown.
 */
export async function withPostRetry<T>(
  label: string,
  task: () => Promise<T>,
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= POST_MAX_ATTEMPTS; attempt += 1) {
    try {
      return await task();
    } catch (error) {
      lastError = error;
      if (attempt === POST_MAX_ATTEMPTS) break;
      const rateLimited = isRateLimitError(error);
      console.warn(
        `[WARN] ${label} failed (attempt ${attempt}/${POST_MAX_ATTEMPTS})${rateLimited ? " [rate limit]" : ""}: ${describeError(error)}`
      );
      await wait(rateLimited ? 60_000 * attempt : 2_000 * attempt);
    }
  }
  throw lastError;
}

export function toSourceItem(tweet: TweetV2, users: ReadonlyMap<string, UserV2>): SourceItem {
  const authorId = tweet.author_id ?? "";
  const author = users.get(authorId);
  const repliedTo = tweet.referenced_tweets?.find((ref) => ref.type === "replied_to");
  return {
    id: tweet.id,
    text: tweet.text,
    authorId,
    authorUsername: author?.username ?? "",
    authorFollowers: author?.public_metrics?.followers_count ?? 0,
    likes: tweet.public_metrics?.like_count ?? 0,
    shares: tweet.public_metrics?.retweet_count ?? 0,
    createdAt: tweet.created_at,
    conversationId: tweet.conversation_id,
    referencedPostId: repliedTo?.id,
  };
}

function indexUsers(users: readonly UserV2[]): Map<string, UserV2> {
  return new Map(users.map((user) => [user.id, user]));
}

export class TwitterPlatform implements SocialPlatform {
  private me: PlatformUser | null = null;

  constructor(
    private readonly client: TwitterApi,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  async getMe(): Promise<PlatformUser> {
    if (this.me) return this.me;
    const response = await this.client.v2.me();
    this.me = { id: response.data.id, username: response.data.username };
    return this.me;
  }

  async post(text: string): Promise<PostedTweet> {
    const result = await withPostRetry("post", () => this.client.v2.tweet(text), this.wait);
    console.log(`[POST] posted ${result.data.id}`);
    return { id: result.data.id, text: result.data.text };
  }

  async reply(text: string, inReplyToId: string): Promise<PostedTweet> {
    const result = await withPostRetry("reply", () => this.client.v2.reply(text, inReplyToId), this.wait);
    console.log(`[REPLY] posted ${result.data.id} -> ${inReplyToId}`);
    return { id: result.data.id, text: result.data.text };
  }

  /**
   * Chains each segment as a reply to the previous one. A failure after the first segment
   * returns what was posted.
   */
  async postThread(segments: readonly string[]): Promise<PostedTweet[]> {
    const posted: PostedTweet[] = [];
    for (const [index, segment] of segments.entries()) {
      try {
        const previous = posted[posted.length - 1];
        const tweet = previous ? await this.reply(segment, previous.id) : await this.post(segment);
        posted.push(tweet);
        console.log(`[THREAD] ${index + 1}/${segments.length} posted`);
      } catch (error) {
        if (posted.length === 0) throw error;
        console.error(`[ERROR] thread stopped after ${posted.length}/${segments.length}: ${describeError(error)}`);
        return posted;
      }
      if (index < segments.length - 1) await this.wait(THREAD_SEGMENT_GAP_MS);
    }
    return posted;
  }

  async searchReplies(conversationId: string): Promise<SourceItem[]> {
    const result = await this.client.v2.search(`conversation_id:${conversationId} is:reply`, {
      max_results: 50,
      "tweet.fields": SOURCE_TWEET_FIELDS,
      expansions: ["author_id"],
      "user.fields": ["username", "public_metrics"],
    });
    const users = indexUsers(result.includes.users);
    return result.tweets.map((tweet) => toSourceItem(tweet, users));
  }

  async getMentions(since: Date): Promise<SourceItem[]> {
    const me = await this.getMe();
    const result = await this.client.v2.userMentionTimeline(me.id, {
      max_results: 50,
      start_time: since.toISOString(),
      "tweet.fields": SOURCE_TWEET_FIELDS,
      expansions: ["author_id", "referenced_tweets.id"],
      "user.fields": ["username", "public_metrics"],
    });
    const users = indexUsers(result.includes.users);
    return result.tweets.map((tweet) => toSourceItem(tweet, users));
  }

  async getUserRecentPosts(username: string, since: Date): Promise<SourceItem[]> {
    const user = await this.client.v2.userByUsername(username, { "user.fields": ["public_metrics"] });
    const account = user.data;
    if (!account) {
      console.warn(`[MONITOR] user not found: @${username}`);
      return [];
    }
    const result = await this.client.v2.userTimeline(account.id, {
      max_results: 10,
      start_time: since.toISOString(),
      "tweet.fields": SOURCE_TWEET_FIELDS,
    });
    const users = indexUsers([account]);
    return result.tweets.map((tweet) => toSourceItem({ ...tweet, author_id: tweet.author_id ?? account.id }, users));
  }

  async getMetrics(postId: string): Promise<PublicMetrics | null> {
    const result = await this.client.v2.singleTweet(postId, { "tweet.fields": ["public_metrics"] });
    const metrics = result.data?.public_metrics;
    if (!metrics) return null;
    return {
      likes: metrics.like_count,
      shares: metrics.retweet_count,
      replies: metrics.reply_count,
      impressions: metrics.impression_count ?? 0,
    };
  }

  async getPostText(postId: string): Promise<string | null> {
    const result = await this.client.v2.singleTweet(postId, { "tweet.fields": ["text"] });
    return result.data?.text ?? null;
  }
}

/**
 * TEST_MODE stand-in: logs writes, returns synthetic ids, reads nothing.
 */
export class DryRunPlatform implements SocialPlatform {
  private counter = 0;
  readonly sent: { text: string; inReplyToId?: string }[] = [];

  async getMe(): Promise<PlatformUser> {
    return { id: "test_user", username: "dry_run" };
  }

  async post(text: string): Promise<PostedTweet> {
    return this.record(text);
  }

  async reply(text: string, inReplyToId: string): Promise<PostedTweet> {
    return this.record(text, inReplyToId);
  }

  async postThread(segments: readonly string[]): Promise<PostedTweet[]> {
    const posted: PostedTweet[] = [];
    for (const segment of segments) {
      const previous = posted[posted.length - 1];
      posted.push(this.record(segment, previous?.id));
    }
    return posted;
  }

  async searchReplies(): Promise<SourceItem[]> {
    return [];
  }

  async getMentions(): Promise<SourceItem[]> {
    return [];
  }

  async getUserRecentPosts(): Promise<SourceItem[]> {
    return [];
  }

  async getMetrics(): Promise<PublicMetrics | null> {
    return null;
  }

  async getPostText(): Promise<string | null> {
    return null;
  }

  private record(text: string, inReplyToId?: string): PostedTweet {
    this.counter += 1;
    const id = `test_${this.counter}`;
    this.sent.push({ text, inReplyToId });
    console.log(`[TEST] would ${inReplyToId ? `reply to ${inReplyToId}` : "post"} (${id}):\n${text}`);
    return { id, text };
  }
}
