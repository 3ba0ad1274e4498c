import fs from "fs";
import os from "os";
import path from "path";
import { CompletionRequest, TextGenerator } from "../src/services/llm.js";
import { SocialPlatform } from "../src/services/twitter.js";
import { PlatformUser, PostedTweet, PublicMetrics, SourceItem } from "../src/types/agent.js";

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `frogwire-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function manualClock(startIso: string) {
  let current = new Date(startIso).getTime();
  return {
    now: () => new Date(current),
    nowMs: () => current,
    advanceMinutes(minutes: number): void {
      current += minutes * 60_000;
    },
    advanceHours(hours: number): void {
      current += hours * 60 * 60_000;
    },
  };
}

/**
 * Replays scripted completions; a function entry can inspect the request or throw.
 */
export class ScriptedTextGenerator implements TextGenerator {
  readonly calls: CompletionRequest[] = [];

  constructor(private readonly responder: (request: CompletionRequest, index: number) => string) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.calls.push(request);
    return this.responder(request, this.calls.length - 1);
  }
}

export function sourceItem(overrides: Partial<SourceItem> & { id: string }): SourceItem {
  return {
    text: "this is a perfectly normal comment",
    authorId: `author_${overrides.id}`,
    authorUsername: `user_${overrides.id}`,
    authorFollowers: 100,
    likes: 1,
    shares: 0,
    ...overrides,
  };
}

export class FakePlatform implements SocialPlatform {
  readonly posts: string[] = [];
  readonly replies: { text: string; inReplyToId: string }[] = [];
  readonly threads: string[][] = [];
  repliesByConversation = new Map<string, SourceItem[]>();
  readonly searchedConversations: string[] = [];
  mentions: SourceItem[] = [];
  userPosts = new Map<string, SourceItem[]>();
  metrics = new Map<string, PublicMetrics>();
  postTexts = new Map<string, string>();
  failReplies = false;
  failPosts = false;
  mentionSinces: Date[] = [];
  private counter = 0;

  async getMe(): Promise<PlatformUser> {
    return { id: "self", username: "frogwire" };
  }

  async post(text: string): Promise<PostedTweet> {
    if (this.failPosts) throw new Error("post rejected");
    this.posts.push(text);
    return { id: this.nextId(), text };
  }

  async reply(text: string, inReplyToId: string): Promise<PostedTweet> {
    if (this.failReplies) throw new Error("reply rejected");
    this.replies.push({ text, inReplyToId });
    return { id: this.nextId(), text };
  }

  async postThread(segments: readonly string[]): Promise<PostedTweet[]> {
    if (this.failPosts) throw new Error("thread rejected");
    this.threads.push([...segments]);
    return segments.map((text) => ({ id: this.nextId(), text }));
  }

  async searchReplies(conversationId: string): Promise<SourceItem[]> {
    this.searchedConversations.push(conversationId);
    return this.repliesByConversation.get(conversationId) ?? [];
  }

  async getMentions(since: Date): Promise<SourceItem[]> {
    this.mentionSinces.push(since);
    return this.mentions;
  }

  async getUserRecentPosts(username: string): Promise<SourceItem[]> {
    const posts = this.userPosts.get(username);
    if (!posts) throw new Error(`unknown user ${username}`);
    return posts;
  }

  async getMetrics(postId: string): Promise<PublicMetrics | null> {
    return this.metrics.get(postId) ?? null;
  }

  async getPostText(postId: string): Promise<string | null> {
    return this.postTexts.get(postId) ?? null;
  }

  private nextId(): string {
    this.counter += 1;
    return `tw_${this.counter}`;
  }
}
