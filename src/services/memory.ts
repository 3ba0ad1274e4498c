import fs from "fs";
import os from "os";
import path from "path";
import { PostRecord, PostStatus, TopicRecord } from "../types/agent.js";
import { describeError, errorCode } from "../utils/errors.js";
import { isRecord, readCount, readOptionalString } from "../utils/guards.js";

const DATA_DIR = path.join(process.cwd(), "data");
const STORE_SAVE_DEBOUNCE_MS = 250;
const MAX_STORED_POSTS = 2000;
const HOUR_MS = 60 * 60 * 1000;

interface StoreData {
  posts: PostRecord[];
  nextPostId: number;
  topics: Record<string, TopicRecord>;
  settings: Record<string, string>;
  lastUpdated: string;
}

export interface NewPostInput {
  content: string;
  category: string;
  isThread?: boolean;
  threadId?: string;
}

export type PostPatch = Partial<Omit<PostRecord, "id" | "createdAt">>;

export interface EngagementStats {
  totalPosts: number;
  totalLikes: number;
  totalShares: number;
  totalReplies: number;
  avgEngagement: number;
  days: number;
}

export type StoreClaim = { ok: true } | { ok: false; reason: string; ownerPid?: number };

interface StoreOwner {
  pid: number;
  host: string;
  claimedAt: string;
}

function createEmptyStoreData(): StoreData {
  return {
    posts: [],
    nextPostId: 1,
    topics: {},
    settings: {},
    lastUpdated: new Date().toISOString(),
  };
}

/**
 * Local JSON document store for post records, topic usage and settings.
 * Writes are debounced; call flush() before exit.
 */
export class AgentStore {
  private data: StoreData;
  private readonly dataPath: string;
  private readonly now: () => Date;
  private readonly ownerPath: string;
  private saveTimer: NodeJS.Timeout | null = null;
  private owned = false;

  constructor(options?: { dataPath?: string; now?: () => Date }) {
    this.dataPath = options?.dataPath ? path.resolve(options.dataPath) : path.join(DATA_DIR, "agent-store.json");
    this.ownerPath = `${this.dataPath}.owner`;
    this.now = typeof options?.now === "function" ? options.now : () => new Date();
    this.data = this.load();
  }

  createPost(input: NewPostInput): PostRecord {
    const record: PostRecord = {
      id: this.data.nextPostId,
      content: input.content,
      category: input.category,
      status: "pending",
      createdAt: this.now().toISOString(),
      likes: 0,
      shares: 0,
      replies: 0,
      isThread: input.isThread === true,
      threadId: input.threadId,
    };
    this.data.nextPostId += 1;
    this.data.posts.push(record);
    if (this.data.posts.length > MAX_STORED_POSTS) {
      this.data.posts = this.data.posts.slice(-MAX_STORED_POSTS);
    }
    this.save();
    return { ...record };
  }

  updatePost(id: number, patch: PostPatch): boolean {
    const record = this.data.posts.find((post) => post.id === id);
    if (!record) return false;
    Object.assign(record, patch);
    this.save();
    return true;
  }

  getPost(id: number): PostRecord | undefined {
    const record = this.data.posts.find((post) => post.id === id);
    return record ? { ...record } : undefined;
  }

  getPostByTweetId(tweetId: string): PostRecord | undefined {
    const record = this.data.posts.find((post) => post.tweetId === tweetId);
    return record ? { ...record } : undefined;
  }

  /**
   * Id of the first record stored for a thread; comments only arrive under its tweet.
   */
  getThreadHeadId(threadId: string): number | undefined {
    let head: number | undefined;
    for (const post of this.data.posts) {
      if (post.threadId === threadId && (head === undefined || post.id < head)) head = post.id;
    }
    return head;
  }

  /**
   * Newest first.
   */
  getRecentPosts(limit: number = 10, status?: PostStatus): PostRecord[] {
    return this.data.posts
      .filter((post) => !status || post.status === status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id - a.id)
      .slice(0, Math.max(0, limit))
      .map((post) => ({ ...post }));
  }

  countPostsInWindow(hours: number): number {
    const since = this.now().getTime() - hours * HOUR_MS;
    return this.data.posts.filter(
      (post) => post.status === "posted" && new Date(post.createdAt).getTime() > since
    ).length;
  }

  isDuplicateContent(text: string, hours: number = 24): boolean {
    const since = this.now().getTime() - hours * HOUR_MS;
    return this.data.posts.some(
      (post) =>
        post.status === "posted" &&
        post.content === text &&
        new Date(post.createdAt).getTime() > since
    );
  }

  getTopic(name: string): TopicRecord | undefined {
    const topic = this.data.topics[name];
    return topic ? { ...topic } : undefined;
  }

  setTopic(topic: TopicRecord): void {
    this.data.topics[topic.name] = { ...topic };
    this.save();
  }

  listTopics(): TopicRecord[] {
    return Object.values(this.data.topics).map((topic) => ({ ...topic }));
  }

  getSetting(key: string): string | undefined {
    return this.data.settings[key];
  }

  setSetting(key: string, value: string): void {
    this.data.settings[key] = value;
    this.save();
  }

  getEngagementStats(days: number = 7): EngagementStats {
    const since = this.now().getTime() - days * 24 * HOUR_MS;
    const posted = this.data.posts.filter(
      (post) => post.status === "posted" && post.postedAt && new Date(post.postedAt).getTime() > since
    );
    const totalLikes = posted.reduce((sum, post) => sum + post.likes, 0);
    const totalShares = posted.reduce((sum, post) => sum + post.shares, 0);
    const totalReplies = posted.reduce((sum, post) => sum + post.replies, 0);
    return {
      totalPosts: posted.length,
      totalLikes,
      totalShares,
      totalReplies,
      avgEngagement: posted.length > 0 ? (totalLikes + totalShares + totalReplies) / posted.length : 0,
      days,
    };
  }

  /**
   * Makes this process the only writer of the store file. An owner record left by a
   * process that is no longer running is taken over.
   */
  claimOwnership(): StoreClaim {
    if (this.owned) return { ok: true };

    const existing = readStoreOwner(this.ownerPath);
    if (existing && isProcessAlive(existing.pid)) {
      return {
        ok: false,
        reason: `${this.dataPath} is in use by pid ${existing.pid} on ${existing.host} since ${existing.claimedAt}`,
        ownerPid: existing.pid,
      };
    }

    const owner: StoreOwner = { pid: process.pid, host: os.hostname(), claimedAt: this.now().toISOString() };
    try {
      fs.mkdirSync(path.dirname(this.ownerPath), { recursive: true });
      if (fs.existsSync(this.ownerPath)) {
        console.log(`[STORE] replacing stale owner record${existing ? ` of pid ${existing.pid}` : ""}`);
        fs.rmSync(this.ownerPath, { force: true });
      }
      fs.writeFileSync(this.ownerPath, JSON.stringify(owner, null, 2), { encoding: "utf-8", flag: "wx" });
    } catch (error) {
      const reason =
        errorCode(error) === "EEXIST"
          ? `${this.dataPath} was claimed by another process during startup`
          : `could not claim ${this.dataPath}: ${describeError(error)}`;
      return { ok: false, reason };
    }

    this.owned = true;
    console.log(`[STORE] claimed by pid ${owner.pid}`);
    return { ok: true };
  }

  releaseOwnership(): void {
    if (!this.owned) return;
    this.owned = false;
    const owner = readStoreOwner(this.ownerPath);
    if (owner && owner.pid !== process.pid) return;
    try {
      fs.rmSync(this.ownerPath, { force: true });
    } catch (error) {
      console.warn(`[STORE] owner record not removed: ${describeError(error)}`);
    }
  }

  /**
   * Final write, then ownership release.
   */
  close(): void {
    this.flush();
    this.releaseOwnership();
  }

  flush(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    try {
      this.data.lastUpdated = this.now().toISOString();
      fs.mkdirSync(path.dirname(this.dataPath), { recursive: true });
      fs.writeFileSync(this.dataPath, JSON.stringify(this.data, null, 2));
    } catch (error) {
      console.error(`[STORE] save failed: ${describeError(error)}`);
    }
  }

  private save(): void {
    if (this.saveTimer) return;
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      this.flush();
    }, STORE_SAVE_DEBOUNCE_MS);
    this.saveTimer.unref();
  }

  private load(): StoreData {
    try {
      if (!fs.existsSync(this.dataPath)) {
        return createEmptyStoreData();
      }
      const raw: unknown = JSON.parse(fs.readFileSync(this.dataPath, "utf-8"));
      const data = normalizeStoreData(raw);
      console.log(`[STORE] loaded - posts: ${data.posts.length}, topics: ${Object.keys(data.topics).length}`);
      return data;
    } catch (error) {
      console.error(`[STORE] load failed, starting empty: ${describeError(error)}`);
      return createEmptyStoreData();
    }
  }
}

function readStoreOwner(ownerPath: string): StoreOwner | null {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(ownerPath, "utf-8"));
  } catch (error) {
    if (errorCode(error) !== "ENOENT") {
      console.warn(`[STORE] owner record unreadable: ${describeError(error)}`);
    }
    return null;
  }
  if (!isRecord(raw)) return null;
  const pid = readCount(raw.pid);
  if (!pid) return null;
  return {
    pid,
    host: readOptionalString(raw.host) ?? "unknown host",
    claimedAt: readOptionalString(raw.claimedAt) ?? "unknown time",
  };
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === "EPERM";
  }
}

function normalizeStoreData(raw: unknown): StoreData {
  if (!isRecord(raw)) return createEmptyStoreData();

  const posts = Array.isArray(raw.posts) ? raw.posts.map(normalizePost).filter((post): post is PostRecord => post !== null) : [];
  const maxId = posts.reduce((max, post) => Math.max(max, post.id), 0);
  const topics: Record<string, TopicRecord> = {};
  if (isRecord(raw.topics)) {
    for (const value of Object.values(raw.topics)) {
      const topic = normalizeTopic(value);
      if (topic) topics[topic.name] = topic;
    }
  }
  const settings: Record<string, string> = {};
  if (isRecord(raw.settings)) {
    for (const [key, value] of Object.entries(raw.settings)) {
      if (typeof value === "string") settings[key] = value;
    }
  }

  return {
    posts,
    nextPostId: Math.max(readCount(raw.nextPostId), maxId + 1),
    topics,
    settings,
    lastUpdated: readOptionalString(raw.lastUpdated) ?? new Date().toISOString(),
  };
}

function normalizePost(raw: unknown): PostRecord | null {
  if (!isRecord(raw)) return null;
  const id = readCount(raw.id);
  const content = typeof raw.content === "string" ? raw.content : "";
  const createdAt = readOptionalString(raw.createdAt);
  if (!id || !content || !createdAt) return null;
  const status: PostStatus = raw.status === "posted" || raw.status === "failed" ? raw.status : "pending";
  return {
    id,
    tweetId: readOptionalString(raw.tweetId),
    content,
    category: readOptionalString(raw.category) ?? "general",
    status,
    createdAt,
    postedAt: readOptionalString(raw.postedAt),
    likes: readCount(raw.likes),
    shares: readCount(raw.shares),
    replies: readCount(raw.replies),
    isThread: raw.isThread === true,
    threadId: readOptionalString(raw.threadId),
    errorMessage: readOptionalString(raw.errorMessage),
  };
}

function normalizeTopic(raw: unknown): TopicRecord | null {
  if (!isRecord(raw)) return null;
  const name = readOptionalString(raw.name);
  if (!name) return null;
  const successRate = typeof raw.successRate === "number" ? Math.min(1, Math.max(0, raw.successRate)) : 0;
  const avgEngagement = typeof raw.avgEngagement === "number" && raw.avgEngagement > 0 ? raw.avgEngagement : 0;
  return {
    name,
    lastUsedAt: readOptionalString(raw.lastUsedAt),
    usageCount: readCount(raw.usageCount),
    successRate,
    avgEngagement,
  };
}
