import { SourceItem } from "../../types/agent.js";
import { SharedReplyRateLimiter } from "../reply-rate-limiter.js";
import { SocialPlatform } from "../twitter.js";
import { describeError } from "../../utils/errors.js";
import { COMMENT_WORTHINESS, commentWeight } from "./policy.js";
import { ReplyProducer, ReplyWriter, emptyCycleResult, mergeCycleResults } from "./reply-producer.js";
import { ReplyCycleResult } from "./types.js";

const MAX_POSTS_CHECKED = 3;
const MIN_POST_AGE_MS = 30 * 60 * 1000;

export interface OwnPost {
  id: string;
  text: string;
  postedAt: string;
}

/**
 * Last three own posts that have had at least 30 minutes to collect comments, newest first.
 */
export function selectPostsForCommentCheck(posts: readonly OwnPost[], now: Date): OwnPost[] {
  const cutoff = now.getTime() - MIN_POST_AGE_MS;
  return [...posts]
    .filter((post) => new Date(post.postedAt).getTime() <= cutoff)
    .sort((a, b) => b.postedAt.localeCompare(a.postedAt))
    .slice(0, MAX_POSTS_CHECKED);
}

export function buildCommentReplyPrompt(original: string, comment: SourceItem): string {
  return [
    "You are replying to a comment on one of your posts.",
    "",
    `YOUR POST:\n"${original}"`,
    "",
    `THEIR COMMENT:\n@${comment.authorUsername || "anon"}: "${comment.text}"`,
    "",
    "Write a short reply (one or two lines) that answers what they actually said. Reply text only.",
  ].join("\n");
}

export class CommentReplyProducer {
  private readonly now: () => Date;

  constructor(
    private readonly producer: ReplyProducer,
    private readonly platform: SocialPlatform,
    private readonly limiter: SharedReplyRateLimiter,
    private readonly writer: ReplyWriter,
    private readonly maxRepliesPerPost: number,
    options?: { now?: () => Date }
  ) {
    this.now = typeof options?.now === "function" ? options.now : () => new Date();
  }

  async run(ownPosts: readonly OwnPost[]): Promise<ReplyCycleResult> {
    const total = emptyCycleResult("comments");
    const posts = selectPostsForCommentCheck(ownPosts, this.now());
    if (posts.length === 0) return total;

    const me = await this.platform.getMe();
    for (const post of posts) {
      const remaining = this.limiter.remainingQuota();
      if (remaining <= 0) {
        const reason = this.limiter.canReply().reason ?? "reply quota exhausted";
        console.log(`[QUOTA] comments: ${reason}; skipping comment check`);
        total.quotaExhausted = true;
        total.quotaReason = reason;
        break;
      }

      try {
        const comments = await this.platform.searchReplies(post.id);
        const result = await this.producer.runCycle({
          items: comments,
          selfId: me.id,
          rules: COMMENT_WORTHINESS,
          weight: commentWeight,
          limit: Math.min(this.maxRepliesPerPost, remaining),
          compose: (comment) => this.writer.write(buildCommentReplyPrompt(post.text, comment)),
        });
        mergeCycleResults(total, result);
        if (result.quotaExhausted) break;
      } catch (error) {
        console.error(`[ERROR] comment check failed for ${post.id}: ${describeError(error)}`);
      }
    }

    if (total.replied > 0) {
      console.log(`[REPLY] comments: ${total.replied} replies across ${posts.length} posts`);
    }
    return total;
  }
}
