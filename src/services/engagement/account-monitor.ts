import { SourceItem } from "../../types/agent.js";
import { SocialPlatform } from "../twitter.js";
import { describeError } from "../../utils/errors.js";
import { MONITOR_WORTHINESS, mentionWeight } from "./policy.js";
import { ReplyProducer, ReplyWriter, emptyCycleResult, mergeCycleResults } from "./reply-producer.js";
import { ReplyCycleResult } from "./types.js";

const LOOKBACK_PADDING_MINUTES = 30;

export function buildMonitorReplyPrompt(post: SourceItem, username: string): string {
  return [
    `@${username} just posted:`,
    `"${post.text}"`,
    "",
    "Write a short reply (one or two lines) that adds a take, a joke or a fact to what they said. Reply text only.",
  ].join("\n");
}

export class AccountMonitor {
  private readonly now: () => Date;

  constructor(
    private readonly producer: ReplyProducer,
    private readonly platform: SocialPlatform,
    private readonly writer: ReplyWriter,
    private readonly usernames: readonly string[],
    private readonly lookbackMinutes: number,
    options?: { now?: () => Date }
  ) {
    this.now = typeof options?.now === "function" ? options.now : () => new Date();
  }

  async run(): Promise<ReplyCycleResult> {
    const total = emptyCycleResult("monitor");
    if (this.usernames.length === 0) return total;

    const since = new Date(this.now().getTime() - (this.lookbackMinutes + LOOKBACK_PADDING_MINUTES) * 60_000);
    const me = await this.platform.getMe();

    for (const username of this.usernames) {
      try {
        const posts = await this.platform.getUserRecentPosts(username, since);
        if (posts.length === 0) continue;
        console.log(`[MONITOR] @${username}: ${posts.length} new posts`);

        const result = await this.producer.runCycle({
          items: posts,
          selfId: me.id,
          rules: MONITOR_WORTHINESS,
          weight: mentionWeight,
          limit: posts.length,
          compose: (post) => this.writer.write(buildMonitorReplyPrompt(post, username)),
        });
        mergeCycleResults(total, result);
        if (result.quotaExhausted) break;
      } catch (error) {
        console.error(`[ERROR] monitor @${username} failed: ${describeError(error)}`);
      }
    }
    return total;
  }
}
