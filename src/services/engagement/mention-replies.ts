import { SourceItem } from "../../types/agent.js";
import { LearnedContextLog } from "../learned-context.js";
import { SocialPlatform } from "../twitter.js";
import { describeError } from "../../utils/errors.js";
import { MENTION_WORTHINESS, mentionWeight } from "./policy.js";
import { ReplyProducer, ReplyWriter } from "./reply-producer.js";
import { ReplyCycleResult } from "./types.js";

const LOOKBACK_PADDING_MINUTES = 30;

export function buildMentionReplyPrompt(mention: SourceItem, original: string | null): string {
  const author = mention.authorUsername || "anon";
  if (original) {
    return [
      "Someone tagged you in a reply to another post. Read both before answering.",
      "",
      `ORIGINAL POST:\n"${original}"`,
      "",
      `THEIR MENTION:\n@${author}: "${mention.text}"`,
      "",
      "Write a short reply (one or two lines) that shows you read the original post. Reply text only.",
    ].join("\n");
  }
  return [
    "Someone mentioned you.",
    "",
    `THEIR MENTION:\n@${author}: "${mention.text}"`,
    "",
    "Write a short reply (one or two lines). Answer questions, engage with statements. Reply text only.",
  ].join("\n");
}

export class MentionReplyProducer {
  private readonly now: () => Date;

  constructor(
    private readonly producer: ReplyProducer,
    private readonly platform: SocialPlatform,
    private readonly writer: ReplyWriter,
    private readonly learnedContext: LearnedContextLog,
    private readonly settings: { pollMinutes: number; maxRepliesPerCycle: number },
    options?: { now?: () => Date }
  ) {
    this.now = typeof options?.now === "function" ? options.now : () => new Date();
  }

  lookbackStart(): Date {
    const minutes = this.settings.pollMinutes + LOOKBACK_PADDING_MINUTES;
    return new Date(this.now().getTime() - minutes * 60_000);
  }

  async run(): Promise<ReplyCycleResult> {
    const me = await this.platform.getMe();
    const mentions = await this.platform.getMentions(this.lookbackStart());
    console.log(`[MENTION] ${mentions.length} mentions in lookback window`);

    return this.producer.runCycle({
      items: mentions,
      selfId: me.id,
      rules: MENTION_WORTHINESS,
      weight: mentionWeight,
      limit: this.settings.maxRepliesPerCycle,
      compose: (mention) => this.compose(mention),
    });
  }

  private async compose(mention: SourceItem): Promise<string> {
    const original = mention.referencedPostId ? await this.fetchOriginal(mention.referencedPostId) : null;
    if (original) {
      this.learnedContext.append(original, mention.text, "conversation");
    }
    return this.writer.write(buildMentionReplyPrompt(mention, original));
  }

  private async fetchOriginal(postId: string): Promise<string | null> {
    try {
      return await this.platform.getPostText(postId);
    } catch (error) {
      console.warn(`[MENTION] could not fetch original post ${postId}: ${describeError(error)}`);
      return null;
    }
  }
}
