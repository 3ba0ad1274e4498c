import { SourceItem } from "../../types/agent.js";
import { normalizeCandidate } from "../content-guard.js";
import { TextGenerator } from "../llm.js";
import { SharedReplyRateLimiter } from "../reply-rate-limiter.js";
import { SocialPlatform } from "../twitter.js";
import { describeError } from "../../utils/errors.js";
import { evaluateWorthiness, rankCandidates } from "./policy.js";
import { ProducerName, RankingWeight, ReplyCycleResult, WorthinessRules } from "./types.js";

const REPLY_MAX_TOKENS = 100;
const REPLY_TEMPERATURE = 0.8;

/**
 * Shared LLM call for all three producers; returns cleaned text.
 */
export class ReplyWriter {
  constructor(
    private readonly llm: TextGenerator,
    private readonly systemPrompt: string
  ) {}

  async write(prompt: string): Promise<string> {
    const raw = await this.llm.complete({
      prompt,
      system: this.systemPrompt,
      maxTokens: REPLY_MAX_TOKENS,
      temperature: REPLY_TEMPERATURE,
    });
    return normalizeCandidate(raw);
  }
}

export interface ReplyProducerOptions {
  name: ProducerName;
  platform: SocialPlatform;
  limiter: SharedReplyRateLimiter;
  strictQuota: boolean;
  maxLength: number;
  blockedUsernames: readonly string[];
  swapProbability: number;
  random?: () => number;
}

export interface ReplyCycleInput {
  items: readonly SourceItem[];
  selfId: string;
  rules: WorthinessRules;
  weight: RankingWeight;
  limit: number;
  compose: (item: SourceItem) => Promise<string>;
}

type ItemOutcome =
  | { status: "replied"; replyId: string }
  | { status: "quota"; reason: string }
  | { status: "failed" }
  | { status: "skipped"; reason: string };

/**
 * discover -> filter -> [quota] -> generate -> [quota] -> submit -> record.
 * Owns the per-producer RepliedIdSet; the limiter is shared.
 */
export class ReplyProducer {
  private readonly repliedIds = new Set<string>();
  private readonly blocked: ReadonlySet<string>;
  private readonly random: () => number;

  constructor(private readonly options: ReplyProducerOptions) {
    this.blocked = new Set(options.blockedUsernames.map((name) => name.toLowerCase()));
    this.random = options.random ?? Math.random;
  }

  get name(): ProducerName {
    return this.options.name;
  }

  hasReplied(itemId: string): boolean {
    return this.repliedIds.has(itemId);
  }

  async runCycle(input: ReplyCycleInput): Promise<ReplyCycleResult> {
    const result: ReplyCycleResult = {
      producer: this.options.name,
      considered: input.items.length,
      worthy: 0,
      selected: 0,
      replied: 0,
      failed: 0,
      skipped: 0,
      quotaExhausted: false,
    };

    const context = { selfId: input.selfId, blockedUsernames: this.blocked, repliedIds: this.repliedIds };
    const worthy = input.items.filter((item) => evaluateWorthiness(item, input.rules, context).worthy);
    result.worthy = worthy.length;
    const selected = rankCandidates(worthy, input.weight, input.limit, {
      swapProbability: this.options.swapProbability,
      random: this.random,
    });
    result.selected = selected.length;

    for (const item of selected) {
      const outcome = this.options.strictQuota
        ? await this.options.limiter.runExclusive(() => this.replyTo(item, input.compose))
        : await this.replyTo(item, input.compose);

      if (outcome.status === "quota") {
        result.quotaExhausted = true;
        result.quotaReason = outcome.reason;
        result.skipped += selected.length - result.replied - result.failed - result.skipped;
        console.log(`[QUOTA] ${this.options.name}: ${outcome.reason}; skipping remaining items this cycle`);
        break;
      }
      if (outcome.status === "replied") result.replied += 1;
      if (outcome.status === "failed") result.failed += 1;
      if (outcome.status === "skipped") {
        result.skipped += 1;
        console.log(`[SKIP] ${this.options.name} ${item.id}: ${outcome.reason}`);
      }
    }

    return result;
  }

  private async replyTo(item: SourceItem, compose: (item: SourceItem) => Promise<string>): Promise<ItemOutcome> {
    const before = this.options.limiter.canReply();
    if (!before.allowed) {
      return { status: "quota", reason: before.reason ?? "reply quota exhausted" };
    }

    let text: string;
    try {
      text = await compose(item);
    } catch (error) {
      console.error(`[ERROR] ${this.options.name} reply generation failed for ${item.id}: ${describeError(error)}`);
      return { status: "failed" };
    }
    if (!text) {
      return { status: "skipped", reason: "empty reply" };
    }
    if (text.length > this.options.maxLength) {
      return { status: "skipped", reason: `reply too long (${text.length} > ${this.options.maxLength})` };
    }

    const beforeSubmit = this.options.limiter.canReply();
    if (!beforeSubmit.allowed) {
      return { status: "quota", reason: beforeSubmit.reason ?? "reply quota exhausted" };
    }

    try {
      const posted = await this.options.platform.reply(text, item.id);
      this.repliedIds.add(item.id);
      this.options.limiter.recordReply();
      console.log(`[REPLY] ${this.options.name} -> @${item.authorUsername || item.authorId}: ${text.slice(0, 60)}`);
      return { status: "replied", replyId: posted.id };
    } catch (error) {
      console.error(`[ERROR] ${this.options.name} reply submit failed for ${item.id}: ${describeError(error)}`);
      return { status: "failed" };
    }
  }
}

export function emptyCycleResult(producer: ProducerName): ReplyCycleResult {
  return {
    producer,
    considered: 0,
    worthy: 0,
    selected: 0,
    replied: 0,
    failed: 0,
    skipped: 0,
    quotaExhausted: false,
  };
}

export function mergeCycleResults(target: ReplyCycleResult, next: ReplyCycleResult): ReplyCycleResult {
  target.considered += next.considered;
  target.worthy += next.worthy;
  target.selected += next.selected;
  target.replied += next.replied;
  target.failed += next.failed;
  target.skipped += next.skipped;
  if (next.quotaExhausted) {
    target.quotaExhausted = true;
    target.quotaReason = next.quotaReason;
  }
  return target;
}
