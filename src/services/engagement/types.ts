import { SourceItem } from "../../types/agent.js";

export type ProducerName = "comments" | "mentions" | "monitor";

export interface WorthinessRules {
  minLength: number;
  spamPhrases: readonly string[];
  shoutingMinLength: number;
  /** Comment-only: requires likes or a follower base, and drops zero-like low-follower accounts. */
  requireAudience: boolean;
}

export interface WorthinessContext {
  selfId: string;
  blockedUsernames: ReadonlySet<string>;
  repliedIds: ReadonlySet<string>;
}

export type WorthinessVerdict = { worthy: true } | { worthy: false; reason: string };

export type RankingWeight = (item: SourceItem) => number;

export interface ReplyCycleResult {
  producer: ProducerName;
  considered: number;
  worthy: number;
  selected: number;
  replied: number;
  failed: number;
  skipped: number;
  quotaExhausted: boolean;
  quotaReason?: string;
}
