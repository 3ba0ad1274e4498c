import { SourceItem } from "../../types/agent.js";
import { RankingWeight, WorthinessContext, WorthinessRules, WorthinessVerdict } from "./types.js";

export const COMMENT_WORTHINESS: WorthinessRules = {
  minLength: 10,
  spamPhrases: ["dm me", "check out", "buy now", "click here", "follow me"],
  shoutingMinLength: 20,
  requireAudience: true,
};

export const MENTION_WORTHINESS: WorthinessRules = {
  minLength: 15,
  spamPhrases: ["dm me", "check out", "click here", "buy now", "follow back"],
  shoutingMinLength: 20,
  requireAudience: false,
};

export const MONITOR_WORTHINESS: WorthinessRules = {
  minLength: 10,
  spamPhrases: ["dm me", "check out", "buy now", "click here", "follow me"],
  shoutingMinLength: 20,
  requireAudience: false,
};

export const commentWeight: RankingWeight = (item) => item.likes * 2 + item.authorFollowers / 100;

export const mentionWeight: RankingWeight = (item) =>
  item.likes * 2 + item.shares * 3 + item.authorFollowers / 100;

/**
 * All letters upper-case (and at least one letter) beyond the length threshold.
 */
export function isShouting(text: string, minLength: number): boolean {
  if (text.length <= minLength) return false;
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

export function evaluateWorthiness(
  item: SourceItem,
  rules: WorthinessRules,
  context: WorthinessContext
): WorthinessVerdict {
  if (context.selfId && item.authorId === context.selfId) {
    return { worthy: false, reason: "self" };
  }
  if (item.authorUsername && context.blockedUsernames.has(item.authorUsername.toLowerCase())) {
    return { worthy: false, reason: "blocked" };
  }
  if (context.repliedIds.has(item.id)) {
    return { worthy: false, reason: "already-replied" };
  }

  const text = item.text.trim();
  if (text.length < rules.minLength) {
    return { worthy: false, reason: "too-short" };
  }
  const lower = text.toLowerCase();
  if (rules.spamPhrases.some((phrase) => lower.includes(phrase))) {
    return { worthy: false, reason: "spam" };
  }
  if (isShouting(text, rules.shoutingMinLength)) {
    return { worthy: false, reason: "all-caps" };
  }

  if (rules.requireAudience) {
    if (item.authorFollowers < 5 && item.likes === 0) {
      return { worthy: false, reason: "likely-bot" };
    }
    if (item.likes <= 0 && item.authorFollowers <= 10) {
      return { worthy: false, reason: "no-audience" };
    }
  }
  return { worthy: true };
}

/**
 * Highest weight first, capped at `limit`. With probability `swapProbability` the last pick
 * is traded for a random item from the next `limit` ranks.
 */
export function rankCandidates(
  items: readonly SourceItem[],
  weight: RankingWeight,
  limit: number,
  options: { swapProbability?: number; random?: () => number } = {}
): SourceItem[] {
  const cap = Math.max(0, Math.floor(limit));
  const random = options.random ?? Math.random;
  const ranked = [...items].sort((a, b) => weight(b) - weight(a));
  if (ranked.length <= cap) return ranked;

  const top = ranked.slice(0, cap);
  const runnersUp = ranked.slice(cap, cap * 2);
  const swapProbability = options.swapProbability ?? 0;
  if (top.length > 0 && runnersUp.length > 0 && random() < swapProbability) {
    top[top.length - 1] = runnersUp[Math.min(runnersUp.length - 1, Math.floor(random() * runnersUp.length))];
  }
  return top;
}
