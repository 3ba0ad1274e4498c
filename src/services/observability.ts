import fs from "fs";
import path from "path";
import { ObservabilityRuntimeSettings } from "../types/runtime.js";
import { describeError } from "../utils/errors.js";
import { ReplyQuotaStats } from "./reply-rate-limiter.js";
import { ProducerName, ReplyCycleResult } from "./engagement/types.js";

export type PostCycleOutcome = "posted" | "thread" | "no-content" | "post-failed" | "rate-limited";

export interface PostCycleObservabilityInput {
  cycle: number;
  outcome: PostCycleOutcome;
  category?: string;
  generationAttempts: number;
  replyResults: ReplyCycleResult[];
  quota: ReplyQuotaStats;
  priceGate: {
    canMention: boolean;
    hoursUntilAllowed: number;
  };
  postsLastHour: number;
  postsLastDay: number;
  durationMs: number;
}

export interface PostCycleObservabilityEvent {
  type: "post_cycle";
  timestamp: string;
  cycle: number;
  outcome: PostCycleOutcome;
  category: string | null;
  generationAttempts: number;
  durationMs: number;
  replies: Record<ProducerName, { replied: number; failed: number; skipped: number }>;
  quota: ReplyQuotaStats & { exhausted: boolean; reason: string | null };
  priceGate: {
    canMention: boolean;
    hoursUntilAllowed: number;
  };
  posts: {
    lastHour: number;
    lastDay: number;
  };
}

export function emitPostCycleObservability(
  input: PostCycleObservabilityInput,
  settings: ObservabilityRuntimeSettings,
  now: Date = new Date()
): PostCycleObservabilityEvent | null {
  if (!settings.enabled) return null;

  const event = buildPostCycleObservabilityEvent(input, now);
  if (settings.stdoutJson) {
    console.log(`[METRIC] ${JSON.stringify(event)}`);
  }
  appendObservabilityEvent(settings.eventLogPath, event);
  return event;
}

export function buildPostCycleObservabilityEvent(
  input: PostCycleObservabilityInput,
  now: Date = new Date()
): PostCycleObservabilityEvent {
  const replies: PostCycleObservabilityEvent["replies"] = {
    comments: { replied: 0, failed: 0, skipped: 0 },
    mentions: { replied: 0, failed: 0, skipped: 0 },
    monitor: { replied: 0, failed: 0, skipped: 0 },
  };
  let exhaustedReason: string | null = null;
  for (const result of input.replyResults) {
    const bucket = replies[result.producer];
    bucket.replied += result.replied;
    bucket.failed += result.failed;
    bucket.skipped += result.skipped;
    if (result.quotaExhausted && !exhaustedReason) {
      exhaustedReason = result.quotaReason ?? "quota exhausted";
    }
  }

  return {
    type: "post_cycle",
    timestamp: now.toISOString(),
    cycle: input.cycle,
    outcome: input.outcome,
    category: input.category ?? null,
    generationAttempts: input.generationAttempts,
    durationMs: Math.max(0, Math.round(input.durationMs)),
    replies,
    quota: {
      ...input.quota,
      exhausted: exhaustedReason !== null,
      reason: exhaustedReason,
    },
    priceGate: {
      canMention: input.priceGate.canMention,
      hoursUntilAllowed: round(input.priceGate.hoursUntilAllowed, 1),
    },
    posts: {
      lastHour: input.postsLastHour,
      lastDay: input.postsLastDay,
    },
  };
}

function appendObservabilityEvent(eventLogPath: string, event: PostCycleObservabilityEvent): void {
  const normalized = String(eventLogPath || "").trim();
  if (!normalized) return;

  const targetPath = path.isAbsolute(normalized)
    ? normalized
    : path.join(process.cwd(), normalized);

  try {
    fs.mkdirSync(path.dirname(targetPath), { recursive: true });
    fs.appendFileSync(targetPath, `${JSON.stringify(event)}\n`);
  } catch (error) {
    console.log(`[METRIC] event log write failed: ${describeError(error)}`);
  }
}

function round(value: number, precision: number): number {
  if (!Number.isFinite(value)) return 0;
  const scale = Math.pow(10, Math.max(0, precision));
  return Math.round(value * scale) / scale;
}
