const WINDOW_MS = 60 * 60 * 1000;

export interface ReplyQuotaDecision {
  allowed: boolean;
  reason?: string;
}

export interface ReplyQuotaStats {
  repliesLastHour: number;
  maxPerHour: number;
  remaining: number;
}

/**
 * One hourly reply budget shared by every reply producer.
 * Producers hold a reference to the same instance and touch the window only through these methods.
 */
export class SharedReplyRateLimiter {
  private readonly maxPerHour: number;
  private readonly now: () => Date;
  private timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(options?: { maxPerHour?: number; now?: () => Date }) {
    this.maxPerHour = clampInt(options?.maxPerHour, 1, 1000, 5);
    this.now = typeof options?.now === "function" ? options.now : () => new Date();
  }

  canReply(): ReplyQuotaDecision {
    const count = this.prune();
    if (count >= this.maxPerHour) {
      return {
        allowed: false,
        reason: `Reply rate limit reached (${count}/${this.maxPerHour} in last hour)`,
      };
    }
    return { allowed: true };
  }

  recordReply(): void {
    this.timestamps.push(this.now().getTime());
    const count = this.prune();
    console.log(`[QUOTA] reply recorded (${count}/${this.maxPerHour} in last hour)`);
  }

  remainingQuota(): number {
    return Math.max(0, this.maxPerHour - this.prune());
  }

  getStats(): ReplyQuotaStats {
    const count = this.prune();
    return {
      repliesLastHour: count,
      maxPerHour: this.maxPerHour,
      remaining: Math.max(0, this.maxPerHour - count),
    };
  }

  /**
   * Runs `task` after every previously queued task settles.
   * Used to make check-generate-submit-record one critical section across producers.
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private prune(): number {
    const cutoff = this.now().getTime() - WINDOW_MS;
    this.timestamps = this.timestamps.filter((ts) => ts > cutoff);
    return this.timestamps.length;
  }
}

function clampInt(value: unknown, min: number, max: number, fallback: number): number {
  const n = typeof value === "number" && Number.isFinite(value) ? Math.floor(value) : fallback;
  return Math.min(max, Math.max(min, n));
}
