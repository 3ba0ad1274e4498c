import cron from "node-cron";
import { ScheduleRuntimeSettings } from "../types/runtime.js";
import { describeError } from "../utils/errors.js";
import { AgentStore } from "./memory.js";
import { EngagementTracker } from "./engagement-tracker.js";
import { TopicManager } from "./topic-manager.js";

export interface PostingCapDecision {
  ok: boolean;
  reason?: string;
  postsLastHour: number;
  postsLastDay: number;
}

export interface MaintenanceJob {
  stop(): void;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function randomInt(min: number, max: number, random: () => number): number {
  if (max <= min) return min;
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Base interval +/- 25%, with both ends clamped into [min, max].
 */
export function jitteredIntervalMinutes(
  schedule: Pick<ScheduleRuntimeSettings, "postIntervalMinutes" | "minIntervalMinutes" | "maxIntervalMinutes">,
  random: () => number = Math.random
): number {
  const low = clamp(
    Math.floor(schedule.postIntervalMinutes * 0.75),
    schedule.minIntervalMinutes,
    schedule.maxIntervalMinutes
  );
  const high = clamp(
    Math.floor(schedule.postIntervalMinutes * 1.25),
    schedule.minIntervalMinutes,
    schedule.maxIntervalMinutes
  );
  return randomInt(low, high, random);
}

export function canPostNow(
  store: Pick<AgentStore, "countPostsInWindow">,
  caps: Pick<ScheduleRuntimeSettings, "maxPostsPerHour" | "maxPostsPerDay">
): PostingCapDecision {
  const postsLastHour = store.countPostsInWindow(1);
  const postsLastDay = store.countPostsInWindow(24);
  if (postsLastHour >= caps.maxPostsPerHour) {
    return {
      ok: false,
      reason: `Hourly limit reached (${postsLastHour}/${caps.maxPostsPerHour})`,
      postsLastHour,
      postsLastDay,
    };
  }
  if (postsLastDay >= caps.maxPostsPerDay) {
    return {
      ok: false,
      reason: `Daily limit reached (${postsLastDay}/${caps.maxPostsPerDay})`,
      postsLastHour,
      postsLastDay,
    };
  }
  return { ok: true, postsLastHour, postsLastDay };
}

export interface PollingLoopOptions {
  name: string;
  firstDelayMs: number;
  errorDelayMs: number;
  /** Runs one iteration and returns the delay before the next one. */
  tick: () => Promise<number>;
  /** When false the pending timer does not hold the process open. */
  keepAlive?: boolean;
}

/**
 * Sleep-then-tick loop with a cooperative stop flag, checked at every sleep boundary.
 * A stop request wakes a pending sleep but never interrupts a running tick.
 */
export class PollingLoop {
  private stopped = false;
  private running: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private iterations = 0;

  constructor(private readonly options: PollingLoopOptions) {}

  get name(): string {
    return this.options.name;
  }

  get completedIterations(): number {
    return this.iterations;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  start(): void {
    if (this.running) return;
    this.stopped = false;
    this.running = this.loop().finally(() => {
      this.running = null;
    });
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const wake = this.wake;
    this.wake = null;
    if (wake) wake();
  }

  /**
   * Resolves true once the loop has exited, false if it is still inside a tick after timeoutMs.
   */
  async join(timeoutMs: number): Promise<boolean> {
    const running = this.running;
    if (!running) return true;

    let expire: (value: boolean) => void = () => {};
    const expired = new Promise<boolean>((resolve) => {
      expire = resolve;
    });
    const timeout = setTimeout(() => expire(false), Math.max(0, timeoutMs));
    timeout.unref();
    try {
      return await Promise.race([running.then(() => true), expired]);
    } finally {
      clearTimeout(timeout);
    }
  }

  private async loop(): Promise<void> {
    let delayMs = this.options.firstDelayMs;
    while (!this.stopped) {
      await this.sleep(delayMs);
      if (this.stopped) break;
      try {
        delayMs = await this.options.tick();
      } catch (error) {
        console.error(`[ERROR] ${this.options.name} loop iteration failed: ${describeError(error)}`);
        delayMs = this.options.errorDelayMs;
      }
      this.iterations += 1;
    }
    console.log(`[SCHEDULER] ${this.options.name} loop stopped`);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        this.timer = null;
        this.wake = null;
        resolve();
      };
      this.wake = done;
      this.timer = setTimeout(done, Math.max(0, ms));
      if (this.options.keepAlive === false) {
        this.timer.unref();
      }
    });
  }
}

export interface MaintenanceOptions {
  tracker: EngagementTracker;
  topics: TopicManager;
  categories: readonly string[];
  retentionDays: number;
}

/**
 * UTC cron jobs: hourly engagement purge, daily topic-insight line at 00:05.
 */
export function scheduleMaintenance(options: MaintenanceOptions): MaintenanceJob[] {
  const purge = cron.schedule(
    "0 * * * *",
    () => {
      options.tracker.cleanup(options.retentionDays);
    },
    { timezone: "UTC" }
  );

  const insights = cron.schedule(
    "5 0 * * *",
    () => {
      console.log(`[SCHEDULER] topic insights: ${formatTopicInsights(options.topics, options.categories)}`);
    },
    { timezone: "UTC" }
  );

  return [purge, insights];
}

export function formatTopicInsights(topics: TopicManager, categories: readonly string[]): string {
  const insights = topics.getInsights(categories);
  if (insights.length === 0) return "none";
  return insights
    .map((insight) => `${insight.name}(${insight.lastUsedAt ? insight.lastUsedAt.slice(0, 10) : "never"})`)
    .join(", ");
}
