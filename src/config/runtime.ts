import {
  ContentRuntimeSettings,
  CredentialSettings,
  EngagementRuntimeSettings,
  ObservabilityRuntimeSettings,
  ReplyRuntimeSettings,
  ScheduleRuntimeSettings,
} from "../types/runtime.js";

export interface RuntimeConfig {
  testMode: boolean;
  schedule: ScheduleRuntimeSettings;
  content: ContentRuntimeSettings;
  replies: ReplyRuntimeSettings;
  engagement: EngagementRuntimeSettings;
  observability: ObservabilityRuntimeSettings;
  credentials: CredentialSettings;
}

const DEFAULT_OBSERVABILITY_EVENT_LOG_PATH = "data/metrics-events.ndjson";

export const DEFAULT_SCHEDULE_SETTINGS: ScheduleRuntimeSettings = {
  postIntervalMinutes: 120,
  minIntervalMinutes: 60,
  maxIntervalMinutes: 240,
  mentionPollMinutes: 30,
  maxPostsPerHour: 10,
  maxPostsPerDay: 50,
  shutdownJoinTimeoutMs: 5000,
};

export const DEFAULT_CONTENT_SETTINGS: ContentRuntimeSettings = {
  maxTweetLength: 280,
  maxHashtags: 3,
  postMaxAttempts: 10,
  threadMaxAttempts: 3,
  threadLength: 3,
  criticMinScore: 8,
  subjectTicker: "$FROG",
  subjectPairAddress: "",
  catchPhrase: "gm",
};

export const DEFAULT_REPLY_SETTINGS: ReplyRuntimeSettings = {
  enabled: true,
  maxRepliesPerHour: 5,
  maxRepliesPerTweet: 2,
  maxMentionRepliesPerCycle: 4,
  monitoredAccounts: [],
  blockedUsernames: [],
  strictQuota: true,
  swapProbability: 0.1,
};

export const DEFAULT_ENGAGEMENT_SETTINGS: EngagementRuntimeSettings = {
  retentionDays: 7,
};

export const DEFAULT_OBSERVABILITY_SETTINGS: ObservabilityRuntimeSettings = {
  enabled: true,
  stdoutJson: true,
  eventLogPath: DEFAULT_OBSERVABILITY_EVENT_LOG_PATH,
};

function parseIntInRange(
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  const parsed = Number.parseInt(raw || "", 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, parsed));
}

// Unclamped: interval relationships are validated rather than silently corrected.
function parseRawInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw || "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseFloatInRange(
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  const parsed = Number.parseFloat(raw || "");
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, parsed));
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (typeof raw !== "string") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  return fallback;
}

function parseNonEmptyString(raw: string | undefined, fallback: string, maxLength: number = 200): string {
  if (typeof raw !== "string") return fallback;
  const normalized = raw.trim();
  if (!normalized) return fallback;
  return normalized.slice(0, maxLength);
}

function parseUsernameList(raw: string | undefined): string[] {
  if (typeof raw !== "string") return [];
  const seen = new Set<string>();
  for (const item of raw.split(",")) {
    const username = item.trim().replace(/^@+/, "");
    if (username) seen.add(username);
  }
  return [...seen];
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const schedule: ScheduleRuntimeSettings = {
    postIntervalMinutes: parseRawInt(env.POST_INTERVAL_MINUTES, DEFAULT_SCHEDULE_SETTINGS.postIntervalMinutes),
    minIntervalMinutes: parseRawInt(env.MIN_INTERVAL_MINUTES, DEFAULT_SCHEDULE_SETTINGS.minIntervalMinutes),
    maxIntervalMinutes: parseRawInt(env.MAX_INTERVAL_MINUTES, DEFAULT_SCHEDULE_SETTINGS.maxIntervalMinutes),
    mentionPollMinutes: parseIntInRange(
      env.MENTION_POLL_MINUTES,
      DEFAULT_SCHEDULE_SETTINGS.mentionPollMinutes,
      1,
      1440
    ),
    maxPostsPerHour: parseIntInRange(
      env.MAX_POSTS_PER_HOUR,
      DEFAULT_SCHEDULE_SETTINGS.maxPostsPerHour,
      1,
      100
    ),
    maxPostsPerDay: parseIntInRange(
      env.MAX_POSTS_PER_DAY,
      DEFAULT_SCHEDULE_SETTINGS.maxPostsPerDay,
      1,
      1000
    ),
    shutdownJoinTimeoutMs: parseIntInRange(
      env.SHUTDOWN_JOIN_TIMEOUT_MS,
      DEFAULT_SCHEDULE_SETTINGS.shutdownJoinTimeoutMs,
      100,
      60_000
    ),
  };

  const content: ContentRuntimeSettings = {
    maxTweetLength: parseIntInRange(env.MAX_TWEET_LENGTH, DEFAULT_CONTENT_SETTINGS.maxTweetLength, 40, 4000),
    maxHashtags: parseIntInRange(env.MAX_HASHTAGS, DEFAULT_CONTENT_SETTINGS.maxHashtags, 0, 10),
    postMaxAttempts: parseIntInRange(env.POST_MAX_ATTEMPTS, DEFAULT_CONTENT_SETTINGS.postMaxAttempts, 1, 30),
    threadMaxAttempts: parseIntInRange(env.THREAD_MAX_ATTEMPTS, DEFAULT_CONTENT_SETTINGS.threadMaxAttempts, 1, 10),
    threadLength: parseIntInRange(env.THREAD_LENGTH, DEFAULT_CONTENT_SETTINGS.threadLength, 2, 10),
    criticMinScore: parseIntInRange(env.CRITIC_MIN_SCORE, DEFAULT_CONTENT_SETTINGS.criticMinScore, 1, 10),
    subjectTicker: parseNonEmptyString(env.SUBJECT_TICKER, DEFAULT_CONTENT_SETTINGS.subjectTicker, 20),
    subjectPairAddress: parseNonEmptyString(
      env.SUBJECT_PAIR_ADDRESS,
      DEFAULT_CONTENT_SETTINGS.subjectPairAddress,
      120
    ),
    catchPhrase: parseNonEmptyString(env.CATCH_PHRASE, DEFAULT_CONTENT_SETTINGS.catchPhrase, 40),
  };

  const replies: ReplyRuntimeSettings = {
    enabled: parseBoolean(env.ENABLE_REPLY_SYSTEM, DEFAULT_REPLY_SETTINGS.enabled),
    maxRepliesPerHour: parseIntInRange(env.MAX_REPLIES_PER_HOUR, DEFAULT_REPLY_SETTINGS.maxRepliesPerHour, 1, 100),
    maxRepliesPerTweet: parseIntInRange(
      env.MAX_REPLIES_PER_TWEET,
      DEFAULT_REPLY_SETTINGS.maxRepliesPerTweet,
      1,
      20
    ),
    maxMentionRepliesPerCycle: parseIntInRange(
      env.MAX_MENTION_REPLIES_PER_CYCLE,
      DEFAULT_REPLY_SETTINGS.maxMentionRepliesPerCycle,
      1,
      50
    ),
    monitoredAccounts: parseUsernameList(env.MONITORED_ACCOUNTS),
    blockedUsernames: parseUsernameList(env.BLOCKED_USERNAMES).map((name) => name.toLowerCase()),
    strictQuota: parseBoolean(env.STRICT_REPLY_QUOTA, DEFAULT_REPLY_SETTINGS.strictQuota),
    swapProbability: parseFloatInRange(
      env.REPLY_SWAP_PROBABILITY,
      DEFAULT_REPLY_SETTINGS.swapProbability,
      0,
      1
    ),
  };

  const engagement: EngagementRuntimeSettings = {
    retentionDays: parseIntInRange(
      env.ENGAGEMENT_RETENTION_DAYS,
      DEFAULT_ENGAGEMENT_SETTINGS.retentionDays,
      1,
      90
    ),
  };

  const observability: ObservabilityRuntimeSettings = {
    enabled: parseBoolean(env.OBSERVABILITY_ENABLED, DEFAULT_OBSERVABILITY_SETTINGS.enabled),
    stdoutJson: parseBoolean(env.OBSERVABILITY_STDOUT_JSON, DEFAULT_OBSERVABILITY_SETTINGS.stdoutJson),
    eventLogPath: parseNonEmptyString(
      env.OBSERVABILITY_EVENT_LOG_PATH,
      DEFAULT_OBSERVABILITY_SETTINGS.eventLogPath,
      400
    ),
  };

  const credentials: CredentialSettings = {
    anthropicApiKey: (env.ANTHROPIC_API_KEY || "").trim(),
    twitterApiKey: (env.TWITTER_API_KEY || "").trim(),
    twitterApiSecret: (env.TWITTER_API_SECRET || "").trim(),
    twitterAccessToken: (env.TWITTER_ACCESS_TOKEN || "").trim(),
    twitterAccessSecret: (env.TWITTER_ACCESS_SECRET || "").trim(),
  };

  return Object.freeze({
    testMode: parseBoolean(env.TEST_MODE, false),
    schedule: Object.freeze(schedule),
    content: Object.freeze(content),
    replies: Object.freeze(replies),
    engagement: Object.freeze(engagement),
    observability: Object.freeze(observability),
    credentials: Object.freeze(credentials),
  });
}

/**
 * Returns every startup problem at once; an empty list means the daemon may start.
 */
export function validateRuntimeConfig(config: RuntimeConfig): string[] {
  const errors: string[] = [];
  const { schedule, credentials } = config;

  if (!credentials.anthropicApiKey) {
    errors.push("ANTHROPIC_API_KEY is not set");
  }

  if (!config.testMode) {
    const missing = [
      ["TWITTER_API_KEY", credentials.twitterApiKey],
      ["TWITTER_API_SECRET", credentials.twitterApiSecret],
      ["TWITTER_ACCESS_TOKEN", credentials.twitterAccessToken],
      ["TWITTER_ACCESS_SECRET", credentials.twitterAccessSecret],
    ]
      .filter(([, value]) => !value)
      .map(([key]) => key);
    if (missing.length > 0) {
      errors.push(`Twitter credentials are incomplete: ${missing.join(", ")}`);
    }
  }

  if (schedule.minIntervalMinutes < 1) {
    errors.push(`MIN_INTERVAL_MINUTES (${schedule.minIntervalMinutes}) must be >= 1`);
  }
  if (schedule.minIntervalMinutes > schedule.maxIntervalMinutes) {
    errors.push(
      `MIN_INTERVAL_MINUTES (${schedule.minIntervalMinutes}) must be <= MAX_INTERVAL_MINUTES (${schedule.maxIntervalMinutes})`
    );
  }
  if (schedule.postIntervalMinutes < schedule.minIntervalMinutes) {
    errors.push(
      `POST_INTERVAL_MINUTES (${schedule.postIntervalMinutes}) must be >= MIN_INTERVAL_MINUTES (${schedule.minIntervalMinutes})`
    );
  }
  if (schedule.postIntervalMinutes > schedule.maxIntervalMinutes) {
    errors.push(
      `POST_INTERVAL_MINUTES (${schedule.postIntervalMinutes}) must be <= MAX_INTERVAL_MINUTES (${schedule.maxIntervalMinutes})`
    );
  }

  return errors;
}
