export interface ScheduleRuntimeSettings {
  postIntervalMinutes: number;
  minIntervalMinutes: number;
  maxIntervalMinutes: number;
  mentionPollMinutes: number;
  maxPostsPerHour: number;
  maxPostsPerDay: number;
  shutdownJoinTimeoutMs: number;
}

export interface ContentRuntimeSettings {
  maxTweetLength: number;
  maxHashtags: number;
  postMaxAttempts: number;
  threadMaxAttempts: number;
  threadLength: number;
  criticMinScore: number;
  subjectTicker: string;
  subjectPairAddress: string;
  catchPhrase: string;
}

export interface ReplyRuntimeSettings {
  enabled: boolean;
  maxRepliesPerHour: number;
  maxRepliesPerTweet: number;
  maxMentionRepliesPerCycle: number;
  monitoredAccounts: string[];
  blockedUsernames: string[];
  strictQuota: boolean;
  swapProbability: number;
}

export interface EngagementRuntimeSettings {
  retentionDays: number;
}

export interface ObservabilityRuntimeSettings {
  enabled: boolean;
  stdoutJson: boolean;
  eventLogPath: string;
}

export interface CredentialSettings {
  anthropicApiKey: string;
  twitterApiKey: string;
  twitterApiSecret: string;
  twitterAccessToken: string;
  twitterAccessSecret: string;
}
