export interface PublicMetrics {
  likes: number;
  shares: number;
  replies: number;
  impressions: number;
}

/**
 * A post on the platform that a reply producer may answer:
 * a comment under one of our posts, a mention, or a monitored account's post.
 */
export interface SourceItem {
  id: string;
  text: string;
  authorId: string;
  authorUsername: string;
  authorFollowers: number;
  likes: number;
  shares: number;
  createdAt?: string;
  conversationId?: string;
  referencedPostId?: string;
}

export interface PostedTweet {
  id: string;
  text: string;
}

export interface PlatformUser {
  id: string;
  username: string;
}

export interface TokenSummary {
  name: string;
  symbol: string;
  address?: string;
  priceUsd?: number;
  priceChange24h?: number;
  volume24h?: number;
  liquidityUsd?: number;
}

export interface SubjectTokenMetrics {
  priceUsd: number;
  priceChange24h: number;
  volume24h: number;
  url: string;
}

export interface MarketContext {
  trending: TokenSummary[];
  recentLaunches: TokenSummary[];
  narrative: string;
  suspicious: TokenSummary[];
  subject?: SubjectTokenMetrics;
}

export interface ContentTemplate {
  category: string;
  weight: number;
  liveData: boolean;
  prompts: string[];
}

export interface LearnedContextEntry {
  timestamp: string;
  category: string;
  originalPost: string;
  mention: string;
}

export type PostStatus = "pending" | "posted" | "failed";

export interface PostRecord {
  id: number;
  tweetId?: string;
  content: string;
  category: string;
  status: PostStatus;
  createdAt: string;
  postedAt?: string;
  likes: number;
  shares: number;
  replies: number;
  isThread: boolean;
  threadId?: string;
  errorMessage?: string;
}

export interface TopicRecord {
  name: string;
  lastUsedAt?: string;
  usageCount: number;
  successRate: number;
  avgEngagement: number;
}
