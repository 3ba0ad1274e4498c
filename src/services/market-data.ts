import { MarketContext, SubjectTokenMetrics, TokenSummary } from "../types/agent.js";
import { describeError } from "../utils/errors.js";

const DEXSCREENER_BASE_URL = "https://api.dexscreener.com/latest/dex";
const DEFAULT_TTL_MS = 300_000;
const SUBJECT_TTL_MS = 60_000;
const NARRATIVE_TTL_MS = 600_000;
const REQUEST_TIMEOUT_MS = 10_000;
const MIN_TRENDING_VOLUME = 1000;
const MIN_LAUNCH_VOLUME = 500;

const FALLBACK_TRENDING: TokenSummary[] = [
  { name: "Lily Pad", symbol: "PAD", priceChange24h: 4.8, volume24h: 2_100_000 },
  { name: "Swamp Cat", symbol: "SWCAT", priceChange24h: -3.2, volume24h: 1_400_000 },
  { name: "Ribbit Inu", symbol: "RBIT", priceChange24h: 9.1, volume24h: 880_000 },
  { name: "Marsh Dog", symbol: "MDOG", priceChange24h: -6.4, volume24h: 610_000 },
  { name: "Pond Agent", symbol: "POND", priceChange24h: 17.3, volume24h: 540_000 },
  { name: "Tadpole", symbol: "TAD", priceChange24h: 2.2, volume24h: 390_000 },
];

const NARRATIVE_THEMES: Record<string, string[]> = {
  dog: ["dog", "doge", "shib", "puppy", "woof", "inu"],
  cat: ["cat", "kitty", "meow", "neko"],
  frog: ["frog", "pepe", "toad", "ribbit"],
  meme: ["meme", "chad", "wojak", "based"],
  ai: ["ai", "gpt", "bot", "agent", "agi"],
  politics: ["trump", "maga", "vote"],
};

class TtlCache<T> {
  private readonly entries = new Map<string, { value: T; expiresAt: number }>();

  constructor(private readonly nowMs: () => number) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.nowMs() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T, ttlMs: number): void {
    this.entries.set(key, { value, expiresAt: this.nowMs() + ttlMs });
  }
}

export interface MarketDataSource {
  getContext(): Promise<MarketContext>;
}

export interface MarketDataServiceOptions {
  subjectPairAddress?: string;
  fetchImpl?: typeof fetch;
  nowMs?: () => number;
  random?: () => number;
}

/**
 * Read-through DexScreener client. Every method degrades to fallback values instead of throwing.
 */
export class MarketDataService implements MarketDataSource {
  private readonly tokenCache: TtlCache<TokenSummary[]>;
  private readonly narrativeCache: TtlCache<string>;
  private readonly subjectCache: TtlCache<SubjectTokenMetrics>;
  private readonly fetchImpl: typeof fetch;
  private readonly nowMs: () => number;
  private readonly random: () => number;
  private readonly subjectPairAddress: string;

  constructor(options: MarketDataServiceOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.nowMs = options.nowMs ?? Date.now;
    this.random = options.random ?? Math.random;
    this.subjectPairAddress = (options.subjectPairAddress || "").trim();
    this.tokenCache = new TtlCache(this.nowMs);
    this.narrativeCache = new TtlCache(this.nowMs);
    this.subjectCache = new TtlCache(this.nowMs);
  }

  async getTrendingTokens(limit: number = 10): Promise<TokenSummary[]> {
    const cacheKey = `trending_${limit}`;
    const cached = this.tokenCache.get(cacheKey);
    if (cached) return cached;

    try {
      const data = await this.fetchJson(`${DEXSCREENER_BASE_URL}/search/?q=SOL`);
      const pairs = readArray(data, "pairs");
      const tokens = pairs
        .filter((pair) => readString(pair, ["chainId"]) === "solana")
        .map(toTokenSummary)
        .filter((token) => (token.volume24h ?? 0) > MIN_TRENDING_VOLUME)
        .sort((a, b) => (b.volume24h ?? 0) - (a.volume24h ?? 0))
        .slice(0, limit);

      this.tokenCache.set(cacheKey, tokens, DEFAULT_TTL_MS);
      console.log(`[MARKET] trending tokens fetched: ${tokens.length}`);
      return tokens;
    } catch (error) {
      console.warn(`[MARKET] trending fetch failed, using fallback: ${describeError(error)}`);
      return FALLBACK_TRENDING.slice(0, limit);
    }
  }

  /**
   * DexScreener has no launch feed; active tokens from the trending search stand in for it.
   */
  async getRecentLaunches(limit: number = 10): Promise<TokenSummary[]> {
    const cacheKey = `recent_${limit}`;
    const cached = this.tokenCache.get(cacheKey);
    if (cached) return cached;

    const trending = await this.getTrendingTokens(limit * 2);
    const recent = shuffle(
      trending.filter((token) => (token.volume24h ?? 0) > MIN_LAUNCH_VOLUME),
      this.random
    ).slice(0, limit);
    this.tokenCache.set(cacheKey, recent, DEFAULT_TTL_MS);
    return recent;
  }

  async detectSuspicious(): Promise<TokenSummary[]> {
    const cacheKey = "suspicious";
    const cached = this.tokenCache.get(cacheKey);
    if (cached) return cached;

    const trending = await this.getTrendingTokens(50);
    const suspicious = trending.filter(
      (token) =>
        (token.priceChange24h ?? 0) < -70 ||
        (typeof token.liquidityUsd === "number" && token.liquidityUsd < 1000)
    );
    this.tokenCache.set(cacheKey, suspicious, DEFAULT_TTL_MS);
    return suspicious;
  }

  async getTrendingNarrative(): Promise<string> {
    const cached = this.narrativeCache.get("narrative");
    if (cached) return cached;

    const trending = await this.getTrendingTokens(20);
    if (trending.length === 0) return "degen chaos mode";

    const narrative = detectNarrative(trending);
    this.narrativeCache.set("narrative", narrative, NARRATIVE_TTL_MS);
    return narrative;
  }

  async getSubjectMetrics(): Promise<SubjectTokenMetrics | undefined> {
    if (!this.subjectPairAddress) return undefined;
    const cached = this.subjectCache.get("subject");
    if (cached) return cached;

    try {
      const data = await this.fetchJson(`${DEXSCREENER_BASE_URL}/pairs/solana/${this.subjectPairAddress}`);
      const pair = typeof data === "object" && data !== null ? Reflect.get(data, "pair") : undefined;
      if (typeof pair !== "object" || pair === null) {
        console.warn("[MARKET] subject pair not found");
        return undefined;
      }
      const metrics: SubjectTokenMetrics = {
        priceUsd: readNumber(pair, ["priceUsd"]) ?? 0,
        priceChange24h: readNumber(pair, ["priceChange", "h24"]) ?? 0,
        volume24h: readNumber(pair, ["volume", "h24"]) ?? 0,
        url: `https://dexscreener.com/solana/${this.subjectPairAddress}`,
      };
      this.subjectCache.set("subject", metrics, SUBJECT_TTL_MS);
      return metrics;
    } catch (error) {
      console.warn(`[MARKET] subject fetch failed: ${describeError(error)}`);
      return undefined;
    }
  }

  async getContext(): Promise<MarketContext> {
    const trending = await this.getTrendingTokens(5);
    const recentLaunches = await this.getRecentLaunches(10);
    const narrative = await this.getTrendingNarrative();
    const suspicious = await this.detectSuspicious();
    const subject = await this.getSubjectMetrics();
    return { trending, recentLaunches, narrative, suspicious, subject };
  }

  private async fetchJson(url: string): Promise<unknown> {
    const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    if (!response.ok) {
      throw new Error(`DexScreener API error: ${response.status}`);
    }
    const data: unknown = await response.json();
    return data;
  }
}

export function detectNarrative(tokens: TokenSummary[]): string {
  const haystack = tokens
    .flatMap((token) => [token.name, token.symbol])
    .join(" ")
    .toLowerCase();

  let topTheme = "";
  let topCount = 0;
  for (const [theme, keywords] of Object.entries(NARRATIVE_THEMES)) {
    const count = keywords.filter((keyword) => haystack.includes(keyword)).length;
    if (count > topCount) {
      topTheme = theme;
      topCount = count;
    }
  }
  return topTheme ? `${topTheme} season` : "general memecoin season";
}

/**
 * Bounded prompt block. Callers tolerate any empty field.
 */
export function formatMarketContext(context: MarketContext, subjectTicker: string): string {
  const lines = ["Current launchpad ecosystem context:"];
  if (context.subject) {
    const { priceUsd, priceChange24h, volume24h, url } = context.subject;
    const direction = priceChange24h > 0 ? "up" : "down";
    const sign = priceChange24h > 0 ? "+" : "";
    lines.push(
      `- YOUR TOKEN ${subjectTicker}: $${priceUsd.toFixed(8)} (${sign}${priceChange24h.toFixed(2)}% 24h ${direction}), $${Math.round(volume24h).toLocaleString("en-US")} volume`
    );
    lines.push(`  Chart: ${url}`);
  }
  if (context.narrative) {
    lines.push(`- Current meta: ${context.narrative}`);
  }
  const trending = context.trending.slice(0, 3);
  if (trending.length > 0) {
    lines.push("- Trending tokens:");
    for (const token of trending) lines.push(`  * ${token.name} ($${token.symbol})`);
  }
  const recent = context.recentLaunches.slice(0, 3);
  if (recent.length > 0) {
    lines.push("- Recent launches:");
    for (const token of recent) lines.push(`  * ${token.name}`);
  }
  if (context.suspicious.length > 0) {
    lines.push(`- ${context.suspicious.length} suspicious tokens detected in last 24h`);
  }
  return lines.join("\n");
}

function toTokenSummary(pair: unknown): TokenSummary {
  return {
    name: readString(pair, ["baseToken", "name"]) || "Unknown",
    symbol: readString(pair, ["baseToken", "symbol"]) || "???",
    address: readString(pair, ["baseToken", "address"]) || undefined,
    priceUsd: readNumber(pair, ["priceUsd"]),
    priceChange24h: readNumber(pair, ["priceChange", "h24"]),
    volume24h: readNumber(pair, ["volume", "h24"]),
    liquidityUsd: readNumber(pair, ["liquidity", "usd"]),
  };
}

function readPath(source: unknown, keys: string[]): unknown {
  let current: unknown = source;
  for (const key of keys) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

function readString(source: unknown, keys: string[]): string {
  const value = readPath(source, keys);
  return typeof value === "string" ? value : "";
}

function readNumber(source: unknown, keys: string[]): number | undefined {
  const value = readPath(source, keys);
  const parsed = typeof value === "string" ? Number(value) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) ? parsed : undefined;
}

function readArray(source: unknown, key: string): unknown[] {
  const value = readPath(source, [key]);
  return Array.isArray(value) ? value : [];
}

function shuffle<T>(items: T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
