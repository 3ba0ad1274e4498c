import test from "node:test";
import assert from "node:assert/strict";
import { MarketDataService, detectNarrative, formatMarketContext } from "../src/services/market-data.js";
import { manualClock } from "./helpers.js";

function pair(chainId: string, name: string, symbol: string, volume: number): Record<string, unknown> {
  return {
    chainId,
    baseToken: { name, symbol, address: `${symbol}_addr` },
    priceUsd: "0.0042",
    priceChange: { h24: -12.5 },
    volume: { h24: volume },
    liquidity: { usd: 50_000 },
  };
}

function stubFetch(payloads: unknown[], urls: string[]): typeof fetch {
  return async (input) => {
    urls.push(String(input));
    const payload = payloads.shift();
    if (payload instanceof Error) throw payload;
    return new Response(JSON.stringify(payload), { status: 200 });
  };
}

test("getTrendingTokens keeps busy solana pairs sorted by volume", async (t) => {
  t.mock.method(console, "log", () => {});
  const urls: string[] = [];
  const service = new MarketDataService({
    fetchImpl: stubFetch(
      [
        {
          pairs: [
            pair("solana", "Swamp Cat", "SWCAT", 5_000),
            pair("ethereum", "Elsewhere", "ELSE", 90_000),
            pair("solana", "Tiny", "TINY", 500),
            pair("solana", "Lily Pad", "PAD", 20_000),
          ],
        },
      ],
      urls
    ),
  });

  const tokens = await service.getTrendingTokens(10);
  assert.deepEqual(
    tokens.map((token) => token.symbol),
    ["PAD", "SWCAT"]
  );
  assert.equal(tokens[0]?.priceUsd, 0.0042);
  assert.equal(tokens[0]?.priceChange24h, -12.5);
  assert.equal(tokens[0]?.address, "PAD_addr");
  assert.deepEqual(urls, ["https://api.dexscreener.com/latest/dex/search/?q=SOL"]);
});

test("getTrendingTokens serves the cache until the TTL passes", async (t) => {
  t.mock.method(console, "log", () => {});
  const clock = manualClock("2026-03-01T00:00:00.000Z");
  const urls: string[] = [];
  const service = new MarketDataService({
    nowMs: clock.nowMs,
    fetchImpl: stubFetch(
      [{ pairs: [pair("solana", "Lily Pad", "PAD", 20_000)] }, { pairs: [pair("solana", "Tadpole", "TAD", 9_000)] }],
      urls
    ),
  });

  assert.equal((await service.getTrendingTokens(5))[0]?.symbol, "PAD");
  clock.advanceMinutes(4);
  assert.equal((await service.getTrendingTokens(5))[0]?.symbol, "PAD");
  assert.equal(urls.length, 1);

  clock.advanceMinutes(2);
  assert.equal((await service.getTrendingTokens(5))[0]?.symbol, "TAD");
  assert.equal(urls.length, 2);
});

test("getTrendingTokens falls back to static tokens when the request fails", async (t) => {
  const warn = t.mock.method(console, "warn", () => {});
  const service = new MarketDataService({ fetchImpl: stubFetch([new Error("socket hang up")], []) });

  const tokens = await service.getTrendingTokens(2);
  assert.deepEqual(
    tokens.map((token) => token.symbol),
    ["PAD", "SWCAT"]
  );
  assert.equal(
    warn.mock.calls[0]?.arguments[0],
    "[MARKET] trending fetch failed, using fallback: socket hang up"
  );
});

test("getTrendingTokens treats a non-2xx response as a failure", async (t) => {
  const warn = t.mock.method(console, "warn", () => {});
  const service = new MarketDataService({
    fetchImpl: async () => new Response("busy", { status: 429 }),
  });

  const tokens = await service.getTrendingTokens(1);
  assert.deepEqual(
    tokens.map((token) => token.symbol),
    ["PAD"]
  );
  assert.equal(
    warn.mock.calls[0]?.arguments[0],
    "[MARKET] trending fetch failed, using fallback: DexScreener API error: 429"
  );
});

test("getSubjectMetrics reads the configured pair", async () => {
  const urls: string[] = [];
  const service = new MarketDataService({
    subjectPairAddress: "pair123",
    fetchImpl: stubFetch([{ pair: { priceUsd: "0.00001234", priceChange: { h24: 5.5 }, volume: { h24: 12_345.6 } } }], urls),
  });

  const metrics = await service.getSubjectMetrics();
  assert.deepEqual(metrics, {
    priceUsd: 0.00001234,
    priceChange24h: 5.5,
    volume24h: 12_345.6,
    url: "https://dexscreener.com/solana/pair123",
  });
  assert.deepEqual(urls, ["https://api.dexscreener.com/latest/dex/pairs/solana/pair123"]);
});

test("getSubjectMetrics is skipped without a pair address", async () => {
  const urls: string[] = [];
  const service = new MarketDataService({ fetchImpl: stubFetch([], urls) });
  assert.equal(await service.getSubjectMetrics(), undefined);
  assert.equal(urls.length, 0);
});

test("detectNarrative picks the theme with the most keyword hits", () => {
  assert.equal(
    detectNarrative([
      { name: "Doge Killer", symbol: "DOGEK" },
      { name: "Frog Prince", symbol: "FROG" },
    ]),
    "dog season"
  );
  assert.equal(detectNarrative([{ name: "Blue Chip", symbol: "BLU" }]), "general memecoin season");
});

test("formatMarketContext renders the subject token and skips empty sections", () => {
  const text = formatMarketContext(
    {
      trending: [{ name: "Lily Pad", symbol: "PAD" }],
      recentLaunches: [],
      narrative: "frog season",
      suspicious: [
        { name: "Rug One", symbol: "RUG1" },
        { name: "Rug Two", symbol: "RUG2" },
      ],
      subject: {
        priceUsd: 0.00001234,
        priceChange24h: 5.5,
        volume24h: 12_345.6,
        url: "https://dexscreener.com/solana/pair123",
      },
    },
    "$FROG"
  );

  assert.deepEqual(text.split("\n"), [
    "Current launchpad ecosystem context:",
    "- YOUR TOKEN $FROG: $0.00001234 (+5.50% 24h up), $12,346 volume",
    "  Chart: https://dexscreener.com/solana/pair123",
    "- Current meta: frog season",
    "- Trending tokens:",
    "  * Lily Pad ($PAD)",
    "- 2 suspicious tokens detected in last 24h",
  ]);
});
