import test from "node:test";
import assert from "node:assert/strict";
import {
  containsCatchPhrase,
  detectPriceAction,
  normalizeCandidate,
  sanitizeSegment,
  stripEmojis,
  validateStructure,
} from "../src/services/content-guard.js";

const RULES = { maxLength: 280, maxHashtags: 3 };

test("validateStructure rejects an over-length candidate without truncating it", () => {
  const text = "a".repeat(281);
  const result = validateStructure(text, RULES);
  assert.equal(result.ok, false);
  assert.deepEqual(result.errors, ["Content exceeds max length: 281 > 280"]);
  assert.equal(text.length, 281);
});

test("validateStructure rejects more hashtags than allowed", () => {
  const result = validateStructure("frog szn #a #b #c #d", RULES);
  assert.equal(result.ok, false);
  assert.deepEqual(result.errors, ["Too many hashtags: 4 > 3"]);
});

test("validateStructure rejects bare-IP and shortener URLs", () => {
  const ip = validateStructure("claim here http://192.168.0.1/claim", RULES);
  assert.deepEqual(ip.errors, ["Content contains suspicious URL: http://192.168.0.1/claim"]);

  const short = validateStructure("read this https://bit.ly/x1", RULES);
  assert.deepEqual(short.errors, ["Content contains suspicious URL: https://bit.ly/x1"]);

  assert.equal(validateStructure("thread https://t.co/abc", RULES).ok, true);
});

test("validateStructure flags prohibited phrasing and warns on missing disclaimer", () => {
  const guaranteed = validateStructure("guaranteed pond gains", RULES);
  assert.deepEqual(guaranteed.errors, ["Content contains prohibited pattern: guarantee"]);
  assert.deepEqual(guaranteed.warnings, ["financial keywords without disclaimer"]);

  const disclaimed = validateStructure("my trading strategy is vibes. NFA", RULES);
  assert.equal(disclaimed.ok, true);
  assert.deepEqual(disclaimed.warnings, []);
});

test("normalizeCandidate strips wrapping quotes and emoji", () => {
  assert.equal(normalizeCandidate('  "gm frens 🐸"  '), "gm frens");
  assert.equal(stripEmojis("gm 🐸 frens"), "gm  frens");
});

test("containsCatchPhrase matches whole words case-insensitively", () => {
  assert.equal(containsCatchPhrase("GM frens", "gm"), true);
  assert.equal(containsCatchPhrase("gmgm frens", "gm"), false);
  assert.equal(containsCatchPhrase("anything", "  "), false);
});

test("detectPriceAction needs the ticker plus a price keyword or figure", () => {
  assert.equal(detectPriceAction("$FROG chart looking clean", "$FROG"), true);
  assert.equal(detectPriceAction("frog at $4.2m already", "$FROG"), true);
  assert.equal(detectPriceAction("frog memes all day", "$FROG"), false);
  assert.equal(detectPriceAction("chart looks clean at $5m", "$FROG"), false);
});

test("sanitizeSegment drops extra hashtags and cuts at a word boundary", () => {
  const rules = { maxLength: 20, maxHashtags: 1 };
  assert.equal(sanitizeSegment("#a #b hello", rules), "#a hello");
  assert.equal(sanitizeSegment("one   two three four five six seven", rules), "one two three...");
  assert.equal(sanitizeSegment("short one", rules), "short one");
});
