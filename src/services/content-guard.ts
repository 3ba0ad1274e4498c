export interface StructuralRules {
  maxLength: number;
  maxHashtags: number;
}

export interface StructuralValidation {
  ok: boolean;
  errors: string[];
  warnings: string[];
}

const PROHIBITED_PATTERNS: Array<{ label: string; pattern: RegExp }> = [
  { label: "profanity", pattern: /\b(fuck|shit|damn)\b/i },
  { label: "urgency", pattern: /\b(buy|sell|moon|wen)\s+(now|immediately)\b/i },
  { label: "price-prediction", pattern: /will\s+(hit|reach|go\s+to)\s+\$\d+/i },
  { label: "return-promise", pattern: /\d+x\s+(gain|profit|return)/i },
  { label: "guarantee", pattern: /guaranteed|promise|definitely will/i },
];

const URL_PATTERN = /https?:\/\/[^\s]+/gi;
const BARE_IP_URL_PATTERN = /^https?:\/\/\d+\.\d+\.\d+\.\d+/i;
// the platform's own shortener (t.co) is allowed
const SHORTENER_DOMAINS = ["bit.ly", "tinyurl.com"];

const FINANCIAL_KEYWORDS = [
  "invest",
  "trading",
  "profit",
  "gains",
  "returns",
  "buy",
  "sell",
  "portfolio",
  "strategy",
];

const PRICE_KEYWORDS = [
  "price",
  "mcap",
  "market cap",
  "volume",
  "$0.",
  "cent",
  "dollar",
  "usd",
  "up",
  "down",
  "pump",
  "dump",
  "moon",
  "ath",
  "dip",
  "breakout",
  "chart",
  "candle",
  "support",
  "resistance",
  "buy",
  "bought",
  "sold",
  "bag",
];

const EMOJI_PATTERN = new RegExp(
  "[" +
    "\\u{1F600}-\\u{1F64F}" +
    "\\u{1F300}-\\u{1F5FF}" +
    "\\u{1F680}-\\u{1F6FF}" +
    "\\u{1F1E0}-\\u{1F1FF}" +
    "\\u{2702}-\\u{27B0}" +
    "\\u{24C2}-\\u{1F251}" +
    "\\u{1F900}-\\u{1F9FF}" +
    "\\u{1FA00}-\\u{1FA6F}" +
    "\\u{2600}-\\u{26FF}" +
    "]+",
  "gu"
);

const QUOTE_PAIRS: Array<[string, string]> = [
  ["\"", "\""],
  ["'", "'"],
  ["“", "”"],
  ["‘", "’"],
];

export function stripEmojis(text: string): string {
  return text.replace(EMOJI_PATTERN, "").trim();
}

export function stripWrappingQuotes(text: string): string {
  let result = text;
  for (const [open, close] of QUOTE_PAIRS) {
    if (result.length >= 2 && result.startsWith(open) && result.endsWith(close)) {
      result = result.slice(open.length, result.length - close.length);
    }
  }
  return result;
}

/**
 * Cleans raw model output before any gate looks at it.
 */
export function normalizeCandidate(raw: string): string {
  return stripEmojis(stripWrappingQuotes(raw.trim())).trim();
}

export function containsCatchPhrase(text: string, phrase: string): boolean {
  const normalized = phrase.trim();
  if (!normalized) return false;
  return new RegExp(`\\b${escapeRegExp(normalized)}\\b`, "i").test(text);
}

/**
 * Best-effort: the subject ticker alongside a price keyword or a `$<number>` figure.
 * Misses and false hits are expected.
 */
export function detectPriceAction(text: string, subjectTicker: string): boolean {
  const lower = text.toLowerCase();
  const bareTicker = subjectTicker.trim().replace(/^\$+/, "").toLowerCase();
  if (!bareTicker || !lower.includes(bareTicker)) return false;

  const hasKeyword = PRICE_KEYWORDS.some((keyword) => lower.includes(keyword));
  const hasPriceFigure = /\$\d+\.?\d*[mkb]?/.test(lower);
  return hasKeyword || hasPriceFigure;
}

export function countHashtags(text: string): number {
  return (text.match(/#\w+/g) || []).length;
}

export function findSuspiciousUrl(text: string): string | null {
  for (const url of text.match(URL_PATTERN) || []) {
    if (BARE_IP_URL_PATTERN.test(url)) return url;
    const lower = url.toLowerCase();
    if (SHORTENER_DOMAINS.some((domain) => lower.includes(domain))) return url;
  }
  return null;
}

export function lacksFinancialDisclaimer(text: string): boolean {
  const lower = text.toLowerCase();
  const hasFinancialKeyword = FINANCIAL_KEYWORDS.some((keyword) => lower.includes(keyword));
  const hasDisclaimer = text.includes("NFA") || lower.includes("not financial advice");
  return hasFinancialKeyword && !hasDisclaimer;
}

/**
 * Length, emptiness, hashtags, prohibited phrasing and URLs. Never modifies the text.
 */
export function validateStructure(text: string, rules: StructuralRules): StructuralValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (text.length > rules.maxLength) {
    errors.push(`Content exceeds max length: ${text.length} > ${rules.maxLength}`);
  }

  if (!text.trim()) {
    errors.push("Content is empty");
  }

  const hashtags = countHashtags(text);
  if (hashtags > rules.maxHashtags) {
    errors.push(`Too many hashtags: ${hashtags} > ${rules.maxHashtags}`);
  }

  for (const { label, pattern } of PROHIBITED_PATTERNS) {
    if (pattern.test(text)) {
      errors.push(`Content contains prohibited pattern: ${label}`);
    }
  }

  const suspiciousUrl = findSuspiciousUrl(text);
  if (suspiciousUrl) {
    errors.push(`Content contains suspicious URL: ${suspiciousUrl}`);
  }

  if (lacksFinancialDisclaimer(text)) {
    warnings.push("financial keywords without disclaimer");
  }

  return { ok: errors.length === 0, errors, warnings };
}

/**
 * Repairs a thread segment: trims hashtags beyond the limit, collapses whitespace,
 * and shortens at a word boundary with a trailing ellipsis. Single posts never go through this.
 */
export function sanitizeSegment(text: string, rules: StructuralRules): string {
  let result = text;

  let seenHashtags = 0;
  result = result.replace(/#\w+\s*/g, (match) => {
    seenHashtags += 1;
    return seenHashtags > rules.maxHashtags ? "" : match;
  });

  result = result.replace(/\s+/g, " ").trim();

  if (result.length > rules.maxLength) {
    const budget = Math.max(0, rules.maxLength - 3);
    const head = result.slice(0, budget);
    const lastSpace = head.lastIndexOf(" ");
    const cut = lastSpace > budget / 2 ? head.slice(0, lastSpace) : head;
    result = `${cut.trimEnd()}...`;
  }

  return result;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
