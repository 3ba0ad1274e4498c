import { ContentTemplate } from "../types/agent.js";
import { ContentRuntimeSettings } from "../types/runtime.js";
import { PromptCatalog } from "../config/templates.js";
import { AcceptancePipeline } from "./acceptance.js";
import { StructuralRules, normalizeCandidate, sanitizeSegment, validateStructure } from "./content-guard.js";
import { LearnedContextLog } from "./learned-context.js";
import { TextGenerator } from "./llm.js";
import { MarketDataSource, formatMarketContext } from "./market-data.js";
import { PriceMentionTracker } from "./price-mention-tracker.js";
import { describeError } from "../utils/errors.js";

export const TOPIC_WINDOW_CAPACITY = 5;

const POST_MAX_TOKENS = 100;
const THREAD_MAX_TOKENS = 800;
const INSIGHT_MAX_TOKENS = 150;
const GENERATION_TEMPERATURE = 0.8;
const INSIGHT_TEMPERATURE = 0.7;
const LEARNED_READ_LIMIT = 20;
const LEARNED_SEND_LIMIT = 10;

/**
 * Last N selected categories, oldest first.
 */
export class TopicRecencyWindow {
  private readonly items: string[] = [];

  constructor(private readonly capacity: number = TOPIC_WINDOW_CAPACITY) {}

  add(category: string): void {
    this.items.push(category);
    while (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  recent(count: number): string[] {
    return count > 0 ? this.items.slice(-count) : [];
  }

  list(): readonly string[] {
    return [...this.items];
  }
}

export interface StyleGuidanceSource {
  getStyleGuidance(): string;
}

export interface ContentGeneratorOptions {
  llm: TextGenerator;
  catalog: PromptCatalog;
  acceptance: AcceptancePipeline;
  priceTracker: PriceMentionTracker;
  settings: ContentRuntimeSettings;
  market?: MarketDataSource;
  styleGuidance?: StyleGuidanceSource;
  learnedContext?: LearnedContextLog;
  topicWindow?: TopicRecencyWindow;
  random?: () => number;
}

export interface GenerationOutcome<T> {
  ok: boolean;
  content?: T;
  category?: string;
  attempts: number;
  reason?: string;
}

export interface GenerateOptions {
  category?: string;
  useLiveData?: boolean;
}

export class ContentGenerator {
  readonly topicWindow: TopicRecencyWindow;
  private readonly random: () => number;
  private readonly rules: StructuralRules;

  constructor(private readonly options: ContentGeneratorOptions) {
    this.topicWindow = options.topicWindow ?? new TopicRecencyWindow();
    this.random = options.random ?? Math.random;
    this.rules = {
      maxLength: options.settings.maxTweetLength,
      maxHashtags: options.settings.maxHashtags,
    };
  }

  get categories(): string[] {
    return this.options.catalog.templates.map((template) => template.category);
  }

  /**
   * Explicit category wins. Otherwise weighted choice, skipping the last two picks
   * while at least two exist, unless that empties the pool.
   */
  selectTemplate(category?: string): ContentTemplate {
    const templates = this.options.catalog.templates;
    if (category) {
      const explicit = templates.find((template) => template.category === category);
      if (explicit) return explicit;
      console.warn(`[GEN] unknown category "${category}", falling back to weighted choice`);
    }

    let pool = templates;
    const recent = this.topicWindow.list();
    if (recent.length >= 2) {
      const excluded = new Set(this.topicWindow.recent(2));
      const filtered = templates.filter((template) => !excluded.has(template.category));
      if (filtered.length > 0) pool = filtered;
    }
    return pickWeighted(pool, this.random);
  }

  async generatePost(options: GenerateOptions = {}): Promise<GenerationOutcome<string>> {
    const maxAttempts = this.options.settings.postMaxAttempts;
    const insights = await this.loadLearnedInsights();

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const template = this.selectTemplate(options.category);
      try {
        const prompt = await this.buildPostPrompt(template, options.useLiveData !== false, insights);
        const raw = await this.options.llm.complete({
          prompt,
          system: this.options.catalog.baseSystemPrompt,
          maxTokens: POST_MAX_TOKENS,
          temperature: GENERATION_TEMPERATURE,
        });
        if (!raw.trim()) {
          console.warn(`[GEN] empty completion (attempt ${attempt}/${maxAttempts})`);
          continue;
        }

        const result = await this.options.acceptance.evaluate(raw);
        if (!result.ok || !result.text) {
          console.log(`[REJECT] ${result.gate}: ${result.reason} (attempt ${attempt}/${maxAttempts})`);
          continue;
        }

        this.topicWindow.add(template.category);
        console.log(`[ACCEPT] ${template.category} score=${result.score} "${result.text.slice(0, 60)}"`);
        return { ok: true, content: result.text, category: template.category, attempts: attempt };
      } catch (error) {
        console.error(`[ERROR] generation attempt ${attempt}/${maxAttempts} failed: ${describeError(error)}`);
      }
    }

    console.error(`[GEN] no accepted post after ${maxAttempts} attempts`);
    return { ok: false, attempts: maxAttempts, reason: "attempt budget exhausted" };
  }

  async generateThread(options: GenerateOptions & { length?: number } = {}): Promise<GenerationOutcome<string[]>> {
    const maxAttempts = this.options.settings.threadMaxAttempts;
    const length = options.length ?? this.options.settings.threadLength;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const template = this.selectTemplate(options.category);
      try {
        const basePrompt = pickPrompt(template, this.random);
        let prompt =
          `Expand this into a thread of ${length} posts: ${basePrompt}\n` +
          `Put each post on its own line, numbered 1/, 2/, 3/ and so on. ` +
          `Keep each post under ${this.rules.maxLength} characters.`;
        if (template.liveData && options.useLiveData !== false) {
          const context = await this.buildMarketBlock();
          if (context) prompt += `\n\n${context}\n\nWork the live data in if it fits.`;
        }

        const raw = await this.options.llm.complete({
          prompt,
          system: this.options.catalog.baseSystemPrompt,
          maxTokens: THREAD_MAX_TOKENS,
          temperature: GENERATION_TEMPERATURE,
        });
        const segments = parseThread(raw, length);
        if (segments.length < length) {
          console.warn(`[THREAD] parsed ${segments.length}/${length} segments (attempt ${attempt}/${maxAttempts})`);
          continue;
        }

        const validated = validateThreadSegments(segments, this.rules);
        if (!validated) {
          console.log(`[REJECT] thread segment failed structure after sanitize (attempt ${attempt}/${maxAttempts})`);
          continue;
        }

        this.topicWindow.add(template.category);
        console.log(`[ACCEPT] thread ${template.category} (${validated.length} posts)`);
        return { ok: true, content: validated, category: template.category, attempts: attempt };
      } catch (error) {
        console.error(`[ERROR] thread attempt ${attempt}/${maxAttempts} failed: ${describeError(error)}`);
      }
    }

    console.error(`[THREAD] no valid thread after ${maxAttempts} attempts`);
    return { ok: false, attempts: maxAttempts, reason: "attempt budget exhausted" };
  }

  private async buildPostPrompt(template: ContentTemplate, useLiveData: boolean, insights: string): Promise<string> {
    let prompt = pickPrompt(template, this.random);

    if (useLiveData && template.liveData) {
      const context = await this.buildMarketBlock();
      let constraint = "";
      if (!this.options.priceTracker.canMentionPrice()) {
        const hours = this.options.priceTracker.hoursUntilAllowed().toFixed(1);
        constraint =
          `\n\nIMPORTANT: do not mention ${this.options.settings.subjectTicker} price action, price changes or price figures. ` +
          `Price came up recently; wait ${hours} more hours. Culture, community and narrative are fine.`;
      }
      prompt +=
        `\n\n${context}${constraint}\n\n` +
        `Use the live data only if it fits the voice. The post MUST stay under ${this.rules.maxLength - 20} characters, ` +
        `one or two lines, and finish its thought.`;
    }

    const guidance = this.options.styleGuidance?.getStyleGuidance() ?? "";
    if (guidance) prompt += `\n\n${guidance}`;
    if (insights) prompt += `\n\nRECENT LEARNINGS from community conversations:\n${insights}`;
    return prompt;
  }

  private async buildMarketBlock(): Promise<string> {
    if (!this.options.market) return "";
    try {
      const context = await this.options.market.getContext();
      return formatMarketContext(context, this.options.settings.subjectTicker);
    } catch (error) {
      console.warn(`[MARKET] context unavailable: ${describeError(error)}`);
      return "";
    }
  }

  /**
   * One extraction call per generatePost; any failure means no insights.
   */
  private async loadLearnedInsights(): Promise<string> {
    if (!this.options.learnedContext) return "";
    const entries = this.options.learnedContext.readRecent(LEARNED_READ_LIMIT);
    const conversations = entries
      .slice(-LEARNED_SEND_LIMIT)
      .map((entry) => entry.originalPost)
      .filter((text) => text.length > 10)
      .map((text, index) => `${index + 1}. ${text}`);
    if (conversations.length === 0) return "";

    try {
      const insights = await this.options.llm.complete({
        prompt:
          `Posts seen recently in conversations:\n\n${conversations.join("\n")}\n\n` +
          "List 2-3 key insights worth remembering (new tokens, narratives, sentiment, memes). " +
          'One concise lowercase line each, starting with "- ".',
        system: this.options.catalog.insightSystemPrompt,
        maxTokens: INSIGHT_MAX_TOKENS,
        temperature: INSIGHT_TEMPERATURE,
      });
      return insights.trim();
    } catch (error) {
      console.warn(`[GEN] insight extraction failed: ${describeError(error)}`);
      return "";
    }
  }
}

export function pickWeighted<T extends { weight: number }>(items: readonly T[], random: () => number): T {
  if (items.length === 0) {
    throw new Error("cannot pick from an empty pool");
  }
  const total = items.reduce((sum, item) => sum + Math.max(0, item.weight), 0);
  if (total <= 0) {
    return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
  }
  let threshold = random() * total;
  for (const item of items) {
    threshold -= Math.max(0, item.weight);
    if (threshold < 0) return item;
  }
  return items[items.length - 1];
}

function pickPrompt(template: ContentTemplate, random: () => number): string {
  const index = Math.min(template.prompts.length - 1, Math.floor(random() * template.prompts.length));
  return template.prompts[index];
}

const SEGMENT_MARKER = /^(\d+)\s*[/.]\s*/;

function stripMarker(line: string): string {
  return line.replace(SEGMENT_MARKER, "").trim();
}

/**
 * Splits numbered output ("1/ ...", "2. ...") into segments; unnumbered lines join the current one.
 * Falls back to one segment per non-empty line when the numbering yields too few.
 */
export function parseThread(content: string, expected: number): string[] {
  const lines = content
    .trim()
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);

  const segments: string[] = [];
  let current: string[] = [];
  for (const line of lines) {
    const marker = line.match(SEGMENT_MARKER);
    const number = marker ? parseInt(marker[1], 10) : 0;
    if (marker && number >= 1 && number <= expected + 1) {
      if (current.length > 0) segments.push(current.join(" "));
      const body = stripMarker(line);
      current = body ? [body] : [];
    } else {
      current.push(line);
    }
  }
  if (current.length > 0) segments.push(current.join(" "));

  const parsed = segments.length >= expected ? segments : lines.map(stripMarker);
  return parsed.filter(Boolean).slice(0, expected);
}

/**
 * Structural check per segment with one sanitize retry. Any failure discards the thread.
 */
export function validateThreadSegments(segments: readonly string[], rules: StructuralRules): string[] | null {
  const output: string[] = [];
  for (const segment of segments) {
    const normalized = normalizeCandidate(segment);
    if (validateStructure(normalized, rules).ok) {
      output.push(normalized);
      continue;
    }
    const sanitized = sanitizeSegment(normalized, rules);
    if (!validateStructure(sanitized, rules).ok) {
      return null;
    }
    output.push(sanitized);
  }
  return output;
}
