import { TextGenerator } from "./llm.js";
import { describeError } from "../utils/errors.js";

export interface Critique {
  score: number;
  feedback: string;
}

export const DEFAULT_CRITIQUE_SCORE = 7;

const CRITIC_MAX_TOKENS = 100;
const CRITIC_TEMPERATURE = 0.3;

/**
 * Parse a "Score: N / Feedback: ..." answer. A missing or unreadable score falls back to the default.
 */
export function parseCritique(response: string): Critique {
  const text = String(response || "").trim();
  if (!text) {
    return { score: DEFAULT_CRITIQUE_SCORE, feedback: "" };
  }

  let score = DEFAULT_CRITIQUE_SCORE;
  const scoreMatch = text.match(/score\s*:\s*(\d{1,2})/i);
  if (scoreMatch) {
    score = clampScore(parseInt(scoreMatch[1], 10));
  }

  let feedback = "";
  const feedbackIndex = text.toLowerCase().indexOf("feedback:");
  if (feedbackIndex >= 0) {
    feedback = text.slice(feedbackIndex + "feedback:".length).trim();
  }

  return { score, feedback };
}

function clampScore(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_CRITIQUE_SCORE;
  return Math.min(10, Math.max(1, value));
}

export class TweetCritic {
  constructor(
    private readonly llm: TextGenerator,
    private readonly systemPrompt: string
  ) {}

  async critique(candidate: string): Promise<Critique> {
    try {
      const response = await this.llm.complete({
        prompt: `Rate this post from 1 to 10:\n\n"${candidate}"\n\nAnswer as:\nScore: N\nFeedback: one short sentence`,
        system: this.systemPrompt,
        maxTokens: CRITIC_MAX_TOKENS,
        temperature: CRITIC_TEMPERATURE,
      });
      return parseCritique(response);
    } catch (error) {
      console.warn(`[CRITIC] critique failed, using default score: ${describeError(error)}`);
      return { score: DEFAULT_CRITIQUE_SCORE, feedback: "" };
    }
  }
}
