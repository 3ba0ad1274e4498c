import Anthropic from "@anthropic-ai/sdk";

export interface ClaudeTextLikeBlock {
  type: string;
  text?: string;
}

export const CLAUDE_MODEL = "claude-sonnet-4-5-20250929";

export interface CompletionRequest {
  prompt: string;
  system?: string;
  maxTokens: number;
  temperature: number;
}

/**
 * complete(prompt, system, params) -> text. Implementations throw on transport failure;
 * callers decide whether that means retry, skip or a default.
 */
export interface TextGenerator {
  complete(request: CompletionRequest): Promise<string>;
}

export function extractTextFromClaude(content: ClaudeTextLikeBlock[]): string {
  const textBlock = content.find((block) => block.type === "text");
  if (!textBlock || typeof textBlock.text !== "string") {
    return "";
  }
  return textBlock.text;
}

export function initClaudeClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey });
}

export class ClaudeTextGenerator implements TextGenerator {
  constructor(
    private readonly claude: Anthropic,
    private readonly model: string = CLAUDE_MODEL
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const message = await this.claude.messages.create({
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: clampTemperature(request.temperature),
      system: request.system,
      messages: [{ role: "user", content: request.prompt }],
    });
    return extractTextFromClaude(message.content).trim();
  }
}

function clampTemperature(value: number): number {
  if (!Number.isFinite(value)) return 0.7;
  return Math.min(1, Math.max(0, value));
}
