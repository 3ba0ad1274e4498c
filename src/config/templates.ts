import fs from "fs";
import path from "path";
import { ContentTemplate } from "../types/agent.js";

export interface PromptCatalog {
  baseSystemPrompt: string;
  criticSystemPrompt: string;
  replySystemPrompt: string;
  insightSystemPrompt: string;
  templates: ContentTemplate[];
}

export const DEFAULT_CATALOG_PATH = path.join(process.cwd(), "config", "content-templates.json");

export function loadPromptCatalog(
  source: string = DEFAULT_CATALOG_PATH,
  subjectTicker: string = "$FROG"
): PromptCatalog {
  const parsed: unknown = JSON.parse(fs.readFileSync(source, "utf-8"));
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("prompt catalog must be a JSON object");
  }

  const fill = (text: string) => text.split("{ticker}").join(subjectTicker);
  const catalog: PromptCatalog = {
    baseSystemPrompt: fill(readString(parsed, "baseSystemPrompt")),
    criticSystemPrompt: fill(readString(parsed, "criticSystemPrompt")),
    replySystemPrompt: fill(readString(parsed, "replySystemPrompt")),
    insightSystemPrompt: fill(readString(parsed, "insightSystemPrompt")),
    templates: readTemplates(parsed).map((template) => ({
      ...template,
      prompts: template.prompts.map(fill),
    })),
  };

  if (catalog.templates.length === 0) {
    throw new Error("prompt catalog has no templates");
  }
  return catalog;
}

function readString(source: object, key: string): string {
  const value: unknown = Reflect.get(source, key);
  if (typeof value !== "string" || !value.trim()) {
    throw new Error(`prompt catalog field "${key}" must be a non-empty string`);
  }
  return value;
}

function readTemplates(source: object): ContentTemplate[] {
  const raw: unknown = Reflect.get(source, "templates");
  if (!Array.isArray(raw)) {
    throw new Error("prompt catalog field \"templates\" must be an array");
  }

  return raw.map((item: unknown, index: number) => {
    if (typeof item !== "object" || item === null) {
      throw new Error(`template #${index} must be an object`);
    }
    const category = readString(item, "category");
    const weightRaw: unknown = Reflect.get(item, "weight");
    const liveDataRaw: unknown = Reflect.get(item, "liveData");
    const promptsRaw: unknown = Reflect.get(item, "prompts");
    const prompts = Array.isArray(promptsRaw)
      ? promptsRaw.filter((prompt): prompt is string => typeof prompt === "string" && prompt.trim().length > 0)
      : [];
    if (prompts.length === 0) {
      throw new Error(`template "${category}" has no prompts`);
    }
    return {
      category,
      weight: typeof weightRaw === "number" && weightRaw > 0 ? weightRaw : 1,
      liveData: liveDataRaw === true,
      prompts,
    };
  });
}
