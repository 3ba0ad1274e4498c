import fs from "fs";
import path from "path";
import { LearnedContextEntry } from "../types/agent.js";
import { describeError } from "../utils/errors.js";
import { isRecord } from "../utils/guards.js";

const DEFAULT_DATA_PATH = path.join(process.cwd(), "data", "learned-context.jsonl");

/**
 * Append-only JSONL log of conversations the mention producer grounded a reply on.
 */
export class LearnedContextLog {
  private readonly dataPath: string;
  private readonly now: () => Date;

  constructor(options?: { dataPath?: string; now?: () => Date }) {
    this.dataPath = options?.dataPath ? path.resolve(options.dataPath) : DEFAULT_DATA_PATH;
    this.now = typeof options?.now === "function" ? options.now : () => new Date();
  }

  append(originalPost: string, mention: string, category: string = "conversation"): void {
    const entry: LearnedContextEntry = {
      timestamp: this.now().toISOString(),
      category,
      originalPost,
      mention,
    };
    try {
      fs.mkdirSync(path.dirname(this.dataPath), { recursive: true });
      fs.appendFileSync(this.dataPath, `${JSON.stringify(entry)}\n`, "utf8");
    } catch (error) {
      console.error(`[LEARN] append failed: ${describeError(error)}`);
    }
  }

  /**
   * Last `limit` parseable entries, oldest first. Broken lines are skipped.
   */
  readRecent(limit: number = 20): LearnedContextEntry[] {
    if (!fs.existsSync(this.dataPath)) return [];
    let raw: string;
    try {
      raw = fs.readFileSync(this.dataPath, "utf8");
    } catch (error) {
      console.error(`[LEARN] read failed: ${describeError(error)}`);
      return [];
    }

    const entries: LearnedContextEntry[] = [];
    for (const line of raw.split("\n").slice(-(limit + 1))) {
      if (!line.trim()) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isLearnedContextEntry(parsed)) entries.push(parsed);
      } catch {
        continue;
      }
    }
    return entries.slice(-limit);
  }
}

function isLearnedContextEntry(value: unknown): value is LearnedContextEntry {
  return (
    isRecord(value) &&
    typeof value.timestamp === "string" &&
    typeof value.category === "string" &&
    typeof value.originalPost === "string" &&
    typeof value.mention === "string"
  );
}
