import test from "node:test";
import assert from "node:assert/strict";
import fs from "fs";
import path from "path";
import { loadPromptCatalog } from "../src/config/templates.js";
import { makeTempDir, removeDir } from "./helpers.js";

function writeCatalog(dir: string, catalog: unknown): string {
  const file = path.join(dir, "catalog.json");
  fs.writeFileSync(file, JSON.stringify(catalog));
  return file;
}

const PROMPTS = {
  baseSystemPrompt: "You shill {ticker} and nothing else.",
  criticSystemPrompt: "Score tweets about {ticker}.",
  replySystemPrompt: "Reply briefly.",
  insightSystemPrompt: "Extract one insight.",
};

test("loadPromptCatalog fills the ticker and defaults template fields", () => {
  const dir = makeTempDir("catalog");
  const file = writeCatalog(dir, {
    ...PROMPTS,
    templates: [
      { category: "pond_news", weight: 3, liveData: true, prompts: ["Talk about {ticker} and {ticker}", "", 7] },
      { category: "plain", weight: -2, prompts: ["Say gm"] },
    ],
  });

  const catalog = loadPromptCatalog(file, "$TOAD");
  assert.equal(catalog.baseSystemPrompt, "You shill $TOAD and nothing else.");
  assert.equal(catalog.criticSystemPrompt, "Score tweets about $TOAD.");
  assert.deepEqual(catalog.templates, [
    { category: "pond_news", weight: 3, liveData: true, prompts: ["Talk about $TOAD and $TOAD"] },
    { category: "plain", weight: 1, liveData: false, prompts: ["Say gm"] },
  ]);

  removeDir(dir);
});

test("loadPromptCatalog rejects a catalog without templates", () => {
  const dir = makeTempDir("catalog");
  const file = writeCatalog(dir, { ...PROMPTS, templates: [] });
  assert.throws(() => loadPromptCatalog(file), /prompt catalog has no templates/);
  removeDir(dir);
});

test("loadPromptCatalog names the missing prompt field", () => {
  const dir = makeTempDir("catalog");
  const file = writeCatalog(dir, { ...PROMPTS, replySystemPrompt: "  ", templates: [{ category: "a", prompts: ["x"] }] });
  assert.throws(() => loadPromptCatalog(file), /field "replySystemPrompt" must be a non-empty string/);
  removeDir(dir);
});

test("loadPromptCatalog rejects a template with no usable prompts", () => {
  const dir = makeTempDir("catalog");
  const file = writeCatalog(dir, { ...PROMPTS, templates: [{ category: "empty", prompts: [""] }] });
  assert.throws(() => loadPromptCatalog(file), /template "empty" has no prompts/);
  removeDir(dir);
});

test("the shipped catalog loads with every category", () => {
  const catalog = loadPromptCatalog();
  assert.equal(catalog.templates.length, 14);
  assert.equal(catalog.templates.some((template) => template.category === "subject_price_action"), true);
  assert.equal(catalog.templates.every((template) => template.prompts.every((prompt) => !prompt.includes("{ticker}"))), true);
});
