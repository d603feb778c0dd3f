import { readFileSync } from "node:fs";
import { z } from "zod";
import { factText, type StoredFact } from "./types.js";

const DEFAULT_STOPWORDS_URL = new URL("../../data/stopwords.json", import.meta.url);
const RECENCY_DECAY_HOURS = 720;

export function loadStopwords(source: URL | string = DEFAULT_STOPWORDS_URL): ReadonlySet<string> {
  const words = z.array(z.string()).parse(JSON.parse(readFileSync(source, "utf-8")));
  return new Set(words.map((w) => w.toLowerCase()));
}

/** Lower-cased `\w+` tokens of three or more characters, minus stop words, first occurrence only. */
export function extractKeywords(text: string, stopwords: ReadonlySet<string>): string[] {
  const seen = new Set<string>();
  for (const word of text.toLowerCase().match(/\w+/g) ?? []) {
    if (word.length < 3 || stopwords.has(word)) continue;
    seen.add(word);
  }
  return [...seen];
}

/**
 * 0.6 keyword overlap, 0.2 recency (decays over 30 days), 0.2 confidence.
 * Capped at 1.
 */
export function relevance(fact: StoredFact, keywords: readonly string[], now: number): number {
  const text = factText(fact).toLowerCase();
  const matched = keywords.filter((k) => text.includes(k)).length;
  const keywordScore = keywords.length > 0 ? matched / keywords.length : 0;
  const ageHours = Math.max(0, now - fact.updatedAt) / 3_600_000;
  const recency = Math.exp(-ageHours / RECENCY_DECAY_HOURS);
  return Math.min(1, keywordScore * 0.6 + recency * 0.2 + fact.confidence * 0.2);
}
