import { readFileSync } from "node:fs";
import { z } from "zod";
import type { IntentPattern } from "./types.js";

const DEFAULT_PATTERNS_URL = new URL("../../data/intent-patterns.json", import.meta.url);

const directSchema = z.object({
  provider: z.string().min(1),
  action: z.string().min(1),
  requires: z.array(z.string()).default([]),
  input: z.record(z.string()).optional(),
});

const patternSchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
  subcategory: z.string().min(1),
  keywords: z.array(z.string().min(1)).default([]),
  regex: z.string().optional(),
  confidence: z.number().min(0).max(1),
  tier: z.number().int().min(0).max(3),
  direct: directSchema.optional(),
});

export function compilePatterns(raw: unknown): IntentPattern[] {
  return z.array(patternSchema).parse(raw).map((p) => ({
    ...p,
    keywords: p.keywords.map((k) => k.toLowerCase()),
    regex: p.regex !== undefined ? new RegExp(p.regex, "i") : undefined,
  }));
}

export function loadPatterns(source: URL | string = DEFAULT_PATTERNS_URL): IntentPattern[] {
  return compilePatterns(JSON.parse(readFileSync(source, "utf-8")));
}

/** At least one keyword must appear, and the regex (if any) must match too. */
export function patternMatches(pattern: IntentPattern, text: string): boolean {
  const lower = text.toLowerCase();
  if (pattern.keywords.length > 0 && !pattern.keywords.some((k) => lower.includes(k))) {
    return false;
  }
  return pattern.regex ? pattern.regex.test(lower) : true;
}

export function firstMatch(patterns: readonly IntentPattern[], text: string): IntentPattern | undefined {
  return patterns.find((p) => patternMatches(p, text));
}
