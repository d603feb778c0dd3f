import type { RoutingMode } from "../config/types.js";
import type { ModelProvider } from "./types.js";

/** Tier assumed for a provider that does not declare one: a frontier cloud model. */
export const DEFAULT_PROVIDER_TIER = 3;

const SHORT_PROMPT_CHARS = 500;
const LONG_PROMPT_CHARS = 2000;

const COMPLEX_KEYWORDS = [
  "analyze",
  "research",
  "investigate",
  "explore",
  "write",
  "generate",
  "create",
  "compose",
  "explain in detail",
  "deep dive",
  "comprehensive",
];

export function providerTier(provider: ModelProvider): number {
  return provider.tier ?? DEFAULT_PROVIDER_TIER;
}

/**
 * Tier a prompt needs when the caller did not say. Short prompts and
 * medium ones without reasoning or writing keywords fit a small model.
 */
export function estimateTier(prompt: string): number {
  if (prompt.length < SHORT_PROMPT_CHARS) return 1;
  const lower = prompt.toLowerCase();
  if (COMPLEX_KEYWORDS.some((k) => lower.includes(k))) return DEFAULT_PROVIDER_TIER;
  return prompt.length < LONG_PROMPT_CHARS ? 1 : DEFAULT_PROVIDER_TIER;
}

/**
 * Order in which providers are tried for a request.
 *
 * - `smart`: the least capable provider that meets the tier first, then the
 *   more capable ones; providers below the tier are kept as a last resort.
 * - `local`: only providers below the frontier tier, smallest first.
 * - `cloud`: most capable first.
 *
 * Ties keep the configured order.
 */
export function orderProviders<T extends ModelProvider>(
  providers: readonly T[],
  requiredTier: number,
  mode: RoutingMode,
): T[] {
  const ascending = [...providers].sort((a, b) => providerTier(a) - providerTier(b));
  switch (mode) {
    case "local":
      return ascending.filter((p) => providerTier(p) < DEFAULT_PROVIDER_TIER);
    case "cloud":
      return [...providers].sort((a, b) => providerTier(b) - providerTier(a));
    case "smart": {
      const capable = ascending.filter((p) => providerTier(p) >= requiredTier);
      const fallback = ascending.filter((p) => providerTier(p) < requiredTier).reverse();
      return [...capable, ...fallback];
    }
  }
}
