import type { DirectBinding, PatternMatch } from "../classifier/types.js";
import type { Intent } from "../classifier/types.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { StepCall } from "../providers/types.js";
import { mapFromStrings } from "../utils/value.js";

export type Route = "local" | "direct" | "plan";
export type PlanMode = "planned" | "conversational";

const ACTIONABLE = new Set(["code", "file", "research", "task", "calendar", "system"]);
const TOOL_VERBS =
  /\b(?:run|execute|open|read|write|edit|search|look\s+up|find|fetch|summari[sz]e|browse|install|delete|remove|list)\b/i;

export function hasToolVerbs(text: string): boolean {
  return TOOL_VERBS.test(text);
}

/** Actionable categories and imperative requests get a plan; everything else is a conversation. */
export function choosePlanMode(intent: Pick<Intent, "category">, text: string): PlanMode {
  return ACTIONABLE.has(intent.category) || hasToolVerbs(text) ? "planned" : "conversational";
}

/**
 * Builds the single step for a pattern's direct binding, or `null` when the
 * binding is absent, not registered, or missing a required variable.
 */
export function directCall(match: PatternMatch | null, registry: ProviderRegistry): StepCall | null {
  const binding: DirectBinding | undefined = match?.pattern.direct;
  if (!match || !binding) return null;
  if (!registry.has(binding.provider, binding.action)) return null;

  const vars = match.variables;
  if (!binding.requires.every((name) => vars[name] !== undefined && vars[name] !== "")) return null;

  const input: Record<string, string> = {};
  const mapping = binding.input ?? Object.fromEntries(binding.requires.map((name) => [name, name]));
  for (const [param, variable] of Object.entries(mapping)) {
    const value = vars[variable];
    if (value !== undefined) input[param] = value;
  }

  return { id: 1, provider: binding.provider, action: binding.action, input: mapFromStrings(input) };
}
