import { GuardrailError } from "../errors/app-error.js";
import type { Intent } from "../classifier/types.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { PlanStep } from "./types.js";

export interface GuardrailContext {
  readonly intent?: Pick<Intent, "category" | "subcategory">;
  readonly text?: string;
}

const RESEARCH_PROVIDER = "research";
const EXPLICIT_SEARCH = /\b(?:search|look\s+up|google|browse)\b/i;

/** Every rule a plan breaks, in step order. An empty list means the plan may run. */
export function planViolations(
  steps: readonly PlanStep[],
  registry: ProviderRegistry,
  ctx: GuardrailContext = {},
): string[] {
  if (steps.length === 0) return ["plan has no steps"];

  const violations: string[] = [];
  const seen = new Set<number>();
  const chatOnly = ctx.intent?.category === "chat" && !EXPLICIT_SEARCH.test(ctx.text ?? "");

  for (const step of steps) {
    const label = `step ${step.id}`;
    if (step.id <= 0) violations.push(`${label}: id must be a positive integer`);
    if (seen.has(step.id)) violations.push(`${label}: duplicate id`);

    const provider = registry.get(step.provider);
    if (!provider) {
      violations.push(`${label}: unknown provider '${step.provider}'`);
    } else if (!registry.has(step.provider, step.action)) {
      violations.push(`${label}: action '${step.provider}.${step.action}' is not allowed`);
    }

    for (const dep of step.depends) {
      if (!seen.has(dep)) {
        violations.push(`${label}: depends on step ${dep}, which is missing or not earlier`);
      }
    }

    if (step.timeoutSec !== undefined && step.timeoutSec < 0) {
      violations.push(`${label}: negative timeout`);
    }

    if (chatOnly && step.provider === RESEARCH_PROVIDER) {
      violations.push(`${label}: research is not allowed for a conversational request`);
    }

    seen.add(step.id);
  }

  return violations;
}

/** Throws a `GuardrailError` carrying every violation. */
export function assertPlanAllowed(
  steps: readonly PlanStep[],
  registry: ProviderRegistry,
  ctx: GuardrailContext = {},
): void {
  const violations = planViolations(steps, registry, ctx);
  if (violations.length > 0) {
    throw new GuardrailError(violations, ctx.intent ? { intent: `${ctx.intent.category}.${ctx.intent.subcategory}` } : undefined);
  }
}
