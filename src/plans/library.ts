import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Value } from "../utils/value.js";
import { planStepSchema, planVariableSchema, toStep, type Plan, type PlanStep } from "./types.js";

const DEFAULT_TEMPLATES_URL = new URL("../../data/plan-templates.json", import.meta.url);

const BASE_TOKENS_PER_STEP = 100;
const DEFAULT_USD_PER_MILLION_TOKENS = 0.5;

const templateSchema = z.object({
  id: z.string().min(1),
  intentKey: z.string().min(1),
  description: z.string().min(1),
  steps: z.array(planStepSchema).min(1),
  variables: z.array(planVariableSchema).default([]),
});

export interface PlanCostEstimate {
  readonly totalSteps: number;
  readonly estimatedTokens: number;
  readonly estimatedCostUsd: number;
}

export function compileTemplates(raw: unknown): Plan[] {
  return z.array(templateSchema).parse(raw).map((t) => ({
    ...t,
    steps: t.steps.map(toStep),
    createdAt: 0,
  }));
}

export function loadTemplates(source: URL | string = DEFAULT_TEMPLATES_URL): Plan[] {
  return compileTemplates(JSON.parse(readFileSync(source, "utf-8")));
}

/** Hand-written plans offered before the model is asked to generate one. */
export class PlanLibrary {
  private readonly byIntent: ReadonlyMap<string, Plan>;

  constructor(templates: readonly Plan[]) {
    const byIntent = new Map<string, Plan>();
    for (const template of templates) {
      if (byIntent.has(template.intentKey)) {
        throw new Error(`Duplicate plan template for intent: ${template.intentKey}`);
      }
      byIntent.set(template.intentKey, template);
    }
    this.byIntent = byIntent;
  }

  get(intentKey: string): Plan | undefined {
    return this.byIntent.get(intentKey);
  }

  list(): Plan[] {
    return [...this.byIntent.values()].sort((a, b) => a.intentKey.localeCompare(b.intentKey));
  }

  get size(): number {
    return this.byIntent.size;
  }
}

// ── Cost estimation ──

function inputTokens(value: Value): number {
  switch (value.kind) {
    case "string":
      // About four characters per token
      return Math.floor(value.value.length / 4);
    case "map":
      return 200;
    case "list":
      return 50 * value.items.length;
    default:
      return 0;
  }
}

function stepTokens(step: PlanStep): number {
  return Object.values(step.input).reduce((sum, value) => sum + inputTokens(value), BASE_TOKENS_PER_STEP);
}

/** Rough upper bound on what running a plan costs, before any step has run. */
export function estimatePlanCost(
  plan: Pick<Plan, "steps">,
  usdPerMillionTokens = DEFAULT_USD_PER_MILLION_TOKENS,
): PlanCostEstimate {
  const estimatedTokens = plan.steps.reduce((sum, step) => sum + stepTokens(step), 0);
  return {
    totalSteps: plan.steps.length,
    estimatedTokens,
    estimatedCostUsd: (estimatedTokens / 1_000_000) * usdPerMillionTokens,
  };
}
