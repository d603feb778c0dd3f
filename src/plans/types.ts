import { z } from "zod";
import { ErrorCodes, systemError } from "../errors/app-error.js";
import { mapFromJson, mapToJson, type JsonObject, type ValueMap } from "../utils/value.js";

export interface PlanStep {
  readonly id: number;
  readonly provider: string;
  readonly action: string;
  readonly input: ValueMap;
  readonly depends: readonly number[];
  readonly timeoutSec?: number;
}

export interface PlanVariable {
  readonly name: string;
  readonly description?: string;
  readonly required: boolean;
  readonly default?: string;
}

export interface Plan {
  readonly id: string;
  readonly intentKey: string;
  readonly description: string;
  readonly steps: readonly PlanStep[];
  readonly variables: readonly PlanVariable[];
  readonly createdAt: number;
}

export interface PlanStats {
  readonly usageCount: number;
  readonly successCount: number;
  readonly failureCount: number;
  /** Cumulative `successCount / usageCount`; 0 before the first use. */
  readonly successRate: number;
  readonly active: boolean;
  readonly lastUsedAt?: number;
}

/** A stored plan with its outcome statistics. */
export interface PlanPattern {
  readonly plan: Plan;
  readonly stats: PlanStats;
}

export type PlanSource = "pattern" | "cached" | "template" | "generated";

export interface PlanSelection {
  readonly plan: Plan;
  /** Steps with `{{name}}` placeholders bound. */
  readonly steps: readonly PlanStep[];
  readonly variables: Readonly<Record<string, string>>;
  readonly source: PlanSource;
  /** Tokens spent generating the plan; 0 when it came from the cache. */
  readonly tokensUsed: number;
}

// ── Schemas ──

export const planStepSchema = z.object({
  id: z.number().int(),
  provider: z.string().min(1),
  action: z.string().min(1),
  input: z.record(z.unknown()).default({}),
  depends: z.array(z.number().int()).default([]),
  timeoutSec: z.number().optional(),
});

export const planVariableSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  required: z.boolean().default(false),
  default: z.union([z.string(), z.number(), z.boolean()]).transform(String).optional(),
});

const storedPlanSchema = z.object({
  id: z.string().min(1),
  intentKey: z.string().min(1),
  description: z.string().default(""),
  steps: z.array(planStepSchema),
  variables: z.array(planVariableSchema).default([]),
  createdAt: z.number(),
  active: z.boolean().default(true),
  lastUsedAt: z.number().optional(),
});

export function toStep(raw: z.infer<typeof planStepSchema>): PlanStep {
  return {
    id: raw.id,
    provider: raw.provider,
    action: raw.action,
    input: mapFromJson(raw.input),
    depends: raw.depends,
    ...(raw.timeoutSec !== undefined ? { timeoutSec: raw.timeoutSec } : {}),
  };
}

export function serializePlan(plan: Plan, extra: { active: boolean; lastUsedAt?: number }): JsonObject {
  const data: JsonObject = {
    id: plan.id,
    intentKey: plan.intentKey,
    description: plan.description,
    steps: plan.steps.map((s) => {
      const step: JsonObject = {
        id: s.id,
        provider: s.provider,
        action: s.action,
        input: mapToJson(s.input),
        depends: [...s.depends],
      };
      if (s.timeoutSec !== undefined) step["timeoutSec"] = s.timeoutSec;
      return step;
    }),
    variables: plan.variables.map((v) => {
      const variable: JsonObject = { name: v.name, required: v.required };
      if (v.description !== undefined) variable["description"] = v.description;
      if (v.default !== undefined) variable["default"] = v.default;
      return variable;
    }),
    createdAt: plan.createdAt,
    active: extra.active,
  };
  if (extra.lastUsedAt !== undefined) data["lastUsedAt"] = extra.lastUsedAt;
  return data;
}

export function deserializePlan(data: JsonObject): { plan: Plan; active: boolean; lastUsedAt?: number } {
  const parsed = storedPlanSchema.safeParse(data);
  if (!parsed.success) {
    throw systemError(ErrorCodes.STORE_CORRUPT, `Stored plan is malformed: ${parsed.error.message}`);
  }
  const { active, lastUsedAt, steps, ...rest } = parsed.data;
  return {
    plan: { ...rest, steps: steps.map(toStep) },
    active,
    ...(lastUsedAt !== undefined ? { lastUsedAt } : {}),
  };
}
