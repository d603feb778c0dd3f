import type { Intent } from "../classifier/types.js";
import { intentKey } from "../classifier/types.js";
import { AppError, ErrorCodes, systemError, userError } from "../errors/app-error.js";
import { isFullSuccess, type ExecutionRecord } from "../executor/types.js";
import type { Logger } from "../logging/logger.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { DurableStore, StoredRecord } from "../store/types.js";
import type { PlanGenerator } from "./generator.js";
import { assertPlanAllowed, planViolations, type GuardrailContext } from "./guardrail.js";
import type { PlanLibrary } from "./library.js";
import { instantiate } from "./templates.js";
import {
  deserializePlan,
  serializePlan,
  type Plan,
  type PlanPattern,
  type PlanSelection,
  type PlanSource,
  type PlanStats,
} from "./types.js";

export interface PlanCacheOptions {
  readonly bestPatternMinSuccessRate?: number;
  readonly retirementThreshold?: number;
  readonly minUsesBeforeRetirement?: number;
  /** Built-in plans tried after the stored ones and before generation. */
  readonly library?: PlanLibrary;
  readonly now?: () => number;
}

export interface ListPatternsOptions {
  readonly intentKey?: string;
  readonly includeInactive?: boolean;
}

const PLANS = "plans";
const STATS = "plan_stats";

function planKey(plan: Plan): string {
  return `${plan.intentKey}#${plan.id}`;
}

function byPerformance(a: PlanPattern, b: PlanPattern): number {
  return b.stats.successRate - a.stats.successRate || b.stats.usageCount - a.stats.usageCount;
}

function lastUsed(p: PlanPattern): number {
  return p.stats.lastUsedAt ?? p.plan.createdAt;
}

/**
 * Reusable plans keyed by intent. Lookup order: the best-performing pattern,
 * then the most recently used plan, then a built-in template, then a freshly
 * generated one. Retired plans are never offered.
 */
export class PlanCache {
  private readonly bestRate: number;
  private readonly retirementThreshold: number;
  private readonly minUses: number;
  private readonly now: () => number;
  private readonly library: PlanLibrary | null;

  constructor(
    private readonly store: DurableStore,
    private readonly registry: ProviderRegistry,
    private readonly generator: PlanGenerator | null,
    private readonly logger: Logger,
    opts?: PlanCacheOptions,
  ) {
    this.bestRate = opts?.bestPatternMinSuccessRate ?? 0.7;
    this.retirementThreshold = opts?.retirementThreshold ?? 0.3;
    this.minUses = opts?.minUsesBeforeRetirement ?? 3;
    this.now = opts?.now ?? Date.now;
    this.library = opts?.library ?? null;
  }

  async getOrCreate(intent: Intent, text: string, signal?: AbortSignal): Promise<PlanSelection> {
    const key = intentKey(intent);
    const ctx: GuardrailContext = { intent, text };
    const all = await this.patterns(key);
    const active = all.filter((p) => p.stats.active);

    const best = [...active].sort(byPerformance)[0];
    if (best && best.stats.successRate > this.bestRate) {
      const selection = this.bind(best.plan, intent, ctx, "pattern");
      if (selection) return selection;
    }

    for (const candidate of [...active].sort((a, b) => lastUsed(b) - lastUsed(a))) {
      const selection = this.bind(candidate.plan, intent, ctx, "cached");
      if (selection) return selection;
    }

    const template = this.library?.get(key);
    // A stored copy of the template has already been tried above, or was retired
    if (template && !all.some((p) => p.plan.id === template.id)) {
      const selection = this.bind(template, intent, ctx, "template");
      if (selection) {
        this.logger.debug({ intent: key, planId: template.id }, "Using built-in plan");
        return selection;
      }
    }

    if (!this.generator) {
      throw systemError(ErrorCodes.MODEL_UNAVAILABLE, `No stored plan for ${key} and no model to generate one`);
    }

    const { plan, tokensUsed } = await this.generator.generate(intent, text, signal);
    assertPlanAllowed(plan.steps, this.registry, ctx);
    const bound = instantiate(plan, intent.variables);
    if (bound.missing.length > 0) {
      throw userError(ErrorCodes.PLAN_VARIABLES_MISSING, `Missing required values: ${bound.missing.join(", ")}`, {
        suggestions: ["Include the missing values in your request"],
        context: { intent: key },
      });
    }
    this.logger.info({ intent: key, planId: plan.id, steps: plan.steps.length }, "Generated plan");
    return { plan, steps: bound.steps, variables: bound.variables, source: "generated", tokensUsed };
  }

  /**
   * Updates the plan's counters after an attempt. A generated plan is stored
   * only when this first run fully succeeded; a built-in one is stored on
   * first use whatever the outcome. A run the caller cancelled says nothing
   * about the plan and is not counted.
   */
  async recordOutcome(selection: PlanSelection, record: ExecutionRecord, signal?: AbortSignal): Promise<void> {
    const { plan } = selection;
    if (signal?.aborted) {
      this.logger.debug({ intent: plan.intentKey, planId: plan.id }, "Run was cancelled; plan statistics unchanged");
      return;
    }
    const key = planKey(plan);
    const success = isFullSuccess(record);
    const now = this.now();

    if (selection.source === "generated") {
      if (!success) {
        this.logger.info({ intent: plan.intentKey, planId: plan.id, status: record.status }, "Discarding generated plan");
        return;
      }
      await this.store.upsert(PLANS, key, serializePlan(plan, { active: true, lastUsedAt: now }), { onlyIfAbsent: true });
      await this.store.increment(STATS, key, "usage");
      await this.store.increment(STATS, key, "success");
      this.logger.info({ intent: plan.intentKey, planId: plan.id }, "Stored plan");
      return;
    }

    if (selection.source === "template") {
      const stored = serializePlan({ ...plan, createdAt: now }, { active: true, lastUsedAt: now });
      await this.store.upsert(PLANS, key, stored, { onlyIfAbsent: true });
    }
    await this.store.increment(STATS, key, "usage");
    await this.store.increment(STATS, key, success ? "success" : "failure");
    const stats = this.toStats(await this.store.counters(STATS, key), true, now);
    const retire = stats.usageCount >= this.minUses && stats.successRate < this.retirementThreshold;
    await this.store.upsert(PLANS, key, serializePlan(plan, { active: !retire, lastUsedAt: now }));
    if (retire) {
      this.logger.warn(
        { intent: plan.intentKey, planId: plan.id, successRate: stats.successRate, uses: stats.usageCount },
        "Retired plan",
      );
    }
  }

  /** Best pattern for an intent, retired ones included when nothing active remains. */
  async getPattern(key: string): Promise<PlanPattern | null> {
    const all = await this.patterns(key);
    const active = all.filter((p) => p.stats.active).sort(byPerformance);
    return active[0] ?? all.sort(byPerformance)[0] ?? null;
  }

  async listPatterns(opts?: ListPatternsOptions): Promise<PlanPattern[]> {
    const all = await this.patterns(opts?.intentKey);
    const includeInactive = opts?.includeInactive ?? true;
    return (includeInactive ? all : all.filter((p) => p.stats.active)).sort(byPerformance);
  }

  // ── Internals ──

  private bind(plan: Plan, intent: Intent, ctx: GuardrailContext, source: PlanSource): PlanSelection | null {
    const bound = instantiate(plan, intent.variables);
    if (bound.missing.length > 0) {
      this.logger.debug({ planId: plan.id, missing: bound.missing }, "Stored plan lacks variables");
      return null;
    }
    const violations = planViolations(bound.steps, this.registry, ctx);
    if (violations.length > 0) {
      if (source === "template") {
        this.logger.debug({ planId: plan.id, violations }, "Built-in plan needs actions that are not registered");
      } else {
        this.logger.warn({ planId: plan.id, violations }, "Stored plan no longer passes guardrails");
      }
      return null;
    }
    return { plan, steps: bound.steps, variables: bound.variables, source, tokensUsed: 0 };
  }

  private async patterns(key?: string): Promise<PlanPattern[]> {
    const rows = await this.store.scan(PLANS, key ? { prefix: `${key}#` } : {});
    const out: PlanPattern[] = [];
    for (const row of rows) {
      const pattern = await this.load(row);
      if (pattern) out.push(pattern);
    }
    return out;
  }

  private async load(row: StoredRecord): Promise<PlanPattern | null> {
    try {
      const { plan, active, lastUsedAt } = deserializePlan(row.data);
      const counters = await this.store.counters(STATS, row.key);
      return { plan, stats: this.toStats(counters, active, lastUsedAt) };
    } catch (err) {
      if (!(err instanceof AppError) || err.code !== ErrorCodes.STORE_CORRUPT) throw err;
      this.logger.warn({ key: row.key, err }, "Skipping malformed plan");
      return null;
    }
  }

  private toStats(counters: Record<string, number>, active: boolean, lastUsedAt?: number): PlanStats {
    const usageCount = counters["usage"] ?? 0;
    const successCount = counters["success"] ?? 0;
    return {
      usageCount,
      successCount,
      failureCount: counters["failure"] ?? 0,
      successRate: usageCount > 0 ? successCount / usageCount : 0,
      active,
      ...(lastUsedAt !== undefined ? { lastUsedAt } : {}),
    };
  }
}
