import { randomUUID } from "node:crypto";
import { categoryOf, errorMessage, type ErrorCategory } from "../errors/app-error.js";
import type { Logger } from "../logging/logger.js";
import type { ExecutionLog } from "../plans/execution-log.js";
import type { PlanStep } from "../plans/types.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { StepCall } from "../providers/types.js";
import { deadlineSignal, raceSignal, TimeoutError } from "../utils/timeout.js";
import { list, map, render, str, type Value, type ValueMap } from "../utils/value.js";
import type { ExecutionMeta, ExecutionRecord, StepResult } from "./types.js";

export interface StepExecutorOptions {
  readonly concurrency?: number;
  readonly defaultStepTimeoutMs?: number;
  readonly stepTimeoutCeilingMs?: number;
  readonly log?: ExecutionLog;
  readonly now?: () => number;
}

export type ExecutableStep = StepCall & {
  readonly timeoutSec?: number;
  /** Why the call's input could not be decoded. Such a step fails without running. */
  readonly invalidInput?: string;
};

const STEP_REF = /\{\{\s*step\.(\d+)\s*\}\}/g;
const WHOLE_STEP_REF = /^\{\{\s*step\.(\d+)\s*\}\}$/;

function resolveRefs(value: Value, outputs: ReadonlyMap<number, Value>): Value {
  switch (value.kind) {
    case "string": {
      const whole = WHOLE_STEP_REF.exec(value.value);
      const direct = whole?.[1] ? outputs.get(Number(whole[1])) : undefined;
      if (direct) return direct;
      return str(
        value.value.replace(STEP_REF, (ref, id: string) => {
          const output = outputs.get(Number(id));
          return output ? render(output) : ref;
        }),
      );
    }
    case "list":
      return list(value.items.map((item) => resolveRefs(item, outputs)));
    case "map":
      return map(resolveInput(value.entries, outputs));
    default:
      return value;
  }
}

/** Replaces `{{step.N}}` with the output of step N. A whole-string reference keeps the output's type. */
export function resolveInput(input: ValueMap, outputs: ReadonlyMap<number, Value>): ValueMap {
  const out: Record<string, Value> = {};
  for (const [key, value] of Object.entries(input)) out[key] = resolveRefs(value, outputs);
  return out;
}

/**
 * Runs provider steps with per-step deadlines and bounded fan-out. Steps never
 * reject; every failure becomes a `StepResult` with a category.
 */
export class StepExecutor {
  private readonly concurrency: number;
  private readonly defaultTimeoutMs: number;
  private readonly ceilingMs: number;
  private readonly log: ExecutionLog | undefined;
  private readonly now: () => number;

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly logger: Logger,
    opts?: StepExecutorOptions,
  ) {
    this.concurrency = Math.max(1, opts?.concurrency ?? 4);
    this.defaultTimeoutMs = opts?.defaultStepTimeoutMs ?? 300_000;
    this.ceilingMs = opts?.stepTimeoutCeilingMs ?? 120_000;
    this.log = opts?.log;
    this.now = opts?.now ?? Date.now;
  }

  timeoutFor(step: Pick<ExecutableStep, "timeoutSec">): number {
    if (step.timeoutSec !== undefined && step.timeoutSec > 0) {
      return Math.min(step.timeoutSec * 1000, this.ceilingMs);
    }
    return this.defaultTimeoutMs;
  }

  async executeStep(step: ExecutableStep, signal?: AbortSignal): Promise<StepResult> {
    const started = this.now();
    const base = { stepId: step.id, provider: step.provider, action: step.action };
    const failed = (error: string, errorCategory: ErrorCategory): StepResult => ({
      ...base,
      success: false,
      error,
      errorCategory,
      durationMs: this.now() - started,
      tokensUsed: 0,
      costUsd: 0,
    });

    if (step.invalidInput !== undefined) return failed(step.invalidInput, "user");
    const provider = this.registry.get(step.provider);
    if (!provider) return failed(`Unknown provider: ${step.provider}`, "user");
    if (!this.registry.has(step.provider, step.action)) {
      return failed(`Action not allowed: ${step.provider}.${step.action}`, "user");
    }
    if (signal?.aborted) return failed("Cancelled before start", "system");

    const timeoutMs = this.timeoutFor(step);
    const deadline = deadlineSignal(timeoutMs, signal, `${step.provider}.${step.action}`);
    try {
      const call: StepCall = { id: step.id, provider: step.provider, action: step.action, input: step.input };
      const result = await raceSignal(provider.execute(call, deadline.signal), deadline.signal);
      const durationMs = this.now() - started;
      this.logger.debug({ ...base, success: result.success, durationMs }, "Step finished");
      return {
        ...base,
        success: result.success,
        ...(result.data !== undefined ? { data: result.data } : {}),
        ...(result.success ? {} : { error: result.error ?? "Step reported failure" }),
        durationMs,
        tokensUsed: result.tokensUsed ?? 0,
        costUsd: result.costUsd ?? 0,
      };
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.logger.warn({ ...base, timeoutMs }, "Step timed out");
        return failed(err.message, "temporary");
      }
      if (signal?.aborted) return failed("Cancelled", "system");
      this.logger.warn({ ...base, err }, "Step failed");
      return failed(errorMessage(err), categoryOf(err));
    } finally {
      deadline.dispose();
    }
  }

  /** Independent calls, all attempted; one failure never cancels its siblings. */
  async executeBatch(calls: readonly ExecutableStep[], signal?: AbortSignal, meta?: ExecutionMeta): Promise<ExecutionRecord> {
    const record = this.begin(calls.length, meta);
    await this.persist("start", record);

    const results: StepResult[] = [];
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < calls.length) {
        const index = next++;
        const call = calls[index];
        if (call) results[index] = await this.executeStep(call, signal);
      }
    };
    await Promise.all(Array.from({ length: Math.min(this.concurrency, calls.length) }, worker));

    return this.finish(record, results, new Set());
  }

  /**
   * Runs steps as a dependency graph. A step starts once all of its
   * dependencies succeeded; a step behind a failure is recorded as blocked.
   */
  async executePlan(steps: readonly PlanStep[], signal?: AbortSignal, meta?: ExecutionMeta): Promise<ExecutionRecord> {
    const record = this.begin(steps.length, meta);
    await this.persist("start", record);

    const results = new Map<number, StepResult>();
    const outputs = new Map<number, Value>();
    const succeeded = new Set<number>();
    const pending = new Map(steps.map((s) => [s.id, s]));
    let running = 0;

    await new Promise<void>((resolve) => {
      const block = (step: PlanStep, reason: string): void => {
        pending.delete(step.id);
        results.set(step.id, {
          stepId: step.id,
          provider: step.provider,
          action: step.action,
          success: false,
          blocked: true,
          error: reason,
          durationMs: 0,
          tokensUsed: 0,
          costUsd: 0,
        });
      };

      const pump = (): void => {
        let changed = true;
        while (changed) {
          changed = false;
          for (const step of pending.values()) {
            const dead = step.depends.find((d) => results.has(d) && !succeeded.has(d));
            if (dead !== undefined) {
              block(step, `Blocked by failed step ${dead}`);
              changed = true;
            }
          }
        }

        for (const step of pending.values()) {
          if (running >= this.concurrency) break;
          if (!step.depends.every((d) => succeeded.has(d))) continue;
          pending.delete(step.id);
          running++;
          const resolved = { ...step, input: resolveInput(step.input, outputs) };
          void this.executeStep(resolved, signal).then((result) => {
            running--;
            results.set(step.id, result);
            if (result.success) {
              succeeded.add(step.id);
              if (result.data) outputs.set(step.id, result.data);
            }
            pump();
          });
        }

        if (running === 0) {
          // Whatever is left waits on a step that will never run
          for (const step of [...pending.values()]) block(step, "Unresolvable dependency");
          resolve();
        }
      };

      pump();
    });

    const ordered = steps.flatMap((s) => {
      const result = results.get(s.id);
      return result ? [result] : [];
    });
    const critical = new Set(steps.flatMap((s) => s.depends));
    return this.finish(record, ordered, critical);
  }

  // ── Records ──

  private begin(stepCount: number, meta?: ExecutionMeta): ExecutionRecord {
    return {
      id: randomUUID(),
      ...(meta?.planId !== undefined ? { planId: meta.planId } : {}),
      intentKey: meta?.intentKey ?? "adhoc",
      variables: meta?.variables ?? {},
      results: [],
      status: "running",
      failedSteps: [],
      blockedSteps: [],
      completedCount: 0,
      stepCount,
      tokensUsed: 0,
      costUsd: 0,
      startedAt: this.now(),
    };
  }

  private async finish(
    record: ExecutionRecord,
    results: readonly StepResult[],
    critical: ReadonlySet<number>,
  ): Promise<ExecutionRecord> {
    const failedSteps = results.filter((r) => !r.success && !r.blocked).map((r) => r.stepId);
    const blockedSteps = results.filter((r) => r.blocked).map((r) => r.stepId);
    const allFailed = results.length > 0 && failedSteps.length === results.length;
    const failed = allFailed || failedSteps.some((id) => critical.has(id));

    const done: ExecutionRecord = {
      ...record,
      results,
      status: failed ? "failed" : "completed",
      failedSteps,
      blockedSteps,
      completedCount: results.filter((r) => r.success).length,
      tokensUsed: results.reduce((sum, r) => sum + r.tokensUsed, 0),
      costUsd: results.reduce((sum, r) => sum + r.costUsd, 0),
      completedAt: this.now(),
    };
    this.logger.info(
      { executionId: done.id, intent: done.intentKey, status: done.status, steps: done.stepCount, failed: failedSteps.length },
      "Execution finished",
    );
    await this.persist("finish", done);
    return done;
  }

  private async persist(phase: "start" | "finish", record: ExecutionRecord): Promise<void> {
    if (!this.log) return;
    try {
      await (phase === "start" ? this.log.start(record) : this.log.finish(record));
    } catch (err) {
      this.logger.warn({ err, executionId: record.id, phase }, "Could not persist execution record");
    }
  }
}
