import type { ErrorCategory } from "../errors/app-error.js";
import type { Value } from "../utils/value.js";

export type ExecutionStatus = "pending" | "running" | "completed" | "failed";

export interface StepResult {
  readonly stepId: number;
  readonly provider: string;
  readonly action: string;
  readonly success: boolean;
  readonly data?: Value;
  readonly error?: string;
  readonly errorCategory?: ErrorCategory;
  /** Set when the step never ran because a dependency failed. */
  readonly blocked?: boolean;
  readonly durationMs: number;
  readonly tokensUsed: number;
  readonly costUsd: number;
}

export interface ExecutionRecord {
  readonly id: string;
  readonly planId?: string;
  readonly intentKey: string;
  readonly variables: Readonly<Record<string, string>>;
  readonly results: readonly StepResult[];
  readonly status: ExecutionStatus;
  readonly failedSteps: readonly number[];
  readonly blockedSteps: readonly number[];
  readonly completedCount: number;
  readonly stepCount: number;
  readonly tokensUsed: number;
  readonly costUsd: number;
  readonly startedAt: number;
  readonly completedAt?: number;
}

export interface ExecutionMeta {
  readonly planId?: string;
  readonly intentKey?: string;
  readonly variables?: Readonly<Record<string, string>>;
}

/** No failed and no blocked steps. Only this counts as success for plan statistics. */
export function isFullSuccess(record: ExecutionRecord): boolean {
  return record.status === "completed" && record.failedSteps.length === 0 && record.blockedSteps.length === 0;
}
