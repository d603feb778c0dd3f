import type { Intent } from "../../src/classifier/types.js";
import { parseConfig } from "../../src/config/schema.js";
import type { ConductorConfig } from "../../src/config/types.js";
import type { ExecutionRecord, StepResult } from "../../src/executor/types.js";

export function makeIntent(overrides: Partial<Intent> = {}): Intent {
  return {
    category: "file",
    subcategory: "read",
    confidence: 0.9,
    tier: 1,
    variables: {},
    source: "pattern",
    ...overrides,
  };
}

export function makeStepResult(overrides: Partial<StepResult> = {}): StepResult {
  return {
    stepId: 1,
    provider: "file",
    action: "read",
    success: true,
    durationMs: 1,
    tokensUsed: 0,
    costUsd: 0,
    ...overrides,
  };
}

export function makeExecutionRecord(overrides: Partial<ExecutionRecord> = {}): ExecutionRecord {
  return {
    id: "exec-1",
    intentKey: "file.read",
    variables: {},
    results: [makeStepResult()],
    status: "completed",
    failedSteps: [],
    blockedSteps: [],
    completedCount: 1,
    stepCount: 1,
    tokensUsed: 0,
    costUsd: 0,
    startedAt: 1_000,
    completedAt: 1_005,
    ...overrides,
  };
}

export function failedRecord(): ExecutionRecord {
  return makeExecutionRecord({
    results: [makeStepResult({ success: false, error: "boom" })],
    status: "failed",
    failedSteps: [1],
    completedCount: 0,
  });
}

/** Config with the file provider off and storage in memory. */
export function makeConfig(raw: Record<string, unknown> = {}): ConductorConfig {
  return parseConfig({
    storage: { path: ":memory:" },
    logging: { level: "error", json: true },
    providers: { file: { enabled: false } },
    ...raw,
  });
}
