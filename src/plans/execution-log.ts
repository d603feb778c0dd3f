import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { DurableStore } from "../store/types.js";
import type { ExecutionRecord, StepResult } from "../executor/types.js";
import { fromJson, toJson, type JsonObject } from "../utils/value.js";

const COLLECTION = "executions";

const stepResultSchema = z.object({
  stepId: z.number(),
  provider: z.string(),
  action: z.string(),
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  errorCategory: z.enum(["temporary", "rate_limited", "user", "system", "permanent", "guardrail"]).optional(),
  blocked: z.boolean().optional(),
  durationMs: z.number(),
  tokensUsed: z.number(),
  costUsd: z.number(),
});

const recordSchema = z.object({
  id: z.string(),
  planId: z.string().optional(),
  intentKey: z.string(),
  variables: z.record(z.string()).default({}),
  results: z.array(stepResultSchema).default([]),
  status: z.enum(["pending", "running", "completed", "failed"]),
  failedSteps: z.array(z.number()).default([]),
  blockedSteps: z.array(z.number()).default([]),
  completedCount: z.number(),
  stepCount: z.number(),
  tokensUsed: z.number(),
  costUsd: z.number(),
  startedAt: z.number(),
  completedAt: z.number().optional(),
});

function serializeResult(result: StepResult): JsonObject {
  const out: JsonObject = {
    stepId: result.stepId,
    provider: result.provider,
    action: result.action,
    success: result.success,
    durationMs: result.durationMs,
    tokensUsed: result.tokensUsed,
    costUsd: result.costUsd,
  };
  if (result.data !== undefined) out["data"] = toJson(result.data);
  if (result.error !== undefined) out["error"] = result.error;
  if (result.errorCategory !== undefined) out["errorCategory"] = result.errorCategory;
  if (result.blocked) out["blocked"] = true;
  return out;
}

function serialize(record: ExecutionRecord): JsonObject {
  const out: JsonObject = {
    id: record.id,
    intentKey: record.intentKey,
    variables: { ...record.variables },
    results: record.results.map(serializeResult),
    status: record.status,
    failedSteps: [...record.failedSteps],
    blockedSteps: [...record.blockedSteps],
    completedCount: record.completedCount,
    stepCount: record.stepCount,
    tokensUsed: record.tokensUsed,
    costUsd: record.costUsd,
    startedAt: record.startedAt,
  };
  if (record.planId !== undefined) out["planId"] = record.planId;
  if (record.completedAt !== undefined) out["completedAt"] = record.completedAt;
  return out;
}

function deserialize(data: JsonObject): ExecutionRecord | null {
  const parsed = recordSchema.safeParse(data);
  if (!parsed.success) return null;
  const { results, ...rest } = parsed.data;
  return {
    ...rest,
    results: results.map(({ data: raw, ...r }): StepResult => (raw === undefined ? r : { ...r, data: fromJson(raw) })),
  };
}

/** Append-only record of plan attempts. Each attempt is written when it starts and when it ends. */
export class ExecutionLog {
  constructor(
    private readonly store: DurableStore,
    private readonly logger: Logger,
  ) {}

  private key(record: ExecutionRecord): string {
    return `${record.intentKey}#${record.id}`;
  }

  async start(record: ExecutionRecord): Promise<void> {
    await this.store.upsert(COLLECTION, this.key(record), serialize(record));
  }

  async finish(record: ExecutionRecord): Promise<void> {
    await this.store.upsert(COLLECTION, this.key(record), serialize(record));
    this.logger.debug({ id: record.id, status: record.status, intent: record.intentKey }, "Execution recorded");
  }

  /** Most recent first. Without an intent key, spans every intent. */
  async history(intentKey?: string, limit = 20): Promise<ExecutionRecord[]> {
    const rows = await this.store.scan(COLLECTION, {
      ...(intentKey ? { prefix: `${intentKey}#` } : {}),
      limit,
    });
    const records: ExecutionRecord[] = [];
    for (const row of rows) {
      const record = deserialize(row.data);
      if (record) records.push(record);
      else this.logger.warn({ key: row.key }, "Skipping malformed execution record");
    }
    return records;
  }
}
