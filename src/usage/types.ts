export interface UsageRecord {
  readonly threadId: string;
  readonly route: string;
  readonly tokensUsed: number;
  readonly costUsd: number;
  readonly durationMs: number;
}

export interface UsageSummary {
  readonly totalTokens: number;
  readonly totalCost: number;
  readonly requestCount: number;
  readonly period: string;
  readonly breakdown: UsageBreakdown[];
}

export interface UsageBreakdown {
  readonly date: string;
  readonly tokens: number;
  readonly cost: number;
  readonly requests: number;
}
