import type { DurableStore } from "../store/types.js";
import type { UsageBreakdown, UsageRecord, UsageSummary } from "./types.js";

const DAILY = "usage_daily";
const THREADS = "usage_thread";
const DAY_MS = 86_400_000;

function dayKey(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/** Token and cost totals per UTC day and per thread, kept as store counters. */
export class UsageTracker {
  constructor(
    private readonly store: DurableStore,
    private readonly now: () => number = Date.now,
  ) {}

  async record(entry: UsageRecord): Promise<void> {
    const day = dayKey(this.now());
    await Promise.all([
      this.store.increment(DAILY, day, "requests"),
      this.store.increment(DAILY, day, "tokens", entry.tokensUsed),
      this.store.increment(DAILY, day, "cost", entry.costUsd),
      this.store.increment(DAILY, day, `route:${entry.route}`),
      this.store.increment(THREADS, entry.threadId, "requests"),
      this.store.increment(THREADS, entry.threadId, "tokens", entry.tokensUsed),
      this.store.increment(THREADS, entry.threadId, "cost", entry.costUsd),
    ]);
  }

  async forThread(threadId: string): Promise<{ tokens: number; cost: number; requests: number }> {
    const counters = await this.store.counters(THREADS, threadId);
    return { tokens: counters["tokens"] ?? 0, cost: counters["cost"] ?? 0, requests: counters["requests"] ?? 0 };
  }

  /** The last `days` UTC days, today included, newest first. Days with no traffic are left out. */
  async summarize(days = 7): Promise<UsageSummary> {
    const today = this.now();
    const breakdown: UsageBreakdown[] = [];
    for (let i = 0; i < days; i++) {
      const date = dayKey(today - i * DAY_MS);
      const counters = await this.store.counters(DAILY, date);
      const requests = counters["requests"] ?? 0;
      if (requests === 0) continue;
      breakdown.push({ date, tokens: counters["tokens"] ?? 0, cost: counters["cost"] ?? 0, requests });
    }

    return {
      totalTokens: breakdown.reduce((sum, d) => sum + d.tokens, 0),
      totalCost: breakdown.reduce((sum, d) => sum + d.cost, 0),
      requestCount: breakdown.reduce((sum, d) => sum + d.requests, 0),
      period: `last ${days} day${days === 1 ? "" : "s"}`,
      breakdown,
    };
  }
}
