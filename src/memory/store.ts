import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { DurableStore, StoredRecord } from "../store/types.js";
import { withinDeadline } from "../utils/timeout.js";
import { extractKeywords, relevance } from "./retrieval.js";
import {
  DEFAULT_NAMESPACE,
  type MemoryFact,
  type RetrieveOptions,
  type ScoredMemory,
  type StoredFact,
} from "./types.js";

export interface MemoryStoreOptions {
  readonly threshold?: number;
  readonly minRelevance?: number;
  readonly maxResults?: number;
  readonly stopwords: ReadonlySet<string>;
  readonly now?: () => number;
}

const PROFILE = "memory_profile";
const ACTIONS = "memory_actions";

const profileSchema = z.object({ field: z.string(), value: z.string(), confidence: z.number() });
const actionSchema = z.object({ trigger: z.string(), action: z.string(), confidence: z.number() });

function normalize(key: string): string {
  return key.trim().toLowerCase();
}

/**
 * Cross-session facts per namespace. Profile facts are unique per field and
 * actions per trigger; without `overwrite` the first write wins.
 */
export class MemoryStore {
  private readonly threshold: number;
  private readonly minRelevance: number;
  private readonly maxResults: number;
  private readonly stopwords: ReadonlySet<string>;
  private readonly now: () => number;

  constructor(
    private readonly store: DurableStore,
    private readonly logger: Logger,
    opts: MemoryStoreOptions,
  ) {
    this.threshold = opts.threshold ?? 0.7;
    this.minRelevance = opts.minRelevance ?? 0.1;
    this.maxResults = opts.maxResults ?? 5;
    this.stopwords = opts.stopwords;
    this.now = opts.now ?? Date.now;
  }

  /** Returns how many facts were written. */
  async ingest(facts: readonly MemoryFact[], namespace = DEFAULT_NAMESPACE): Promise<number> {
    let written = 0;
    for (const fact of facts) {
      if (fact.confidence < this.threshold) continue;
      const opts = { onlyIfAbsent: !fact.overwrite };
      const ok =
        fact.kind === "profile"
          ? await this.store.upsert(
              PROFILE,
              `${namespace}:${normalize(fact.field)}`,
              { field: normalize(fact.field), value: fact.value.trim(), confidence: fact.confidence },
              opts,
            )
          : await this.store.upsert(
              ACTIONS,
              `${namespace}:${normalize(fact.trigger)}`,
              { trigger: normalize(fact.trigger), action: fact.action.trim(), confidence: fact.confidence },
              opts,
            );
      if (ok) written++;
    }
    if (written > 0) this.logger.debug({ namespace, written, offered: facts.length }, "Memory facts stored");
    return written;
  }

  async list(namespace = DEFAULT_NAMESPACE, limit?: number): Promise<StoredFact[]> {
    const scan = { prefix: `${namespace}:`, ...(limit !== undefined ? { limit } : {}) };
    const [profile, actions] = await Promise.all([this.store.scan(PROFILE, scan), this.store.scan(ACTIONS, scan)]);
    return [...profile.flatMap((r) => this.toFact(r, "profile")), ...actions.flatMap((r) => this.toFact(r, "action"))];
  }

  /** Scored facts at or above `minRelevance`, best first. */
  async retrieve(text: string, opts?: RetrieveOptions): Promise<ScoredMemory[]> {
    const keywords = extractKeywords(text, this.stopwords);
    if (keywords.length === 0) return [];

    const minRelevance = opts?.minRelevance ?? this.minRelevance;
    const limit = opts?.limit ?? this.maxResults;
    const now = this.now();
    return (await this.list(opts?.namespace ?? DEFAULT_NAMESPACE))
      .map((fact) => ({ fact, score: relevance(fact, keywords, now), updatedAt: fact.updatedAt }))
      .filter((m) => m.score >= minRelevance)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  /** `null` when the deadline passes first. */
  async retrieveWithin(
    text: string,
    timeoutMs: number,
    opts?: RetrieveOptions,
    signal?: AbortSignal,
  ): Promise<ScoredMemory[] | null> {
    return withinDeadline(() => this.retrieve(text, opts), timeoutMs, signal);
  }

  async summary(namespace = DEFAULT_NAMESPACE, limit = 10): Promise<string> {
    const facts = await this.list(namespace, limit);
    const profile = facts.flatMap((f) => (f.kind === "profile" ? [`- ${f.field}: ${f.value}`] : []));
    const actions = facts.flatMap((f) => (f.kind === "action" ? [`- When "${f.trigger}": ${f.action}`] : []));
    const sections: string[] = [];
    if (profile.length > 0) sections.push(`Profile:\n${profile.join("\n")}`);
    if (actions.length > 0) sections.push(`Actions:\n${actions.join("\n")}`);
    return sections.join("\n\n");
  }

  private toFact(record: StoredRecord, kind: StoredFact["kind"]): StoredFact[] {
    if (kind === "profile") {
      const parsed = profileSchema.safeParse(record.data);
      if (parsed.success) return [{ kind, ...parsed.data, updatedAt: record.updatedAt }];
    } else {
      const parsed = actionSchema.safeParse(record.data);
      if (parsed.success) return [{ kind, ...parsed.data, updatedAt: record.updatedAt }];
    }
    this.logger.warn({ key: record.key, collection: record.collection }, "Skipping malformed memory record");
    return [];
  }
}
