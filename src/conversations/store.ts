import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { DurableStore } from "../store/types.js";
import type { JsonObject } from "../utils/value.js";
import type { ConversationTurn, HistoryOptions, NewTurn, ThreadMode } from "./types.js";

const COLLECTIONS: Readonly<Record<ThreadMode, string>> = {
  personal: "conversations",
  team: "team_conversations",
};
const SEQUENCES = "conversation_seq";

const turnSchema = z.object({
  threadId: z.string(),
  mode: z.enum(["personal", "team"]),
  userId: z.string(),
  seq: z.number().int().positive(),
  user: z.string(),
  assistant: z.string(),
  route: z.string(),
  intent: z.string().optional(),
  tier: z.number(),
  tokensUsed: z.number(),
  durationMs: z.number(),
  createdAt: z.number(),
});

function turnKey(threadId: string, seq: number): string {
  return `${threadId}#${String(seq).padStart(8, "0")}`;
}

function toJson(turn: ConversationTurn): JsonObject {
  const data: JsonObject = {
    threadId: turn.threadId,
    mode: turn.mode,
    userId: turn.userId,
    seq: turn.seq,
    user: turn.user,
    assistant: turn.assistant,
    route: turn.route,
    tier: turn.tier,
    tokensUsed: turn.tokensUsed,
    durationMs: turn.durationMs,
    createdAt: turn.createdAt,
  };
  if (turn.intent !== undefined) data["intent"] = turn.intent;
  return data;
}

/**
 * Request/reply pairs per thread. Personal and team threads live in
 * separate collections and never see each other's turns.
 */
export class ConversationStore {
  constructor(
    private readonly store: DurableStore,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  async append(turn: NewTurn): Promise<ConversationTurn> {
    const seq = await this.store.increment(SEQUENCES, `${turn.mode}:${turn.threadId}`, "turns");
    const stored: ConversationTurn = { ...turn, seq, createdAt: this.now() };
    await this.store.upsert(COLLECTIONS[turn.mode], turnKey(turn.threadId, seq), toJson(stored));
    return stored;
  }

  /** Oldest first. */
  async history(threadId: string, opts?: HistoryOptions): Promise<ConversationTurn[]> {
    const rows = await this.store.scan(COLLECTIONS[opts?.mode ?? "personal"], { prefix: `${threadId}#` });
    const turns: ConversationTurn[] = [];
    for (const row of rows) {
      const parsed = turnSchema.safeParse(row.data);
      if (parsed.success) {
        turns.push(parsed.data);
      } else {
        this.logger.warn({ key: row.key }, "Skipping malformed conversation turn");
      }
    }
    turns.sort((a, b) => a.seq - b.seq);
    if (opts?.limit === undefined) return turns;
    return opts.limit > 0 ? turns.slice(-opts.limit) : [];
  }
}
