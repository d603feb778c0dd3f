/** Personal threads belong to one user; team threads are shared by a workspace. */
export type ThreadMode = "personal" | "team";

export interface ConversationTurn {
  readonly threadId: string;
  readonly mode: ThreadMode;
  readonly userId: string;
  /** 1-based position within the thread. */
  readonly seq: number;
  readonly user: string;
  readonly assistant: string;
  readonly route: string;
  readonly intent?: string;
  readonly tier: number;
  readonly tokensUsed: number;
  readonly durationMs: number;
  readonly createdAt: number;
}

export type NewTurn = Omit<ConversationTurn, "seq" | "createdAt">;

export interface HistoryOptions {
  readonly mode?: ThreadMode;
  /** Most recent turns to return. */
  readonly limit?: number;
}
