export type MemoryFact =
  | {
      readonly kind: "profile";
      readonly field: string;
      readonly value: string;
      readonly confidence: number;
      readonly overwrite: boolean;
    }
  | {
      readonly kind: "action";
      readonly trigger: string;
      readonly action: string;
      readonly confidence: number;
      readonly overwrite: boolean;
    };

/** A fact as persisted, without the write-time `overwrite` flag. */
export type StoredFact =
  | { readonly kind: "profile"; readonly field: string; readonly value: string; readonly confidence: number; readonly updatedAt: number }
  | { readonly kind: "action"; readonly trigger: string; readonly action: string; readonly confidence: number; readonly updatedAt: number };

export interface ScoredMemory {
  readonly fact: StoredFact;
  readonly score: number;
  readonly updatedAt: number;
}

export interface RetrieveOptions {
  readonly namespace?: string;
  readonly minRelevance?: number;
  readonly limit?: number;
}

export const DEFAULT_NAMESPACE = "local";

export function factText(fact: StoredFact | MemoryFact): string {
  return fact.kind === "profile" ? `${fact.field} ${fact.value}` : `${fact.trigger} ${fact.action}`;
}
