export interface DirectBinding {
  readonly provider: string;
  readonly action: string;
  /** Variables that must be extracted before the call can run. */
  readonly requires: readonly string[];
  /** Provider input name → variable name. Defaults to passing each required variable under its own name. */
  readonly input?: Readonly<Record<string, string>>;
}

export interface IntentPattern {
  readonly name: string;
  readonly category: string;
  readonly subcategory: string;
  readonly keywords: readonly string[];
  readonly regex?: RegExp;
  readonly confidence: number;
  readonly tier: number;
  readonly direct?: DirectBinding;
}

export type IntentSource = "pattern" | "gateway" | "fallback";

export interface Intent {
  readonly category: string;
  readonly subcategory: string;
  readonly confidence: number;
  readonly tier: number;
  readonly variables: Readonly<Record<string, string>>;
  readonly source: IntentSource;
  readonly pattern?: string;
  readonly direct?: DirectBinding;
}

export interface PatternMatch {
  readonly pattern: IntentPattern;
  readonly variables: Readonly<Record<string, string>>;
}

export function intentKey(intent: Pick<Intent, "category" | "subcategory">): string {
  return intent.subcategory ? `${intent.category}.${intent.subcategory}` : intent.category;
}
