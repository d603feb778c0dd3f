import type { Value, ValueMap } from "../utils/value.js";

/** One invocation of a provider action. Step ids are positive integers. */
export interface StepCall {
  readonly id: number;
  readonly provider: string;
  readonly action: string;
  readonly input: ValueMap;
}

export interface ProviderResult {
  readonly success: boolean;
  readonly data?: Value;
  readonly error?: string;
  readonly tokensUsed?: number;
  readonly costUsd?: number;
}

export interface ParamSpec {
  readonly type: "string" | "number" | "boolean";
  readonly description: string;
  readonly required?: boolean;
}

export interface ActionDescription {
  readonly description: string;
  readonly params: Readonly<Record<string, ParamSpec>>;
}

/**
 * A capability the core can drive. Side effects stay inside `execute`; it may
 * resolve with a failed result or reject with an `AppError`.
 */
export interface CapabilityProvider {
  name(): string;
  capabilities(): ReadonlySet<string>;
  validateAction(action: string): boolean;
  execute(call: StepCall, signal: AbortSignal): Promise<ProviderResult>;
  describeAction?(action: string): ActionDescription | undefined;
}
