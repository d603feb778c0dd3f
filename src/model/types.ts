import type { ValueMap } from "../utils/value.js";

/** A function the model may call. Names are `<provider>__<action>`. */
export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, unknown>>;
}

export interface ModelToolCall {
  readonly id: string;
  readonly name: string;
  readonly input: ValueMap;
  /** Set when the arguments could not be decoded; the call must not run. */
  readonly error?: string;
}

export interface ModelRequest {
  readonly system?: string;
  readonly prompt: string;
  readonly tools?: readonly ToolSpec[];
  readonly jsonMode?: boolean;
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly stream?: boolean;
  readonly signal?: AbortSignal;
  /** Capability tier the request needs (1 to 3); estimated from the prompt when absent. */
  readonly tier?: number;
}

export interface ModelResponse {
  readonly text: string;
  readonly toolCalls: readonly ModelToolCall[];
  readonly tokensUsed: number;
  readonly model: string;
  readonly provider: string;
}

export type StreamSink = (chunk: string) => void;

/**
 * Vendor adapter. Implementations throw `AppError` with a category so the
 * gateway can decide whether to retry.
 */
export interface ModelProvider {
  readonly id: string;
  /** 1 for a small local model up to 3 for a frontier model. Defaults to 3. */
  readonly tier?: number;
  generate(request: ModelRequest, onChunk?: StreamSink): Promise<ModelResponse>;
}

export const TOOL_NAME_SEPARATOR = "__";

export function toolName(provider: string, action: string): string {
  return `${provider}${TOOL_NAME_SEPARATOR}${action}`;
}

export function parseToolName(name: string): { provider: string; action: string } | null {
  const idx = name.indexOf(TOOL_NAME_SEPARATOR);
  if (idx <= 0) return null;
  const action = name.slice(idx + TOOL_NAME_SEPARATOR.length);
  if (!action) return null;
  return { provider: name.slice(0, idx), action };
}
