import type { ConversationTurn } from "../conversations/types.js";
import type { ExecutionRecord, StepResult } from "../executor/types.js";
import type { ScoredMemory } from "../memory/types.js";
import { render, type Value } from "../utils/value.js";

const MAX_INLINE_CHARS = 400;
const MAX_RESULT_CHARS = 4_000;
const MAX_HISTORY_CHARS = 600;

export interface SystemPromptSections {
  readonly tooling?: string;
  readonly memory?: string;
  readonly history?: string;
}

export function buildSystemPrompt(sections: SystemPromptSections): string {
  const parts = [
    "Identity:\nYou are a local-first assistant. Be concise and action-oriented.",
    `Tooling:\n${sections.tooling || "None."}`,
    "Safety:\nConfirm destructive actions before taking them.",
  ];
  if (sections.memory) parts.push(`Memory:\n${sections.memory}`);
  if (sections.history) parts.push(`Conversation so far:\n${sections.history}`);
  parts.push(`Current date and time:\n${new Date().toISOString()}`);
  return parts.join("\n\n");
}

export function formatMemoryContext(memories: readonly ScoredMemory[]): string {
  return memories
    .map(({ fact, score }) =>
      fact.kind === "profile"
        ? `- ${fact.field}: ${fact.value} (relevance ${score.toFixed(2)})`
        : `- When "${fact.trigger}": ${fact.action} (relevance ${score.toFixed(2)})`,
    )
    .join("\n");
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export function formatConversationHistory(turns: readonly ConversationTurn[]): string {
  return turns
    .map((t) => `User: ${truncate(t.user, MAX_HISTORY_CHARS)}\nAssistant: ${truncate(t.assistant, MAX_HISTORY_CHARS)}`)
    .join("\n");
}

function inline(value: Value): string {
  switch (value.kind) {
    case "map":
      return Object.entries(value.entries)
        .map(([k, v]) => `${k}: ${render(v)}`)
        .join(", ");
    default:
      return render(value);
  }
}

/** Plain-text rendering of a provider output. */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case "null":
      return "(no output)";
    case "list":
      return value.items.length === 0 ? "(empty)" : value.items.map((item) => `- ${inline(item)}`).join("\n");
    case "map":
      return Object.entries(value.entries)
        .map(([k, v]) => `${k}: ${inline(v)}`)
        .join("\n");
    default:
      return render(value);
  }
}

export function formatStepOutput(result: StepResult): string {
  if (!result.success) {
    return `Could not run ${result.provider}.${result.action}: ${result.error ?? "unknown error"}`;
  }
  return result.data ? formatValue(result.data) : "Done.";
}

function stepLine(result: StepResult): string {
  const name = `${result.provider}.${result.action}`;
  if (result.blocked) return `- [blocked] ${name}: ${result.error ?? "dependency failed"}`;
  if (!result.success) return `- [failed] ${name}: ${result.error ?? "unknown error"}`;
  const output = result.data ? truncate(inline(result.data), MAX_INLINE_CHARS) : "done";
  return `- [ok] ${name}: ${output}`;
}

/** Used in place of model synthesis when the model is unavailable. */
export function formatExecutionSummary(record: ExecutionRecord): string {
  const head = `Completed ${record.completedCount} of ${record.stepCount} steps.`;
  return [head, ...record.results.map(stepLine)].join("\n");
}

export function buildSynthesisPrompt(text: string, record: ExecutionRecord | undefined): string {
  const parts = [`User request:\n${text}`];
  if (record && record.results.length > 0) {
    const results = record.results.map((r) => {
      const name = `${r.provider}.${r.action}`;
      if (!r.success) return `Step ${r.stepId} (${name}) ${r.blocked ? "was blocked" : "failed"}: ${r.error ?? ""}`;
      return `Step ${r.stepId} (${name}) output:\n${r.data ? truncate(formatValue(r.data), MAX_RESULT_CHARS) : "(none)"}`;
    });
    parts.push(`Execution results (${record.status}):\n${results.join("\n\n")}`);
  }
  parts.push("Answer the user directly using the results above. Mention any step that failed.");
  return parts.join("\n\n");
}

export const CANNED_UNAVAILABLE =
  "The model is unavailable right now, so I could not work on that request. Please try again shortly.";
