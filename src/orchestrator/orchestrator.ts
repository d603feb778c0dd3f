import type { IntentClassifier } from "../classifier/classifier.js";
import type { ConversationStore } from "../conversations/store.js";
import type { ThreadMode } from "../conversations/types.js";
import { intentKey, type Intent } from "../classifier/types.js";
import { categoryOf, formatUserMessage } from "../errors/app-error.js";
import type { ExecutionRecord } from "../executor/types.js";
import type { ExecutableStep, StepExecutor } from "../executor/step-executor.js";
import type { Logger } from "../logging/logger.js";
import type { MemoryExtractor } from "../memory/extractor.js";
import type { MemoryStore } from "../memory/store.js";
import { DEFAULT_NAMESPACE } from "../memory/types.js";
import type { ModelGateway } from "../model/gateway.js";
import { parseToolName, type StreamSink } from "../model/types.js";
import type { PlanCache } from "../plans/cache.js";
import type { PlanSelection, PlanSource } from "../plans/types.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { BackgroundQueue } from "../tasks/background-queue.js";
import type { UsageTracker } from "../usage/tracker.js";
import type { LocalReplyEngine } from "./local-replies.js";
import {
  buildSynthesisPrompt,
  buildSystemPrompt,
  CANNED_UNAVAILABLE,
  formatConversationHistory,
  formatExecutionSummary,
  formatMemoryContext,
  formatStepOutput,
} from "./prompts.js";
import { choosePlanMode, directCall, type PlanMode, type Route } from "./router.js";

export interface ThreadContext {
  readonly threadId: string;
  /** Namespaces memory. Defaults to `"local"`. */
  readonly userId?: string;
  /** Where the thread's turns are kept. Defaults to `"personal"`. */
  readonly mode?: ThreadMode;
}

export interface ProcessResult {
  readonly message: string;
  readonly route: Route;
  readonly intent?: Intent;
  readonly mode?: PlanMode;
  readonly planSource?: PlanSource;
  readonly executionTrace?: ExecutionRecord;
  readonly durationMs: number;
  readonly tier: number;
  readonly tokensUsed: number;
  /** True when the reply was assembled without the model. */
  readonly degraded: boolean;
}

export interface OrchestratorDeps {
  readonly classifier: IntentClassifier;
  readonly registry: ProviderRegistry;
  readonly executor: StepExecutor;
  readonly plans: PlanCache;
  readonly gateway: ModelGateway | null;
  readonly localReplies: LocalReplyEngine | null;
  readonly memory: { readonly store: MemoryStore; readonly extractor: MemoryExtractor } | null;
  readonly background: BackgroundQueue;
  readonly usage?: UsageTracker;
  readonly conversations?: ConversationStore | null;
  readonly logger: Logger;
}

export interface OrchestratorOptions {
  readonly memoryRetrievalTimeoutMs?: number;
  readonly contextMinRelevance?: number;
  readonly contextMaxResults?: number;
  readonly synthesisMaxTokens?: number;
  /** Earlier turns of the thread shown to the model. */
  readonly historyTurns?: number;
}

type Outcome = Omit<ProcessResult, "durationMs">;

interface PromptContext {
  readonly memory: string;
  readonly history: string;
}

/** Sink that remembers whether anything reached the caller. */
class Emitter {
  emitted = false;

  constructor(private readonly onChunk: StreamSink | undefined) {}

  sink(): StreamSink | undefined {
    const onChunk = this.onChunk;
    if (!onChunk) return undefined;
    return (chunk) => {
      if (chunk.length > 0) this.emitted = true;
      onChunk(chunk);
    };
  }

  /** Emits a whole reply when nothing has been streamed yet. */
  flush(message: string): void {
    if (this.onChunk && !this.emitted && message.length > 0) {
      this.emitted = true;
      this.onChunk(message);
    }
  }
}

/**
 * Turns a message into a reply: a local reply, a single direct capability
 * call, or a plan (cached or generated) followed by model synthesis.
 * Each turn is appended to the thread's conversation; memory ingestion runs
 * afterwards on the background queue.
 */
export class Orchestrator {
  private readonly retrievalTimeoutMs: number;
  private readonly contextMinRelevance: number;
  private readonly contextMaxResults: number;
  private readonly synthesisMaxTokens: number | undefined;
  private readonly historyTurns: number;

  constructor(
    private readonly deps: OrchestratorDeps,
    opts?: OrchestratorOptions,
  ) {
    this.retrievalTimeoutMs = opts?.memoryRetrievalTimeoutMs ?? 500;
    this.contextMinRelevance = opts?.contextMinRelevance ?? 0.3;
    this.contextMaxResults = opts?.contextMaxResults ?? 5;
    this.synthesisMaxTokens = opts?.synthesisMaxTokens;
    this.historyTurns = opts?.historyTurns ?? 6;
  }

  async process(text: string, thread: ThreadContext, signal?: AbortSignal): Promise<ProcessResult> {
    return this.run(text, thread, new Emitter(undefined), signal);
  }

  async processStream(
    text: string,
    thread: ThreadContext,
    onChunk: StreamSink,
    signal?: AbortSignal,
  ): Promise<ProcessResult> {
    return this.run(text, thread, new Emitter(onChunk), signal);
  }

  // ── State machine ──

  private async run(text: string, thread: ThreadContext, emitter: Emitter, signal?: AbortSignal): Promise<ProcessResult> {
    const started = Date.now();
    const userId = thread.userId ?? DEFAULT_NAMESPACE;
    const logger = this.deps.logger.child({ threadId: thread.threadId });

    const outcome =
      this.localReply(text, userId) ??
      (await this.directReply(text, signal)) ??
      (await this.planReply(text, thread, emitter, logger, signal));

    emitter.flush(outcome.message);
    const result: ProcessResult = { ...outcome, durationMs: Date.now() - started };
    logger.info(
      {
        route: result.route,
        intent: result.intent ? intentKey(result.intent) : undefined,
        tier: result.tier,
        tokens: result.tokensUsed,
        degraded: result.degraded,
        durationMs: result.durationMs,
      },
      "Request processed",
    );

    await this.recordTurn(text, thread, result, logger);
    await this.recordUsage(thread, result, logger);
    this.enqueueIngestion(text, userId);
    return result;
  }

  private localReply(text: string, userId: string): Outcome | null {
    const match = this.deps.localReplies?.match(text, { userId });
    if (!match) return null;
    return { message: match.response, route: "local", tier: 0, tokensUsed: 0, degraded: false };
  }

  private async directReply(text: string, signal?: AbortSignal): Promise<Outcome | null> {
    const match = this.deps.classifier.matchPattern(text);
    const call = directCall(match, this.deps.registry);
    if (!match || !call) return null;

    const { pattern } = match;
    const intent: Intent = {
      category: pattern.category,
      subcategory: pattern.subcategory,
      confidence: pattern.confidence,
      tier: pattern.tier,
      variables: match.variables,
      source: "pattern",
      pattern: pattern.name,
      ...(pattern.direct ? { direct: pattern.direct } : {}),
    };
    const record = await this.deps.executor.executeBatch([call], signal, {
      intentKey: intentKey(intent),
      variables: match.variables,
    });
    const result = record.results[0];
    return {
      message: result ? formatStepOutput(result) : "Nothing was run.",
      route: "direct",
      intent,
      executionTrace: record,
      tier: intent.tier,
      tokensUsed: 0,
      degraded: false,
    };
  }

  private async planReply(
    text: string,
    thread: ThreadContext,
    emitter: Emitter,
    logger: Logger,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    const intent = await this.deps.classifier.classify(text, signal);
    const mode = choosePlanMode(intent, text);
    const context = this.promptContext(text, thread, logger, signal);
    const base = { route: "plan" as const, intent, mode, tier: intent.tier };

    let tokensUsed = 0;
    let record: ExecutionRecord | undefined;
    let planSource: PlanSource | undefined;

    try {
      if (mode === "planned") {
        const selection = await this.deps.plans.getOrCreate(intent, text, signal);
        planSource = selection.source;
        tokensUsed += selection.tokensUsed;
        record = await this.deps.executor.executePlan(selection.steps, signal, {
          planId: selection.plan.id,
          intentKey: intentKey(intent),
          variables: selection.variables,
        });
        await this.recordOutcome(selection, record, logger, signal);
      } else {
        const conversation = await this.converse(text, intent, await context, signal);
        tokensUsed += conversation.tokensUsed;
        record = conversation.record;
        if (conversation.answer !== undefined) {
          return { ...base, message: conversation.answer, tokensUsed, degraded: false };
        }
      }
    } catch (err) {
      return { ...base, ...this.failureReply(err, logger), tokensUsed, ...(planSource ? { planSource } : {}) };
    }

    const synthesized = await this.synthesize(text, intent, record, await context, emitter, logger, signal);
    return {
      ...base,
      message: synthesized.message,
      ...(planSource ? { planSource } : {}),
      ...(record ? { executionTrace: record } : {}),
      tokensUsed: tokensUsed + synthesized.tokensUsed,
      degraded: synthesized.degraded,
    };
  }

  /**
   * One model call offering every registered action as a tool. Returned
   * tool calls run as a concurrent batch; a plain answer ends the turn.
   */
  private async converse(
    text: string,
    intent: Intent,
    context: PromptContext,
    signal?: AbortSignal,
  ): Promise<{ answer?: string; record?: ExecutionRecord; tokensUsed: number }> {
    const gateway = this.deps.gateway;
    if (!gateway?.isAvailable()) return { tokensUsed: 0 };

    const tools = this.deps.registry.toolSpecs();
    const response = await gateway.generate({
      system: buildSystemPrompt({ tooling: this.deps.registry.actionNames().join(", "), ...context }),
      prompt: text,
      ...(tools.length > 0 ? { tools } : {}),
      tier: intent.tier,
      signal,
    });
    if (response.toolCalls.length === 0) return { answer: response.text, tokensUsed: response.tokensUsed };

    const calls: ExecutableStep[] = response.toolCalls.map((tc, i) => {
      const parsed = parseToolName(tc.name);
      return {
        id: i + 1,
        provider: parsed?.provider ?? tc.name,
        action: parsed?.action ?? "",
        input: tc.input,
        ...(tc.error !== undefined ? { invalidInput: tc.error } : {}),
      };
    });
    const record = await this.deps.executor.executeBatch(calls, signal, {
      intentKey: intentKey(intent),
      variables: intent.variables,
    });
    return { record, tokensUsed: response.tokensUsed };
  }

  /** Final model call with no tools. Falls back to a plain summary when the model cannot answer. */
  private async synthesize(
    text: string,
    intent: Intent,
    record: ExecutionRecord | undefined,
    context: PromptContext,
    emitter: Emitter,
    logger: Logger,
    signal?: AbortSignal,
  ): Promise<{ message: string; tokensUsed: number; degraded: boolean }> {
    const fallback = record && record.stepCount > 0 ? formatExecutionSummary(record) : CANNED_UNAVAILABLE;
    const gateway = this.deps.gateway;
    if (!gateway?.isAvailable()) return { message: fallback, tokensUsed: 0, degraded: true };

    const request = {
      system: buildSystemPrompt(context),
      prompt: buildSynthesisPrompt(text, record),
      ...(this.synthesisMaxTokens !== undefined ? { maxTokens: this.synthesisMaxTokens } : {}),
      tier: intent.tier,
      signal,
    };
    const sink = emitter.sink();
    try {
      const response = sink ? await gateway.stream(request, sink) : await gateway.generate(request);
      return { message: response.text, tokensUsed: response.tokensUsed, degraded: false };
    } catch (err) {
      logger.warn({ err }, "Response synthesis failed");
      const category = categoryOf(err);
      const visible = category === "user" || category === "permanent" ? `\n\n${formatUserMessage(err)}` : "";
      return { message: `${fallback}${visible}`, tokensUsed: 0, degraded: true };
    }
  }

  private failureReply(err: unknown, logger: Logger): { message: string; degraded: boolean } {
    const category = categoryOf(err);
    logger.warn({ err, category }, "Plan path failed");
    switch (category) {
      case "guardrail":
      case "permanent":
      case "user":
        return { message: `I couldn't do that: ${formatUserMessage(err)}`, degraded: false };
      case "rate_limited":
        return { message: formatUserMessage(err), degraded: true };
      default:
        return { message: CANNED_UNAVAILABLE, degraded: true };
    }
  }

  // ── Side channels ──

  /** Memory and recent turns for the system prompt. Never rejects. */
  private async promptContext(
    text: string,
    thread: ThreadContext,
    logger: Logger,
    signal?: AbortSignal,
  ): Promise<PromptContext> {
    const [memory, history] = await Promise.all([
      this.memoryContext(text, thread.userId ?? DEFAULT_NAMESPACE, logger, signal),
      this.historyContext(thread, logger),
    ]);
    return { memory, history };
  }

  /** Never rejects; an empty string means no earlier turns. */
  private async historyContext(thread: ThreadContext, logger: Logger): Promise<string> {
    const conversations = this.deps.conversations;
    if (!conversations || this.historyTurns === 0) return "";
    try {
      const turns = await conversations.history(thread.threadId, {
        mode: thread.mode ?? "personal",
        limit: this.historyTurns,
      });
      return formatConversationHistory(turns);
    } catch (err) {
      logger.warn({ err }, "Conversation history unavailable");
      return "";
    }
  }

  /** Never rejects; an empty string means no memory context. */
  private async memoryContext(text: string, userId: string, logger: Logger, signal?: AbortSignal): Promise<string> {
    const memory = this.deps.memory;
    if (!memory) return "";
    try {
      const found = await memory.store.retrieveWithin(
        text,
        this.retrievalTimeoutMs,
        { namespace: userId, minRelevance: this.contextMinRelevance, limit: this.contextMaxResults },
        signal,
      );
      if (found === null) {
        logger.debug({ timeoutMs: this.retrievalTimeoutMs }, "Memory retrieval timed out");
        return "";
      }
      return formatMemoryContext(found);
    } catch (err) {
      logger.warn({ err }, "Memory retrieval failed");
      return "";
    }
  }

  private async recordOutcome(
    selection: PlanSelection,
    record: ExecutionRecord,
    logger: Logger,
    signal?: AbortSignal,
  ): Promise<void> {
    try {
      await this.deps.plans.recordOutcome(selection, record, signal);
    } catch (err) {
      logger.warn({ err, planId: selection.plan.id }, "Could not record plan outcome");
    }
  }

  private async recordTurn(text: string, thread: ThreadContext, result: ProcessResult, logger: Logger): Promise<void> {
    const conversations = this.deps.conversations;
    if (!conversations) return;
    try {
      await conversations.append({
        threadId: thread.threadId,
        mode: thread.mode ?? "personal",
        userId: thread.userId ?? DEFAULT_NAMESPACE,
        user: text,
        assistant: result.message,
        route: result.route,
        ...(result.intent ? { intent: intentKey(result.intent) } : {}),
        tier: result.tier,
        tokensUsed: result.tokensUsed,
        durationMs: result.durationMs,
      });
    } catch (err) {
      logger.warn({ err }, "Could not store conversation turn");
    }
  }

  private async recordUsage(thread: ThreadContext, result: ProcessResult, logger: Logger): Promise<void> {
    if (!this.deps.usage) return;
    try {
      await this.deps.usage.record({
        threadId: thread.threadId,
        route: result.route,
        tokensUsed: result.tokensUsed,
        costUsd: result.executionTrace?.costUsd ?? 0,
        durationMs: result.durationMs,
      });
    } catch (err) {
      logger.warn({ err }, "Could not record usage");
    }
  }

  private enqueueIngestion(text: string, userId: string): void {
    const memory = this.deps.memory;
    if (!memory) return;
    this.deps.background.enqueue("memory-ingestion", async (signal) => {
      const facts = await memory.extractor.extract(text, signal);
      if (facts.length > 0) await memory.store.ingest(facts, userId);
    });
  }
}
