import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { ModelGateway } from "../model/gateway.js";
import { parseModelJson } from "../utils/json-text.js";
import { withinDeadline } from "../utils/timeout.js";
import { firstMatch } from "./patterns.js";
import type { Intent, IntentPattern, PatternMatch } from "./types.js";
import { extractVariables } from "./variables.js";

export interface ClassifierOptions {
  readonly minConfidence?: number;
  readonly gatewayFallback?: boolean;
  readonly timeoutMs?: number;
}

const CLASSIFY_SYSTEM = `Classify the user's intent. Return ONLY a JSON object with this exact format:
{"category": "code|file|research|task|calendar|system|chat", "subcategory": "specific_action", "confidence": 0.0-1.0, "tier": 0-3, "variables": {"name": "value"}}

Categories and examples:
- code: fix_tests, analyze, refactor, write, explain, run_tests, git_op
- file: read, write, search, delete, list, info
- research: web_search, fetch_url, compare, summarize
- task: create, list, complete, delete
- calendar: check, schedule, cancel
- system: status, cost, help
- chat: general, question, creative

Respond with ONLY the JSON object, no other text.`;

const scalar = z.union([z.string(), z.number(), z.boolean()]);

const gatewayIntentSchema = z.object({
  category: z.string().min(1).transform((c) => c.trim().toLowerCase()),
  subcategory: z.string().min(1).default("general").transform((s) => s.trim().toLowerCase()),
  confidence: z.number().default(0.5).transform((c) => Math.min(1, Math.max(0, c))),
  tier: z.number().default(2).transform((t) => Math.min(3, Math.max(0, Math.round(t)))),
  variables: z.record(scalar.nullable()).default({}),
});

export function fallbackIntent(text: string): Intent {
  return {
    category: "chat",
    subcategory: "general",
    confidence: 0.5,
    tier: 2,
    variables: extractVariables(text, "chat"),
    source: "fallback",
  };
}

/** Pattern rules first, the model gateway second, a generic chat intent last. */
export class IntentClassifier {
  private readonly minConfidence: number;
  private readonly gatewayFallback: boolean;
  private readonly timeoutMs: number;

  constructor(
    private readonly patterns: readonly IntentPattern[],
    private readonly gateway: ModelGateway | null,
    private readonly logger: Logger,
    opts?: ClassifierOptions,
  ) {
    this.minConfidence = opts?.minConfidence ?? 0.7;
    this.gatewayFallback = opts?.gatewayFallback ?? true;
    this.timeoutMs = opts?.timeoutMs ?? 10_000;
  }

  matchPattern(text: string): PatternMatch | null {
    const pattern = firstMatch(this.patterns, text);
    if (!pattern) return null;
    return { pattern, variables: extractVariables(text, pattern.category) };
  }

  /** Never rejects; any failure degrades to the fallback intent. */
  async classify(text: string, signal?: AbortSignal): Promise<Intent> {
    const match = this.matchPattern(text);
    if (match && match.pattern.confidence >= this.minConfidence) {
      const { pattern } = match;
      return {
        category: pattern.category,
        subcategory: pattern.subcategory,
        confidence: pattern.confidence,
        tier: pattern.tier,
        variables: match.variables,
        source: "pattern",
        pattern: pattern.name,
        direct: pattern.direct,
      };
    }

    const gateway = this.gateway;
    if (this.gatewayFallback && gateway?.isAvailable()) {
      try {
        const intent = await withinDeadline(
          (deadline) => this.classifyWithGateway(gateway, text, deadline),
          this.timeoutMs,
          signal,
        );
        if (intent) return intent;
        this.logger.warn({ timeoutMs: this.timeoutMs }, "Intent classification timed out");
      } catch (err) {
        this.logger.warn({ err }, "Gateway intent classification failed");
      }
    }

    return fallbackIntent(text);
  }

  private async classifyWithGateway(gateway: ModelGateway, text: string, signal: AbortSignal): Promise<Intent> {
    const response = await gateway.generate({
      system: CLASSIFY_SYSTEM,
      prompt: `User message: ${text}`,
      jsonMode: true,
      maxTokens: 200,
      temperature: 0,
      signal,
    });

    const parsed = gatewayIntentSchema.safeParse(parseModelJson(response.text));
    if (!parsed.success) {
      this.logger.debug({ text: response.text }, "Unparseable classification response");
      return fallbackIntent(text);
    }

    const { category, subcategory, confidence, tier, variables } = parsed.data;
    const fromGateway: Record<string, string> = {};
    for (const [key, value] of Object.entries(variables)) {
      if (value !== null && value !== "") fromGateway[key] = String(value);
    }

    return {
      category,
      subcategory,
      confidence,
      tier,
      // Gateway values win over regex extraction
      variables: { ...extractVariables(text, category), ...fromGateway },
      source: "gateway",
    };
  }
}
