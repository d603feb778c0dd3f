import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { ModelGateway } from "../model/gateway.js";
import { parseModelJson } from "../utils/json-text.js";
import { extractByRules } from "./rules.js";
import type { MemoryFact } from "./types.js";

export interface MemoryExtractorOptions {
  readonly threshold?: number;
}

const EXTRACT_SYSTEM = `You are a memory extraction system. Extract ONLY durable, useful user information.

Return JSON with these fields:
{
  "profile": [{"field": "name|timezone|language|location|role|company|preference|dislike", "value": "...", "confidence": 0.0-1.0, "overwrite": false}],
  "actions": [{"trigger": "exact phrase the user uses", "action": "what should happen", "confidence": 0.0-1.0, "overwrite": false}]
}

Set "overwrite" to true when the user corrects an earlier statement ("actually", "no, I mean", "wait").
Ignore transient questions and one-off requests.`;

const extractionSchema = z.object({
  profile: z
    .array(
      z.object({
        field: z.string(),
        value: z.string(),
        confidence: z.number(),
        overwrite: z.boolean().default(false),
      }),
    )
    .default([]),
  actions: z
    .array(
      z.object({
        trigger: z.string(),
        action: z.string(),
        confidence: z.number(),
        overwrite: z.boolean().default(false),
      }),
    )
    .default([]),
});

/** Model extraction first; regex rules when the model is down, fails, or finds nothing. */
export class MemoryExtractor {
  private readonly threshold: number;

  constructor(
    private readonly gateway: ModelGateway | null,
    private readonly logger: Logger,
    opts?: MemoryExtractorOptions,
  ) {
    this.threshold = opts?.threshold ?? 0.7;
  }

  async extract(text: string, signal?: AbortSignal): Promise<MemoryFact[]> {
    if (!text.trim()) return [];

    const gateway = this.gateway;
    if (gateway?.isAvailable()) {
      try {
        const facts = await this.extractWithGateway(gateway, text, signal);
        if (facts.length > 0) return facts;
      } catch (err) {
        this.logger.warn({ err }, "Model memory extraction failed, using rules");
      }
    }

    return extractByRules(text).filter((f) => f.confidence >= this.threshold);
  }

  private async extractWithGateway(gateway: ModelGateway, text: string, signal?: AbortSignal): Promise<MemoryFact[]> {
    const response = await gateway.generate({
      system: EXTRACT_SYSTEM,
      prompt: `Message to analyze:\n${text}`,
      jsonMode: true,
      maxTokens: 400,
      temperature: 0,
      signal,
    });

    const parsed = extractionSchema.safeParse(parseModelJson(response.text));
    if (!parsed.success) {
      this.logger.debug({ text: response.text }, "Unparseable memory extraction response");
      return [];
    }

    const facts: MemoryFact[] = [];
    for (const p of parsed.data.profile) {
      const field = p.field.trim();
      const value = p.value.trim();
      if (!field || !value || p.confidence < this.threshold) continue;
      facts.push({ kind: "profile", field, value, confidence: p.confidence, overwrite: p.overwrite });
    }
    for (const a of parsed.data.actions) {
      const trigger = a.trigger.trim();
      const action = a.action.trim();
      if (!trigger || !action || a.confidence < this.threshold) continue;
      facts.push({ kind: "action", trigger, action, confidence: a.confidence, overwrite: a.overwrite });
    }
    return facts;
  }
}
