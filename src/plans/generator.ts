import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { Intent } from "../classifier/types.js";
import { intentKey } from "../classifier/types.js";
import { ErrorCodes, permanent } from "../errors/app-error.js";
import type { Logger } from "../logging/logger.js";
import type { ModelGateway } from "../model/gateway.js";
import type { ProviderRegistry } from "../providers/registry.js";
import { parseModelJson } from "../utils/json-text.js";
import { planStepSchema, planVariableSchema, toStep, type Plan } from "./types.js";

export interface PlanGeneratorOptions {
  readonly maxSteps?: number;
  readonly maxTokens?: number;
}

const generatedPlanSchema = z.object({
  description: z.string().default(""),
  steps: z.array(planStepSchema),
  variables: z.array(planVariableSchema).default([]),
});

const PLAN_SCHEMA = `{
  "description": "what the plan does",
  "steps": [
    {"id": 1, "provider": "name", "action": "name", "input": {"key": "value"}, "depends": [], "timeoutSec": 60}
  ],
  "variables": [
    {"name": "path", "description": "what it holds", "required": true, "default": "optional"}
  ]
}`;

/** Asks the model gateway for a new plan. The caller validates it. */
export class PlanGenerator {
  private readonly maxSteps: number;
  private readonly maxTokens: number;

  constructor(
    private readonly gateway: ModelGateway,
    private readonly registry: ProviderRegistry,
    private readonly logger: Logger,
    opts?: PlanGeneratorOptions,
  ) {
    this.maxSteps = opts?.maxSteps ?? 8;
    this.maxTokens = opts?.maxTokens ?? 800;
  }

  buildPrompt(intent: Intent, text: string): string {
    const vars = Object.entries(intent.variables).map(([k, v]) => `  ${k} = ${v}`);
    return [
      `Create an execution plan for intent "${intentKey(intent)}".`,
      `User request: ${text}`,
      vars.length > 0 ? `Extracted variables:\n${vars.join("\n")}` : "No variables were extracted.",
      `Available actions (provider.action):\n${this.registry.actionNames().map((a) => `  - ${a}`).join("\n")}`,
      `Use at most ${this.maxSteps} steps. Step ids are positive integers; "depends" lists earlier step ids.`,
      `Reference a variable as {{name}} and the output of an earlier step as {{step.N}}.`,
      `Return ONLY JSON matching:\n${PLAN_SCHEMA}`,
    ].join("\n\n");
  }

  async generate(intent: Intent, text: string, signal?: AbortSignal): Promise<{ plan: Plan; tokensUsed: number }> {
    const response = await this.gateway.generate({
      system: "You plan tool executions. Use only the listed actions.",
      prompt: this.buildPrompt(intent, text),
      jsonMode: true,
      maxTokens: this.maxTokens,
      temperature: 0,
      tier: intent.tier,
      signal,
    });

    const parsed = generatedPlanSchema.safeParse(parseModelJson(response.text));
    if (!parsed.success) {
      throw permanent(ErrorCodes.MODEL_PARSE_ERROR, "The model returned a plan that could not be parsed", {
        context: { issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      });
    }

    let steps = parsed.data.steps.map(toStep);
    if (steps.length > this.maxSteps) {
      this.logger.warn({ steps: steps.length, maxSteps: this.maxSteps }, "Generated plan trimmed to step ceiling");
      steps = steps.slice(0, this.maxSteps);
    }

    return {
      plan: {
        id: randomUUID(),
        intentKey: intentKey(intent),
        description: parsed.data.description || text,
        steps,
        variables: parsed.data.variables.map((v) => ({
          name: v.name,
          required: v.required,
          ...(v.description !== undefined ? { description: v.description } : {}),
          ...(v.default !== undefined ? { default: v.default } : {}),
        })),
        createdAt: Date.now(),
      },
      tokensUsed: response.tokensUsed,
    };
  }
}
