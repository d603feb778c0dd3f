import { z } from "zod";
import type { ConductorConfig } from "./types.js";

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const storageSchema = z.object({
  path: z.string().optional(),
});

const modelSchema = z.object({
  provider: z.enum(["openai", "none"]).default("none"),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().optional(),
  model: z.string().min(1).default("gpt-4o-mini"),
  timeoutMs: z.number().int().positive().default(60_000),
  maxTokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).optional(),
  tier: z.number().int().min(1).max(3).default(3),
  local: z.object({
    baseUrl: z.string().url(),
    model: z.string().min(1),
    apiKey: z.string().optional(),
    tier: z.number().int().min(1).max(3).default(1),
    timeoutMs: z.number().int().positive().default(30_000),
  }).optional(),
});

const gatewaySchema = z.object({
  routing: z.enum(["smart", "local", "cloud"]).default("smart"),
  breaker: z.object({
    failureThreshold: z.number().int().positive().default(5),
    cooldownMs: z.number().int().positive().default(60_000),
    halfOpenMaxTrials: z.number().int().positive().default(3),
  }).default({}),
  retry: z.object({
    maxAttempts: z.number().int().positive().default(3),
    baseDelayMs: z.number().int().nonnegative().default(200),
    maxDelayMs: z.number().int().positive().default(10_000),
  }).default({}),
});

const classifierSchema = z.object({
  minConfidence: z.number().min(0).max(1).default(0.7),
  gatewayFallback: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(10_000),
});

const plansSchema = z.object({
  maxSteps: z.number().int().positive().default(8),
  retirementThreshold: z.number().min(0).max(1).default(0.3),
  minUsesBeforeRetirement: z.number().int().positive().default(3),
  bestPatternMinSuccessRate: z.number().min(0).max(1).default(0.7),
  generationMaxTokens: z.number().int().positive().default(800),
  builtinTemplates: z.boolean().default(true),
});

const executorSchema = z.object({
  concurrency: z.number().int().positive().default(4),
  defaultStepTimeoutMs: z.number().int().positive().default(300_000),
  stepTimeoutCeilingMs: z.number().int().positive().default(120_000),
});

const memorySchema = z.object({
  enabled: z.boolean().default(true),
  extractionThreshold: z.number().min(0).max(1).default(0.7),
  minRelevance: z.number().min(0).max(1).default(0.1),
  contextMinRelevance: z.number().min(0).max(1).default(0.3),
  maxResults: z.number().int().positive().default(5),
  retrievalTimeoutMs: z.number().int().positive().default(500),
  ingestionTimeoutMs: z.number().int().positive().default(15_000),
  ingestionConcurrency: z.number().int().positive().default(2),
});

const conversationsSchema = z.object({
  enabled: z.boolean().default(true),
  historyTurns: z.number().int().nonnegative().default(6),
});

const triggerSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("exact"), pattern: z.string().min(1) }),
  z.object({ type: z.literal("prefix"), pattern: z.string().min(1) }),
  z.object({
    type: z.literal("regex"),
    pattern: z.string().min(1).refine((p) => {
      try {
        new RegExp(p);
        return true;
      } catch {
        return false;
      }
    }, "Invalid regular expression"),
  }),
  z.object({ type: z.literal("keyword"), words: z.array(z.string().min(1)).min(1) }),
  z.object({ type: z.literal("command"), name: z.string().min(1) }),
]);

const localRepliesSchema = z.object({
  enabled: z.boolean().default(true),
  builtins: z.boolean().default(true),
  templates: z.array(z.object({
    id: z.string().min(1),
    trigger: triggerSchema,
    response: z.string().min(1),
    priority: z.number().optional(),
  })).default([]),
});

const providersSchema = z.object({
  file: z.object({
    enabled: z.boolean().default(true),
    root: z.string().default("."),
    maxReadBytes: z.number().int().positive().default(262_144),
  }).default({}),
});

export const conductorConfigSchema = z.object({
  logging: loggingSchema.default({}),
  storage: storageSchema.default({}),
  model: modelSchema.default({}),
  gateway: gatewaySchema.default({}),
  classifier: classifierSchema.default({}),
  plans: plansSchema.default({}),
  executor: executorSchema.default({}),
  memory: memorySchema.default({}),
  conversations: conversationsSchema.default({}),
  localReplies: localRepliesSchema.default({}),
  providers: providersSchema.default({}),
});

export function parseConfig(raw: unknown): ConductorConfig {
  return conductorConfigSchema.parse(raw);
}
