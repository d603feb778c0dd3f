export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ConductorConfig {
  readonly logging: LoggingConfig;
  readonly storage: StorageConfig;
  readonly model: ModelConfig;
  readonly gateway: GatewayConfig;
  readonly classifier: ClassifierConfig;
  readonly plans: PlansConfig;
  readonly executor: ExecutorConfig;
  readonly memory: MemoryConfig;
  readonly conversations: ConversationsConfig;
  readonly localReplies: LocalRepliesConfig;
  readonly providers: ProvidersConfig;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}

export interface StorageConfig {
  /** SQLite file path. Defaults to `<state dir>/conductor.db`. */
  readonly path?: string;
}

export interface ModelConfig {
  readonly provider: "openai" | "none";
  readonly baseUrl?: string;
  readonly apiKey?: string;
  readonly model: string;
  readonly timeoutMs: number;
  readonly maxTokens: number;
  readonly temperature?: number;
  /** Capability tier of the configured model, 1 (small) to 3 (frontier). */
  readonly tier: number;
  /** Optional OpenAI-compatible local server tried ahead of the cloud model for simple requests. */
  readonly local?: LocalModelConfig;
}

export interface LocalModelConfig {
  readonly baseUrl: string;
  readonly model: string;
  readonly apiKey?: string;
  readonly tier: number;
  readonly timeoutMs: number;
}

export type RoutingMode = "smart" | "local" | "cloud";

export interface GatewayConfig {
  readonly routing: RoutingMode;
  readonly breaker: {
    readonly failureThreshold: number;
    readonly cooldownMs: number;
    readonly halfOpenMaxTrials: number;
  };
  readonly retry: {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
  };
}

export interface ClassifierConfig {
  readonly minConfidence: number;
  readonly gatewayFallback: boolean;
  readonly timeoutMs: number;
}

export interface PlansConfig {
  readonly maxSteps: number;
  readonly retirementThreshold: number;
  readonly minUsesBeforeRetirement: number;
  readonly bestPatternMinSuccessRate: number;
  readonly generationMaxTokens: number;
  readonly builtinTemplates: boolean;
}

export interface ExecutorConfig {
  readonly concurrency: number;
  readonly defaultStepTimeoutMs: number;
  readonly stepTimeoutCeilingMs: number;
}

export interface MemoryConfig {
  readonly enabled: boolean;
  readonly extractionThreshold: number;
  readonly minRelevance: number;
  readonly contextMinRelevance: number;
  readonly maxResults: number;
  readonly retrievalTimeoutMs: number;
  readonly ingestionTimeoutMs: number;
  readonly ingestionConcurrency: number;
}

export interface ConversationsConfig {
  readonly enabled: boolean;
  /** Earlier turns of the thread included in the system prompt; 0 keeps them out. */
  readonly historyTurns: number;
}

export interface LocalRepliesConfig {
  readonly enabled: boolean;
  /** Greetings and acknowledgements. */
  readonly builtins: boolean;
  readonly templates: readonly LocalReplyTemplateConfig[];
}

export type LocalReplyTrigger =
  | { readonly type: "exact"; readonly pattern: string }
  | { readonly type: "prefix"; readonly pattern: string }
  | { readonly type: "regex"; readonly pattern: string }
  | { readonly type: "keyword"; readonly words: readonly string[] }
  | { readonly type: "command"; readonly name: string };

export interface LocalReplyTemplateConfig {
  readonly id: string;
  readonly trigger: LocalReplyTrigger;
  readonly response: string;
  readonly priority?: number;
}

export interface ProvidersConfig {
  readonly file: {
    readonly enabled: boolean;
    readonly root: string;
    readonly maxReadBytes: number;
  };
}
