import { IntentClassifier } from "../classifier/classifier.js";
import { loadPatterns } from "../classifier/patterns.js";
import { loadConfig } from "../config/loader.js";
import { resolveDatabasePath } from "../config/paths.js";
import type { ConductorConfig } from "../config/types.js";
import { ConversationStore } from "../conversations/store.js";
import { StepExecutor } from "../executor/step-executor.js";
import { componentLogger, createLogger, type Logger } from "../logging/logger.js";
import { MemoryExtractor } from "../memory/extractor.js";
import { loadStopwords } from "../memory/retrieval.js";
import { MemoryStore } from "../memory/store.js";
import { ModelGateway } from "../model/gateway.js";
import { createOpenAIProvider } from "../model/openai-provider.js";
import type { ModelProvider } from "../model/types.js";
import { LocalReplyEngine } from "../orchestrator/local-replies.js";
import { Orchestrator } from "../orchestrator/orchestrator.js";
import { PlanCache } from "../plans/cache.js";
import { ExecutionLog } from "../plans/execution-log.js";
import { PlanGenerator } from "../plans/generator.js";
import { PlanLibrary, loadTemplates } from "../plans/library.js";
import { FileProvider } from "../providers/file-provider.js";
import { ProviderRegistry } from "../providers/registry.js";
import type { CapabilityProvider } from "../providers/types.js";
import { ConductorDB } from "../store/db.js";
import { SqliteStore } from "../store/sqlite-store.js";
import type { DurableStore } from "../store/types.js";
import { BackgroundQueue } from "../tasks/background-queue.js";
import { UsageTracker } from "../usage/tracker.js";

export interface RuntimeOverrides {
  readonly logger?: Logger;
  readonly store?: DurableStore;
  /** Replaces the configured model provider. */
  readonly modelProviders?: readonly ModelProvider[];
  /** Registered in addition to the configured capability providers. */
  readonly providers?: readonly CapabilityProvider[];
}

export interface RuntimeContext {
  readonly config: ConductorConfig;
  readonly logger: Logger;
  readonly store: DurableStore;
  readonly registry: ProviderRegistry;
  readonly gateway: ModelGateway | null;
  readonly classifier: IntentClassifier;
  readonly plans: PlanCache;
  /** Built-in plans; null when `plans.builtinTemplates` is off. */
  readonly templates: PlanLibrary | null;
  readonly executions: ExecutionLog;
  readonly memory: MemoryStore;
  readonly usage: UsageTracker;
  readonly conversations: ConversationStore | null;
  readonly background: BackgroundQueue;
  readonly orchestrator: Orchestrator;
  shutdown(): Promise<void>;
}

function configuredModelProviders(config: ConductorConfig, logger: Logger): ModelProvider[] {
  const model = config.model;
  const providers: ModelProvider[] = [];

  if (model.local) {
    providers.push(
      createOpenAIProvider(
        {
          id: "local",
          tier: model.local.tier,
          // Local servers ignore the key, the client still requires one
          apiKey: model.local.apiKey ?? "local",
          baseUrl: model.local.baseUrl,
          model: model.local.model,
          timeoutMs: model.local.timeoutMs,
          maxTokens: model.maxTokens,
        },
        componentLogger(logger, "local-model"),
      ),
    );
  }

  if (model.provider === "none") return providers;
  if (!model.apiKey) {
    logger.warn("model.provider is openai but model.apiKey is not set; running without the cloud model");
    return providers;
  }
  providers.push(
    createOpenAIProvider(
      {
        id: "openai",
        tier: model.tier,
        apiKey: model.apiKey,
        model: model.model,
        timeoutMs: model.timeoutMs,
        maxTokens: model.maxTokens,
        ...(model.baseUrl !== undefined ? { baseUrl: model.baseUrl } : {}),
        ...(model.temperature !== undefined ? { temperature: model.temperature } : {}),
      },
      componentLogger(logger, "openai"),
    ),
  );
  return providers;
}

function openStore(config: ConductorConfig): DurableStore {
  return new SqliteStore(new ConductorDB(resolveDatabasePath(config.storage.path)));
}

/** Builds every component once. Registries are immutable after this point. */
export function createRuntime(config: ConductorConfig, overrides: RuntimeOverrides = {}): RuntimeContext {
  // 1. Logger and store
  const logger = overrides.logger ?? createLogger(config.logging);
  const store = overrides.store ?? openStore(config);

  // 2. Capability providers
  const providers: CapabilityProvider[] = [];
  if (config.providers.file.enabled) {
    providers.push(new FileProvider({ root: config.providers.file.root, maxReadBytes: config.providers.file.maxReadBytes }));
  }
  providers.push(...(overrides.providers ?? []));
  const registry = new ProviderRegistry(providers);

  // 3. Model gateway
  const modelProviders = overrides.modelProviders ?? configuredModelProviders(config, logger);
  const gateway =
    modelProviders.length > 0
      ? new ModelGateway(modelProviders, componentLogger(logger, "gateway"), {
          breaker: config.gateway.breaker,
          retry: config.gateway.retry,
          routing: config.gateway.routing,
        })
      : null;

  // 4. Classifier
  const classifier = new IntentClassifier(loadPatterns(), gateway, componentLogger(logger, "classifier"), config.classifier);

  // 5. Plans and execution
  const executions = new ExecutionLog(store, componentLogger(logger, "executions"));
  const generator = gateway
    ? new PlanGenerator(gateway, registry, componentLogger(logger, "planner"), {
        maxSteps: config.plans.maxSteps,
        maxTokens: config.plans.generationMaxTokens,
      })
    : null;
  const templates = config.plans.builtinTemplates ? new PlanLibrary(loadTemplates()) : null;
  const plans = new PlanCache(store, registry, generator, componentLogger(logger, "plans"), {
    ...config.plans,
    ...(templates ? { library: templates } : {}),
  });
  const executor = new StepExecutor(registry, componentLogger(logger, "executor"), {
    ...config.executor,
    log: executions,
  });

  // 6. Memory and background work
  const memory = new MemoryStore(store, componentLogger(logger, "memory"), {
    threshold: config.memory.extractionThreshold,
    minRelevance: config.memory.minRelevance,
    maxResults: config.memory.maxResults,
    stopwords: loadStopwords(),
  });
  const extractor = new MemoryExtractor(gateway, componentLogger(logger, "memory"), {
    threshold: config.memory.extractionThreshold,
  });
  const background = new BackgroundQueue(componentLogger(logger, "background"), {
    concurrency: config.memory.ingestionConcurrency,
    timeoutMs: config.memory.ingestionTimeoutMs,
  });
  const usage = new UsageTracker(store);
  const conversations = config.conversations.enabled
    ? new ConversationStore(store, componentLogger(logger, "conversations"))
    : null;

  // 7. Orchestrator
  const localReplies = config.localReplies.enabled
    ? new LocalReplyEngine(config.localReplies.templates, config.localReplies.builtins)
    : null;
  const orchestrator = new Orchestrator(
    {
      classifier,
      registry,
      executor,
      plans,
      gateway,
      localReplies,
      memory: config.memory.enabled ? { store: memory, extractor } : null,
      background,
      usage,
      conversations,
      logger: componentLogger(logger, "orchestrator"),
    },
    {
      memoryRetrievalTimeoutMs: config.memory.retrievalTimeoutMs,
      contextMinRelevance: config.memory.contextMinRelevance,
      contextMaxResults: config.memory.maxResults,
      synthesisMaxTokens: config.model.maxTokens,
      historyTurns: config.conversations.historyTurns,
    },
  );

  logger.info(
    { providers: registry.actionNames().length, model: gateway ? config.model.model : "none" },
    "Runtime ready",
  );

  let closed = false;
  return {
    config,
    logger,
    store,
    registry,
    gateway,
    classifier,
    plans,
    templates,
    executions,
    memory,
    usage,
    conversations,
    background,
    orchestrator,
    async shutdown() {
      if (closed) return;
      closed = true;
      await background.drain();
      await background.close();
      store.close();
      logger.debug("Runtime stopped");
    },
  };
}

export function createRuntimeFromFile(configPath?: string, overrides?: RuntimeOverrides): RuntimeContext {
  return createRuntime(loadConfig(configPath), overrides);
}
