import type { Logger } from "../logging/logger.js";
import {
  ErrorCodes,
  categoryOf,
  isRetryable,
  retryAfterOf,
  systemError,
} from "../errors/app-error.js";
import { retry, type RetryOptions } from "../utils/retry.js";
import type { RoutingMode } from "../config/types.js";
import { CircuitBreaker, type BreakerState, type CircuitBreakerOptions } from "./circuit-breaker.js";
import { DEFAULT_PROVIDER_TIER, estimateTier, orderProviders, providerTier } from "./router.js";
import type { ModelProvider, ModelRequest, ModelResponse, StreamSink } from "./types.js";

export interface ModelGatewayOptions {
  readonly breaker?: CircuitBreakerOptions;
  readonly retry?: Omit<RetryOptions, "signal" | "shouldRetry" | "delayHint">;
  readonly routing?: RoutingMode;
}

export interface ProviderHealth {
  readonly provider: string;
  readonly tier: number;
  readonly state: BreakerState;
  readonly consecutiveFailures: number;
}

/**
 * Uniform entry point for text generation. Every call, streamed or not, runs
 * through the provider's circuit breaker and the retry policy. Providers are
 * tried in the order the routing mode gives for the request's tier.
 */
export class ModelGateway {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly providers: readonly ModelProvider[];
  private readonly routing: RoutingMode;

  constructor(
    providers: readonly ModelProvider[],
    private readonly logger: Logger,
    private readonly options: ModelGatewayOptions = {},
  ) {
    this.providers = [...providers];
    this.routing = options.routing ?? "smart";
    for (const provider of this.providers) {
      this.breakers.set(provider.id, new CircuitBreaker(provider.id, options.breaker));
    }
  }

  get hasProviders(): boolean {
    return this.providers.length > 0;
  }

  isAvailable(): boolean {
    const routable = orderProviders(this.providers, DEFAULT_PROVIDER_TIER, this.routing);
    return routable.some((p) => this.breakerFor(p).canAttempt());
  }

  health(): ProviderHealth[] {
    return this.providers.map((p) => {
      const breaker = this.breakerFor(p);
      return {
        provider: p.id,
        tier: providerTier(p),
        state: breaker.currentState,
        consecutiveFailures: breaker.consecutiveFailures,
      };
    });
  }

  async generate(request: ModelRequest): Promise<ModelResponse> {
    return this.call({ ...request, stream: false });
  }

  async stream(request: ModelRequest, onChunk: StreamSink): Promise<ModelResponse> {
    return this.call({ ...request, stream: true }, onChunk);
  }

  private async call(request: ModelRequest, onChunk?: StreamSink): Promise<ModelResponse> {
    if (this.providers.length === 0) {
      throw systemError(ErrorCodes.MODEL_UNAVAILABLE, "No model provider configured");
    }
    const requiredTier = request.tier ?? estimateTier(request.prompt);
    const candidates = orderProviders(this.providers, requiredTier, this.routing);
    if (candidates.length === 0) {
      throw systemError(ErrorCodes.MODEL_UNAVAILABLE, `No model provider serves routing mode '${this.routing}'`);
    }
    this.logger.debug({ tier: requiredTier, order: candidates.map((p) => p.id) }, "Routing model call");

    let emitted = false;
    const sink: StreamSink | undefined = onChunk
      ? (chunk) => {
          if (chunk.length > 0) emitted = true;
          onChunk(chunk);
        }
      : undefined;

    let lastError: unknown;
    for (const provider of candidates) {
      const breaker = this.breakerFor(provider);
      if (!breaker.canAttempt()) {
        lastError = systemError(ErrorCodes.CIRCUIT_OPEN, `Circuit breaker '${provider.id}' is open`);
        this.logger.debug({ provider: provider.id }, "Skipping provider with open circuit");
        continue;
      }
      try {
        return await this.callProvider(provider, breaker, request, sink, () => emitted);
      } catch (err) {
        // Partial output already reached the caller; a second provider would duplicate it
        if (emitted || request.signal?.aborted || categoryOf(err) === "user") throw err;
        lastError = err;
      }
    }

    throw lastError ?? systemError(ErrorCodes.MODEL_UNAVAILABLE, "No model provider available");
  }

  private async callProvider(
    provider: ModelProvider,
    breaker: CircuitBreaker,
    request: ModelRequest,
    sink: StreamSink | undefined,
    hasEmitted: () => boolean,
  ): Promise<ModelResponse> {
    return retry(
      async (attempt) => {
        if (!breaker.tryAcquire()) {
          throw systemError(ErrorCodes.CIRCUIT_OPEN, `Circuit breaker '${provider.id}' is open`);
        }
        const started = Date.now();
        try {
          const response = await provider.generate(request, sink);
          breaker.recordSuccess();
          this.logger.debug(
            { provider: provider.id, model: response.model, attempt, durationMs: Date.now() - started, tokens: response.tokensUsed },
            "Model call completed",
          );
          return response;
        } catch (err) {
          if (request.signal?.aborted || categoryOf(err) === "user") {
            breaker.release();
          } else {
            breaker.recordFailure();
          }
          this.logger.warn(
            { provider: provider.id, attempt, category: categoryOf(err), err },
            "Model call failed",
          );
          throw err;
        }
      },
      {
        ...this.options.retry,
        signal: request.signal,
        shouldRetry: (err) => !hasEmitted() && !request.signal?.aborted && isRetryable(err),
        delayHint: retryAfterOf,
      },
    );
  }

  private breakerFor(provider: ModelProvider): CircuitBreaker {
    let breaker = this.breakers.get(provider.id);
    if (!breaker) {
      breaker = new CircuitBreaker(provider.id, this.options.breaker);
      this.breakers.set(provider.id, breaker);
    }
    return breaker;
  }
}
