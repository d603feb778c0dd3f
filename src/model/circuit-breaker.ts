export type BreakerState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  readonly failureThreshold?: number;
  readonly cooldownMs?: number;
  readonly halfOpenMaxTrials?: number;
  readonly now?: () => number;
}

const DEFAULT_FAILURE_THRESHOLD = 5;
const DEFAULT_COOLDOWN_MS = 60_000;
const DEFAULT_HALF_OPEN_TRIALS = 3;

export class CircuitBreaker {
  private state: BreakerState = "closed";
  private failures = 0;
  private openedAt = 0;
  private trials = 0;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly halfOpenMaxTrials: number;
  private readonly now: () => number;

  constructor(readonly name: string, opts?: CircuitBreakerOptions) {
    this.failureThreshold = opts?.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.cooldownMs = opts?.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.halfOpenMaxTrials = opts?.halfOpenMaxTrials ?? DEFAULT_HALF_OPEN_TRIALS;
    this.now = opts?.now ?? Date.now;
  }

  /** Reserves a slot for one call. Returns false when the call must fail fast. */
  tryAcquire(): boolean {
    if (this.state === "closed") return true;

    if (this.state === "open") {
      if (this.now() - this.openedAt < this.cooldownMs) return false;
      this.state = "half_open";
      this.trials = 0;
    }

    if (this.trials < this.halfOpenMaxTrials) {
      this.trials++;
      return true;
    }
    return false;
  }

  /** Whether a call would currently be admitted, without reserving a slot. */
  canAttempt(): boolean {
    if (this.state === "closed") return true;
    if (this.state === "open") return this.now() - this.openedAt >= this.cooldownMs;
    return this.trials < this.halfOpenMaxTrials;
  }

  recordSuccess(): void {
    this.failures = 0;
    this.trials = 0;
    this.state = "closed";
  }

  recordFailure(): void {
    this.failures++;
    if (this.state === "half_open" || this.failures >= this.failureThreshold) {
      this.state = "open";
      this.openedAt = this.now();
      this.trials = 0;
    }
  }

  /** Releases a reserved slot for a call whose outcome should not count either way. */
  release(): void {
    if (this.state === "half_open" && this.trials > 0) this.trials--;
  }

  get currentState(): BreakerState {
    if (this.state === "open" && this.now() - this.openedAt >= this.cooldownMs) {
      return "half_open";
    }
    return this.state;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  reset(): void {
    this.state = "closed";
    this.failures = 0;
    this.trials = 0;
  }
}
