export type ErrorCategory =
  | "temporary"
  | "rate_limited"
  | "user"
  | "system"
  | "permanent"
  | "guardrail";

export const ErrorCodes = {
  // Model gateway
  MODEL_UNAVAILABLE: "MODEL_UNAVAILABLE",
  MODEL_TIMEOUT: "MODEL_TIMEOUT",
  MODEL_PARSE_ERROR: "MODEL_PARSE_ERROR",
  MODEL_RATE_LIMIT: "MODEL_RATE_LIMIT",
  MODEL_INVALID_RESPONSE: "MODEL_INVALID_RESPONSE",
  MODEL_AUTH: "MODEL_AUTH",
  CIRCUIT_OPEN: "CIRCUIT_OPEN",
  // Capabilities
  PROVIDER_NOT_FOUND: "PROVIDER_NOT_FOUND",
  ACTION_NOT_ALLOWED: "ACTION_NOT_ALLOWED",
  STEP_TIMEOUT: "STEP_TIMEOUT",
  STEP_FAILED: "STEP_FAILED",
  INVALID_INPUT: "INVALID_INPUT",
  PATH_OUTSIDE_ROOT: "PATH_OUTSIDE_ROOT",
  // Plans
  PLAN_INVALID: "PLAN_INVALID",
  PLAN_VARIABLES_MISSING: "PLAN_VARIABLES_MISSING",
  // Memory and storage
  MEMORY_UNAVAILABLE: "MEMORY_UNAVAILABLE",
  STORE_CORRUPT: "STORE_CORRUPT",
  STORE_VERSION_UNSUPPORTED: "STORE_VERSION_UNSUPPORTED",
  // Misc
  CONFIG_INVALID: "CONFIG_INVALID",
  CANCELLED: "CANCELLED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes] | (string & {});

export interface AppErrorOptions {
  readonly retryAfterMs?: number;
  readonly suggestions?: readonly string[];
  readonly context?: Readonly<Record<string, unknown>>;
  readonly cause?: unknown;
}

const RETRYABLE: ReadonlySet<ErrorCategory> = new Set(["temporary", "rate_limited"]);

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly retryable: boolean;
  readonly retryAfterMs: number | undefined;
  readonly suggestions: readonly string[];
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: ErrorCode, message: string, category: ErrorCategory, opts?: AppErrorOptions) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "AppError";
    this.code = code;
    this.category = category;
    this.retryable = RETRYABLE.has(category);
    this.retryAfterMs = opts?.retryAfterMs;
    this.suggestions = opts?.suggestions ?? [];
    this.context = opts?.context ?? {};
  }

  override toString(): string {
    const inner = this.cause instanceof Error ? this.cause.message : undefined;
    const base = `[${this.code}] ${this.message}`;
    return inner && inner !== this.message ? `${base}: ${inner}` : base;
  }
}

export class GuardrailError extends AppError {
  readonly violations: readonly string[];

  constructor(violations: readonly string[], context?: Readonly<Record<string, unknown>>) {
    super(
      ErrorCodes.PLAN_INVALID,
      `Plan rejected by guardrails: ${violations.join("; ")}`,
      "guardrail",
      { context },
    );
    this.name = "GuardrailError";
    this.violations = violations;
  }
}

// ── Factories ──

export function temporary(code: ErrorCode, message: string, opts?: AppErrorOptions): AppError {
  return new AppError(code, message, "temporary", opts);
}

export function rateLimited(code: ErrorCode, message: string, retryAfterMs?: number, opts?: AppErrorOptions): AppError {
  const wait = retryAfterMs !== undefined ? `Wait ${Math.ceil(retryAfterMs / 1000)}s before retrying` : "Wait a moment before retrying";
  return new AppError(code, message, "rate_limited", {
    ...opts,
    retryAfterMs,
    suggestions: opts?.suggestions ?? [wait, "Check your API quota"],
  });
}

export function userError(code: ErrorCode, message: string, opts?: AppErrorOptions): AppError {
  return new AppError(code, message, "user", opts);
}

export function systemError(code: ErrorCode, message: string, opts?: AppErrorOptions): AppError {
  return new AppError(code, message, "system", opts);
}

export function permanent(code: ErrorCode, message: string, opts?: AppErrorOptions): AppError {
  return new AppError(code, message, "permanent", opts);
}

// ── Helpers ──

/** Unknown errors are treated as temporary. */
export function categoryOf(err: unknown): ErrorCategory {
  return err instanceof AppError ? err.category : "temporary";
}

export function isRetryable(err: unknown): boolean {
  return err instanceof AppError ? err.retryable : true;
}

export function retryAfterOf(err: unknown): number | undefined {
  return err instanceof AppError ? err.retryAfterMs : undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatUserMessage(err: unknown): string {
  if (!(err instanceof AppError)) return errorMessage(err);
  if (err.suggestions.length === 0) return err.message;
  return `${err.message}\n\nSuggestions:\n${err.suggestions.map((s) => `  • ${s}`).join("\n")}`;
}
