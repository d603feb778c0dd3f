const MESSAGE_HINT = /(?:retry|try again)\s+(?:after|in)\s+(\d+(?:\.\d+)?)\s*(ms|milliseconds?|s|sec|seconds?|m|min|minutes?)\b/i;

/**
 * Parses a retry hint from rate-limit response headers.
 * Accepts `retry-after-ms`, `retry-after` in seconds, or `retry-after` as an HTTP date.
 */
export function parseRetryAfterHeaders(
  header: (name: string) => string | undefined,
  now: number = Date.now(),
): number | undefined {
  const ms = header("retry-after-ms");
  if (ms !== undefined) {
    const parsed = Number(ms);
    if (Number.isFinite(parsed) && parsed >= 0) return parsed;
  }

  const value = header("retry-after");
  if (value === undefined || value.trim() === "") return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) return seconds >= 0 ? seconds * 1000 : undefined;

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/** Extracts phrases like "Please try again in 20s" from provider error messages. */
export function parseRetryAfterMessage(message: string): number | undefined {
  const match = MESSAGE_HINT.exec(message);
  if (!match?.[1] || !match[2]) return undefined;
  const amount = Number(match[1]);
  const unit = match[2].toLowerCase();
  if (unit === "ms" || unit.startsWith("milli")) return amount;
  if (unit === "m" || unit.startsWith("min")) return amount * 60_000;
  return amount * 1000;
}

export function headerReader(headers: unknown): (name: string) => string | undefined {
  return (name) => {
    if (typeof headers !== "object" || headers === null) return undefined;
    if (typeof Headers !== "undefined" && headers instanceof Headers) {
      return headers.get(name) ?? undefined;
    }
    for (const [key, val] of Object.entries(headers)) {
      if (key.toLowerCase() === name && typeof val === "string") return val;
    }
    return undefined;
  };
}
