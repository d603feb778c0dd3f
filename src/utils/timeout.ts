export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number, label = "operation") {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Derives a signal that aborts when the parent aborts or after `timeoutMs`.
 * Call `dispose` once the guarded work settles so the timer does not linger.
 */
export function deadlineSignal(
  timeoutMs: number,
  parent?: AbortSignal,
  label?: string,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs, label)), timeoutMs);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * Races `work` against the signal. The work receives the derived signal and should
 * honour it; if it does not, its eventual result is ignored.
 */
export function raceSignal<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/** Resolves to `null` instead of rejecting when the deadline passes. */
export async function withinDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T | null> {
  const { signal, dispose } = deadlineSignal(timeoutMs, parent);
  try {
    return await raceSignal(fn(signal), signal);
  } catch (err) {
    if (err instanceof TimeoutError) return null;
    throw err;
  } finally {
    dispose();
  }
}
