import type { Logger } from "../logging/logger.js";
import { deadlineSignal, raceSignal } from "../utils/timeout.js";

export interface BackgroundTask {
  readonly id: string;
  readonly label: string;
  readonly run: (signal: AbortSignal) => Promise<void>;
  readonly createdAt: number;
}

export interface BackgroundQueueOptions {
  readonly maxSize?: number;
  readonly concurrency?: number;
  readonly timeoutMs?: number;
}

const DEFAULT_MAX_QUEUE_SIZE = 500;
const DEFAULT_CONCURRENCY = 2;
const DEFAULT_TIMEOUT_MS = 15_000;

/**
 * Detached work with a bounded worker pool and a per-task deadline. Failures
 * are logged; nothing is reported back to the caller that enqueued the task.
 */
export class BackgroundQueue {
  private readonly queue: BackgroundTask[] = [];
  private active = 0;
  private scheduled = false;
  private closed = false;
  private readonly maxSize: number;
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly controller = new AbortController();
  private idCounter = 0;
  private drainWaiters: (() => void)[] = [];

  constructor(
    private readonly logger: Logger,
    options?: BackgroundQueueOptions,
  ) {
    this.maxSize = options?.maxSize ?? DEFAULT_MAX_QUEUE_SIZE;
    this.concurrency = Math.max(1, options?.concurrency ?? DEFAULT_CONCURRENCY);
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Returns the task id, or `null` once the queue is closed. */
  enqueue(label: string, run: (signal: AbortSignal) => Promise<void>): string | null {
    if (this.closed) {
      this.logger.warn({ label }, "Background queue closed, task dropped");
      return null;
    }
    if (this.queue.length >= this.maxSize) {
      const dropped = this.queue.shift();
      this.logger.warn({ queueSize: this.queue.length, dropped: dropped?.label }, "Background queue full, dropping oldest");
    }

    const id = `bg-${++this.idCounter}-${Date.now()}`;
    this.queue.push({ id, label, run, createdAt: Date.now() });
    this.schedule();
    return id;
  }

  get size(): number {
    return this.queue.length;
  }

  get activeCount(): number {
    return this.active;
  }

  /** Resolves once the queue is empty and every running task has settled. */
  drain(): Promise<void> {
    if (this.queue.length === 0 && this.active === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  /** Stops accepting work, drops what is queued and aborts what is running. */
  async close(): Promise<void> {
    this.closed = true;
    this.queue.length = 0;
    this.controller.abort();
    await this.drain();
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    queueMicrotask(() => {
      this.scheduled = false;
      this.processNext();
    });
  }

  private processNext(): void {
    while (this.active < this.concurrency) {
      const task = this.queue.shift();
      if (!task) break;
      this.active++;
      void this.runTask(task);
    }
    this.checkDrain();
  }

  private async runTask(task: BackgroundTask): Promise<void> {
    const started = Date.now();
    const deadline = deadlineSignal(this.timeoutMs, this.controller.signal, task.label);
    try {
      await raceSignal(task.run(deadline.signal), deadline.signal);
      this.logger.debug({ taskId: task.id, label: task.label, durationMs: Date.now() - started }, "Background task done");
    } catch (err) {
      this.logger.warn({ err, taskId: task.id, label: task.label }, "Background task failed");
    } finally {
      deadline.dispose();
      this.active--;
      this.processNext();
    }
  }

  private checkDrain(): void {
    if (this.queue.length === 0 && this.active === 0 && this.drainWaiters.length > 0) {
      const waiters = this.drainWaiters;
      this.drainWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
