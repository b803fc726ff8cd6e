import { EvaluationCancelledError } from "./errors.js";

interface Waiter {
  readonly resolve: () => void;
  readonly reject: (error: unknown) => void;
  readonly signal: AbortSignal | undefined;
  readonly onAbort: () => void;
}

export interface EvaluationPoolStatistics {
  readonly maxWorkers: number;
  readonly active: number;
  readonly queued: number;
  /** Highest number of tasks observed running at once. */
  readonly peak: number;
  readonly executed: number;
}

/**
 * Bounds how many operation invocations run at once. Tasks beyond the limit
 * queue in FIFO order; a queued task whose signal aborts leaves the queue
 * with {@link EvaluationCancelledError} without ever taking a slot.
 */
export class EvaluationPool {
  private readonly maxWorkers: number;
  private readonly queue: Waiter[] = [];
  private activeWorkers = 0;
  private peakWorkers = 0;
  private executed = 0;

  constructor(maxWorkers: number) {
    this.maxWorkers = Number.isFinite(maxWorkers) ? Math.max(1, Math.floor(maxWorkers)) : 1;
  }

  /** Runs the task once a slot is free and releases the slot when it settles. */
  async run<T>(task: () => Promise<T> | T, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.executed += 1;
      this.release();
    }
  }

  getStatistics(): EvaluationPoolStatistics {
    return {
      maxWorkers: this.maxWorkers,
      active: this.activeWorkers,
      queued: this.queue.length,
      peak: this.peakWorkers,
      executed: this.executed,
    };
  }

  private acquire(signal: AbortSignal | undefined): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new EvaluationCancelledError(signal.reason));
    }
    if (this.activeWorkers < this.maxWorkers) {
      this.take();
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        signal,
        onAbort: () => {
          const position = this.queue.indexOf(waiter);
          if (position >= 0) {
            this.queue.splice(position, 1);
          }
          reject(new EvaluationCancelledError(signal?.reason));
        },
      };
      signal?.addEventListener("abort", waiter.onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  private take(): void {
    this.activeWorkers += 1;
    this.peakWorkers = Math.max(this.peakWorkers, this.activeWorkers);
  }

  private release(): void {
    this.activeWorkers = Math.max(0, this.activeWorkers - 1);
    const next = this.queue.shift();
    if (!next) {
      return;
    }
    next.signal?.removeEventListener("abort", next.onAbort);
    this.take();
    next.resolve();
  }
}
