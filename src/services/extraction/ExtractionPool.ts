/**
 * Extraction Pool
 *
 * Bounds the number of extractor processes (local subprocesses and ssh
 * sessions) running at once. Callers beyond the limit wait in FIFO order.
 * Each call carries a deadline measured from submission, enforced while
 * queued and while running.
 */

import { ExtractionCancelledError, ExtractionTimeoutError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';

export interface PoolTaskContext {
  /** Aborted on deadline or caller cancellation; the task must stop its process */
  signal: AbortSignal;
  /** Time left before the deadline, at least 1ms */
  remainingMs(): number;
}

export interface PoolRunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** For logs */
  label?: string;
}

export interface PoolStats {
  active: number;
  queued: number;
  maxConcurrent: number;
}

export class ExtractionPool {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(
    private readonly maxConcurrent: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Run a task once a slot is free.
   *
   * Rejects with ExtractionTimeoutError when the deadline passes and with
   * ExtractionCancelledError when the caller aborts. A running task is
   * signalled to stop, but its slot is only released once it settles.
   */
  run<T>(task: (context: PoolTaskContext) => Promise<T>, { timeoutMs, signal, label }: PoolRunOptions): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const deadline = this.now() + timeoutMs;
      const controller = new AbortController();
      let started = false;
      let settled = false;

      const settle = (complete: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        complete();
      };

      const dequeue = (): void => {
        const index = this.queue.indexOf(start);
        if (index !== -1) this.queue.splice(index, 1);
      };

      const timer = setTimeout(() => {
        logger.warn('[ExtractionPool] Deadline exceeded', { label, timeoutMs, started });
        if (!started) dequeue();
        controller.abort();
        settle(() => reject(new ExtractionTimeoutError(timeoutMs, { service: 'ExtractionPool', operation: label })));
      }, timeoutMs);

      const onAbort = (): void => {
        if (!started) dequeue();
        controller.abort();
        settle(() => reject(new ExtractionCancelledError({ service: 'ExtractionPool', operation: label })));
      };

      const start = (): void => {
        started = true;
        this.active++;

        let pending: Promise<T>;
        try {
          pending = task({
            signal: controller.signal,
            remainingMs: () => Math.max(1, deadline - this.now()),
          });
        } catch (error) {
          pending = Promise.reject(error);
        }

        void pending
          .then(
            value => settle(() => resolve(value)),
            (error: unknown) => settle(() => reject(error))
          )
          .finally(() => {
            this.active--;
            this.dispatch();
          });
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.queue.push(start);
      this.dispatch();
    });
  }

  stats(): PoolStats {
    return { active: this.active, queued: this.queue.length, maxConcurrent: this.maxConcurrent };
  }

  private dispatch(): void {
    while (this.active < this.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) return;
      next();
    }
  }
}
