/**
 * Bounded-concurrency executor for background work
 *
 * Submissions return immediately; at most `concurrency` jobs run at once and
 * the rest wait in FIFO order.
 */

import { logger } from "../observability/logs.js";

export interface Runnable {
  readonly id: string;
  run(): Promise<void>;
}

export class WorkerPool {
  readonly #concurrency: number;
  #queue: Runnable[] = [];
  #active = 0;
  #idleWaiters: Array<() => void> = [];

  constructor(concurrency = 2) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker concurrency must be a positive integer, got ${concurrency}`);
    }
    this.#concurrency = concurrency;
  }

  get concurrency(): number {
    return this.#concurrency;
  }

  /** Jobs running right now */
  get active(): number {
    return this.#active;
  }

  /** Jobs waiting for a free worker */
  get pending(): number {
    return this.#queue.length;
  }

  submit(job: Runnable): void {
    this.#queue.push(job);
    this.#pump();
  }

  /**
   * Resolve once nothing is running or queued
   */
  onIdle(): Promise<void> {
    if (this.#active === 0 && this.#queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.#idleWaiters.push(resolve);
    });
  }

  #pump(): void {
    while (this.#active < this.#concurrency) {
      const job = this.#queue.shift();
      if (!job) break;
      this.#active++;
      void this.#execute(job);
    }
  }

  async #execute(job: Runnable): Promise<void> {
    try {
      await job.run();
    } catch (err) {
      logger.error("pool.job.failed", {
        message: err instanceof Error ? err.message : String(err),
        details: { id: job.id },
      });
    } finally {
      this.#active--;
      this.#pump();
      if (this.#active === 0 && this.#queue.length === 0) {
        const waiters = this.#idleWaiters;
        this.#idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }
}
