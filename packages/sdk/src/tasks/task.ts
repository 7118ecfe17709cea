/**
 * Background task state machine
 *
 * Invariants:
 * - CREATED → RUNNING → DONE | FAILED; terminal states never change
 * - `run()` executes at most once per task
 * - A failing sub-unit is reported through `progress.addError` and does not end
 *   the task; only an error escaping `execute` makes it FAILED
 * - `summary()` returns a frozen copy, never the live status
 */

import { randomUUID } from "node:crypto";
import { logger } from "../observability/logs.js";
import type { TaskState, TaskSummary } from "../types.js";

/**
 * Progress reporting handed to a task's routine
 */
export interface TaskProgress<R> {
  /** Declare how many sub-units the routine will work through */
  setTotal(units: number): void;
  /** Mark sub-units as processed (default: 1) */
  advance(units?: number): void;
  addResults(results: readonly R[]): void;
  /** Record a failed sub-unit; the routine carries on */
  addError(message: string): void;
}

export interface BackgroundTaskOptions {
  /** How long a finished task stays retrievable, in milliseconds (default: 1 hour) */
  ttlMs?: number;
  now?: () => number;
  id?: string;
}

export const DEFAULT_TASK_TTL_MS = 60 * 60 * 1000;

function toIso(ms: number | undefined): string | null {
  return ms === undefined ? null : new Date(ms).toISOString();
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export abstract class BackgroundTask<R = never> {
  readonly id: string;
  readonly #ttlMs: number;
  readonly #now: () => number;
  readonly #createdAt: number;
  #startedAt: number | undefined;
  #finishedAt: number | undefined;
  #state: TaskState = "CREATED";
  #totalUnits = 0;
  #unitsProcessed = 0;
  #results: R[] = [];
  #errors: string[] = [];

  constructor(options: BackgroundTaskOptions = {}) {
    this.id = options.id ?? randomUUID();
    this.#ttlMs = options.ttlMs ?? DEFAULT_TASK_TTL_MS;
    this.#now = options.now ?? Date.now;
    this.#createdAt = this.#now();
  }

  /**
   * The operation-specific routine
   */
  protected abstract execute(progress: TaskProgress<R>): Promise<void>;

  /**
   * Short label used in log lines
   */
  protected abstract describe(): string;

  get state(): TaskState {
    return this.#state;
  }

  /**
   * Whether the task has not reached a terminal state yet
   */
  get isLive(): boolean {
    return this.#state === "CREATED" || this.#state === "RUNNING";
  }

  get results(): readonly R[] {
    return [...this.#results];
  }

  /**
   * Run the routine once, recording the outcome. Never rejects.
   */
  async run(): Promise<void> {
    if (this.#state !== "CREATED") {
      logger.warn("task.rerun", { message: `${this.describe()} is already ${this.#state}` });
      return;
    }

    this.#startedAt = this.#now();
    this.#state = "RUNNING";
    logger.debug("task.start", { message: this.describe(), details: { id: this.id } });

    const progress: TaskProgress<R> = {
      setTotal: (units) => {
        this.#totalUnits = units;
      },
      advance: (units = 1) => {
        this.#unitsProcessed += units;
      },
      addResults: (results) => {
        this.#results.push(...results);
      },
      addError: (message) => {
        this.#errors.push(message);
      },
    };

    try {
      await this.execute(progress);
      this.#finishedAt = this.#now();
      this.#state = "DONE";
      logger.info("task.done", {
        message: this.describe(),
        details: { id: this.id, errors: this.#errors.length, results: this.#results.length },
      });
    } catch (err) {
      this.#errors.push(errorMessage(err));
      this.#finishedAt = this.#now();
      this.#state = "FAILED";
      logger.warn("task.failed", {
        message: `${this.describe()}: ${errorMessage(err)}`,
        details: { id: this.id },
      });
    }
  }

  /**
   * Whether a finished task has outlived its TTL
   */
  isExpired(now: number = this.#now()): boolean {
    return this.#finishedAt !== undefined && now >= this.#finishedAt + this.#ttlMs;
  }

  /**
   * Point-in-time copy of the status
   */
  summary(): Readonly<TaskSummary> {
    const end = this.#finishedAt ?? this.#now();
    return Object.freeze({
      id: this.id,
      state: this.#state,
      createdAt: new Date(this.#createdAt).toISOString(),
      startedAt: toIso(this.#startedAt),
      finishedAt: toIso(this.#finishedAt),
      expiresAfter: toIso(
        this.#finishedAt === undefined ? undefined : this.#finishedAt + this.#ttlMs
      ),
      processingTimeInMillis: this.#startedAt === undefined ? 0 : end - this.#startedAt,
      totalUnits: this.#totalUnits,
      unitsProcessed: this.#unitsProcessed,
      resultCount: this.#results.length,
      errors: Object.freeze([...this.#errors]),
    });
  }
}
