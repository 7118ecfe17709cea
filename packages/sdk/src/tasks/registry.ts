/**
 * Keyed registry of background tasks honouring their post-completion TTL
 *
 * Every method is synchronous, so `putIfAbsent` is an atomic test-and-set on
 * the event loop.
 */

export interface ExpirableTask {
  readonly id: string;
  isExpired(now?: number): boolean;
}

export class TaskRegistry<K, T extends ExpirableTask> {
  #tasks = new Map<K, T>();

  /**
   * Look up a task; a task past its TTL is dropped and reported absent
   */
  get(key: K): T | undefined {
    const task = this.#tasks.get(key);
    if (task && task.isExpired()) {
      this.#tasks.delete(key);
      return undefined;
    }
    return task;
  }

  set(key: K, task: T): void {
    this.#tasks.set(key, task);
  }

  /**
   * Return the registered task for `key`, or register the one `create` builds
   * @param keep - Whether an existing task still counts as present (default: always)
   */
  putIfAbsent(
    key: K,
    create: () => T,
    keep: (existing: T) => boolean = () => true
  ): { task: T; created: boolean } {
    const existing = this.get(key);
    if (existing && keep(existing)) {
      return { task: existing, created: false };
    }
    const task = create();
    this.#tasks.set(key, task);
    return { task, created: true };
  }

  delete(key: K): boolean {
    return this.#tasks.delete(key);
  }

  /**
   * Drop every task whose entry matches
   * @returns Number of tasks removed
   */
  deleteWhere(predicate: (task: T, key: K) => boolean): number {
    let removed = 0;
    for (const [key, task] of this.#tasks) {
      if (predicate(task, key)) {
        this.#tasks.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Drop every expired task
   * @returns Number of tasks removed
   */
  purgeExpired(): number {
    let removed = 0;
    for (const [key, task] of this.#tasks) {
      if (task.isExpired()) {
        this.#tasks.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.#tasks.size;
  }
}
