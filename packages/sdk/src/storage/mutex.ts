/**
 * Simple in-process mutex for serializing writes to one collection
 */
export class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter; #locked stays true
      next();
    } else {
      this.#locked = false;
    }
  }

  get locked(): boolean {
    return this.#locked;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Lazily created mutexes, one per key
 */
export class MutexMap {
  #mutexes = new Map<string, Mutex>();

  get(key: string): Mutex {
    let mutex = this.#mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.#mutexes.set(key, mutex);
    }
    return mutex;
  }

  withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.get(key).withLock(fn);
  }
}
