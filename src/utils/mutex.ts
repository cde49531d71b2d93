/**
 * FIFO async mutex
 *
 * Waiters acquire the lock in the order they called `acquire()`.
 */
export class Mutex {
  #locked = false;
  readonly #queue: Array<() => void> = [];

  /**
   * Resolve with a release function once the lock is held
   */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = (): void => {
        if (this.#locked) {
          this.#queue.push(tryAcquire);
        } else {
          this.#locked = true;
          let released = false;
          resolve(() => {
            if (released) return;
            released = true;
            this.#release();
          });
        }
      };
      tryAcquire();
    });
  }

  /**
   * Run `task` while holding the lock
   */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.#locked;
  }

  get pending(): number {
    return this.#queue.length;
  }

  #release(): void {
    this.#locked = false;
    const next = this.#queue.shift();
    if (next) {
      next();
    }
  }
}
