export class LockAbortedError extends Error {
  constructor() {
    super("Gave up waiting for lock");
    this.name = "LockAbortedError";
  }
}

/**
 * FIFO async mutex. On release the lock passes straight to the oldest
 * waiter, so it never appears free while someone is queued.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  async runExclusive<T>(fn: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new LockAbortedError());
    }
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(grant);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new LockAbortedError());
      };
      const grant = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };

      this.waiters.push(grant);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
