/**
 * Non-reentrant async mutex
 *
 * Serializes async critical sections in FIFO order. Acquiring the mutex again
 * from inside a section that already holds it waits forever: callers that need
 * the guarded state while holding the lock must use lock-held helpers instead
 * of re-entering a public, lock-acquiring method.
 *
 * @example
 * ```typescript
 * const mutex = new Mutex();
 * const result = await mutex.runExclusive(async () => {
 *   // only one caller at a time
 *   return doWork();
 * });
 * ```
 */

/**
 * Releases a held lock. Calling it more than once has no effect.
 */
export type ReleaseFn = () => void;

interface Waiter {
  grant: (release: ReleaseFn) => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class Mutex {
  private locked = false;
  private readonly waiters: Waiter[] = [];

  /**
   * Whether a caller currently holds the lock
   */
  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Number of callers waiting for the lock
   */
  pending(): number {
    return this.waiters.length;
  }

  /**
   * Take the lock if it is free, without waiting.
   *
   * @returns A release function, or null when the lock is held
   */
  tryAcquire(): ReleaseFn | null {
    if (this.locked) {
      return null;
    }
    this.locked = true;
    return this.createRelease();
  }

  /**
   * Wait for the lock.
   *
   * If `signal` aborts while waiting, the caller leaves the queue and the
   * promise rejects with the signal's reason.
   */
  acquire(signal?: AbortSignal): Promise<ReleaseFn> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const release = this.tryAcquire();
    if (release) {
      return Promise.resolve(release);
    }

    return new Promise<ReleaseFn>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, reject };

      if (signal) {
        waiter.signal = signal;
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
            reject(signal.reason);
          }
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.waiters.push(waiter);
    });
  }

  /**
   * Run `fn` while holding the lock; the lock is released on every exit path.
   */
  async runExclusive<T>(fn: () => Promise<T> | T, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.handOff();
    };
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (!next) {
      this.locked = false;
      return;
    }
    if (next.signal && next.onAbort) {
      next.signal.removeEventListener('abort', next.onAbort);
    }
    // Ownership passes directly to the next waiter; the lock never looks free.
    next.grant(this.createRelease());
  }
}
