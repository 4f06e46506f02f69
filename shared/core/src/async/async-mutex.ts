/**
 * AsyncMutex
 *
 * Mutual exclusion for async operations. Used wherever an operation spans an
 * `await` and must not interleave with another caller:
 * - TokenBucket.consume (held across the refill wait)
 * - FailoverManager iterations and operator mutations
 *
 * @example
 * ```ts
 * const mutex = new AsyncMutex();
 *
 * await mutex.runExclusive(async () => {
 *   await doSomethingExclusive();
 * });
 *
 * const release = mutex.tryAcquire();
 * if (release) {
 *   try { inspect(); } finally { release(); }
 * }
 * ```
 */

export interface MutexStats {
  acquireCount: number;
  /** Number of times callers had to wait */
  contentionCount: number;
  isLocked: boolean;
  waitingCount: number;
}

export class AsyncMutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];
  private acquireCount = 0;
  private contentionCount = 0;

  /**
   * Acquire the mutex, waiting in FIFO order if it is held.
   *
   * @returns A release function that MUST be called when done
   */
  async acquire(): Promise<() => void> {
    if (this.locked) {
      this.contentionCount++;
      await new Promise<void>(resolve => {
        this.waitQueue.push(resolve);
      });
      // Ownership was handed over by the previous holder; `locked` stayed true
    }

    this.locked = true;
    this.acquireCount++;
    return this.createRelease();
  }

  /**
   * Acquire, waiting at most `timeoutMs`. A waiter that times out leaves the
   * queue and never receives the lock.
   *
   * @returns Release function, or null on timeout
   */
  async acquireWithin(timeoutMs: number): Promise<(() => void) | null> {
    if (!this.locked) {
      return this.acquire();
    }

    this.contentionCount++;
    const acquired = await new Promise<boolean>(resolve => {
      const waiter = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        const index = this.waitQueue.indexOf(waiter);
        // Already shifted by release(): the handoff is on its way
        if (index === -1) return;
        this.waitQueue.splice(index, 1);
        resolve(false);
      }, Math.max(0, timeoutMs));
      timer.unref();
      this.waitQueue.push(waiter);
    });
    if (!acquired) return null;

    this.acquireCount++;
    return this.createRelease();
  }

  /**
   * Acquire without waiting.
   *
   * @returns Release function, or null if the mutex is held
   */
  tryAcquire(): (() => void) | null {
    if (this.locked) {
      return null;
    }
    this.locked = true;
    this.acquireCount++;
    return this.createRelease();
  }

  /**
   * Run `fn` with exclusive access; the mutex is released on success or error.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  getStats(): MutexStats {
    return {
      acquireCount: this.acquireCount,
      contentionCount: this.contentionCount,
      isLocked: this.locked,
      waitingCount: this.waitQueue.length,
    };
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      // Direct handoff: the lock stays held while the next waiter wakes, so
      // a newcomer cannot slip in between release and wake-up.
      const next = this.waitQueue.shift();
      if (next) {
        setImmediate(next);
      } else {
        this.locked = false;
      }
    };
  }
}
