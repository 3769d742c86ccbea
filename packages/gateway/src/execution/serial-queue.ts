/**
 * Serial Queue
 *
 * Enforces per-key serialization of async calls.
 *
 * Invariant: one key = at most one call in flight. Waiters run in arrival
 * order. This is how a single-threaded host gives every inbound vote and every
 * outbound flush exclusive access to the state it touches, even when stores
 * are async.
 *
 * Not re-entrant: a call that awaits `run` on its own key deadlocks.
 */

// =============================================================================
// KEY LOCK
// =============================================================================

interface KeyLock {
  held: boolean;
  queue: Array<() => void>;
}

// =============================================================================
// SERIAL QUEUE
// =============================================================================

export class SerialQueue {
  private locks: Map<string, KeyLock> = new Map();

  /**
   * Run `fn` once every earlier call for `key` has settled.
   * The lock is released whether `fn` resolves or throws.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  // ===========================================================================
  // PRIVATE: Lock Management
  // ===========================================================================

  private async acquire(key: string): Promise<void> {
    const lock = this.locks.get(key);

    if (!lock) {
      this.locks.set(key, { held: true, queue: [] });
      return;
    }

    if (!lock.held) {
      lock.held = true;
      return;
    }

    return new Promise<void>((resolve) => {
      lock.queue.push(resolve);
    });
  }

  private release(key: string): void {
    const lock = this.locks.get(key);
    if (!lock) return;

    // Hand the lock straight to the next waiter so nobody can cut in line
    const next = lock.queue.shift();
    if (next) {
      next();
    } else {
      this.locks.delete(key);
    }
  }

  // For testing: check if key is held
  isLocked(key: string): boolean {
    return this.locks.get(key)?.held ?? false;
  }

  // For testing: get number of waiters for key
  queueLength(key: string): number {
    return this.locks.get(key)?.queue.length ?? 0;
  }
}
