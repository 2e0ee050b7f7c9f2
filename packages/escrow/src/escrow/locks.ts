/**
 * Bounty Locks
 *
 * Per-key serialization for escrow operations.
 *
 * Invariant: one bounty = at most one operation between its first read and
 * its commit. Waiters are served in arrival order. A key has an entry only
 * while it is held; release hands it to the next waiter or removes it.
 */

// =============================================================================
// LOCK KEYS
// =============================================================================

export const CREATE_LOCK_KEY = 'bounty:new';
export const VERIFIER_LOCK_KEY = 'verifiers';

export function bountyLockKey(bountyId: number): string {
  return `bounty:${bountyId}`;
}

// =============================================================================
// KEY LOCK
// =============================================================================

interface KeyLock {
  queue: Array<() => void>;
}

export class BountyLocks {
  private locks: Map<string, KeyLock> = new Map();

  /**
   * Run `fn` while holding the lock for `key`.
   * The lock is released when `fn` settles, whether it resolves or rejects.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
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
      this.locks.set(key, { queue: [] });
      return;
    }

    return new Promise<void>((resolve) => {
      lock.queue.push(resolve);
    });
  }

  private release(key: string): void {
    const lock = this.locks.get(key);
    if (!lock) return;

    // Hand the lock straight to the next waiter, or drop the entry
    const next = lock.queue.shift();
    if (next) {
      next();
    } else {
      this.locks.delete(key);
    }
  }

  // For testing: check if a key is held
  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  // For testing: number of operations waiting on a key
  queueLength(key: string): number {
    return this.locks.get(key)?.queue.length ?? 0;
  }
}
