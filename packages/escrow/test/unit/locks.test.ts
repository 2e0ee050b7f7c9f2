/**
 * Bounty Lock Tests
 *
 * Proves:
 * - Operations on one key never overlap
 * - Waiters run in arrival order
 * - Different keys do not block each other
 * - A rejected operation still releases its lock
 */

import { describe, it, expect } from 'vitest';
import { BountyLocks, bountyLockKey, CREATE_LOCK_KEY, VERIFIER_LOCK_KEY } from '../../src/escrow/locks.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('BountyLocks', () => {
  it('should serialize operations on the same key in arrival order', async () => {
    const locks = new BountyLocks();
    const order: string[] = [];
    const gate = deferred();

    const first = locks.runExclusive('bounty:1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = locks.runExclusive('bounty:1', async () => {
      order.push('second');
    });
    const third = locks.runExclusive('bounty:1', async () => {
      order.push('third');
    });

    await Promise.resolve();
    expect(locks.isLocked('bounty:1')).toBe(true);
    expect(locks.queueLength('bounty:1')).toBe(2);

    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first:start', 'first:end', 'second', 'third']);
    expect(locks.isLocked('bounty:1')).toBe(false);
  });

  it('should hand the key to the next waiter and drop it after the last', async () => {
    const locks = new BountyLocks();
    const gate = deferred();
    const seen: boolean[] = [];

    const first = locks.runExclusive('bounty:1', async () => {
      await gate.promise;
    });
    const second = locks.runExclusive('bounty:1', async () => {
      seen.push(locks.isLocked('bounty:1'));
    });

    gate.resolve();
    await Promise.all([first, second]);

    expect(seen).toEqual([true]);
    expect(locks.isLocked('bounty:1')).toBe(false);
    expect(locks.queueLength('bounty:1')).toBe(0);
  });

  it('should not block other keys', async () => {
    const locks = new BountyLocks();
    const gate = deferred();
    const order: string[] = [];

    const held = locks.runExclusive('bounty:1', async () => {
      await gate.promise;
      order.push('bounty:1');
    });
    await locks.runExclusive('bounty:2', async () => {
      order.push('bounty:2');
    });

    gate.resolve();
    await held;
    expect(order).toEqual(['bounty:2', 'bounty:1']);
  });

  it('should release the lock when the operation rejects', async () => {
    const locks = new BountyLocks();

    await expect(
      locks.runExclusive('bounty:1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(locks.isLocked('bounty:1')).toBe(false);
    expect(await locks.runExclusive('bounty:1', async () => 'next')).toBe('next');
  });

  it('should name lock keys', () => {
    expect(bountyLockKey(7)).toBe('bounty:7');
    expect(CREATE_LOCK_KEY).toBe('bounty:new');
    expect(VERIFIER_LOCK_KEY).toBe('verifiers');
  });
});
