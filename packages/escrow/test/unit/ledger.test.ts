/**
 * Ledger + Clock Adapter Tests
 */

import { describe, it, expect } from 'vitest';
import { InMemoryLedger } from '../../src/adapters/ledger.js';
import { ManualClock, SystemClock } from '../../src/adapters/clock.js';

describe('InMemoryLedger', () => {
  it('should move value between identities', async () => {
    const ledger = new InMemoryLedger({ alice: 500n });

    const outcome = await ledger.transfer('alice', 'custodian', 200n);

    expect(outcome).toEqual({ ok: true, reference: 'mem-1' });
    expect(await ledger.balanceOf('alice')).toBe(300n);
    expect(await ledger.balanceOf('custodian')).toBe(200n);
    expect(ledger.getTransfers()).toEqual([
      { reference: 'mem-1', from: 'alice', to: 'custodian', amount: 200n },
    ]);
  });

  it('should report zero for unknown identities', async () => {
    expect(await new InMemoryLedger().balanceOf('ghost')).toBe(0n);
  });

  it('should refuse overdrafts without moving anything', async () => {
    const ledger = new InMemoryLedger({ alice: 100n });

    const outcome = await ledger.transfer('alice', 'bob', 101n);

    expect(outcome).toEqual({ ok: false, reason: 'insufficient balance: 100 < 101' });
    expect(await ledger.balanceOf('alice')).toBe(100n);
    expect(await ledger.balanceOf('bob')).toBe(0n);
    expect(ledger.getTransfers()).toEqual([]);
  });

  it('should refuse non-positive amounts and self transfers', async () => {
    const ledger = new InMemoryLedger({ alice: 100n });

    expect(await ledger.transfer('alice', 'bob', 0n)).toEqual({
      ok: false,
      reason: 'transfer amount must be positive',
    });
    expect(await ledger.transfer('alice', 'alice', 10n)).toEqual({
      ok: false,
      reason: 'sender and recipient are the same identity',
    });
  });

  it('should report recorded transfers as confirmed and anything else as failed', async () => {
    const ledger = new InMemoryLedger({ alice: 100n });
    await ledger.transfer('alice', 'custodian', 10n);

    expect(await ledger.transferStatus('mem-1')).toBe('confirmed');
    expect(await ledger.transferStatus('mem-2')).toBe('failed');
  });

  it('should mint for seeding', async () => {
    const ledger = new InMemoryLedger();
    ledger.mint('alice', 5n);
    ledger.mint('alice', 7n);
    expect(await ledger.balanceOf('alice')).toBe(12n);
  });
});

describe('ManualClock', () => {
  it('should advance and set forward', async () => {
    const clock = new ManualClock(10);
    expect(await clock.now()).toBe(10);
    expect(clock.advance()).toBe(11);
    expect(clock.advance(4)).toBe(15);
    clock.set(20);
    expect(await clock.now()).toBe(20);
  });

  it('should never move backwards', () => {
    const clock = new ManualClock(10);
    expect(() => clock.set(9)).toThrow('ManualClock cannot move backwards (10 -> 9)');
    expect(() => clock.advance(-1)).toThrow('ManualClock cannot move backwards');
  });
});

describe('SystemClock', () => {
  it('should return unix seconds that never decrease', async () => {
    const clock = new SystemClock();
    const first = await clock.now();
    const second = await clock.now();

    expect(Number.isInteger(first)).toBe(true);
    expect(second).toBeGreaterThanOrEqual(first);
  });
});
