/**
 * Metrics Tests
 *
 * Proves:
 * - Metrics are write-only signals
 * - Default no-op implementation exists
 * - Console metrics emit one JSON line per signal, amounts as strings
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleMetrics, EscrowMetrics, NoOpMetrics } from '../../src/observability/metrics.js';

function exercise(metrics: EscrowMetrics): void {
  metrics.bountyCreated(1000n);
  metrics.payoutReleased(1000n);
  metrics.refundIssued(250n);
  metrics.workSubmitted();
  metrics.verifierUpdated(true);
  metrics.operationCompleted('createBounty', 12);
  metrics.operationRejected('submitWork', 'DeadlinePassed');
  metrics.transferFailed('verifySubmission');
  metrics.compensationIssued('cancelBounty', false);
  metrics.custodyAudited(true, 0n);
  metrics.transferUnconfirmed('verifySubmission');
  metrics.settlementReconciled('confirmed');
}

describe('NoOpMetrics', () => {
  it('should implement all methods without side effects', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(() => exercise(new NoOpMetrics())).not.toThrow();
    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });
});

describe('ConsoleMetrics', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log one JSON line per signal', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    exercise(new ConsoleMetrics());

    expect(consoleSpy).toHaveBeenCalledTimes(12);
  });

  it('should serialize amounts as decimal strings', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    new ConsoleMetrics().bountyCreated(123456789012345678901234567890n);

    const entry = JSON.parse(String(consoleSpy.mock.calls[0][0]));
    expect(entry.category).toBe('funds');
    expect(entry.event).toBe('locked');
    expect(entry.amount).toBe('123456789012345678901234567890');
  });

  it('should tag unconfirmed transfers and their reconciliation', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const metrics = new ConsoleMetrics();

    metrics.transferUnconfirmed('cancelBounty');
    metrics.settlementReconciled('failed');

    expect(JSON.parse(String(consoleSpy.mock.calls[0][0]))).toMatchObject({
      category: 'ledger',
      event: 'transfer_unconfirmed',
      operation: 'cancelBounty',
    });
    expect(JSON.parse(String(consoleSpy.mock.calls[1][0]))).toMatchObject({
      category: 'ledger',
      event: 'settlement_reconciled',
      resolution: 'failed',
    });
  });

  it('should tag rejections with operation and code', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    new ConsoleMetrics().operationRejected('cancelBounty', 'NotAuthorized');

    const entry = JSON.parse(String(consoleSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      category: 'operation',
      event: 'rejected',
      operation: 'cancelBounty',
      code: 'NotAuthorized',
    });
  });
});
