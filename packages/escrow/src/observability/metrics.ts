/**
 * Metrics Interface
 *
 * Write-only signals for observability.
 *
 * HARD CONSTRAINT: The engine must NEVER read metrics or act on them.
 * Metrics are purely for external monitoring.
 *
 * Default implementation is no-op.
 */

import { EscrowOperation, SettlementResolution } from '../escrow/types.js';
import { EscrowErrorCode } from '../escrow/errors.js';

// =============================================================================
// METRICS INTERFACE
// =============================================================================

/**
 * Write-only metrics sink.
 *
 * All methods are fire-and-forget.
 * Implementations must never throw.
 */
export interface EscrowMetrics {
  // =========================================================================
  // Fund movements
  // =========================================================================

  /** Funds locked into escrow by a new bounty. */
  bountyCreated(amount: bigint): void;

  /** Escrow released to a verified submitter. */
  payoutReleased(amount: bigint): void;

  /** Escrow returned to the creator of a cancelled bounty. */
  refundIssued(amount: bigint): void;

  // =========================================================================
  // Records
  // =========================================================================

  workSubmitted(): void;

  verifierUpdated(approved: boolean): void;

  // =========================================================================
  // Operation outcomes
  // =========================================================================

  /** Operation finished, successfully or not. */
  operationCompleted(operation: EscrowOperation, durationMs: number): void;

  /** Operation refused with a tagged error. */
  operationRejected(operation: EscrowOperation, code: EscrowErrorCode): void;

  /** Ledger refused or failed a transfer. */
  transferFailed(operation: EscrowOperation): void;

  /** Ledger accepted a transfer but did not confirm it; the bounty is held. */
  transferUnconfirmed(operation: EscrowOperation): void;

  /** A held bounty was resolved from the ledger's final answer. */
  settlementReconciled(resolution: SettlementResolution): void;

  /** Reverse transfer after a failed commit. */
  compensationIssued(operation: EscrowOperation, succeeded: boolean): void;

  // =========================================================================
  // Custody
  // =========================================================================

  custodyAudited(balanced: boolean, escrowed: bigint): void;
}

// =============================================================================
// NO-OP IMPLEMENTATION (Default)
// =============================================================================

export class NoOpMetrics implements EscrowMetrics {
  bountyCreated(_amount: bigint): void {}
  payoutReleased(_amount: bigint): void {}
  refundIssued(_amount: bigint): void {}

  workSubmitted(): void {}
  verifierUpdated(_approved: boolean): void {}

  operationCompleted(_operation: EscrowOperation, _durationMs: number): void {}
  operationRejected(_operation: EscrowOperation, _code: EscrowErrorCode): void {}
  transferFailed(_operation: EscrowOperation): void {}
  transferUnconfirmed(_operation: EscrowOperation): void {}
  settlementReconciled(_resolution: SettlementResolution): void {}
  compensationIssued(_operation: EscrowOperation, _succeeded: boolean): void {}

  custodyAudited(_balanced: boolean, _escrowed: bigint): void {}
}

// =============================================================================
// CONSOLE METRICS (for development)
// =============================================================================

/**
 * One JSON line per signal on stdout.
 */
export class ConsoleMetrics implements EscrowMetrics {
  private log(category: string, event: string, data: Record<string, unknown>): void {
    console.log(JSON.stringify({
      timestamp: new Date().toISOString(),
      category,
      event,
      ...data,
    }, (_, v) => (typeof v === 'bigint' ? v.toString() : v)));
  }

  bountyCreated(amount: bigint): void {
    this.log('funds', 'locked', { amount });
  }

  payoutReleased(amount: bigint): void {
    this.log('funds', 'released', { amount });
  }

  refundIssued(amount: bigint): void {
    this.log('funds', 'refunded', { amount });
  }

  workSubmitted(): void {
    this.log('submission', 'received', {});
  }

  verifierUpdated(approved: boolean): void {
    this.log('verifier', approved ? 'approved' : 'revoked', {});
  }

  operationCompleted(operation: EscrowOperation, durationMs: number): void {
    this.log('operation', 'completed', { operation, durationMs });
  }

  operationRejected(operation: EscrowOperation, code: EscrowErrorCode): void {
    this.log('operation', 'rejected', { operation, code });
  }

  transferFailed(operation: EscrowOperation): void {
    this.log('ledger', 'transfer_failed', { operation });
  }

  transferUnconfirmed(operation: EscrowOperation): void {
    this.log('ledger', 'transfer_unconfirmed', { operation });
  }

  settlementReconciled(resolution: SettlementResolution): void {
    this.log('ledger', 'settlement_reconciled', { resolution });
  }

  compensationIssued(operation: EscrowOperation, succeeded: boolean): void {
    this.log('ledger', 'compensation', { operation, succeeded });
  }

  custodyAudited(balanced: boolean, escrowed: bigint): void {
    this.log('custody', 'audited', { balanced, escrowed });
  }
}
