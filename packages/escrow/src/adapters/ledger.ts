/**
 * Ledger Adapter
 *
 * The engine's only way to move value. Implementations must be
 * all-or-nothing: a failed transfer leaves both balances unchanged.
 * A transfer that was accepted but not confirmed is neither: it is reported
 * as unconfirmed with its reference, and may still land.
 */

// =============================================================================
// LEDGER INTERFACE
// =============================================================================

export type TransferOutcome =
  | { ok: true; reference?: string }
  | { ok: false; reason: string }
  | { ok: false; unconfirmed: true; reference: string; reason: string };

export type TransferStatus = 'confirmed' | 'failed' | 'pending';

export interface LedgerAdapter {
  /**
   * Value the identity can currently move.
   */
  balanceOf(identity: string): Promise<bigint>;

  /**
   * Move `amount` from one identity to another.
   * Resolves with a failed outcome (or throws) without moving anything
   * if the transfer cannot be completed in full.
   */
  transfer(from: string, to: string, amount: bigint): Promise<TransferOutcome>;

  /**
   * Where a transfer reported as unconfirmed stands now.
   */
  transferStatus(reference: string): Promise<TransferStatus>;
}

// =============================================================================
// IN-MEMORY LEDGER (For testing & development)
// =============================================================================

export interface LedgerTransferRecord {
  reference: string;
  from: string;
  to: string;
  amount: bigint;
}

/**
 * Balance map with atomic transfers.
 *
 * WARNING: Balances are lost on restart. Not a real ledger.
 */
export class InMemoryLedger implements LedgerAdapter {
  private balances: Map<string, bigint> = new Map();
  private history: LedgerTransferRecord[] = [];

  constructor(initialBalances: Record<string, bigint> = {}) {
    for (const [identity, amount] of Object.entries(initialBalances)) {
      this.balances.set(identity, amount);
    }
  }

  async balanceOf(identity: string): Promise<bigint> {
    return this.balances.get(identity) ?? 0n;
  }

  async transfer(from: string, to: string, amount: bigint): Promise<TransferOutcome> {
    if (amount <= 0n) {
      return { ok: false, reason: 'transfer amount must be positive' };
    }
    if (from === to) {
      return { ok: false, reason: 'sender and recipient are the same identity' };
    }

    const fromBalance = this.balances.get(from) ?? 0n;
    if (fromBalance < amount) {
      return { ok: false, reason: `insufficient balance: ${fromBalance} < ${amount}` };
    }

    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);

    const reference = `mem-${this.history.length + 1}`;
    this.history.push({ reference, from, to, amount });
    return { ok: true, reference };
  }

  // Transfers here settle immediately; anything not in the history never happened
  async transferStatus(reference: string): Promise<TransferStatus> {
    return this.history.some((record) => record.reference === reference) ? 'confirmed' : 'failed';
  }

  /** Credit an identity out of thin air. Development seeding only. */
  mint(identity: string, amount: bigint): void {
    this.balances.set(identity, (this.balances.get(identity) ?? 0n) + amount);
  }

  // For testing: completed transfers, oldest first
  getTransfers(): LedgerTransferRecord[] {
    return [...this.history];
  }
}
