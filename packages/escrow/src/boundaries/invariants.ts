/**
 * Escrow Boundary Invariants
 *
 * Runtime guards for the custody rules. These are NON-NEGOTIABLE:
 *
 * 1. Escrowed value equals the sum of OPEN and SUBMITTED bounty amounts
 * 2. Status only moves along the lifecycle edges; terminal stays terminal
 * 3. Winner and submission URL exist exactly when a bounty is COMPLETED
 * 4. Funds never move without the matching record update, and vice versa
 *
 * A violation means a bug in the engine or corrupted storage, not a caller
 * mistake; caller mistakes are EscrowErrors.
 */

import { Bounty, BountyStatus, ESCROWED_STATUSES } from '../escrow/types.js';
import { isValidTransition } from '../escrow/policy.js';

// =============================================================================
// INVARIANT VIOLATION
// =============================================================================

export class InvariantViolation extends Error {
  constructor(
    public readonly invariant: string,
    public readonly details: string
  ) {
    super(`INVARIANT VIOLATION: ${invariant}: ${details}`);
    this.name = 'InvariantViolation';
  }
}

// =============================================================================
// ASSERTIONS
// =============================================================================

/**
 * Call before committing a status change.
 */
export function assertValidTransition(
  bountyId: number,
  from: BountyStatus,
  to: BountyStatus
): void {
  if (!isValidTransition(from, to)) {
    throw new InvariantViolation(
      'STATUS_TRANSITION',
      `bounty ${bountyId} cannot move from ${from} to ${to}`
    );
  }
}

/**
 * Check stored resolution columns against the completion rule: winner and
 * submission URL are present exactly when the bounty is COMPLETED.
 */
export function assertResolutionFields(
  bountyId: number,
  status: BountyStatus,
  winner: string | null,
  submissionUrl: string | null
): void {
  const resolved = winner !== null && submissionUrl !== null;
  const unresolved = winner === null && submissionUrl === null;

  if (status === 'COMPLETED' ? !resolved : !unresolved) {
    throw new InvariantViolation(
      'RESOLUTION_FIELDS',
      `bounty ${bountyId} in ${status} has winner=${winner} submission_url=${submissionUrl}`
    );
  }
}

export function assertPositiveAmount(bountyId: number, amount: bigint): void {
  if (amount <= 0n) {
    throw new InvariantViolation('POSITIVE_AMOUNT', `bounty ${bountyId} holds ${amount}`);
  }
}

// =============================================================================
// CUSTODY ARITHMETIC
// =============================================================================

/**
 * Value the custodian must hold for these bounties.
 */
export function sumEscrowed(bounties: readonly Bounty[]): bigint {
  let total = 0n;
  for (const bounty of bounties) {
    if (ESCROWED_STATUSES.includes(bounty.status)) {
      total += bounty.amount;
    }
  }
  return total;
}
