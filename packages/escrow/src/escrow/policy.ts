/**
 * Bounty lifecycle and authorization policy.
 *
 * OPEN      --submitWork-->       SUBMITTED
 * OPEN      --cancelBounty-->     CANCELLED  (terminal)
 * SUBMITTED --verifySubmission--> COMPLETED  (terminal)
 */

import { Bounty, BountyStatus } from './types.js';

export const VALID_TRANSITIONS: Readonly<Record<BountyStatus, readonly BountyStatus[]>> = {
  OPEN: ['SUBMITTED', 'CANCELLED'],
  SUBMITTED: ['COMPLETED'],
  COMPLETED: [],
  CANCELLED: [],
};

export function isValidTransition(from: BountyStatus, to: BountyStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: BountyStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

/**
 * Who may approve a submission and release the escrow: the bounty's creator,
 * or any identity the contract owner has approved as a verifier.
 */
export function canResolveBounty(
  caller: string,
  bounty: Pick<Bounty, 'creator'>,
  callerIsVerifier: boolean
): boolean {
  return caller === bounty.creator || callerIsVerifier;
}
