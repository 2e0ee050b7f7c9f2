/**
 * Escrow Types
 *
 * Records, inputs and configuration for the bounty escrow engine.
 * Records use snake_case field names; they are persisted as-is.
 */

// =============================================================================
// STATUS
// =============================================================================

export type BountyStatus =
  | 'OPEN'       // Funded, accepting submissions
  | 'SUBMITTED'  // At least one submission received, awaiting verification
  | 'COMPLETED'  // Paid out to the winner (terminal)
  | 'CANCELLED'; // Refunded to the creator (terminal)

export const ESCROWED_STATUSES: readonly BountyStatus[] = ['OPEN', 'SUBMITTED'];

export type EscrowOperation =
  | 'createBounty'
  | 'submitWork'
  | 'verifySubmission'
  | 'cancelBounty'
  | 'addVerifier'
  | 'removeVerifier'
  | 'reconcileSettlement';

// =============================================================================
// BOUNTY RECORD
// =============================================================================

interface BountyFields {
  id: number;
  creator: string;
  amount: bigint;
  title: string;
  description: string;
  requirements: string;
  deadline: number;       // Clock height; submissions rejected at or after it
  created_at: number;     // Clock height at creation
}

/**
 * A payout or refund the ledger accepted but did not confirm in time.
 * While one is recorded the bounty accepts no other operation until
 * reconcileSettlement resolves it.
 */
export interface PendingSettlement {
  kind: 'payout' | 'refund';
  recipient: string;
  reference: string;      // Ledger reference (tx hash)
  requested_by: string;
}

/**
 * A bounty that has not been paid out. No winner exists yet.
 */
export interface UnresolvedBounty extends BountyFields {
  status: 'OPEN' | 'SUBMITTED' | 'CANCELLED';
  winner: null;
  submission_url: null;
  pending_settlement: PendingSettlement | null;
}

/**
 * A paid-out bounty. Winner and URL are copied from the verified submission.
 */
export interface CompletedBounty extends BountyFields {
  status: 'COMPLETED';
  winner: string;
  submission_url: string;
  pending_settlement: null;
}

export type Bounty = UnresolvedBounty | CompletedBounty;

// =============================================================================
// SUBMISSION RECORD
// =============================================================================

export interface Submission {
  bounty_id: number;
  submitter: string;
  submission_url: string;
  description: string;
  submitted_at: number;   // Clock height
  verified: boolean;
}

// =============================================================================
// VERIFIER REGISTRY
// =============================================================================

export interface VerifierRecord {
  identity: string;
  approved: boolean;
  updated_by: string;
  updated_at: number;     // Unix timestamp ms
}

// =============================================================================
// OPERATION INPUTS
// =============================================================================

export interface CreateBountyInput {
  amount: bigint;
  title: string;
  description: string;
  requirements: string;
  deadline: number;
}

export interface SubmitWorkInput {
  submissionUrl: string;
  description: string;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface TextLimits {
  title: number;
  description: number;
  requirements: number;
  submissionUrl: number;
  submissionDescription: number;
}

export const DEFAULT_TEXT_LIMITS: TextLimits = {
  title: 100,
  description: 500,
  requirements: 500,
  submissionUrl: 200,
  submissionDescription: 500,
};

export interface EscrowConfig {
  /** Identity allowed to manage verifiers. Fixed for the engine's lifetime. */
  contractOwner: string;
  /** Identity that holds escrowed funds on the ledger. */
  custodian: string;
  textLimits?: TextLimits;
  /** Upper bound for ledger balance reads and clock reads (ms). */
  collaboratorTimeoutMs?: number;
}

// =============================================================================
// READ MODELS
// =============================================================================

export interface EscrowStats {
  nextBountyId: number;
  bountyCount: number;
  contractOwner: string;
}

export interface CustodyReport {
  escrowed: bigint;
  custodianBalance: bigint;
  openBounties: number;
  balanced: boolean;
}

/** How reconcileSettlement resolved a held bounty. */
export type SettlementResolution = 'confirmed' | 'failed';
