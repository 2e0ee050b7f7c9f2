/**
 * Escrow Persistence Layer
 *
 * Storage for bounties, submissions, the verifier registry and the bounty id
 * sequence.
 * Guarantees:
 * - Atomic commit: every write of one operation lands together or not at all
 * - No deletes: records only ever move forward
 * - Sequence never reused: the id counter only advances on a committed create
 * - Conditional updates: a bounty update applies only if the stored record is
 *   still in the state the caller read
 */

import { Bounty, BountyStatus, Submission, VerifierRecord } from './types.js';

// =============================================================================
// MUTATION BATCH
// =============================================================================

/**
 * All writes produced by a single escrow operation.
 */
export interface EscrowMutation {
  /**
   * Insert a new bounty, or update an existing one when `expectedBounty`
   * is given.
   */
  bounty?: Bounty;
  /** State the stored bounty must still be in for the update to apply. */
  expectedBounty?: BountyExpectation;
  /** Insert or replace a submission record. */
  submission?: Submission;
  /** Insert or replace a verifier registry entry. */
  verifier?: VerifierRecord;
  /**
   * Advance the id sequence. The value is the id the caller allocated;
   * the commit fails if the sequence has moved since it was read.
   */
  advanceBountyIdFrom?: number;
}

export interface BountyExpectation {
  status: BountyStatus;
  /** Reference of the held settlement, or null when none is held. */
  pendingReference: string | null;
}

export function expectationOf(bounty: Bounty): BountyExpectation {
  return { status: bounty.status, pendingReference: bounty.pending_settlement?.reference ?? null };
}

export class SequenceConflictError extends Error {
  constructor(public readonly expected: number, public readonly actual: number) {
    super(`Bounty id sequence moved: expected ${expected}, found ${actual}`);
    this.name = 'SequenceConflictError';
  }
}

/**
 * The stored bounty moved since it was read, or a create hit an existing id.
 */
export class BountyConflictError extends Error {
  constructor(public readonly bountyId: number, public readonly expected: BountyExpectation | null) {
    super(
      expected
        ? `Bounty ${bountyId} is no longer ${expected.status} with settlement ${expected.pendingReference ?? 'none'}`
        : `Bounty ${bountyId} already exists`
    );
    this.name = 'BountyConflictError';
  }
}

// =============================================================================
// PERSISTENCE INTERFACE
// =============================================================================

export interface EscrowPersistence {
  /**
   * Load a bounty by id.
   * Returns null if not found.
   */
  getBounty(id: number): Promise<Bounty | null>;

  /**
   * Load the submission for a (bounty, submitter) pair.
   */
  getSubmission(bountyId: number, submitter: string): Promise<Submission | null>;

  /**
   * All submissions for a bounty, oldest first.
   */
  listSubmissions(bountyId: number): Promise<Submission[]>;

  /**
   * Registry entry for an identity, approved or revoked.
   */
  getVerifier(identity: string): Promise<VerifierRecord | null>;

  /**
   * The id the next created bounty will receive. Starts at 1.
   */
  getNextBountyId(): Promise<number>;

  /**
   * Bounties in any of the given statuses.
   */
  findBountiesByStatus(statuses: readonly BountyStatus[]): Promise<Bounty[]>;

  /**
   * Apply a mutation batch atomically.
   * Throws (and applies nothing) if any part cannot be written.
   */
  commit(mutation: EscrowMutation): Promise<void>;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

function submissionKey(bountyId: number, submitter: string): string {
  return `${bountyId}:${submitter}`;
}

function compareSubmissions(a: Submission, b: Submission): number {
  if (a.submitted_at !== b.submitted_at) {
    return a.submitted_at - b.submitted_at;
  }
  return a.submitter < b.submitter ? -1 : a.submitter > b.submitter ? 1 : 0;
}

/**
 * In-memory persistence for development and tests.
 *
 * WARNING: Data is lost on restart.
 * Production should use PostgreSQL.
 */
export class InMemoryEscrowPersistence implements EscrowPersistence {
  private bounties: Map<number, Bounty> = new Map();
  private submissions: Map<string, Submission> = new Map();
  private verifiers: Map<string, VerifierRecord> = new Map();
  private nextBountyId = 1;

  async getBounty(id: number): Promise<Bounty | null> {
    const bounty = this.bounties.get(id);
    // Return clone to prevent external mutation
    return bounty ? structuredClone(bounty) : null;
  }

  async getSubmission(bountyId: number, submitter: string): Promise<Submission | null> {
    const submission = this.submissions.get(submissionKey(bountyId, submitter));
    return submission ? structuredClone(submission) : null;
  }

  async listSubmissions(bountyId: number): Promise<Submission[]> {
    const results: Submission[] = [];
    for (const submission of this.submissions.values()) {
      if (submission.bounty_id === bountyId) {
        results.push(structuredClone(submission));
      }
    }
    return results.sort(compareSubmissions);
  }

  async getVerifier(identity: string): Promise<VerifierRecord | null> {
    const record = this.verifiers.get(identity);
    return record ? structuredClone(record) : null;
  }

  async getNextBountyId(): Promise<number> {
    return this.nextBountyId;
  }

  async findBountiesByStatus(statuses: readonly BountyStatus[]): Promise<Bounty[]> {
    const results: Bounty[] = [];
    for (const bounty of this.bounties.values()) {
      if (statuses.includes(bounty.status)) {
        results.push(structuredClone(bounty));
      }
    }
    return results;
  }

  async commit(mutation: EscrowMutation): Promise<void> {
    // Check everything that can fail before writing anything
    if (
      mutation.advanceBountyIdFrom !== undefined &&
      mutation.advanceBountyIdFrom !== this.nextBountyId
    ) {
      throw new SequenceConflictError(mutation.advanceBountyIdFrom, this.nextBountyId);
    }
    if (mutation.bounty) {
      this.checkBountyExpectation(mutation.bounty.id, mutation.expectedBounty ?? null);
    }

    if (mutation.advanceBountyIdFrom !== undefined) {
      this.nextBountyId = mutation.advanceBountyIdFrom + 1;
    }
    if (mutation.bounty) {
      this.bounties.set(mutation.bounty.id, structuredClone(mutation.bounty));
    }
    if (mutation.submission) {
      const { bounty_id, submitter } = mutation.submission;
      this.submissions.set(submissionKey(bounty_id, submitter), structuredClone(mutation.submission));
    }
    if (mutation.verifier) {
      this.verifiers.set(mutation.verifier.identity, structuredClone(mutation.verifier));
    }
  }

  private checkBountyExpectation(id: number, expected: BountyExpectation | null): void {
    const stored = this.bounties.get(id);
    if (!expected) {
      if (stored) throw new BountyConflictError(id, null);
      return;
    }
    if (
      !stored ||
      stored.status !== expected.status ||
      (stored.pending_settlement?.reference ?? null) !== expected.pendingReference
    ) {
      throw new BountyConflictError(id, expected);
    }
  }

  // For testing: get counts
  counts(): { bounties: number; submissions: number; verifiers: number } {
    return {
      bounties: this.bounties.size,
      submissions: this.submissions.size,
      verifiers: this.verifiers.size,
    };
  }
}
