/**
 * Bounty Escrow
 *
 * Holds bounty rewards in custody from creation until the creator or an
 * approved verifier releases them to a submitter, or the creator cancels.
 *
 * Design invariants:
 * - Custodian balance equals the sum of OPEN and SUBMITTED bounty amounts
 * - COMPLETED and CANCELLED are terminal
 * - At most one submission per (bounty, submitter)
 * - Every precondition is checked before funds move
 */

// Types
export type {
  BountyStatus,
  EscrowOperation,
  Bounty,
  UnresolvedBounty,
  CompletedBounty,
  Submission,
  VerifierRecord,
  CreateBountyInput,
  SubmitWorkInput,
  TextLimits,
  EscrowConfig,
  EscrowStats,
  CustodyReport,
  PendingSettlement,
  SettlementResolution,
} from './types.js';
export { ESCROWED_STATUSES, DEFAULT_TEXT_LIMITS } from './types.js';

// Errors
export type { EscrowErrorCode, EscrowResult } from './errors.js';
export {
  ESCROW_ERROR_CODES,
  EscrowError,
  success,
  failure,
  isEscrowError,
} from './errors.js';

// Lifecycle policy
export {
  VALID_TRANSITIONS,
  isValidTransition,
  isTerminalStatus,
  canResolveBounty,
} from './policy.js';

// Input checks
export {
  checkIdentity,
  checkCreateBountyInput,
  checkSubmitWorkInput,
} from './validation.js';

// Locks
export {
  BountyLocks,
  bountyLockKey,
  CREATE_LOCK_KEY,
  VERIFIER_LOCK_KEY,
} from './locks.js';

// Persistence
export type { EscrowPersistence, EscrowMutation, BountyExpectation } from './persistence.js';
export {
  InMemoryEscrowPersistence,
  SequenceConflictError,
  BountyConflictError,
  expectationOf,
} from './persistence.js';

// Engine
export type { EscrowEvent, EscrowEventHandler, EscrowEngineDeps } from './engine.js';
export { EscrowEngine } from './engine.js';
