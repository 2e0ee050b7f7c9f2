/**
 * Escrow Engine
 *
 * Orchestrates the bounty lifecycle: validates preconditions, moves funds
 * through the ledger, and commits record updates.
 *
 * Invariants:
 * 1. Every precondition is checked before any transfer or write
 * 2. At most one transfer per operation, and it happens before the commit
 * 3. A failed transfer aborts with no writes
 * 4. A failed commit after a transfer is compensated by the reverse transfer
 * 5. An unconfirmed payout or refund holds the bounty until reconciled
 * 6. One operation per bounty at a time (BountyLocks); across processes,
 *    commits only apply to the state that was read
 * 7. Mutating operations return EscrowResult and never throw
 */

import { ClockOracle } from '../adapters/clock.js';
import { LedgerAdapter } from '../adapters/ledger.js';
import {
  assertPositiveAmount,
  assertValidTransition,
  sumEscrowed,
} from '../boundaries/invariants.js';
import { DEFAULT_COLLABORATOR_TIMEOUT_MS, withTimeout } from '../execution/timeout.js';
import { EscrowMetrics, NoOpMetrics } from '../observability/metrics.js';
import { createLogger, LogContext, Logger } from '../utils/logger.js';
import { EscrowErrorCode, EscrowResult, failure, success } from './errors.js';
import { BountyLocks, bountyLockKey, CREATE_LOCK_KEY, VERIFIER_LOCK_KEY } from './locks.js';
import { EscrowMutation, EscrowPersistence, expectationOf } from './persistence.js';
import { canResolveBounty } from './policy.js';
import {
  Bounty,
  CompletedBounty,
  CreateBountyInput,
  CustodyReport,
  DEFAULT_TEXT_LIMITS,
  EscrowConfig,
  EscrowOperation,
  EscrowStats,
  ESCROWED_STATUSES,
  PendingSettlement,
  SettlementResolution,
  Submission,
  SubmitWorkInput,
  TextLimits,
  UnresolvedBounty,
} from './types.js';
import { checkCreateBountyInput, checkIdentity, checkSubmitWorkInput } from './validation.js';

// =============================================================================
// ENGINE EVENTS
// =============================================================================

export type EscrowEvent =
  | { type: 'BOUNTY_CREATED'; bountyId: number; creator: string; amount: bigint }
  | { type: 'WORK_SUBMITTED'; bountyId: number; submitter: string }
  | { type: 'SUBMISSION_VERIFIED'; bountyId: number; submitter: string; verifiedBy: string; amount: bigint }
  | { type: 'BOUNTY_CANCELLED'; bountyId: number; creator: string; amount: bigint }
  | { type: 'VERIFIER_UPDATED'; identity: string; approved: boolean; updatedBy: string }
  | { type: 'OPERATION_REJECTED'; operation: EscrowOperation; code: EscrowErrorCode; message: string };

export type EscrowEventHandler = (event: EscrowEvent) => void;

// =============================================================================
// DEPENDENCIES
// =============================================================================

export interface EscrowEngineDeps {
  persistence: EscrowPersistence;
  ledger: LedgerAdapter;
  clock: ClockOracle;
  logger?: Logger;
  metrics?: EscrowMetrics;
}

interface PlannedTransfer {
  from: string;
  to: string;
  amount: bigint;
}

type FundMovement =
  | { state: 'moved'; reference?: string }
  | { state: 'unconfirmed'; reference: string; reason: string }
  | { state: 'rejected'; result: EscrowResult<never> };

function heldMessage(bounty: Bounty): string | null {
  const held = bounty.pending_settlement;
  return held
    ? `Bounty ${bounty.id} is held until unconfirmed ${held.kind} ${held.reference} is reconciled`
    : null;
}

// =============================================================================
// ESCROW ENGINE
// =============================================================================

export class EscrowEngine {
  private readonly contractOwner: string;
  private readonly custodian: string;
  private readonly textLimits: TextLimits;
  private readonly collaboratorTimeoutMs: number;

  private persistence: EscrowPersistence;
  private ledger: LedgerAdapter;
  private clock: ClockOracle;
  private logger: Logger;
  private metrics: EscrowMetrics;
  private locks = new BountyLocks();
  private eventHandlers: EscrowEventHandler[] = [];

  constructor(config: EscrowConfig, deps: EscrowEngineDeps) {
    this.contractOwner = config.contractOwner;
    this.custodian = config.custodian;
    this.textLimits = config.textLimits ?? DEFAULT_TEXT_LIMITS;
    this.collaboratorTimeoutMs = config.collaboratorTimeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS;

    this.persistence = deps.persistence;
    this.ledger = deps.ledger;
    this.clock = deps.clock;
    this.logger = deps.logger ?? createLogger();
    this.metrics = deps.metrics ?? new NoOpMetrics();
  }

  /**
   * Subscribe to engine events.
   */
  onEvent(handler: EscrowEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EscrowEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ event: event.type, error }, 'Event handler error');
      }
    }
  }

  // ===========================================================================
  // MUTATING OPERATIONS
  // ===========================================================================

  /**
   * Lock `amount` from the creator into escrow and open a bounty.
   * Returns the new bounty id.
   */
  async createBounty(creator: string, input: CreateBountyInput): Promise<EscrowResult<number>> {
    const ctx: LogContext = { operation: 'createBounty', caller: creator };

    return this.run('createBounty', CREATE_LOCK_KEY, ctx, async () => {
      const problem = checkIdentity(creator, 'creator') ?? checkCreateBountyInput(input, this.textLimits);
      if (problem) {
        return failure('InvalidInput', problem);
      }

      const balance = await this.readBalance(creator);
      if (balance < input.amount) {
        return failure('InsufficientFunds', `Creator balance ${balance} is below ${input.amount}`);
      }

      const now = await this.readClock();
      if (input.deadline <= now) {
        return failure('DeadlinePassed', `Deadline ${input.deadline} is not after current height ${now}`);
      }

      const id = await this.persistence.getNextBountyId();
      assertPositiveAmount(id, input.amount);
      const transfer: PlannedTransfer = { from: creator, to: this.custodian, amount: input.amount };

      const moved = await this.moveFunds('createBounty', transfer, { ...ctx, bountyId: id });
      if (moved.state === 'rejected') {
        return moved.result;
      }
      if (moved.state === 'unconfirmed') {
        // No bounty exists to hold; the deposit shows up as custody surplus
        this.logger.error(
          { ...ctx, bountyId: id, reference: moved.reference, amount: input.amount },
          'Unconfirmed deposit needs manual reconciliation'
        );
        return failure('TransferPending', `Deposit ${moved.reference} is unconfirmed; no bounty was opened`, {
          reference: moved.reference,
        });
      }

      const bounty: UnresolvedBounty = {
        id,
        creator,
        amount: input.amount,
        title: input.title,
        description: input.description,
        requirements: input.requirements,
        deadline: input.deadline,
        status: 'OPEN',
        winner: null,
        submission_url: null,
        created_at: now,
        pending_settlement: null,
      };

      const committed = await this.commitAfterTransfer(
        'createBounty',
        { bounty, advanceBountyIdFrom: id },
        transfer,
        { ...ctx, bountyId: id }
      );
      if (!committed.ok) {
        return committed;
      }

      this.metrics.bountyCreated(bounty.amount);
      this.logger.info({ ...ctx, bountyId: id, amount: bounty.amount, deadline: bounty.deadline }, 'Bounty created');
      this.emit({ type: 'BOUNTY_CREATED', bountyId: id, creator, amount: bounty.amount });
      return success(id);
    });
  }

  /**
   * Record a submission. The first accepted submission moves the bounty
   * from OPEN to SUBMITTED.
   */
  async submitWork(
    bountyId: number,
    submitter: string,
    input: SubmitWorkInput
  ): Promise<EscrowResult<true>> {
    const ctx: LogContext = { operation: 'submitWork', bountyId, submitter };

    return this.run('submitWork', bountyLockKey(bountyId), ctx, async () => {
      const problem = checkIdentity(submitter, 'submitter') ?? checkSubmitWorkInput(input, this.textLimits);
      if (problem) {
        return failure('InvalidInput', problem);
      }

      const bounty = await this.persistence.getBounty(bountyId);
      if (!bounty) {
        return failure('BountyNotFound', `Bounty ${bountyId} not found`);
      }

      // Checked before status: a repeat submitter is told about their own
      // submission, not that the bounty has moved on because of it
      const existing = await this.persistence.getSubmission(bountyId, submitter);
      if (existing) {
        return failure('AlreadySubmitted', `${submitter} already submitted to bounty ${bountyId}`);
      }

      if (bounty.status !== 'OPEN') {
        return failure('BountyNotOpen', `Bounty ${bountyId} is ${bounty.status}`);
      }
      const held = heldMessage(bounty);
      if (held) {
        return failure('BountyNotOpen', held);
      }

      const now = await this.readClock();
      if (now >= bounty.deadline) {
        return failure('DeadlinePassed', `Bounty ${bountyId} closed at height ${bounty.deadline}`);
      }

      const submission: Submission = {
        bounty_id: bountyId,
        submitter,
        submission_url: input.submissionUrl,
        description: input.description,
        submitted_at: now,
        verified: false,
      };
      assertValidTransition(bountyId, bounty.status, 'SUBMITTED');
      const updated: UnresolvedBounty = { ...bounty, status: 'SUBMITTED' };

      await this.persistence.commit({ bounty: updated, expectedBounty: expectationOf(bounty), submission });

      this.metrics.workSubmitted();
      this.logger.info({ ...ctx, url: submission.submission_url }, 'Work submitted');
      this.emit({ type: 'WORK_SUBMITTED', bountyId, submitter });
      return success(true);
    });
  }

  /**
   * Approve `submitter`'s work and release the escrow to them.
   * Allowed for the bounty creator and approved verifiers, only while the
   * bounty is SUBMITTED; a second verification therefore cannot pay twice.
   */
  async verifySubmission(
    bountyId: number,
    submitter: string,
    caller: string
  ): Promise<EscrowResult<true>> {
    const ctx: LogContext = { operation: 'verifySubmission', bountyId, submitter, caller };

    return this.run('verifySubmission', bountyLockKey(bountyId), ctx, async () => {
      const bounty = await this.persistence.getBounty(bountyId);
      if (!bounty) {
        return failure('BountyNotFound', `Bounty ${bountyId} not found`);
      }

      const submission = await this.persistence.getSubmission(bountyId, submitter);
      if (!submission) {
        return failure('SubmissionNotFound', `No submission from ${submitter} on bounty ${bountyId}`);
      }

      const callerIsVerifier = caller !== bounty.creator && (await this.isVerifier(caller));
      if (!canResolveBounty(caller, bounty, callerIsVerifier)) {
        return failure('NotAuthorized', `${caller} may not verify bounty ${bountyId}`);
      }

      if (bounty.status !== 'SUBMITTED') {
        return failure('InvalidStatus', `Bounty ${bountyId} is ${bounty.status}, expected SUBMITTED`);
      }
      const held = heldMessage(bounty);
      if (held) {
        return failure('InvalidStatus', held);
      }

      const transfer: PlannedTransfer = { from: this.custodian, to: submitter, amount: bounty.amount };
      const moved = await this.moveFunds('verifySubmission', transfer, ctx);
      if (moved.state === 'rejected') {
        return moved.result;
      }
      if (moved.state === 'unconfirmed') {
        return this.holdForSettlement<true>(
          'verifySubmission',
          bounty,
          { kind: 'payout', recipient: submitter, reference: moved.reference, requested_by: caller },
          ctx
        );
      }

      assertValidTransition(bountyId, bounty.status, 'COMPLETED');
      const completed: CompletedBounty = {
        ...bounty,
        status: 'COMPLETED',
        winner: submitter,
        submission_url: submission.submission_url,
        pending_settlement: null,
      };

      const committed = await this.commitAfterTransfer(
        'verifySubmission',
        { bounty: completed, expectedBounty: expectationOf(bounty), submission: { ...submission, verified: true } },
        transfer,
        ctx
      );
      if (!committed.ok) {
        return committed;
      }

      this.metrics.payoutReleased(bounty.amount);
      this.logger.info({ ...ctx, amount: bounty.amount, reference: moved.reference }, 'Submission verified, escrow released');
      this.emit({ type: 'SUBMISSION_VERIFIED', bountyId, submitter, verifiedBy: caller, amount: bounty.amount });
      return success(true);
    });
  }

  /**
   * Withdraw an OPEN bounty and refund its creator.
   */
  async cancelBounty(bountyId: number, caller: string): Promise<EscrowResult<true>> {
    const ctx: LogContext = { operation: 'cancelBounty', bountyId, caller };

    return this.run('cancelBounty', bountyLockKey(bountyId), ctx, async () => {
      const bounty = await this.persistence.getBounty(bountyId);
      if (!bounty) {
        return failure('BountyNotFound', `Bounty ${bountyId} not found`);
      }

      if (caller !== bounty.creator) {
        return failure('NotAuthorized', `Only the creator may cancel bounty ${bountyId}`);
      }

      if (bounty.status !== 'OPEN') {
        return failure('InvalidStatus', `Bounty ${bountyId} is ${bounty.status}, expected OPEN`);
      }
      const held = heldMessage(bounty);
      if (held) {
        return failure('InvalidStatus', held);
      }

      const transfer: PlannedTransfer = { from: this.custodian, to: bounty.creator, amount: bounty.amount };
      const moved = await this.moveFunds('cancelBounty', transfer, ctx);
      if (moved.state === 'rejected') {
        return moved.result;
      }
      if (moved.state === 'unconfirmed') {
        return this.holdForSettlement<true>(
          'cancelBounty',
          bounty,
          { kind: 'refund', recipient: bounty.creator, reference: moved.reference, requested_by: caller },
          ctx
        );
      }

      assertValidTransition(bountyId, bounty.status, 'CANCELLED');
      const cancelled: UnresolvedBounty = { ...bounty, status: 'CANCELLED' };

      const committed = await this.commitAfterTransfer(
        'cancelBounty',
        { bounty: cancelled, expectedBounty: expectationOf(bounty) },
        transfer,
        ctx
      );
      if (!committed.ok) {
        return committed;
      }

      this.metrics.refundIssued(bounty.amount);
      this.logger.info({ ...ctx, amount: bounty.amount, reference: moved.reference }, 'Bounty cancelled, escrow refunded');
      this.emit({ type: 'BOUNTY_CANCELLED', bountyId, creator: bounty.creator, amount: bounty.amount });
      return success(true);
    });
  }

  /**
   * Resolve a bounty held by an unconfirmed payout or refund, using what the
   * ledger now reports for that transfer. A confirmed transfer completes the
   * operation that started it; a failed one releases the hold and leaves the
   * bounty as it was. Allowed for the contract owner and the bounty creator.
   */
  async reconcileSettlement(bountyId: number, caller: string): Promise<EscrowResult<SettlementResolution>> {
    const ctx: LogContext = { operation: 'reconcileSettlement', bountyId, caller };

    return this.run('reconcileSettlement', bountyLockKey(bountyId), ctx, async () => {
      const bounty = await this.persistence.getBounty(bountyId);
      if (!bounty) {
        return failure('BountyNotFound', `Bounty ${bountyId} not found`);
      }

      if (caller !== this.contractOwner && caller !== bounty.creator) {
        return failure('NotAuthorized', `${caller} may not reconcile bounty ${bountyId}`);
      }

      if (bounty.status === 'COMPLETED' || bounty.pending_settlement === null) {
        return failure('InvalidStatus', `Bounty ${bountyId} has no unconfirmed transfer`);
      }
      const held = bounty.pending_settlement;

      const status = await withTimeout(
        () => this.ledger.transferStatus(held.reference),
        this.collaboratorTimeoutMs,
        'ledger'
      );
      const settleCtx: LogContext = { ...ctx, reference: held.reference, kind: held.kind };

      if (status === 'pending') {
        return failure('TransferPending', `Transfer ${held.reference} is still unconfirmed`, {
          reference: held.reference,
        });
      }

      if (status === 'failed') {
        await this.persistence.commit({
          bounty: { ...bounty, pending_settlement: null },
          expectedBounty: expectationOf(bounty),
        });
        this.metrics.settlementReconciled('failed');
        this.logger.warn(settleCtx, 'Unconfirmed transfer failed, hold released');
        return success<SettlementResolution>('failed');
      }

      if (held.kind === 'refund') {
        assertValidTransition(bountyId, bounty.status, 'CANCELLED');
        await this.persistence.commit({
          bounty: { ...bounty, status: 'CANCELLED', pending_settlement: null },
          expectedBounty: expectationOf(bounty),
        });
        this.metrics.settlementReconciled('confirmed');
        this.metrics.refundIssued(bounty.amount);
        this.logger.info(settleCtx, 'Unconfirmed refund confirmed, bounty cancelled');
        this.emit({ type: 'BOUNTY_CANCELLED', bountyId, creator: bounty.creator, amount: bounty.amount });
        return success<SettlementResolution>('confirmed');
      }

      const submission = await this.persistence.getSubmission(bountyId, held.recipient);
      if (!submission) {
        return failure('SubmissionNotFound', `No submission from ${held.recipient} on bounty ${bountyId}`);
      }

      assertValidTransition(bountyId, bounty.status, 'COMPLETED');
      const completed: CompletedBounty = {
        ...bounty,
        status: 'COMPLETED',
        winner: held.recipient,
        submission_url: submission.submission_url,
        pending_settlement: null,
      };
      await this.persistence.commit({
        bounty: completed,
        expectedBounty: expectationOf(bounty),
        submission: { ...submission, verified: true },
      });

      this.metrics.settlementReconciled('confirmed');
      this.metrics.payoutReleased(bounty.amount);
      this.logger.info(settleCtx, 'Unconfirmed payout confirmed, bounty completed');
      this.emit({
        type: 'SUBMISSION_VERIFIED',
        bountyId,
        submitter: held.recipient,
        verifiedBy: held.requested_by,
        amount: bounty.amount,
      });
      return success<SettlementResolution>('confirmed');
    });
  }

  async addVerifier(caller: string, identity: string): Promise<EscrowResult<true>> {
    return this.setVerifier('addVerifier', caller, identity, true);
  }

  /**
   * Soft revoke: the registry entry stays, with approved = false.
   */
  async removeVerifier(caller: string, identity: string): Promise<EscrowResult<true>> {
    return this.setVerifier('removeVerifier', caller, identity, false);
  }

  private async setVerifier(
    operation: 'addVerifier' | 'removeVerifier',
    caller: string,
    identity: string,
    approved: boolean
  ): Promise<EscrowResult<true>> {
    const ctx: LogContext = { operation, caller, identity };

    return this.run(operation, VERIFIER_LOCK_KEY, ctx, async () => {
      if (caller !== this.contractOwner) {
        return failure('NotAuthorized', 'Only the contract owner may manage verifiers');
      }

      const problem = checkIdentity(identity, 'identity');
      if (problem) {
        return failure('InvalidInput', problem);
      }

      await this.persistence.commit({
        verifier: { identity, approved, updated_by: caller, updated_at: Date.now() },
      });

      this.metrics.verifierUpdated(approved);
      this.logger.info(ctx, approved ? 'Verifier approved' : 'Verifier revoked');
      this.emit({ type: 'VERIFIER_UPDATED', identity, approved, updatedBy: caller });
      return success(true);
    });
  }

  // ===========================================================================
  // READ-ONLY OPERATIONS
  // ===========================================================================

  async getBounty(bountyId: number): Promise<Bounty | null> {
    return this.persistence.getBounty(bountyId);
  }

  async getSubmission(bountyId: number, submitter: string): Promise<Submission | null> {
    return this.persistence.getSubmission(bountyId, submitter);
  }

  async listSubmissions(bountyId: number): Promise<Submission[]> {
    return this.persistence.listSubmissions(bountyId);
  }

  async isVerifier(identity: string): Promise<boolean> {
    const record = await this.persistence.getVerifier(identity);
    return record?.approved ?? false;
  }

  async getNextBountyId(): Promise<number> {
    return this.persistence.getNextBountyId();
  }

  getContractOwner(): string {
    return this.contractOwner;
  }

  getCustodian(): string {
    return this.custodian;
  }

  async getBountyCount(): Promise<number> {
    return (await this.persistence.getNextBountyId()) - 1;
  }

  async getStats(): Promise<EscrowStats> {
    const nextBountyId = await this.persistence.getNextBountyId();
    return {
      nextBountyId,
      bountyCount: nextBountyId - 1,
      contractOwner: this.contractOwner,
    };
  }

  /**
   * Compare what the records say is escrowed with what the custodian holds.
   * An imbalance is reported, never corrected.
   */
  async auditCustody(): Promise<CustodyReport> {
    const escrowedBounties = await this.persistence.findBountiesByStatus(ESCROWED_STATUSES);
    const escrowed = sumEscrowed(escrowedBounties);
    const custodianBalance = await this.readBalance(this.custodian);
    const balanced = escrowed === custodianBalance;

    this.metrics.custodyAudited(balanced, escrowed);
    if (!balanced) {
      this.logger.error(
        { escrowed, custodianBalance, openBounties: escrowedBounties.length },
        'Custody imbalance: escrowed total does not match custodian balance'
      );
    }

    return { escrowed, custodianBalance, openBounties: escrowedBounties.length, balanced };
  }

  // ===========================================================================
  // PRIVATE: Operation Envelope
  // ===========================================================================

  /**
   * Serialize on `lockKey`, time the operation, and turn anything thrown
   * before funds moved into ServiceUnavailable.
   */
  private async run<T>(
    operation: EscrowOperation,
    lockKey: string,
    ctx: LogContext,
    body: () => Promise<EscrowResult<T>>
  ): Promise<EscrowResult<T>> {
    const startedAt = Date.now();

    let result: EscrowResult<T>;
    try {
      result = await this.locks.runExclusive(lockKey, body);
    } catch (error) {
      this.logger.error({ ...ctx, error }, 'Escrow operation aborted');
      result = failure('ServiceUnavailable', `${operation} could not be completed`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    this.metrics.operationCompleted(operation, Date.now() - startedAt);
    if (!result.ok) {
      this.metrics.operationRejected(operation, result.error.code);
      this.logger.debug({ ...ctx, code: result.error.code }, result.error.message);
      this.emit({
        type: 'OPERATION_REJECTED',
        operation,
        code: result.error.code,
        message: result.error.message,
      });
    }
    return result;
  }

  // ===========================================================================
  // PRIVATE: Fund Movement
  // ===========================================================================

  private async moveFunds(
    operation: EscrowOperation,
    transfer: PlannedTransfer,
    ctx: LogContext
  ): Promise<FundMovement> {
    let reason: string;
    try {
      const outcome = await this.ledger.transfer(transfer.from, transfer.to, transfer.amount);
      if (outcome.ok) {
        return { state: 'moved', reference: outcome.reference };
      }
      if ('unconfirmed' in outcome) {
        this.metrics.transferUnconfirmed(operation);
        this.logger.warn(
          { ...ctx, from: transfer.from, to: transfer.to, amount: transfer.amount, reference: outcome.reference },
          'Ledger transfer unconfirmed'
        );
        return { state: 'unconfirmed', reference: outcome.reference, reason: outcome.reason };
      }
      reason = outcome.reason;
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
    }

    this.metrics.transferFailed(operation);
    this.logger.warn({ ...ctx, from: transfer.from, to: transfer.to, amount: transfer.amount, reason }, 'Ledger transfer failed');
    return { state: 'rejected', result: failure('TransferFailed', `Ledger transfer failed: ${reason}`) };
  }

  /**
   * Record an unconfirmed payout or refund on the bounty. The bounty keeps
   * its status and refuses further operations until reconcileSettlement.
   */
  private async holdForSettlement<T>(
    operation: EscrowOperation,
    bounty: UnresolvedBounty,
    settlement: PendingSettlement,
    ctx: LogContext
  ): Promise<EscrowResult<T>> {
    const details = { reference: settlement.reference };
    try {
      await this.persistence.commit({
        bounty: { ...bounty, pending_settlement: settlement },
        expectedBounty: expectationOf(bounty),
      });
    } catch (error) {
      // Nothing can be reversed while the transfer is unconfirmed
      this.logger.error(
        { ...ctx, error, reference: settlement.reference, recipient: settlement.recipient, amount: bounty.amount },
        'Unconfirmed transfer could not be recorded'
      );
      return failure('ServiceUnavailable', 'Escrow records could not be saved', { ...details, held: false });
    }

    this.logger.warn({ ...ctx, reference: settlement.reference, kind: settlement.kind }, 'Bounty held for unconfirmed transfer');
    return failure(
      'TransferPending',
      `${operation} sent ${settlement.reference} but it is unconfirmed; bounty ${bounty.id} is held until reconciled`,
      details
    );
  }

  /**
   * Commit the records for a transfer that already happened. If the commit
   * fails, the transfer is reversed so funds and records stay in step.
   */
  private async commitAfterTransfer(
    operation: EscrowOperation,
    mutation: EscrowMutation,
    transfer: PlannedTransfer,
    ctx: LogContext
  ): Promise<EscrowResult<void>> {
    try {
      await this.persistence.commit(mutation);
      return success(undefined);
    } catch (error) {
      this.logger.error({ ...ctx, error }, 'Commit failed after transfer, reversing');
    }

    let compensated = false;
    let reason = '';
    try {
      const outcome = await this.ledger.transfer(transfer.to, transfer.from, transfer.amount);
      compensated = outcome.ok;
      reason = outcome.ok ? '' : outcome.reason;
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
    }

    this.metrics.compensationIssued(operation, compensated);
    if (!compensated) {
      this.logger.error(
        { ...ctx, from: transfer.to, to: transfer.from, amount: transfer.amount, reason },
        'Custody compensation failed'
      );
    }

    return failure('ServiceUnavailable', 'Escrow records could not be saved', { compensated });
  }

  // ===========================================================================
  // PRIVATE: Collaborator Reads
  // ===========================================================================

  private readBalance(identity: string): Promise<bigint> {
    return withTimeout(() => this.ledger.balanceOf(identity), this.collaboratorTimeoutMs, 'ledger');
  }

  private readClock(): Promise<number> {
    return withTimeout(() => this.clock.now(), this.collaboratorTimeoutMs, 'clock');
  }
}
