/**
 * PostgreSQL Escrow Persistence
 *
 * One transaction per commit. The bounty id counter advances with a
 * compare-and-set, so a create that lost a race rolls back whole. Bounty
 * updates carry the state they were read in; an update that finds the row
 * moved by another writer rolls back the same way.
 *
 * Column conventions:
 * - amount is NUMERIC and travels as a decimal string
 * - deadline, created_at, submitted_at, updated_at are BIGINT (pg returns strings)
 */

import { assertResolutionFields } from '../../boundaries/invariants.js';
import {
  BountyConflictError,
  EscrowMutation,
  EscrowPersistence,
  SequenceConflictError,
} from '../../escrow/persistence.js';
import {
  Bounty,
  BountyStatus,
  PendingSettlement,
  Submission,
  VerifierRecord,
} from '../../escrow/types.js';
import { SCHEMA_SQL } from './schema.js';

// =============================================================================
// SQL CLIENT
// =============================================================================

export interface SqlQueryResult {
  rows: unknown[];
  rowCount: number | null;
}

/**
 * The part of a pg client this store uses. pg's Pool and PoolClient fit it.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

const NEXT_BOUNTY_ID = 'next_bounty_id';

// =============================================================================
// ROW DECODING
// =============================================================================

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null;
}

function rowsOf(result: SqlQueryResult): Row[] {
  return result.rows.map((row) => {
    if (!isRow(row)) {
      throw new Error('Unexpected row shape from database');
    }
    return row;
  });
}

function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not text`);
  }
  return value;
}

function readNullableString(row: Row, column: string): string | null {
  return row[column] === null || row[column] === undefined ? null : readString(row, column);
}

function readInteger(row: Row, column: string): number {
  const value = row[column];
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
    throw new Error(`Column ${column} is not an integer`);
  }
  return parsed;
}

function readAmount(row: Row, column: string): bigint {
  const value = row[column];
  if (typeof value === 'string' || typeof value === 'number') {
    return BigInt(value);
  }
  throw new Error(`Column ${column} is not numeric`);
}

function readBoolean(row: Row, column: string): boolean {
  const value = row[column];
  if (typeof value !== 'boolean') {
    throw new Error(`Column ${column} is not boolean`);
  }
  return value;
}

function readStatus(row: Row): BountyStatus {
  const value = row.status;
  switch (value) {
    case 'OPEN':
    case 'SUBMITTED':
    case 'COMPLETED':
    case 'CANCELLED':
      return value;
    default:
      throw new Error(`Unknown bounty status: ${String(value)}`);
  }
}

function readSettlement(row: Row): PendingSettlement | null {
  const reference = readNullableString(row, 'pending_reference');
  if (reference === null) {
    return null;
  }
  const kind = row.pending_kind;
  if (kind !== 'payout' && kind !== 'refund') {
    throw new Error(`Unknown settlement kind: ${String(kind)}`);
  }
  return {
    kind,
    recipient: readString(row, 'pending_recipient'),
    reference,
    requested_by: readString(row, 'pending_requested_by'),
  };
}

function settlementColumns(settlement: PendingSettlement | null): Array<string | null> {
  return settlement
    ? [settlement.kind, settlement.recipient, settlement.reference, settlement.requested_by]
    : [null, null, null, null];
}

function rowToBounty(row: Row): Bounty {
  const id = readInteger(row, 'id');
  const status = readStatus(row);
  const winner = readNullableString(row, 'winner');
  const submissionUrl = readNullableString(row, 'submission_url');
  assertResolutionFields(id, status, winner, submissionUrl);

  const fields = {
    id,
    creator: readString(row, 'creator'),
    amount: readAmount(row, 'amount'),
    title: readString(row, 'title'),
    description: readString(row, 'description'),
    requirements: readString(row, 'requirements'),
    deadline: readInteger(row, 'deadline'),
    created_at: readInteger(row, 'created_at'),
  };

  const settlement = readSettlement(row);
  if (status === 'COMPLETED') {
    if (settlement) {
      throw new Error(`Completed bounty ${id} still holds settlement ${settlement.reference}`);
    }
    return {
      ...fields,
      status,
      winner: readString(row, 'winner'),
      submission_url: readString(row, 'submission_url'),
      pending_settlement: null,
    };
  }
  return { ...fields, status, winner: null, submission_url: null, pending_settlement: settlement };
}

function rowToSubmission(row: Row): Submission {
  return {
    bounty_id: readInteger(row, 'bounty_id'),
    submitter: readString(row, 'submitter'),
    submission_url: readString(row, 'submission_url'),
    description: readString(row, 'description'),
    submitted_at: readInteger(row, 'submitted_at'),
    verified: readBoolean(row, 'verified'),
  };
}

function rowToVerifier(row: Row): VerifierRecord {
  return {
    identity: readString(row, 'identity'),
    approved: readBoolean(row, 'approved'),
    updated_by: readString(row, 'updated_by'),
    updated_at: readInteger(row, 'updated_at'),
  };
}

// =============================================================================
// POSTGRES PERSISTENCE
// =============================================================================

export class PostgresEscrowPersistence implements EscrowPersistence {
  constructor(private readonly pool: SqlPool) {}

  /**
   * Create tables and seed the id counter if missing.
   */
  async ensureSchema(): Promise<void> {
    await this.pool.query(SCHEMA_SQL);
  }

  async getBounty(id: number): Promise<Bounty | null> {
    const result = await this.pool.query('SELECT * FROM escrow_bounties WHERE id = $1', [id]);
    const [row] = rowsOf(result);
    return row ? rowToBounty(row) : null;
  }

  async getSubmission(bountyId: number, submitter: string): Promise<Submission | null> {
    const result = await this.pool.query(
      'SELECT * FROM escrow_submissions WHERE bounty_id = $1 AND submitter = $2',
      [bountyId, submitter]
    );
    const [row] = rowsOf(result);
    return row ? rowToSubmission(row) : null;
  }

  async listSubmissions(bountyId: number): Promise<Submission[]> {
    const result = await this.pool.query(
      'SELECT * FROM escrow_submissions WHERE bounty_id = $1 ORDER BY submitted_at ASC, submitter ASC',
      [bountyId]
    );
    return rowsOf(result).map(rowToSubmission);
  }

  async getVerifier(identity: string): Promise<VerifierRecord | null> {
    const result = await this.pool.query('SELECT * FROM escrow_verifiers WHERE identity = $1', [identity]);
    const [row] = rowsOf(result);
    return row ? rowToVerifier(row) : null;
  }

  async getNextBountyId(): Promise<number> {
    return this.readNextBountyId(this.pool);
  }

  async findBountiesByStatus(statuses: readonly BountyStatus[]): Promise<Bounty[]> {
    const result = await this.pool.query(
      'SELECT * FROM escrow_bounties WHERE status = ANY($1) ORDER BY id ASC',
      [[...statuses]]
    );
    return rowsOf(result).map(rowToBounty);
  }

  async commit(mutation: EscrowMutation): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      if (mutation.advanceBountyIdFrom !== undefined) {
        const expected = mutation.advanceBountyIdFrom;
        const advanced = await client.query(
          'UPDATE escrow_counters SET value = value + 1 WHERE name = $1 AND value = $2',
          [NEXT_BOUNTY_ID, expected]
        );
        if (advanced.rowCount !== 1) {
          throw new SequenceConflictError(expected, await this.readNextBountyId(client));
        }
      }

      // Bounty first: submissions reference it
      if (mutation.bounty) {
        const b = mutation.bounty;
        const expected = mutation.expectedBounty;
        if (expected) {
          const updated = await client.query(
            `UPDATE escrow_bounties SET
               status = $2,
               winner = $3,
               submission_url = $4,
               pending_kind = $5,
               pending_recipient = $6,
               pending_reference = $7,
               pending_requested_by = $8
             WHERE id = $1 AND status = $9 AND pending_reference IS NOT DISTINCT FROM $10`,
            [
              b.id,
              b.status,
              b.winner,
              b.submission_url,
              ...settlementColumns(b.pending_settlement),
              expected.status,
              expected.pendingReference,
            ]
          );
          if (updated.rowCount !== 1) {
            throw new BountyConflictError(b.id, expected);
          }
        } else {
          await client.query(
            `INSERT INTO escrow_bounties
               (id, creator, amount, title, description, requirements, deadline, status, winner, submission_url,
                created_at, pending_kind, pending_recipient, pending_reference, pending_requested_by)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)`,
            [
              b.id,
              b.creator,
              b.amount.toString(),
              b.title,
              b.description,
              b.requirements,
              b.deadline,
              b.status,
              b.winner,
              b.submission_url,
              b.created_at,
              ...settlementColumns(b.pending_settlement),
            ]
          );
        }
      }

      if (mutation.submission) {
        const s = mutation.submission;
        await client.query(
          `INSERT INTO escrow_submissions
             (bounty_id, submitter, submission_url, description, submitted_at, verified)
           VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT (bounty_id, submitter) DO UPDATE SET verified = EXCLUDED.verified`,
          [s.bounty_id, s.submitter, s.submission_url, s.description, s.submitted_at, s.verified]
        );
      }

      if (mutation.verifier) {
        const v = mutation.verifier;
        await client.query(
          `INSERT INTO escrow_verifiers (identity, approved, updated_by, updated_at)
           VALUES ($1, $2, $3, $4)
           ON CONFLICT (identity) DO UPDATE SET
             approved = EXCLUDED.approved,
             updated_by = EXCLUDED.updated_by,
             updated_at = EXCLUDED.updated_at`,
          [v.identity, v.approved, v.updated_by, v.updated_at]
        );
      }

      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private async readNextBountyId(client: SqlClient): Promise<number> {
    const result = await client.query('SELECT value FROM escrow_counters WHERE name = $1', [NEXT_BOUNTY_ID]);
    const [row] = rowsOf(result);
    return row ? readInteger(row, 'value') : 1;
  }
}
