/**
 * In-Memory Persistence Tests
 *
 * Proves:
 * - Commits are all-or-nothing
 * - The id sequence only advances from the value it was read at
 * - A bounty update only applies to the state it was read in
 * - Reads return copies
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  BountyConflictError,
  InMemoryEscrowPersistence,
  SequenceConflictError,
} from '../../src/escrow/persistence.js';
import { Submission, UnresolvedBounty } from '../../src/escrow/types.js';

function openBounty(id: number): UnresolvedBounty {
  return {
    id,
    creator: 'alice',
    amount: 100n,
    title: 't',
    description: 'd',
    requirements: 'r',
    deadline: 50,
    status: 'OPEN',
    winner: null,
    submission_url: null,
    created_at: 1,
    pending_settlement: null,
  };
}

function submission(submitter: string, submittedAt: number): Submission {
  return {
    bounty_id: 1,
    submitter,
    submission_url: `https://example.com/${submitter}`,
    description: 'work',
    submitted_at: submittedAt,
    verified: false,
  };
}

describe('InMemoryEscrowPersistence', () => {
  let persistence: InMemoryEscrowPersistence;

  beforeEach(() => {
    persistence = new InMemoryEscrowPersistence();
  });

  it('should start the id sequence at 1', async () => {
    expect(await persistence.getNextBountyId()).toBe(1);
  });

  it('should apply a create and advance the sequence together', async () => {
    await persistence.commit({ bounty: openBounty(1), advanceBountyIdFrom: 1 });

    expect(await persistence.getNextBountyId()).toBe(2);
    expect(await persistence.getBounty(1)).toEqual(openBounty(1));
  });

  it('should apply nothing when the sequence moved', async () => {
    await persistence.commit({ bounty: openBounty(1), advanceBountyIdFrom: 1 });

    await expect(
      persistence.commit({ bounty: openBounty(5), advanceBountyIdFrom: 1 })
    ).rejects.toThrow(SequenceConflictError);

    expect(await persistence.getBounty(5)).toBeNull();
    expect(await persistence.getNextBountyId()).toBe(2);
    expect(persistence.counts()).toEqual({ bounties: 1, submissions: 0, verifiers: 0 });
  });

  it('should apply an update only to the state it was read in', async () => {
    await persistence.commit({ bounty: openBounty(1), advanceBountyIdFrom: 1 });
    await persistence.commit({
      bounty: { ...openBounty(1), status: 'SUBMITTED' },
      expectedBounty: { status: 'OPEN', pendingReference: null },
    });

    await expect(
      persistence.commit({
        bounty: { ...openBounty(1), status: 'CANCELLED' },
        expectedBounty: { status: 'OPEN', pendingReference: null },
        submission: submission('bob', 5),
      })
    ).rejects.toThrow('Bounty 1 is no longer OPEN with settlement none');

    expect((await persistence.getBounty(1))?.status).toBe('SUBMITTED');
    expect(persistence.counts()).toEqual({ bounties: 1, submissions: 0, verifiers: 0 });
  });

  it('should match the held settlement reference', async () => {
    const held = { kind: 'refund' as const, recipient: 'alice', reference: 'ref-1', requested_by: 'alice' };
    await persistence.commit({ bounty: { ...openBounty(1), pending_settlement: held }, advanceBountyIdFrom: 1 });

    await expect(
      persistence.commit({
        bounty: { ...openBounty(1), status: 'CANCELLED' },
        expectedBounty: { status: 'OPEN', pendingReference: null },
      })
    ).rejects.toThrow(BountyConflictError);

    await persistence.commit({
      bounty: { ...openBounty(1), status: 'CANCELLED' },
      expectedBounty: { status: 'OPEN', pendingReference: 'ref-1' },
    });
    expect((await persistence.getBounty(1))?.pending_settlement).toBeNull();
  });

  it('should refuse to insert over an existing bounty', async () => {
    await persistence.commit({ bounty: openBounty(1), advanceBountyIdFrom: 1 });

    await expect(persistence.commit({ bounty: openBounty(1) })).rejects.toThrow('Bounty 1 already exists');
  });

  it('should return copies', async () => {
    await persistence.commit({ bounty: openBounty(1), advanceBountyIdFrom: 1 });

    const loaded = await persistence.getBounty(1);
    if (loaded) loaded.title = 'changed';

    expect((await persistence.getBounty(1))?.title).toBe('t');
  });

  it('should list submissions by time, then submitter', async () => {
    await persistence.commit({ bounty: openBounty(1), advanceBountyIdFrom: 1 });
    await persistence.commit({ submission: submission('carol', 20) });
    await persistence.commit({ submission: submission('bob', 20) });
    await persistence.commit({ submission: submission('dave', 10) });

    const listed = await persistence.listSubmissions(1);
    expect(listed.map((s) => s.submitter)).toEqual(['dave', 'bob', 'carol']);
    expect(await persistence.listSubmissions(2)).toEqual([]);
  });

  it('should find bounties by status', async () => {
    await persistence.commit({ bounty: openBounty(1), advanceBountyIdFrom: 1 });
    await persistence.commit({ bounty: { ...openBounty(2), status: 'CANCELLED' }, advanceBountyIdFrom: 2 });

    const open = await persistence.findBountiesByStatus(['OPEN', 'SUBMITTED']);
    expect(open.map((b) => b.id)).toEqual([1]);
  });

  it('should overwrite verifier entries', async () => {
    await persistence.commit({ verifier: { identity: 'vera', approved: true, updated_by: 'owner', updated_at: 1 } });
    await persistence.commit({ verifier: { identity: 'vera', approved: false, updated_by: 'owner', updated_at: 2 } });

    expect(await persistence.getVerifier('vera')).toEqual({
      identity: 'vera',
      approved: false,
      updated_by: 'owner',
      updated_at: 2,
    });
    expect(await persistence.getVerifier('nobody')).toBeNull();
  });
});
