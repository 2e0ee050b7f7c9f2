/**
 * Lifecycle Policy + Input Check Tests
 */

import { describe, it, expect } from 'vitest';
import {
  VALID_TRANSITIONS,
  canResolveBounty,
  isTerminalStatus,
  isValidTransition,
} from '../../src/escrow/policy.js';
import { checkCreateBountyInput, checkIdentity, checkSubmitWorkInput } from '../../src/escrow/validation.js';
import { CreateBountyInput, DEFAULT_TEXT_LIMITS } from '../../src/escrow/types.js';

describe('Bounty lifecycle', () => {
  it('should allow only the lifecycle edges', () => {
    expect(isValidTransition('OPEN', 'SUBMITTED')).toBe(true);
    expect(isValidTransition('OPEN', 'CANCELLED')).toBe(true);
    expect(isValidTransition('SUBMITTED', 'COMPLETED')).toBe(true);

    expect(isValidTransition('OPEN', 'COMPLETED')).toBe(false);
    expect(isValidTransition('SUBMITTED', 'OPEN')).toBe(false);
    expect(isValidTransition('SUBMITTED', 'CANCELLED')).toBe(false);
    expect(isValidTransition('COMPLETED', 'OPEN')).toBe(false);
    expect(isValidTransition('CANCELLED', 'OPEN')).toBe(false);
  });

  it('should treat COMPLETED and CANCELLED as terminal', () => {
    expect(isTerminalStatus('COMPLETED')).toBe(true);
    expect(isTerminalStatus('CANCELLED')).toBe(true);
    expect(isTerminalStatus('OPEN')).toBe(false);
    expect(isTerminalStatus('SUBMITTED')).toBe(false);
    expect(VALID_TRANSITIONS.COMPLETED).toEqual([]);
  });
});

describe('canResolveBounty', () => {
  const bounty = { creator: 'alice' };

  it('should allow the creator', () => {
    expect(canResolveBounty('alice', bounty, false)).toBe(true);
  });

  it('should allow an approved verifier', () => {
    expect(canResolveBounty('vera', bounty, true)).toBe(true);
  });

  it('should refuse everyone else', () => {
    expect(canResolveBounty('mallory', bounty, false)).toBe(false);
  });
});

describe('input checks', () => {
  const valid: CreateBountyInput = {
    amount: 1n,
    title: 'Title',
    description: 'Description',
    requirements: 'Requirements',
    deadline: 10,
  };

  it('should accept valid bounty input', () => {
    expect(checkCreateBountyInput(valid, DEFAULT_TEXT_LIMITS)).toBeNull();
  });

  it('should name the first problem', () => {
    expect(checkCreateBountyInput({ ...valid, amount: -5n }, DEFAULT_TEXT_LIMITS)).toBe('amount must be positive');
    expect(checkCreateBountyInput({ ...valid, deadline: 1.5 }, DEFAULT_TEXT_LIMITS)).toBe(
      'deadline must be a non-negative integer'
    );
    expect(checkCreateBountyInput({ ...valid, title: '  ' }, DEFAULT_TEXT_LIMITS)).toBe('title must not be empty');
    expect(checkCreateBountyInput({ ...valid, requirements: 'r'.repeat(501) }, DEFAULT_TEXT_LIMITS)).toBe(
      'requirements must be at most 500 characters'
    );
  });

  it('should honor custom limits', () => {
    const limits = { ...DEFAULT_TEXT_LIMITS, title: 3 };
    expect(checkCreateBountyInput({ ...valid, title: 'abcd' }, limits)).toBe('title must be at most 3 characters');
  });

  it('should only accept printable ASCII text', () => {
    expect(checkCreateBountyInput({ ...valid, title: 'Caf\u00e9 crash' }, DEFAULT_TEXT_LIMITS)).toBe(
      'title must be printable ASCII'
    );
    expect(checkCreateBountyInput({ ...valid, description: 'line one\nline two' }, DEFAULT_TEXT_LIMITS)).toBe(
      'description must be printable ASCII'
    );
    expect(
      checkSubmitWorkInput({ submissionUrl: 'https://x/\u{1F600}', description: 'd' }, DEFAULT_TEXT_LIMITS)
    ).toBe('submissionUrl must be printable ASCII');
    expect(checkCreateBountyInput({ ...valid, title: '~ Fix #12: "quotes" & {braces} ~' }, DEFAULT_TEXT_LIMITS)).toBeNull();
  });

  it('should check submission text', () => {
    expect(checkSubmitWorkInput({ submissionUrl: 'https://x', description: 'd' }, DEFAULT_TEXT_LIMITS)).toBeNull();
    expect(checkSubmitWorkInput({ submissionUrl: '', description: 'd' }, DEFAULT_TEXT_LIMITS)).toBe(
      'submissionUrl must not be empty'
    );
    expect(
      checkSubmitWorkInput({ submissionUrl: 'https://x', description: 'd'.repeat(501) }, DEFAULT_TEXT_LIMITS)
    ).toBe('description must be at most 500 characters');
  });

  it('should check identities', () => {
    expect(checkIdentity('alice', 'caller')).toBeNull();
    expect(checkIdentity('', 'caller')).toBe('caller must not be empty');
  });
});
