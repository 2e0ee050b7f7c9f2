/**
 * Input checks for escrow operations.
 * Each returns a problem description, or null when the input is acceptable.
 */

import { CreateBountyInput, SubmitWorkInput, TextLimits } from './types.js';

// Stored text is fixed-width ASCII
const PRINTABLE_ASCII = /^[\x20-\x7E]*$/;

function checkText(value: string, field: string, limit: number): string | null {
  if (value.trim() === '') {
    return `${field} must not be empty`;
  }
  if (!PRINTABLE_ASCII.test(value)) {
    return `${field} must be printable ASCII`;
  }
  if (value.length > limit) {
    return `${field} must be at most ${limit} characters`;
  }
  return null;
}

export function checkIdentity(value: string, field: string): string | null {
  return value.trim() === '' ? `${field} must not be empty` : null;
}

export function checkCreateBountyInput(
  input: CreateBountyInput,
  limits: TextLimits
): string | null {
  if (input.amount <= 0n) {
    return 'amount must be positive';
  }
  if (!Number.isSafeInteger(input.deadline) || input.deadline < 0) {
    return 'deadline must be a non-negative integer';
  }
  return (
    checkText(input.title, 'title', limits.title) ??
    checkText(input.description, 'description', limits.description) ??
    checkText(input.requirements, 'requirements', limits.requirements)
  );
}

export function checkSubmitWorkInput(
  input: SubmitWorkInput,
  limits: TextLimits
): string | null {
  return (
    checkText(input.submissionUrl, 'submissionUrl', limits.submissionUrl) ??
    checkText(input.description, 'description', limits.submissionDescription)
  );
}
