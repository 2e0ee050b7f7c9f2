/**
 * Escrow Errors
 *
 * Every failure is caller-recoverable and reported as a value, never thrown
 * past the engine boundary. Numeric codes match the contract error table.
 */

// =============================================================================
// ERROR CODES
// =============================================================================

export const ESCROW_ERROR_CODES = {
  NotAuthorized: 100,
  BountyNotFound: 101,
  BountyNotOpen: 102,
  InsufficientFunds: 103,
  DeadlinePassed: 104,
  AlreadySubmitted: 105,
  NotVerifier: 106,
  SubmissionNotFound: 107,
  InvalidStatus: 108,
  TransferFailed: 109,
  InvalidInput: 110,
  ServiceUnavailable: 111,
  TransferPending: 112,
} as const;

export type EscrowErrorCode = keyof typeof ESCROW_ERROR_CODES;

// =============================================================================
// ERROR CLASS
// =============================================================================

export class EscrowError extends Error {
  public readonly errorCode: number;

  constructor(
    public readonly code: EscrowErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EscrowError';
    this.errorCode = ESCROW_ERROR_CODES[code];
  }

  toJSON(): { code: EscrowErrorCode; errorCode: number; message: string } {
    return { code: this.code, errorCode: this.errorCode, message: this.message };
  }
}

// =============================================================================
// RESULT
// =============================================================================

export type EscrowResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: EscrowError };

export function success<T>(value: T): EscrowResult<T> {
  return { ok: true, value };
}

export function failure<T>(
  code: EscrowErrorCode,
  message: string,
  details?: Record<string, unknown>
): EscrowResult<T> {
  return { ok: false, error: new EscrowError(code, message, details) };
}

export function isEscrowError(value: unknown): value is EscrowError {
  return value instanceof EscrowError;
}
