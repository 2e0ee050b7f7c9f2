/**
 * Escrow Boundaries Module
 *
 * Guards and assertions that enforce the custody invariants.
 */

export {
  InvariantViolation,
  assertValidTransition,
  assertResolutionFields,
  assertPositiveAmount,
  sumEscrowed,
} from './invariants.js';
