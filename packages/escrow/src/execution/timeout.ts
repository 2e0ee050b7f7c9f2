/**
 * Collaborator Timeout Enforcement
 *
 * Bounds read-only calls to external collaborators (ledger balance, clock).
 * A timeout fails the operation before anything is written or moved.
 *
 * Transfers are NOT wrapped: a transfer that outlives its timer may still
 * land, so the ledger adapter owns its own confirmation timeout.
 */

export const DEFAULT_COLLABORATOR_TIMEOUT_MS = 10_000;

// =============================================================================
// TIMEOUT ERROR
// =============================================================================

export class CollaboratorTimeoutError extends Error {
  constructor(
    public readonly collaborator: string,
    public readonly timeoutMs: number
  ) {
    super(`${collaborator} did not respond within ${timeoutMs}ms`);
    this.name = 'CollaboratorTimeoutError';
  }
}

// =============================================================================
// TIMEOUT WRAPPER
// =============================================================================

/**
 * Execute a function with timeout.
 *
 * Does NOT cancel the underlying call; its late result is discarded.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  collaborator: string
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new CollaboratorTimeoutError(collaborator, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
