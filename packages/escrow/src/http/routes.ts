/**
 * HTTP API Routes
 *
 * Thin controllers - validate input, call engine, return records.
 * No business logic here.
 *
 * The acting identity comes from the x-caller-identity header, set by a
 * trusted upstream. Amounts travel as decimal strings.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { EscrowEngine } from '../escrow/engine.js';
import { EscrowError, EscrowErrorCode, EscrowResult, ESCROW_ERROR_CODES } from '../escrow/errors.js';
import { Bounty, CustodyReport, PendingSettlement, Submission } from '../escrow/types.js';
import { Logger } from '../utils/logger.js';

export const CALLER_HEADER = 'x-caller-identity';
export const REQUEST_ID_HEADER = 'x-request-id';

// =============================================================================
// RESPONSE TYPES
// =============================================================================

interface BountyResponse {
  id: number;
  creator: string;
  amount: string;
  title: string;
  description: string;
  requirements: string;
  deadline: number;
  status: string;
  winner: string | null;
  submission_url: string | null;
  created_at: number;
  pending_settlement: PendingSettlement | null;
}

interface CustodyResponse {
  escrowed: string;
  custodian_balance: string;
  open_bounties: number;
  balanced: boolean;
}

interface ErrorResponse {
  error: {
    code: EscrowErrorCode;
    errorCode: number;
    message: string;
  };
}

// =============================================================================
// VALIDATION
// =============================================================================

class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

type Body = Record<string, unknown>;

function validateBody(value: unknown): Body {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const body: Body = {};
  for (const [key, field] of Object.entries(value)) {
    body[key] = field;
  }
  return body;
}

function validateString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} must be a string`);
  }
  return value;
}

function validateAmount(value: unknown, fieldName: string): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new ValidationError(`${fieldName} must be a decimal integer string`);
  }
  return BigInt(value);
}

function validateNonNegativeInteger(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${fieldName} must be a non-negative integer`);
  }
  return value;
}

function validateBountyId(value: string): number {
  const id = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(id)) {
    throw new ValidationError('bounty id must be a non-negative integer');
  }
  return id;
}

function requireCaller(req: Request): string {
  const caller = req.header(CALLER_HEADER);
  if (!caller || caller.trim() === '') {
    throw new ValidationError(`${CALLER_HEADER} header is required`);
  }
  return caller;
}

/**
 * Unwrap an engine result; a failure goes to the error handler.
 */
function unwrap<T>(result: EscrowResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function requestIdOf(res: Response): string | undefined {
  const value = res.getHeader(REQUEST_ID_HEADER);
  return typeof value === 'string' ? value : undefined;
}

// =============================================================================
// ROUTE FACTORY
// =============================================================================

export function createRoutes(engine: EscrowEngine, logger: Logger): Router {
  const router = Router();

  // Request id + access log
  router.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header(REQUEST_ID_HEADER) ?? uuidv4();
    const startedAt = Date.now();
    res.setHeader(REQUEST_ID_HEADER, requestId);
    res.on('finish', () => {
      logger.debug(
        {
          requestId,
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        'Request completed'
      );
    });
    next();
  });

  // ===========================================================================
  // POST /bounties
  // Create a bounty, escrowing its reward from the caller
  // ===========================================================================
  router.post('/bounties', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const creator = requireCaller(req);
      const body = validateBody(req.body);

      const id = unwrap(
        await engine.createBounty(creator, {
          amount: validateAmount(body.amount, 'amount'),
          title: validateString(body.title, 'title'),
          description: validateString(body.description, 'description'),
          requirements: validateString(body.requirements, 'requirements'),
          deadline: validateNonNegativeInteger(body.deadline, 'deadline'),
        })
      );

      res.status(201).json({ id });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // GET /bounties/:id
  // ===========================================================================
  router.get('/bounties/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = validateBountyId(req.params.id);
      const bounty = await engine.getBounty(id);
      if (!bounty) {
        throw new EscrowError('BountyNotFound', `Bounty ${id} not found`);
      }
      res.json(toBountyResponse(bounty));
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // POST /bounties/:id/submissions
  // Submit work as the caller
  // ===========================================================================
  router.post('/bounties/:id/submissions', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const submitter = requireCaller(req);
      const id = validateBountyId(req.params.id);
      const body = validateBody(req.body);

      unwrap(
        await engine.submitWork(id, submitter, {
          submissionUrl: validateString(body.submission_url, 'submission_url'),
          description: validateString(body.description, 'description'),
        })
      );

      res.status(201).json({ ok: true });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // GET /bounties/:id/submissions
  // ===========================================================================
  router.get('/bounties/:id/submissions', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = validateBountyId(req.params.id);
      if (!(await engine.getBounty(id))) {
        throw new EscrowError('BountyNotFound', `Bounty ${id} not found`);
      }
      const submissions: Submission[] = await engine.listSubmissions(id);
      res.json({ submissions, count: submissions.length });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // GET /bounties/:id/submissions/:submitter
  // ===========================================================================
  router.get(
    '/bounties/:id/submissions/:submitter',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = validateBountyId(req.params.id);
        const { submitter } = req.params;
        const submission = await engine.getSubmission(id, submitter);
        if (!submission) {
          throw new EscrowError('SubmissionNotFound', `No submission from ${submitter} on bounty ${id}`);
        }
        res.json(submission);
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /bounties/:id/submissions/:submitter/verify
  // Approve a submission and release the escrow to its submitter
  // ===========================================================================
  router.post(
    '/bounties/:id/submissions/:submitter/verify',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const caller = requireCaller(req);
        const id = validateBountyId(req.params.id);
        unwrap(await engine.verifySubmission(id, req.params.submitter, caller));
        res.json({ ok: true });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /bounties/:id/cancel
  // ===========================================================================
  router.post('/bounties/:id/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const id = validateBountyId(req.params.id);
      unwrap(await engine.cancelBounty(id, caller));
      res.json({ ok: true });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // POST /bounties/:id/reconcile
  // Resolve a bounty held by an unconfirmed payout or refund
  // ===========================================================================
  router.post('/bounties/:id/reconcile', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const id = validateBountyId(req.params.id);
      const resolution = unwrap(await engine.reconcileSettlement(id, caller));
      res.json({ resolution });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // Verifier registry
  // ===========================================================================
  router.put('/verifiers/:identity', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      unwrap(await engine.addVerifier(caller, req.params.identity));
      res.json({ ok: true });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/verifiers/:identity', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      unwrap(await engine.removeVerifier(caller, req.params.identity));
      res.json({ ok: true });
    } catch (error) {
      next(error);
    }
  });

  router.get('/verifiers/:identity', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { identity } = req.params;
      res.json({ identity, approved: await engine.isVerifier(identity) });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // GET /stats
  // ===========================================================================
  router.get('/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await engine.getStats();
      res.json({
        next_bounty_id: stats.nextBountyId,
        bounty_count: stats.bountyCount,
        contract_owner: stats.contractOwner,
      });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // GET /custody
  // Escrowed total against the custodian's ledger balance
  // ===========================================================================
  router.get('/custody', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(toCustodyResponse(await engine.auditCustody()));
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // Health check
  // ===========================================================================
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return router;
}

// =============================================================================
// RESPONSE MAPPING
// =============================================================================

function toBountyResponse(bounty: Bounty): BountyResponse {
  return {
    id: bounty.id,
    creator: bounty.creator,
    amount: bounty.amount.toString(),
    title: bounty.title,
    description: bounty.description,
    requirements: bounty.requirements,
    deadline: bounty.deadline,
    status: bounty.status,
    winner: bounty.winner,
    submission_url: bounty.submission_url,
    created_at: bounty.created_at,
    pending_settlement: bounty.pending_settlement,
  };
}

function toCustodyResponse(report: CustodyReport): CustodyResponse {
  return {
    escrowed: report.escrowed.toString(),
    custodian_balance: report.custodianBalance.toString(),
    open_bounties: report.openBounties,
    balanced: report.balanced,
  };
}

function toErrorResponse(code: EscrowErrorCode, message: string): ErrorResponse {
  return { error: { code, errorCode: ESCROW_ERROR_CODES[code], message } };
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

const HTTP_STATUS: Record<EscrowErrorCode, number> = {
  InvalidInput: 400,
  NotAuthorized: 403,
  NotVerifier: 403,
  BountyNotFound: 404,
  SubmissionNotFound: 404,
  BountyNotOpen: 409,
  AlreadySubmitted: 409,
  InvalidStatus: 409,
  DeadlinePassed: 409,
  InsufficientFunds: 422,
  TransferFailed: 502,
  ServiceUnavailable: 503,
  TransferPending: 504,
};

export function httpStatusFor(code: EscrowErrorCode): number {
  return HTTP_STATUS[code];
}

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof EscrowError) {
      res.status(httpStatusFor(err.code)).json({ error: err.toJSON() });
      return;
    }

    // ValidationError from the controllers, SyntaxError from express.json()
    if (err instanceof ValidationError || err instanceof SyntaxError) {
      res.status(400).json(toErrorResponse('InvalidInput', err.message));
      return;
    }

    logger.error({ requestId: requestIdOf(res), error: err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}
