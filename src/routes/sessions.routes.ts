/**
 * Reconciliation Session API Routes
 *
 * Endpoints for creating sessions, running matching and recording
 * reviewer decisions. These routes handle HTTP concerns and validation.
 * Business logic is delegated to the reconciliation service.
 *
 * IMPORTANT: Every decision is audited. Each state change appends an
 * immutable entry to the session's audit trail.
 *
 * Endpoints:
 * - POST   /                                  - Create a session from raw rows
 * - GET    /                                  - List sessions
 * - GET    /:id                               - Session with records, matches, exceptions
 * - DELETE /:id                               - Delete a session
 * - POST   /:id/start                         - Start matching (dispatched)
 * - POST   /:id/run                           - Run matching in this request
 * - POST   /:id/matches/:matchId/confirm      - Confirm a proposed match
 * - POST   /:id/matches/:matchId/reject       - Reject a match
 * - POST   /:id/exceptions/:exceptionId/resolve - Resolve an exception
 * - POST   /:id/links                         - Manually link two records
 * - POST   /:id/complete                      - Complete the session
 * - GET    /:id/summary                       - Summary counts and amounts
 * - GET    /:id/audit                         - Audit trail
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { parseRequest, validateRequest } from '../middlewares/validateRequest';
import { AUDIT_ACTIONS, SESSION_STATUSES } from '../repositories/schema';
import type { ReconciliationService } from '../services/reconciliation.service';
import { asyncHandler } from '../utils/asyncHandler';
import { sendSuccess } from '../utils/response';
import type { MatchingDispatcher } from '../workers/dispatcher';

// ============================================
// Validation Schemas
// ============================================

const uuid = (label: string) => z.string().uuid(`Invalid ${label} ID format`);

const tolerancesSchema = z.object({
  dateToleranceDays: z.number().int().nonnegative(),
  amountTolerance: z.number().int().nonnegative(),
});

// In a real deployment performedBy would come from auth middleware
const performedBy = z.string().trim().min(1).max(200).default('admin');

// Rows stay loosely typed here: the normalizer reports bad rows by number
const rawRows = z.array(z.record(z.unknown())).max(100_000);

export const sessionSchemas = {
  create: z.object({
    name: z.string().trim().min(1).max(200),
    description: z.string().trim().max(2000).optional(),
    ledgerRows: rawRows,
    bankRows: rawRows,
    tolerances: tolerancesSchema.partial().optional(),
    allowPartial: z.boolean().optional(),
  }),
  start: z.object({
    tolerances: tolerancesSchema.optional(),
  }),
  list: z.object({
    status: z.enum(SESSION_STATUSES).optional(),
  }),
  audit: z.object({
    action: z.enum(AUDIT_ACTIONS).optional(),
  }),
  decision: z.object({
    performedBy,
  }),
  reject: z.object({
    performedBy,
    reason: z.string().max(2000).optional(),
  }),
  resolve: z.object({
    performedBy,
    note: z.string().max(2000).optional(),
  }),
  link: z.object({
    ledgerRecordId: uuid('ledger record'),
    bankRecordId: uuid('bank record'),
    performedBy,
    note: z.string().max(2000).optional(),
  }),
};

const params = {
  session: z.object({ id: uuid('session') }),
  match: z.object({ id: uuid('session'), matchId: uuid('match') }),
  exception: z.object({ id: uuid('session'), exceptionId: uuid('exception') }),
};

// ============================================
// Router
// ============================================

export interface SessionsRouterDeps {
  service: ReconciliationService;
  dispatcher: MatchingDispatcher;
}

export function createSessionsRouter({ service, dispatcher }: SessionsRouterDeps): Router {
  const router = Router();

  /**
   * @route   POST /sessions
   * @desc    Normalize ledger and bank rows into a new session
   *
   * Response:
   * - 201 Created: { session, rowErrors }
   * - 422 Unprocessable: malformed rows (unless allowPartial)
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const body = parseRequest(sessionSchemas.create, req.body ?? {});
      const result = await service.createSession(body);

      sendSuccess(res, result, 'Session created successfully', 201);
    })
  );

  /**
   * @route   GET /sessions
   * @desc    List sessions, newest first
   */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const query = parseRequest(sessionSchemas.list, req.query);
      const sessions = await service.listSessions(query);

      sendSuccess(res, sessions);
    })
  );

  /**
   * @route   GET /sessions/:id
   */
  router.get(
    '/:id',
    validateRequest({ params: params.session }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      sendSuccess(res, await service.getSession(req.params.id));
    })
  );

  /**
   * @route   DELETE /sessions/:id
   * @desc    Delete a session with all its records, matches and exceptions
   */
  router.delete(
    '/:id',
    validateRequest({ params: params.session }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      await service.deleteSession(req.params.id);
      sendSuccess(res, { id: req.params.id }, 'Session deleted successfully');
    })
  );

  /**
   * @route   POST /sessions/:id/start
   * @desc    Move to MATCHING and dispatch the matching pass
   *
   * Response:
   * - 202 Accepted: { session, dispatch }
   * - 409 Conflict: empty side, confirmed matches, terminal state, or session locked
   */
  router.post(
    '/:id/start',
    validateRequest({ params: params.session }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { tolerances } = parseRequest(sessionSchemas.start, req.body ?? {});
      const started = await service.start(req.params.id, tolerances);
      const dispatch = await dispatcher.dispatch(started.id);

      const session = dispatch.mode === 'inline' ? await service.getSession(started.id) : started;
      sendSuccess(res, { session, dispatch }, 'Matching started', 202);
    })
  );

  /**
   * @route   POST /sessions/:id/run
   * @desc    Run the matching pass within the request
   */
  router.post(
    '/:id/run',
    validateRequest({ params: params.session }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const session = await service.runMatching(req.params.id);
      sendSuccess(res, session, 'Matching completed');
    })
  );

  /**
   * @route   POST /sessions/:id/matches/:matchId/confirm
   */
  router.post(
    '/:id/matches/:matchId/confirm',
    validateRequest({ params: params.match }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const body = parseRequest(sessionSchemas.decision, req.body ?? {});
      const session = await service.confirmMatch(req.params.id, req.params.matchId, body.performedBy);

      sendSuccess(res, session, 'Match confirmed successfully');
    })
  );

  /**
   * @route   POST /sessions/:id/matches/:matchId/reject
   * @desc    Reject a match; both records get fresh exceptions
   */
  router.post(
    '/:id/matches/:matchId/reject',
    validateRequest({ params: params.match }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const body = parseRequest(sessionSchemas.reject, req.body ?? {});
      const session = await service.rejectMatch(
        req.params.id,
        req.params.matchId,
        body.performedBy,
        body.reason
      );

      sendSuccess(res, session, 'Match rejected successfully');
    })
  );

  /**
   * @route   POST /sessions/:id/exceptions/:exceptionId/resolve
   * @desc    Resolve an exception; amount mismatches and duplicates need a note
   */
  router.post(
    '/:id/exceptions/:exceptionId/resolve',
    validateRequest({ params: params.exception }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const body = parseRequest(sessionSchemas.resolve, req.body ?? {});
      const session = await service.resolveException(
        req.params.id,
        req.params.exceptionId,
        body.performedBy,
        body.note
      );

      sendSuccess(res, session, 'Exception resolved successfully');
    })
  );

  /**
   * @route   POST /sessions/:id/links
   * @desc    Manually link a ledger record to a bank record
   */
  router.post(
    '/:id/links',
    validateRequest({ params: params.session }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const body = parseRequest(sessionSchemas.link, req.body ?? {});
      const session = await service.manualLink(
        req.params.id,
        body.ledgerRecordId,
        body.bankRecordId,
        body.performedBy,
        body.note
      );

      sendSuccess(res, session, 'Records linked successfully', 201);
    })
  );

  /**
   * @route   POST /sessions/:id/complete
   */
  router.post(
    '/:id/complete',
    validateRequest({ params: params.session }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const body = parseRequest(sessionSchemas.decision, req.body ?? {});
      const session = await service.complete(req.params.id, body.performedBy);

      sendSuccess(res, session, 'Session completed successfully');
    })
  );

  /**
   * @route   GET /sessions/:id/summary
   */
  router.get(
    '/:id/summary',
    validateRequest({ params: params.session }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      sendSuccess(res, await service.summary(req.params.id));
    })
  );

  /**
   * @route   GET /sessions/:id/audit
   */
  router.get(
    '/:id/audit',
    validateRequest({ params: params.session }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { action } = parseRequest(sessionSchemas.audit, req.query);
      sendSuccess(res, await service.auditTrail(req.params.id, action));
    })
  );

  return router;
}

export default createSessionsRouter;
