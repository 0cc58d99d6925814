/**
 * Booking read routes
 * GET /bookings/:id, GET /bookings/:id/audit
 */

import { Router, Request, Response } from 'express';
import type { BookingOrchestrator } from '../orchestrator/booking-orchestrator.js';
import { toStatusView } from '../orchestrator/messages.js';
import type { Logger } from '../utils/logger.js';
import { getCorrelationId, toErrorResponse } from './middleware.js';

type BookingQueries = Pick<BookingOrchestrator, 'getStatus' | 'getAuditTrail'>;

export function createBookingsRouter(orchestrator: BookingQueries, logger: Logger): Router {
  const router = Router();

  const fail = (res: Response, error: unknown, requestId: string): void => {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      logger.error('Error fetching booking', {
        error: error instanceof Error ? error.message : String(error),
        request_id: requestId,
        correlation_id: getCorrelationId(res),
      });
    }
    res.status(status).json({ error: body });
  };

  /**
   * GET /bookings/:id
   * Current status view of one booking request
   */
  router.get('/:id', async (req: Request, res: Response): Promise<void> => {
    try {
      const request = await orchestrator.getStatus(req.params.id);
      res.status(200).json(toStatusView(request));
    } catch (error) {
      fail(res, error, req.params.id);
    }
  });

  /**
   * GET /bookings/:id/audit
   * Audit entries in append order
   */
  router.get('/:id/audit', async (req: Request, res: Response): Promise<void> => {
    try {
      const entries = await orchestrator.getAuditTrail(req.params.id);
      res.status(200).json({ request_id: req.params.id, entries });
    } catch (error) {
      fail(res, error, req.params.id);
    }
  });

  return router;
}
