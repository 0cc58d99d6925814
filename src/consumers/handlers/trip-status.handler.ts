/**
 * Trip Status Handler
 *
 * Handles provider.trip-status events: the provider reports pickup
 * (in_transit) and delivery for a booked trip.
 */

import { z } from 'zod';
import type { BookingOrchestrator } from '../../orchestrator/booking-orchestrator.js';
import { errorMessage, isBookingError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { decodeMessage, resolveCorrelationId, type InboundMessage } from './inbound-message.js';

export const TripStatusSchema = z.object({
  request_id: z.string().uuid(),
  status: z.enum(['in_transit', 'delivered']),
  reported_at: z.string().datetime({ offset: true }),
  sequence: z.number().int().nonnegative().optional(),
  correlation_id: z.string().optional(),
});

export type TripStatusPayload = z.infer<typeof TripStatusSchema>;

type TripStatusCommands = Pick<BookingOrchestrator, 'updateTripStatus'>;

interface HandlerDependencies {
  orchestrator: TripStatusCommands;
  logger: Logger;
}

export class TripStatusHandler {
  private orchestrator: TripStatusCommands;
  private logger: Logger;

  constructor(deps: HandlerDependencies) {
    if (!deps.orchestrator) {
      throw new Error('orchestrator is required');
    }
    if (!deps.logger) {
      throw new Error('logger is required');
    }
    this.orchestrator = deps.orchestrator;
    this.logger = deps.logger;
  }

  async handle(message: InboundMessage): Promise<void> {
    const payload = decodeMessage(message, TripStatusSchema, this.logger);
    if (!payload) {
      return;
    }

    const correlationId = resolveCorrelationId(message, payload.correlation_id);

    try {
      const request = await this.orchestrator.updateTripStatus(payload.request_id, payload.status, {
        sequence: payload.sequence,
        correlationId,
      });
      this.logger.info('Trip status applied', {
        request_id: payload.request_id,
        status: payload.status,
        state: request.state,
        reported_at: payload.reported_at,
        correlation_id: correlationId,
      });
    } catch (error) {
      const meta = {
        request_id: payload.request_id,
        status: payload.status,
        error: errorMessage(error),
        correlation_id: correlationId,
      };
      if (isBookingError(error)) {
        this.logger.warn('Trip status rejected', { ...meta, kind: error.kind });
        return;
      }
      this.logger.error('error processing trip status event', {
        ...meta,
        topic: message.topic,
        offset: message.message.offset,
      });
    }
  }
}

export function createTripStatusHandler(deps: HandlerDependencies): TripStatusHandler {
  return new TripStatusHandler(deps);
}
