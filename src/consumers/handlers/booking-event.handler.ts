/**
 * Booking Event Handler
 *
 * Handles booking.inbound events relayed from the chat front end: new
 * intents, option selections, trip-detail updates and cancellations.
 */

import { z } from 'zod';
import type { BookingOrchestrator, EventMeta } from '../../orchestrator/booking-orchestrator.js';
import type { BookingRequest, BookingState } from '../../types/booking.js';
import { errorMessage, isBookingError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { decodeMessage, resolveCorrelationId, type InboundMessage } from './inbound-message.js';

const envelope = {
  user_id: z.string().min(1),
  request_id: z.string().min(1).optional(),
  sequence: z.number().int().nonnegative().optional(),
  correlation_id: z.string().optional(),
};

export const BookingEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('intent'), ...envelope, intent: z.unknown() }),
  z.object({
    type: z.literal('selection'),
    ...envelope,
    candidate_id: z.string().min(1).optional(),
    option_number: z.number().int().positive().optional(),
  }),
  z.object({ type: z.literal('field_update'), ...envelope, fields: z.record(z.unknown()) }),
  z.object({ type: z.literal('cancel'), ...envelope, reason: z.string().optional() }),
]);

export type BookingEventPayload = z.infer<typeof BookingEventSchema>;

type RequestEvent = Exclude<BookingEventPayload, { type: 'intent' }>;

export type BookingCommands = Pick<
  BookingOrchestrator,
  'createRequest' | 'submitSelection' | 'submitDetails' | 'cancel' | 'findActiveRequest' | 'getStatus'
>;

interface HandlerDependencies {
  orchestrator: BookingCommands;
  logger: Logger;
}

export class BookingEventHandler {
  private orchestrator: BookingCommands;
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

  /**
   * Handle one booking.inbound message; failures are logged and never thrown
   */
  async handle(message: InboundMessage): Promise<void> {
    const payload = decodeMessage(message, BookingEventSchema, this.logger);
    if (!payload) {
      return;
    }

    const correlationId = resolveCorrelationId(message, payload.correlation_id);
    const meta: EventMeta = { sequence: payload.sequence, correlationId };

    this.logger.info('Processing booking event', {
      type: payload.type,
      user_id: payload.user_id,
      request_id: payload.request_id,
      correlation_id: correlationId,
      topic: message.topic,
    });

    try {
      if (payload.type === 'intent') {
        const request = await this.orchestrator.createRequest(payload.user_id, payload.intent, meta);
        this.logger.info('Booking request opened', {
          request_id: request.id,
          state: request.state,
          correlation_id: correlationId,
        });
        return;
      }

      const request = await this.resolveRequest(payload.user_id, payload.request_id);
      if (!request) {
        this.logger.warn('No booking request for event', {
          type: payload.type,
          user_id: payload.user_id,
          request_id: payload.request_id,
          correlation_id: correlationId,
        });
        return;
      }

      const state = await this.apply(request, payload, meta);

      this.logger.info('Successfully processed booking event', {
        type: payload.type,
        request_id: request.id,
        state,
        correlation_id: correlationId,
      });
    } catch (error) {
      if (isBookingError(error)) {
        // Domain rejections are already audited and reported to the user
        this.logger.warn('Booking event rejected', {
          type: payload.type,
          kind: error.kind,
          error: error.message,
          user_id: payload.user_id,
          correlation_id: correlationId,
        });
        return;
      }
      this.logger.error('error processing booking event', {
        error: errorMessage(error),
        type: payload.type,
        topic: message.topic,
        offset: message.message.offset,
        correlation_id: correlationId,
      });
      // Don't throw - consumer continues processing
    }
  }

  private async apply(
    request: BookingRequest,
    payload: RequestEvent,
    meta: EventMeta
  ): Promise<BookingState> {
    switch (payload.type) {
      case 'selection': {
        const selection = { candidateId: payload.candidate_id, optionNumber: payload.option_number };
        return (await this.orchestrator.submitSelection(request.id, selection, meta)).state;
      }
      case 'field_update':
        return (await this.orchestrator.submitDetails(request.id, payload.fields, meta)).request.state;
      case 'cancel':
        return (await this.orchestrator.cancel(request.id, payload.reason ?? null, meta)).state;
    }
  }

  /**
   * Explicit request id when given (it must belong to the sender), else the user's active request
   */
  private async resolveRequest(userId: string, requestId?: string): Promise<BookingRequest | null> {
    if (!requestId) {
      return this.orchestrator.findActiveRequest(userId);
    }
    const request = await this.orchestrator.getStatus(requestId);
    if (request.userId !== userId) {
      this.logger.warn('Booking event user does not own request', {
        user_id: userId,
        request_id: requestId,
      });
      return null;
    }
    return request;
  }
}

export function createBookingEventHandler(deps: HandlerDependencies): BookingEventHandler {
  return new BookingEventHandler(deps);
}
