/**
 * Notification dispatcher
 * Emits user-facing status messages; delivery belongs to the chat transport.
 */

import { randomUUID } from 'crypto';
import type { Pool } from 'pg';
import type { BookingState } from '../types/booking.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface StatusMessage {
  userId: string;
  requestId: string;
  state: BookingState;
  message: string;
  correlationId?: string;
}

export interface StatusTransport {
  send(message: StatusMessage): Promise<void>;
}

export class NotificationDispatcher {
  constructor(
    private readonly transport: StatusTransport,
    private readonly logger: Logger
  ) {}

  /**
   * Hand a message to the transport; a failed delivery is logged, never raised
   */
  async dispatch(message: StatusMessage): Promise<boolean> {
    try {
      await this.transport.send(message);
      return true;
    } catch (error) {
      this.logger.warn('Status message delivery failed', {
        error: errorMessage(error),
        request_id: message.requestId,
        state: message.state,
        correlation_id: message.correlationId,
      });
      return false;
    }
  }
}

/**
 * Writes status messages to the outbox table; the chat relay publishes them
 */
export class OutboxStatusTransport implements StatusTransport {
  constructor(private readonly db: Pool) {}

  async send(message: StatusMessage): Promise<void> {
    await this.db.query(
      `INSERT INTO booking_orchestrator.outbox
        (id, aggregate_id, aggregate_type, event_type, payload, correlation_id)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        randomUUID(),
        message.requestId,
        'booking_request',
        'booking.status_message',
        JSON.stringify({
          user_id: message.userId,
          request_id: message.requestId,
          state: message.state,
          message: message.message,
        }),
        message.correlationId ?? randomUUID(),
      ]
    );
  }
}
