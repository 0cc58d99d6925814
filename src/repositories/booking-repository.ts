/**
 * Booking request persistence
 * One row per request: the aggregate as JSONB plus the columns queries filter on
 */

import type { Pool } from 'pg';
import type { BookingRequest, BookingState } from '../types/booking.js';
import { ValidationError } from '../utils/errors.js';

export interface BookingRepository {
  create(request: BookingRequest): Promise<void>;
  get(id: string): Promise<BookingRequest | null>;
  save(request: BookingRequest): Promise<void>;
  /** Latest non-terminal request of a user */
  findActiveByUser(userId: string): Promise<BookingRequest | null>;
}

type BookingRow = {
  document: BookingRequest;
};

const TERMINAL: BookingState[] = ['Delivered', 'Cancelled', 'Failed'];

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

export class PgBookingRepository implements BookingRepository {
  constructor(private readonly db: Pool) {}

  /**
   * @throws ValidationError when the user already has an open request (uq_booking_requests_active_user)
   */
  async create(request: BookingRequest): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO booking_orchestrator.booking_requests
          (id, user_id, state, sequence, document, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          request.id,
          request.userId,
          request.state,
          request.sequence,
          JSON.stringify(request),
          request.createdAt,
          request.updatedAt,
        ]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError('An active booking request already exists', [
          { field: 'user_id', message: `user ${request.userId} already has an open request` },
        ]);
      }
      throw error;
    }
  }

  async get(id: string): Promise<BookingRequest | null> {
    const result = await this.db.query<BookingRow>(
      'SELECT document FROM booking_orchestrator.booking_requests WHERE id = $1',
      [id]
    );
    return result.rows[0]?.document ?? null;
  }

  async save(request: BookingRequest): Promise<void> {
    await this.db.query(
      `UPDATE booking_orchestrator.booking_requests
       SET state = $2, sequence = $3, document = $4, updated_at = $5
       WHERE id = $1`,
      [request.id, request.state, request.sequence, JSON.stringify(request), request.updatedAt]
    );
  }

  async findActiveByUser(userId: string): Promise<BookingRequest | null> {
    const result = await this.db.query<BookingRow>(
      `SELECT document FROM booking_orchestrator.booking_requests
       WHERE user_id = $1 AND state <> ALL($2::text[])
       ORDER BY created_at DESC
       LIMIT 1`,
      [userId, TERMINAL]
    );
    return result.rows[0]?.document ?? null;
  }
}
