/**
 * In-process stand-ins for PostgreSQL-backed collaborators
 */

import type { BookingRepository } from '../../src/repositories/booking-repository.js';
import type { AuditSink } from '../../src/services/audit-logger.js';
import type { StatusMessage, StatusTransport } from '../../src/services/notification-dispatcher.js';
import type { AuditEntry, BookingRequest } from '../../src/types/booking.js';

const TERMINAL = ['Delivered', 'Cancelled', 'Failed'];

export class InMemoryBookingRepository implements BookingRepository {
  readonly rows = new Map<string, BookingRequest>();
  failSaves = false;

  async create(request: BookingRequest): Promise<void> {
    if (this.rows.has(request.id)) {
      throw new Error(`duplicate key value violates unique constraint: ${request.id}`);
    }
    this.rows.set(request.id, structuredClone(request));
  }

  async get(id: string): Promise<BookingRequest | null> {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  async save(request: BookingRequest): Promise<void> {
    if (this.failSaves) {
      throw new Error('connection terminated unexpectedly');
    }
    this.rows.set(request.id, structuredClone(request));
  }

  async findActiveByUser(userId: string): Promise<BookingRequest | null> {
    const active = [...this.rows.values()]
      .filter((row) => row.userId === userId && !TERMINAL.includes(row.state))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return active[0] ? structuredClone(active[0]) : null;
  }
}

export class InMemoryAuditSink implements AuditSink {
  readonly entries: AuditEntry[] = [];
  failing = false;

  async append(entry: AuditEntry): Promise<void> {
    if (this.failing) {
      throw new Error('audit_log unavailable');
    }
    this.entries.push(entry);
  }

  async list(requestId: string): Promise<AuditEntry[]> {
    return this.entries.filter((entry) => entry.requestId === requestId);
  }

  kinds(requestId: string): string[] {
    return this.entries.filter((entry) => entry.requestId === requestId).map((entry) => entry.kind);
  }
}

export class RecordingTransport implements StatusTransport {
  readonly messages: StatusMessage[] = [];
  failing = false;

  async send(message: StatusMessage): Promise<void> {
    if (this.failing) {
      throw new Error('outbox insert failed');
    }
    this.messages.push(message);
  }
}
