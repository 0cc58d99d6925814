/**
 * Append-only audit log
 *
 * record() masks the payload, appends one entry and never throws. When the
 * sink fails, the entry goes to the fallback logger and the audit logger
 * reports degraded mode to its caller.
 */

import { randomUUID } from 'crypto';
import type { Pool } from 'pg';
import type { AuditEntry, AuditKind, AuditSeverity } from '../types/booking.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface AuditSink {
  append(entry: AuditEntry): Promise<void>;
  list(requestId: string): Promise<AuditEntry[]>;
}

export interface PayloadMasker {
  maskPayload(payload: Record<string, unknown>): Record<string, unknown>;
}

export interface AuditRecordInput {
  requestId: string;
  kind: AuditKind;
  severity?: AuditSeverity;
  payload?: Record<string, unknown>;
}

export interface AuditRecordResult {
  recorded: boolean;
  entry: AuditEntry;
}

interface AuditLoggerDependencies {
  sink: AuditSink;
  masker: PayloadMasker;
  logger: Logger;
  clock?: () => Date;
}

export class AuditLogger {
  private readonly sink: AuditSink;
  private readonly masker: PayloadMasker;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private failures = 0;

  constructor(deps: AuditLoggerDependencies) {
    this.sink = deps.sink;
    this.masker = deps.masker;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());
  }

  async record(input: AuditRecordInput): Promise<AuditRecordResult> {
    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: this.clock().toISOString(),
      requestId: input.requestId,
      kind: input.kind,
      severity: input.severity ?? 'info',
      payload: this.masker.maskPayload(input.payload ?? {}),
    };

    try {
      await this.sink.append(entry);
      return { recorded: true, entry };
    } catch (error) {
      this.failures++;
      // Fallback channel: the entry must not vanish
      this.logger.error('Audit write failed, entry kept in fallback log', {
        error: errorMessage(error),
        audit_entry: entry,
      });
      this.logger.warn('Audit logger running in degraded mode', {
        request_id: entry.requestId,
        failures: this.failures,
      });
      return { recorded: false, entry };
    }
  }

  async list(requestId: string): Promise<AuditEntry[]> {
    return this.sink.list(requestId);
  }

  isDegraded(): boolean {
    return this.failures > 0;
  }

  get failureCount(): number {
    return this.failures;
  }
}

type AuditRow = {
  id: string;
  request_id: string;
  kind: AuditKind;
  severity: AuditSeverity;
  payload: Record<string, unknown>;
  created_at: Date | string;
};

/**
 * PostgreSQL sink; one INSERT per entry so concurrent appends never interleave
 */
export class PgAuditSink implements AuditSink {
  constructor(private readonly db: Pool) {}

  async append(entry: AuditEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO booking_orchestrator.audit_log
        (id, request_id, kind, severity, payload, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [entry.id, entry.requestId, entry.kind, entry.severity, JSON.stringify(entry.payload), entry.timestamp]
    );
  }

  async list(requestId: string): Promise<AuditEntry[]> {
    const result = await this.db.query<AuditRow>(
      `SELECT id, request_id, kind, severity, payload, created_at
       FROM booking_orchestrator.audit_log
       WHERE request_id = $1
       ORDER BY seq ASC`,
      [requestId]
    );
    return result.rows.map((row) => ({
      id: row.id,
      requestId: row.request_id,
      kind: row.kind,
      severity: row.severity,
      payload: row.payload,
      timestamp: new Date(row.created_at).toISOString(),
    }));
  }
}
