/**
 * Document gate
 *
 * Tracks one DocumentRecord per required document type and party. The
 * booking may leave DocumentsPending only when every record is verified; a
 * rejected upload flags its own record and nothing else.
 */

import type { DocumentParty, DocumentRecord } from '../types/booking.js';
import { ValidationError } from '../utils/errors.js';

export interface RequiredDocuments {
  user: string[];
  provider: string[];
}

export type DocumentVerdict = { status: 'verified' } | { status: 'rejected'; reason: string };

export class DocumentGate {
  constructor(private readonly required: RequiredDocuments) {}

  createRecords(): DocumentRecord[] {
    const build = (party: DocumentParty) => (type: string): DocumentRecord => ({
      type,
      party,
      recordId: null,
      uploadStatus: 'missing',
      verificationStatus: 'pending',
      notes: null,
    });
    return [...this.required.user.map(build('user')), ...this.required.provider.map(build('provider'))];
  }

  /**
   * Resolve the record for an upload; only configured types are accepted
   */
  find(records: DocumentRecord[], party: DocumentParty, type: string): DocumentRecord {
    const record = records.find((r) => r.party === party && r.type === type);
    if (!record) {
      const allowed = this.required[party].join(', ') || 'none';
      throw new ValidationError(`Document '${type}' is not required from ${party} (expected: ${allowed})`, [
        { field: 'type', message: `unknown ${party} document type` },
      ]);
    }
    return record;
  }

  markUploaded(records: DocumentRecord[], party: DocumentParty, type: string, recordId: string): DocumentRecord[] {
    this.find(records, party, type);
    return records.map((r): DocumentRecord =>
      r.party === party && r.type === type
        ? { ...r, recordId, uploadStatus: 'uploaded', verificationStatus: 'pending', notes: null }
        : r
    );
  }

  /**
   * Apply a verification verdict; stale verdicts for a replaced upload are ignored
   */
  applyVerification(records: DocumentRecord[], recordId: string, verdict: DocumentVerdict): DocumentRecord[] {
    return records.map((r): DocumentRecord => {
      if (r.recordId !== recordId) {
        return r;
      }
      return verdict.status === 'verified'
        ? { ...r, verificationStatus: 'verified', notes: null }
        : { ...r, verificationStatus: 'rejected', notes: verdict.reason };
    });
  }

  allVerified(records: DocumentRecord[]): boolean {
    return records.length > 0 && records.every((r) => r.verificationStatus === 'verified');
  }

  outstanding(records: DocumentRecord[]): DocumentRecord[] {
    return records.filter((r) => r.verificationStatus !== 'verified');
  }
}
