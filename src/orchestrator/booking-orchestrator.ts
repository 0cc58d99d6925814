/**
 * Booking orchestrator
 *
 * Owns the BookingRequest aggregate and drives it through the state machine.
 * Validate-and-apply runs under the per-request lock; calls to the catalog,
 * the verifier and the document store run outside it and their results are
 * applied only if the request is still where it was when the call started.
 * Every transition is audited before its status message is dispatched.
 */

import { createHash, randomUUID } from 'crypto';
import type { AuditLogger } from '../services/audit-logger.js';
import type { AvailabilityOutcome, VerifyContext } from '../services/availability-client.js';
import type { SearchOptions } from '../services/catalog-client.js';
import { validateCriteria } from '../services/catalog-client.js';
import { outstandingFields, type DetailCollector, type RejectedField } from '../services/detail-collector.js';
import type { DocumentGate, DocumentVerdict } from '../services/document-gate.js';
import type { DocumentPayload } from '../services/document-store-client.js';
import type { NotificationDispatcher, StatusMessage } from '../services/notification-dispatcher.js';
import type { CallContext, RetryListener } from '../services/provider-http.js';
import { isTripDetailField, type SecurityGate } from '../services/security-gate.js';
import type { BookingRepository } from '../repositories/booking-repository.js';
import type {
  AuditEntry,
  Booking,
  BookingRequest,
  BookingStatus,
  Candidate,
  DocumentParty,
  DocumentRecord,
  SearchCriteria,
  TripDetailField,
  TripDetails,
  TriggerKind,
} from '../types/booking.js';
import {
  AvailabilityRejected,
  ExternalServiceError,
  FatalError,
  InvalidTransition,
  NotFoundError,
  SecurityViolation,
  ValidationError,
  errorMessage,
  isBookingError,
} from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { RequestLock } from '../utils/request-lock.js';
import { parseIntent } from './intent.js';
import { rejectionMessage, stateMessage } from './messages.js';
import { isTerminal, nextState, permits } from './state-machine.js';

export interface CandidateCatalog {
  search(criteria: SearchCriteria, options?: SearchOptions): Promise<Candidate[]>;
}

export interface AvailabilityVerifier {
  verify(candidateId: string, details: TripDetails, context: VerifyContext): Promise<AvailabilityOutcome>;
}

export interface DocumentStore {
  upload(type: string, payload: DocumentPayload, context?: CallContext): Promise<string>;
  verify(recordId: string, context?: CallContext): Promise<DocumentVerdict>;
}

export interface OrchestratorDependencies {
  repository: BookingRepository;
  catalog: CandidateCatalog;
  verifier: AvailabilityVerifier;
  documentStore: DocumentStore;
  gate: SecurityGate;
  collector: DetailCollector;
  documentGate: DocumentGate;
  audit: AuditLogger;
  notifier: NotificationDispatcher;
  logger: Logger;
  maxRetrySelections: number;
  lock?: RequestLock;
  clock?: () => Date;
  idFactory?: () => string;
}

/**
 * Delivery metadata of an inbound event
 */
export interface EventMeta {
  /** Request sequence the sender observed when issuing the event */
  sequence?: number;
  correlationId?: string;
}

export interface SelectionInput {
  candidateId?: string;
  /** 1-based position in the offered list */
  optionNumber?: number;
}

export interface CriteriaPatch {
  origin?: string;
  destination?: string;
  dateWindow?: { start?: string; end?: string };
  partyCount?: number;
  budget?: number | null;
}

export interface DocumentUpload {
  party: DocumentParty;
  type: string;
  fileName: string;
  mimeType: string;
  /** Base64-encoded content */
  content: string;
}

export type TripStatusUpdate = 'in_transit' | 'delivered';

export interface DetailsSubmission {
  request: BookingRequest;
  accepted: TripDetailField[];
  rejected: RejectedField[];
  outstanding: TripDetailField[];
}

export interface DocumentSubmission {
  request: BookingRequest;
  document: DocumentRecord | null;
}

type RejectionError = ValidationError | SecurityViolation;

interface DetailsStep {
  request: BookingRequest;
  accepted: TripDetailField[];
  rejected: RejectedField[];
  verify: boolean;
}

/**
 * Deterministic JSON: object keys sorted at every level
 */
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function fingerprintOf(event: string, payload: unknown): string {
  return createHash('sha256').update(`${event}:${canonicalJson(payload)}`).digest('hex').slice(0, 16);
}

function withBookingStatus(booking: Booking | null, status: BookingStatus): Booking | null {
  return booking ? { ...booking, status } : null;
}

const SEARCHABLE_STATES = ['Searching', 'RetrySelection'] as const;

function isSearchable(request: BookingRequest): boolean {
  return SEARCHABLE_STATES.some((state) => state === request.state);
}

function acceptsDocuments(request: BookingRequest): boolean {
  return request.state === 'Confirmed' || request.state === 'DocumentsPending';
}

export class BookingOrchestrator {
  private readonly repository: BookingRepository;
  private readonly catalog: CandidateCatalog;
  private readonly verifier: AvailabilityVerifier;
  private readonly documentStore: DocumentStore;
  private readonly gate: SecurityGate;
  private readonly collector: DetailCollector;
  private readonly documentGate: DocumentGate;
  private readonly audit: AuditLogger;
  private readonly notifier: NotificationDispatcher;
  private readonly logger: Logger;
  private readonly maxRetrySelections: number;
  private readonly lock: RequestLock;
  private readonly clock: () => Date;
  private readonly idFactory: () => string;

  constructor(deps: OrchestratorDependencies) {
    this.repository = deps.repository;
    this.catalog = deps.catalog;
    this.verifier = deps.verifier;
    this.documentStore = deps.documentStore;
    this.gate = deps.gate;
    this.collector = deps.collector;
    this.documentGate = deps.documentGate;
    this.audit = deps.audit;
    this.notifier = deps.notifier;
    this.logger = deps.logger;
    this.maxRetrySelections = deps.maxRetrySelections;
    this.lock = deps.lock ?? new RequestLock();
    this.clock = deps.clock ?? (() => new Date());
    this.idFactory = deps.idFactory ?? randomUUID;
  }

  /**
   * Open a booking request from a structured intent and run the first search
   *
   * @throws ValidationError for a malformed intent or when the user already has an active request
   * @throws SecurityViolation when route text carries a dangerous payload
   */
  async createRequest(userId: string, input: unknown, meta: EventMeta = {}): Promise<BookingRequest> {
    const requestId = this.idFactory();

    return this.guarded(requestId, 'createRequest', async () => {
      const intent = await this.admit(requestId, { user_id: userId }, () => parseIntent(input));
      const criteria: SearchCriteria = {
        origin: intent.route.origin.trim(),
        destination: intent.route.destination.trim(),
        dateWindow: { start: intent.dates.start, end: intent.dates.end ?? intent.dates.start },
        partyCount: intent.party_count,
      };
      await this.admit(requestId, { user_id: userId }, () => this.checkCriteria(criteria));

      const intentFingerprint = fingerprintOf('intent', { userId, intent });
      const opened = await this.lock.runExclusive(`user:${userId}`, async () => {
        const active = await this.repository.findActiveByUser(userId);
        if (active) {
          if (active.intentFingerprint === intentFingerprint) {
            await this.recordReplay(active, 'intent', active.sequence, meta);
            return { request: active, created: false };
          }
          const error = new ValidationError('An active booking request already exists', [
            { field: 'user_id', message: `request ${active.id} is still ${active.state}; cancel it first` },
          ]);
          await this.auditRejection(requestId, error, { user_id: userId, active_request_id: active.id });
          throw error;
        }

        const prefill: Record<string, unknown> = {};
        for (const [field, value] of Object.entries(intent.free_text_fields)) {
          if (isTripDetailField(field)) {
            prefill[field] = value;
          }
        }
        const merged = this.collector.merge({}, prefill);

        const now = this.now();
        const request: BookingRequest = {
          id: requestId,
          userId,
          intentKind: intent.intent_kind,
          criteria,
          budget: intent.budget ?? null,
          state: 'Searching',
          sequence: 0,
          excludedCandidateIds: [],
          offeredCandidates: [],
          selectedCandidateId: null,
          tripDetails: merged.details,
          booking: null,
          documents: [],
          retryCount: 0,
          failureReason: null,
          history: [],
          intentFingerprint,
          createdAt: now,
          updatedAt: now,
        };

        await this.repository.create(request);
        await this.audit.record({
          requestId,
          kind: 'request_created',
          payload: {
            user_id: userId,
            intent_kind: request.intentKind,
            origin: criteria.origin,
            destination: criteria.destination,
            date_window: criteria.dateWindow,
            party_count: criteria.partyCount,
            budget: request.budget,
            prefilled: merged.accepted,
            correlation_id: meta.correlationId,
          },
        });
        for (const rejected of merged.rejected) {
          await this.auditRejectedField(requestId, rejected, prefill[rejected.field]);
        }

        this.logger.info('Booking request created', {
          request_id: requestId,
          user_id: userId,
          intent_kind: request.intentKind,
          correlation_id: meta.correlationId,
        });
        return { request, created: true };
      });

      return opened.created ? this.runSearch(requestId, meta) : opened.request;
    });
  }

  /**
   * Change the search criteria of a request that has no offers yet and search again
   */
  async refineSearch(requestId: string, patch: CriteriaPatch, meta: EventMeta = {}): Promise<BookingRequest> {
    return this.guarded(requestId, 'refineSearch', async () => {
      await this.exclusive(requestId, async (outbox) => {
        const current = await this.load(requestId);
        if (!isSearchable(current)) {
          throw await this.rejectEvent(current, 'refine_search');
        }

        const criteria: SearchCriteria = {
          origin: patch.origin?.trim() ?? current.criteria.origin,
          destination: patch.destination?.trim() ?? current.criteria.destination,
          dateWindow: {
            start: patch.dateWindow?.start ?? current.criteria.dateWindow.start,
            end: patch.dateWindow?.end ?? patch.dateWindow?.start ?? current.criteria.dateWindow.end,
          },
          partyCount: patch.partyCount ?? current.criteria.partyCount,
        };
        const problem = this.criteriaProblem(criteria);
        if (problem) {
          throw await this.refuse(current, problem, outbox, meta);
        }

        const updated: BookingRequest = {
          ...current,
          criteria,
          budget: patch.budget === undefined ? current.budget : patch.budget,
          updatedAt: this.now(),
        };
        await this.repository.save(updated);
        await this.audit.record({
          requestId,
          kind: 'criteria_updated',
          payload: { criteria, budget: updated.budget, correlation_id: meta.correlationId },
        });
      });

      return this.runSearch(requestId, meta);
    });
  }

  /**
   * Pick one of the offered candidates by offer id or option number
   */
  async submitSelection(requestId: string, selection: SelectionInput, meta: EventMeta = {}): Promise<BookingRequest> {
    return this.guarded(requestId, 'submitSelection', () =>
      this.exclusive(requestId, async (outbox) => {
        const current = await this.load(requestId);
        const candidateId = this.resolveSelection(current, selection);
        const fingerprint = fingerprintOf('selection', candidateId ?? selection);

        if (await this.isReplay(current, 'selection', fingerprint, meta)) {
          return current;
        }
        if (!permits(current.state, 'selection')) {
          throw await this.rejectEvent(current, 'selection');
        }

        const offered = current.offeredCandidates.length;
        if (!candidateId || !current.offeredCandidates.some((c) => c.offerId === candidateId)) {
          const field = selection.optionNumber !== undefined ? 'optionNumber' : 'candidateId';
          throw await this.refuse(
            current,
            new ValidationError('Selection does not match an offered option', [
              { field, message: `choose an option between 1 and ${offered}` },
            ]),
            outbox,
            meta
          );
        }
        if (current.excludedCandidateIds.includes(candidateId)) {
          throw await this.refuse(
            current,
            new ValidationError('Selected candidate was already rejected', [
              { field: 'candidateId', message: `${candidateId} is excluded` },
            ]),
            outbox,
            meta
          );
        }

        return this.applyTransition(
          current,
          'selection',
          {
            fingerprint,
            meta,
            changes: { selectedCandidateId: candidateId },
            payload: { candidate_id: candidateId },
          },
          outbox
        );
      })
    );
  }

  /**
   * Merge submitted trip details; once every required field is valid the
   * candidate is sent for availability verification
   *
   * Field-level rejections are reported in the result, not thrown.
   */
  async submitDetails(
    requestId: string,
    fields: Record<string, unknown>,
    meta: EventMeta = {}
  ): Promise<DetailsSubmission> {
    return this.guarded(requestId, 'submitDetails', async () => {
      const step = await this.exclusive<DetailsStep>(requestId, async (outbox) => {
        const current = await this.load(requestId);
        const fingerprint = fingerprintOf('details_completed', fields);

        if (await this.isReplay(current, 'details_completed', fingerprint, meta)) {
          return { request: current, accepted: [], rejected: [], verify: false };
        }
        if (current.state !== 'CollectingDetails') {
          throw await this.rejectEvent(current, 'details_completed');
        }

        const merged = this.collector.merge(current.tripDetails, fields);
        for (const rejected of merged.rejected) {
          await this.auditRejectedField(requestId, rejected, fields[rejected.field]);
        }
        if (merged.accepted.length > 0) {
          await this.audit.record({
            requestId,
            kind: 'details_updated',
            payload: {
              accepted: merged.accepted,
              outstanding: merged.outstanding,
              correlation_id: meta.correlationId,
            },
          });
        }

        const updated: BookingRequest = { ...current, tripDetails: merged.details, updatedAt: this.now() };

        if (merged.complete && merged.rejected.length === 0) {
          const verifying = await this.applyTransition(
            updated,
            'details_completed',
            { fingerprint, meta, payload: { accepted: merged.accepted } },
            outbox
          );
          return { request: verifying, accepted: merged.accepted, rejected: merged.rejected, verify: true };
        }

        if (merged.accepted.length > 0) {
          await this.repository.save(updated);
        }
        const message =
          merged.rejected.length > 0 ? rejectionMessage(updated, merged.rejected) : stateMessage(updated);
        outbox.push(this.statusMessage(updated, message, meta));
        return { request: updated, accepted: merged.accepted, rejected: merged.rejected, verify: false };
      });

      const request = step.verify
        ? await this.runVerification(requestId, step.request.sequence, meta)
        : step.request;

      return {
        request,
        accepted: step.accepted,
        rejected: step.rejected,
        outstanding: outstandingFields(request.tripDetails),
      };
    });
  }

  /**
   * Store one required document and have it verified
   *
   * The first upload after confirmation moves the request to DocumentsPending;
   * the last verified document moves it to DocumentsVerified.
   */
  async uploadDocument(requestId: string, upload: DocumentUpload, meta: EventMeta = {}): Promise<DocumentSubmission> {
    return this.guarded(requestId, 'uploadDocument', async () => {
      await this.exclusive(requestId, async (outbox) => {
        const current = await this.load(requestId);
        if (!acceptsDocuments(current)) {
          throw await this.rejectEvent(current, 'document_uploaded');
        }
        const problem = this.uploadProblem(current, upload);
        if (problem) {
          throw await this.refuse(current, problem, outbox, meta, { document_type: upload.type, party: upload.party });
        }
      });

      const context: CallContext = {
        correlationId: meta.correlationId,
        onRetry: this.retryMarker(requestId, 'document-store', meta),
      };

      let recordId: string;
      try {
        recordId = await this.documentStore.upload(
          upload.type,
          {
            party: upload.party,
            requestId,
            fileName: upload.fileName,
            mimeType: upload.mimeType,
            content: upload.content,
          },
          context
        );
      } catch (error) {
        if (error instanceof ExternalServiceError) {
          await this.reportExternalFailure(requestId, error, 'Document upload is temporarily unavailable. Please try again.', meta);
        }
        throw error;
      }

      const stored = await this.exclusive(requestId, async (outbox) => {
        const current = await this.load(requestId);
        if (!acceptsDocuments(current)) {
          await this.recordStale(current, 'document_uploaded', { record_id: recordId, document_type: upload.type });
          return false;
        }

        const documents = this.documentGate.markUploaded(current.documents, upload.party, upload.type, recordId);
        await this.audit.record({
          requestId,
          kind: 'document_uploaded',
          payload: {
            document_type: upload.type,
            party: upload.party,
            record_id: recordId,
            file_name: upload.fileName,
            correlation_id: meta.correlationId,
          },
        });

        if (current.state === 'Confirmed') {
          await this.applyTransition(
            current,
            'document_uploaded',
            {
              fingerprint: fingerprintOf('document_uploaded', { recordId }),
              meta,
              changes: { documents, booking: withBookingStatus(current.booking, 'documents_pending') },
              payload: { document_type: upload.type, record_id: recordId },
            },
            outbox
          );
        } else {
          await this.repository.save({ ...current, documents, updatedAt: this.now() });
        }
        return true;
      });

      if (!stored) {
        return this.documentResult(await this.load(requestId), upload);
      }

      let verdict: DocumentVerdict;
      try {
        verdict = await this.documentStore.verify(recordId, context);
      } catch (error) {
        if (!(error instanceof ExternalServiceError)) {
          throw error;
        }
        await this.reportExternalFailure(
          requestId,
          error,
          `We received your ${upload.type}; its verification is delayed. Re-upload it if it stays pending.`,
          meta
        );
        return this.documentResult(await this.load(requestId), upload);
      }

      const request = await this.exclusive(requestId, async (outbox) => {
        const current = await this.load(requestId);
        if (current.state !== 'DocumentsPending' || !current.documents.some((d) => d.recordId === recordId)) {
          await this.recordStale(current, 'documents_verified', {
            record_id: recordId,
            verdict: verdict.status,
          });
          return current;
        }

        const documents = this.documentGate.applyVerification(current.documents, recordId, verdict);
        await this.audit.record({
          requestId,
          kind: verdict.status === 'verified' ? 'document_verified' : 'document_rejected',
          severity: verdict.status === 'verified' ? 'info' : 'warning',
          payload: {
            document_type: upload.type,
            party: upload.party,
            record_id: recordId,
            ...(verdict.status === 'rejected' ? { reason: verdict.reason } : {}),
          },
        });

        if (this.documentGate.allVerified(documents)) {
          return this.applyTransition(
            current,
            'documents_verified',
            {
              fingerprint: fingerprintOf('documents_verified', documents.map((d) => d.recordId)),
              meta,
              changes: { documents, booking: withBookingStatus(current.booking, 'documents_verified') },
            },
            outbox
          );
        }

        const updated: BookingRequest = { ...current, documents, updatedAt: this.now() };
        await this.repository.save(updated);
        const message =
          verdict.status === 'rejected'
            ? `Your ${upload.type} was rejected: ${verdict.reason}. Please upload it again.`
            : stateMessage(updated);
        outbox.push(this.statusMessage(updated, message, meta));
        return updated;
      });

      return this.documentResult(request, upload);
    });
  }

  /**
   * Apply a provider-reported trip status
   */
  async updateTripStatus(requestId: string, status: TripStatusUpdate, meta: EventMeta = {}): Promise<BookingRequest> {
    const trigger: TriggerKind = status === 'in_transit' ? 'transit_started' : 'delivery_confirmed';

    return this.guarded(requestId, 'updateTripStatus', () =>
      this.exclusive(requestId, async (outbox) => {
        const current = await this.load(requestId);
        const fingerprint = fingerprintOf(trigger, { status });

        if (await this.isReplay(current, trigger, fingerprint, meta)) {
          return current;
        }
        if (!permits(current.state, trigger)) {
          throw await this.rejectEvent(current, trigger);
        }

        return this.applyTransition(
          current,
          trigger,
          { fingerprint, meta, changes: { booking: withBookingStatus(current.booking, status) }, payload: { status } },
          outbox
        );
      })
    );
  }

  /**
   * Cancel a request from any non-terminal state; in-flight results arriving
   * afterwards are discarded as stale
   */
  async cancel(requestId: string, reason: string | null = null, meta: EventMeta = {}): Promise<BookingRequest> {
    return this.guarded(requestId, 'cancel', () =>
      this.exclusive(requestId, async (outbox) => {
        const current = await this.load(requestId);
        const fingerprint = fingerprintOf('cancel', {});

        // Cancel wins over any pending event; the sequence only identifies a redelivery
        const applied = current.history.find((record) => record.trigger === 'cancel' && record.fingerprint === fingerprint);
        if (applied) {
          await this.recordReplay(current, 'cancel', applied.sequence, meta);
          return current;
        }
        if (!permits(current.state, 'cancel')) {
          throw await this.rejectEvent(current, 'cancel');
        }

        return this.applyTransition(
          current,
          'cancel',
          {
            fingerprint,
            meta,
            changes: { booking: withBookingStatus(current.booking, 'cancelled') },
            payload: { reason },
          },
          outbox
        );
      })
    );
  }

  async getStatus(requestId: string): Promise<BookingRequest> {
    return this.load(requestId);
  }

  async getAuditTrail(requestId: string): Promise<AuditEntry[]> {
    await this.load(requestId);
    return this.audit.list(requestId);
  }

  async findActiveRequest(userId: string): Promise<BookingRequest | null> {
    return this.repository.findActiveByUser(userId);
  }

  private async runSearch(requestId: string, meta: EventMeta): Promise<BookingRequest> {
    const snapshot = await this.load(requestId);
    if (!isSearchable(snapshot)) {
      return snapshot;
    }
    const sequence = snapshot.sequence;
    const searchKey = canonicalJson(snapshot.criteria);

    let candidates: Candidate[];
    try {
      candidates = await this.catalog.search(snapshot.criteria, {
        excluded: snapshot.excludedCandidateIds,
        budget: snapshot.budget,
        correlationId: meta.correlationId,
        onRetry: this.retryMarker(requestId, 'catalog', meta),
      });
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        return this.reportExternalFailure(
          requestId,
          error,
          'Search is temporarily unavailable. Please try again shortly.',
          meta
        );
      }
      throw error;
    }

    return this.exclusive(requestId, async (outbox) => {
      const current = await this.load(requestId);
      if (current.sequence !== sequence || !isSearchable(current) || canonicalJson(current.criteria) !== searchKey) {
        await this.recordStale(current, 'search_completed', {
          expected_sequence: sequence,
          candidates: candidates.length,
        });
        return current;
      }

      const fingerprint = fingerprintOf('search_completed', {
        criteria: current.criteria,
        offers: candidates.map((c) => c.offerId),
      });

      if (candidates.length === 0) {
        if (current.state === 'Searching') {
          await this.audit.record({
            requestId,
            kind: 'search_empty',
            payload: { criteria: current.criteria, correlation_id: meta.correlationId },
          });
          outbox.push(this.statusMessage(current, stateMessage(current), meta));
          return current;
        }
        return this.applyTransition(
          current,
          'search_completed',
          {
            fingerprint,
            meta,
            emptyResult: true,
            changes: { offeredCandidates: [], failureReason: 'no alternatives available' },
            payload: { candidates: 0, excluded: current.excludedCandidateIds },
          },
          outbox
        );
      }

      return this.applyTransition(
        current,
        'search_completed',
        {
          fingerprint,
          meta,
          changes: { offeredCandidates: candidates, selectedCandidateId: null },
          payload: { candidates: candidates.length, excluded: current.excludedCandidateIds },
        },
        outbox
      );
    });
  }

  private async runVerification(requestId: string, sequence: number, meta: EventMeta): Promise<BookingRequest> {
    const snapshot = await this.load(requestId);
    const candidateId = snapshot.selectedCandidateId;
    if (snapshot.state !== 'VerifyingAvailability' || snapshot.sequence !== sequence || !candidateId) {
      return snapshot;
    }

    let outcome: AvailabilityOutcome;
    try {
      outcome = await this.verifier.verify(candidateId, snapshot.tripDetails, {
        requestId,
        dateWindow: snapshot.criteria.dateWindow,
        correlationId: meta.correlationId,
        onRetry: this.retryMarker(requestId, 'availability', meta),
      });
    } catch (error) {
      if (!(error instanceof ExternalServiceError)) {
        throw error;
      }
      await this.auditExternalFailure(requestId, error, meta);
      outcome = { status: 'rejected', reason: 'verification unavailable' };
    }

    const step = await this.exclusive(requestId, async (outbox) => {
      const current = await this.load(requestId);
      if (current.state !== 'VerifyingAvailability' || current.sequence !== sequence) {
        await this.recordStale(
          current,
          outcome.status === 'confirmed' ? 'availability_confirmed' : 'availability_rejected',
          { candidate_id: candidateId, expected_sequence: sequence, outcome: outcome.status }
        );
        return { request: current, searchAgain: false };
      }

      if (outcome.status === 'confirmed') {
        const booking: Booking = {
          reference: outcome.bookingReference,
          candidateId,
          status: 'confirmed',
          confirmedAt: this.now(),
        };
        const confirmed = await this.applyTransition(
          current,
          'availability_confirmed',
          {
            fingerprint: fingerprintOf('availability_confirmed', { candidateId, reference: booking.reference }),
            meta,
            changes: { booking, documents: this.documentGate.createRecords() },
            payload: { candidate_id: candidateId, booking_reference: booking.reference },
          },
          outbox
        );
        return { request: confirmed, searchAgain: false };
      }

      const rejection = new AvailabilityRejected(candidateId, outcome.reason);
      const excludedCandidateIds = current.excludedCandidateIds.includes(candidateId)
        ? current.excludedCandidateIds
        : [...current.excludedCandidateIds, candidateId];
      const retryCount = current.retryCount + 1;

      const retrying = await this.applyTransition(
        current,
        'availability_rejected',
        {
          fingerprint: fingerprintOf('availability_rejected', { candidateId, reason: outcome.reason }),
          meta,
          changes: { excludedCandidateIds, retryCount, selectedCandidateId: null, offeredCandidates: [] },
          payload: {
            error_kind: rejection.kind,
            candidate_id: candidateId,
            reason: outcome.reason,
            retry_count: retryCount,
          },
          message: `The selected truck is not available (${outcome.reason}). Looking for alternatives...`,
        },
        outbox
      );

      if (retryCount > this.maxRetrySelections) {
        const failed = await this.applyTransition(
          retrying,
          'fatal',
          {
            fingerprint: fingerprintOf('fatal', { reason: 'retry limit reached', retryCount }),
            meta,
            changes: { failureReason: 'retry limit reached' },
            payload: { reason: 'retry limit reached', retry_count: retryCount, max_retry_selections: this.maxRetrySelections },
          },
          outbox
        );
        return { request: failed, searchAgain: false };
      }

      return { request: retrying, searchAgain: true };
    });

    return step.searchAgain ? this.runSearch(requestId, meta) : step.request;
  }

  private async applyTransition(
    request: BookingRequest,
    trigger: TriggerKind,
    step: {
      fingerprint: string;
      meta: EventMeta;
      changes?: Partial<BookingRequest>;
      payload?: Record<string, unknown>;
      emptyResult?: boolean;
      message?: string;
    },
    outbox: StatusMessage[]
  ): Promise<BookingRequest> {
    const to = nextState(request.state, trigger, { emptyResult: step.emptyResult });
    if (!to) {
      throw await this.rejectEvent(request, trigger);
    }

    const at = this.now();
    const sequence = request.sequence + 1;
    const updated: BookingRequest = {
      ...request,
      ...step.changes,
      state: to,
      sequence,
      history: [
        ...request.history,
        { sequence, from: request.state, to, trigger, fingerprint: step.fingerprint, at },
      ],
      updatedAt: at,
    };

    await this.repository.save(updated);
    await this.audit.record({
      requestId: request.id,
      kind: 'transition',
      payload: {
        from: request.state,
        to,
        trigger,
        sequence,
        correlation_id: step.meta.correlationId,
        ...step.payload,
      },
    });

    this.logger.info('Booking request transitioned', {
      request_id: request.id,
      from: request.state,
      to,
      trigger,
      sequence,
      correlation_id: step.meta.correlationId,
    });

    outbox.push(this.statusMessage(updated, step.message ?? stateMessage(updated), step.meta));
    return updated;
  }

  /**
   * Recognise a redelivered event
   *
   * @returns true for a replay of an applied transition (marker written, no change)
   * @throws InvalidTransition for an event issued against an outdated sequence that does not match
   */
  private async isReplay(
    request: BookingRequest,
    trigger: TriggerKind,
    fingerprint: string,
    meta: EventMeta
  ): Promise<boolean> {
    if (meta.sequence !== undefined && meta.sequence !== request.sequence) {
      const observed = meta.sequence;
      const applied = request.history.find((record) => record.sequence === observed + 1);
      if (observed < request.sequence && applied && applied.trigger === trigger && applied.fingerprint === fingerprint) {
        await this.recordReplay(request, trigger, applied.sequence, meta);
        return true;
      }
      await this.recordStale(request, trigger, { observed_sequence: observed });
      throw new InvalidTransition(
        `Event '${trigger}' was issued at sequence ${observed} but the request is at ${request.sequence}`,
        request.state,
        trigger
      );
    }

    if (meta.sequence !== undefined || permits(request.state, trigger)) {
      return false;
    }
    const applied = [...request.history]
      .reverse()
      .find((record) => record.trigger === trigger && record.fingerprint === fingerprint);
    if (applied) {
      await this.recordReplay(request, trigger, applied.sequence, meta);
      return true;
    }
    return false;
  }

  private async recordReplay(
    request: BookingRequest,
    event: string,
    sequence: number,
    meta: EventMeta
  ): Promise<void> {
    await this.audit.record({
      requestId: request.id,
      kind: 'idempotent_replay',
      payload: { event, sequence, state: request.state, correlation_id: meta.correlationId },
    });
    this.logger.info('Duplicate event ignored', { request_id: request.id, event, sequence });
  }

  private async recordStale(request: BookingRequest, event: string, payload: Record<string, unknown>): Promise<void> {
    await this.audit.record({
      requestId: request.id,
      kind: 'stale_event',
      severity: 'warning',
      payload: { event, state: request.state, sequence: request.sequence, ...payload },
    });
    this.logger.warn('Stale event discarded', { request_id: request.id, event, state: request.state });
  }

  private async rejectEvent(request: BookingRequest, event: string): Promise<InvalidTransition> {
    const error = new InvalidTransition(
      `Event '${event}' is not permitted in state ${request.state}`,
      request.state,
      event
    );
    await this.audit.record({
      requestId: request.id,
      kind: 'invalid_transition',
      severity: 'warning',
      payload: { event, state: request.state, sequence: request.sequence },
    });
    return error;
  }

  /**
   * Audit a local rejection and tell the user; returns the error for the caller to throw
   */
  private async refuse<E extends RejectionError>(
    request: BookingRequest,
    error: E,
    outbox: StatusMessage[],
    meta: EventMeta,
    payload: Record<string, unknown> = {}
  ): Promise<E> {
    await this.auditRejection(request.id, error, { ...payload, correlation_id: meta.correlationId });
    outbox.push(this.statusMessage(request, error.message, meta));
    return error;
  }

  private async auditRejection(
    requestId: string,
    error: RejectionError,
    payload: Record<string, unknown> = {}
  ): Promise<void> {
    if (error instanceof SecurityViolation) {
      await this.audit.record({
        requestId,
        kind: 'security_violation',
        severity: 'high',
        payload: { field: error.field, pattern: error.pattern, message: error.message, ...payload },
      });
      return;
    }
    await this.audit.record({
      requestId,
      kind: 'validation_failed',
      severity: 'warning',
      payload: { message: error.message, issues: error.issues, ...payload },
    });
  }

  private async auditRejectedField(requestId: string, rejected: RejectedField, input: unknown): Promise<void> {
    if (rejected.kind === 'SecurityViolation') {
      await this.audit.record({
        requestId,
        kind: 'security_violation',
        severity: 'high',
        payload: {
          field: rejected.field,
          pattern: rejected.pattern,
          message: rejected.message,
          input: typeof input === 'string' ? input : canonicalJson(input),
        },
      });
      return;
    }
    await this.audit.record({
      requestId,
      kind: 'validation_failed',
      severity: 'warning',
      payload: { field: rejected.field, message: rejected.message },
    });
  }

  /**
   * Run a boundary check; its validation or security error is audited before propagating
   */
  private async admit<T>(requestId: string, payload: Record<string, unknown>, check: () => T): Promise<T> {
    try {
      return check();
    } catch (error) {
      if (error instanceof ValidationError || error instanceof SecurityViolation) {
        await this.auditRejection(requestId, error, payload);
      }
      throw error;
    }
  }

  private checkCriteria(criteria: SearchCriteria): void {
    const problem = this.criteriaProblem(criteria);
    if (problem) {
      throw problem;
    }
  }

  private criteriaProblem(criteria: SearchCriteria): RejectionError | null {
    const violation =
      this.gate.inspect('origin', criteria.origin) ?? this.gate.inspect('destination', criteria.destination);
    if (violation) {
      return violation;
    }
    try {
      validateCriteria(criteria);
      return null;
    } catch (error) {
      if (error instanceof ValidationError) {
        return error;
      }
      throw error;
    }
  }

  private uploadProblem(request: BookingRequest, upload: DocumentUpload): RejectionError | null {
    let record: DocumentRecord;
    try {
      record = this.documentGate.find(request.documents, upload.party, upload.type);
    } catch (error) {
      if (error instanceof ValidationError) {
        return error;
      }
      throw error;
    }
    if (record.verificationStatus === 'verified') {
      return new ValidationError(`Document '${upload.type}' is already verified`, [
        { field: 'type', message: 'already verified' },
      ]);
    }
    if (upload.content.length === 0) {
      return new ValidationError('Document content is empty', [{ field: 'content', message: 'must not be empty' }]);
    }
    return this.gate.inspect('fileName', upload.fileName);
  }

  private resolveSelection(request: BookingRequest, selection: SelectionInput): string | null {
    if (selection.candidateId) {
      return selection.candidateId;
    }
    const option = selection.optionNumber;
    if (option !== undefined && Number.isInteger(option) && option >= 1) {
      return request.offeredCandidates[option - 1]?.offerId ?? null;
    }
    return null;
  }

  private documentResult(request: BookingRequest, upload: DocumentUpload): DocumentSubmission {
    return {
      request,
      document: request.documents.find((d) => d.party === upload.party && d.type === upload.type) ?? null,
    };
  }

  private retryMarker(requestId: string, service: string, meta: EventMeta): RetryListener {
    return async (attempt, error, delayMs) => {
      await this.audit.record({
        requestId,
        kind: 'retry_attempt',
        severity: 'warning',
        payload: {
          service,
          attempt,
          delay_ms: delayMs,
          error: errorMessage(error),
          correlation_id: meta.correlationId,
        },
      });
    };
  }

  private async auditExternalFailure(requestId: string, error: ExternalServiceError, meta: EventMeta): Promise<void> {
    await this.audit.record({
      requestId,
      kind: 'external_service_error',
      severity: 'warning',
      payload: {
        service: error.service,
        message: error.message,
        attempts: error.attempts,
        correlation_id: meta.correlationId,
      },
    });
    this.logger.warn('External service unavailable', {
      request_id: requestId,
      service: error.service,
      attempts: error.attempts,
      correlation_id: meta.correlationId,
    });
  }

  /**
   * Degraded status: audit the outage and tell the user, state unchanged
   */
  private async reportExternalFailure(
    requestId: string,
    error: ExternalServiceError,
    message: string,
    meta: EventMeta
  ): Promise<BookingRequest> {
    await this.auditExternalFailure(requestId, error, meta);
    return this.exclusive(requestId, async (outbox) => {
      const current = await this.load(requestId);
      outbox.push(this.statusMessage(current, message, meta));
      return current;
    });
  }

  /**
   * Unexpected failures drive the request to Failed and surface as FatalError
   */
  private async guarded<T>(requestId: string, operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (isBookingError(error)) {
        throw error;
      }

      this.logger.error('Booking operation failed unexpectedly', {
        request_id: requestId,
        operation,
        error: errorMessage(error),
      });
      await this.failRequest(requestId, operation, error);
      throw new FatalError(`${operation} failed: ${errorMessage(error)}`);
    }
  }

  private async failRequest(requestId: string, operation: string, cause: unknown): Promise<void> {
    try {
      await this.exclusive(requestId, async (outbox) => {
        const current = await this.repository.get(requestId);
        if (!current || isTerminal(current.state)) {
          return;
        }
        await this.audit.record({
          requestId,
          kind: 'fatal_error',
          severity: 'high',
          payload: { operation, error: errorMessage(cause), state: current.state },
        });
        await this.applyTransition(
          current,
          'fatal',
          {
            fingerprint: fingerprintOf('fatal', { operation }),
            meta: {},
            changes: { failureReason: 'internal error' },
            payload: { operation },
          },
          outbox
        );
      });
    } catch (error) {
      this.logger.error('Could not mark booking request as failed', {
        request_id: requestId,
        operation,
        error: errorMessage(error),
      });
    }
  }

  private async exclusive<T>(requestId: string, work: (outbox: StatusMessage[]) => Promise<T>): Promise<T> {
    const outbox: StatusMessage[] = [];
    try {
      return await this.lock.runExclusive(requestId, () => work(outbox));
    } finally {
      for (const message of outbox) {
        await this.notifier.dispatch(message);
      }
    }
  }

  private async load(requestId: string): Promise<BookingRequest> {
    const request = await this.repository.get(requestId);
    if (!request) {
      throw new NotFoundError(`Booking request ${requestId} not found`);
    }
    return request;
  }

  private statusMessage(request: BookingRequest, message: string, meta: EventMeta): StatusMessage {
    return {
      userId: request.userId,
      requestId: request.id,
      state: request.state,
      message,
      correlationId: meta.correlationId,
    };
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
