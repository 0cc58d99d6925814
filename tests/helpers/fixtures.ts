/**
 * Test data and an orchestrator wired to in-process fakes
 */

import { vi, type Mock } from 'vitest';
import {
  BookingOrchestrator,
  type AvailabilityVerifier,
  type CandidateCatalog,
  type DocumentStore,
} from '../../src/orchestrator/booking-orchestrator.js';
import { AuditLogger } from '../../src/services/audit-logger.js';
import { DetailCollector } from '../../src/services/detail-collector.js';
import { DocumentGate } from '../../src/services/document-gate.js';
import { NotificationDispatcher } from '../../src/services/notification-dispatcher.js';
import { SecurityGate } from '../../src/services/security-gate.js';
import type { InboundMessage } from '../../src/consumers/handlers/inbound-message.js';
import type { BookingRequest, Candidate } from '../../src/types/booking.js';
import { InMemoryAuditSink, InMemoryBookingRepository, RecordingTransport } from './in-memory.js';

export interface MockLogger {
  info: Mock;
  error: Mock;
  warn: Mock;
  debug: Mock;
}

export function createMockLogger(): MockLogger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
}

export function candidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    offerId: 'offer-a',
    providerId: 'prov-1',
    providerName: 'Sharma Logistics',
    providerContact: 'dispatch desk',
    vehicleType: 'truck',
    capacityKg: 5000,
    price: 12000,
    rating: 4.5,
    available: true,
    ...overrides,
  };
}

export const offerA = candidate();
export const offerB = candidate({
  offerId: 'offer-b',
  providerId: 'prov-2',
  providerName: 'Patel Transport',
  price: 15000,
  rating: 4,
});

export const mumbaiToDelhi = {
  intent_kind: 'truck_booking',
  route: { origin: 'Mumbai', destination: 'Delhi' },
  dates: { start: '2025-03-10', end: '2025-03-12' },
  party_count: 1,
};

export const completeDetails = {
  consigner: 'Asha Rao',
  consignee: 'Vikram Singh',
  pickupAddress: '12 Marine Drive, Mumbai',
  deliveryAddress: '44 Connaught Place, Delhi',
  parcelDimensions: '120x80x60 cm',
  weightKg: '250kg',
};

export const REQUIRED_DOCUMENTS = {
  user: ['id_proof', 'parcel_photo'],
  provider: ['driving_license', 'vehicle_registration'],
};

export const FIXED_NOW = new Date('2025-03-01T10:00:00.000Z');

export function bookingRequest(overrides: Partial<BookingRequest> = {}): BookingRequest {
  return {
    id: '7d3f1c2a-0000-4000-8000-000000000001',
    userId: 'user-1',
    intentKind: 'truck_booking',
    criteria: {
      origin: 'Mumbai',
      destination: 'Delhi',
      dateWindow: { start: '2025-03-10', end: '2025-03-12' },
      partyCount: 1,
    },
    budget: null,
    state: 'AwaitingSelection',
    sequence: 1,
    excludedCandidateIds: [],
    offeredCandidates: [offerA, offerB],
    selectedCandidateId: null,
    tripDetails: {},
    booking: null,
    documents: [],
    retryCount: 0,
    failureReason: null,
    history: [],
    intentFingerprint: 'a1b2c3d4e5f60718',
    createdAt: FIXED_NOW.toISOString(),
    updatedAt: FIXED_NOW.toISOString(),
    ...overrides,
  };
}

/**
 * KafkaJS-shaped message for handler tests
 */
export function createMockMessage(
  topic: string,
  payload: object | string | null,
  headers: Record<string, string> = {}
): InboundMessage {
  return {
    topic,
    partition: 0,
    message: {
      key: null,
      value:
        payload === null ? null : Buffer.from(typeof payload === 'string' ? payload : JSON.stringify(payload)),
      offset: '456',
      timestamp: Date.now().toString(),
      headers: Object.fromEntries(Object.entries(headers).map(([k, v]) => [k, Buffer.from(v)])),
    },
    heartbeat: vi.fn().mockResolvedValue(undefined),
    pause: vi.fn().mockReturnValue(() => {}),
  };
}

export function createHarness(options: { maxRetrySelections?: number } = {}) {
  const repository = new InMemoryBookingRepository();
  const sink = new InMemoryAuditSink();
  const transport = new RecordingTransport();
  const logger = createMockLogger();
  const gate = new SecurityGate({ maxFieldLength: 5000, allowedUrlDomains: ['maps.example.com'] });
  const audit = new AuditLogger({ sink, masker: gate, logger, clock: () => FIXED_NOW });

  const catalog = { search: vi.fn<CandidateCatalog['search']>() };
  const verifier = { verify: vi.fn<AvailabilityVerifier['verify']>() };
  const documentStore = {
    upload: vi.fn<DocumentStore['upload']>(),
    verify: vi.fn<DocumentStore['verify']>(),
  };

  // Catalog answers with every offer the request has not excluded
  catalog.search.mockImplementation(async (_criteria, searchOptions) =>
    [offerA, offerB].filter((c) => !(searchOptions?.excluded ?? []).includes(c.offerId))
  );

  let ids = 0;
  const orchestrator = new BookingOrchestrator({
    repository,
    catalog,
    verifier,
    documentStore,
    gate,
    collector: new DetailCollector(gate),
    documentGate: new DocumentGate(REQUIRED_DOCUMENTS),
    audit,
    notifier: new NotificationDispatcher(transport, logger),
    logger,
    maxRetrySelections: options.maxRetrySelections ?? 3,
    clock: () => FIXED_NOW,
    idFactory: () => `7d3f1c2a-0000-4000-8000-00000000000${++ids}`,
  });

  return { orchestrator, repository, sink, transport, logger, audit, gate, catalog, verifier, documentStore };
}

export type Harness = ReturnType<typeof createHarness>;

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
