/**
 * Domain types for the booking orchestrator
 * One BookingRequest aggregate per user request, owned by the orchestrator
 */

export type BookingState =
  | 'Searching'
  | 'AwaitingSelection'
  | 'CollectingDetails'
  | 'VerifyingAvailability'
  | 'Confirmed'
  | 'RetrySelection'
  | 'DocumentsPending'
  | 'DocumentsVerified'
  | 'InTransit'
  | 'Delivered'
  | 'Cancelled'
  | 'Failed';

/**
 * Events that may trigger exactly one state transition
 */
export type TriggerKind =
  | 'search_completed'
  | 'selection'
  | 'details_completed'
  | 'availability_confirmed'
  | 'availability_rejected'
  | 'document_uploaded'
  | 'documents_verified'
  | 'transit_started'
  | 'delivery_confirmed'
  | 'cancel'
  | 'fatal';

export type IntentKind = 'truck_booking' | 'trip_booking';

export interface DateWindow {
  start: string; // YYYY-MM-DD
  end: string; // YYYY-MM-DD
}

export interface SearchCriteria {
  origin: string;
  destination: string;
  dateWindow: DateWindow;
  partyCount: number;
}

export interface Candidate {
  offerId: string;
  providerId: string;
  providerName: string;
  providerContact: string;
  vehicleType: string;
  capacityKg: number;
  price: number;
  rating: number; // 0-5
  available: boolean;
}

export interface ParcelDimensions {
  lengthCm: number;
  widthCm: number;
  heightCm: number;
}

export interface TripDetails {
  consigner?: string;
  consignee?: string;
  pickupAddress?: string;
  deliveryAddress?: string;
  parcelDimensions?: ParcelDimensions;
  weightKg?: number;
  declaredValue?: number;
  specialInstructions?: string;
}

export type TripDetailField = keyof TripDetails;

export const REQUIRED_TRIP_FIELDS: readonly TripDetailField[] = [
  'consigner',
  'consignee',
  'pickupAddress',
  'deliveryAddress',
  'parcelDimensions',
  'weightKg',
];

export const OPTIONAL_TRIP_FIELDS: readonly TripDetailField[] = ['declaredValue', 'specialInstructions'];

export type BookingStatus =
  | 'confirmed'
  | 'documents_pending'
  | 'documents_verified'
  | 'in_transit'
  | 'delivered'
  | 'cancelled';

export interface Booking {
  reference: string;
  candidateId: string;
  status: BookingStatus;
  confirmedAt: string;
}

export type DocumentParty = 'user' | 'provider';

export interface DocumentRecord {
  type: string;
  party: DocumentParty;
  recordId: string | null;
  uploadStatus: 'missing' | 'uploaded';
  verificationStatus: 'pending' | 'verified' | 'rejected';
  notes: string | null;
}

export interface TransitionRecord {
  sequence: number;
  from: BookingState;
  to: BookingState;
  trigger: TriggerKind;
  fingerprint: string;
  at: string;
}

export interface BookingRequest {
  id: string;
  userId: string;
  intentKind: IntentKind;
  criteria: SearchCriteria;
  budget: number | null;
  state: BookingState;
  sequence: number;
  excludedCandidateIds: string[];
  offeredCandidates: Candidate[];
  selectedCandidateId: string | null;
  tripDetails: TripDetails;
  booking: Booking | null;
  documents: DocumentRecord[];
  retryCount: number;
  failureReason: string | null;
  history: TransitionRecord[];
  /** Fingerprint of the intent that opened the request */
  intentFingerprint: string;
  createdAt: string;
  updatedAt: string;
}

export type AuditKind =
  | 'request_created'
  | 'transition'
  | 'validation_failed'
  | 'security_violation'
  | 'details_updated'
  | 'search_empty'
  | 'criteria_updated'
  | 'retry_attempt'
  | 'idempotent_replay'
  | 'stale_event'
  | 'invalid_transition'
  | 'document_uploaded'
  | 'document_verified'
  | 'document_rejected'
  | 'external_service_error'
  | 'fatal_error';

export type AuditSeverity = 'info' | 'warning' | 'high';

export interface AuditEntry {
  id: string;
  timestamp: string;
  requestId: string;
  kind: AuditKind;
  severity: AuditSeverity;
  payload: Record<string, unknown>;
}
