/**
 * User-facing status texts and the status view returned by tools and routes
 */

import type { BookingRequest, Candidate, DocumentRecord } from '../types/booking.js';
import { FIELD_PROMPTS, outstandingFields, type RejectedField } from '../services/detail-collector.js';

function route(request: BookingRequest): string {
  return `${request.criteria.origin} → ${request.criteria.destination}`;
}

export function formatCandidate(candidate: Candidate, index: number): string {
  return `${index + 1}. ${candidate.providerName || candidate.providerId} (${candidate.vehicleType}, ${candidate.capacityKg}kg) ₹${candidate.price}, rating ${candidate.rating}`;
}

function documentLabel(record: DocumentRecord): string {
  const label = `${record.type} (${record.party})`;
  return record.verificationStatus === 'rejected' ? `${label}: rejected, ${record.notes ?? 'please re-upload'}` : label;
}

function promptList(request: BookingRequest): string {
  return outstandingFields(request.tripDetails)
    .map((field) => `- ${FIELD_PROMPTS[field]}`)
    .join('\n');
}

/**
 * Message announcing the state the request is now in
 */
export function stateMessage(request: BookingRequest): string {
  switch (request.state) {
    case 'Searching':
      return `No trucks found for ${route(request)} between ${request.criteria.dateWindow.start} and ${request.criteria.dateWindow.end}. Try other dates or a nearby city.`;
    case 'AwaitingSelection':
      return [
        `Found ${request.offeredCandidates.length} option(s) for ${route(request)}:`,
        ...request.offeredCandidates.map(formatCandidate),
        'Reply with the option number to choose.',
      ].join('\n');
    case 'CollectingDetails': {
      const prompts = promptList(request);
      return prompts
        ? `Great choice. Please send the trip details:\n${prompts}`
        : 'Your trip details are on file. Submit them again to check availability.';
    }
    case 'VerifyingAvailability':
      return 'Checking availability with the provider...';
    case 'Confirmed':
      return [
        `Booking confirmed! Reference: ${request.booking?.reference ?? 'pending'}.`,
        `Please upload: ${request.documents.map((d) => d.type).join(', ')}.`,
      ].join('\n');
    case 'RetrySelection':
      return 'The selected truck is not available. Looking for alternatives...';
    case 'DocumentsPending': {
      const outstanding = request.documents.filter((d) => d.verificationStatus !== 'verified');
      return `Documents received so far are being checked. Still needed:\n${outstanding.map((d) => `- ${documentLabel(d)}`).join('\n')}`;
    }
    case 'DocumentsVerified':
      return 'All documents verified. Your trip is ready to start.';
    case 'InTransit':
      return `Your parcel is on the way (${route(request)}).`;
    case 'Delivered':
      return request.booking ? `Delivered. Booking ${request.booking.reference} is complete.` : 'Delivered.';
    case 'Cancelled':
      return 'Your booking request has been cancelled.';
    case 'Failed':
      return `We could not complete your booking: ${request.failureReason ?? 'unexpected error'}.`;
  }
}

/**
 * Message listing rejected fields and what is still missing
 */
export function rejectionMessage(request: BookingRequest, rejected: RejectedField[]): string {
  const lines = rejected.map((r) => `- ${r.field}: ${r.message}`);
  const prompts = promptList(request);
  return [
    'Some details could not be accepted:',
    ...lines,
    ...(prompts ? ['Still needed:', prompts] : []),
  ].join('\n');
}

export interface BookingStatusView {
  requestId: string;
  userId: string;
  intentKind: BookingRequest['intentKind'];
  state: BookingRequest['state'];
  sequence: number;
  criteria: BookingRequest['criteria'];
  candidates: Candidate[];
  selectedCandidateId: string | null;
  excludedCandidateIds: string[];
  tripDetails: BookingRequest['tripDetails'];
  outstandingFields: string[];
  booking: BookingRequest['booking'];
  documents: DocumentRecord[];
  retryCount: number;
  failureReason: string | null;
  updatedAt: string;
}

export function toStatusView(request: BookingRequest): BookingStatusView {
  return {
    requestId: request.id,
    userId: request.userId,
    intentKind: request.intentKind,
    state: request.state,
    sequence: request.sequence,
    criteria: request.criteria,
    candidates: request.offeredCandidates,
    selectedCandidateId: request.selectedCandidateId,
    excludedCandidateIds: request.excludedCandidateIds,
    tripDetails: request.tripDetails,
    outstandingFields: outstandingFields(request.tripDetails),
    booking: request.booking,
    documents: request.documents,
    retryCount: request.retryCount,
    failureReason: request.failureReason,
    updatedAt: request.updatedAt,
  };
}
