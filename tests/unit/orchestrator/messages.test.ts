/**
 * Unit tests for user-facing status texts
 */

import { describe, it, expect } from 'vitest';
import {
  formatCandidate,
  rejectionMessage,
  stateMessage,
  toStatusView,
} from '../../../src/orchestrator/messages.js';
import { bookingRequest, offerA } from '../../helpers/fixtures.js';

describe('formatCandidate', () => {
  it('should number options from one', () => {
    expect(formatCandidate(offerA, 0)).toBe('1. Sharma Logistics (truck, 5000kg) ₹12000, rating 4.5');
  });

  it('should fall back to the provider id without a name', () => {
    expect(formatCandidate({ ...offerA, providerName: '' }, 2)).toBe('3. prov-1 (truck, 5000kg) ₹12000, rating 4.5');
  });
});

describe('stateMessage', () => {
  it('should list offered candidates while awaiting selection', () => {
    expect(stateMessage(bookingRequest())).toBe(
      [
        'Found 2 option(s) for Mumbai → Delhi:',
        '1. Sharma Logistics (truck, 5000kg) ₹12000, rating 4.5',
        '2. Patel Transport (truck, 5000kg) ₹15000, rating 4',
        'Reply with the option number to choose.',
      ].join('\n')
    );
  });

  it('should prompt for outstanding fields while collecting details', () => {
    const request = bookingRequest({
      state: 'CollectingDetails',
      tripDetails: {
        consigner: 'Asha Rao',
        consignee: 'Vikram Singh',
        pickupAddress: '12 Marine Drive, Mumbai',
        deliveryAddress: '44 Connaught Place, Delhi',
      },
    });

    expect(stateMessage(request)).toBe(
      'Great choice. Please send the trip details:\n- Parcel dimensions as LxWxH (e.g. 120x80x60 cm)\n- Parcel weight (e.g. 250kg)'
    );
  });

  it('should name rejected documents with their notes', () => {
    const request = bookingRequest({
      state: 'DocumentsPending',
      documents: [
        {
          type: 'id_proof',
          party: 'user',
          recordId: 'rec-1',
          uploadStatus: 'uploaded',
          verificationStatus: 'verified',
          notes: null,
        },
        {
          type: 'parcel_photo',
          party: 'user',
          recordId: 'rec-2',
          uploadStatus: 'uploaded',
          verificationStatus: 'rejected',
          notes: 'photo is blurred',
        },
        {
          type: 'driving_license',
          party: 'provider',
          recordId: null,
          uploadStatus: 'missing',
          verificationStatus: 'pending',
          notes: null,
        },
      ],
    });

    expect(stateMessage(request)).toBe(
      [
        'Documents received so far are being checked. Still needed:',
        '- parcel_photo (user): rejected, photo is blurred',
        '- driving_license (provider)',
      ].join('\n')
    );
  });

  it('should include the booking reference on delivery', () => {
    const request = bookingRequest({
      state: 'Delivered',
      booking: { reference: 'BK-1001', candidateId: 'offer-a', status: 'delivered', confirmedAt: '2025-03-01T10:00:00.000Z' },
    });

    expect(stateMessage(request)).toBe('Delivered. Booking BK-1001 is complete.');
  });

  it('should explain a failure', () => {
    expect(stateMessage(bookingRequest({ state: 'Failed', failureReason: 'retry limit reached' }))).toBe(
      'We could not complete your booking: retry limit reached.'
    );
    expect(stateMessage(bookingRequest({ state: 'Failed' }))).toBe(
      'We could not complete your booking: unexpected error.'
    );
  });
});

describe('rejectionMessage', () => {
  it('should list rejected fields and what is still needed', () => {
    const request = bookingRequest({
      state: 'CollectingDetails',
      tripDetails: {
        consigner: 'Asha Rao',
        consignee: 'Vikram Singh',
        pickupAddress: '12 Marine Drive, Mumbai',
        deliveryAddress: '44 Connaught Place, Delhi',
        parcelDimensions: { lengthCm: 120, widthCm: 80, heightCm: 60 },
      },
    });

    expect(
      rejectionMessage(request, [
        { field: 'weightKg', kind: 'ValidationError', message: 'Weight must be a positive amount' },
      ])
    ).toBe(
      'Some details could not be accepted:\n- weightKg: Weight must be a positive amount\nStill needed:\n- Parcel weight (e.g. 250kg)'
    );
  });

  it('should omit the outstanding list when nothing is missing', () => {
    const request = bookingRequest({
      tripDetails: {
        consigner: 'a',
        consignee: 'b',
        pickupAddress: 'c',
        deliveryAddress: 'd',
        parcelDimensions: { lengthCm: 1, widthCm: 1, heightCm: 1 },
        weightKg: 1,
      },
    });

    expect(
      rejectionMessage(request, [
        { field: 'declaredValue', kind: 'ValidationError', message: "Declared value 'a lot' is not an amount" },
      ])
    ).toBe("Some details could not be accepted:\n- declaredValue: Declared value 'a lot' is not an amount");
  });
});

describe('toStatusView', () => {
  it('should expose the request without its history or fingerprint', () => {
    const view = toStatusView(bookingRequest({ tripDetails: { weightKg: 250 } }));

    expect(view.requestId).toBe('7d3f1c2a-0000-4000-8000-000000000001');
    expect(view.candidates).toHaveLength(2);
    expect(view.outstandingFields).toEqual(['consigner', 'consignee', 'pickupAddress', 'deliveryAddress', 'parcelDimensions']);
    expect(view).not.toHaveProperty('history');
    expect(view).not.toHaveProperty('intentFingerprint');
  });
});
