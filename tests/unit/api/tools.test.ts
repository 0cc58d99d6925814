/**
 * Unit tests for the tool API
 * POST /tools/:name drives a real orchestrator wired to in-memory fakes
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import express, { Express } from 'express';
import { correlationId } from '../../../src/api/middleware.js';
import { createBookingTools, createToolsRouter } from '../../../src/api/tools.js';
import { completeDetails, createHarness, type Harness } from '../../helpers/fixtures.js';

describe('Tool API', () => {
  let app: Express;
  let h: Harness;

  const createBooking = () =>
    request(app)
      .post('/tools/create_booking_request')
      .set('X-Correlation-ID', 'corr-tool-1')
      .send({
        user_id: 'user-1',
        intent_kind: 'truck_booking',
        route: { origin: 'Mumbai', destination: 'Delhi' },
        dates: { start: '2025-03-10', end: '2025-03-12' },
      });

  beforeEach(() => {
    h = createHarness();
    app = express();
    app.use(express.json());
    app.use(correlationId());
    app.use('/tools', createToolsRouter(createBookingTools(h.orchestrator), h.logger));
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('GET /tools', () => {
    it('should list every booking tool with its fields', async () => {
      // Act
      const response = await request(app).get('/tools').expect(200);

      // Assert
      expect(response.body.tools.map((t: { name: string }) => t.name)).toEqual([
        'create_booking_request',
        'refine_search',
        'submit_selection',
        'submit_details',
        'upload_document',
        'update_trip_status',
        'cancel_booking_request',
        'get_booking_status',
      ]);
      const submitDetails = response.body.tools[3];
      expect(submitDetails.fields).toEqual([
        { name: 'request_id', required: true },
        { name: 'fields', required: false },
        { name: 'sequence', required: false },
      ]);
    });
  });

  describe('POST /tools/:name', () => {
    it('should open a booking request and return its status view', async () => {
      // Act
      const response = await createBooking().expect(200);

      // Assert
      expect(response.headers['x-correlation-id']).toBe('corr-tool-1');
      expect(response.body.ok).toBe(true);
      expect(response.body.result).toMatchObject({
        requestId: '7d3f1c2a-0000-4000-8000-000000000001',
        userId: 'user-1',
        state: 'AwaitingSelection',
        sequence: 1,
        outstandingFields: [
          'consigner',
          'consignee',
          'pickupAddress',
          'deliveryAddress',
          'parcelDimensions',
          'weightKg',
        ],
      });
      expect(response.body.result.candidates).toHaveLength(2);
      expect(h.transport.messages[0].correlationId).toBe('corr-tool-1');
    });

    it('should carry a booking through selection and details', async () => {
      // Arrange
      h.verifier.verify.mockResolvedValueOnce({ status: 'confirmed', bookingReference: 'BK-3003' });
      const requestId = (await createBooking()).body.result.requestId;

      // Act
      await request(app)
        .post('/tools/submit_selection')
        .send({ request_id: requestId, option_number: 1, sequence: 1 })
        .expect(200);
      const response = await request(app)
        .post('/tools/submit_details')
        .send({ request_id: requestId, fields: completeDetails })
        .expect(200);

      // Assert
      expect(response.body.result).toMatchObject({
        state: 'Confirmed',
        booking: { reference: 'BK-3003', candidateId: 'offer-a', status: 'confirmed' },
        rejected: [],
        outstandingFields: [],
      });
      expect(response.body.result.documents).toHaveLength(4);
    });

    it('should report rejected fields in a successful response', async () => {
      // Arrange
      const requestId = (await createBooking()).body.result.requestId;
      await request(app).post('/tools/submit_selection').send({ request_id: requestId, option_number: 1 });

      // Act
      const response = await request(app)
        .post('/tools/submit_details')
        .send({ request_id: requestId, fields: { weightKg: '-5kg' } })
        .expect(200);

      // Assert
      expect(response.body.result.state).toBe('CollectingDetails');
      expect(response.body.result.rejected).toEqual([
        { field: 'weightKg', kind: 'ValidationError', message: 'Weight must be a positive amount' },
      ]);
    });

    it('should require a candidate id or option number for a selection', async () => {
      // Arrange
      const requestId = (await createBooking()).body.result.requestId;

      // Act
      const response = await request(app)
        .post('/tools/submit_selection')
        .send({ request_id: requestId })
        .expect(400);

      // Assert
      expect(response.body).toEqual({
        ok: false,
        error: {
          kind: 'ValidationError',
          message: 'Selection requires candidate_id or option_number',
          details: [{ field: 'option_number', message: 'candidate_id or option_number is required' }],
        },
      });
    });

    it('should return 400 for input that fails the tool schema', async () => {
      // Act
      const response = await request(app).post('/tools/get_booking_status').send({}).expect(400);

      // Assert
      expect(response.body.error).toEqual({
        kind: 'ValidationError',
        message: 'Validation error',
        details: [{ field: 'request_id', message: 'Required' }],
      });
      expect(h.logger.warn).toHaveBeenCalledWith(
        'Tool call rejected',
        expect.objectContaining({ tool: 'get_booking_status', kind: 'ValidationError' })
      );
    });

    it('should return 409 for an event the state does not permit', async () => {
      // Arrange
      const requestId = (await createBooking()).body.result.requestId;

      // Act
      const response = await request(app)
        .post('/tools/update_trip_status')
        .send({ request_id: requestId, status: 'delivered' })
        .expect(409);

      // Assert
      expect(response.body.error).toEqual({
        kind: 'InvalidTransition',
        message: "Event 'delivery_confirmed' is not permitted in state AwaitingSelection",
        details: { state: 'AwaitingSelection', event: 'delivery_confirmed' },
      });
    });

    it('should return 404 for an unknown request', async () => {
      // Act
      const response = await request(app)
        .post('/tools/get_booking_status')
        .send({ request_id: 'missing' })
        .expect(404);

      // Assert
      expect(response.body.error).toEqual({ kind: 'NotFound', message: 'Booking request missing not found' });
    });

    it('should return 404 for an unknown tool', async () => {
      // Act
      const response = await request(app).post('/tools/book_flight').send({}).expect(404);

      // Assert
      expect(response.body).toEqual({
        ok: false,
        error: { kind: 'NotFound', message: "Unknown tool 'book_flight'" },
      });
    });

    it('should return 500 and log when the request fails unexpectedly', async () => {
      // Arrange
      h.verifier.verify.mockRejectedValueOnce(new Error('boom'));
      const requestId = (await createBooking()).body.result.requestId;
      await request(app).post('/tools/submit_selection').send({ request_id: requestId, option_number: 1 });

      // Act
      const response = await request(app)
        .post('/tools/submit_details')
        .send({ request_id: requestId, fields: completeDetails })
        .expect(500);

      // Assert
      expect(response.body.error).toEqual({ kind: 'Fatal', message: 'submitDetails failed: boom' });
      expect(h.logger.error).toHaveBeenCalledWith(
        'Tool execution failed',
        expect.objectContaining({ tool: 'submit_details', error: 'submitDetails failed: boom' })
      );
    });

    it('should cancel a request', async () => {
      // Arrange
      const requestId = (await createBooking()).body.result.requestId;

      // Act
      const response = await request(app)
        .post('/tools/cancel_booking_request')
        .send({ request_id: requestId, reason: 'plans changed' })
        .expect(200);

      // Assert
      expect(response.body.result.state).toBe('Cancelled');
      const cancel = h.sink.entries[h.sink.entries.length - 1];
      expect(cancel.payload).toMatchObject({ trigger: 'cancel', reason: 'plans changed' });
    });
  });
});
