/**
 * Booking Event Handler Tests
 *
 * Topic: booking.inbound
 * Handler: booking-event.handler.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import {
  BookingEventHandler,
  createBookingEventHandler,
  type BookingCommands,
} from '../../../../src/consumers/handlers/booking-event.handler.js';
import { InvalidTransition } from '../../../../src/utils/errors.js';
import {
  bookingRequest,
  createMockLogger,
  createMockMessage,
  mumbaiToDelhi,
  type MockLogger,
} from '../../../helpers/fixtures.js';

const TOPIC = 'booking.inbound';
const REQUEST_ID = '7d3f1c2a-0000-4000-8000-000000000001';

describe('Booking Event Handler (booking.inbound events)', () => {
  let mockLogger: MockLogger;
  let orchestrator: {
    createRequest: Mock<BookingCommands['createRequest']>;
    submitSelection: Mock<BookingCommands['submitSelection']>;
    submitDetails: Mock<BookingCommands['submitDetails']>;
    cancel: Mock<BookingCommands['cancel']>;
    findActiveRequest: Mock<BookingCommands['findActiveRequest']>;
    getStatus: Mock<BookingCommands['getStatus']>;
  };
  let handler: BookingEventHandler;

  beforeEach(() => {
    mockLogger = createMockLogger();
    orchestrator = {
      createRequest: vi.fn<BookingCommands['createRequest']>(),
      submitSelection: vi.fn<BookingCommands['submitSelection']>(),
      submitDetails: vi.fn<BookingCommands['submitDetails']>(),
      cancel: vi.fn<BookingCommands['cancel']>(),
      findActiveRequest: vi.fn<BookingCommands['findActiveRequest']>(),
      getStatus: vi.fn<BookingCommands['getStatus']>(),
    };
    handler = createBookingEventHandler({ orchestrator, logger: mockLogger });
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('intent events', () => {
    it('should open a booking request with the payload correlation id', async () => {
      // Arrange
      orchestrator.createRequest.mockResolvedValue(bookingRequest());
      const message = createMockMessage(TOPIC, {
        type: 'intent',
        user_id: 'user-1',
        intent: mumbaiToDelhi,
        correlation_id: 'corr-intent-1',
      });

      // Act
      await handler.handle(message);

      // Assert
      expect(orchestrator.createRequest).toHaveBeenCalledWith('user-1', mumbaiToDelhi, {
        sequence: undefined,
        correlationId: 'corr-intent-1',
      });
      expect(mockLogger.info).toHaveBeenCalledWith('Booking request opened', {
        request_id: REQUEST_ID,
        state: 'AwaitingSelection',
        correlation_id: 'corr-intent-1',
      });
    });

    it('should prefer the correlation id header', async () => {
      // Arrange
      orchestrator.createRequest.mockResolvedValue(bookingRequest());
      const message = createMockMessage(
        TOPIC,
        { type: 'intent', user_id: 'user-1', intent: mumbaiToDelhi, correlation_id: 'corr-body' },
        { 'x-correlation-id': 'corr-header' }
      );

      // Act
      await handler.handle(message);

      // Assert
      expect(orchestrator.createRequest.mock.calls[0][2]).toEqual({ correlationId: 'corr-header' });
    });
  });

  describe('request events', () => {
    it('should route a selection to the active request', async () => {
      // Arrange
      orchestrator.findActiveRequest.mockResolvedValue(bookingRequest());
      orchestrator.submitSelection.mockResolvedValue(bookingRequest({ state: 'CollectingDetails', sequence: 2 }));
      const message = createMockMessage(TOPIC, {
        type: 'selection',
        user_id: 'user-1',
        option_number: 2,
        sequence: 1,
        correlation_id: 'corr-sel',
      });

      // Act
      await handler.handle(message);

      // Assert
      expect(orchestrator.findActiveRequest).toHaveBeenCalledWith('user-1');
      expect(orchestrator.submitSelection).toHaveBeenCalledWith(
        REQUEST_ID,
        { candidateId: undefined, optionNumber: 2 },
        { sequence: 1, correlationId: 'corr-sel' }
      );
      expect(mockLogger.info).toHaveBeenCalledWith('Successfully processed booking event', {
        type: 'selection',
        request_id: REQUEST_ID,
        state: 'CollectingDetails',
        correlation_id: 'corr-sel',
      });
    });

    it('should route field updates to an explicit request id', async () => {
      // Arrange
      const request = bookingRequest({ state: 'CollectingDetails' });
      orchestrator.getStatus.mockResolvedValue(request);
      orchestrator.submitDetails.mockResolvedValue({
        request,
        accepted: ['weightKg'],
        rejected: [],
        outstanding: ['consigner'],
      });
      const message = createMockMessage(TOPIC, {
        type: 'field_update',
        user_id: 'user-1',
        request_id: REQUEST_ID,
        fields: { weightKg: '250kg' },
      });

      // Act
      await handler.handle(message);

      // Assert
      expect(orchestrator.getStatus).toHaveBeenCalledWith(REQUEST_ID);
      expect(orchestrator.findActiveRequest).not.toHaveBeenCalled();
      expect(orchestrator.submitDetails).toHaveBeenCalledWith(
        REQUEST_ID,
        { weightKg: '250kg' },
        expect.objectContaining({ sequence: undefined })
      );
    });

    it('should pass the cancellation reason', async () => {
      // Arrange
      orchestrator.findActiveRequest.mockResolvedValue(bookingRequest());
      orchestrator.cancel.mockResolvedValue(bookingRequest({ state: 'Cancelled', sequence: 2 }));
      const message = createMockMessage(TOPIC, { type: 'cancel', user_id: 'user-1', reason: 'found a cheaper option' });

      // Act
      await handler.handle(message);

      // Assert
      expect(orchestrator.cancel).toHaveBeenCalledWith(
        REQUEST_ID,
        'found a cheaper option',
        expect.objectContaining({ correlationId: expect.any(String) })
      );
    });

    it('should ignore events for a request owned by another user', async () => {
      // Arrange
      orchestrator.getStatus.mockResolvedValue(bookingRequest({ userId: 'user-2' }));
      const message = createMockMessage(TOPIC, {
        type: 'cancel',
        user_id: 'user-1',
        request_id: REQUEST_ID,
      });

      // Act
      await handler.handle(message);

      // Assert
      expect(orchestrator.cancel).not.toHaveBeenCalled();
      expect(mockLogger.warn).toHaveBeenCalledWith('Booking event user does not own request', {
        user_id: 'user-1',
        request_id: REQUEST_ID,
      });
    });

    it('should log when the user has no active request', async () => {
      // Arrange
      orchestrator.findActiveRequest.mockResolvedValue(null);
      const message = createMockMessage(TOPIC, { type: 'selection', user_id: 'user-1', option_number: 1 });

      // Act
      await handler.handle(message);

      // Assert
      expect(orchestrator.submitSelection).not.toHaveBeenCalled();
      expect(mockLogger.warn).toHaveBeenCalledWith(
        'No booking request for event',
        expect.objectContaining({ type: 'selection', user_id: 'user-1' })
      );
    });
  });

  describe('error handling', () => {
    it('should log domain rejections as warnings without throwing', async () => {
      // Arrange
      orchestrator.findActiveRequest.mockResolvedValue(bookingRequest({ state: 'Confirmed' }));
      orchestrator.submitSelection.mockRejectedValue(
        new InvalidTransition("Event 'selection' is not permitted in state Confirmed", 'Confirmed', 'selection')
      );
      const message = createMockMessage(TOPIC, { type: 'selection', user_id: 'user-1', option_number: 1 });

      // Act & Assert
      await expect(handler.handle(message)).resolves.toBeUndefined();
      expect(mockLogger.warn).toHaveBeenCalledWith(
        'Booking event rejected',
        expect.objectContaining({ kind: 'InvalidTransition', type: 'selection' })
      );
      expect(mockLogger.error).not.toHaveBeenCalled();
    });

    it('should log unexpected errors without throwing', async () => {
      // Arrange
      orchestrator.createRequest.mockRejectedValue(new Error('pool exhausted'));
      const message = createMockMessage(TOPIC, { type: 'intent', user_id: 'user-1', intent: mumbaiToDelhi });

      // Act
      await handler.handle(message);

      // Assert
      expect(mockLogger.error).toHaveBeenCalledWith(
        'error processing booking event',
        expect.objectContaining({ error: 'pool exhausted', offset: '456', topic: TOPIC })
      );
    });

    it('should skip a message with an empty value', async () => {
      // Act
      await handler.handle(createMockMessage(TOPIC, null));

      // Assert
      expect(mockLogger.error).toHaveBeenCalledWith('Empty message value received', {
        topic: TOPIC,
        offset: '456',
      });
      expect(orchestrator.createRequest).not.toHaveBeenCalled();
    });

    it('should skip a message that is not JSON', async () => {
      // Act
      await handler.handle(createMockMessage(TOPIC, '{not json'));

      // Assert
      expect(mockLogger.error).toHaveBeenCalledWith(
        'Failed to parse message payload',
        expect.objectContaining({ topic: TOPIC })
      );
    });

    it('should skip an unknown event type', async () => {
      // Act
      await handler.handle(createMockMessage(TOPIC, { type: 'upgrade', user_id: 'user-1' }));

      // Assert
      expect(mockLogger.error).toHaveBeenCalledWith(
        'Payload validation failed',
        expect.objectContaining({ field: 'type' })
      );
      expect(orchestrator.findActiveRequest).not.toHaveBeenCalled();
    });
  });
});
