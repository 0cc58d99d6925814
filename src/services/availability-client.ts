/**
 * Availability verifier client
 * Asks the offer's provider to confirm or reject a candidate for a trip
 */

import { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ProviderEndpointConfig } from '../config/env.js';
import type { DateWindow, TripDetails } from '../types/booking.js';
import { ExternalServiceError } from '../utils/errors.js';
import { callProvider, createProviderAxios, requestHeaders, type CallContext } from './provider-http.js';

const AvailabilityResponseSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('confirmed'),
    booking_reference: z.string().min(1),
  }),
  z.object({
    status: z.literal('rejected'),
    reason: z.string().min(1).default('provider declined the request'),
  }),
]);

export type AvailabilityOutcome =
  | { status: 'confirmed'; bookingReference: string }
  | { status: 'rejected'; reason: string };

export interface VerifyContext extends CallContext {
  requestId: string;
  dateWindow: DateWindow;
}

export class AvailabilityClient {
  private axiosClient: AxiosInstance;

  constructor(private readonly config: ProviderEndpointConfig) {
    this.axiosClient = createProviderAxios(config);
  }

  /**
   * Verify a candidate for the collected trip details
   *
   * Each call is one verification attempt from the orchestrator's point of
   * view; transport-level retries happen inside it.
   *
   * @throws ExternalServiceError when the provider stays unreachable
   */
  async verify(candidateId: string, details: TripDetails, context: VerifyContext): Promise<AvailabilityOutcome> {
    const body = {
      offer_id: candidateId,
      request_id: context.requestId,
      date_window: context.dateWindow,
      trip: {
        consigner: details.consigner,
        consignee: details.consignee,
        pickup_address: details.pickupAddress,
        delivery_address: details.deliveryAddress,
        parcel_dimensions_cm: details.parcelDimensions,
        weight_kg: details.weightKg,
        declared_value: details.declaredValue,
        special_instructions: details.specialInstructions,
      },
    };

    return callProvider(
      'availability',
      this.config,
      async () => {
        const response = await this.axiosClient.post('/availability', body, {
          headers: requestHeaders(context.correlationId),
        });
        const parsed = AvailabilityResponseSchema.safeParse(response.data);
        if (!parsed.success) {
          throw new ExternalServiceError('availability', 'malformed availability response');
        }
        const data = parsed.data;
        return data.status === 'confirmed'
          ? { status: 'confirmed' as const, bookingReference: data.booking_reference }
          : { status: 'rejected' as const, reason: data.reason };
      },
      context
    );
  }
}
