/**
 * Candidate catalog client
 * Queries the provider catalog for offers on a route and ranks them
 */

import { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ProviderEndpointConfig } from '../config/env.js';
import type { Candidate, SearchCriteria } from '../types/booking.js';
import { ExternalServiceError, ValidationError, type FieldIssue } from '../utils/errors.js';
import { rankCandidates } from '../utils/candidate-scoring.js';
import { callProvider, createProviderAxios, requestHeaders, type CallContext } from './provider-http.js';

const ProviderCandidateSchema = z.object({
  offer_id: z.string().min(1),
  provider_id: z.string().min(1),
  provider_name: z.string().default(''),
  provider_contact: z.string().default(''),
  vehicle_type: z.string().default('truck'),
  capacity_kg: z.number().nonnegative().default(0),
  price: z.number().nonnegative(),
  rating: z.number().min(0).max(5).default(0),
  available: z.boolean().default(true),
});

const SearchResponseSchema = z.object({
  candidates: z.array(ProviderCandidateSchema),
});

type ProviderCandidate = z.infer<typeof ProviderCandidateSchema>;

export interface CatalogClientConfig extends ProviderEndpointConfig {
  ratingValue: number;
}

export interface SearchOptions extends CallContext {
  excluded?: readonly string[];
  budget?: number | null;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isValidDate(value: string): boolean {
  return ISO_DATE.test(value) && !Number.isNaN(new Date(`${value}T00:00:00Z`).getTime());
}

/**
 * Reject criteria that cannot be searched: missing route or empty date window
 */
export function validateCriteria(criteria: SearchCriteria): void {
  const issues: FieldIssue[] = [];

  if (!criteria.origin || criteria.origin.trim() === '') {
    issues.push({ field: 'origin', message: 'origin is required' });
  }
  if (!criteria.destination || criteria.destination.trim() === '') {
    issues.push({ field: 'destination', message: 'destination is required' });
  }

  const { start, end } = criteria.dateWindow ?? { start: '', end: '' };
  if (!isValidDate(start)) {
    issues.push({ field: 'dateWindow.start', message: 'start must be a YYYY-MM-DD date' });
  }
  if (!isValidDate(end)) {
    issues.push({ field: 'dateWindow.end', message: 'end must be a YYYY-MM-DD date' });
  }
  if (isValidDate(start) && isValidDate(end) && start > end) {
    issues.push({ field: 'dateWindow', message: 'date window is empty (start is after end)' });
  }

  if (issues.length > 0) {
    throw new ValidationError('Invalid search criteria', issues);
  }
}

function toCandidate(c: ProviderCandidate): Candidate {
  return {
    offerId: c.offer_id,
    providerId: c.provider_id,
    providerName: c.provider_name,
    providerContact: c.provider_contact,
    vehicleType: c.vehicle_type,
    capacityKg: c.capacity_kg,
    price: c.price,
    rating: c.rating,
    available: c.available,
  };
}

export class CatalogClient {
  private axiosClient: AxiosInstance;

  constructor(private readonly config: CatalogClientConfig) {
    this.axiosClient = createProviderAxios(config);
  }

  /**
   * Search available offers for a route
   *
   * @returns Candidates ranked best first, excluding unavailable, excluded and over-budget offers
   * @throws ValidationError for incomplete criteria, ExternalServiceError when the catalog fails
   */
  async search(criteria: SearchCriteria, options: SearchOptions = {}): Promise<Candidate[]> {
    validateCriteria(criteria);

    const excluded = [...(options.excluded ?? [])];
    const body = {
      origin: criteria.origin,
      destination: criteria.destination,
      dateWindow: criteria.dateWindow,
      partyCount: criteria.partyCount,
      excluded,
    };

    const candidates = await callProvider(
      'catalog',
      this.config,
      async () => {
        const response = await this.axiosClient.post('/search', body, {
          headers: requestHeaders(options.correlationId),
        });
        const parsed = SearchResponseSchema.safeParse(response.data);
        if (!parsed.success) {
          throw new ExternalServiceError('catalog', 'malformed search response');
        }
        return parsed.data.candidates.map(toCandidate);
      },
      options
    );

    return rankCandidates(candidates, { excluded, budget: options.budget }, {
      RATING_VALUE: this.config.ratingValue,
    }).map(({ candidate }) => candidate);
  }
}
