/**
 * Detail collector
 *
 * Accumulates TripDetails over several user turns. Each submitted field goes
 * through the security gate; accepted values are merged, rejected ones are
 * reported and previously accepted values are kept.
 */

import {
  OPTIONAL_TRIP_FIELDS,
  REQUIRED_TRIP_FIELDS,
  type TripDetailField,
  type TripDetails,
} from '../types/booking.js';
import type { BookingErrorKind } from '../utils/errors.js';
import type { SecurityGate } from './security-gate.js';

export interface RejectedField {
  field: string;
  kind: Extract<BookingErrorKind, 'ValidationError' | 'SecurityViolation'>;
  message: string;
  /** Name of the matched dangerous pattern, for security violations */
  pattern?: string;
}

export interface MergeResult {
  details: TripDetails;
  accepted: TripDetailField[];
  rejected: RejectedField[];
  outstanding: TripDetailField[];
  complete: boolean;
}

/**
 * Required fields still absent from the details
 */
export function outstandingFields(details: TripDetails): TripDetailField[] {
  return REQUIRED_TRIP_FIELDS.filter((field) => details[field] === undefined);
}

export function isComplete(details: TripDetails): boolean {
  return outstandingFields(details).length === 0;
}

/**
 * Field prompts shown to the user when a field is outstanding
 */
export const FIELD_PROMPTS: Record<TripDetailField, string> = {
  consigner: 'Consigner (sender) name and contact',
  consignee: 'Consignee (receiver) name and contact',
  pickupAddress: 'Pickup address',
  deliveryAddress: 'Delivery address',
  parcelDimensions: 'Parcel dimensions as LxWxH (e.g. 120x80x60 cm)',
  weightKg: 'Parcel weight (e.g. 250kg)',
  declaredValue: 'Declared value (optional)',
  specialInstructions: 'Special instructions (optional)',
};

export class DetailCollector {
  constructor(private readonly gate: SecurityGate) {}

  merge(current: TripDetails, fields: Record<string, unknown>): MergeResult {
    let details: TripDetails = { ...current };
    const accepted: TripDetailField[] = [];
    const rejected: RejectedField[] = [];

    for (const [field, raw] of Object.entries(fields)) {
      const result = this.gate.validateField(field, raw);
      if (!result.ok) {
        const { error } = result;
        rejected.push({
          field,
          kind: error.kind,
          message: error.message,
          ...(error.kind === 'SecurityViolation' ? { pattern: error.pattern } : {}),
        });
        continue;
      }

      details = { ...details, ...result.patch };
      for (const key of [...REQUIRED_TRIP_FIELDS, ...OPTIONAL_TRIP_FIELDS]) {
        if (key in result.patch && !accepted.includes(key)) {
          accepted.push(key);
        }
      }
    }

    const outstanding = outstandingFields(details);
    return { details, accepted, rejected, outstanding, complete: outstanding.length === 0 };
  }
}
