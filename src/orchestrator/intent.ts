/**
 * Structured intent handed over by the language-understanding collaborator
 */

import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

export const IntentSchema = z.object({
  intent_kind: z.enum(['truck_booking', 'trip_booking'], {
    errorMap: () => ({ message: 'intent_kind must be truck_booking or trip_booking' }),
  }),
  route: z.object({
    origin: z.string().min(1, 'origin is required'),
    destination: z.string().min(1, 'destination is required'),
  }),
  dates: z.object({
    start: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'start must be YYYY-MM-DD format'),
    end: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, 'end must be YYYY-MM-DD format')
      .optional(),
  }),
  party_count: z.number().int().positive().default(1),
  budget: z.number().positive().nullable().optional(),
  free_text_fields: z.record(z.unknown()).default({}),
});

export type Intent = z.infer<typeof IntentSchema>;
export type IntentInput = z.input<typeof IntentSchema>;

/**
 * Validate an intent object at the boundary
 *
 * @throws ValidationError listing every offending field
 */
export function parseIntent(input: unknown): Intent {
  const parsed = IntentSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid booking intent',
      parsed.error.errors.map((err) => ({
        field: err.path.join('.'),
        message: err.message,
      }))
    );
  }
  return parsed.data;
}
