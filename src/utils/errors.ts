/**
 * Error taxonomy for booking orchestration
 *
 * Every error raised by the orchestrator or its collaborators carries a
 * `kind` so that transports (HTTP tools, Kafka handlers) can map it without
 * inspecting messages.
 */

export type BookingErrorKind =
  | 'ValidationError'
  | 'SecurityViolation'
  | 'AvailabilityRejected'
  | 'ExternalServiceError'
  | 'InvalidTransition'
  | 'Fatal'
  | 'NotFound';

export interface FieldIssue {
  field: string;
  message: string;
}

export abstract class BookingError extends Error {
  abstract readonly kind: BookingErrorKind;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends BookingError {
  readonly kind = 'ValidationError';
  readonly statusCode = 400;

  constructor(message: string, readonly issues: FieldIssue[] = []) {
    super(message);
  }
}

export class SecurityViolation extends BookingError {
  readonly kind = 'SecurityViolation';
  readonly statusCode = 400;

  constructor(message: string, readonly field: string, readonly pattern: string) {
    super(message);
  }
}

export class AvailabilityRejected extends BookingError {
  readonly kind = 'AvailabilityRejected';
  readonly statusCode = 409;

  constructor(readonly candidateId: string, readonly reason: string) {
    super(`Candidate ${candidateId} rejected: ${reason}`);
  }
}

export class ExternalServiceError extends BookingError {
  readonly kind = 'ExternalServiceError';
  readonly statusCode = 502;

  constructor(readonly service: string, message: string, readonly attempts: number = 1) {
    super(`${service}: ${message}`);
  }
}

export class InvalidTransition extends BookingError {
  readonly kind = 'InvalidTransition';
  readonly statusCode = 409;

  constructor(message: string, readonly state: string, readonly event: string) {
    super(message);
  }
}

export class FatalError extends BookingError {
  readonly kind = 'Fatal';
  readonly statusCode = 500;
}

export class NotFoundError extends BookingError {
  readonly kind = 'NotFound';
  readonly statusCode = 404;
}

export function isBookingError(error: unknown): error is BookingError {
  return error instanceof BookingError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
