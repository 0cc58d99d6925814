/**
 * Shared HTTP plumbing: correlation ids, request logging, error envelopes
 */

import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import {
  ExternalServiceError,
  InvalidTransition,
  SecurityViolation,
  ValidationError,
  isBookingError,
  type BookingErrorKind,
} from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export function correlationId() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const id = req.header('x-correlation-id') || randomUUID();
    res.locals.correlationId = id;
    res.setHeader('X-Correlation-ID', id);
    next();
  };
}

export function getCorrelationId(res: Response): string | undefined {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : undefined;
}

export function requestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info('HTTP request', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - start,
        correlation_id: getCorrelationId(res),
      });
    });
    next();
  };
}

export interface ErrorBody {
  kind: BookingErrorKind;
  message: string;
  details?: unknown;
}

function errorDetails(error: unknown): unknown {
  if (error instanceof ValidationError) {
    return error.issues;
  }
  if (error instanceof SecurityViolation) {
    return { field: error.field, pattern: error.pattern };
  }
  if (error instanceof InvalidTransition) {
    return { state: error.state, event: error.event };
  }
  if (error instanceof ExternalServiceError) {
    return { service: error.service, attempts: error.attempts };
  }
  return undefined;
}

/**
 * Map any thrown value to an HTTP status and error body
 */
export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        kind: 'ValidationError',
        message: 'Validation error',
        details: error.errors.map((err) => ({ field: err.path.join('.'), message: err.message })),
      },
    };
  }
  if (isBookingError(error)) {
    const details = errorDetails(error);
    return {
      status: error.statusCode,
      body: { kind: error.kind, message: error.message, ...(details === undefined ? {} : { details }) },
    };
  }
  return { status: 500, body: { kind: 'Fatal', message: 'Internal server error' } };
}
