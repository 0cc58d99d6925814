/**
 * Bounded exponential backoff for calls to external collaborators
 *
 * delay(attempt) = min(maxDelayMs, baseDelayMs × 2^(attempt − 1))
 */

import type { RetryPolicy } from '../config/env.js';

export interface RetryOptions extends RetryPolicy {
  /** Decides whether a failed attempt may be repeated */
  isRetryable: (error: unknown) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
}

export class RetriesExhausted extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(
      `Gave up after ${attempts} attempt(s): ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`
    );
    this.name = 'RetriesExhausted';
  }
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run an operation, repeating it on retryable failures
 *
 * Non-retryable errors are rethrown untouched. When every attempt failed with
 * a retryable error, RetriesExhausted is thrown carrying the last error.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!options.isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetriesExhausted(attempt, error);
      }
      const delayMs = backoffDelay(attempt, options);
      await options.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}

const TRANSIENT_CODES = new Set([
  'ECONNABORTED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ERR_NETWORK',
]);

/**
 * Timeouts, connection failures, 429 and 5xx responses are transient
 */
export function isTransientHttpError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  if (code && TRANSIENT_CODES.has(code)) {
    return true;
  }

  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const status = 'status' in error.response ? error.response.status : undefined;
    if (typeof status === 'number') {
      return status === 429 || status >= 500;
    }
  }

  return error.message.toLowerCase().includes('timeout');
}
