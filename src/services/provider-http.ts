/**
 * Shared plumbing for provider HTTP clients
 * axios instance construction, correlation headers and retry-to-error mapping
 */

import axios, { AxiosInstance } from 'axios';
import type { ProviderEndpointConfig } from '../config/env.js';
import { ExternalServiceError, isBookingError } from '../utils/errors.js';
import { RetriesExhausted, isTransientHttpError, withRetry } from '../utils/retry.js';

export type RetryListener = (attempt: number, error: unknown, delayMs: number) => void | Promise<void>;

export interface CallContext {
  correlationId?: string;
  /** Invoked before each repeated attempt */
  onRetry?: RetryListener;
}

export function createProviderAxios(config: ProviderEndpointConfig): AxiosInstance {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  if (config.apiToken) {
    headers.Authorization = `Bearer ${config.apiToken}`;
  }

  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers,
  });
}

export function requestHeaders(correlationId?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  if (correlationId) {
    headers['X-Correlation-ID'] = correlationId;
  }
  return headers;
}

/**
 * Run a provider call under the configured retry budget
 *
 * Transient failures are retried; whatever still fails surfaces as
 * ExternalServiceError so callers deal with one error type per collaborator.
 */
export async function callProvider<T>(
  service: string,
  config: ProviderEndpointConfig,
  operation: () => Promise<T>,
  context: CallContext = {}
): Promise<T> {
  try {
    return await withRetry(() => operation(), {
      ...config.retry,
      isRetryable: isTransientHttpError,
      onRetry: context.onRetry,
    });
  } catch (error) {
    if (error instanceof RetriesExhausted) {
      const cause = error.lastError instanceof Error ? error.lastError.message : String(error.lastError);
      throw new ExternalServiceError(service, `unavailable after ${error.attempts} attempts (${cause})`, error.attempts);
    }
    if (isBookingError(error)) {
      throw error;
    }
    throw new ExternalServiceError(service, error instanceof Error ? error.message : String(error));
  }
}
