/**
 * Configuration loader
 * Reads environment variables once, validates them with zod and returns the
 * typed AppConfig that is injected into every collaborator client.
 */

import { z } from 'zod';

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean)
    );

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  SERVICE_NAME: z.string().min(1).default('booking-orchestrator'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),

  // Data layer
  DATABASE_URL: z.string().default('postgres://localhost:5432/booking_orchestrator'),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(10),

  // Kafka (chat transport)
  KAFKA_BROKERS: csv('localhost:9092'),
  KAFKA_GROUP_ID: z.string().default('booking-orchestrator-consumers'),
  KAFKA_USERNAME: z.string().optional(),
  KAFKA_PASSWORD: z.string().optional(),
  KAFKA_SSL: z
    .string()
    .default('false')
    .transform((v) => v === 'true'),

  // Provider collaborators
  CATALOG_API_URL: z.string().url().default('http://localhost:4010'),
  VERIFIER_API_URL: z.string().url().default('http://localhost:4020'),
  DOCUMENT_STORE_URL: z.string().url().default('http://localhost:4030'),
  PROVIDER_API_TOKEN: z.string().default(''),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // Retry budget for external calls
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(2000),

  // Orchestration policy
  MAX_RETRY_SELECTIONS: z.coerce.number().int().min(0).default(3),
  RATING_VALUE: z.coerce.number().min(0).default(1000),
  USER_DOCUMENTS: csv('id_proof,parcel_photo'),
  PROVIDER_DOCUMENTS: csv('driving_license,vehicle_registration'),

  // Security gate
  MAX_FIELD_LENGTH: z.coerce.number().int().positive().default(5000),
  ALLOWED_URL_DOMAINS: csv(''),
});

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ProviderEndpointConfig {
  baseUrl: string;
  apiToken: string;
  timeoutMs: number;
  retry: RetryPolicy;
}

export interface AppConfig {
  environment: 'development' | 'test' | 'production';
  serviceName: string;
  port: number;
  logLevel: string;
  database: {
    url: string;
    poolSize: number;
  };
  kafka: {
    brokers: string[];
    groupId: string;
    username?: string;
    password?: string;
    ssl: boolean;
  };
  catalog: ProviderEndpointConfig & { ratingValue: number };
  verifier: ProviderEndpointConfig;
  documentStore: ProviderEndpointConfig;
  orchestrator: {
    maxRetrySelections: number;
    requiredDocuments: {
      user: string[];
      provider: string[];
    };
  };
  security: {
    maxFieldLength: number;
    allowedUrlDomains: string[];
  };
}

/**
 * Parse and validate configuration from an environment map
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment variables: ${fields}`);
  }

  const e = parsed.data;
  const retry: RetryPolicy = {
    maxAttempts: e.RETRY_MAX_ATTEMPTS,
    baseDelayMs: e.RETRY_BASE_DELAY_MS,
    maxDelayMs: e.RETRY_MAX_DELAY_MS,
  };
  const endpoint = (baseUrl: string): ProviderEndpointConfig => ({
    baseUrl,
    apiToken: e.PROVIDER_API_TOKEN,
    timeoutMs: e.PROVIDER_TIMEOUT_MS,
    retry,
  });

  return {
    environment: e.NODE_ENV,
    serviceName: e.SERVICE_NAME,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    database: {
      url: e.DATABASE_URL,
      poolSize: e.DB_POOL_SIZE,
    },
    kafka: {
      brokers: e.KAFKA_BROKERS,
      groupId: e.KAFKA_GROUP_ID,
      username: e.KAFKA_USERNAME,
      password: e.KAFKA_PASSWORD,
      ssl: e.KAFKA_SSL,
    },
    catalog: { ...endpoint(e.CATALOG_API_URL), ratingValue: e.RATING_VALUE },
    verifier: endpoint(e.VERIFIER_API_URL),
    documentStore: endpoint(e.DOCUMENT_STORE_URL),
    orchestrator: {
      maxRetrySelections: e.MAX_RETRY_SELECTIONS,
      requiredDocuments: {
        user: e.USER_DOCUMENTS,
        provider: e.PROVIDER_DOCUMENTS,
      },
    },
    security: {
      maxFieldLength: e.MAX_FIELD_LENGTH,
      allowedUrlDomains: e.ALLOWED_URL_DOMAINS,
    },
  };
}
