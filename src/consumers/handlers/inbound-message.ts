/**
 * Kafka message plumbing shared by the handlers
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { Logger } from '../../utils/logger.js';

/**
 * Kafka message interface compatible with KafkaJS EachMessagePayload.
 * Uses flexible headers type to match KafkaJS IHeaders interface.
 */
export interface InboundMessage {
  topic: string;
  partition: number;
  message: {
    key: Buffer | null;
    value: Buffer | null;
    offset: string;
    timestamp: string;
    headers?: Record<string, Buffer | string | (Buffer | string)[] | undefined>;
  };
  heartbeat: () => Promise<void>;
  pause: () => () => void;
}

export function headerCorrelationId(message: InboundMessage): string | undefined {
  const headerValue = message.message.headers?.['x-correlation-id'];
  if (headerValue) {
    return headerValue.toString();
  }
  return undefined;
}

/**
 * Decode and validate a message body
 *
 * @returns Parsed payload, or null after logging why the message is skipped
 */
export function decodeMessage<T>(
  message: InboundMessage,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  logger: Logger
): T | null {
  if (!message.message.value) {
    logger.error('Empty message value received', {
      topic: message.topic,
      offset: message.message.offset,
    });
    return null;
  }

  let body: unknown;
  try {
    body = JSON.parse(message.message.value.toString());
  } catch (parseError) {
    logger.error('Failed to parse message payload', {
      error: parseError instanceof Error ? parseError.message : String(parseError),
      topic: message.topic,
      offset: message.message.offset,
    });
    return null;
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    logger.error('Payload validation failed', {
      field: parsed.error.errors[0]?.path.join('.') || 'payload',
      issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      topic: message.topic,
      offset: message.message.offset,
    });
    return null;
  }
  return parsed.data;
}

export function resolveCorrelationId(message: InboundMessage, fromPayload?: string): string {
  return headerCorrelationId(message) ?? fromPayload ?? randomUUID();
}
