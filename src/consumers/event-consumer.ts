/**
 * Event Consumer Wrapper
 *
 * Manages the kafkajs consumer lifecycle and routes each inbound topic to
 * its handler.
 */

import { Kafka, logLevel, type Consumer, type EachMessagePayload } from 'kafkajs';
import type { Logger } from '../utils/logger.js';
import { createBookingEventHandler, type BookingCommands } from './handlers/booking-event.handler.js';
import type { InboundMessage } from './handlers/inbound-message.js';
import { createTripStatusHandler } from './handlers/trip-status.handler.js';
import type { BookingOrchestrator } from '../orchestrator/booking-orchestrator.js';

export const BOOKING_INBOUND_TOPIC = 'booking.inbound';
export const TRIP_STATUS_TOPIC = 'provider.trip-status';

type Topic = typeof BOOKING_INBOUND_TOPIC | typeof TRIP_STATUS_TOPIC;

export type ConsumerCommands = BookingCommands & Pick<BookingOrchestrator, 'updateTripStatus'>;

/**
 * EventConsumer configuration
 */
export interface EventConsumerConfig {
  serviceName: string;
  brokers: string[];
  groupId: string;
  username?: string;
  password?: string;
  ssl?: boolean;
  orchestrator: ConsumerCommands;
  logger: Logger;
}

interface HandlerStats {
  processedCount: number;
  errorCount: number;
  lastProcessedAt: Date | null;
}

export interface ConsumerStats {
  processedCount: number;
  errorCount: number;
  lastProcessedAt: Date | null;
  isRunning: boolean;
  handlers: Record<Topic, HandlerStats>;
}

interface MessageHandler {
  handle(message: InboundMessage): Promise<void>;
}

export class EventConsumer {
  private consumer: Consumer;
  private logger: Logger;
  private serviceName: string;
  private started: boolean = false;
  private handlers: Record<Topic, MessageHandler>;

  private stats: ConsumerStats = {
    processedCount: 0,
    errorCount: 0,
    lastProcessedAt: null,
    isRunning: false,
    handlers: {
      [BOOKING_INBOUND_TOPIC]: { processedCount: 0, errorCount: 0, lastProcessedAt: null },
      [TRIP_STATUS_TOPIC]: { processedCount: 0, errorCount: 0, lastProcessedAt: null },
    },
  };

  constructor(config: EventConsumerConfig) {
    this.logger = config.logger;
    this.serviceName = config.serviceName;

    const kafka = new Kafka({
      clientId: config.serviceName,
      brokers: config.brokers,
      ssl: config.ssl,
      sasl:
        config.username && config.password
          ? { mechanism: 'plain', username: config.username, password: config.password }
          : undefined,
      logLevel: logLevel.WARN,
    });
    this.consumer = kafka.consumer({ groupId: config.groupId });

    this.handlers = {
      [BOOKING_INBOUND_TOPIC]: createBookingEventHandler({
        orchestrator: config.orchestrator,
        logger: config.logger,
      }),
      [TRIP_STATUS_TOPIC]: createTripStatusHandler({
        orchestrator: config.orchestrator,
        logger: config.logger,
      }),
    };
  }

  /**
   * Connect, subscribe to every topic, then start consuming
   */
  async start(): Promise<void> {
    this.logger.info('Connecting to Kafka', { serviceName: this.serviceName });

    try {
      await this.consumer.connect();
      this.logger.info('Successfully connected to Kafka', { serviceName: this.serviceName });

      const topics: Topic[] = [BOOKING_INBOUND_TOPIC, TRIP_STATUS_TOPIC];
      this.logger.info('Subscribing to topics', { topics });
      await this.consumer.subscribe({ topics, fromBeginning: false });

      await this.consumer.run({
        eachMessage: (payload) => this.dispatch(payload),
      });

      this.started = true;
      this.stats.isRunning = true;
    } catch (error) {
      this.logger.error('Failed to connect to Kafka', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (!this.started) {
      this.logger.warn('Consumer not running, nothing to stop', { serviceName: this.serviceName });
      return;
    }

    this.logger.info('Shutting down Kafka consumer', { serviceName: this.serviceName });

    try {
      await this.consumer.disconnect();
      this.logger.info('Successfully disconnected from Kafka', { serviceName: this.serviceName });
    } catch (error) {
      this.logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.started = false;
      this.stats.isRunning = false;
    }
  }

  getStats(): ConsumerStats {
    return {
      ...this.stats,
      handlers: {
        [BOOKING_INBOUND_TOPIC]: { ...this.stats.handlers[BOOKING_INBOUND_TOPIC] },
        [TRIP_STATUS_TOPIC]: { ...this.stats.handlers[TRIP_STATUS_TOPIC] },
      },
    };
  }

  isRunning(): boolean {
    return this.started;
  }

  private async dispatch(payload: EachMessagePayload): Promise<void> {
    const topic = payload.topic;
    if (topic !== BOOKING_INBOUND_TOPIC && topic !== TRIP_STATUS_TOPIC) {
      this.logger.warn('Message from unexpected topic', { topic });
      return;
    }

    const handlerStats = this.stats.handlers[topic];
    try {
      await this.handlers[topic].handle(payload);
      handlerStats.processedCount++;
      handlerStats.lastProcessedAt = new Date();
      this.stats.processedCount++;
      this.stats.lastProcessedAt = new Date();
    } catch (error) {
      handlerStats.errorCount++;
      this.stats.errorCount++;
      throw error;
    }
  }
}

/**
 * Factory function to create EventConsumer
 */
export function createEventConsumer(config: EventConsumerConfig): EventConsumer {
  if (!config) {
    throw new Error('config is required');
  }

  if (!config.orchestrator) {
    throw new Error('orchestrator is required');
  }

  if (!config.logger) {
    throw new Error('logger is required');
  }

  if (!config.brokers || config.brokers.length === 0) {
    throw new Error('brokers is required and must not be empty');
  }

  if (!config.groupId || config.groupId.trim() === '') {
    throw new Error('groupId is required');
  }

  return new EventConsumer(config);
}
