/**
 * booking-orchestrator service entry point
 * Tool API over HTTP plus the booking.inbound / provider.trip-status consumers
 */

import express, { Request, Response, NextFunction } from 'express';
import { Pool } from 'pg';
import { createBookingsRouter } from './api/bookings.js';
import { createHealthRouter } from './api/health.js';
import { correlationId, getCorrelationId, requestLogger } from './api/middleware.js';
import { createBookingTools, createToolsRouter } from './api/tools.js';
import { loadConfig } from './config/env.js';
import { createEventConsumer } from './consumers/event-consumer.js';
import { BookingOrchestrator } from './orchestrator/booking-orchestrator.js';
import { PgBookingRepository } from './repositories/booking-repository.js';
import { AuditLogger, PgAuditSink } from './services/audit-logger.js';
import { AvailabilityClient } from './services/availability-client.js';
import { CatalogClient } from './services/catalog-client.js';
import { DetailCollector } from './services/detail-collector.js';
import { DocumentGate } from './services/document-gate.js';
import { DocumentStoreClient } from './services/document-store-client.js';
import { NotificationDispatcher, OutboxStatusTransport } from './services/notification-dispatcher.js';
import { SecurityGate } from './services/security-gate.js';
import { createLogger } from './utils/logger.js';

const config = loadConfig(process.env);

const logger = createLogger({
  serviceName: config.serviceName,
  level: config.logLevel,
  environment: config.environment,
});

const db = new Pool({
  connectionString: config.database.url,
  max: config.database.poolSize,
});

const gate = new SecurityGate(config.security);
const audit = new AuditLogger({ sink: new PgAuditSink(db), masker: gate, logger });

const orchestrator = new BookingOrchestrator({
  repository: new PgBookingRepository(db),
  catalog: new CatalogClient(config.catalog),
  verifier: new AvailabilityClient(config.verifier),
  documentStore: new DocumentStoreClient(config.documentStore),
  gate,
  collector: new DetailCollector(gate),
  documentGate: new DocumentGate(config.orchestrator.requiredDocuments),
  audit,
  notifier: new NotificationDispatcher(new OutboxStatusTransport(db), logger),
  logger,
  maxRetrySelections: config.orchestrator.maxRetrySelections,
});

const consumer = createEventConsumer({
  serviceName: config.serviceName,
  brokers: config.kafka.brokers,
  groupId: config.kafka.groupId,
  username: config.kafka.username,
  password: config.kafka.password,
  ssl: config.kafka.ssl,
  orchestrator,
  logger,
});

const app = express();

app.set('trust proxy', true);
app.use(express.json({ limit: '10mb' }));
app.use(correlationId());
app.use(requestLogger(logger));

app.use('/tools', createToolsRouter(createBookingTools(orchestrator), logger));
app.use('/bookings', createBookingsRouter(orchestrator, logger));
app.use('/health', createHealthRouter({ serviceName: config.serviceName, db, consumer, audit }));

// Error handler
app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    correlation_id: getCorrelationId(res),
  });

  res.status(500).json({
    error: 'Internal server error',
    correlation_id: getCorrelationId(res),
  });
});

async function start(): Promise<void> {
  try {
    logger.info('Connecting to database...');
    const client = await db.connect();
    client.release();
    logger.info('Database connected');

    await consumer.start();

    app.listen(config.port, () => {
      logger.info(`${config.serviceName} listening`, {
        port: config.port,
        environment: config.environment,
      });
    });
  } catch (error) {
    logger.error('Failed to start service', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

process.on('SIGTERM', async () => {
  logger.info('SIGTERM received, shutting down gracefully...');

  try {
    await consumer.stop();
    await db.end();
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
});

void start();
