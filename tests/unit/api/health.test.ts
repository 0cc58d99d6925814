/**
 * Unit tests for GET /health endpoint
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import request from 'supertest';
import express, { Express } from 'express';
import { createHealthRouter, type HealthDependencies } from '../../../src/api/health.js';

describe('GET /health', () => {
  let mockDb: { query: Mock<(sql: string) => Promise<unknown>> };

  const buildApp = (extra: Partial<HealthDependencies> = {}) => {
    const app: Express = express();
    app.use('/health', createHealthRouter({ serviceName: 'booking-orchestrator', db: mockDb, ...extra }));
    return app;
  };

  beforeEach(() => {
    mockDb = { query: vi.fn<(sql: string) => Promise<unknown>>() };
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should return 200 when database is healthy', async () => {
    // Arrange
    mockDb.query.mockResolvedValue({ rows: [{ health: 1 }] });

    // Act
    const response = await request(buildApp()).get('/health').expect(200);

    // Assert
    expect(response.body).toMatchObject({
      status: 'healthy',
      service: 'booking-orchestrator',
      dependencies: {
        database: 'healthy',
        kafka_consumer: 'unknown',
        audit_log: 'unknown',
      },
    });
    expect(response.body.timestamp).toBeDefined();
    expect(mockDb.query).toHaveBeenCalledWith('SELECT 1 as health');
  });

  it('should return 503 when database is unhealthy', async () => {
    // Arrange
    mockDb.query.mockRejectedValue(new Error('Connection refused'));

    // Act
    const response = await request(buildApp()).get('/health').expect(503);

    // Assert
    expect(response.body).toMatchObject({
      status: 'unhealthy',
      dependencies: { database: 'unhealthy' },
    });
  });

  it('should report consumer and audit log status without failing the check', async () => {
    // Arrange
    mockDb.query.mockResolvedValue({ rows: [] });
    const app = buildApp({
      consumer: { isRunning: () => false },
      audit: { isDegraded: () => true },
    });

    // Act
    const response = await request(app).get('/health').expect(200);

    // Assert
    expect(response.body.dependencies).toEqual({
      database: 'healthy',
      kafka_consumer: 'unhealthy',
      audit_log: 'degraded',
    });
  });
});
