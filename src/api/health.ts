/**
 * Health check endpoint
 */

import { Router, Request, Response } from 'express';

export interface HealthDependencies {
  serviceName: string;
  db: { query(sql: string): Promise<unknown> };
  consumer?: { isRunning(): boolean };
  audit?: { isDegraded(): boolean };
}

type DependencyStatus = 'healthy' | 'unhealthy' | 'degraded' | 'unknown';

export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();

  /**
   * GET /health
   * Returns health status of service and dependencies
   */
  router.get('/', async (req: Request, res: Response): Promise<void> => {
    const dependencies: Record<'database' | 'kafka_consumer' | 'audit_log', DependencyStatus> = {
      database: 'unknown',
      kafka_consumer: deps.consumer ? (deps.consumer.isRunning() ? 'healthy' : 'unhealthy') : 'unknown',
      audit_log: deps.audit ? (deps.audit.isDegraded() ? 'degraded' : 'healthy') : 'unknown',
    };

    try {
      await deps.db.query('SELECT 1 as health');
      dependencies.database = 'healthy';
    } catch {
      dependencies.database = 'unhealthy';
    }

    // Only the database is required to serve traffic
    const healthy = dependencies.database === 'healthy';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      service: deps.serviceName,
      timestamp: new Date().toISOString(),
      dependencies,
    });
  });

  return router;
}
