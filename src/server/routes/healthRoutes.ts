import express, { Router } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';
import { logger } from '../utils/logger.js';

export interface HealthSource {
  healthCheckAll(): Promise<Record<string, boolean>>;
}

/**
 * Liveness and per-resource health endpoints
 */
export function createHealthRouter(source: HealthSource): Router {
  const router = express.Router();

  // GET /health
  router.get('/', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  // GET /health/resources
  // Only resources that have been initialized are probed
  router.get(
    '/resources',
    asyncHandler(async (_req, res) => {
      const resources = await source.healthCheckAll();
      const unhealthy = Object.keys(resources).filter((name) => !resources[name]);
      if (unhealthy.length > 0) {
        logger.warn({ unhealthy }, 'Resource health check failed');
      }
      res.status(unhealthy.length > 0 ? 503 : 200).json({
        status: unhealthy.length > 0 ? 'degraded' : 'healthy',
        resources,
      });
    })
  );

  return router;
}
