import express, { type Express } from 'express';
import { requestIdMiddleware } from './middleware/requestId.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createCatalogRouter } from './routes/catalogRoutes.js';
import { createAgentRouter } from './routes/agentRoutes.js';
import { createHealthRouter, type HealthSource } from './routes/healthRoutes.js';
import type { ServiceGetters } from './config/services.js';

export interface AppDependencies extends ServiceGetters {
  health: HealthSource;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));
  app.use(requestIdMiddleware);

  app.use('/health', createHealthRouter(deps.health));
  app.use('/catalog', createCatalogRouter(deps.getCatalogService));
  app.use('/agent', createAgentRouter(deps.getAgentService));

  // 404 handler for unmatched routes, then the error handler (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
