import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, logger } from '../utils/logger.js';

const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Attach a request ID to each request and run the rest of the chain inside
 * the logging context, so every log line of the request carries it
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER];
  const requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : randomUUID();

  res.setHeader('X-Request-ID', requestId);

  const context: Record<string, unknown> = {
    requestId,
    method: req.method,
    path: req.path,
  };

  requestContext.run(context, () => {
    logger.info({ query: req.query, ip: req.ip }, 'Incoming request');
    next();
  });
}
