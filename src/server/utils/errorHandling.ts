/**
 * Error handling utilities for route handlers
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Wraps an async route handler so a rejected promise reaches the Express
 * error middleware instead of becoming an unhandled rejection.
 *
 * ```typescript
 * router.get('/:id', asyncHandler(async (req, res) => {
 *   res.json(await service.get(req.params.id));
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Message of any thrown value, for log fields
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
