import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../utils/logger.js';
import { BadRequestError, ErrorCode, NotFoundError, toAppError, type AppError, type ErrorResponse } from '../types/errors.js';
import { toBadRequest } from './validation.js';

const STATUS_TITLES: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  409: 'Conflict',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};

/**
 * express.json() rejects unparseable bodies with a SyntaxError tagged by body-parser
 */
function isBodyParseError(err: unknown): err is SyntaxError & { type: string } {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

function normalizeError(err: unknown): AppError {
  if (err instanceof ZodError) {
    return toBadRequest(err);
  }
  if (isBodyParseError(err)) {
    return new BadRequestError('Malformed JSON body');
  }
  return toAppError(err);
}

/**
 * Transform any thrown value into the standard error body
 */
export function toErrorResponse(err: unknown, path: string, includeStack: boolean): ErrorResponse {
  const appError = normalizeError(err);
  // Internal details of non-operational errors stay in the logs
  const exposeDetails = appError.isOperational || includeStack;

  return {
    error: STATUS_TITLES[appError.statusCode] ?? 'Error',
    code: appError.code,
    message: exposeDetails ? appError.message : 'An unexpected error occurred',
    statusCode: appError.statusCode,
    timestamp: new Date().toISOString(),
    path,
    ...(exposeDetails && appError.context ? { context: appError.context } : {}),
    ...(includeStack && appError.stack ? { stack: appError.stack } : {}),
  };
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in the Express app
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const includeStack = process.env.NODE_ENV === 'development';
  const body = toErrorResponse(err, req.path, includeStack);

  if (err instanceof NotFoundError) {
    logger.info({ path: req.path, method: req.method, message: body.message }, 'Resource not found');
  } else if (body.statusCode >= 500) {
    logger.error(
      {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
        code: body.code,
        path: req.path,
        method: req.method,
      },
      'Unhandled error'
    );
  } else {
    logger.warn({ code: body.code, path: req.path, method: req.method, message: body.message }, 'Request failed');
  }

  if (res.headersSent) {
    // Streaming responses (SSE) have already committed a status; report in-band and close
    if (!res.writableEnded) {
      res.write(`event: error\ndata: ${JSON.stringify({ code: body.code, message: body.message })}\n\n`);
      res.end();
    }
    return;
  }

  res.status(body.statusCode).json(body);
}

/**
 * 404 for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'Not Found',
    code: ErrorCode.NOT_FOUND,
    message: `Route ${req.method} ${req.path} not found`,
    statusCode: 404,
    timestamp: new Date().toISOString(),
    path: req.path,
  } satisfies ErrorResponse);
}
