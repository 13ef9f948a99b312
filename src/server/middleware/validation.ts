import type { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodTypeAny, type z } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

interface ValidationSchema {
  body: ZodTypeAny;
}

export interface ValidationDetail {
  path: string;
  message: string;
}

export function zodIssueDetails(error: ZodError): ValidationDetail[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export function toBadRequest(error: ZodError): BadRequestError {
  return new BadRequestError('Validation failed', { details: zodIssueDetails(error) });
}

/**
 * Parse a value inside a handler. Query strings and route params go through
 * here so the handler gets their typed result.
 * @throws BadRequestError
 */
export function parseOrBadRequest<T extends ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw toBadRequest(result.error);
  }
  return result.data;
}

/**
 * Body validation middleware factory.
 * Replaces the body with its parsed value (defaults applied) and turns a
 * ZodError into a BadRequestError with one detail per issue.
 */
export function validate(schema: ValidationSchema) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      req.body = schema.body.parse(req.body);
      next();
    } catch (error) {
      if (!(error instanceof ZodError)) {
        next(error);
        return;
      }
      logger.warn(
        { path: req.path, method: req.method, issues: zodIssueDetails(error) },
        'Request validation failed'
      );
      next(toBadRequest(error));
    }
  };
}
