import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, NotFoundError, UnauthorizedError } from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

// body-parser tags JSON syntax errors this way
function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
    res.status(400).json(response);
    return;
  }

  if (isMalformedJson(err)) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Malformed JSON body',
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof AppError) {
    if (err instanceof UnauthorizedError) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }
    const response: ErrorResponse = {
      code: err.code,
      message: err.message,
    };
    res.status(err.status).json(response);
    return;
  }

  // Store failures (disk, corrupt file) land here
  console.error('Error:', err);

  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
