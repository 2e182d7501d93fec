import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import type { ApiErrorBody } from '../../../shared/types/api';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(err);
  }

  let statusCode = 500;
  let message = err.message || 'Internal Server Error';
  let code = 'INTERNAL_ERROR';
  let details: unknown;

  if (err instanceof ZodError) {
    statusCode = 400;
    message = 'Validation Error';
    code = 'VALIDATION_ERROR';
    details = err.issues;
  } else if (err instanceof ApiError) {
    statusCode = err.statusCode;
    code = err.code;
    details = err.details;
  } else if (err instanceof SyntaxError && 'body' in err) {
    statusCode = 400;
    message = 'Malformed JSON body';
    code = 'INVALID_JSON';
  }

  if (statusCode >= 500) {
    console.error('❌ API Error:', {
      error: err.message,
      stack: err.stack,
      url: req.url,
      method: req.method,
      statusCode,
    });
  }

  const body: ApiErrorBody = {
    error: {
      message,
      code,
      ...(details !== undefined && { details }),
      ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
    },
  };

  res.status(statusCode).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.url} not found`,
      code: 'NOT_FOUND',
    },
  });
}

export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}
