// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { apiLogger } from '@/utils/logger.js';

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
  details?: unknown;
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string,
  details?: unknown
): ApiError {
  return Object.assign(new Error(message), { statusCode, code, details });
}

function toApiError(err: unknown): ApiError {
  if (err instanceof ZodError) {
    return createError('Request validation failed', 400, 'VALIDATION_ERROR', {
      issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  if (err instanceof Error) {
    return err;
  }
  return createError(String(err));
}

export function errorHandler(
  thrown: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const err = toApiError(thrown);
  const statusCode = err.statusCode ?? 500;
  const code = err.code ?? 'INTERNAL_ERROR';

  // Log error details (but not in test environment)
  if (process.env.NODE_ENV !== 'test') {
    const context = { code, statusCode, errorType: err.name, stack: statusCode >= 500 ? err.stack : undefined };
    if (statusCode >= 500) {
      apiLogger.error(err.message, context);
    } else {
      apiLogger.warn(err.message, context);
    }
  }

  // Don't leak error details in production
  const isProduction = process.env.NODE_ENV === 'production';
  const message = isProduction && statusCode === 500
    ? 'Internal server error'
    : err.message;

  res.status(statusCode).json({
    success: false,
    error: {
      code,
      message,
      ...(err.details && !isProduction ? { details: err.details } : {}),
    },
  });
}

// Async handler wrapper to avoid try-catch in every route
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
