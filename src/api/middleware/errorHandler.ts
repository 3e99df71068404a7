// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { StoreUnavailableError, STORE_UNAVAILABLE_MESSAGE } from '@/utils/errors.js';
import { authLogger } from '@/utils/auth-logger.js';

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
    return createError('Invalid request', 400, 'VALIDATION_ERROR', err.issues);
  }
  if (err instanceof StoreUnavailableError) {
    // Internal paths and causes stay in the log, never in the response
    return createError(STORE_UNAVAILABLE_MESSAGE, err.statusCode, err.code);
  }
  if (err instanceof Error) {
    return err;
  }
  return createError(String(err));
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const apiError = toApiError(err);
  const statusCode = apiError.statusCode ?? 500;
  const code = apiError.code ?? 'INTERNAL_ERROR';

  // Log error details (but not in test environment)
  if (process.env.NODE_ENV !== 'test') {
    const original = err instanceof Error ? err : apiError;
    authLogger.error(`[${code}] ${original.message}`, {
      statusCode,
      stack: statusCode >= 500 ? original.stack : undefined,
    });
  }

  // Don't leak error details in production
  const isProduction = process.env.NODE_ENV === 'production';
  const message = isProduction && statusCode === 500
    ? 'Internal server error'
    : apiError.message;

  res.status(statusCode).json({
    success: false,
    error: {
      code,
      message,
      ...(apiError.details && !isProduction ? { details: apiError.details } : {}),
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
