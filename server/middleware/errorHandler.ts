/**
 * Centralized Error Handling Middleware
 *
 * Provides consistent error responses across all API routes.
 * Domain errors raised by the coverage services are mapped to HTTP
 * statuses here; route handlers just throw.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  DataQualityError,
  DomainError,
  DuplicateKeyError,
  ExternalProviderError,
  NotFoundError,
  ValidationError,
} from '../lib/errors';
import { createLogger, logError } from '../lib/logger';
import { formatZodError, type FieldError } from './validation';

const log = createLogger({ module: 'error-handler' });

/**
 * API error carrying its HTTP status
 */
export class ApiError extends Error {
  /** Whether the error is operational (expected) vs programming error */
  readonly isOperational = true;

  constructor(
    message: string,
    readonly statusCode: number = 500,
    readonly code: string = 'INTERNAL_ERROR',
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Translate a domain error into its HTTP equivalent
 */
export function toApiError(err: DomainError): ApiError {
  if (err instanceof ValidationError || err instanceof DataQualityError) {
    return new ApiError(err.message, 422, err.code, err.details);
  }
  if (err instanceof DuplicateKeyError) {
    return new ApiError(err.message, 409, err.code, err.details);
  }
  if (err instanceof NotFoundError) {
    return new ApiError(err.message, 404, err.code, err.details);
  }
  if (err instanceof ExternalProviderError) {
    return new ApiError(err.message, 502, err.code, err.details);
  }
  return new ApiError(err.message, 500, err.code, err.details);
}

/**
 * Standard API response format
 */
interface ErrorResponse {
  success: false;
  message: string;
  code: string;
  details?: Record<string, unknown>;
  errors?: FieldError[];
  stack?: string;
  requestId?: string;
}

/**
 * Centralized error handling middleware
 *
 * Must be registered AFTER all route handlers.
 * Catches all errors and returns consistent JSON responses.
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = req.id;

  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      success: false,
      message: 'Validation failed',
      code: 'VALIDATION_ERROR',
      errors: formatZodError(err),
      requestId,
    };
    res.status(400).json(response);
    return;
  }

  const apiError =
    err instanceof ApiError
      ? err
      : err instanceof DomainError
        ? toApiError(err)
        : new ApiError(err instanceof Error ? err.message : String(err));
  const statusCode = apiError.statusCode;

  if (statusCode >= 500) {
    logError(log, err, 'Request error', {
      requestId,
      path: req.path,
      method: req.method,
      statusCode,
    });
  } else {
    log.debug({ requestId, path: req.path, statusCode, code: apiError.code }, apiError.message);
  }

  const isProduction = process.env.NODE_ENV === 'production';

  const response: ErrorResponse = {
    success: false,
    message: isProduction && statusCode === 500
      ? 'An unexpected error occurred'
      : apiError.message,
    code: apiError.code,
    requestId,
  };

  if (apiError.details && (!isProduction || statusCode < 500)) {
    response.details = apiError.details;
  }

  // Include stack trace in development only
  if (process.env.NODE_ENV === 'development' && err instanceof Error) {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
}

/**
 * Not found handler for undefined routes
 * Register after all route definitions but before the error handler.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    message: 'Route not found',
    code: 'NOT_FOUND',
    path: req.path,
    method: req.method,
    requestId: req.id,
  });
}

/**
 * Async handler wrapper to catch errors from async route handlers
 *
 * @example
 * router.get('/carriers/:usdot', asyncHandler(async (req, res) => {
 *   const carrier = await directory.getCarrier(usdotParam(req));
 *   sendSuccess(res, carrier);
 * }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
