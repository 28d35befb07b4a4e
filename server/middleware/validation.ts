/**
 * Request Validation Middleware
 *
 * Zod-based validation for Express routes. Bodies are validated by
 * middleware; route handlers parse params and query strings with the
 * schemas in validationSchemas.ts and let a ZodError reach the error handler.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodSchema } from 'zod';

export interface FieldError {
  path: string;
  message: string;
}

export function formatZodError(error: ZodError): FieldError[] {
  return error.errors.map((err) => ({
    path: err.path.join('.'),
    message: err.message,
  }));
}

/**
 * Validate request body against a Zod schema
 */
export function validateBody<T extends ZodSchema>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({
        success: false,
        message: 'Validation failed',
        code: 'VALIDATION_ERROR',
        errors: formatZodError(result.error),
        requestId: req.id,
      });
      return;
    }
    req.body = result.data;
    next();
  };
}
