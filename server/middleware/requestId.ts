/**
 * Request ID Middleware
 *
 * Generates or extracts request ID and adds it to request/response context.
 * Request ID is used for tracing requests across the system.
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import { createLogger, type Logger } from '../lib/logger';

const log = createLogger({ module: 'http' });

/**
 * Extract or generate request ID from headers
 */
function getRequestId(req: Request): string {
  const header = req.get('x-request-id') ?? req.get('x-correlation-id');
  return header && header.length <= 128 ? header : randomUUID();
}

/**
 * Middleware to add request ID to all requests
 *
 * Adds request ID to:
 * - req.id (for use in route handlers)
 * - res.locals.requestId (for use in response helpers)
 * - Response header X-Request-ID
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = getRequestId(req);

  req.id = requestId;
  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);
  req.logger = log.child({ requestId, method: req.method, path: req.path });

  next();
}

/**
 * Logs one line per finished request
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    const logger = req.logger ?? log;
    logger.info({ statusCode: res.statusCode, durationMs: Date.now() - start }, `${req.method} ${req.originalUrl}`);
  });
  next();
}

// Extend Express types
declare global {
  namespace Express {
    interface Request {
      id?: string;
      logger?: Logger;
    }
  }
}
