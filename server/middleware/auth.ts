/**
 * API Key Authentication
 *
 * Every /api route except the health check requires the shared key in the
 * X-API-Key header. With no key configured the check is disabled; config
 * loading refuses to start production without one.
 */

import { timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createLogger } from '../lib/logger';

const log = createLogger({ module: 'auth' });

function keysMatch(expected: string, supplied: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(supplied);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireApiKey(apiKey: string | undefined): RequestHandler {
  if (!apiKey) {
    log.warn('API_KEY is not set; API key authentication is disabled');
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  return (req: Request, res: Response, next: NextFunction) => {
    const supplied = req.get('x-api-key');
    if (supplied && keysMatch(apiKey, supplied)) {
      next();
      return;
    }

    res.status(401).json({
      success: false,
      message: 'Authentication required',
      code: 'UNAUTHORIZED',
      requestId: req.id,
    });
  };
}
