/**
 * Rate Limiting Middleware
 *
 * Protects the API from abuse. Enrichment triggers call a rate-limited
 * external provider, so they get a much tighter budget than reads.
 */

import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import { createLogger } from '../lib/logger';

const log = createLogger({ module: 'rate-limit' });

/**
 * Rate limit exceeded handler
 */
function rateLimitHandler(req: Request, res: Response) {
  log.warn({
    path: req.path,
    ip: req.ip,
    method: req.method,
    requestId: req.id,
  }, 'Rate limit exceeded');

  res.status(429).json({
    success: false,
    message: 'Too many requests. Please try again later.',
    code: 'RATE_LIMIT_EXCEEDED',
    requestId: req.id,
  });
}

function clientKey(req: Request): string {
  return req.get('x-api-key') ? `key-${req.ip}` : req.ip || 'unknown';
}

const skipInTest = () => process.env.NODE_ENV === 'test';

/**
 * General API rate limiter
 *
 * - 100 requests per minute per client
 */
export const apiRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 100,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: clientKey,
  handler: rateLimitHandler,
  skip: (req: Request) => req.path === '/api/health' || skipInTest(),
});

/**
 * Enrichment trigger rate limiter
 *
 * - 10 job submissions per 15 minutes
 */
export const enrichmentRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 10,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req: Request) => `enrich-${clientKey(req)}`,
  handler: rateLimitHandler,
  skip: skipInTest,
});
