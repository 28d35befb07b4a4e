/**
 * Routes Index
 *
 * Mounts every route module on the Express app, followed by the 404 and
 * error handlers.
 */

import type { Express, Request, Response } from 'express';
import type { AppServices } from '../services/container';
import { requireApiKey } from '../middleware/auth';
import { errorHandler, notFoundHandler } from '../middleware/errorHandler';
import { apiRateLimiter } from '../middleware/rateLimit';
import { createLogger } from '../lib/logger';
import { createCarrierRouter } from './carriers';
import { createInsuranceRouter } from './insurance';
import { createProviderRouter } from './providers';

const log = createLogger({ module: 'routes' });

export interface RouteOptions {
  apiKey?: string;
  version?: string;
}

/**
 * Register all routes with the Express app
 */
export function registerRoutes(app: Express, services: AppServices, options: RouteOptions = {}): void {
  // =================================================
  // Health Check (unauthenticated)
  // =================================================

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: options.version ?? '1.0.0',
    });
  });

  app.use('/api', apiRateLimiter, requireApiKey(options.apiKey));

  // =================================================
  // Mount Route Modules
  // =================================================

  app.use('/api/insurance', createInsuranceRouter(services));
  app.use('/api/carriers', createCarrierRouter(services));
  app.use('/api/insurance-providers', createProviderRouter(services));

  // =================================================
  // Error Handling
  // =================================================

  app.use('/api/*', notFoundHandler);
  app.use(errorHandler);

  log.info('Routes registered successfully');
}
