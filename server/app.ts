/**
 * Express application factory. No listening socket; server/index.ts and
 * the route tests both build the app here.
 */

import express, { type Express } from 'express';
import type { AppConfig } from './config/appConfig';
import { requestIdMiddleware, requestLogger } from './middleware/requestId';
import { registerRoutes } from './routes';
import type { AppServices } from './services/container';

export function createApp(services: AppServices, config: Pick<AppConfig, 'apiKey'>): Express {
  const app = express();
  app.set('trust proxy', 1);

  app.use(requestIdMiddleware);
  app.use(requestLogger);
  app.use(express.json({ limit: '1mb' }));

  registerRoutes(app, services, {
    apiKey: config.apiKey,
    version: process.env.npm_package_version,
  });

  return app;
}
