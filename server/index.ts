// Load environment variables from .env file BEFORE any other imports
import 'dotenv/config';

import { createServer } from 'node:http';
import { createApp } from './app';
import { loadConfig } from './config/appConfig';
import { logger, logError } from './lib/logger';
import { createServices } from './services/container';
import { openStorage } from './storage/openStorage';

const SHUTDOWN_GRACE_MS = 10_000;

async function main(): Promise<void> {
  const config = loadConfig();

  if (config.storage.driver === 'memory') {
    logger.warn('GRAPH_STORE=memory: data is kept in process memory only');
  }
  const { storage, close: closeDatabase } = openStorage(config);

  const services = createServices(storage, config);
  const httpServer = createServer(createApp(services, config));

  httpServer.listen({ port: config.port, host: '0.0.0.0' }, () => {
    logger.info({ port: config.port, storage: config.storage.driver }, `serving on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal, activeJobs: services.jobs.activeJobIds().length }, 'Shutting down');
    const timer = setTimeout(() => process.exit(1), SHUTDOWN_GRACE_MS);
    timer.unref();

    httpServer.close(() => {
      closeDatabase()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logError(logger, error, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logError(logger, error, 'Server failed to start');
  process.exit(1);
});
