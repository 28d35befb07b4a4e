/**
 * Backfill coverage relationships
 *
 * Recomputes status and duration on every coverage period and rebuilds
 * policy succession links for every carrier. Safe to re-run.
 *
 * Usage: npx tsx scripts/refresh-coverage-relationships.ts
 */

import 'dotenv/config';
import { loadConfig } from '../server/config/appConfig';
import { createLogger, logError, logTiming } from '../server/lib/logger';
import { createServices } from '../server/services/container';
import { openStorage } from '../server/storage/openStorage';

const log = createLogger({ module: 'refresh-coverage' });

async function main(): Promise<void> {
  const started = Date.now();
  const config = loadConfig();
  const { storage, close } = openStorage(config);

  try {
    const { orchestrator } = createServices(storage, config);
    const totals = await orchestrator.refreshAllCarriers();
    logTiming(log, 'refreshCoverageRelationships', started, totals);
  } finally {
    await close();
  }
}

main().catch((error: unknown) => {
  logError(log, error, 'Coverage backfill failed');
  process.exitCode = 1;
});
