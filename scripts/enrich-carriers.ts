/**
 * Enrich carriers with insurance history from the provider API
 *
 * Runs one enrichment job in the foreground and prints its summary.
 *
 * Usage:
 *   npx tsx scripts/enrich-carriers.ts 1234567 2345678
 *   npx tsx scripts/enrich-carriers.ts --high-risk 50
 */

import 'dotenv/config';
import { loadConfig } from '../server/config/appConfig';
import { createLogger, logError } from '../server/lib/logger';
import { createServices } from '../server/services/container';
import { openStorage } from '../server/storage/openStorage';

const log = createLogger({ module: 'enrich-carriers' });

function parseArgs(argv: string[]): { usdots: number[]; highRiskLimit?: number } {
  const highRiskIndex = argv.indexOf('--high-risk');
  if (highRiskIndex >= 0) {
    const limit = Number(argv[highRiskIndex + 1] ?? 100);
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new Error('--high-risk takes a positive integer limit');
    }
    return { usdots: [], highRiskLimit: limit };
  }

  const usdots = argv.map(Number);
  const invalid = argv.filter((_, i) => !Number.isInteger(usdots[i]) || usdots[i] <= 0);
  if (usdots.length === 0 || invalid.length > 0) {
    throw new Error(`Expected USDOT numbers, got: ${invalid.join(', ') || '(none)'}`);
  }
  return { usdots };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const { storage, close } = openStorage(config);

  try {
    const services = createServices(storage, config);
    const usdots = args.highRiskLimit === undefined
      ? args.usdots
      : await services.orchestrator.selectHighRiskCarriers(args.highRiskLimit);

    if (usdots.length === 0) {
      log.info('No carriers to enrich');
      return;
    }

    const queued = await services.jobs.enqueue(usdots, args.highRiskLimit === undefined ? 'bulk' : 'high_risk');
    await services.jobs.waitFor(queued.jobId);
    const job = await services.jobs.getJob(queued.jobId);

    log.info(
      {
        jobId: job.jobId,
        status: job.status,
        total: job.total,
        succeeded: job.succeeded,
        failed: job.failed,
        skipped: job.skipped,
        errors: job.errors,
      },
      'Enrichment finished',
    );
    if (job.status === 'failed') {
      process.exitCode = 1;
    }
  } finally {
    await close();
  }
}

main().catch((error: unknown) => {
  logError(log, error, 'Enrichment run failed');
  process.exitCode = 1;
});
