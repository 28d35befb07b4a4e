/**
 * Enrichment Jobs - background batch processing
 *
 * Accepts a list of carriers and returns a job id immediately. Carriers are
 * enriched one at a time in batches, with a pause between carriers and a
 * longer pause between batches to stay under the provider's rate ceiling.
 *
 * Features:
 * - Persistent job record (pending → running → completed | failed)
 * - Progress counters updated after every carrier
 * - Per-carrier failures are recorded and the batch continues
 */

import { randomUUID } from 'node:crypto';
import {
  EnrichmentJobStatus,
  type EnrichmentJob,
  type JobErrorDetail,
} from '@shared/schema';
import type { EnrichmentConfig } from '../config/appConfig';
import type { IGraphStorage } from '../storage/types';
import { NotFoundError, ValidationError, errorMessage, isDomainError } from '../lib/errors';
import { loggers, logError } from '../lib/logger';
import type { EnrichmentOrchestrator } from './enrichmentOrchestrator';
import { sleep as defaultSleep } from './insuranceDataClient';

const log = loggers.jobs;

// ============================================
// TYPES
// ============================================

export type EnrichmentJobKind = 'carrier' | 'bulk' | 'high_risk';

export interface EnrichmentJobRunnerDeps {
  storage: IGraphStorage;
  orchestrator: EnrichmentOrchestrator;
  config: EnrichmentConfig;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

// ============================================
// RUNNER
// ============================================

export class EnrichmentJobRunner {
  private readonly storage: IGraphStorage;
  private readonly orchestrator: EnrichmentOrchestrator;
  private readonly config: EnrichmentConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly running = new Map<string, Promise<void>>();

  constructor(deps: EnrichmentJobRunnerDeps) {
    this.storage = deps.storage;
    this.orchestrator = deps.orchestrator;
    this.config = deps.config;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Records a pending job and starts it in the background.
   * Returns as soon as the job record is stored.
   */
  async enqueue(carrierUsdots: number[], kind: EnrichmentJobKind = 'bulk'): Promise<EnrichmentJob> {
    const usdots = Array.from(new Set(carrierUsdots));
    if (usdots.length === 0) {
      throw new ValidationError('At least one carrier is required', { field: 'usdots' });
    }

    const job: EnrichmentJob = {
      jobId: randomUUID(),
      kind,
      status: EnrichmentJobStatus.PENDING,
      carrierUsdots: usdots,
      total: usdots.length,
      processed: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      errors: [],
      outcomes: [],
      failureReason: null,
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
    };
    await this.storage.saveJob(job);
    log.info({ jobId: job.jobId, kind, total: job.total }, 'Enrichment job queued');

    const queued = { ...job, carrierUsdots: [...usdots] };
    const run = this.process(job)
      .catch((error) => {
        logError(log, error, 'Enrichment job crashed', { jobId: job.jobId });
      })
      .finally(() => {
        this.running.delete(job.jobId);
      });
    this.running.set(job.jobId, run);

    return queued;
  }

  async getJob(jobId: string): Promise<EnrichmentJob> {
    const job = await this.storage.getJob(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  async listJobs(limit = 50): Promise<EnrichmentJob[]> {
    return this.storage.listJobs(limit);
  }

  /** Resolves once the job has finished; resolves immediately for unknown or finished jobs. */
  async waitFor(jobId: string): Promise<void> {
    await this.running.get(jobId);
  }

  /** Jobs still running in this process. */
  activeJobIds(): string[] {
    return Array.from(this.running.keys());
  }

  // ============================================
  // PROCESSOR
  // ============================================

  private async process(job: EnrichmentJob): Promise<void> {
    job.status = EnrichmentJobStatus.RUNNING;
    job.startedAt = this.now();
    await this.storage.saveJob(job);

    try {
      const batches = chunk(job.carrierUsdots, this.config.batchSize);

      for (const [batchIndex, batch] of batches.entries()) {
        for (const [itemIndex, carrierUsdot] of batch.entries()) {
          await this.processCarrier(job, carrierUsdot);
          job.processed++;
          await this.storage.saveJob(job);

          if (itemIndex < batch.length - 1) {
            await this.sleep(this.config.itemDelayMs);
          }
        }

        log.info(
          { jobId: job.jobId, batch: batchIndex + 1, batches: batches.length, processed: job.processed },
          'Enrichment batch finished',
        );
        if (batchIndex < batches.length - 1) {
          await this.sleep(this.config.batchDelayMs);
        }
      }

      job.status = EnrichmentJobStatus.COMPLETED;
    } catch (error) {
      job.status = EnrichmentJobStatus.FAILED;
      job.failureReason = errorMessage(error);
      logError(log, error, 'Enrichment job failed', { jobId: job.jobId });
    }

    job.completedAt = this.now();
    await this.storage.saveJob(job);
    log.info(
      {
        jobId: job.jobId,
        status: job.status,
        succeeded: job.succeeded,
        failed: job.failed,
        skipped: job.skipped,
      },
      'Enrichment job finished',
    );
  }

  private async processCarrier(job: EnrichmentJob, carrierUsdot: number): Promise<void> {
    try {
      const result = await this.orchestrator.enrichCarrier(carrierUsdot);
      job.outcomes.push({
        carrierUsdot,
        outcome: result.outcome,
        policiesCreated: result.policiesCreated,
        eventsCreated: result.eventsCreated,
        gapsFound: result.gapsFound,
      });

      if (result.outcome === 'failed') {
        job.failed++;
        const first = result.errors[0];
        this.recordError(job, {
          carrierUsdot,
          code: first?.code ?? 'ENRICHMENT_FAILED',
          message: first?.message ?? 'Enrichment failed',
        });
      } else {
        job.succeeded++;
      }
    } catch (error) {
      if (error instanceof NotFoundError) {
        job.skipped++;
      } else {
        job.failed++;
        logError(log, error, 'Carrier enrichment failed', { jobId: job.jobId, carrierUsdot });
      }
      this.recordError(job, {
        carrierUsdot,
        code: isDomainError(error) ? error.code : 'INTERNAL_ERROR',
        message: errorMessage(error),
      });
    }
  }

  private recordError(job: EnrichmentJob, detail: JobErrorDetail): void {
    if (job.errors.length < this.config.maxErrorDetails) {
      job.errors.push(detail);
    }
  }
}
