/**
 * Service wiring
 *
 * Builds every coverage service over one storage backend. The HTTP app,
 * the CLI scripts and the tests all start here.
 */

import type { AppConfig } from '../config/appConfig';
import { KeyedMutex } from '../lib/keyedMutex';
import type { IGraphStorage } from '../storage/types';
import { CarrierDirectory } from './carrierDirectory';
import { CoverageGapDetector } from './coverageGapDetector';
import { EnrichmentJobRunner } from './enrichmentJobs';
import { EnrichmentOrchestrator } from './enrichmentOrchestrator';
import { FraudPatternEngine } from './fraudPatternEngine';
import { InsuranceDataClient, type InsuranceDataSource } from './insuranceDataClient';
import { PolicyEventStore } from './policyEventStore';
import { RelationshipFabric } from './relationshipFabric';
import { todayIso } from './temporalCoverage';

export interface AppServices {
  storage: IGraphStorage;
  policies: PolicyEventStore;
  fabric: RelationshipFabric;
  gapDetector: CoverageGapDetector;
  fraudEngine: FraudPatternEngine;
  orchestrator: EnrichmentOrchestrator;
  jobs: EnrichmentJobRunner;
  directory: CarrierDirectory;
  today: () => string;
}

export interface ServiceOverrides {
  source?: InsuranceDataSource;
  today?: () => string;
  sleep?: (ms: number) => Promise<void>;
}

export function createServices(
  storage: IGraphStorage,
  config: Pick<AppConfig, 'insuranceApi' | 'enrichment'>,
  overrides: ServiceOverrides = {},
): AppServices {
  const today = overrides.today ?? todayIso;
  const source = overrides.source ?? new InsuranceDataClient(config.insuranceApi, { sleep: overrides.sleep });

  const policies = new PolicyEventStore(storage);
  const fabric = new RelationshipFabric(storage, today);
  const gapDetector = new CoverageGapDetector(storage, today);
  const fraudEngine = new FraudPatternEngine(storage, gapDetector, today);
  const orchestrator = new EnrichmentOrchestrator({
    storage,
    policies,
    fabric,
    source,
    mutex: new KeyedMutex<number>(),
    today,
  });
  const jobs = new EnrichmentJobRunner({
    storage,
    orchestrator,
    config: config.enrichment,
    sleep: overrides.sleep,
  });
  const directory = new CarrierDirectory(storage, fabric);

  return { storage, policies, fabric, gapDetector, fraudEngine, orchestrator, jobs, directory, today };
}
