/**
 * Enrichment Orchestrator
 *
 * Pulls a carrier's filing history from the insurance data provider and
 * materializes it into the coverage graph: policies, provider links,
 * coverage periods, successions and derived events. Re-running for the
 * same carrier converges on the same graph.
 */

import { subMonths } from 'date-fns';
import type { Carrier, InsertInsurancePolicy, InsurancePolicy } from '@shared/schema';
import {
  COMPLIANCE_GAP_DAYS,
  type ComplianceReport,
  type ComplianceViolation,
  type EnrichmentErrorDetail,
  type EnrichmentResult,
} from '@shared/insuranceTypes';
import type { IGraphStorage } from '../storage/types';
import {
  DataQualityError,
  DuplicateKeyError,
  ExternalProviderError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../lib/errors';
import { KeyedMutex } from '../lib/keyedMutex';
import { loggers, logTiming } from '../lib/logger';
import { deriveEvents, summarizeCompliance } from './coverageEvents';
import type { InsuranceDataSource } from './insuranceDataClient';
import { mapRawRecord, type MappedPolicy, type RawInsuranceRecord } from './insuranceRecordMapper';
import type { PolicyEventStore } from './policyEventStore';
import type { RelationshipFabric } from './relationshipFabric';
import { endDate, formatCalendarDate, parseCalendarDate, todayIso } from './temporalCoverage';

const log = loggers.enrichment;

const CARRIER_PAGE_SIZE = 500;
const SHOPPING_WINDOW_MONTHS = 12;
const SHOPPING_MIN_PROVIDERS = 3;

export const INSURANCE_SHOPPING = 'insurance_shopping';

export interface HighRiskCriteria {
  driverOosRate: number;
  crashes: number;
  violations: number;
}

export const DEFAULT_HIGH_RISK_CRITERIA: HighRiskCriteria = {
  driverOosRate: 5,
  crashes: 5,
  violations: 20,
};

export interface EnrichmentOrchestratorDeps {
  storage: IGraphStorage;
  policies: PolicyEventStore;
  fabric: RelationshipFabric;
  source: InsuranceDataSource;
  mutex?: KeyedMutex<number>;
  today?: () => string;
}

interface MappedRecords {
  policies: MappedPolicy[];
  rejected: EnrichmentErrorDetail[];
}

function sameFiling(a: MappedPolicy, b: MappedPolicy): boolean {
  return (
    a.providerName === b.providerName &&
    a.policyType === b.policyType &&
    a.coverageAmount === b.coverageAmount &&
    (a.policyNumber ?? null) === (b.policyNumber ?? null)
  );
}

/**
 * Maps raw records. A second filing whose id clashes with a different
 * filing gets the source record id appended; a repeat of the same filing
 * is counted as a duplicate.
 */
export function mapRecords(records: RawInsuranceRecord[], carrierUsdot: number, today: string): MappedRecords {
  const byId = new Map<string, MappedPolicy>();
  const rejected: EnrichmentErrorDetail[] = [];

  for (const record of records) {
    let policy: MappedPolicy;
    try {
      policy = mapRawRecord(record, carrierUsdot, today);
    } catch (error) {
      if (!(error instanceof DataQualityError)) throw error;
      rejected.push({ code: error.code, message: error.message, recordId: error.recordId });
      continue;
    }

    const kept = byId.get(policy.policyId);
    if (!kept) {
      byId.set(policy.policyId, policy);
      continue;
    }

    const suffix = (policy.sourceRecordId ?? '').replace(/[^A-Za-z0-9_-]/g, '');
    const distinctId = `${policy.policyId}-${suffix}`;
    if (sameFiling(kept, policy) || !suffix || byId.has(distinctId)) {
      rejected.push({
        code: 'DUPLICATE_KEY',
        message: `Duplicate filing of ${policy.policyId}`,
        recordId: policy.sourceRecordId ?? undefined,
      });
      continue;
    }
    byId.set(distinctId, { ...policy, policyId: distinctId });
  }

  const policies = Array.from(byId.values());
  policies.sort((a, b) => (a.effectiveDate < b.effectiveDate ? -1 : a.effectiveDate > b.effectiveDate ? 1 : 0));
  return { policies, rejected };
}

/** True when at least three providers issued policies in the trailing twelve months. */
export function isInsuranceShopping(
  policies: Array<Pick<InsurancePolicy, 'providerName' | 'effectiveDate'>>,
  today: string,
): boolean {
  const cutoff = formatCalendarDate(subMonths(parseCalendarDate(today), SHOPPING_WINDOW_MONTHS));
  const recent = new Set(
    policies
      .filter((policy) => policy.effectiveDate >= cutoff && policy.effectiveDate <= today)
      .map((policy) => policy.providerName),
  );
  return recent.size >= SHOPPING_MIN_PROVIDERS;
}

export function isHighRisk(carrier: Carrier, criteria: HighRiskCriteria = DEFAULT_HIGH_RISK_CRITERIA): boolean {
  return (
    (carrier.driverOosRate ?? 0) > criteria.driverOosRate ||
    carrier.crashes > criteria.crashes ||
    carrier.violations > criteria.violations
  );
}

export class EnrichmentOrchestrator {
  private readonly storage: IGraphStorage;
  private readonly policies: PolicyEventStore;
  private readonly fabric: RelationshipFabric;
  private readonly source: InsuranceDataSource;
  private readonly mutex: KeyedMutex<number>;
  private readonly today: () => string;

  constructor(deps: EnrichmentOrchestratorDeps) {
    this.storage = deps.storage;
    this.policies = deps.policies;
    this.fabric = deps.fabric;
    this.source = deps.source;
    this.mutex = deps.mutex ?? new KeyedMutex<number>();
    this.today = deps.today ?? todayIso;
  }

  /**
   * Enriches one carrier. Provider failures are reported in the result with
   * outcome `failed`; an unknown carrier raises NotFoundError.
   */
  async enrichCarrier(carrierUsdot: number): Promise<EnrichmentResult> {
    const carrier = await this.storage.getCarrier(carrierUsdot);
    if (!carrier) {
      throw new NotFoundError('Carrier', carrierUsdot);
    }
    return this.mutex.runExclusive(carrierUsdot, () => this.enrichLocked(carrier));
  }

  /** Live compliance check from the provider's current filings; nothing is written. */
  async checkCompliance(carrierUsdot: number, cargoType?: string): Promise<ComplianceReport> {
    const today = this.today();
    const records = await this.source.fetchInsuranceHistory(carrierUsdot);
    const { policies } = mapRecords(records, carrierUsdot, today);

    return summarizeCompliance(carrierUsdot, policies, today, cargoType);
  }

  /** Carriers matching the high-risk safety profile, most violations first. */
  async selectHighRiskCarriers(limit: number, criteria: HighRiskCriteria = DEFAULT_HIGH_RISK_CRITERIA): Promise<number[]> {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError('limit must be a positive integer', { limit });
    }

    const matches = (await this.allCarriers()).filter((carrier) => isHighRisk(carrier, criteria));
    return matches
      .sort((a, b) => b.violations - a.violations || a.usdot - b.usdot)
      .slice(0, limit)
      .map((carrier) => carrier.usdot);
  }

  /**
   * Recomputes coverage-period status and duration and rebuilds succession
   * links for every carrier. `carriers` counts those with at least one period.
   */
  async refreshAllCarriers(): Promise<{ carriers: number; periodsRefreshed: number; successionsLinked: number }> {
    const carriers = await this.allCarriers();
    const totals = { carriers: 0, periodsRefreshed: 0, successionsLinked: 0 };

    for (const { usdot: carrierUsdot } of carriers) {
      const refreshed = await this.mutex.runExclusive(carrierUsdot, () => this.fabric.refreshCarrier(carrierUsdot));
      totals.periodsRefreshed += refreshed.periodsRefreshed;
      totals.successionsLinked += refreshed.successionsLinked;
      if (refreshed.periodsRefreshed > 0) {
        totals.carriers++;
      }
    }
    log.info(totals, 'Coverage relationships refreshed');
    return totals;
  }

  private async allCarriers(): Promise<Carrier[]> {
    const carriers: Carrier[] = [];
    for (let offset = 0; ; offset += CARRIER_PAGE_SIZE) {
      const page = await this.storage.listCarriers({ limit: CARRIER_PAGE_SIZE, offset });
      carriers.push(...page);
      if (page.length < CARRIER_PAGE_SIZE) {
        return carriers;
      }
    }
  }

  private async enrichLocked(carrier: Carrier): Promise<EnrichmentResult> {
    const started = Date.now();
    const today = this.today();
    const result: EnrichmentResult = {
      carrierUsdot: carrier.usdot,
      carrierName: carrier.carrierName,
      outcome: 'completed',
      policiesCreated: 0,
      policiesSkipped: 0,
      recordsRejected: 0,
      eventsCreated: 0,
      gapsFound: 0,
      complianceViolations: [],
      fraudIndicators: [],
      errors: [],
    };

    let records: RawInsuranceRecord[];
    try {
      records = await this.source.fetchInsuranceHistory(carrier.usdot);
    } catch (error) {
      if (!(error instanceof ExternalProviderError)) throw error;
      log.warn({ carrierUsdot: carrier.usdot, status: error.status }, error.message);
      return { ...result, outcome: 'failed', errors: [{ code: error.code, message: error.message }] };
    }

    if (records.length === 0) {
      log.info({ carrierUsdot: carrier.usdot }, 'No insurance history on file');
      return { ...result, outcome: 'no_data' };
    }

    const mapped = mapRecords(records, carrier.usdot, today);
    for (const rejection of mapped.rejected) {
      log.warn({ carrierUsdot: carrier.usdot, recordId: rejection.recordId }, `Insurance record rejected: ${rejection.message}`);
    }
    result.recordsRejected = mapped.rejected.length;
    result.errors.push(...mapped.rejected);

    const providerNames = Array.from(new Set(mapped.policies.map((policy) => policy.providerName)));
    for (const name of providerNames) {
      await this.fabric.getOrCreateProvider(name);
    }

    for (const input of mapped.policies) {
      const policy = await this.storePolicy(input, result);
      if (!policy) continue;
      await this.fabric.linkCoveragePeriod(policy.policyId, carrier.usdot, policy.effectiveDate, endDate(policy));
      await this.fabric.linkProvider(policy.policyId, policy.providerName);
    }

    const history = await this.storage.listPoliciesByCarrier(carrier.usdot);
    const chain = await this.fabric.linkSuccessionChain(history);
    result.gapsFound = chain.gaps.length;

    const gapViolations: ComplianceViolation[] = chain.gaps
      .filter((gap) => gap.gapDays > COMPLIANCE_GAP_DAYS)
      .map((gap) => ({
        type: 'COVERAGE_GAP',
        severity: 'HIGH',
        description: `Coverage gap of ${gap.gapDays} days between ${gap.earlier.policyId} and ${gap.later.policyId}`,
        policyId: gap.later.policyId,
        gapDays: gap.gapDays,
      }));

    const indicators = new Set<string>();
    for (const event of deriveEvents(history, carrier.usdot, today)) {
      event.fraudIndicators?.forEach((indicator) => indicators.add(indicator));
      if (await this.storage.insertEvent(event)) {
        result.eventsCreated++;
      }
    }
    if (isInsuranceShopping(history, today)) {
      indicators.add(INSURANCE_SHOPPING);
    }

    const compliance = summarizeCompliance(carrier.usdot, history, today);
    result.complianceViolations = [...compliance.violations, ...gapViolations];
    result.fraudIndicators = Array.from(indicators).sort();

    const latest = history[history.length - 1];
    if (latest) {
      await this.storage.updateCarrier(carrier.usdot, {
        insuranceProvider: latest.providerName,
        insuranceAmount: latest.coverageAmount,
      });
    }
    for (const name of providerNames) {
      await this.fabric.recomputeProviderCarrierCount(name);
    }

    logTiming(log, 'enrichCarrier', started, {
      carrierUsdot: carrier.usdot,
      policiesCreated: result.policiesCreated,
      policiesSkipped: result.policiesSkipped,
      recordsRejected: result.recordsRejected,
      eventsCreated: result.eventsCreated,
      gapsFound: result.gapsFound,
    });
    return result;
  }

  /** Creates the policy unless it is already stored; returns the stored row. */
  private async storePolicy(input: InsertInsurancePolicy, result: EnrichmentResult): Promise<InsurancePolicy | undefined> {
    const existing = await this.storage.getPolicy(input.policyId);
    if (existing) {
      result.policiesSkipped++;
      return existing;
    }

    try {
      const created = await this.policies.createPolicy(input);
      result.policiesCreated++;
      return created;
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        result.policiesSkipped++;
        return this.storage.getPolicy(input.policyId);
      }
      if (error instanceof ValidationError) {
        result.recordsRejected++;
        result.errors.push({ code: error.code, message: errorMessage(error), recordId: input.sourceRecordId ?? undefined });
        return undefined;
      }
      throw error;
    }
  }
}
