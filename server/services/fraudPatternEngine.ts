/**
 * Fraud Pattern Engine
 *
 * Carrier-level fraud signals over the coverage graph:
 * - additive risk score with every component reported
 * - insurance shopping (provider churn inside a trailing window)
 * - underinsurance against the federal minimum for a cargo type
 * - chameleon candidates (distinct carriers sharing officers and insurers)
 */

import { subMonths } from 'date-fns';
import {
  CargoType,
  CoverageStatus,
  InsuranceEventType,
  type Carrier,
  type InsurancePolicy,
} from '@shared/schema';
import {
  COMPLIANCE_GAP_DAYS,
  DEFAULT_FEDERAL_MINIMUM,
  FEDERAL_MINIMUM_COVERAGE,
  type CarrierRiskScore,
  type ChameleonPattern,
  type FederalComplianceResult,
  type FraudStatisticsSummary,
  type RiskScoreComponent,
  type ShoppingPattern,
  type UnderinsuredCarrier,
} from '@shared/insuranceTypes';
import type { CoverageRecord, IGraphStorage } from '../storage/types';
import { NotFoundError, ValidationError } from '../lib/errors';
import { loggers } from '../lib/logger';
import type { CoverageGapDetector } from './coverageGapDetector';
import { coverageStatus, formatCalendarDate, parseCalendarDate, todayIso } from './temporalCoverage';

const log = loggers.fraud;

const CARRIER_PAGE_SIZE = 500;
const HIGH_RISK_THRESHOLD = 50;

// ============================================
// REGULATORY MINIMUMS
// ============================================

const CARGO_TYPES = new Set<string>(Object.values(CargoType));

function isCargoType(value: string): value is CargoType {
  return CARGO_TYPES.has(value);
}

/** Unknown cargo types fall back to the general-freight minimum. */
export function federalMinimumFor(cargoType: string): number {
  const normalized = cargoType.trim().toUpperCase();
  return isCargoType(normalized) ? FEDERAL_MINIMUM_COVERAGE[normalized] : DEFAULT_FEDERAL_MINIMUM;
}

const usd = (amount: number) => Math.round(amount).toLocaleString('en-US');

export function checkFederalCompliance(
  policy: Pick<InsurancePolicy, 'coverageAmount'>,
  cargoType: string = CargoType.GENERAL_FREIGHT,
): FederalComplianceResult {
  const requiredMinimum = federalMinimumFor(cargoType);
  if (policy.coverageAmount < requiredMinimum) {
    return {
      compliant: false,
      requiredMinimum,
      reason: `Coverage $${usd(policy.coverageAmount)} below required $${usd(requiredMinimum)} for ${cargoType.trim().toUpperCase()}`,
    };
  }
  return { compliant: true, requiredMinimum };
}

// ============================================
// RISK SCORE
// ============================================

export interface RiskFacts {
  policyCount: number;
  providerCount: number;
  cancellations: number;
  complianceViolations: number;
  maxCoverageGap: number;
}

/** Additive score in [0, 100]; each category is capped at 25 points. */
export function scoreRisk(facts: RiskFacts): { riskScore: number; components: RiskScoreComponent[] } {
  if (facts.policyCount === 0) {
    return {
      riskScore: 100,
      components: [{ factor: 'no_policy', points: 100, detail: 'No insurance policy on file' }],
    };
  }

  const gapPoints = facts.maxCoverageGap > COMPLIANCE_GAP_DAYS ? 25 : facts.maxCoverageGap > 7 ? 15 : 0;
  const components: RiskScoreComponent[] = [
    {
      factor: 'provider_shopping',
      points: facts.providerCount > 3 ? 25 : 0,
      detail: `${facts.providerCount} distinct providers`,
    },
    {
      factor: 'cancellations',
      points: Math.min(facts.cancellations * 10, 25),
      detail: `${facts.cancellations} cancellations`,
    },
    {
      factor: 'compliance_violations',
      points: facts.complianceViolations > 0 ? 25 : 0,
      detail: `${facts.complianceViolations} compliance violation events`,
    },
    {
      factor: 'coverage_gap',
      points: gapPoints,
      detail: `Longest coverage gap ${facts.maxCoverageGap} days`,
    },
  ];

  const total = components.reduce((sum, component) => sum + component.points, 0);
  return { riskScore: Math.min(100, Math.max(0, total)), components };
}

// ============================================
// ENGINE
// ============================================

export class FraudPatternEngine {
  constructor(
    private readonly storage: IGraphStorage,
    private readonly gapDetector: CoverageGapDetector,
    private readonly today: () => string = todayIso,
  ) {}

  async riskScore(carrierUsdot: number): Promise<CarrierRiskScore> {
    const carrier = await this.storage.getCarrier(carrierUsdot);
    if (!carrier) {
      throw new NotFoundError('Carrier', carrierUsdot);
    }
    return this.scoreCarrier(carrier);
  }

  /** Every carrier with a non-zero score, highest first. */
  async riskScores(limit?: number): Promise<CarrierRiskScore[]> {
    const scores: CarrierRiskScore[] = [];
    for (const carrier of await this.allCarriers()) {
      const score = await this.scoreCarrier(carrier);
      if (score.riskScore > 0) {
        scores.push(score);
      }
    }
    scores.sort((a, b) => b.riskScore - a.riskScore || a.carrierUsdot - b.carrierUsdot);
    return limit === undefined ? scores : scores.slice(0, limit);
  }

  async detectShopping(monthsWindow = 12, minProviderCount = 3): Promise<ShoppingPattern[]> {
    if (!Number.isInteger(monthsWindow) || monthsWindow <= 0) {
      throw new ValidationError('monthsWindow must be a positive integer', { monthsWindow });
    }
    if (!Number.isInteger(minProviderCount) || minProviderCount <= 0) {
      throw new ValidationError('minProviderCount must be a positive integer', { minProviderCount });
    }

    const today = this.today();
    const cutoff = formatCalendarDate(subMonths(parseCalendarDate(today), monthsWindow));
    const records = await this.storage.listCoverageRecords();

    const windows = new Map<number, CoverageRecord[]>();
    for (const record of records) {
      const from = record.period.fromDate;
      if (from < cutoff || from > today) {
        continue;
      }
      const bucket = windows.get(record.period.carrierUsdot) ?? [];
      bucket.push(record);
      windows.set(record.period.carrierUsdot, bucket);
    }

    const patterns: ShoppingPattern[] = [];
    for (const [carrierUsdot, bucket] of windows) {
      const providers = Array.from(new Set(bucket.map((r) => r.policy.providerName))).sort();
      if (providers.length < minProviderCount) {
        continue;
      }
      const carrier = await this.storage.getCarrier(carrierUsdot);
      patterns.push({
        carrierUsdot,
        carrierName: carrier?.carrierName ?? null,
        providerCount: providers.length,
        providers,
        policyDates: bucket.map((r) => r.period.fromDate).sort(),
        violations: carrier?.violations ?? 0,
        crashes: carrier?.crashes ?? 0,
        riskScore: Math.round((providers.length / monthsWindow) * 10000) / 10000,
      });
    }

    return patterns.sort((a, b) => b.providerCount - a.providerCount || a.carrierUsdot - b.carrierUsdot);
  }

  async detectUnderinsured(cargoType: string = CargoType.GENERAL_FREIGHT): Promise<UnderinsuredCarrier[]> {
    const requiredMinimum = federalMinimumFor(cargoType);
    const today = this.today();
    const records = await this.storage.listCoverageRecords();
    const carriers = new Map<number, Carrier | undefined>();

    const results: UnderinsuredCarrier[] = [];
    for (const { period, policy } of records) {
      const active = policy.effectiveDate <= today && coverageStatus(policy, today) === CoverageStatus.ACTIVE;
      if (!active || policy.coverageAmount >= requiredMinimum) {
        continue;
      }
      if (!carriers.has(period.carrierUsdot)) {
        carriers.set(period.carrierUsdot, await this.storage.getCarrier(period.carrierUsdot));
      }
      const carrier = carriers.get(period.carrierUsdot);
      results.push({
        carrierUsdot: period.carrierUsdot,
        carrierName: carrier?.carrierName ?? null,
        policyId: policy.policyId,
        provider: policy.providerName,
        coverageAmount: policy.coverageAmount,
        requiredMinimum,
        shortage: requiredMinimum - policy.coverageAmount,
        cargoType: cargoType.trim().toUpperCase(),
        violations: carrier?.violations ?? 0,
        crashes: carrier?.crashes ?? 0,
      });
    }

    return results.sort((a, b) => b.shortage - a.shortage || a.carrierUsdot - b.carrierUsdot);
  }

  /**
   * Pairs of distinct carriers sharing at least one officer and at least one
   * insurance provider. Each pair is reported once, lower USDOT first.
   */
  async detectChameleonPatterns(): Promise<ChameleonPattern[]> {
    const links = await this.storage.listOfficerLinks();

    const officers = new Map<string, { fullName: string; carriers: Set<number> }>();
    for (const link of links) {
      const entry = officers.get(link.personId) ?? { fullName: link.fullName, carriers: new Set<number>() };
      entry.carriers.add(link.carrierUsdot);
      officers.set(link.personId, entry);
    }

    const pairs = new Map<string, { first: number; second: number; officers: Set<string> }>();
    for (const { fullName, carriers } of officers.values()) {
      const sorted = Array.from(carriers).sort((a, b) => a - b);
      for (let i = 0; i < sorted.length; i++) {
        for (let j = i + 1; j < sorted.length; j++) {
          const key = `${sorted[i]}:${sorted[j]}`;
          const pair = pairs.get(key) ?? { first: sorted[i], second: sorted[j], officers: new Set<string>() };
          pair.officers.add(fullName);
          pairs.set(key, pair);
        }
      }
    }

    const providerCache = new Map<number, Set<string>>();
    const providersOf = async (usdot: number): Promise<Set<string>> => {
      const cached = providerCache.get(usdot);
      if (cached) return cached;
      const policies = await this.storage.listPoliciesByCarrier(usdot);
      const providers = new Set(policies.map((p) => p.providerName));
      providerCache.set(usdot, providers);
      return providers;
    };

    const patterns: ChameleonPattern[] = [];
    for (const pair of pairs.values()) {
      const [firstProviders, secondProviders] = await Promise.all([providersOf(pair.first), providersOf(pair.second)]);
      const shared = Array.from(firstProviders).filter((name) => secondProviders.has(name)).sort();
      if (shared.length === 0) {
        continue;
      }

      const [first, second] = await Promise.all([
        this.storage.getCarrier(pair.first),
        this.storage.getCarrier(pair.second),
      ]);
      patterns.push({
        carrier1Usdot: pair.first,
        carrier1Name: first?.carrierName ?? null,
        carrier2Usdot: pair.second,
        carrier2Name: second?.carrierName ?? null,
        sharedOfficers: Array.from(pair.officers).sort(),
        sharedProviders: shared,
        sharedProviderCount: shared.length,
        carrier1Violations: first?.violations ?? 0,
        carrier2Violations: second?.violations ?? 0,
      });
    }

    return patterns.sort(
      (a, b) =>
        b.sharedProviderCount - a.sharedProviderCount ||
        a.carrier1Usdot - b.carrier1Usdot ||
        a.carrier2Usdot - b.carrier2Usdot,
    );
  }

  async statisticsSummary(): Promise<FraudStatisticsSummary> {
    const [gaps, shopping, underinsured, scores] = await Promise.all([
      this.gapDetector.detectAllGaps(COMPLIANCE_GAP_DAYS + 1),
      this.detectShopping(),
      this.detectUnderinsured(),
      this.riskScores(),
    ]);

    const averageGapDays =
      gaps.length === 0 ? 0 : Math.round((gaps.reduce((sum, gap) => sum + gap.gapDays, 0) / gaps.length) * 10) / 10;

    return {
      carriersWithGaps: new Set(gaps.map((gap) => gap.carrierUsdot)).size,
      averageGapDays,
      insuranceShoppingCarriers: shopping.length,
      underinsuredCarriers: new Set(underinsured.map((entry) => entry.carrierUsdot)).size,
      highRiskCarriers: scores.filter((score) => score.riskScore > HIGH_RISK_THRESHOLD).length,
      topRisks: scores.slice(0, 5),
    };
  }

  private async scoreCarrier(carrier: Carrier): Promise<CarrierRiskScore> {
    const [policies, events, gaps] = await Promise.all([
      this.storage.listPoliciesByCarrier(carrier.usdot),
      this.storage.listEventsByCarrier(carrier.usdot),
      this.gapDetector.detectGaps(carrier.usdot, 1),
    ]);

    const facts: RiskFacts = {
      policyCount: policies.length,
      providerCount: new Set(policies.map((p) => p.providerName)).size,
      cancellations: events.filter((e) => e.eventType === InsuranceEventType.CANCELLATION).length,
      complianceViolations: events.filter((e) => e.complianceViolation).length,
      maxCoverageGap: gaps.reduce((max, gap) => Math.max(max, gap.gapDays), 0),
    };
    const { riskScore, components } = scoreRisk(facts);

    log.debug({ carrierUsdot: carrier.usdot, riskScore }, 'Risk score computed');

    return {
      carrierUsdot: carrier.usdot,
      carrierName: carrier.carrierName,
      riskScore,
      components,
      ...facts,
      violations: carrier.violations,
      crashes: carrier.crashes,
    };
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
}
