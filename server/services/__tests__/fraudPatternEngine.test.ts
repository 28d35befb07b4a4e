/**
 * Fraud Pattern Engine Tests
 *
 * Unit tests for risk scoring, insurance shopping, underinsurance and
 * chameleon-carrier detection.
 * Run with: npx vitest run server/services/__tests__/fraudPatternEngine.test.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InsuranceEventType } from '../../../shared/schema';
import { NotFoundError, ValidationError } from '../../lib/errors';
import { checkFederalCompliance, federalMinimumFor, scoreRisk } from '../fraudPatternEngine';
import { addCarrier, addLinkedPolicy, buildTestServices, type TestServices } from './fixtures';

// ============================================
// PURE SCORING
// ============================================

describe('federal minimums', () => {
  it('looks up the minimum per cargo type', () => {
    expect(federalMinimumFor('GENERAL_FREIGHT')).toBe(750_000);
    expect(federalMinimumFor('hazmat')).toBe(5_000_000);
    expect(federalMinimumFor('OIL')).toBe(1_000_000);
  });

  it('falls back to the general-freight minimum', () => {
    expect(federalMinimumFor('LIVESTOCK')).toBe(750_000);
  });

  it('explains a shortfall', () => {
    expect(checkFederalCompliance({ coverageAmount: 500_000 })).toEqual({
      compliant: false,
      requiredMinimum: 750_000,
      reason: 'Coverage $500,000 below required $750,000 for GENERAL_FREIGHT',
    });
    expect(checkFederalCompliance({ coverageAmount: 750_000 })).toEqual({ compliant: true, requiredMinimum: 750_000 });
  });
});

describe('scoreRisk', () => {
  const clean = { policyCount: 1, providerCount: 1, cancellations: 0, complianceViolations: 0, maxCoverageGap: 0 };

  it('scores a carrier without policies at 100', () => {
    expect(scoreRisk({ ...clean, policyCount: 0 })).toEqual({
      riskScore: 100,
      components: [{ factor: 'no_policy', points: 100, detail: 'No insurance policy on file' }],
    });
  });

  it('adds each component', () => {
    const { riskScore, components } = scoreRisk({
      policyCount: 5,
      providerCount: 4,
      cancellations: 2,
      complianceViolations: 1,
      maxCoverageGap: 10,
    });

    expect(components.map((c) => [c.factor, c.points])).toEqual([
      ['provider_shopping', 25],
      ['cancellations', 20],
      ['compliance_violations', 25],
      ['coverage_gap', 15],
    ]);
    expect(riskScore).toBe(85);
  });

  it('caps cancellations and gap points', () => {
    const { components } = scoreRisk({ ...clean, cancellations: 7, maxCoverageGap: 31 });
    expect(components.find((c) => c.factor === 'cancellations')?.points).toBe(25);
    expect(components.find((c) => c.factor === 'coverage_gap')?.points).toBe(25);
  });

  it('does not score a 30-day gap as a compliance-length gap', () => {
    const { components } = scoreRisk({ ...clean, maxCoverageGap: 30 });
    expect(components.find((c) => c.factor === 'coverage_gap')?.points).toBe(15);
  });

  it('stays within 0 and 100', () => {
    for (const policyCount of [0, 1, 10]) {
      for (const providerCount of [0, 3, 9]) {
        for (const cancellations of [0, 1, 50]) {
          for (const maxCoverageGap of [0, 8, 400]) {
            const { riskScore } = scoreRisk({
              policyCount,
              providerCount,
              cancellations,
              complianceViolations: cancellations,
              maxCoverageGap,
            });
            expect(riskScore).toBeGreaterThanOrEqual(0);
            expect(riskScore).toBeLessThanOrEqual(100);
          }
        }
      }
    }
  });
});

// ============================================
// ENGINE
// ============================================

describe('FraudPatternEngine', () => {
  let services: TestServices;

  beforeEach(() => {
    services = buildTestServices('2024-06-15');
  });

  describe('riskScore', () => {
    it('scores a carrier with no policies at 100', async () => {
      await addCarrier(services, 1001);

      const score = await services.fraudEngine.riskScore(1001);

      expect(score.riskScore).toBe(100);
      expect(score.components.map((c) => c.factor)).toEqual(['no_policy']);
      expect(score.policyCount).toBe(0);
    });

    it('combines cancellations, violations and the longest gap', async () => {
      await addCarrier(services, 1001);
      await addLinkedPolicy(services, {
        policyId: 'P1',
        providerName: 'Acme',
        effectiveDate: '2023-01-01',
        cancellationDate: '2023-06-01',
      });
      await addLinkedPolicy(services, { policyId: 'P2', providerName: 'Beta', effectiveDate: '2023-07-15' });
      await services.policies.createEvent({
        carrierUsdot: 1001,
        eventType: InsuranceEventType.CANCELLATION,
        eventDate: '2023-06-01',
        reason: 'NON_PAYMENT',
      });
      await services.policies.createEvent({
        carrierUsdot: 1001,
        eventType: InsuranceEventType.PROVIDER_CHANGE,
        eventDate: '2023-07-15',
        daysWithoutCoverage: 44,
        complianceViolation: true,
      });

      const score = await services.fraudEngine.riskScore(1001);

      expect(score).toMatchObject({
        riskScore: 60,
        policyCount: 2,
        providerCount: 2,
        cancellations: 1,
        complianceViolations: 1,
        maxCoverageGap: 44,
      });
    });

    it('rejects unknown carriers', async () => {
      await expect(services.fraudEngine.riskScore(9999)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('riskScores', () => {
    it('omits zero scores and orders highest first', async () => {
      await addCarrier(services, 1001);
      await addCarrier(services, 1002);
      await addLinkedPolicy(services, { policyId: 'P1', carrierUsdot: 1002, effectiveDate: '2023-01-01' });
      await addCarrier(services, 1003);
      await addLinkedPolicy(services, {
        policyId: 'P2',
        carrierUsdot: 1003,
        effectiveDate: '2023-01-01',
        expirationDate: '2023-02-01',
      });
      await addLinkedPolicy(services, { policyId: 'P3', carrierUsdot: 1003, effectiveDate: '2023-02-11' });

      const scores = await services.fraudEngine.riskScores();

      expect(scores.map((s) => [s.carrierUsdot, s.riskScore])).toEqual([
        [1001, 100],
        [1003, 15],
      ]);
      expect(await services.fraudEngine.riskScores(1)).toHaveLength(1);
    });
  });

  describe('detectShopping', () => {
    it('flags three providers inside twelve months', async () => {
      await addCarrier(services, 3003, 'Hopper Logistics');
      await addLinkedPolicy(services, { policyId: 'S1', carrierUsdot: 3003, providerName: 'Acme', effectiveDate: '2023-08-01' });
      await addLinkedPolicy(services, { policyId: 'S2', carrierUsdot: 3003, providerName: 'Beta', effectiveDate: '2023-12-01' });
      await addLinkedPolicy(services, { policyId: 'S3', carrierUsdot: 3003, providerName: 'Gamma', effectiveDate: '2024-04-01' });

      const patterns = await services.fraudEngine.detectShopping(12, 3);

      expect(patterns).toEqual([
        {
          carrierUsdot: 3003,
          carrierName: 'Hopper Logistics',
          providerCount: 3,
          providers: ['Acme', 'Beta', 'Gamma'],
          policyDates: ['2023-08-01', '2023-12-01', '2024-04-01'],
          violations: 0,
          crashes: 0,
          riskScore: 0.25,
        },
      ]);
    });

    it('ignores policies that started before the window', async () => {
      await addCarrier(services, 3003);
      await addLinkedPolicy(services, { policyId: 'S1', carrierUsdot: 3003, providerName: 'Acme', effectiveDate: '2023-06-14' });
      await addLinkedPolicy(services, { policyId: 'S2', carrierUsdot: 3003, providerName: 'Beta', effectiveDate: '2023-12-01' });
      await addLinkedPolicy(services, { policyId: 'S3', carrierUsdot: 3003, providerName: 'Gamma', effectiveDate: '2024-04-01' });

      expect(await services.fraudEngine.detectShopping(12, 3)).toEqual([]);
    });

    it('counts a provider once however many policies it wrote', async () => {
      await addCarrier(services, 3003);
      await addLinkedPolicy(services, { policyId: 'S1', carrierUsdot: 3003, providerName: 'Acme', effectiveDate: '2023-08-01' });
      await addLinkedPolicy(services, { policyId: 'S2', carrierUsdot: 3003, providerName: 'Acme', effectiveDate: '2023-12-01' });
      await addLinkedPolicy(services, { policyId: 'S3', carrierUsdot: 3003, providerName: 'Beta', effectiveDate: '2024-04-01' });

      expect(await services.fraudEngine.detectShopping(12, 3)).toEqual([]);
      expect((await services.fraudEngine.detectShopping(12, 2))[0].providerCount).toBe(2);
    });

    it('validates its parameters', async () => {
      await expect(services.fraudEngine.detectShopping(0, 3)).rejects.toBeInstanceOf(ValidationError);
      await expect(services.fraudEngine.detectShopping(12, 0)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('detectUnderinsured', () => {
    it('reports the shortfall for active policies below the minimum', async () => {
      await addCarrier(services, 5005, 'Thin Cover Co');
      await addLinkedPolicy(services, {
        policyId: 'U1',
        carrierUsdot: 5005,
        providerName: 'Acme',
        coverageAmount: 500_000,
        effectiveDate: '2024-01-01',
      });

      const results = await services.fraudEngine.detectUnderinsured('GENERAL_FREIGHT');

      expect(results).toEqual([
        {
          carrierUsdot: 5005,
          carrierName: 'Thin Cover Co',
          policyId: 'U1',
          provider: 'Acme',
          coverageAmount: 500_000,
          requiredMinimum: 750_000,
          shortage: 250_000,
          cargoType: 'GENERAL_FREIGHT',
          violations: 0,
          crashes: 0,
        },
      ]);
    });

    it('skips cancelled, expired and future policies', async () => {
      await addCarrier(services, 5005);
      await addLinkedPolicy(services, {
        policyId: 'U1',
        carrierUsdot: 5005,
        coverageAmount: 100_000,
        effectiveDate: '2023-01-01',
        cancellationDate: '2023-03-01',
      });
      await addLinkedPolicy(services, {
        policyId: 'U2',
        carrierUsdot: 5005,
        coverageAmount: 100_000,
        effectiveDate: '2023-01-01',
        expirationDate: '2024-01-01',
      });
      await addLinkedPolicy(services, {
        policyId: 'U3',
        carrierUsdot: 5005,
        coverageAmount: 100_000,
        effectiveDate: '2024-07-01',
      });

      expect(await services.fraudEngine.detectUnderinsured()).toEqual([]);
    });

    it('uses the stricter hazmat minimum', async () => {
      await addCarrier(services, 5005);
      await addLinkedPolicy(services, { policyId: 'U1', carrierUsdot: 5005, coverageAmount: 1_000_000 });

      const [result] = await services.fraudEngine.detectUnderinsured('HAZMAT');
      expect(result.shortage).toBe(4_000_000);
    });
  });

  describe('detectChameleonPatterns', () => {
    it('pairs carriers sharing an officer and a provider', async () => {
      await addCarrier(services, 4001, 'Old Road Transport');
      await addCarrier(services, 4002, 'New Road Transport');
      await services.directory.attachOfficer(4001, 'John Smith');
      await services.directory.attachOfficer(4002, 'John Smith');
      await addLinkedPolicy(services, { policyId: 'C1', carrierUsdot: 4001, providerName: 'Progressive' });
      await addLinkedPolicy(services, { policyId: 'C2', carrierUsdot: 4002, providerName: 'Progressive' });

      const patterns = await services.fraudEngine.detectChameleonPatterns();

      expect(patterns).toEqual([
        {
          carrier1Usdot: 4001,
          carrier1Name: 'Old Road Transport',
          carrier2Usdot: 4002,
          carrier2Name: 'New Road Transport',
          sharedOfficers: ['John Smith'],
          sharedProviders: ['Progressive'],
          sharedProviderCount: 1,
          carrier1Violations: 0,
          carrier2Violations: 0,
        },
      ]);
    });

    it('reports each pair once with the lower USDOT first', async () => {
      await addCarrier(services, 4002);
      await addCarrier(services, 4001);
      await services.directory.attachOfficer(4002, 'Jane Doe');
      await services.directory.attachOfficer(4001, 'jane  doe');
      await addLinkedPolicy(services, { policyId: 'C2', carrierUsdot: 4002, providerName: 'Progressive' });
      await addLinkedPolicy(services, { policyId: 'C1', carrierUsdot: 4001, providerName: 'Progressive' });

      const patterns = await services.fraudEngine.detectChameleonPatterns();

      expect(patterns.map((p) => [p.carrier1Usdot, p.carrier2Usdot])).toEqual([[4001, 4002]]);
      expect(patterns[0].sharedOfficers).toEqual(['Jane Doe']);
    });

    it('requires a shared provider as well as an officer', async () => {
      await addCarrier(services, 4001);
      await addCarrier(services, 4002);
      await services.directory.attachOfficer(4001, 'John Smith');
      await services.directory.attachOfficer(4002, 'John Smith');
      await addLinkedPolicy(services, { policyId: 'C1', carrierUsdot: 4001, providerName: 'Progressive' });
      await addLinkedPolicy(services, { policyId: 'C2', carrierUsdot: 4002, providerName: 'Acme' });

      expect(await services.fraudEngine.detectChameleonPatterns()).toEqual([]);
    });
  });

  describe('statisticsSummary', () => {
    it('aggregates the individual detectors', async () => {
      await addCarrier(services, 1001);
      await addLinkedPolicy(services, { policyId: 'P1', effectiveDate: '2023-01-01', cancellationDate: '2023-06-01' });
      await addLinkedPolicy(services, { policyId: 'P2', effectiveDate: '2023-07-15' });

      const summary = await services.fraudEngine.statisticsSummary();

      expect(summary).toMatchObject({
        carriersWithGaps: 1,
        averageGapDays: 44,
        insuranceShoppingCarriers: 0,
        underinsuredCarriers: 0,
        highRiskCarriers: 0,
      });
      expect(summary.topRisks.map((risk) => [risk.carrierUsdot, risk.riskScore])).toEqual([[1001, 25]]);
    });
  });
});
