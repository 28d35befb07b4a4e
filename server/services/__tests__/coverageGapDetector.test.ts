/**
 * Coverage Gap Detector Tests
 *
 * Unit tests for gap, overlap and coverage-accounting queries over the
 * in-memory graph.
 * Run with: npx vitest run server/services/__tests__/coverageGapDetector.test.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '../../lib/errors';
import { addCarrier, addLinkedPolicy, buildTestServices, type TestServices } from './fixtures';

describe('CoverageGapDetector', () => {
  let services: TestServices;

  beforeEach(async () => {
    services = buildTestServices();
    await addCarrier(services, 1001, 'Gap Freight LLC');
  });

  // ============================================
  // GAPS
  // ============================================

  describe('detectGaps', () => {
    it('reports the gap between a cancelled policy and its replacement', async () => {
      await addLinkedPolicy(services, {
        policyId: 'P1',
        providerName: 'Acme',
        effectiveDate: '2023-01-01',
        cancellationDate: '2023-06-01',
      });
      await addLinkedPolicy(services, { policyId: 'P2', providerName: 'Beta', effectiveDate: '2023-07-15' });

      const gaps = await services.gapDetector.detectGaps(1001, 30);

      expect(gaps).toEqual([
        {
          carrierUsdot: 1001,
          fromPolicy: 'P1',
          toPolicy: 'P2',
          gapStart: '2023-06-01',
          gapEnd: '2023-07-15',
          gapDays: 44,
          fromProvider: 'Acme',
          toProvider: 'Beta',
        },
      ]);
    });

    it('filters gaps shorter than the minimum', async () => {
      await addLinkedPolicy(services, { policyId: 'P1', effectiveDate: '2023-01-01', cancellationDate: '2023-06-01' });
      await addLinkedPolicy(services, { policyId: 'P2', effectiveDate: '2023-07-15' });

      expect(await services.gapDetector.detectGaps(1001, 45)).toEqual([]);
      expect(await services.gapDetector.detectGaps(1001, 44)).toHaveLength(1);
    });

    it('never reports back-to-back policies, even with a zero minimum', async () => {
      await addLinkedPolicy(services, { policyId: 'P1', effectiveDate: '2023-01-01', expirationDate: '2023-06-01' });
      await addLinkedPolicy(services, { policyId: 'P2', effectiveDate: '2023-06-01' });

      expect(await services.gapDetector.detectGaps(1001, 0)).toEqual([]);
    });

    it('reports a single missing day', async () => {
      await addLinkedPolicy(services, { policyId: 'P1', effectiveDate: '2023-01-01', expirationDate: '2023-06-01' });
      await addLinkedPolicy(services, { policyId: 'P2', effectiveDate: '2023-06-02' });

      const gaps = await services.gapDetector.detectGaps(1001, 1);
      expect(gaps.map((gap) => gap.gapDays)).toEqual([1]);
    });

    it('skips pairs whose earlier period is open-ended', async () => {
      await addLinkedPolicy(services, { policyId: 'P1', effectiveDate: '2023-01-01' });
      await addLinkedPolicy(services, { policyId: 'P2', effectiveDate: '2023-09-01' });

      expect(await services.gapDetector.detectGaps(1001, 1)).toEqual([]);
    });

    it('orders gaps longest first', async () => {
      await addLinkedPolicy(services, { policyId: 'P1', effectiveDate: '2022-01-01', expirationDate: '2022-03-01' });
      await addLinkedPolicy(services, { policyId: 'P2', effectiveDate: '2022-03-11', expirationDate: '2022-06-01' });
      await addLinkedPolicy(services, { policyId: 'P3', effectiveDate: '2022-08-01' });

      const gaps = await services.gapDetector.detectGaps(1001, 1);
      expect(gaps.map((gap) => [gap.toPolicy, gap.gapDays])).toEqual([
        ['P3', 61],
        ['P2', 10],
      ]);
    });

    it('rejects a negative minimum', async () => {
      await expect(services.gapDetector.detectGaps(1001, -1)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('detectAllGaps', () => {
    it('adds carrier names across carriers', async () => {
      await addCarrier(services, 2002, 'Second Haul Inc');
      await addLinkedPolicy(services, { policyId: 'A1', effectiveDate: '2023-01-01', expirationDate: '2023-02-01' });
      await addLinkedPolicy(services, { policyId: 'A2', effectiveDate: '2023-02-11' });
      await addLinkedPolicy(services, {
        policyId: 'B1',
        carrierUsdot: 2002,
        effectiveDate: '2023-01-01',
        expirationDate: '2023-02-01',
      });
      await addLinkedPolicy(services, { policyId: 'B2', carrierUsdot: 2002, effectiveDate: '2023-04-01' });

      const gaps = await services.gapDetector.detectAllGaps(1);

      expect(gaps.map((gap) => [gap.carrierUsdot, gap.carrierName, gap.gapDays])).toEqual([
        [2002, 'Second Haul Inc', 59],
        [1001, 'Gap Freight LLC', 10],
      ]);
    });
  });

  // ============================================
  // OVERLAPS
  // ============================================

  describe('detectOverlaps', () => {
    it('reports overlapping policies once per pair', async () => {
      await addLinkedPolicy(services, {
        policyId: 'P1',
        providerName: 'Acme',
        effectiveDate: '2023-01-01',
        expirationDate: '2023-12-31',
      });
      await addLinkedPolicy(services, { policyId: 'P2', providerName: 'Beta', effectiveDate: '2023-06-01' });

      const overlaps = await services.gapDetector.detectOverlaps(1001);

      expect(overlaps).toEqual([
        {
          carrierUsdot: 1001,
          firstPolicy: 'P1',
          secondPolicy: 'P2',
          firstProvider: 'Acme',
          secondProvider: 'Beta',
          firstPeriod: { fromDate: '2023-01-01', toDate: '2023-12-31' },
          secondPeriod: { fromDate: '2023-06-01', toDate: null },
          overlapDays: 213,
        },
      ]);
    });

    it('treats policies starting on the same day as overlapping', async () => {
      await addLinkedPolicy(services, { policyId: 'P1', effectiveDate: '2024-06-01' });
      await addLinkedPolicy(services, { policyId: 'P2', effectiveDate: '2024-06-01', providerName: 'Beta' });

      const overlaps = await services.gapDetector.detectOverlaps(1001);
      expect(overlaps).toHaveLength(1);
      expect(overlaps[0].overlapDays).toBe(14);
    });

    it('ignores policies that only touch', async () => {
      await addLinkedPolicy(services, { policyId: 'P1', effectiveDate: '2023-01-01', expirationDate: '2023-06-01' });
      await addLinkedPolicy(services, { policyId: 'P2', effectiveDate: '2023-06-01' });

      expect(await services.gapDetector.detectOverlaps()).toEqual([]);
    });
  });

  // ============================================
  // ACCOUNTING
  // ============================================

  describe('coverageAccounting', () => {
    it('agrees with the detected gap', async () => {
      await addLinkedPolicy(services, { policyId: 'P1', effectiveDate: '2023-01-01', cancellationDate: '2023-06-01' });
      await addLinkedPolicy(services, { policyId: 'P2', effectiveDate: '2023-07-15' });

      const accounting = await services.gapDetector.coverageAccounting(1001, '2023-01-01', '2023-12-31');
      const [gap] = await services.gapDetector.detectGaps(1001, 1);

      expect(accounting.uncoveredDays).toBe(gap.gapDays);
      expect(accounting.coveredDays + accounting.uncoveredDays).toBe(accounting.windowDays);
    });

    it('counts the whole window for a carrier with no policies', async () => {
      expect(await services.gapDetector.daysWithoutCoverage(1001, '2024-01-01', '2024-01-31')).toBe(31);
    });
  });
});
