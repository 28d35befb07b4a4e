/**
 * Coverage Gap & Overlap Detection
 *
 * Reads coverage-period edges and reports where a carrier had no policy
 * on file, where two policies covered the same days, and how many days
 * of a window went uncovered.
 */

import type {
  CarrierCoverageGap,
  CoverageAccounting,
  CoverageGap,
  CoverageOverlap,
} from '@shared/insuranceTypes';
import type { CoverageRecord, IGraphStorage } from '../storage/types';
import { ValidationError } from '../lib/errors';
import { coverageAccounting, daysBetween, overlapDays, todayIso } from './temporalCoverage';

function groupByCarrier(records: CoverageRecord[]): Map<number, CoverageRecord[]> {
  const groups = new Map<number, CoverageRecord[]>();
  for (const record of records) {
    const group = groups.get(record.period.carrierUsdot);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.period.carrierUsdot, [record]);
    }
  }
  return groups;
}

function assertMinGap(minGapDays: number): void {
  if (!Number.isInteger(minGapDays) || minGapDays < 0) {
    throw new ValidationError('minGapDays must be a non-negative integer', { minGapDays });
  }
}

/** Gaps between adjacent periods of one carrier. `records` must be ordered by from date. */
export function gapsBetweenPeriods(records: CoverageRecord[], minGapDays: number): CoverageGap[] {
  const gaps: CoverageGap[] = [];

  for (let i = 1; i < records.length; i++) {
    const earlier = records[i - 1];
    const later = records[i];
    const end = earlier.period.toDate;
    if (end === null) {
      continue;
    }

    const gap = Math.max(0, daysBetween(end, later.period.fromDate));
    if (gap > 0 && gap >= minGapDays) {
      gaps.push({
        carrierUsdot: later.period.carrierUsdot,
        fromPolicy: earlier.policy.policyId,
        toPolicy: later.policy.policyId,
        gapStart: end,
        gapEnd: later.period.fromDate,
        gapDays: gap,
        fromProvider: earlier.policy.providerName,
        toProvider: later.policy.providerName,
      });
    }
  }

  return gaps.sort((a, b) => b.gapDays - a.gapDays);
}

/** Every overlapping pair of one carrier's periods, each pair once. */
export function overlappingPeriods(records: CoverageRecord[], today: string): CoverageOverlap[] {
  const overlaps: CoverageOverlap[] = [];

  for (let i = 0; i < records.length; i++) {
    for (let j = i + 1; j < records.length; j++) {
      const first = records[i];
      const second = records[j];
      const days = overlapDays(first.period, second.period, today);
      if (days === null) {
        continue;
      }
      overlaps.push({
        carrierUsdot: first.period.carrierUsdot,
        firstPolicy: first.policy.policyId,
        secondPolicy: second.policy.policyId,
        firstProvider: first.policy.providerName,
        secondProvider: second.policy.providerName,
        firstPeriod: { fromDate: first.period.fromDate, toDate: first.period.toDate },
        secondPeriod: { fromDate: second.period.fromDate, toDate: second.period.toDate },
        overlapDays: days,
      });
    }
  }

  return overlaps;
}

export class CoverageGapDetector {
  constructor(
    private readonly storage: IGraphStorage,
    private readonly today: () => string = todayIso,
  ) {}

  async detectGaps(carrierUsdot: number, minGapDays = 1): Promise<CoverageGap[]> {
    assertMinGap(minGapDays);
    const records = await this.storage.listCoverageRecords(carrierUsdot);
    return gapsBetweenPeriods(records, minGapDays);
  }

  async detectAllGaps(minGapDays = 1): Promise<CarrierCoverageGap[]> {
    assertMinGap(minGapDays);
    const records = await this.storage.listCoverageRecords();
    const groups = groupByCarrier(records);

    const gaps: CarrierCoverageGap[] = [];
    for (const [carrierUsdot, group] of groups) {
      const carrier = await this.storage.getCarrier(carrierUsdot);
      for (const gap of gapsBetweenPeriods(group, minGapDays)) {
        gaps.push({ ...gap, carrierName: carrier?.carrierName ?? null });
      }
    }
    return gaps.sort((a, b) => b.gapDays - a.gapDays);
  }

  /** Overlaps for one carrier, or for every carrier when `carrierUsdot` is omitted. */
  async detectOverlaps(carrierUsdot?: number): Promise<CoverageOverlap[]> {
    const records = await this.storage.listCoverageRecords(carrierUsdot);
    const today = this.today();

    const overlaps: CoverageOverlap[] = [];
    for (const group of groupByCarrier(records).values()) {
      overlaps.push(...overlappingPeriods(group, today));
    }
    return overlaps;
  }

  async coverageAccounting(carrierUsdot: number, windowStart: string, windowEnd: string): Promise<CoverageAccounting> {
    const records = await this.storage.listCoverageRecords(carrierUsdot);
    return coverageAccounting(
      records.map((record) => ({ fromDate: record.period.fromDate, toDate: record.period.toDate })),
      windowStart,
      windowEnd,
    );
  }

  async daysWithoutCoverage(carrierUsdot: number, windowStart: string, windowEnd: string): Promise<number> {
    const accounting = await this.coverageAccounting(carrierUsdot, windowStart, windowEnd);
    return accounting.uncoveredDays;
  }
}
