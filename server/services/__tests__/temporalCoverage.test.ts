/**
 * Temporal Coverage Tests
 *
 * Unit tests for the calendar-date interval model.
 * Run with: npx vitest run server/services/__tests__/temporalCoverage.test.ts
 */

import { describe, it, expect } from 'vitest';
import { CoverageStatus, FilingStatus } from '../../../shared/schema';
import { OPEN_ENDED_DURATION } from '../../../shared/insuranceTypes';
import { ValidationError } from '../../lib/errors';
import {
  assertOrderedDates,
  coverageAccounting,
  coverageStatus,
  daysBetween,
  durationDays,
  endDate,
  gapDays,
  isActiveOn,
  lifecycleState,
  overlapDays,
  parseCalendarDate,
  periodsOverlap,
  periodStatus,
  shiftDate,
} from '../temporalCoverage';

const TODAY = '2024-06-15';

function dates(effectiveDate: string, expirationDate: string | null = null, cancellationDate: string | null = null) {
  return { effectiveDate, expirationDate, cancellationDate };
}

// ============================================
// DATE HELPERS
// ============================================

describe('date helpers', () => {
  it('counts whole calendar days between dates', () => {
    expect(daysBetween('2023-06-01', '2023-07-15')).toBe(44);
    expect(daysBetween('2023-07-15', '2023-06-01')).toBe(-44);
    expect(daysBetween('2024-02-28', '2024-03-01')).toBe(2);
  });

  it('shifts across month boundaries', () => {
    expect(shiftDate('2023-12-31', 1)).toBe('2024-01-01');
    expect(shiftDate('2024-03-01', -1)).toBe('2024-02-29');
  });

  it('rejects malformed dates', () => {
    expect(() => parseCalendarDate('not-a-date')).toThrow(ValidationError);
    expect(() => parseCalendarDate('2023-13-01', 'effectiveDate')).toThrow('effectiveDate must be a valid YYYY-MM-DD date');
    expect(() => parseCalendarDate('2023-1-5')).toThrow(ValidationError);
  });
});

// ============================================
// POLICY INTERVALS
// ============================================

describe('endDate', () => {
  it('prefers the cancellation date over expiration', () => {
    expect(endDate(dates('2023-01-01', '2024-01-01', '2023-06-01'))).toBe('2023-06-01');
  });

  it('falls back to expiration, then open-ended', () => {
    expect(endDate(dates('2023-01-01', '2024-01-01'))).toBe('2024-01-01');
    expect(endDate(dates('2023-01-01'))).toBeNull();
  });
});

describe('coverageStatus', () => {
  it('reports CANCELLED whenever a cancellation date is set', () => {
    expect(coverageStatus(dates('2020-01-01', '2021-01-01', '2020-06-01'), TODAY)).toBe(CoverageStatus.CANCELLED);
    expect(coverageStatus(dates('2024-01-01', '2025-01-01', '2025-06-01'), TODAY)).toBe(CoverageStatus.CANCELLED);
  });

  it('reports EXPIRED only once the expiration date has passed', () => {
    expect(coverageStatus(dates('2023-01-01', '2024-06-14'), TODAY)).toBe(CoverageStatus.EXPIRED);
    expect(coverageStatus(dates('2023-01-01', TODAY), TODAY)).toBe(CoverageStatus.ACTIVE);
  });

  it('treats open-ended policies as ACTIVE', () => {
    expect(coverageStatus(dates('2023-01-01'), TODAY)).toBe(CoverageStatus.ACTIVE);
  });

  it('assigns exactly one status to every combination', () => {
    const statuses = new Set(Object.values(CoverageStatus));
    for (const expiration of [null, '2023-01-01', '2030-01-01']) {
      for (const cancellation of [null, '2022-06-01']) {
        expect(statuses.has(coverageStatus(dates('2022-01-01', expiration, cancellation), TODAY))).toBe(true);
      }
    }
  });
});

describe('periodStatus', () => {
  it('uses the cancelled flag before the end date', () => {
    expect(periodStatus(null, true, TODAY)).toBe(CoverageStatus.CANCELLED);
    expect(periodStatus('2020-01-01', false, TODAY)).toBe(CoverageStatus.EXPIRED);
    expect(periodStatus(null, false, TODAY)).toBe(CoverageStatus.ACTIVE);
  });
});

describe('gapDays', () => {
  it('measures the days between one end and the next start', () => {
    expect(gapDays(dates('2023-01-01', null, '2023-06-01'), dates('2023-07-15'))).toBe(44);
  });

  it('returns 0 for back-to-back and overlapping policies', () => {
    expect(gapDays(dates('2023-01-01', '2023-06-01'), dates('2023-06-01'))).toBe(0);
    expect(gapDays(dates('2023-01-01', '2023-12-31'), dates('2023-06-01'))).toBe(0);
  });

  it('returns null when the earlier policy never ends', () => {
    expect(gapDays(dates('2023-01-01'), dates('2023-07-15'))).toBeNull();
  });
});

describe('durationDays', () => {
  it('counts days to the end date', () => {
    expect(durationDays('2023-01-01', '2024-01-01')).toBe(365);
  });

  it('marks open-ended periods', () => {
    expect(durationDays('2023-01-01', null)).toBe(OPEN_ENDED_DURATION);
  });
});

describe('isActiveOn', () => {
  const policy = { ...dates('2023-01-01', '2023-12-31'), filingStatus: FilingStatus.ACTIVE };

  it('includes both the effective and the end date', () => {
    expect(isActiveOn(policy, '2023-01-01')).toBe(true);
    expect(isActiveOn(policy, '2023-12-31')).toBe(true);
    expect(isActiveOn(policy, '2024-01-01')).toBe(false);
    expect(isActiveOn(policy, '2022-12-31')).toBe(false);
  });

  it('requires an ACTIVE filing', () => {
    expect(isActiveOn({ ...policy, filingStatus: FilingStatus.PENDING }, '2023-06-01')).toBe(false);
  });
});

describe('lifecycleState', () => {
  it('walks pending, active, expired, lapsed and cancelled', () => {
    expect(lifecycleState(dates('2025-01-01'), TODAY, false)).toBe('PENDING');
    expect(lifecycleState(dates('2024-01-01', '2025-01-01'), TODAY, false)).toBe('ACTIVE');
    expect(lifecycleState(dates('2023-01-01', '2024-01-01'), TODAY, true)).toBe('EXPIRED');
    expect(lifecycleState(dates('2023-01-01', '2024-01-01'), TODAY, false)).toBe('LAPSED');
    expect(lifecycleState(dates('2023-01-01', '2024-01-01', '2023-03-01'), TODAY, true)).toBe('CANCELLED');
  });
});

describe('assertOrderedDates', () => {
  it('accepts equal and open end dates', () => {
    expect(() => assertOrderedDates('2023-01-01', '2023-01-01', 'expirationDate')).not.toThrow();
    expect(() => assertOrderedDates('2023-01-01', null, 'expirationDate')).not.toThrow();
  });

  it('rejects an end date before the start', () => {
    expect(() => assertOrderedDates('2023-06-01', '2023-01-01', 'expirationDate')).toThrow(
      'expirationDate must not precede the effective date',
    );
  });
});

// ============================================
// OVERLAPS
// ============================================

describe('periodsOverlap', () => {
  it('treats periods starting the same day as overlapping', () => {
    expect(periodsOverlap(
      { fromDate: '2023-01-01', toDate: '2023-01-02' },
      { fromDate: '2023-01-01', toDate: null },
    )).toBe(true);
  });

  it('does not count a shared boundary day', () => {
    expect(periodsOverlap(
      { fromDate: '2023-01-01', toDate: '2023-06-01' },
      { fromDate: '2023-06-01', toDate: null },
    )).toBe(false);
  });

  it('lets an open first period overlap anything after it', () => {
    expect(periodsOverlap({ fromDate: '2020-01-01', toDate: null }, { fromDate: '2024-01-01', toDate: null })).toBe(true);
  });
});

describe('overlapDays', () => {
  it('stops at the earlier end', () => {
    expect(overlapDays(
      { fromDate: '2023-01-01', toDate: '2023-12-31' },
      { fromDate: '2023-06-01', toDate: null },
      TODAY,
    )).toBe(213);
  });

  it('runs open periods to today', () => {
    expect(overlapDays(
      { fromDate: '2024-01-01', toDate: null },
      { fromDate: '2024-06-01', toDate: null },
      TODAY,
    )).toBe(14);
  });

  it('reports 0 days when the later period starts after today', () => {
    expect(overlapDays(
      { fromDate: '2024-01-01', toDate: null },
      { fromDate: '2024-07-01', toDate: null },
      TODAY,
    )).toBe(0);
  });

  it('returns null for disjoint periods', () => {
    expect(overlapDays(
      { fromDate: '2023-01-01', toDate: '2023-02-01' },
      { fromDate: '2023-03-01', toDate: null },
      TODAY,
    )).toBeNull();
  });
});

// ============================================
// COVERAGE ACCOUNTING
// ============================================

describe('coverageAccounting', () => {
  it('splits the window into covered and uncovered days', () => {
    const result = coverageAccounting(
      [
        { fromDate: '2023-01-01', toDate: '2023-06-01' },
        { fromDate: '2023-07-15', toDate: null },
      ],
      '2023-01-01',
      '2023-12-31',
    );

    expect(result.windowDays).toBe(365);
    expect(result.coveredDays).toBe(321);
    expect(result.uncoveredDays).toBe(44);
    expect(result.mergedPeriods).toEqual([
      { fromDate: '2023-01-01', toDate: '2023-06-01' },
      { fromDate: '2023-07-15', toDate: '2024-01-01' },
    ]);
  });

  it('counts overlapping periods once', () => {
    const result = coverageAccounting(
      [
        { fromDate: '2023-03-01', toDate: '2023-09-01' },
        { fromDate: '2023-01-01', toDate: '2023-07-01' },
      ],
      '2023-01-01',
      '2023-12-31',
    );

    expect(result.mergedPeriods).toEqual([{ fromDate: '2023-01-01', toDate: '2023-09-01' }]);
    expect(result.coveredDays).toBe(243);
    expect(result.uncoveredDays).toBe(122);
  });

  it('clamps periods that start before the window', () => {
    const result = coverageAccounting([{ fromDate: '2020-01-01', toDate: '2023-01-11' }], '2023-01-01', '2023-01-31');
    expect(result.coveredDays).toBe(10);
    expect(result.uncoveredDays).toBe(21);
  });

  it('conserves window days for any mix of periods', () => {
    const periods = [
      { fromDate: '2022-11-01', toDate: '2023-02-15' },
      { fromDate: '2023-02-01', toDate: '2023-04-01' },
      { fromDate: '2023-05-10', toDate: '2023-05-11' },
      { fromDate: '2023-11-30', toDate: null },
    ];
    const result = coverageAccounting(periods, '2023-01-01', '2023-12-31');
    expect(result.coveredDays + result.uncoveredDays).toBe(result.windowDays);
    expect(result.coveredDays).toBeLessThanOrEqual(result.windowDays);
  });

  it('counts a single-day window', () => {
    const result = coverageAccounting([{ fromDate: '2023-05-01', toDate: null }], '2023-05-01', '2023-05-01');
    expect(result.windowDays).toBe(1);
    expect(result.coveredDays).toBe(1);
  });

  it('rejects an inverted window', () => {
    expect(() => coverageAccounting([], '2023-12-31', '2023-01-01')).toThrow(ValidationError);
  });
});
