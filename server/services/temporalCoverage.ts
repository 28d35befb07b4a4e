/**
 * Temporal Coverage Model
 *
 * Pure date arithmetic over insurance policies and coverage periods.
 * All dates are calendar dates ('YYYY-MM-DD'); a policy stops covering on
 * its end date, so a policy ending 2023-06-01 followed by one starting
 * 2023-06-01 leaves no gap.
 */

import { addDays, differenceInCalendarDays, format, isValid, parseISO } from 'date-fns';
import { CoverageStatus, FilingStatus, type InsurancePolicy } from '@shared/schema';
import {
  OPEN_ENDED_DURATION,
  type CoverageAccounting,
  type DateRange,
  type PolicyLifecycleState,
} from '@shared/insuranceTypes';
import { ValidationError } from '../lib/errors';

export type PolicyDates = Pick<InsurancePolicy, 'effectiveDate' | 'expirationDate' | 'cancellationDate'>;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

// ============================================
// DATE HELPERS
// ============================================

export function parseCalendarDate(value: string, field = 'date'): Date {
  const parsed = parseISO(value);
  if (!ISO_DATE.test(value) || !isValid(parsed)) {
    throw new ValidationError(`${field} must be a valid YYYY-MM-DD date`, { field, value });
  }
  return parsed;
}

export function formatCalendarDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function todayIso(): string {
  return formatCalendarDate(new Date());
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseCalendarDate(to), parseCalendarDate(from));
}

export function shiftDate(value: string, days: number): string {
  return formatCalendarDate(addDays(parseCalendarDate(value), days));
}

function minDate(a: string, b: string): string {
  return a <= b ? a : b;
}

function maxDate(a: string, b: string): string {
  return a >= b ? a : b;
}

// ============================================
// POLICY INTERVALS
// ============================================

/** Cancellation wins over expiration; null means open-ended. */
export function endDate(policy: PolicyDates): string | null {
  return policy.cancellationDate ?? policy.expirationDate ?? null;
}

export function coverageStatus(policy: PolicyDates, today: string): CoverageStatus {
  if (policy.cancellationDate) {
    return CoverageStatus.CANCELLED;
  }
  return periodStatus(policy.expirationDate, false, today);
}

/** Status of a coverage period from its end date. */
export function periodStatus(toDate: string | null, cancelled: boolean, today: string): CoverageStatus {
  if (cancelled) {
    return CoverageStatus.CANCELLED;
  }
  if (toDate !== null && toDate < today) {
    return CoverageStatus.EXPIRED;
  }
  return CoverageStatus.ACTIVE;
}

/**
 * Days between the end of `earlier` and the start of `later`, clamped at 0.
 * Null when `earlier` is still open.
 */
export function gapDays(earlier: PolicyDates, later: PolicyDates): number | null {
  const end = endDate(earlier);
  if (end === null) {
    return null;
  }
  return Math.max(0, daysBetween(end, later.effectiveDate));
}

export function durationDays(fromDate: string, toDate: string | null): number {
  if (toDate === null) {
    return OPEN_ENDED_DURATION;
  }
  return daysBetween(fromDate, toDate);
}

export function isActiveOn(
  policy: PolicyDates & Pick<InsurancePolicy, 'filingStatus'>,
  date: string,
): boolean {
  if (policy.filingStatus !== FilingStatus.ACTIVE || policy.effectiveDate > date) {
    return false;
  }
  const end = endDate(policy);
  return end === null || date <= end;
}

export function lifecycleState(policy: PolicyDates, today: string, hasSuccessor: boolean): PolicyLifecycleState {
  if (policy.cancellationDate) {
    return 'CANCELLED';
  }
  if (policy.effectiveDate > today) {
    return 'PENDING';
  }
  if (policy.expirationDate && policy.expirationDate < today) {
    return hasSuccessor ? 'EXPIRED' : 'LAPSED';
  }
  return 'ACTIVE';
}

/** Rejects intervals whose end precedes their start. */
export function assertOrderedDates(fromDate: string, toDate: string | null | undefined, field: string): void {
  parseCalendarDate(fromDate, 'effectiveDate');
  if (toDate === null || toDate === undefined) {
    return;
  }
  parseCalendarDate(toDate, field);
  if (toDate < fromDate) {
    throw new ValidationError(`${field} must not precede the effective date`, { field, fromDate, toDate });
  }
}

// ============================================
// OVERLAPS
// ============================================

/**
 * `first` must be the period that starts no later than `second`.
 * Periods starting on the same day overlap.
 */
export function periodsOverlap(first: DateRange, second: DateRange): boolean {
  if (first.fromDate > second.fromDate) {
    return false;
  }
  return first.toDate === null || first.toDate > second.fromDate;
}

/**
 * Overlapping days of two ordered periods; open ends run to `today`. Null
 * when they do not overlap. A later period that starts after today overlaps
 * an open one but has no elapsed shared days yet, so it reports 0.
 */
export function overlapDays(first: DateRange, second: DateRange, today: string): number | null {
  if (!periodsOverlap(first, second)) {
    return null;
  }
  const sharedEnd = minDate(first.toDate ?? today, second.toDate ?? today);
  return Math.max(0, daysBetween(second.fromDate, sharedEnd));
}

// ============================================
// COVERAGE ACCOUNTING
// ============================================

/**
 * Covered and uncovered days inside an inclusive window. Periods are clamped
 * to the window and merged before counting, so overlapping policies are
 * counted once.
 */
export function coverageAccounting(periods: DateRange[], windowStart: string, windowEnd: string): CoverageAccounting {
  parseCalendarDate(windowStart, 'windowStart');
  parseCalendarDate(windowEnd, 'windowEnd');
  if (windowEnd < windowStart) {
    throw new ValidationError('windowEnd must not precede windowStart', { windowStart, windowEnd });
  }

  const windowDays = daysBetween(windowStart, windowEnd) + 1;
  const windowLimit = shiftDate(windowEnd, 1);

  const clamped = periods
    .map((period) => ({
      fromDate: maxDate(period.fromDate, windowStart),
      toDate: minDate(period.toDate ?? windowLimit, windowLimit),
    }))
    .filter((period) => period.toDate > period.fromDate)
    .sort((a, b) => (a.fromDate === b.fromDate ? 0 : a.fromDate < b.fromDate ? -1 : 1));

  const merged: Array<{ fromDate: string; toDate: string }> = [];
  for (const period of clamped) {
    const last = merged[merged.length - 1];
    if (last && period.fromDate <= last.toDate) {
      last.toDate = maxDate(last.toDate, period.toDate);
    } else {
      merged.push({ ...period });
    }
  }

  const coveredDays = merged.reduce((sum, period) => sum + daysBetween(period.fromDate, period.toDate), 0);

  return {
    windowStart,
    windowEnd,
    windowDays,
    coveredDays,
    uncoveredDays: windowDays - coveredDays,
    mergedPeriods: merged,
  };
}
