/**
 * Event Signals
 *
 * Per-event fraud tagging and scoring. Pure functions; the store and the
 * enrichment orchestrator call them before events are written.
 */

import { FraudIndicator, InsuranceEventType, type InsuranceEvent } from '@shared/schema';
import { COMPLIANCE_GAP_DAYS } from '@shared/insuranceTypes';
import { daysBetween } from './temporalCoverage';

export const SIGNIFICANT_REDUCTION = -100_000;

type EventFacts = Pick<
  InsuranceEvent,
  'eventType' | 'daysWithoutCoverage' | 'coverageChange' | 'reason'
>;

export function detectFraudPatterns(event: EventFacts): FraudIndicator[] {
  const tags: FraudIndicator[] = [];

  if (event.daysWithoutCoverage > COMPLIANCE_GAP_DAYS) {
    tags.push(FraudIndicator.EXTENDED_COVERAGE_GAP);
  }
  if (event.eventType === InsuranceEventType.PROVIDER_CHANGE) {
    tags.push(FraudIndicator.PROVIDER_SHOPPING);
  }
  if (event.coverageChange !== null && event.coverageChange < SIGNIFICANT_REDUCTION) {
    tags.push(FraudIndicator.SIGNIFICANT_COVERAGE_REDUCTION);
  }
  if (event.eventType === InsuranceEventType.CANCELLATION && event.reason?.toUpperCase() === 'NON_PAYMENT') {
    tags.push(FraudIndicator.FINANCIAL_DISTRESS);
  }
  if (event.eventType === InsuranceEventType.LAPSE) {
    tags.push(FraudIndicator.COVERAGE_LAPSE);
  }

  return tags;
}

const EVENT_TYPE_WEIGHTS: Record<InsuranceEventType, number> = {
  [InsuranceEventType.CANCELLATION]: 0.3,
  [InsuranceEventType.LAPSE]: 0.4,
  [InsuranceEventType.PROVIDER_CHANGE]: 0.2,
  [InsuranceEventType.COVERAGE_DECREASE]: 0.2,
  [InsuranceEventType.NEW_POLICY]: 0.1,
  [InsuranceEventType.RENEWAL]: 0,
  [InsuranceEventType.COVERAGE_INCREASE]: 0,
};

/** Risk of a single event in [0, 1]. */
export function eventRiskScore(
  event: Pick<InsuranceEvent, 'eventType' | 'daysWithoutCoverage' | 'complianceViolation' | 'isSuspicious'>,
): number {
  let score = EVENT_TYPE_WEIGHTS[event.eventType] ?? 0.1;

  if (event.daysWithoutCoverage > COMPLIANCE_GAP_DAYS) {
    score += 0.3;
  } else if (event.daysWithoutCoverage > 7) {
    score += 0.1;
  }
  if (event.complianceViolation) {
    score += 0.2;
  }
  if (event.isSuspicious) {
    score += 0.1;
  }

  return Math.min(Math.round(score * 100) / 100, 1);
}

/**
 * Provider stability over the year before `asOf`: 1.0 with no provider
 * changes, falling to 0.2 at three or more.
 */
export function providerStabilityScore(
  previousEvents: Array<Pick<InsuranceEvent, 'eventType' | 'eventDate'>>,
  asOf: string,
): number {
  const changes = previousEvents.filter((event) => {
    if (event.eventType !== InsuranceEventType.PROVIDER_CHANGE) {
      return false;
    }
    const age = daysBetween(event.eventDate, asOf);
    return age >= 0 && age <= 365;
  }).length;

  if (changes === 0) return 1.0;
  if (changes === 1) return 0.8;
  if (changes === 2) return 0.5;
  return 0.2;
}
