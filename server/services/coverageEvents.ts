/**
 * Derives insurance events from a carrier's policies in effective-date order.
 */

import {
  InsuranceEventType,
  type InsertInsuranceEvent,
  type InsurancePolicy,
} from '@shared/schema';
import {
  COMPLIANCE_GAP_DAYS,
  type ComplianceReport,
  type ComplianceViolation,
} from '@shared/insuranceTypes';
import { detectFraudPatterns } from './eventSignals';
import { checkFederalCompliance } from './fraudPatternEngine';
import { buildEventId } from './policyEventStore';
import { daysBetween, gapDays, isActiveOn, type PolicyDates } from './temporalCoverage';

type DerivedEvent = InsertInsuranceEvent & { eventId: string };

type ComplianceFacts = PolicyDates & Pick<InsurancePolicy, 'policyId' | 'coverageAmount' | 'filingStatus'>;

function withSignals(event: DerivedEvent): DerivedEvent {
  const fraudIndicators = detectFraudPatterns({
    eventType: event.eventType,
    daysWithoutCoverage: event.daysWithoutCoverage ?? 0,
    coverageChange: event.coverageChange ?? null,
    reason: event.reason ?? null,
  });
  return { ...event, fraudIndicators, isSuspicious: fraudIndicators.length > 0 };
}

function transitionType(previous: InsurancePolicy, current: InsurancePolicy): InsuranceEventType {
  if (previous.providerName !== current.providerName) {
    return InsuranceEventType.PROVIDER_CHANGE;
  }
  if (current.coverageAmount > previous.coverageAmount) {
    return InsuranceEventType.COVERAGE_INCREASE;
  }
  if (current.coverageAmount < previous.coverageAmount) {
    return InsuranceEventType.COVERAGE_DECREASE;
  }
  return InsuranceEventType.RENEWAL;
}

/**
 * One event per policy start (NEW_POLICY for the first, a transition for
 * the rest), a CANCELLATION per cancelled policy, and a LAPSE where an
 * expired policy was not followed immediately by another.
 */
export function deriveEvents(policies: InsurancePolicy[], carrierUsdot: number, today: string): DerivedEvent[] {
  const events: DerivedEvent[] = [];

  policies.forEach((policy, index) => {
    if (index === 0) {
      events.push(withSignals({
        eventId: buildEventId(carrierUsdot, policy.effectiveDate, InsuranceEventType.NEW_POLICY),
        carrierUsdot,
        eventType: InsuranceEventType.NEW_POLICY,
        eventDate: policy.effectiveDate,
        newProvider: policy.providerName,
        newCoverage: policy.coverageAmount,
        newPolicyId: policy.policyId,
        daysWithoutCoverage: 0,
        reason: 'First policy on file',
      }));
    } else {
      const previous = policies[index - 1];
      const gap = gapDays(previous, policy) ?? 0;
      const eventType = transitionType(previous, policy);
      const violation = gap > COMPLIANCE_GAP_DAYS;

      events.push(withSignals({
        eventId: buildEventId(carrierUsdot, policy.effectiveDate, eventType),
        carrierUsdot,
        eventType,
        eventDate: policy.effectiveDate,
        previousProvider: previous.providerName,
        newProvider: policy.providerName,
        previousCoverage: previous.coverageAmount,
        newCoverage: policy.coverageAmount,
        coverageChange: policy.coverageAmount - previous.coverageAmount,
        daysWithoutCoverage: gap,
        previousPolicyId: previous.policyId,
        newPolicyId: policy.policyId,
        complianceViolation: violation,
        violationReason: violation ? `Coverage gap exceeded ${COMPLIANCE_GAP_DAYS} days` : null,
      }));
    }

    if (policy.cancellationDate) {
      events.push(withSignals({
        eventId: buildEventId(carrierUsdot, policy.cancellationDate, InsuranceEventType.CANCELLATION),
        carrierUsdot,
        eventType: InsuranceEventType.CANCELLATION,
        eventDate: policy.cancellationDate,
        previousProvider: policy.providerName,
        previousCoverage: policy.coverageAmount,
        previousPolicyId: policy.policyId,
        daysWithoutCoverage: 0,
        reason: policy.cancellationReason,
      }));
      return;
    }

    if (policy.expirationDate) {
      const next = policies[index + 1];
      const uncovered = next
        ? Math.max(0, daysBetween(policy.expirationDate, next.effectiveDate))
        : policy.expirationDate < today
          ? daysBetween(policy.expirationDate, today)
          : 0;

      if (uncovered > 0) {
        events.push(withSignals({
          eventId: buildEventId(carrierUsdot, policy.expirationDate, InsuranceEventType.LAPSE),
          carrierUsdot,
          eventType: InsuranceEventType.LAPSE,
          eventDate: policy.expirationDate,
          previousProvider: policy.providerName,
          previousCoverage: policy.coverageAmount,
          previousPolicyId: policy.policyId,
          newPolicyId: next?.policyId ?? null,
          daysWithoutCoverage: uncovered,
          reason: next ? 'Expired before the next policy took effect' : 'Expired without renewal',
        }));
      }
    }
  });

  return events;
}

/** Compliance summary of a carrier's policies on `today`. */
export function summarizeCompliance(
  carrierUsdot: number,
  policies: ComplianceFacts[],
  today: string,
  cargoType?: string,
): ComplianceReport {
  const violations: ComplianceViolation[] = [];
  const active = policies.filter((policy) => isActiveOn(policy, today));

  if (policies.length === 0) {
    violations.push({ type: 'NO_INSURANCE', severity: 'CRITICAL', description: 'No insurance records found' });
  } else if (active.length === 0) {
    violations.push({ type: 'NO_ACTIVE_INSURANCE', severity: 'HIGH', description: 'No active insurance policy' });
  }

  for (const policy of active) {
    const check = checkFederalCompliance(policy, cargoType);
    if (!check.compliant) {
      violations.push({
        type: 'UNDERINSURED',
        severity: 'HIGH',
        description: check.reason ?? 'Coverage below federal minimum',
        policyId: policy.policyId,
      });
    }
  }

  return {
    carrierUsdot,
    isCompliant: violations.length === 0,
    totalPolicies: policies.length,
    activePolicies: active.length,
    violations,
  };
}
