/**
 * Event Signals Tests
 *
 * Unit tests for per-event fraud tagging and scoring.
 * Run with: npx vitest run server/services/__tests__/eventSignals.test.ts
 */

import { describe, it, expect } from 'vitest';
import { FraudIndicator, InsuranceEventType } from '../../../shared/schema';
import { detectFraudPatterns, eventRiskScore, providerStabilityScore } from '../eventSignals';

const facts = (overrides: Partial<Parameters<typeof detectFraudPatterns>[0]> = {}) => ({
  eventType: InsuranceEventType.RENEWAL,
  daysWithoutCoverage: 0,
  coverageChange: null,
  reason: null,
  ...overrides,
});

describe('detectFraudPatterns', () => {
  it('returns no tags for a clean renewal', () => {
    expect(detectFraudPatterns(facts())).toEqual([]);
  });

  it('tags gaps longer than 30 days only', () => {
    expect(detectFraudPatterns(facts({ daysWithoutCoverage: 30 }))).toEqual([]);
    expect(detectFraudPatterns(facts({ daysWithoutCoverage: 31 }))).toEqual([FraudIndicator.EXTENDED_COVERAGE_GAP]);
  });

  it('collects every matching tag in a fixed order', () => {
    expect(detectFraudPatterns(facts({
      eventType: InsuranceEventType.PROVIDER_CHANGE,
      daysWithoutCoverage: 44,
      coverageChange: -250_000,
    }))).toEqual([
      FraudIndicator.EXTENDED_COVERAGE_GAP,
      FraudIndicator.PROVIDER_SHOPPING,
      FraudIndicator.SIGNIFICANT_COVERAGE_REDUCTION,
    ]);
  });

  it('treats a reduction of exactly 100k as not significant', () => {
    expect(detectFraudPatterns(facts({ coverageChange: -100_000 }))).toEqual([]);
  });

  it('flags non-payment cancellations regardless of case', () => {
    expect(detectFraudPatterns(facts({ eventType: InsuranceEventType.CANCELLATION, reason: 'non_payment' }))).toEqual([
      FraudIndicator.FINANCIAL_DISTRESS,
    ]);
    expect(detectFraudPatterns(facts({ eventType: InsuranceEventType.CANCELLATION, reason: 'Sold' }))).toEqual([]);
  });

  it('tags every lapse', () => {
    expect(detectFraudPatterns(facts({ eventType: InsuranceEventType.LAPSE }))).toEqual([FraudIndicator.COVERAGE_LAPSE]);
  });
});

describe('eventRiskScore', () => {
  const event = {
    eventType: InsuranceEventType.NEW_POLICY,
    daysWithoutCoverage: 0,
    complianceViolation: false,
    isSuspicious: false,
  };

  it('starts from the event type weight', () => {
    expect(eventRiskScore(event)).toBe(0.1);
    expect(eventRiskScore({ ...event, eventType: InsuranceEventType.RENEWAL })).toBe(0);
  });

  it('adds gap, violation and suspicion bonuses', () => {
    expect(eventRiskScore({ ...event, eventType: InsuranceEventType.RENEWAL, daysWithoutCoverage: 10 })).toBe(0.1);
    expect(eventRiskScore({ ...event, eventType: InsuranceEventType.PROVIDER_CHANGE, isSuspicious: true })).toBe(0.3);
  });

  it('caps the score at 1', () => {
    expect(eventRiskScore({
      eventType: InsuranceEventType.LAPSE,
      daysWithoutCoverage: 45,
      complianceViolation: true,
      isSuspicious: true,
    })).toBe(1);
  });
});

describe('providerStabilityScore', () => {
  const change = (eventDate: string) => ({ eventType: InsuranceEventType.PROVIDER_CHANGE, eventDate });

  it('is 1.0 without provider changes', () => {
    expect(providerStabilityScore([{ eventType: InsuranceEventType.RENEWAL, eventDate: '2024-01-01' }], '2024-06-15')).toBe(1.0);
  });

  it('counts changes from the trailing 365 days only', () => {
    const events = [change('2024-01-01'), change('2023-06-16'), change('2023-06-15'), change('2024-07-01')];
    expect(providerStabilityScore(events, '2024-06-15')).toBe(0.5);
  });

  it('bottoms out at 0.2', () => {
    const events = [change('2024-01-01'), change('2024-02-01'), change('2024-03-01'), change('2024-04-01')];
    expect(providerStabilityScore(events, '2024-06-15')).toBe(0.2);
  });
});
