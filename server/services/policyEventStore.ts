/**
 * Policy & Event Store
 *
 * Validates and persists insurance policies and events. Records are
 * immutable once written; derived state lives on the coverage-period edges.
 */

import {
  CoverageStatus,
  DEFAULT_DATA_SOURCE,
  FilingStatus,
  type InsertInsuranceEvent,
  type InsertInsurancePolicy,
  type InsuranceEvent,
  type InsurancePolicy,
} from '@shared/schema';
import { DEFAULT_FEDERAL_MINIMUM, type TimelineEntry } from '@shared/insuranceTypes';
import type { IGraphStorage } from '../storage/types';
import { DuplicateKeyError, NotFoundError, ValidationError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { detectFraudPatterns } from './eventSignals';
import {
  assertOrderedDates,
  coverageStatus,
  lifecycleState,
  parseCalendarDate,
  todayIso,
} from './temporalCoverage';

const log = createLogger({ module: 'policy-event-store' });

export interface PolicyListOptions {
  /** Only policies whose derived status is ACTIVE. */
  activeOnly?: boolean;
  /** Keep policies whose expiration date has passed (default true). */
  includeExpired?: boolean;
  today?: string;
}

export type CreateEventInput = Omit<InsertInsuranceEvent, 'eventId' | 'createdAt'> & { eventId?: string };

export function buildEventId(carrierUsdot: number, eventDate: string, eventType: string): string {
  return `EVT-${carrierUsdot}-${eventDate.replace(/-/g, '')}-${eventType}`;
}

function assertNonNegative(value: number | null | undefined, field: string): void {
  if (value === null || value === undefined) {
    return;
  }
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative number`, { field, value });
  }
}

export function validatePolicy(policy: InsertInsurancePolicy): void {
  if (!policy.policyId?.trim()) {
    throw new ValidationError('policyId is required', { field: 'policyId' });
  }
  if (!policy.providerName?.trim()) {
    throw new ValidationError('providerName is required', { field: 'providerName' });
  }
  if (!Number.isInteger(policy.carrierUsdot) || policy.carrierUsdot <= 0) {
    throw new ValidationError('carrierUsdot must be a positive integer', { field: 'carrierUsdot' });
  }
  if (!policy.effectiveDate) {
    throw new ValidationError('effectiveDate is required', { field: 'effectiveDate' });
  }
  assertNonNegative(policy.coverageAmount, 'coverageAmount');
  assertNonNegative(policy.cargoCoverage, 'cargoCoverage');
  assertNonNegative(policy.requiredMinimum, 'requiredMinimum');
  assertOrderedDates(policy.effectiveDate, policy.expirationDate, 'expirationDate');
  assertOrderedDates(policy.effectiveDate, policy.cancellationDate, 'cancellationDate');
}

export class PolicyEventStore {
  constructor(private readonly storage: IGraphStorage) {}

  async createPolicy(input: InsertInsurancePolicy): Promise<InsurancePolicy> {
    validatePolicy(input);

    const policy: InsertInsurancePolicy = {
      ...input,
      filingStatus: input.filingStatus ?? FilingStatus.ACTIVE,
      requiredMinimum: input.requiredMinimum ?? DEFAULT_FEDERAL_MINIMUM,
      meetsFederalMinimum:
        input.meetsFederalMinimum ?? input.coverageAmount >= (input.requiredMinimum ?? DEFAULT_FEDERAL_MINIMUM),
      dataSource: input.dataSource ?? DEFAULT_DATA_SOURCE,
    };

    const created = await this.storage.insertPolicy(policy);
    if (!created) {
      throw new DuplicateKeyError('Policy', input.policyId);
    }

    log.debug({ policyId: created.policyId, carrierUsdot: created.carrierUsdot }, 'Policy created');
    return created;
  }

  async getPolicy(policyId: string): Promise<InsurancePolicy | undefined> {
    return this.storage.getPolicy(policyId);
  }

  async listPoliciesForCarrier(carrierUsdot: number, options: PolicyListOptions = {}): Promise<InsurancePolicy[]> {
    const today = options.today ?? todayIso();
    const includeExpired = options.includeExpired ?? true;
    const policies = await this.storage.listPoliciesByCarrier(carrierUsdot);

    return policies.filter((policy) => {
      if (options.activeOnly && coverageStatus(policy, today) !== CoverageStatus.ACTIVE) {
        return false;
      }
      if (!includeExpired && policy.expirationDate !== null && policy.expirationDate < today) {
        return false;
      }
      return true;
    });
  }

  async createEvent(input: CreateEventInput): Promise<InsuranceEvent> {
    if (!(await this.storage.carrierExists(input.carrierUsdot))) {
      throw new NotFoundError('Carrier', input.carrierUsdot);
    }
    parseCalendarDate(input.eventDate, 'eventDate');
    assertNonNegative(input.daysWithoutCoverage, 'daysWithoutCoverage');

    const coverageChange =
      input.coverageChange ??
      (input.previousCoverage != null && input.newCoverage != null ? input.newCoverage - input.previousCoverage : null);
    const daysWithoutCoverage = input.daysWithoutCoverage ?? 0;

    const detected = detectFraudPatterns({
      eventType: input.eventType,
      daysWithoutCoverage,
      coverageChange,
      reason: input.reason ?? null,
    });
    const fraudIndicators = Array.from(new Set([...(input.fraudIndicators ?? []), ...detected]));

    const event: InsertInsuranceEvent = {
      ...input,
      eventId: input.eventId ?? buildEventId(input.carrierUsdot, input.eventDate, input.eventType),
      coverageChange,
      daysWithoutCoverage,
      fraudIndicators,
      isSuspicious: (input.isSuspicious ?? false) || fraudIndicators.length > 0,
    };

    const created = await this.storage.insertEvent(event);
    if (!created) {
      throw new DuplicateKeyError('Event', event.eventId);
    }
    return created;
  }

  async getEvent(eventId: string): Promise<InsuranceEvent | undefined> {
    return this.storage.getEvent(eventId);
  }

  async listEventsForCarrier(carrierUsdot: number): Promise<InsuranceEvent[]> {
    return this.storage.listEventsByCarrier(carrierUsdot);
  }

  /**
   * Policies and events merged by date. On the same date a policy sorts
   * before the events it triggered.
   */
  async getCarrierTimeline(carrierUsdot: number, today: string = todayIso()): Promise<TimelineEntry[]> {
    const [policies, events] = await Promise.all([
      this.storage.listPoliciesByCarrier(carrierUsdot),
      this.storage.listEventsByCarrier(carrierUsdot),
    ]);

    const entries: TimelineEntry[] = [
      ...policies.map((policy, index): TimelineEntry => ({
        kind: 'policy',
        date: policy.effectiveDate,
        lifecycle: lifecycleState(policy, today, index < policies.length - 1),
        policy,
      })),
      ...events.map((event): TimelineEntry => ({ kind: 'event', date: event.eventDate, event })),
    ];

    return entries.sort((a, b) => {
      if (a.date !== b.date) {
        return a.date < b.date ? -1 : 1;
      }
      if (a.kind === b.kind) {
        return 0;
      }
      return a.kind === 'policy' ? -1 : 1;
    });
  }
}
