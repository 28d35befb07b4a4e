/**
 * Relationship Fabric
 *
 * Maintains the edges of the coverage graph:
 * - coverage periods (carrier → policy) with derived status and duration
 * - provider links (policy → provider, carrier → provider)
 * - successions (later policy → the policy it replaced)
 *
 * Every link is an upsert. Missing endpoints make a link return false
 * instead of throwing; enrichment is best-effort.
 */

import type { InsurancePolicy, InsuranceProvider } from '@shared/schema';
import type { IGraphStorage } from '../storage/types';
import { ValidationError } from '../lib/errors';
import { loggers } from '../lib/logger';
import {
  assertOrderedDates,
  durationDays,
  endDate,
  gapDays,
  periodStatus,
  todayIso,
} from './temporalCoverage';

const log = loggers.coverage.child({ component: 'relationship-fabric' });

const MAX_PROVIDER_ID_ATTEMPTS = 20;

export function providerIdFor(name: string, attempt = 0): string {
  const base = `PROV-${name.replace(/\s+/g, '').toUpperCase().slice(0, 10)}`;
  return attempt === 0 ? base : `${base}-${attempt + 1}`;
}

export interface SuccessionChainResult {
  linked: number;
  gaps: Array<{ earlier: InsurancePolicy; later: InsurancePolicy; gapDays: number }>;
}

export class RelationshipFabric {
  constructor(
    private readonly storage: IGraphStorage,
    private readonly today: () => string = todayIso,
  ) {}

  /** Providers are singletons by name. */
  async getOrCreateProvider(name: string): Promise<InsuranceProvider> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError('Provider name is required', { field: 'providerName' });
    }

    for (let attempt = 0; attempt < MAX_PROVIDER_ID_ATTEMPTS; attempt++) {
      const existing = await this.storage.getProviderByName(trimmed);
      if (existing) {
        return existing;
      }
      const created = await this.storage.insertProviderIfAbsent({
        providerId: providerIdFor(trimmed, attempt),
        name: trimmed,
      });
      if (created) {
        log.debug({ providerId: created.providerId, name: trimmed }, 'Insurance provider created');
        return created;
      }
    }

    throw new Error(`Could not allocate a provider id for "${trimmed}"`);
  }

  /**
   * Creates the carrier → policy coverage period, or refreshes its end date,
   * status and duration when it already exists.
   */
  async linkCoveragePeriod(
    policyId: string,
    carrierUsdot: number,
    fromDate: string,
    toDate: string | null,
  ): Promise<boolean> {
    assertOrderedDates(fromDate, toDate, 'toDate');

    const [policy, carrierExists] = await Promise.all([
      this.storage.getPolicy(policyId),
      this.storage.carrierExists(carrierUsdot),
    ]);
    if (!policy || !carrierExists) {
      log.debug({ policyId, carrierUsdot, policyFound: !!policy, carrierExists }, 'Coverage period not linked');
      return false;
    }
    if (policy.carrierUsdot !== carrierUsdot) {
      log.warn({ policyId, carrierUsdot, owner: policy.carrierUsdot }, 'Coverage period not linked: policy belongs to another carrier');
      return false;
    }

    await this.storage.upsertCoveragePeriod({
      carrierUsdot,
      policyId,
      fromDate,
      toDate,
      status: periodStatus(toDate, policy.cancellationDate !== null, this.today()),
      durationDays: durationDays(fromDate, toDate),
    });
    return true;
  }

  /** Links a policy to its provider, and the policy's carrier to the same provider. */
  async linkProvider(policyId: string, providerName: string): Promise<boolean> {
    const policy = await this.storage.getPolicy(policyId);
    if (!policy) {
      return false;
    }

    const provider = await this.getOrCreateProvider(providerName);
    await this.storage.linkPolicyProvider(policyId, provider.providerId);

    if (await this.storage.carrierExists(policy.carrierUsdot)) {
      await this.storage.linkCarrierProvider(policy.carrierUsdot, provider.providerId);
    }
    return true;
  }

  async linkSuccession(earlierPolicyId: string, laterPolicyId: string, gap: number): Promise<boolean> {
    if (!Number.isInteger(gap) || gap < 0) {
      throw new ValidationError('gapDays must be a non-negative integer', { gapDays: gap });
    }
    if (earlierPolicyId === laterPolicyId) {
      return false;
    }

    const [earlier, later] = await Promise.all([
      this.storage.getPolicy(earlierPolicyId),
      this.storage.getPolicy(laterPolicyId),
    ]);
    if (!earlier || !later) {
      return false;
    }

    await this.storage.insertSuccessionIfAbsent({
      policyId: later.policyId,
      precedingPolicyId: earlier.policyId,
      carrierUsdot: later.carrierUsdot,
      gapDays: gap,
    });
    return true;
  }

  /**
   * Links each policy to the one before it. `policies` must already be in
   * effective-date order.
   */
  async linkSuccessionChain(policies: InsurancePolicy[]): Promise<SuccessionChainResult> {
    const result: SuccessionChainResult = { linked: 0, gaps: [] };

    for (let i = 1; i < policies.length; i++) {
      const earlier = policies[i - 1];
      const later = policies[i];
      const gap = gapDays(earlier, later);

      if (await this.linkSuccession(earlier.policyId, later.policyId, gap ?? 0)) {
        result.linked++;
      }
      if (gap !== null && gap > 0) {
        result.gaps.push({ earlier, later, gapDays: gap });
      }
    }
    return result;
  }

  /** Recomputes `total_carriers_insured` from the carrier → provider links. */
  async recomputeProviderCarrierCount(providerName: string): Promise<InsuranceProvider | undefined> {
    const provider = await this.storage.getProviderByName(providerName);
    if (!provider) {
      return undefined;
    }
    const insured = await this.storage.listCarriersForProvider(provider.providerId);
    return this.storage.setProviderCarrierCount(provider.providerId, insured.length);
  }

  /**
   * Rebuilds coverage periods and succession links for one carrier from its
   * stored policies.
   */
  async refreshCarrier(carrierUsdot: number): Promise<{ periodsRefreshed: number; successionsLinked: number }> {
    const policies = await this.storage.listPoliciesByCarrier(carrierUsdot);
    let periodsRefreshed = 0;

    for (const policy of policies) {
      if (await this.linkCoveragePeriod(policy.policyId, carrierUsdot, policy.effectiveDate, endDate(policy))) {
        periodsRefreshed++;
      }
    }
    const chain = await this.linkSuccessionChain(policies);

    return { periodsRefreshed, successionsLinked: chain.linked };
  }
}
