/**
 * Shared test fixtures for the coverage service tests.
 */

import type { InsertInsurancePolicy, InsurancePolicy } from '../../../shared/schema';
import type { EnrichmentConfig, InsuranceApiConfig } from '../../config/appConfig';
import { MemoryGraphStorage } from '../../storage/memoryStorage';
import { createServices, type AppServices } from '../container';
import type { InsuranceDataSource } from '../insuranceDataClient';
import type { RawInsuranceRecord } from '../insuranceRecordMapper';
import { endDate } from '../temporalCoverage';

export const TEST_TODAY = '2024-06-15';

export const testApiConfig: InsuranceApiConfig = {
  baseUrl: 'https://insurance.test/api',
  token: 'test-token',
  maxRetries: 2,
  backoffMs: 100,
  minIntervalMs: 0,
  pageSize: 2,
};

export const testEnrichmentConfig: EnrichmentConfig = {
  batchSize: 2,
  itemDelayMs: 10,
  batchDelayMs: 50,
  maxErrorDetails: 5,
};

/** Insurance source that serves canned records per carrier. */
export class FakeInsuranceSource implements InsuranceDataSource {
  readonly calls: number[] = [];
  private readonly failures = new Map<number, Error>();

  constructor(private readonly records: Map<number, RawInsuranceRecord[]> = new Map()) {}

  setRecords(usdot: number, records: RawInsuranceRecord[]): void {
    this.records.set(usdot, records);
  }

  failWith(usdot: number, error: Error): void {
    this.failures.set(usdot, error);
  }

  async fetchInsuranceHistory(carrierUsdot: number): Promise<RawInsuranceRecord[]> {
    this.calls.push(carrierUsdot);
    const failure = this.failures.get(carrierUsdot);
    if (failure) {
      throw failure;
    }
    return this.records.get(carrierUsdot) ?? [];
  }
}

export interface TestServices extends AppServices {
  source: FakeInsuranceSource;
  sleeps: number[];
}

export function buildTestServices(today: string = TEST_TODAY): TestServices {
  const source = new FakeInsuranceSource();
  const sleeps: number[] = [];
  const services = createServices(
    new MemoryGraphStorage(),
    { insuranceApi: testApiConfig, enrichment: testEnrichmentConfig },
    {
      source,
      today: () => today,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    },
  );
  return { ...services, source, sleeps };
}

export function policyInput(
  overrides: Partial<InsertInsurancePolicy> & Pick<InsertInsurancePolicy, 'policyId'>,
): InsertInsurancePolicy {
  return {
    carrierUsdot: 1001,
    providerName: 'Acme Insurance',
    policyType: 'BMC-91X',
    coverageAmount: 1_000_000,
    effectiveDate: '2023-01-01',
    ...overrides,
  };
}

export async function addCarrier(services: AppServices, usdot: number, carrierName = `Carrier ${usdot}`): Promise<void> {
  await services.directory.createCarrier({ usdot, carrierName });
}

/** Stores a policy and links its coverage period and provider. */
export async function addLinkedPolicy(
  services: AppServices,
  overrides: Partial<InsertInsurancePolicy> & Pick<InsertInsurancePolicy, 'policyId'>,
): Promise<InsurancePolicy> {
  const policy = await services.policies.createPolicy(policyInput(overrides));
  await services.fabric.linkCoveragePeriod(policy.policyId, policy.carrierUsdot, policy.effectiveDate, endDate(policy));
  await services.fabric.linkProvider(policy.policyId, policy.providerName);
  return policy;
}

export function rawRecord(overrides: Partial<RawInsuranceRecord> = {}): RawInsuranceRecord {
  return {
    id: 'rec-1',
    name_company: 'Acme Insurance',
    max_cov_amount: '01000',
    ins_form_code: '91X',
    effective_date: '2023-01-01 00:00:00',
    expiration_date: null,
    cancel_effective_date: null,
    ...overrides,
  };
}
