import type {
  Carrier,
  CarrierPatch,
  CoveragePeriod,
  CoverageStatus,
  EnrichmentJob,
  InsertCarrier,
  InsertInsuranceEvent,
  InsertInsurancePolicy,
  InsertInsuranceProvider,
  InsertPerson,
  InsuranceEvent,
  InsurancePolicy,
  InsuranceProvider,
  Person,
  PolicySuccession,
} from "@shared/schema";

export interface PageOptions {
  limit?: number;
  offset?: number;
}

/** A coverage-period edge together with the policy it points at. */
export interface CoverageRecord {
  period: CoveragePeriod;
  policy: InsurancePolicy;
}

export interface CoveragePeriodUpsert {
  carrierUsdot: number;
  policyId: string;
  fromDate: string;
  toDate: string | null;
  status: CoverageStatus;
  durationDays: number;
}

export interface SuccessionLink {
  policyId: string;
  precedingPolicyId: string;
  carrierUsdot: number;
  gapDays: number;
}

export interface OfficerLink {
  carrierUsdot: number;
  personId: string;
  fullName: string;
}

/**
 * Persistence contract for the carrier insurance graph.
 *
 * Nodes: carriers, persons, providers, policies, events.
 * Edges: coverage periods (HAD_INSURANCE), policy providers (PROVIDED_BY),
 * successions (PRECEDED_BY), carrier providers (INSURED_BY) and
 * officers (MANAGED_BY). Every edge write is idempotent.
 */
export interface IGraphStorage {
  // Carriers
  createCarrier(carrier: InsertCarrier): Promise<Carrier | null>;
  getCarrier(usdot: number): Promise<Carrier | undefined>;
  carrierExists(usdot: number): Promise<boolean>;
  listCarriers(options?: PageOptions): Promise<Carrier[]>;
  updateCarrier(usdot: number, patch: CarrierPatch): Promise<Carrier | undefined>;
  /** Removes the carrier and all of its edges; policies and events stay as history. */
  deleteCarrier(usdot: number): Promise<boolean>;

  // Persons / officers
  upsertPerson(person: InsertPerson): Promise<Person>;
  linkOfficer(usdot: number, personId: string): Promise<void>;
  listOfficers(usdot: number): Promise<Person[]>;
  listCarriersForOfficer(personId: string): Promise<Carrier[]>;
  listOfficerLinks(): Promise<OfficerLink[]>;

  // Providers
  getProviderByName(name: string): Promise<InsuranceProvider | undefined>;
  getProviderById(providerId: string): Promise<InsuranceProvider | undefined>;
  /** Inserts unless the name or id is taken; returns the stored row either way. */
  insertProviderIfAbsent(provider: InsertInsuranceProvider): Promise<InsuranceProvider | null>;
  listProviders(options?: PageOptions): Promise<InsuranceProvider[]>;
  listCarriersForProvider(providerId: string): Promise<Carrier[]>;
  setProviderCarrierCount(providerId: string, count: number): Promise<InsuranceProvider | undefined>;

  // Policies
  /** Returns null when the policy id already exists. */
  insertPolicy(policy: InsertInsurancePolicy): Promise<InsurancePolicy | null>;
  getPolicy(policyId: string): Promise<InsurancePolicy | undefined>;
  /** Ordered by effective date, then policy id. */
  listPoliciesByCarrier(usdot: number): Promise<InsurancePolicy[]>;

  // Events
  /** Returns null when the event id already exists. */
  insertEvent(event: InsertInsuranceEvent): Promise<InsuranceEvent | null>;
  getEvent(eventId: string): Promise<InsuranceEvent | undefined>;
  /** Ordered by event date, then event id. */
  listEventsByCarrier(usdot: number): Promise<InsuranceEvent[]>;

  // Edges
  upsertCoveragePeriod(edge: CoveragePeriodUpsert): Promise<CoveragePeriod>;
  /** Ordered by carrier, from date, then creation order. All carriers when `usdot` is omitted. */
  listCoverageRecords(usdot?: number): Promise<CoverageRecord[]>;
  linkPolicyProvider(policyId: string, providerId: string): Promise<void>;
  listProvidersForPolicy(policyId: string): Promise<InsuranceProvider[]>;
  linkCarrierProvider(usdot: number, providerId: string): Promise<void>;
  insertSuccessionIfAbsent(link: SuccessionLink): Promise<void>;
  listSuccessions(usdot?: number): Promise<PolicySuccession[]>;

  // Enrichment jobs
  saveJob(job: EnrichmentJob): Promise<void>;
  getJob(jobId: string): Promise<EnrichmentJob | undefined>;
  listJobs(limit: number): Promise<EnrichmentJob[]>;
}
