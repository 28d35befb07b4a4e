import {
  DEFAULT_DATA_SOURCE,
  FilingStatus,
  type Carrier,
  type CarrierPatch,
  type CoveragePeriod,
  type EnrichmentJob,
  type InsertCarrier,
  type InsertInsuranceEvent,
  type InsertInsurancePolicy,
  type InsertInsuranceProvider,
  type InsertPerson,
  type InsuranceEvent,
  type InsurancePolicy,
  type InsuranceProvider,
  type Person,
  type PolicySuccession,
} from "@shared/schema";
import type {
  CoveragePeriodUpsert,
  CoverageRecord,
  IGraphStorage,
  OfficerLink,
  PageOptions,
  SuccessionLink,
} from "./types";

function page<T>(rows: T[], options: PageOptions = {}): T[] {
  const offset = options.offset ?? 0;
  return options.limit === undefined ? rows.slice(offset) : rows.slice(offset, offset + options.limit);
}

function byKey<T>(key: (row: T) => string | number) {
  return (a: T, b: T) => {
    const ka = key(a);
    const kb = key(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  };
}

const pairKey = (a: string | number, b: string | number) => `${a}\u0000${b}`;

/**
 * In-process implementation of the graph storage contract.
 * Used by the unit tests and by `GRAPH_STORE=memory`.
 */
export class MemoryGraphStorage implements IGraphStorage {
  private readonly carriers = new Map<number, Carrier>();
  private readonly persons = new Map<string, Person>();
  private readonly officers = new Map<string, { carrierUsdot: number; personId: string }>();
  private readonly providers = new Map<string, InsuranceProvider>();
  private readonly policies = new Map<string, InsurancePolicy>();
  private readonly events = new Map<string, InsuranceEvent>();
  private readonly coverage = new Map<string, CoveragePeriod>();
  private readonly policyProviders = new Map<string, { policyId: string; providerId: string }>();
  private readonly carrierProviders = new Map<string, { carrierUsdot: number; providerId: string }>();
  private readonly successions = new Map<string, PolicySuccession>();
  private readonly jobs = new Map<string, EnrichmentJob>();
  private coverageSequence = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  // ============================================
  // CARRIERS
  // ============================================

  async createCarrier(carrier: InsertCarrier): Promise<Carrier | null> {
    if (this.carriers.has(carrier.usdot)) {
      return null;
    }
    const row: Carrier = {
      usdot: carrier.usdot,
      carrierName: carrier.carrierName,
      primaryOfficer: carrier.primaryOfficer ?? null,
      insuranceProvider: carrier.insuranceProvider ?? null,
      insuranceAmount: carrier.insuranceAmount ?? null,
      trucks: carrier.trucks ?? 0,
      inspections: carrier.inspections ?? 0,
      violations: carrier.violations ?? 0,
      oos: carrier.oos ?? 0,
      crashes: carrier.crashes ?? 0,
      driverOosRate: carrier.driverOosRate ?? 0,
      vehicleOosRate: carrier.vehicleOosRate ?? 0,
      mcs150Drivers: carrier.mcs150Drivers ?? null,
      mcs150Miles: carrier.mcs150Miles ?? null,
      mcs150Date: carrier.mcs150Date ?? null,
      dataSource: carrier.dataSource ?? "CSV_IMPORT",
      createdAt: this.clock(),
      updatedAt: null,
    };
    this.carriers.set(row.usdot, row);
    return { ...row };
  }

  async getCarrier(usdot: number): Promise<Carrier | undefined> {
    const row = this.carriers.get(usdot);
    return row ? { ...row } : undefined;
  }

  async carrierExists(usdot: number): Promise<boolean> {
    return this.carriers.has(usdot);
  }

  async listCarriers(options?: PageOptions): Promise<Carrier[]> {
    const rows = Array.from(this.carriers.values()).sort(byKey((c) => c.usdot));
    return page(rows, options).map((row) => ({ ...row }));
  }

  async updateCarrier(usdot: number, patch: CarrierPatch): Promise<Carrier | undefined> {
    const existing = this.carriers.get(usdot);
    if (!existing) {
      return undefined;
    }
    const updated: Carrier = { ...existing, updatedAt: this.clock() };
    for (const [key, value] of Object.entries(patch)) {
      if (value !== undefined && key in updated) {
        Object.assign(updated, { [key]: value });
      }
    }
    this.carriers.set(usdot, updated);
    return { ...updated };
  }

  async deleteCarrier(usdot: number): Promise<boolean> {
    if (!this.carriers.delete(usdot)) {
      return false;
    }
    for (const [key, edge] of this.coverage) {
      if (edge.carrierUsdot === usdot) this.coverage.delete(key);
    }
    for (const [key, edge] of this.carrierProviders) {
      if (edge.carrierUsdot === usdot) this.carrierProviders.delete(key);
    }
    for (const [key, edge] of this.officers) {
      if (edge.carrierUsdot === usdot) this.officers.delete(key);
    }
    return true;
  }

  // ============================================
  // PERSONS / OFFICERS
  // ============================================

  async upsertPerson(person: InsertPerson): Promise<Person> {
    const existing = this.persons.get(person.personId);
    if (existing) {
      return { ...existing };
    }
    const row: Person = {
      personId: person.personId,
      fullName: person.fullName,
      firstName: person.firstName ?? null,
      lastName: person.lastName ?? null,
      createdAt: this.clock(),
    };
    this.persons.set(row.personId, row);
    return { ...row };
  }

  async linkOfficer(usdot: number, personId: string): Promise<void> {
    this.officers.set(pairKey(usdot, personId), { carrierUsdot: usdot, personId });
  }

  async listOfficers(usdot: number): Promise<Person[]> {
    return Array.from(this.officers.values())
      .filter((edge) => edge.carrierUsdot === usdot)
      .map((edge) => this.persons.get(edge.personId))
      .filter((person): person is Person => person !== undefined)
      .sort(byKey((p) => p.fullName))
      .map((person) => ({ ...person }));
  }

  async listCarriersForOfficer(personId: string): Promise<Carrier[]> {
    return Array.from(this.officers.values())
      .filter((edge) => edge.personId === personId)
      .map((edge) => this.carriers.get(edge.carrierUsdot))
      .filter((carrier): carrier is Carrier => carrier !== undefined)
      .sort(byKey((c) => c.usdot))
      .map((carrier) => ({ ...carrier }));
  }

  async listOfficerLinks(): Promise<OfficerLink[]> {
    const links: OfficerLink[] = [];
    for (const edge of this.officers.values()) {
      const person = this.persons.get(edge.personId);
      if (person && this.carriers.has(edge.carrierUsdot)) {
        links.push({ carrierUsdot: edge.carrierUsdot, personId: edge.personId, fullName: person.fullName });
      }
    }
    return links.sort(byKey((l) => pairKey(l.personId, l.carrierUsdot)));
  }

  // ============================================
  // PROVIDERS
  // ============================================

  async getProviderByName(name: string): Promise<InsuranceProvider | undefined> {
    const row = Array.from(this.providers.values()).find((p) => p.name === name);
    return row ? { ...row } : undefined;
  }

  async getProviderById(providerId: string): Promise<InsuranceProvider | undefined> {
    const row = this.providers.get(providerId);
    return row ? { ...row } : undefined;
  }

  async insertProviderIfAbsent(provider: InsertInsuranceProvider): Promise<InsuranceProvider | null> {
    if (this.providers.has(provider.providerId)) {
      return null;
    }
    if (Array.from(this.providers.values()).some((p) => p.name === provider.name)) {
      return null;
    }
    const row: InsuranceProvider = {
      providerId: provider.providerId,
      name: provider.name,
      contactPhone: provider.contactPhone ?? null,
      contactEmail: provider.contactEmail ?? null,
      website: provider.website ?? null,
      totalCarriersInsured: 0,
      dataSource: provider.dataSource ?? DEFAULT_DATA_SOURCE,
      createdAt: this.clock(),
      updatedAt: null,
    };
    this.providers.set(row.providerId, row);
    return { ...row };
  }

  async listProviders(options?: PageOptions): Promise<InsuranceProvider[]> {
    const rows = Array.from(this.providers.values()).sort(byKey((p) => p.name));
    return page(rows, options).map((row) => ({ ...row }));
  }

  async listCarriersForProvider(providerId: string): Promise<Carrier[]> {
    return Array.from(this.carrierProviders.values())
      .filter((edge) => edge.providerId === providerId)
      .map((edge) => this.carriers.get(edge.carrierUsdot))
      .filter((carrier): carrier is Carrier => carrier !== undefined)
      .sort(byKey((c) => c.usdot))
      .map((carrier) => ({ ...carrier }));
  }

  async setProviderCarrierCount(providerId: string, count: number): Promise<InsuranceProvider | undefined> {
    const existing = this.providers.get(providerId);
    if (!existing) {
      return undefined;
    }
    const updated = { ...existing, totalCarriersInsured: count, updatedAt: this.clock() };
    this.providers.set(providerId, updated);
    return { ...updated };
  }

  // ============================================
  // POLICIES
  // ============================================

  async insertPolicy(policy: InsertInsurancePolicy): Promise<InsurancePolicy | null> {
    if (this.policies.has(policy.policyId)) {
      return null;
    }
    const row: InsurancePolicy = {
      policyId: policy.policyId,
      carrierUsdot: policy.carrierUsdot,
      providerName: policy.providerName,
      providerId: policy.providerId ?? null,
      policyType: policy.policyType,
      policyNumber: policy.policyNumber ?? null,
      coverageAmount: policy.coverageAmount,
      cargoCoverage: policy.cargoCoverage ?? null,
      effectiveDate: policy.effectiveDate,
      expirationDate: policy.expirationDate ?? null,
      cancellationDate: policy.cancellationDate ?? null,
      cancellationReason: policy.cancellationReason ?? null,
      filingStatus: policy.filingStatus ?? FilingStatus.ACTIVE,
      isCompliant: policy.isCompliant ?? true,
      meetsFederalMinimum: policy.meetsFederalMinimum ?? true,
      requiredMinimum: policy.requiredMinimum ?? null,
      dataSource: policy.dataSource ?? DEFAULT_DATA_SOURCE,
      sourceRecordId: policy.sourceRecordId ?? null,
      createdAt: policy.createdAt ?? this.clock(),
      updatedAt: policy.updatedAt ?? null,
    };
    this.policies.set(row.policyId, row);
    return { ...row };
  }

  async getPolicy(policyId: string): Promise<InsurancePolicy | undefined> {
    const row = this.policies.get(policyId);
    return row ? { ...row } : undefined;
  }

  async listPoliciesByCarrier(usdot: number): Promise<InsurancePolicy[]> {
    return Array.from(this.policies.values())
      .filter((p) => p.carrierUsdot === usdot)
      .sort(byKey((p) => pairKey(p.effectiveDate, p.policyId)))
      .map((row) => ({ ...row }));
  }

  // ============================================
  // EVENTS
  // ============================================

  async insertEvent(event: InsertInsuranceEvent): Promise<InsuranceEvent | null> {
    if (this.events.has(event.eventId)) {
      return null;
    }
    const row: InsuranceEvent = {
      eventId: event.eventId,
      carrierUsdot: event.carrierUsdot,
      eventType: event.eventType,
      eventDate: event.eventDate,
      previousProvider: event.previousProvider ?? null,
      newProvider: event.newProvider ?? null,
      previousCoverage: event.previousCoverage ?? null,
      newCoverage: event.newCoverage ?? null,
      coverageChange: event.coverageChange ?? null,
      daysWithoutCoverage: event.daysWithoutCoverage ?? 0,
      previousPolicyId: event.previousPolicyId ?? null,
      newPolicyId: event.newPolicyId ?? null,
      complianceViolation: event.complianceViolation ?? false,
      violationReason: event.violationReason ?? null,
      isSuspicious: event.isSuspicious ?? false,
      fraudIndicators: [...(event.fraudIndicators ?? [])],
      reason: event.reason ?? null,
      notes: event.notes ?? null,
      dataSource: event.dataSource ?? DEFAULT_DATA_SOURCE,
      createdAt: event.createdAt ?? this.clock(),
    };
    this.events.set(row.eventId, row);
    return { ...row, fraudIndicators: [...row.fraudIndicators] };
  }

  async getEvent(eventId: string): Promise<InsuranceEvent | undefined> {
    const row = this.events.get(eventId);
    return row ? { ...row, fraudIndicators: [...row.fraudIndicators] } : undefined;
  }

  async listEventsByCarrier(usdot: number): Promise<InsuranceEvent[]> {
    return Array.from(this.events.values())
      .filter((e) => e.carrierUsdot === usdot)
      .sort(byKey((e) => pairKey(e.eventDate, e.eventId)))
      .map((row) => ({ ...row, fraudIndicators: [...row.fraudIndicators] }));
  }

  // ============================================
  // EDGES
  // ============================================

  async upsertCoveragePeriod(edge: CoveragePeriodUpsert): Promise<CoveragePeriod> {
    const key = pairKey(edge.carrierUsdot, edge.policyId);
    const existing = this.coverage.get(key);
    const now = this.clock();
    const row: CoveragePeriod = existing
      ? { ...existing, toDate: edge.toDate, status: edge.status, durationDays: edge.durationDays, updatedAt: now }
      : {
          id: ++this.coverageSequence,
          carrierUsdot: edge.carrierUsdot,
          policyId: edge.policyId,
          fromDate: edge.fromDate,
          toDate: edge.toDate,
          status: edge.status,
          durationDays: edge.durationDays,
          createdAt: now,
          updatedAt: null,
        };
    this.coverage.set(key, row);
    return { ...row };
  }

  async listCoverageRecords(usdot?: number): Promise<CoverageRecord[]> {
    const records: CoverageRecord[] = [];
    for (const period of this.coverage.values()) {
      if (usdot !== undefined && period.carrierUsdot !== usdot) continue;
      const policy = this.policies.get(period.policyId);
      if (policy) {
        records.push({ period: { ...period }, policy: { ...policy } });
      }
    }
    return records.sort((a, b) => {
      if (a.period.carrierUsdot !== b.period.carrierUsdot) {
        return a.period.carrierUsdot - b.period.carrierUsdot;
      }
      if (a.period.fromDate !== b.period.fromDate) {
        return a.period.fromDate < b.period.fromDate ? -1 : 1;
      }
      return a.period.id - b.period.id;
    });
  }

  async linkPolicyProvider(policyId: string, providerId: string): Promise<void> {
    this.policyProviders.set(pairKey(policyId, providerId), { policyId, providerId });
  }

  async listProvidersForPolicy(policyId: string): Promise<InsuranceProvider[]> {
    return Array.from(this.policyProviders.values())
      .filter((edge) => edge.policyId === policyId)
      .map((edge) => this.providers.get(edge.providerId))
      .filter((provider): provider is InsuranceProvider => provider !== undefined)
      .map((provider) => ({ ...provider }));
  }

  async linkCarrierProvider(usdot: number, providerId: string): Promise<void> {
    this.carrierProviders.set(pairKey(usdot, providerId), { carrierUsdot: usdot, providerId });
  }

  async insertSuccessionIfAbsent(link: SuccessionLink): Promise<void> {
    const key = pairKey(link.policyId, link.precedingPolicyId);
    if (!this.successions.has(key)) {
      this.successions.set(key, { ...link, createdAt: this.clock() });
    }
  }

  async listSuccessions(usdot?: number): Promise<PolicySuccession[]> {
    return Array.from(this.successions.values())
      .filter((s) => usdot === undefined || s.carrierUsdot === usdot)
      .sort(byKey((s) => pairKey(s.carrierUsdot, s.policyId)))
      .map((row) => ({ ...row }));
  }

  // ============================================
  // JOBS
  // ============================================

  async saveJob(job: EnrichmentJob): Promise<void> {
    this.jobs.set(job.jobId, structuredClone(job));
  }

  async getJob(jobId: string): Promise<EnrichmentJob | undefined> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : undefined;
  }

  async listJobs(limit: number): Promise<EnrichmentJob[]> {
    return Array.from(this.jobs.values())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }
}
