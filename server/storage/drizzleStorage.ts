import { asc, desc, eq, sql } from "drizzle-orm";
import {
  carrierOfficers,
  carrierProviders,
  carriers,
  coveragePeriods,
  enrichmentJobs,
  insuranceEvents,
  insurancePolicies,
  insuranceProviders,
  persons,
  policyProviders,
  policySuccessions,
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
import type { Database } from "../db";
import type {
  CoveragePeriodUpsert,
  CoverageRecord,
  IGraphStorage,
  OfficerLink,
  PageOptions,
  SuccessionLink,
} from "./types";

const DEFAULT_PAGE_SIZE = 100;

/**
 * PostgreSQL implementation of the graph storage contract.
 * Edges are rows keyed by their endpoints; conflicts on those keys make
 * every link write idempotent.
 */
export class DrizzleGraphStorage implements IGraphStorage {
  constructor(private readonly db: Database) {}

  // ============================================
  // CARRIERS
  // ============================================

  async createCarrier(carrier: InsertCarrier): Promise<Carrier | null> {
    const [row] = await this.db.insert(carriers).values(carrier).onConflictDoNothing().returning();
    return row ?? null;
  }

  async getCarrier(usdot: number): Promise<Carrier | undefined> {
    const [row] = await this.db.select().from(carriers).where(eq(carriers.usdot, usdot)).limit(1);
    return row;
  }

  async carrierExists(usdot: number): Promise<boolean> {
    const rows = await this.db.select({ usdot: carriers.usdot }).from(carriers).where(eq(carriers.usdot, usdot)).limit(1);
    return rows.length > 0;
  }

  async listCarriers(options: PageOptions = {}): Promise<Carrier[]> {
    return this.db
      .select()
      .from(carriers)
      .orderBy(asc(carriers.usdot))
      .limit(options.limit ?? DEFAULT_PAGE_SIZE)
      .offset(options.offset ?? 0);
  }

  async updateCarrier(usdot: number, patch: CarrierPatch): Promise<Carrier | undefined> {
    const [row] = await this.db
      .update(carriers)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(carriers.usdot, usdot))
      .returning();
    return row;
  }

  async deleteCarrier(usdot: number): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      await tx.delete(coveragePeriods).where(eq(coveragePeriods.carrierUsdot, usdot));
      await tx.delete(carrierProviders).where(eq(carrierProviders.carrierUsdot, usdot));
      await tx.delete(carrierOfficers).where(eq(carrierOfficers.carrierUsdot, usdot));
      const deleted = await tx.delete(carriers).where(eq(carriers.usdot, usdot)).returning({ usdot: carriers.usdot });
      return deleted.length > 0;
    });
  }

  // ============================================
  // PERSONS / OFFICERS
  // ============================================

  async upsertPerson(person: InsertPerson): Promise<Person> {
    await this.db.insert(persons).values(person).onConflictDoNothing();
    const [row] = await this.db.select().from(persons).where(eq(persons.personId, person.personId)).limit(1);
    if (!row) {
      throw new Error(`Person ${person.personId} could not be stored`);
    }
    return row;
  }

  async linkOfficer(usdot: number, personId: string): Promise<void> {
    await this.db.insert(carrierOfficers).values({ carrierUsdot: usdot, personId }).onConflictDoNothing();
  }

  async listOfficers(usdot: number): Promise<Person[]> {
    const rows = await this.db
      .select({ person: persons })
      .from(carrierOfficers)
      .innerJoin(persons, eq(carrierOfficers.personId, persons.personId))
      .where(eq(carrierOfficers.carrierUsdot, usdot))
      .orderBy(asc(persons.fullName));
    return rows.map((row) => row.person);
  }

  async listCarriersForOfficer(personId: string): Promise<Carrier[]> {
    const rows = await this.db
      .select({ carrier: carriers })
      .from(carrierOfficers)
      .innerJoin(carriers, eq(carrierOfficers.carrierUsdot, carriers.usdot))
      .where(eq(carrierOfficers.personId, personId))
      .orderBy(asc(carriers.usdot));
    return rows.map((row) => row.carrier);
  }

  async listOfficerLinks(): Promise<OfficerLink[]> {
    return this.db
      .select({
        carrierUsdot: carrierOfficers.carrierUsdot,
        personId: carrierOfficers.personId,
        fullName: persons.fullName,
      })
      .from(carrierOfficers)
      .innerJoin(persons, eq(carrierOfficers.personId, persons.personId))
      .innerJoin(carriers, eq(carrierOfficers.carrierUsdot, carriers.usdot))
      .orderBy(asc(carrierOfficers.personId), asc(carrierOfficers.carrierUsdot));
  }

  // ============================================
  // PROVIDERS
  // ============================================

  async getProviderByName(name: string): Promise<InsuranceProvider | undefined> {
    const [row] = await this.db.select().from(insuranceProviders).where(eq(insuranceProviders.name, name)).limit(1);
    return row;
  }

  async getProviderById(providerId: string): Promise<InsuranceProvider | undefined> {
    const [row] = await this.db
      .select()
      .from(insuranceProviders)
      .where(eq(insuranceProviders.providerId, providerId))
      .limit(1);
    return row;
  }

  async insertProviderIfAbsent(provider: InsertInsuranceProvider): Promise<InsuranceProvider | null> {
    const [row] = await this.db.insert(insuranceProviders).values(provider).onConflictDoNothing().returning();
    return row ?? null;
  }

  async listProviders(options: PageOptions = {}): Promise<InsuranceProvider[]> {
    return this.db
      .select()
      .from(insuranceProviders)
      .orderBy(asc(insuranceProviders.name))
      .limit(options.limit ?? DEFAULT_PAGE_SIZE)
      .offset(options.offset ?? 0);
  }

  async listCarriersForProvider(providerId: string): Promise<Carrier[]> {
    const rows = await this.db
      .select({ carrier: carriers })
      .from(carrierProviders)
      .innerJoin(carriers, eq(carrierProviders.carrierUsdot, carriers.usdot))
      .where(eq(carrierProviders.providerId, providerId))
      .orderBy(asc(carriers.usdot));
    return rows.map((row) => row.carrier);
  }

  async setProviderCarrierCount(providerId: string, count: number): Promise<InsuranceProvider | undefined> {
    const [row] = await this.db
      .update(insuranceProviders)
      .set({ totalCarriersInsured: count, updatedAt: new Date() })
      .where(eq(insuranceProviders.providerId, providerId))
      .returning();
    return row;
  }

  // ============================================
  // POLICIES
  // ============================================

  async insertPolicy(policy: InsertInsurancePolicy): Promise<InsurancePolicy | null> {
    const [row] = await this.db.insert(insurancePolicies).values(policy).onConflictDoNothing().returning();
    return row ?? null;
  }

  async getPolicy(policyId: string): Promise<InsurancePolicy | undefined> {
    const [row] = await this.db
      .select()
      .from(insurancePolicies)
      .where(eq(insurancePolicies.policyId, policyId))
      .limit(1);
    return row;
  }

  async listPoliciesByCarrier(usdot: number): Promise<InsurancePolicy[]> {
    return this.db
      .select()
      .from(insurancePolicies)
      .where(eq(insurancePolicies.carrierUsdot, usdot))
      .orderBy(asc(insurancePolicies.effectiveDate), asc(insurancePolicies.policyId));
  }

  // ============================================
  // EVENTS
  // ============================================

  async insertEvent(event: InsertInsuranceEvent): Promise<InsuranceEvent | null> {
    const [row] = await this.db.insert(insuranceEvents).values(event).onConflictDoNothing().returning();
    return row ?? null;
  }

  async getEvent(eventId: string): Promise<InsuranceEvent | undefined> {
    const [row] = await this.db.select().from(insuranceEvents).where(eq(insuranceEvents.eventId, eventId)).limit(1);
    return row;
  }

  async listEventsByCarrier(usdot: number): Promise<InsuranceEvent[]> {
    return this.db
      .select()
      .from(insuranceEvents)
      .where(eq(insuranceEvents.carrierUsdot, usdot))
      .orderBy(asc(insuranceEvents.eventDate), asc(insuranceEvents.eventId));
  }

  // ============================================
  // EDGES
  // ============================================

  async upsertCoveragePeriod(edge: CoveragePeriodUpsert): Promise<CoveragePeriod> {
    const [row] = await this.db
      .insert(coveragePeriods)
      .values(edge)
      .onConflictDoUpdate({
        target: [coveragePeriods.carrierUsdot, coveragePeriods.policyId],
        set: {
          toDate: edge.toDate,
          status: edge.status,
          durationDays: edge.durationDays,
          updatedAt: sql`NOW()`,
        },
      })
      .returning();
    if (!row) {
      throw new Error(`Coverage period ${edge.carrierUsdot}/${edge.policyId} was not written`);
    }
    return row;
  }

  async listCoverageRecords(usdot?: number): Promise<CoverageRecord[]> {
    return this.db
      .select({ period: coveragePeriods, policy: insurancePolicies })
      .from(coveragePeriods)
      .innerJoin(insurancePolicies, eq(coveragePeriods.policyId, insurancePolicies.policyId))
      .where(usdot === undefined ? undefined : eq(coveragePeriods.carrierUsdot, usdot))
      .orderBy(asc(coveragePeriods.carrierUsdot), asc(coveragePeriods.fromDate), asc(coveragePeriods.id));
  }

  async linkPolicyProvider(policyId: string, providerId: string): Promise<void> {
    await this.db.insert(policyProviders).values({ policyId, providerId }).onConflictDoNothing();
  }

  async listProvidersForPolicy(policyId: string): Promise<InsuranceProvider[]> {
    const rows = await this.db
      .select({ provider: insuranceProviders })
      .from(policyProviders)
      .innerJoin(insuranceProviders, eq(policyProviders.providerId, insuranceProviders.providerId))
      .where(eq(policyProviders.policyId, policyId));
    return rows.map((row) => row.provider);
  }

  async linkCarrierProvider(usdot: number, providerId: string): Promise<void> {
    await this.db.insert(carrierProviders).values({ carrierUsdot: usdot, providerId }).onConflictDoNothing();
  }

  async insertSuccessionIfAbsent(link: SuccessionLink): Promise<void> {
    await this.db.insert(policySuccessions).values(link).onConflictDoNothing();
  }

  async listSuccessions(usdot?: number): Promise<PolicySuccession[]> {
    return this.db
      .select()
      .from(policySuccessions)
      .where(usdot === undefined ? undefined : eq(policySuccessions.carrierUsdot, usdot))
      .orderBy(asc(policySuccessions.carrierUsdot), asc(policySuccessions.policyId));
  }

  // ============================================
  // JOBS
  // ============================================

  async saveJob(job: EnrichmentJob): Promise<void> {
    const { jobId, createdAt, ...progress } = job;
    await this.db
      .insert(enrichmentJobs)
      .values(job)
      .onConflictDoUpdate({ target: enrichmentJobs.jobId, set: progress });
  }

  async getJob(jobId: string): Promise<EnrichmentJob | undefined> {
    const [row] = await this.db.select().from(enrichmentJobs).where(eq(enrichmentJobs.jobId, jobId)).limit(1);
    return row;
  }

  async listJobs(limit: number): Promise<EnrichmentJob[]> {
    return this.db.select().from(enrichmentJobs).orderBy(desc(enrichmentJobs.createdAt)).limit(limit);
  }
}
