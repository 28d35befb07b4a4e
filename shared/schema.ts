import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  integer,
  boolean,
  timestamp,
  jsonb,
  date,
  index,
  uniqueIndex,
  primaryKey,
  serial,
  doublePrecision,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================
// INSURANCE ENUMS
// ============================================

/** Filing status as supplied by the data source when the policy is created. */
export enum FilingStatus {
  ACTIVE = "ACTIVE",
  EXPIRED = "EXPIRED",
  CANCELLED = "CANCELLED",
  LAPSED = "LAPSED",
  PENDING = "PENDING",
}

/** Derived status of a coverage period (carrier → policy). */
export enum CoverageStatus {
  ACTIVE = "ACTIVE",
  EXPIRED = "EXPIRED",
  CANCELLED = "CANCELLED",
}

export enum InsuranceEventType {
  NEW_POLICY = "NEW_POLICY",
  RENEWAL = "RENEWAL",
  PROVIDER_CHANGE = "PROVIDER_CHANGE",
  CANCELLATION = "CANCELLATION",
  LAPSE = "LAPSE",
  COVERAGE_INCREASE = "COVERAGE_INCREASE",
  COVERAGE_DECREASE = "COVERAGE_DECREASE",
}

export enum FraudIndicator {
  EXTENDED_COVERAGE_GAP = "extended_coverage_gap",
  PROVIDER_SHOPPING = "provider_shopping",
  SIGNIFICANT_COVERAGE_REDUCTION = "significant_coverage_reduction",
  FINANCIAL_DISTRESS = "financial_distress",
  COVERAGE_LAPSE = "coverage_lapse",
}

export enum CargoType {
  GENERAL_FREIGHT = "GENERAL_FREIGHT",
  HOUSEHOLD_GOODS = "HOUSEHOLD_GOODS",
  HAZMAT = "HAZMAT",
  PASSENGERS_15_PLUS = "PASSENGERS_15_PLUS",
  PASSENGERS_UNDER_15 = "PASSENGERS_UNDER_15",
  OIL = "OIL",
}

export enum EnrichmentJobStatus {
  PENDING = "pending",
  RUNNING = "running",
  COMPLETED = "completed",
  FAILED = "failed",
}

export const DEFAULT_DATA_SOURCE = "SEARCHCARRIERS_API";

// ============================================
// CARRIERS, PERSONS, PROVIDERS (nodes)
// ============================================

export const carriers = pgTable("carriers", {
  usdot: integer("usdot").primaryKey(),
  carrierName: text("carrier_name").notNull(),
  primaryOfficer: text("primary_officer"),

  // Display cache only; the temporal tables are authoritative
  insuranceProvider: text("insurance_provider"),
  insuranceAmount: doublePrecision("insurance_amount"),

  // Fleet / safety aggregates
  trucks: integer("trucks").notNull().default(0),
  inspections: integer("inspections").notNull().default(0),
  violations: integer("violations").notNull().default(0),
  oos: integer("oos").notNull().default(0),
  crashes: integer("crashes").notNull().default(0),
  driverOosRate: doublePrecision("driver_oos_rate").notNull().default(0),
  vehicleOosRate: doublePrecision("vehicle_oos_rate").notNull().default(0),
  mcs150Drivers: integer("mcs150_drivers"),
  mcs150Miles: integer("mcs150_miles"),
  mcs150Date: date("mcs150_date"),

  dataSource: varchar("data_source", { length: 50 }).notNull().default("CSV_IMPORT"),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
  updatedAt: timestamp("updated_at"),
}, (table) => ({
  nameIdx: index("carriers_name_idx").on(table.carrierName),
}));

export const insertCarrierSchema = createInsertSchema(carriers, {
  usdot: (schema) => schema.int().positive(),
  carrierName: (schema) => schema.min(1),
}).omit({
  createdAt: true,
  updatedAt: true,
});

export type InsertCarrier = z.infer<typeof insertCarrierSchema>;
export type Carrier = typeof carriers.$inferSelect;

/** Fields that may be changed on an existing carrier. */
export const carrierPatchSchema = insertCarrierSchema.omit({ usdot: true }).partial();
export type CarrierPatch = z.infer<typeof carrierPatchSchema>;

export const persons = pgTable("persons", {
  personId: varchar("person_id", { length: 20 }).primaryKey(),
  fullName: text("full_name").notNull(),
  firstName: text("first_name"),
  lastName: text("last_name"),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
});

export const insertPersonSchema = createInsertSchema(persons).omit({
  createdAt: true,
});

export type InsertPerson = z.infer<typeof insertPersonSchema>;
export type Person = typeof persons.$inferSelect;

export const insuranceProviders = pgTable("insurance_providers", {
  providerId: varchar("provider_id", { length: 40 }).primaryKey(),
  name: text("name").notNull().unique(),
  contactPhone: varchar("contact_phone", { length: 30 }),
  contactEmail: varchar("contact_email", { length: 255 }),
  website: text("website"),
  totalCarriersInsured: integer("total_carriers_insured").notNull().default(0),
  dataSource: varchar("data_source", { length: 50 }).notNull().default(DEFAULT_DATA_SOURCE),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
  updatedAt: timestamp("updated_at"),
});

export const insertInsuranceProviderSchema = createInsertSchema(insuranceProviders).omit({
  totalCarriersInsured: true,
  createdAt: true,
  updatedAt: true,
});

export type InsertInsuranceProvider = z.infer<typeof insertInsuranceProviderSchema>;
export type InsuranceProvider = typeof insuranceProviders.$inferSelect;

// ============================================
// POLICIES AND EVENTS (nodes)
// ============================================

export const insurancePolicies = pgTable("insurance_policies", {
  policyId: varchar("policy_id", { length: 100 }).primaryKey(),
  carrierUsdot: integer("carrier_usdot").notNull(),
  providerName: text("provider_name").notNull(),
  providerId: varchar("provider_id", { length: 40 }),

  policyType: varchar("policy_type", { length: 30 }).notNull(),
  policyNumber: varchar("policy_number", { length: 100 }),
  coverageAmount: doublePrecision("coverage_amount").notNull(),
  cargoCoverage: doublePrecision("cargo_coverage"),

  // 'YYYY-MM-DD'
  effectiveDate: date("effective_date").notNull(),
  expirationDate: date("expiration_date"),
  cancellationDate: date("cancellation_date"),
  cancellationReason: text("cancellation_reason"),

  filingStatus: varchar("filing_status", { length: 20 }).$type<FilingStatus>().notNull().default(FilingStatus.ACTIVE),
  isCompliant: boolean("is_compliant").notNull().default(true),
  meetsFederalMinimum: boolean("meets_federal_minimum").notNull().default(true),
  requiredMinimum: doublePrecision("required_minimum"),

  dataSource: varchar("data_source", { length: 50 }).notNull().default(DEFAULT_DATA_SOURCE),
  sourceRecordId: varchar("source_record_id", { length: 100 }),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
  updatedAt: timestamp("updated_at"),
}, (table) => ({
  carrierIdx: index("insurance_policies_carrier_idx").on(table.carrierUsdot, table.effectiveDate),
  providerIdx: index("insurance_policies_provider_idx").on(table.providerName),
}));

export type InsertInsurancePolicy = typeof insurancePolicies.$inferInsert;
export type InsurancePolicy = typeof insurancePolicies.$inferSelect;

export const insuranceEvents = pgTable("insurance_events", {
  eventId: varchar("event_id", { length: 120 }).primaryKey(),
  // INSURANCE_EVENT edge (carrier → event)
  carrierUsdot: integer("carrier_usdot").notNull(),
  eventType: varchar("event_type", { length: 30 }).$type<InsuranceEventType>().notNull(),
  eventDate: date("event_date").notNull(),

  previousProvider: text("previous_provider"),
  newProvider: text("new_provider"),
  previousCoverage: doublePrecision("previous_coverage"),
  newCoverage: doublePrecision("new_coverage"),
  coverageChange: doublePrecision("coverage_change"),
  daysWithoutCoverage: integer("days_without_coverage").notNull().default(0),
  previousPolicyId: varchar("previous_policy_id", { length: 100 }),
  newPolicyId: varchar("new_policy_id", { length: 100 }),

  complianceViolation: boolean("compliance_violation").notNull().default(false),
  violationReason: text("violation_reason"),
  isSuspicious: boolean("is_suspicious").notNull().default(false),
  fraudIndicators: jsonb("fraud_indicators").$type<FraudIndicator[]>().notNull().default(sql`'[]'::jsonb`),

  reason: text("reason"),
  notes: text("notes"),
  dataSource: varchar("data_source", { length: 50 }).notNull().default(DEFAULT_DATA_SOURCE),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
}, (table) => ({
  carrierIdx: index("insurance_events_carrier_idx").on(table.carrierUsdot, table.eventDate),
}));

export type InsertInsuranceEvent = typeof insuranceEvents.$inferInsert;
export type InsuranceEvent = typeof insuranceEvents.$inferSelect;

// ============================================
// RELATIONSHIPS (edges)
// ============================================

/** HAD_INSURANCE: carrier → policy, with derived temporal properties. */
export const coveragePeriods = pgTable("coverage_periods", {
  // Creation order; used as the stable pair ordering for overlap reporting
  id: serial("id").primaryKey(),
  carrierUsdot: integer("carrier_usdot").notNull(),
  policyId: varchar("policy_id", { length: 100 }).notNull(),
  fromDate: date("from_date").notNull(),
  toDate: date("to_date"),
  status: varchar("status", { length: 20 }).$type<CoverageStatus>().notNull(),
  // -1 while open-ended
  durationDays: integer("duration_days").notNull(),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
  updatedAt: timestamp("updated_at"),
}, (table) => ({
  carrierPolicyIdx: uniqueIndex("coverage_periods_carrier_policy_idx").on(table.carrierUsdot, table.policyId),
  fromDateIdx: index("coverage_periods_from_date_idx").on(table.carrierUsdot, table.fromDate),
}));

export type CoveragePeriod = typeof coveragePeriods.$inferSelect;

/** PROVIDED_BY: policy → provider. */
export const policyProviders = pgTable("policy_providers", {
  policyId: varchar("policy_id", { length: 100 }).notNull(),
  providerId: varchar("provider_id", { length: 40 }).notNull(),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
}, (table) => ({
  pk: primaryKey({ columns: [table.policyId, table.providerId] }),
}));

export type PolicyProviderLink = typeof policyProviders.$inferSelect;

/** PRECEDED_BY: later policy → the policy it replaced. */
export const policySuccessions = pgTable("policy_successions", {
  policyId: varchar("policy_id", { length: 100 }).notNull(),
  precedingPolicyId: varchar("preceding_policy_id", { length: 100 }).notNull(),
  carrierUsdot: integer("carrier_usdot").notNull(),
  gapDays: integer("gap_days").notNull().default(0),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
}, (table) => ({
  pk: primaryKey({ columns: [table.policyId, table.precedingPolicyId] }),
  carrierIdx: index("policy_successions_carrier_idx").on(table.carrierUsdot),
}));

export type PolicySuccession = typeof policySuccessions.$inferSelect;

/** INSURED_BY: carrier → provider, display cache. */
export const carrierProviders = pgTable("carrier_providers", {
  carrierUsdot: integer("carrier_usdot").notNull(),
  providerId: varchar("provider_id", { length: 40 }).notNull(),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
}, (table) => ({
  pk: primaryKey({ columns: [table.carrierUsdot, table.providerId] }),
}));

/** MANAGED_BY: carrier → person. */
export const carrierOfficers = pgTable("carrier_officers", {
  carrierUsdot: integer("carrier_usdot").notNull(),
  personId: varchar("person_id", { length: 20 }).notNull(),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
}, (table) => ({
  pk: primaryKey({ columns: [table.carrierUsdot, table.personId] }),
  personIdx: index("carrier_officers_person_idx").on(table.personId),
}));

// ============================================
// ENRICHMENT JOBS
// ============================================

export interface JobErrorDetail {
  carrierUsdot: number;
  code: string;
  message: string;
}

export interface JobCarrierOutcome {
  carrierUsdot: number;
  outcome: string;
  policiesCreated: number;
  eventsCreated: number;
  gapsFound: number;
}

export const enrichmentJobs = pgTable("enrichment_jobs", {
  jobId: varchar("job_id", { length: 64 }).primaryKey(),
  kind: varchar("kind", { length: 30 }).notNull(),
  status: varchar("status", { length: 20 }).$type<EnrichmentJobStatus>().notNull(),
  carrierUsdots: jsonb("carrier_usdots").$type<number[]>().notNull(),
  total: integer("total").notNull(),
  processed: integer("processed").notNull().default(0),
  succeeded: integer("succeeded").notNull().default(0),
  failed: integer("failed").notNull().default(0),
  skipped: integer("skipped").notNull().default(0),
  errors: jsonb("errors").$type<JobErrorDetail[]>().notNull().default(sql`'[]'::jsonb`),
  outcomes: jsonb("outcomes").$type<JobCarrierOutcome[]>().notNull().default(sql`'[]'::jsonb`),
  failureReason: text("failure_reason"),
  createdAt: timestamp("created_at").notNull().default(sql`NOW()`),
  startedAt: timestamp("started_at"),
  completedAt: timestamp("completed_at"),
}, (table) => ({
  statusIdx: index("enrichment_jobs_status_idx").on(table.status),
}));

export type EnrichmentJob = typeof enrichmentJobs.$inferSelect;
