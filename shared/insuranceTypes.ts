/**
 * Insurance Coverage Types
 *
 * Result shapes shared between the coverage services and the HTTP layer.
 * Dates are calendar dates in 'YYYY-MM-DD' form.
 */

import { CargoType, type InsuranceEvent, type InsurancePolicy } from "./schema";

// ============================================
// REGULATORY MINIMUMS
// ============================================

export const FEDERAL_MINIMUM_COVERAGE: Record<CargoType, number> = {
  [CargoType.GENERAL_FREIGHT]: 750_000,
  [CargoType.HOUSEHOLD_GOODS]: 750_000,
  [CargoType.HAZMAT]: 5_000_000,
  [CargoType.PASSENGERS_15_PLUS]: 5_000_000,
  [CargoType.PASSENGERS_UNDER_15]: 1_500_000,
  [CargoType.OIL]: 1_000_000,
};

export const DEFAULT_FEDERAL_MINIMUM = 750_000;

/** Gaps longer than this are compliance violations. */
export const COMPLIANCE_GAP_DAYS = 30;

/** Duration reported for a period with no end date. */
export const OPEN_ENDED_DURATION = -1;

// ============================================
// TEMPORAL
// ============================================

export type PolicyLifecycleState = "PENDING" | "ACTIVE" | "EXPIRED" | "CANCELLED" | "LAPSED";

export interface DateRange {
  fromDate: string;
  toDate: string | null;
}

export interface CoverageAccounting {
  windowStart: string;
  windowEnd: string;
  windowDays: number;
  coveredDays: number;
  uncoveredDays: number;
  /** Covered stretches after clamping to the window and merging overlaps; toDate is exclusive. */
  mergedPeriods: Array<{ fromDate: string; toDate: string }>;
}

export type TimelineEntry =
  | { kind: "policy"; date: string; lifecycle: PolicyLifecycleState; policy: InsurancePolicy }
  | { kind: "event"; date: string; event: InsuranceEvent };

// ============================================
// GAPS & OVERLAPS
// ============================================

export interface CoverageGap {
  carrierUsdot: number;
  fromPolicy: string;
  toPolicy: string;
  gapStart: string;
  gapEnd: string;
  gapDays: number;
  fromProvider: string;
  toProvider: string;
}

export interface CarrierCoverageGap extends CoverageGap {
  carrierName: string | null;
}

export interface CoverageOverlap {
  carrierUsdot: number;
  firstPolicy: string;
  secondPolicy: string;
  firstProvider: string;
  secondProvider: string;
  firstPeriod: DateRange;
  secondPeriod: DateRange;
  overlapDays: number;
}

// ============================================
// FRAUD PATTERNS
// ============================================

export type RiskFactor =
  | "no_policy"
  | "provider_shopping"
  | "cancellations"
  | "compliance_violations"
  | "coverage_gap";

export interface RiskScoreComponent {
  factor: RiskFactor;
  points: number;
  detail: string;
}

export interface CarrierRiskScore {
  carrierUsdot: number;
  carrierName: string | null;
  riskScore: number;
  components: RiskScoreComponent[];
  policyCount: number;
  providerCount: number;
  cancellations: number;
  complianceViolations: number;
  maxCoverageGap: number;
  violations: number;
  crashes: number;
}

export interface ShoppingPattern {
  carrierUsdot: number;
  carrierName: string | null;
  providerCount: number;
  providers: string[];
  policyDates: string[];
  violations: number;
  crashes: number;
  /** provider_count / months_window */
  riskScore: number;
}

export interface UnderinsuredCarrier {
  carrierUsdot: number;
  carrierName: string | null;
  policyId: string;
  provider: string;
  coverageAmount: number;
  requiredMinimum: number;
  shortage: number;
  cargoType: string;
  violations: number;
  crashes: number;
}

export interface ChameleonPattern {
  carrier1Usdot: number;
  carrier1Name: string | null;
  carrier2Usdot: number;
  carrier2Name: string | null;
  sharedOfficers: string[];
  sharedProviders: string[];
  sharedProviderCount: number;
  carrier1Violations: number;
  carrier2Violations: number;
}

export interface FederalComplianceResult {
  compliant: boolean;
  requiredMinimum: number;
  reason?: string;
}

export interface FraudStatisticsSummary {
  carriersWithGaps: number;
  averageGapDays: number;
  insuranceShoppingCarriers: number;
  underinsuredCarriers: number;
  highRiskCarriers: number;
  topRisks: CarrierRiskScore[];
}

// ============================================
// COMPLIANCE & ENRICHMENT
// ============================================

export type ComplianceSeverity = "CRITICAL" | "HIGH" | "MEDIUM";

export interface ComplianceViolation {
  type: string;
  severity: ComplianceSeverity;
  description: string;
  policyId?: string;
  gapDays?: number;
}

export interface ComplianceReport {
  carrierUsdot: number;
  isCompliant: boolean;
  totalPolicies: number;
  activePolicies: number;
  violations: ComplianceViolation[];
}

export type EnrichmentOutcome = "completed" | "no_data" | "failed";

export interface EnrichmentErrorDetail {
  code: string;
  message: string;
  recordId?: string;
}

export interface EnrichmentResult {
  carrierUsdot: number;
  carrierName: string | null;
  outcome: EnrichmentOutcome;
  policiesCreated: number;
  policiesSkipped: number;
  recordsRejected: number;
  eventsCreated: number;
  gapsFound: number;
  complianceViolations: ComplianceViolation[];
  fraudIndicators: string[];
  errors: EnrichmentErrorDetail[];
}
