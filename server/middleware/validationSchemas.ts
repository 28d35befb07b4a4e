/**
 * Validation Schemas for API Endpoints
 *
 * Centralized Zod schemas for request bodies
 */

import { z } from 'zod';
import { FilingStatus, InsuranceEventType, FraudIndicator } from '@shared/schema';

const calendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');
const amount = z.number().nonnegative();

// ============================================
// POLICY SCHEMAS
// ============================================

export const policyCreateSchema = z.object({
  policyId: z.string().trim().min(1, 'policyId is required').max(100),
  carrierUsdot: z.number().int().positive(),
  providerName: z.string().trim().min(1, 'providerName is required'),
  providerId: z.string().max(40).nullish(),
  policyType: z.string().trim().min(1).max(30),
  policyNumber: z.string().max(100).nullish(),
  coverageAmount: amount,
  cargoCoverage: amount.nullish(),
  effectiveDate: calendarDate,
  expirationDate: calendarDate.nullish(),
  cancellationDate: calendarDate.nullish(),
  cancellationReason: z.string().nullish(),
  filingStatus: z.nativeEnum(FilingStatus).optional(),
  isCompliant: z.boolean().optional(),
  meetsFederalMinimum: z.boolean().optional(),
  requiredMinimum: amount.nullish(),
  dataSource: z.string().max(50).optional(),
});

export type PolicyCreateInput = z.infer<typeof policyCreateSchema>;

// ============================================
// EVENT SCHEMAS
// ============================================

export const eventCreateSchema = z.object({
  eventId: z.string().trim().min(1).max(120).optional(),
  carrierUsdot: z.number().int().positive(),
  eventType: z.nativeEnum(InsuranceEventType),
  eventDate: calendarDate,
  previousProvider: z.string().nullish(),
  newProvider: z.string().nullish(),
  previousCoverage: amount.nullish(),
  newCoverage: amount.nullish(),
  coverageChange: z.number().nullish(),
  daysWithoutCoverage: z.number().int().nonnegative().optional(),
  previousPolicyId: z.string().nullish(),
  newPolicyId: z.string().nullish(),
  complianceViolation: z.boolean().optional(),
  violationReason: z.string().nullish(),
  isSuspicious: z.boolean().optional(),
  fraudIndicators: z.array(z.nativeEnum(FraudIndicator)).optional(),
  reason: z.string().nullish(),
  notes: z.string().nullish(),
});

export type EventCreateInput = z.infer<typeof eventCreateSchema>;

// ============================================
// ENRICHMENT SCHEMAS
// ============================================

export const bulkEnrichSchema = z.object({
  usdots: z.array(z.number().int().positive()).min(1, 'At least one USDOT is required').max(10_000),
});

// ============================================
// CARRIER SCHEMAS
// ============================================

export const officerAttachSchema = z.object({
  fullName: z.string().trim().min(1, 'fullName is required').max(200),
});
