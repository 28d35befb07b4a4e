/**
 * Query Parameter Validation Helpers
 *
 * Schemas for the route params and query strings shared across the
 * insurance, carrier and provider routes.
 */

import { z } from 'zod';

const calendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Standard pagination query schema
 */
export const paginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional().default(100),
  offset: z.coerce.number().int().min(0).optional().default(0),
});

/**
 * USDOT route parameter
 */
export const usdotParamSchema = z.object({
  usdot: z.coerce.number().int().positive('USDOT must be a positive integer'),
});

export const policyIdParamSchema = z.object({
  policyId: z.string().min(1),
});

export const jobIdParamSchema = z.object({
  jobId: z.string().uuid('Invalid job id'),
});

export const providerNameParamSchema = z.object({
  name: z.string().trim().min(1),
});

export const carrierPoliciesQuerySchema = z.object({
  activeOnly: booleanFlag.optional().default('false'),
  includeExpired: booleanFlag.optional().default('true'),
});

export const minGapQuerySchema = z.object({
  minGapDays: z.coerce.number().int().min(0).optional().default(1),
});

export const coverageGapsQuerySchema = minGapQuerySchema.extend({
  carrierUsdot: z.coerce.number().int().positive().optional(),
});

/**
 * Coverage window; both ends inclusive
 */
export const coverageWindowQuerySchema = z
  .object({
    windowStart: calendarDate,
    windowEnd: calendarDate,
  })
  .refine((data) => data.windowStart <= data.windowEnd, {
    message: 'windowStart must be before or equal to windowEnd',
    path: ['windowStart'],
  });

export const shoppingQuerySchema = z.object({
  monthsWindow: z.coerce.number().int().min(1).max(120).optional().default(12),
  minProviders: z.coerce.number().int().min(1).optional().default(3),
});

export const cargoTypeQuerySchema = z.object({
  cargoType: z.string().trim().min(1).optional().default('GENERAL_FREIGHT'),
});

export const limitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export const highRiskQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional().default(100),
});
