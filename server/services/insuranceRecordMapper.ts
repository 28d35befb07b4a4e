/**
 * Insurance Record Mapper
 *
 * Normalizes raw filings from the insurance data provider into policy rows.
 * Records that cannot be mapped raise DataQualityError; the orchestrator
 * counts and skips them.
 */

import { isValid, parse } from 'date-fns';
import { z } from 'zod';
import {
  DEFAULT_DATA_SOURCE,
  FilingStatus,
  type InsertInsurancePolicy,
  type InsurancePolicy,
} from '@shared/schema';
import { DEFAULT_FEDERAL_MINIMUM } from '@shared/insuranceTypes';
import { DataQualityError, ValidationError } from '../lib/errors';
import { formatCalendarDate, parseCalendarDate } from './temporalCoverage';

const looseValue = z.union([z.string(), z.number()]).nullish();

export const rawInsuranceRecordSchema = z
  .object({
    id: looseValue,
    name_company: z.string().nullish(),
    provider_id: looseValue,
    max_cov_amount: looseValue,
    cargo_coverage: looseValue,
    policy_no: looseValue,
    ins_form_code: looseValue,
    effective_date: z.string().nullish(),
    expiration_date: z.string().nullish(),
    cancel_effective_date: z.string().nullish(),
    cancellation_reason: z.string().nullish(),
    filing_status: z.string().nullish(),
  })
  .passthrough();

export type RawInsuranceRecord = z.infer<typeof rawInsuranceRecordSchema>;

const LEADING_ISO_DATE = /^(\d{4}-\d{2}-\d{2})(?:[ T].*)?$/;
const FILING_STATUSES = new Set<string>(Object.values(FilingStatus));

function text(value: string | number | null | undefined): string {
  return value === null || value === undefined ? '' : String(value).trim();
}

function isFilingStatus(value: string): value is FilingStatus {
  return FILING_STATUSES.has(value);
}

/**
 * Accepts 'YYYY-MM-DD HH:mm:ss', ISO 8601, 'YYYY-MM-DD' and 'MM/DD/YYYY'.
 * Empty values are absent dates.
 */
export function parseProviderDate(value: string | null | undefined, field: string, recordId?: string): string | null {
  const raw = text(value);
  if (!raw) {
    return null;
  }

  const iso = LEADING_ISO_DATE.exec(raw);
  if (iso) {
    try {
      parseCalendarDate(iso[1], field);
      return iso[1];
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
    }
  } else {
    const us = parse(raw, 'M/d/yyyy', new Date());
    if (isValid(us)) {
      return formatCalendarDate(us);
    }
  }

  throw new DataQualityError(`Unparseable ${field} "${raw}"`, field, recordId);
}

/** Coverage is reported in thousands of dollars, often zero-padded ("01000"). */
export function parseCoverageAmount(value: string | number | null | undefined, recordId?: string): number {
  const raw = text(value);
  if (!raw) {
    return 0;
  }
  const thousands = Number(raw);
  if (!Number.isFinite(thousands) || thousands < 0) {
    throw new DataQualityError(`Invalid coverage amount "${raw}"`, 'max_cov_amount', recordId);
  }
  return Math.round(thousands * 1000);
}

function parseDollars(value: string | number | null | undefined, field: string, recordId?: string): number | null {
  const raw = text(value);
  if (!raw) {
    return null;
  }
  const amount = Number(raw);
  if (!Number.isFinite(amount) || amount < 0) {
    throw new DataQualityError(`Invalid ${field} "${raw}"`, field, recordId);
  }
  return amount;
}

/** Filing-form code to policy type, e.g. "91X" → "BMC-91X". */
export function mapFormCode(value: string | number | null | undefined, recordId?: string): string {
  const code = text(value).toUpperCase();
  if (!code) {
    return 'BMC-91';
  }
  if (/^[A-Z0-9]+$/.test(code)) {
    return `BMC-${code}`;
  }
  throw new DataQualityError(`Unknown form code "${code}"`, 'ins_form_code', recordId);
}

export function buildPolicyId(carrierUsdot: number, providerName: string, effectiveDate: string): string {
  const provider = providerName.replace(/[ ,]/g, '').toUpperCase().slice(0, 10);
  return `POL-${carrierUsdot}-${provider}-${effectiveDate.replace(/-/g, '')}`;
}

/** Policy insert with every temporal field resolved. */
export type MappedPolicy = InsertInsurancePolicy &
  Pick<InsurancePolicy, 'expirationDate' | 'cancellationDate' | 'filingStatus' | 'sourceRecordId'>;

export function mapRawRecord(raw: RawInsuranceRecord, carrierUsdot: number, today: string): MappedPolicy {
  const recordId = text(raw.id) || undefined;
  const providerName = text(raw.name_company) || 'Unknown';

  const effectiveDate = parseProviderDate(raw.effective_date, 'effective_date', recordId);
  if (!effectiveDate) {
    throw new DataQualityError('Record has no effective date', 'effective_date', recordId);
  }
  const expirationDate = parseProviderDate(raw.expiration_date, 'expiration_date', recordId);
  const cancellationDate = parseProviderDate(raw.cancel_effective_date, 'cancel_effective_date', recordId);

  if (expirationDate && expirationDate < effectiveDate) {
    throw new DataQualityError('Expiration precedes effective date', 'expiration_date', recordId);
  }
  if (cancellationDate && cancellationDate < effectiveDate) {
    throw new DataQualityError('Cancellation precedes effective date', 'cancel_effective_date', recordId);
  }

  const coverageAmount = parseCoverageAmount(raw.max_cov_amount, recordId);
  const suppliedStatus = text(raw.filing_status).toUpperCase();

  let filingStatus: FilingStatus;
  if (cancellationDate) {
    filingStatus = FilingStatus.CANCELLED;
  } else if (expirationDate && expirationDate < today) {
    filingStatus = FilingStatus.LAPSED;
  } else {
    filingStatus = isFilingStatus(suppliedStatus) ? suppliedStatus : FilingStatus.ACTIVE;
  }

  const meetsFederalMinimum = coverageAmount >= DEFAULT_FEDERAL_MINIMUM;

  return {
    policyId: buildPolicyId(carrierUsdot, providerName, effectiveDate),
    carrierUsdot,
    providerName,
    providerId: text(raw.provider_id) || null,
    policyType: mapFormCode(raw.ins_form_code, recordId),
    policyNumber: text(raw.policy_no) || null,
    coverageAmount,
    cargoCoverage: parseDollars(raw.cargo_coverage, 'cargo_coverage', recordId),
    effectiveDate,
    expirationDate,
    cancellationDate,
    cancellationReason: text(raw.cancellation_reason) || null,
    filingStatus,
    isCompliant: meetsFederalMinimum,
    meetsFederalMinimum,
    requiredMinimum: DEFAULT_FEDERAL_MINIMUM,
    dataSource: DEFAULT_DATA_SOURCE,
    sourceRecordId: recordId ?? null,
  };
}
