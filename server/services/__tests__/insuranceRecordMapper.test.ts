/**
 * Insurance Record Mapper Tests
 *
 * Unit tests for normalizing raw provider filings into policy rows.
 * Run with: npx vitest run server/services/__tests__/insuranceRecordMapper.test.ts
 */

import { describe, it, expect } from 'vitest';
import { FilingStatus } from '../../../shared/schema';
import { DataQualityError } from '../../lib/errors';
import {
  buildPolicyId,
  mapFormCode,
  mapRawRecord,
  parseCoverageAmount,
  parseProviderDate,
} from '../insuranceRecordMapper';
import { rawRecord } from './fixtures';

const TODAY = '2024-06-15';

// ============================================
// FIELD PARSERS
// ============================================

describe('parseProviderDate', () => {
  it('accepts the provider date formats', () => {
    expect(parseProviderDate('2023-01-01 00:00:00', 'effective_date')).toBe('2023-01-01');
    expect(parseProviderDate('2023-01-01T05:00:00Z', 'effective_date')).toBe('2023-01-01');
    expect(parseProviderDate('2023-01-01', 'effective_date')).toBe('2023-01-01');
    expect(parseProviderDate('1/5/2023', 'effective_date')).toBe('2023-01-05');
  });

  it('treats empty values as absent', () => {
    expect(parseProviderDate('', 'expiration_date')).toBeNull();
    expect(parseProviderDate('   ', 'expiration_date')).toBeNull();
    expect(parseProviderDate(null, 'expiration_date')).toBeNull();
  });

  it('rejects unparseable dates', () => {
    expect(() => parseProviderDate('soon', 'expiration_date', 'rec-9')).toThrow(DataQualityError);
    expect(() => parseProviderDate('2023-02-30', 'expiration_date')).toThrow('Unparseable expiration_date "2023-02-30"');
  });
});

describe('parseCoverageAmount', () => {
  it('converts thousands to dollars', () => {
    expect(parseCoverageAmount('01000')).toBe(1_000_000);
    expect(parseCoverageAmount(750)).toBe(750_000);
    expect(parseCoverageAmount('0.5')).toBe(500);
  });

  it('reads a missing amount as zero', () => {
    expect(parseCoverageAmount(null)).toBe(0);
    expect(parseCoverageAmount('')).toBe(0);
  });

  it('rejects negative and non-numeric amounts', () => {
    expect(() => parseCoverageAmount('-5')).toThrow('Invalid coverage amount "-5"');
    expect(() => parseCoverageAmount('lots')).toThrow(DataQualityError);
  });
});

describe('mapFormCode', () => {
  it('prefixes form codes', () => {
    expect(mapFormCode('91x')).toBe('BMC-91X');
    expect(mapFormCode(34)).toBe('BMC-34');
  });

  it('defaults to BMC-91', () => {
    expect(mapFormCode(undefined)).toBe('BMC-91');
  });

  it('rejects codes with punctuation', () => {
    expect(() => mapFormCode('91-X', 'rec-1')).toThrow('Unknown form code "91-X"');
  });
});

describe('buildPolicyId', () => {
  it('squashes the provider name into the id', () => {
    expect(buildPolicyId(1001, 'Acme Insurance, Inc', '2023-01-01')).toBe('POL-1001-ACMEINSURA-20230101');
    expect(buildPolicyId(42, 'Beta', '2024-02-29')).toBe('POL-42-BETA-20240229');
    expect(buildPolicyId(1001, 'Progressive Casualty', '2023-01-01')).toBe('POL-1001-PROGRESSIV-20230101');
  });
});

// ============================================
// RECORDS
// ============================================

describe('mapRawRecord', () => {
  it('maps a complete record', () => {
    expect(mapRawRecord(rawRecord({ policy_no: 'AC-77', cargo_coverage: '100000' }), 1001, TODAY)).toEqual({
      policyId: 'POL-1001-ACMEINSURA-20230101',
      carrierUsdot: 1001,
      providerName: 'Acme Insurance',
      providerId: null,
      policyType: 'BMC-91X',
      policyNumber: 'AC-77',
      coverageAmount: 1_000_000,
      cargoCoverage: 100_000,
      effectiveDate: '2023-01-01',
      expirationDate: null,
      cancellationDate: null,
      cancellationReason: null,
      filingStatus: FilingStatus.ACTIVE,
      isCompliant: true,
      meetsFederalMinimum: true,
      requiredMinimum: 750_000,
      dataSource: 'SEARCHCARRIERS_API',
      sourceRecordId: 'rec-1',
    });
  });

  it('derives the filing status from the dates', () => {
    const cancelled = mapRawRecord(
      rawRecord({ cancel_effective_date: '2023-06-01', cancellation_reason: 'NON_PAYMENT' }),
      1001,
      TODAY,
    );
    expect(cancelled.filingStatus).toBe(FilingStatus.CANCELLED);
    expect(cancelled.cancellationReason).toBe('NON_PAYMENT');

    const lapsed = mapRawRecord(rawRecord({ expiration_date: '2024-01-01' }), 1001, TODAY);
    expect(lapsed.filingStatus).toBe(FilingStatus.LAPSED);
  });

  it('keeps a recognised supplied status', () => {
    const pending = mapRawRecord(rawRecord({ effective_date: '2024-07-01', filing_status: 'pending' }), 1001, TODAY);
    expect(pending.filingStatus).toBe(FilingStatus.PENDING);
  });

  it('flags coverage below the federal minimum', () => {
    const policy = mapRawRecord(rawRecord({ max_cov_amount: '00500' }), 1001, TODAY);
    expect(policy.coverageAmount).toBe(500_000);
    expect(policy.meetsFederalMinimum).toBe(false);
    expect(policy.isCompliant).toBe(false);
  });

  it('names an unknown provider', () => {
    expect(mapRawRecord(rawRecord({ name_company: '  ' }), 1001, TODAY).providerName).toBe('Unknown');
  });

  it('rejects records without an effective date', () => {
    expect(() => mapRawRecord(rawRecord({ effective_date: null }), 1001, TODAY)).toThrow('Record has no effective date');
  });

  it('rejects end dates before the effective date', () => {
    try {
      mapRawRecord(rawRecord({ expiration_date: '2022-12-01' }), 1001, TODAY);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DataQualityError);
      expect(error).toMatchObject({ field: 'expiration_date', recordId: 'rec-1' });
    }
  });
});
