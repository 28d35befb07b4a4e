/**
 * Insurance Data Client
 *
 * HTTP client for the carrier insurance-history API. Requests are spaced by
 * a minimum interval and retried with exponential backoff on rate-limit and
 * server errors. A 404 means the provider has no filings for the carrier.
 */

import { z } from 'zod';
import type { InsuranceApiConfig } from '../config/appConfig';
import { ExternalProviderError, errorMessage } from '../lib/errors';
import { loggers } from '../lib/logger';
import { rawInsuranceRecordSchema, type RawInsuranceRecord } from './insuranceRecordMapper';

const log = loggers.provider;

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);
const MAX_PAGES = 50;

const historyPageSchema = z.object({
  data: z.array(rawInsuranceRecordSchema).default([]),
});

export interface InsuranceDataSource {
  fetchInsuranceHistory(carrierUsdot: number): Promise<RawInsuranceRecord[]>;
}

export interface InsuranceDataClientDeps {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class InsuranceDataClient implements InsuranceDataSource {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastRequestAt = 0;

  constructor(
    private readonly config: InsuranceApiConfig,
    deps: InsuranceDataClientDeps = {},
  ) {
    this.fetchImpl = deps.fetch ?? fetch;
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? Date.now;
  }

  async fetchInsuranceHistory(carrierUsdot: number): Promise<RawInsuranceRecord[]> {
    const records: RawInsuranceRecord[] = [];

    for (let page = 1; page <= MAX_PAGES; page++) {
      const body = await this.request(`/v2/company/${carrierUsdot}/insurances`, {
        page: String(page),
        perPage: String(this.config.pageSize),
      });
      if (body === null) {
        break;
      }

      const parsed = historyPageSchema.safeParse(body);
      if (!parsed.success) {
        throw new ExternalProviderError(
          `Malformed insurance history for carrier ${carrierUsdot}: ${parsed.error.errors[0]?.message ?? 'invalid body'}`,
          null,
          false,
        );
      }

      records.push(...parsed.data.data);
      if (parsed.data.data.length < this.config.pageSize) {
        break;
      }
    }

    log.debug({ carrierUsdot, records: records.length }, 'Fetched insurance history');
    return records;
  }

  /** Returns the parsed JSON body, or null on 404. */
  private async request(path: string, query: Record<string, string>): Promise<unknown> {
    const url = `${this.config.baseUrl}${path}?${new URLSearchParams(query).toString()}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    for (let attempt = 0; ; attempt++) {
      await this.pace();

      let response: Response;
      try {
        response = await this.fetchImpl(url, { headers });
      } catch (error) {
        if (attempt < this.config.maxRetries) {
          await this.backoff(attempt, null);
          continue;
        }
        throw new ExternalProviderError(`Insurance API unreachable: ${errorMessage(error)}`, null, true);
      }

      if (response.status === 404) {
        await response.body?.cancel();
        return null;
      }
      if (response.ok) {
        try {
          return await response.json();
        } catch (error) {
          throw new ExternalProviderError(`Insurance API returned invalid JSON: ${errorMessage(error)}`, response.status, false);
        }
      }

      // release the connection before retrying or giving up
      await response.body?.cancel();
      const retryable = RETRYABLE_STATUSES.has(response.status);
      if (retryable && attempt < this.config.maxRetries) {
        log.warn({ url, status: response.status, attempt: attempt + 1 }, 'Insurance API request failed, retrying');
        await this.backoff(attempt, response.headers.get('retry-after'));
        continue;
      }

      throw new ExternalProviderError(
        `Insurance API responded ${response.status} for ${path}`,
        response.status,
        retryable,
      );
    }
  }

  private async pace(): Promise<void> {
    const wait = this.lastRequestAt + this.config.minIntervalMs - this.now();
    if (wait > 0) {
      await this.sleep(wait);
    }
    this.lastRequestAt = this.now();
  }

  private async backoff(attempt: number, retryAfter: string | null): Promise<void> {
    const retryAfterSeconds = retryAfter === null ? NaN : Number(retryAfter);
    const delay = Number.isFinite(retryAfterSeconds)
      ? retryAfterSeconds * 1000
      : this.config.backoffMs * 2 ** attempt;
    await this.sleep(delay);
  }
}
