/**
 * Application Configuration
 *
 * Environment variables are parsed once into a typed, frozen object.
 * `.env` is loaded by the entry points through `dotenv/config`.
 */

import { z } from 'zod';

const numberFromEnv = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(5000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    GRAPH_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().min(1).optional(),
    DATABASE_SSL: z.enum(['true', 'false']).default('false'),

    API_KEY: z.string().min(1).optional(),

    INSURANCE_API_URL: z.string().url().default('https://searchcarriers.com/api'),
    INSURANCE_API_TOKEN: z.string().min(1).optional(),
    INSURANCE_API_MAX_RETRIES: numberFromEnv(3),
    INSURANCE_API_BACKOFF_MS: numberFromEnv(1000),
    INSURANCE_API_MIN_INTERVAL_MS: numberFromEnv(1000),
    INSURANCE_API_PAGE_SIZE: z.coerce.number().int().min(1).max(500).default(100),

    ENRICHMENT_BATCH_SIZE: z.coerce.number().int().min(1).default(10),
    ENRICHMENT_ITEM_DELAY_MS: numberFromEnv(1000),
    ENRICHMENT_BATCH_DELAY_MS: numberFromEnv(5000),
    ENRICHMENT_MAX_ERROR_DETAILS: z.coerce.number().int().min(1).default(20),
  })
  .superRefine((env, ctx) => {
    if (env.GRAPH_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when GRAPH_STORE=postgres',
      });
    }
    if (env.NODE_ENV === 'production' && !env.API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['API_KEY'],
        message: 'API_KEY is required in production',
      });
    }
  });

export interface InsuranceApiConfig {
  baseUrl: string;
  token?: string;
  maxRetries: number;
  backoffMs: number;
  minIntervalMs: number;
  pageSize: number;
}

export interface EnrichmentConfig {
  batchSize: number;
  itemDelayMs: number;
  batchDelayMs: number;
  maxErrorDetails: number;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  storage: { driver: 'memory' } | { driver: 'postgres'; url: string; ssl: boolean };
  apiKey?: string;
  insuranceApi: InsuranceApiConfig;
  enrichment: EnrichmentConfig;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const env = parsed.data;

  const config: AppConfig = {
    env: env.NODE_ENV,
    port: env.PORT,
    storage:
      env.GRAPH_STORE === 'postgres' && env.DATABASE_URL
        ? { driver: 'postgres', url: env.DATABASE_URL, ssl: env.DATABASE_SSL === 'true' }
        : { driver: 'memory' },
    apiKey: env.API_KEY,
    insuranceApi: {
      baseUrl: env.INSURANCE_API_URL.replace(/\/+$/, ''),
      token: env.INSURANCE_API_TOKEN,
      maxRetries: env.INSURANCE_API_MAX_RETRIES,
      backoffMs: env.INSURANCE_API_BACKOFF_MS,
      minIntervalMs: env.INSURANCE_API_MIN_INTERVAL_MS,
      pageSize: env.INSURANCE_API_PAGE_SIZE,
    },
    enrichment: {
      batchSize: env.ENRICHMENT_BATCH_SIZE,
      itemDelayMs: env.ENRICHMENT_ITEM_DELAY_MS,
      batchDelayMs: env.ENRICHMENT_BATCH_DELAY_MS,
      maxErrorDetails: env.ENRICHMENT_MAX_ERROR_DETAILS,
    },
  };
  return Object.freeze(config);
}
