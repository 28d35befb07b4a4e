import pino from 'pino';

/**
 * Structured Logger
 *
 * JSON lines through pino; pino-pretty in development, silent under test.
 * Credentials that can reach a log line (the API key header, the provider
 * bearer token) are redacted at the root so child loggers inherit it.
 */

const env = process.env.NODE_ENV ?? 'development';
const isTest = env === 'test';
const isProduction = env === 'production';

const level = isTest ? 'silent' : process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug');

export type Logger = pino.Logger;

const transport = !isProduction && !isTest
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    }
  : undefined;

export const logger = pino({
  level,
  transport,
  base: {
    service: 'carrier-insurance-graph',
    env,
  },
  redact: {
    paths: ['headers["x-api-key"]', 'headers.authorization', 'token', 'apiKey'],
    censor: '[redacted]',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Child logger bound to a context, usually `{ module }`.
 *
 * @example
 * const log = createLogger({ module: 'coverage-gaps' });
 * log.info({ carrierUsdot: 1234567, gaps: 2 }, 'Gaps detected');
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/** Shared loggers for the coverage services. */
export const loggers = {
  api: createLogger({ module: 'api' }),
  coverage: createLogger({ module: 'coverage' }),
  fraud: createLogger({ module: 'fraud' }),
  enrichment: createLogger({ module: 'enrichment' }),
  jobs: createLogger({ module: 'enrichment-jobs' }),
  provider: createLogger({ module: 'insurance-data-client' }),
};

/**
 * Logs an error with its name, message and stack under `err`.
 */
export function logError(
  loggerInstance: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));
  loggerInstance.error({ err: pino.stdSerializers.err(err), ...context }, message);
}

export function logTiming(
  loggerInstance: Logger,
  operation: string,
  startTime: number,
  context?: Record<string, unknown>
): void {
  const durationMs = Date.now() - startTime;
  loggerInstance.info({ operation, durationMs, ...context }, `${operation} completed in ${durationMs}ms`);
}
