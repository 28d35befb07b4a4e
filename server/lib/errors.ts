/**
 * Domain Errors
 *
 * Typed failures raised by the coverage services. The HTTP layer maps them
 * to status codes in middleware/errorHandler.ts; the enrichment orchestrator
 * collects them per record.
 */

export type DomainErrorCode =
  | 'VALIDATION_ERROR'
  | 'DUPLICATE_KEY'
  | 'NOT_FOUND'
  | 'EXTERNAL_PROVIDER_ERROR'
  | 'DATA_QUALITY_ERROR';

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
}

export class DuplicateKeyError extends DomainError {
  readonly code = 'DUPLICATE_KEY';

  constructor(entity: string, key: string | number) {
    super(`${entity} ${key} already exists`, { entity, key });
  }
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';

  constructor(readonly entity: string, key: string | number) {
    super(`${entity} ${key} not found`, { entity, key });
  }
}

export class ExternalProviderError extends DomainError {
  readonly code = 'EXTERNAL_PROVIDER_ERROR';

  constructor(message: string, readonly status: number | null, readonly retryable: boolean) {
    super(message, { status, retryable });
  }
}

export class DataQualityError extends DomainError {
  readonly code = 'DATA_QUALITY_ERROR';

  constructor(message: string, readonly field: string, readonly recordId?: string) {
    super(message, { field, recordId });
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
