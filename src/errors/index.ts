import type { ZodIssue } from 'zod';

export type WeatherHistoryErrorCode =
  | 'INVALID_PARAMETER'
  | 'PROVIDER_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'SCHEMA_MISMATCH'
  | 'IO_FAILURE';

export abstract class WeatherHistoryError extends Error {
  abstract readonly code: WeatherHistoryErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad caller input: date format/order, frequency, empty location or key. */
export class InvalidParameterError extends WeatherHistoryError {
  readonly code = 'INVALID_PARAMETER';

  constructor(message: string, readonly issues: ZodIssue[] = []) {
    super(message);
  }
}

/** The provider rejected the request (bad key, unknown location, HTTP error). */
export class ProviderError extends WeatherHistoryError {
  readonly code = 'PROVIDER_ERROR';

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class MalformedResponseError extends WeatherHistoryError {
  readonly code = 'MALFORMED_RESPONSE';
}

/** Daily records that cannot be flattened into aligned rows. */
export class SchemaMismatchError extends WeatherHistoryError {
  readonly code = 'SCHEMA_MISMATCH';

  constructor(message: string, readonly issues: ZodIssue[] = []) {
    super(message);
  }
}

export class IOFailureError extends WeatherHistoryError {
  readonly code = 'IO_FAILURE';

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Failed to write weather history to ${path}`, options);
  }
}

export function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
