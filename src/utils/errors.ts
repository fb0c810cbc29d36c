import type { ErrorKind } from '../types/flight.types';

/**
 * Failure of a single upstream lookup, tagged with the kind the
 * orchestrator and UI branch on.
 */
export class FetchError extends Error {
  public readonly kind: ErrorKind;

  public readonly retryAfterSeconds: number | null;

  constructor(kind: ErrorKind, message: string, retryAfterSeconds: number | null = null) {
    super(message);
    this.name = 'FetchError';
    this.kind = kind;
    this.retryAfterSeconds = retryAfterSeconds;
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

export class ConfigError extends Error {
  public readonly variable: string;

  constructor(message: string, variable: string) {
    super(message);
    this.name = 'ConfigError';
    this.variable = variable;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export const isFetchError = (error: unknown): error is FetchError => error instanceof FetchError;

/**
 * Returns a user-facing message for a failure kind.
 */
export function userMessage(kind: ErrorKind): string {
  switch (kind) {
    case 'NotFound':
      return 'No data yet.';
    case 'RateLimited':
      return 'API rate limit reached. Try again later.';
    case 'Unavailable':
      return 'Source unavailable. Check your connection.';
    case 'ConfigError':
      return 'Source disabled: API credential missing or rejected.';
    default:
      return 'Unexpected error.';
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
