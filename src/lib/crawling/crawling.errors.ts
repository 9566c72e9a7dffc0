/**
 * Crawl Dedup Errors
 * Failure taxonomy for filter construction, fingerprinting and snapshots
 */

export enum DedupErrorType {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_URL = 'INVALID_URL',
  INVALID_REQUEST = 'INVALID_REQUEST',
  CORRUPT_SNAPSHOT = 'CORRUPT_SNAPSHOT',
}

export class DedupError extends Error {
  readonly type: DedupErrorType;
  readonly details?: Record<string, unknown>;

  /**
   * Failures are reported to the immediate caller and never retried here.
   */
  readonly retryable: boolean = false;

  constructor(type: DedupErrorType, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DedupError';
    this.type = type;
    this.details = details;
  }
}

export function configurationError(message: string, details?: Record<string, unknown>): DedupError {
  return new DedupError(DedupErrorType.CONFIGURATION_ERROR, message, details);
}

export function invalidUrl(url: string, reason: string): DedupError {
  return new DedupError(DedupErrorType.INVALID_URL, `Invalid URL "${url}": ${reason}`, { url });
}

export function invalidRequest(message: string, details?: Record<string, unknown>): DedupError {
  return new DedupError(DedupErrorType.INVALID_REQUEST, message, details);
}

export function corruptSnapshot(message: string, details?: Record<string, unknown>): DedupError {
  return new DedupError(DedupErrorType.CORRUPT_SNAPSHOT, message, details);
}

/**
 * Check whether an unknown error is a DedupError, optionally of a given type
 */
export function isDedupError(error: unknown, type?: DedupErrorType): error is DedupError {
  if (!(error instanceof DedupError)) {
    return false;
  }
  return type === undefined || error.type === type;
}
