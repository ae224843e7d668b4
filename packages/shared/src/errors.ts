/**
 * Error Taxonomy
 *
 * Every failure surfaced by the digester is a DigestError carrying a category,
 * so the pipeline can decide between aborting the run and skipping a document.
 */

export type ErrorCategory = 'CONFIGURATION_ERROR' | 'IO_ERROR' | 'EXTRACTION_ERROR';

/**
 * Why a provider call did not yield a usable record
 */
export type ExtractionFailureReason =
  | 'network'
  | 'rate_limit'
  | 'malformed_response'
  | 'provider_rejected'
  | 'schema_mismatch';

export interface DigestErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class DigestError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, options: DigestErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DigestError';
    this.category = category;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Wrap any caught value, keeping DigestErrors as they are
   */
  static fromUnknown(error: unknown, category: ErrorCategory = 'EXTRACTION_ERROR'): DigestError {
    if (error instanceof DigestError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new DigestError(category, message, { cause: error });
  }
}

/**
 * Missing or invalid settings or credentials. Always fatal.
 */
export class ConfigurationError extends DigestError {
  constructor(message: string, options: DigestErrorOptions = {}) {
    super('CONFIGURATION_ERROR', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Filesystem failure on the input or output side
 */
export class IOError extends DigestError {
  public readonly path: string;

  constructor(message: string, path: string, options: DigestErrorOptions = {}) {
    super('IO_ERROR', message, { ...options, details: { path, ...options.details } });
    this.name = 'IOError';
    this.path = path;
  }
}

export class ExtractionError extends DigestError {
  public readonly reason: ExtractionFailureReason;

  constructor(reason: ExtractionFailureReason, message: string, options: DigestErrorOptions = {}) {
    super('EXTRACTION_ERROR', message, { ...options, details: { reason, ...options.details } });
    this.name = 'ExtractionError';
    this.reason = reason;
  }
}

/**
 * Error code from a Node.js system error (ENOENT, EACCES, ...), if any
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
