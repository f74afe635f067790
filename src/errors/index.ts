/**
 * Error taxonomy
 *
 * Page absence is not an error: the resolver reports it as a ResolvedPage
 * with null text. Malformed references are dropped inside the extractor and
 * have no error type.
 */

export type HarvestErrorCode = 'TRANSPORT_EXHAUSTED' | 'CONFIG_ERROR' | 'RECORD_FORMAT_ERROR';

/**
 * Base class for every error the harvester raises or returns
 */
export class HarvestError extends Error {
  readonly code: HarvestErrorCode;

  constructor(code: HarvestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HarvestError';
    this.code = code;
  }
}

/**
 * All retry attempts for one logical fetch failed
 */
export class TransportExhaustedError extends HarvestError {
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, cause: Error) {
    super(
      'TRANSPORT_EXHAUSTED',
      `Request to ${url} failed after ${attempts} attempt(s): ${cause.message}`,
      { cause }
    );
    this.name = 'TransportExhaustedError';
    this.url = url;
    this.attempts = attempts;
  }

  /** The error raised by the final attempt */
  get lastError(): Error {
    return this.cause instanceof Error ? this.cause : new Error(String(this.cause));
  }
}

/**
 * Run parameters failed validation
 */
export class ConfigError extends HarvestError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * A line of a record file could not be decoded
 */
export class RecordFormatError extends HarvestError {
  readonly file: string;
  readonly line: number;

  constructor(file: string, line: number, reason: string) {
    super('RECORD_FORMAT_ERROR', `${file}:${line}: ${reason}`);
    this.name = 'RecordFormatError';
    this.file = file;
    this.line = line;
  }
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
