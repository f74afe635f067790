/**
 * Fetcher Module
 *
 * Single outbound request primitive shared by the paginator and resolver.
 *
 * Features:
 * - Fixed User-Agent header on every request
 * - Bounded retry with a pluggable backoff (linear by default)
 * - Politeness delay between distinct logical fetches, measured from the
 *   completion of the previous successful fetch
 * - Returns a result value instead of throwing on transport failure
 *
 * Usage:
 * ```typescript
 * const fetcher = new RateLimitedFetcher({ userAgent: 'MyBot/1.0' });
 * const result = await fetcher.fetch({ url: 'https://en.wikipedia.org/wiki/Talk:X' });
 * if (result.ok) console.log(result.value.length);
 * ```
 */

import axios, { type AxiosInstance } from 'axios';
import { TransportExhaustedError, toError } from '../errors/index.js';
import { defaultLogger, defaultMetrics } from '../logger/index.js';
import type { Logger, Metrics } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Retry policy consumed by the fetcher
 */
export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before attempt `attempt + 1`, given the 1-based failed attempt number */
  backoff(attempt: number): number;
}

export interface FetchRequest {
  url: string;
  params?: Record<string, string | number>;
}

export type FetchResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: TransportExhaustedError };

/**
 * Converts a raw response body into the caller's value. A thrown error counts
 * as a failed attempt.
 */
export type ResponseParser<T> = (body: unknown) => T;

export interface FetcherOptions {
  userAgent: string;
  retryPolicy?: RetryPolicy;
  /** Minimum gap between logical fetches in milliseconds (default: 1000) */
  politenessDelayMs?: number;
  /** Per-attempt timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Preconfigured axios instance, e.g. one with a custom adapter */
  client?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Retry Policy
// ============================================================================

/**
 * Linear backoff: `baseDelayMs × attempt`
 */
export function linearRetryPolicy(maxAttempts = 3, baseDelayMs = 2000): RetryPolicy {
  return {
    maxAttempts,
    backoff: (attempt) => baseDelayMs * attempt,
  };
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Identity parser that requires a string body
 */
export const textParser: ResponseParser<string> = (body) => {
  if (typeof body !== 'string') {
    throw new Error(`Expected a text body, received ${typeof body}`);
  }
  return body;
};

// ============================================================================
// Fetcher
// ============================================================================

export class RateLimitedFetcher {
  private readonly client: AxiosInstance;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly politenessDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private lastSuccessAt: number | null = null;

  constructor(options: FetcherOptions) {
    this.retryPolicy = options.retryPolicy ?? linearRetryPolicy();
    this.politenessDelayMs = options.politenessDelayMs ?? 1000;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;

    this.client = options.client ?? axios.create();
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  /**
   * Perform one logical fetch with retries
   */
  async fetch(request: FetchRequest): Promise<FetchResult<string>>;
  async fetch<T>(request: FetchRequest, parse: ResponseParser<T>): Promise<FetchResult<T>>;
  async fetch<T>(
    request: FetchRequest,
    parse?: ResponseParser<T>
  ): Promise<FetchResult<T | string>> {
    const parser: ResponseParser<T | string> = parse ?? textParser;
    const { maxAttempts } = this.retryPolicy;
    let lastError: Error = new Error('No attempt made');

    await this.waitForPoliteness();

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.metrics.increment('fetcher.attempt');
      try {
        const value = await this.attempt(request, parser);
        this.lastSuccessAt = this.now();
        return { ok: true, value, attempts: attempt };
      } catch (error) {
        lastError = toError(error);
        this.logger.warn(`Request attempt ${attempt}/${maxAttempts} failed`, {
          url: request.url,
          error: lastError.message,
        });

        if (attempt < maxAttempts) {
          await this.sleep(this.retryPolicy.backoff(attempt));
        }
      }
    }

    this.metrics.increment('fetcher.exhausted');
    return {
      ok: false,
      error: new TransportExhaustedError(request.url, maxAttempts, lastError),
    };
  }

  private async attempt<T>(request: FetchRequest, parse: ResponseParser<T>): Promise<T> {
    const response = await this.client.get<unknown>(request.url, {
      params: request.params,
      responseType: 'text',
      timeout: this.timeoutMs,
      headers: { 'User-Agent': this.userAgent },
      // Status codes are checked below
      validateStatus: () => true,
    });

    if (response.status < 200 || response.status >= 300) {
      throw new Error(`HTTP ${response.status}`);
    }

    return parse(response.data);
  }

  private async waitForPoliteness(): Promise<void> {
    if (this.lastSuccessAt === null || this.politenessDelayMs <= 0) {
      return;
    }
    const remaining = this.lastSuccessAt + this.politenessDelayMs - this.now();
    if (remaining > 0) {
      this.logger.debug('Waiting for politeness delay', { ms: remaining });
      await this.sleep(remaining);
    }
  }
}

/**
 * Parse a JSON text body, for use inside response parsers
 */
export function parseJsonBody(body: unknown): unknown {
  if (typeof body !== 'string') {
    return body;
  }
  return JSON.parse(body);
}
