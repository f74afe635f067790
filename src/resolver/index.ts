/**
 * Resolver Module
 *
 * Turns page identifiers into their latest wikitext through the MediaWiki
 * Action API. Each distinct identifier is fetched at most once per run; the
 * outcome (present, absent or failed) is cached for the resolver's lifetime.
 */

import { z } from 'zod';
import type { TransportExhaustedError } from '../errors/index.js';
import { parseJsonBody, type RateLimitedFetcher } from '../fetcher/index.js';
import { defaultLogger, defaultMetrics } from '../logger/index.js';
import type { Logger, Metrics, PageIdentifier, ResolvedPage } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface PresentPage extends ResolvedPage {
  text: string;
}

export type Resolution =
  | { status: 'present'; page: PresentPage }
  | { status: 'absent'; page: ResolvedPage }
  | { status: 'failed'; identifier: PageIdentifier; error: TransportExhaustedError };

export interface ResolverOptions {
  apiEndpoint: string;
  cache?: ResolutionCache;
  now?: () => Date;
  logger?: Logger;
  metrics?: Metrics;
}

export interface ResolverStats {
  distinctResolutions: number;
  cacheHits: number;
  absent: number;
  failed: number;
}

// ============================================================================
// API Response Schema (action=query, formatversion=2)
// ============================================================================

const RevisionSchema = z.object({
  timestamp: z.string().optional(),
  slots: z
    .object({
      main: z.object({ content: z.string().optional() }).passthrough().optional(),
    })
    .passthrough()
    .optional(),
});

const PageSchema = z
  .object({
    title: z.string().optional(),
    missing: z.boolean().optional(),
    invalid: z.boolean().optional(),
    revisions: z.array(RevisionSchema).optional(),
  })
  .passthrough();

const QueryResponseSchema = z
  .object({
    error: z.object({ code: z.string(), info: z.string().optional() }).optional(),
    query: z.object({ pages: z.array(PageSchema).optional() }).passthrough().optional(),
  })
  .passthrough();

/**
 * Latest revision of a page, or null when the page does not exist or has no
 * revisions
 */
export interface LatestRevision {
  content: string;
  timestamp: string | null;
}

/**
 * Parse a query response body. Throws on envelopes that are not a usable
 * answer so the fetcher retries them.
 */
export function parseRevisionResponse(body: unknown): LatestRevision | null {
  const parsed = QueryResponseSchema.safeParse(parseJsonBody(body));
  if (!parsed.success) {
    throw new Error(
      `Unexpected API response: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`
    );
  }

  const { error, query } = parsed.data;
  if (error) {
    throw new Error(`API error ${error.code}${error.info ? `: ${error.info}` : ''}`);
  }

  const page = query?.pages?.[0];
  if (!page || page.missing || page.invalid) {
    return null;
  }

  const revision = page.revisions?.[0];
  if (!revision) {
    return null;
  }

  return {
    content: revision.slots?.main?.content ?? '',
    timestamp: revision.timestamp ?? null,
  };
}

/**
 * Query parameters for the latest revision of one page
 */
export function buildRevisionQuery(identifier: PageIdentifier): Record<string, string | number> {
  return {
    action: 'query',
    format: 'json',
    prop: 'revisions',
    rvprop: 'content|timestamp',
    rvslots: 'main',
    titles: identifier,
    formatversion: 2,
  };
}

// ============================================================================
// Cache
// ============================================================================

/**
 * Run-scoped resolution cache. Entries are frozen and never replaced.
 */
export class ResolutionCache {
  private readonly entries = new Map<PageIdentifier, Resolution>();

  get(identifier: PageIdentifier): Resolution | undefined {
    return this.entries.get(identifier);
  }

  has(identifier: PageIdentifier): boolean {
    return this.entries.has(identifier);
  }

  set(identifier: PageIdentifier, resolution: Resolution): Resolution {
    const existing = this.entries.get(identifier);
    if (existing) {
      return existing;
    }
    const frozen = Object.freeze(resolution);
    this.entries.set(identifier, frozen);
    return frozen;
  }

  get size(): number {
    return this.entries.size;
  }
}

// ============================================================================
// Resolver
// ============================================================================

export class ContentResolver {
  private readonly cache: ResolutionCache;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private counters: ResolverStats = { distinctResolutions: 0, cacheHits: 0, absent: 0, failed: 0 };

  constructor(
    private readonly fetcher: RateLimitedFetcher,
    private readonly options: ResolverOptions
  ) {
    this.cache = options.cache ?? new ResolutionCache();
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  async resolve(identifier: PageIdentifier): Promise<Resolution> {
    const cached = this.cache.get(identifier);
    if (cached) {
      this.counters.cacheHits++;
      this.metrics.increment('resolver.cache_hit');
      return cached;
    }

    this.logger.info('Fetching wikitext', { title: identifier });
    this.counters.distinctResolutions++;
    this.metrics.increment('resolver.fetch');

    const result = await this.fetcher.fetch(
      { url: this.options.apiEndpoint, params: buildRevisionQuery(identifier) },
      parseRevisionResponse
    );

    if (!result.ok) {
      this.counters.failed++;
      return this.cache.set(identifier, { status: 'failed', identifier, error: result.error });
    }

    const resolvedAt = this.now().toISOString();
    if (result.value === null) {
      this.counters.absent++;
      return this.cache.set(identifier, {
        status: 'absent',
        page: Object.freeze({ identifier, text: null, revisionTimestamp: null, resolvedAt }),
      });
    }

    return this.cache.set(identifier, {
      status: 'present',
      page: Object.freeze({
        identifier,
        text: result.value.content,
        revisionTimestamp: result.value.timestamp,
        resolvedAt,
      }),
    });
  }

  stats(): ResolverStats {
    return { ...this.counters };
  }
}
