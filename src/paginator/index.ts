/**
 * Paginator Module
 *
 * Walks the noticeboard seed page and the archive pages it links to, and
 * streams the talk-page references found on each, seed first.
 *
 * Archives are enumerated once from the seed, so traversal is one level deep.
 * An archive that cannot be fetched is skipped with a warning; a seed that
 * cannot be fetched is fatal.
 */

import {
  archiveMatcher,
  extractReferences,
  namespacePrefixMatcher,
  pageUrl,
  uniqueIdentifiers,
  type ExtractedReference,
  type ReferenceMatcher,
} from '../extractor/index.js';
import type { RateLimitedFetcher } from '../fetcher/index.js';
import { defaultLogger, defaultMetrics } from '../logger/index.js';
import { SEED_CONTEXT, type Logger, type Metrics, type ReferenceLink } from '../types/index.js';

export interface PaginatorOptions {
  wikiBaseUrl: string;
  targetPrefix: string;
  noticeboard: string;
  archiveMarker: string;
  logger?: Logger;
  metrics?: Metrics;
}

export interface PaginatorStats {
  linksDiscovered: number;
  archivesFound: number;
  archivesVisited: number;
  archivesSkipped: number;
}

export class ArchivePaginator {
  private readonly targetMatcher: ReferenceMatcher;
  private readonly archivePageMatcher: ReferenceMatcher;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private nextOrder = 0;
  private counters: PaginatorStats = {
    linksDiscovered: 0,
    archivesFound: 0,
    archivesVisited: 0,
    archivesSkipped: 0,
  };

  constructor(
    private readonly fetcher: RateLimitedFetcher,
    private readonly options: PaginatorOptions
  ) {
    this.targetMatcher = namespacePrefixMatcher(options.targetPrefix);
    this.archivePageMatcher = archiveMatcher(options.noticeboard, options.archiveMarker);
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Fetch the seed page and stream every reference reachable from it
   *
   * @throws TransportExhaustedError when the seed page cannot be fetched
   */
  async *crawl(seedIdentifier: string): AsyncGenerator<ReferenceLink> {
    const url = pageUrl(this.options.wikiBaseUrl, seedIdentifier);
    this.logger.info('Fetching seed page', { page: seedIdentifier, url });

    const result = await this.fetcher.fetch({ url });
    if (!result.ok) {
      this.logger.error('Seed page could not be fetched', { url, error: result.error.message });
      throw result.error;
    }

    yield* this.discoverAll(result.value);
  }

  /**
   * Stream references from an already fetched seed document, then from each
   * archive it links to in discovery order
   */
  async *discoverAll(seedHtml: string): AsyncGenerator<ReferenceLink> {
    const seedReferences = extractReferences(seedHtml, this.targetMatcher, this.options.wikiBaseUrl);
    this.logger.info('Found talk links on seed page', { count: seedReferences.length });
    yield* this.tag(SEED_CONTEXT, seedReferences);

    const archives = uniqueIdentifiers(
      extractReferences(seedHtml, this.archivePageMatcher, this.options.wikiBaseUrl)
    );
    this.counters.archivesFound = archives.length;
    this.logger.info('Found archive pages', { count: archives.length });

    for (const archive of archives) {
      const url = pageUrl(this.options.wikiBaseUrl, archive);
      this.logger.info('Processing archive', { archive });

      const result = await this.fetcher.fetch({ url });
      if (!result.ok) {
        this.counters.archivesSkipped++;
        this.metrics.increment('paginator.archive_skipped');
        this.logger.warn('Skipping archive after failed fetch', {
          archive,
          error: result.error.message,
        });
        continue;
      }

      this.counters.archivesVisited++;
      const references = extractReferences(result.value, this.targetMatcher, this.options.wikiBaseUrl);
      this.logger.debug('Found talk links on archive', { archive, count: references.length });
      yield* this.tag(archive, references);
    }
  }

  stats(): PaginatorStats {
    return { ...this.counters };
  }

  private *tag(sourceContext: string, references: ExtractedReference[]): Generator<ReferenceLink> {
    for (const reference of references) {
      this.counters.linksDiscovered++;
      yield {
        sourceContext,
        targetIdentifier: reference.identifier,
        anchor: reference.anchor,
        url: reference.url,
        discoveryOrder: this.nextOrder++,
      };
    }
  }
}
