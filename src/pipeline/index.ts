/**
 * Pipeline Module - discovery, resolution and join
 *
 * Usage:
 * ```typescript
 * const config = resolveConfig({ outDir: 'data' });
 * const deps = createPipelineDeps(config);
 * const sink = createOutputSink(config.outDir);
 * const summary = await runPipeline(config, deps, sink);
 * ```
 *
 * Links are consumed lazily from the paginator, so memory grows with the
 * number of distinct pages resolved, not with the number of links.
 */

import type { HarvesterConfig } from '../config/index.js';
import { normalizePageIdentifier } from '../extractor/index.js';
import { RateLimitedFetcher, linearRetryPolicy } from '../fetcher/index.js';
import { createConsoleLogger, defaultLogger, defaultMetrics } from '../logger/index.js';
import { ArchivePaginator } from '../paginator/index.js';
import { ContentResolver } from '../resolver/index.js';
import type { RecordEntry } from '../storage/index.js';
import type {
  LinkRecord,
  Logger,
  Metrics,
  OutputRecord,
  RecordSink,
  ReferenceLink,
  RunSummary,
} from '../types/index.js';

export interface PipelineDeps {
  fetcher: RateLimitedFetcher;
  paginator: ArchivePaginator;
  resolver: ContentResolver;
  logger: Logger;
  metrics: Metrics;
  now: () => Date;
}

export interface PipelineDepsOverrides {
  fetcher?: RateLimitedFetcher;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => Date;
}

/**
 * Wire the fetcher, paginator and resolver for one run. The resolver (and
 * with it the cache) is new for every call.
 */
export function createPipelineDeps(
  config: HarvesterConfig,
  overrides: PipelineDepsOverrides = {}
): PipelineDeps {
  const logger = overrides.logger ?? createConsoleLogger(config.verbose);
  const metrics = overrides.metrics ?? defaultMetrics;
  const now = overrides.now ?? (() => new Date());
  const fetcher =
    overrides.fetcher ??
    new RateLimitedFetcher({
      userAgent: config.userAgent,
      retryPolicy: linearRetryPolicy(config.maxAttempts, config.retryBaseDelayMs),
      politenessDelayMs: config.politenessDelayMs,
      timeoutMs: config.timeoutMs,
      logger,
      metrics,
    });

  return {
    fetcher,
    paginator: new ArchivePaginator(fetcher, {
      wikiBaseUrl: config.wikiBaseUrl,
      targetPrefix: config.targetPrefix,
      noticeboard: config.noticeboard,
      archiveMarker: config.archiveMarker,
      logger,
      metrics,
    }),
    resolver: new ContentResolver(fetcher, {
      apiEndpoint: config.apiEndpoint,
      now,
      logger,
      metrics,
    }),
    logger,
    metrics,
    now,
  };
}

/**
 * Resolve every link and write one record per link whose page exists.
 * Absent and failed pages drop their links with a warning.
 */
export async function resolveLinks(
  links: AsyncIterable<ReferenceLink>,
  deps: Pick<PipelineDeps, 'resolver' | 'logger' | 'metrics' | 'now'>,
  sink: RecordSink<OutputRecord>
): Promise<RunSummary> {
  const { resolver, logger, metrics, now } = deps;
  const started = now();
  const before = resolver.stats();
  let linksConsumed = 0;
  let recordsWritten = 0;
  let droppedAbsent = 0;
  let droppedFailed = 0;

  for await (const link of links) {
    linksConsumed++;
    const resolution = await resolver.resolve(link.targetIdentifier);

    switch (resolution.status) {
      case 'present':
        await sink.write({
          sourceContext: link.sourceContext,
          targetIdentifier: link.targetIdentifier,
          anchor: link.anchor,
          url: link.url,
          discoveryOrder: link.discoveryOrder,
          text: resolution.page.text,
          revisionTimestamp: resolution.page.revisionTimestamp,
          fetchedAt: now().toISOString(),
        });
        recordsWritten++;
        break;
      case 'absent':
        droppedAbsent++;
        logger.warn('No wikitext for page, dropping link', {
          title: link.targetIdentifier,
          source: link.sourceContext,
        });
        break;
      case 'failed':
        droppedFailed++;
        logger.warn('Page could not be resolved, dropping link', {
          title: link.targetIdentifier,
          source: link.sourceContext,
          error: resolution.error.message,
        });
        break;
    }
  }

  const after = resolver.stats();
  const completed = now();
  const durationMs = completed.getTime() - started.getTime();

  metrics.gauge('pipeline.records_written', recordsWritten);
  metrics.timing('pipeline.duration', durationMs);

  return {
    linksConsumed,
    recordsWritten,
    droppedAbsent,
    droppedFailed,
    distinctResolutions: after.distinctResolutions - before.distinctResolutions,
    cacheHits: after.cacheHits - before.cacheHits,
    startedAt: started.toISOString(),
    completedAt: completed.toISOString(),
    durationMs,
  };
}

/**
 * Full run: crawl the seed and its archives, resolve, write. The sink is
 * closed when the run ends, including on a fatal seed failure.
 *
 * @throws TransportExhaustedError when the seed page cannot be fetched
 */
export async function runPipeline(
  config: HarvesterConfig,
  deps: PipelineDeps,
  sink: RecordSink<OutputRecord>
): Promise<RunSummary> {
  deps.logger.info('Starting harvest', { seed: config.seedPage });
  try {
    const summary = await resolveLinks(deps.paginator.crawl(config.seedPage), deps, sink);
    deps.logger.info('Harvest completed', { ...summary, ...deps.paginator.stats() });
    return summary;
  } finally {
    await sink.close();
  }
}

/**
 * Discovery-only run: write where each talk link was found
 *
 * @returns number of link records written
 * @throws TransportExhaustedError when the seed page cannot be fetched
 */
export async function discoverLinks(
  config: HarvesterConfig,
  deps: Pick<PipelineDeps, 'paginator' | 'logger'>,
  sink: RecordSink<LinkRecord>
): Promise<number> {
  let written = 0;
  try {
    for await (const link of deps.paginator.crawl(config.seedPage)) {
      await sink.write({ source: link.sourceContext, url: link.url });
      written++;
    }
  } finally {
    await sink.close();
  }
  deps.logger.info('Discovery completed', { links: written, ...deps.paginator.stats() });
  return written;
}

/**
 * Rebuild ReferenceLinks from saved link records, numbering them in file
 * order. Records whose URL is not an article on this wiki are skipped with a
 * warning.
 */
export async function* linksFromRecords(
  entries: AsyncIterable<RecordEntry<LinkRecord>>,
  wikiBaseUrl: string,
  logger: Logger = defaultLogger,
  file = '<links>'
): AsyncGenerator<ReferenceLink> {
  let discoveryOrder = 0;
  for await (const { line, record } of entries) {
    const reference = normalizePageIdentifier(record.url, wikiBaseUrl);
    if (!reference) {
      logger.warn('Skipping link record that is not a wiki article URL', {
        file,
        line,
        url: record.url,
      });
      continue;
    }
    yield {
      sourceContext: record.source,
      targetIdentifier: reference.identifier,
      anchor: reference.anchor,
      url: reference.url,
      discoveryOrder: discoveryOrder++,
    };
  }
}

/**
 * Resolution-only run over saved link records
 */
export async function resolveLinkRecords(
  entries: AsyncIterable<RecordEntry<LinkRecord>>,
  config: HarvesterConfig,
  deps: PipelineDeps,
  sink: RecordSink<OutputRecord>,
  file?: string
): Promise<RunSummary> {
  try {
    const summary = await resolveLinks(
      linksFromRecords(entries, config.wikiBaseUrl, deps.logger, file),
      deps,
      sink
    );
    deps.logger.info('Resolution completed', { ...summary });
    return summary;
  } finally {
    await sink.close();
  }
}
