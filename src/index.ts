/**
 * Noticeboard Harvester - Main Entry Point
 *
 * Harvests talk-page links from a wiki noticeboard and its archives and joins
 * each link with the full wikitext of the page it points to.
 *
 * Architecture:
 * - fetcher: every outbound request goes through one rate-limited fetcher
 * - extractor + paginator: discovery, seed first, then archives
 * - resolver: one API call per distinct page, cached for the run
 * - pipeline: lazy join of links and pages, streamed to a sink
 */

// Core Types
export type * from './types/index.js';
export { SEED_CONTEXT } from './types/index.js';

// Errors
export {
  HarvestError,
  TransportExhaustedError,
  ConfigError,
  RecordFormatError,
  type HarvestErrorCode,
} from './errors/index.js';

// Configuration
export { resolveConfig, DEFAULT_CONFIG, type HarvesterConfig } from './config/index.js';

// Logging
export { createConsoleLogger, defaultLogger, defaultMetrics } from './logger/index.js';

// Fetcher Module
export {
  RateLimitedFetcher,
  linearRetryPolicy,
  textParser,
  type RetryPolicy,
  type FetchRequest,
  type FetchResult,
  type FetcherOptions,
  type ResponseParser,
} from './fetcher/index.js';

// Extractor Module
export {
  normalizePageIdentifier,
  extractReferences,
  namespacePrefixMatcher,
  archiveMatcher,
  uniqueIdentifiers,
  pageUrl,
  type ExtractedReference,
  type ReferenceMatcher,
} from './extractor/index.js';

// Paginator Module
export { ArchivePaginator, type PaginatorOptions, type PaginatorStats } from './paginator/index.js';

// Resolver Module
export {
  ContentResolver,
  ResolutionCache,
  parseRevisionResponse,
  buildRevisionQuery,
  type Resolution,
  type PresentPage,
  type LatestRevision,
  type ResolverOptions,
  type ResolverStats,
} from './resolver/index.js';

// Storage Module
export {
  JsonlFileSink,
  MemoryRecordSink,
  createOutputSink,
  createLinkSink,
  datasetPath,
  readJsonLines,
  readLinkRecords,
  readLinkEntries,
  toOutputLine,
  DATASET_FILE_NAMES,
  type OutputLine,
  type DatasetName,
  type RecordEntry,
} from './storage/index.js';

// Pipeline Module
export {
  createPipelineDeps,
  resolveLinks,
  runPipeline,
  discoverLinks,
  linksFromRecords,
  resolveLinkRecords,
  type PipelineDeps,
  type PipelineDepsOverrides,
} from './pipeline/index.js';
