/**
 * Core type definitions for the noticeboard harvester
 *
 * This module exports the shared data model used across discovery,
 * resolution and output.
 */

/**
 * Source context of links found on the seed page itself
 */
export const SEED_CONTEXT = 'seed';

/**
 * Page identifier as used by the wiki, e.g. `Talk:Some_page`
 */
export type PageIdentifier = string;

// ============================================================================
// Discovery
// ============================================================================

/**
 * One discovered pointer into a target page
 */
export interface ReferenceLink {
  /** `"seed"` or the archive page identifier the link was found on */
  sourceContext: string;
  targetIdentifier: PageIdentifier;
  /** Decoded fragment, never an empty string */
  anchor: string | null;
  /** Absolute URL of the link as found */
  url: string;
  /** Monotonic sequence number assigned at extraction time */
  discoveryOrder: number;
}

/**
 * Stage-one dataset line: where a link was found and where it points
 */
export interface LinkRecord {
  source: string;
  url: string;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Outcome of resolving one page identifier. `text` is null for absent pages.
 */
export interface ResolvedPage {
  identifier: PageIdentifier;
  text: string | null;
  revisionTimestamp: string | null;
  resolvedAt: string;
}

/**
 * Join of a ReferenceLink with the page it resolved to
 */
export interface OutputRecord {
  sourceContext: string;
  targetIdentifier: PageIdentifier;
  anchor: string | null;
  url: string;
  discoveryOrder: number;
  text: string;
  revisionTimestamp: string | null;
  fetchedAt: string;
}

/**
 * Counters reported at the end of a resolution run
 */
export interface RunSummary {
  linksConsumed: number;
  recordsWritten: number;
  droppedAbsent: number;
  droppedFailed: number;
  distinctResolutions: number;
  cacheHits: number;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

// ============================================================================
// Observability
// ============================================================================

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

// ============================================================================
// Output
// ============================================================================

/**
 * Append-only destination for streamed records
 */
export interface RecordSink<T> {
  write(record: T): Promise<void>;
  close(): Promise<void>;
}
