/**
 * Storage Module
 *
 * Responsibilities:
 * - Implement RecordSink for line-delimited JSON files and for memory
 * - Map domain records to and from their on-disk line shape
 * - Read record files back line by line with schema validation
 *
 * Dataset files per run directory:
 * - {outDir}/drn_links.jsonl   (discovery stage)
 * - {outDir}/talkpages.jsonl   (resolution stage)
 */

import { mkdir, open, type FileHandle } from 'fs/promises';
import { dirname, join } from 'path';
import { z } from 'zod';
import { RecordFormatError } from '../errors/index.js';
import type { LinkRecord, OutputRecord, RecordSink } from '../types/index.js';

export type { RecordSink };

/**
 * Dataset file names inside the output directory
 */
export const DATASET_FILE_NAMES = {
  links: 'drn_links.jsonl',
  pages: 'talkpages.jsonl',
} as const;

export type DatasetName = keyof typeof DATASET_FILE_NAMES;

export function datasetPath(outDir: string, dataset: DatasetName): string {
  return join(outDir, DATASET_FILE_NAMES[dataset]);
}

// ============================================================================
// Line Shapes
// ============================================================================

export const LinkRecordSchema = z.object({
  source: z.string().min(1),
  url: z.string().min(1),
});

/**
 * On-disk shape of an OutputRecord
 */
export interface OutputLine {
  source: string;
  title: string;
  anchor: string | null;
  url: string;
  discovery_order: number;
  wikitext: string;
  revision_timestamp: string | null;
  fetched_at: string;
}

export function toOutputLine(record: OutputRecord): OutputLine {
  return {
    source: record.sourceContext,
    title: record.targetIdentifier,
    anchor: record.anchor,
    url: record.url,
    discovery_order: record.discoveryOrder,
    wikitext: record.text,
    revision_timestamp: record.revisionTimestamp,
    fetched_at: record.fetchedAt,
  };
}

// ============================================================================
// Sinks
// ============================================================================

/**
 * Appends one JSON document per line to a file. The file is created (and
 * truncated) on first write, along with its parent directory.
 */
export class JsonlFileSink<T> implements RecordSink<T> {
  private handle: FileHandle | null = null;
  private closed = false;
  private written = 0;

  constructor(
    readonly path: string,
    private readonly serialize: (record: T) => unknown = (record) => record
  ) {}

  async write(record: T): Promise<void> {
    if (this.closed) {
      throw new Error(`Sink already closed: ${this.path}`);
    }
    const handle = await this.open();
    await handle.write(`${JSON.stringify(this.serialize(record))}\n`);
    this.written++;
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.handle) {
      await this.handle.close();
      this.handle = null;
    }
  }

  /**
   * Number of records written so far
   */
  count(): number {
    return this.written;
  }

  private async open(): Promise<FileHandle> {
    if (!this.handle) {
      await mkdir(dirname(this.path), { recursive: true });
      this.handle = await open(this.path, 'w');
    }
    return this.handle;
  }
}

/**
 * In-memory sink for testing
 */
export class MemoryRecordSink<T> implements RecordSink<T> {
  readonly records: T[] = [];
  closed = false;

  async write(record: T): Promise<void> {
    if (this.closed) {
      throw new Error('Sink already closed');
    }
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function createOutputSink(outDir: string): JsonlFileSink<OutputRecord> {
  return new JsonlFileSink<OutputRecord>(datasetPath(outDir, 'pages'), toOutputLine);
}

export function createLinkSink(outDir: string): JsonlFileSink<LinkRecord> {
  return new JsonlFileSink<LinkRecord>(datasetPath(outDir, 'links'));
}

// ============================================================================
// Readers
// ============================================================================

/**
 * Decode one line of a record file
 *
 * @throws RecordFormatError for invalid JSON or a schema mismatch
 */
export function decodeLine<T>(
  line: string,
  schema: z.ZodType<T>,
  file: string,
  lineNumber: number
): T {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    throw new RecordFormatError(
      file,
      lineNumber,
      `invalid JSON (${error instanceof Error ? error.message : String(error)})`
    );
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RecordFormatError(
      file,
      lineNumber,
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')
    );
  }
  return parsed.data;
}

/**
 * A decoded record and the 1-based file line it came from
 */
export interface RecordEntry<T> {
  line: number;
  record: T;
}

/**
 * Stream validated records from a JSONL file; blank lines are skipped
 */
export async function* readJsonLines<T>(
  path: string,
  schema: z.ZodType<T>
): AsyncGenerator<RecordEntry<T>> {
  const file = await open(path, 'r');
  try {
    let lineNumber = 0;
    for await (const line of file.readLines()) {
      lineNumber++;
      if (line.trim() === '') {
        continue;
      }
      yield { line: lineNumber, record: decodeLine(line, schema, path, lineNumber) };
    }
  } finally {
    await file.close();
  }
}

export function readLinkEntries(path: string): AsyncGenerator<RecordEntry<LinkRecord>> {
  return readJsonLines(path, LinkRecordSchema);
}

export async function* readLinkRecords(path: string): AsyncGenerator<LinkRecord> {
  for await (const entry of readLinkEntries(path)) {
    yield entry.record;
  }
}
