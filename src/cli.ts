#!/usr/bin/env node
/**
 * Noticeboard Harvester CLI
 *
 * Usage:
 *   noticeboard-harvester [run]                 discover + resolve -> talkpages.jsonl
 *   noticeboard-harvester discover              discover only      -> drn_links.jsonl
 *   noticeboard-harvester resolve --input FILE  resolve saved links -> talkpages.jsonl
 *
 * Options:
 *   --outdir DIR        output directory (default: data)
 *   --input FILE        links file for `resolve` (default: <outdir>/drn_links.jsonl)
 *   --seed PAGE         seed page identifier
 *   --max-attempts N    attempts per request (default: 3)
 *   --delay-ms N        politeness delay between requests (default: 1000)
 *   --timeout-ms N      per-attempt timeout (default: 30000)
 *   --verbose           debug logging
 */

import { resolveConfig, type HarvesterConfig } from './config/index.js';
import { HarvestError } from './errors/index.js';
import { createConsoleLogger } from './logger/index.js';
import { createPipelineDeps, discoverLinks, resolveLinkRecords, runPipeline } from './pipeline/index.js';
import {
  createLinkSink,
  createOutputSink,
  datasetPath,
  readLinkEntries,
} from './storage/index.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Command = 'run' | 'discover' | 'resolve';

export interface CliOptions {
  command: Command;
  input: string | null;
  help: boolean;
  config: Partial<HarvesterConfig>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const COMMANDS: readonly Command[] = ['run', 'discover', 'resolve'];

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function requireInt(argv: string[], index: number, flag: string): number {
  const raw = requireValue(argv, index, flag);
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new UsageError(`${flag} expects an integer, got "${raw}"`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { command: 'run', input: null, help: false, config: {} };
  let commandSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '--outdir':
        opts.config.outDir = requireValue(argv, ++i, arg);
        break;
      case '--input':
        opts.input = requireValue(argv, ++i, arg);
        break;
      case '--seed':
        opts.config.seedPage = requireValue(argv, ++i, arg);
        break;
      case '--max-attempts':
        opts.config.maxAttempts = requireInt(argv, ++i, arg);
        break;
      case '--delay-ms':
        opts.config.politenessDelayMs = requireInt(argv, ++i, arg);
        break;
      case '--timeout-ms':
        opts.config.timeoutMs = requireInt(argv, ++i, arg);
        break;
      case '--verbose':
        opts.config.verbose = true;
        break;
      case '--help':
      case '-h':
        opts.help = true;
        break;
      default:
        if (!commandSeen && isCommand(arg)) {
          opts.command = arg;
          commandSeen = true;
          break;
        }
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (opts.input !== null && opts.command !== 'resolve') {
    throw new UsageError('--input is only valid with the resolve command');
  }

  return opts;
}

const HELP = `Usage: noticeboard-harvester [run|discover|resolve] [options]

  run        discover talk links and resolve their wikitext (default)
  discover   write discovered links only
  resolve    resolve links from a saved links file

Options:
  --outdir DIR  --input FILE  --seed PAGE  --max-attempts N
  --delay-ms N  --timeout-ms N  --verbose  --help`;

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

export async function main(argv: string[]): Promise<number> {
  let opts: CliOptions;
  let config: HarvesterConfig;
  try {
    opts = parseArgs(argv);
    if (opts.help) {
      console.log(HELP);
      return EXIT_OK;
    }
    config = resolveConfig(opts.config);
  } catch (error) {
    if (error instanceof UsageError || error instanceof HarvestError) {
      console.error(`Error: ${error.message}`);
      console.error(HELP);
      return EXIT_USAGE;
    }
    throw error;
  }

  const logger = createConsoleLogger(config.verbose);
  const deps = createPipelineDeps(config, { logger });

  try {
    switch (opts.command) {
      case 'run': {
        const sink = createOutputSink(config.outDir);
        await runPipeline(config, deps, sink);
        logger.info('Saved talk pages', { path: sink.path, records: sink.count() });
        break;
      }
      case 'discover': {
        const sink = createLinkSink(config.outDir);
        await discoverLinks(config, deps, sink);
        logger.info('Saved links', { path: sink.path, records: sink.count() });
        break;
      }
      case 'resolve': {
        const input = opts.input ?? datasetPath(config.outDir, 'links');
        const sink = createOutputSink(config.outDir);
        await resolveLinkRecords(readLinkEntries(input), config, deps, sink, input);
        logger.info('Saved talk pages', { path: sink.path, records: sink.count() });
        break;
      }
    }
    return EXIT_OK;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const code = error instanceof HarvestError ? error.code : 'UNEXPECTED_ERROR';
    logger.error('Run aborted', { code, error: message });
    return EXIT_FATAL;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_FATAL;
    }
  );
}
