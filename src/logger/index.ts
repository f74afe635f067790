import type { Logger, Metrics } from '../types/index.js';

export type { Logger, Metrics };

function formatMeta(meta?: Record<string, unknown>): string {
  return meta ? JSON.stringify(meta) : '';
}

/**
 * Console logger. Debug lines are printed only when verbose.
 */
export function createConsoleLogger(verbose = false): Logger {
  return {
    info: (msg, meta) => console.log(`[INFO] ${msg}`, formatMeta(meta)),
    warn: (msg, meta) => console.warn(`[WARN] ${msg}`, formatMeta(meta)),
    error: (msg, meta) => console.error(`[ERROR] ${msg}`, formatMeta(meta)),
    debug: (msg, meta) => {
      if (verbose) {
        console.debug(`[DEBUG] ${msg}`, formatMeta(meta));
      }
    },
  };
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = createConsoleLogger();

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => {},
  gauge: () => {},
  timing: () => {},
};
