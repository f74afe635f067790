/**
 * Configuration Module
 *
 * Resolves run parameters from explicit options, environment variables and
 * defaults (in that order of precedence) and validates the result.
 *
 * Environment variables:
 * - HARVEST_USER_AGENT
 * - HARVEST_MAX_ATTEMPTS
 * - HARVEST_POLITENESS_MS
 * - HARVEST_TIMEOUT_MS
 * - HARVEST_OUT_DIR
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

const HarvesterConfigSchema = z.object({
  wikiBaseUrl: z.string().url(),
  apiEndpoint: z.string().url(),
  seedPage: z.string().min(1),
  noticeboard: z.string().min(1),
  archiveMarker: z.string().min(1),
  targetPrefix: z.string().min(1),
  userAgent: z.string().min(1),
  maxAttempts: z.number().int().min(1).max(10),
  retryBaseDelayMs: z.number().int().positive(),
  politenessDelayMs: z.number().int().min(0),
  timeoutMs: z.number().int().positive(),
  outDir: z.string().min(1),
  verbose: z.boolean(),
});

export type HarvesterConfig = z.infer<typeof HarvesterConfigSchema>;

export const DEFAULT_CONFIG: HarvesterConfig = {
  wikiBaseUrl: 'https://en.wikipedia.org',
  apiEndpoint: 'https://en.wikipedia.org/w/api.php',
  seedPage: 'Wikipedia:Dispute_resolution_noticeboard',
  noticeboard: 'Dispute_resolution_noticeboard',
  archiveMarker: 'Archive',
  targetPrefix: 'Talk:',
  userAgent: 'NoticeboardHarvester/0.1 (research dataset builder)',
  maxAttempts: 3,
  retryBaseDelayMs: 2000,
  politenessDelayMs: 1000,
  timeoutMs: 30000,
  outDir: 'data',
  verbose: false,
};

type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  // NaN is left for the schema to reject
  return Number(raw);
}

function envString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Merge options over environment over defaults and validate
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(
  options: Partial<HarvesterConfig> = {},
  env: Env = process.env
): HarvesterConfig {
  const merged = {
    ...DEFAULT_CONFIG,
    ...definedOnly({
      userAgent: envString(env, 'HARVEST_USER_AGENT'),
      maxAttempts: envInt(env, 'HARVEST_MAX_ATTEMPTS'),
      politenessDelayMs: envInt(env, 'HARVEST_POLITENESS_MS'),
      timeoutMs: envInt(env, 'HARVEST_TIMEOUT_MS'),
      outDir: envString(env, 'HARVEST_OUT_DIR'),
    }),
    ...definedOnly(options),
  };

  const parseResult = HarvesterConfigSchema.safeParse(merged);
  if (!parseResult.success) {
    throw new ConfigError(
      parseResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  return parseResult.data;
}

function definedOnly<T extends object>(values: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in values) {
    if (Object.hasOwn(values, key) && values[key] !== undefined) {
      result[key] = values[key];
    }
  }
  return result;
}
