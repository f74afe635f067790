/**
 * Shared test utilities: an in-process wiki served through an axios adapter,
 * a fake clock, and a recording logger
 */

import { jest } from '@jest/globals';
import axios, { type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { RateLimitedFetcher, linearRetryPolicy } from '../src/fetcher/index.js';
import type { Logger } from '../src/types/index.js';

export const WIKI_BASE = 'https://en.wikipedia.org';
export const API_ENDPOINT = 'https://en.wikipedia.org/w/api.php';
export const SEED_PAGE = 'Wikipedia:Dispute_resolution_noticeboard';

// ============================================================================
// HTTP stub
// ============================================================================

export interface RecordedRequest {
  url: string;
  params: Record<string, unknown>;
  userAgent: string | null;
  timeout: number | undefined;
}

export type StubReply = { status: number; body: string } | Error;

export type StubHandler = (request: RecordedRequest) => StubReply;

/**
 * Axios instance whose adapter answers from a handler instead of the network
 */
export function createStubClient(handler: StubHandler): {
  client: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const userAgent = config.headers.get('User-Agent');
      const request: RecordedRequest = {
        url: config.url ?? '',
        params: { ...(config.params ?? {}) },
        userAgent: typeof userAgent === 'string' ? userAgent : null,
        timeout: config.timeout,
      };
      requests.push(request);

      const reply = handler(request);
      if (reply instanceof Error) {
        throw reply;
      }
      return { data: reply.body, status: reply.status, statusText: '', headers: {}, config };
    },
  });
  return { client, requests };
}

/**
 * Handler that replays a fixed list of replies, repeating the last one
 */
export function sequenceHandler(replies: StubReply[]): StubHandler {
  let index = 0;
  return () => {
    const reply = replies[Math.min(index, replies.length - 1)];
    index++;
    if (!reply) {
      throw new Error('sequenceHandler needs at least one reply');
    }
    return reply;
  };
}

export function ok(body: string): StubReply {
  return { status: 200, body };
}

// ============================================================================
// Wiki fixture
// ============================================================================

export interface WikiFixture {
  /** Rendered HTML by page identifier */
  pages: Record<string, string>;
  /** Latest revision by page identifier; pages not listed are missing */
  wikitext: Record<string, { content: string; timestamp: string }>;
  /** Identifiers (documents or API titles) that always answer 503 */
  failing?: string[];
}

export function revisionBody(title: string, content: string, timestamp: string): string {
  return JSON.stringify({
    batchcomplete: true,
    query: {
      pages: [
        {
          pageid: 1,
          ns: 1,
          title,
          revisions: [{ timestamp, slots: { main: { contentmodel: 'wikitext', content } } }],
        },
      ],
    },
  });
}

export function missingBody(title: string): string {
  return JSON.stringify({
    batchcomplete: true,
    query: { pages: [{ ns: 1, title, missing: true }] },
  });
}

/**
 * Handler serving article HTML under /wiki/ and revision queries at the API
 * endpoint
 */
export function wikiHandler(fixture: WikiFixture): StubHandler {
  const failing = new Set(fixture.failing ?? []);
  return (request) => {
    if (request.url === API_ENDPOINT) {
      const title = String(request.params.titles);
      if (failing.has(title)) {
        return { status: 503, body: 'Service Unavailable' };
      }
      const revision = fixture.wikitext[title];
      return ok(revision ? revisionBody(title, revision.content, revision.timestamp) : missingBody(title));
    }

    const prefix = `${WIKI_BASE}/wiki/`;
    if (request.url.startsWith(prefix)) {
      const identifier = decodeURIComponent(request.url.slice(prefix.length));
      if (failing.has(identifier)) {
        return { status: 503, body: 'Service Unavailable' };
      }
      const html = fixture.pages[identifier];
      return html === undefined ? { status: 404, body: 'Not Found' } : ok(html);
    }

    return { status: 404, body: 'Not Found' };
  };
}

/**
 * Minimal article HTML with one anchor per href
 */
export function htmlWithLinks(hrefs: string[]): string {
  const anchors = hrefs.map((href) => `<li><a href="${href}">${href}</a></li>`).join('\n');
  return `<!DOCTYPE html><html><body><div id="content"><ul>${anchors}</ul></div></body></html>`;
}

// ============================================================================
// Clock
// ============================================================================

export interface FakeClock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
  advance(ms: number): void;
  sleeps: number[];
}

/**
 * Clock that only moves when slept on or advanced
 */
export function createFakeClock(start = 0): FakeClock {
  let time = start;
  const sleeps: number[] = [];
  return {
    now: () => time,
    sleep: async (ms) => {
      sleeps.push(ms);
      time += ms;
    },
    advance: (ms) => {
      time += ms;
    },
    sleeps,
  };
}

// ============================================================================
// Logger
// ============================================================================

/**
 * Create a mock logger for testing
 */
export function createMockLogger(): Logger & { calls: Record<keyof Logger, unknown[][]> } {
  const calls: Record<keyof Logger, unknown[][]> = {
    info: [],
    warn: [],
    error: [],
    debug: [],
  };
  return {
    calls,
    info: jest.fn((...args: unknown[]) => { calls.info.push(args); }),
    warn: jest.fn((...args: unknown[]) => { calls.warn.push(args); }),
    error: jest.fn((...args: unknown[]) => { calls.error.push(args); }),
    debug: jest.fn((...args: unknown[]) => { calls.debug.push(args); }),
  };
}

/**
 * Messages logged at one level, in order
 */
export function messages(logger: ReturnType<typeof createMockLogger>, level: keyof Logger): string[] {
  return logger.calls[level].map((args) => String(args[0]));
}

// ============================================================================
// Fetcher
// ============================================================================

export function createTestFetcher(
  handler: StubHandler,
  options: { maxAttempts?: number; baseDelayMs?: number; politenessDelayMs?: number } = {}
): {
  fetcher: RateLimitedFetcher;
  requests: RecordedRequest[];
  clock: FakeClock;
  logger: ReturnType<typeof createMockLogger>;
} {
  const { client, requests } = createStubClient(handler);
  const clock = createFakeClock();
  const logger = createMockLogger();
  const fetcher = new RateLimitedFetcher({
    userAgent: 'test-agent/1.0',
    retryPolicy: linearRetryPolicy(options.maxAttempts ?? 3, options.baseDelayMs ?? 100),
    politenessDelayMs: options.politenessDelayMs ?? 1000,
    client,
    sleep: clock.sleep,
    now: clock.now,
    logger,
  });
  return { fetcher, requests, clock, logger };
}

// ============================================================================
// Iteration
// ============================================================================

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}
