/**
 * Paginator Module Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { TransportExhaustedError } from '../../src/errors/index.js';
import { ArchivePaginator } from '../../src/paginator/index.js';
import {
  SEED_PAGE,
  WIKI_BASE,
  collect,
  createTestFetcher,
  htmlWithLinks,
  messages,
  wikiHandler,
  type WikiFixture,
} from '../helpers.js';

const ARCHIVE_1 = 'Wikipedia:Dispute_resolution_noticeboard/Archive_1';
const ARCHIVE_2 = 'Wikipedia:Dispute_resolution_noticeboard/Archive_2';

function createPaginator(fixture: WikiFixture) {
  const harness = createTestFetcher(wikiHandler(fixture), { maxAttempts: 2, baseDelayMs: 10 });
  const paginator = new ArchivePaginator(harness.fetcher, {
    wikiBaseUrl: WIKI_BASE,
    targetPrefix: 'Talk:',
    noticeboard: 'Dispute_resolution_noticeboard',
    archiveMarker: 'Archive',
    logger: harness.logger,
  });
  return { paginator, ...harness };
}

const seedHtml = htmlWithLinks([
  '/wiki/Talk:X#SectionA',
  `/wiki/${ARCHIVE_2}`,
  '/wiki/Talk:X#SectionB',
  `/wiki/${ARCHIVE_1}`,
  '/wiki/Talk:Y',
  `/wiki/${ARCHIVE_2}#Closed_cases`,
]);

const fixture: WikiFixture = {
  pages: {
    [SEED_PAGE]: seedHtml,
    [ARCHIVE_2]: htmlWithLinks(['/wiki/Talk:W', '/wiki/Talk:X#SectionA']),
    [ARCHIVE_1]: htmlWithLinks([
      '/wiki/Talk:Z',
      '/wiki/Wikipedia:Dispute_resolution_noticeboard/Archive_99',
    ]),
  },
  wikitext: {},
};

describe('ArchivePaginator', () => {
  describe('discoverAll', () => {
    it('yields seed links first, then each archive in discovery order', async () => {
      const { paginator } = createPaginator(fixture);

      const links = await collect(paginator.discoverAll(seedHtml));

      expect(links.map((link) => [link.sourceContext, link.targetIdentifier, link.anchor])).toEqual([
        ['seed', 'Talk:X', 'SectionA'],
        ['seed', 'Talk:X', 'SectionB'],
        ['seed', 'Talk:Y', null],
        [ARCHIVE_2, 'Talk:W', null],
        [ARCHIVE_2, 'Talk:X', 'SectionA'],
        [ARCHIVE_1, 'Talk:Z', null],
      ]);
    });

    it('numbers links monotonically across source contexts', async () => {
      const { paginator } = createPaginator(fixture);

      const links = await collect(paginator.discoverAll(seedHtml));

      expect(links.map((link) => link.discoveryOrder)).toEqual([0, 1, 2, 3, 4, 5]);
    });

    it('keeps the absolute link URL', async () => {
      const { paginator } = createPaginator(fixture);

      const [first] = await collect(paginator.discoverAll(seedHtml));

      expect(first?.url).toBe('https://en.wikipedia.org/wiki/Talk:X#SectionA');
    });

    it('fetches each archive once and does not follow archives linked from archives', async () => {
      const { paginator, requests } = createPaginator(fixture);

      await collect(paginator.discoverAll(seedHtml));

      expect(requests.map((request) => request.url)).toEqual([
        `${WIKI_BASE}/wiki/${ARCHIVE_2}`,
        `${WIKI_BASE}/wiki/${ARCHIVE_1}`,
      ]);
      expect(paginator.stats()).toEqual({
        linksDiscovered: 6,
        archivesFound: 2,
        archivesVisited: 2,
        archivesSkipped: 0,
      });
    });

    it('applies the politeness delay between archive fetches', async () => {
      const { paginator, clock } = createPaginator(fixture);

      await collect(paginator.discoverAll(seedHtml));

      expect(clock.sleeps).toEqual([1000]);
    });

    it('skips an archive that keeps failing and continues with the rest', async () => {
      const { paginator, requests, logger } = createPaginator({ ...fixture, failing: [ARCHIVE_2] });

      const links = await collect(paginator.discoverAll(seedHtml));

      expect(links.map((link) => `${link.sourceContext}|${link.targetIdentifier}`)).toEqual([
        'seed|Talk:X',
        'seed|Talk:X',
        'seed|Talk:Y',
        `${ARCHIVE_1}|Talk:Z`,
      ]);
      expect(requests).toHaveLength(3);
      expect(messages(logger, 'warn')).toContain('Skipping archive after failed fetch');
      expect(paginator.stats()).toMatchObject({ archivesVisited: 1, archivesSkipped: 1 });
    });

    it('produces nothing past the seed when it links no archives', async () => {
      const { paginator, requests } = createPaginator(fixture);

      const links = await collect(paginator.discoverAll(htmlWithLinks(['/wiki/Talk:Solo'])));

      expect(links.map((link) => link.targetIdentifier)).toEqual(['Talk:Solo']);
      expect(requests).toHaveLength(0);
    });
  });

  describe('crawl', () => {
    it('fetches the seed page before anything else', async () => {
      const { paginator, requests } = createPaginator(fixture);

      const links = await collect(paginator.crawl(SEED_PAGE));

      expect(links).toHaveLength(6);
      expect(requests[0]?.url).toBe(`${WIKI_BASE}/wiki/${SEED_PAGE}`);
      expect(requests).toHaveLength(3);
    });

    it('fails the run when the seed page cannot be fetched', async () => {
      const { paginator, logger } = createPaginator({ ...fixture, failing: [SEED_PAGE] });

      await expect(collect(paginator.crawl(SEED_PAGE))).rejects.toBeInstanceOf(TransportExhaustedError);
      expect(messages(logger, 'error')).toEqual(['Seed page could not be fetched']);
    });

    it('fails the run when the seed page does not exist', async () => {
      const { paginator } = createPaginator(fixture);

      await expect(collect(paginator.crawl('Wikipedia:No_such_board'))).rejects.toThrow(
        'failed after 2 attempt(s): HTTP 404'
      );
    });
  });
});
