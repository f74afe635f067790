/**
 * Extractor Module
 *
 * Pure transformation of an HTML document into the ordered, deduplicated set
 * of wiki pages it links to. Nothing is fetched here.
 */

import { load } from 'cheerio';
import type { PageIdentifier } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * A link resolved to an absolute wiki page
 */
export interface ExtractedReference {
  /** Canonical absolute URL: origin, article path and fragment */
  url: string;
  identifier: PageIdentifier;
  anchor: string | null;
}

/**
 * Decides whether a normalized page identifier is wanted
 */
export type ReferenceMatcher = (identifier: PageIdentifier) => boolean;

const ARTICLE_PATH = '/wiki/';

// ============================================================================
// Identifier Normalization
// ============================================================================

function safeDecode(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

/**
 * Resolve an href against the wiki base and split it into page identifier
 * and anchor.
 *
 * The identifier is the decoded title with spaces written as underscores, so
 * every spelling of a link to one page yields the same identifier. The url is
 * rebuilt from the identifier and anchor rather than copied from the href.
 *
 * Returns null for hrefs that do not point at an article on the same wiki:
 * unparseable URLs, other hosts, non-article paths, bad percent escapes and
 * empty titles.
 *
 * @example
 * normalizePageIdentifier('/wiki/Talk:Caf%c3%a9%20bar#Section_A', 'https://en.wikipedia.org')
 * // => { url: 'https://en.wikipedia.org/wiki/Talk:Caf%C3%A9_bar#Section_A',
 * //      identifier: 'Talk:Café_bar', anchor: 'Section_A' }
 */
export function normalizePageIdentifier(
  href: string,
  baseUrl: string
): ExtractedReference | null {
  let url: URL;
  let base: URL;
  try {
    base = new URL(baseUrl);
    url = new URL(href.trim(), base);
  } catch {
    return null;
  }

  if (url.hostname !== base.hostname || !url.pathname.startsWith(ARTICLE_PATH)) {
    return null;
  }

  const title = safeDecode(url.pathname.slice(ARTICLE_PATH.length));
  if (!title) {
    return null;
  }
  const identifier = title.replace(/ /g, '_');

  let anchor: string | null = null;
  const rawAnchor = url.hash.replace(/^#/, '');
  if (rawAnchor) {
    const decoded = safeDecode(rawAnchor);
    if (decoded === null) {
      return null;
    }
    anchor = decoded || null;
  }

  return {
    url: `${pageUrl(baseUrl, identifier)}${anchor ? `#${encodeURIComponent(anchor)}` : ''}`,
    identifier,
    anchor,
  };
}

/**
 * Build the article URL for a page identifier
 */
export function pageUrl(baseUrl: string, identifier: PageIdentifier): string {
  const path = identifier
    .split('/')
    .map((segment) => encodeURIComponent(segment).replace(/%3A/gi, ':'))
    .join('/');
  return `${new URL(baseUrl).origin}${ARTICLE_PATH}${path}`;
}

// ============================================================================
// Matchers
// ============================================================================

/**
 * Match pages in a namespace, e.g. `Talk:`
 */
export function namespacePrefixMatcher(prefix: string): ReferenceMatcher {
  return (identifier) => identifier.startsWith(prefix) && identifier.length > prefix.length;
}

/**
 * Match archive pages of a noticeboard: the identifier must contain both the
 * noticeboard name and the archive marker
 */
export function archiveMatcher(noticeboard: string, marker: string): ReferenceMatcher {
  return (identifier) => identifier.includes(noticeboard) && identifier.includes(marker);
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Extract matching references from an HTML document, deduplicated by
 * identifier and anchor in order of first occurrence
 */
export function extractReferences(
  html: string,
  matcher: ReferenceMatcher,
  baseUrl: string
): ExtractedReference[] {
  const $ = load(html);
  const seen = new Set<string>();
  const references: ExtractedReference[] = [];

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href');
    if (!href) {
      return;
    }

    const reference = normalizePageIdentifier(href, baseUrl);
    if (!reference || !matcher(reference.identifier)) {
      return;
    }

    const key = `${reference.identifier}#${reference.anchor ?? ''}`;
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    references.push(reference);
  });

  return references;
}

/**
 * Distinct page identifiers of a reference list, first occurrence first
 */
export function uniqueIdentifiers(references: ExtractedReference[]): PageIdentifier[] {
  return Array.from(new Set(references.map((reference) => reference.identifier)));
}
