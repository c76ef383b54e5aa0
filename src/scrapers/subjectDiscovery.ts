/**
 * Subject Discovery
 * Bulletin index -> category pages -> subject pages
 */

import { CancelledError, errorMessage, failureKind } from '../errors.js';
import type { PageFetcher } from '../http/fetcher.js';
import { parseCategoryLinks, parseSubjectLinks } from '../parsers/indexParser.js';
import type { EventSink } from '../types.js';

/**
 * Subject page URL for a subject code: "CMPSC" -> <base>/undergraduate/cmpsc/
 */
export function subjectPageUrl(baseUrl: string, category: string, subject: string): string {
  const slug = subject.toLowerCase().replace(/[\s&]+/g, '');
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return new URL(`${category}/${slug}/`, base).toString();
}

/**
 * Crawl every category on the index for subject page links.
 * A category that fails is reported and skipped; a failing index page throws.
 * Cancellation stops the crawl and returns what was found so far.
 */
export async function discoverSubjectUrls(
  fetcher: PageFetcher,
  baseUrl: string,
  events: EventSink,
  signal?: AbortSignal
): Promise<string[]> {
  let indexHtml: string;
  try {
    indexHtml = await fetcher.fetch(baseUrl, signal);
  } catch (err) {
    if (err instanceof CancelledError) return [];
    throw err;
  }
  const categories = parseCategoryLinks(indexHtml, baseUrl);

  const subjects = new Set<string>();
  for (const category of categories) {
    if (signal?.aborted) break;
    try {
      const html = await fetcher.fetch(category, signal);
      for (const link of parseSubjectLinks(html, category)) {
        subjects.add(link);
      }
    } catch (err) {
      if (err instanceof CancelledError) break;
      events.emit({ type: 'page_failed', url: category, kind: failureKind(err), reason: errorMessage(err) });
    }
  }

  return [...subjects];
}
