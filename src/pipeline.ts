/**
 * Extraction-and-load pipeline
 * fetch -> parse -> normalize on a small worker pool, commits through a single writer
 *
 * Failure policy:
 * - bad record: skipped, page continues
 * - fetch/parse failure: page fails, nothing written
 * - storage failure: page rolled back, run continues
 * - lost database connection: run halts, no new pages start
 * - cancellation: requests in flight abort, unfinished pages count as remaining
 * Skips are reported only for pages that commit.
 */

import pLimit from 'p-limit';
import { CancelledError, StorageError, errorMessage, failureKind } from './errors.js';
import type { PageFetcher } from './http/fetcher.js';
import { parseCoursePage } from './parsers/courseBlockParser.js';
import { normalizeCourse } from './parsers/normalizer.js';
import { discoverSubjectUrls, subjectPageUrl } from './scrapers/subjectDiscovery.js';
import type {
  CourseRecord,
  CourseStore,
  EventSink,
  PageFailure,
  RecordSkip,
  RunReport,
  ScraperConfig,
} from './types.js';

export const MAX_CONCURRENCY = 4;

export interface PipelineDeps {
  fetcher: PageFetcher;
  store: CourseStore;
  events: EventSink;
  signal?: AbortSignal;
  now?: () => Date;
}

type PreparedPage =
  | { status: 'ready'; records: CourseRecord[]; skips: RecordSkip[] }
  | { status: 'failed'; failure: PageFailure }
  | { status: 'cancelled' };

/**
 * Run the pipeline for a configuration: explicit subjects, or every subject on the index
 */
export async function runPipeline(config: ScraperConfig, deps: PipelineDeps): Promise<RunReport> {
  const urls = config.subjects.length > 0
    ? config.subjects.map(subject => subjectPageUrl(config.baseUrl, config.category, subject))
    : await discoverSubjectUrls(deps.fetcher, config.baseUrl, deps.events, deps.signal);

  return scrapePages(urls, deps, { concurrency: config.concurrency });
}

/**
 * Scrape and load a list of subject pages
 */
export async function scrapePages(
  urls: string[],
  deps: PipelineDeps,
  options: { concurrency?: number } = {}
): Promise<RunReport> {
  const { fetcher, store, events, signal } = deps;
  const now = deps.now ?? (() => new Date());
  const concurrency = Math.min(MAX_CONCURRENCY, Math.max(1, Math.floor(options.concurrency ?? 1)));

  const fetchLimit = pLimit(concurrency);
  // One writer: commits never interleave, even with several fetch workers
  const writeLimit = pLimit(1);

  const report: RunReport = {
    startedAt: now().toISOString(),
    finishedAt: '',
    pagesProcessed: 0,
    pagesFailed: 0,
    recordsInserted: 0,
    recordsUpdated: 0,
    recordsSkipped: 0,
    failures: [],
    skips: [],
    halted: false,
    haltReason: null,
    cancelled: false,
  };
  let notStarted = 0;

  const fail = (failure: PageFailure) => {
    report.pagesFailed++;
    report.failures.push(failure);
  };

  /**
   * Fetch, parse and normalize one page. Never throws.
   */
  const preparePage = async (url: string): Promise<PreparedPage> => {
    try {
      const html = await fetcher.fetch(url, signal);
      events.emit({ type: 'page_fetched', url, bytes: Buffer.byteLength(html) });

      const blocks = parseCoursePage(html, url);
      events.emit({ type: 'page_parsed', url, count: blocks.length });

      const observedAt = now().toISOString();
      const records: CourseRecord[] = [];
      const skips: RecordSkip[] = [];

      for (const block of blocks) {
        const result = normalizeCourse(block, observedAt);
        if (!result.ok) {
          skips.push({ url, reason: result.error.message });
          events.emit({ type: 'record_skipped', url, reason: result.error.message });
          continue;
        }
        const course = `${result.record.subjectCode} ${result.record.courseNumber}`;
        for (const warning of result.warnings) {
          events.emit({ type: 'record_warning', url, course, warning });
        }
        records.push(result.record);
      }

      return { status: 'ready', records, skips };
    } catch (err) {
      if (err instanceof CancelledError) return { status: 'cancelled' };
      return { status: 'failed', failure: { url, kind: failureKind(err), reason: errorMessage(err) } };
    }
  };

  const commitPage = (url: string, records: CourseRecord[], skips: RecordSkip[]): void => {
    if (report.halted) return;

    try {
      const stats = store.commitPage(records);
      report.pagesProcessed++;
      report.recordsSkipped += skips.length;
      report.skips.push(...skips);
      report.recordsInserted += stats.inserted;
      report.recordsUpdated += stats.updated;
      events.emit({ type: 'page_committed', url, inserted: stats.inserted, updated: stats.updated });
    } catch (err) {
      const storageError = err instanceof StorageError
        ? err
        : new StorageError('unknown', errorMessage(err), { cause: err });

      fail({ url, kind: 'storage', reason: storageError.message });
      events.emit({ type: 'page_rolled_back', url, reason: storageError.message });

      if (storageError.kind === 'connection') {
        report.halted = true;
        report.haltReason = storageError.message;
        events.emit({ type: 'run_halted', reason: storageError.message });
      }
    }
  };

  const tasks = urls.map(url =>
    fetchLimit(async () => {
      if (report.halted) return;
      if (signal?.aborted) {
        notStarted++;
        return;
      }

      const page = await preparePage(url);
      if (page.status === 'cancelled') {
        notStarted++;
        return;
      }
      if (page.status === 'failed') {
        fail(page.failure);
        events.emit({ type: 'page_failed', ...page.failure });
        return;
      }

      await writeLimit(() => commitPage(url, page.records, page.skips));
    })
  );

  await Promise.all(tasks);

  if (notStarted > 0 || signal?.aborted) {
    report.cancelled = true;
    events.emit({ type: 'run_cancelled', pagesRemaining: notStarted });
  }

  report.finishedAt = now().toISOString();
  return report;
}
