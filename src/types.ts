/**
 * Bulletin Scraper Type Definitions
 */

// ============ Parser Output ============

/**
 * One course block as found on a subject page. Field-sets only differ in
 * which optional fields are present.
 */
export interface RawCourseFields {
  header?: string;          // "CMPSC 121: Introduction to Programming (3 credits)"
  code?: string;            // "CMPSC 121"
  title?: string;           // "Introduction to Programming Techniques"
  creditText?: string;      // "3 Credits", "1-12 Credits/Maximum of 12"
  description?: string;
  prerequisiteText?: string;
  crossListText?: string;
  attributes: string[];     // extra paragraphs: GenEd flags, course attributes
  sourceUrl: string;
}

// ============ Canonical Records ============

export interface CreditRange {
  min: number;
  max: number;
}

export interface CourseRecord {
  subjectCode: string;      // "CMPSC", "A B E"
  courseNumber: string;     // "121", "15S", "140H"
  title: string;
  description: string;
  credits: CreditRange;
  prerequisites: string;
  prerequisiteCodes: string[];  // ["CMPSC 121", "MATH 140"]
  crossListings: string[];
  attributes: string[];
  sourceUrl: string;
  lastSeenAt: string;       // ISO 8601
}

// ============ Scrape Runs ============

export type ScrapeRunStatus = 'running' | 'completed' | 'halted' | 'cancelled';

export interface PageCommitStats {
  inserted: number;
  updated: number;
}

export interface RunCounts {
  pagesProcessed: number;
  pagesFailed: number;
  recordsInserted: number;
  recordsUpdated: number;
  recordsSkipped: number;
}

export interface ScrapeRun {
  id: number;
  startedAt: Date;
  finishedAt: Date | null;
  status: ScrapeRunStatus;
  counts: RunCounts;
  error: string | null;
}

// ============ Pipeline ============

export type FailureKind = 'fetch' | 'parse' | 'storage' | 'unknown';

export interface PageFailure {
  url: string;
  kind: FailureKind;
  reason: string;
}

export interface RecordSkip {
  url: string;
  reason: string;
}

export interface RunReport extends RunCounts {
  startedAt: string;
  finishedAt: string;
  failures: PageFailure[];
  skips: RecordSkip[];
  halted: boolean;
  haltReason: string | null;
  cancelled: boolean;
}

export type PipelineEvent =
  | { type: 'page_fetched'; url: string; bytes: number }
  | { type: 'page_parsed'; url: string; count: number }
  | { type: 'record_skipped'; url: string; reason: string }
  | { type: 'record_warning'; url: string; course: string; warning: string }
  | { type: 'page_committed'; url: string; inserted: number; updated: number }
  | { type: 'page_rolled_back'; url: string; reason: string }
  | { type: 'page_failed'; url: string; kind: FailureKind; reason: string }
  | { type: 'run_halted'; reason: string }
  | { type: 'run_cancelled'; pagesRemaining: number };

export interface EventSink {
  emit(event: PipelineEvent): void;
}

// ============ Scraper Options ============

export interface FetchPolicy {
  maxAttempts: number;
  backoffMs: number;
  minDelayMs: number;
  jitterMs: number;
  timeoutMs: number;
  userAgent: string;
}

export interface ScraperConfig {
  baseUrl: string;          // "https://bulletins.psu.edu/university-course-descriptions/"
  category: string;         // "undergraduate", "graduate"
  subjects: string[];       // empty: discover from the index
  concurrency: number;      // 1-4 fetch/parse workers
  dbPath: string;
  dbTimeoutMs: number;
  fetch: FetchPolicy;
}

// ============ Storage ============

export type UpsertOutcome = 'inserted' | 'updated';

/**
 * The single writer: one transaction per page
 */
export interface CourseStore {
  commitPage(records: CourseRecord[]): PageCommitStats;
}
