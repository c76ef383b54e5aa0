/**
 * Database Module
 * SQLite course catalog: upserts by (subject_code, course_number), one transaction per page
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';
import { StorageError, errorMessage } from '../errors.js';
import type {
  CourseRecord,
  CourseStore,
  PageCommitStats,
  RunCounts,
  ScrapeRun,
  ScrapeRunStatus,
  UpsertOutcome,
} from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// SQLite result codes that mean the database itself is gone or unusable
const CONNECTION_CODES = ['SQLITE_CANTOPEN', 'SQLITE_IOERR', 'SQLITE_NOTADB', 'SQLITE_CORRUPT'];

const stringList = z.array(z.string());
const runStatus = z.enum(['running', 'completed', 'halted', 'cancelled']);

interface CourseRow {
  id: number;
  subject_code: string;
  course_number: string;
  title: string;
  description: string;
  credits_min: number;
  credits_max: number;
  prerequisites: string;
  prerequisite_codes: string;
  cross_listings: string;
  attributes: string;
  source_url: string;
  first_seen_at: string;
  last_seen_at: string;
}

interface CourseParams {
  subject_code: string;
  course_number: string;
  title: string;
  description: string;
  credits_min: number;
  credits_max: number;
  prerequisites: string;
  prerequisite_codes: string;
  cross_listings: string;
  attributes: string;
  source_url: string;
  last_seen_at: string;
}

interface RunRow {
  id: number;
  started_at: string;
  finished_at: string | null;
  status: string;
  pages_processed: number;
  pages_failed: number;
  records_inserted: number;
  records_updated: number;
  records_skipped: number;
  error: string | null;
}

interface RunEndParams {
  id: number;
  finished_at: string;
  status: ScrapeRunStatus;
  pages_processed: number;
  pages_failed: number;
  records_inserted: number;
  records_updated: number;
  records_skipped: number;
  error: string | null;
}

function prepareStatements(db: Database.Database) {
  const findCourse = db.prepare<[string, string], CourseRow>(`
    SELECT * FROM courses WHERE subject_code = ? AND course_number = ?
  `);

  const insertCourse = db.prepare<CourseParams>(`
    INSERT INTO courses
    (subject_code, course_number, title, description, credits_min, credits_max,
     prerequisites, prerequisite_codes, cross_listings, attributes, source_url,
     first_seen_at, last_seen_at)
    VALUES (@subject_code, @course_number, @title, @description, @credits_min, @credits_max,
     @prerequisites, @prerequisite_codes, @cross_listings, @attributes, @source_url,
     @last_seen_at, @last_seen_at)
  `);

  const updateCourse = db.prepare<CourseParams>(`
    UPDATE courses SET
      title = @title,
      description = @description,
      credits_min = @credits_min,
      credits_max = @credits_max,
      prerequisites = @prerequisites,
      prerequisite_codes = @prerequisite_codes,
      cross_listings = @cross_listings,
      attributes = @attributes,
      source_url = @source_url,
      last_seen_at = @last_seen_at
    WHERE subject_code = @subject_code AND course_number = @course_number
  `);

  const upsert = (record: CourseRecord): UpsertOutcome => {
    const params = toParams(record);
    if (findCourse.get(record.subjectCode, record.courseNumber)) {
      updateCourse.run(params);
      return 'updated';
    }
    insertCourse.run(params);
    return 'inserted';
  };

  const commitPage = db.transaction((records: CourseRecord[]): PageCommitStats => {
    const stats: PageCommitStats = { inserted: 0, updated: 0 };
    for (const record of records) {
      if (upsert(record) === 'inserted') {
        stats.inserted++;
      } else {
        stats.updated++;
      }
    }
    return stats;
  });

  return {
    findCourse,
    upsert,
    commitPage,
    countCourses: db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM courses'),
    findStale: db.prepare<[string], CourseRow>(`
      SELECT * FROM courses WHERE last_seen_at < ? ORDER BY subject_code, course_number
    `),
    startRun: db.prepare<[string]>(`INSERT INTO scrape_runs (started_at, status) VALUES (?, 'running')`),
    endRun: db.prepare<RunEndParams>(`
      UPDATE scrape_runs SET
        finished_at = @finished_at,
        status = @status,
        pages_processed = @pages_processed,
        pages_failed = @pages_failed,
        records_inserted = @records_inserted,
        records_updated = @records_updated,
        records_skipped = @records_skipped,
        error = @error
      WHERE id = @id
    `),
    recentRuns: db.prepare<[number], RunRow>('SELECT * FROM scrape_runs ORDER BY id DESC LIMIT ?'),
    lastCompletedRun: db.prepare<[], RunRow>(`
      SELECT * FROM scrape_runs WHERE status = 'completed' ORDER BY id DESC LIMIT 1
    `),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

export class CatalogDatabase implements CourseStore {
  private db: Database.Database;
  private statements: Statements | null = null;

  constructor(dbPath: string = 'catalog.db', timeoutMs: number = 5000) {
    // timeout: how long a write waits on a locked database before SQLITE_BUSY
    this.db = new Database(dbPath, { timeout: timeoutMs });
    this.db.pragma('journal_mode = WAL');
  }

  /**
   * Initialize database with schema
   */
  initialize(): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.guard('initialize', () => {
      this.db.exec(schema);
      this.statements = prepareStatements(this.db);
    });
  }

  /**
   * Insert or update one course by natural key
   */
  upsertCourse(record: CourseRecord): UpsertOutcome {
    return this.guard(`upsert ${record.subjectCode} ${record.courseNumber}`, () =>
      this.requireStatements().upsert(record)
    );
  }

  /**
   * Upsert a page's records in a single transaction: all or nothing
   */
  commitPage(records: CourseRecord[]): PageCommitStats {
    return this.guard(`commit of ${records.length} records`, () =>
      this.requireStatements().commitPage(records)
    );
  }

  getCourse(subjectCode: string, courseNumber: string): CourseRecord | null {
    const row = this.guard('lookup', () =>
      this.requireStatements().findCourse.get(subjectCode, courseNumber)
    );
    return row ? toRecord(row) : null;
  }

  countCourses(): number {
    const row = this.guard('count', () => this.requireStatements().countCourses.get());
    return row?.count ?? 0;
  }

  /**
   * Courses not observed since the given timestamp (e.g. a run's start)
   */
  findStaleCourses(since: string): CourseRecord[] {
    return this.guard('stale lookup', () => this.requireStatements().findStale.all(since)).map(toRecord);
  }

  startScrapeRun(startedAt: string): number {
    const result = this.guard('start run', () => this.requireStatements().startRun.run(startedAt));
    return Number(result.lastInsertRowid);
  }

  endScrapeRun(
    id: number,
    counts: RunCounts,
    status: ScrapeRunStatus,
    error: string | null,
    finishedAt: string
  ): void {
    this.guard('end run', () => {
      this.requireStatements().endRun.run({
        id,
        finished_at: finishedAt,
        status,
        pages_processed: counts.pagesProcessed,
        pages_failed: counts.pagesFailed,
        records_inserted: counts.recordsInserted,
        records_updated: counts.recordsUpdated,
        records_skipped: counts.recordsSkipped,
        error,
      });
    });
  }

  getRecentScrapeRuns(limit: number = 5): ScrapeRun[] {
    return this.guard('recent runs', () => this.requireStatements().recentRuns.all(limit)).map(toScrapeRun);
  }

  getLastCompletedRun(): ScrapeRun | null {
    const row = this.guard('last run', () => this.requireStatements().lastCompletedRun.get());
    return row ? toScrapeRun(row) : null;
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Close database
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private requireStatements(): Statements {
    if (!this.statements) {
      throw new StorageError('unknown', 'Database not initialized; call initialize() first');
    }
    return this.statements;
  }

  private guard<T>(operation: string, fn: () => T): T {
    if (!this.db.open) {
      throw new StorageError('connection', `Database connection is closed (${operation})`);
    }
    try {
      return fn();
    } catch (err) {
      throw this.toStorageError(operation, err);
    }
  }

  private toStorageError(operation: string, err: unknown): StorageError {
    if (err instanceof StorageError) return err;

    const message = `${operation} failed: ${errorMessage(err)}`;
    if (!this.db.open) {
      return new StorageError('connection', message, { cause: err });
    }

    const code = sqliteCode(err);
    if (code?.startsWith('SQLITE_CONSTRAINT')) {
      return new StorageError('constraint', message, { cause: err });
    }
    if (code && CONNECTION_CODES.some(prefix => code.startsWith(prefix))) {
      return new StorageError('connection', message, { cause: err });
    }
    return new StorageError('unknown', message, { cause: err });
  }
}

function sqliteCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

function toParams(record: CourseRecord): CourseParams {
  return {
    subject_code: record.subjectCode,
    course_number: record.courseNumber,
    title: record.title,
    description: record.description,
    credits_min: record.credits.min,
    credits_max: record.credits.max,
    prerequisites: record.prerequisites,
    prerequisite_codes: JSON.stringify(record.prerequisiteCodes),
    cross_listings: JSON.stringify(record.crossListings),
    attributes: JSON.stringify(record.attributes),
    source_url: record.sourceUrl,
    last_seen_at: record.lastSeenAt,
  };
}

function toRecord(row: CourseRow): CourseRecord {
  return {
    subjectCode: row.subject_code,
    courseNumber: row.course_number,
    title: row.title,
    description: row.description,
    credits: { min: row.credits_min, max: row.credits_max },
    prerequisites: row.prerequisites,
    prerequisiteCodes: stringList.parse(JSON.parse(row.prerequisite_codes)),
    crossListings: stringList.parse(JSON.parse(row.cross_listings)),
    attributes: stringList.parse(JSON.parse(row.attributes)),
    sourceUrl: row.source_url,
    lastSeenAt: row.last_seen_at,
  };
}

function toScrapeRun(row: RunRow): ScrapeRun {
  return {
    id: row.id,
    startedAt: new Date(row.started_at),
    finishedAt: row.finished_at ? new Date(row.finished_at) : null,
    status: runStatus.parse(row.status),
    counts: {
      pagesProcessed: row.pages_processed,
      pagesFailed: row.pages_failed,
      recordsInserted: row.records_inserted,
      recordsUpdated: row.records_updated,
      recordsSkipped: row.records_skipped,
    },
    error: row.error,
  };
}
