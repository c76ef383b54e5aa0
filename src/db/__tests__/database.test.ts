/**
 * Tests for the SQLite catalog loader
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CatalogDatabase } from '../database.js';
import { StorageError } from '../../errors.js';
import type { CourseRecord } from '../../types.js';

function course(overrides: Partial<CourseRecord> = {}): CourseRecord {
  return {
    subjectCode: 'CMPSC',
    courseNumber: '121',
    title: 'Introduction to Programming Techniques',
    description: 'Design and implementation of algorithms.',
    credits: { min: 3, max: 3 },
    prerequisites: 'MATH 21 or MATH 22',
    prerequisiteCodes: [],
    crossListings: [],
    attributes: ['General Education: Quantification (GQ)'],
    sourceUrl: 'https://bulletins.example.edu/university-course-descriptions/undergraduate/cmpsc/',
    lastSeenAt: '2026-09-01T12:00:00.000Z',
    ...overrides,
  };
}

function storageError(fn: () => unknown): StorageError {
  try {
    fn();
  } catch (err) {
    if (err instanceof StorageError) return err;
    throw err;
  }
  throw new Error('expected a StorageError');
}

describe('CatalogDatabase', () => {
  let db: CatalogDatabase;

  beforeEach(() => {
    db = new CatalogDatabase(':memory:');
    db.initialize();
  });

  afterEach(() => {
    db.close();
  });

  describe('upsertCourse', () => {
    it('inserts on first observation and reads back the same record', () => {
      const record = course({ prerequisiteCodes: ['MATH 21'], crossListings: ['MATH 121'] });

      expect(db.upsertCourse(record)).toBe('inserted');
      expect(db.getCourse('CMPSC', '121')).toEqual(record);
    });

    it('leaves one row matching the second call when upserting twice', () => {
      db.upsertCourse(course());
      const second = course({
        title: 'Intro to Programming',
        credits: { min: 1, max: 4 },
        lastSeenAt: '2026-09-02T12:00:00.000Z',
      });

      expect(db.upsertCourse(second)).toBe('updated');
      expect(db.countCourses()).toBe(1);
      expect(db.getCourse('CMPSC', '121')).toEqual(second);
    });

    it('is idempotent for an identical record', () => {
      const record = course();
      db.upsertCourse(record);
      db.upsertCourse(record);

      expect(db.countCourses()).toBe(1);
      expect(db.getCourse('CMPSC', '121')).toEqual(record);
    });

    it('keeps cross-listed courses as separate rows', () => {
      db.upsertCourse(course({ subjectCode: 'CMPSC', courseNumber: '360', crossListings: ['MATH 360'] }));
      db.upsertCourse(course({ subjectCode: 'MATH', courseNumber: '360', crossListings: ['CMPSC 360'] }));

      expect(db.countCourses()).toBe(2);
    });

    it('reports constraint violations as constraint errors', () => {
      const err = storageError(() => db.upsertCourse(course({ credits: { min: 4, max: 1 } })));

      expect(err.kind).toBe('constraint');
    });
  });

  describe('commitPage', () => {
    it('counts inserts and updates for a page', () => {
      db.upsertCourse(course({ courseNumber: '121' }));

      const stats = db.commitPage([
        course({ courseNumber: '121' }),
        course({ courseNumber: '131' }),
        course({ courseNumber: '132' }),
      ]);

      expect(stats).toEqual({ inserted: 2, updated: 1 });
      expect(db.countCourses()).toBe(3);
    });

    it('rolls back the whole page when one record fails', () => {
      const err = storageError(() =>
        db.commitPage([
          course({ courseNumber: '131' }),
          course({ courseNumber: '132', credits: { min: 3, max: 1 } }),
        ])
      );

      expect(err.kind).toBe('constraint');
      expect(db.countCourses()).toBe(0);
      expect(db.getCourse('CMPSC', '131')).toBeNull();
    });

    it('never stores two rows for the same natural key', () => {
      for (let run = 0; run < 3; run++) {
        db.commitPage([
          course({ courseNumber: '121', lastSeenAt: `2026-09-0${run + 1}T00:00:00.000Z` }),
          course({ courseNumber: '121', title: 'Duplicate on the same page' }),
          course({ subjectCode: 'MATH', courseNumber: '121' }),
        ]);
      }

      expect(db.countCourses()).toBe(2);
    });

    it('fails with a connection error once the database is closed', () => {
      db.close();

      const err = storageError(() => db.commitPage([course()]));

      expect(err.kind).toBe('connection');
    });
  });

  describe('staleness', () => {
    it('finds courses not seen since a timestamp', () => {
      db.upsertCourse(course({ courseNumber: '121', lastSeenAt: '2026-01-01T00:00:00.000Z' }));
      db.upsertCourse(course({ courseNumber: '131', lastSeenAt: '2026-02-01T00:00:00.000Z' }));

      const stale = db.findStaleCourses('2026-01-15T00:00:00.000Z');

      expect(stale.map(c => c.courseNumber)).toEqual(['121']);
    });
  });

  describe('scrape runs', () => {
    it('records run start and outcome', () => {
      const id = db.startScrapeRun('2026-09-01T00:00:00.000Z');
      db.endScrapeRun(
        id,
        { pagesProcessed: 9, pagesFailed: 1, recordsInserted: 40, recordsUpdated: 2, recordsSkipped: 3 },
        'completed',
        null,
        '2026-09-01T00:05:00.000Z'
      );

      const [run] = db.getRecentScrapeRuns(1);

      expect(run.id).toBe(id);
      expect(run.status).toBe('completed');
      expect(run.startedAt.toISOString()).toBe('2026-09-01T00:00:00.000Z');
      expect(run.finishedAt?.toISOString()).toBe('2026-09-01T00:05:00.000Z');
      expect(run.counts).toEqual({
        pagesProcessed: 9,
        pagesFailed: 1,
        recordsInserted: 40,
        recordsUpdated: 2,
        recordsSkipped: 3,
      });
      expect(db.getLastCompletedRun()?.id).toBe(id);
    });

    it('ignores halted runs when looking for the last completed run', () => {
      const first = db.startScrapeRun('2026-09-01T00:00:00.000Z');
      db.endScrapeRun(first, emptyCounts(), 'completed', null, '2026-09-01T00:01:00.000Z');
      const second = db.startScrapeRun('2026-09-02T00:00:00.000Z');
      db.endScrapeRun(second, emptyCounts(), 'halted', 'connection lost', '2026-09-02T00:01:00.000Z');

      expect(db.getLastCompletedRun()?.id).toBe(first);
      expect(db.getRecentScrapeRuns(5).map(r => r.status)).toEqual(['halted', 'completed']);
    });
  });

  it('requires initialize before use', () => {
    const fresh = new CatalogDatabase(':memory:');
    try {
      const err = storageError(() => fresh.upsertCourse(course()));
      expect(err.kind).toBe('unknown');
    } finally {
      fresh.close();
    }
  });
});

function emptyCounts() {
  return { pagesProcessed: 0, pagesFailed: 0, recordsInserted: 0, recordsUpdated: 0, recordsSkipped: 0 };
}
