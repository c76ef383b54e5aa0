#!/usr/bin/env node

/**
 * Bulletin Catalog Scraper - Main Entry Point
 *
 * Usage:
 *   npm start -- --subjects CMPSC,MATH     # specific subjects
 *   npm start                              # every subject on the bulletin index
 *   npm start -- --stale                   # courses missing from the last completed run
 */

import { config } from 'dotenv';
import { Command } from 'commander';
import { loadConfig } from './config.js';
import { CatalogDatabase } from './db/database.js';
import { errorMessage } from './errors.js';
import { createLoggerSink } from './events.js';
import { BulletinFetcher } from './http/fetcher.js';
import { LogLevel, logger } from './logger.js';
import { runPipeline } from './pipeline.js';
import type { RunReport, ScrapeRunStatus } from './types.js';

// Load environment variables
config();

interface CliOptions {
  subjects?: string;
  category?: string;
  baseUrl?: string;
  db?: string;
  concurrency?: string;
  delay?: string;
  stale?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('bulletin-scraper')
  .description('Scrape university bulletin course descriptions into SQLite')
  .version('1.0.0')
  .option('-s, --subjects <codes>', 'Comma-separated subject codes (default: discover all)')
  .option('-c, --category <name>', 'Bulletin category (undergraduate, graduate, ...)')
  .option('-b, --base-url <url>', 'Course descriptions base URL')
  .option('--db <path>', 'SQLite database file')
  .option('--concurrency <n>', 'Concurrent page fetches (1-4)')
  .option('--delay <ms>', 'Minimum delay between requests in ms')
  .option('--stale', 'List courses not seen in the latest completed run')
  .option('-v, --verbose', 'Verbose output');

program.parse();

const options = program.opts<CliOptions>();

function runStatus(report: RunReport): ScrapeRunStatus {
  if (report.halted) return 'halted';
  if (report.cancelled) return 'cancelled';
  return 'completed';
}

function printReport(report: RunReport): void {
  const elapsed = ((Date.parse(report.finishedAt) - Date.parse(report.startedAt)) / 1000).toFixed(1);

  logger.summary('Scraping Complete', {
    'Time elapsed': `${elapsed}s`,
    'Pages processed': report.pagesProcessed,
    'Pages failed': report.pagesFailed,
    'Records inserted': report.recordsInserted,
    'Records updated': report.recordsUpdated,
    'Records skipped': report.recordsSkipped,
    'Status': runStatus(report),
  });

  for (const failure of report.failures) {
    logger.warn('Report', `${failure.kind}: ${failure.url} - ${failure.reason}`);
  }
  for (const skip of report.skips) {
    logger.warn('Report', `skipped on ${skip.url}: ${skip.reason}`);
  }
  if (report.haltReason) {
    logger.error('Report', `Run halted: ${report.haltReason}`);
  }
}

function listStale(db: CatalogDatabase): void {
  const lastRun = db.getLastCompletedRun();
  if (!lastRun) {
    logger.info('Stale', 'No completed runs yet');
    return;
  }

  const stale = db.findStaleCourses(lastRun.startedAt.toISOString());
  logger.info('Stale', `${stale.length} courses not seen since run #${lastRun.id} (${lastRun.startedAt.toISOString()})`);
  for (const course of stale) {
    logger.info('Stale', `${course.subjectCode} ${course.courseNumber} - ${course.title} (last seen ${course.lastSeenAt})`);
  }
}

async function main(): Promise<number> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const cfg = loadConfig(process.env, {
    baseUrl: options.baseUrl,
    category: options.category,
    subjects: options.subjects,
    dbPath: options.db,
    concurrency: options.concurrency,
    delay: options.delay,
  });

  const db = new CatalogDatabase(cfg.dbPath, cfg.dbTimeoutMs);

  try {
    db.initialize();

    if (options.stale) {
      listStale(db);
      return 0;
    }

    logger.startSession('scrape');
    logger.info('Main', `Base URL: ${cfg.baseUrl}`);
    logger.info('Main', `Subjects: ${cfg.subjects.length > 0 ? cfg.subjects.join(', ') : `all (discovered)`}`);
    logger.info('Main', `Concurrency: ${cfg.concurrency}, delay: ${cfg.fetch.minDelayMs}ms`);

    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('Main', 'Interrupted: finishing in-flight pages, no new fetches');
      controller.abort();
    });

    const startedAt = new Date().toISOString();
    const runId = db.startScrapeRun(startedAt);

    let report: RunReport;
    try {
      report = await runPipeline(cfg, {
        fetcher: new BulletinFetcher(cfg.fetch),
        store: db,
        events: createLoggerSink(logger),
        signal: controller.signal,
      });
    } catch (err) {
      db.endScrapeRun(
        runId,
        { pagesProcessed: 0, pagesFailed: 0, recordsInserted: 0, recordsUpdated: 0, recordsSkipped: 0 },
        'halted',
        errorMessage(err),
        new Date().toISOString()
      );
      throw err;
    }

    printReport(report);

    if (db.isOpen) {
      db.endScrapeRun(runId, report, runStatus(report), report.haltReason, report.finishedAt);
    } else {
      logger.error('Main', `Scrape run #${runId} could not be closed: database connection lost`);
    }

    logger.info('Main', `Database: ${cfg.dbPath} (${db.isOpen ? db.countCourses() : '?'} courses)`);
    return report.halted ? 1 : 0;
  } finally {
    db.close();
    logger.flush();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Main', `Scraper error: ${errorMessage(error)}`);
    if (options.verbose && error instanceof Error) {
      console.error(error.stack);
    }
    logger.flush();
    process.exitCode = 1;
  });
