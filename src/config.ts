/**
 * Configuration
 * Environment (.env) validated with zod; CLI flags override individual values
 */

import { z } from 'zod';
import { DEFAULT_FETCH_POLICY } from './http/fetcher.js';
import { MAX_CONCURRENCY } from './pipeline.js';
import type { ScraperConfig } from './types.js';

export const DEFAULT_BASE_URL = 'https://bulletins.psu.edu/university-course-descriptions/';

const envSchema = z.object({
  BULLETIN_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  BULLETIN_CATEGORY: z.string().min(1).default('undergraduate'),
  BULLETIN_SUBJECTS: z.string().default(''),
  SCRAPER_DB_PATH: z.string().min(1).default('catalog.db'),
  SCRAPER_CONCURRENCY: z.coerce.number().int().min(1).max(MAX_CONCURRENCY).default(1),
  SCRAPER_MIN_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_FETCH_POLICY.minDelayMs),
  SCRAPER_JITTER_MS: z.coerce.number().int().min(0).default(DEFAULT_FETCH_POLICY.jitterMs),
  SCRAPER_BACKOFF_MS: z.coerce.number().int().min(0).default(DEFAULT_FETCH_POLICY.backoffMs),
  SCRAPER_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(DEFAULT_FETCH_POLICY.maxAttempts),
  SCRAPER_TIMEOUT_MS: z.coerce.number().int().min(1).default(DEFAULT_FETCH_POLICY.timeoutMs),
  SCRAPER_DB_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  SCRAPER_USER_AGENT: z.string().min(1).default(DEFAULT_FETCH_POLICY.userAgent),
});

export interface ConfigOverrides {
  baseUrl?: string;
  category?: string;
  subjects?: string;
  dbPath?: string;
  concurrency?: string;
  delay?: string;
}

export function parseSubjectList(value: string): string[] {
  const subjects = value
    .split(',')
    .map(s => s.replace(/\s+/g, ' ').trim().toUpperCase())
    .filter(s => s.length > 0);
  return [...new Set(subjects)];
}

/**
 * Build the scraper configuration from environment variables and CLI overrides
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): ScraperConfig {
  const merged: Record<string, string | undefined> = {
    ...withoutBlanks(env),
    ...withoutBlanks({
      BULLETIN_BASE_URL: overrides.baseUrl,
      BULLETIN_CATEGORY: overrides.category,
      BULLETIN_SUBJECTS: overrides.subjects,
      SCRAPER_DB_PATH: overrides.dbPath,
      SCRAPER_CONCURRENCY: overrides.concurrency,
      SCRAPER_MIN_DELAY_MS: overrides.delay,
    }),
  };

  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    const errs = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${errs}`);
  }

  const cfg = parsed.data;
  return {
    baseUrl: cfg.BULLETIN_BASE_URL,
    category: cfg.BULLETIN_CATEGORY,
    subjects: parseSubjectList(cfg.BULLETIN_SUBJECTS),
    concurrency: cfg.SCRAPER_CONCURRENCY,
    dbPath: cfg.SCRAPER_DB_PATH,
    dbTimeoutMs: cfg.SCRAPER_DB_TIMEOUT_MS,
    fetch: {
      maxAttempts: cfg.SCRAPER_MAX_ATTEMPTS,
      backoffMs: cfg.SCRAPER_BACKOFF_MS,
      minDelayMs: cfg.SCRAPER_MIN_DELAY_MS,
      jitterMs: cfg.SCRAPER_JITTER_MS,
      timeoutMs: cfg.SCRAPER_TIMEOUT_MS,
      userAgent: cfg.SCRAPER_USER_AGENT,
    },
  };
}

function withoutBlanks(values: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}
