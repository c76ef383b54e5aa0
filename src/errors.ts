/**
 * Scraper error taxonomy
 *
 * - FetchError: network or HTTP failure for one URL (transient or permanent)
 * - ParseError: page layout not recognized at the top level
 * - ValidationError: one course record cannot be normalized (skipped)
 * - StorageError: database failure while committing a page
 * - CancelledError: the run was cancelled before or during a request
 */

import type { FailureKind } from './types.js';

export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends ScraperError {
  constructor(
    readonly url: string,
    message: string,
    readonly transient: boolean,
    readonly attempts: number,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ParseError extends ScraperError {
  constructor(readonly url: string, message: string) {
    super(message);
  }
}

export class ValidationError extends ScraperError {
  constructor(readonly field: string, message: string) {
    super(message);
  }
}

export class CancelledError extends ScraperError {
  constructor(readonly url: string) {
    super(`GET ${url} cancelled`);
  }
}

export type StorageErrorKind = 'connection' | 'constraint' | 'unknown';

export class StorageError extends ScraperError {
  constructor(readonly kind: StorageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function failureKind(err: unknown): FailureKind {
  if (err instanceof FetchError) return 'fetch';
  if (err instanceof ParseError) return 'parse';
  if (err instanceof StorageError) return 'storage';
  return 'unknown';
}
