/**
 * Error types for the scrape/cache pipeline.
 *
 * Each error carries a stable `code` and the HTTP status it maps to, so the
 * web server and the CLI can report failures without inspecting messages.
 */

import { ZodError } from 'zod';

export type ErrorCode =
  | 'fetch_failed'
  | 'parse_failed'
  | 'validation_failed'
  | 'cache_failed'
  | 'source_unreachable'
  | 'config_invalid'
  | 'internal_error';

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;

  constructor(code: ErrorCode, message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/** A single results page could not be retrieved (network, timeout, blocked). */
export class FetchError extends AppError {
  constructor(readonly page: number, message: string, options?: { cause?: unknown }) {
    super('fetch_failed', message, 502, options);
  }
}

export class ParseError extends AppError {
  constructor(readonly page: number, message: string, options?: { cause?: unknown }) {
    super('parse_failed', message, 500, options);
  }
}

export class ValidationError extends AppError {
  constructor(readonly field: string, message: string) {
    super('validation_failed', message, 400);
  }
}

export class CacheError extends AppError {
  constructor(readonly operation: 'read' | 'write' | 'purge' | 'open', message: string, options?: { cause?: unknown }) {
    super('cache_failed', message, 500, options);
  }
}

/** Every configured page failed, so there is nothing to serve or cache. */
export class TotalFetchFailureError extends AppError {
  constructor(readonly pagesAttempted: number, readonly failures: FetchError[]) {
    super(
      'source_unreachable',
      `Could not retrieve any of ${pagesAttempted} result page(s)`,
      502
    );
  }
}

export class ConfigError extends AppError {
  constructor(readonly keys: string[], message: string) {
    super('config_invalid', message, 500);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert the first zod issue into a ValidationError naming the failed field.
 */
export function fromZodError(error: ZodError): ValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'input';
  return new ValidationError(field, issue ? `${field}: ${issue.message}` : 'Invalid input');
}

export interface ErrorResponse {
  status: number;
  body: Record<string, unknown>;
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return {
      status: error.statusCode,
      body: { error: error.code, field: error.field, message: error.message }
    };
  }
  if (error instanceof TotalFetchFailureError) {
    return {
      status: error.statusCode,
      body: { error: error.code, message: error.message, pages_attempted: error.pagesAttempted }
    };
  }
  return { status: 500, body: { error: 'internal_error' } };
}
