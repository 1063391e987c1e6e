/**
 * Error taxonomy for the sync pipeline plus pure classification predicates.
 *
 * Kept in lib/ so the HTTP clients, the pagination driver and the store can
 * all depend on it without creating a lib → services dependency cycle.
 */

import type { TimeRange } from './dateUtils.js';

/** Input did not match the fixed `DDMMYYYY:HHMM` pattern (or was not a valid instant). */
export class FormatError extends Error {
  readonly input: string;

  constructor(input: string, detail?: string) {
    super(`Invalid date "${input}": expected DDMMYYYY:HHMM${detail ? ` (${detail})` : ''}`);
    this.name = 'FormatError';
    this.input = input;
  }
}

/** Network failure, timeout or unexpected HTTP status before an API envelope could be read. */
export class TransportError extends Error {
  readonly httpStatus: number | null;
  readonly timedOut: boolean;

  constructor(message: string, options: { httpStatus?: number | null; timedOut?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TransportError';
    this.httpStatus = options.httpStatus ?? null;
    this.timedOut = options.timedOut ?? false;
  }
}

/** Upstream accepted the request but rejected it at the application level (`retCode != 0`). */
export class ApiError extends Error {
  readonly retCode: number;
  readonly retMsg: string;
  readonly rateLimited: boolean;

  constructor(retCode: number, retMsg: string, options: { rateLimited?: boolean } = {}) {
    super(retMsg);
    this.name = 'ApiError';
    this.retCode = retCode;
    this.retMsg = retMsg;
    this.rateLimited = options.rateLimited ?? false;
  }
}

/** Response or persisted table does not have the expected shape. */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class NoHistoryError extends Error {
  readonly floorYear: number;

  constructor(floorYear: number, label = 'series') {
    super(`No ${label} history found between ${floorYear} and now`);
    this.name = 'NoHistoryError';
    this.floorYear = floorYear;
  }
}

export class EmptyRangeError extends Error {
  readonly range: TimeRange;

  constructor(range: TimeRange, label = 'dataset') {
    super(`No ${label} rows in range [${range.startMs}, ${range.endMs}]`);
    this.name = 'EmptyRangeError';
    this.range = range;
  }
}

/** Upstream kept handing out fresh cursors past the configured round cap. */
export class PaginationLimitError extends Error {
  readonly rounds: number;
  readonly recordsSoFar: number;

  constructor(label: string, rounds: number, recordsSoFar: number) {
    super(`${label} pagination did not terminate after ${rounds} rounds (${recordsSoFar} records so far)`);
    this.name = 'PaginationLimitError';
    this.rounds = rounds;
    this.recordsSoFar = recordsSoFar;
  }
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, an HTTP 499 status, or an error message containing "aborted" /
 * "aborterror" (case-insensitive).
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const e = err as Record<string, unknown>;
  const name = String(e.name || '');
  const message = String(e.message || err || '');
  return name === 'AbortError' || Number(e.httpStatus) === 499 || /aborted|aborterror/i.test(message);
}

/** Rate-limit rejections are the only upstream failures worth retrying in-process. */
export function isRateLimitedError(err: unknown): boolean {
  return err instanceof ApiError && err.rateLimited;
}

/** Process exit code for an error surfaced by a CLI command. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof FormatError) return 2;
  return 1;
}

export function describeError(err: unknown): string {
  if (err instanceof ApiError) return `${err.name} (retCode ${err.retCode}): ${err.retMsg}`;
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
