/**
 * Cursor-follow pagination as an explicit state machine.
 *
 *   state    { cursor, accumulated, rounds }
 *   round    fetch page(cursor)
 *            empty page                     → exhausted-empty
 *            append; cursor absent/repeated → exhausted-dup
 *            adopt cursor, wait, next round
 *   cap      rounds == maxRounds            → PaginationLimitError
 *
 * Any failure propagates immediately; nothing accumulated is returned.
 */

import { PaginationLimitError } from '../lib/errors.js';
import type { TimeRange } from '../lib/dateUtils.js';
import { sleep } from '../lib/httpClient.js';
import type { ApiPage } from './bybitApi.js';
import type { RawRecord } from './seriesTypes.js';

export type PaginationTerminal = 'exhausted-empty' | 'exhausted-dup';

export interface PaginationState {
  cursor: string | null;
  accumulated: RawRecord[];
  rounds: number;
}

export type PaginationStep =
  | { done: false; state: PaginationState }
  | { done: true; state: PaginationState; terminal: PaginationTerminal };

export interface PaginationOptions {
  /** Fetch one page; `cursor` is `null` on the first round. */
  fetchPage: (cursor: string | null) => Promise<ApiPage>;
  label?: string;
  /** Pause between rounds (not after the last one). */
  delayMs?: number;
  maxRounds?: number;
  /** Injected for tests. */
  wait?: (ms: number) => Promise<void>;
}

export interface PaginationResult {
  records: RawRecord[];
  rounds: number;
  terminal: PaginationTerminal;
}

const DEFAULT_MAX_ROUNDS = 10_000;

export function initialPaginationState(): PaginationState {
  return { cursor: null, accumulated: [], rounds: 0 };
}

/** Pure transition: fold one fetched page into the state. */
export function advancePagination(state: PaginationState, page: ApiPage): PaginationStep {
  const rounds = state.rounds + 1;
  if (page.records.length === 0) {
    return { done: true, terminal: 'exhausted-empty', state: { ...state, rounds } };
  }
  const accumulated = state.accumulated.concat(page.records);
  if (!page.nextCursor || page.nextCursor === state.cursor) {
    return { done: true, terminal: 'exhausted-dup', state: { cursor: state.cursor, accumulated, rounds } };
  }
  return { done: false, state: { cursor: page.nextCursor, accumulated, rounds } };
}

export async function paginate(options: PaginationOptions): Promise<PaginationResult> {
  const label = options.label ?? 'pagination';
  const maxRounds = Math.max(1, Math.floor(options.maxRounds ?? DEFAULT_MAX_ROUNDS));
  const delayMs = Math.max(0, options.delayMs ?? 0);
  const wait = options.wait ?? sleep;

  let state = initialPaginationState();
  while (true) {
    const page = await options.fetchPage(state.cursor);
    const step = advancePagination(state, page);
    state = step.state;
    if (step.done) {
      console.debug(`[pagination] ${label} ${step.terminal} after ${state.rounds} round(s), ${state.accumulated.length} records`);
      return { records: state.accumulated, rounds: state.rounds, terminal: step.terminal };
    }
    console.debug(`[pagination] ${label} page ${state.rounds}: ${page.records.length} records | total ${state.accumulated.length}`);
    if (state.rounds >= maxRounds) {
      console.error(`[pagination] ${label} hit the ${maxRounds}-round cap with ${state.accumulated.length} records`);
      throw new PaginationLimitError(label, state.rounds, state.accumulated.length);
    }
    await wait(delayMs);
  }
}

/**
 * Split an inclusive range into contiguous inclusive windows of at most
 * `stepMs` each, ascending. Used for endpoints that cap rows per request
 * without handing out a cursor.
 */
export function planWindows(range: TimeRange, stepMs: number): TimeRange[] {
  if (!(stepMs > 0)) throw new RangeError(`window step must be positive (got ${stepMs})`);
  if (range.startMs > range.endMs) return [];
  const windows: TimeRange[] = [];
  let start = range.startMs;
  while (start <= range.endMs) {
    const end = Math.min(range.endMs, start + stepMs - 1);
    windows.push({ startMs: start, endMs: end });
    start = end + 1;
  }
  return windows;
}
