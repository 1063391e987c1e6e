/**
 * Discovers the earliest UTC day with upstream data when there is no local
 * baseline. A probe answers "is there at least one record in this window?";
 * strategies decide which windows to ask about.
 *
 * Probe failures (transport or API errors) abort the search. Only a `false`
 * answer is treated as "no data".
 */

import {
  DAY_MS,
  daysInUtcMonth,
  formatDateStamp,
  startOfUtcDay,
  startOfUtcMonth,
  startOfUtcYear,
  utcEpoch,
  utcYearOf,
  type TimeRange,
} from '../lib/dateUtils.js';
import { NoHistoryError } from '../lib/errors.js';
import type { PageFetcher, PageRequest } from './bybitApi.js';

/** Bounded existence query over an inclusive window. */
export type HistoryProbe = (window: TimeRange) => Promise<boolean>;

export interface ProbeSearchOptions {
  nowMs: number;
  /** Oldest year worth asking about; nothing before it is probed. */
  floorYear: number;
  label?: string;
}

export interface HistoryProbeStrategy {
  readonly name: 'calendar' | 'binary';
  /** Start of the earliest UTC day holding data. */
  findEarliest(probe: HistoryProbe, options: ProbeSearchOptions): Promise<number>;
}

function yearWindow(year: number): TimeRange {
  return { startMs: startOfUtcYear(year), endMs: startOfUtcYear(year + 1) - 1 };
}

function monthWindow(year: number, month: number): TimeRange {
  return { startMs: startOfUtcMonth(year, month), endMs: startOfUtcMonth(year, month + 1) - 1 };
}

function dayWindow(year: number, month: number, day: number): TimeRange {
  const startMs = utcEpoch(year, month, day);
  return { startMs, endMs: startMs + DAY_MS - 1 };
}

/**
 * Three-level linear scan: years backward from the current one until a miss
 * follows a hit (or the floor is reached), then months 1..12 and days 1..N of
 * the earliest year/month ascending, first hit wins. At most
 * `yearsScanned + 12 + 31` probes.
 */
export const calendarScanStrategy: HistoryProbeStrategy = {
  name: 'calendar',
  async findEarliest(probe, options) {
    const label = options.label ?? 'series';
    const currentYear = utcYearOf(options.nowMs);

    let earliestYear: number | null = null;
    for (let year = currentYear; year >= options.floorYear; year--) {
      const hit = await probe(yearWindow(year));
      console.debug(`[prober] ${label} year ${year}: ${hit ? 'data' : 'empty'}`);
      if (hit) {
        earliestYear = year;
      } else if (earliestYear !== null) {
        break;
      }
    }
    if (earliestYear === null) {
      throw new NoHistoryError(options.floorYear, label);
    }

    let earliestMonth: number | null = null;
    for (let month = 1; month <= 12; month++) {
      if (await probe(monthWindow(earliestYear, month))) {
        earliestMonth = month;
        break;
      }
    }
    if (earliestMonth === null) {
      console.warn(`[prober] ${label} year ${earliestYear} reported data but no month did`);
      throw new NoHistoryError(options.floorYear, label);
    }

    const dayCount = daysInUtcMonth(earliestYear, earliestMonth);
    for (let day = 1; day <= dayCount; day++) {
      const window = dayWindow(earliestYear, earliestMonth, day);
      if (await probe(window)) {
        console.log(`[prober] ${label} earliest data on ${formatDateStamp(window.startMs)}`);
        return window.startMs;
      }
    }
    console.warn(`[prober] ${label} month ${earliestMonth}/${earliestYear} reported data but no day did`);
    throw new NoHistoryError(options.floorYear, label);
  },
};

/**
 * Binary search over day starts between Jan 1 of the floor year and today,
 * using the monotonic predicate "data exists in [floor, end of day d]".
 * Relies on upstream history being contiguous from its first record onward.
 */
export const binarySearchStrategy: HistoryProbeStrategy = {
  name: 'binary',
  async findEarliest(probe, options) {
    const label = options.label ?? 'series';
    const floorMs = startOfUtcYear(options.floorYear);
    const todayMs = startOfUtcDay(options.nowMs);
    if (todayMs < floorMs) {
      throw new NoHistoryError(options.floorYear, label);
    }
    const existsThrough = (dayIndex: number) => probe({ startMs: floorMs, endMs: floorMs + (dayIndex + 1) * DAY_MS - 1 });

    let lo = 0;
    let hi = Math.round((todayMs - floorMs) / DAY_MS);
    if (!(await existsThrough(hi))) {
      throw new NoHistoryError(options.floorYear, label);
    }
    while (lo < hi) {
      const mid = Math.floor((lo + hi) / 2);
      if (await existsThrough(mid)) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }
    const earliestMs = floorMs + lo * DAY_MS;
    console.log(`[prober] ${label} earliest data on ${formatDateStamp(earliestMs)}`);
    return earliestMs;
  },
};

export function getProbeStrategy(name: HistoryProbeStrategy['name']): HistoryProbeStrategy {
  return name === 'binary' ? binarySearchStrategy : calendarScanStrategy;
}

/**
 * Turn a page fetcher into a probe: one single-record request per window,
 * true when the page is non-empty.
 */
export function createPageProbe(fetchPage: PageFetcher, buildRequest: (window: TimeRange) => PageRequest): HistoryProbe {
  return async (window) => {
    const page = await fetchPage(buildRequest(window));
    return page.records.length > 0;
  };
}
