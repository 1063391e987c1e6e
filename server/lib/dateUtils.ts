/**
 * Date stamp codec and UTC calendar helpers shared by the prober, the
 * resampler and the CLI. All functions are pure.
 *
 * Every stamp is interpreted in UTC. Local time is never consulted, so the
 * same `DDMMYYYY:HHMM` text maps to the same epoch on every machine.
 */

import { FormatError } from './errors.js';

export interface TimeRange {
  startMs: number;
  endMs: number;
}

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

const DATE_STAMP_PATTERN = /^(\d{2})(\d{2})(\d{4}):(\d{2})(\d{2})$/;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

/** Number of days in `month` (1-12) of `year`. */
export function daysInUtcMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

/** `Date.UTC` maps years 0-99 onto 1900-1999; setUTCFullYear does not. */
export function utcEpoch(year: number, month: number, day: number, hour = 0, minute = 0): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, 0, 0);
  return date.getTime();
}

export function startOfUtcYear(year: number): number {
  return utcEpoch(year, 1, 1);
}

export function startOfUtcMonth(year: number, month: number): number {
  return utcEpoch(year, month, 1);
}

export function startOfUtcDay(epochMs: number): number {
  return Math.floor(epochMs / DAY_MS) * DAY_MS;
}

export function utcYearOf(epochMs: number): number {
  return new Date(epochMs).getUTCFullYear();
}

/**
 * Parse `DDMMYYYY:HHMM` (zero-padded, 24-hour clock, UTC) into epoch ms.
 * Calendar-invalid values such as 31 April or hour 24 are rejected rather
 * than rolled over into the next unit.
 */
export function parseDateStamp(text: string): number {
  const value = String(text ?? '');
  const match = value.match(DATE_STAMP_PATTERN);
  if (!match) {
    throw new FormatError(value);
  }
  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  const hour = Number(match[4]);
  const minute = Number(match[5]);

  if (month < 1 || month > 12) throw new FormatError(value, `month ${month} out of range`);
  if (day < 1 || day > daysInUtcMonth(year, month)) throw new FormatError(value, `day ${day} out of range`);
  if (hour > 23) throw new FormatError(value, `hour ${hour} out of range`);
  if (minute > 59) throw new FormatError(value, `minute ${minute} out of range`);

  return utcEpoch(year, month, day, hour, minute);
}

/** Inverse of {@link parseDateStamp}; seconds and milliseconds are truncated. */
export function formatDateStamp(epochMs: number): string {
  if (!Number.isFinite(epochMs)) {
    throw new FormatError(String(epochMs), 'not a finite epoch');
  }
  const date = new Date(epochMs);
  const year = date.getUTCFullYear();
  if (year < 0 || year > 9999) {
    throw new FormatError(String(epochMs), 'year outside 0000-9999');
  }
  return (
    `${pad2(date.getUTCDate())}${pad2(date.getUTCMonth() + 1)}${String(year).padStart(4, '0')}:` +
    `${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}`
  );
}

/** Stamp without the colon, for file names (`010120240000`). */
export function compactDateStamp(epochMs: number): string {
  return formatDateStamp(epochMs).replace(':', '');
}

export function floorToGrid(epochMs: number, periodMs: number): number {
  return Math.floor(epochMs / periodMs) * periodMs;
}

export function ceilToGrid(epochMs: number, periodMs: number): number {
  return Math.ceil(epochMs / periodMs) * periodMs;
}
