/**
 * Timestamp-axis merge and upsampling. Both operations are a single
 * carry-last-seen pass over ascending timestamps: a value applies from its
 * own timestamp (inclusive) onward until the next one replaces it.
 */

import { ceilToGrid, floorToGrid } from '../lib/dateUtils.js';
import type { FieldValue, NormalizedRow, Series } from './seriesTypes.js';

export interface ForwardFillOptions {
  /**
   * Values known from before the first row (e.g. the last persisted row), used
   * until the series supplies its own. Columns absent here start empty.
   */
  carry?: Record<string, FieldValue> | null;
}

function pickColumns(source: Record<string, FieldValue> | null | undefined, columns: string[]): Record<string, FieldValue> {
  const out: Record<string, FieldValue> = {};
  for (const column of columns) {
    const value = source ? source[column] : undefined;
    out[column] = value === undefined ? null : value;
  }
  return out;
}

/**
 * Rows exactly on `a`'s timestamps; each carries `a`'s fields plus the latest
 * `b` values at or before that timestamp. Timestamps only present in `b` are
 * dropped: `a` defines the grid.
 */
export function mergeForwardFill(a: Series, b: Series, options: ForwardFillOptions = {}): Series {
  const overlay = b.columns.filter((column) => !a.columns.includes(column));
  const columns = [...a.columns, ...overlay];
  let carried = pickColumns(options.carry, overlay);
  let j = 0;

  const rows = a.rows.map((row): NormalizedRow => {
    while (j < b.rows.length && b.rows[j].timestampMs <= row.timestampMs) {
      carried = pickColumns(b.rows[j].fields, overlay);
      j++;
    }
    return { timestampMs: row.timestampMs, fields: { ...row.fields, ...carried } };
  });

  return { columns, rows };
}

/**
 * Upsample onto a fixed grid from `floor(first)` to `ceil(last)` inclusive.
 * Each grid point repeats the latest row at or before it; points before the
 * first row take `carry` (or stay empty). No values are interpolated.
 */
export function resampleForwardFill(series: Series, periodMs: number, options: ForwardFillOptions = {}): Series {
  if (!(periodMs > 0)) throw new RangeError(`resample period must be positive (got ${periodMs})`);
  const columns = [...series.columns];
  if (series.rows.length === 0) return { columns, rows: [] };

  const first = floorToGrid(series.rows[0].timestampMs, periodMs);
  const last = ceilToGrid(series.rows[series.rows.length - 1].timestampMs, periodMs);

  let carried = pickColumns(options.carry, columns);
  let j = 0;
  const rows: NormalizedRow[] = [];
  for (let t = first; t <= last; t += periodMs) {
    while (j < series.rows.length && series.rows[j].timestampMs <= t) {
      carried = pickColumns(series.rows[j].fields, columns);
      j++;
    }
    rows.push({ timestampMs: t, fields: { ...carried } });
  }
  return { columns, rows };
}
