/**
 * Maps raw endpoint records onto canonical, typed, timestamp-sorted rows.
 * A record with a missing or non-numeric field rejects the whole batch.
 */

import { SchemaError } from '../lib/errors.js';
import type { FieldSpec, NormalizedRow, RawRecord, Series, SeriesSpec } from './seriesTypes.js';

function coerceNumber(raw: string | number): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : null;
}

function readField(record: RawRecord, field: FieldSpec, index: number, label: string): number {
  const raw = record[field.source];
  if (raw === undefined) {
    throw new SchemaError(`${label} record ${index} is missing field "${field.source}"`);
  }
  const num = coerceNumber(raw);
  if (num === null) {
    throw new SchemaError(`${label} record ${index} field "${field.source}" is not numeric: ${JSON.stringify(raw)}`);
  }
  if (field.type === 'int') {
    if (!Number.isInteger(num)) {
      throw new SchemaError(`${label} record ${index} field "${field.source}" is not an integer: ${JSON.stringify(raw)}`);
    }
  }
  return num;
}

function readTimestamp(record: RawRecord, spec: SeriesSpec, index: number): number {
  const value = readField(record, { source: spec.timestampField, column: 'timestamp', type: 'int' }, index, spec.label);
  return spec.timestampUnit === 's' ? value * 1000 : value;
}

/**
 * Sort ascending and collapse duplicate timestamps, keeping the last row seen
 * for each. The sort is stable, so "last seen" follows input order.
 */
export function sortAndDedupe(rows: NormalizedRow[]): NormalizedRow[] {
  const sorted = rows
    .map((row, order) => ({ row, order }))
    .sort((a, b) => a.row.timestampMs - b.row.timestampMs || a.order - b.order)
    .map((entry) => entry.row);
  const out: NormalizedRow[] = [];
  for (const row of sorted) {
    const last = out[out.length - 1];
    if (last && last.timestampMs === row.timestampMs) {
      out[out.length - 1] = row;
    } else {
      out.push(row);
    }
  }
  return out;
}

export function normalizeSeries(records: RawRecord[], spec: SeriesSpec): Series {
  const rows = records.map((record, index): NormalizedRow => {
    const fields: NormalizedRow['fields'] = {};
    for (const field of spec.fields) {
      fields[field.column] = readField(record, field, index, spec.label);
    }
    return { timestampMs: readTimestamp(record, spec, index), fields };
  });
  return {
    columns: spec.fields.map((field) => field.column),
    rows: sortAndDedupe(rows),
  };
}

/** Index of the first row not strictly after its predecessor, or -1 when the rows are sorted with no duplicates. */
export function findOrderBreak(rows: NormalizedRow[]): number {
  for (let i = 1; i < rows.length; i++) {
    if (rows[i].timestampMs <= rows[i - 1].timestampMs) return i;
  }
  return -1;
}

/** Keep rows with `startMs <= timestamp <= endMs`. */
export function sliceSeries(series: Series, startMs: number, endMs: number): Series {
  return {
    columns: [...series.columns],
    rows: series.rows.filter((row) => row.timestampMs >= startMs && row.timestampMs <= endMs),
  };
}
