/**
 * Shared type definitions for raw upstream records and normalized series.
 */

/** One upstream record; shape depends on the endpoint. */
export type RawRecord = Record<string, string | number>;

/** A cell value; `null` is an empty cell (e.g. funding rate before the first fixing). */
export type FieldValue = number | string | null;

export interface NormalizedRow {
  timestampMs: number;
  fields: Record<string, FieldValue>;
}

/**
 * An ordered, timestamp-unique sequence of rows. `columns` lists the value
 * fields in output order; the `timestamp` column is implicit.
 */
export interface Series {
  columns: string[];
  rows: NormalizedRow[];
}

export type FieldType = 'float' | 'int';

export interface FieldSpec {
  /** Field name in the raw record. */
  source: string;
  /** Column name in the normalized series. */
  column: string;
  type: FieldType;
}

export interface SeriesSpec {
  label: string;
  timestampField: string;
  /** Unit of the raw timestamp; normalized series are always in ms. */
  timestampUnit: 'ms' | 's';
  fields: FieldSpec[];
}

export function emptySeries(columns: string[]): Series {
  return { columns: [...columns], rows: [] };
}
