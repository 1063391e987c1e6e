/**
 * Persisted dataset table: one CSV file per dataset, header row first,
 * ascending unique millisecond timestamps. The store is the only writer; every
 * write replaces the file through a temp file + rename so a crash never leaves
 * a half-written table behind.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

import { compactDateStamp } from '../lib/dateUtils.js';
import { EmptyRangeError, SchemaError } from '../lib/errors.js';
import { findOrderBreak, sliceSeries, sortAndDedupe } from '../services/seriesNormalizer.js';
import type { FieldValue, NormalizedRow, Series } from '../services/seriesTypes.js';

const CsvRowsSchema = z.array(z.array(z.string()));

export interface AppendResult {
  /** Timestamps that were not persisted before. */
  added: number;
  /** Incoming rows that replaced a persisted row with the same timestamp. */
  replaced: number;
  total: number;
}

export interface ExportResult {
  file: string;
  rows: number;
}

// ---------------------------------------------------------------------------
// CSV encoding
// ---------------------------------------------------------------------------

export function formatCsvCell(value: FieldValue): string {
  if (value === null) return '';
  if (typeof value === 'number') return String(value);
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function encodeCsv(series: Series): string {
  const lines = [['timestamp', ...series.columns].join(',')];
  for (const row of series.rows) {
    const cells = [String(row.timestampMs)];
    for (const column of series.columns) {
      const value = row.fields[column];
      cells.push(formatCsvCell(value === undefined ? null : value));
    }
    lines.push(cells.join(','));
  }
  return `${lines.join('\n')}\n`;
}

function parseCell(raw: string): FieldValue {
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : raw;
}

export function decodeCsv(text: string, columns: string[], label: string): Series {
  let raw: unknown;
  try {
    raw = parse(text, { skip_empty_lines: true });
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SchemaError(`${label} could not be read as a CSV table: ${message}`);
  }
  const parsed = CsvRowsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaError(`${label} could not be read as a CSV table`);
  }
  const [header, ...body] = parsed.data;
  if (!header) return { columns: [...columns], rows: [] };

  const expected = ['timestamp', ...columns];
  if (header.length !== expected.length || header.some((name, i) => name.trim() !== expected[i])) {
    throw new SchemaError(`${label} header is "${header.join(',')}", expected "${expected.join(',')}"`);
  }

  const rows = body.map((cells, index): NormalizedRow => {
    const timestampMs = Number(cells[0]);
    if (!Number.isInteger(timestampMs)) {
      throw new SchemaError(`${label} line ${index + 2} has a non-integer timestamp "${cells[0]}"`);
    }
    const fields: Record<string, FieldValue> = {};
    columns.forEach((column, i) => {
      fields[column] = parseCell(cells[i + 1] ?? '');
    });
    return { timestampMs, fields };
  });

  const orderBreak = findOrderBreak(rows);
  if (orderBreak !== -1) {
    throw new SchemaError(`${label} line ${orderBreak + 2} breaks ascending timestamp order`);
  }
  return { columns: [...columns], rows };
}

async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(tmpPath, contents, 'utf8');
    await fs.rename(tmpPath, filePath);
  } catch (err: unknown) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class DatasetStore {
  readonly filePath: string;
  readonly columns: string[];

  constructor(filePath: string, columns: string[]) {
    this.filePath = filePath;
    this.columns = [...columns];
  }

  private get label(): string {
    return path.basename(this.filePath);
  }

  /** Whole table; empty when nothing has been persisted yet. */
  async read(): Promise<Series> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (err: unknown) {
      if (isMissingFileError(err)) return { columns: [...this.columns], rows: [] };
      throw err;
    }
    return decodeCsv(text, this.columns, this.label);
  }

  async lastRow(): Promise<NormalizedRow | null> {
    const { rows } = await this.read();
    return rows.length > 0 ? rows[rows.length - 1] : null;
  }

  async lastTimestamp(): Promise<number | null> {
    const row = await this.lastRow();
    return row ? row.timestampMs : null;
  }

  /**
   * Union the persisted table with `rows`, dedupe by timestamp (incoming row
   * wins), sort, and replace the file atomically. Rows are never removed.
   */
  async append(rows: NormalizedRow[]): Promise<AppendResult> {
    for (const row of rows) {
      const unknown = Object.keys(row.fields).filter((key) => !this.columns.includes(key));
      if (unknown.length > 0) {
        throw new SchemaError(`${this.label} has no column(s) ${unknown.join(', ')}`);
      }
    }

    const existing = await this.read();
    const fileExists = await fs.access(this.filePath).then(
      () => true,
      (err: unknown) => {
        if (isMissingFileError(err)) return false;
        throw err;
      },
    );

    const persisted = new Set(existing.rows.map((row) => row.timestampMs));
    const incoming = sortAndDedupe(rows);
    const added = incoming.filter((row) => !persisted.has(row.timestampMs)).length;
    const replaced = incoming.length - added;

    if (incoming.length === 0 && fileExists) {
      return { added: 0, replaced: 0, total: existing.rows.length };
    }

    const merged = sortAndDedupe([...existing.rows, ...incoming]);
    await writeFileAtomic(this.filePath, encodeCsv({ columns: this.columns, rows: merged }));
    console.log(`[store] ${this.label}: +${added} new, ${replaced} refreshed, ${merged.length} total`);
    return { added, replaced, total: merged.length };
  }

  /** Rows with `startMs <= timestamp <= endMs`, ascending. */
  async range(startMs: number, endMs: number): Promise<Series> {
    const range = { startMs, endMs };
    if (startMs > endMs) {
      throw new EmptyRangeError(range, this.label);
    }
    const selected = sliceSeries(await this.read(), startMs, endMs);
    if (selected.rows.length === 0) {
      throw new EmptyRangeError(range, this.label);
    }
    return selected;
  }

  /** File name for a range export, derived from the dataset name and bounds. */
  exportFileName(startMs: number, endMs: number): string {
    const base = path.basename(this.filePath, path.extname(this.filePath));
    return `${base}_${compactDateStamp(startMs)}-${compactDateStamp(endMs)}.csv`;
  }

  /** Write the inclusive range to a separate file under `outDir`. */
  async exportRange(startMs: number, endMs: number, outDir: string): Promise<ExportResult> {
    const selected = await this.range(startMs, endMs);
    const file = path.join(outDir, this.exportFileName(startMs, endMs));
    await writeFileAtomic(file, encodeCsv(selected));
    console.log(`[store] exported ${selected.rows.length} rows to ${file}`);
    return { file, rows: selected.rows.length };
  }
}
