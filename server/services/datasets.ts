/**
 * Dataset catalog: which upstream endpoint feeds each dataset, how its raw
 * records map to columns, and where it is persisted.
 */

import { FUNDING_PERIOD_MS, INTERVALS, KLINE_PAGE_LIMIT, type SyncConfig } from '../config.js';
import { HOUR_MS, type TimeRange } from '../lib/dateUtils.js';
import type { PageRequest, QueryParams } from './bybitApi.js';
import type { SeriesSpec } from './seriesTypes.js';

export const DATASET_KINDS = ['candles', 'open-interest', 'funding-rate', 'futures', 'fear-greed'] as const;

export type DatasetKind = (typeof DATASET_KINDS)[number];

export function isDatasetKind(value: string): value is DatasetKind {
  return (DATASET_KINDS as readonly string[]).includes(value);
}

export const SENTIMENT_RESAMPLE_MS = 4 * HOUR_MS;

// ---------------------------------------------------------------------------
// Series specs
// ---------------------------------------------------------------------------

export const KLINE_TUPLE_FIELDS = ['startTime', 'open', 'high', 'low', 'close', 'volume', 'turnover'] as const;

export const CANDLE_SPEC: SeriesSpec = {
  label: 'candles',
  timestampField: 'startTime',
  timestampUnit: 'ms',
  fields: [
    { source: 'open', column: 'open', type: 'float' },
    { source: 'high', column: 'high', type: 'float' },
    { source: 'low', column: 'low', type: 'float' },
    { source: 'close', column: 'close', type: 'float' },
    { source: 'volume', column: 'volume', type: 'float' },
    { source: 'turnover', column: 'turnover', type: 'float' },
  ],
};

export const OPEN_INTEREST_SPEC: SeriesSpec = {
  label: 'open-interest',
  timestampField: 'timestamp',
  timestampUnit: 'ms',
  fields: [{ source: 'openInterest', column: 'open_interest', type: 'float' }],
};

export const FUNDING_RATE_SPEC: SeriesSpec = {
  label: 'funding-rate',
  timestampField: 'fundingRateTimestamp',
  timestampUnit: 'ms',
  fields: [{ source: 'fundingRate', column: 'funding_rate', type: 'float' }],
};

export const FEAR_GREED_SPEC: SeriesSpec = {
  label: 'fear-greed',
  timestampField: 'timestamp',
  timestampUnit: 's',
  fields: [{ source: 'value', column: 'fear_greed_index', type: 'int' }],
};

// ---------------------------------------------------------------------------
// Bybit sources
// ---------------------------------------------------------------------------

export interface BybitSource {
  label: string;
  /** Expected spacing of consecutive records, used to size request windows. Denser data is caught by halving full windows. */
  periodMs: number;
  pageLimit: number;
  spec: SeriesSpec;
  /** Request for an inclusive window; pagination adds the cursor. */
  request(window: TimeRange, limit: number): PageRequest;
}

function baseParams(config: SyncConfig): QueryParams {
  return { category: config.category, symbol: config.symbol };
}

export function candleSource(config: SyncConfig): BybitSource {
  const interval = INTERVALS[config.interval];
  return {
    label: `candles ${config.symbol} ${config.interval}`,
    periodMs: interval.periodMs,
    pageLimit: KLINE_PAGE_LIMIT,
    spec: CANDLE_SPEC,
    request: (window, limit) => ({
      path: '/v5/market/kline',
      params: { ...baseParams(config), interval: interval.klineCode, start: window.startMs, end: window.endMs, limit },
      tupleFields: KLINE_TUPLE_FIELDS,
    }),
  };
}

export function openInterestSource(config: SyncConfig): BybitSource {
  const interval = INTERVALS[config.interval];
  return {
    label: `open-interest ${config.symbol} ${config.interval}`,
    periodMs: interval.periodMs,
    pageLimit: config.pageLimit,
    spec: OPEN_INTEREST_SPEC,
    request: (window, limit) => ({
      path: '/v5/market/open-interest',
      params: {
        ...baseParams(config),
        intervalTime: interval.openInterestCode,
        startTime: window.startMs,
        endTime: window.endMs,
        limit,
      },
    }),
  };
}

export function fundingRateSource(config: SyncConfig): BybitSource {
  return {
    label: `funding-rate ${config.symbol}`,
    periodMs: FUNDING_PERIOD_MS,
    pageLimit: config.pageLimit,
    spec: FUNDING_RATE_SPEC,
    request: (window, limit) => ({
      path: '/v5/market/funding/history',
      params: { ...baseParams(config), startTime: window.startMs, endTime: window.endMs, limit },
    }),
  };
}

// ---------------------------------------------------------------------------
// Persisted layout
// ---------------------------------------------------------------------------

export interface DatasetDefinition {
  kind: DatasetKind;
  fileName: string;
  columns: string[];
}

export function describeDataset(kind: DatasetKind, config: SyncConfig): DatasetDefinition {
  switch (kind) {
    case 'candles':
      return {
        kind,
        fileName: `candles_${config.symbol}_${config.interval}.csv`,
        columns: CANDLE_SPEC.fields.map((field) => field.column),
      };
    case 'open-interest':
      return { kind, fileName: `open_interest_${config.symbol}_${config.interval}.csv`, columns: ['open_interest'] };
    case 'funding-rate':
      return { kind, fileName: `funding_rate_${config.symbol}.csv`, columns: ['funding_rate'] };
    case 'futures':
      return {
        kind,
        fileName: `futures_${config.symbol}_${config.interval}.csv`,
        columns: ['open_interest', 'funding_rate'],
      };
    case 'fear-greed':
      return { kind, fileName: `fear_greed_index_${config.sentimentInterval}.csv`, columns: ['fear_greed_index'] };
  }
}
