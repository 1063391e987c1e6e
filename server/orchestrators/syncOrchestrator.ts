import * as path from 'path';

import type { SyncConfig } from '../config.js';
import { DatasetStore, type ExportResult } from '../data/datasetStore.js';
import { formatDateStamp, type TimeRange } from '../lib/dateUtils.js';
import { NoHistoryError, describeError } from '../lib/errors.js';
import { sleep } from '../lib/httpClient.js';
import type { PageFetcher } from '../services/bybitApi.js';
import {
  FEAR_GREED_SPEC,
  SENTIMENT_RESAMPLE_MS,
  candleSource,
  describeDataset,
  fundingRateSource,
  openInterestSource,
  type BybitSource,
  type DatasetDefinition,
  type DatasetKind,
} from '../services/datasets.js';
import { createPageProbe, getProbeStrategy, type HistoryProbeStrategy } from '../services/historyProber.js';
import { paginate, planWindows } from '../services/paginationDriver.js';
import type { SentimentFetcher } from '../services/sentimentApi.js';
import { mergeForwardFill, resampleForwardFill } from '../services/seriesMerge.js';
import { normalizeSeries, sliceSeries } from '../services/seriesNormalizer.js';
import { emptySeries, type RawRecord, type Series } from '../services/seriesTypes.js';

export interface SyncDeps {
  fetchPage: PageFetcher;
  fetchSentiment: SentimentFetcher;
  now?: () => number;
  /** Pause between pagination rounds and windows. */
  wait?: (ms: number) => Promise<void>;
  probeStrategy?: HistoryProbeStrategy;
  openStore?: (definition: DatasetDefinition, filePath: string) => DatasetStore;
}

export type BaselineSource = 'dataset' | 'config' | 'probe' | 'full-history';

export interface SyncReport {
  kind: DatasetKind;
  file: string;
  baseline: BaselineSource;
  fromMs: number;
  toMs: number;
  /** Raw records received from upstream. */
  fetched: number;
  /** Rows handed to the store after normalization/merge. */
  rows: number;
  added: number;
  total: number;
}

export interface SyncEngine {
  sync(kind: DatasetKind): Promise<SyncReport>;
  probeEarliest(kind: DatasetKind): Promise<number>;
  exportRange(kind: DatasetKind, startMs: number, endMs: number): Promise<ExportResult>;
  storeFor(kind: DatasetKind): DatasetStore;
}

interface FetchedSeries {
  series: Series;
  fetched: number;
}

/**
 * Build the incremental synchronization engine. All configuration arrives
 * through `config`; every collaborator that touches the network or the clock
 * arrives through `deps`.
 */
export function createSyncEngine(config: SyncConfig, deps: SyncDeps): SyncEngine {
  const now = deps.now ?? (() => Date.now());
  const wait = deps.wait ?? sleep;
  const probeStrategy = deps.probeStrategy ?? getProbeStrategy(config.probeStrategy);
  const openStore =
    deps.openStore ??
    ((definition: DatasetDefinition, filePath: string) => new DatasetStore(filePath, definition.columns));

  function storeFor(kind: DatasetKind): DatasetStore {
    const definition = describeDataset(kind, config);
    return openStore(definition, path.join(config.dataDir, definition.fileName));
  }

  /** Source whose history defines where a dataset can start (the grid source for `futures`). */
  function sourceFor(kind: Exclude<DatasetKind, 'fear-greed'>): BybitSource {
    switch (kind) {
      case 'candles':
        return candleSource(config);
      case 'open-interest':
      case 'futures':
        return openInterestSource(config);
      case 'funding-rate':
        return fundingRateSource(config);
    }
  }

  /**
   * Records for one inclusive window. A lone page that comes back full carried
   * no cursor, so rows beyond `limit` were cut off: halve the window and fetch
   * both halves instead.
   */
  async function fetchWindow(source: BybitSource, window: TimeRange, label: string): Promise<RawRecord[]> {
    const result = await paginate({
      label,
      delayMs: config.pageDelayMs,
      maxRounds: config.maxRounds,
      wait,
      fetchPage: (cursor) => deps.fetchPage({ ...source.request(window, source.pageLimit), cursor }),
    });
    const truncated = result.rounds === 1 && result.records.length >= source.pageLimit;
    if (!truncated || window.endMs <= window.startMs) return result.records;

    const midMs = window.startMs + Math.floor((window.endMs - window.startMs) / 2);
    console.warn(
      `[sync] ${label}: full page without a cursor, splitting ${formatDateStamp(window.startMs)} -> ${formatDateStamp(window.endMs)}`,
    );
    await wait(config.pageDelayMs);
    const head = await fetchWindow(source, { startMs: window.startMs, endMs: midMs }, label);
    await wait(config.pageDelayMs);
    const tail = await fetchWindow(source, { startMs: midMs + 1, endMs: window.endMs }, label);
    return head.concat(tail);
  }

  async function fetchBybitSeries(source: BybitSource, range: TimeRange): Promise<FetchedSeries> {
    // One period short of a full page, so a window on schedule never fills it.
    const windows = planWindows(range, (source.pageLimit - 1) * source.periodMs);
    const records: RawRecord[] = [];
    console.log(
      `[sync] ${source.label}: ${formatDateStamp(range.startMs)} -> ${formatDateStamp(range.endMs)} in ${windows.length} window(s)`,
    );
    for (let i = 0; i < windows.length; i++) {
      records.push(...(await fetchWindow(source, windows[i], `${source.label} window ${i + 1}/${windows.length}`)));
      if (i < windows.length - 1) await wait(config.pageDelayMs);
    }
    const series = sliceSeries(normalizeSeries(records, source.spec), range.startMs, range.endMs);
    console.log(`[sync] ${source.label}: ${records.length} records, ${series.rows.length} unique rows`);
    return { series, fetched: records.length };
  }

  async function fetchSentimentSeries(fromMs: number | null, toMs: number): Promise<FetchedSeries> {
    const records = await deps.fetchSentiment();
    const normalized = normalizeSeries(records, FEAR_GREED_SPEC);
    const series = sliceSeries(normalized, fromMs ?? Number.NEGATIVE_INFINITY, toMs);
    return { series, fetched: records.length };
  }

  async function probeEarliest(kind: DatasetKind): Promise<number> {
    if (kind === 'fear-greed') {
      const { series } = await fetchSentimentSeries(null, now());
      if (series.rows.length === 0) {
        throw new NoHistoryError(config.floorYear, 'fear-greed');
      }
      return series.rows[0].timestampMs;
    }
    const source = sourceFor(kind);
    const probe = createPageProbe(deps.fetchPage, (window) => source.request(window, 1));
    return probeStrategy.findEarliest(probe, { nowMs: now(), floorYear: config.floorYear, label: source.label });
  }

  async function sync(kind: DatasetKind): Promise<SyncReport> {
    const store = storeFor(kind);
    try {
      const lastRow = await store.lastRow();
      const toMs = now();

      let baseline: BaselineSource;
      let fromMs: number | null;
      if (lastRow) {
        baseline = 'dataset';
        fromMs = lastRow.timestampMs;
      } else if (config.startMs !== null) {
        baseline = 'config';
        fromMs = config.startMs;
      } else if (kind === 'fear-greed') {
        baseline = 'full-history';
        fromMs = null;
      } else {
        baseline = 'probe';
        fromMs = await probeEarliest(kind);
      }
      console.log(
        `[sync] ${kind}: resuming from ${fromMs === null ? 'start of history' : formatDateStamp(fromMs)} (${baseline})`,
      );

      let fetched: FetchedSeries;
      if (fromMs !== null && fromMs > toMs) {
        fetched = { series: emptySeries(store.columns), fetched: 0 };
      } else if (kind === 'fear-greed') {
        const daily = await fetchSentimentSeries(fromMs, toMs);
        fetched =
          config.sentimentInterval === '4h'
            ? {
                fetched: daily.fetched,
                series: resampleForwardFill(daily.series, SENTIMENT_RESAMPLE_MS, { carry: lastRow?.fields }),
              }
            : daily;
      } else if (kind === 'futures') {
        const range = { startMs: fromMs ?? 0, endMs: toMs };
        const openInterest = await fetchBybitSeries(openInterestSource(config), range);
        const funding = await fetchBybitSeries(fundingRateSource(config), range);
        fetched = {
          fetched: openInterest.fetched + funding.fetched,
          series: mergeForwardFill(openInterest.series, funding.series, { carry: lastRow?.fields }),
        };
      } else {
        fetched = await fetchBybitSeries(sourceFor(kind), { startMs: fromMs ?? 0, endMs: toMs });
      }

      const result = await store.append(fetched.series.rows);
      const firstRow = fetched.series.rows[0];
      const report: SyncReport = {
        kind,
        file: store.filePath,
        baseline,
        fromMs: fromMs ?? (firstRow ? firstRow.timestampMs : toMs),
        toMs,
        fetched: fetched.fetched,
        rows: fetched.series.rows.length,
        added: result.added,
        total: result.total,
      };
      console.log(`[sync] ${kind}: ${report.added} new rows, ${report.total} total in ${report.file}`);
      return report;
    } catch (err: unknown) {
      console.error(`[sync] ${kind} sync failed (${store.filePath}): ${describeError(err)}`);
      throw err;
    }
  }

  async function exportRange(kind: DatasetKind, startMs: number, endMs: number): Promise<ExportResult> {
    const store = storeFor(kind);
    try {
      return await store.exportRange(startMs, endMs, config.exportDir);
    } catch (err: unknown) {
      console.error(`[sync] ${kind} export failed (${store.filePath}): ${describeError(err)}`);
      throw err;
    }
  }

  return { sync, probeEarliest, exportRange, storeFor };
}
