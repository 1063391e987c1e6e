import test from 'node:test';
import assert from 'node:assert/strict';

import { USAGE, UsageError, parseCliArgs, runCli } from '../server/cli.js';
import type { SyncConfig } from '../server/config.js';
import { EmptyRangeError, FormatError } from '../server/lib/errors.js';
import type { SyncEngine, SyncReport } from '../server/orchestrators/syncOrchestrator.js';
import type { DatasetKind } from '../server/services/datasets.js';

const T0 = Date.UTC(2024, 0, 1);

interface EngineCalls {
  sync: DatasetKind[];
  exportRange: Array<[DatasetKind, number, number]>;
  probe: DatasetKind[];
  configs: SyncConfig[];
}

function fakeEngine(calls: EngineCalls, overrides: Partial<SyncEngine> = {}): (config: SyncConfig) => SyncEngine {
  return (config) => {
    calls.configs.push(config);
    return {
      async sync(kind) {
        calls.sync.push(kind);
        const report: SyncReport = {
          kind,
          file: 'data/futures_BTCUSDT_1h.csv',
          baseline: 'dataset',
          fromMs: T0,
          toMs: T0 + 3_600_000,
          fetched: 3,
          rows: 2,
          added: 2,
          total: 10,
        };
        return report;
      },
      async exportRange(kind, startMs, endMs) {
        calls.exportRange.push([kind, startMs, endMs]);
        return { file: 'exports/candles.csv', rows: 4 };
      },
      async probeEarliest(kind) {
        calls.probe.push(kind);
        return Date.UTC(2019, 11, 4);
      },
      storeFor() {
        throw new Error('storeFor is not used by the CLI');
      },
      ...overrides,
    };
  };
}

function setup(overrides: Partial<SyncEngine> = {}) {
  const calls: EngineCalls = { sync: [], exportRange: [], probe: [], configs: [] };
  const lines: string[] = [];
  return {
    calls,
    lines,
    deps: { createEngine: fakeEngine(calls, overrides), env: {}, stdout: (line: string) => void lines.push(line) },
  };
}

// ---------------------------------------------------------------------------
// parseCliArgs
// ---------------------------------------------------------------------------

test('parseCliArgs defaults the dataset to futures', () => {
  assert.deepEqual(parseCliArgs(['fetch']), { command: { name: 'fetch', dataset: 'futures' }, overrides: {} });
  assert.deepEqual(parseCliArgs(['probe', 'candles']).command, { name: 'probe', dataset: 'candles' });
});

test('parseCliArgs parses get bounds and options', () => {
  const parsed = parseCliArgs(['get', '01012024:0000', '02012024:1200', 'candles', '--symbol=ethusdt', '--data-dir=/tmp/d']);
  assert.deepEqual(parsed.command, {
    name: 'get',
    dataset: 'candles',
    startMs: T0,
    endMs: Date.UTC(2024, 0, 2, 12),
  });
  assert.deepEqual(parsed.overrides, { symbol: 'ethusdt', dataDir: '/tmp/d' });
});

test('parseCliArgs shows help for no command', () => {
  assert.deepEqual(parseCliArgs([]).command, { name: 'help' });
  assert.deepEqual(parseCliArgs(['fetch', '--help']).command, { name: 'help' });
});

test('parseCliArgs rejects bad commands, datasets and options', () => {
  assert.throws(() => parseCliArgs(['sync']), UsageError);
  assert.throws(() => parseCliArgs(['fetch', 'orders']), UsageError);
  assert.throws(() => parseCliArgs(['fetch', 'candles', 'futures']), UsageError);
  assert.throws(() => parseCliArgs(['get', '01012024:0000']), UsageError);
  assert.throws(() => parseCliArgs(['get', '02012024:0000', '01012024:0000']), UsageError);
  assert.throws(() => parseCliArgs(['fetch', '--verbose']), UsageError);
  assert.throws(() => parseCliArgs(['fetch', '--symbol']), UsageError);
  assert.throws(() => parseCliArgs(['fetch', '--toString=x']), UsageError);
});

test('parseCliArgs surfaces malformed dates as FormatError', () => {
  assert.throws(() => parseCliArgs(['get', '2024-01-01', '02012024:0000']), FormatError);
});

// ---------------------------------------------------------------------------
// runCli
// ---------------------------------------------------------------------------

test('runCli fetch syncs the dataset and prints a summary', async () => {
  const { calls, lines, deps } = setup();
  const code = await runCli(['fetch', 'futures', '--symbol=ethusdt'], deps);

  assert.equal(code, 0);
  assert.deepEqual(calls.sync, ['futures']);
  assert.equal(calls.configs[0].symbol, 'ETHUSDT');
  assert.deepEqual(lines, ['futures: +2 rows (10 total) 01012024:0000 -> 01012024:0100 in data/futures_BTCUSDT_1h.csv']);
});

test('runCli get exports the parsed range', async () => {
  const { calls, lines, deps } = setup();
  const code = await runCli(['get', '01012024:0000', '01012024:0300', 'candles'], deps);

  assert.equal(code, 0);
  assert.deepEqual(calls.exportRange, [['candles', T0, T0 + 3 * 3_600_000]]);
  assert.deepEqual(lines, ['exports/candles.csv (4 rows)']);
});

test('runCli probe prints the earliest day', async () => {
  const { calls, lines, deps } = setup();
  const code = await runCli(['probe', 'open-interest'], deps);

  assert.equal(code, 0);
  assert.deepEqual(calls.probe, ['open-interest']);
  assert.deepEqual(lines, ['open-interest: earliest data 04122019:0000']);
});

test('runCli prints usage for help', async () => {
  const { lines, deps } = setup();
  assert.equal(await runCli(['--help'], deps), 0);
  assert.deepEqual(lines, [USAGE]);
});

test('runCli exits 2 on usage and date format errors', async () => {
  const usage = setup();
  assert.equal(await runCli(['fetch', 'orders'], usage.deps), 2);
  assert.deepEqual(usage.lines, [USAGE]);

  const format = setup();
  assert.equal(await runCli(['get', '32012024:0000', '01022024:0000'], format.deps), 2);
  assert.deepEqual(format.calls.exportRange, []);
});

test('runCli exits 1 when the command fails', async () => {
  const { deps } = setup({
    async exportRange() {
      throw new EmptyRangeError({ startMs: T0, endMs: T0 }, 'candles_BTCUSDT_1h.csv');
    },
  });
  assert.equal(await runCli(['get', '01012024:0000', '01012024:0000', 'candles'], deps), 1);
});

test('runCli exits 1 on invalid configuration', async () => {
  const { calls, deps } = setup();
  assert.equal(await runCli(['fetch', '--interval=2h'], deps), 1);
  assert.deepEqual(calls.sync, []);
});
