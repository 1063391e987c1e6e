import test from 'node:test';
import assert from 'node:assert/strict';

import type { TimeRange } from '../server/lib/dateUtils.js';
import { ApiError, NoHistoryError } from '../server/lib/errors.js';
import type { PageRequest } from '../server/services/bybitApi.js';
import {
  binarySearchStrategy,
  calendarScanStrategy,
  createPageProbe,
  getProbeStrategy,
  type HistoryProbe,
} from '../server/services/historyProber.js';

const NOW = Date.UTC(2024, 2, 10, 12);
const FLOOR_YEAR = 2018;

/** Upstream whose history starts at `firstMs` and runs to NOW. */
function thresholdProbe(firstMs: number): { probe: HistoryProbe; windows: TimeRange[] } {
  const windows: TimeRange[] = [];
  const probe: HistoryProbe = async (window) => {
    windows.push(window);
    return window.endMs >= firstMs && window.startMs <= NOW;
  };
  return { probe, windows };
}

for (const strategy of [calendarScanStrategy, binarySearchStrategy]) {
  test(`${strategy.name}: finds the UTC day of the first record`, async () => {
    const { probe } = thresholdProbe(Date.UTC(2020, 6, 15, 9, 30));
    const earliest = await strategy.findEarliest(probe, { nowMs: NOW, floorYear: FLOOR_YEAR });
    assert.equal(earliest, Date.UTC(2020, 6, 15));
  });

  test(`${strategy.name}: history starting on the floor day`, async () => {
    const { probe } = thresholdProbe(Date.UTC(FLOOR_YEAR, 0, 1));
    const earliest = await strategy.findEarliest(probe, { nowMs: NOW, floorYear: FLOOR_YEAR });
    assert.equal(earliest, Date.UTC(FLOOR_YEAR, 0, 1));
  });

  test(`${strategy.name}: history starting today`, async () => {
    const { probe } = thresholdProbe(Date.UTC(2024, 2, 10, 0, 5));
    const earliest = await strategy.findEarliest(probe, { nowMs: NOW, floorYear: FLOOR_YEAR });
    assert.equal(earliest, Date.UTC(2024, 2, 10));
  });

  test(`${strategy.name}: NoHistoryError when every probe is empty`, async () => {
    const probe: HistoryProbe = async () => false;
    await assert.rejects(strategy.findEarliest(probe, { nowMs: NOW, floorYear: FLOOR_YEAR }), NoHistoryError);
  });

  test(`${strategy.name}: probe failures abort the search`, async () => {
    const failure = new ApiError(10001, 'params error');
    let calls = 0;
    const probe: HistoryProbe = async () => {
      calls++;
      if (calls === 3) throw failure;
      return true;
    };
    await assert.rejects(
      strategy.findEarliest(probe, { nowMs: NOW, floorYear: FLOOR_YEAR }),
      (err: unknown) => err === failure,
    );
    assert.equal(calls, 3);
  });
}

test('calendar: probes years backward, then months and days forward', async () => {
  const { probe, windows } = thresholdProbe(Date.UTC(2020, 6, 15, 9, 30));
  await calendarScanStrategy.findEarliest(probe, { nowMs: NOW, floorYear: FLOOR_YEAR });

  // 2024..2019 (6 years), Jan..Jul 2020 (7 months), 1..15 Jul (15 days)
  assert.equal(windows.length, 6 + 7 + 15);
  assert.deepEqual(windows[0], { startMs: Date.UTC(2024, 0, 1), endMs: Date.UTC(2025, 0, 1) - 1 });
  assert.deepEqual(windows[5], { startMs: Date.UTC(2019, 0, 1), endMs: Date.UTC(2020, 0, 1) - 1 });
  assert.deepEqual(windows[6], { startMs: Date.UTC(2020, 0, 1), endMs: Date.UTC(2020, 1, 1) - 1 });
  assert.deepEqual(windows[windows.length - 1], {
    startMs: Date.UTC(2020, 6, 15),
    endMs: Date.UTC(2020, 6, 16) - 1,
  });
});

test('calendar: probe count stays within years + 12 + 31', async () => {
  const { probe, windows } = thresholdProbe(Date.UTC(2018, 11, 31, 23));
  await calendarScanStrategy.findEarliest(probe, { nowMs: NOW, floorYear: FLOOR_YEAR });
  const years = 2024 - FLOOR_YEAR + 1;
  assert.ok(windows.length <= years + 12 + 31, `used ${windows.length} probes`);
});

test('calendar: never probes below the floor year', async () => {
  const probe: HistoryProbe = async () => false;
  const windows: TimeRange[] = [];
  await assert.rejects(
    calendarScanStrategy.findEarliest(
      async (window) => {
        windows.push(window);
        return probe(window);
      },
      { nowMs: NOW, floorYear: FLOOR_YEAR },
    ),
    NoHistoryError,
  );
  assert.equal(windows.length, 2024 - FLOOR_YEAR + 1);
  assert.equal(windows[windows.length - 1].startMs, Date.UTC(FLOOR_YEAR, 0, 1));
});

test('getProbeStrategy selects by name', () => {
  assert.equal(getProbeStrategy('binary'), binarySearchStrategy);
  assert.equal(getProbeStrategy('calendar'), calendarScanStrategy);
});

test('createPageProbe asks for one record per window', async () => {
  const requests: PageRequest[] = [];
  const probe = createPageProbe(
    async (request) => {
      requests.push(request);
      return { records: request.params.startTime === 0 ? [] : [{ timestamp: '1' }], nextCursor: null };
    },
    (window) => ({ path: '/v5/market/open-interest', params: { startTime: window.startMs, endTime: window.endMs, limit: 1 } }),
  );

  assert.equal(await probe({ startMs: 0, endMs: 10 }), false);
  assert.equal(await probe({ startMs: 11, endMs: 20 }), true);
  assert.deepEqual(requests[1].params, { startTime: 11, endTime: 20, limit: 1 });
});
