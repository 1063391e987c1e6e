import test from 'node:test';
import assert from 'node:assert/strict';
import { MockAgent } from 'undici';

import { ApiError, SchemaError, TransportError } from '../server/lib/errors.js';
import { createBybitPageFetcher, toRawRecord, type PageRequest } from '../server/services/bybitApi.js';
import { KLINE_TUPLE_FIELDS } from '../server/services/datasets.js';

const ORIGIN = 'https://api.bybit.test';

function setup(): { agent: MockAgent; seenPaths: string[] } {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return { agent, seenPaths: [] };
}

function openInterestRequest(cursor: string | null = null): PageRequest {
  return {
    path: '/v5/market/open-interest',
    params: { category: 'linear', symbol: 'BTCUSDT', intervalTime: '1h', startTime: 1, endTime: 2, limit: 200 },
    cursor,
  };
}

function envelope(list: unknown[], nextPageCursor = ''): string {
  return JSON.stringify({ retCode: 0, retMsg: 'OK', result: { list, nextPageCursor } });
}

// ---------------------------------------------------------------------------
// toRawRecord
// ---------------------------------------------------------------------------

test('toRawRecord passes named records through', () => {
  const record = { openInterest: '1.5', timestamp: '1700000000000' };
  assert.equal(toRawRecord(record, undefined, 0), record);
});

test('toRawRecord zips positional records with field names', () => {
  assert.deepEqual(toRawRecord(['1700000000000', '1', '2', '0.5', '1.5', '10', '15'], KLINE_TUPLE_FIELDS, 0), {
    startTime: '1700000000000',
    open: '1',
    high: '2',
    low: '0.5',
    close: '1.5',
    volume: '10',
    turnover: '15',
  });
});

test('toRawRecord rejects short tuples and unnamed tuples', () => {
  assert.throws(() => toRawRecord(['1', '2'], KLINE_TUPLE_FIELDS, 3), SchemaError);
  assert.throws(() => toRawRecord(['1', '2'], undefined, 0), SchemaError);
});

// ---------------------------------------------------------------------------
// createBybitPageFetcher
// ---------------------------------------------------------------------------

test('fetcher returns records and the next cursor, forwarding the cursor param', async () => {
  const { agent, seenPaths } = setup();
  agent
    .get(ORIGIN)
    .intercept({
      path: (p: string) => {
        seenPaths.push(p);
        return p.startsWith('/v5/market/open-interest?');
      },
      method: 'GET',
    })
    .reply(200, envelope([{ openInterest: '100.5', timestamp: '1700000000000' }], 'page-2'));

  const fetchPage = createBybitPageFetcher({ baseUrl: ORIGIN, dispatcher: agent });
  const page = await fetchPage(openInterestRequest('page-1'));

  assert.deepEqual(page.records, [{ openInterest: '100.5', timestamp: '1700000000000' }]);
  assert.equal(page.nextCursor, 'page-2');
  const lastPath = seenPaths[seenPaths.length - 1];
  assert.ok(lastPath.includes('symbol=BTCUSDT'));
  assert.ok(lastPath.includes('intervalTime=1h'));
  assert.ok(lastPath.includes('cursor=page-1'));
  await agent.close();
});

test('fetcher maps an empty nextPageCursor to null', async () => {
  const { agent } = setup();
  agent.get(ORIGIN).intercept({ path: /^\/v5\/market\/open-interest/, method: 'GET' }).reply(200, envelope([], ''));

  const fetchPage = createBybitPageFetcher({ baseUrl: ORIGIN, dispatcher: agent });
  const page = await fetchPage(openInterestRequest());
  assert.deepEqual(page, { records: [], nextCursor: null });
  await agent.close();
});

test('fetcher zips kline tuples', async () => {
  const { agent } = setup();
  agent
    .get(ORIGIN)
    .intercept({ path: /^\/v5\/market\/kline/, method: 'GET' })
    .reply(200, envelope([['1700003600000', '2', '3', '1', '2.5', '7', '17.5']]));

  const fetchPage = createBybitPageFetcher({ baseUrl: ORIGIN, dispatcher: agent });
  const page = await fetchPage({
    path: '/v5/market/kline',
    params: { category: 'linear', symbol: 'BTCUSDT', interval: '60' },
    tupleFields: KLINE_TUPLE_FIELDS,
  });
  assert.equal(page.records[0].startTime, '1700003600000');
  assert.equal(page.records[0].close, '2.5');
  await agent.close();
});

test('fetcher surfaces a non-zero retCode as ApiError without retrying', async () => {
  const { agent } = setup();
  agent
    .get(ORIGIN)
    .intercept({ path: /^\/v5\/market\/open-interest/, method: 'GET' })
    .reply(200, JSON.stringify({ retCode: 10001, retMsg: 'params error', result: {} }));

  const fetchPage = createBybitPageFetcher({ baseUrl: ORIGIN, dispatcher: agent, rateLimitBackoffMs: 0 });
  await assert.rejects(fetchPage(openInterestRequest()), (err: unknown) => {
    assert.ok(err instanceof ApiError);
    assert.equal(err.retCode, 10001);
    assert.equal(err.retMsg, 'params error');
    assert.equal(err.rateLimited, false);
    return true;
  });
  await agent.close();
});

test('fetcher retries a throttled page and returns the next good response', async () => {
  const { agent } = setup();
  const pool = agent.get(ORIGIN);
  pool
    .intercept({ path: /^\/v5\/market\/open-interest/, method: 'GET' })
    .reply(200, JSON.stringify({ retCode: 10006, retMsg: 'Too many visits!', result: {} }));
  pool
    .intercept({ path: /^\/v5\/market\/open-interest/, method: 'GET' })
    .reply(200, envelope([{ openInterest: '5', timestamp: '1700000000000' }]));

  const fetchPage = createBybitPageFetcher({
    baseUrl: ORIGIN,
    dispatcher: agent,
    maxRateLimitRetries: 2,
    rateLimitBackoffMs: 0,
  });
  const page = await fetchPage(openInterestRequest());
  assert.deepEqual(page.records, [{ openInterest: '5', timestamp: '1700000000000' }]);
  await agent.close();
});

test('fetcher gives up after the configured number of rate-limit retries', async () => {
  const { agent } = setup();
  agent
    .get(ORIGIN)
    .intercept({ path: /^\/v5\/market\/open-interest/, method: 'GET' })
    .reply(429, 'Too Many Requests')
    .times(3);

  const fetchPage = createBybitPageFetcher({
    baseUrl: ORIGIN,
    dispatcher: agent,
    maxRateLimitRetries: 2,
    rateLimitBackoffMs: 0,
  });
  await assert.rejects(fetchPage(openInterestRequest()), (err: unknown) => {
    assert.ok(err instanceof ApiError);
    assert.equal(err.rateLimited, true);
    assert.equal(err.retCode, 429);
    return true;
  });
  await agent.close();
});

test('fetcher classifies server errors as TransportError', async () => {
  const { agent } = setup();
  agent
    .get(ORIGIN)
    .intercept({ path: /^\/v5\/market\/open-interest/, method: 'GET' })
    .reply(502, 'Bad Gateway');

  const fetchPage = createBybitPageFetcher({ baseUrl: ORIGIN, dispatcher: agent });
  await assert.rejects(fetchPage(openInterestRequest()), (err: unknown) => {
    assert.ok(err instanceof TransportError);
    assert.equal(err.httpStatus, 502);
    assert.match(err.message, /\(502\): Bad Gateway$/);
    return true;
  });
  await agent.close();
});

test('fetcher classifies connection failures as TransportError', async () => {
  const { agent } = setup();
  agent
    .get(ORIGIN)
    .intercept({ path: /^\/v5\/market\/open-interest/, method: 'GET' })
    .replyWithError(new Error('connection refused'));

  const fetchPage = createBybitPageFetcher({ baseUrl: ORIGIN, dispatcher: agent });
  await assert.rejects(fetchPage(openInterestRequest()), TransportError);
  await agent.close();
});

test('fetcher rejects bodies that are not JSON or lack a list', async () => {
  const { agent } = setup();
  const pool = agent.get(ORIGIN);
  pool.intercept({ path: /^\/v5\/market\/open-interest/, method: 'GET' }).reply(200, '<html>maintenance</html>');
  pool
    .intercept({ path: /^\/v5\/market\/open-interest/, method: 'GET' })
    .reply(200, JSON.stringify({ retCode: 0, retMsg: 'OK', result: { category: 'linear' } }));

  const fetchPage = createBybitPageFetcher({ baseUrl: ORIGIN, dispatcher: agent });
  await assert.rejects(fetchPage(openInterestRequest()), SchemaError);
  await assert.rejects(fetchPage(openInterestRequest()), SchemaError);
  await agent.close();
});
