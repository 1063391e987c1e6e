/**
 * Bybit v5 market-data page fetcher: one GET per page against a
 * parameterized endpoint, envelope validation, error classification and
 * bounded retry of rate-limit rejections.
 *
 * Callers apply their own pacing between pages; this module never loops
 * over cursors itself (see paginationDriver.ts).
 */

import type { Dispatcher } from 'undici';
import { z } from 'zod';

import { API_RATE_LIMIT_MAX_RETRIES, API_TIMEOUT_MS, BYBIT_API_BASE } from '../config.js';
import { BybitResultSchema, BybitStatusSchema, parseApiResponse, type BybitRecord } from '../lib/apiSchemas.js';
import { ApiError, SchemaError, TransportError, isRateLimitedError } from '../lib/errors.js';
import { buildApiUrl, fetchJson, sleep } from '../lib/httpClient.js';
import type { RawRecord } from './seriesTypes.js';

export type QueryParams = Record<string, string | number | undefined | null>;

export interface PageRequest {
  /** Endpoint path, e.g. `/v5/market/open-interest`. */
  path: string;
  params: QueryParams;
  cursor?: string | null;
  /** Field names for positional records (kline tuples). */
  tupleFields?: readonly string[];
}

export interface ApiPage {
  records: RawRecord[];
  /** `null` when upstream sent no (or an empty) `nextPageCursor`. */
  nextCursor: string | null;
}

export type PageFetcher = (request: PageRequest) => Promise<ApiPage>;

export interface BybitClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  maxRateLimitRetries?: number;
  /** First backoff after a rate-limit rejection; doubles per attempt. */
  rateLimitBackoffMs?: number;
  signal?: AbortSignal | null;
}

/** retCodes Bybit uses for throttling ("Too many visits", IP limit). */
const RATE_LIMIT_RET_CODES = new Set([10006, 10018]);
const RATE_LIMIT_BASE_BACKOFF_MS = 1_500;
const RATE_LIMIT_MAX_BACKOFF_MS = 30_000;

function describePath(request: PageRequest): string {
  const symbol = request.params.symbol ? ` ${request.params.symbol}` : '';
  return `${request.path}${symbol}`;
}

export function toRawRecord(item: BybitRecord, tupleFields: readonly string[] | undefined, index: number): RawRecord {
  if (!Array.isArray(item)) return item;
  if (!tupleFields || tupleFields.length === 0) {
    throw new SchemaError(`record ${index} is positional but no field names are configured`);
  }
  if (item.length < tupleFields.length) {
    throw new SchemaError(`record ${index} has ${item.length} values, expected ${tupleFields.length}`);
  }
  const record: RawRecord = {};
  tupleFields.forEach((field, i) => {
    record[field] = item[i];
  });
  return record;
}

/** Interpret one HTTP response as a Bybit page. */
function parseBybitPage(
  response: { httpStatus: number; ok: boolean; payload: unknown; bodyText: string },
  request: PageRequest,
): ApiPage {
  const label = describePath(request);
  const { httpStatus, payload } = response;

  if (httpStatus === 429 || httpStatus === 403) {
    const retMsg = extractRetMsg(payload) || `HTTP ${httpStatus} from ${label}`;
    throw new ApiError(extractRetCode(payload) ?? httpStatus, retMsg, { rateLimited: true });
  }
  if (!response.ok) {
    const details = response.bodyText.trim().slice(0, 180) || `HTTP ${httpStatus}`;
    throw new TransportError(`${label} request failed (${httpStatus}): ${details}`, { httpStatus });
  }
  if (payload === null) {
    throw new SchemaError(`${label} returned a non-JSON body`);
  }

  const status = parseApiResponse(BybitStatusSchema, payload, label);
  if (status.retCode !== 0) {
    throw new ApiError(status.retCode, status.retMsg, { rateLimited: RATE_LIMIT_RET_CODES.has(status.retCode) });
  }

  const result = parseApiResponse(BybitResultSchema, status.result, `${label} result`);
  const records = result.list.map((item, index) => toRawRecord(item, request.tupleFields, index));
  const nextCursor = result.nextPageCursor ? result.nextPageCursor : null;
  return { records, nextCursor };
}

/** Throttling responses may or may not carry a JSON envelope. */
const ThrottleEnvelopeSchema = z.object({ retCode: z.number().optional(), retMsg: z.string().optional() });

function extractRetCode(payload: unknown): number | null {
  const envelope = ThrottleEnvelopeSchema.safeParse(payload);
  return envelope.success && envelope.data.retCode !== undefined ? envelope.data.retCode : null;
}

function extractRetMsg(payload: unknown): string | null {
  const envelope = ThrottleEnvelopeSchema.safeParse(payload);
  const msg = envelope.success ? envelope.data.retMsg?.trim() : undefined;
  return msg ? msg : null;
}

/**
 * Build a `PageFetcher` bound to one base URL and transport. Each call is one
 * outbound request, plus up to `maxRateLimitRetries` repeats when upstream
 * throttles; every other failure propagates on the first attempt.
 */
export function createBybitPageFetcher(options: BybitClientOptions = {}): PageFetcher {
  const baseUrl = options.baseUrl ?? BYBIT_API_BASE;
  const maxRetries = Math.max(0, Math.floor(options.maxRateLimitRetries ?? API_RATE_LIMIT_MAX_RETRIES));
  const baseBackoffMs = Math.max(0, options.rateLimitBackoffMs ?? RATE_LIMIT_BASE_BACKOFF_MS);

  return async function fetchBybitPage(request: PageRequest): Promise<ApiPage> {
    const params: QueryParams = { ...request.params };
    if (request.cursor) params.cursor = request.cursor;
    const url = buildApiUrl(baseUrl, request.path, params);
    const label = describePath(request);

    let attempt = 0;
    while (true) {
      try {
        const response = await fetchJson(url, label, {
          dispatcher: options.dispatcher,
          timeoutMs: options.timeoutMs ?? API_TIMEOUT_MS,
          signal: options.signal,
        });
        return parseBybitPage(response, request);
      } catch (err: unknown) {
        attempt++;
        if (isRateLimitedError(err) && attempt <= maxRetries) {
          const backoffMs = Math.min(RATE_LIMIT_MAX_BACKOFF_MS, baseBackoffMs * 2 ** (attempt - 1));
          console.warn(`[bybit] ${label} rate-limited (attempt ${attempt}/${maxRetries}), retrying in ${backoffMs}ms`);
          await sleep(backoffMs);
          continue;
        }
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[bybit] ${label} page fetch failed: ${message}`);
        throw err;
      }
    }
  };
}
