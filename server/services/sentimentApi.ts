/**
 * Crypto Fear & Greed index client. The endpoint serves the full daily
 * history in one response (`limit=0`), so there is no cursor to follow.
 */

import type { Dispatcher } from 'undici';

import { API_TIMEOUT_MS, SENTIMENT_API_URL } from '../config.js';
import { FearGreedResponseSchema, parseApiResponse } from '../lib/apiSchemas.js';
import { ApiError, SchemaError, TransportError } from '../lib/errors.js';
import { fetchJson } from '../lib/httpClient.js';
import type { RawRecord } from './seriesTypes.js';

export interface SentimentClientOptions {
  url?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  signal?: AbortSignal | null;
}

export type SentimentFetcher = () => Promise<RawRecord[]>;

const LABEL = 'fear-greed';

export async function fetchFearGreedHistory(options: SentimentClientOptions = {}): Promise<RawRecord[]> {
  const url = options.url ?? SENTIMENT_API_URL;
  try {
    const response = await fetchJson(url, LABEL, {
      dispatcher: options.dispatcher,
      timeoutMs: options.timeoutMs ?? API_TIMEOUT_MS,
      signal: options.signal,
    });
    if (!response.ok) {
      const details = response.bodyText.trim().slice(0, 180) || `HTTP ${response.httpStatus}`;
      throw new TransportError(`${LABEL} request failed (${response.httpStatus}): ${details}`, {
        httpStatus: response.httpStatus,
      });
    }
    if (response.payload === null) {
      throw new SchemaError(`${LABEL} returned a non-JSON body`);
    }
    const body = parseApiResponse(FearGreedResponseSchema, response.payload, LABEL);
    const upstreamError = body.metadata?.error;
    if (upstreamError) {
      throw new ApiError(-1, upstreamError);
    }
    console.log(`[sentiment] received ${body.data.length} daily values`);
    return body.data.map((entry) => ({ timestamp: entry.timestamp, value: entry.value }));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[sentiment] ${LABEL} fetch failed: ${message}`);
    throw err;
  }
}

export function createSentimentFetcher(options: SentimentClientOptions = {}): SentimentFetcher {
  return () => fetchFearGreedHistory(options);
}
