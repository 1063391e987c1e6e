/**
 * Low-level JSON-over-HTTP helper shared by the Bybit and sentiment clients:
 * URL construction, one GET with a hard timeout, abort forwarding and
 * transport-error classification. Interpreting the payload is left to the
 * caller.
 */

import { Agent, fetch, type Dispatcher } from 'undici';

import { TransportError, isAbortError } from './errors.js';

export interface HttpRequestOptions {
  /** undici dispatcher; tests pass a MockAgent. */
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  signal?: AbortSignal | null;
}

export interface HttpJsonResponse {
  httpStatus: number;
  ok: boolean;
  /** Parsed JSON body, or `null` when the body is empty or not JSON. */
  payload: unknown;
  bodyText: string;
}

const DEFAULT_TIMEOUT_MS = 30_000;

let defaultDispatcher: Agent | null = null;

/** Shared keep-alive agent, created on first use. */
export function getDefaultDispatcher(): Agent {
  if (!defaultDispatcher) {
    defaultDispatcher = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 10_000,
      connect: {
        timeout: 10_000,
      },
    });
  }
  return defaultDispatcher;
}

/** Release pooled sockets so a CLI run can exit promptly. */
export async function closeDefaultDispatcher(): Promise<void> {
  if (!defaultDispatcher) return;
  const agent = defaultDispatcher;
  defaultDispatcher = null;
  await agent.close();
}

// ---------------------------------------------------------------------------
// URL building
// ---------------------------------------------------------------------------

export function buildApiUrl(
  baseUrl: string,
  path: string,
  params: Record<string, string | number | boolean | undefined | null> = {},
): string {
  const normalizedBase = baseUrl.replace(/\/+$/, '');
  const normalizedPath = String(path || '').replace(/^\/+/, '');
  const url = new URL(`${normalizedBase}/${normalizedPath}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export function parseJsonSafe(text: unknown): unknown {
  if (typeof text !== 'string' || !text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function sleep(ms: number): Promise<void> {
  const waitMs = Math.max(0, Math.ceil(Number(ms) || 0));
  if (waitMs === 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, waitMs));
}

// ---------------------------------------------------------------------------
// Core HTTP fetch
// ---------------------------------------------------------------------------

/**
 * Issue one GET and read the body. Network failures and timeouts become
 * `TransportError`; an abort requested by the caller's signal is rethrown as-is.
 * Non-2xx responses are returned so the caller can inspect the envelope.
 */
export async function fetchJson(url: string, label: string, options: HttpRequestOptions = {}): Promise<HttpJsonResponse> {
  const timeoutMs = Math.max(1, Math.floor(Number(options.timeoutMs) || DEFAULT_TIMEOUT_MS));
  const externalSignal = options.signal ?? null;
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const forwardAbort = () => controller.abort();
  if (externalSignal) {
    if (externalSignal.aborted) {
      forwardAbort();
    } else {
      externalSignal.addEventListener('abort', forwardAbort, { once: true });
    }
  }

  try {
    const resp = await fetch(url, {
      method: 'GET',
      headers: { accept: 'application/json' },
      signal: controller.signal,
      dispatcher: options.dispatcher ?? getDefaultDispatcher(),
    });
    const bodyText = await resp.text();
    return {
      httpStatus: resp.status,
      ok: resp.ok,
      payload: parseJsonSafe(bodyText),
      bodyText,
    };
  } catch (err: unknown) {
    if (timedOut) {
      throw new TransportError(`${label} request timed out after ${timeoutMs}ms`, { timedOut: true, cause: err });
    }
    if (isAbortError(err) && externalSignal?.aborted) {
      throw err;
    }
    const cause = err instanceof Error && err.cause instanceof Error ? `: ${err.cause.message}` : '';
    const message = err instanceof Error ? err.message : String(err);
    throw new TransportError(`${label} request failed: ${message}${cause}`, { cause: err });
  } finally {
    clearTimeout(timeout);
    if (externalSignal) {
      externalSignal.removeEventListener('abort', forwardAbort);
    }
  }
}
