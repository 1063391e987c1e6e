import 'dotenv/config';
import { z } from 'zod';

import { DAY_MS, HOUR_MS, MINUTE_MS, parseDateStamp } from './lib/dateUtils.js';

/** Non-negative numeric env value; unset, blank or malformed values fall back. */
function nonNegativeEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const numeric = Number(raw);
  return Number.isFinite(numeric) && numeric >= 0 ? numeric : fallback;
}

// --- Upstream ---
export const BYBIT_API_BASE = String(process.env.BYBIT_API_BASE || 'https://api.bybit.com').trim();
export const SENTIMENT_API_URL = String(process.env.SENTIMENT_API_URL || 'https://api.alternative.me/fng/?limit=0').trim();
export const API_TIMEOUT_MS = Math.max(1_000, Number(process.env.API_TIMEOUT_MS) || 30_000);
export const API_RATE_LIMIT_MAX_RETRIES = Math.floor(nonNegativeEnv('API_RATE_LIMIT_MAX_RETRIES', 3));

// --- Pagination ---
/** Largest page the open-interest and funding endpoints accept. */
export const PAGE_LIMIT_MAX = 200;
/** Kline pages are sized separately; the endpoint caps at 1000 rows. */
export const KLINE_PAGE_LIMIT = 1000;
export const PAGE_DELAY_MS = nonNegativeEnv('PAGE_DELAY_MS', 120);
export const MAX_PAGINATION_ROUNDS = Math.max(1, Number(process.env.MAX_PAGINATION_ROUNDS) || 10_000);

// --- History probing ---
/** Bybit derivatives launched in 2018; nothing older can exist upstream. */
export const HISTORY_FLOOR_YEAR = Math.max(1970, Number(process.env.HISTORY_FLOOR_YEAR) || 2018);

// --- Intervals ---
export interface IntervalSpec {
  periodMs: number;
  /** `interval` value for /v5/market/kline. */
  klineCode: string;
  /** `intervalTime` value for /v5/market/open-interest. */
  openInterestCode: string;
}

export const INTERVAL_NAMES = ['5min', '15min', '30min', '1h', '4h', '1d'] as const;

export type IntervalName = (typeof INTERVAL_NAMES)[number];

export const INTERVALS: Record<IntervalName, IntervalSpec> = {
  '5min': { periodMs: 5 * MINUTE_MS, klineCode: '5', openInterestCode: '5min' },
  '15min': { periodMs: 15 * MINUTE_MS, klineCode: '15', openInterestCode: '15min' },
  '30min': { periodMs: 30 * MINUTE_MS, klineCode: '30', openInterestCode: '30min' },
  '1h': { periodMs: HOUR_MS, klineCode: '60', openInterestCode: '1h' },
  '4h': { periodMs: 4 * HOUR_MS, klineCode: '240', openInterestCode: '4h' },
  '1d': { periodMs: DAY_MS, klineCode: 'D', openInterestCode: '1d' },
};

export function isIntervalName(value: string): value is IntervalName {
  return (INTERVAL_NAMES as readonly string[]).includes(value);
}

export const FUNDING_PERIOD_MS = 8 * HOUR_MS;

// --- Sync configuration ---

const SyncConfigSchema = z.object({
  symbol: z
    .string()
    .trim()
    .min(1)
    .transform((value) => value.toUpperCase()),
  category: z.enum(['linear', 'inverse']),
  interval: z.enum(INTERVAL_NAMES),
  sentimentInterval: z.enum(['1d', '4h']),
  startDate: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  dataDir: z.string().trim().min(1),
  exportDir: z.string().trim().min(1),
  // A full page must be told apart from a complete window, which needs room for at least two rows.
  pageLimit: z.coerce.number().int().min(2).max(PAGE_LIMIT_MAX),
  pageDelayMs: z.coerce.number().min(0),
  maxRounds: z.coerce.number().int().min(1),
  floorYear: z.coerce.number().int().min(1970),
  probeStrategy: z.enum(['calendar', 'binary']),
});

export type SyncConfigInput = z.input<typeof SyncConfigSchema>;

/** Raw override values (CLI flags, tests); validated together with the env. */
export type SyncConfigOverrides = Partial<Record<keyof SyncConfigInput, unknown>>;

/**
 * Explicit, immutable configuration handed to the sync engine at construction.
 * `basePeriodMs` is the sampling period of the configured interval.
 */
export type SyncConfig = Readonly<
  z.output<typeof SyncConfigSchema> & {
    basePeriodMs: number;
    startMs: number | null;
  }
>;

type Env = Record<string, string | undefined>;

/** Raw env values; the schema does the narrowing. */
function envDefaults(env: Env): Record<string, unknown> {
  return {
    symbol: env.SYNC_SYMBOL || 'BTCUSDT',
    category: (env.SYNC_CATEGORY || 'linear').toLowerCase(),
    interval: env.SYNC_INTERVAL || '1h',
    sentimentInterval: env.SENTIMENT_INTERVAL || '1d',
    startDate: env.SYNC_START_DATE,
    dataDir: env.DATA_DIR || 'data',
    exportDir: env.EXPORT_DIR || 'exports',
    pageLimit: env.PAGE_LIMIT || PAGE_LIMIT_MAX,
    pageDelayMs: env.PAGE_DELAY_MS ?? PAGE_DELAY_MS,
    maxRounds: env.MAX_PAGINATION_ROUNDS || MAX_PAGINATION_ROUNDS,
    floorYear: env.HISTORY_FLOOR_YEAR || HISTORY_FLOOR_YEAR,
    probeStrategy: (env.PROBE_STRATEGY || 'calendar').toLowerCase(),
  };
}

/**
 * Build a validated `SyncConfig` from environment variables, with explicit
 * overrides (CLI flags, tests) taking precedence. Throws one error listing
 * every invalid setting.
 */
export function loadSyncConfig(env: Env = process.env, overrides: SyncConfigOverrides = {}): SyncConfig {
  const result = SyncConfigSchema.safeParse({ ...envDefaults(env), ...overrides });
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid sync configuration: ${details.join('; ')}`);
  }
  const parsed = result.data;
  return Object.freeze({
    ...parsed,
    basePeriodMs: INTERVALS[parsed.interval].periodMs,
    startMs: parsed.startDate ? parseDateStamp(parsed.startDate) : null,
  });
}

// --- Startup validation ---
export function validateStartupEnvironment(env: Env = process.env): string[] {
  const warnings: string[] = [];
  const warnIfInvalidNonNegativeNumber = (name: string) => {
    const raw = env[name];
    if (raw === undefined || raw === null || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric < 0) {
      warnings.push(`${name} should be a non-negative number (received: ${String(raw)})`);
    }
  };

  const numericEnvNames = [
    'API_TIMEOUT_MS',
    'API_RATE_LIMIT_MAX_RETRIES',
    'PAGE_LIMIT',
    'PAGE_DELAY_MS',
    'MAX_PAGINATION_ROUNDS',
    'HISTORY_FLOOR_YEAR',
  ];
  numericEnvNames.forEach(warnIfInvalidNonNegativeNumber);

  const interval = env.SYNC_INTERVAL;
  if (interval && !isIntervalName(interval)) {
    warnings.push(`SYNC_INTERVAL must be one of ${INTERVAL_NAMES.join(', ')} (received: ${interval})`);
  }

  for (const warning of warnings) {
    console.warn(`[startup-env] ${warning}`);
  }
  return warnings;
}
