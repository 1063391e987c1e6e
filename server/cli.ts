/**
 * Command-line surface: argument parsing and command dispatch. Kept apart
 * from index.ts so it can be exercised without touching process state.
 *
 *   fetch [dataset]                 incremental sync
 *   get <start> <end> [dataset]     export an inclusive range (DDMMYYYY:HHMM)
 *   probe [dataset]                 report the earliest upstream day
 *
 * Options: --symbol=BTCUSDT --category=linear --interval=1h --start=DDMMYYYY:HHMM
 *          --data-dir=data --export-dir=exports --probe=calendar|binary
 */

import { loadSyncConfig, type SyncConfig, type SyncConfigInput, type SyncConfigOverrides } from './config.js';
import { formatDateStamp, parseDateStamp } from './lib/dateUtils.js';
import { describeError, exitCodeFor } from './lib/errors.js';
import { createSyncEngine, type SyncEngine } from './orchestrators/syncOrchestrator.js';
import { createBybitPageFetcher } from './services/bybitApi.js';
import { DATASET_KINDS, isDatasetKind, type DatasetKind } from './services/datasets.js';
import { createSentimentFetcher } from './services/sentimentApi.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CliCommand =
  | { name: 'fetch'; dataset: DatasetKind }
  | { name: 'get'; dataset: DatasetKind; startMs: number; endMs: number }
  | { name: 'probe'; dataset: DatasetKind }
  | { name: 'help' };

export interface ParsedCli {
  command: CliCommand;
  overrides: SyncConfigOverrides;
}

export const USAGE = [
  'Usage:',
  '  market-data-sync fetch [dataset]',
  '  market-data-sync get <DDMMYYYY:HHMM> <DDMMYYYY:HHMM> [dataset]',
  '  market-data-sync probe [dataset]',
  '',
  `Datasets: ${DATASET_KINDS.join(', ')} (default: futures)`,
  'Options: --symbol= --category= --interval= --start= --data-dir= --export-dir= --probe=',
].join('\n');

const DEFAULT_DATASET: DatasetKind = 'futures';

const OPTION_KEYS: Record<string, keyof SyncConfigInput> = {
  symbol: 'symbol',
  category: 'category',
  interval: 'interval',
  start: 'startDate',
  'data-dir': 'dataDir',
  'export-dir': 'exportDir',
  probe: 'probeStrategy',
};

function parseDataset(value: string | undefined): DatasetKind {
  if (value === undefined) return DEFAULT_DATASET;
  if (!isDatasetKind(value)) {
    throw new UsageError(`Unknown dataset "${value}". Expected one of: ${DATASET_KINDS.join(', ')}`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): ParsedCli {
  const positional: string[] = [];
  const overrides: SyncConfigOverrides = {};
  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      return { command: { name: 'help' }, overrides: {} };
    }
    if (arg.startsWith('--')) {
      const [key, ...rest] = arg.slice(2).split('=');
      const target = Object.hasOwn(OPTION_KEYS, key) ? OPTION_KEYS[key] : undefined;
      if (!target || rest.length === 0) {
        throw new UsageError(`Unknown or malformed option "${arg}"`);
      }
      overrides[target] = rest.join('=');
      continue;
    }
    positional.push(arg);
  }

  const [name, ...args] = positional;
  let command: CliCommand;
  switch (name) {
    case 'fetch':
    case 'probe':
      if (args.length > 1) throw new UsageError(`"${name}" takes at most one dataset argument`);
      command = { name, dataset: parseDataset(args[0]) };
      break;
    case 'get': {
      if (args.length < 2 || args.length > 3) {
        throw new UsageError('"get" needs <start> <end> and an optional dataset');
      }
      const startMs = parseDateStamp(args[0]);
      const endMs = parseDateStamp(args[1]);
      if (startMs > endMs) {
        throw new UsageError(`start ${args[0]} is after end ${args[1]}`);
      }
      command = { name, dataset: parseDataset(args[2]), startMs, endMs };
      break;
    }
    case undefined:
    case 'help':
      command = { name: 'help' };
      break;
    default:
      throw new UsageError(`Unknown command "${name}"`);
  }
  return { command, overrides };
}

export interface CliDeps {
  /** Build the engine; defaults to live Bybit and sentiment clients. */
  createEngine?: (config: SyncConfig) => SyncEngine;
  env?: Record<string, string | undefined>;
  stdout?: (line: string) => void;
}

function defaultEngine(config: SyncConfig): SyncEngine {
  return createSyncEngine(config, {
    fetchPage: createBybitPageFetcher(),
    fetchSentiment: createSentimentFetcher(),
  });
}

/** Run one command and resolve to the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  try {
    const { command, overrides } = parseCliArgs(argv);
    if (command.name === 'help') {
      stdout(USAGE);
      return 0;
    }
    const config = loadSyncConfig(deps.env ?? process.env, overrides);
    const engine = (deps.createEngine ?? defaultEngine)(config);

    switch (command.name) {
      case 'fetch': {
        const report = await engine.sync(command.dataset);
        stdout(
          `${report.kind}: +${report.added} rows (${report.total} total) ` +
            `${formatDateStamp(report.fromMs)} -> ${formatDateStamp(report.toMs)} in ${report.file}`,
        );
        return 0;
      }
      case 'get': {
        const result = await engine.exportRange(command.dataset, command.startMs, command.endMs);
        stdout(`${result.file} (${result.rows} rows)`);
        return 0;
      }
      case 'probe': {
        const earliestMs = await engine.probeEarliest(command.dataset);
        stdout(`${command.dataset}: earliest data ${formatDateStamp(earliestMs)}`);
        return 0;
      }
    }
  } catch (err: unknown) {
    console.error(`[cli] ${describeError(err)}`);
    if (err instanceof UsageError) {
      stdout(USAGE);
      return 2;
    }
    return exitCodeFor(err);
  }
}
