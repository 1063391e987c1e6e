#!/usr/bin/env node
import 'dotenv/config';

import { validateStartupEnvironment } from './server/config.js';
import { runCli } from './server/cli.js';
import { closeDefaultDispatcher } from './server/lib/httpClient.js';
import logger, { redirectConsoleToLogger } from './server/logger.js';

redirectConsoleToLogger(logger);

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled promise rejection:', reason);
  process.exitCode = 1;
});

async function main(): Promise<void> {
  validateStartupEnvironment();
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } finally {
    await closeDefaultDispatcher();
    logger.flush();
  }
}

main().catch((err: unknown) => {
  console.error('Fatal:', err);
  process.exitCode = 1;
});
