#!/usr/bin/env node
import { getErrorMessage } from '@payledger/core';
import { flushLoggers, getLogger } from '@payledger/logger';

import { displayCliError } from './features/shared/cli-error.js';
import { processIo } from './features/shared/cli-io.js';
import { ExitCodes } from './features/shared/exit-codes.js';
import { runCli } from './program.js';

const logger = getLogger('CLI');

async function main() {
  process.exitCode = await runCli(process.argv, processIo());
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
  displayCliError(new Error(`Unhandled rejection: ${getErrorMessage(reason)}`), process.stderr);
  flushLoggers();
  process.exit(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  logger.error({ error }, 'CLI failed');
  displayCliError(error instanceof Error ? error : new Error(String(error)), process.stderr);
  process.exitCode = ExitCodes.GENERAL_ERROR;
});
