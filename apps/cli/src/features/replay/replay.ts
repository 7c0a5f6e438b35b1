import type { IngestionSummary } from '@payledger/ingestion';
import { configureLogger, flushLoggers } from '@payledger/logger';
import type { Command } from 'commander';
import pc from 'picocolors';
import type { z } from 'zod';

import { parseCliEnv } from '../../config/env.js';
import { displayCliError } from '../shared/cli-error.js';
import type { CliIo } from '../shared/cli-io.js';
import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';
import { ReplayCommandOptionsSchema } from '../shared/schemas.js';

import { ReplayHandler } from './replay-handler.js';
import { formatStreamReport, formatSummaryTotals } from './replay-utils.js';

/**
 * Replay command options validated by Zod at CLI boundary
 */
export type ReplayCommandOptions = z.infer<typeof ReplayCommandOptionsSchema>;

/**
 * Register the replay command as the program's default action.
 */
export function registerReplayCommand(program: Command, io: CliIo, onExit: (code: ExitCode) => void): void {
  program
    .argument('[files...]', 'Transaction CSV files, each replayed by its own worker')
    .option('--on-malformed <policy>', 'On a malformed row: abort the stream or skip the row (default: abort)')
    .option('--log-level <level>', 'Log level for this run (overrides LOGGER_LOG_LEVEL)')
    .option('--summary', 'Print a per-stream report to stderr after the export')
    .addHelpText(
      'after',
      `
Examples:
  $ payledger transactions.csv > accounts.csv
  $ payledger --on-malformed skip --summary jan.csv feb.csv > accounts.csv

Notes:
  - The account snapshot goes to stdout; logs and reports go to stderr.
  - PAYLEDGER_ON_MALFORMED sets the default for --on-malformed.
`
    )
    .action(async (files: string[], rawOptions: unknown) => {
      onExit(await executeReplayCommand(files, rawOptions, io));
    });
}

/**
 * Execute the replay command.
 */
export async function executeReplayCommand(
  files: readonly string[],
  rawOptions: unknown,
  io: CliIo
): Promise<ExitCode> {
  // Validate options at CLI boundary with Zod
  const validationResult = ReplayCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    displayCliError(new Error(firstError?.message ?? 'Invalid options'), io.stderr);
    return ExitCodes.INVALID_ARGS;
  }
  const options = validationResult.data;

  const envResult = parseCliEnv(io.env);
  if (envResult.isErr()) {
    displayCliError(envResult.error, io.stderr);
    return ExitCodes.VALIDATION_ERROR;
  }

  if (options.logLevel) {
    configureLogger({ level: options.logLevel });
  }

  const handler = new ReplayHandler();
  const result = await handler.execute(
    {
      files,
      malformedRowPolicy: options.onMalformed ?? envResult.value.PAYLEDGER_ON_MALFORMED ?? 'abort',
    },
    io.stdout
  );
  flushLoggers();

  if (result.isErr()) {
    displayCliError(result.error, io.stderr);
    return ExitCodes.GENERAL_ERROR;
  }

  if (options.summary) {
    printSummary(result.value.summary, io);
  }

  return ExitCodes.SUCCESS;
}

function printSummary(summary: IngestionSummary, io: CliIo): void {
  for (const report of summary.streams) {
    const marker = report.status === 'completed' ? pc.green('✓') : pc.red('✗');
    io.stderr.write(`${marker} ${formatStreamReport(report)}\n`);
  }
  io.stderr.write(`${pc.dim(formatSummaryTotals(summary))}\n`);
}
