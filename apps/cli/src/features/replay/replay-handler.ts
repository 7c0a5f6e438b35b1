import type { Writable } from 'node:stream';

import { ExportError, getErrorMessage, type AccountSnapshot } from '@payledger/core';
import { IngestionCoordinator, type IngestionSummary, type MalformedRowPolicy } from '@payledger/ingestion';
import { Ledger } from '@payledger/ledger';
import { getLogger } from '@payledger/logger';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('ReplayHandler');

export interface ReplayParams {
  files: readonly string[];
  malformedRowPolicy: MalformedRowPolicy;
}

export interface ReplayResult {
  summary: IngestionSummary;
  accounts: AccountSnapshot[];
}

/**
 * Replay handler - replays every input file into a fresh ledger and writes the
 * account snapshot to `output`.
 *
 * Failed input streams are part of a successful result (see the summary); only
 * a failed export is an error.
 */
export class ReplayHandler {
  async execute(params: ReplayParams, output: Writable): Promise<Result<ReplayResult, ExportError>> {
    const ledger = new Ledger();
    const coordinator = new IngestionCoordinator(ledger, { malformedRowPolicy: params.malformedRowPolicy });

    const summary = await coordinator.run(params.files);

    try {
      const accounts = await coordinator.export(output);
      return ok({ summary, accounts });
    } catch (error) {
      logger.error({ error }, 'Account export failed');
      return err(
        error instanceof ExportError
          ? error
          : new ExportError(`Failed to export accounts: ${getErrorMessage(error)}`, { cause: error })
      );
    }
  }
}
