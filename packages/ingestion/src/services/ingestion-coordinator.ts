import type { Writable } from 'node:stream';

import {
  DomainError,
  getErrorMessage,
  IngestionError,
  ValidationError,
  type AccountSnapshot,
} from '@payledger/core';
import { TransactionProcessor, type Ledger } from '@payledger/ledger';
import { getLogger } from '@payledger/logger';

import { writeAccountsCsv } from '../csv/account-csv-writer.js';
import { readTransactionRecords, type RecordSource } from '../csv/transaction-record-source.js';

/**
 * What a worker does with a row that does not decode:
 * - abort: stop reading that stream (the rest of it is abandoned)
 * - skip: log the row and continue with the next one
 */
export type MalformedRowPolicy = 'abort' | 'skip';

export type RecordSourceFactory = (source: string) => RecordSource;

export interface IngestionCoordinatorOptions {
  malformedRowPolicy?: MalformedRowPolicy | undefined;
  /** Defaults to streaming the source as a CSV file */
  openSource?: RecordSourceFactory | undefined;
}

export interface StreamReport {
  source: string;
  status: 'completed' | 'failed';
  /** Records that changed the ledger */
  recordsApplied: number;
  /** Records that decoded but had no effect (locked account, unknown tx, ...) */
  recordsIgnored: number;
  /** Malformed rows passed over under the skip policy */
  rowsSkipped: number;
  error?: DomainError | undefined;
}

export interface IngestionSummary {
  streams: StreamReport[];
  accounts: number;
  transactions: number;
}

/**
 * Replays any number of input streams into one shared ledger.
 *
 * Each stream gets its own worker; workers run concurrently and each applies its
 * records strictly in stream order. A worker that hits an unreadable stream, broken
 * CSV structure or (under the abort policy) a malformed row stops alone; everything
 * it already applied stays.
 */
export class IngestionCoordinator {
  private readonly logger = getLogger('IngestionCoordinator');
  private readonly processor: TransactionProcessor;
  private readonly malformedRowPolicy: MalformedRowPolicy;
  private readonly openSource: RecordSourceFactory;

  constructor(
    private readonly ledger: Ledger,
    options: IngestionCoordinatorOptions = {}
  ) {
    this.processor = new TransactionProcessor(ledger);
    this.malformedRowPolicy = options.malformedRowPolicy ?? 'abort';
    this.openSource = options.openSource ?? readTransactionRecords;
  }

  async run(sources: readonly string[]): Promise<IngestionSummary> {
    this.logger.info({ policy: this.malformedRowPolicy, sources: sources.length }, 'Starting ingestion');

    const streams = await Promise.all(
      sources.map((source) => this.runWorker(source).catch((error: unknown) => this.crashedReport(source, error)))
    );

    const summary: IngestionSummary = {
      streams,
      accounts: this.ledger.accountCount,
      transactions: this.ledger.transactionCount,
    };

    this.logger.info(
      {
        accounts: summary.accounts,
        failed: streams.filter((stream) => stream.status === 'failed').length,
        transactions: summary.transactions,
      },
      'Ingestion finished'
    );

    return summary;
  }

  /**
   * Snapshot the ledger and write it as CSV. Call once every worker has finished.
   */
  async export(output: Writable): Promise<AccountSnapshot[]> {
    const snapshots = await this.ledger.snapshotAccounts();
    await writeAccountsCsv(snapshots, output);
    this.logger.debug({ accounts: snapshots.length }, 'Account snapshot exported');
    return snapshots;
  }

  private async runWorker(source: string): Promise<StreamReport> {
    const report: StreamReport = {
      source,
      status: 'completed',
      recordsApplied: 0,
      recordsIgnored: 0,
      rowsSkipped: 0,
    };

    this.logger.debug({ source }, 'Worker started');

    for await (const result of this.openSource(source)) {
      if (result.isErr()) {
        const error = result.error;

        // Only row-level errors can be skipped; any other error means the source has ended
        if (error instanceof ValidationError && this.malformedRowPolicy === 'skip') {
          report.rowsSkipped++;
          this.logger.warn({ error: error.message, source }, 'Skipping malformed row');
          continue;
        }

        this.logger.warn({ code: error.code, error: error.message, source }, 'Worker stopped');
        return { ...report, status: 'failed', error };
      }

      const outcome = await this.processor.process(result.value);
      if (outcome === 'applied') {
        report.recordsApplied++;
      } else {
        report.recordsIgnored++;
      }
    }

    this.logger.debug({ applied: report.recordsApplied, source }, 'Worker completed');
    return report;
  }

  private crashedReport(source: string, error: unknown): StreamReport {
    this.logger.error({ error, source }, 'Worker crashed');

    return {
      source,
      status: 'failed',
      recordsApplied: 0,
      recordsIgnored: 0,
      rowsSkipped: 0,
      error:
        error instanceof DomainError
          ? error
          : new IngestionError(`Worker for ${source} failed: ${getErrorMessage(error)}`, { cause: error, source }),
    };
  }
}
