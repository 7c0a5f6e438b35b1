import fs from 'node:fs';

import {
  CsvStructureError,
  getErrorMessage,
  isNodeSystemError,
  SourceReadError,
  ValidationError,
  type DomainError,
  type TransactionRecord,
} from '@payledger/core';
import { getLogger } from '@payledger/logger';
import { CsvError, parse } from 'csv-parse';
import { err, type Result } from 'neverthrow';

import { ParsedCsvRecordSchema } from './schemas.js';
import { decodeTransactionRow } from './transaction-row-decoder.js';

const logger = getLogger('transaction-record-source');

export type RecordSource = AsyncIterable<Result<TransactionRecord, DomainError>>;

function toSourceError(error: unknown, filePath: string): DomainError {
  if (error instanceof CsvError) {
    return new CsvStructureError(`Malformed CSV in ${filePath}: ${error.message}`, {
      additionalContext: { csvCode: error.code },
      cause: error,
      source: filePath,
    });
  }

  return new SourceReadError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, {
    additionalContext: isNodeSystemError(error) ? { errorCode: error.code } : undefined,
    cause: error,
    source: filePath,
  });
}

/**
 * Stream a transaction CSV one record at a time.
 *
 * Columns come from the header row (`type, client, tx, amount`); fields are
 * trimmed, a byte-order mark is dropped and short rows are accepted. Rows that
 * fail to decode are yielded as ValidationErrors and reading goes on. An unreadable
 * file (SourceReadError) or broken CSV structure (CsvStructureError) yields a
 * single error and ends the stream.
 */
export async function* readTransactionRecords(filePath: string): AsyncGenerator<Result<TransactionRecord, DomainError>> {
  const input = fs.createReadStream(filePath);
  const parser = parse({
    bom: true,
    columns: true,
    info: true,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });

  // pipe() does not forward source errors
  input.on('error', (error) => parser.destroy(error));
  input.pipe(parser);

  try {
    for await (const chunk of parser) {
      const parsed = ParsedCsvRecordSchema.safeParse(chunk);
      if (!parsed.success) {
        yield err(new ValidationError(`Unexpected CSV record shape in ${filePath}`, { source: filePath }));
        continue;
      }

      yield decodeTransactionRow(parsed.data.record, { source: filePath, line: parsed.data.info.lines });
    }
  } catch (error) {
    logger.debug({ error, filePath }, 'Transaction source failed');
    yield err(toSourceError(error, filePath));
  } finally {
    input.destroy();
  }
}
