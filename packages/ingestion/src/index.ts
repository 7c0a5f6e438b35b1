export { ACCOUNT_CSV_COLUMNS, formatAccountsCsv, writeAccountsCsv } from './csv/account-csv-writer.js';
export { ParsedCsvRecordSchema, TransactionRowSchema, type TransactionRow } from './csv/schemas.js';
export { readTransactionRecords, type RecordSource } from './csv/transaction-record-source.js';
export { decodeTransactionRow, type RowLocation } from './csv/transaction-row-decoder.js';
export {
  IngestionCoordinator,
  type IngestionCoordinatorOptions,
  type IngestionSummary,
  type MalformedRowPolicy,
  type RecordSourceFactory,
  type StreamReport,
} from './services/ingestion-coordinator.js';
