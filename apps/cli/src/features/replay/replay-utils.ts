import type { IngestionSummary, StreamReport } from '@payledger/ingestion';

/**
 * One line per input stream, e.g.
 * `jan.csv: completed (4 applied, 1 ignored, 0 skipped)`
 */
export function formatStreamReport(report: StreamReport): string {
  const counts = `${report.recordsApplied} applied, ${report.recordsIgnored} ignored, ${report.rowsSkipped} skipped`;

  if (report.status === 'completed') {
    return `${report.source}: completed (${counts})`;
  }

  const reason = report.error ? `${report.error.code}: ${report.error.message}` : 'unknown error';
  return `${report.source}: failed (${counts}) ${reason}`;
}

export function formatSummaryTotals(summary: IngestionSummary): string {
  const failed = summary.streams.filter((stream) => stream.status === 'failed').length;
  return `${summary.streams.length} streams (${failed} failed), ${summary.accounts} accounts, ${summary.transactions} stored transactions`;
}
