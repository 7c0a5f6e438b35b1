import type { Writable } from 'node:stream';

import { ExportError, type AccountSnapshot } from '@payledger/core';
import { stringify } from 'csv-stringify/sync';

export const ACCOUNT_CSV_COLUMNS = ['client', 'available', 'held', 'total', 'locked'] as const;

/**
 * Render account snapshots as CSV, header first, amounts with four fractional digits.
 */
export function formatAccountsCsv(snapshots: readonly AccountSnapshot[]): string {
  const rows = snapshots.map((snapshot) => [
    String(snapshot.clientId),
    snapshot.available.toDecimalString(),
    snapshot.held.toDecimalString(),
    snapshot.total.toDecimalString(),
    String(snapshot.locked),
  ]);

  return stringify([[...ACCOUNT_CSV_COLUMNS], ...rows]);
}

/**
 * Write the snapshot CSV to `output`, resolving once the stream has accepted it.
 */
export function writeAccountsCsv(snapshots: readonly AccountSnapshot[], output: Writable): Promise<void> {
  const payload = formatAccountsCsv(snapshots);

  return new Promise((resolve, reject) => {
    const fail = (error: Error) => {
      reject(new ExportError(`Failed to write account snapshot: ${error.message}`, { cause: error }));
    };

    // A failed write also emits 'error' after the callback; keep the listener for it
    output.once('error', fail);
    output.write(payload, (error) => {
      if (error) {
        fail(error);
        return;
      }
      output.off('error', fail);
      resolve();
    });
  });
}
