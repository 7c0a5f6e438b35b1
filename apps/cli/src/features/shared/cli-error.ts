import type { Writable } from 'node:stream';

import pc from 'picocolors';

/**
 * Display a CLI error on stderr. stdout is reserved for the account snapshot.
 */
export function displayCliError(error: Error, stderr: Writable): void {
  stderr.write(`${pc.red('✗')} Error: ${error.message}\n`);

  // In development, show full stack trace
  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    stderr.write(`\n${pc.dim(error.stack)}\n\n`);
  }
}
