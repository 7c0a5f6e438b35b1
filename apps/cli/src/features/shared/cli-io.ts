import type { Writable } from 'node:stream';

/**
 * Process handles a command runs against; tests pass in-memory streams.
 */
export interface CliIo {
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
}

export function processIo(): CliIo {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
  };
}
