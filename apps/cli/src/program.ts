import { Command, CommanderError } from 'commander';

import { registerReplayCommand } from './features/replay/replay.js';
import type { CliIo } from './features/shared/cli-io.js';
import { ExitCodes, type ExitCode } from './features/shared/exit-codes.js';

export const CLI_VERSION = '0.1.0';

/**
 * Build the command-line program. Commander's own output (help, version, usage
 * errors) goes through `io` as well.
 */
export function createProgram(io: CliIo, onExit: (code: ExitCode) => void): Command {
  const program = new Command();

  program
    .name('payledger')
    .description('Replay payment transaction streams into client account balances')
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });

  registerReplayCommand(program, io, onExit);

  return program;
}

/**
 * Parse `argv` (node, script, ...args) and run the program.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<ExitCode> {
  let exitCode: ExitCode = ExitCodes.SUCCESS;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'node' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit through here with code 0
      return error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS;
    }
    throw error;
  }

  return exitCode;
}
