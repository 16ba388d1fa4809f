#!/usr/bin/env node
/**
 * Replay a moves file through the chess engine and print a transcript.
 *
 * Usage:
 *   chess-replay games/opening.txt
 *
 *   # Verbose diagnostics on stderr
 *   LOG_LEVEL=debug chess-replay games/opening.txt
 */

import { isEngineError } from '../shared/engine';
import { MoveFileError, wrapError } from '../shared/errors';
import { loadMoveFile, type MoveSource } from './moveFile';
import { replayGame, type OutputSink } from './replay';
import { logger } from './utils/logger';

export const USAGE = 'Usage: chess-replay <moves_file_path>';

export interface CliArgs {
  movesFile: string;
}

export type ParsedArgs = { kind: 'run'; args: CliArgs } | { kind: 'help' } | { kind: 'usage' };

export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { kind: 'help' };
  }
  if (argv.length !== 1) {
    return { kind: 'usage' };
  }
  return { kind: 'run', args: { movesFile: argv[0] } };
}

export interface CliIO {
  out: OutputSink;
  err: OutputSink;
  load?: (filePath: string) => Promise<MoveSource>;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Run the CLI against `argv` (arguments after the script name) and resolve
 * with the process exit code.
 */
export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const parsed = parseArgs(argv);
  if (parsed.kind === 'help') {
    io.out(USAGE);
    return 0;
  }
  if (parsed.kind === 'usage') {
    io.err(USAGE);
    return 1;
  }

  const { movesFile } = parsed.args;
  const load = io.load ?? loadMoveFile;

  try {
    const source = await load(movesFile);
    const summary = replayGame(source, io.out);
    logger.info('Replay finished', {
      movesFile,
      outcome: summary.outcome,
      accepted: summary.accepted,
      rejected: summary.rejected,
    });
    return 0;
  } catch (error) {
    if (error instanceof MoveFileError) {
      logger.error('Could not read moves file', error.toJSON());
      io.err(error.message);
      return 1;
    }

    const wrapped = wrapError(error, { movesFile });
    logger.error('Replay failed', isEngineError(error) ? error.toJSON() : wrapped.toJSON());
    io.err(`An unexpected error occurred: ${wrapped.message}`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error('[chess-replay] Fatal error:', err);
      process.exitCode = 1;
    });
}
