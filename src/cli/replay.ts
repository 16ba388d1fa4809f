import {
  applyMove,
  colorName,
  createInitialGameState,
  describeMoveEvent,
  findAttackers,
  formatMove,
  formatPosition,
  renderBoard,
  type GameState,
} from '../shared/engine';
import { MoveRecordSchema, moveFromRecord } from '../shared/validation/schemas';
import type { MoveSource } from './moveFile';
import { logger } from './utils/logger';

export type ReplayOutcome = 'exhausted' | 'format_error';

export interface ReplaySummary {
  outcome: ReplayOutcome;
  finalState: GameState;
  accepted: number;
  rejected: number;
}

/** Receives one transcript line at a time. */
export type OutputSink = (line: string) => void;

export const GAME_OVER_MESSAGE = 'No more moves available - GAME OVER';
export const FORMAT_ERROR_MESSAGE = 'Error in moves file format';

/**
 * Feed every record from `source` into the engine, writing the transcript
 * to `output`.
 *
 * Rejected moves are reported and skipped with the state unchanged. The loop
 * stops when the source is exhausted or yields a malformed record.
 */
export function replayGame(
  source: MoveSource,
  output: OutputSink,
  initial: GameState = createInitialGameState()
): ReplaySummary {
  let state = initial;
  let accepted = 0;
  let rejected = 0;

  for (;;) {
    const record = source.nextMove();
    if (record === null) {
      output(GAME_OVER_MESSAGE);
      logger.debug('Move source exhausted', { accepted, rejected });
      return { outcome: 'exhausted', finalState: state, accepted, rejected };
    }

    const parsed = MoveRecordSchema.safeParse(record);
    if (!parsed.success) {
      output(FORMAT_ERROR_MESSAGE);
      logger.warn('Malformed move record', {
        record,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return { outcome: 'format_error', finalState: state, accepted, rejected };
    }

    const move = moveFromRecord(parsed.data);
    output('');
    output(
      `Processing ${colorName(state.currentPlayer)} move from ${formatPosition(move.from)} to ${formatPosition(move.to)}`
    );

    const result = applyMove(state, move);
    if (!result.ok) {
      rejected += 1;
      output(`Invalid move: ${result.reason}`);
      logger.debug('Move rejected', {
        move: formatMove(move),
        player: state.currentPlayer,
        code: result.code,
      });
      continue;
    }

    accepted += 1;
    for (const line of describeMoveEvent(result.event)) {
      output(line);
    }
    output(renderBoard(result.state.board));
    output('');
    logger.debug('Move applied', {
      move: formatMove(move),
      player: state.currentPlayer,
      captured: result.event.captured?.type ?? null,
      givesCheck: result.event.givesCheck,
      ...(result.event.givesCheck
        ? {
            attackers: findAttackers(result.state.board, result.state.currentPlayer).map(
              formatPosition
            ),
          }
        : {}),
    });
    state = result.state;
  }
}
