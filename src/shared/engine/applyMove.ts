import { GameState, Move } from '../types/game';
import { ApplyMoveResult } from './types';
import { otherColor, pieceAt } from './board';
import { isInCheck } from './checkDetection';
import { validateMove } from './validators/MoveValidator';

/**
 * Apply `move` for the player to move.
 *
 * Rejections are returned as values and leave `state` untouched. On success
 * the returned state holds the new board with the other colour to move, and
 * the event records the mover, any captured piece, and whether the move puts
 * the opponent in check.
 */
export function applyMove(state: GameState, move: Move): ApplyMoveResult {
  const validation = validateMove(state, move);
  if (!validation.valid) {
    return { ok: false, reason: validation.reason, code: validation.code };
  }

  const nextPlayer = otherColor(state.currentPlayer);
  const nextState: GameState = {
    board: validation.nextBoard,
    currentPlayer: nextPlayer,
  };

  return {
    ok: true,
    state: nextState,
    event: {
      move,
      mover: state.currentPlayer,
      piece: validation.piece,
      captured: pieceAt(state.board, move.to),
      givesCheck: isInCheck(nextState.board, nextPlayer),
    },
  };
}
