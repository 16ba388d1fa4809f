import { GameState, Move } from '../../types/game';
import { MOVE_REJECTION_REASONS, MoveRejection, MoveRejectionCode, MoveValidationResult } from '../types';
import { pieceAt, withPieceMoved } from '../board';
import { isLegalMove } from '../movementLogic';
import { isInCheck } from '../checkDetection';

function reject(code: MoveRejectionCode): MoveRejection {
  return { valid: false, reason: MOVE_REJECTION_REASONS[code], code };
}

export function validateMove(state: GameState, move: Move): MoveValidationResult {
  // 1. Piece at origin
  const piece = pieceAt(state.board, move.from);
  if (!piece) {
    return reject(MoveRejectionCode.NO_PIECE_AT_ORIGIN);
  }

  // 2. Turn check
  if (piece.color !== state.currentPlayer) {
    return reject(MoveRejectionCode.NOT_CURRENT_PLAYER);
  }

  // 3. Piece geometry and path
  if (!isLegalMove(state.board, move, piece)) {
    return reject(MoveRejectionCode.ILLEGAL_MOVE);
  }

  // 4. Own king must not be left attacked
  const nextBoard = withPieceMoved(state.board, move);
  if (isInCheck(nextBoard, state.currentPlayer)) {
    return reject(MoveRejectionCode.LEAVES_KING_IN_CHECK);
  }

  return { valid: true, piece, nextBoard };
}
