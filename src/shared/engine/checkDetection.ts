import { Board, Color, Position } from '../types/game';
import { findKing, listPieces, otherColor } from './board';
import { isLegalMove } from './movementLogic';

/**
 * Squares of every opposing piece with a legal move onto the king of
 * `color`. Throws InvalidState when that king is missing.
 */
export function findAttackers(board: Board, color: Color): Position[] {
  const kingSquare = findKing(board, color);
  const opponent = otherColor(color);

  return listPieces(board)
    .filter(
      ({ position, piece }) =>
        piece.color === opponent && isLegalMove(board, { from: position, to: kingSquare }, piece)
    )
    .map(({ position }) => position);
}

/**
 * True when some opposing piece could capture the king of `color`.
 */
export function isInCheck(board: Board, color: Color): boolean {
  return findAttackers(board, color).length > 0;
}
