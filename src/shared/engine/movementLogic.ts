import { Board, Color, Move, Piece } from '../types/game';
import { pieceAt } from './board';
import { getMoveDeltas, isPathBlocked } from './core';

/**
 * Geometric move legality.
 *
 * A move is legal when its destination does not hold a piece of the mover's
 * colour and its shape matches the piece type:
 *
 * - King: one square in any direction (no castling).
 * - Rook: straight along a file or rank with a clear path.
 * - Bishop: diagonal with a clear path.
 * - Queen: rook or bishop movement.
 * - Knight: (2,1) or (1,2) jump; intervening squares are ignored.
 * - Pawn: one square forward onto an empty square, two squares forward from
 *   its start rank over empty squares, or one square diagonally forward onto
 *   an opposing piece. No en passant and no promotion.
 *
 * Legality here ignores whether the move exposes the mover's own king; that
 * test belongs to the move executor.
 */
export function isLegalMove(board: Board, move: Move, piece: Piece): boolean {
  const target = pieceAt(board, move.to);
  if (target && target.color === piece.color) {
    return false;
  }

  switch (piece.type) {
    case 'king':
      return isLegalKingMove(move);
    case 'queen':
      return isLegalQueenMove(board, move);
    case 'rook':
      return isLegalRookMove(board, move);
    case 'bishop':
      return isLegalBishopMove(board, move);
    case 'knight':
      return isLegalKnightMove(move);
    case 'pawn':
      return isLegalPawnMove(board, move, piece.color);
  }
}

export function isLegalKingMove(move: Move): boolean {
  const { dx, dy } = getMoveDeltas(move.from, move.to);
  return dx <= 1 && dy <= 1;
}

export function isLegalQueenMove(board: Board, move: Move): boolean {
  return isLegalRookMove(board, move) || isLegalBishopMove(board, move);
}

export function isLegalRookMove(board: Board, move: Move): boolean {
  const straight = move.from.x === move.to.x || move.from.y === move.to.y;
  return straight && !isPathBlocked(board, move.from, move.to);
}

export function isLegalBishopMove(board: Board, move: Move): boolean {
  const { dx, dy } = getMoveDeltas(move.from, move.to);
  return dx === dy && !isPathBlocked(board, move.from, move.to);
}

export function isLegalKnightMove(move: Move): boolean {
  const { dx, dy } = getMoveDeltas(move.from, move.to);
  return (dx === 2 && dy === 1) || (dx === 1 && dy === 2);
}

/** Rank step of a pawn of `color`: White moves up the board, Black down. */
export function pawnDirection(color: Color): 1 | -1 {
  return color === 'white' ? 1 : -1;
}

/** Rank index a pawn of `color` starts on. */
export function pawnStartRank(color: Color): number {
  return color === 'white' ? 1 : 6;
}

export function isLegalPawnMove(board: Board, move: Move, color: Color): boolean {
  const direction = pawnDirection(color);
  const { from, to } = move;
  const target = pieceAt(board, to);
  const sameFile = from.x === to.x;

  const isForwardMove = sameFile && to.y === from.y + direction && target === null;

  // Short-circuit keeps the intermediate-square lookup on the board.
  const isDoubleMove =
    sameFile &&
    to.y === from.y + 2 * direction &&
    from.y === pawnStartRank(color) &&
    target === null &&
    pieceAt(board, { x: from.x, y: from.y + direction }) === null;

  const isCapture =
    Math.abs(to.x - from.x) === 1 &&
    to.y === from.y + direction &&
    target !== null &&
    target.color !== color;

  return isForwardMove || isDoubleMove || isCapture;
}
