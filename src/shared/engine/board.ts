import { BOARD_SIZE, Board, Cell, Color, Move, Piece, PieceType, Position } from '../types/game';
import { EngineErrorCode, InvalidState } from './errors';

/**
 * Board model helpers.
 *
 * Boards are immutable values: every update returns a new outer array and
 * copies only the rows it touches, so untouched rows are shared between
 * successive boards.
 */

const BACK_RANK: readonly PieceType[] = [
  'rook',
  'knight',
  'bishop',
  'queen',
  'king',
  'bishop',
  'knight',
  'rook',
];

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(null));
}

/**
 * Standard starting position: White on rank indices 0 and 1, Black on 6 and 7.
 */
export function createInitialBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, (_, rank) =>
    Array.from({ length: BOARD_SIZE }, (_, file): Cell => {
      switch (rank) {
        case 0:
          return { type: BACK_RANK[file], color: 'white' };
        case 1:
          return { type: 'pawn', color: 'white' };
        case 6:
          return { type: 'pawn', color: 'black' };
        case 7:
          return { type: BACK_RANK[file], color: 'black' };
        default:
          return null;
      }
    })
  );
}

/**
 * Piece at `pos`, or null for an empty square. `pos` must be on the board.
 */
export function pieceAt(board: Board, pos: Position): Piece | null {
  return board[pos.y][pos.x];
}

/**
 * Copy of `board` with `pos` set to `piece` (or cleared when null).
 */
export function withPieceAt(board: Board, pos: Position, piece: Piece | null): Board {
  return board.map((row, y) =>
    y === pos.y ? row.map((cell, x) => (x === pos.x ? piece : cell)) : row
  );
}

/**
 * Copy of `board` with the piece at `move.from` relocated to `move.to`.
 *
 * No legality check is made: whatever stood on `move.to` is overwritten.
 */
export function withPieceMoved(board: Board, move: Move): Board {
  const moving = pieceAt(board, move.from);
  return withPieceAt(withPieceAt(board, move.from, null), move.to, moving);
}

export function isOnBoard(pos: Position): boolean {
  return (
    Number.isInteger(pos.x) &&
    Number.isInteger(pos.y) &&
    pos.x >= 0 &&
    pos.x < BOARD_SIZE &&
    pos.y >= 0 &&
    pos.y < BOARD_SIZE
  );
}

export function otherColor(color: Color): Color {
  return color === 'white' ? 'black' : 'white';
}

/**
 * Square of the king of `color`.
 *
 * Every board handed to the engine must hold exactly one king per colour;
 * a missing king is reported as InvalidState rather than a rule violation.
 */
export function findKing(board: Board, color: Color): Position {
  for (let y = 0; y < board.length; y++) {
    const row = board[y];
    for (let x = 0; x < row.length; x++) {
      const cell = row[x];
      if (cell && cell.type === 'king' && cell.color === color) {
        return { x, y };
      }
    }
  }

  throw new InvalidState(
    EngineErrorCode.STATE_KING_NOT_FOUND,
    `No ${color} king on the board`,
    { color },
    'Board'
  );
}

/**
 * Every occupied square with its piece, in rank-then-file order.
 */
export function listPieces(board: Board): Array<{ position: Position; piece: Piece }> {
  const result: Array<{ position: Position; piece: Piece }> = [];
  board.forEach((row, y) => {
    row.forEach((cell, x) => {
      if (cell) {
        result.push({ position: { x, y }, piece: cell });
      }
    });
  });
  return result;
}
