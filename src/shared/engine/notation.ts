import { BOARD_SIZE, Board, Color, Move, Piece, PieceType, Position } from '../types/game';
import { otherColor } from './board';
import { MoveEvent } from './types';

/**
 * Shared notation and text-rendering helpers.
 *
 * These give a lightweight, human-readable form of positions, moves and
 * boards for the replay transcript and for log metadata. The notation is
 * plain coordinate notation, not SAN.
 */

const PIECE_LETTERS: Record<PieceType, string> = {
  king: 'K',
  queen: 'Q',
  rook: 'R',
  bishop: 'B',
  knight: 'N',
  pawn: 'P',
};

const PIECE_NAMES: Record<PieceType, string> = {
  king: 'King',
  queen: 'Queen',
  rook: 'Rook',
  bishop: 'Bishop',
  knight: 'Knight',
  pawn: 'Pawn',
};

/**
 * Algebraic coordinates for a board position: (0,0) -> a1, (7,7) -> h8.
 */
export function formatPosition(pos: Position): string {
  const file = String.fromCharCode('a'.charCodeAt(0) + pos.x);
  return `${file}${pos.y + 1}`;
}

/** Compact `from-to` form, e.g. "e2-e4". */
export function formatMove(move: Move): string {
  return `${formatPosition(move.from)}-${formatPosition(move.to)}`;
}

/** Uppercase letter for White, lowercase for Black. */
export function pieceSymbol(piece: Piece): string {
  const letter = PIECE_LETTERS[piece.type];
  return piece.color === 'white' ? letter : letter.toLowerCase();
}

export function pieceName(type: PieceType): string {
  return PIECE_NAMES[type];
}

export function colorName(color: Color): string {
  return color === 'white' ? 'White' : 'Black';
}

function describePiece(piece: Piece): string {
  return `${colorName(piece.color)} ${pieceName(piece.type)}`;
}

/**
 * Transcript lines for an accepted move: the move itself, the capture when
 * there was one, and a check notice for the side now to move.
 */
export function describeMoveEvent(event: MoveEvent): string[] {
  const { move, piece, captured } = event;
  const lines = [
    `${describePiece(piece)} moved from ${formatPosition(move.from)} to ${formatPosition(move.to)}`,
  ];

  if (captured) {
    lines.push(
      `${describePiece(piece)} captured ${describePiece(captured)} at ${formatPosition(move.to)}`
    );
  }

  if (event.givesCheck) {
    lines.push(`${colorName(otherColor(event.mover))} is in check!`);
  }

  return lines;
}

const FILE_LABELS = Array.from({ length: BOARD_SIZE }, (_, x) =>
  String.fromCharCode('a'.charCodeAt(0) + x)
);

export const BOARD_FILES_ROW = `      ${FILE_LABELS.join('     ')}  `;

export const BOARD_SEPARATOR_ROW = `   +${'-----+'.repeat(BOARD_SIZE)}`;

/**
 * Fixed-width text grid of the board, rank 8 at the top. Each rank row is
 * framed by its number on both sides; empty squares render as a space.
 */
export function renderBoard(board: Board): string {
  const lines = [BOARD_FILES_ROW, BOARD_SEPARATOR_ROW];

  for (let y = board.length - 1; y >= 0; y--) {
    const rank = String(y + 1).padStart(2, ' ');
    const cells = board[y].map((cell) => (cell ? pieceSymbol(cell) : ' '));
    lines.push(`${rank} |  ${cells.join('  |  ')}  |${rank}`);
    lines.push(BOARD_SEPARATOR_ROW);
  }

  lines.push(BOARD_FILES_ROW);
  return lines.join('\n');
}
