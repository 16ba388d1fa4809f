import type { Board, Color, GameState, Move, Piece } from '../types/game';

// Re-export types used in the engine interface
export type { Board, Color, GameState, Move, Piece };

/**
 * Codes for a move the executor refuses. Checked in declaration order; the
 * first failing check wins.
 */
export enum MoveRejectionCode {
  NO_PIECE_AT_ORIGIN = 'NO_PIECE_AT_ORIGIN',
  NOT_CURRENT_PLAYER = 'NOT_CURRENT_PLAYER',
  ILLEGAL_MOVE = 'ILLEGAL_MOVE',
  LEAVES_KING_IN_CHECK = 'LEAVES_KING_IN_CHECK',
}

export const MOVE_REJECTION_REASONS: Record<MoveRejectionCode, string> = {
  [MoveRejectionCode.NO_PIECE_AT_ORIGIN]: 'No piece at the starting position',
  [MoveRejectionCode.NOT_CURRENT_PLAYER]: "Not the current player's piece",
  [MoveRejectionCode.ILLEGAL_MOVE]: 'Invalid move',
  [MoveRejectionCode.LEAVES_KING_IN_CHECK]: 'Move leaves the player in check',
};

export interface MoveRejection {
  valid: false;
  reason: string;
  code: MoveRejectionCode;
}

/**
 * Outcome of validating a move against a game state. A valid result carries
 * the moving piece and the board the move would produce, so applying it does
 * not repeat the work.
 */
export type MoveValidationResult =
  | { valid: true; piece: Piece; nextBoard: Board }
  | MoveRejection;

/**
 * What happened on an accepted move, for callers that report it.
 */
export interface MoveEvent {
  move: Move;
  mover: Color;
  piece: Piece;
  /** Piece that stood on `move.to` before the move, if any. */
  captured: Piece | null;
  /** Whether the player now to move is in check. */
  givesCheck: boolean;
}

export type ApplyMoveResult =
  | { ok: true; state: GameState; event: MoveEvent }
  | { ok: false; reason: string; code: MoveRejectionCode };
