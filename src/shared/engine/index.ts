// =============================================================================
// CHESS RULES ENGINE - PUBLIC API
// =============================================================================
// The CLI and tests import the engine through this file.
//
// Design principles:
// - NARROW: Only essential functions are exported
// - PURE: No side effects; state passed in and returned out
// - VALUES, NOT THROWS: rule violations come back as result objects
// =============================================================================

// Core types
export type { Board, Cell, Color, GameState, Move, Piece, PieceType, Position } from '../types/game';
export { BOARD_SIZE } from '../types/game';

export type { ApplyMoveResult, MoveEvent, MoveRejection, MoveValidationResult } from './types';
export { MoveRejectionCode, MOVE_REJECTION_REASONS } from './types';

// Board model
export {
  createEmptyBoard,
  createInitialBoard,
  findKing,
  isOnBoard,
  listPieces,
  otherColor,
  pieceAt,
  withPieceAt,
  withPieceMoved,
} from './board';
export { createInitialGameState } from './initialState';

// Movement & check
export { isLegalMove } from './movementLogic';
export { findAttackers, isInCheck } from './checkDetection';
export { validateMove } from './validators/MoveValidator';
export { applyMove } from './applyMove';

// Notation
export {
  colorName,
  describeMoveEvent,
  formatMove,
  formatPosition,
  pieceName,
  pieceSymbol,
  renderBoard,
} from './notation';

// Errors
export { EngineError, EngineErrorCode, InvalidState, isEngineError } from './errors';
