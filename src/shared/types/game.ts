// Shared chess domain types. Everything here is plain data so the engine
// helpers can stay pure and the CLI can print or log values directly.

export type Color = 'white' | 'black';

export type PieceType = 'king' | 'queen' | 'rook' | 'bishop' | 'knight' | 'pawn';

export interface Piece {
  readonly type: PieceType;
  readonly color: Color;
}

/**
 * Board coordinate. `x` is the file index (0 = a) and `y` the rank index
 * (0 = rank 1). Bounds are not checked at construction.
 */
export interface Position {
  readonly x: number;
  readonly y: number;
}

export interface Move {
  readonly from: Position;
  readonly to: Position;
}

export type Cell = Piece | null;

/** 8×8 grid indexed `[rank][file]`. */
export type Board = ReadonlyArray<ReadonlyArray<Cell>>;

export interface GameState {
  readonly board: Board;
  readonly currentPlayer: Color;
}

export const BOARD_SIZE = 8;

