import {
  createEmptyBoard,
  createInitialBoard,
  findKing,
  isOnBoard,
  listPieces,
  otherColor,
  pieceAt,
  withPieceAt,
  withPieceMoved,
} from '../../src/shared/engine/board';
import { EngineErrorCode, InvalidState } from '../../src/shared/engine/errors';
import type { Piece, Position } from '../../src/shared/types/game';

const pos = (x: number, y: number): Position => ({ x, y });

describe('board model', () => {
  describe('createInitialBoard', () => {
    const board = createInitialBoard();

    it('places the kings on the e-file', () => {
      expect(pieceAt(board, pos(4, 0))).toEqual({ type: 'king', color: 'white' });
      expect(pieceAt(board, pos(4, 7))).toEqual({ type: 'king', color: 'black' });
    });

    it('lays out both back ranks as R N B Q K B N R', () => {
      const order = ['rook', 'knight', 'bishop', 'queen', 'king', 'bishop', 'knight', 'rook'];
      expect(board[0].map((cell) => cell?.type)).toEqual(order);
      expect(board[0].every((cell) => cell?.color === 'white')).toBe(true);
      expect(board[7].map((cell) => cell?.type)).toEqual(order);
      expect(board[7].every((cell) => cell?.color === 'black')).toBe(true);
    });

    it('fills rank indices 1 and 6 with pawns', () => {
      expect(board[1]).toEqual(Array(8).fill({ type: 'pawn', color: 'white' }));
      expect(board[6]).toEqual(Array(8).fill({ type: 'pawn', color: 'black' }));
    });

    it('leaves rank indices 2 to 5 empty', () => {
      for (let y = 2; y <= 5; y++) {
        expect(board[y]).toEqual(Array(8).fill(null));
      }
    });

    it('holds 32 pieces', () => {
      expect(listPieces(board)).toHaveLength(32);
    });
  });

  describe('withPieceMoved', () => {
    it('clears the origin and moves the piece to the destination', () => {
      const board = createInitialBoard();
      const knight = pieceAt(board, pos(1, 0));
      const next = withPieceMoved(board, { from: pos(1, 0), to: pos(2, 2) });

      expect(pieceAt(next, pos(1, 0))).toBeNull();
      expect(pieceAt(next, pos(2, 2))).toBe(knight);
    });

    it('overwrites whatever stood on the destination, own pieces included', () => {
      const board = createInitialBoard();
      const next = withPieceMoved(board, { from: pos(0, 0), to: pos(0, 1) });

      expect(pieceAt(next, pos(0, 1))).toEqual({ type: 'rook', color: 'white' });
      expect(pieceAt(next, pos(0, 0))).toBeNull();
      expect(listPieces(next)).toHaveLength(31);
    });

    it('does not modify the original board and shares untouched rows', () => {
      const board = createInitialBoard();
      const next = withPieceMoved(board, { from: pos(4, 1), to: pos(4, 3) });

      expect(pieceAt(board, pos(4, 1))).toEqual({ type: 'pawn', color: 'white' });
      expect(pieceAt(board, pos(4, 3))).toBeNull();
      expect(next[0]).toBe(board[0]);
      expect(next[7]).toBe(board[7]);
      expect(next[1]).not.toBe(board[1]);
    });
  });

  describe('withPieceAt', () => {
    it('places and clears single squares', () => {
      const queen: Piece = { type: 'queen', color: 'black' };
      const placed = withPieceAt(createEmptyBoard(), pos(3, 4), queen);
      expect(pieceAt(placed, pos(3, 4))).toBe(queen);
      expect(listPieces(placed)).toEqual([{ position: pos(3, 4), piece: queen }]);

      const cleared = withPieceAt(placed, pos(3, 4), null);
      expect(listPieces(cleared)).toEqual([]);
    });
  });

  describe('findKing', () => {
    it('locates each king', () => {
      const board = createInitialBoard();
      expect(findKing(board, 'white')).toEqual(pos(4, 0));
      expect(findKing(board, 'black')).toEqual(pos(4, 7));
    });

    it('throws InvalidState when the king is missing', () => {
      const board = withPieceAt(createEmptyBoard(), pos(0, 0), { type: 'king', color: 'white' });

      expect(() => findKing(board, 'black')).toThrow('No black king on the board');

      let thrown: unknown;
      try {
        findKing(board, 'black');
      } catch (error) {
        thrown = error;
      }
      expect(thrown).toBeInstanceOf(InvalidState);
      if (thrown instanceof InvalidState) {
        expect(thrown.code).toBe(EngineErrorCode.STATE_KING_NOT_FOUND);
        expect(thrown.context).toEqual({ color: 'black' });
        expect(thrown.toJSON()).toMatchObject({
          type: 'InvalidState',
          domain: 'Board',
          category: 'Corrupted or unexpected game state',
        });
      }
    });
  });

  it('reports board bounds', () => {
    expect(isOnBoard(pos(0, 0))).toBe(true);
    expect(isOnBoard(pos(7, 7))).toBe(true);
    expect(isOnBoard(pos(8, 0))).toBe(false);
    expect(isOnBoard(pos(0, -1))).toBe(false);
  });

  it('flips colours', () => {
    expect(otherColor('white')).toBe('black');
    expect(otherColor('black')).toBe('white');
  });
});
