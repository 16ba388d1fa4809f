import { createEmptyBoard, createInitialBoard, withPieceAt } from '../../src/shared/engine/board';
import {
  BOARD_FILES_ROW,
  BOARD_SEPARATOR_ROW,
  colorName,
  describeMoveEvent,
  formatMove,
  formatPosition,
  pieceName,
  pieceSymbol,
  renderBoard,
} from '../../src/shared/engine/notation';
import type { MoveEvent } from '../../src/shared/engine/types';
import type { Position } from '../../src/shared/types/game';

const pos = (x: number, y: number): Position => ({ x, y });

describe('notation helpers', () => {
  describe('formatPosition', () => {
    it('formats positions as algebraic coordinates', () => {
      expect(formatPosition(pos(0, 0))).toBe('a1');
      expect(formatPosition(pos(1, 0))).toBe('b1');
      expect(formatPosition(pos(0, 1))).toBe('a2');
      expect(formatPosition(pos(4, 3))).toBe('e4');
      expect(formatPosition(pos(7, 7))).toBe('h8');
    });
  });

  it('formats moves as from-to', () => {
    expect(formatMove({ from: pos(4, 1), to: pos(4, 3) })).toBe('e2-e4');
  });

  it('renders uppercase symbols for White and lowercase for Black', () => {
    expect(pieceSymbol({ type: 'knight', color: 'white' })).toBe('N');
    expect(pieceSymbol({ type: 'knight', color: 'black' })).toBe('n');
    expect(pieceSymbol({ type: 'king', color: 'black' })).toBe('k');
    expect(pieceSymbol({ type: 'pawn', color: 'white' })).toBe('P');
  });

  it('names pieces and colours', () => {
    expect(pieceName('bishop')).toBe('Bishop');
    expect(colorName('white')).toBe('White');
    expect(colorName('black')).toBe('Black');
  });

  describe('describeMoveEvent', () => {
    it('describes a quiet move in one line', () => {
      const event: MoveEvent = {
        move: { from: pos(6, 0), to: pos(5, 2) },
        mover: 'white',
        piece: { type: 'knight', color: 'white' },
        captured: null,
        givesCheck: false,
      };
      expect(describeMoveEvent(event)).toEqual(['White Knight moved from g1 to f3']);
    });

    it('adds capture and check lines', () => {
      const event: MoveEvent = {
        move: { from: pos(7, 4), to: pos(5, 6) },
        mover: 'white',
        piece: { type: 'queen', color: 'white' },
        captured: { type: 'pawn', color: 'black' },
        givesCheck: true,
      };
      expect(describeMoveEvent(event)).toEqual([
        'White Queen moved from h5 to f7',
        'White Queen captured Black Pawn at f7',
        'Black is in check!',
      ]);
    });
  });

  describe('renderBoard', () => {
    it('uses the fixed header and separator rows', () => {
      expect(BOARD_FILES_ROW).toBe('      a     b     c     d     e     f     g     h  ');
      expect(BOARD_SEPARATOR_ROW).toBe('   +-----+-----+-----+-----+-----+-----+-----+-----+');
    });

    it('renders the starting position with rank 8 on top', () => {
      const lines = renderBoard(createInitialBoard()).split('\n');

      expect(lines).toHaveLength(19);
      expect(lines[0]).toBe(BOARD_FILES_ROW);
      expect(lines[1]).toBe(BOARD_SEPARATOR_ROW);
      expect(lines[2]).toBe(' 8 |  r  |  n  |  b  |  q  |  k  |  b  |  n  |  r  | 8');
      expect(lines[3]).toBe(BOARD_SEPARATOR_ROW);
      expect(lines[4]).toBe(' 7 |  p  |  p  |  p  |  p  |  p  |  p  |  p  |  p  | 7');
      expect(lines[6]).toBe(' 6 |     |     |     |     |     |     |     |     | 6');
      expect(lines[14]).toBe(' 2 |  P  |  P  |  P  |  P  |  P  |  P  |  P  |  P  | 2');
      expect(lines[16]).toBe(' 1 |  R  |  N  |  B  |  Q  |  K  |  B  |  N  |  R  | 1');
      expect(lines[17]).toBe(BOARD_SEPARATOR_ROW);
      expect(lines[18]).toBe(BOARD_FILES_ROW);
    });

    it('places a lone piece on the right square', () => {
      const board = withPieceAt(createEmptyBoard(), pos(2, 3), { type: 'bishop', color: 'black' });
      const lines = renderBoard(board).split('\n');
      // rank 4 is the fifth rank row from the top: index 2 + 2 * 4
      expect(lines[10]).toBe(' 4 |     |     |  b  |     |     |     |     |     | 4');
    });
  });
});
