import { Board, Position } from '../types/game';

/**
 * Shared geometry helpers for the chess engine.
 *
 * These functions are pure and depend only on the shared types so they can
 * be reused by the legality checker, the check detector and tests alike.
 */

/**
 * A unit step in board-local coordinates. Each component is -1, 0 or 1.
 */
export interface Direction {
  x: number;
  y: number;
}

/**
 * Unit step from `from` towards `to`, taken as the sign of each axis delta.
 */
export function getStepDirection(from: Position, to: Position): Direction {
  return {
    x: Math.sign(to.x - from.x),
    y: Math.sign(to.y - from.y),
  };
}

/**
 * Squares strictly between two positions, walking one unit step at a time
 * along the sign of each delta. The endpoints are not included.
 *
 * The walk covers `max(|dx|, |dy|) - 1` squares, so for a move that is
 * neither straight nor diagonal it follows the sign vector rather than the
 * exact line; callers only use it after checking the move's shape.
 */
export function getPathPositions(from: Position, to: Position): Position[] {
  const dir = getStepDirection(from, to);
  const steps = Math.max(Math.abs(to.x - from.x), Math.abs(to.y - from.y)) - 1;

  const path: Position[] = [];
  for (let i = 1; i <= steps; i++) {
    path.push({ x: from.x + dir.x * i, y: from.y + dir.y * i });
  }
  return path;
}

/**
 * True when any square strictly between `from` and `to` is occupied.
 */
export function isPathBlocked(board: Board, from: Position, to: Position): boolean {
  return getPathPositions(from, to).some((pos) => board[pos.y][pos.x] !== null);
}

/**
 * Absolute file and rank deltas of a move.
 */
export function getMoveDeltas(from: Position, to: Position): { dx: number; dy: number } {
  return {
    dx: Math.abs(to.x - from.x),
    dy: Math.abs(to.y - from.y),
  };
}
