import { z } from 'zod';
import { BOARD_SIZE, Move } from '../types/game';

// A single coordinate of a move record: an integer index on the 8×8 board.
export const BoardIndexSchema = z
  .number()
  .int()
  .min(0)
  .max(BOARD_SIZE - 1);

// Move record as produced by a move source:
// [fromFile, fromRawRank, toFile, toRawRank]. Raw ranks count from the top
// of the board, so raw 0 is rank 8.
export const MoveRecordSchema = z.tuple([
  BoardIndexSchema,
  BoardIndexSchema,
  BoardIndexSchema,
  BoardIndexSchema,
]);

export type MoveRecord = z.infer<typeof MoveRecordSchema>;

/**
 * Convert a well-formed record into an engine Move, flipping raw ranks into
 * rank indices (`7 - raw`).
 */
export function moveFromRecord(record: MoveRecord): Move {
  const [fromFile, fromRawRank, toFile, toRawRank] = record;
  return {
    from: { x: fromFile, y: BOARD_SIZE - 1 - fromRawRank },
    to: { x: toFile, y: BOARD_SIZE - 1 - toRawRank },
  };
}
