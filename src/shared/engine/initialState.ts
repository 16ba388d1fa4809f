import { GameState } from '../types/game';
import { createInitialBoard } from './board';

/**
 * Creates a pristine initial GameState: the standard starting position with
 * White to move.
 */
export function createInitialGameState(): GameState {
  return {
    board: createInitialBoard(),
    currentPlayer: 'white',
  };
}
