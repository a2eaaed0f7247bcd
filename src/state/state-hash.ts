/**
 * State hashing for duplicate detection during search
 */

import { PuzzleState } from './puzzle-state.js';

/**
 * Create a hash string for a puzzle state
 * Two states share a hash exactly when their tile sequences are equal.
 */
export function hashState(state: PuzzleState): string {
  return state.tiles.join(',');
}

