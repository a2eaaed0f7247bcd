/**
 * Random solvable start states for experiments
 */

import { SUPPORTED_SIZES } from '../domain/constants.js';
import { InvalidConfigurationError } from '../domain/errors.js';
import { PuzzleState, createGoalState, createPuzzleState, isSolvable } from './puzzle-state.js';
import { hashState } from './state-hash.js';

export type RandomSource = () => number;

/**
 * Generate `count` distinct solvable states by shuffling the goal configuration
 * and keeping the shuffles that pass the parity check.
 */
export function generateRandomSolvable(
  count: number,
  size: number = 3,
  random: RandomSource = Math.random
): PuzzleState[] {
  if (!Number.isInteger(count) || count <= 0) {
    throw new InvalidConfigurationError('Number of puzzles must be a positive integer');
  }
  if (!SUPPORTED_SIZES.includes(size)) {
    throw new InvalidConfigurationError(`Unsupported puzzle size: ${size}×${size}`);
  }
  if (count > solvableStateCount(size)) {
    throw new InvalidConfigurationError(
      `Cannot generate ${count} distinct puzzles: only ${solvableStateCount(size)} solvable ${size}×${size} states exist`
    );
  }

  const goalTiles = createGoalState(size).tiles;
  const seen = new Set<string>();
  const result: PuzzleState[] = [];

  while (result.length < count) {
    const state = createPuzzleState(shuffle(goalTiles, random));
    const hash = hashState(state);

    if (isSolvable(state) && !seen.has(hash)) {
      seen.add(hash);
      result.push(state);
    }
  }

  return result;
}

/**
 * Half of all (size²)! arrangements
 */
export function solvableStateCount(size: number): number {
  let total = 1;
  for (let n = 2; n <= size * size; n++) {
    total *= n;
  }
  return total / 2;
}

// Fisher-Yates
function shuffle(tiles: readonly number[], random: RandomSource): number[] {
  const result = [...tiles];

  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }

  return result;
}
