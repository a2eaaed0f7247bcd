/**
 * Error types raised before a search starts
 *
 * Running out of steps or frontier is reported through the search result,
 * never thrown.
 */

export class PuzzleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Tile sequence is not a permutation of 0..N²-1 for a supported N
 */
export class InvalidStateError extends PuzzleError {}

/**
 * Inversion parity rules out reaching the goal
 */
export class UnsolvableStateError extends PuzzleError {
  constructor(readonly tiles: readonly number[]) {
    super(`Puzzle is not solvable: ${tiles.join(' ')}`);
  }
}

export class IllegalMoveError extends PuzzleError {}

/**
 * Unknown algorithm/heuristic name or out-of-range numeric option
 */
export class InvalidConfigurationError extends PuzzleError {}
