/**
 * Heuristic functions for informed search
 *
 * Each estimates the number of moves left to reach the goal and must be
 * admissible (never overestimate) for A* to return optimal paths.
 */

import { HeuristicName, coordDistance } from '../domain/types.js';
import { LINEAR_CONFLICT_PENALTY } from '../domain/constants.js';
import { InvalidConfigurationError } from '../domain/errors.js';
import { PuzzleState, getGoalPosition, indexToCoord } from '../state/puzzle-state.js';

export type Heuristic = (state: PuzzleState) => number;

/**
 * Non-blank tiles away from their goal cell
 */
export function misplacedTiles(state: PuzzleState): number {
  let count = 0;

  state.tiles.forEach((tile, i) => {
    if (tile !== 0 && tile !== i + 1) {
      count++;
    }
  });

  return count;
}

/**
 * Sum of each tile's grid distance to its goal cell
 */
export function manhattanDistance(state: PuzzleState): number {
  let total = 0;

  state.tiles.forEach((tile, i) => {
    if (tile === 0) return;
    total += coordDistance(indexToCoord(i, state.size), getGoalPosition(tile, state.size));
  });

  return total;
}

/**
 * Manhattan distance plus two moves for every tile that has to leave its
 * goal row or column to let a reversed neighbour past.
 */
export function linearConflict(state: PuzzleState): number {
  const { size, tiles } = state;
  let conflicts = 0;

  for (let line = 0; line < size; line++) {
    // Row: tiles whose goal row is this row, keyed by goal column
    const rowGoals: number[] = [];
    // Column: tiles whose goal column is this column, keyed by goal row
    const colGoals: number[] = [];

    for (let k = 0; k < size; k++) {
      const rowTile = tiles[line * size + k];
      if (rowTile !== 0) {
        const goal = getGoalPosition(rowTile, size);
        if (goal.row === line) rowGoals.push(goal.col);
      }

      const colTile = tiles[k * size + line];
      if (colTile !== 0) {
        const goal = getGoalPosition(colTile, size);
        if (goal.col === line) colGoals.push(goal.row);
      }
    }

    conflicts += countLineConflicts(rowGoals) + countLineConflicts(colGoals);
  }

  return manhattanDistance(state) + LINEAR_CONFLICT_PENALTY * conflicts;
}

/**
 * Fewest tiles to pull out of a line so the rest are in goal order.
 * Takes out the tile in the most conflicts (earliest on ties) until none remain.
 *
 * @param goals - goal offsets along the line, in current order
 */
export function countLineConflicts(goals: readonly number[]): number {
  const remaining = [...goals];
  let removed = 0;

  while (true) {
    const counts = remaining.map(() => 0);

    for (let i = 0; i < remaining.length; i++) {
      for (let j = i + 1; j < remaining.length; j++) {
        if (remaining[i] > remaining[j]) {
          counts[i]++;
          counts[j]++;
        }
      }
    }

    let worst = 0;
    for (let i = 1; i < counts.length; i++) {
      if (counts[i] > counts[worst]) worst = i;
    }

    if (counts.length === 0 || counts[worst] === 0) {
      return removed;
    }

    remaining.splice(worst, 1);
    removed++;
  }
}

export const HEURISTICS: Record<HeuristicName, Heuristic> = {
  misplaced: misplacedTiles,
  manhattan: manhattanDistance,
  linear_conflict: linearConflict,
};

export function isHeuristicName(name: string): name is HeuristicName {
  return Object.prototype.hasOwnProperty.call(HEURISTICS, name);
}

export function getHeuristic(name: string): Heuristic {
  if (!isHeuristicName(name)) {
    throw new InvalidConfigurationError(
      `Unknown heuristic: ${name} (expected one of ${Object.keys(HEURISTICS).join(', ')})`
    );
  }
  return HEURISTICS[name];
}
