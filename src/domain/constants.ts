/**
 * Constants for the sliding puzzle solver
 */

import { AlgorithmName, HeuristicName, Move, SolverOptions } from './types.js';

// Supported grid dimensions (8-puzzle and 15-puzzle)
export const SUPPORTED_SIZES: readonly number[] = [3, 4];

// Neighbor generation order
export const MOVES: readonly Move[] = ['up', 'down', 'left', 'right'];

// Row/column offset of the blank for each move
export const MOVE_OFFSETS: Record<Move, { dRow: number; dCol: number }> = {
  up: { dRow: -1, dCol: 0 },
  down: { dRow: 1, dCol: 0 },
  left: { dRow: 0, dCol: -1 },
  right: { dRow: 0, dCol: 1 },
};

export const ALGORITHM_NAMES: readonly AlgorithmName[] = ['best-first', 'astar'];

export const HEURISTIC_NAMES: readonly HeuristicName[] = ['misplaced', 'manhattan', 'linear_conflict'];

// Default solver options
export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  algorithm: 'astar',
  heuristic: 'manhattan',
  maxSteps: 10000,
};

// Experiment runs top up the state list to this many puzzles
export const DEFAULT_EXPERIMENT_STATE_COUNT = 5;

// Each linear conflict costs a tile stepping out of its line and back
export const LINEAR_CONFLICT_PENALTY = 2;
