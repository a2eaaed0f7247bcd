/**
 * Core type definitions for the sliding puzzle solver
 */

// Direction the blank moves
export type Move = 'up' | 'down' | 'left' | 'right';

// Search algorithm names as accepted on the command line
export type AlgorithmName = 'best-first' | 'astar';

// Heuristic names as accepted on the command line
export type HeuristicName = 'misplaced' | 'manhattan' | 'linear_conflict';

// Grid position (0-based)
export interface Coord {
  row: number;
  col: number;
}

// Frontier ordering key selection
export type OrderingPolicy = 'BY_HEURISTIC' | 'BY_COST_PLUS_HEURISTIC';

// How a search run ended
export type TerminalState = 'SOLVED' | 'EXHAUSTED' | 'STEP_LIMIT_REACHED';

// Search statistics
export interface SearchStats {
  nodesExpanded: number;
  nodesGenerated: number;
  elapsedTime: number; // milliseconds
}

// Solver options
export interface SolverOptions {
  algorithm: AlgorithmName;
  heuristic: HeuristicName;
  maxSteps: number;
}

export function coordDistance(a: Coord, b: Coord): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}
