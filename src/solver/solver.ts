/**
 * Main Solver Interface
 */

import { AlgorithmName, OrderingPolicy, SolverOptions } from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS } from '../domain/constants.js';
import { InvalidConfigurationError } from '../domain/errors.js';
import { PuzzleState } from '../state/puzzle-state.js';
import { parseState } from '../io/state-parser.js';
import { getHeuristic } from './heuristics.js';
import { SearchEngine, SearchResult } from './search-engine.js';

export const ALGORITHM_POLICIES: Record<AlgorithmName, OrderingPolicy> = {
  'best-first': 'BY_HEURISTIC',
  astar: 'BY_COST_PLUS_HEURISTIC',
};

export function isAlgorithmName(name: string): name is AlgorithmName {
  return Object.prototype.hasOwnProperty.call(ALGORITHM_POLICIES, name);
}

/**
 * Search engine for an algorithm name
 */
export function createEngine(algorithm: string): SearchEngine {
  if (!isAlgorithmName(algorithm)) {
    throw new InvalidConfigurationError(
      `Unknown algorithm: ${algorithm} (expected one of ${Object.keys(ALGORITHM_POLICIES).join(', ')})`
    );
  }
  return new SearchEngine(ALGORITHM_POLICIES[algorithm]);
}

/**
 * Main Puzzle Solver class
 */
export class PuzzleSolver {
  constructor(private readonly defaults: SolverOptions = DEFAULT_SOLVER_OPTIONS) {}

  /**
   * Solve a puzzle from the given state
   */
  solve(initialState: PuzzleState, options: Partial<SolverOptions> = {}): SearchResult {
    const opts: SolverOptions = { ...this.defaults, ...options };

    const engine = createEngine(opts.algorithm);
    const heuristic = getHeuristic(opts.heuristic);

    return engine.solve(initialState, heuristic, opts.maxSteps);
  }
}

/**
 * Quick solve function for a state written as text, e.g. "1 2 3 4 5 6 7 0 8"
 */
export function quickSolve(text: string, options: Partial<SolverOptions> = {}): SearchResult {
  return new PuzzleSolver().solve(parseState(text), options);
}
