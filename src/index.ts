/**
 * Sliding Puzzle Solver
 *
 * Best-First and A* search for the 8-puzzle and 15-puzzle.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/errors.js';

// State exports
export * from './state/puzzle-state.js';
export * from './state/state-hash.js';
export * from './state/puzzle-generator.js';

// Solver exports
export * from './solver/index.js';

// Experiment exports
export * from './experiment/experiment.js';

// I/O exports
export * from './io/state-parser.js';
export * from './io/solution-formatter.js';
