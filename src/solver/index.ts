/**
 * Solver module exports
 */

export * from './search-node.js';
export * from './heuristics.js';
export * from './search-engine.js';
export * from './solver.js';
