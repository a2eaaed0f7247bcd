/**
 * Experiment runner: every algorithm × heuristic combination over a set of
 * start states, with per-configuration averages.
 */

import { AlgorithmName, HeuristicName, Move, TerminalState } from '../domain/types.js';
import { ALGORITHM_NAMES, HEURISTIC_NAMES } from '../domain/constants.js';
import { PuzzleError } from '../domain/errors.js';
import { PuzzleState } from '../state/puzzle-state.js';
import { PuzzleSolver } from '../solver/solver.js';

export interface ExperimentConfig {
  algorithm: AlgorithmName;
  heuristic: HeuristicName;
  initialState: PuzzleState;
  maxSteps: number;
}

export interface ExperimentResult {
  algorithm: AlgorithmName;
  heuristic: HeuristicName;
  initialState: PuzzleState;
  solved: boolean;
  terminalState: TerminalState;
  solutionLength: number | null;
  moves: Move[];
  states: PuzzleState[];
  nodesExpanded: number;
  nodesGenerated: number;
  elapsedTime: number;
}

export interface ExperimentFailure {
  initialState: PuzzleState;
  message: string;
}

export interface ConfigurationRuns {
  algorithm: AlgorithmName;
  heuristic: HeuristicName;
  results: ExperimentResult[];
  failures: ExperimentFailure[];
}

export interface ExperimentReport {
  maxSteps: number;
  states: PuzzleState[];
  configurations: ConfigurationRuns[];
}

export interface ConfigurationSummary {
  algorithm: AlgorithmName;
  heuristic: HeuristicName;
  runs: number;
  solved: number;
  failures: number;
  averageSolutionLength: number | null;
  averageNodesExpanded: number;
  averageNodesGenerated: number;
  averageElapsedTime: number;
}

/**
 * Run a single search and collect its statistics
 */
export function runExperiment(config: ExperimentConfig, solver: PuzzleSolver = new PuzzleSolver()): ExperimentResult {
  const result = solver.solve(config.initialState, {
    algorithm: config.algorithm,
    heuristic: config.heuristic,
    maxSteps: config.maxSteps,
  });

  return {
    algorithm: config.algorithm,
    heuristic: config.heuristic,
    initialState: config.initialState,
    solved: result.solved,
    terminalState: result.terminalState,
    solutionLength: result.solved ? result.path.length : null,
    moves: result.path,
    states: result.states,
    nodesExpanded: result.stats.nodesExpanded,
    nodesGenerated: result.stats.nodesGenerated,
    elapsedTime: result.stats.elapsedTime,
  };
}

/**
 * Run all combinations of algorithms and heuristics on all states.
 * A run rejected with a PuzzleError is recorded as a failure and the sweep carries on.
 */
export function runAllExperiments(states: PuzzleState[], maxSteps: number): ExperimentReport {
  const solver = new PuzzleSolver();
  const configurations: ConfigurationRuns[] = [];

  for (const algorithm of ALGORITHM_NAMES) {
    for (const heuristic of HEURISTIC_NAMES) {
      const runs: ConfigurationRuns = { algorithm, heuristic, results: [], failures: [] };

      for (const initialState of states) {
        try {
          runs.results.push(runExperiment({ algorithm, heuristic, initialState, maxSteps }, solver));
        } catch (err) {
          if (!(err instanceof PuzzleError)) throw err;
          runs.failures.push({ initialState, message: err.message });
        }
      }

      configurations.push(runs);
    }
  }

  return { maxSteps, states, configurations };
}

/**
 * Averages per configuration. Solution length is averaged over solved runs
 * only; node counts and time over every completed run.
 */
export function summarizeExperiments(report: ExperimentReport): ConfigurationSummary[] {
  return report.configurations.map(({ algorithm, heuristic, results, failures }) => {
    const solved = results.filter(r => r.solved);
    const lengths = solved.map(r => r.solutionLength ?? 0);

    return {
      algorithm,
      heuristic,
      runs: results.length,
      solved: solved.length,
      failures: failures.length,
      averageSolutionLength: lengths.length > 0 ? average(lengths) : null,
      averageNodesExpanded: average(results.map(r => r.nodesExpanded)),
      averageNodesGenerated: average(results.map(r => r.nodesGenerated)),
      averageElapsedTime: average(results.map(r => r.elapsedTime)),
    };
  });
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
