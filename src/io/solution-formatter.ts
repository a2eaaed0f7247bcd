/**
 * Format search results and experiment reports for human-readable output
 */

import { TerminalState } from '../domain/types.js';
import { PuzzleState } from '../state/puzzle-state.js';
import { SearchResult } from '../solver/search-engine.js';
import {
  ConfigurationSummary,
  ExperimentReport,
  ExperimentResult,
  summarizeExperiments,
} from '../experiment/experiment.js';

const BLANK = 'b';

function tileLabel(tile: number): string {
  return tile === 0 ? BLANK : String(tile);
}

/**
 * Single-line state, e.g. (1 2 3 4 5 6 7 b 8)
 */
export function formatState(state: PuzzleState): string {
  return `(${state.tiles.map(tileLabel).join(' ')})`;
}

/**
 * Format the puzzle as a grid, one row per line
 */
export function formatGrid(state: PuzzleState): string {
  const width = String(state.tiles.length - 1).length;
  const rows: string[] = [];

  for (let row = 0; row < state.size; row++) {
    const cells = state.tiles
      .slice(row * state.size, (row + 1) * state.size)
      .map(tile => tileLabel(tile).padStart(width));
    rows.push(cells.join(' '));
  }

  return rows.join('\n');
}

export function formatPath(states: readonly PuzzleState[]): string {
  return states.map(formatState).join(' → ');
}

function describeFailure(terminalState: TerminalState): string {
  return terminalState === 'EXHAUSTED'
    ? 'No solution found: frontier exhausted.'
    : 'No solution found within the step limit.';
}

/**
 * Format a complete search result for console output
 */
export function formatResult(result: SearchResult, initialState: PuzzleState): string {
  const lines: string[] = [];

  lines.push('=== PUZZLE SOLUTION ===');
  lines.push('');
  lines.push(`Initial state: ${formatState(initialState)}`);

  if (result.solved) {
    lines.push(`Solution found in ${result.path.length} steps`);
    lines.push(`Moves: ${result.path.length > 0 ? result.path.join(' ') : '(already solved)'}`);
    lines.push(`Solution path: ${formatPath(result.states)}`);
  } else {
    lines.push(describeFailure(result.terminalState));
  }

  lines.push('');

  // Search stats
  lines.push('=== SEARCH STATISTICS ===');
  lines.push(`Outcome: ${result.terminalState}`);
  lines.push(`Nodes Expanded: ${result.stats.nodesExpanded.toLocaleString('en-US')}`);
  lines.push(`Nodes Generated: ${result.stats.nodesGenerated.toLocaleString('en-US')}`);
  lines.push(`Time Taken: ${result.stats.elapsedTime}ms`);

  return lines.join('\n');
}

/**
 * Format a search result as JSON, with states as plain tile arrays
 */
export function formatResultJSON(result: SearchResult): string {
  return JSON.stringify({
    solved: result.solved,
    terminalState: result.terminalState,
    moves: result.path,
    states: result.states.map(state => [...state.tiles]),
    stats: result.stats,
  }, null, 2);
}

function formatAverage(value: number | null): string {
  return value === null ? '-' : value.toFixed(2);
}

/**
 * Console table of per-configuration averages
 */
export function formatExperimentSummary(summaries: ConfigurationSummary[]): string {
  const header = ['Algorithm', 'Heuristic', 'Solved', 'Avg Steps', 'Avg Expanded', 'Avg Generated', 'Avg Time (ms)'];
  const rows = summaries.map(s => [
    s.algorithm,
    s.heuristic,
    `${s.solved}/${s.runs + s.failures}`,
    formatAverage(s.averageSolutionLength),
    formatAverage(s.averageNodesExpanded),
    formatAverage(s.averageNodesGenerated),
    formatAverage(s.averageElapsedTime),
  ]);

  const widths = header.map((h, i) => Math.max(h.length, ...rows.map(r => r[i].length)));
  const formatRow = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();

  return [
    '=== EXPERIMENT SUMMARY ===',
    '',
    formatRow(header),
    formatRow(widths.map(w => '-'.repeat(w))),
    ...rows.map(formatRow),
  ].join('\n');
}

const HEURISTIC_DESCRIPTIONS = [
  ['Misplaced Tiles', 'Counts the number of tiles that are not in their goal position.'],
  ['Manhattan Distance', 'Sums the Manhattan distance (|x1 - x2| + |y1 - y2|) for each tile from its current position to its goal position.'],
  ['Linear Conflict', 'Adds two moves to the Manhattan distance for every tile that must leave its goal row or column so that reversed tiles in that line can pass.'],
];

function formatRunMarkdown(lines: string[], index: number, run: ExperimentResult): void {
  lines.push(`#### Initial state ${index}: ${formatState(run.initialState)}`);

  if (run.solved) {
    lines.push(`Solution found in ${run.solutionLength} steps`);
    lines.push('');
    lines.push('Solution path:');
    lines.push('```');
    lines.push(formatPath(run.states));
    lines.push('```');
  } else {
    lines.push(describeFailure(run.terminalState));
  }

  lines.push('');
  lines.push(`Nodes expanded: ${run.nodesExpanded}`);
  lines.push(`Nodes generated: ${run.nodesGenerated}`);
  lines.push(`Time taken: ${run.elapsedTime} ms`);
  lines.push('');
}

/**
 * Markdown report of a full experiment sweep
 */
export function formatMarkdownReport(report: ExperimentReport, size: number): string {
  const lines: string[] = [];
  const summaries = summarizeExperiments(report);

  lines.push(`# ${size * size - 1}-Puzzle Solver Experiment Results`);
  lines.push('');
  lines.push(`Start states: ${report.states.length}, step limit: ${report.maxSteps}`);
  lines.push('');

  lines.push('## Heuristics Used');
  lines.push('');
  HEURISTIC_DESCRIPTIONS.forEach(([name, description], i) => {
    lines.push(`### Heuristic ${i + 1}: ${name}`);
    lines.push(description);
    lines.push('');
  });

  let currentAlgorithm: string | null = null;

  report.configurations.forEach((config, i) => {
    if (config.algorithm !== currentAlgorithm) {
      currentAlgorithm = config.algorithm;
      lines.push(`## ${config.algorithm.toUpperCase()} Search`);
      lines.push('');
    }

    const summary = summaries[i];
    lines.push(`### Heuristic: ${config.heuristic}`);
    lines.push('');
    lines.push(summary.averageSolutionLength === null
      ? 'No successful solutions found.'
      : `Average number of steps: ${formatAverage(summary.averageSolutionLength)}`);
    lines.push('');

    for (const run of config.results) {
      formatRunMarkdown(lines, report.states.indexOf(run.initialState) + 1, run);
    }

    for (const failure of config.failures) {
      const index = report.states.indexOf(failure.initialState) + 1;
      lines.push(`#### Initial state ${index}: ${formatState(failure.initialState)}`);
      lines.push(`Skipped: ${failure.message}`);
      lines.push('');
    }
  });

  return lines.join('\n').trimEnd() + '\n';
}
