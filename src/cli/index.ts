#!/usr/bin/env node
/**
 * Sliding Puzzle Solver - CLI Interface
 */

import * as fs from 'fs';

import { InvalidConfigurationError, PuzzleError } from '../domain/errors.js';
import { PuzzleState } from '../state/puzzle-state.js';
import { hashState } from '../state/state-hash.js';
import { generateRandomSolvable } from '../state/puzzle-generator.js';
import { PuzzleSolver } from '../solver/solver.js';
import { parseState, parseStateList } from '../io/state-parser.js';
import { runAllExperiments, summarizeExperiments } from '../experiment/experiment.js';
import {
  formatResult,
  formatResultJSON,
  formatGrid,
  formatExperimentSummary,
  formatMarkdownReport,
} from '../io/solution-formatter.js';
import { CLIOptions, parseArgs } from './args.js';

function printHelp(): void {
  console.log(`
Sliding Puzzle Solver
=====================

Solves the 8-puzzle and 15-puzzle with Best-First or A* search.

USAGE:
  sliding-puzzle-solver <command> [options]

COMMANDS:
  solve       Solve a single puzzle and print the move sequence
  experiment  Run every algorithm/heuristic combination over a set of puzzles
  generate    Print random solvable puzzles
  help        Show this help message

OPTIONS:
  -s, --state <tiles>       Initial state, e.g. "1 2 3 4 5 6 7 0 8" (0 is the blank)
  -a, --algorithm <name>    best-first or astar (default: astar)
  -H, --heuristic <name>    misplaced, manhattan or linear_conflict (default: manhattan)
  -m, --max-steps <n>       Node expansions before giving up (default: 10000)
  -f, --format <type>       Output format for solve: text (default) or json
  -i, --input <file>        Start states for experiment, one per line
  -r, --report <file>       Write a Markdown experiment report to this file
  --size <8|15>             Puzzle for experiment and generate (default: 8)
  -n, --count <n>           Number of puzzles for experiment and generate (default: 5)
  -h, --help                Show help

EXAMPLES:
  # Solve one puzzle with A* and linear conflict
  sliding-puzzle-solver solve -s "8 1 2 7 0 3 6 5 4" -H linear_conflict

  # Compare all configurations on states from a file
  sliding-puzzle-solver experiment -i states.txt -r results.md

  # Five random 15-puzzles
  sliding-puzzle-solver generate --size 15

INPUT FILE FORMAT:
  # comment lines and blank lines are ignored
  1 2 3 4 5 6 7 0 8
  8 1 2 7 0 3 6 5 4
`);
}

function runSolve(options: CLIOptions): void {
  if (options.state === undefined) {
    throw new InvalidConfigurationError('solve needs an initial state (--state "1 2 3 4 5 6 7 0 8")');
  }

  const state = parseState(options.state);
  const solver = new PuzzleSolver();

  if (options.outputFormat === 'json') {
    const result = solver.solve(state, options);
    console.log(formatResultJSON(result));
    return;
  }

  console.log('Starting puzzle solver...');
  console.log(`Algorithm: ${options.algorithm}`);
  console.log(`Heuristic: ${options.heuristic}`);
  console.log(`Max steps: ${options.maxSteps}`);
  console.log('');

  console.log('Initial State:');
  console.log(formatGrid(state));
  console.log('');

  const result = solver.solve(state, options);

  console.log(formatResult(result, state));
}

/**
 * Fill the list up to `count` with distinct random puzzles
 */
function topUpStates(states: PuzzleState[], count: number, size: number): PuzzleState[] {
  const seen = new Set(states.map(hashState));
  const result = [...states];

  while (result.length < count) {
    for (const state of generateRandomSolvable(count - result.length, size)) {
      const hash = hashState(state);
      if (!seen.has(hash)) {
        seen.add(hash);
        result.push(state);
      }
    }
  }

  return result;
}

function runExperimentCommand(options: CLIOptions): void {
  let states: PuzzleState[] = [];

  if (options.inputFile) {
    const content = fs.readFileSync(options.inputFile, 'utf-8');
    const parsed = parseStateList(content, options.size);
    states = parsed.states;

    if (parsed.warnings.length > 0) {
      console.log('Warnings:');
      parsed.warnings.forEach(w => console.log(`  - ${w}`));
      console.log('');
    }
  }

  if (states.length < options.count) {
    const needed = options.count - states.length;
    console.log(`Found ${states.length} ${options.size}×${options.size} initial states, generating ${needed} more random solvable puzzles...`);
    states = topUpStates(states, options.count, options.size);
  }

  console.log(`Running all experiments on ${states.length} initial states (${options.size}×${options.size} grid)...`);
  console.log('');

  const report = runAllExperiments(states, options.maxSteps);

  console.log(formatExperimentSummary(summarizeExperiments(report)));

  for (const config of report.configurations) {
    for (const failure of config.failures) {
      console.log(`Error running ${config.algorithm}-${config.heuristic}: ${failure.message}`);
    }
  }

  if (options.reportFile) {
    fs.writeFileSync(options.reportFile, formatMarkdownReport(report, options.size), 'utf-8');
    console.log('');
    console.log(`Detailed report saved to ${options.reportFile}`);
  }
}

function runGenerate(options: CLIOptions): void {
  const puzzles = generateRandomSolvable(options.count, options.size);

  console.log('# Format: Each line represents one initial state');
  console.log('# Use 0 to represent the blank tile');
  for (const puzzle of puzzles) {
    console.log(puzzle.tiles.join(' '));
  }
}

// Main entry point
function main(): void {
  const options = parseArgs(process.argv.slice(2));

  switch (options.command) {
    case 'solve':
      runSolve(options);
      break;

    case 'experiment':
      runExperimentCommand(options);
      break;

    case 'generate':
      runGenerate(options);
      break;

    case 'help':
    default:
      printHelp();
      break;
  }
}

try {
  main();
} catch (err) {
  if (err instanceof PuzzleError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('Error:', err);
  }
  process.exit(1);
}
