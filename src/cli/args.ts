/**
 * Command line argument parsing
 */

import { AlgorithmName, HeuristicName } from '../domain/types.js';
import { DEFAULT_EXPERIMENT_STATE_COUNT, DEFAULT_SOLVER_OPTIONS } from '../domain/constants.js';
import { InvalidConfigurationError } from '../domain/errors.js';
import { isHeuristicName } from '../solver/heuristics.js';
import { isAlgorithmName } from '../solver/solver.js';

export interface CLIOptions {
  command: 'solve' | 'experiment' | 'generate' | 'help';
  state?: string;
  inputFile?: string;
  reportFile?: string;
  outputFormat: 'text' | 'json';
  algorithm: AlgorithmName;
  heuristic: HeuristicName;
  maxSteps: number;
  size: number; // grid dimension
  count: number;
}

// --size takes the puzzle name: 8 (3×3) or 15 (4×4)
const PUZZLE_SIZES = new Map<string, number>([['8', 3], ['15', 4]]);

function parsePositiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || n <= 0) {
    throw new InvalidConfigurationError(`${flag} expects a positive integer, got "${value}"`);
  }
  return n;
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    outputFormat: 'text',
    algorithm: DEFAULT_SOLVER_OPTIONS.algorithm,
    heuristic: DEFAULT_SOLVER_OPTIONS.heuristic,
    maxSteps: DEFAULT_SOLVER_OPTIONS.maxSteps,
    size: 3,
    count: DEFAULT_EXPERIMENT_STATE_COUNT,
  };

  const valueFor = (i: number): string => {
    const value = args[i + 1];
    if (value === undefined) {
      throw new InvalidConfigurationError(`Missing value for ${args[i]}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case 'solve':
      case 'experiment':
      case 'generate':
      case 'help':
        options.command = arg;
        break;

      case '-s':
      case '--state':
        options.state = valueFor(i++);
        break;

      case '-i':
      case '--input':
        options.inputFile = valueFor(i++);
        break;

      case '-r':
      case '--report':
        options.reportFile = valueFor(i++);
        break;

      case '-f':
      case '--format': {
        const format = valueFor(i++);
        if (format !== 'text' && format !== 'json') {
          throw new InvalidConfigurationError(`Unknown output format: ${format} (expected text or json)`);
        }
        options.outputFormat = format;
        break;
      }

      case '-a':
      case '--algorithm': {
        const algorithm = valueFor(i++);
        if (!isAlgorithmName(algorithm)) {
          throw new InvalidConfigurationError(`Unknown algorithm: ${algorithm} (expected best-first or astar)`);
        }
        options.algorithm = algorithm;
        break;
      }

      case '-H':
      case '--heuristic': {
        const heuristic = valueFor(i++);
        if (!isHeuristicName(heuristic)) {
          throw new InvalidConfigurationError(
            `Unknown heuristic: ${heuristic} (expected misplaced, manhattan or linear_conflict)`
          );
        }
        options.heuristic = heuristic;
        break;
      }

      case '-m':
      case '--max-steps':
        options.maxSteps = parsePositiveInt(arg, valueFor(i++));
        break;

      case '--size': {
        const value = valueFor(i++);
        const size = PUZZLE_SIZES.get(value);
        if (size === undefined) {
          throw new InvalidConfigurationError(`Unknown puzzle size: ${value} (expected 8 or 15)`);
        }
        options.size = size;
        break;
      }

      case '-n':
      case '--count':
        options.count = parsePositiveInt(arg, valueFor(i++));
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        break;

      default:
        throw new InvalidConfigurationError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}
