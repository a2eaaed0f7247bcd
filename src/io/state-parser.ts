/**
 * Parse puzzle states from text input
 */

import { InvalidStateError, PuzzleError } from '../domain/errors.js';
import { PuzzleState, createPuzzleState } from '../state/puzzle-state.js';

export interface StateListParseResult {
  states: PuzzleState[];
  warnings: string[];
}

/**
 * Parse a single state
 * Format: "4 5 0 6 1 8 7 3 2" or "4,5,0,6,1,8,7,3,2", where 0 is the blank
 */
export function parseState(text: string): PuzzleState {
  const tokens = text.trim().split(/[\s,]+/).filter(t => t.length > 0);

  const tiles = tokens.map(token => {
    if (!/^\d+$/.test(token)) {
      throw new InvalidStateError(`Invalid tile "${token}" in state "${text.trim()}"`);
    }
    return Number(token);
  });

  return createPuzzleState(tiles);
}

/**
 * Parse a list of states, one per line
 * Blank lines and lines starting with # are ignored. Lines holding a state of
 * another size, or an invalid one, are skipped with a warning.
 *
 * ```
 * # 8-puzzle start states
 * 1 2 3 4 5 6 7 0 8
 * 8 1 2 7 0 3 6 5 4
 * ```
 */
export function parseStateList(content: string, size: number): StateListParseResult {
  const states: PuzzleState[] = [];
  const warnings: string[] = [];

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) return;

    const lineNumber = index + 1;

    try {
      const state = parseState(line);
      if (state.size !== size) {
        warnings.push(`Line ${lineNumber}: skipped ${state.size}×${state.size} state (expected ${size}×${size})`);
        return;
      }
      states.push(state);
    } catch (err) {
      if (!(err instanceof PuzzleError)) throw err;
      warnings.push(`Line ${lineNumber}: ${err.message}`);
    }
  });

  return { states, warnings };
}
