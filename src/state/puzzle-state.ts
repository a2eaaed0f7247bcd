/**
 * Puzzle state representation and move generation
 */

import { Coord, Move } from '../domain/types.js';
import { MOVES, MOVE_OFFSETS, SUPPORTED_SIZES } from '../domain/constants.js';
import { IllegalMoveError, InvalidStateError } from '../domain/errors.js';

export interface PuzzleState {
  readonly tiles: readonly number[];
  readonly size: number;
  readonly blankIndex: number;
}

export interface Neighbor {
  move: Move;
  state: PuzzleState;
}

/**
 * Create a state from a tile sequence (0 = blank)
 * The sequence is copied; the returned state is frozen.
 */
export function createPuzzleState(tiles: readonly number[]): PuzzleState {
  const size = Math.round(Math.sqrt(tiles.length));

  if (size * size !== tiles.length || !SUPPORTED_SIZES.includes(size)) {
    const lengths = SUPPORTED_SIZES.map(s => s * s).join(' or ');
    throw new InvalidStateError(`State must have exactly ${lengths} tiles, got ${tiles.length}`);
  }

  const seen = new Set<number>();
  for (const tile of tiles) {
    if (!Number.isInteger(tile) || tile < 0 || tile >= tiles.length) {
      throw new InvalidStateError(`Tile ${tile} is outside 0-${tiles.length - 1}`);
    }
    if (seen.has(tile)) {
      throw new InvalidStateError(`Tile ${tile} appears more than once`);
    }
    seen.add(tile);
  }

  return freezeState([...tiles], size);
}

function freezeState(tiles: number[], size: number): PuzzleState {
  return Object.freeze({
    tiles: Object.freeze(tiles),
    size,
    blankIndex: tiles.indexOf(0),
  });
}

/**
 * Goal configuration: tiles ascending, blank last
 */
export function createGoalState(size: number): PuzzleState {
  const tiles = Array.from({ length: size * size }, (_, i) => (i + 1) % (size * size));
  return createPuzzleState(tiles);
}

export function indexToCoord(index: number, size: number): Coord {
  return { row: Math.floor(index / size), col: index % size };
}

export function getBlankPosition(state: PuzzleState): Coord {
  return indexToCoord(state.blankIndex, state.size);
}

/**
 * Current position of a tile
 */
export function getTilePosition(state: PuzzleState, tile: number): Coord {
  const index = state.tiles.indexOf(tile);
  if (index < 0) {
    throw new InvalidStateError(`Tile ${tile} is not on the board`);
  }
  return indexToCoord(index, state.size);
}

/**
 * Where a tile sits in the goal configuration
 */
export function getGoalPosition(tile: number, size: number): Coord {
  const index = tile === 0 ? size * size - 1 : tile - 1;
  return indexToCoord(index, size);
}

export function getLegalMoves(state: PuzzleState): Move[] {
  const { row, col } = getBlankPosition(state);

  return MOVES.filter(move => {
    const { dRow, dCol } = MOVE_OFFSETS[move];
    const r = row + dRow;
    const c = col + dCol;
    return r >= 0 && r < state.size && c >= 0 && c < state.size;
  });
}

/**
 * Slide the blank one cell, returning a new state
 */
export function applyMove(state: PuzzleState, move: Move): PuzzleState {
  if (!getLegalMoves(state).includes(move)) {
    const { row, col } = getBlankPosition(state);
    throw new IllegalMoveError(`Illegal move: ${move} (blank at row ${row}, col ${col})`);
  }

  const { dRow, dCol } = MOVE_OFFSETS[move];
  const swapIndex = state.blankIndex + dRow * state.size + dCol;
  const tiles = [...state.tiles];

  [tiles[state.blankIndex], tiles[swapIndex]] = [tiles[swapIndex], tiles[state.blankIndex]];

  return freezeState(tiles, state.size);
}

/**
 * Successor states in up, down, left, right order
 */
export function* neighbors(state: PuzzleState): Generator<Neighbor> {
  for (const move of getLegalMoves(state)) {
    yield { move, state: applyMove(state, move) };
  }
}

export function isGoal(state: PuzzleState): boolean {
  const last = state.tiles.length - 1;
  return state.tiles.every((tile, i) => tile === (i === last ? 0 : i + 1));
}

/**
 * Pairs of non-blank tiles appearing in reverse order
 */
export function countInversions(state: PuzzleState): number {
  const tiles = state.tiles.filter(t => t !== 0);
  let inversions = 0;

  for (let i = 0; i < tiles.length; i++) {
    for (let j = i + 1; j < tiles.length; j++) {
      if (tiles[i] > tiles[j]) {
        inversions++;
      }
    }
  }

  return inversions;
}

/**
 * Odd width: inversions must be even.
 * Even width: inversions plus the blank's row distance from the last row must be even.
 */
export function isSolvable(state: PuzzleState): boolean {
  const inversions = countInversions(state);

  if (state.size % 2 === 1) {
    return inversions % 2 === 0;
  }

  const rowsFromBottom = state.size - 1 - getBlankPosition(state).row;
  return (inversions + rowsFromBottom) % 2 === 0;
}

export function statesEqual(a: PuzzleState, b: PuzzleState): boolean {
  return a.size === b.size && a.tiles.every((tile, i) => tile === b.tiles[i]);
}
