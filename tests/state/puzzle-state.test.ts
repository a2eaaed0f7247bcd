/**
 * Tests for puzzle state management
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  createPuzzleState,
  createGoalState,
  getBlankPosition,
  getTilePosition,
  getGoalPosition,
  getLegalMoves,
  applyMove,
  neighbors,
  isGoal,
  countInversions,
  isSolvable,
  statesEqual,
} from '../../src/state/puzzle-state.js';
import { hashState } from '../../src/state/state-hash.js';
import { IllegalMoveError, InvalidStateError } from '../../src/domain/errors.js';
import { ONE_MOVE, UNSOLVABLE, UNSOLVABLE_FIFTEEN_INVERSIONS, state } from '../puzzleTestHelper.js';

describe('Puzzle State Creation', () => {
  it('should create a 3x3 state', () => {
    const s = createPuzzleState([1, 2, 3, 4, 5, 6, 7, 8, 0]);

    assert.equal(s.size, 3);
    assert.equal(s.blankIndex, 8);
    assert.deepEqual(s.tiles, [1, 2, 3, 4, 5, 6, 7, 8, 0]);
  });

  it('should create a 4x4 state', () => {
    const s = createPuzzleState([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 0]);

    assert.equal(s.size, 4);
    assert.equal(s.blankIndex, 15);
  });

  it('should copy and freeze the tile sequence', () => {
    const tiles = [4, 5, 0, 6, 1, 8, 7, 3, 2];
    const s = createPuzzleState(tiles);
    tiles[0] = 9;

    assert.equal(s.tiles[0], 4);
    assert.ok(Object.isFrozen(s));
    assert.ok(Object.isFrozen(s.tiles));
  });

  it('should reject a wrong number of tiles', () => {
    assert.throws(() => createPuzzleState([1, 2, 3, 4, 5, 6, 7, 0]), InvalidStateError);
    assert.throws(() => createPuzzleState([]), InvalidStateError);
  });

  it('should reject unsupported grid sizes', () => {
    assert.throws(() => createPuzzleState([1, 2, 3, 0]), InvalidStateError);
    const fiveByFive = Array.from({ length: 25 }, (_, i) => i);
    assert.throws(() => createPuzzleState(fiveByFive), InvalidStateError);
  });

  it('should reject duplicate tiles', () => {
    assert.throws(
      () => createPuzzleState([1, 1, 3, 4, 5, 6, 7, 8, 0]),
      { name: 'InvalidStateError', message: 'Tile 1 appears more than once' }
    );
  });

  it('should reject out-of-range and non-integer tiles', () => {
    assert.throws(
      () => createPuzzleState([1, 2, 3, 4, 5, 6, 7, 8, 9]),
      { name: 'InvalidStateError', message: 'Tile 9 is outside 0-8' }
    );
    assert.throws(() => createPuzzleState([1, 2, 3, 4, 5, 6, 7, 8, 0.5]), InvalidStateError);
    assert.throws(() => createPuzzleState([1, 2, 3, 4, 5, 6, 7, -1, 0]), InvalidStateError);
  });

  it('should build goal states', () => {
    assert.deepEqual(createGoalState(3).tiles, [1, 2, 3, 4, 5, 6, 7, 8, 0]);
    assert.deepEqual(
      createGoalState(4).tiles,
      [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 0]
    );
  });
});

describe('Positions', () => {
  it('should locate the blank', () => {
    assert.deepEqual(getBlankPosition(state('4 5 0 6 1 8 7 3 2')), { row: 0, col: 2 });
    assert.deepEqual(getBlankPosition(state(ONE_MOVE)), { row: 2, col: 1 });
  });

  it('should locate tiles', () => {
    const s = state('4 5 0 6 1 8 7 3 2');

    assert.deepEqual(getTilePosition(s, 4), { row: 0, col: 0 });
    assert.deepEqual(getTilePosition(s, 2), { row: 2, col: 2 });
  });

  it('should give goal positions, blank last', () => {
    assert.deepEqual(getGoalPosition(1, 3), { row: 0, col: 0 });
    assert.deepEqual(getGoalPosition(5, 3), { row: 1, col: 1 });
    assert.deepEqual(getGoalPosition(0, 3), { row: 2, col: 2 });
    assert.deepEqual(getGoalPosition(12, 4), { row: 2, col: 3 });
  });
});

describe('Moves', () => {
  it('should list all four moves with the blank in the middle', () => {
    assert.deepEqual(getLegalMoves(state('1 2 3 4 0 6 7 8 5')), ['up', 'down', 'left', 'right']);
  });

  it('should list two moves in a corner', () => {
    assert.deepEqual(getLegalMoves(state('0 2 3 4 5 6 7 8 1')), ['down', 'right']);
    assert.deepEqual(getLegalMoves(state('1 2 3 4 5 6 7 8 0')), ['up', 'left']);
  });

  it('should list three moves on an edge', () => {
    assert.deepEqual(getLegalMoves(state(ONE_MOVE)), ['up', 'left', 'right']);
  });

  it('should slide the blank in each direction', () => {
    const s = state('1 2 3 4 0 6 7 8 5');

    assert.deepEqual(applyMove(s, 'up').tiles, [1, 0, 3, 4, 2, 6, 7, 8, 5]);
    assert.deepEqual(applyMove(s, 'down').tiles, [1, 2, 3, 4, 8, 6, 7, 0, 5]);
    assert.deepEqual(applyMove(s, 'left').tiles, [1, 2, 3, 0, 4, 6, 7, 8, 5]);
    assert.deepEqual(applyMove(s, 'right').tiles, [1, 2, 3, 4, 6, 0, 7, 8, 5]);
  });

  it('should leave the original state untouched', () => {
    const s = state('1 2 3 4 0 6 7 8 5');
    const moved = applyMove(s, 'up');

    assert.deepEqual(s.tiles, [1, 2, 3, 4, 0, 6, 7, 8, 5]);
    assert.equal(s.blankIndex, 4);
    assert.equal(moved.blankIndex, 1);
    assert.notEqual(moved.tiles, s.tiles);
  });

  it('should reject moves off the board', () => {
    assert.throws(() => applyMove(createGoalState(3), 'down'), IllegalMoveError);
    assert.throws(() => applyMove(createGoalState(3), 'right'), IllegalMoveError);
  });
});

describe('Neighbors', () => {
  it('should pair each legal move with its successor', () => {
    const result = [...neighbors(state(ONE_MOVE))];

    assert.deepEqual(result.map(n => n.move), ['up', 'left', 'right']);
    assert.deepEqual(result[0].state.tiles, [1, 2, 3, 4, 0, 6, 7, 5, 8]);
    assert.deepEqual(result[1].state.tiles, [1, 2, 3, 4, 5, 6, 0, 7, 8]);
    assert.deepEqual(result[2].state.tiles, [1, 2, 3, 4, 5, 6, 7, 8, 0]);
  });

  it('should produce successors lazily', () => {
    const iterator = neighbors(state('1 2 3 4 0 6 7 8 5'));
    const first = iterator.next();

    assert.equal(first.done, false);
    assert.equal(first.value.move, 'up');
  });

  it('should yield the same successors on every call', () => {
    const s = state('4 5 0 6 1 8 7 3 2');
    const first = [...neighbors(s)].map(n => hashState(n.state));
    const second = [...neighbors(s)].map(n => hashState(n.state));

    assert.deepEqual(first, second);
    assert.deepEqual(s.tiles, [4, 5, 0, 6, 1, 8, 7, 3, 2]);
  });

  it('should not share tile arrays between successors', () => {
    const result = [...neighbors(state('1 2 3 4 0 6 7 8 5'))];
    const arrays = new Set(result.map(n => n.state.tiles));

    assert.equal(arrays.size, 4);
  });
});

describe('Goal Test', () => {
  it('should recognise the goal', () => {
    assert.equal(isGoal(createGoalState(3)), true);
    assert.equal(isGoal(createGoalState(4)), true);
  });

  it('should reject non-goal states', () => {
    assert.equal(isGoal(state(ONE_MOVE)), false);
    assert.equal(isGoal(state('0 1 2 3 4 5 6 7 8')), false);
  });
});

describe('Solvability', () => {
  it('should count inversions ignoring the blank', () => {
    assert.equal(countInversions(createGoalState(3)), 0);
    assert.equal(countInversions(state('1 2 3 4 0 6 7 8 5')), 3);
    assert.equal(countInversions(state(UNSOLVABLE_FIFTEEN_INVERSIONS)), 15);
    assert.equal(countInversions(state('8 1 2 7 0 3 6 5 4')), 14);
  });

  it('should use inversion parity for 3x3 grids', () => {
    assert.equal(isSolvable(createGoalState(3)), true);
    assert.equal(isSolvable(state(ONE_MOVE)), true);
    assert.equal(isSolvable(state('8 1 2 7 0 3 6 5 4')), true);
    assert.equal(isSolvable(state('1 2 3 4 5 6 8 7 0')), false);
    assert.equal(isSolvable(state(UNSOLVABLE)), false);
    assert.equal(isSolvable(state(UNSOLVABLE_FIFTEEN_INVERSIONS)), false);
  });

  it('should add the blank row distance for 4x4 grids', () => {
    assert.equal(isSolvable(createGoalState(4)), true);
    // blank one row up: 3 inversions + 1 row
    assert.equal(isSolvable(state('1 2 3 4 5 6 7 8 9 10 11 0 13 14 15 12')), true);
    // 14 and 15 swapped: 1 inversion + 0 rows
    assert.equal(isSolvable(state('1 2 3 4 5 6 7 8 9 10 11 12 13 15 14 0')), false);
    // same swap with the blank one row up
    assert.equal(isSolvable(state('1 2 3 4 5 6 7 8 9 10 11 0 13 15 14 12')), false);
  });

  it('should split the 8-puzzle into two equal halves', () => {
    let solvable = 0;
    let total = 0;

    forEachPermutation([0, 1, 2, 3, 4, 5, 6, 7, 8], tiles => {
      total++;
      if (isSolvable(createPuzzleState(tiles))) solvable++;
    });

    assert.equal(total, 362880);
    assert.equal(solvable, 181440);
  });
});

describe('Equality', () => {
  it('should compare by tile values', () => {
    const a = state(ONE_MOVE);
    const b = createPuzzleState([1, 2, 3, 4, 5, 6, 7, 0, 8]);

    assert.equal(statesEqual(a, b), true);
    assert.equal(statesEqual(a, createGoalState(3)), false);
    assert.equal(statesEqual(applyMove(a, 'right'), createGoalState(3)), true);
  });
});

// Heap's algorithm
function forEachPermutation(items: number[], visit: (tiles: number[]) => void): void {
  const a = [...items];
  const c = a.map(() => 0);
  visit([...a]);

  let i = 0;
  while (i < a.length) {
    if (c[i] < i) {
      const j = i % 2 === 0 ? 0 : c[i];
      [a[j], a[i]] = [a[i], a[j]];
      visit([...a]);
      c[i]++;
      i = 0;
    } else {
      c[i] = 0;
      i++;
    }
  }
}
