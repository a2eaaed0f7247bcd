/**
 * Tests for state hashing
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { hashState } from '../../src/state/state-hash.js';
import { applyMove, createGoalState, createPuzzleState } from '../../src/state/puzzle-state.js';
import { ONE_MOVE, state } from '../puzzleTestHelper.js';

describe('State Hashing', () => {
  it('should produce the same hash for equal states', () => {
    const a = state(ONE_MOVE);
    const b = createPuzzleState([1, 2, 3, 4, 5, 6, 7, 0, 8]);

    assert.equal(hashState(a), hashState(b));
    assert.equal(hashState(applyMove(a, 'right')), hashState(createGoalState(3)));
  });

  it('should produce different hashes for different states', () => {
    assert.notEqual(hashState(state(ONE_MOVE)), hashState(createGoalState(3)));
  });

  it('should keep multi-digit tiles apart', () => {
    const a = state('1 2 3 4 5 6 7 8 9 10 11 12 13 14 15 0');
    const b = state('1 2 3 4 5 6 7 8 9 10 11 12 13 14 0 15');

    assert.equal(hashState(a), '1,2,3,4,5,6,7,8,9,10,11,12,13,14,15,0');
    assert.notEqual(hashState(a), hashState(b));
  });
});
