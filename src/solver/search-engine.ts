/**
 * Graph search over puzzle states
 *
 * Best-First and A* run the same loop and differ only in the frontier
 * ordering key: h alone, or g + h.
 */

import { Move, OrderingPolicy, SearchStats, TerminalState } from '../domain/types.js';
import { InvalidConfigurationError, UnsolvableStateError } from '../domain/errors.js';
import { PuzzleState, isGoal, isSolvable, neighbors } from '../state/puzzle-state.js';
import { hashState } from '../state/state-hash.js';
import { NodeArena, PriorityQueue, SearchNode, extractMovePath } from './search-node.js';
import { Heuristic } from './heuristics.js';

export interface SearchResult {
  solved: boolean;
  terminalState: TerminalState;
  path: Move[];
  states: PuzzleState[]; // start..goal inclusive when solved
  stats: SearchStats;
}

export function priorityFor(policy: OrderingPolicy, cost: number, heuristic: number): number {
  switch (policy) {
    case 'BY_HEURISTIC':
      return heuristic;
    case 'BY_COST_PLUS_HEURISTIC':
      return cost + heuristic;
  }
}

export class SearchEngine {
  constructor(readonly policy: OrderingPolicy) {}

  static bestFirst(): SearchEngine {
    return new SearchEngine('BY_HEURISTIC');
  }

  static astar(): SearchEngine {
    return new SearchEngine('BY_COST_PLUS_HEURISTIC');
  }

  /**
   * Search from `initialState` until the goal is popped, the frontier runs dry
   * or `maxSteps` nodes have been expanded.
   *
   * @throws UnsolvableStateError when parity rules out the goal
   * @throws InvalidConfigurationError when maxSteps is not a positive integer
   */
  solve(initialState: PuzzleState, heuristic: Heuristic, maxSteps: number): SearchResult {
    if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
      throw new InvalidConfigurationError(`maxSteps must be a positive integer, got ${maxSteps}`);
    }
    if (!isSolvable(initialState)) {
      throw new UnsolvableStateError(initialState.tiles);
    }

    return graphSearch(initialState, heuristic, this.policy, maxSteps);
  }
}

/**
 * The search loop itself, without the solvability gate.
 * On an unsolvable start it explores the reachable half of the state space.
 */
export function graphSearch(
  initialState: PuzzleState,
  heuristic: Heuristic,
  policy: OrderingPolicy,
  maxSteps: number
): SearchResult {
  const startTime = Date.now();

  const arena = new NodeArena();
  const frontier = new PriorityQueue<SearchNode>();
  // Cheapest g recorded per state hash
  const expanded = new Map<string, number>();
  const queued = new Map<string, number>();

  const startHeuristic = heuristic(initialState);
  const startNode = arena.add(
    initialState,
    null,
    null,
    0,
    startHeuristic,
    priorityFor(policy, 0, startHeuristic)
  );

  frontier.push(startNode);
  queued.set(hashState(initialState), 0);

  let nodesExpanded = 0;
  let steps = 0;

  // Every node in the arena was generated, the root included
  const stats = (): SearchStats => ({
    nodesExpanded,
    nodesGenerated: arena.size(),
    elapsedTime: Date.now() - startTime,
  });

  while (steps < maxSteps) {
    const current = frontier.pop();
    if (current === undefined) break;

    // Goal check
    if (isGoal(current.state)) {
      return {
        solved: true,
        terminalState: 'SOLVED',
        path: extractMovePath(arena, current.id),
        states: arena.pathTo(current.id).map(node => node.state),
        stats: stats(),
      };
    }

    const stateHash = hashState(current.state);

    // Skip if already expanded at equal or lower cost
    const expandedCost = expanded.get(stateHash);
    if (expandedCost !== undefined && expandedCost <= current.cost) continue;

    expanded.set(stateHash, current.cost);
    nodesExpanded++;

    for (const neighbor of neighbors(current.state)) {
      const cost = current.cost + 1;
      const neighborHash = hashState(neighbor.state);

      const seenCost = Math.min(
        expanded.get(neighborHash) ?? Infinity,
        queued.get(neighborHash) ?? Infinity
      );
      if (seenCost <= cost) continue;

      const h = heuristic(neighbor.state);
      const childNode = arena.add(
        neighbor.state,
        current.id,
        neighbor.move,
        cost,
        h,
        priorityFor(policy, cost, h)
      );

      frontier.push(childNode);
      queued.set(neighborHash, cost);
    }

    steps++;
  }

  return {
    solved: false,
    terminalState: frontier.isEmpty() ? 'EXHAUSTED' : 'STEP_LIMIT_REACHED',
    path: [],
    states: [],
    stats: stats(),
  };
}
