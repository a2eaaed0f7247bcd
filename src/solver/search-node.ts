/**
 * Search tree nodes, node arena and frontier queue
 */

import { Move } from '../domain/types.js';
import { PuzzleState } from '../state/puzzle-state.js';

export interface SearchNode {
  id: number;                // arena index, doubles as insertion order
  state: PuzzleState;
  parentId: number | null;
  move: Move | null;
  depth: number;
  cost: number;      // g(n) - moves from start
  heuristic: number; // h(n) - estimated moves to goal
  priority: number;  // frontier ordering key
}

/**
 * Owns every node created during one search.
 * Parent links are arena indices, so the tree holds no object back-references.
 */
export class NodeArena {
  private nodes: SearchNode[] = [];

  /**
   * Create a node; its priority is filled in by the caller's ordering policy
   */
  add(
    state: PuzzleState,
    parentId: number | null,
    move: Move | null,
    cost: number,
    heuristic: number,
    priority: number
  ): SearchNode {
    const parent = parentId === null ? null : this.get(parentId);
    const node: SearchNode = {
      id: this.nodes.length,
      state,
      parentId,
      move,
      depth: parent ? parent.depth + 1 : 0,
      cost,
      heuristic,
      priority,
    };

    this.nodes.push(node);
    return node;
  }

  get(id: number): SearchNode {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new RangeError(`No search node with id ${id}`);
    }
    return node;
  }

  size(): number {
    return this.nodes.length;
  }

  /**
   * Nodes from the root down to `id`
   */
  pathTo(id: number): SearchNode[] {
    const path: SearchNode[] = [];
    let current: number | null = id;

    while (current !== null) {
      const node = this.get(current);
      path.push(node);
      current = node.parentId;
    }

    return path.reverse();
  }
}

/**
 * Extract the moves from the root to a node
 */
export function extractMovePath(arena: NodeArena, id: number): Move[] {
  const moves: Move[] = [];

  for (const node of arena.pathTo(id)) {
    if (node.move !== null) {
      moves.push(node.move);
    }
  }

  return moves;
}

/**
 * Min-priority queue; equal priorities come out in insertion order
 */
export class PriorityQueue<T extends { priority: number; id: number }> {
  private items: T[] = [];

  push(item: T): void {
    // Binary heap insert
    this.items.push(item);
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    if (this.items.length === 0) return undefined;

    const result = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.bubbleDown(0);
    }

    return result;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  private before(a: T, b: T): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.id < b.id);
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.before(this.items[index], this.items[parentIndex])) {
        break;
      }
      [this.items[parentIndex], this.items[index]] = [this.items[index], this.items[parentIndex]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (leftChild < this.items.length &&
          this.before(this.items[leftChild], this.items[smallest])) {
        smallest = leftChild;
      }

      if (rightChild < this.items.length &&
          this.before(this.items[rightChild], this.items[smallest])) {
        smallest = rightChild;
      }

      if (smallest === index) break;

      [this.items[smallest], this.items[index]] = [this.items[index], this.items[smallest]];
      index = smallest;
    }
  }
}
