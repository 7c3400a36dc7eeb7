import { cellIndexOf } from "./coordinates"
import { PriorityQueue } from "./PriorityQueue"
import type { SearchNodeArena } from "./SearchNodeArena"
import type { Coordinate, SearchMode } from "./types"

export type FrontierOrdering = (
  arena: SearchNodeArena,
  a: number,
  b: number,
) => number

/** Classic A*: lowest f = cost + heuristic first. */
export const compareByFValue: FrontierOrdering = (arena, a, b) =>
  arena.fValue(a) - arena.fValue(b)

/**
 * Fewest obstacles crossed first, whatever the length; f only decides between
 * equal obstacle counts.
 */
export const compareByObstaclesThenFValue: FrontierOrdering = (arena, a, b) =>
  arena.obstaclesCrossed[a] - arena.obstaclesCrossed[b] ||
  compareByFValue(arena, a, b)

export const FRONTIER_ORDERINGS: Record<SearchMode, FrontierOrdering> = {
  strict: compareByFValue,
  relaxed: compareByObstaclesThenFValue,
}

/**
 * Open set of one search. Holds cell indices and reads their priorities from
 * the arena, so a node whose cost changed must be passed to `insertOrUpdate`
 * again.
 */
export class Frontier {
  private queue: PriorityQueue<number>

  constructor(
    private arena: SearchNodeArena,
    mode: SearchMode,
  ) {
    const ordering = FRONTIER_ORDERINGS[mode]
    this.queue = new PriorityQueue<number>((a, b) => ordering(arena, a, b))
  }

  get size(): number {
    return this.queue.size
  }

  insertOrUpdate(index: number): void {
    this.queue.enqueue(index)
  }

  popBest(): number | undefined {
    return this.queue.dequeue()
  }

  isEmpty(): boolean {
    return this.queue.isEmpty()
  }

  contains(coord: Coordinate): boolean {
    return this.queue.has(cellIndexOf(this.arena.size, coord))
  }
}
