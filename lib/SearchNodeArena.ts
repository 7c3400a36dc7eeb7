import { coordinateOfCellIndex } from "./coordinates"
import type { NodeMembership, SearchNode } from "./types"

const UNSEEN = 0
const OPEN = 1
const CLOSED = 2

const MEMBERSHIP_NAMES: NodeMembership[] = ["unseen", "open", "closed"]

/**
 * Search bookkeeping for every cell of one search, stored in flat arrays
 * indexed by cell index. Predecessors are cell indices, so the parent chain
 * holds no object references.
 */
export class SearchNodeArena {
  readonly size: number
  readonly costFromStart: Int32Array
  readonly obstaclesCrossed: Int32Array
  readonly heuristic: Int32Array
  readonly predecessor: Int32Array
  private membership: Uint8Array

  constructor(size: number, heuristicOf: (index: number) => number) {
    const cellCount = size * size
    this.size = size
    this.costFromStart = new Int32Array(cellCount).fill(-1)
    this.obstaclesCrossed = new Int32Array(cellCount)
    this.heuristic = new Int32Array(cellCount)
    this.predecessor = new Int32Array(cellCount).fill(-1)
    this.membership = new Uint8Array(cellCount)
    for (let index = 0; index < cellCount; index++) {
      this.heuristic[index] = heuristicOf(index)
    }
  }

  get cellCount(): number {
    return this.membership.length
  }

  isUnseen(index: number): boolean {
    return this.membership[index] === UNSEEN
  }

  isOpen(index: number): boolean {
    return this.membership[index] === OPEN
  }

  isClosed(index: number): boolean {
    return this.membership[index] === CLOSED
  }

  fValue(index: number): number {
    return this.costFromStart[index] + this.heuristic[index]
  }

  /** Records a better path to `index` and marks it open. */
  open(
    index: number,
    costFromStart: number,
    obstaclesCrossed: number,
    predecessor: number,
  ): void {
    this.costFromStart[index] = costFromStart
    this.obstaclesCrossed[index] = obstaclesCrossed
    this.predecessor[index] = predecessor
    this.membership[index] = OPEN
  }

  close(index: number): void {
    this.membership[index] = CLOSED
  }

  /**
   * Links the goal to the node it was reached from without opening it; the
   * search ends as soon as the goal is seen.
   */
  reachGoal(index: number, predecessor: number, obstaclesCrossed: number) {
    this.costFromStart[index] = this.costFromStart[predecessor] + 1
    this.obstaclesCrossed[index] = obstaclesCrossed
    this.predecessor[index] = predecessor
    this.membership[index] = CLOSED
  }

  getNode(index: number): SearchNode {
    const cost = this.costFromStart[index]
    const predecessor = this.predecessor[index]
    return {
      coordinate: coordinateOfCellIndex(this.size, index),
      costFromStart: cost < 0 ? null : cost,
      obstaclesCrossed: this.obstaclesCrossed[index],
      heuristic: this.heuristic[index],
      predecessor:
        predecessor < 0 ? null : coordinateOfCellIndex(this.size, predecessor),
      membership: MEMBERSHIP_NAMES[this.membership[index]],
    }
  }
}
