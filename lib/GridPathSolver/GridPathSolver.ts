import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import {
  GRID_NEIGHBOR_OFFSETS,
  cellIndexOf,
  coordinateOfCellIndex,
  formatCoordinate,
} from "../coordinates"
import {
  GridRouteError,
  InvalidInputError,
  IterationLimitError,
} from "../errors"
import { Frontier } from "../Frontier"
import type { Grid } from "../Grid"
import { chebyshevDistance } from "../heuristic/chebyshevDistance"
import { SearchNodeArena } from "../SearchNodeArena"
import type {
  Coordinate,
  SearchMode,
  SearchResult,
  SearchState,
  SearchStats,
} from "../types"
import { validateSearchInput } from "../validateSearchInput"
import { reconstructRoute } from "./reconstructRoute"
import { visualizeGridPathSolver } from "./visualizeGridPathSolver"

export const GRID_PATH_SOLVER_DEFAULTS = {
  /**
   * Expansion budget per grid cell. A correct search expands each cell a
   * handful of times at most, so running past size² × this is treated as a
   * configuration error.
   */
  maxExpansionsPerCell: 8,
}

export type GridPathSolverInput = {
  grid: Grid
  start: Coordinate
  goal: Coordinate
  mode: SearchMode
  maxExpansionsPerCell?: number
}

/**
 * A* over an 8-connected grid. Each step expands one node.
 *
 * In relaxed mode nodes are ordered by (obstacles crossed, f) and a closed
 * node is opened again whenever a path with fewer obstacles, or equally many
 * and a shorter length, reaches it. Skipping closed nodes, as textbook A*
 * does, loses the fewest-obstacles route.
 */
export class GridPathSolver extends BaseSolver {
  override getSolverName(): string {
    return "GridPathSolver"
  }

  readonly size: number
  readonly mode: SearchMode
  readonly start: Coordinate
  readonly goal: Coordinate
  readonly startIndex: number
  readonly goalIndex: number
  readonly blocked: Uint8Array
  readonly arena: SearchNodeArena
  readonly frontier: Frontier

  maxExpansionsPerCell = GRID_PATH_SOLVER_DEFAULTS.maxExpansionsPerCell
  state: SearchState = "running"
  override stats: SearchStats = {
    expansions: 0,
    reopenedNodes: 0,
    peakFrontierSize: 0,
  }

  constructor(public input: GridPathSolverInput) {
    super()
    const { grid, start, goal, mode } = input
    validateSearchInput(grid, start, goal, mode)

    this.size = grid.size
    this.mode = mode
    this.start = { x: start.x, y: start.y }
    this.goal = { x: goal.x, y: goal.y }
    this.startIndex = cellIndexOf(this.size, start)
    this.goalIndex = cellIndexOf(this.size, goal)
    this.blocked = grid.snapshotPassability()
    this.maxExpansionsPerCell =
      input.maxExpansionsPerCell ?? this.maxExpansionsPerCell
    if (
      !Number.isFinite(this.maxExpansionsPerCell) ||
      this.maxExpansionsPerCell <= 0
    ) {
      throw new InvalidInputError(
        `maxExpansionsPerCell must be a positive number, got ${this.maxExpansionsPerCell}`,
      )
    }
    this.MAX_ITERATIONS = this.size * this.size * this.maxExpansionsPerCell

    this.arena = new SearchNodeArena(this.size, (index) =>
      chebyshevDistance(coordinateOfCellIndex(this.size, index), this.goal),
    )
    this.frontier = new Frontier(this.arena, mode)

    this.arena.open(this.startIndex, 0, this.blocked[this.startIndex], -1)
    this.frontier.insertOrUpdate(this.startIndex)
    this.stats.peakFrontierSize = 1

    if (this.startIndex === this.goalIndex) {
      this.arena.close(this.startIndex)
      this.state = "goal-reached"
      this.solved = true
    }
  }

  override _step() {
    const current = this.frontier.popBest()
    if (current === undefined) {
      this.state = "exhausted"
      this.failed = true
      this.error = `No ${this.mode} route from ${formatCoordinate(this.start)} to ${formatCoordinate(this.goal)}`
      return
    }

    this.arena.close(current)
    this.stats.expansions++

    const { x, y } = coordinateOfCellIndex(this.size, current)
    for (const offset of GRID_NEIGHBOR_OFFSETS) {
      const nx = x + offset.x
      const ny = y + offset.y
      if (nx < 0 || nx >= this.size || ny < 0 || ny >= this.size) continue

      const neighbor = cellIndexOf(this.size, { x: nx, y: ny })
      const isObstacle = this.blocked[neighbor] === 1
      if (isObstacle && this.mode === "strict") continue

      const newObstacles =
        this.arena.obstaclesCrossed[current] + (isObstacle ? 1 : 0)

      if (neighbor === this.goalIndex) {
        this.arena.reachGoal(neighbor, current, newObstacles)
        this.state = "goal-reached"
        this.solved = true
        return
      }

      const newCost = this.arena.costFromStart[current] + 1
      if (!this.shouldRelax(neighbor, newCost, newObstacles)) continue

      if (this.arena.isClosed(neighbor)) this.stats.reopenedNodes++
      this.arena.open(neighbor, newCost, newObstacles, current)
      this.frontier.insertOrUpdate(neighbor)
    }

    this.stats.peakFrontierSize = Math.max(
      this.stats.peakFrontierSize,
      this.frontier.size,
    )
  }

  /** Closed nodes stay eligible; see the class comment. */
  shouldRelax(neighbor: number, newCost: number, newObstacles: number) {
    if (this.arena.isUnseen(neighbor)) return true
    const knownCost = this.arena.costFromStart[neighbor]
    if (this.mode === "strict") return newCost < knownCost

    const knownObstacles = this.arena.obstaclesCrossed[neighbor]
    return (
      newObstacles < knownObstacles ||
      (newObstacles === knownObstacles && newCost < knownCost)
    )
  }

  override getOutput(): SearchResult {
    const stats = { ...this.stats }
    if (this.state === "goal-reached") {
      return {
        found: true,
        route: reconstructRoute(
          this.arena,
          this.blocked,
          this.startIndex,
          this.goalIndex,
        ),
        stats,
      }
    }
    if (this.state === "exhausted") {
      return { found: false, reason: "exhausted", stats }
    }
    if (this.failed) {
      throw new IterationLimitError(
        `${this.getSolverName()} exceeded ${this.MAX_ITERATIONS} iterations on a ${this.size}x${this.size} grid (maxExpansionsPerCell=${this.maxExpansionsPerCell})`,
        this.iterations,
      )
    }
    throw new GridRouteError(
      `${this.getSolverName()} has not finished; call solve() first`,
    )
  }

  override visualize(): GraphicsObject {
    return visualizeGridPathSolver(this)
  }
}
