import type { Grid } from "./Grid"
import { GridPathSolver } from "./GridPathSolver/GridPathSolver"
import type { Coordinate, SearchMode, SearchResult } from "./types"

export type SearchOptions = {
  maxExpansionsPerCell?: number
}

const runSolver = (
  grid: Grid,
  start: Coordinate,
  goal: Coordinate,
  mode: SearchMode,
  options: SearchOptions,
): GridPathSolver => {
  const solver = new GridPathSolver({ grid, start, goal, mode, ...options })
  solver.solve()
  return solver
}

/**
 * Runs one search to completion. A missing route is a result, not an error;
 * bad input, a broken predecessor chain and an exhausted iteration budget
 * throw.
 */
export const search = (
  grid: Grid,
  start: Coordinate,
  goal: Coordinate,
  mode: SearchMode,
  options: SearchOptions = {},
): SearchResult => {
  return runSolver(grid, start, goal, mode, options).getOutput()
}

export type FallbackSearchResult = SearchResult & { mode: SearchMode }

/**
 * Tries an obstacle-free route first and only crosses obstacles when none
 * exists, or when the start or goal is itself an obstacle. Whenever strict
 * succeeds, relaxed would also return a route of the same length with no
 * obstacles, so the order only saves work.
 *
 * Returns the solver that produced the answer, for callers that also want its
 * stats or visualization.
 */
export const solveWithFallback = (
  grid: Grid,
  start: Coordinate,
  goal: Coordinate,
  options: SearchOptions = {},
): GridPathSolver => {
  if (grid.isPassable(start) && grid.isPassable(goal)) {
    const strictSolver = runSolver(grid, start, goal, "strict", options)
    if (strictSolver.state !== "exhausted") return strictSolver
  }
  return runSolver(grid, start, goal, "relaxed", options)
}

export const findRouteWithFallback = (
  grid: Grid,
  start: Coordinate,
  goal: Coordinate,
  options: SearchOptions = {},
): FallbackSearchResult => {
  const solver = solveWithFallback(grid, start, goal, options)
  return { ...solver.getOutput(), mode: solver.mode }
}
