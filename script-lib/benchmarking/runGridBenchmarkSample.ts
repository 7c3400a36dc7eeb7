import { Grid } from "../../lib/Grid"
import { GridPathSolver } from "../../lib/GridPathSolver/GridPathSolver"
import { placeRandomObstacles } from "../../lib/obstacles/placeRandomObstacles"
import type { SearchMode } from "../../lib/types"

export type GridBenchmarkSample = {
  seed: number
  mode: SearchMode
  found: boolean
  failed: boolean
  iterations: number
  reopenedNodes: number
  steps?: number
  obstaclesCrossed?: number
  duration: number
}

/**
 * Solves one seeded random grid from corner to corner. `density` is the share
 * of cells turned into obstacles.
 */
export const runGridBenchmarkSample = (params: {
  size: number
  density: number
  seed: number
  mode: SearchMode
}): GridBenchmarkSample => {
  const { size, density, seed, mode } = params
  const start = { x: 0, y: 0 }
  const goal = { x: size - 1, y: size - 1 }
  const grid = new Grid(size)
  placeRandomObstacles(grid, Math.round(size * size * density), {
    seed,
    exclude: [start, goal],
  })

  const solver = new GridPathSolver({ grid, start, goal, mode })
  const startTime = performance.now()
  solver.solve()
  const duration = performance.now() - startTime

  const sample: GridBenchmarkSample = {
    seed,
    mode,
    found: solver.state === "goal-reached",
    failed: solver.failed && solver.state !== "exhausted",
    iterations: solver.iterations,
    reopenedNodes: solver.stats.reopenedNodes,
    duration,
  }
  if (solver.state === "goal-reached") {
    const output = solver.getOutput()
    if (output.found) {
      sample.steps = output.route.steps
      sample.obstaclesCrossed = output.route.obstaclesCrossed
    }
  }
  return sample
}
