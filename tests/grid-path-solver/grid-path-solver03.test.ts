import { describe, expect, test } from "vitest"
import { Grid } from "lib/Grid"
import { placeRandomObstacles } from "lib/obstacles/placeRandomObstacles"
import { search } from "lib/search"
import {
  describeRouteProblems,
  referenceBestCost,
} from "../fixtures/referenceSearch"

const SIZE = 8
const START = { x: 0, y: 0 }
const GOAL = { x: 7, y: 7 }
const SEEDS = Array.from({ length: 60 }, (_, i) => i + 1)

const createRandomGrid = (seed: number): Grid => {
  const grid = new Grid(SIZE)
  placeRandomObstacles(grid, 24, { seed, exclude: [START, GOAL] })
  return grid
}

describe("grid-path-solver03: random 8x8 grids with 24 obstacles", () => {
  test.each(SEEDS)("strict mode finds a shortest route or none (seed %i)", (seed) => {
    const grid = createRandomGrid(seed)
    const expected = referenceBestCost(grid, START, GOAL, false)

    const result = search(grid, START, GOAL, "strict")

    expect(result.found).toBe(expected !== null)
    if (!result.found || !expected) return
    expect(describeRouteProblems(grid, result.route, START, GOAL)).toEqual([])
    expect(result.route.obstaclesCrossed).toBe(0)
    expect(result.route.steps).toBe(expected.steps)
  })

  test.each(SEEDS)("relaxed mode crosses the fewest obstacles, then takes the fewest steps (seed %i)", (seed) => {
    const grid = createRandomGrid(seed)
    const expected = referenceBestCost(grid, START, GOAL, true)

    const result = search(grid, START, GOAL, "relaxed")

    expect(result.found).toBe(true)
    if (!result.found || !expected) return
    expect(describeRouteProblems(grid, result.route, START, GOAL)).toEqual([])
    expect(result.route.obstaclesCrossed).toBe(expected.obstacles)
    expect(result.route.steps).toBe(expected.steps)
  })

  test.each(SEEDS)("relaxed mode never crosses more obstacles than strict (seed %i)", (seed) => {
    const grid = createRandomGrid(seed)

    const strict = search(grid, START, GOAL, "strict")
    const relaxed = search(grid, START, GOAL, "relaxed")

    if (!strict.found || !relaxed.found) return
    expect(relaxed.route.obstaclesCrossed).toBe(0)
    expect(relaxed.route.steps).toBe(strict.route.steps)
  })
})
