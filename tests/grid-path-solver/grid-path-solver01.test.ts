import { expect, test } from "vitest"
import { Grid } from "lib/Grid"
import { GridPathSolver } from "lib/GridPathSolver/GridPathSolver"
import { search } from "lib/search"

test("grid-path-solver01: open 3x3 grid takes the diagonal", () => {
  const solver = new GridPathSolver({
    grid: new Grid(3),
    start: { x: 0, y: 0 },
    goal: { x: 2, y: 2 },
    mode: "strict",
  })

  solver.solve()

  expect(solver.solved).toBe(true)
  expect(solver.state).toBe("goal-reached")
  expect(solver.stats.expansions).toBe(2)
  expect(solver.stats.reopenedNodes).toBe(0)

  const output = solver.getOutput()
  expect(output.found).toBe(true)
  if (!output.found) return
  expect(output.route.coordinates).toEqual([
    { x: 0, y: 0 },
    { x: 1, y: 1 },
    { x: 2, y: 2 },
  ])
  expect(output.route.steps).toBe(2)
  expect(output.route.obstaclesCrossed).toBe(0)
})

test("grid-path-solver01: strict mode detours around a centre obstacle", () => {
  const grid = Grid.fromObstacles(3, [{ x: 1, y: 1 }])

  const result = search(grid, { x: 0, y: 0 }, { x: 2, y: 2 }, "strict")

  expect(result.found).toBe(true)
  if (!result.found) return
  expect(result.route.coordinates).toEqual([
    { x: 0, y: 0 },
    { x: 0, y: 1 },
    { x: 1, y: 2 },
    { x: 2, y: 2 },
  ])
  expect(result.route.steps).toBe(3)
  expect(result.route.obstaclesCrossed).toBe(0)
})

test("grid-path-solver01: relaxed mode does not cross an obstacle it can go around", () => {
  const grid = Grid.fromObstacles(3, [{ x: 1, y: 1 }])

  const result = search(grid, { x: 0, y: 0 }, { x: 2, y: 2 }, "relaxed")

  expect(result.found).toBe(true)
  if (!result.found) return
  expect(result.route.coordinates).toEqual([
    { x: 0, y: 0 },
    { x: 0, y: 1 },
    { x: 1, y: 2 },
    { x: 2, y: 2 },
  ])
  expect(result.route.obstaclesCrossed).toBe(0)
  expect(result.route.obstacleCoordinates).toEqual([])
})

test("grid-path-solver01: empty grids give Chebyshev-length routes", () => {
  const grid = new Grid(6)
  for (let x = 0; x < 6; x++) {
    for (let y = 0; y < 6; y++) {
      const result = search(grid, { x: 0, y: 0 }, { x, y }, "strict")
      expect(result.found).toBe(true)
      if (!result.found) return
      expect(result.route.coordinates).toHaveLength(Math.max(x, y) + 1)
    }
  }
})

test("grid-path-solver01: searching twice returns the same route", () => {
  const grid = Grid.fromObstacles(6, [
    { x: 2, y: 1 },
    { x: 2, y: 2 },
    { x: 2, y: 3 },
    { x: 4, y: 4 },
  ])

  const first = search(grid, { x: 0, y: 2 }, { x: 5, y: 2 }, "relaxed")
  const second = search(grid, { x: 0, y: 2 }, { x: 5, y: 2 }, "relaxed")

  expect(second).toEqual(first)
})
