import { expect, test } from "vitest"
import { InvalidInputError } from "lib/errors"
import { Grid } from "lib/Grid"

test("a new grid has no obstacles", () => {
  const grid = new Grid(3)

  expect([...grid.cells()]).toHaveLength(9)
  expect(grid.obstacles()).toEqual([])
  expect(grid.isPassable({ x: 2, y: 2 })).toBe(true)
})

test("grid size must be a positive integer", () => {
  expect(() => new Grid(0)).toThrow(InvalidInputError)
  expect(() => new Grid(2.5)).toThrow("Grid size must be a positive integer, got 2.5")
})

test("obstacles can be set and cleared", () => {
  const grid = new Grid(4)

  grid.setObstacle({ x: 1, y: 2 })
  grid.setObstacle({ x: 3, y: 0 })
  expect(grid.isObstacle({ x: 1, y: 2 })).toBe(true)
  expect(grid.getCell({ x: 1, y: 2 })).toEqual({
    coordinate: { x: 1, y: 2 },
    passable: false,
  })

  grid.setObstacle({ x: 1, y: 2 }, false)
  expect(grid.obstacles()).toEqual([{ x: 3, y: 0 }])
})

test("cells are listed x-major", () => {
  const grid = Grid.fromObstacles(2, [{ x: 1, y: 0 }])

  expect([...grid.cells()]).toEqual([
    { coordinate: { x: 0, y: 0 }, passable: true },
    { coordinate: { x: 0, y: 1 }, passable: true },
    { coordinate: { x: 1, y: 0 }, passable: false },
    { coordinate: { x: 1, y: 1 }, passable: true },
  ])
})

test("inBounds rejects negative, too large and fractional coordinates", () => {
  const grid = new Grid(5)

  expect(grid.inBounds({ x: 0, y: 4 })).toBe(true)
  expect(grid.inBounds({ x: -1, y: 0 })).toBe(false)
  expect(grid.inBounds({ x: 0, y: 5 })).toBe(false)
  expect(grid.inBounds({ x: 0.5, y: 1 })).toBe(false)
})

test("reading or writing outside the grid throws", () => {
  const grid = new Grid(2)

  expect(() => grid.isPassable({ x: 2, y: 0 })).toThrow(
    "(2,0) is outside the 2x2 grid",
  )
  expect(() => grid.setObstacle({ x: 0, y: -1 })).toThrow(InvalidInputError)
})

test("snapshots do not follow later edits", () => {
  const grid = new Grid(2)
  const snapshot = grid.snapshotPassability()

  grid.setObstacle({ x: 1, y: 1 })

  expect([...snapshot]).toEqual([0, 0, 0, 0])
  expect([...grid.snapshotPassability()]).toEqual([0, 0, 0, 1])
})
