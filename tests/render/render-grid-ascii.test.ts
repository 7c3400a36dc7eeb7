import { expect, test } from "vitest"
import { Grid } from "lib/Grid"
import { describeRoute, renderGridAscii } from "lib/render/renderGridAscii"
import type { Route } from "lib/types"

test("renders the grid top row first with the route marked", () => {
  const grid = Grid.fromObstacles(3, [{ x: 1, y: 1 }])
  const route: Route = {
    coordinates: [
      { x: 0, y: 0 },
      { x: 0, y: 1 },
      { x: 1, y: 2 },
      { x: 2, y: 2 },
    ],
    steps: 3,
    obstaclesCrossed: 0,
    obstacleCoordinates: [],
  }

  expect(renderGridAscii(grid, route)).toBe(
    "[ ] [O] [O]\n[O] [X] [ ]\n[O] [ ] [ ]",
  )
  expect(describeRoute(route)).toEqual([
    "[(0,0),(0,1),(1,2),(2,2)]",
    "This is 3 steps",
  ])
})

test("marks obstacles on the route and lists them", () => {
  const grid = Grid.fromObstacles(3, [{ x: 1, y: 1 }])
  const route: Route = {
    coordinates: [
      { x: 0, y: 0 },
      { x: 1, y: 1 },
      { x: 2, y: 2 },
    ],
    steps: 2,
    obstaclesCrossed: 1,
    obstacleCoordinates: [{ x: 1, y: 1 }],
  }

  expect(renderGridAscii(grid, route)).toBe(
    "[ ] [ ] [O]\n[ ] [+] [ ]\n[O] [ ] [ ]",
  )
  expect(describeRoute(route)).toEqual([
    "[(0,0),(1,1),(2,2)]",
    "This is 2 steps",
    "Obstacles were traversed at: [(1,1)]",
  ])
})

test("renders a grid without a route", () => {
  const grid = Grid.fromObstacles(2, [{ x: 0, y: 1 }])

  expect(renderGridAscii(grid)).toBe("[X] [ ]\n[ ] [ ]")
})
