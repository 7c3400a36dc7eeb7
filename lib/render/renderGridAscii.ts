import { cellIndexOf, formatCoordinateList } from "../coordinates"
import type { Grid } from "../Grid"
import type { Route } from "../types"

export const CELL_SYMBOLS = {
  empty: " ",
  obstacle: "X",
  route: "O",
  routeThroughObstacle: "+",
}

/** Rows from the top (y = size - 1) down, so y grows upwards. */
export const renderGridAscii = (grid: Grid, route?: Route): string => {
  const onRoute = new Set<number>()
  for (const coord of route?.coordinates ?? []) {
    onRoute.add(cellIndexOf(grid.size, coord))
  }

  const rows: string[] = []
  for (let y = grid.size - 1; y >= 0; y--) {
    const cells: string[] = []
    for (let x = 0; x < grid.size; x++) {
      const isObstacle = grid.isObstacle({ x, y })
      let symbol = isObstacle ? CELL_SYMBOLS.obstacle : CELL_SYMBOLS.empty
      if (onRoute.has(cellIndexOf(grid.size, { x, y }))) {
        symbol = isObstacle
          ? CELL_SYMBOLS.routeThroughObstacle
          : CELL_SYMBOLS.route
      }
      cells.push(`[${symbol}]`)
    }
    rows.push(cells.join(" "))
  }
  return rows.join("\n")
}

export const describeRoute = (route: Route): string[] => {
  const lines = [
    formatCoordinateList(route.coordinates),
    `This is ${route.steps} steps`,
  ]
  if (route.obstaclesCrossed > 0) {
    lines.push(
      `Obstacles were traversed at: ${formatCoordinateList(route.obstacleCoordinates)}`,
    )
  }
  return lines
}
