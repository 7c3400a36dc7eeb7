import { formatCoordinate } from "./coordinates"
import { InvalidInputError } from "./errors"
import type { Grid } from "./Grid"
import type { Coordinate, SearchMode } from "./types"

export const validateSearchInput = (
  grid: Grid,
  start: Coordinate,
  goal: Coordinate,
  mode: SearchMode,
): void => {
  if (mode !== "strict" && mode !== "relaxed") {
    throw new InvalidInputError(`Unknown search mode "${mode}"`)
  }
  for (const [label, coord] of [
    ["start", start],
    ["goal", goal],
  ] as const) {
    if (!grid.inBounds(coord)) {
      throw new InvalidInputError(
        `The ${label} ${formatCoordinate(coord)} is outside the ${grid.size}x${grid.size} grid`,
      )
    }
    // Relaxed mode may begin or end on an obstacle; it is counted as crossed.
    if (mode === "strict" && grid.isObstacle(coord)) {
      throw new InvalidInputError(
        `The ${label} ${formatCoordinate(coord)} is an obstacle, which strict mode cannot enter`,
      )
    }
  }
}
