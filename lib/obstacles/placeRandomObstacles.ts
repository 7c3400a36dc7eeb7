import { coordinatesEqual } from "../coordinates"
import type { Grid } from "../Grid"
import type { Coordinate } from "../types"
import { createSeededRandom } from "./createSeededRandom"

export type PlaceRandomObstaclesOptions = {
  seed: number
  /** cells that must stay passable, usually start and goal */
  exclude?: Coordinate[]
}

/**
 * Turns up to `count` passable cells into obstacles. When fewer candidates
 * remain than requested, all of them are used. Returns the new obstacles in
 * placement order.
 */
export const placeRandomObstacles = (
  grid: Grid,
  count: number,
  { seed, exclude = [] }: PlaceRandomObstaclesOptions,
): Coordinate[] => {
  const random = createSeededRandom(seed)
  const candidates: Coordinate[] = []
  for (const cell of grid.cells()) {
    if (!cell.passable) continue
    if (exclude.some((coord) => coordinatesEqual(coord, cell.coordinate))) {
      continue
    }
    candidates.push(cell.coordinate)
  }

  const placed: Coordinate[] = []
  const target = Math.min(Math.max(0, Math.floor(count)), candidates.length)
  while (placed.length < target) {
    const [chosen] = candidates.splice(
      Math.floor(random() * candidates.length),
      1,
    )
    grid.setObstacle(chosen)
    placed.push(chosen)
  }
  return placed
}
