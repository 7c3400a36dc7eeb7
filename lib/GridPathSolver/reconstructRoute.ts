import { coordinateOfCellIndex, formatCoordinate } from "../coordinates"
import { InternalInconsistencyError } from "../errors"
import type { SearchNodeArena } from "../SearchNodeArena"
import type { Coordinate, Route } from "../types"

/**
 * Walks predecessor links from the goal back to the start. A chain longer
 * than the number of cells must contain a cycle.
 */
export const reconstructRoute = (
  arena: SearchNodeArena,
  blocked: Uint8Array,
  startIndex: number,
  goalIndex: number,
): Route => {
  const indices: number[] = []
  let current = goalIndex

  while (current !== -1) {
    if (indices.length >= arena.cellCount) {
      throw new InternalInconsistencyError(
        `Predecessor chain from ${formatCoordinate(coordinateOfCellIndex(arena.size, goalIndex))} did not end within ${arena.cellCount} cells`,
      )
    }
    indices.push(current)
    current = arena.predecessor[current]
  }

  const lastIndex = indices[indices.length - 1]
  if (lastIndex !== startIndex) {
    throw new InternalInconsistencyError(
      `Predecessor chain ended at ${formatCoordinate(coordinateOfCellIndex(arena.size, lastIndex))} instead of the start ${formatCoordinate(coordinateOfCellIndex(arena.size, startIndex))}`,
    )
  }

  indices.reverse()

  const coordinates: Coordinate[] = []
  const obstacleCoordinates: Coordinate[] = []
  for (const index of indices) {
    const coord = coordinateOfCellIndex(arena.size, index)
    coordinates.push(coord)
    if (blocked[index] === 1) obstacleCoordinates.push(coord)
  }

  return {
    coordinates,
    steps: coordinates.length - 1,
    obstaclesCrossed: obstacleCoordinates.length,
    obstacleCoordinates,
  }
}
