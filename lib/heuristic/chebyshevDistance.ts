import type { Coordinate } from "../types"

/**
 * Number of king moves between two cells. Admissible and consistent when
 * diagonal and orthogonal moves both cost 1.
 */
export const chebyshevDistance = (a: Coordinate, b: Coordinate): number =>
  Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y))
