import type { Coordinate } from "./types"

/**
 * King-move offsets, x outer and y inner. Ties in the frontier fall back to
 * insertion order, so this order decides which of several equal routes wins.
 */
export const GRID_NEIGHBOR_OFFSETS: ReadonlyArray<Coordinate> = [
  { x: -1, y: -1 },
  { x: -1, y: 0 },
  { x: -1, y: 1 },
  { x: 0, y: -1 },
  { x: 0, y: 1 },
  { x: 1, y: -1 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
]

export const cellIndexOf = (size: number, coord: Coordinate): number =>
  coord.x * size + coord.y

export const coordinateOfCellIndex = (
  size: number,
  index: number,
): Coordinate => ({
  x: Math.floor(index / size),
  y: index % size,
})

export const coordinatesEqual = (a: Coordinate, b: Coordinate): boolean =>
  a.x === b.x && a.y === b.y

export const formatCoordinate = (coord: Coordinate): string =>
  `(${coord.x},${coord.y})`

export const formatCoordinateList = (coords: Coordinate[]): string =>
  `[${coords.map(formatCoordinate).join(",")}]`
