import { cellIndexOf, coordinateOfCellIndex, formatCoordinate } from "./coordinates"
import { InvalidInputError } from "./errors"
import type { Cell, Coordinate } from "./types"

/**
 * Square grid of cells with one obstacle flag per cell. The side length is
 * fixed at construction; only the obstacle flags change, and only while
 * setting up a search.
 */
export class Grid {
  readonly size: number
  private blocked: Uint8Array

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new InvalidInputError(
        `Grid size must be a positive integer, got ${size}`,
      )
    }
    this.size = size
    this.blocked = new Uint8Array(size * size)
  }

  static fromObstacles(size: number, obstacles: Coordinate[]): Grid {
    const grid = new Grid(size)
    for (const coord of obstacles) {
      grid.setObstacle(coord)
    }
    return grid
  }

  inBounds(coord: Coordinate): boolean {
    return (
      Number.isInteger(coord.x) &&
      Number.isInteger(coord.y) &&
      coord.x >= 0 &&
      coord.x < this.size &&
      coord.y >= 0 &&
      coord.y < this.size
    )
  }

  isPassable(coord: Coordinate): boolean {
    return this.blocked[this.indexOf(coord)] === 0
  }

  isObstacle(coord: Coordinate): boolean {
    return !this.isPassable(coord)
  }

  setObstacle(coord: Coordinate, isObstacle = true): void {
    this.blocked[this.indexOf(coord)] = isObstacle ? 1 : 0
  }

  getCell(coord: Coordinate): Cell {
    return { coordinate: { x: coord.x, y: coord.y }, passable: this.isPassable(coord) }
  }

  *cells(): IterableIterator<Cell> {
    for (let index = 0; index < this.blocked.length; index++) {
      yield {
        coordinate: coordinateOfCellIndex(this.size, index),
        passable: this.blocked[index] === 0,
      }
    }
  }

  obstacles(): Coordinate[] {
    const result: Coordinate[] = []
    for (const cell of this.cells()) {
      if (!cell.passable) result.push(cell.coordinate)
    }
    return result
  }

  /** 1 marks an obstacle. Indexed with `cellIndexOf`. */
  snapshotPassability(): Uint8Array {
    return this.blocked.slice()
  }

  private indexOf(coord: Coordinate): number {
    if (!this.inBounds(coord)) {
      throw new InvalidInputError(
        `${formatCoordinate(coord)} is outside the ${this.size}x${this.size} grid`,
      )
    }
    return cellIndexOf(this.size, coord)
  }
}
