import type { GraphicsObject } from "graphics-debug"
import { coordinateOfCellIndex } from "../coordinates"
import type { GridPathSolver } from "./GridPathSolver"

const CELL_COLORS = {
  obstacle: "rgba(52, 73, 94, 0.8)",
  closed: "rgba(52, 152, 219, 0.25)",
  open: "rgba(46, 204, 113, 0.35)",
  free: "rgba(236, 240, 241, 0.5)",
}

/**
 * One unit square per cell centred on its coordinate, the route (once found)
 * as a line, start and goal as points.
 */
export const visualizeGridPathSolver = (
  solver: GridPathSolver,
): GraphicsObject => {
  const { arena, blocked, size } = solver
  const rects: NonNullable<GraphicsObject["rects"]> = []
  const lines: NonNullable<GraphicsObject["lines"]> = []

  for (let index = 0; index < size * size; index++) {
    const center = coordinateOfCellIndex(size, index)
    let fill = CELL_COLORS.free
    if (arena.isClosed(index)) fill = CELL_COLORS.closed
    else if (arena.isOpen(index)) fill = CELL_COLORS.open
    if (blocked[index] === 1) fill = CELL_COLORS.obstacle

    const node = arena.getNode(index)
    rects.push({
      center,
      width: 0.95,
      height: 0.95,
      fill,
      label:
        node.costFromStart === null
          ? undefined
          : `g=${node.costFromStart} h=${node.heuristic} o=${node.obstaclesCrossed}`,
    })
  }

  if (solver.state === "goal-reached") {
    const output = solver.getOutput()
    if (output.found) {
      lines.push({
        points: output.route.coordinates,
        strokeColor: solver.mode === "strict" ? "blue" : "orange",
        strokeWidth: 0.15,
        label: `${output.route.steps} steps, ${output.route.obstaclesCrossed} obstacles`,
      })
    }
  }

  return {
    title: `GridPathSolver (${solver.mode})`,
    rects,
    lines,
    points: [
      { ...solver.start, label: "start", color: "green" },
      { ...solver.goal, label: "goal", color: "red" },
    ],
  }
}
