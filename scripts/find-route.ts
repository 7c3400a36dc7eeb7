import fs from "node:fs"
import { getSvgFromGraphicsObject } from "graphics-debug"
import { formatCoordinateList } from "../lib/coordinates"
import { InvalidInputError } from "../lib/errors"
import { Grid } from "../lib/Grid"
import { GridPathSolver } from "../lib/GridPathSolver/GridPathSolver"
import { placeRandomObstacles } from "../lib/obstacles/placeRandomObstacles"
import { describeRoute, renderGridAscii } from "../lib/render/renderGridAscii"
import { solveWithFallback } from "../lib/search"
import type { SearchMode } from "../lib/types"
import {
  getCoordinateFlag,
  getFlagValue,
  getIntegerFlag,
} from "../script-lib/parseScriptArgs"

const args = process.argv.slice(2)

if (args.includes("--help") || args.includes("-h")) {
  console.log(`
Usage: tsx scripts/find-route.ts [options]

Options:
  --size=N          Grid side length (default: 10)
  --obstacles=N     Random obstacles to add (default: 20)
  --seed=N          Seed for obstacle placement (default: current time)
  --mode=MODE       strict, relaxed or fallback (default: fallback)
  --start=x,y       Start cell (default: 0,0)
  --goal=x,y        Goal cell (default: size-1,size-1)
  --svg=PATH        Also write the solver visualization as SVG
  --help, -h        Show this help message

Without --size the fixed obstacles (9,7), (8,7), (6,7) and (6,8) are added.
`)
  process.exit(0)
}

const FIXED_OBSTACLES = [
  { x: 9, y: 7 },
  { x: 8, y: 7 },
  { x: 6, y: 7 },
  { x: 6, y: 8 },
]

const size = getIntegerFlag(args, "size", 10)
const obstacleCount = getIntegerFlag(args, "obstacles", 20)
const seed = getIntegerFlag(args, "seed", Date.now() % 2 ** 31)
const modeArg = getFlagValue(args, "mode") ?? "fallback"
const start = getCoordinateFlag(args, "start", { x: 0, y: 0 })
const goal = getCoordinateFlag(args, "goal", { x: size - 1, y: size - 1 })
const svgPath = getFlagValue(args, "svg")

if (modeArg !== "strict" && modeArg !== "relaxed" && modeArg !== "fallback") {
  console.error(`Unknown --mode "${modeArg}"`)
  process.exit(1)
}

const grid = new Grid(size)
if (getFlagValue(args, "size") === undefined) {
  for (const coord of FIXED_OBSTACLES) grid.setObstacle(coord)
}
const placed = placeRandomObstacles(grid, obstacleCount, {
  seed,
  exclude: [start, goal],
})
console.log(`Placed ${placed.length} random obstacles (seed ${seed}):`)
console.log(`${formatCoordinateList(placed)}\n`)

const runSearch = (mode: SearchMode | "fallback"): GridPathSolver => {
  if (mode === "fallback") return solveWithFallback(grid, start, goal)
  const solver = new GridPathSolver({ grid, start, goal, mode })
  solver.solve()
  return solver
}

let solver: GridPathSolver
try {
  solver = runSearch(modeArg)
} catch (error) {
  if (!(error instanceof InvalidInputError)) throw error
  console.error(error.message)
  process.exit(1)
}
if (modeArg === "fallback" && solver.mode === "relaxed") {
  console.log("Searched for the route crossing the fewest obstacles")
}

const output = solver.getOutput()
if (!output.found) {
  console.log(renderGridAscii(grid))
  console.log(`\n${solver.error ?? "Could not find a route"}`)
} else {
  const { route } = output
  if (route.obstaclesCrossed > 0) {
    console.log("Unable to reach the goal without crossing obstacles")
  }
  console.log(
    `This is a route from the start to the goal crossing ${route.obstaclesCrossed} obstacle(s)\n`,
  )
  console.log(renderGridAscii(grid, route))
  console.log()
  for (const line of describeRoute(route)) console.log(line)
}

console.log(
  `\n${solver.getSolverName()} (${solver.mode}): ${solver.stats.expansions} expansions, ${solver.stats.reopenedNodes} reopened, peak frontier ${solver.stats.peakFrontierSize}`,
)

if (svgPath) {
  fs.writeFileSync(svgPath, getSvgFromGraphicsObject(solver.visualize()))
  console.log(`Written ${svgPath}`)
}
