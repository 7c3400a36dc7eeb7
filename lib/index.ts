export * from "./types"
export * from "./errors"
export * from "./coordinates"
export { Grid } from "./Grid"
export { chebyshevDistance } from "./heuristic/chebyshevDistance"
export { SearchNodeArena } from "./SearchNodeArena"
export { PriorityQueue } from "./PriorityQueue"
export {
  Frontier,
  FRONTIER_ORDERINGS,
  compareByFValue,
  compareByObstaclesThenFValue,
  type FrontierOrdering,
} from "./Frontier"
export {
  GridPathSolver,
  GRID_PATH_SOLVER_DEFAULTS,
  type GridPathSolverInput,
} from "./GridPathSolver/GridPathSolver"
export { reconstructRoute } from "./GridPathSolver/reconstructRoute"
export { visualizeGridPathSolver } from "./GridPathSolver/visualizeGridPathSolver"
export {
  search,
  findRouteWithFallback,
  solveWithFallback,
  type SearchOptions,
  type FallbackSearchResult,
} from "./search"
export { validateSearchInput } from "./validateSearchInput"
export { createSeededRandom } from "./obstacles/createSeededRandom"
export {
  placeRandomObstacles,
  type PlaceRandomObstaclesOptions,
} from "./obstacles/placeRandomObstacles"
export {
  renderGridAscii,
  describeRoute,
  CELL_SYMBOLS,
} from "./render/renderGridAscii"
