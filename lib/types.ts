export type Coordinate = {
  x: number
  y: number
}

export type Cell = {
  coordinate: Coordinate
  passable: boolean
}

/**
 * "strict" treats obstacles as walls, "relaxed" lets the route cross them and
 * minimises the number crossed before minimising length.
 */
export type SearchMode = "strict" | "relaxed"

export type NodeMembership = "unseen" | "open" | "closed"

export type SearchNode = {
  coordinate: Coordinate
  /** null while the node is unseen */
  costFromStart: number | null
  obstaclesCrossed: number
  heuristic: number
  predecessor: Coordinate | null
  membership: NodeMembership
}

export type SearchState = "running" | "goal-reached" | "exhausted"

export type Route = {
  /** start to goal inclusive */
  coordinates: Coordinate[]
  steps: number
  obstaclesCrossed: number
  obstacleCoordinates: Coordinate[]
}

export type SearchStats = {
  expansions: number
  reopenedNodes: number
  peakFrontierSize: number
}

export type SearchResult =
  | { found: true; route: Route; stats: SearchStats }
  | { found: false; reason: "exhausted"; stats: SearchStats }
