export class GridRouteError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Rejected before any search starts. */
export class InvalidInputError extends GridRouteError {}

/**
 * The predecessor chain is broken or cyclic. Only a defect in the relax logic
 * can produce this.
 */
export class InternalInconsistencyError extends GridRouteError {}

export class IterationLimitError extends GridRouteError {
  constructor(
    message: string,
    public readonly iterations: number,
  ) {
    super(message)
  }
}
