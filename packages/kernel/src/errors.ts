import type { Inconsistency, InconsistencyKind } from "@autosweep/schemas";

/** The engine returned a grid that does not match the board. */
export class GridShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GridShapeError";
  }
}

/** Raised when the inconsistency policy says to abort. */
export class ProbabilityInconsistencyError extends Error {
  readonly inconsistency: Inconsistency;

  constructor(inconsistency: Inconsistency) {
    super(`Probability check failed (${inconsistency.kind}): ${inconsistency.message}`);
    this.name = "ProbabilityInconsistencyError";
    this.inconsistency = inconsistency;
  }

  get kind(): InconsistencyKind {
    return this.inconsistency.kind;
  }
}

/**
 * The guess policy found no uncertain cell while the controller was guessing.
 * Points at a controller bug, not at bad data.
 */
export class NoGuessAvailableError extends Error {
  constructor(message = "No uncertain cell to guess") {
    super(message);
    this.name = "NoGuessAvailableError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Invalid controller transition: ${from} → ${to}`);
    this.name = "InvalidTransitionError";
  }
}
