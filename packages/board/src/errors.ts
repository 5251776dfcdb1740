/** The board admits no mine layout: the numbers, flags and mine count contradict each other. */
export class InconsistentBoardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InconsistentBoardError";
  }
}

export class EngineLimitError extends Error {
  readonly maxNodes: number;

  constructor(maxNodes: number) {
    super(`Exhaustive search gave up after ${maxNodes} nodes`);
    this.name = "EngineLimitError";
    this.maxNodes = maxNodes;
  }
}
