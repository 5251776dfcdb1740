export {
  GameLoopController,
  DEFAULT_STEP_DELAY_MS,
  DEFAULT_GAME_DELAY_MS,
} from "./controller.js";
export type { GameLoopControllerConfig } from "./controller.js";
export {
  verifyProbabilities,
  bestProbability,
  rangeCheck,
  guessBoundCheck,
  globalSumCheck,
  localSumCheck,
} from "./verifier.js";
export type { VerifierInput, VerifierOptions } from "./verifier.js";
export {
  selectGuess,
  minimumCells,
  cornerThenEdgePolicy,
  cornerPolicy,
  firstMinimumPolicy,
  DEFAULT_GUESS_POLICY,
  GUESS_POLICIES,
  resolveGuessPolicy,
} from "./policies.js";
export type { GuessPolicy, MinimumCells } from "./policies.js";
export { StatisticsTracker } from "./statistics.js";
export { CancellationToken, sleep } from "./cancellation.js";
export type { SleepFn } from "./cancellation.js";
export {
  DEFAULT_TOLERANCE,
  assertGridShape,
  boxSums,
  effectiveMass,
  formatCell,
  isClose,
  isCorner,
  isEdge,
  compareCoordinates,
} from "./grid.js";
export type { GridSize } from "./grid.js";
export {
  GridShapeError,
  ProbabilityInconsistencyError,
  NoGuessAvailableError,
  InvalidTransitionError,
} from "./errors.js";
