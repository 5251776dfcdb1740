export { Minefield } from "./minefield.js";
export type { MinefieldOptions } from "./minefield.js";
export { ExhaustiveEngine, DEFAULT_MAX_NODES } from "./exhaustive-engine.js";
export type { ExhaustiveEngineOptions } from "./exhaustive-engine.js";
export { neighbours, inBounds, createMatrix } from "./board.js";
export { createRng, nextSeed, randomSeed, shuffle } from "./rng.js";
export type { Rng } from "./rng.js";
export { InconsistentBoardError, EngineLimitError } from "./errors.js";
