import type {
  BoardState,
  Inconsistency,
  ProbabilityGrid,
  Tolerance,
  VerificationMode,
  VerificationResult,
} from "@autosweep/schemas";
import { DEFAULT_TOLERANCE, assertGridShape, boxSums, effectiveMass, formatCell, isClose } from "./grid.js";

export interface VerifierInput {
  state: BoardState;
  grid: ProbabilityGrid;
  minesRemaining: number;
}

export interface VerifierOptions {
  mode?: VerificationMode;
  tolerance?: Tolerance;
}

interface CheckContext extends VerifierInput {
  mode: VerificationMode;
  tolerance: Tolerance;
  mass: number[][];
}

type Check = (ctx: CheckContext) => Inconsistency | null;

/**
 * Smallest non-missing probability over hidden cells, or null when there is
 * none. Values on flagged or revealed cells never make a step an opening one.
 */
export function bestProbability(state: BoardState, grid: ProbabilityGrid): number | null {
  let best: number | null = null;
  for (let y = 0; y < grid.length; y++) {
    const row = grid[y] ?? [];
    for (let x = 0; x < row.length; x++) {
      const p = row[x];
      if (p === null || p === undefined || state[y]?.[x] !== "hidden") continue;
      if (best === null || p < best) best = p;
    }
  }
  return best;
}

/**
 * Every value the engine gave must be a probability. While guessing there is
 * no certain-safe cell, so exact zeros are rejected too.
 */
export const rangeCheck: Check = ({ grid, mode }) => {
  for (let y = 0; y < grid.length; y++) {
    const row = grid[y] ?? [];
    for (let x = 0; x < row.length; x++) {
      const p = row[x];
      if (p === null || p === undefined) continue;
      const inRange = mode === "guess" ? p > 0 && p <= 1 : p >= 0 && p <= 1;
      if (!inRange) {
        const bounds = mode === "guess" ? "]0, 1]" : "[0, 1]";
        return {
          kind: "out_of_range",
          message: `Probability ${p} at ${formatCell({ x, y })} is outside ${bounds}`,
          cell: { x, y },
          actual: p,
        };
      }
    }
  }
  return null;
};

/** The best hidden probability must be a real guess: strictly between 0 and 1. */
export const guessBoundCheck: Check = ({ grid, state, mode }) => {
  if (mode !== "guess") return null;
  const best = bestProbability(state, grid);
  if (best === null) {
    return { kind: "no_valid_guess_bound", message: "No hidden cell has a probability to guess on" };
  }
  if (!(best > 0 && best < 1)) {
    return {
      kind: "no_valid_guess_bound",
      message: `The best probability ${best} is outside ]0, 1[`,
      actual: best,
    };
  }
  return null;
};

/** Total mass equals the mines left plus every cell already known to be a mine. */
export const globalSumCheck: Check = ({ mass, minesRemaining, tolerance }) => {
  let total = 0;
  let certain = 0;
  for (const row of mass) {
    for (const m of row) {
      total += m;
      if (m === 1) certain++;
    }
  }
  const expected = minesRemaining + certain;
  if (!isClose(total, expected, tolerance)) {
    return {
      kind: "global_sum_mismatch",
      message: `The total probability ${total} doesn't add up to ${minesRemaining} mines left + ${certain} certain mines`,
      expected,
      actual: total,
    };
  }
  return null;
};

/** The mass around each revealed number equals that number. */
export const localSumCheck: Check = ({ state, mass, tolerance }) => {
  const sums = boxSums(mass);
  for (let y = 0; y < state.length; y++) {
    const row = state[y] ?? [];
    for (let x = 0; x < row.length; x++) {
      const cell = row[x];
      if (typeof cell !== "number") continue;
      const actual = sums[y]?.[x] ?? 0;
      if (!isClose(actual, cell, tolerance)) {
        return {
          kind: "local_sum_mismatch",
          message: `The probability around ${formatCell({ x, y })} sums to ${actual}, not ${cell}`,
          cell: { x, y },
          expected: cell,
          actual,
        };
      }
    }
  }
  return null;
};

const CHECKS: Check[] = [rangeCheck, guessBoundCheck, globalSumCheck, localSumCheck];

/**
 * Runs the four invariant checks against one snapshot of the board and the
 * grid, stopping at the first failure. Throws GridShapeError when the grid
 * does not fit the board.
 */
export function verifyProbabilities(input: VerifierInput, options?: VerifierOptions): VerificationResult {
  assertGridShape(input.state, input.grid);
  const ctx: CheckContext = {
    ...input,
    mode: options?.mode ?? "guess",
    tolerance: options?.tolerance ?? DEFAULT_TOLERANCE,
    mass: effectiveMass(input.state, input.grid),
  };
  for (const check of CHECKS) {
    const inconsistency = check(ctx);
    if (inconsistency) return { ok: false, inconsistency };
  }
  return { ok: true };
}
