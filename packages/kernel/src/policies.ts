import type { Coordinate, GuessPolicyName, ProbabilityGrid } from "@autosweep/schemas";
import { compareCoordinates, isCorner, isEdge } from "./grid.js";
import type { GridSize } from "./grid.js";

/**
 * Picks the cell to reveal when no cell is known to be safe. Must return a
 * cell attaining the minimum uncertain probability, or null when no value lies
 * strictly between 0 and 1.
 */
export type GuessPolicy = (grid: ProbabilityGrid) => Coordinate | null;

export interface MinimumCells {
  probability: number;
  /** Sorted by x, then y. */
  cells: Coordinate[];
}

/** Cells tied at the smallest probability strictly inside ]0, 1[. */
export function minimumCells(grid: ProbabilityGrid): MinimumCells | null {
  let probability = Infinity;
  let cells: Coordinate[] = [];
  grid.forEach((row, y) => row.forEach((p, x) => {
    if (p === null || !(p > 0 && p < 1)) return;
    if (p < probability) {
      probability = p;
      cells = [{ x, y }];
    } else if (p === probability) {
      cells.push({ x, y });
    }
  }));
  if (cells.length === 0) return null;
  return { probability, cells: cells.sort(compareCoordinates) };
}

function gridSize(grid: ProbabilityGrid): GridSize {
  return { width: grid[0]?.length ?? 0, height: grid.length };
}

/** Smallest tied coordinate. */
export const firstMinimumPolicy: GuessPolicy = (grid) => {
  return minimumCells(grid)?.cells[0] ?? null;
};

/** A tied corner if there is one, otherwise the smallest tied coordinate. */
export const cornerPolicy: GuessPolicy = (grid) => {
  const tied = minimumCells(grid);
  if (!tied) return null;
  const size = gridSize(grid);
  return tied.cells.find((c) => isCorner(c, size)) ?? tied.cells[0] ?? null;
};

/**
 * Corners have the fewest neighbours, then edges. Opening there keeps the
 * engine's constraint sets small; among equals it is not any safer.
 */
export const cornerThenEdgePolicy: GuessPolicy = (grid) => {
  const tied = minimumCells(grid);
  if (!tied) return null;
  const size = gridSize(grid);
  return tied.cells.find((c) => isCorner(c, size))
    ?? tied.cells.find((c) => isEdge(c, size))
    ?? tied.cells[0]
    ?? null;
};

export const DEFAULT_GUESS_POLICY: GuessPolicy = cornerThenEdgePolicy;

export const GUESS_POLICIES: Record<GuessPolicyName, GuessPolicy> = {
  "corner-then-edge": cornerThenEdgePolicy,
  corner: cornerPolicy,
  first: firstMinimumPolicy,
};

export function resolveGuessPolicy(name: string): GuessPolicy {
  const entry = Object.entries(GUESS_POLICIES).find(([key]) => key === name);
  if (!entry) {
    throw new Error(`Unknown guess policy "${name}" (expected one of: ${Object.keys(GUESS_POLICIES).join(", ")})`);
  }
  return entry[1];
}

export function selectGuess(grid: ProbabilityGrid, policy: GuessPolicy = DEFAULT_GUESS_POLICY): Coordinate | null {
  return policy(grid);
}
