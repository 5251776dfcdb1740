import type { BoardState, Coordinate, ProbabilityGrid, Tolerance } from "@autosweep/schemas";
import { GridShapeError } from "./errors.js";

export const DEFAULT_TOLERANCE: Tolerance = { rtol: 1e-9, atol: 1e-9 };

export interface GridSize {
  width: number;
  height: number;
}

export function boardSize(state: BoardState): GridSize {
  return { width: state[0]?.length ?? 0, height: state.length };
}

/** Throws GridShapeError unless every row of the grid matches the board. */
export function assertGridShape(state: BoardState, grid: ProbabilityGrid): void {
  const { width, height } = boardSize(state);
  if (grid.length !== height) {
    throw new GridShapeError(`Probability grid has ${grid.length} rows, board has ${height}`);
  }
  grid.forEach((row, y) => {
    if (row.length !== width) {
      throw new GridShapeError(`Probability grid row ${y} has ${row.length} cells, board has ${width}`);
    }
  });
}

export function isClose(actual: number, expected: number, tolerance: Tolerance = DEFAULT_TOLERANCE): boolean {
  return Math.abs(actual - expected) <= tolerance.atol + tolerance.rtol * Math.abs(expected);
}

export function isCorner(cell: Coordinate, size: GridSize): boolean {
  return (cell.x === 0 || cell.x === size.width - 1) && (cell.y === 0 || cell.y === size.height - 1);
}

export function isEdge(cell: Coordinate, size: GridSize): boolean {
  return cell.x === 0 || cell.x === size.width - 1 || cell.y === 0 || cell.y === size.height - 1;
}

/** Lexicographic order on (x, y). */
export function compareCoordinates(a: Coordinate, b: Coordinate): number {
  return a.x - b.x || a.y - b.y;
}

export function formatCell(cell: Coordinate): string {
  return `(${cell.x}, ${cell.y})`;
}

/**
 * Probability mass per cell as the invariants count it: flags are 1,
 * missing values are 0.
 */
export function effectiveMass(state: BoardState, grid: ProbabilityGrid): number[][] {
  return grid.map((row, y) => row.map((p, x) => (state[y]?.[x] === "flag" ? 1 : p ?? 0)));
}

/**
 * 3×3 box sum around every cell, zero padded at the border. Uses a 2-D
 * prefix-sum table, so the whole grid costs O(width × height).
 */
export function boxSums(mass: ReadonlyArray<ReadonlyArray<number>>): number[][] {
  const height = mass.length;
  const width = mass[0]?.length ?? 0;
  // prefix[y][x] = sum of mass over rows < y and columns < x
  const prefix: number[][] = [new Array<number>(width + 1).fill(0)];
  for (let y = 0; y < height; y++) {
    const above = prefix[y] ?? [];
    const row = [0];
    let rowSum = 0;
    for (let x = 0; x < width; x++) {
      rowSum += mass[y]?.[x] ?? 0;
      row.push((above[x + 1] ?? 0) + rowSum);
    }
    prefix.push(row);
  }
  const at = (y: number, x: number): number => prefix[y]?.[x] ?? 0;
  return Array.from({ length: height }, (_, y) =>
    Array.from({ length: width }, (_, x) => {
      const top = Math.max(0, y - 1);
      const bottom = Math.min(height, y + 2);
      const left = Math.max(0, x - 1);
      const right = Math.min(width, x + 2);
      return at(bottom, right) - at(top, right) - at(bottom, left) + at(top, left);
    }),
  );
}
