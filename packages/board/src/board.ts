import type { Coordinate } from "@autosweep/schemas";

/** The up to eight cells around `cell`, row by row. */
export function neighbours(cell: Coordinate, width: number, height: number): Coordinate[] {
  const out: Coordinate[] = [];
  for (let dy = -1; dy <= 1; dy++) {
    for (let dx = -1; dx <= 1; dx++) {
      if (dx === 0 && dy === 0) continue;
      const x = cell.x + dx;
      const y = cell.y + dy;
      if (x >= 0 && x < width && y >= 0 && y < height) out.push({ x, y });
    }
  }
  return out;
}

export function inBounds(cell: Coordinate, width: number, height: number): boolean {
  return Number.isInteger(cell.x) && Number.isInteger(cell.y)
    && cell.x >= 0 && cell.x < width && cell.y >= 0 && cell.y < height;
}

export function createMatrix<T>(width: number, height: number, fill: T): T[][] {
  return Array.from({ length: height }, () => Array.from({ length: width }, () => fill));
}
