import type { BoardDimensions, CellState, Coordinate, GameSession } from "@autosweep/schemas";
import { createMatrix, inBounds, neighbours } from "./board.js";
import { createRng, nextSeed, randomSeed, shuffle } from "./rng.js";
import type { Rng } from "./rng.js";

export interface MinefieldOptions extends BoardDimensions {
  /** Master seed; every game draws its own seed from it. Random when omitted. */
  seed?: number;
  /** Place mines on the first reveal, never under the revealed cell. Default true. */
  firstMoveSafe?: boolean;
  /** Fixed mine positions, used instead of random placement for every game. */
  layout?: Coordinate[];
}

type Status = "playing" | "won" | "lost";

/**
 * Reference game session. Cells are indexed `[y][x]`; a lost game leaves the
 * exploded mine hidden, since a cell state has no way to show a mine.
 */
export class Minefield implements GameSession {
  readonly width: number;
  readonly height: number;
  readonly numMines: number;
  private readonly firstMoveSafe: boolean;
  private readonly layout: Coordinate[] | undefined;
  private readonly master: Rng;
  private gameSeed = 0;
  private mines: boolean[][];
  private hints: number[][];
  private revealed: boolean[][];
  private flagged: boolean[][];
  private placed = false;
  private safeLeft = 0;
  private flags = 0;
  private status: Status = "playing";

  constructor(options: MinefieldOptions) {
    const { width, height, numMines } = options;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Invalid board size ${width}x${height}`);
    }
    this.firstMoveSafe = options.firstMoveSafe ?? true;
    const capacity = width * height - (this.firstMoveSafe ? 1 : 0);
    if (!Number.isInteger(numMines) || numMines < 0 || numMines > capacity) {
      throw new RangeError(`Cannot place ${numMines} mines on a ${width}x${height} board`);
    }
    if (options.layout) {
      if (options.layout.length !== numMines) {
        throw new RangeError(`Layout has ${options.layout.length} mines, expected ${numMines}`);
      }
      const bad = options.layout.find((c) => !inBounds(c, width, height));
      if (bad) throw new RangeError(`Layout mine (${bad.x}, ${bad.y}) is off the board`);
    }
    this.width = width;
    this.height = height;
    this.numMines = numMines;
    this.layout = options.layout;
    this.master = createRng(options.seed ?? randomSeed());
    this.mines = createMatrix(width, height, false);
    this.hints = createMatrix(width, height, 0);
    this.revealed = createMatrix(width, height, false);
    this.flagged = createMatrix(width, height, false);
    this.reset();
  }

  /** Seed of the current game. */
  get seed(): number {
    return this.gameSeed;
  }

  get state(): CellState[][] {
    return this.revealed.map((row, y) => row.map((open, x): CellState => {
      if (open) return this.hints[y]?.[x] ?? 0;
      return this.flagged[y]?.[x] ? "flag" : "hidden";
    }));
  }

  get minesRemaining(): number {
    return this.numMines - this.flags;
  }

  get done(): boolean {
    return this.status !== "playing";
  }

  isWon(): boolean {
    return this.status === "won";
  }

  reset(): void {
    this.gameSeed = nextSeed(this.master);
    this.mines = createMatrix(this.width, this.height, false);
    this.hints = createMatrix(this.width, this.height, 0);
    this.revealed = createMatrix(this.width, this.height, false);
    this.flagged = createMatrix(this.width, this.height, false);
    this.safeLeft = this.width * this.height - this.numMines;
    this.flags = 0;
    this.status = "playing";
    this.placed = false;
    if (this.layout || !this.firstMoveSafe) this.placeMines(null);
  }

  isMine(cell: Coordinate): boolean {
    return this.mines[cell.y]?.[cell.x] ?? false;
  }

  revealAction(cell: Coordinate): void {
    this.assertInBounds(cell);
    if (this.done || this.revealed[cell.y]?.[cell.x] || this.flagged[cell.y]?.[cell.x]) return;
    if (!this.placed) this.placeMines(cell);
    if (this.isMine(cell)) {
      this.status = "lost";
      return;
    }
    this.floodReveal(cell);
    if (this.safeLeft === 0) this.status = "won";
  }

  /** Toggles a flag on a hidden cell. */
  flagAction(cell: Coordinate): void {
    this.assertInBounds(cell);
    const row = this.flagged[cell.y];
    if (this.done || !row || this.revealed[cell.y]?.[cell.x]) return;
    const next = !row[cell.x];
    row[cell.x] = next;
    this.flags += next ? 1 : -1;
  }

  private placeMines(safe: Coordinate | null): void {
    const positions = this.layout ?? this.randomPositions(safe);
    for (const { x, y } of positions) {
      const row = this.mines[y];
      if (row) row[x] = true;
    }
    this.hints = this.mines.map((row, y) => row.map((_, x) =>
      neighbours({ x, y }, this.width, this.height).filter((n) => this.isMine(n)).length,
    ));
    this.placed = true;
  }

  private randomPositions(safe: Coordinate | null): Coordinate[] {
    const rng = createRng(this.gameSeed);
    const candidates: Coordinate[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (safe && safe.x === x && safe.y === y) continue;
        candidates.push({ x, y });
      }
    }
    return shuffle(candidates, rng).slice(0, this.numMines);
  }

  private floodReveal(start: Coordinate): void {
    const stack = [start];
    for (let cell = stack.pop(); cell; cell = stack.pop()) {
      const row = this.revealed[cell.y];
      if (!row || row[cell.x] || this.flagged[cell.y]?.[cell.x] || this.isMine(cell)) continue;
      row[cell.x] = true;
      this.safeLeft--;
      if (this.hints[cell.y]?.[cell.x] === 0) {
        stack.push(...neighbours(cell, this.width, this.height));
      }
    }
  }

  private assertInBounds(cell: Coordinate): void {
    if (!inBounds(cell, this.width, this.height)) {
      throw new RangeError(`Cell (${cell.x}, ${cell.y}) is off the ${this.width}x${this.height} board`);
    }
  }
}
