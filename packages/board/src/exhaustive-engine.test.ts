import { describe, it, expect } from "vitest";
import type { BoardState, CellState } from "@autosweep/schemas";
import { ExhaustiveEngine } from "./exhaustive-engine.js";
import { EngineLimitError, InconsistentBoardError } from "./errors.js";

const h = "hidden";

describe("ExhaustiveEngine", () => {
  it("spreads mines evenly over an untouched board", () => {
    const engine = new ExhaustiveEngine({ numMines: 1 });
    const grid = engine.solve([[h, h, h], [h, h, h], [h, h, h]]);
    for (const p of grid.flat()) expect(p).toBeCloseTo(1 / 9, 12);
  });

  it("shares a number's mine among its hidden neighbours", () => {
    const engine = new ExhaustiveEngine({ numMines: 1 });
    expect(engine.solve([[1, h], [h, h]])).toEqual([[null, 1 / 3], [1 / 3, 1 / 3]]);
  });

  it("gives exact 1 and 0 to certain cells", () => {
    const engine = new ExhaustiveEngine({ numMines: 1 });
    expect(engine.solve([[1, h, h]])).toEqual([[null, 1, 0]]);
  });

  it("reports flags as 1 and subtracts them from the numbers", () => {
    const engine = new ExhaustiveEngine({ numMines: 1 });
    expect(engine.solve([[1, "flag", h]])).toEqual([[null, 1, 0]]);
  });

  it("weights the frontier by the ways to place the other mines", () => {
    // Two 1s sharing (2, 0): either it holds the mine, or (0, 0) and (4, 0) do.
    const state: BoardState = [[h, 1, h, 1, h, h, h]];
    const engine = new ExhaustiveEngine({ numMines: 2 });
    expect(engine.solve(state)).toEqual([[1 / 3, null, 2 / 3, null, 1 / 3, 1 / 3, 1 / 3]]);
  });

  it("combines a certain mine with the unconstrained cells", () => {
    const engine = new ExhaustiveEngine({ numMines: 2 });
    expect(engine.solve([[1, h, h, h]])).toEqual([[null, 1, 0.5, 0.5]]);
  });

  it("stays finite when the layout counts pass the double range", () => {
    // 40x40 with 300 mines: C(1596, 299) alone is far beyond Number.MAX_VALUE.
    const state: CellState[][] = Array.from({ length: 40 }, () => Array.from({ length: 40 }, () => h));
    const corner = state[0];
    if (corner) corner[0] = 1;
    const grid = new ExhaustiveEngine({ numMines: 300 }).solve(state);
    expect(grid[0]?.[0]).toBeNull();
    for (const p of [grid[0]?.[1], grid[1]?.[0], grid[1]?.[1]]) expect(p).toBeCloseTo(1 / 3, 12);
    expect(grid[39]?.[39]).toBeCloseTo(299 / 1596, 12);
    for (const p of grid.flat()) {
      if (p !== null) expect(Number.isFinite(p)).toBe(true);
    }
  });

  it("spreads mines over a large untouched board", () => {
    const state: BoardState = Array.from({ length: 40 }, () => Array.from({ length: 40 }, () => h));
    const grid = new ExhaustiveEngine({ numMines: 300 }).solve(state);
    for (const p of grid.flat()) expect(p).toBeCloseTo(300 / 1600, 12);
  });

  describe("inconsistent boards", () => {
    it("rejects a number with too few hidden neighbours", () => {
      const engine = new ExhaustiveEngine({ numMines: 2 });
      expect(() => engine.solve([[2, h]])).toThrow(InconsistentBoardError);
      expect(() => engine.solve([[2, h]])).toThrow("The 2 at (0, 0) cannot be satisfied");
    });

    it("rejects more flags than mines", () => {
      const engine = new ExhaustiveEngine({ numMines: 0 });
      expect(() => engine.solve([["flag", h]])).toThrow("1 flags placed but the board only has 0 mines");
    });

    it("rejects numbers that need more mines than are left", () => {
      const engine = new ExhaustiveEngine({ numMines: 0 });
      expect(() => engine.solve([[1, h, h]])).toThrow("A group of numbers admits no mine layout");
    });

    it("rejects a mine count no layout can reach", () => {
      const engine = new ExhaustiveEngine({ numMines: 3 });
      expect(() => engine.solve([[h, 1, h, 1, h]])).toThrow("No layout fits the 3 mines left");
    });
  });

  it("gives up past the node limit", () => {
    const engine = new ExhaustiveEngine({ numMines: 2, maxNodes: 2 });
    expect(() => engine.solve([[h, 1, h, 1, h, h, h]])).toThrow(EngineLimitError);
  });
});
