import type { BoardState, Coordinate, InferenceEngine, Probability, ProbabilityGrid } from "@autosweep/schemas";
import { neighbours } from "./board.js";
import { EngineLimitError, InconsistentBoardError } from "./errors.js";

export interface ExhaustiveEngineOptions {
  numMines: number;
  /** Search nodes allowed per solve() before EngineLimitError. */
  maxNodes?: number;
}

export const DEFAULT_MAX_NODES = 2_000_000;

interface Constraint {
  /** Indices into the component's cells. */
  cells: number[];
  need: number;
}

interface Component {
  cells: Coordinate[];
  constraints: Constraint[];
}

/** Solutions of one component, grouped by how many mines they use. */
interface ComponentCounts {
  /** counts[k]: layouts with k mines. */
  counts: number[];
  /** cellMines[k][i]: layouts with k mines that put one on cell i. */
  cellMines: number[][];
}

/**
 * Exact mine probabilities by enumeration. Hidden cells next to a revealed
 * number form the frontier; it is split into independent components, each
 * enumerated by backtracking. Components are then combined with the
 * unconstrained cells through binomial weights over the remaining mine count.
 *
 * A cell that is a mine in every layout gets exactly 1, and one that never is
 * gets exactly 0: its numerator is summed term by term in the same order as
 * the normalising total.
 */
export class ExhaustiveEngine implements InferenceEngine {
  private readonly numMines: number;
  private readonly maxNodes: number;

  constructor(options: ExhaustiveEngineOptions) {
    this.numMines = options.numMines;
    this.maxNodes = options.maxNodes ?? DEFAULT_MAX_NODES;
  }

  solve(state: BoardState): ProbabilityGrid {
    const height = state.length;
    const width = state[0]?.length ?? 0;
    const cellAt = (c: Coordinate) => state[c.y]?.[c.x];

    let flags = 0;
    const hidden: Coordinate[] = [];
    state.forEach((row, y) => row.forEach((cell, x) => {
      if (cell === "flag") flags++;
      else if (cell === "hidden") hidden.push({ x, y });
    }));
    const minesLeft = this.numMines - flags;
    if (minesLeft < 0) {
      throw new InconsistentBoardError(`${flags} flags placed but the board only has ${this.numMines} mines`);
    }

    // Frontier cells and the constraints over them.
    const key = (c: Coordinate) => c.y * width + c.x;
    const frontierIndex = new Map<number, number>();
    const frontier: Coordinate[] = [];
    const rawConstraints: { cells: number[]; need: number }[] = [];
    state.forEach((row, y) => row.forEach((cell, x) => {
      if (typeof cell !== "number") return;
      const around = neighbours({ x, y }, width, height);
      const open = around.filter((n) => cellAt(n) === "hidden");
      const need = cell - around.filter((n) => cellAt(n) === "flag").length;
      if (need < 0 || need > open.length) {
        throw new InconsistentBoardError(`The ${cell} at (${x}, ${y}) cannot be satisfied`);
      }
      if (open.length === 0) return;
      const cells = open.map((n) => {
        const k = key(n);
        let index = frontierIndex.get(k);
        if (index === undefined) {
          index = frontier.length;
          frontierIndex.set(k, index);
          frontier.push(n);
        }
        return index;
      });
      rawConstraints.push({ cells, need });
    }));

    const components = splitComponents(frontier, rawConstraints);
    const budget = { nodes: 0, max: this.maxNodes };
    const solved = components.map((c) => enumerate(c, minesLeft, budget));
    const free = hidden.length - frontier.length;

    const grid: Probability[][] = state.map((row) => row.map((cell): Probability => (cell === "flag" ? 1 : null)));
    const setCell = (c: Coordinate, p: number) => {
      const row = grid[c.y];
      if (row) row[c.x] = p;
    };

    // Every weight is scaled by the same power of two, which cancels in each ratio.
    const all = convolveAll(solved.map((s) => s.counts));
    const binomials = binomialRow(free);
    const offset = weightOffset(binomials, all, minesLeft);
    const freeWays = (mines: number): number => {
      const entry = mines >= 0 && mines <= free ? binomials[mines] : undefined;
      return entry ? entry.mantissa * 2 ** (entry.exponent - offset) : 0;
    };

    solved.forEach((own, c) => {
      const others = convolveAll(solved.filter((_, i) => i !== c).map((s) => s.counts));
      // weight[k]: placements of everything else, given this component uses k mines
      const weight = own.counts.map((ways, k) => {
        if (ways === 0) return 0;
        let sum = 0;
        others.forEach((rest, r) => { sum += rest * freeWays(minesLeft - k - r); });
        return sum;
      });
      let total = 0;
      own.counts.forEach((ways, k) => { total += ways * (weight[k] ?? 0); });
      if (total === 0) throw new InconsistentBoardError(`No layout fits the ${minesLeft} mines left`);
      const component = components[c];
      component?.cells.forEach((cell, i) => {
        let mass = 0;
        own.cellMines.forEach((row, k) => { mass += (row[i] ?? 0) * (weight[k] ?? 0); });
        setCell(cell, mass / total);
      });
    });

    if (free > 0) {
      let total = 0;
      let mass = 0;
      all.forEach((ways, k) => {
        const w = ways * freeWays(minesLeft - k);
        total += w;
        mass += w * ((minesLeft - k) / free);
      });
      if (total === 0) throw new InconsistentBoardError(`No layout fits the ${minesLeft} mines left`);
      const p = mass / total;
      for (const cell of hidden) {
        if (!frontierIndex.has(key(cell))) setCell(cell, p);
      }
    }
    return grid;
  }
}

/** Groups constraints that share cells, with union-find over frontier indices. */
function splitComponents(frontier: Coordinate[], constraints: { cells: number[]; need: number }[]): Component[] {
  const parent = frontier.map((_, i) => i);
  const find = (i: number): number => {
    let root = i;
    while ((parent[root] ?? root) !== root) root = parent[root] ?? root;
    while (i !== root) {
      const next = parent[i] ?? root;
      parent[i] = root;
      i = next;
    }
    return root;
  };
  for (const { cells } of constraints) {
    const [first, ...rest] = cells;
    if (first === undefined) continue;
    for (const other of rest) parent[find(other)] = find(first);
  }

  const byRoot = new Map<number, { global: number[]; constraints: { cells: number[]; need: number }[] }>();
  frontier.forEach((_, i) => {
    const root = find(i);
    const group = byRoot.get(root);
    if (group) group.global.push(i);
    else byRoot.set(root, { global: [i], constraints: [] });
  });
  for (const constraint of constraints) {
    const first = constraint.cells[0];
    if (first !== undefined) byRoot.get(find(first))?.constraints.push(constraint);
  }

  return [...byRoot.values()].map(({ global, constraints: own }) => {
    const local = new Map(global.map((g, i): [number, number] => [g, i]));
    return {
      cells: global.map((g) => frontier[g] ?? { x: 0, y: 0 }),
      constraints: own.map((c) => ({ need: c.need, cells: c.cells.map((g) => local.get(g) ?? 0) })),
    };
  });
}

function enumerate(component: Component, minesLeft: number, budget: { nodes: number; max: number }): ComponentCounts {
  const n = component.cells.length;
  const { constraints } = component;
  const byCell: number[][] = Array.from({ length: n }, () => []);
  constraints.forEach((c, ci) => c.cells.forEach((i) => byCell[i]?.push(ci)));

  const mines = constraints.map(() => 0);
  const unassigned = constraints.map((c) => c.cells.length);
  const assignment = new Array<number>(n).fill(0);
  const counts = new Array<number>(n + 1).fill(0);
  const cellMines = Array.from({ length: n + 1 }, () => new Array<number>(n).fill(0));
  let placed = 0;

  const fits = (i: number, value: number): boolean => {
    if (placed + value > minesLeft) return false;
    for (const ci of byCell[i] ?? []) {
      const need = constraints[ci]?.need ?? 0;
      const m = (mines[ci] ?? 0) + value;
      const rest = (unassigned[ci] ?? 0) - 1;
      if (m > need || m + rest < need) return false;
    }
    return true;
  };

  const apply = (i: number, value: number, sign: 1 | -1): void => {
    for (const ci of byCell[i] ?? []) {
      mines[ci] = (mines[ci] ?? 0) + sign * value;
      unassigned[ci] = (unassigned[ci] ?? 0) - sign;
    }
    assignment[i] = sign > 0 ? value : 0;
    placed += sign * value;
  };

  const visit = (i: number): void => {
    if (++budget.nodes > budget.max) throw new EngineLimitError(budget.max);
    if (i === n) {
      counts[placed] = (counts[placed] ?? 0) + 1;
      const row = cellMines[placed];
      if (row) assignment.forEach((v, j) => { row[j] = (row[j] ?? 0) + v; });
      return;
    }
    for (const value of [0, 1]) {
      if (!fits(i, value)) continue;
      apply(i, value, 1);
      visit(i + 1);
      apply(i, value, -1);
    }
  };
  visit(0);

  if (counts.every((c) => c === 0)) {
    throw new InconsistentBoardError("A group of numbers admits no mine layout");
  }
  return { counts, cellMines };
}

/** Rescaling step for values that would otherwise leave the double range. */
const RESCALE = 2 ** 256;

/** Rescaled by a power of two once it grows large; only ratios matter. */
function convolve(a: number[], b: number[]): number[] {
  const out = new Array<number>(a.length + b.length - 1).fill(0);
  a.forEach((x, i) => b.forEach((y, j) => { out[i + j] = (out[i + j] ?? 0) + x * y; }));
  return Math.max(...out) > RESCALE ? out.map((v) => v / RESCALE) : out;
}

function convolveAll(distributions: number[][]): number[] {
  return distributions.reduce(convolve, [1]);
}

/** A large number as `mantissa × 2^exponent`. */
interface Scaled {
  mantissa: number;
  exponent: number;
}

/** C(n, k) for k = 0..n. Exact integers while they fit; large rows carry a binary exponent. */
function binomialRow(n: number): Scaled[] {
  const row: Scaled[] = [{ mantissa: 1, exponent: 0 }];
  for (let k = 1; k <= n; k++) {
    const prev = row[k - 1] ?? { mantissa: 1, exponent: 0 };
    let mantissa = (prev.mantissa * (n - k + 1)) / k;
    let exponent = prev.exponent;
    if (mantissa > RESCALE) {
      mantissa /= RESCALE;
      exponent += 256;
    }
    row.push({ mantissa, exponent });
  }
  return row;
}

/**
 * Binary exponent that brings the largest term of the normalising total,
 * `all[k] * C(free, minesLeft - k)`, into [1, 2).
 */
function weightOffset(binomials: Scaled[], all: number[], minesLeft: number): number {
  let offset = -Infinity;
  all.forEach((ways, k) => {
    const entry = binomials[minesLeft - k];
    if (!entry || ways <= 0) return;
    offset = Math.max(offset, Math.floor(entry.exponent + Math.log2(entry.mantissa * ways)));
  });
  return Number.isFinite(offset) ? offset : 0;
}
