/**
 * autosweep Core Types
 *
 * Canonical data models shared by the controller, the verifier, the
 * reference board and the journal. Grids are row-major: `grid[y][x]`.
 */

// ─── Board ──────────────────────────────────────────────────────────

export interface Coordinate {
  x: number;
  y: number;
}

/** A hidden cell, a flagged cell, or a revealed cell with its adjacent-mine count. */
export type CellState = "hidden" | "flag" | number;

export type BoardState = ReadonlyArray<ReadonlyArray<CellState>>;

/** `null` marks a cell the engine has no value for (revealed cells, unknowns). */
export type Probability = number | null;

export type ProbabilityGrid = ReadonlyArray<ReadonlyArray<Probability>>;

export type BoardActionType = "flag" | "reveal";

export interface BoardAction {
  type: BoardActionType;
  cell: Coordinate;
}

export interface BoardDimensions {
  width: number;
  height: number;
  numMines: number;
}

export type Difficulty = "beginner" | "intermediate" | "expert";

export const DIFFICULTY_PRESETS: Record<Difficulty, BoardDimensions> = {
  beginner: { width: 9, height: 9, numMines: 10 },
  intermediate: { width: 16, height: 16, numMines: 40 },
  expert: { width: 30, height: 16, numMines: 99 },
};

// ─── Collaborators ──────────────────────────────────────────────────

/** Game session the controller plays on. Action methods may be async. */
export interface GameSession {
  readonly width: number;
  readonly height: number;
  readonly numMines: number;
  readonly minesRemaining: number;
  readonly state: BoardState;
  readonly done: boolean;
  /** Seed of the current board, when the session exposes one. */
  readonly seed?: number;
  isWon(): boolean;
  reset(): void | Promise<void>;
  revealAction(cell: Coordinate): void | Promise<void>;
  flagAction(cell: Coordinate): void | Promise<void>;
}

/** Produces a probability grid for a board. May be expensive. */
export interface InferenceEngine {
  solve(state: BoardState): ProbabilityGrid | Promise<ProbabilityGrid>;
}

/** A fresh engine is created for every game. */
export type InferenceEngineFactory = (dimensions: BoardDimensions) => InferenceEngine;

// ─── Verification ───────────────────────────────────────────────────

export type InconsistencyKind =
  | "out_of_range"
  | "no_valid_guess_bound"
  | "global_sum_mismatch"
  | "local_sum_mismatch";

export interface Inconsistency {
  kind: InconsistencyKind;
  message: string;
  cell?: Coordinate;
  expected?: number;
  actual?: number;
}

export type VerificationResult =
  | { ok: true }
  | { ok: false; inconsistency: Inconsistency };

/**
 * "guess": no certain-safe cell exists, every value must be in ]0, 1].
 * "open": exact zeros are certain-safe cells, values must be in [0, 1].
 */
export type VerificationMode = "guess" | "open";

export interface Tolerance {
  rtol: number;
  atol: number;
}

export type InconsistencyAction = "abort" | "restart" | "continue";

export type InconsistencyPolicy = Partial<Record<InconsistencyKind, InconsistencyAction>>;

// ─── Games & statistics ─────────────────────────────────────────────

export type ControllerState =
  | "idle"
  | "awaiting_probabilities"
  | "auto_resolving"
  | "verifying"
  | "guessing"
  | "opening"
  | "won"
  | "lost"
  | "cancelled"
  | "abandoned"
  | "failed";

export type GameOutcome = "won" | "lost" | "cancelled" | "abandoned";

export interface GameResult {
  game_id: string;
  outcome: GameOutcome;
  expected_win: number;
  steps: number;
  guesses: number;
  seed?: number;
}

export interface SessionStats {
  games_played: number;
  games_won: number;
  /** Sum of the per-game expected-win values. */
  expected_wins: number;
  realized_win_rate: number;
  expected_win_rate: number;
}

// ─── Snapshots & config files ───────────────────────────────────────

/** A saved board + grid pair, as checked by `autosweep verify`. */
export interface ProbabilitySnapshot {
  state: CellState[][];
  probabilities: Probability[][];
  mines_remaining: number;
  mode?: VerificationMode;
}

export type GuessPolicyName = "corner-then-edge" | "corner" | "first";

export interface PlayConfig {
  width: number;
  height: number;
  mines: number;
  games?: number;
  seed?: number;
  policy: GuessPolicyName;
  step_delay_ms: number;
  game_delay_ms: number;
  engine_timeout_ms: number;
  first_move_safe: boolean;
  max_engine_nodes: number;
  on_inconsistency: InconsistencyAction | InconsistencyPolicy;
  journal_path: string;
  metrics: boolean;
}

/** Shape accepted from YAML files and the environment, before defaults are applied. */
export interface PlayConfigInput {
  difficulty?: Difficulty;
  width?: number;
  height?: number;
  mines?: number;
  games?: number;
  seed?: number;
  policy?: GuessPolicyName;
  step_delay_ms?: number;
  game_delay_ms?: number;
  engine_timeout_ms?: number;
  first_move_safe?: boolean;
  max_engine_nodes?: number;
  on_inconsistency?: InconsistencyAction | InconsistencyPolicy;
  journal_path?: string;
  metrics?: boolean;
}

// ─── Journal ────────────────────────────────────────────────────────

export type JournalEventType =
  | "run.started"
  | "run.completed"
  | "run.cancelled"
  | "game.started"
  | "step.completed"
  | "mine.flagged"
  | "guess.taken"
  | "cells.opened"
  | "verification.failed"
  | "game.ended"
  | "game.failed";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  run_id: string;
  game_id?: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}
