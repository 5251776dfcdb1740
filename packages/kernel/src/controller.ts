import { v4 as uuid } from "uuid";
import type {
  BoardState,
  ControllerState,
  Coordinate,
  GameOutcome,
  GameResult,
  GameSession,
  Inconsistency,
  InconsistencyAction,
  InconsistencyPolicy,
  InferenceEngine,
  InferenceEngineFactory,
  Probability,
  ProbabilityGrid,
  SessionStats,
  Tolerance,
  VerificationMode,
} from "@autosweep/schemas";
import { withTimeout } from "@autosweep/schemas";
import type { Journal } from "@autosweep/journal";
import { CancellationToken, sleep as defaultSleep } from "./cancellation.js";
import type { SleepFn } from "./cancellation.js";
import { InvalidTransitionError, NoGuessAvailableError, ProbabilityInconsistencyError } from "./errors.js";
import { assertGridShape } from "./grid.js";
import { DEFAULT_GUESS_POLICY } from "./policies.js";
import type { GuessPolicy } from "./policies.js";
import { StatisticsTracker } from "./statistics.js";
import { bestProbability, verifyProbabilities } from "./verifier.js";

export interface GameLoopControllerConfig {
  game: GameSession;
  createEngine: InferenceEngineFactory;
  journal: Journal;
  cancellation?: CancellationToken;
  guessPolicy?: GuessPolicy;
  statistics?: StatisticsTracker;
  /** One action for every kind, or a per-kind map. Unlisted kinds abort. */
  inconsistencyPolicy?: InconsistencyAction | InconsistencyPolicy;
  tolerance?: Tolerance;
  stepDelayMs?: number;
  gameDelayMs?: number;
  sleep?: SleepFn;
  /** 0 or unset: no limit. */
  engineTimeoutMs?: number;
  maxGames?: number;
  onGameEnd?: (result: GameResult, stats: SessionStats) => void | Promise<void>;
}

export const DEFAULT_STEP_DELAY_MS = 1000;
export const DEFAULT_GAME_DELAY_MS = 5000;

const VALID_TRANSITIONS: Record<ControllerState, ControllerState[]> = {
  idle: ["awaiting_probabilities", "cancelled", "failed"],
  awaiting_probabilities: ["auto_resolving", "failed"],
  auto_resolving: ["verifying", "failed"],
  verifying: ["guessing", "opening", "abandoned", "failed"],
  guessing: ["awaiting_probabilities", "won", "lost", "cancelled", "failed"],
  opening: ["awaiting_probabilities", "won", "lost", "cancelled", "failed"],
  won: ["idle"],
  lost: ["idle"],
  cancelled: ["idle"],
  abandoned: ["idle"],
  failed: ["idle"],
};

const TERMINAL_STATES: ReadonlySet<ControllerState> = new Set(["won", "lost", "cancelled", "abandoned", "failed"]);

interface GameProgress {
  gameId: string;
  expectedWin: number;
  steps: number;
  guesses: number;
}

/** What one step did, once the grid passed (or was let through) verification. */
type StepOutcome =
  | { kind: "abandoned" }
  | { kind: "played"; mode: VerificationMode };

export class GameLoopController {
  private config: GameLoopControllerConfig;
  private readonly runId = uuid();
  private state: ControllerState = "idle";
  private running = false;
  private cancellation: CancellationToken;
  private statistics: StatisticsTracker;
  private guessPolicy: GuessPolicy;
  private sleep: SleepFn;

  constructor(config: GameLoopControllerConfig) {
    this.config = config;
    this.cancellation = config.cancellation ?? new CancellationToken();
    this.statistics = config.statistics ?? new StatisticsTracker();
    this.guessPolicy = config.guessPolicy ?? DEFAULT_GUESS_POLICY;
    this.sleep = config.sleep ?? defaultSleep;
  }

  getRunId(): string { return this.runId; }
  getState(): ControllerState { return this.state; }
  getStatistics(): SessionStats { return this.statistics.getSummary(); }

  /**
   * Plays games until the token is cancelled or `maxGames` games have been
   * played. Only won and lost games count towards the statistics.
   */
  async run(): Promise<SessionStats> {
    this.acquire();
    const { game, journal, maxGames } = this.config;
    try {
      await journal.emit(this.runId, "run.started", {
        width: game.width,
        height: game.height,
        num_mines: game.numMines,
        ...(maxGames !== undefined ? { max_games: maxGames } : {}),
      });

      let played = 0;
      while (!this.cancellation.cancelled && (maxGames === undefined || played < maxGames)) {
        if (played > 0) {
          await this.sleep(this.config.gameDelayMs ?? DEFAULT_GAME_DELAY_MS, this.cancellation.signal);
          if (this.cancellation.cancelled) break;
        }
        const result = await this.playOne();
        played++;
        const stats = result.outcome === "won" || result.outcome === "lost"
          ? this.statistics.recordGameEnd(result.outcome === "won", result.expected_win)
          : this.statistics.getSummary();
        await this.config.onGameEnd?.(result, stats);
      }

      const stats = this.statistics.getSummary();
      if (this.cancellation.cancelled) {
        await journal.emit(this.runId, "run.cancelled", { reason: this.cancellation.reason ?? "cancelled", stats });
      } else {
        await journal.emit(this.runId, "run.completed", { stats });
      }
      return stats;
    } finally {
      this.running = false;
    }
  }

  /** Plays a single game on a freshly reset board. Does not touch the statistics. */
  async playGame(): Promise<GameResult> {
    this.acquire();
    try {
      return await this.playOne();
    } finally {
      this.running = false;
    }
  }

  private acquire(): void {
    if (this.running) throw new Error("Controller is already running. Concurrent calls are not allowed.");
    this.running = true;
  }

  private async playOne(): Promise<GameResult> {
    const { game, journal } = this.config;
    if (this.state !== "idle") this.transition("idle");
    const progress: GameProgress = { gameId: uuid(), expectedWin: 1, steps: 0, guesses: 0 };

    try {
      await game.reset();
      const engine = this.config.createEngine({ width: game.width, height: game.height, numMines: game.numMines });
      await journal.emit(this.runId, "game.started", {
        width: game.width,
        height: game.height,
        num_mines: game.numMines,
        ...(game.seed !== undefined ? { seed: game.seed } : {}),
      }, { gameId: progress.gameId });

      while (!TERMINAL_STATES.has(this.state)) {
        if (this.cancellation.cancelled) {
          this.transition("cancelled");
          break;
        }
        const outcome = await this.step(engine, progress);
        if (outcome.kind === "abandoned") {
          this.transition("abandoned");
          break;
        }
        await this.sleep(this.config.stepDelayMs ?? DEFAULT_STEP_DELAY_MS, this.cancellation.signal);
        if (game.done) {
          this.transition(game.isWon() ? "won" : "lost");
        } else if (this.cancellation.cancelled) {
          this.transition("cancelled");
        }
      }
    } catch (err) {
      if (!TERMINAL_STATES.has(this.state)) this.transition("failed");
      await journal.tryEmit(this.runId, "game.failed", {
        error: err instanceof Error ? err.message : String(err),
        steps: progress.steps,
      }, { gameId: progress.gameId });
      throw err;
    }

    const result: GameResult = {
      game_id: progress.gameId,
      outcome: this.outcome(),
      expected_win: progress.expectedWin,
      steps: progress.steps,
      guesses: progress.guesses,
      ...(game.seed !== undefined ? { seed: game.seed } : {}),
    };
    await journal.emit(this.runId, "game.ended", { ...result }, { gameId: progress.gameId });
    return result;
  }

  private async step(engine: InferenceEngine, progress: GameProgress): Promise<StepOutcome> {
    const { game, journal } = this.config;
    const opts = { gameId: progress.gameId };

    this.transition("awaiting_probabilities");
    const before = game.state;
    const grid = await withTimeout(engine.solve(before), this.config.engineTimeoutMs ?? 0, "Inference engine");
    assertGridShape(before, grid);

    this.transition("auto_resolving");
    const flagged = certainMines(before, grid);
    for (const cell of flagged) {
      await game.flagAction(cell);
    }
    if (flagged.length > 0) {
      await journal.emit(this.runId, "mine.flagged", { cells: flagged }, opts);
    }

    this.transition("verifying");
    const state = game.state;
    const best = bestProbability(state, grid);
    const mode: VerificationMode = best === 0 ? "open" : "guess";
    const verification = verifyProbabilities(
      { state, grid, minesRemaining: game.minesRemaining },
      { mode, ...(this.config.tolerance ? { tolerance: this.config.tolerance } : {}) },
    );
    if (!verification.ok) {
      const action = this.actionFor(verification.inconsistency);
      await journal.emit(this.runId, "verification.failed", { ...verification.inconsistency, action }, opts);
      if (action === "abort") throw new ProbabilityInconsistencyError(verification.inconsistency);
      if (action === "restart") return { kind: "abandoned" };
    }

    progress.steps++;
    if (mode === "open") {
      this.transition("opening");
      const opened = await this.openSafeCells(state, grid);
      await journal.emit(this.runId, "cells.opened", { cells: opened }, opts);
    } else {
      this.transition("guessing");
      const candidates = hiddenValues(state, grid);
      const cell = this.guessPolicy(candidates);
      if (!cell) throw new NoGuessAvailableError();
      const probability = candidates[cell.y]?.[cell.x] ?? best ?? 0;
      progress.expectedWin *= 1 - probability;
      progress.guesses++;
      await game.revealAction(cell);
      await journal.emit(this.runId, "guess.taken", {
        cell,
        probability,
        expected_win: progress.expectedWin,
      }, opts);
    }
    await journal.emit(this.runId, "step.completed", {
      step: progress.steps,
      mode,
      best_probability: best,
      flagged: flagged.length,
    }, opts);
    return { kind: "played", mode };
  }

  /** Reveals every hidden cell at exactly 0, row by row, until the game ends. */
  private async openSafeCells(state: BoardState, grid: ProbabilityGrid): Promise<Coordinate[]> {
    const { game } = this.config;
    const safe: Coordinate[] = [];
    grid.forEach((row, y) => row.forEach((p, x) => {
      if (p === 0 && state[y]?.[x] === "hidden") safe.push({ x, y });
    }));
    if (safe.length === 0) throw new NoGuessAvailableError("No hidden cell at probability 0 to open");

    const opened: Coordinate[] = [];
    for (const cell of safe) {
      if (game.done) break;
      await game.revealAction(cell);
      opened.push(cell);
    }
    return opened;
  }

  private actionFor(inconsistency: Inconsistency): InconsistencyAction {
    const policy = this.config.inconsistencyPolicy ?? "abort";
    if (typeof policy === "string") return policy;
    return policy[inconsistency.kind] ?? "abort";
  }

  private outcome(): GameOutcome {
    switch (this.state) {
      case "won":
      case "lost":
      case "cancelled":
      case "abandoned":
        return this.state;
      default:
        throw new Error(`Game ended in non-terminal state ${this.state}`);
    }
  }

  private transition(next: ControllerState): void {
    const allowed = VALID_TRANSITIONS[this.state];
    if (!allowed.includes(next)) {
      throw new InvalidTransitionError(this.state, next);
    }
    this.state = next;
  }
}

/** Unflagged cells the engine is certain about. */
function certainMines(state: BoardState, grid: ProbabilityGrid): Coordinate[] {
  const cells: Coordinate[] = [];
  grid.forEach((row, y) => row.forEach((p, x) => {
    if (p === 1 && state[y]?.[x] !== "flag") cells.push({ x, y });
  }));
  return cells;
}

/** The grid as the guess policy sees it: only hidden cells keep their value. */
function hiddenValues(state: BoardState, grid: ProbabilityGrid): Probability[][] {
  return grid.map((row, y) => row.map((p, x) => (state[y]?.[x] === "hidden" ? p : null)));
}
