import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Command } from "commander";
import yaml from "js-yaml";
import type { Coordinate, JournalEvent, VerificationMode } from "@autosweep/schemas";
import { validateProbabilitySnapshotData } from "@autosweep/schemas";
import { Journal } from "@autosweep/journal";
import {
  CancellationToken,
  GameLoopController,
  bestProbability,
  resolveGuessPolicy,
  verifyProbabilities,
} from "@autosweep/kernel";
import { ExhaustiveEngine, Minefield } from "@autosweep/board";
import { MetricsCollector } from "@autosweep/metrics";
import { DEFAULT_JOURNAL_PATH, loadPlayConfig } from "./config.js";
import type { PlayFlags } from "./config.js";
import {
  formatEvent,
  formatGameSummary,
  formatGuess,
  formatInconsistency,
  formatStats,
} from "./formatter.js";

function journalPath(): string {
  return process.env.AUTOSWEEP_JOURNAL_PATH || DEFAULT_JOURNAL_PATH;
}

function parseMode(value: string): VerificationMode {
  if (value === "guess" || value === "open") return value;
  throw new Error(`Invalid mode: "${value}" (expected guess or open)`);
}

/** Command failures print `Error: ...` and leave exit code 1 instead of crashing. */
function guarded<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  };
}

function guessLine(event: JournalEvent): string | null {
  const { cell, probability } = event.payload;
  if (typeof probability !== "number" || typeof cell !== "object" || cell === null) return null;
  if (!("x" in cell) || !("y" in cell)) return null;
  const { x, y } = cell;
  if (typeof x !== "number" || typeof y !== "number") return null;
  const at: Coordinate = { x, y };
  return formatGuess(probability, at);
}

async function play(flags: PlayFlags): Promise<void> {
  const config = await loadPlayConfig(flags);
  const journal = new Journal(resolve(config.journal_path));
  await journal.init();

  const metrics = config.metrics ? new MetricsCollector({ collectDefault: false }) : undefined;
  metrics?.attach(journal);

  const cancellation = new CancellationToken();
  const onSigint = () => {
    console.log("\n[autosweep] Interrupted, stopping after the current step...");
    cancellation.cancel("interrupted");
  };
  process.once("SIGINT", onSigint);

  const controller = new GameLoopController({
    game: new Minefield({
      width: config.width,
      height: config.height,
      numMines: config.mines,
      firstMoveSafe: config.first_move_safe,
      ...(config.seed !== undefined ? { seed: config.seed } : {}),
    }),
    createEngine: ({ numMines }) => new ExhaustiveEngine({ numMines, maxNodes: config.max_engine_nodes }),
    journal,
    cancellation,
    guessPolicy: resolveGuessPolicy(config.policy),
    inconsistencyPolicy: config.on_inconsistency,
    stepDelayMs: config.step_delay_ms,
    gameDelayMs: config.game_delay_ms,
    engineTimeoutMs: config.engine_timeout_ms,
    ...(config.games !== undefined ? { maxGames: config.games } : {}),
    onGameEnd: (result, stats) => console.log(formatGameSummary(result, stats)),
  });

  const unsubscribe = journal.on((event) => {
    if (event.type === "guess.taken") {
      const line = guessLine(event);
      if (line) console.log(line);
    } else if (event.type === "verification.failed") {
      const { kind, message, action } = event.payload;
      console.log(`[game] verification failed (${String(kind)}, ${String(action)}): ${String(message)}`);
    }
  });

  const games = config.games !== undefined ? `${config.games} games` : "until interrupted";
  console.log(
    `[autosweep] Playing ${config.width}x${config.height} with ${config.mines} mines, ${games} (run ${controller.getRunId()})`,
  );
  try {
    const stats = await controller.run();
    console.log(`\n${formatStats(stats)}`);
    if (metrics) console.log(`\n${await metrics.getMetrics()}`);
  } finally {
    process.removeListener("SIGINT", onSigint);
    unsubscribe();
    metrics?.detach();
    await journal.close();
  }
}

async function verifySnapshot(path: string, opts: { mode?: string }): Promise<void> {
  const raw = await readFile(path, "utf-8");
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new Error(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const validation = validateProbabilitySnapshotData(data);
  if (!validation.valid) {
    throw new Error(`Invalid snapshot ${path}: ${validation.errors.join("; ")}`);
  }
  const snapshot = validation.value;
  const mode = opts.mode !== undefined
    ? parseMode(opts.mode)
    : snapshot.mode ?? (bestProbability(snapshot.state, snapshot.probabilities) === 0 ? "open" : "guess");
  const result = verifyProbabilities(
    { state: snapshot.state, grid: snapshot.probabilities, minesRemaining: snapshot.mines_remaining },
    { mode },
  );
  if (result.ok) {
    console.log("OK");
    return;
  }
  console.log(`FAILED ${formatInconsistency(result.inconsistency)}`);
  process.exitCode = 1;
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name("autosweep")
    .description("Automated Minesweeper play on a probability oracle, verified at every step")
    .version("0.1.0");

  program.command("play").description("Play games headless and report win statistics")
    .option("-c, --config <path>", "YAML config file")
    .option("-d, --difficulty <name>", "Board preset: beginner, intermediate, expert")
    .option("--width <n>", "Board width")
    .option("--height <n>", "Board height")
    .option("--mines <n>", "Number of mines")
    .option("-n, --games <n>", "Stop after this many games")
    .option("--seed <n>", "Master seed for reproducible boards")
    .option("--policy <name>", "Guess policy: corner-then-edge, corner, first")
    .option("--step-delay <ms>", "Pause after every step")
    .option("--game-delay <ms>", "Pause between games")
    .option("--engine-timeout <ms>", "Fail a game whose engine call takes longer (0 = no limit)")
    .option("--max-nodes <n>", "Search budget per engine call")
    .option("--first-move-safe", "Never place a mine under the first reveal")
    .option("--no-first-move-safe", "Place mines before the first reveal")
    .option("--on-inconsistency <action>", "abort, restart or continue")
    .option("--journal <path>", "Journal file")
    .option("--metrics", "Print Prometheus metrics at exit")
    .action(guarded(play));

  program.command("verify").description("Check a saved board and probability grid")
    .argument("<snapshot>", "JSON or YAML snapshot file")
    .option("--mode <mode>", "guess or open (default: from the snapshot, else inferred)")
    .action(guarded(verifySnapshot));

  const journalCmd = program.command("journal").description("Journal inspection");

  journalCmd.command("verify").description("Check the journal hash chain")
    .option("--journal <path>", "Journal file")
    .action(guarded(async (opts: { journal?: string }) => {
      const journal = new Journal(resolve(opts.journal ?? journalPath()));
      const integrity = await journal.verifyIntegrity();
      console.log(`Journal integrity: ${integrity.valid ? "OK" : `BROKEN at event ${integrity.brokenAt}`}`);
      if (!integrity.valid) process.exitCode = 1;
    }));

  journalCmd.command("ls").description("List runs in the journal")
    .option("--journal <path>", "Journal file")
    .action(guarded(async (opts: { journal?: string }) => {
      const journal = new Journal(resolve(opts.journal ?? journalPath()), { recovery: "strict" });
      await journal.init();
      const runs = journal.listRuns();
      if (runs.length === 0) { console.log("No runs found."); return; }
      for (const runId of runs) {
        const events = journal.readRun(runId);
        const status = [...events].reverse().find((e) => e.type.startsWith("run.") && e.type !== "run.started");
        const games = events.filter((e) => e.type === "game.ended").length;
        const started = events[0]?.timestamp ?? "";
        console.log(`${runId}  [${status ? status.type.replace("run.", "") : "running"}]  ${games} games  ${started}`);
      }
    }));

  journalCmd.command("show").description("Print the events of a run")
    .argument("<runId>", "Run ID")
    .option("--journal <path>", "Journal file")
    .option("--game <gameId>", "Only this game's events")
    .action(guarded(async (runId: string, opts: { journal?: string; game?: string }) => {
      const journal = new Journal(resolve(opts.journal ?? journalPath()), { recovery: "strict" });
      await journal.init();
      const events = journal.readRun(runId, opts.game ? { gameId: opts.game } : undefined);
      if (events.length === 0) { console.log(`No events found for run ${runId}`); return; }
      for (const event of events) {
        for (const line of formatEvent(event)) console.log(line);
      }
    }));

  return program;
}
