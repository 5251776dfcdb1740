import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { rm } from "node:fs/promises";
import { v4 as uuid } from "uuid";
import type { SessionStats } from "@autosweep/schemas";
import { Journal } from "@autosweep/journal";
import { GameLoopController } from "@autosweep/kernel";
import { Minefield } from "./minefield.js";
import type { MinefieldOptions } from "./minefield.js";
import { ExhaustiveEngine } from "./exhaustive-engine.js";

describe("playing on the reference board", () => {
  let testDir: string;
  let journal: Journal;

  beforeEach(async () => {
    testDir = join(tmpdir(), `autosweep-play-${uuid()}`);
    journal = new Journal(join(testDir, "journal.jsonl"), { fsync: false });
    await journal.init();
  });

  afterEach(async () => {
    await journal.close();
    try { await rm(testDir, { recursive: true }); } catch { /* cleanup */ }
  });

  function controllerFor(options: MinefieldOptions, maxGames: number) {
    return new GameLoopController({
      game: new Minefield(options),
      createEngine: ({ numMines }) => new ExhaustiveEngine({ numMines }),
      journal,
      sleep: async () => {},
      maxGames,
    });
  }

  it("wins a fixed board with one corner guess", async () => {
    const controller = controllerFor({ width: 3, height: 3, numMines: 1, layout: [{ x: 2, y: 2 }] }, 1);

    const stats = await controller.run();

    expect(stats).toEqual({
      games_played: 1,
      games_won: 1,
      expected_wins: 1 - 1 / 9,
      realized_win_rate: 1,
      expected_win_rate: 1 - 1 / 9,
    });
    const guess = journal.readRun(controller.getRunId()).find((e) => e.type === "guess.taken");
    expect(guess?.payload).toMatchObject({ cell: { x: 0, y: 0 }, probability: 1 / 9 });
  });

  it("plays whole sessions without an inconsistency", async () => {
    const controller = controllerFor({ width: 6, height: 6, numMines: 5, seed: 2024 }, 6);

    const stats = await controller.run();

    expect(stats.games_played).toBe(6);
    expect(stats.expected_win_rate).toBeGreaterThan(0);
    expect(stats.expected_win_rate).toBeLessThanOrEqual(1);
    const types = journal.readRun(controller.getRunId()).map((e) => e.type);
    expect(types).not.toContain("verification.failed");
    expect(types.filter((t) => t === "game.ended")).toHaveLength(6);
  });

  it("replays identically from the same seed", async () => {
    const options = { width: 5, height: 5, numMines: 4, seed: 77 };
    const first: SessionStats = await controllerFor(options, 4).run();
    const second: SessionStats = await controllerFor(options, 4).run();
    expect(second).toEqual(first);
  });
});
