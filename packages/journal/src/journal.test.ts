import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { rm, readFile, writeFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { v4 as uuid } from "uuid";
import { Journal, JournalIntegrityError } from "./journal.js";

describe("Journal", () => {
  let testDir: string;
  let testFile: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `autosweep-journal-${uuid()}`);
    testFile = join(testDir, "events.jsonl");
  });

  afterEach(async () => {
    try { await rm(testDir, { recursive: true }); } catch { /* cleanup */ }
  });

  it("creates directory and file on init + emit", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    const event = await journal.emit("run-1", "run.started", { games: 3 });
    expect(event.event_id).toBeTruthy();
    expect(event.run_id).toBe("run-1");
    expect(event.game_id).toBeUndefined();
    expect(event.type).toBe("run.started");
    expect(event.payload).toEqual({ games: 3 });
    expect(existsSync(testFile)).toBe(true);
  });

  it("writes the game id when given", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    const event = await journal.emit("run-1", "game.started", {}, { gameId: "game-1" });
    expect(event.game_id).toBe("game-1");
    const [stored] = await journal.readAll();
    expect(stored?.game_id).toBe("game-1");
  });

  it("writes through fsync by default", async () => {
    const journal = new Journal(testFile);
    await journal.init();
    await journal.emit("run-1", "run.started", {});
    await journal.close();
    const content = await readFile(testFile, "utf-8");
    expect(content.trim().split("\n")).toHaveLength(1);
  });

  it("reads events of one run and of one game", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    await journal.emit("run-1", "run.started", {});
    await journal.emit("run-2", "run.started", {});
    await journal.emit("run-1", "game.started", {}, { gameId: "g-1" });
    await journal.emit("run-1", "game.started", {}, { gameId: "g-2" });

    expect(journal.readRun("run-1").map((e) => e.type)).toEqual(["run.started", "game.started", "game.started"]);
    expect(journal.readRun("run-1", { gameId: "g-2" })).toHaveLength(1);
    expect(journal.readRun("missing")).toEqual([]);
    expect(journal.listRuns()).toEqual(["run-1", "run-2"]);
  });

  it("maintains hash chain integrity", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    const e1 = await journal.emit("run-1", "run.started", {});
    const e2 = await journal.emit("run-1", "game.started", {}, { gameId: "g-1" });

    expect(e1.hash_prev).toBeUndefined();
    expect(e2.hash_prev).toMatch(/^[0-9a-f]{64}$/);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("detects a tampered line", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    await journal.emit("run-1", "run.started", {});
    await journal.emit("run-1", "game.started", {});
    await journal.emit("run-1", "game.ended", { outcome: "won" });

    const lines = (await readFile(testFile, "utf-8")).trim().split("\n");
    const parsed = JSON.parse(lines[1] ?? "{}");
    parsed.payload = { tampered: true };
    lines[1] = JSON.stringify(parsed);
    await writeFile(testFile, lines.join("\n") + "\n", "utf-8");

    expect(await journal.verifyIntegrity()).toEqual({ valid: false, brokenAt: 2 });

    const strict = new Journal(testFile, { fsync: false, recovery: "strict" });
    await expect(strict.init()).rejects.toThrow(JournalIntegrityError);
    await expect(strict.init()).rejects.toThrow("Journal integrity violation at event 2: hash chain broken");
  });

  it("truncates a torn last line on init", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    await journal.emit("run-1", "run.started", {});
    await journal.emit("run-1", "game.started", {});
    const content = await readFile(testFile, "utf-8");
    await writeFile(testFile, content + '{"event_id":"half', "utf-8");

    const reopened = new Journal(testFile, { fsync: false });
    await reopened.init();
    const after = await readFile(testFile, "utf-8");
    expect(after.trim().split("\n")).toHaveLength(2);
    const next = await reopened.emit("run-1", "game.ended", {});
    expect(next.seq).toBe(2);
    expect(await reopened.verifyIntegrity()).toEqual({ valid: true });
  });

  it("returns valid integrity for an empty journal", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("notifies and unsubscribes listeners", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    const received: string[] = [];
    const unsub = journal.on((event) => { received.push(event.type); });
    await journal.emit("run-1", "run.started", {});
    unsub();
    await journal.emit("run-1", "run.completed", {});
    expect(received).toEqual(["run.started"]);
  });

  it("continues when a listener throws", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    const received: string[] = [];
    journal.on(() => { throw new Error("boom"); });
    journal.on((event) => { received.push(event.type); });
    await journal.emit("run-1", "run.started", {});
    expect(received).toEqual(["run.started"]);
  });

  it("resumes hash chain and seq from an existing file", async () => {
    const journal1 = new Journal(testFile, { fsync: false });
    await journal1.init();
    await journal1.emit("run-1", "run.started", {});
    await journal1.emit("run-1", "game.started", {});

    const journal2 = new Journal(testFile, { fsync: false });
    await journal2.init();
    const e3 = await journal2.emit("run-1", "game.ended", {});
    expect(e3.seq).toBe(2);
    expect(journal2.readRun("run-1")).toHaveLength(3);
    expect(await journal2.verifyIntegrity()).toEqual({ valid: true });
  });

  it("returns an empty list for readAll on a missing file", async () => {
    const journal = new Journal(join(testDir, "nonexistent.jsonl"));
    await journal.init();
    expect(await journal.readAll()).toEqual([]);
  });

  it("limits readAll to the most recent events", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    await journal.emit("run-1", "run.started", {});
    await journal.emit("run-1", "game.started", {});
    await journal.emit("run-1", "game.ended", {});
    const last = await journal.readAll({ limit: 2 });
    expect(last.map((e) => e.type)).toEqual(["game.started", "game.ended"]);
  });

  it("concurrent emits don't corrupt the hash chain", async () => {
    const journal = new Journal(testFile, { fsync: false });
    await journal.init();
    await Promise.all(
      Array.from({ length: 20 }, (_, i) => journal.emit(`run-${i % 3}`, "step.completed", { step: i })),
    );
    const events = await journal.readAll();
    expect(events.map((e) => e.seq)).toEqual(Array.from({ length: 20 }, (_, i) => i));
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("tryEmit resolves to null when the write fails", async () => {
    await mkdir(testFile, { recursive: true });
    const journal = new Journal(testFile, { fsync: false });
    expect(await journal.tryEmit("run-1", "run.started", {})).toBeNull();
  });
});
