import { describe, it, expect } from "vitest";
import { v4 as uuid } from "uuid";
import {
  validateJournalEventData,
  validatePlayConfigData,
  validateProbabilitySnapshotData,
} from "./validator.js";

describe("validateJournalEventData", () => {
  const validEvent = () => ({
    event_id: uuid(),
    timestamp: new Date().toISOString(),
    run_id: uuid(),
    game_id: uuid(),
    type: "guess.taken",
    payload: { x: 0, y: 0, probability: 0.125 },
    seq: 0,
  });

  it("accepts a valid event", () => {
    const result = validateJournalEventData(validEvent());
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it("accepts a run-level event without a game id", () => {
    const { game_id: _gameId, ...event } = validEvent();
    expect(validateJournalEventData({ ...event, type: "run.started" }).valid).toBe(true);
  });

  it("rejects an unknown event type", () => {
    const result = validateJournalEventData({ ...validEvent(), type: "session.created" });
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toContain("/type");
  });

  it("rejects a malformed timestamp", () => {
    const result = validateJournalEventData({ ...validEvent(), timestamp: "yesterday" });
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toContain("/timestamp");
  });

  it("rejects extra properties", () => {
    const result = validateJournalEventData({ ...validEvent(), extra: true });
    expect(result.valid).toBe(false);
  });
});

describe("validateProbabilitySnapshotData", () => {
  const snapshot = () => ({
    state: [
      ["hidden", 1],
      ["flag", 1],
    ],
    probabilities: [
      [0.5, null],
      [1, null],
    ],
    mines_remaining: 0,
  });

  it("accepts a well-formed snapshot and returns it typed", () => {
    const result = validateProbabilitySnapshotData(snapshot());
    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.value.mines_remaining).toBe(0);
      expect(result.value.state[1]?.[0]).toBe("flag");
    }
  });

  it("accepts an explicit mode", () => {
    expect(validateProbabilitySnapshotData({ ...snapshot(), mode: "open" }).valid).toBe(true);
  });

  it("rejects unknown cell states", () => {
    const data = { ...snapshot(), state: [["hidden", "?"], ["flag", 1]] };
    expect(validateProbabilitySnapshotData(data).valid).toBe(false);
  });

  it("rejects adjacency counts above 8", () => {
    const data = { ...snapshot(), state: [["hidden", 9], ["flag", 1]] };
    expect(validateProbabilitySnapshotData(data).valid).toBe(false);
  });

  it("rejects string probabilities", () => {
    const data = { ...snapshot(), probabilities: [["0.5", null], [1, null]] };
    expect(validateProbabilitySnapshotData(data).valid).toBe(false);
  });

  it("rejects ragged board rows", () => {
    const data = { ...snapshot(), state: [["hidden", 1], ["flag"]] };
    const result = validateProbabilitySnapshotData(data);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/state/1: expected 2 columns, got 1"]);
  });

  it("rejects a grid whose shape differs from the board", () => {
    const data = { ...snapshot(), probabilities: [[0.5, null]] };
    const result = validateProbabilitySnapshotData(data);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/probabilities: expected 2 rows, got 1"]);
  });
});

describe("validatePlayConfigData", () => {
  it("accepts an empty config", () => {
    expect(validatePlayConfigData({}).valid).toBe(true);
  });

  it("accepts a full config", () => {
    const result = validatePlayConfigData({
      difficulty: "expert",
      games: 10,
      seed: -1365615019,
      policy: "corner",
      step_delay_ms: 0,
      game_delay_ms: 0,
      engine_timeout_ms: 5000,
      first_move_safe: false,
      max_engine_nodes: 100000,
      on_inconsistency: { global_sum_mismatch: "restart", local_sum_mismatch: "continue" },
      journal_path: "journal/test.jsonl",
      metrics: true,
    });
    expect(result.valid).toBe(true);
  });

  it("accepts a single inconsistency action", () => {
    expect(validatePlayConfigData({ on_inconsistency: "restart" }).valid).toBe(true);
  });

  it("rejects an unknown policy", () => {
    const result = validatePlayConfigData({ policy: "random" });
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toContain("/policy");
  });

  it("rejects an unknown inconsistency kind", () => {
    expect(validatePlayConfigData({ on_inconsistency: { bogus: "abort" } }).valid).toBe(false);
  });

  it("rejects negative delays and unknown keys", () => {
    expect(validatePlayConfigData({ step_delay_ms: -1 }).valid).toBe(false);
    expect(validatePlayConfigData({ speed: 3 }).valid).toBe(false);
  });
});
