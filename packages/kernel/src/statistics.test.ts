import { describe, it, expect } from "vitest";
import { StatisticsTracker } from "./statistics.js";

describe("StatisticsTracker", () => {
  it("starts at zero", () => {
    const stats = new StatisticsTracker();
    expect(stats.getSummary()).toEqual({
      games_played: 0,
      games_won: 0,
      expected_wins: 0,
      realized_win_rate: 0,
      expected_win_rate: 0,
    });
  });

  it("accumulates wins and expected wins", () => {
    const stats = new StatisticsTracker();
    expect(stats.recordGameEnd(true, 0.875)).toEqual({
      games_played: 1,
      games_won: 1,
      expected_wins: 0.875,
      realized_win_rate: 1,
      expected_win_rate: 0.875,
    });
    expect(stats.recordGameEnd(false, 0.5)).toEqual({
      games_played: 2,
      games_won: 1,
      expected_wins: 1.375,
      realized_win_rate: 0.5,
      expected_win_rate: 0.6875,
    });
  });

  it("returns snapshots that later games do not change", () => {
    const stats = new StatisticsTracker();
    const first = stats.recordGameEnd(true, 1);
    stats.recordGameEnd(false, 0.25);
    expect(first.games_played).toBe(1);
    expect(stats.getSummary().games_played).toBe(2);
  });

  it("rejects an expected win outside [0, 1]", () => {
    const stats = new StatisticsTracker();
    expect(() => stats.recordGameEnd(true, 1.5)).toThrow(RangeError);
    expect(() => stats.recordGameEnd(true, -0.1)).toThrow("Expected win -0.1 is outside [0, 1]");
    expect(() => stats.recordGameEnd(true, Number.NaN)).toThrow(RangeError);
    expect(stats.getSummary().games_played).toBe(0);
  });
});
