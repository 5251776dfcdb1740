import type { SessionStats } from "@autosweep/schemas";

export class StatisticsTracker {
  private played = 0;
  private won = 0;
  private expected = 0;

  /** Adds one finished game and returns the updated totals. */
  recordGameEnd(won: boolean, expectedWin: number): SessionStats {
    if (!(expectedWin >= 0 && expectedWin <= 1)) {
      throw new RangeError(`Expected win ${expectedWin} is outside [0, 1]`);
    }
    this.played++;
    if (won) this.won++;
    this.expected += expectedWin;
    return this.getSummary();
  }

  getSummary(): SessionStats {
    return {
      games_played: this.played,
      games_won: this.won,
      expected_wins: this.expected,
      realized_win_rate: this.played > 0 ? this.won / this.played : 0,
      expected_win_rate: this.played > 0 ? this.expected / this.played : 0,
    };
  }
}
