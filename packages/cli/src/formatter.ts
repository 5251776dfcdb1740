import type { GameResult, Inconsistency, JournalEvent, SessionStats } from "@autosweep/schemas";
import { formatCell } from "@autosweep/kernel";

/**
 * Three significant digits, keeping one decimal on whole numbers:
 * 0.875 → "0.875", 0.88888 → "0.889", 1 → "1.0".
 */
export function formatSignificant(value: number, digits = 3): string {
  const rounded = Number(value.toPrecision(digits));
  return Number.isInteger(rounded) ? rounded.toFixed(1) : String(rounded);
}

export function formatPercent(value: number, decimals: number): string {
  return `${(value * 100).toFixed(decimals)}%`;
}

/** `GUESS (12.5000%) (3, 4)` */
export function formatGuess(probability: number, cell: { x: number; y: number }): string {
  return `GUESS (${formatPercent(probability, 4)}) ${formatCell(cell)}`;
}

/**
 * One line per finished game. Won and lost games print the running
 * statistics; other outcomes say why the game did not count.
 */
export function formatGameSummary(result: GameResult, stats: SessionStats): string {
  if (result.outcome !== "won" && result.outcome !== "lost") {
    return `[game] ${result.outcome} after ${result.steps} steps (not counted)`;
  }
  return [
    `${result.outcome === "won" ? "W" : "L"} | E[GameWin%] = ${formatSignificant(result.expected_win)}`,
    `Wins = ${stats.games_won}`,
    `Games = ${stats.games_played}`,
    `E[Wins] = ${formatSignificant(stats.expected_wins)}`,
    `Win% = ${formatPercent(stats.realized_win_rate, 3)}`,
  ].join(", ");
}

export function formatStats(stats: SessionStats): string {
  return [
    `Games: ${stats.games_played}`,
    `Wins: ${stats.games_won}`,
    `E[Wins]: ${formatSignificant(stats.expected_wins)}`,
    `Win%: ${formatPercent(stats.realized_win_rate, 3)}`,
    `E[Win%]: ${formatPercent(stats.expected_win_rate, 3)}`,
  ].join("  ");
}

export function formatInconsistency(inconsistency: Inconsistency): string {
  return `${inconsistency.kind}: ${inconsistency.message}`;
}

/** `[12:34:56.789] guess.taken  game=<id>` followed by the payload. */
export function formatEvent(event: JournalEvent): string[] {
  const ts = event.timestamp.split("T")[1]?.slice(0, 12) ?? "";
  const lines = [`[${ts}] ${event.type}${event.game_id ? `  game=${event.game_id}` : ""}`];
  if (Object.keys(event.payload).length > 0) lines.push(`         ${JSON.stringify(event.payload)}`);
  return lines;
}
