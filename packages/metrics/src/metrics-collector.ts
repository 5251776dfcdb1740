import {
  Registry,
  Counter,
  Gauge,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import type { Journal } from "@autosweep/journal";
import type { JournalEvent } from "@autosweep/schemas";

export interface MetricsCollectorConfig {
  registry?: Registry;
  prefix?: string;
  collectDefault?: boolean;
}

/** Label values come from journal files; keep them short and plain. */
export function sanitizeLabel(value: string): string {
  return value.replace(/[^A-Za-z0-9_.-]/g, "_").slice(0, 64);
}

function labelField(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === "string" ? sanitizeLabel(value) : "unknown";
}

function numberField(payload: Record<string, unknown>, key: string): number | undefined {
  const value = payload[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function cellCount(payload: Record<string, unknown>): number {
  const cells = payload.cells;
  return Array.isArray(cells) ? cells.length : 0;
}

/** Prometheus metrics derived from journal events. */
export class MetricsCollector {
  private readonly registry: Registry;
  private readonly prefix: string;
  private unsubscribe?: () => void;

  // Running totals behind the win-rate gauges
  private gamesRecorded = 0;
  private gamesWon = 0;
  private expectedWins = 0;

  // ─── Game Metrics ──────────────────────────────────────────────────
  private readonly gamesTotal: Counter;
  private readonly expectedWinRate: Gauge;
  private readonly realizedWinRate: Gauge;

  // ─── Step Metrics ──────────────────────────────────────────────────
  private readonly stepsTotal: Counter;
  private readonly guessesTotal: Counter;
  private readonly guessProbability: Histogram;
  private readonly minesFlaggedTotal: Counter;
  private readonly cellsOpenedTotal: Counter;

  // ─── Verification Metrics ──────────────────────────────────────────
  private readonly verificationFailuresTotal: Counter;

  constructor(config?: MetricsCollectorConfig) {
    this.registry = config?.registry ?? new Registry();
    this.prefix = config?.prefix ?? "autosweep_";

    if (config?.collectDefault !== false) {
      collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
    }

    this.gamesTotal = new Counter({
      name: `${this.prefix}games_total`,
      help: "Total number of finished games by outcome",
      labelNames: ["outcome"] as const,
      registers: [this.registry],
    });

    this.expectedWinRate = new Gauge({
      name: `${this.prefix}expected_win_rate`,
      help: "Mean expected win probability over won and lost games",
      registers: [this.registry],
    });

    this.realizedWinRate = new Gauge({
      name: `${this.prefix}realized_win_rate`,
      help: "Fraction of won and lost games that were won",
      registers: [this.registry],
    });

    this.stepsTotal = new Counter({
      name: `${this.prefix}steps_total`,
      help: "Total number of controller steps by mode",
      labelNames: ["mode"] as const,
      registers: [this.registry],
    });

    this.guessesTotal = new Counter({
      name: `${this.prefix}guesses_total`,
      help: "Total number of guesses taken",
      registers: [this.registry],
    });

    this.guessProbability = new Histogram({
      name: `${this.prefix}guess_probability`,
      help: "Mine probability of the guessed cell",
      buckets: [0.01, 0.05, 0.1, 0.15, 0.2, 0.3, 0.4, 0.5, 0.75, 1],
      registers: [this.registry],
    });

    this.minesFlaggedTotal = new Counter({
      name: `${this.prefix}mines_flagged_total`,
      help: "Total number of cells flagged as certain mines",
      registers: [this.registry],
    });

    this.cellsOpenedTotal = new Counter({
      name: `${this.prefix}cells_opened_total`,
      help: "Total number of certain-safe cells opened",
      registers: [this.registry],
    });

    this.verificationFailuresTotal = new Counter({
      name: `${this.prefix}verification_failures_total`,
      help: "Total probability checks that failed, by kind",
      labelNames: ["kind"] as const,
      registers: [this.registry],
    });
  }

  attach(journal: Journal): void {
    this.detach();
    this.unsubscribe = journal.on((event) => this.handleEvent(event));
  }

  detach(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = undefined;
    }
  }

  handleEvent(event: JournalEvent): void {
    const { payload } = event;
    switch (event.type) {
      // ─── Game Events ───────────────────────────────────────────────
      case "game.ended": {
        const outcome = labelField(payload, "outcome");
        this.gamesTotal.inc({ outcome });
        if (outcome === "won" || outcome === "lost") {
          this.gamesRecorded++;
          if (outcome === "won") this.gamesWon++;
          this.expectedWins += numberField(payload, "expected_win") ?? 0;
          this.realizedWinRate.set(this.gamesWon / this.gamesRecorded);
          this.expectedWinRate.set(this.expectedWins / this.gamesRecorded);
        }
        break;
      }

      case "game.failed":
        this.gamesTotal.inc({ outcome: "failed" });
        break;

      // ─── Step Events ───────────────────────────────────────────────
      case "step.completed":
        this.stepsTotal.inc({ mode: labelField(payload, "mode") });
        break;

      case "guess.taken": {
        this.guessesTotal.inc();
        const probability = numberField(payload, "probability");
        if (probability !== undefined) this.guessProbability.observe(probability);
        break;
      }

      case "mine.flagged":
        this.minesFlaggedTotal.inc(cellCount(payload));
        break;

      case "cells.opened":
        this.cellsOpenedTotal.inc(cellCount(payload));
        break;

      // ─── Verification Events ───────────────────────────────────────
      case "verification.failed":
        this.verificationFailuresTotal.inc({ kind: labelField(payload, "kind") });
        break;

      default:
        break;
    }
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  getRegistry(): Registry {
    return this.registry;
  }

  reset(): void {
    this.registry.resetMetrics();
    this.gamesRecorded = 0;
    this.gamesWon = 0;
    this.expectedWins = 0;
  }
}
