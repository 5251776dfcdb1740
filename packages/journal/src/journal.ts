import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType } from "@autosweep/schemas";
import { validateJournalEventData } from "@autosweep/schemas";

export interface JournalOptions {
  fsync?: boolean;
  /** How to handle corruption on init. "truncate" (default) auto-repairs; "strict" throws. */
  recovery?: "truncate" | "strict";
}

export interface EmitOptions {
  gameId?: string;
}

export type JournalListener = (event: JournalEvent) => void;

export class JournalIntegrityError extends Error {
  readonly index: number;

  constructor(index: number, reason: string) {
    super(`Journal integrity violation at event ${index}: ${reason}`);
    this.name = "JournalIntegrityError";
    this.index = index;
  }
}

function parseEvent(line: string): JournalEvent | null {
  let data: unknown;
  try { data = JSON.parse(line); } catch { return null; }
  const result = validateJournalEventData(data);
  return result.valid ? result.value : null;
}

/**
 * Append-only JSONL event log. Every line carries the SHA-256 of the line
 * before it, so tampering or a torn write is detectable on the next init().
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private runIndex = new Map<string, JournalEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private recovery: "truncate" | "strict";

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.recovery = options?.recovery ?? "truncate";
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);
    const tempIndex = new Map<string, JournalEvent[]>();
    let prevHash: string | undefined;
    let maxSeq = -1;
    let validCount = lines.length;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseEvent(line);
      const reason = !event
        ? "unreadable event"
        : i > 0 && event.hash_prev !== prevHash
          ? "hash chain broken"
          : null;
      if (reason) {
        if (this.recovery === "strict") throw new JournalIntegrityError(i, reason);
        validCount = i;
        console.error(`[journal] recovered from ${reason} at event ${i}, truncated ${lines.length - i} events`);
        break;
      }
      if (!event) break;
      prevHash = this.hash(line);
      const bucket = tempIndex.get(event.run_id);
      if (bucket) bucket.push(event);
      else tempIndex.set(event.run_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    if (validCount < lines.length) {
      // Rewrite atomically with the valid prefix
      const validLines = lines.slice(0, validCount);
      const tmpPath = `${this.filePath}.tmp`;
      await writeFile(tmpPath, validLines.length > 0 ? validLines.join("\n") + "\n" : "", "utf-8");
      await rename(tmpPath, this.filePath);
    }

    this.runIndex = tempIndex;
    this.nextSeq = maxSeq + 1;
    this.lastHash = validCount > 0 ? prevHash : undefined;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(
    runId: string,
    type: JournalEventType,
    payload: Record<string, unknown>,
    options?: EmitOptions,
  ): Promise<JournalEvent> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;
      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        run_id: runId,
        ...(options?.gameId ? { game_id: options.gameId } : {}),
        type,
        payload,
        hash_prev: this.lastHash,
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only update in-memory state after a successful write
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;
      const bucket = this.runIndex.get(runId);
      if (bucket) bucket.push(event);
      else this.runIndex.set(runId, [event]);

      for (const listener of this.listeners) {
        try { listener(event); } catch { /* listeners must not break the journal */ }
      }
      return event;
    } finally {
      releaseLock();
    }
  }

  /** Like emit(), but resolves to null instead of rejecting. */
  async tryEmit(
    runId: string,
    type: JournalEventType,
    payload: Record<string, unknown>,
    options?: EmitOptions,
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(runId, type, payload, options);
    } catch (err) {
      console.error(`[journal] failed to write ${type}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events: JournalEvent[] = [];
    for (const line of content.trim().split("\n").filter(Boolean)) {
      const event = parseEvent(line);
      if (event) events.push(event);
    }
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readRun(runId: string, options?: { gameId?: string }): JournalEvent[] {
    const events = this.runIndex.get(runId) ?? [];
    if (!options?.gameId) return [...events];
    return events.filter((e) => e.game_id === options.gameId);
  }

  listRuns(): string[] {
    return [...this.runIndex.keys()];
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    if (!existsSync(this.filePath)) return { valid: true };
    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseEvent(line);
      if (!event || (i > 0 && event.hash_prev !== prevHash)) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(line);
    }
    return { valid: true };
  }

  /** Wait for pending writes. Call before process exit. */
  async close(): Promise<void> {
    await this.writeLock;
  }

  getFilePath(): string {
    return this.filePath;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }
}
