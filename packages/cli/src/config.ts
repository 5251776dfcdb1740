import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import type {
  Difficulty,
  GuessPolicyName,
  PlayConfig,
  PlayConfigInput,
} from "@autosweep/schemas";
import { DIFFICULTY_PRESETS, validatePlayConfigData } from "@autosweep/schemas";
import { DEFAULT_GAME_DELAY_MS, DEFAULT_STEP_DELAY_MS } from "@autosweep/kernel";
import { DEFAULT_MAX_NODES } from "@autosweep/board";

export const DEFAULT_JOURNAL_PATH = "journal/autosweep.jsonl";
export const DEFAULT_DIFFICULTY: Difficulty = "beginner";

export class ConfigError extends Error {
  constructor(source: string, errors: string[]) {
    super(`Invalid configuration in ${source}: ${errors.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Flag values as commander hands them over: strings, booleans, or nothing. */
export interface PlayFlags {
  config?: string;
  difficulty?: string;
  width?: string;
  height?: string;
  mines?: string;
  games?: string;
  seed?: string;
  policy?: string;
  stepDelay?: string;
  gameDelay?: string;
  engineTimeout?: string;
  maxNodes?: string;
  firstMoveSafe?: boolean;
  onInconsistency?: string;
  journal?: string;
  metrics?: boolean;
}

function parseInteger(value: string, label: string): number {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n)) {
    throw new Error(`Invalid ${label}: "${value}" (must be an integer)`);
  }
  return n;
}

function parseBoolean(value: string, label: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(`Invalid ${label}: "${value}" (must be true or false)`);
}

function checked(data: unknown, source: string): PlayConfigInput {
  const result = validatePlayConfigData(data);
  if (!result.valid) throw new ConfigError(source, result.errors);
  return result.value;
}

/** Reads a YAML (or JSON) config file. An empty file is an empty layer. */
export async function loadConfigFile(path: string): Promise<PlayConfigInput> {
  const raw = await readFile(path, "utf-8");
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new Error(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return checked(data ?? {}, path);
}

type Raw = Record<string, unknown>;

const INTEGER_KEYS = [
  "width",
  "height",
  "mines",
  "games",
  "seed",
  "step_delay_ms",
  "game_delay_ms",
  "engine_timeout_ms",
  "max_engine_nodes",
] as const;

const STRING_KEYS = ["difficulty", "policy", "on_inconsistency", "journal_path"] as const;

const BOOLEAN_KEYS = ["first_move_safe", "metrics"] as const;

/**
 * `AUTOSWEEP_<KEY>` for every config key, e.g. `AUTOSWEEP_STEP_DELAY_MS=0`.
 * Only a single action is accepted for `AUTOSWEEP_ON_INCONSISTENCY`.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PlayConfigInput {
  const data: Raw = {};
  const lookup = (key: string): string | undefined => {
    const value = env[`AUTOSWEEP_${key.toUpperCase()}`];
    return value === undefined || value === "" ? undefined : value;
  };
  for (const key of INTEGER_KEYS) {
    const value = lookup(key);
    if (value !== undefined) data[key] = parseInteger(value, `AUTOSWEEP_${key.toUpperCase()}`);
  }
  for (const key of STRING_KEYS) {
    const value = lookup(key);
    if (value !== undefined) data[key] = value;
  }
  for (const key of BOOLEAN_KEYS) {
    const value = lookup(key);
    if (value !== undefined) data[key] = parseBoolean(value, `AUTOSWEEP_${key.toUpperCase()}`);
  }
  return checked(data, "environment");
}

export function configFromFlags(flags: PlayFlags): PlayConfigInput {
  const data: Raw = {};
  const integers: [keyof PlayFlags, string, string][] = [
    ["width", "width", "width"],
    ["height", "height", "height"],
    ["mines", "mines", "mines"],
    ["games", "games", "games"],
    ["seed", "seed", "seed"],
    ["stepDelay", "step_delay_ms", "step-delay"],
    ["gameDelay", "game_delay_ms", "game-delay"],
    ["engineTimeout", "engine_timeout_ms", "engine-timeout"],
    ["maxNodes", "max_engine_nodes", "max-nodes"],
  ];
  for (const [flag, key, label] of integers) {
    const value = flags[flag];
    if (typeof value === "string") data[key] = parseInteger(value, label);
  }
  if (flags.difficulty !== undefined) data.difficulty = flags.difficulty;
  if (flags.policy !== undefined) data.policy = flags.policy;
  if (flags.onInconsistency !== undefined) data.on_inconsistency = flags.onInconsistency;
  if (flags.journal !== undefined) data.journal_path = flags.journal;
  if (flags.firstMoveSafe !== undefined) data.first_move_safe = flags.firstMoveSafe;
  if (flags.metrics !== undefined) data.metrics = flags.metrics;
  return checked(data, "command-line flags");
}

/**
 * Merges layers, later ones winning key by key. Board size comes from the
 * difficulty preset (beginner by default), overridden by any explicit
 * width, height or mines.
 */
export function resolvePlayConfig(...layers: PlayConfigInput[]): PlayConfig {
  const merged = checked(
    layers.reduce<PlayConfigInput>((acc, layer) => ({ ...acc, ...layer }), {}),
    "merged configuration",
  );
  const preset = DIFFICULTY_PRESETS[merged.difficulty ?? DEFAULT_DIFFICULTY];
  const width = merged.width ?? preset.width;
  const height = merged.height ?? preset.height;
  const mines = merged.mines ?? preset.numMines;
  if (mines >= width * height) {
    throw new ConfigError("merged configuration", [
      `${mines} mines do not fit a ${width}x${height} board with a safe cell left`,
    ]);
  }
  const policy: GuessPolicyName = merged.policy ?? "corner-then-edge";
  return {
    width,
    height,
    mines,
    ...(merged.games !== undefined ? { games: merged.games } : {}),
    ...(merged.seed !== undefined ? { seed: merged.seed } : {}),
    policy,
    step_delay_ms: merged.step_delay_ms ?? DEFAULT_STEP_DELAY_MS,
    game_delay_ms: merged.game_delay_ms ?? DEFAULT_GAME_DELAY_MS,
    engine_timeout_ms: merged.engine_timeout_ms ?? 0,
    first_move_safe: merged.first_move_safe ?? true,
    max_engine_nodes: merged.max_engine_nodes ?? DEFAULT_MAX_NODES,
    on_inconsistency: merged.on_inconsistency ?? "abort",
    journal_path: merged.journal_path ?? DEFAULT_JOURNAL_PATH,
    metrics: merged.metrics ?? false,
  };
}

/** defaults < `--config` file < environment < flags */
export async function loadPlayConfig(
  flags: PlayFlags,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PlayConfig> {
  const file = flags.config ? await loadConfigFile(flags.config) : {};
  return resolvePlayConfig(file, configFromEnv(env), configFromFlags(flags));
}
