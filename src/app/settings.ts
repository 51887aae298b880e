// Solver settings: defaults, tolerant extraction from untyped sources
// (JSON, environment) and validation into a SolverConfig

import { createDurationMs } from "../types/brands";
import { fromNow } from "../types/timestamp";

import type { PourMode } from "../puzzle/types";
import type {
  Clock,
  SearchMode,
  SolverConfig,
  SolverSettings,
} from "../solver/types";

export const DEFAULT_SOLVER_SETTINGS: SolverSettings = {
  maxIterations: 1_000_000,
  mode: "astar",
  pour: "all-or-nothing",
  progressInterval: 10_000,
  timeLimitMs: null,
};

export const SETTINGS_ENV_KEYS: Readonly<Record<keyof SolverSettings, string>> = {
  maxIterations: "WATERSORT_MAX_ITERATIONS",
  mode: "WATERSORT_MODE",
  pour: "WATERSORT_POUR",
  progressInterval: "WATERSORT_PROGRESS_INTERVAL",
  timeLimitMs: "WATERSORT_TIME_LIMIT_MS",
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

// Numbers arrive as numbers from JSON and as strings from the environment
function coerceNumber(u: unknown): number | undefined {
  if (typeof u === "number") return Number.isFinite(u) ? u : undefined;
  if (!isString(u) || u.trim().length === 0) return undefined;
  const n = Number(u);
  return Number.isFinite(n) ? n : undefined;
}

function coercePositiveInt(u: unknown): number | undefined {
  const n = coerceNumber(u);
  if (n === undefined || !Number.isInteger(n) || n < 1) return undefined;
  return n;
}

export function coerceMode(u: unknown): SearchMode | undefined {
  if (!isString(u)) return undefined;
  const v = u.trim().toLowerCase();
  if (v === "bfs" || v === "astar") return v;
  if (v === "a*") return "astar"; // tolerate legacy spellings
  if (v === "breadth-first") return "bfs";
  return undefined;
}

export function coercePour(u: unknown): PourMode | undefined {
  if (!isString(u)) return undefined;
  const v = u.trim().toLowerCase();
  if (v === "partial" || v === "all-or-nothing") return v;
  if (v === "clamp") return "partial";
  return undefined;
}

function coerceTimeLimit(u: unknown): number | null | undefined {
  if (u === null) return null;
  if (isString(u) && ["none", "off"].includes(u.trim().toLowerCase())) {
    return null;
  }
  const n = coerceNumber(u);
  if (n === undefined || n < 0) return undefined;
  return n;
}

// Keeps the fields that parse, drops the rest
export function parseSolverSettings(raw: unknown): Partial<SolverSettings> {
  if (!isRecord(raw)) return {};
  const out: {
    -readonly [K in keyof SolverSettings]?: SolverSettings[K];
  } = {};

  const mode = coerceMode(raw["mode"]);
  if (mode !== undefined) out.mode = mode;

  const pour = coercePour(raw["pour"]);
  if (pour !== undefined) out.pour = pour;

  const maxIterations = coercePositiveInt(raw["maxIterations"]);
  if (maxIterations !== undefined) out.maxIterations = maxIterations;

  const progressInterval = coercePositiveInt(raw["progressInterval"]);
  if (progressInterval !== undefined) out.progressInterval = progressInterval;

  const timeLimitMs = coerceTimeLimit(raw["timeLimitMs"]);
  if (timeLimitMs !== undefined) out.timeLimitMs = timeLimitMs;

  return out;
}

export function loadSolverSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Partial<SolverSettings> {
  const raw: Record<string, unknown> = {};
  for (const [field, envKey] of Object.entries(SETTINGS_ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined) raw[field] = value;
  }
  return parseSolverSettings(raw);
}

// Merges over defaults; out-of-range values are caller bugs and throw
export function resolveSolverConfig(
  partial: Partial<SolverSettings> = {},
  clock: Clock = fromNow,
): SolverConfig {
  // An explicit `undefined` keeps the default
  const d = DEFAULT_SOLVER_SETTINGS;
  const settings: SolverSettings = {
    maxIterations: partial.maxIterations ?? d.maxIterations,
    mode: partial.mode ?? d.mode,
    pour: partial.pour ?? d.pour,
    progressInterval: partial.progressInterval ?? d.progressInterval,
    timeLimitMs:
      partial.timeLimitMs === undefined ? d.timeLimitMs : partial.timeLimitMs,
  };

  if (!Number.isInteger(settings.maxIterations) || settings.maxIterations < 1) {
    throw new Error("maxIterations must be a positive integer");
  }
  if (
    !Number.isInteger(settings.progressInterval) ||
    settings.progressInterval < 1
  ) {
    throw new Error("progressInterval must be a positive integer");
  }
  if (coerceMode(settings.mode) !== settings.mode) {
    throw new Error(`unknown search mode: ${String(settings.mode)}`);
  }
  if (coercePour(settings.pour) !== settings.pour) {
    throw new Error(`unknown pour mode: ${String(settings.pour)}`);
  }

  return {
    clock,
    maxIterations: settings.maxIterations,
    mode: settings.mode,
    pour: settings.pour,
    progressInterval: settings.progressInterval,
    timeLimitMs:
      settings.timeLimitMs === null ? null : createDurationMs(settings.timeLimitMs),
  };
}
