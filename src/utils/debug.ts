// Lightweight, opt-in debug logging utilities for the solver + tests

// Topics can be enabled via:
// - environment variable WATERSORT_DEBUG with values: "true", "1", "on", or a comma list of topics
//   e.g. WATERSORT_DEBUG=solver,replay
// - setDebugTopics(["solver"]) at runtime, which takes precedence until cleared with null

export const DEBUG_ENV_KEY = "WATERSORT_DEBUG" as const;

let overrideTopics: ReadonlyArray<string> | null = null;

function parseTopics(raw: string): ReadonlyArray<string> {
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readEnvTopics(): ReadonlyArray<string> {
  const raw = process.env[DEBUG_ENV_KEY];
  if (raw === undefined) return [];
  return parseTopics(raw);
}

export function setDebugTopics(topics: ReadonlyArray<string> | null): void {
  overrideTopics = topics === null ? null : topics.map((t) => t.toLowerCase());
}

export function isDebugEnabled(topic?: string): boolean {
  const topics = overrideTopics ?? readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic.toLowerCase());
  return true;
}

export function debugLog(topic: string, message: string, data?: unknown): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}

export function debugTable(topic: string, label: string, rows: unknown): void {
  if (!isDebugEnabled(topic)) return;
  console.warn(`[DBG:${topic}] ${label}`, rows);
}
