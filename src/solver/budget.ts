// Search budget: iteration cap and optional wall-clock limit, checked once per dequeue

import { durationMsAsNumber } from "../types/brands";
import { elapsedMs, type Timestamp } from "../types/timestamp";
import { debugLog } from "../utils/debug";

import type { BudgetLimit, SolverConfig } from "./types";

export type BudgetMeter = Readonly<{
  config: SolverConfig;
  started: Timestamp;
}>;

export function startBudget(config: SolverConfig): BudgetMeter {
  return { config, started: config.clock() };
}

export function elapsedSince(meter: BudgetMeter): number {
  return elapsedMs(meter.started, meter.config.clock());
}

// Called before each dequeue with the number of dequeues so far
export function checkBudget(
  meter: BudgetMeter,
  iterations: number,
): BudgetLimit | null {
  const { maxIterations, timeLimitMs } = meter.config;
  if (iterations >= maxIterations) return "iterations";
  if (
    timeLimitMs !== null &&
    elapsedSince(meter) >= durationMsAsNumber(timeLimitMs)
  ) {
    return "time";
  }
  return null;
}

export function reportProgress(
  meter: BudgetMeter,
  iterations: number,
  frontier: number,
  seen: number,
): void {
  if (iterations === 0 || iterations % meter.config.progressInterval !== 0) {
    return;
  }
  debugLog(
    "solver",
    `Progress: ${String(iterations)} iterations, ${String(frontier)} states in queue, ${String(seen)} states seen`,
  );
}
