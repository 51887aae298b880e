// Solver configuration and result types

import type { InputIssue } from "../puzzle/input";
import type { Move, PourMode } from "../puzzle/types";
import type { DurationMs } from "../types/brands";
import type { Timestamp } from "../types/timestamp";

// "bfs": shortest move count; "astar": heuristic best-first, not guaranteed minimal
export type SearchMode = "bfs" | "astar";

export type SolverSettings = Readonly<{
  mode: SearchMode;
  pour: PourMode;
  maxIterations: number; // dequeues before giving up
  timeLimitMs: number | null; // null = no wall-clock limit
  progressInterval: number; // dequeues between progress log lines
}>;

export type Clock = () => Timestamp;

// Settings after validation, with the clock the budget reads
export type SolverConfig = Readonly<{
  mode: SearchMode;
  pour: PourMode;
  maxIterations: number;
  timeLimitMs: DurationMs | null;
  progressInterval: number;
  clock: Clock;
}>;

export type SearchStats = Readonly<{
  iterations: number; // states dequeued, stale A* entries included
  statesSeen: number; // distinct canonical keys recorded
  maxFrontier: number;
  elapsedMs: number;
}>;

export type BudgetLimit = "iterations" | "time";

// "capacity": colors cannot fit into the available tubes, no search run
// "exhausted": every reachable state was examined
export type UnsolvableProof = "capacity" | "exhausted";

export type SearchOutcome =
  | Readonly<{ kind: "solved"; moves: ReadonlyArray<Move>; stats: SearchStats }>
  | Readonly<{ kind: "unsolvable"; proof: UnsolvableProof; stats: SearchStats }>
  | Readonly<{ kind: "budget-exhausted"; limit: BudgetLimit; stats: SearchStats }>;

export type SolveResult =
  | SearchOutcome
  | Readonly<{ kind: "invalid-input"; issues: ReadonlyArray<InputIssue> }>;

export type SolveOptions = Partial<SolverSettings> & Readonly<{ clock?: Clock }>;
