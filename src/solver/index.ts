import { resolveSolverConfig } from "../app/settings";
import { formatState } from "../puzzle/format";
import { parsePuzzle } from "../puzzle/input";
import { debugLog, debugTable, isDebugEnabled } from "../utils/debug";

import { aStarSearch } from "./astar";
import { breadthFirstSearch } from "./bfs";
import { isProvablyUnsolvable } from "./feasibility";
import { heuristic } from "./heuristic";

import type { Puzzle } from "../puzzle/types";
import type { SearchOutcome, SolveOptions, SolveResult, SolverConfig } from "./types";

function logOutcome(outcome: SearchOutcome): void {
  const { iterations, statesSeen, elapsedMs } = outcome.stats;
  const tail = `after ${String(iterations)} iterations, ${String(statesSeen)} states seen, ${elapsedMs.toFixed(1)}ms`;
  switch (outcome.kind) {
    case "solved":
      debugLog("solver", `Solution found: ${String(outcome.moves.length)} moves ${tail}`);
      break;
    case "unsolvable":
      debugLog("solver", `No solution (${outcome.proof}) ${tail}`);
      break;
    case "budget-exhausted":
      debugLog("solver", `Budget exhausted (${outcome.limit}) ${tail}`);
      break;
  }
}

export function searchPuzzle(puzzle: Puzzle, config: SolverConfig): SearchOutcome {
  const { palette, state } = puzzle;
  if (isDebugEnabled("solver")) {
    debugTable("solver", "Initial state", formatState(state, palette));
    debugLog(
      "solver",
      `Starting ${config.mode} search (pour: ${config.pour}), initial heuristic ${String(heuristic(state))}`,
    );
  }

  if (isProvablyUnsolvable(state)) {
    const outcome: SearchOutcome = {
      kind: "unsolvable",
      proof: "capacity",
      stats: { elapsedMs: 0, iterations: 0, maxFrontier: 0, statesSeen: 0 },
    };
    logOutcome(outcome);
    return outcome;
  }

  const outcome =
    config.mode === "bfs"
      ? breadthFirstSearch(state, config)
      : aStarSearch(state, config);
  logOutcome(outcome);
  return outcome;
}

/**
 * Solve an already-parsed puzzle.
 * Throws only when `options` holds out-of-range settings.
 */
export function solvePuzzle(puzzle: Puzzle, options: SolveOptions = {}): SearchOutcome {
  const { clock, ...settings } = options;
  return searchPuzzle(puzzle, resolveSolverConfig(settings, clock));
}

/**
 * Validate raw capture-side input and solve it.
 * Every puzzle outcome, malformed input included, comes back as a value.
 */
export function solve(input: unknown, options: SolveOptions = {}): SolveResult {
  const parsed = parsePuzzle(input);
  if (!parsed.ok) {
    debugLog("solver", "Rejected input", parsed.issues);
    return { issues: parsed.issues, kind: "invalid-input" };
  }
  return solvePuzzle(parsed.puzzle, options);
}
