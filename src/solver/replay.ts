// Pure re-derivation of the states a move list passes through

import { formatMove } from "../puzzle/format";
import { applyMove, canPour, isSolved } from "../puzzle/state";
import { tubeIndexAsNumber } from "../types/brands";
import { debugLog } from "../utils/debug";

import type { Move, PourMode, PuzzleState } from "../puzzle/types";

export type ReplayFailure = "index-out-of-range" | "same-tube" | "illegal-pour";

// `states[0]` is the initial state, `states[i + 1]` the state after move i
export type ReplayResult =
  | Readonly<{
      ok: true;
      states: ReadonlyArray<PuzzleState>;
      final: PuzzleState;
      solved: boolean;
    }>
  | Readonly<{
      ok: false;
      step: number; // 0-based index of the offending move
      reason: ReplayFailure;
      states: ReadonlyArray<PuzzleState>;
    }>;

function checkMove(state: PuzzleState, move: Move, pour: PourMode): ReplayFailure | null {
  const from = state.tubes[tubeIndexAsNumber(move.from)];
  const to = state.tubes[tubeIndexAsNumber(move.to)];
  if (from === undefined || to === undefined) return "index-out-of-range";
  if (move.from === move.to) return "same-tube";
  if (!canPour(from, to, state.capacity, pour)) return "illegal-pour";
  return null;
}

export function replay(
  initial: PuzzleState,
  moves: ReadonlyArray<Move>,
  pour: PourMode,
): ReplayResult {
  const states: Array<PuzzleState> = [initial];
  let state = initial;

  for (const [step, move] of moves.entries()) {
    const reason = checkMove(state, move, pour);
    if (reason !== null) {
      debugLog("replay", `move ${String(step)} (${formatMove(move)}) rejected: ${reason}`);
      return { ok: false, reason, states, step };
    }
    state = applyMove(state, move, pour);
    states.push(state);
  }

  return { final: state, ok: true, solved: isSolved(state), states };
}

export function verifySolution(
  initial: PuzzleState,
  moves: ReadonlyArray<Move>,
  pour: PourMode,
): boolean {
  const result = replay(initial, moves, pour);
  return result.ok && result.solved;
}
