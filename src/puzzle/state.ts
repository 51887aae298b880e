import {
  createStateKey,
  createTubeIndex,
  tubeIndexAsNumber,
  type Capacity,
  type ColorCode,
  type StateKey,
} from "../types/brands";

import { blockSize, freeSpace, isEmpty, isSettled, topColor } from "./tube";

import type { Move, PourMode, PuzzleState, Tube } from "./types";

// Units that would move from `from` to `to`; 0 means the pour is illegal
export function pourAmount(
  from: Tube,
  to: Tube,
  capacity: Capacity,
  pour: PourMode,
): number {
  const block = blockSize(from);
  if (block === 0) return 0;

  const space = freeSpace(to, capacity);
  if (space === 0) return 0;

  if (!isEmpty(to) && topColor(to) !== topColor(from)) return 0;

  if (block <= space) return block;
  return pour === "partial" ? space : 0;
}

export function canPour(
  from: Tube,
  to: Tube,
  capacity: Capacity,
  pour: PourMode,
): boolean {
  return pourAmount(from, to, capacity, pour) > 0;
}

// Moving a settled tube wholesale into an empty one only relabels it
export function isUsefulMove(from: Tube, to: Tube): boolean {
  return !(isEmpty(to) && isSettled(from));
}

function tubeAt(state: PuzzleState, index: number): Tube {
  const tube = state.tubes[index];
  if (tube === undefined) {
    throw new Error(`applyMove: tube ${String(index)} out of range`);
  }
  return tube;
}

// Returns a new state; the input is never touched
export function applyMove(
  state: PuzzleState,
  move: Move,
  pour: PourMode,
): PuzzleState {
  const fromIdx = tubeIndexAsNumber(move.from);
  const toIdx = tubeIndexAsNumber(move.to);
  if (fromIdx === toIdx) {
    throw new Error("applyMove: source and destination are the same tube");
  }
  const from = tubeAt(state, fromIdx);
  const to = tubeAt(state, toIdx);

  const amount = pourAmount(from, to, state.capacity, pour);
  if (amount === 0) {
    throw new Error(
      `applyMove: illegal pour from tube ${String(fromIdx)} to tube ${String(toIdx)}`,
    );
  }

  const poured = from.slice(from.length - amount);
  const tubes = state.tubes.map((tube, i) => {
    if (i === fromIdx) return from.slice(0, from.length - amount);
    if (i === toIdx) return [...to, ...poured];
    return tube;
  });

  return { ...state, tubes };
}

// Candidate moves in a fixed order: source ascending, then destination ascending
export function legalMoves(
  state: PuzzleState,
  pour: PourMode,
): ReadonlyArray<Move> {
  const moves: Array<Move> = [];
  const { capacity, tubes } = state;

  tubes.forEach((from, fromIdx) => {
    if (blockSize(from) === 0) return;
    tubes.forEach((to, toIdx) => {
      if (fromIdx === toIdx) return;
      if (!canPour(from, to, capacity, pour)) return;
      if (!isUsefulMove(from, to)) return;
      moves.push({ from: createTubeIndex(fromIdx), to: createTubeIndex(toIdx) });
    });
  });

  return moves;
}

export function isSolved(state: PuzzleState): boolean {
  return state.tubes.every(isSettled);
}

// Order-preserving structural key, e.g. "[0,1][1,0][][]"
export function stateKey(state: PuzzleState): StateKey {
  return createStateKey(state.tubes.map((t) => `[${t.join(",")}]`).join(""));
}

export function colorCounts(state: PuzzleState): ReadonlyMap<ColorCode, number> {
  const counts = new Map<ColorCode, number>();
  for (const tube of state.tubes) {
    for (const color of tube) {
      counts.set(color, (counts.get(color) ?? 0) + 1);
    }
  }
  return counts;
}
