// Human-readable rendering of tubes, states and moves for logs and for the
// move-execution side. Colors print as their original tokens.

import { colorCodeAsNumber, tubeIndexAsNumber } from "../types/brands";

import { applyMove, pourAmount } from "./state";
import { topColor } from "./tube";

import type { ColorToken, Move, PourMode, PuzzleState, Tube } from "./types";

function tokenOf(palette: ReadonlyArray<ColorToken>, code: number): string {
  const token = palette[code];
  return token === undefined ? `#${String(code)}` : String(token);
}

export function formatTube(tube: Tube, palette: ReadonlyArray<ColorToken>): string {
  if (tube.length === 0) return "[empty]";
  return tube.map((c) => tokenOf(palette, colorCodeAsNumber(c))).join(", ");
}

// One line per tube, bottom to top
export function formatState(
  state: PuzzleState,
  palette: ReadonlyArray<ColorToken>,
): ReadonlyArray<string> {
  return state.tubes.map(
    (tube, i) => `Tube ${String(i)}: ${formatTube(tube, palette)}`,
  );
}

// Describes the pour `move` would make from `state`, e.g.
// "Pour 2 unit(s) of 'red' from Tube 0 to Tube 3"
export function describeMove(
  state: PuzzleState,
  move: Move,
  palette: ReadonlyArray<ColorToken>,
  pour: PourMode,
): string {
  const fromIdx = tubeIndexAsNumber(move.from);
  const toIdx = tubeIndexAsNumber(move.to);
  const from = state.tubes[fromIdx] ?? [];
  const to = state.tubes[toIdx] ?? [];
  const amount = pourAmount(from, to, state.capacity, pour);
  const top = topColor(from);
  const color = top === undefined ? "N/A" : tokenOf(palette, colorCodeAsNumber(top));
  return `Pour ${String(amount)} unit(s) of '${color}' from Tube ${String(fromIdx)} to Tube ${String(toIdx)}`;
}

export function formatMove(move: Move): string {
  return `${String(tubeIndexAsNumber(move.from))}->${String(tubeIndexAsNumber(move.to))}`;
}

// Numbered from 1; stops at the first move that cannot be made
export function describeSolution(
  initial: PuzzleState,
  moves: ReadonlyArray<Move>,
  palette: ReadonlyArray<ColorToken>,
  pour: PourMode,
): ReadonlyArray<string> {
  const lines: Array<string> = [];
  let state = initial;
  for (const [i, move] of moves.entries()) {
    const from = state.tubes[tubeIndexAsNumber(move.from)];
    const to = state.tubes[tubeIndexAsNumber(move.to)];
    if (
      from === undefined ||
      to === undefined ||
      move.from === move.to ||
      pourAmount(from, to, state.capacity, pour) === 0
    ) {
      lines.push(`${String(i + 1)}. Illegal move ${formatMove(move)}`);
      break;
    }
    lines.push(`${String(i + 1)}. ${describeMove(state, move, palette, pour)}`);
    state = applyMove(state, move, pour);
  }
  return lines;
}
