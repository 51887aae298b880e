import { stateKey } from "../puzzle/state";

import type { Move, PuzzleState } from "../puzzle/types";
import type { StateKey } from "../types/brands";

// Parent-linked search node; the path is rebuilt only for the solved node
export type SearchNode = Readonly<{
  state: PuzzleState;
  key: StateKey;
  g: number;
  move: Move | null;
  parent: SearchNode | null;
}>;

export function rootNode(state: PuzzleState): SearchNode {
  return { g: 0, key: stateKey(state), move: null, parent: null, state };
}

export function childNode(
  parent: SearchNode,
  move: Move,
  state: PuzzleState,
  key: StateKey,
): SearchNode {
  return { g: parent.g + 1, key, move, parent, state };
}

export function reconstructMoves(node: SearchNode): ReadonlyArray<Move> {
  const moves: Array<Move> = [];
  for (let n: SearchNode | null = node; n !== null; n = n.parent) {
    if (n.move !== null) moves.push(n.move);
  }
  return moves.reverse();
}
