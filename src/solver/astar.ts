/**
 * Best-first search ordered by f = g + h, ties broken by discovery order.
 *
 * The heuristic is not admissible, so the first solution found is not
 * necessarily the shortest. A state is re-opened whenever a strictly shorter
 * path to it turns up; heap entries left behind by such a relaxation are
 * skipped when dequeued.
 */

import { applyMove, isSolved, legalMoves, stateKey } from "../puzzle/state";

import { checkBudget, elapsedSince, reportProgress, startBudget } from "./budget";
import { MinHeap } from "./frontier";
import { heuristic } from "./heuristic";
import { childNode, reconstructMoves, rootNode, type SearchNode } from "./node";

import type { PuzzleState } from "../puzzle/types";
import type { StateKey } from "../types/brands";
import type { SearchOutcome, SearchStats, SolverConfig } from "./types";

type OpenEntry = Readonly<{
  f: number;
  seq: number; // insertion order, earlier wins among equal f
  node: SearchNode;
}>;

function compareEntries(a: OpenEntry, b: OpenEntry): number {
  return a.f !== b.f ? a.f - b.f : a.seq - b.seq;
}

// True when a cheaper path to the node's state was found after it was queued
export function isStale(
  best: ReadonlyMap<StateKey, number>,
  node: SearchNode,
): boolean {
  return node.g > (best.get(node.key) ?? Infinity);
}

// Records `g` when it beats the best known cost; an equal cost is no improvement
export function relax(
  best: Map<StateKey, number>,
  key: StateKey,
  g: number,
): boolean {
  if (g >= (best.get(key) ?? Infinity)) return false;
  best.set(key, g);
  return true;
}

export function aStarSearch(
  initial: PuzzleState,
  config: SolverConfig,
): SearchOutcome {
  const meter = startBudget(config);
  const root = rootNode(initial);
  const gScore = new Map<StateKey, number>([[root.key, 0]]);
  const open = new MinHeap<OpenEntry>(compareEntries);

  let seq = 0;
  open.push({ f: heuristic(initial), node: root, seq: seq++ });

  let iterations = 0;
  let maxFrontier = open.size;

  const stats = (): SearchStats => ({
    elapsedMs: elapsedSince(meter),
    iterations,
    maxFrontier,
    statesSeen: gScore.size,
  });

  for (;;) {
    const limit = checkBudget(meter, iterations);
    const entry = open.pop();
    if (entry === undefined) break;
    if (limit !== null) {
      return { kind: "budget-exhausted", limit, stats: stats() };
    }
    iterations++;
    reportProgress(meter, iterations, open.size, gScore.size);

    const { node } = entry;
    if (isStale(gScore, node)) continue;

    if (isSolved(node.state)) {
      return { kind: "solved", moves: reconstructMoves(node), stats: stats() };
    }

    const tentative = node.g + 1;
    for (const move of legalMoves(node.state, config.pour)) {
      const next = applyMove(node.state, move, config.pour);
      const key = stateKey(next);
      if (!relax(gScore, key, tentative)) continue;
      open.push({
        f: tentative + heuristic(next),
        node: childNode(node, move, next, key),
        seq: seq++,
      });
    }
    maxFrontier = Math.max(maxFrontier, open.size);
  }

  return { kind: "unsolvable", proof: "exhausted", stats: stats() };
}
