/**
 * Breadth-first search over pour moves.
 *
 * Every state is recorded when first enqueued, so each canonical state is
 * expanded at most once and the first solved state dequeued sits at minimum
 * depth: the returned move list is as short as any solution under the
 * configured pour mode.
 */

import { applyMove, isSolved, legalMoves, stateKey } from "../puzzle/state";

import { checkBudget, elapsedSince, reportProgress, startBudget } from "./budget";
import { FifoQueue } from "./frontier";
import { childNode, reconstructMoves, rootNode, type SearchNode } from "./node";

import type { PuzzleState } from "../puzzle/types";
import type { StateKey } from "../types/brands";
import type { SearchOutcome, SearchStats, SolverConfig } from "./types";

export function breadthFirstSearch(
  initial: PuzzleState,
  config: SolverConfig,
): SearchOutcome {
  const meter = startBudget(config);
  const root = rootNode(initial);
  const visited = new Set<StateKey>([root.key]);
  const queue = new FifoQueue<SearchNode>();
  queue.enqueue(root);

  let iterations = 0;
  let maxFrontier = queue.size;

  const stats = (): SearchStats => ({
    elapsedMs: elapsedSince(meter),
    iterations,
    maxFrontier,
    statesSeen: visited.size,
  });

  for (;;) {
    const limit = checkBudget(meter, iterations);
    const node = queue.dequeue();
    if (node === undefined) break;
    if (limit !== null) {
      return { kind: "budget-exhausted", limit, stats: stats() };
    }
    iterations++;
    reportProgress(meter, iterations, queue.size, visited.size);

    if (isSolved(node.state)) {
      return { kind: "solved", moves: reconstructMoves(node), stats: stats() };
    }

    for (const move of legalMoves(node.state, config.pour)) {
      const next = applyMove(node.state, move, config.pour);
      const key = stateKey(next);
      if (visited.has(key)) continue;
      visited.add(key);
      queue.enqueue(childNode(node, move, next, key));
    }
    maxFrontier = Math.max(maxFrontier, queue.size);
  }

  return { kind: "unsolvable", proof: "exhausted", stats: stats() };
}
