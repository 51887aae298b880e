import { describe, it, expect } from "@jest/globals";

import { aStarSearch, isStale, relax } from "@/solver/astar";
import { rootNode } from "@/solver/node";
import { createStateKey } from "@/types/brands";
import { verifySolution } from "@/solver/replay";

import { makeState, pairs, testConfig } from "../test-helpers";

import type { SolverSettings } from "@/solver/types";

const astar = (overrides: Partial<SolverSettings> = {}) =>
  testConfig({ mode: "astar", ...overrides });

const threeColors = () =>
  makeState([
    ["amber", "teal", "violet", "amber"],
    ["teal", "violet", "amber", "teal"],
    ["violet", "amber", "teal", "violet"],
    [],
    [],
  ]);

describe("aStarSearch", () => {
  it("expands the lowest f first", () => {
    // root h=1; child 0->1 has f=1, the other two f=2
    const result = aStarSearch(makeState([["red", "blue"], ["blue"], []]), astar());
    expect(result).toEqual({
      kind: "solved",
      moves: [{ from: 0, to: 1 }],
      stats: { elapsedMs: 0, iterations: 2, maxFrontier: 3, statesSeen: 4 },
    });
  });

  it("returns no moves for a solved start", () => {
    const result = aStarSearch(makeState([["red", "red"], ["blue"], []]), astar());
    expect(result.kind).toBe("solved");
    if (result.kind !== "solved") return;
    expect(result.moves).toEqual([]);
  });

  it("solves two interleaved colors with a replayable move list", () => {
    const initial = makeState([
      ["red", "blue", "red", "blue"],
      ["blue", "red", "blue", "red"],
      [],
      [],
    ]);
    const result = aStarSearch(initial, astar());
    expect(result.kind).toBe("solved");
    if (result.kind !== "solved") return;
    expect(result.moves.length).toBeGreaterThanOrEqual(6);
    expect(verifySolution(initial, result.moves, "all-or-nothing")).toBe(true);
  });

  it("solves the three-color puzzle under both pour modes", () => {
    for (const pour of ["all-or-nothing", "partial"] as const) {
      const result = aStarSearch(threeColors(), astar({ pour }));
      expect(result.kind).toBe("solved");
      if (result.kind !== "solved") return;
      expect(verifySolution(threeColors(), result.moves, pour)).toBe(true);
    }
  });

  it("reports unsolvable when the frontier empties", () => {
    const result = aStarSearch(makeState([["red", "blue"], ["blue", "red"]]), astar());
    expect(result).toEqual({
      kind: "unsolvable",
      proof: "exhausted",
      stats: { elapsedMs: 0, iterations: 1, maxFrontier: 1, statesSeen: 1 },
    });
  });

  it("reports budget exhaustion separately from unsolvable", () => {
    const result = aStarSearch(threeColors(), astar({ maxIterations: 3 }));
    expect(result.kind).toBe("budget-exhausted");
    if (result.kind !== "budget-exhausted") return;
    expect(result.limit).toBe("iterations");
    expect(result.stats.iterations).toBe(3);
  });

  it("is deterministic", () => {
    const a = aStarSearch(threeColors(), astar());
    const b = aStarSearch(threeColors(), astar());
    expect(a.kind).toBe("solved");
    if (a.kind !== "solved" || b.kind !== "solved") return;
    expect(pairs(a.moves)).toEqual(pairs(b.moves));
    expect(a.stats.iterations).toBe(b.stats.iterations);
  });

  it("re-opens a state reached again by a shorter path", () => {
    // every reachable state is visited; one is first found one pour deeper
    // than necessary, so its first heap entry goes stale and is dequeued once more
    const initial = makeState([
      ["red", "red", "green", "blue"],
      ["red", "green", "blue"],
      ["green"],
      ["red", "blue", "green", "blue"],
    ]);
    expect(aStarSearch(initial, astar({ pour: "partial" }))).toEqual({
      kind: "unsolvable",
      proof: "exhausted",
      stats: { elapsedMs: 0, iterations: 37, maxFrontier: 9, statesSeen: 36 },
    });
  });

  it("visits each state once when no shorter path turns up", () => {
    const initial = makeState([
      ["red", "red", "green", "blue"],
      ["red", "green", "blue"],
      ["green"],
      ["red", "blue", "green", "blue"],
    ]);
    expect(aStarSearch(initial, astar())).toEqual({
      kind: "unsolvable",
      proof: "exhausted",
      stats: { elapsedMs: 0, iterations: 30, maxFrontier: 7, statesSeen: 30 },
    });
  });
});

describe("relax", () => {
  const key = createStateKey("[0][1][]");

  it("records a first or strictly cheaper cost", () => {
    const best = new Map([[createStateKey("[]"), 0]]);
    expect(relax(best, key, 3)).toBe(true);
    expect(relax(best, key, 2)).toBe(true);
    expect(best.get(key)).toBe(2);
  });

  it("ignores an equal or higher cost", () => {
    const best = new Map([[key, 2]]);
    expect(relax(best, key, 2)).toBe(false);
    expect(relax(best, key, 5)).toBe(false);
    expect(best.get(key)).toBe(2);
  });
});

describe("isStale", () => {
  const node = rootNode(makeState([["red"], []]));

  it("flags a node whose state has since been reached more cheaply", () => {
    expect(isStale(new Map([[node.key, 0]]), node)).toBe(false);
    expect(isStale(new Map([[node.key, 1]]), { ...node, g: 3 })).toBe(true);
  });
});
