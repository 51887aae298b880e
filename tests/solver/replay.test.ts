import { describe, it, expect } from "@jest/globals";

import { replay, verifySolution } from "@/solver/replay";

import { makeState, mv } from "../test-helpers";

describe("replay", () => {
  const initial = makeState([["red", "blue"], ["blue"], ["red"], []]);

  it("re-derives each intermediate state", () => {
    const result = replay(initial, [mv(0, 1), mv(2, 0)], "all-or-nothing");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.states.map((s) => s.tubes)).toEqual([
      [[0, 1], [1], [0], []],
      [[0], [1, 1], [0], []],
      [[0, 0], [1, 1], [], []],
    ]);
    expect(result.final.tubes).toEqual([[0, 0], [1, 1], [], []]);
    expect(result.solved).toBe(true);
  });

  it("leaves the initial state untouched", () => {
    replay(initial, [mv(0, 1)], "partial");
    expect(initial.tubes).toEqual([[0, 1], [1], [0], []]);
  });

  it("reports an unsolved end state without failing", () => {
    const result = replay(initial, [mv(1, 3)], "all-or-nothing");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.solved).toBe(false);
  });

  it("rejects an out-of-range index", () => {
    const result = replay(initial, [mv(0, 1), mv(4, 0)], "partial");
    expect(result).toMatchObject({ ok: false, reason: "index-out-of-range", step: 1 });
    if (result.ok) return;
    expect(result.states).toHaveLength(2);
  });

  it("rejects a move onto the same tube", () => {
    expect(replay(initial, [mv(1, 1)], "partial")).toMatchObject({
      ok: false,
      reason: "same-tube",
      step: 0,
    });
  });

  it("rejects an illegal pour", () => {
    expect(replay(initial, [mv(2, 1)], "partial")).toMatchObject({
      ok: false,
      reason: "illegal-pour",
      step: 0,
    });
  });

  it("verifySolution requires a legal replay that ends solved", () => {
    expect(verifySolution(initial, [mv(0, 1), mv(2, 0)], "partial")).toBe(true);
    expect(verifySolution(initial, [mv(1, 3)], "partial")).toBe(false);
    expect(verifySolution(initial, [mv(2, 1)], "partial")).toBe(false);
  });
});
