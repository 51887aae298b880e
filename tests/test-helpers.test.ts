/**
 * @fileoverview Tests for the shared test helpers module
 */

import { makePuzzle, makeState, mv, pairs, steppingClock, testConfig } from "./test-helpers";

describe("test-helpers", () => {
  describe("makePuzzle()", () => {
    test("interns colors in first-seen order", () => {
      const puzzle = makePuzzle([["red", "blue"], ["blue"], []]);
      expect(puzzle.palette).toEqual(["red", "blue"]);
      expect(puzzle.state.tubes).toEqual([[0, 1], [1], []]);
      expect(puzzle.state.capacity).toBe(4);
    });

    test("throws on a puzzle the parser rejects", () => {
      expect(() => makeState([["red", "red", "red"]], 2)).toThrow(
        "makePuzzle: invalid test puzzle",
      );
    });
  });

  test("mv() and pairs() round-trip plain indices", () => {
    expect(pairs([mv(0, 2), mv(3, 1)])).toEqual([
      [0, 2],
      [3, 1],
    ]);
  });

  test("steppingClock() advances on every reading", () => {
    const clock = steppingClock(5);
    expect(clock()).toBe(1000);
    expect(clock()).toBe(1005);
    expect(clock.readings()).toBe(2);
  });

  test("testConfig() defaults to a frozen clock", () => {
    const config = testConfig({ mode: "bfs" });
    expect(config.mode).toBe("bfs");
    expect(config.clock()).toBe(config.clock());
  });
});
