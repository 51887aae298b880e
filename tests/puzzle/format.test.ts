import { describe, it, expect } from "@jest/globals";

import {
  describeMove,
  describeSolution,
  formatMove,
  formatState,
  formatTube,
} from "@/puzzle/format";
import { createColorCode } from "@/types/brands";

import { makePuzzle, mv } from "../test-helpers";

describe("format", () => {
  it("formats tubes bottom to top with original tokens", () => {
    const { palette, state } = makePuzzle([["red", "blue"], [], ["blue"]]);
    expect(formatState(state, palette)).toEqual([
      "Tube 0: red, blue",
      "Tube 1: [empty]",
      "Tube 2: blue",
    ]);
  });

  it("falls back to the code for colors missing from the palette", () => {
    expect(formatTube([createColorCode(0), createColorCode(3)], ["red"])).toBe("red, #3");
  });

  it("describes a single pour with its amount and color", () => {
    const { palette, state } = makePuzzle([["red", "blue"], [], ["blue"]]);
    expect(describeMove(state, mv(0, 2), palette, "all-or-nothing")).toBe(
      "Pour 1 unit(s) of 'blue' from Tube 0 to Tube 2",
    );
  });

  it("formats a move as from->to", () => {
    expect(formatMove(mv(3, 1))).toBe("3->1");
  });

  it("numbers a solution and stops at the first illegal move", () => {
    const { palette, state } = makePuzzle([["red", "blue"], ["blue"], ["red"]]);
    const lines = describeSolution(
      state,
      [mv(0, 1), mv(2, 0), mv(2, 0), mv(0, 1)],
      palette,
      "all-or-nothing",
    );
    expect(lines).toEqual([
      "1. Pour 1 unit(s) of 'blue' from Tube 0 to Tube 1",
      "2. Pour 1 unit(s) of 'red' from Tube 2 to Tube 0",
      "3. Illegal move 2->0",
    ]);
  });
});
