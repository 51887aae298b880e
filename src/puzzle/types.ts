// Puzzle model types: tubes, states, moves and the capture-side input shape

import type { Capacity, ColorCode, TubeIndex } from "../types/brands";

// Color as delivered by the capture side; opaque, compared by identity only
export type ColorToken = string | number;

// Bottom first: index 0 is the bottom unit, the last index is the top
export type Tube = ReadonlyArray<ColorCode>;

export type PuzzleState = Readonly<{
  capacity: Capacity;
  tubes: ReadonlyArray<Tube>;
}>;

// Pours the whole top block (or as much as fits, under "partial")
export type Move = Readonly<{
  from: TubeIndex;
  to: TubeIndex;
}>;

// "partial": clamp to free space in the destination
// "all-or-nothing": the whole block must fit or the pour is illegal
export type PourMode = "partial" | "all-or-nothing";

export type PuzzleInput = Readonly<{
  totalTubes: number;
  capacity: number;
  tubes: ReadonlyArray<ReadonlyArray<ColorToken>>;
  emptyTubes?: number; // declared count of empty tubes, cross-checked when present
}>;

// Parsed puzzle: interned state plus the palette to map codes back to tokens
export type Puzzle = Readonly<{
  state: PuzzleState;
  palette: ReadonlyArray<ColorToken>;
}>;
