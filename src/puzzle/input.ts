// Structural validation of capture-side input and color interning
// Never throws: malformed input comes back as a list of issues

import { createCapacity, createColorCode, type ColorCode } from "../types/brands";

import type { ColorToken, Puzzle, PuzzleInput, Tube } from "./types";

export type InputIssueCode =
  | "malformed"
  | "invalid-capacity"
  | "too-few-tubes"
  | "tube-count-mismatch"
  | "tube-over-capacity"
  | "invalid-color"
  | "empty-count-mismatch";

export type InputIssue = Readonly<{
  code: InputIssueCode;
  message: string;
  tube?: number;
}>;

export type ParseResult =
  | Readonly<{ ok: true; puzzle: Puzzle }>
  | Readonly<{ ok: false; issues: ReadonlyArray<InputIssue> }>;

export const MIN_TUBES = 2 as const;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isInteger(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x);
}

function isColorToken(x: unknown): x is ColorToken {
  if (typeof x === "string") return x.length > 0;
  return typeof x === "number" && Number.isFinite(x);
}

function issue(code: InputIssueCode, message: string, tube?: number): InputIssue {
  return tube === undefined ? { code, message } : { code, message, tube };
}

function fail(...issues: Array<InputIssue>): ParseResult {
  return { issues, ok: false };
}

type Header = Pick<PuzzleInput, "capacity" | "totalTubes">;

function readHeader(
  raw: Record<string, unknown>,
):
  | Readonly<{ ok: true; header: Header }>
  | Readonly<{ ok: false; issues: ReadonlyArray<InputIssue> }> {
  const { capacity, totalTubes } = raw;
  const issues: Array<InputIssue> = [];
  if (!isInteger(capacity) || capacity < 1) {
    issues.push(issue("invalid-capacity", "capacity must be an integer >= 1"));
  }
  if (!isInteger(totalTubes) || totalTubes < MIN_TUBES) {
    issues.push(
      issue("too-few-tubes", `totalTubes must be an integer >= ${String(MIN_TUBES)}`),
    );
  }
  if (!isInteger(capacity) || !isInteger(totalTubes) || issues.length > 0) {
    return { issues, ok: false };
  }
  return { header: { capacity, totalTubes }, ok: true };
}

// Holes in a sparse list read as undefined and fail the color check
function readTube(raw: unknown): Array<ColorToken> | null {
  if (!Array.isArray(raw)) return null;
  const units: ReadonlyArray<unknown> = raw;
  const tube: Array<ColorToken> = [];
  for (let j = 0; j < units.length; j++) {
    const unit = units[j];
    if (!isColorToken(unit)) return null;
    tube.push(unit);
  }
  return tube;
}

type CheckedTubes = Readonly<{
  issues: ReadonlyArray<InputIssue>;
  tubes: ReadonlyArray<ReadonlyArray<ColorToken>>;
}>;

function checkTubes(
  tubes: ReadonlyArray<unknown>,
  capacity: number,
  totalTubes: number,
  emptyTubes: unknown,
): CheckedTubes {
  const out: Array<InputIssue> = [];
  const checked: Array<ReadonlyArray<ColorToken>> = [];

  if (tubes.length !== totalTubes) {
    out.push(
      issue(
        "tube-count-mismatch",
        `expected ${String(totalTubes)} tubes, got ${String(tubes.length)}`,
      ),
    );
  }

  // Index loop: forEach would skip the holes of a sparse list
  for (let i = 0; i < tubes.length; i++) {
    const raw = tubes[i];
    if (!Array.isArray(raw)) {
      out.push(issue("malformed", `tube ${String(i)} is not a list`, i));
      continue;
    }
    if (raw.length > capacity) {
      out.push(
        issue(
          "tube-over-capacity",
          `tube ${String(i)} holds ${String(raw.length)} units, capacity is ${String(capacity)}`,
          i,
        ),
      );
    }
    const tube = readTube(raw);
    if (tube === null) {
      out.push(
        issue("invalid-color", `tube ${String(i)} contains an invalid color`, i),
      );
      continue;
    }
    checked.push(tube);
  }

  if (emptyTubes !== undefined) {
    const actual = checked.filter((t) => t.length === 0).length;
    if (!isInteger(emptyTubes) || emptyTubes !== actual) {
      out.push(
        issue(
          "empty-count-mismatch",
          `declared ${String(emptyTubes)} empty tubes, found ${String(actual)}`,
        ),
      );
    }
  }

  return { issues: out, tubes: checked };
}

// Codes follow first appearance: tube 0 bottom to top, then tube 1, ...
function intern(tubes: ReadonlyArray<ReadonlyArray<ColorToken>>): {
  tubes: ReadonlyArray<Tube>;
  palette: ReadonlyArray<ColorToken>;
} {
  const codes = new Map<ColorToken, ColorCode>();
  const palette: Array<ColorToken> = [];

  const interned = tubes.map((tube) =>
    tube.map((token) => {
      const known = codes.get(token);
      if (known !== undefined) return known;
      const code = createColorCode(palette.length);
      codes.set(token, code);
      palette.push(token);
      return code;
    }),
  );

  return { palette, tubes: interned };
}

/**
 * Checks untyped capture output against the {@link PuzzleInput} shape and
 * interns its colors. Every problem found is reported, not just the first.
 */
export function parsePuzzle(raw: unknown): ParseResult {
  if (!isRecord(raw)) {
    return fail(issue("malformed", "puzzle input must be an object"));
  }
  const rawTubes = raw["tubes"];
  if (!Array.isArray(rawTubes)) {
    return fail(issue("malformed", "tubes must be a list"));
  }
  const tubes: Array<unknown> = rawTubes;

  const read = readHeader(raw);
  if (!read.ok) return fail(...read.issues);
  const { capacity, totalTubes } = read.header;

  const checked = checkTubes(tubes, capacity, totalTubes, raw["emptyTubes"]);
  if (checked.issues.length > 0) return fail(...checked.issues);

  const { palette, tubes: interned } = intern(checked.tubes);

  return {
    ok: true,
    puzzle: {
      palette,
      state: { capacity: createCapacity(capacity), tubes: interned },
    },
  };
}
