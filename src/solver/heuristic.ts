import type { PuzzleState } from "../puzzle/types";
import type { ColorCode } from "../types/brands";

// Broken color runs within tubes, plus one point for every tube beyond the
// first that shares a bottom color. Not admissible; best-first only.
export function heuristic(state: PuzzleState): number {
  let h = 0;
  const bottoms = new Map<ColorCode, number>();

  for (const tube of state.tubes) {
    for (let i = 1; i < tube.length; i++) {
      if (tube[i] !== tube[i - 1]) h++;
    }
    const bottom = tube[0];
    if (bottom !== undefined) {
      bottoms.set(bottom, (bottoms.get(bottom) ?? 0) + 1);
    }
  }

  for (const count of bottoms.values()) {
    if (count > 1) h += count - 1;
  }

  return h;
}
