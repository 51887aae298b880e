import { colorCounts } from "../puzzle/state";
import { capacityAsNumber } from "../types/brands";

import type { PuzzleState } from "../puzzle/types";

// Minimum tubes a solved arrangement needs: each settled tube holds one color,
// at most `capacity` units of it
export function minimumTubesNeeded(state: PuzzleState): number {
  const capacity = capacityAsNumber(state.capacity);
  let needed = 0;
  for (const count of colorCounts(state).values()) {
    needed += Math.ceil(count / capacity);
  }
  return needed;
}

export function isProvablyUnsolvable(state: PuzzleState): boolean {
  return minimumTubesNeeded(state) > state.tubes.length;
}
