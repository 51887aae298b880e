import { capacityAsNumber, type Capacity, type ColorCode } from "../types/brands";

import type { Tube } from "./types";

export function isEmpty(tube: Tube): boolean {
  return tube.length === 0;
}

export function isFull(tube: Tube, capacity: Capacity): boolean {
  return tube.length >= capacityAsNumber(capacity);
}

export function freeSpace(tube: Tube, capacity: Capacity): number {
  return Math.max(0, capacityAsNumber(capacity) - tube.length);
}

export function topColor(tube: Tube): ColorCode | undefined {
  return tube[tube.length - 1];
}

// Length of the same-colored run at the top; 0 for an empty tube
export function blockSize(tube: Tube): number {
  const top = topColor(tube);
  if (top === undefined) return 0;
  let count = 0;
  for (let i = tube.length - 1; i >= 0; i--) {
    if (tube[i] !== top) break;
    count++;
  }
  return count;
}

// Empty or a single color, regardless of fill level
export function isSettled(tube: Tube): boolean {
  return blockSize(tube) === tube.length;
}
