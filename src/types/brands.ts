// Branded primitive types for type safety and domain modeling

// Tube position within a puzzle - for move reporting (must be a non-negative integer)
declare const TubeIndexBrand: unique symbol;
export type TubeIndex = number & { readonly [TubeIndexBrand]: true };

// Units a tube may hold - uniform across a puzzle
declare const CapacityBrand: unique symbol;
export type Capacity = number & { readonly [CapacityBrand]: true };

// Interned color - index into the puzzle palette
declare const ColorCodeBrand: unique symbol;
export type ColorCode = number & { readonly [ColorCodeBrand]: true };

// Duration in milliseconds - for search time budgets
declare const DurationMsBrand: unique symbol;
export type DurationMs = number & { readonly [DurationMsBrand]: true };

// Structural-equality key of a puzzle state
declare const StateKeyBrand: unique symbol;
export type StateKey = string & { readonly [StateKeyBrand]: true };

// TubeIndex constructors and guards
export function createTubeIndex(value: number): TubeIndex {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("TubeIndex must be a non-negative integer");
  }
  return value as TubeIndex;
}

export function isTubeIndex(n: unknown): n is TubeIndex {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

export function assertTubeIndex(n: unknown): asserts n is TubeIndex {
  if (!isTubeIndex(n)) throw new Error("Not a valid TubeIndex");
}

// Capacity constructors and guards
export function createCapacity(value: number): Capacity {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error("Capacity must be a positive integer");
  }
  return value as Capacity;
}

export function isCapacity(n: unknown): n is Capacity {
  return typeof n === "number" && Number.isInteger(n) && n >= 1;
}

export function assertCapacity(n: unknown): asserts n is Capacity {
  if (!isCapacity(n)) throw new Error("Not a valid Capacity");
}

// ColorCode constructors and guards
export function createColorCode(value: number): ColorCode {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("ColorCode must be a non-negative integer");
  }
  return value as ColorCode;
}

export function isColorCode(n: unknown): n is ColorCode {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

export function assertColorCode(n: unknown): asserts n is ColorCode {
  if (!isColorCode(n)) throw new Error("Not a valid ColorCode");
}

// DurationMs constructors and guards
export function createDurationMs(value: number): DurationMs {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("DurationMs must be a non-negative finite number");
  }
  return value as DurationMs;
}

export function isDurationMs(n: unknown): n is DurationMs {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

export function assertDurationMs(n: unknown): asserts n is DurationMs {
  if (!isDurationMs(n)) throw new Error("Not a valid DurationMs");
}

// StateKey constructors and guards
export function createStateKey(value: string): StateKey {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error("StateKey must be a non-empty string");
  }
  return value as StateKey;
}

export function isStateKey(s: unknown): s is StateKey {
  return typeof s === "string" && s.length > 0;
}

// Conversion helpers for interop at boundaries
export const tubeIndexAsNumber = (t: TubeIndex): number => t as number;
export const capacityAsNumber = (c: Capacity): number => c as number;
export const colorCodeAsNumber = (c: ColorCode): number => c as number;
export const durationMsAsNumber = (d: DurationMs): number => d as number;
export const stateKeyAsString = (k: StateKey): string => k as string;
