// timestamp.ts
declare const TimestampBrand: unique symbol;

export type Timestamp = number & { readonly [TimestampBrand]: true };

// Constructors / guards
export function createTimestamp(value: number): Timestamp {
  if (value <= 0 || !Number.isFinite(value)) {
    throw new Error("Timestamp must be a finite, non-zero number.");
  }
  return value as Timestamp;
}

export function fromNow(): Timestamp {
  return createTimestamp(performance.now());
}

export function isTimestamp(n: unknown): n is Timestamp {
  return typeof n === "number" && n !== 0 && Number.isFinite(n);
}

// Helpers for interop
export const asNumber = (t: Timestamp) => t as number;

// Milliseconds between two readings, never negative
export function elapsedMs(start: Timestamp, end: Timestamp): number {
  return Math.max(0, asNumber(end) - asNumber(start));
}
