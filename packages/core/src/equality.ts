/**
 * Content equality across sequence implementations
 */

import type { ElementEquals } from "./types.js";

/**
 * Anything with a size that iterates its elements in order
 */
export interface SizedIterable<T> extends Iterable<T> {
  readonly size: number;
}

/**
 * Compare two sequences element-wise, ignoring how either stores its elements.
 * Elements are compared with `Object.is` unless a comparer is given.
 */
export function sequenceEquals<T>(
  a: SizedIterable<T>,
  b: SizedIterable<T>,
  equals: ElementEquals<T> = Object.is
): boolean {
  if (a === b) return true;
  if (a.size !== b.size) return false;

  const left = a[Symbol.iterator]();
  const right = b[Symbol.iterator]();
  for (;;) {
    const l = left.next();
    const r = right.next();
    if (l.done || r.done) {
      return l.done === r.done;
    }
    if (!equals(l.value, r.value)) {
      return false;
    }
  }
}
