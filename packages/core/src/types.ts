/**
 * Core types for wrinkle-list
 */

/**
 * Direction of a cursor step
 */
export type CursorDirection = "forward" | "backward";

/**
 * Bidirectional traversal handle over a sequence.
 *
 * A cursor sits between two elements: `nextIndex()` is the index of the element
 * `next()` would return, `previousIndex()` the one `previous()` would return.
 * `set()` and `remove()` act on the element returned by the latest traversal step.
 */
export interface SequenceCursor<T> {
  hasNext(): boolean;
  hasPrevious(): boolean;
  /** Return the next element and move past it */
  next(): T;
  /** Return the previous element and move before it */
  previous(): T;
  nextIndex(): number;
  previousIndex(): number;
  /** Replace the element most recently returned by `next()` or `previous()` */
  set(item: T): void;
  /** Remove the element most recently returned by `next()` or `previous()` */
  remove(): T;
  /** Insert an element at the cursor position, before the element `next()` would return */
  insert(item: T): void;
}

/**
 * Minimal positional sequence contract shared by every implementation
 */
export interface Sequence<T> extends Iterable<T> {
  /** Current element count */
  readonly size: number;
  get(index: number): T;
  /** Replace the element at `index`, returning the previous one */
  set(index: number, item: T): T;
  append(item: T): void;
  insert(index: number, item: T): void;
  removeAt(index: number): T;
  /** Remove the half-open range `[from, to)` */
  removeRange(from: number, to: number): void;
  clear(): void;
  cursor(index?: number): SequenceCursor<T>;
}

/**
 * Ordered view of one wrinkle
 */
export interface WrinkleEntry {
  /** Backbone slot the correction starts at */
  readonly index: number;
  /** Net insertions (positive) or deletions (negative) recorded at this slot */
  readonly offset: number;
}

/**
 * Structural statistics for monitoring and debugging
 */
export interface SequenceStats {
  /** Current element count */
  size: number;
  /** Number of slots captured by the last snapshot */
  backboneLength: number;
  /** Number of stored wrinkles */
  wrinkleCount: number;
  /** Elements that lie after the backbone's covered range */
  tailLength: number;
  /** Structural modification counter */
  modCount: number;
}

/**
 * Element comparer used by equality helpers
 */
export type ElementEquals<T> = (a: T, b: T) => boolean;
