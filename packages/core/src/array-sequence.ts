/**
 * Array-backed reference sequence
 */

import {
  CursorExhaustedError,
  IllegalCursorStateError,
  IndexOutOfRangeError,
  StaleCursorError,
} from "./errors.js";
import type { Sequence, SequenceCursor } from "./types.js";

/**
 * Plain dynamic-array sequence. Positional edits shift elements (O(n)), reads are O(1).
 * Serves as the oracle for equivalence checks and as a benchmark baseline.
 */
export class ArraySequence<T> implements Sequence<T> {
  #items: T[];
  #modCount = 0;

  constructor(items: Iterable<T> = []) {
    this.#items = Array.from(items);
  }

  get size(): number {
    return this.#items.length;
  }

  /** @internal structural modification counter read by cursors */
  get modCount(): number {
    return this.#modCount;
  }

  get(index: number): T {
    this.checkIndex(index);
    return this.#items[index];
  }

  set(index: number, item: T): T {
    this.checkIndex(index);
    const previous = this.#items[index];
    this.#items[index] = item;
    return previous;
  }

  append(item: T): void {
    this.#items.push(item);
    this.#modCount++;
  }

  insert(index: number, item: T): void {
    this.checkPosition(index);
    this.#items.splice(index, 0, item);
    this.#modCount++;
  }

  removeAt(index: number): T {
    this.checkIndex(index);
    const [removed] = this.#items.splice(index, 1);
    this.#modCount++;
    return removed;
  }

  removeRange(from: number, to: number): void {
    this.checkPosition(to);
    if (!Number.isInteger(from) || from < 0 || from > to) {
      throw new IndexOutOfRangeError(from, this.#items.length);
    }
    if (from === to) return;
    this.#items.splice(from, to - from);
    this.#modCount++;
  }

  clear(): void {
    this.#items = [];
    this.#modCount++;
  }

  cursor(index = 0): SequenceCursor<T> {
    return new ArrayCursor(this, index);
  }

  *[Symbol.iterator](): Generator<T, void, undefined> {
    const cursor = this.cursor();
    while (cursor.hasNext()) {
      yield cursor.next();
    }
  }

  toArray(): T[] {
    return [...this.#items];
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.#items.length) {
      throw new IndexOutOfRangeError(index, this.#items.length);
    }
  }

  private checkPosition(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index > this.#items.length) {
      throw new IndexOutOfRangeError(index, this.#items.length);
    }
  }
}

/**
 * Index-based cursor with the same contract as the list cursor
 */
class ArrayCursor<T> implements SequenceCursor<T> {
  private position: number;
  private lastIndex = -1;
  private expectedModCount: number;

  constructor(
    private readonly sequence: ArraySequence<T>,
    index: number
  ) {
    if (!Number.isInteger(index) || index < 0 || index > sequence.size) {
      throw new IndexOutOfRangeError(index, sequence.size);
    }
    this.position = index;
    this.expectedModCount = sequence.modCount;
  }

  hasNext(): boolean {
    return this.position < this.sequence.size;
  }

  hasPrevious(): boolean {
    return this.position !== 0;
  }

  nextIndex(): number {
    return this.position;
  }

  previousIndex(): number {
    return this.position - 1;
  }

  next(): T {
    this.checkForModification();
    if (this.position >= this.sequence.size) {
      throw new CursorExhaustedError("forward");
    }
    this.lastIndex = this.position++;
    return this.sequence.get(this.lastIndex);
  }

  previous(): T {
    this.checkForModification();
    if (this.position === 0) {
      throw new CursorExhaustedError("backward");
    }
    this.lastIndex = --this.position;
    return this.sequence.get(this.lastIndex);
  }

  set(item: T): void {
    this.checkForModification();
    if (this.lastIndex < 0) {
      throw new IllegalCursorStateError("set");
    }
    this.sequence.set(this.lastIndex, item);
  }

  remove(): T {
    this.checkForModification();
    if (this.lastIndex < 0) {
      throw new IllegalCursorStateError("remove");
    }
    const removed = this.sequence.removeAt(this.lastIndex);
    if (this.lastIndex < this.position) {
      this.position--;
    }
    this.lastIndex = -1;
    this.expectedModCount = this.sequence.modCount;
    return removed;
  }

  insert(item: T): void {
    this.checkForModification();
    this.sequence.insert(this.position, item);
    if (this.lastIndex >= this.position) {
      // The last returned element moved one slot right
      this.lastIndex++;
    }
    this.position++;
    this.expectedModCount = this.sequence.modCount;
  }

  private checkForModification(): void {
    if (this.sequence.modCount !== this.expectedModCount) {
      throw new StaleCursorError(this.expectedModCount, this.sequence.modCount);
    }
  }
}
