/**
 * WrinkleList: an indexable sequence for bursty positional edits
 *
 * Elements live in a doubly linked node chain. `snapshot()` captures the chain
 * into an array of node references (the backbone); edits made afterwards are
 * recorded as wrinkles, so a positional lookup jumps into the backbone, corrects
 * the position by the wrinkle offsets and walks only the short run it lands in.
 * Call `snapshot()` after a burst of edits to return lookups to O(1) walks.
 */

import { NodeChain } from "./chain.js";
import type { ListNode } from "./chain.js";
import { ListCursor } from "./cursor.js";
import { sequenceEquals } from "./equality.js";
import { IndexOutOfRangeError } from "./errors.js";
import { logger as defaultLogger } from "./observability/logs.js";
import type { Logger } from "./observability/logs.js";
import { describeStructure } from "./structure.js";
import type {
  ElementEquals,
  Sequence,
  SequenceCursor,
  SequenceStats,
  WrinkleEntry,
} from "./types.js";

/**
 * Configuration options for a WrinkleList
 */
export interface WrinkleListOptions {
  /** Logger receiving maintenance events (default: global logger) */
  logger?: Logger;
}

export class WrinkleList<T> implements Sequence<T> {
  private readonly chain = new NodeChain<T>();
  private readonly logger: Logger;

  constructor(options: WrinkleListOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Build a list holding the given items in order. No snapshot is taken.
   */
  static from<T>(items: Iterable<T>, options?: WrinkleListOptions): WrinkleList<T> {
    const list = new WrinkleList<T>(options);
    for (const item of items) {
      list.append(item);
    }
    return list;
  }

  get size(): number {
    return this.chain.size;
  }

  isEmpty(): boolean {
    return this.chain.size === 0;
  }

  get(index: number): T {
    return this.locate(index).item;
  }

  set(index: number, item: T): T {
    const node = this.locate(index);
    const previous = node.item;
    node.item = item;
    return previous;
  }

  append(item: T): void {
    this.chain.append(item);
  }

  /**
   * Append several items, returning the new size
   */
  push(...items: T[]): number {
    for (const item of items) {
      this.chain.append(item);
    }
    return this.chain.size;
  }

  insert(index: number, item: T): void {
    this.checkPosition(index);
    if (index === this.chain.size) {
      this.chain.append(item);
      return;
    }

    const backboneIndex = this.chain.backboneIndexOf(index);
    const successor = this.chain.grab(backboneIndex, index);
    this.chain.linkBefore(successor, item, backboneIndex);
  }

  removeAt(index: number): T {
    this.checkIndex(index);
    const backboneIndex = this.chain.backboneIndexOf(index);
    const target = this.chain.grab(backboneIndex, index);
    return this.chain.unlink(target, backboneIndex);
  }

  /**
   * Remove `[from, to)`, walking backward from `to` so each removal leaves the
   * positions still to visit untouched
   */
  removeRange(from: number, to: number): void {
    this.checkPosition(to);
    if (!Number.isInteger(from) || from < 0 || from > to) {
      throw new IndexOutOfRangeError(from, this.chain.size);
    }

    const cursor = this.cursor(to);
    while (cursor.previousIndex() >= from) {
      cursor.previous();
      cursor.remove();
    }
  }

  clear(): void {
    const removed = this.chain.size;
    this.chain.reset();
    this.logger.debug("list.clear", { details: { removed } });
  }

  /**
   * Rebuild the backbone from the current chain and discard all wrinkles.
   * Content and size are unchanged; open cursors become stale.
   */
  snapshot(): void {
    const wrinklesCleared = this.chain.wrinkles.size;
    const tailLength = this.chain.tailLength();
    this.chain.rebuildBackbone();
    this.logger.debug("list.snapshot", {
      details: {
        size: this.chain.size,
        backboneLength: this.chain.backbone.length,
        wrinklesCleared,
        tailLength,
      },
    });
  }

  cursor(index = 0): SequenceCursor<T> {
    return new ListCursor(this.chain, index);
  }

  *[Symbol.iterator](): Generator<T, void, undefined> {
    const cursor = this.cursor();
    while (cursor.hasNext()) {
      yield cursor.next();
    }
  }

  indexOf(item: T): number {
    let index = 0;
    for (const node of this.chain.nodes()) {
      if (Object.is(node.item, item)) return index;
      index++;
    }
    return -1;
  }

  lastIndexOf(item: T): number {
    let index = this.chain.size - 1;
    for (let node = this.chain.foot; node !== undefined; node = node.prev) {
      if (Object.is(node.item, item)) return index;
      index--;
    }
    return -1;
  }

  includes(item: T): boolean {
    return this.indexOf(item) !== -1;
  }

  toArray(): T[] {
    const result: T[] = [];
    for (const node of this.chain.nodes()) {
      result.push(node.item);
    }
    return result;
  }

  /**
   * Element-wise equality with any sequence, regardless of its internals
   */
  equals(other: Sequence<T>, comparer?: ElementEquals<T>): boolean {
    return sequenceEquals(this, other, comparer);
  }

  /**
   * @example "[B0, B1, B2]"
   */
  toString(): string {
    return `[${this.toArray().map(String).join(", ")}]`;
  }

  /**
   * Diagnostic dump of the backbone, wrinkle and tail layout.
   * The format is for debugging only.
   */
  structure(): string {
    return describeStructure(this.chain);
  }

  /**
   * Ascending copy of the wrinkle chain
   */
  wrinkles(): WrinkleEntry[] {
    return this.chain.wrinkles.entries();
  }

  stats(): SequenceStats {
    return {
      size: this.chain.size,
      backboneLength: this.chain.backbone.length,
      wrinkleCount: this.chain.wrinkles.size,
      tailLength: this.chain.tailLength(),
      modCount: this.chain.modCount,
    };
  }

  private locate(index: number): ListNode<T> {
    this.checkIndex(index);
    return this.chain.grab(this.chain.backboneIndexOf(index), index);
  }

  /**
   * Element index: `0 <= index < size`
   */
  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.chain.size) {
      throw new IndexOutOfRangeError(index, this.chain.size);
    }
  }

  /**
   * Insertion position: `0 <= index <= size`
   */
  private checkPosition(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index > this.chain.size) {
      throw new IndexOutOfRangeError(index, this.chain.size);
    }
  }
}
