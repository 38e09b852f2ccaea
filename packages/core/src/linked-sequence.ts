/**
 * Chain-backed reference sequence
 */

import { NodeChain } from "./chain.js";
import type { ListNode } from "./chain.js";
import { ListCursor } from "./cursor.js";
import { IndexOutOfRangeError } from "./errors.js";
import type { Sequence, SequenceCursor } from "./types.js";

/**
 * Doubly linked sequence that never takes a snapshot: every positional access
 * walks from the nearer end. Benchmark baseline for the linked-list extreme.
 */
export class LinkedSequence<T> implements Sequence<T> {
  private readonly chain = new NodeChain<T>();

  constructor(items: Iterable<T> = []) {
    for (const item of items) {
      this.chain.append(item);
    }
  }

  get size(): number {
    return this.chain.size;
  }

  get(index: number): T {
    return this.nodeAt(index).item;
  }

  set(index: number, item: T): T {
    const node = this.nodeAt(index);
    const previous = node.item;
    node.item = item;
    return previous;
  }

  append(item: T): void {
    this.chain.append(item);
  }

  insert(index: number, item: T): void {
    if (!Number.isInteger(index) || index < 0 || index > this.chain.size) {
      throw new IndexOutOfRangeError(index, this.chain.size);
    }
    if (index === this.chain.size) {
      this.chain.append(item);
    } else {
      // Without a backbone every node sits in the tail run
      this.chain.linkBefore(this.nodeAt(index), item, 0);
    }
  }

  removeAt(index: number): T {
    return this.chain.unlink(this.nodeAt(index), 0);
  }

  removeRange(from: number, to: number): void {
    if (!Number.isInteger(to) || to < 0 || to > this.chain.size) {
      throw new IndexOutOfRangeError(to, this.chain.size);
    }
    if (!Number.isInteger(from) || from < 0 || from > to) {
      throw new IndexOutOfRangeError(from, this.chain.size);
    }
    if (from === to) return;

    let node: ListNode<T> | undefined = this.nodeAt(from);
    for (let i = from; i < to && node !== undefined; i++) {
      const next: ListNode<T> | undefined = node.next;
      this.chain.unlink(node, 0);
      node = next;
    }
  }

  clear(): void {
    this.chain.reset();
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

  toArray(): T[] {
    return Array.from(this.chain.nodes(), (node) => node.item);
  }

  private nodeAt(index: number): ListNode<T> {
    const { head, foot, size } = this.chain;
    if (!Number.isInteger(index) || index < 0 || index >= size || !head || !foot) {
      throw new IndexOutOfRangeError(index, size);
    }

    let node: ListNode<T> | undefined;
    if (index < size / 2) {
      node = head;
      for (let i = 0; i < index && node; i++) node = node.next;
    } else {
      node = foot;
      for (let i = size - 1; i > index && node; i--) node = node.prev;
    }
    if (!node) {
      throw new IndexOutOfRangeError(index, size);
    }
    return node;
  }
}
