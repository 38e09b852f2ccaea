/**
 * Node chain, backbone and node locator shared by the list and its cursors
 */

import { IndexOutOfRangeError } from "./errors.js";
import { WrinkleChain } from "./wrinkles.js";

/**
 * One element of the chain
 */
export interface ListNode<T> {
  item: T;
  prev: ListNode<T> | undefined;
  next: ListNode<T> | undefined;
}

/**
 * Mutable engine state.
 *
 * Invariants:
 * - `head` has no `prev`, `foot` has no `next`; both are absent only when `size` is 0
 * - Right after `rebuildBackbone()`, `backbone[i]` is the node at logical index `i`
 *   and the wrinkle chain is empty
 * - For every slot `b` whose run is non-empty (`toLogical(b) > toLogical(b - 1)`),
 *   `backbone[b]` is the live node at logical index `toLogical(b)`; lookups only
 *   ever start from such slots
 * - `modCount` grows on every structural edit
 */
export class NodeChain<T> {
  head: ListNode<T> | undefined;
  foot: ListNode<T> | undefined;
  backbone: ListNode<T>[] = [];
  readonly wrinkles = new WrinkleChain();
  size = 0;
  modCount = 0;

  /**
   * Backbone slot whose run covers a logical index (`backbone.length` for the tail)
   */
  backboneIndexOf(logicalIndex: number): number {
    return this.wrinkles.toBackbone(logicalIndex, this.backbone.length);
  }

  /**
   * Resolve a logical index to its node, starting from the given backbone slot.
   * Requires `0 <= logicalIndex < size`.
   */
  grab(backboneIndex: number, logicalIndex: number): ListNode<T> {
    const { head, foot } = this;
    if (head === undefined || foot === undefined) {
      throw new IndexOutOfRangeError(logicalIndex, this.size);
    }

    if (logicalIndex === 0) {
      return head;
    }
    if (logicalIndex === this.size - 1) {
      return foot;
    }

    if (backboneIndex === this.backbone.length) {
      return this.walkBack(foot, this.size - 1, logicalIndex);
    }
    return this.walkBack(
      this.backbone[backboneIndex],
      this.wrinkles.toLogical(backboneIndex),
      logicalIndex
    );
  }

  /**
   * Add a node after the foot. Tail growth needs no wrinkle.
   */
  append(item: T): ListNode<T> {
    const node: ListNode<T> = { item, prev: this.foot, next: undefined };
    if (this.foot) {
      this.foot.next = node;
    } else {
      this.head = node;
    }
    this.foot = node;
    this.size++;
    this.modCount++;
    return node;
  }

  /**
   * Splice a new node immediately before `successor`, which lies in the run of
   * `backboneIndex`
   */
  linkBefore(successor: ListNode<T>, item: T, backboneIndex: number): ListNode<T> {
    const node: ListNode<T> = { item, prev: successor.prev, next: successor };
    if (successor.prev) {
      successor.prev.next = node;
    } else {
      this.head = node;
    }
    successor.prev = node;
    this.wrinkles.add(backboneIndex, 1, this.backbone.length);
    this.size++;
    this.modCount++;
    return node;
  }

  /**
   * Splice `node`, which lies in the run of `backboneIndex`, out of the chain
   */
  unlink(node: ListNode<T>, backboneIndex: number): T {
    const { prev, next } = node;
    if (prev) {
      prev.next = next;
    } else {
      this.head = next;
    }
    if (next) {
      next.prev = prev;
    } else {
      this.foot = prev;
    }

    // The slot keeps ending its run. Without a predecessor the run is empty and
    // the slot is never read again.
    if (
      backboneIndex < this.backbone.length &&
      this.backbone[backboneIndex] === node &&
      prev !== undefined
    ) {
      this.backbone[backboneIndex] = prev;
    }
    this.wrinkles.add(backboneIndex, -1, this.backbone.length);

    node.prev = undefined;
    node.next = undefined;
    this.size--;
    this.modCount++;
    return node.item;
  }

  /**
   * Capture every node into a fresh backbone and drop all wrinkles
   */
  rebuildBackbone(): void {
    const backbone = new Array<ListNode<T>>(this.size);
    let node = this.head;
    for (let i = 0; node !== undefined; i++) {
      backbone[i] = node;
      node = node.next;
    }
    this.backbone = backbone;
    this.wrinkles.clear();
    this.modCount++;
  }

  /**
   * Drop every node, the backbone and all wrinkles
   */
  reset(): void {
    this.head = undefined;
    this.foot = undefined;
    this.backbone = [];
    this.wrinkles.clear();
    this.size = 0;
    this.modCount++;
  }

  /**
   * Number of nodes after the backbone's covered range
   */
  tailLength(): number {
    return this.size - this.backbone.length - this.wrinkles.totalOffset();
  }

  /**
   * Iterate nodes from head to foot
   */
  *nodes(): Generator<ListNode<T>, void, undefined> {
    for (let node = this.head; node !== undefined; node = node.next) {
      yield node;
    }
  }

  private walkBack(start: ListNode<T>, startIndex: number, logicalIndex: number): ListNode<T> {
    let node = start;
    for (let index = startIndex; index > logicalIndex; index--) {
      const prev = node.prev;
      if (prev === undefined) {
        throw new IndexOutOfRangeError(logicalIndex, this.size);
      }
      node = prev;
    }
    return node;
  }
}
