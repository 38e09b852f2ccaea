/**
 * Bidirectional cursor over a node chain with fail-fast modification checks
 */

import type { ListNode, NodeChain } from "./chain.js";
import {
  CursorExhaustedError,
  IllegalCursorStateError,
  IndexOutOfRangeError,
  StaleCursorError,
} from "./errors.js";
import type { SequenceCursor } from "./types.js";

/**
 * Cursor state:
 * - fresh: `lastNode` is absent, `set()`/`remove()` throw
 * - positioned: `lastNode` is the element returned by the latest step
 *
 * `backboneIndex` is the slot whose run holds the node at `position` (the node
 * `next()` would return); `lastBackboneIndex` is the slot whose run holds
 * `lastNode`. Both stay valid across this cursor's own edits.
 */
export class ListCursor<T> implements SequenceCursor<T> {
  private nextNode: ListNode<T> | undefined;
  private lastNode: ListNode<T> | undefined;
  private position: number;
  private backboneIndex: number;
  private lastBackboneIndex = 0;
  private expectedModCount: number;

  constructor(
    private readonly chain: NodeChain<T>,
    index: number
  ) {
    if (!Number.isInteger(index) || index < 0 || index > chain.size) {
      throw new IndexOutOfRangeError(index, chain.size);
    }
    this.position = index;
    this.backboneIndex = chain.backboneIndexOf(index);
    this.nextNode = index < chain.size ? chain.grab(this.backboneIndex, index) : undefined;
    this.expectedModCount = chain.modCount;
  }

  hasNext(): boolean {
    return this.nextNode !== undefined;
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
    const node = this.nextNode;
    if (node === undefined) {
      throw new CursorExhaustedError("forward");
    }

    this.lastNode = node;
    this.nextNode = node.next;
    this.position++;
    this.lastBackboneIndex = this.backboneIndex;
    this.backboneIndex = this.chain.backboneIndexOf(this.position);
    return node.item;
  }

  previous(): T {
    this.checkForModification();
    // At the tail end the previous element is the foot
    const node = this.nextNode === undefined ? this.chain.foot : this.nextNode.prev;
    if (this.position === 0 || node === undefined) {
      throw new CursorExhaustedError("backward");
    }

    this.nextNode = node;
    this.lastNode = node;
    this.position--;
    this.backboneIndex = this.chain.backboneIndexOf(this.position);
    this.lastBackboneIndex = this.backboneIndex;
    return node.item;
  }

  set(item: T): void {
    this.checkForModification();
    if (this.lastNode === undefined) {
      throw new IllegalCursorStateError("set");
    }
    this.lastNode.item = item;
  }

  remove(): T {
    this.checkForModification();
    const node = this.lastNode;
    if (node === undefined) {
      throw new IllegalCursorStateError("remove");
    }

    if (node === this.nextNode) {
      // Last step went backward: the cursor sits before the removed node
      this.nextNode = node.next;
    } else {
      this.position--;
    }

    const item = this.chain.unlink(node, this.lastBackboneIndex);
    this.backboneIndex = this.chain.backboneIndexOf(this.position);
    this.lastNode = undefined;
    this.expectedModCount = this.chain.modCount;
    return item;
  }

  insert(item: T): void {
    this.checkForModification();
    const successor = this.nextNode;

    if (successor === undefined) {
      // Empty chain or tail end: plain append
      this.chain.append(item);
    } else {
      // Head end or interior: the new node joins the run of `successor`
      this.chain.linkBefore(successor, item, this.backboneIndex);
    }

    this.position++;
    this.expectedModCount = this.chain.modCount;
  }

  private checkForModification(): void {
    if (this.chain.modCount !== this.expectedModCount) {
      throw new StaleCursorError(this.expectedModCount, this.chain.modCount);
    }
  }
}
