/**
 * Wrinkle chain: ordered corrections between backbone slots and logical indexes
 *
 * Invariants:
 * - Wrinkles are strictly ascending by backbone index (no duplicates)
 * - No stored wrinkle has a zero offset
 * - No stored wrinkle sits at or past the backbone length
 */

import type { WrinkleEntry } from "./types.js";

interface Wrinkle {
  index: number;
  offset: number;
  next: Wrinkle | undefined;
}

/**
 * Translates between backbone coordinates and logical indexes.
 *
 * The run of slot `b` is the nodes after `backbone[b - 1]` up to and including
 * `backbone[b]`; a wrinkle at `b` records how many nodes that run gained or lost
 * since the last snapshot. Lookups walk the chain, so their cost follows the
 * number of wrinkles rather than the number of elements.
 */
export class WrinkleChain {
  #head: Wrinkle | undefined;
  #count = 0;

  /**
   * Number of stored wrinkles
   */
  get size(): number {
    return this.#count;
  }

  /**
   * Logical index of the node referenced by a backbone slot
   */
  toLogical(backboneIndex: number): number {
    let index = backboneIndex;
    for (let w = this.#head; w !== undefined && w.index <= backboneIndex; w = w.next) {
      index += w.offset;
    }
    return index;
  }

  /**
   * Backbone slot whose run covers a logical index.
   *
   * Returns `backboneLength` when the index lies in the tail appended after the
   * backbone. The returned slot may reference a node after the target; the
   * caller walks back `toLogical(slot) - logicalIndex` links from it.
   */
  toBackbone(logicalIndex: number, backboneLength: number): number {
    let lastSeen = 0;
    let runningOffset = 0;
    let w = this.#head;
    // Pass every wrinkle whose run starts at or before the target
    while (w !== undefined && w.index + runningOffset <= logicalIndex) {
      lastSeen = w.index;
      runningOffset += w.offset;
      w = w.next;
    }

    if (lastSeen + runningOffset > logicalIndex) {
      // Inside the run grown by the last passed wrinkle
      return lastSeen;
    }
    if (logicalIndex - runningOffset > backboneLength) {
      return backboneLength;
    }
    return logicalIndex - runningOffset;
  }

  /**
   * Record `offset` net insertions at a backbone slot, merging with an existing
   * wrinkle at the same slot and dropping it when the sum reaches zero
   */
  add(backboneIndex: number, offset: number, backboneLength: number): void {
    // Tail edits need no correction
    if (backboneIndex >= backboneLength || offset === 0) {
      return;
    }

    let prev: Wrinkle | undefined;
    let w = this.#head;
    while (w !== undefined && w.index < backboneIndex) {
      prev = w;
      w = w.next;
    }

    if (w !== undefined && w.index === backboneIndex) {
      w.offset += offset;
      if (w.offset === 0) {
        if (prev) {
          prev.next = w.next;
        } else {
          this.#head = w.next;
        }
        this.#count--;
      }
      return;
    }

    const created: Wrinkle = { index: backboneIndex, offset, next: w };
    if (prev) {
      prev.next = created;
    } else {
      this.#head = created;
    }
    this.#count++;
  }

  /**
   * Sum of every stored offset
   */
  totalOffset(): number {
    let total = 0;
    for (let w = this.#head; w !== undefined; w = w.next) {
      total += w.offset;
    }
    return total;
  }

  /**
   * Drop every wrinkle
   */
  clear(): void {
    this.#head = undefined;
    this.#count = 0;
  }

  /**
   * Ascending copy of the chain
   */
  entries(): WrinkleEntry[] {
    const result: WrinkleEntry[] = [];
    for (let w = this.#head; w !== undefined; w = w.next) {
      result.push({ index: w.index, offset: w.offset });
    }
    return result;
  }
}
