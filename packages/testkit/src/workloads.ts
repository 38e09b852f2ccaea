/**
 * Seeded operation streams for driving sequences
 *
 * Every decision is drawn from the generator and the current size only, so two
 * correct sequences fed the same seed see exactly the same operations.
 */

import type { Sequence, SequenceCursor } from "@wrinkle-list/core";
import type { SeededRandom } from "./rng.js";
import { clock } from "./timers.js";

export type RandomOperation = "insert" | "get" | "remove";
export type CursorOperation = "next" | "previous" | "insert" | "remove";

/**
 * Per-operation call counts and accumulated milliseconds
 */
export interface OperationTally<Op extends string> {
  counts: Record<Op, number>;
  timings: Record<Op, number>;
}

export interface RandomWorkloadOptions {
  /** Rebuild hook invoked every `snapshotEvery` operations */
  snapshot?: () => void;
  /** Operations between `snapshot` calls (0 or absent: never) */
  snapshotEvery?: number;
}

function randomTally(): OperationTally<RandomOperation> {
  return {
    counts: { insert: 0, get: 0, remove: 0 },
    timings: { insert: 0, get: 0, remove: 0 },
  };
}

function cursorTally(): OperationTally<CursorOperation> {
  return {
    counts: { next: 0, previous: 0, insert: 0, remove: 0 },
    timings: { next: 0, previous: 0, insert: 0, remove: 0 },
  };
}

function record<Op extends string>(tally: OperationTally<Op>, op: Op, elapsed: number): void {
  tally.counts[op]++;
  tally.timings[op] += elapsed;
}

/**
 * Append `size` random values
 */
export function populate(sequence: Sequence<number>, size: number, rng: SeededRandom): void {
  for (let i = 0; i < size; i++) {
    sequence.append(rng.nextInt32());
  }
}

/**
 * Random inserts, reads and removals at uniformly chosen positions.
 * Reads and removals are skipped while the sequence is empty.
 */
export function runRandomOperations(
  sequence: Sequence<number>,
  operations: number,
  rng: SeededRandom,
  options: RandomWorkloadOptions = {}
): OperationTally<RandomOperation> {
  const tally = randomTally();
  const { snapshot, snapshotEvery = 0 } = options;

  for (let i = 0; i < operations; i++) {
    if (snapshot && snapshotEvery > 0 && i > 0 && i % snapshotEvery === 0) {
      snapshot();
    }

    switch (rng.nextInt(3)) {
      case 0: {
        const value = rng.nextInt32();
        const at = rng.nextInt(sequence.size + 1);
        const [, elapsed] = clock.measure(() => sequence.insert(at, value));
        record(tally, "insert", elapsed);
        break;
      }
      case 1: {
        if (sequence.size === 0) break;
        const at = rng.nextInt(sequence.size);
        const [, elapsed] = clock.measure(() => sequence.get(at));
        record(tally, "get", elapsed);
        break;
      }
      default: {
        if (sequence.size === 0) break;
        const at = rng.nextInt(sequence.size);
        const [, elapsed] = clock.measure(() => sequence.removeAt(at));
        record(tally, "remove", elapsed);
        break;
      }
    }
  }

  return tally;
}

/**
 * Full forward then backward cursor passes. After each step a roll of 0 (out of
 * 10) inserts a random value and a roll of 1 removes the element just visited.
 */
export function runCursorPasses(
  sequence: Sequence<number>,
  passes: number,
  rng: SeededRandom
): OperationTally<CursorOperation> {
  const tally = cursorTally();

  for (let pass = 0; pass < passes; pass++) {
    const cursor = sequence.cursor();

    while (cursor.hasNext()) {
      const [, elapsed] = clock.measure(() => cursor.next());
      record(tally, "next", elapsed);
      editAfterStep(cursor, rng, tally);
    }

    while (cursor.hasPrevious()) {
      const [, elapsed] = clock.measure(() => cursor.previous());
      record(tally, "previous", elapsed);
      editAfterStep(cursor, rng, tally);
    }
  }

  return tally;
}

function editAfterStep(
  cursor: SequenceCursor<number>,
  rng: SeededRandom,
  tally: OperationTally<CursorOperation>
): void {
  const roll = rng.nextInt(10);
  if (roll === 0) {
    const value = rng.nextInt32();
    const [, elapsed] = clock.measure(() => cursor.insert(value));
    record(tally, "insert", elapsed);
  } else if (roll === 1) {
    const [, elapsed] = clock.measure(() => cursor.remove());
    record(tally, "remove", elapsed);
  }
}
