/**
 * Performance benchmarks for positional access
 * Run with: VITEST_PERF=1 npm test -w @wrinkle-list/core
 */

import { describe, it, expect } from "vitest";
import { ArraySequence } from "../src/array-sequence.js";
import { LinkedSequence } from "../src/linked-sequence.js";
import { WrinkleList } from "../src/wrinkle-list.js";
import { Logger } from "../src/observability/logs.js";
import type { Sequence } from "../src/types.js";

// Only run benchmarks if VITEST_PERF is set
const describeIf = process.env.VITEST_PERF ? describe : describe.skip;

const SIZE = 100_000;
const READS = 20_000;

const quiet = new Logger();
quiet.setEnabled(false);

function stride(count: number, size: number): number[] {
  // Deterministic spread of positions across the whole sequence
  return Array.from({ length: count }, (_, i) => (i * 7919) % size);
}

function readAll(seq: Sequence<number>, positions: number[]): number {
  let sum = 0;
  for (const at of positions) {
    sum += seq.get(at);
  }
  return sum;
}

describeIf("Sequence Performance Benchmarks", () => {
  const items = Array.from({ length: SIZE }, (_, i) => i);
  const positions = stride(READS, SIZE);
  const expectedSum = positions.reduce((sum, at) => sum + at, 0);

  it("snapshotted WrinkleList reads - < 200ms", { timeout: 30000 }, () => {
    const list = WrinkleList.from(items, { logger: quiet });
    list.snapshot();

    const start = Date.now();
    const sum = readAll(list, positions);
    const duration = Date.now() - start;

    console.log(`WrinkleList: ${READS} reads in ${duration}ms`);
    expect(sum).toBe(expectedSum);
    expect(duration).toBeLessThanOrEqual(200);
  });

  it("WrinkleList reads after a burst of inserts", { timeout: 30000 }, () => {
    const list = WrinkleList.from(items, { logger: quiet });
    const oracle = new ArraySequence(items);
    list.snapshot();

    for (let i = 0; i < 500; i++) {
      const at = (i * 104729) % list.size;
      list.insert(at, -i);
      oracle.insert(at, -i);
    }

    const start = Date.now();
    const wrinkled = readAll(list, positions);
    const wrinkledMs = Date.now() - start;

    list.snapshot();
    const rebuiltStart = Date.now();
    const rebuilt = readAll(list, positions);
    const rebuiltMs = Date.now() - rebuiltStart;

    console.log(`WrinkleList: ${READS} reads with 500 wrinkles ${wrinkledMs}ms, after snapshot ${rebuiltMs}ms`);
    expect(wrinkled).toBe(readAll(oracle, positions));
    expect(rebuilt).toBe(wrinkled);
  });

  it("LinkedSequence reads for comparison", { timeout: 60000 }, () => {
    const linked = new LinkedSequence(items);
    const sample = positions.slice(0, 1000);

    const start = Date.now();
    const sum = readAll(linked, sample);
    const duration = Date.now() - start;

    console.log(`LinkedSequence: ${sample.length} reads in ${duration}ms`);
    expect(sum).toBe(sample.reduce((total, at) => total + at, 0));
  });
});
