/**
 * Lockstep harness: run one seeded workload against several sequence
 * implementations and check they end with identical content
 */

import {
  ArraySequence,
  LinkedSequence,
  WrinkleList,
  sequenceEquals,
} from "@wrinkle-list/core";
import type { Logger, Sequence } from "@wrinkle-list/core";
import { SeededRandom } from "./rng.js";
import { clock } from "./timers.js";
import { populate, runCursorPasses, runRandomOperations } from "./workloads.js";

export type SequenceKind = "array" | "linked" | "wrinkle";
export type WorkloadMode = "random" | "cursor";

export const SEQUENCE_KINDS: readonly SequenceKind[] = ["array", "linked", "wrinkle"];
export const WORKLOAD_MODES: readonly WorkloadMode[] = ["random", "cursor"];

/**
 * A sequence under test, with its rebuild hook when it has one
 */
export interface SequenceSubject {
  kind: SequenceKind;
  name: string;
  sequence: Sequence<number>;
  snapshot?: () => void;
}

export function createSubject(kind: SequenceKind, logger?: Logger): SequenceSubject {
  switch (kind) {
    case "array":
      return { kind, name: "ArraySequence", sequence: new ArraySequence<number>() };
    case "linked":
      return { kind, name: "LinkedSequence", sequence: new LinkedSequence<number>() };
    case "wrinkle": {
      const list = new WrinkleList<number>({ logger });
      return { kind, name: "WrinkleList", sequence: list, snapshot: () => list.snapshot() };
    }
  }
}

export interface HarnessOptions {
  kinds: readonly SequenceKind[];
  /** Initial element count */
  size: number;
  /** Random operations, or full cursor pass pairs in cursor mode */
  ops: number;
  seed: number;
  mode: WorkloadMode;
  /** Random mode only: rebuild every N operations (0: only after populating) */
  snapshotEvery?: number;
  logger?: Logger;
}

export interface SubjectReport {
  kind: SequenceKind;
  name: string;
  finalSize: number;
  totalMs: number;
  counts: Record<string, number>;
  timings: Record<string, number>;
}

export interface HarnessReport {
  seed: number;
  mode: WorkloadMode;
  size: number;
  ops: number;
  subjects: SubjectReport[];
  /** True when every subject ends with the same content */
  consistent: boolean;
  /** Names of subjects whose content differs from the first */
  mismatches: string[];
}

/**
 * Populate each subject from the same seed, take a snapshot where supported,
 * then replay the same operation stream against each one
 */
export function runHarness(options: HarnessOptions): HarnessReport {
  const { kinds, size, ops, seed, mode, snapshotEvery = 0, logger } = options;
  const subjects = kinds.map((kind) => createSubject(kind, logger));
  const reports: SubjectReport[] = [];

  for (const subject of subjects) {
    populate(subject.sequence, size, new SeededRandom(seed, "populate"));
    subject.snapshot?.();

    const rng = new SeededRandom(seed, "operations");
    const [tally, totalMs] = clock.measure(() =>
      mode === "random"
        ? runRandomOperations(subject.sequence, ops, rng, {
            snapshot: subject.snapshot,
            snapshotEvery,
          })
        : runCursorPasses(subject.sequence, ops, rng)
    );

    reports.push({
      kind: subject.kind,
      name: subject.name,
      finalSize: subject.sequence.size,
      totalMs,
      counts: { ...tally.counts },
      timings: { ...tally.timings },
    });
  }

  const [reference, ...others] = subjects;
  const mismatches =
    reference === undefined
      ? []
      : others
          .filter((subject) => !sequenceEquals(reference.sequence, subject.sequence))
          .map((subject) => subject.name);

  return {
    seed,
    mode,
    size,
    ops,
    subjects: reports,
    consistent: mismatches.length === 0,
    mismatches,
  };
}
