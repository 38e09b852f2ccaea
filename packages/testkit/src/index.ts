/**
 * Shared test and benchmark utilities for wrinkle-list packages
 */

export { SeededRandom, fnv1a32 } from "./rng.js";
export { clock } from "./timers.js";

export type {
  CursorOperation,
  OperationTally,
  RandomOperation,
  RandomWorkloadOptions,
} from "./workloads.js";
export { populate, runCursorPasses, runRandomOperations } from "./workloads.js";

export type {
  HarnessOptions,
  HarnessReport,
  SequenceKind,
  SequenceSubject,
  SubjectReport,
  WorkloadMode,
} from "./harness.js";
export { SEQUENCE_KINDS, WORKLOAD_MODES, createSubject, runHarness } from "./harness.js";
