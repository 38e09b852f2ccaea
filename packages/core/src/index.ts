/**
 * wrinkle-list
 *
 * An indexable sequence that absorbs bursts of positional edits between snapshots
 */

// Re-export types
export type {
  CursorDirection,
  ElementEquals,
  Sequence,
  SequenceCursor,
  SequenceStats,
  WrinkleEntry,
} from "./types.js";

// Sequence implementations
export type { WrinkleListOptions } from "./wrinkle-list.js";
export { WrinkleList } from "./wrinkle-list.js";
export { ArraySequence } from "./array-sequence.js";
export { LinkedSequence } from "./linked-sequence.js";

// Re-export utilities
export type { SizedIterable } from "./equality.js";
export { sequenceEquals } from "./equality.js";

// Re-export logging
export type { LogData, LogEntry, LogLevel } from "./observability/logs.js";
export { Logger, logger, formatLogEntry } from "./observability/logs.js";

// Re-export errors
export {
  SequenceError,
  IndexOutOfRangeError,
  IllegalCursorStateError,
  StaleCursorError,
  CursorExhaustedError,
} from "./errors.js";
