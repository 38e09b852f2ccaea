/**
 * Error types for sequence operations
 *
 * Invariants:
 * - Every error is raised before the operation changes any state
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

import type { CursorDirection } from "./types.js";

/**
 * Base class for all sequence errors
 */
export abstract class SequenceError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an index falls outside the bounds an operation accepts
 */
export class IndexOutOfRangeError extends SequenceError {
  readonly code = "E_RANGE";

  constructor(
    public readonly index: number,
    public readonly size: number,
    options?: ErrorOptions
  ) {
    super(`Index: ${index}, Size: ${size}`, options);
  }
}

/**
 * Thrown by cursor `set()`/`remove()` when no element has been returned since
 * the cursor was created or since its last removal
 */
export class IllegalCursorStateError extends SequenceError {
  readonly code = "E_CURSOR_STATE";

  constructor(
    public readonly operation: "set" | "remove",
    options?: ErrorOptions
  ) {
    super(`Cannot ${operation}: the cursor has no current element`, options);
  }
}

/**
 * Thrown when a sequence was structurally modified by someone other than the cursor
 */
export class StaleCursorError extends SequenceError {
  readonly code = "E_STALE_CURSOR";

  constructor(
    public readonly expectedModCount: number,
    public readonly actualModCount: number,
    options?: ErrorOptions
  ) {
    super(
      `Sequence was modified outside this cursor (expected modCount ${expectedModCount}, found ${actualModCount})`,
      options
    );
  }
}

/**
 * Thrown when a cursor step has no element in the requested direction
 */
export class CursorExhaustedError extends SequenceError {
  readonly code = "E_EXHAUSTED";

  constructor(
    public readonly direction: CursorDirection,
    options?: ErrorOptions
  ) {
    super(`No ${direction === "forward" ? "next" : "previous"} element`, options);
  }
}
