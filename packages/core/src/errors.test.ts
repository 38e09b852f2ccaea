/**
 * Tests for sequence error types
 */

import { describe, it, expect } from "vitest";
import {
  CursorExhaustedError,
  IllegalCursorStateError,
  IndexOutOfRangeError,
  SequenceError,
  StaleCursorError,
} from "./errors.js";

describe("errors", () => {
  it("should expose code, name and message for range errors", () => {
    const error = new IndexOutOfRangeError(12, 10);

    expect(error).toBeInstanceOf(SequenceError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("E_RANGE");
    expect(error.name).toBe("IndexOutOfRangeError");
    expect(error.message).toBe("Index: 12, Size: 10");
    expect(error.index).toBe(12);
    expect(error.size).toBe(10);
  });

  it("should name the rejected cursor operation", () => {
    const error = new IllegalCursorStateError("remove");

    expect(error.code).toBe("E_CURSOR_STATE");
    expect(error.operation).toBe("remove");
    expect(error.message).toBe("Cannot remove: the cursor has no current element");
  });

  it("should report both modification counts for stale cursors", () => {
    const error = new StaleCursorError(4, 6);

    expect(error.code).toBe("E_STALE_CURSOR");
    expect(error.expectedModCount).toBe(4);
    expect(error.actualModCount).toBe(6);
    expect(error.message).toBe(
      "Sequence was modified outside this cursor (expected modCount 4, found 6)"
    );
  });

  it("should describe the exhausted direction", () => {
    expect(new CursorExhaustedError("forward").message).toBe("No next element");
    expect(new CursorExhaustedError("backward").message).toBe("No previous element");
    expect(new CursorExhaustedError("backward").code).toBe("E_EXHAUSTED");
  });

  it("should keep the cause", () => {
    const cause = new Error("underlying");
    const error = new IndexOutOfRangeError(1, 0, { cause });

    expect(error.cause).toBe(cause);
  });
});
