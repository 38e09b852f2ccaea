import { describe, it, expect } from "vitest";
import { clock } from "./timers.js";

describe("clock", () => {
  it("should return the result with a non-negative duration", () => {
    const [result, elapsed] = clock.measure(() => 6 * 7);

    expect(result).toBe(42);
    expect(elapsed).toBeGreaterThanOrEqual(0);
  });

  it("should move forward", () => {
    const start = clock.now();
    expect(clock.now()).toBeGreaterThanOrEqual(start);
  });
});
