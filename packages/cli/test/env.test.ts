/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InvalidArgumentError } from "commander";
import { isVerbose, resolveSeed } from "../src/lib/env.js";

describe("environment resolution", () => {
  let originalSeed: string | undefined;
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalSeed = process.env.WRINKLE_LIST_SEED;
    originalDebug = process.env.WRINKLE_LIST_CLI_DEBUG;
    delete process.env.WRINKLE_LIST_SEED;
    delete process.env.WRINKLE_LIST_CLI_DEBUG;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const [key, value] of [
      ["WRINKLE_LIST_SEED", originalSeed],
      ["WRINKLE_LIST_CLI_DEBUG", originalDebug],
    ] as const) {
      if (value !== undefined) {
        process.env[key] = value;
      } else {
        delete process.env[key];
      }
    }
  });

  describe("resolveSeed", () => {
    it("should use CLI option when provided", () => {
      process.env.WRINKLE_LIST_SEED = "7";
      expect(resolveSeed(42)).toBe(42);
    });

    it("should use WRINKLE_LIST_SEED when CLI option not provided", () => {
      process.env.WRINKLE_LIST_SEED = "7";
      expect(resolveSeed()).toBe(7);
    });

    it("should reject an invalid WRINKLE_LIST_SEED", () => {
      process.env.WRINKLE_LIST_SEED = "seven";
      expect(() => resolveSeed()).toThrow(InvalidArgumentError);
      expect(() => resolveSeed()).toThrow("WRINKLE_LIST_SEED must be an integer");
    });

    it("should fall back to a 32-bit seed", () => {
      const seed = resolveSeed();
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThanOrEqual(0xffffffff);
    });
  });

  describe("isVerbose", () => {
    it("should be on only for WRINKLE_LIST_CLI_DEBUG=1", () => {
      expect(isVerbose()).toBe(false);

      process.env.WRINKLE_LIST_CLI_DEBUG = "true";
      expect(isVerbose()).toBe(false);

      process.env.WRINKLE_LIST_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
