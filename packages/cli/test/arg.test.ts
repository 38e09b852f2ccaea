/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseKinds, parseMode, parseNonNegativeInt, parseSeed } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid non-negative integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt(" 100 ", "test")).toBe(100);
      expect(parseNonNegativeInt("10000000", "test")).toBe(10000000);
    });

    it("should reject negative numbers and garbage", () => {
      expect(() => parseNonNegativeInt("-1", "--size")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("abc", "--size")).toThrow(
        "--size must be a non-negative integer"
      );
      expect(() => parseNonNegativeInt("1.5", "--size")).toThrow(InvalidArgumentError);
    });

    it("should enforce the maximum", () => {
      expect(() => parseNonNegativeInt("10000001", "--ops")).toThrow("--ops must be <= 10000000");
      expect(parseNonNegativeInt("1000", "--ops", 1000)).toBe(1000);
      expect(() => parseNonNegativeInt("1001", "--ops", 1000)).toThrow("--ops must be <= 1000");
    });
  });

  describe("parseSeed", () => {
    it("should reduce integers to 32 bits", () => {
      expect(parseSeed("42", "--seed")).toBe(42);
      expect(parseSeed("-1", "--seed")).toBe(4294967295);
      expect(parseSeed("4294967296", "--seed")).toBe(0);
    });

    it("should reject non-integers", () => {
      expect(() => parseSeed("seed", "--seed")).toThrow("--seed must be an integer");
      expect(() => parseSeed("1e3", "--seed")).toThrow(InvalidArgumentError);
      expect(() => parseSeed("99999999999999999999", "--seed")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseKinds", () => {
    it("should accept initials and names", () => {
      expect(parseKinds("a,l,w", "--lists")).toEqual(["array", "linked", "wrinkle"]);
      expect(parseKinds("Wrinkle, array", "--lists")).toEqual(["wrinkle", "array"]);
    });

    it("should drop duplicates and empty entries", () => {
      expect(parseKinds("w,,wrinkle,a", "--lists")).toEqual(["wrinkle", "array"]);
    });

    it("should reject unknown kinds and empty lists", () => {
      expect(() => parseKinds("a,q", "--lists")).toThrow(
        '--lists accepts array, linked, wrinkle (or a, l, w), got "q"'
      );
      expect(() => parseKinds(" , ", "--lists")).toThrow("--lists must name at least one sequence");
    });
  });

  describe("parseMode", () => {
    it("should accept known modes", () => {
      expect(parseMode("random", "--mode")).toBe("random");
      expect(parseMode("CURSOR", "--mode")).toBe("cursor");
    });

    it("should reject unknown modes", () => {
      expect(() => parseMode("burst", "--mode")).toThrow("--mode must be one of random, cursor");
    });
  });
});
