/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { parseCoordinate, parseNonNegativeInt, parseNumber, parseRangeSpec } from "../src/lib/arg.js";
import { InvalidArgumentError } from "commander";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid positive integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt("1", "test")).toBe(1);
      expect(parseNonNegativeInt("9999", "test")).toBe(9999);
    });

    it("should reject negative numbers", () => {
      expect(() => parseNonNegativeInt("-1", "test")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("-100", "test")).toThrow("must be a non-negative integer");
    });

    it("should reject NaN", () => {
      expect(() => parseNonNegativeInt("abc", "test")).toThrow("must be a non-negative integer");
    });

    it("should enforce the maximum", () => {
      expect(() => parseNonNegativeInt("10001", "test")).toThrow("must be <= 10000");
      expect(parseNonNegativeInt("10000", "test")).toBe(10000);
      expect(parseNonNegativeInt("123456", "--seed", 0xffffffff)).toBe(123456);
    });
  });

  describe("parseNumber", () => {
    it("should parse decimals", () => {
      expect(parseNumber("250000", "--price-min")).toBe(250000);
      expect(parseNumber(" 1.5 ", "--price-min")).toBe(1.5);
    });

    it("should reject non-numbers", () => {
      expect(() => parseNumber("1e5", "--price-min")).toThrow("--price-min must be a non-negative number");
    });
  });

  describe("parseCoordinate", () => {
    it("should parse signed degrees", () => {
      expect(parseCoordinate("41.88", "--lat", 90)).toBe(41.88);
      expect(parseCoordinate(" -87.69 ", "--lon", 180)).toBe(-87.69);
      expect(parseCoordinate("-90", "--lat", 90)).toBe(-90);
    });

    it("should reject out-of-range or malformed degrees", () => {
      expect(() => parseCoordinate("90.5", "--lat", 90)).toThrow("--lat must be between -90 and 90");
      expect(() => parseCoordinate("+10", "--lon", 180)).toThrow(
        "--lon must be a decimal number of degrees"
      );
      expect(() => parseCoordinate("east", "--lon", 180)).toThrow(InvalidArgumentError);
    });
  });

  describe("parseRangeSpec", () => {
    it("should parse exact values", () => {
      expect(parseRangeSpec("3", "--bedrooms")).toBe(3);
      expect(parseRangeSpec("2.5", "--bathrooms")).toBe(2.5);
    });

    it("should parse inclusive ranges", () => {
      expect(parseRangeSpec("2-4", "--bedrooms")).toEqual({ min: 2, max: 4 });
      expect(parseRangeSpec("200_000-300_000", "--price")).toEqual({ min: 200000, max: 300000 });
    });

    it("should parse open-ended ranges", () => {
      expect(parseRangeSpec("2+", "--bathrooms")).toEqual({ min: 2 });
      expect(parseRangeSpec("-1950", "--year-built")).toEqual({ max: 1950 });
    });

    it("should reject anything else", () => {
      expect(() => parseRangeSpec("three", "--bedrooms")).toThrow(InvalidArgumentError);
      expect(() => parseRangeSpec("2-", "--bedrooms")).toThrow(
        '--bedrooms must look like 3, 2-4, 2+ or -4 (got "2-")'
      );
    });
  });
});
