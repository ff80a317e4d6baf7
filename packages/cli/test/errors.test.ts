/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import {
  DatasetReadError,
  IncompatibleIndexesError,
  InvalidRangeError,
  ResultMismatchError,
  UnknownAttributeError,
} from "@homeindex/core";
import { CliError, mapCoreErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("disagreement", { exitCode: 3 });
      expect(err.exitCode).toBe(3);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapCoreErrorToExitCode", () => {
    it("should map dataset errors to exit code 2", () => {
      expect(mapCoreErrorToExitCode(new DatasetReadError("/tmp/missing.json", true))).toBe(2);
      expect(mapCoreErrorToExitCode(new DatasetReadError("/tmp/broken.json", false))).toBe(2);
    });

    it("should map index disagreement to exit code 3", () => {
      expect(mapCoreErrorToExitCode(new ResultMismatchError([1], []))).toBe(3);
      expect(mapCoreErrorToExitCode(new IncompatibleIndexesError())).toBe(3);
    });

    it("should map filter errors to exit code 1", () => {
      expect(mapCoreErrorToExitCode(new UnknownAttributeError("pool", ["bedrooms"]))).toBe(1);
      expect(mapCoreErrorToExitCode(new InvalidRangeError("price", "min (5) is greater than max (1)"))).toBe(1);
    });

    it("should use the exit code carried by CLI and commander errors", () => {
      expect(mapCoreErrorToExitCode(new CliError("x", { exitCode: 3 }))).toBe(3);
      expect(mapCoreErrorToExitCode(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(0);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapCoreErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapCoreErrorToExitCode("string error")).toBe(1);
      expect(mapCoreErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      expect(formatCliError(new Error("test error"))).toBe("test error");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted.length).toBeLessThan(2100);
      expect(formatted).toContain("(truncated)");
    });

    it("should include cause in verbose mode", () => {
      const err = new DatasetReadError("/tmp/missing.json", true, { cause: new Error("ENOENT: no such file") });

      const formatted = formatCliError(err, true);
      expect(formatted).toContain("Cause: Error: ENOENT: no such file");
    });

    it("should list disagreeing ids in verbose mode", () => {
      const formatted = formatCliError(new ResultMismatchError([4, 9], [7]), true);
      expect(formatted).toContain("\n  Only in hash-set: 4, 9");
      expect(formatted).toContain("\n  Only in posting-list: 7");
    });

    it("should not include stack in non-verbose mode", () => {
      expect(formatCliError(new Error("test"), false)).toBe("test");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
