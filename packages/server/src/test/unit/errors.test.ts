import { describe, it, expect } from "vitest";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import {
  HomeNotLocatedError,
  IncompatibleIndexesError,
  InvalidRangeError,
  ResultMismatchError,
  UnknownAttributeError,
} from "@homeindex/core";
import { SearchHomesInputSchema } from "../../schemas.js";
import { errorCode, mapErrorToMcp } from "../../errors.js";

function zodErrorFor(input: unknown): unknown {
  const parsed = SearchHomesInputSchema.safeParse(input);
  return parsed.success ? undefined : parsed.error;
}

describe("mapErrorToMcp", () => {
  it("should map validation errors to InvalidParams with field paths", () => {
    const mapped = mapErrorToMcp(zodErrorFor({ limit: 5000 }));
    expect(mapped.code).toBe(ErrorCode.InvalidParams);
    expect(mapped.message).toBe("Validation error: limit: limit cannot exceed 1000");
  });

  it("should map filter errors to InvalidParams", () => {
    expect(mapErrorToMcp(new UnknownAttributeError("pool", ["bedrooms"])).code).toBe(
      ErrorCode.InvalidParams
    );
    expect(mapErrorToMcp(new InvalidRangeError("price", "empty")).code).toBe(ErrorCode.InvalidParams);
    expect(mapErrorToMcp(new RangeError("limit must be a non-negative integer, got -1"))).toEqual({
      code: ErrorCode.InvalidParams,
      message: "limit must be a non-negative integer, got -1",
    });
  });

  it("should map proximity searches from unplaced homes to InvalidParams", () => {
    expect(mapErrorToMcp(new HomeNotLocatedError(7))).toEqual({
      code: ErrorCode.InvalidParams,
      message: "Home #7 does not exist or has no coordinates",
    });
    expect(errorCode(new HomeNotLocatedError(7))).toBe("HOME_NOT_LOCATED");
  });

  it("should map index defects to InternalError with their code", () => {
    expect(mapErrorToMcp(new IncompatibleIndexesError())).toEqual({
      code: ErrorCode.InternalError,
      message:
        "INCOMPATIBLE_INDEXES: Hash-set and posting-list indexes were built from different property stores",
    });
    expect(mapErrorToMcp(new ResultMismatchError([4], [])).code).toBe(ErrorCode.InternalError);
  });

  it("should map anything else to InternalError", () => {
    expect(mapErrorToMcp(new Error("boom"))).toEqual({ code: ErrorCode.InternalError, message: "boom" });
    expect(mapErrorToMcp("plain")).toEqual({ code: ErrorCode.InternalError, message: "plain" });
  });
});

describe("errorCode", () => {
  it("should name each error family", () => {
    expect(errorCode(new ResultMismatchError([], [1]))).toBe("RESULT_MISMATCH");
    expect(errorCode(zodErrorFor({ method: "scan" }))).toBe("INVALID_INPUT");
    expect(errorCode(new McpError(ErrorCode.MethodNotFound, "nope"))).toBe(String(ErrorCode.MethodNotFound));
    expect(errorCode(new RangeError("x"))).toBe("OUT_OF_RANGE");
    expect(errorCode(new Error("x"))).toBe("UNKNOWN");
  });
});
