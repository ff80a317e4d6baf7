/**
 * Mapping of validation and index errors onto MCP error codes
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
  HomeIndexError,
  HomeNotLocatedError,
  InvalidPredicateError,
  InvalidRangeError,
  UnknownAttributeError,
} from "@homeindex/core";

/**
 * Stable short code for logs and metric labels
 */
export function errorCode(error: unknown): string {
  if (error instanceof HomeIndexError) return error.code;
  if (error instanceof z.ZodError) return "INVALID_INPUT";
  if (error instanceof McpError) return String(error.code);
  if (error instanceof RangeError) return "OUT_OF_RANGE";
  return "UNKNOWN";
}

export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")}`,
    };
  }

  // Filters that reference unknown attributes or carry bad values are caller errors,
  // as are proximity searches from homes that cannot be placed on the map
  if (
    error instanceof UnknownAttributeError ||
    error instanceof HomeNotLocatedError ||
    error instanceof InvalidRangeError ||
    error instanceof InvalidPredicateError ||
    error instanceof RangeError
  ) {
    return { code: ErrorCode.InvalidParams, message: error.message };
  }

  if (error instanceof HomeIndexError) {
    return { code: ErrorCode.InternalError, message: `${error.code}: ${error.message}` };
  }

  if (error instanceof Error) {
    return { code: ErrorCode.InternalError, message: error.message };
  }

  return { code: ErrorCode.InternalError, message: String(error) };
}
