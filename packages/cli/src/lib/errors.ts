/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import {
  DatasetReadError,
  HomeIndexError,
  IncompatibleIndexesError,
  ResultMismatchError,
} from "@homeindex/core";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map core errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/unknown error
 * - 2: dataset not found or unreadable
 * - 3: index paths disagree (or were built inconsistently)
 */
export function mapCoreErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof DatasetReadError) {
    return 2;
  }

  if (error instanceof ResultMismatchError || error instanceof IncompatibleIndexesError) {
    return 3;
  }

  if (error instanceof HomeIndexError) {
    return 1;
  }

  // Default to exit code 1 for unknown errors
  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (error instanceof ResultMismatchError && verbose) {
      message += `\n  Only in hash-set: ${error.onlyInHashSet.slice(0, 20).join(", ")}`;
      message += `\n  Only in posting-list: ${error.onlyInPostingList.slice(0, 20).join(", ")}`;
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
