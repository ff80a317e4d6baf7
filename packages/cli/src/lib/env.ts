/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import type { IndexOptions } from "@homeindex/core";
import { CliError } from "./errors.js";

/**
 * Expand a leading "~" or "~/" to the home directory. "~user" paths are left as given.
 */
function expandTilde(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolve the dataset file
 * Priority: CLI option > HOMEINDEX_DATA env var > default "./data/properties.json"
 */
export function resolveDataPath(cliData?: string): string {
  const data = cliData ?? process.env.HOMEINDEX_DATA ?? "./data/properties.json";
  return path.resolve(expandTilde(data));
}

function readBucketSize(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim()) || Number(raw) < 1) {
    throw new CliError(`${name} must be a positive integer, got "${raw}"`, { exitCode: 1 });
  }
  return Number(raw);
}

/**
 * Index options from HOMEINDEX_PRICE_BUCKET and HOMEINDEX_YEAR_BUCKET
 */
export function resolveIndexOptionsFromEnv(): IndexOptions {
  const options: IndexOptions = {};
  const priceBucketSize = readBucketSize("HOMEINDEX_PRICE_BUCKET");
  const yearBucketSize = readBucketSize("HOMEINDEX_YEAR_BUCKET");
  if (priceBucketSize !== undefined) options.priceBucketSize = priceBucketSize;
  if (yearBucketSize !== undefined) options.yearBucketSize = yearBucketSize;
  return options;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.HOMEINDEX_CLI_DEBUG === "1";
}
