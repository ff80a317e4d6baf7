/**
 * Server configuration from the environment
 */

import * as path from "node:path";
import type { IndexOptions } from "@homeindex/core";
import { isLogLevel } from "./observability/logger.js";
import type { LogLevel } from "./observability/logger.js";

export interface ServerConfig {
  dataPath: string;
  logLevel: LogLevel;
  enabled: boolean;
  indexOptions: IndexOptions;
}

function readBucketSize(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") {
    return undefined;
  }
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

export function resolveServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const indexOptions: IndexOptions = {};
  const priceBucketSize = readBucketSize(env, "HOMEINDEX_PRICE_BUCKET");
  const yearBucketSize = readBucketSize(env, "HOMEINDEX_YEAR_BUCKET");
  if (priceBucketSize !== undefined) indexOptions.priceBucketSize = priceBucketSize;
  if (yearBucketSize !== undefined) indexOptions.yearBucketSize = yearBucketSize;

  const level = env.LOG_LEVEL;

  return {
    dataPath: path.resolve(env.DATA_PATH ?? "./data/properties.json"),
    logLevel: level !== undefined && isLogLevel(level) ? level : "info",
    // Default: enabled
    enabled: env.HOMEINDEX_MCP_ENABLED !== "false",
    indexOptions,
  };
}
