/**
 * Dataset file loading
 *
 * Invariants:
 * - Reads are UTF-8 JSON only
 * - A missing file and an unreadable/malformed file are distinguishable (DatasetReadError.notFound)
 * - Every record is validated; the first bad record aborts the load
 */

import * as fs from "node:fs/promises";
import { DatasetReadError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { parsePropertyRecord } from "./validation.js";
import type { PropertyInput } from "./types.js";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Accepts either a bare array of records or `{ "properties": [...] }`
 */
function extractRecords(data: unknown, filePath: string): unknown[] {
  if (Array.isArray(data)) {
    return data;
  }
  if (data !== null && typeof data === "object" && "properties" in data && Array.isArray(data.properties)) {
    return data.properties;
  }
  throw new DatasetReadError(filePath, false, {
    cause: new TypeError('Dataset must be an array of properties or { "properties": [...] }'),
  });
}

/**
 * Read and validate a property dataset
 * @param filePath - Path to a JSON dataset file
 * @returns Validated property inputs in file order (file order becomes id order)
 * @throws DatasetReadError if the file is missing, unreadable or not JSON
 * @throws InvalidPropertyError if a record fails validation
 */
export async function loadProperties(filePath: string): Promise<PropertyInput[]> {
  const startTime = performance.now();

  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new DatasetReadError(filePath, isMissingFile(err), { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new DatasetReadError(filePath, false, { cause: err });
  }

  const properties = extractRecords(data, filePath).map((raw, position) =>
    parsePropertyRecord(raw, position)
  );

  logger.debug("dataset.load", {
    path: filePath,
    properties: properties.length,
    durationMs: performance.now() - startTime,
  });

  return properties;
}
