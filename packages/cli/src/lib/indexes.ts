/**
 * Index loading for CLI commands
 */

import { buildIndexes, loadProperties } from "@homeindex/core";
import type { IndexSet } from "@homeindex/core";
import { resolveDataPath, resolveIndexOptionsFromEnv } from "./env.js";

/**
 * Load the dataset and build both indexes
 * @param cliData - Value of the global --data option, if given
 */
export async function openIndexes(cliData?: string): Promise<IndexSet> {
  const options = resolveIndexOptionsFromEnv();
  const properties = await loadProperties(resolveDataPath(cliData));
  return buildIndexes(properties, options);
}
