/**
 * Query contracts and invariants
 * This module defines the canonical filter semantics shared by both index paths
 */

/**
 * Query semantics and invariants:
 *
 * 1. Filter semantics:
 *    - Empty filter {} matches every property, ids [0, P)
 *    - All `where` entries and `features` are AND-ed
 *    - A `where` value of undefined is ignored
 *    - Unknown attributes and malformed ranges throw before any index is read
 *
 * 2. Range semantics:
 *    - { min, max } bounds are inclusive on both ends
 *    - A missing bound is open-ended; at least one bound is required
 *    - An exact value v is the range [v, v]
 *
 * 3. Keying:
 *    - bedrooms and bathrooms are exact (one key per value)
 *    - price and yearBuilt are bucketed; results are refined against true values
 *    - Feature flags key true to 1 and false to 0
 *
 * 4. Query execution order:
 *    - 1. Compile (validate every predicate)
 *    - 2. Evaluate each requested index path, timed independently
 *    - 3. Compare results (mismatch is a defect)
 *    - 4. Hydrate records, capped by limit
 *
 * 5. Result semantics:
 *    - ids are ascending and duplicate-free
 *    - total always equals ids.length; limit only caps hydrated records
 */

/**
 * Query performance contracts (SLOs):
 * - Build over 10000 properties (both indexes): <500ms
 * - Single-attribute exact query, 10000 properties: <10ms per path
 * - Four-attribute range query, 10000 properties: <25ms per path
 */
export const QUERY_SLO = {
  BUILD_10K_MS: 500,
  EXACT_QUERY_10K_MS: 10,
  RANGE_QUERY_10K_MS: 25,
} as const;
