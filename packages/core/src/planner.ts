/**
 * Query planner and comparator
 *
 * Builds both indexes from one store and answers every query through both,
 * timing each path and refusing to return an answer the paths disagree on.
 *
 * Invariants:
 * - The filter is compiled (and rejected) before either index is evaluated
 * - Timers wrap only each index's own evaluation, never hydration
 * - With both paths run, `ids` is only ever an answer both paths produced
 */

import { INDEXED_ATTRIBUTES, propertyKey, resolveIndexOptions } from "./attributes.js";
import { IncompatibleIndexesError, ResultMismatchError } from "./errors.js";
import { HashSetIndex } from "./hash-set-index.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { PostingListIndex } from "./posting-list-index.js";
import { compileFilter } from "./predicates.js";
import { differenceSorted, intersectSorted, isStrictlyAscending, sameSequence } from "./sorted.js";
import { PropertyStore } from "./store.js";
import type {
  CompiledPredicate,
  IndexEvaluation,
  IndexOptions,
  IndexSummary,
  InvertedIndex,
  PropertyFilter,
  PropertyInput,
  QueryOptions,
  QueryResult,
  ResolvedIndexOptions,
  VerificationReport,
} from "./types.js";

/**
 * An index together with the store and options it was built from
 */
export interface BuiltIndex extends InvertedIndex {
  readonly store: PropertyStore;
  readonly options: ResolvedIndexOptions;
}

export interface IndexSet {
  readonly store: PropertyStore;
  readonly options: ResolvedIndexOptions;
  readonly hashSet: HashSetIndex;
  readonly postingList: PostingListIndex;
}

export interface IndexSetSummary {
  properties: number;
  options: ResolvedIndexOptions;
  hashSet: IndexSummary;
  postingList: IndexSummary;
}

/**
 * Build both indexes over the same store
 * @param source - Validated store, or raw inputs to validate into one
 */
export function buildIndexes(
  source: PropertyStore | readonly PropertyInput[],
  options: IndexOptions = {}
): IndexSet {
  const resolved = resolveIndexOptions(options);
  const store = source instanceof PropertyStore ? source : PropertyStore.from(source);

  if (store.isEmpty) {
    logger.warn("index.build.empty_dataset", { properties: 0 });
  }

  return Object.freeze({
    store,
    options: resolved,
    hashSet: HashSetIndex.build(store, resolved),
    postingList: PostingListIndex.build(store, resolved),
  });
}

function assertCompatible(hashSetIndex: BuiltIndex, postingListIndex: BuiltIndex): void {
  if (
    hashSetIndex.store !== postingListIndex.store ||
    hashSetIndex.options.priceBucketSize !== postingListIndex.options.priceBucketSize ||
    hashSetIndex.options.yearBucketSize !== postingListIndex.options.yearBucketSize
  ) {
    throw new IncompatibleIndexesError();
  }
}

interface TimedEvaluation extends IndexEvaluation {
  elapsedMs: number;
}

function timed(index: BuiltIndex, predicates: readonly CompiledPredicate[]): TimedEvaluation {
  const start = performance.now();
  const evaluation = index.evaluate(predicates);
  const elapsedMs = performance.now() - start;
  metrics.recordQueryTime(index.kind, elapsedMs);
  return { ...evaluation, elapsedMs };
}

/**
 * Answer a filter through both indexes and compare the results
 * @throws UnknownAttributeError | InvalidRangeError | InvalidPredicateError on a bad filter
 * @throws IncompatibleIndexesError if the indexes come from different stores
 * @throws ResultMismatchError if the paths disagree and `onMismatch` is "throw"
 */
export function query(
  filter: PropertyFilter,
  hashSetIndex: BuiltIndex,
  postingListIndex: BuiltIndex,
  options: QueryOptions = {}
): QueryResult {
  const { method = "both", limit, onMismatch = "throw" } = options;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  }

  assertCompatible(hashSetIndex, postingListIndex);
  const predicates = compileFilter(filter, hashSetIndex.options);
  const store = hashSetIndex.store;

  const hashSet = method === "posting" ? undefined : timed(hashSetIndex, predicates);
  const postingList = method === "hashset" ? undefined : timed(postingListIndex, predicates);

  let ids: number[];
  let mismatch: QueryResult["mismatch"];

  if (hashSet && postingList) {
    if (sameSequence(hashSet.ids, postingList.ids)) {
      ids = postingList.ids;
    } else {
      metrics.recordMismatch();
      const onlyInHashSet = differenceSorted(hashSet.ids, postingList.ids);
      const onlyInPostingList = differenceSorted(postingList.ids, hashSet.ids);

      logger.error("query.mismatch", {
        predicates: predicates.length,
        onlyInHashSet: onlyInHashSet.length,
        onlyInPostingList: onlyInPostingList.length,
      });

      if (onMismatch === "throw") {
        throw new ResultMismatchError(onlyInHashSet, onlyInPostingList);
      }
      ids = intersectSorted(hashSet.ids, postingList.ids);
      mismatch = { onlyInHashSet, onlyInPostingList };
    }
  } else {
    ids = (hashSet ?? postingList)?.ids ?? [];
  }

  const result: QueryResult = {
    ids,
    properties: store.hydrate(ids, limit),
    total: ids.length,
    hashSetElapsedMs: hashSet ? hashSet.elapsedMs : null,
    postingListElapsedMs: postingList ? postingList.elapsedMs : null,
    stats: {},
  };
  if (hashSet) result.stats.hashSet = hashSet.stats;
  if (postingList) result.stats.postingList = postingList.stats;
  if (mismatch) result.mismatch = mismatch;

  logger.debug("query.compare", {
    method,
    predicates: predicates.length,
    total: result.total,
    hashSetMs: result.hashSetElapsedMs,
    postingListMs: result.postingListElapsedMs,
  });

  return result;
}

export function describeIndexes(indexes: IndexSet): IndexSetSummary {
  return {
    properties: indexes.store.size,
    options: indexes.options,
    hashSet: indexes.hashSet.describe(),
    postingList: indexes.postingList.describe(),
  };
}

/**
 * Check one index's postings against the store it was built from
 */
function verifyIndex(index: BuiltIndex, problems: string[]): void {
  const { store, options } = index;

  for (const attribute of INDEXED_ATTRIBUTES) {
    const keys = index.keysFor(attribute);
    if (!isStrictlyAscending(keys)) {
      problems.push(`${index.kind}/${attribute}: keys are not strictly ascending`);
    }

    let total = 0;
    for (const key of keys) {
      const ids = index.postingsFor(attribute, key);
      total += ids.length;

      if (!isStrictlyAscending(ids)) {
        problems.push(`${index.kind}/${attribute}=${key}: postings are not strictly ascending`);
      }
      for (const id of ids) {
        const property = store.get(id);
        if (!property) {
          problems.push(`${index.kind}/${attribute}=${key}: unknown id ${id}`);
        } else if (propertyKey(property, attribute, options) !== key) {
          problems.push(`${index.kind}/${attribute}=${key}: id ${id} belongs under another key`);
        }
      }
    }

    if (total !== store.size) {
      problems.push(`${index.kind}/${attribute}: ${total} postings for ${store.size} properties`);
    }
  }
}

/**
 * Check every structural invariant of both indexes, and that they agree key for key
 */
export function verifyIndexes(indexes: IndexSet): VerificationReport {
  const problems: string[] = [];

  verifyIndex(indexes.hashSet, problems);
  verifyIndex(indexes.postingList, problems);

  for (const attribute of INDEXED_ATTRIBUTES) {
    const hashSetKeys = indexes.hashSet.keysFor(attribute);
    const postingKeys = indexes.postingList.keysFor(attribute);
    if (!sameSequence(hashSetKeys, postingKeys)) {
      problems.push(`${attribute}: indexes hold different key sets`);
      continue;
    }
    for (const key of hashSetKeys) {
      const a = indexes.hashSet.postingsFor(attribute, key);
      const b = indexes.postingList.postingsFor(attribute, key);
      if (!sameSequence(a, b)) {
        problems.push(`${attribute}=${key}: indexes hold different members`);
      }
    }
  }

  if (problems.length > 0) {
    logger.warn("index.verify.failed", { problems: problems.length });
  }

  return { ok: problems.length === 0, problems };
}
