/**
 * Sorted posting-list inverted index
 *
 * Layout: attribute → key → ascending, duplicate-free id list.
 *
 * Build collects (key, id) pairs per attribute, sorts them once by (key, id),
 * and groups them in a single linear pass. Queries merge the lists of a range
 * (heap-based k-way or pairwise), then intersect per-predicate lists with a
 * two-pointer merge in ascending length order. Results come out sorted.
 *
 * Invariants:
 * - Every list is strictly ascending
 * - Every property id is in exactly one list per attribute: the list of its own key
 * - Lists are frozen after build
 */

import { INDEXED_ATTRIBUTES, propertyKey } from "./attributes.js";
import { emptyStats, refineExact } from "./predicates.js";
import { intersectSorted, kWayMerge, mergeUnionPairwise } from "./sorted.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { PropertyStore } from "./store.js";
import type {
  AttributeSummary,
  CompiledPredicate,
  EvaluationStats,
  IndexEvaluation,
  IndexSummary,
  IndexedAttribute,
  InvertedIndex,
  ResolvedIndexOptions,
} from "./types.js";

interface AttributeLists {
  /** Distinct keys, ascending */
  keys: readonly number[];
  lists: ReadonlyMap<number, readonly number[]>;
}

const EMPTY: readonly number[] = Object.freeze([]);

/**
 * First position in `keys` whose value is >= target
 */
function lowerBound(keys: readonly number[], target: number): number {
  let lo = 0;
  let hi = keys.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (keys[mid] < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Group one attribute's postings: one global sort by (key, id), then a linear pass
 */
function buildAttributeLists(
  store: PropertyStore,
  attribute: IndexedAttribute,
  options: ResolvedIndexOptions
): AttributeLists {
  const pairs: Array<{ key: number; id: number }> = [];
  for (const property of store) {
    pairs.push({ key: propertyKey(property, attribute, options), id: property.id });
  }
  pairs.sort((a, b) => a.key - b.key || a.id - b.id);

  const keys: number[] = [];
  const lists = new Map<number, readonly number[]>();
  let current: number[] = [];

  for (let i = 0; i < pairs.length; i++) {
    const { key, id } = pairs[i];
    const startsGroup = i === 0 || pairs[i - 1].key !== key;

    if (startsGroup) {
      if (i > 0) {
        lists.set(keys[keys.length - 1], Object.freeze(current));
      }
      keys.push(key);
      current = [id];
    } else if (current[current.length - 1] !== id) {
      current.push(id);
    }
  }
  if (keys.length > 0) {
    lists.set(keys[keys.length - 1], Object.freeze(current));
  }

  return { keys: Object.freeze(keys), lists };
}

export class PostingListIndex implements InvertedIndex {
  readonly kind = "posting" as const;
  readonly store: PropertyStore;
  readonly options: ResolvedIndexOptions;
  readonly #attributes: ReadonlyMap<IndexedAttribute, AttributeLists>;

  private constructor(
    store: PropertyStore,
    options: ResolvedIndexOptions,
    attributes: ReadonlyMap<IndexedAttribute, AttributeLists>
  ) {
    this.store = store;
    this.options = options;
    this.#attributes = attributes;
    Object.freeze(this);
  }

  static build(store: PropertyStore, options: ResolvedIndexOptions): PostingListIndex {
    const startTime = performance.now();
    logger.debug("index.build.start", { index: "posting", properties: store.size });

    const attributes = new Map<IndexedAttribute, AttributeLists>();
    for (const attribute of INDEXED_ATTRIBUTES) {
      attributes.set(attribute, buildAttributeLists(store, attribute, options));
    }

    const index = new PostingListIndex(store, options, attributes);

    const duration = performance.now() - startTime;
    const summary = index.describe();
    metrics.recordBuildTime("posting", duration);
    metrics.updateSize("posting", summary.postingKeys, summary.postings);

    logger.info("index.build.end", {
      index: "posting",
      properties: store.size,
      keys: summary.postingKeys,
      durationMs: duration,
    });

    return index;
  }

  /**
   * One sorted list for a predicate: the key's list directly, or a merge of the range's lists
   */
  #resolve(predicate: CompiledPredicate, stats: EvaluationStats): readonly number[] {
    const entry = this.#attributes.get(predicate.attribute);
    if (!entry || predicate.loKey > predicate.hiKey) {
      return EMPTY;
    }

    const found: (readonly number[])[] = [];
    for (let i = lowerBound(entry.keys, predicate.loKey); i < entry.keys.length; i++) {
      const key = entry.keys[i];
      if (key > predicate.hiKey) break;
      stats.lookups++;
      const list = entry.lists.get(key);
      if (list && list.length > 0) {
        found.push(list);
      }
    }

    if (found.length === 0) {
      return EMPTY;
    }
    if (found.length === 1) {
      return found[0];
    }

    stats.unions++;
    return this.options.mergeStrategy === "pairwise" ? mergeUnionPairwise(found) : kWayMerge(found);
  }

  /**
   * Resolve each predicate to a list, intersect shortest-first, refine
   */
  evaluate(predicates: readonly CompiledPredicate[]): IndexEvaluation {
    const stats = emptyStats();

    if (predicates.length === 0) {
      return { ids: this.store.allIds(), stats };
    }

    const resolved: (readonly number[])[] = [];
    for (const predicate of predicates) {
      const list = this.#resolve(predicate, stats);
      if (list.length === 0) {
        return { ids: [], stats };
      }
      resolved.push(list);
    }

    resolved.sort((a, b) => a.length - b.length);

    let current = resolved[0];
    for (let i = 1; i < resolved.length; i++) {
      stats.intersections++;
      current = intersectSorted(current, resolved[i]);
      if (current.length === 0) {
        return { ids: [], stats };
      }
    }

    const { ids, dropped } = refineExact(current, predicates, this.store);
    stats.refined = dropped;

    return { ids, stats };
  }

  postingsFor(attribute: IndexedAttribute, key: number): number[] {
    const list = this.#attributes.get(attribute)?.lists.get(key);
    return list ? [...list] : [];
  }

  keysFor(attribute: IndexedAttribute): number[] {
    return [...(this.#attributes.get(attribute)?.keys ?? EMPTY)];
  }

  describe(): IndexSummary {
    const attributes: AttributeSummary[] = [];
    let postingKeys = 0;
    let postings = 0;

    for (const attribute of INDEXED_ATTRIBUTES) {
      const entry = this.#attributes.get(attribute);
      if (!entry) continue;

      let largest = 0;
      for (const list of entry.lists.values()) {
        largest = Math.max(largest, list.length);
        postings += list.length;
      }
      postingKeys += entry.keys.length;

      attributes.push({
        attribute,
        distinctKeys: entry.keys.length,
        minKey: entry.keys.length > 0 ? entry.keys[0] : null,
        maxKey: entry.keys.length > 0 ? entry.keys[entry.keys.length - 1] : null,
        largestPosting: largest,
      });
    }

    return { kind: this.kind, postingKeys, postings, attributes };
  }
}
