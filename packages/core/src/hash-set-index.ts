/**
 * Hash-set inverted index
 *
 * Layout: attribute → key → HashSet of property ids, all on the custom HashTable.
 *
 * Invariants:
 * - Every property id is in exactly one set per attribute: the set of its own key
 * - The index is frozen after build; query evaluation only allocates local sets
 */

import { INDEXED_ATTRIBUTES, propertyKey } from "./attributes.js";
import { HashSet, HashTable } from "./hash-table.js";
import { emptyStats, refineExact } from "./predicates.js";
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

interface AttributeSets {
  sets: HashTable<number, HashSet<number>>;
  minKey: number;
  maxKey: number;
}

/**
 * Intersect by walking the smaller set and probing the larger one
 */
function intersectSets(a: HashSet<number>, b: HashSet<number>): HashSet<number> {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  const out = new HashSet<number>();
  for (const id of small) {
    if (large.has(id)) {
      out.add(id);
    }
  }
  return out;
}

export class HashSetIndex implements InvertedIndex {
  readonly kind = "hashset" as const;
  readonly store: PropertyStore;
  readonly options: ResolvedIndexOptions;
  readonly #attributes: HashTable<IndexedAttribute, AttributeSets>;

  private constructor(
    store: PropertyStore,
    options: ResolvedIndexOptions,
    attributes: HashTable<IndexedAttribute, AttributeSets>
  ) {
    this.store = store;
    this.options = options;
    this.#attributes = attributes;
    Object.freeze(this);
  }

  /**
   * Single pass over the store: O(P·A) inserts
   */
  static build(store: PropertyStore, options: ResolvedIndexOptions): HashSetIndex {
    const startTime = performance.now();
    logger.debug("index.build.start", { index: "hashset", properties: store.size });

    const attributes = new HashTable<IndexedAttribute, AttributeSets>();
    for (const attribute of INDEXED_ATTRIBUTES) {
      attributes.put(attribute, {
        sets: new HashTable<number, HashSet<number>>(),
        minKey: Infinity,
        maxKey: -Infinity,
      });
    }

    for (const property of store) {
      for (const [attribute, entry] of attributes) {
        const key = propertyKey(property, attribute, options);
        entry.sets.getOrCreate(key, () => new HashSet<number>()).add(property.id);
        if (key < entry.minKey) entry.minKey = key;
        if (key > entry.maxKey) entry.maxKey = key;
      }
    }

    const index = new HashSetIndex(store, options, attributes);

    const duration = performance.now() - startTime;
    const summary = index.describe();
    metrics.recordBuildTime("hashset", duration);
    metrics.updateSize("hashset", summary.postingKeys, summary.postings);

    logger.info("index.build.end", {
      index: "hashset",
      properties: store.size,
      keys: summary.postingKeys,
      durationMs: duration,
    });

    return index;
  }

  /**
   * Union of the sets under every key in the predicate's range,
   * clamped to the keys seen at build time
   */
  #resolve(predicate: CompiledPredicate, stats: EvaluationStats): HashSet<number> {
    const entry = this.#attributes.get(predicate.attribute);
    if (!entry) {
      return new HashSet<number>();
    }

    const lo = Math.max(predicate.loKey, entry.minKey);
    const hi = Math.min(predicate.hiKey, entry.maxKey);

    const found: HashSet<number>[] = [];
    for (let key = lo; key <= hi; key++) {
      stats.lookups++;
      const set = entry.sets.get(key);
      if (set && set.size > 0) {
        found.push(set);
      }
    }

    if (found.length === 0) {
      return new HashSet<number>();
    }
    if (found.length === 1) {
      return found[0];
    }

    stats.unions++;
    const union = new HashSet<number>();
    for (const set of found) {
      for (const id of set) {
        union.add(id);
      }
    }
    return union;
  }

  /**
   * Resolve each predicate to a set, intersect smallest-first, refine, then sort
   */
  evaluate(predicates: readonly CompiledPredicate[]): IndexEvaluation {
    const stats = emptyStats();

    if (predicates.length === 0) {
      return { ids: this.store.allIds(), stats };
    }

    const resolved: HashSet<number>[] = [];
    for (const predicate of predicates) {
      const set = this.#resolve(predicate, stats);
      if (set.size === 0) {
        return { ids: [], stats };
      }
      resolved.push(set);
    }

    resolved.sort((a, b) => a.size - b.size);

    let current = resolved[0];
    for (let i = 1; i < resolved.length; i++) {
      stats.intersections++;
      current = intersectSets(current, resolved[i]);
      if (current.size === 0) {
        return { ids: [], stats };
      }
    }

    const { ids, dropped } = refineExact(current, predicates, this.store);
    stats.refined = dropped;

    return { ids: ids.sort((a, b) => a - b), stats };
  }

  postingsFor(attribute: IndexedAttribute, key: number): number[] {
    const set = this.#attributes.get(attribute)?.sets.get(key);
    return set ? Array.from(set).sort((a, b) => a - b) : [];
  }

  keysFor(attribute: IndexedAttribute): number[] {
    const entry = this.#attributes.get(attribute);
    return entry ? Array.from(entry.sets.keys()).sort((a, b) => a - b) : [];
  }

  describe(): IndexSummary {
    const attributes: AttributeSummary[] = [];
    let postingKeys = 0;
    let postings = 0;

    for (const attribute of INDEXED_ATTRIBUTES) {
      const entry = this.#attributes.get(attribute);
      if (!entry) continue;

      let largest = 0;
      for (const set of entry.sets.values()) {
        largest = Math.max(largest, set.size);
        postings += set.size;
      }
      postingKeys += entry.sets.size;

      attributes.push({
        attribute,
        distinctKeys: entry.sets.size,
        minKey: entry.sets.size > 0 ? entry.minKey : null,
        maxKey: entry.sets.size > 0 ? entry.maxKey : null,
        largestPosting: largest,
      });
    }

    return { kind: this.kind, postingKeys, postings, attributes };
  }
}
