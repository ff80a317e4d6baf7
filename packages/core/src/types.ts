/**
 * Core type definitions for homeindex
 */

/**
 * A property record as it arrives from the data source (no id yet)
 */
export interface PropertyInput {
  bedrooms: number;
  /** Half-bath granularity: 1, 1.5, 2, ... */
  bathrooms: number;
  price: number;
  yearBuilt: number;
  /** Used by proximity search and map rendering; not an indexed attribute */
  latitude: number | null;
  longitude: number | null;
  hasBasement: boolean;
  hasFireplace: boolean;
  hasAttic: boolean;
  hasGarage: boolean;
  address?: string;
  buildingSqft?: number;
}

/**
 * An immutable, stored property. `id` equals its insertion position.
 */
export type Property = Readonly<PropertyInput> & { readonly id: number };

/**
 * Attributes that carry an inverted index
 */
export type NumericAttribute = "bedrooms" | "bathrooms" | "price" | "yearBuilt";
export type FeatureFlag = "hasBasement" | "hasFireplace" | "hasAttic" | "hasGarage";
export type IndexedAttribute = NumericAttribute | FeatureFlag;

/**
 * How an attribute value maps to an index key
 * - discrete: one key per value (exact)
 * - bucketed: one key per fixed-width bucket (needs exact refinement)
 * - flag: 1 for true, 0 for false
 */
export type AttributeKind = "discrete" | "bucketed" | "flag";

/**
 * Inclusive range; at least one bound is required. A missing bound is open-ended.
 */
export interface RangeBound {
  min?: number;
  max?: number;
}

export type PredicateValue = number | boolean | RangeBound;

/**
 * Conjunctive filter: every `where` entry and every feature must hold
 */
export interface PropertyFilter {
  where?: Record<string, PredicateValue | undefined>;
  features?: readonly string[];
}

/**
 * One attribute predicate after validation: the inclusive key range to union,
 * plus exact value bounds when the keys are coarser than the values.
 */
export interface CompiledPredicate {
  readonly attribute: IndexedAttribute;
  readonly loKey: number;
  readonly hiKey: number;
  readonly exact?: { readonly min: number; readonly max: number };
}

/**
 * Index build options
 */
export interface IndexOptions {
  /** Width of a price bucket in currency units (default: 50000) */
  priceBucketSize?: number;
  /** Width of a year-built bucket in years (default: 10) */
  yearBucketSize?: number;
  /** Posting-list range merge: heap-based k-way or repeated pairwise (default: "heap") */
  mergeStrategy?: MergeStrategy;
}

export type MergeStrategy = "heap" | "pairwise";

export type ResolvedIndexOptions = Readonly<Required<IndexOptions>>;

export type IndexKind = "hashset" | "posting";

/**
 * Work performed by one index evaluation
 */
export interface EvaluationStats {
  /** Attribute-key lookups against the index */
  lookups: number;
  /** Union/merge operations combining several keys of one predicate */
  unions: number;
  /** Pairwise intersections between predicate results */
  intersections: number;
  /** Ids dropped by exact-bound refinement on bucketed attributes */
  refined: number;
}

export interface IndexEvaluation {
  ids: number[];
  stats: EvaluationStats;
}

/**
 * Per-attribute summary of a built index
 */
export interface AttributeSummary {
  attribute: IndexedAttribute;
  distinctKeys: number;
  minKey: number | null;
  maxKey: number | null;
  largestPosting: number;
}

export interface IndexSummary {
  kind: IndexKind;
  postingKeys: number;
  postings: number;
  attributes: AttributeSummary[];
}

/**
 * Common read surface of both index implementations
 */
export interface InvertedIndex {
  readonly kind: IndexKind;
  /** Evaluate compiled predicates; returns ascending ids */
  evaluate(predicates: readonly CompiledPredicate[]): IndexEvaluation;
  /** Ids stored under one key, ascending */
  postingsFor(attribute: IndexedAttribute, key: number): number[];
  /** Keys present for an attribute, ascending */
  keysFor(attribute: IndexedAttribute): number[];
  describe(): IndexSummary;
}

export type QueryMethod = "both" | "hashset" | "posting";

export interface QueryOptions {
  /** Which index path(s) to run (default: "both") */
  method?: QueryMethod;
  /** Cap on hydrated records; `ids` is never truncated */
  limit?: number;
  /** On disagreement: throw ResultMismatchError (default) or return a flagged result */
  onMismatch?: "throw" | "flag";
}

export interface MismatchReport {
  onlyInHashSet: number[];
  onlyInPostingList: number[];
}

export interface QueryResult {
  /** Matching ids, ascending */
  ids: number[];
  /** Hydrated records for `ids` (capped by `limit`) */
  properties: Property[];
  total: number;
  hashSetElapsedMs: number | null;
  postingListElapsedMs: number | null;
  stats: { hashSet?: EvaluationStats; postingList?: EvaluationStats };
  mismatch?: MismatchReport;
}

export interface VerificationReport {
  ok: boolean;
  problems: string[];
}
