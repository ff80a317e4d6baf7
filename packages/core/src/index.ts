/**
 * homeindex core
 *
 * Dual inverted indexes (hash-set and sorted posting-list) over real-estate records,
 * with a planner that answers every query through both and compares them
 */

// Re-export types
export type {
  PropertyInput,
  Property,
  NumericAttribute,
  FeatureFlag,
  IndexedAttribute,
  AttributeKind,
  RangeBound,
  PredicateValue,
  PropertyFilter,
  CompiledPredicate,
  IndexOptions,
  MergeStrategy,
  ResolvedIndexOptions,
  IndexKind,
  EvaluationStats,
  IndexEvaluation,
  AttributeSummary,
  IndexSummary,
  InvertedIndex,
  QueryMethod,
  QueryOptions,
  MismatchReport,
  QueryResult,
  VerificationReport,
} from "./types.js";

// Planner
export { buildIndexes, query, describeIndexes, verifyIndexes } from "./planner.js";
export type { BuiltIndex, IndexSet, IndexSetSummary } from "./planner.js";

// Indexes and data structures
export { HashSetIndex } from "./hash-set-index.js";
export { PostingListIndex } from "./posting-list-index.js";
export { HashTable, HashSet, fnv1a, encodeKey } from "./hash-table.js";
export type { HashKey, HashTableOptions } from "./hash-table.js";
export { MinHeap } from "./heap.js";
export {
  intersectSorted,
  mergeUnion,
  mergeUnionPairwise,
  kWayMerge,
  differenceSorted,
  isStrictlyAscending,
  sameSequence,
} from "./sorted.js";

// Store, attributes and predicates
export { PropertyStore } from "./store.js";
export {
  NUMERIC_ATTRIBUTES,
  FEATURE_FLAGS,
  INDEXED_ATTRIBUTES,
  DEFAULT_INDEX_OPTIONS,
  isIndexedAttribute,
  isNumericAttribute,
  isFeatureFlag,
  resolveIndexOptions,
  attributeKind,
  keyOf,
  propertyKey,
} from "./attributes.js";
export { compileFilter, refineExact } from "./predicates.js";

// Dataset I/O and validation
export { loadProperties } from "./io.js";
export { validateProperty, parsePropertyRecord, MIN_YEAR_BUILT, MAX_YEAR_BUILT } from "./validation.js";
export { createRandom, generateProperties, generateFilter } from "./synthetic.js";
export type { Random } from "./synthetic.js";

// Proximity
export {
  buildNeighborGraph,
  haversineKm,
  nearestHomes,
  pathTo,
  resolveSource,
  routeBetween,
  shortestPaths,
  DEFAULT_NEIGHBORS,
  DEFAULT_NEAREST_COUNT,
  EARTH_RADIUS_KM,
} from "./proximity.js";
export type {
  Coordinates,
  NearestHome,
  NeighborEdge,
  NeighborGraph,
  ProximitySource,
  Route,
  ShortestPaths,
} from "./proximity.js";

// Errors
export {
  HomeIndexError,
  UnknownAttributeError,
  InvalidRangeError,
  InvalidPredicateError,
  ResultMismatchError,
  IncompatibleIndexesError,
  InvalidPropertyError,
  DatasetReadError,
  HomeNotLocatedError,
} from "./errors.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEvent, LogEvents, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { IndexMetrics } from "./observability/metrics.js";

// Contracts
export { QUERY_SLO } from "./contracts/query.js";

// Presentation
export { toHomeView, toNearbyResponse, toSearchResponse } from "./response.js";
export type {
  HomeView,
  MethodPerformance,
  NearbyHomeView,
  NearbyResponse,
  SearchResponse,
} from "./response.js";
