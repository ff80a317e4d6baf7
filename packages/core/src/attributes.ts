/**
 * Indexed attribute catalogue and bucketing
 *
 * Every indexed attribute projects a property value onto an integer key:
 * - bedrooms:  the count itself
 * - bathrooms: half-bath steps (value × 2)
 * - price:     floor(price / priceBucketSize)
 * - yearBuilt: floor(yearBuilt / yearBucketSize)
 * - flags:     1 for true, 0 for false
 */

import type {
  AttributeKind,
  FeatureFlag,
  IndexOptions,
  IndexedAttribute,
  NumericAttribute,
  Property,
  ResolvedIndexOptions,
} from "./types.js";

export const NUMERIC_ATTRIBUTES: readonly NumericAttribute[] = [
  "bedrooms",
  "bathrooms",
  "price",
  "yearBuilt",
];

export const FEATURE_FLAGS: readonly FeatureFlag[] = [
  "hasBasement",
  "hasFireplace",
  "hasAttic",
  "hasGarage",
];

export const INDEXED_ATTRIBUTES: readonly IndexedAttribute[] = [
  ...NUMERIC_ATTRIBUTES,
  ...FEATURE_FLAGS,
];

export const DEFAULT_INDEX_OPTIONS: ResolvedIndexOptions = Object.freeze({
  priceBucketSize: 50_000,
  yearBucketSize: 10,
  mergeStrategy: "heap",
});

export function isIndexedAttribute(name: string): name is IndexedAttribute {
  return INDEXED_ATTRIBUTES.some((attribute) => attribute === name);
}

export function isNumericAttribute(name: string): name is NumericAttribute {
  return NUMERIC_ATTRIBUTES.some((attribute) => attribute === name);
}

export function isFeatureFlag(name: string): name is FeatureFlag {
  return FEATURE_FLAGS.some((attribute) => attribute === name);
}

/**
 * Fill in defaults and check bucket sizes
 */
export function resolveIndexOptions(options: IndexOptions = {}): ResolvedIndexOptions {
  const resolved = { ...DEFAULT_INDEX_OPTIONS, ...stripUndefined(options) };

  for (const name of ["priceBucketSize", "yearBucketSize"] as const) {
    const size = resolved[name];
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`${name} must be a positive integer, got ${size}`);
    }
  }
  if (resolved.mergeStrategy !== "heap" && resolved.mergeStrategy !== "pairwise") {
    throw new RangeError(`mergeStrategy must be "heap" or "pairwise"`);
  }

  return Object.freeze(resolved);
}

function stripUndefined(options: IndexOptions): IndexOptions {
  const out: IndexOptions = {};
  if (options.priceBucketSize !== undefined) out.priceBucketSize = options.priceBucketSize;
  if (options.yearBucketSize !== undefined) out.yearBucketSize = options.yearBucketSize;
  if (options.mergeStrategy !== undefined) out.mergeStrategy = options.mergeStrategy;
  return out;
}

export function attributeKind(attribute: IndexedAttribute): AttributeKind {
  switch (attribute) {
    case "bedrooms":
    case "bathrooms":
      return "discrete";
    case "price":
    case "yearBuilt":
      return "bucketed";
    default:
      return "flag";
  }
}

/**
 * Key scale for numeric attributes: key = value × scale (discrete) or value / width (bucketed)
 */
function bucketWidth(attribute: NumericAttribute, options: ResolvedIndexOptions): number {
  switch (attribute) {
    case "price":
      return options.priceBucketSize;
    case "yearBuilt":
      return options.yearBucketSize;
    case "bathrooms":
      return 0.5;
    case "bedrooms":
      return 1;
  }
}

/**
 * Continuous key position of a numeric value (not yet rounded)
 */
export function keyPosition(
  attribute: NumericAttribute,
  value: number,
  options: ResolvedIndexOptions
): number {
  return value / bucketWidth(attribute, options);
}

/**
 * Index key of a raw attribute value
 */
export function keyOf(
  attribute: IndexedAttribute,
  value: number | boolean,
  options: ResolvedIndexOptions
): number {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (attribute === "bathrooms") {
    return Math.round(keyPosition(attribute, value, options));
  }
  if (attribute === "bedrooms" || attribute === "price" || attribute === "yearBuilt") {
    return Math.floor(keyPosition(attribute, value, options));
  }
  return value ? 1 : 0;
}

/**
 * Index key of a property for one attribute
 */
export function propertyKey(
  property: Property,
  attribute: IndexedAttribute,
  options: ResolvedIndexOptions
): number {
  return keyOf(attribute, property[attribute], options);
}

/**
 * Raw comparable value of a property for one attribute (flags as 0/1)
 */
export function attributeValue(property: Property, attribute: IndexedAttribute): number {
  const value = property[attribute];
  return typeof value === "boolean" ? (value ? 1 : 0) : value;
}
