/**
 * Filter validation and predicate compilation
 *
 * A filter is validated completely before any index is read, so caller
 * errors never leave partial work behind.
 *
 * Range semantics: bounds are inclusive on both ends; a missing bound is open-ended.
 * Discrete attributes compile to an exact key range. Bucketed attributes compile
 * to the covering buckets plus exact bounds that each index path refines against.
 */

import {
  INDEXED_ATTRIBUTES,
  FEATURE_FLAGS,
  attributeKind,
  attributeValue,
  isFeatureFlag,
  isIndexedAttribute,
  isNumericAttribute,
  keyOf,
  keyPosition,
} from "./attributes.js";
import { InvalidPredicateError, InvalidRangeError, UnknownAttributeError } from "./errors.js";
import type { PropertyStore } from "./store.js";
import type {
  CompiledPredicate,
  EvaluationStats,
  IndexedAttribute,
  NumericAttribute,
  PropertyFilter,
  ResolvedIndexOptions,
} from "./types.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Read one range bound; undefined when absent
 */
function readBound(attribute: string, range: Record<string, unknown>, name: "min" | "max") {
  const bound = range[name];
  if (bound === undefined) {
    return undefined;
  }
  if (typeof bound !== "number" || !Number.isFinite(bound)) {
    throw new InvalidRangeError(attribute, `${name} must be a finite number, got ${String(bound)}`);
  }
  return bound;
}

function compileRange(
  attribute: NumericAttribute,
  range: Record<string, unknown>,
  options: ResolvedIndexOptions
): CompiledPredicate {
  const min = readBound(attribute, range, "min");
  const max = readBound(attribute, range, "max");

  if (min === undefined && max === undefined) {
    throw new InvalidRangeError(attribute, "range needs at least one of min or max");
  }
  if (min !== undefined && max !== undefined && min > max) {
    throw new InvalidRangeError(attribute, `min (${min}) is greater than max (${max})`);
  }

  return compileBounds(attribute, min ?? -Infinity, max ?? Infinity, options);
}

function compileBounds(
  attribute: NumericAttribute,
  min: number,
  max: number,
  options: ResolvedIndexOptions
): CompiledPredicate {
  const lo = Number.isFinite(min) ? keyPosition(attribute, min, options) : -Infinity;
  const hi = Number.isFinite(max) ? keyPosition(attribute, max, options) : Infinity;

  if (attributeKind(attribute) === "discrete") {
    return { attribute, loKey: Math.ceil(lo), hiKey: Math.floor(hi) };
  }

  return {
    attribute,
    loKey: Math.floor(lo),
    hiKey: Math.floor(hi),
    exact: { min, max },
  };
}

function compilePredicate(
  attribute: IndexedAttribute,
  value: unknown,
  options: ResolvedIndexOptions
): CompiledPredicate {
  if (isNumericAttribute(attribute)) {
    if (isPlainObject(value)) {
      return compileRange(attribute, value, options);
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new InvalidPredicateError(
        attribute,
        `expected a finite number or a {min, max} range, got ${describe(value)}`
      );
    }
    return compileBounds(attribute, value, value, options);
  }

  if (isPlainObject(value)) {
    throw new InvalidRangeError(attribute, "feature flags take true or false, not a range");
  }
  if (typeof value !== "boolean") {
    throw new InvalidPredicateError(attribute, `expected a boolean, got ${describe(value)}`);
  }
  const key = keyOf(attribute, value, options);
  return { attribute, loKey: key, hiKey: key };
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value === "string" ? `"${value}"` : String(value);
}

/**
 * Validate a filter and compile it into per-attribute predicates.
 * An empty filter compiles to no predicates (match everything).
 */
export function compileFilter(
  filter: PropertyFilter,
  options: ResolvedIndexOptions
): CompiledPredicate[] {
  const predicates: CompiledPredicate[] = [];

  for (const [name, value] of Object.entries(filter.where ?? {})) {
    if (!isIndexedAttribute(name)) {
      throw new UnknownAttributeError(name, INDEXED_ATTRIBUTES);
    }
    if (value === undefined) {
      continue;
    }
    predicates.push(compilePredicate(name, value, options));
  }

  for (const flag of filter.features ?? []) {
    if (!isFeatureFlag(flag)) {
      throw new UnknownAttributeError(flag, FEATURE_FLAGS);
    }
    predicates.push({ attribute: flag, loKey: 1, hiKey: 1 });
  }

  return predicates;
}

/**
 * True when a property value satisfies a predicate's exact bounds
 */
export function withinExact(predicate: CompiledPredicate, value: number): boolean {
  if (!predicate.exact) return true;
  return value >= predicate.exact.min && value <= predicate.exact.max;
}

/**
 * Drop ids whose true value falls outside a bucketed predicate's exact bounds.
 * Always returns a fresh array, in the input order.
 */
export function refineExact(
  ids: Iterable<number>,
  predicates: readonly CompiledPredicate[],
  store: PropertyStore
): { ids: number[]; dropped: number } {
  const list = Array.from(ids);
  const exact = predicates.filter((predicate) => predicate.exact !== undefined);
  if (exact.length === 0) {
    return { ids: list, dropped: 0 };
  }

  const kept = list.filter((id) => {
    const property = store.get(id);
    return (
      property !== undefined &&
      exact.every((predicate) => withinExact(predicate, attributeValue(property, predicate.attribute)))
    );
  });
  return { ids: kept, dropped: list.length - kept.length };
}

export function emptyStats(): EvaluationStats {
  return { lookups: 0, unions: 0, intersections: 0, refined: 0 };
}
