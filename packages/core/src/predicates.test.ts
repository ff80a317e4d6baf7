/**
 * Unit tests for filter compilation and attribute keying
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_INDEX_OPTIONS, keyOf, resolveIndexOptions } from "./attributes.js";
import { InvalidPredicateError, InvalidRangeError, UnknownAttributeError } from "./errors.js";
import { compileFilter, refineExact, withinExact } from "./predicates.js";
import { PropertyStore } from "./store.js";
import type { PropertyInput } from "./types.js";

const options = DEFAULT_INDEX_OPTIONS;

function home(overrides: Partial<PropertyInput> = {}): PropertyInput {
  return {
    bedrooms: 3,
    bathrooms: 2,
    price: 300_000,
    yearBuilt: 1990,
    latitude: null,
    longitude: null,
    hasBasement: false,
    hasFireplace: false,
    hasAttic: false,
    hasGarage: false,
    ...overrides,
  };
}

describe("keyOf", () => {
  it("should key discrete attributes by value", () => {
    expect(keyOf("bedrooms", 4, options)).toBe(4);
    expect(keyOf("bathrooms", 2.5, options)).toBe(5);
  });

  it("should key bucketed attributes by bucket", () => {
    expect(keyOf("price", 149_999, options)).toBe(2);
    expect(keyOf("price", 150_000, options)).toBe(3);
    expect(keyOf("yearBuilt", 1987, options)).toBe(198);
  });

  it("should key flags as 1 and 0", () => {
    expect(keyOf("hasGarage", true, options)).toBe(1);
    expect(keyOf("hasGarage", false, options)).toBe(0);
  });
});

describe("resolveIndexOptions", () => {
  it("should fill in defaults", () => {
    expect(resolveIndexOptions({ priceBucketSize: 25_000 })).toEqual({
      priceBucketSize: 25_000,
      yearBucketSize: 10,
      mergeStrategy: "heap",
    });
  });

  it("should reject non-positive bucket sizes", () => {
    expect(() => resolveIndexOptions({ priceBucketSize: 0 })).toThrow(RangeError);
    expect(() => resolveIndexOptions({ yearBucketSize: 2.5 })).toThrow(RangeError);
  });
});

describe("compileFilter", () => {
  it("should compile an empty filter to no predicates", () => {
    expect(compileFilter({}, options)).toEqual([]);
  });

  it("should compile exact discrete values to a single key", () => {
    expect(compileFilter({ where: { bedrooms: 3 } }, options)).toEqual([
      { attribute: "bedrooms", loKey: 3, hiKey: 3 },
    ]);
  });

  it("should compile half-bath ranges to half-bath keys", () => {
    expect(compileFilter({ where: { bathrooms: { min: 1.5, max: 2.5 } } }, options)).toEqual([
      { attribute: "bathrooms", loKey: 3, hiKey: 5 },
    ]);
  });

  it("should round discrete bounds inward", () => {
    expect(compileFilter({ where: { bedrooms: { min: 1.5, max: 3.5 } } }, options)).toEqual([
      { attribute: "bedrooms", loKey: 2, hiKey: 3 },
    ]);
  });

  it("should compile bucketed ranges to covering buckets with exact bounds", () => {
    expect(compileFilter({ where: { price: { min: 200_000, max: 300_000 } } }, options)).toEqual([
      { attribute: "price", loKey: 4, hiKey: 6, exact: { min: 200_000, max: 300_000 } },
    ]);
  });

  it("should leave missing bounds open-ended", () => {
    expect(compileFilter({ where: { bathrooms: { min: 2 } } }, options)).toEqual([
      { attribute: "bathrooms", loKey: 4, hiKey: Infinity },
    ]);
    expect(compileFilter({ where: { yearBuilt: { max: 1955 } } }, options)).toEqual([
      { attribute: "yearBuilt", loKey: -Infinity, hiKey: 195, exact: { min: -Infinity, max: 1955 } },
    ]);
  });

  it("should compile features to flag predicates", () => {
    expect(compileFilter({ where: { hasBasement: false }, features: ["hasGarage"] }, options)).toEqual([
      { attribute: "hasBasement", loKey: 0, hiKey: 0 },
      { attribute: "hasGarage", loKey: 1, hiKey: 1 },
    ]);
  });

  it("should ignore undefined values", () => {
    expect(compileFilter({ where: { bedrooms: undefined } }, options)).toEqual([]);
  });

  it("should reject unknown attributes", () => {
    expect(() => compileFilter({ where: { sqft: 1200 } }, options)).toThrow(UnknownAttributeError);
    expect(() => compileFilter({ features: ["hasPool"] }, options)).toThrow(UnknownAttributeError);
  });

  it("should reject malformed ranges", () => {
    expect(() => compileFilter({ where: { price: { min: 5, max: 1 } } }, options)).toThrow(
      InvalidRangeError
    );
    expect(() => compileFilter({ where: { price: {} } }, options)).toThrow(InvalidRangeError);
    expect(() => compileFilter({ where: { price: { min: Number.NaN } } }, options)).toThrow(
      InvalidRangeError
    );
    expect(() => compileFilter({ where: { hasGarage: { min: 0 } } }, options)).toThrow(
      InvalidRangeError
    );
  });

  it("should reject values of the wrong type", () => {
    expect(() => compileFilter({ where: { bedrooms: true } }, options)).toThrow(InvalidPredicateError);
    expect(() => compileFilter({ where: { hasAttic: 1 } }, options)).toThrow(InvalidPredicateError);
  });

  it("should name the attribute in error messages", () => {
    expect(() => compileFilter({ where: { price: { min: 5, max: 1 } } }, options)).toThrow(
      'Invalid range for "price": min (5) is greater than max (1)'
    );
  });
});

describe("refineExact", () => {
  const store = PropertyStore.from([
    home({ price: 199_999 }),
    home({ price: 200_000 }),
    home({ price: 300_000 }),
    home({ price: 300_001 }),
  ]);

  it("should drop ids outside the exact bounds, keeping boundary values", () => {
    const [predicate] = compileFilter({ where: { price: { min: 200_000, max: 300_000 } } }, options);
    expect(refineExact([0, 1, 2, 3], [predicate], store)).toEqual({ ids: [1, 2], dropped: 2 });
  });

  it("should pass everything through when no predicate is bucketed", () => {
    const predicates = compileFilter({ where: { bedrooms: 3 } }, options);
    expect(refineExact([3, 1], predicates, store)).toEqual({ ids: [3, 1], dropped: 0 });
  });

  it("should check a single value against exact bounds", () => {
    const [predicate] = compileFilter({ where: { yearBuilt: 1990 } }, options);
    expect(withinExact(predicate, 1990)).toBe(true);
    expect(withinExact(predicate, 1991)).toBe(false);
  });
});
