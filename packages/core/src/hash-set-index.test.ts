/**
 * Unit tests for HashSetIndex
 */

import { describe, it, expect, beforeAll } from "vitest";
import { DEFAULT_INDEX_OPTIONS } from "./attributes.js";
import { HashSetIndex } from "./hash-set-index.js";
import { logger } from "./observability/logs.js";
import { compileFilter } from "./predicates.js";
import { PropertyStore } from "./store.js";
import type { PropertyFilter, PropertyInput } from "./types.js";

function home(overrides: Partial<PropertyInput>): PropertyInput {
  return {
    bedrooms: 2,
    bathrooms: 1,
    price: 100_000,
    yearBuilt: 1970,
    latitude: null,
    longitude: null,
    hasBasement: false,
    hasFireplace: false,
    hasAttic: false,
    hasGarage: false,
    ...overrides,
  };
}

const store = PropertyStore.from([
  home({ bedrooms: 2, price: 150_000, hasGarage: true }),
  home({ bedrooms: 3, price: 250_000, bathrooms: 1.5 }),
  home({ bedrooms: 3, price: 350_000, bathrooms: 2, hasGarage: true }),
  home({ bedrooms: 4, price: 275_000, bathrooms: 2.5, yearBuilt: 2005 }),
  home({ bedrooms: 2, price: 90_000 }),
]);

describe("HashSetIndex", () => {
  let index: HashSetIndex;

  beforeAll(() => {
    logger.setEnabled(false);
    index = HashSetIndex.build(store, DEFAULT_INDEX_OPTIONS);
    logger.setEnabled(true);
  });

  const run = (filter: PropertyFilter) => index.evaluate(compileFilter(filter, DEFAULT_INDEX_OPTIONS));

  it("should group ids under each key", () => {
    expect(index.postingsFor("bedrooms", 2)).toEqual([0, 4]);
    expect(index.postingsFor("bedrooms", 3)).toEqual([1, 2]);
    expect(index.postingsFor("hasGarage", 1)).toEqual([0, 2]);
    expect(index.postingsFor("price", 5)).toEqual([1, 3]);
  });

  it("should list keys in ascending order", () => {
    expect(index.keysFor("bedrooms")).toEqual([2, 3, 4]);
    expect(index.keysFor("price")).toEqual([1, 3, 5, 7]);
  });

  it("should return every id for an empty predicate set", () => {
    expect(run({}).ids).toEqual([0, 1, 2, 3, 4]);
  });

  it("should answer an exact lookup with one key lookup", () => {
    const { ids, stats } = run({ where: { bedrooms: 3 } });
    expect(ids).toEqual([1, 2]);
    expect(stats).toEqual({ lookups: 1, unions: 0, intersections: 0, refined: 0 });
  });

  it("should union a range and refine bucketed bounds", () => {
    const { ids, stats } = run({ where: { price: { min: 200_000, max: 300_000 } } });
    expect(ids).toEqual([1, 3]);
    expect(stats.unions).toBe(0);
    expect(stats.refined).toBe(0);
  });

  it("should drop bucket members outside the exact bounds", () => {
    const { ids, stats } = run({ where: { price: { min: 260_000, max: 300_000 } } });
    expect(ids).toEqual([3]);
    expect(stats.refined).toBe(1);
  });

  it("should intersect several predicates", () => {
    const { ids, stats } = run({ where: { bathrooms: { min: 1.5 } }, features: ["hasGarage"] });
    expect(ids).toEqual([2]);
    expect(stats.unions).toBe(1);
    expect(stats.intersections).toBe(1);
  });

  it("should short-circuit on a value no property has", () => {
    const { ids, stats } = run({ where: { bedrooms: 9, hasGarage: true } });
    expect(ids).toEqual([]);
    expect(stats.unions).toBe(0);
    expect(stats.intersections).toBe(0);
  });

  it("should summarise keys and postings per attribute", () => {
    const summary = index.describe();
    expect(summary.kind).toBe("hashset");
    expect(summary.postings).toBe(5 * 8);

    const bedrooms = summary.attributes.find((entry) => entry.attribute === "bedrooms");
    expect(bedrooms).toEqual({
      attribute: "bedrooms",
      distinctKeys: 3,
      minKey: 2,
      maxKey: 4,
      largestPosting: 2,
    });
  });

  it("should be frozen after build", () => {
    expect(Object.isFrozen(index)).toBe(true);
  });
});
