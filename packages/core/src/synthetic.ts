/**
 * Seeded synthetic datasets and filters for equivalence tests and benchmarks
 */

import { FEATURE_FLAGS } from "./attributes.js";
import type { PredicateValue, PropertyFilter, PropertyInput } from "./types.js";

export type Random = () => number;

/**
 * Deterministic PRNG (mulberry32) returning floats in [0, 1)
 */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomInt(random: Random, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(random: Random, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

export function generateProperties(count: number, random: Random): PropertyInput[] {
  const properties: PropertyInput[] = [];
  for (let i = 0; i < count; i++) {
    properties.push({
      bedrooms: randomInt(random, 0, 6),
      bathrooms: randomInt(random, 2, 8) / 2,
      price: randomInt(random, 60, 1_200) * 1_000,
      yearBuilt: randomInt(random, 1900, 2024),
      latitude: null,
      longitude: null,
      hasBasement: random() < 0.4,
      hasFireplace: random() < 0.3,
      hasAttic: random() < 0.25,
      hasGarage: random() < 0.6,
    });
  }
  return properties;
}

function randomNumericPredicate(random: Random, min: number, max: number, step: number): PredicateValue {
  const a = randomInt(random, min, max) * step;
  const b = randomInt(random, min, max) * step;
  switch (randomInt(random, 0, 3)) {
    case 0:
      return a;
    case 1:
      return { min: Math.min(a, b), max: Math.max(a, b) };
    case 2:
      return { min: a };
    default:
      return { max: a };
  }
}

/**
 * A random conjunctive filter over one to four attributes
 */
export function generateFilter(random: Random): PropertyFilter {
  const where: Record<string, PredicateValue> = {};
  const generators: Array<() => void> = [
    () => (where.bedrooms = randomNumericPredicate(random, 0, 6, 1)),
    () => (where.bathrooms = randomNumericPredicate(random, 2, 8, 0.5)),
    () => (where.price = randomNumericPredicate(random, 60, 1_200, 1_000)),
    () => (where.yearBuilt = randomNumericPredicate(random, 1900, 2024, 1)),
    () => (where[pick(random, FEATURE_FLAGS)] = random() < 0.7),
  ];

  const count = randomInt(random, 1, 4);
  for (let i = 0; i < count; i++) {
    pick(random, generators)();
  }

  const features = random() < 0.3 ? [pick(random, FEATURE_FLAGS)] : [];
  return { where, features };
}
