/**
 * Unit tests for the neighbour graph and shortest-path proximity search
 */

import { describe, it, expect } from "vitest";
import { HomeNotLocatedError } from "./errors.js";
import {
  EARTH_RADIUS_KM,
  buildNeighborGraph,
  haversineKm,
  nearestHomes,
  pathTo,
  resolveSource,
  routeBetween,
  shortestPaths,
} from "./proximity.js";
import { toNearbyResponse } from "./response.js";
import { PropertyStore } from "./store.js";
import type { PropertyInput } from "./types.js";

// Length of one degree along the equator
const DEGREE_KM = (EARTH_RADIUS_KM * Math.PI) / 180;

function home(longitude: number | null): PropertyInput {
  return {
    bedrooms: 3,
    bathrooms: 2,
    price: 250_000,
    yearBuilt: 1990,
    latitude: longitude === null ? null : 0,
    longitude,
    hasBasement: false,
    hasFireplace: false,
    hasAttic: false,
    hasGarage: false,
  };
}

// Homes along the equator at 0°, 1°, 2°, 3° and 5° east, plus one without coordinates
const store = PropertyStore.from([home(0), home(1), home(2), home(3), home(5), home(null)]);

describe("haversineKm", () => {
  it("should measure one equatorial degree", () => {
    expect(haversineKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBeCloseTo(
      111.195,
      3
    );
  });

  it("should be zero for the same point and symmetric otherwise", () => {
    const a = { latitude: 41.9, longitude: -87.7 };
    const b = { latitude: 41.77, longitude: -87.59 };
    expect(haversineKm(a, a)).toBe(0);
    expect(haversineKm(a, b)).toBeCloseTo(haversineKm(b, a), 9);
  });
});

describe("buildNeighborGraph", () => {
  it("should link each located home to its k nearest, ties by id", () => {
    const graph = buildNeighborGraph(store, 2);

    expect(graph.nodes).toEqual([0, 1, 2, 3, 4]);
    expect(graph.edges[0]?.map((edge) => edge.to)).toEqual([1, 2]);
    // 1° east and 2° west of home 3 are 2 and 1; 1 and 4 tie at 2°
    expect(graph.edges[3]?.map((edge) => edge.to)).toEqual([2, 1]);
    expect(graph.edges[4]?.map((edge) => edge.to)).toEqual([3, 2]);
    expect(graph.edges[5]).toEqual([]);
  });

  it("should default to eight neighbours", () => {
    const graph = buildNeighborGraph(store);
    expect(graph.k).toBe(8);
    expect(graph.edges[0]).toHaveLength(4);
  });

  it("should reject k below one", () => {
    expect(() => buildNeighborGraph(store, 0)).toThrow(RangeError);
    expect(() => buildNeighborGraph(store, 1.5)).toThrow(RangeError);
  });
});

describe("nearestHomes", () => {
  it("should order reachable homes by path distance, source first", () => {
    const nearest = nearestHomes(buildNeighborGraph(store, 2), 0);

    expect(nearest.map((h) => h.id)).toEqual([0, 1, 2, 3]);
    expect(nearest[0]?.distanceKm).toBe(0);
    expect(nearest[1]?.distanceKm).toBeCloseTo(DEGREE_KM, 6);
    expect(nearest[2]?.distanceKm).toBeCloseTo(2 * DEGREE_KM, 6);
    expect(nearest[3]?.distanceKm).toBeCloseTo(3 * DEGREE_KM, 6);
  });

  it("should leave out homes the directed graph cannot reach", () => {
    const nearest = nearestHomes(buildNeighborGraph(store, 1), 0);
    expect(nearest.map((h) => h.id)).toEqual([0, 1]);
  });

  it("should start from the home closest to a point", () => {
    const graph = buildNeighborGraph(store, 1);
    const nearest = nearestHomes(graph, { latitude: 0, longitude: 4.6 }, 3);

    expect(nearest.map((h) => h.id)).toEqual([4, 3, 2]);
    expect(nearest[1]?.distanceKm).toBeCloseTo(2 * DEGREE_KM, 6);
    expect(nearest[2]?.distanceKm).toBeCloseTo(3 * DEGREE_KM, 6);
  });

  it("should cap the result at count", () => {
    const graph = buildNeighborGraph(store, 2);
    expect(nearestHomes(graph, 0, 2).map((h) => h.id)).toEqual([0, 1]);
    expect(nearestHomes(graph, 0, 0)).toEqual([]);
    expect(() => nearestHomes(graph, 0, -1)).toThrow(RangeError);
  });

  it("should reject homes that are missing or have no coordinates", () => {
    const graph = buildNeighborGraph(store, 2);
    expect(() => nearestHomes(graph, 5)).toThrow(HomeNotLocatedError);
    expect(() => nearestHomes(graph, 99)).toThrow("Home #99 does not exist or has no coordinates");
  });

  it("should return nothing when no home has coordinates", () => {
    const graph = buildNeighborGraph(PropertyStore.from([home(null), home(null)]));

    expect(graph.nodes).toEqual([]);
    expect(resolveSource(graph, { latitude: 10, longitude: 10 })).toBeNull();
    expect(nearestHomes(graph, { latitude: 10, longitude: 10 })).toEqual([]);
  });
});

describe("routes", () => {
  it("should follow predecessors along the only path", () => {
    const graph = buildNeighborGraph(store, 1);
    const route = routeBetween(graph, 4, 0);

    expect(route.ids).toEqual([4, 3, 2, 1, 0]);
    expect(route.distanceKm).toBeCloseTo(5 * DEGREE_KM, 6);
  });

  it("should report an unreachable target with no path", () => {
    const graph = buildNeighborGraph(store, 1);

    expect(routeBetween(graph, 0, 4)).toEqual({ from: 0, to: 4, ids: [], distanceKm: null });
    expect(pathTo(shortestPaths(graph, 0), 4)).toEqual([]);
    expect(pathTo(shortestPaths(graph, 0), 0)).toEqual([0]);
  });

  it("should reject a target without coordinates", () => {
    expect(() => routeBetween(buildNeighborGraph(store, 2), 0, 5)).toThrow(HomeNotLocatedError);
  });
});

describe("toNearbyResponse", () => {
  it("should attach rounded distances to home views", () => {
    const graph = buildNeighborGraph(store, 1);
    const response = toNearbyResponse(graph, 4, nearestHomes(graph, 4, 2), routeBetween(graph, 4, 3));

    expect(response.source?.id).toBe(4);
    expect(response.k).toBe(1);
    expect(response.homes.map((h) => [h.id, h.distanceKm])).toEqual([
      [4, 0],
      [3, Math.round(2 * DEGREE_KM * 1000) / 1000],
    ]);
    expect(response.route).toEqual({
      from: 4,
      to: 3,
      ids: [4, 3],
      distanceKm: Math.round(2 * DEGREE_KM * 1000) / 1000,
    });
  });

  it("should have no source when nothing is located", () => {
    const graph = buildNeighborGraph(PropertyStore.from([home(null)]));
    expect(toNearbyResponse(graph, null, [])).toEqual({ source: null, k: 8, homes: [] });
  });
});
