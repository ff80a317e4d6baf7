/**
 * Presentation shape of a search, shared by the CLI and the MCP server
 */

import type {
  MismatchReport,
  Property,
  PropertyFilter,
  QueryMethod,
  QueryResult,
} from "./types.js";
import type { NearestHome, NeighborGraph, Route } from "./proximity.js";

export interface HomeView {
  id: number;
  bedrooms: number;
  bathrooms: number;
  price: number;
  yearBuilt: number;
  address: string | null;
  buildingSqft: number | null;
  latitude: number | null;
  longitude: number | null;
  features: {
    basement: boolean;
    fireplace: boolean;
    attic: boolean;
    garage: boolean;
  };
}

export interface MethodPerformance {
  count: number;
  timeMs: number;
}

export interface SearchResponse {
  query: {
    filter: PropertyFilter;
    method: QueryMethod;
    limit: number | null;
  };
  performance: {
    hashset?: MethodPerformance;
    posting?: MethodPerformance;
    mismatch?: MismatchReport;
  };
  total: number;
  homes: HomeView[];
}

/** Three decimals: microseconds for timings, metres for distances */
function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function toHomeView(property: Property): HomeView {
  return {
    id: property.id,
    bedrooms: property.bedrooms,
    bathrooms: property.bathrooms,
    price: property.price,
    yearBuilt: property.yearBuilt,
    address: property.address ?? null,
    buildingSqft: property.buildingSqft ?? null,
    latitude: property.latitude,
    longitude: property.longitude,
    features: {
      basement: property.hasBasement,
      fireplace: property.hasFireplace,
      attic: property.hasAttic,
      garage: property.hasGarage,
    },
  };
}

/**
 * Per-method counts are what each path returned, so a flagged mismatch shows up as differing counts
 */
export function toSearchResponse(
  filter: PropertyFilter,
  result: QueryResult,
  options: { method: QueryMethod; limit?: number }
): SearchResponse {
  const performance: SearchResponse["performance"] = {};

  if (result.hashSetElapsedMs !== null) {
    performance.hashset = {
      count: result.total + (result.mismatch?.onlyInHashSet.length ?? 0),
      timeMs: round3(result.hashSetElapsedMs),
    };
  }
  if (result.postingListElapsedMs !== null) {
    performance.posting = {
      count: result.total + (result.mismatch?.onlyInPostingList.length ?? 0),
      timeMs: round3(result.postingListElapsedMs),
    };
  }
  if (result.mismatch) {
    performance.mismatch = result.mismatch;
  }

  return {
    query: { filter, method: options.method, limit: options.limit ?? null },
    performance,
    total: result.total,
    homes: result.properties.map(toHomeView),
  };
}

export interface NearbyHomeView extends HomeView {
  distanceKm: number;
}

export interface NearbyResponse {
  /** Home the search started from; null when no home has coordinates */
  source: HomeView | null;
  k: number;
  homes: NearbyHomeView[];
  route?: Route;
}

export function toNearbyResponse(
  graph: NeighborGraph,
  source: number | null,
  nearest: readonly NearestHome[],
  route?: Route
): NearbyResponse {
  const sourceHome = source === null ? undefined : graph.store.get(source);
  const homes = nearest.flatMap(({ id, distanceKm }) => {
    const property = graph.store.get(id);
    return property ? [{ ...toHomeView(property), distanceKm: round3(distanceKm) }] : [];
  });

  const response: NearbyResponse = {
    source: sourceHome ? toHomeView(sourceHome) : null,
    k: graph.k,
    homes,
  };
  if (route) {
    response.route = {
      ...route,
      distanceKm: route.distanceKm === null ? null : round3(route.distanceKm),
    };
  }
  return response;
}
