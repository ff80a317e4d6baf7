/**
 * Geographic proximity search
 *
 * Homes with both coordinates become graph nodes. Each node gets directed edges to
 * its k nearest other nodes by great-circle (haversine) distance. Distances between
 * homes are shortest-path lengths over that graph, found with Dijkstra on MinHeap.
 *
 * Invariants:
 * - Homes without coordinates are never nodes, sources or targets
 * - Edge lists are ordered by distance, ties by id
 * - Results are ordered by path distance, ties by id; unreachable homes are left out
 */

import { HomeNotLocatedError } from "./errors.js";
import { MinHeap } from "./heap.js";
import { logger } from "./observability/logs.js";
import type { PropertyStore } from "./store.js";
import type { Property } from "./types.js";

/** Mean Earth radius (IUGG) */
export const EARTH_RADIUS_KM = 6371.0088;

export const DEFAULT_NEIGHBORS = 8;
export const DEFAULT_NEAREST_COUNT = 10;

export interface Coordinates {
  latitude: number;
  longitude: number;
}

type LocatedProperty = Property & Readonly<Coordinates>;

export interface NeighborEdge {
  readonly to: number;
  readonly km: number;
}

export interface NeighborGraph {
  readonly store: PropertyStore;
  readonly k: number;
  /** Ids of homes with coordinates, ascending */
  readonly nodes: readonly number[];
  /** Outgoing edges by property id; empty for homes without coordinates */
  readonly edges: readonly (readonly NeighborEdge[])[];
}

/**
 * A home id, or a point that resolves to the closest located home
 */
export type ProximitySource = number | Coordinates;

export interface ShortestPaths {
  readonly source: number;
  /** Path distance by property id; Infinity when unreachable */
  readonly distanceKm: Float64Array;
  /** Predecessor on the shortest path by property id; -1 for the source and unreachable ids */
  readonly previous: Int32Array;
}

export interface NearestHome {
  id: number;
  distanceKm: number;
}

export interface Route {
  from: number;
  to: number;
  /** Ids from `from` to `to` inclusive; empty when `to` is unreachable */
  ids: number[];
  distanceKm: number | null;
}

function isLocated(property: Property): property is LocatedProperty {
  return property.latitude !== null && property.longitude !== null;
}

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function haversineKm(a: Coordinates, b: Coordinates): number {
  const phi1 = toRadians(a.latitude);
  const phi2 = toRadians(b.latitude);
  const dPhi = phi2 - phi1;
  const dLambda = toRadians(b.longitude - a.longitude);
  const h =
    Math.sin(dPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

function byDistanceThenId(a: NeighborEdge, b: NeighborEdge): number {
  return a.km - b.km || a.to - b.to;
}

function assertCount(value: number, name: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

function locatedHome(graph: NeighborGraph, id: number): LocatedProperty {
  const property = graph.store.get(id);
  if (!property || !isLocated(property)) {
    throw new HomeNotLocatedError(id);
  }
  return property;
}

/**
 * Build the k-nearest-neighbour graph over every located home. O(n² log n).
 */
export function buildNeighborGraph(store: PropertyStore, k: number = DEFAULT_NEIGHBORS): NeighborGraph {
  assertCount(k, "k", 1);
  const start = performance.now();

  const located = store.all().filter(isLocated);
  const edges = Array.from({ length: store.size }, (): NeighborEdge[] => []);

  for (const from of located) {
    const candidates: NeighborEdge[] = [];
    for (const to of located) {
      if (to.id !== from.id) {
        candidates.push({ to: to.id, km: haversineKm(from, to) });
      }
    }
    candidates.sort(byDistanceThenId);
    edges[from.id] = candidates.slice(0, k);
  }

  logger.debug("proximity.graph.build", {
    nodes: located.length,
    unlocated: store.size - located.length,
    k,
    durationMs: performance.now() - start,
  });

  return Object.freeze({ store, k, nodes: located.map((property) => property.id), edges });
}

/**
 * Turn a source into a node id. A point resolves to the closest located home by
 * straight-line distance; null when the graph has no nodes.
 */
export function resolveSource(graph: NeighborGraph, source: ProximitySource): number | null {
  if (typeof source === "number") {
    return locatedHome(graph, source).id;
  }

  let best: number | null = null;
  let bestKm = Infinity;
  for (const id of graph.nodes) {
    const km = haversineKm(source, locatedHome(graph, id));
    if (km < bestKm) {
      bestKm = km;
      best = id;
    }
  }
  return best;
}

/**
 * Dijkstra from one located home over the neighbour graph
 */
export function shortestPaths(graph: NeighborGraph, source: number): ShortestPaths {
  locatedHome(graph, source);

  const distanceKm = new Float64Array(graph.store.size).fill(Infinity);
  const previous = new Int32Array(graph.store.size).fill(-1);
  const queue = new MinHeap<{ id: number; km: number }>((a, b) => a.km - b.km || a.id - b.id);

  distanceKm[source] = 0;
  queue.push({ id: source, km: 0 });

  for (let entry = queue.pop(); entry !== undefined; entry = queue.pop()) {
    const { id, km } = entry;
    // Stale entry: a shorter path to this node was already settled
    if (km > distanceKm[id]) continue;

    for (const edge of graph.edges[id]) {
      const next = km + edge.km;
      if (next < distanceKm[edge.to]) {
        distanceKm[edge.to] = next;
        previous[edge.to] = id;
        queue.push({ id: edge.to, km: next });
      }
    }
  }

  return { source, distanceKm, previous };
}

/**
 * The `count` reachable homes closest to the source by path distance, source first
 */
export function nearestHomes(
  graph: NeighborGraph,
  source: ProximitySource,
  count: number = DEFAULT_NEAREST_COUNT
): NearestHome[] {
  assertCount(count, "count", 0);
  const origin = resolveSource(graph, source);
  if (origin === null) {
    return [];
  }

  const paths = shortestPaths(graph, origin);
  return graph.nodes
    .filter((id) => Number.isFinite(paths.distanceKm[id]))
    .map((id) => ({ id, distanceKm: paths.distanceKm[id] }))
    .sort((a, b) => a.distanceKm - b.distanceKm || a.id - b.id)
    .slice(0, count);
}

/**
 * Walk predecessors back from `to`
 */
export function pathTo(paths: ShortestPaths, to: number): number[] {
  if (!Number.isFinite(paths.distanceKm[to])) {
    return [];
  }
  const ids: number[] = [];
  for (let id = to; id !== -1; id = paths.previous[id]) {
    ids.push(id);
  }
  return ids.reverse();
}

/**
 * Shortest route between two located homes
 */
export function routeBetween(graph: NeighborGraph, from: number, to: number): Route {
  locatedHome(graph, to);
  const paths = shortestPaths(graph, from);
  const ids = pathTo(paths, to);
  return { from, to, ids, distanceKm: ids.length > 0 ? paths.distanceKm[to] : null };
}
