/**
 * Home search service adapter
 * Owns the index pair built at startup and serves every tool call from it
 */

import {
  buildIndexes,
  buildNeighborGraph,
  describeIndexes,
  loadProperties,
  metrics as indexMetrics,
  nearestHomes,
  query,
  resolveSource,
  routeBetween,
  toNearbyResponse,
  toSearchResponse,
} from "@homeindex/core";
import type {
  IndexOptions,
  IndexSet,
  IndexSetSummary,
  NearbyResponse,
  NeighborGraph,
  PropertyFilter,
  ProximitySource,
  SearchResponse,
} from "@homeindex/core";
import type { NearestHomesInput, SearchHomesInput } from "../schemas.js";
import { logger } from "../observability/logger.js";

export interface HealthReport {
  status: "ok" | "degraded";
  indexesLoaded: boolean;
  source: string;
  properties: number;
  /** Hash-set and posting-list disagreements seen since startup */
  mismatches: number;
}

export class HomeSearchService {
  #indexes: IndexSet;
  #source: string;
  // Neighbour graphs by k, built on first use
  #graphs: Map<number, NeighborGraph> = new Map();

  constructor(indexes: IndexSet, source: string) {
    this.#indexes = indexes;
    this.#source = source;
    logger.info("service.init", { source, properties: indexes.store.size });
  }

  /**
   * Load a dataset file and build both indexes once
   */
  static async open(dataPath: string, options: IndexOptions = {}): Promise<HomeSearchService> {
    const properties = await loadProperties(dataPath);
    return new HomeSearchService(buildIndexes(properties, options), dataPath);
  }

  search(input: SearchHomesInput): SearchResponse {
    const filter: PropertyFilter = { where: input.where, features: input.features };
    const result = query(filter, this.#indexes.hashSet, this.#indexes.postingList, {
      method: input.method,
      limit: input.limit,
      onMismatch: input.onMismatch,
    });

    if (result.mismatch) {
      logger.warn("service.search.mismatch", {
        only_in_hashset: result.mismatch.onlyInHashSet.length,
        only_in_posting: result.mismatch.onlyInPostingList.length,
      });
    }

    return toSearchResponse(filter, result, { method: input.method, limit: input.limit });
  }

  nearest(input: NearestHomesInput): NearbyResponse {
    const graph = this.#graph(input.k);

    let source: ProximitySource | null = graph.nodes[0] ?? null;
    if (input.home !== undefined) {
      source = input.home;
    } else if (input.latitude !== undefined && input.longitude !== undefined) {
      source = { latitude: input.latitude, longitude: input.longitude };
    }

    const origin = source === null ? null : resolveSource(graph, source);
    if (origin === null) {
      return toNearbyResponse(graph, null, []);
    }

    const nearest = nearestHomes(graph, origin, input.count);
    const route = input.target === undefined ? undefined : routeBetween(graph, origin, input.target);
    return toNearbyResponse(graph, origin, nearest, route);
  }

  #graph(k: number): NeighborGraph {
    let graph = this.#graphs.get(k);
    if (!graph) {
      graph = buildNeighborGraph(this.#indexes.store, k);
      this.#graphs.set(k, graph);
      logger.debug("service.graph.build", { k, nodes: graph.nodes.length });
    }
    return graph;
  }

  stats(): IndexSetSummary {
    return describeIndexes(this.#indexes);
  }

  health(): HealthReport {
    const mismatches = indexMetrics.getMismatchCount();
    return {
      status: mismatches === 0 ? "ok" : "degraded",
      indexesLoaded: true,
      source: this.#source,
      properties: this.#indexes.store.size,
      mismatches,
    };
  }
}
