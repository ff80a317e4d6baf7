/**
 * Metrics tracking for index build and query operations
 */

import type { IndexKind } from "../types.js";

export interface IndexMetrics {
  queryCount: number;
  queryTimeMs: number[];
  buildTimeMs: number[];
  keys: number;
  postings: number;
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<IndexKind, IndexMetrics>();
  #mismatches = 0;

  /**
   * Get or create metrics for an index kind
   */
  #getMetrics(kind: IndexKind): IndexMetrics {
    let metrics = this.#metrics.get(kind);
    if (!metrics) {
      metrics = {
        queryCount: 0,
        queryTimeMs: [],
        buildTimeMs: [],
        keys: 0,
        postings: 0,
      };
      this.#metrics.set(kind, metrics);
    }
    return metrics;
  }

  #push(samples: number[], ms: number): void {
    samples.push(ms);

    // Keep only the last samples to avoid unbounded memory growth
    if (samples.length > MAX_SAMPLES) {
      samples.shift();
    }
  }

  /**
   * Record query evaluation time
   */
  recordQueryTime(kind: IndexKind, ms: number): void {
    const metrics = this.#getMetrics(kind);
    metrics.queryCount++;
    this.#push(metrics.queryTimeMs, ms);
  }

  /**
   * Record build time
   */
  recordBuildTime(kind: IndexKind, ms: number): void {
    this.#push(this.#getMetrics(kind).buildTimeMs, ms);
  }

  /**
   * Update index size metrics
   */
  updateSize(kind: IndexKind, keys: number, postings: number): void {
    const metrics = this.#getMetrics(kind);
    metrics.keys = keys;
    metrics.postings = postings;
  }

  /**
   * Record a disagreement between the two index paths
   */
  recordMismatch(): void {
    this.#mismatches++;
  }

  getMismatchCount(): number {
    return this.#mismatches;
  }

  /**
   * Get metrics for an index kind
   */
  getMetrics(kind: IndexKind): IndexMetrics | undefined {
    return this.#metrics.get(kind);
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Get p95 query time
   */
  getP95QueryTime(kind: IndexKind): number {
    return this.getP95(this.#getMetrics(kind).queryTimeMs);
  }

  /**
   * Reset metrics for one index kind, or everything
   */
  reset(kind?: IndexKind): void {
    if (kind) {
      this.#metrics.delete(kind);
    } else {
      this.#metrics.clear();
      this.#mismatches = 0;
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
