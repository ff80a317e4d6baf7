/**
 * Telemetry and observability helpers
 */

import { metrics } from "@homeindex/core";
import type { IndexKind } from "@homeindex/core";
import { isVerbose } from "./env.js";
import { writeStderr } from "./render.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Emit the core collector's per-index latency and size figures
 */
export function emitIndexMetrics(): void {
  const kinds: IndexKind[] = ["hashset", "posting"];
  for (const kind of kinds) {
    const recorded = metrics.getMetrics(kind);
    if (!recorded) continue;
    emitMetric(`index.${kind}`, {
      queries: recorded.queryCount,
      p95_ms: metrics.getP95QueryTime(kind).toFixed(3),
      build_ms: metrics.getP95(recorded.buildTimeMs).toFixed(2),
      keys: recorded.keys,
      postings: recorded.postings,
    });
  }
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = performance.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = performance.now() - start;
    emitMetric(label, {
      duration_ms: duration.toFixed(1),
      success,
    });
    emitIndexMetrics();
  }
}
