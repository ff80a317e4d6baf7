/**
 * In-process metrics for monitoring tool performance
 * Tracks call counts, errors, and latency histograms
 */

type Labels = Record<string, string>;

interface Counter {
  count: number;
}

interface Histogram {
  values: number[];
  sum: number;
}

export interface HistogramStats {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

// Keep only the latest values per histogram
const MAX_SAMPLES = 1000;

export class MetricsRegistry {
  #counters: Map<string, Counter> = new Map();
  #histograms: Map<string, Histogram> = new Map();

  inc(name: string, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const counter = this.#counters.get(key) ?? { count: 0 };
    counter.count++;
    this.#counters.set(key, counter);
  }

  observe(name: string, value: number, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { values: [], sum: 0 };
    histogram.values.push(value);
    histogram.sum += value;

    if (histogram.values.length > MAX_SAMPLES) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
    }

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(this.makeKey(name, labels))?.count ?? 0;
  }

  getHistogram(name: string, labels: Labels = {}): HistogramStats | null {
    const histogram = this.#histograms.get(this.makeKey(name, labels));
    if (!histogram || histogram.values.length === 0) {
      return null;
    }

    const sorted = [...histogram.values].sort((a, b) => a - b);
    const percentile = (p: number): number => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)] ?? 0;
    };

    return {
      count: sorted.length,
      sum: histogram.sum,
      p50: percentile(50),
      p95: percentile(95),
      p99: percentile(99),
    };
  }

  reset(): void {
    this.#counters.clear();
    this.#histograms.clear();
  }

  private makeKey(name: string, labels: Labels): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return labelStr ? `${name}{${labelStr}}` : name;
  }
}

export const metrics = new MetricsRegistry();

// Helper to record tool execution metrics
export function recordToolExecution(
  tool: string,
  duration_ms: number,
  success: boolean,
  errCode?: string
): void {
  metrics.inc("homeindex.tool.calls_total", { tool });

  if (!success) {
    metrics.inc("homeindex.tool.errors_total", { tool, err_code: errCode ?? "UNKNOWN" });
  }

  metrics.observe("homeindex.tool.latency_ms", duration_ms, { tool });
}

export interface ToolUsage {
  calls: number;
  p95Ms: number | null;
}

/**
 * Calls and p95 latency per tool since startup
 */
export function toolUsage(tools: readonly string[]): Record<string, ToolUsage> {
  const usage: Record<string, ToolUsage> = {};
  for (const tool of tools) {
    usage[tool] = {
      calls: metrics.getCounter("homeindex.tool.calls_total", { tool }),
      p95Ms: metrics.getHistogram("homeindex.tool.latency_ms", { tool })?.p95 ?? null,
    };
  }
  return usage;
}
