/**
 * In-process metrics for monitoring tool performance
 * Tracks call counts, errors, and latency histograms
 */

type Labels = Record<string, string>;

interface Histogram {
  name: string;
  labels: Labels;
  values: number[];
  sum: number;
  count: number;
}

export interface HistogramStats {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

// Latency samples kept per histogram
const MAX_SAMPLES = 1000;

export class MetricsRegistry {
  #counters: Map<string, number> = new Map();
  #histograms: Map<string, Histogram> = new Map();

  // Increment a counter
  inc(name: string, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    this.#counters.set(key, (this.#counters.get(key) ?? 0) + 1);
  }

  // Observe a value in a histogram
  observe(name: string, value: number, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { name, labels, values: [], sum: 0, count: 0 };
    histogram.values.push(value);
    histogram.sum += value;
    histogram.count++;

    // Keep only the most recent samples
    if (histogram.values.length > MAX_SAMPLES) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
      histogram.count = histogram.values.length;
    }

    this.#histograms.set(key, histogram);
  }

  // Get counter value
  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(this.makeKey(name, labels)) ?? 0;
  }

  // Get histogram stats (p50, p95, p99)
  getHistogram(name: string, labels: Labels = {}): HistogramStats | null {
    const histogram = this.#histograms.get(this.makeKey(name, labels));
    return histogram ? summarize(histogram) : null;
  }

  // Get all metrics (for debugging)
  getAllMetrics(): {
    counters: Record<string, number>;
    histograms: Record<string, HistogramStats | null>;
  } {
    const counters: Record<string, number> = {};
    for (const [key, count] of this.#counters) {
      counters[key] = count;
    }

    const histograms: Record<string, HistogramStats | null> = {};
    for (const [key, histogram] of this.#histograms) {
      histograms[key] = summarize(histogram);
    }

    return { counters, histograms };
  }

  private makeKey(name: string, labels: Labels): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return labelStr ? `${name}{${labelStr}}` : name;
  }
}

function summarize(histogram: Histogram): HistogramStats | null {
  if (histogram.values.length === 0) {
    return null;
  }

  const sorted = [...histogram.values].sort((a, b) => a - b);
  const percentile = (p: number): number => {
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)] ?? 0;
  };

  return {
    count: histogram.count,
    sum: histogram.sum,
    p50: percentile(50),
    p95: percentile(95),
    p99: percentile(99),
  };
}

export const metrics = new MetricsRegistry();

// Helper to record tool execution metrics
export function recordToolExecution(tool: string, duration_ms: number, success: boolean, errCode?: string): void {
  // Increment call counter
  metrics.inc("netviz.tool.calls_total", { tool });

  // Increment error counter if failed
  if (!success) {
    metrics.inc("netviz.tool.errors_total", { tool, err_code: errCode || "UNKNOWN" });
  }

  // Record latency
  metrics.observe("netviz.tool.latency_ms", duration_ms, { tool });
}
