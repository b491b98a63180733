/**
 * In-process metrics for tool calls and search results
 * Counters plus windowed histograms keyed by name and label set
 */

export interface HistogramStats {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

type Labels = Record<string, string>;

/** Fixed-size ring of the most recent observations */
class Window {
  readonly #values: number[] = [];
  #next = 0;
  #sum = 0;

  constructor(private readonly capacity: number) {}

  push(value: number): void {
    if (this.#values.length < this.capacity) {
      this.#values.push(value);
    } else {
      this.#sum -= this.#values[this.#next] ?? 0;
      this.#values[this.#next] = value;
      this.#next = (this.#next + 1) % this.capacity;
    }
    this.#sum += value;
  }

  stats(): HistogramStats | null {
    if (this.#values.length === 0) return null;

    const sorted = [...this.#values].sort((a, b) => a - b);
    const rank = (p: number): number => sorted[Math.max(0, Math.ceil((p / 100) * sorted.length) - 1)] ?? 0;

    return { count: sorted.length, sum: this.#sum, p50: rank(50), p95: rank(95), p99: rank(99) };
  }
}

function seriesKey(name: string, labels: Labels): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((k) => `${k}="${labels[k] ?? ""}"`);
  return pairs.length > 0 ? `${name}{${pairs.join(",")}}` : name;
}

export class MetricsRegistry {
  readonly #counters = new Map<string, number>();
  readonly #windows = new Map<string, Window>();

  /**
   * @param windowSize - Observations kept per histogram series
   */
  constructor(private readonly windowSize = 1000) {}

  inc(name: string, labels: Labels = {}): void {
    const key = seriesKey(name, labels);
    this.#counters.set(key, (this.#counters.get(key) ?? 0) + 1);
  }

  observe(name: string, value: number, labels: Labels = {}): void {
    const key = seriesKey(name, labels);
    let window = this.#windows.get(key);
    if (!window) {
      window = new Window(this.windowSize);
      this.#windows.set(key, window);
    }
    window.push(value);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(seriesKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels: Labels = {}): HistogramStats | null {
    return this.#windows.get(seriesKey(name, labels))?.stats() ?? null;
  }

  reset(): void {
    this.#counters.clear();
    this.#windows.clear();
  }
}

export const metrics = new MetricsRegistry();

export function recordToolExecution(tool: string, durationMs: number, success: boolean, errCode?: string): void {
  metrics.inc("driveindex.tool.calls_total", { tool });
  if (!success) {
    metrics.inc("driveindex.tool.errors_total", { tool, err_code: errCode ?? "UNKNOWN" });
  }
  metrics.observe("driveindex.tool.latency_ms", durationMs, { tool });
}

export function recordSearchResults(count: number, truncated: boolean): void {
  metrics.observe("driveindex.search.results", count);
  if (truncated) {
    metrics.inc("driveindex.search.truncated_total");
  }
}
