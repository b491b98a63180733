/**
 * Metrics tracking for builds, deltas and searches
 */

export interface DriveMetrics {
  builds: number;
  buildFailures: number;
  searches: number;
  deltasApplied: number;
  buildTimeMs: number[];
  searchTimeMs: number[];
  records: number;
  trigrams: number;
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<string, DriveMetrics>();

  /**
   * Get or create metrics for a drive
   */
  #getMetrics(drive: string): DriveMetrics {
    let metrics = this.#metrics.get(drive);
    if (!metrics) {
      metrics = {
        builds: 0,
        buildFailures: 0,
        searches: 0,
        deltasApplied: 0,
        buildTimeMs: [],
        searchTimeMs: [],
        records: 0,
        trigrams: 0,
      };
      this.#metrics.set(drive, metrics);
    }
    return metrics;
  }

  #push(samples: number[], ms: number): void {
    samples.push(ms);
    // Keep only the most recent samples to avoid unbounded memory growth
    if (samples.length > MAX_SAMPLES) {
      samples.shift();
    }
  }

  recordBuild(drive: string, ms: number, ok: boolean): void {
    const metrics = this.#getMetrics(drive);
    if (ok) {
      metrics.builds++;
      this.#push(metrics.buildTimeMs, ms);
    } else {
      metrics.buildFailures++;
    }
  }

  recordSearch(drive: string, ms: number): void {
    const metrics = this.#getMetrics(drive);
    metrics.searches++;
    this.#push(metrics.searchTimeMs, ms);
  }

  recordDelta(drive: string, changes: number): void {
    this.#getMetrics(drive).deltasApplied += changes;
  }

  /**
   * Update index size metrics
   */
  updateSize(drive: string, records: number, trigrams: number): void {
    const metrics = this.#getMetrics(drive);
    metrics.records = records;
    metrics.trigrams = trigrams;
  }

  getMetrics(drive: string): DriveMetrics | undefined {
    return this.#metrics.get(drive);
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  getP95SearchTime(drive: string): number {
    return this.getP95(this.#getMetrics(drive).searchTimeMs);
  }

  /**
   * Reset metrics for one drive or all drives
   */
  reset(drive?: string): void {
    if (drive) {
      this.#metrics.delete(drive);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
