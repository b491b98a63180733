/**
 * Timing metrics written to stderr in verbose mode
 */

import type { CliOutput } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

export interface MetricSink {
  enabled: boolean;
  output: CliOutput;
}

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric line (`metric <key> k=v ...`) if the sink is enabled
 */
export function emitMetric(sink: MetricSink, key: string, fields: Record<string, unknown>): void {
  if (!sink.enabled) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  sink.output.writeErr(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(sink: MetricSink, label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(sink, label, {
      duration_ms: Date.now() - start,
      success,
    });
  }
}
