/**
 * Metric emission: structured console output on stderr.
 */
import type { MetricData, MetricEvent } from './types.js'

/** Wraps a payload in a timestamped event. */
export function createMetricEvent(data: MetricData, now: Date = new Date()): MetricEvent {
  return { stage: data.stage, timestamp: now.toISOString(), data }
}

/**
 * Writes a metric event to stderr via console.warn with a `[bufr:metrics]` prefix.
 * Callers decide whether to emit.
 */
export function emitMetric(event: MetricEvent): void {
  console.warn(`[bufr:metrics] ${JSON.stringify(event)}`)
}
