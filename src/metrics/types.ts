/**
 * Structured metric types emitted by the extraction stream.
 * All types are immutable and serializable to JSON.
 */

/** Metrics emitted when a `filterStream` run finishes or is closed by its consumer. */
export interface StreamMetrics {
  readonly stage: 'stream'
  /** Messages pulled from the source, including skipped ones. */
  readonly messagesRead: number
  /** Messages skipped by the `count` filter or by header prefiltering. */
  readonly messagesSkipped: number
  readonly observationsYielded: number
  /** Distinct message layouts seen (structure cache entries). */
  readonly structureCacheSize: number
  /** True when the `count` filter's upper bound ended the stream. */
  readonly stoppedAtCountLimit: boolean
}

/** Union of all metric payload types. */
export type MetricData = StreamMetrics

/** A timestamped metric event carrying one of the metric payloads. */
export interface MetricEvent {
  readonly stage: MetricData['stage']
  readonly timestamp: string
  readonly data: MetricData
}
