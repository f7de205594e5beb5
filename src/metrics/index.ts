export type { StreamMetrics, MetricData, MetricEvent } from './types.js'
export { createMetricEvent, emitMetric } from './sink.js'
