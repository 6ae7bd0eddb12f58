/**
 * Runtime entry point (`metric-weaver/runtime`).
 *
 * Instrumented code imports this module under a namespace and calls the
 * `track` helpers and label extractors by name. It must stay free of the
 * compiler, which only the build needs.
 */

export { track, trackAsync, trackThenable } from './track.js'
export {
  noLabels,
  outcomeLabels,
  successLabels,
  EMPTY_LABELS,
  OK_LABELS,
  ERR_LABELS,
  RESULT_LABEL,
} from './labels.js'
export type { LabelSet, LabelExtractor, OkDiscriminated, SuccessDiscriminated, ResultLabelValue } from './labels.js'
export { configureMetricsSink, getMetricsSink, resetMetricsSink, InMemoryMetricsSink } from './sink.js'
export type { MetricsSink, RecordedMetric } from './sink.js'
export { OtelMetricsSink, DEFAULT_METER_NAME } from './otel-sink.js'
export { instrument, instrumentAsync } from './instrument.js'
export type { InstrumentOptions, InstrumentedFn } from './instrument.js'
