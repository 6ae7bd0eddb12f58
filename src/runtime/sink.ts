/**
 * Metrics sink registry.
 *
 * Generated wrappers report every call to the sink registered here. The sink
 * is the only place metrics leave metric-weaver; aggregation and export are
 * its concern.
 */

import type { LabelSet } from './labels.js'
import { OtelMetricsSink } from './otel-sink.js'

/**
 * Backend receiving the observations of instrumented functions.
 *
 * Both operations are called synchronously on every instrumented call and
 * should not block.
 */
export interface MetricsSink {
  recordHistogram(name: string, value: number, labels: LabelSet): void
  incrementCounter(name: string, labels: LabelSet): void
}

let _sink: MetricsSink = new OtelMetricsSink()

/**
 * Returns the sink instrumented functions currently report to.
 */
export function getMetricsSink(): MetricsSink {
  return _sink
}

/**
 * Replaces the global metrics sink.
 *
 * @param sink - The sink to report to
 *
 * @example
 * ```typescript
 * import { configureMetricsSink, OtelMetricsSink } from 'metric-weaver/runtime'
 *
 * const sink = new OtelMetricsSink('checkout-service')
 * await sink.initialize()
 * configureMetricsSink(sink)
 * ```
 */
export function configureMetricsSink(sink: MetricsSink): void {
  _sink = sink
}

/**
 * Restores a fresh, uninitialized OpenTelemetry sink.
 */
export function resetMetricsSink(): void {
  _sink = new OtelMetricsSink()
}

/**
 * A histogram observation or counter increment held by InMemoryMetricsSink.
 */
export type RecordedMetric =
  | { kind: 'histogram'; name: string; value: number; labels: LabelSet }
  | { kind: 'counter'; name: string; labels: LabelSet }

/**
 * Sink that keeps every observation in memory, in arrival order.
 */
export class InMemoryMetricsSink implements MetricsSink {
  readonly records: RecordedMetric[] = []

  recordHistogram(name: string, value: number, labels: LabelSet): void {
    this.records.push({ kind: 'histogram', name, value, labels })
  }

  incrementCounter(name: string, labels: LabelSet): void {
    this.records.push({ kind: 'counter', name, labels })
  }

  /**
   * Histogram values observed under a name.
   */
  histogramValues(name: string): number[] {
    return this.records.flatMap((record) => (record.kind === 'histogram' && record.name === name ? [record.value] : []))
  }

  /**
   * Number of increments of a counter, optionally restricted to one label value.
   */
  counterValue(name: string, labels?: LabelSet): number {
    return this.records.filter(
      (record) =>
        record.kind === 'counter' &&
        record.name === name &&
        (labels === undefined || Object.entries(labels).every(([key, value]) => record.labels[key] === value))
    ).length
  }

  clear(): void {
    this.records.length = 0
  }
}
