/**
 * OpenTelemetry-backed metrics sink.
 *
 * Uses `\@opentelemetry/api` as an optional dependency. The first observation
 * starts loading it; observations made before it has loaded, and all of them
 * when it is not installed, are dropped. Call `initialize()` at startup to load
 * it before the first observation. Instruments are created lazily, once per
 * metric name.
 */

import type { Counter, Histogram, Meter } from '@opentelemetry/api'
import { normalizeError } from '../errors.js'
import { logger } from '../logging/index.js'
import type { LabelSet } from './labels.js'
import type { MetricsSink } from './sink.js'

/**
 * Meter name used when none is given.
 */
export const DEFAULT_METER_NAME = 'metric-weaver'

const HISTOGRAM_OPTIONS = { unit: 's', description: 'Duration of calls to an instrumented function' }
const COUNTER_OPTIONS = { description: 'Calls to an instrumented function' }

/**
 * Sink that records observations as OpenTelemetry histograms and counters.
 */
export class OtelMetricsSink implements MetricsSink {
  private _meter: Meter | undefined
  private _initializing: Promise<void> | undefined
  private readonly _histograms = new Map<string, Histogram>()
  private readonly _counters = new Map<string, Counter>()

  /**
   * @param meterName - Name of the meter instruments are created on
   */
  constructor(private readonly meterName: string = DEFAULT_METER_NAME) {}

  /**
   * Whether a meter is available and observations are being recorded.
   */
  get recording(): boolean {
    return this._meter !== undefined
  }

  /**
   * Loads `\@opentelemetry/api` and obtains a meter from the global meter provider.
   * Every call resolves once the first load has finished.
   */
  initialize(): Promise<void> {
    this._initializing ??= this._load()
    return this._initializing
  }

  private async _load(): Promise<void> {
    try {
      const otel = await import('@opentelemetry/api')
      this._meter = otel.metrics.getMeter(this.meterName)
    } catch (error) {
      logger.debug(`error=<${normalizeError(error).message}> | opentelemetry api unavailable, metrics disabled`)
    }
  }

  recordHistogram(name: string, value: number, labels: LabelSet): void {
    this._histogram(name)?.record(value, labels)
  }

  incrementCounter(name: string, labels: LabelSet): void {
    this._counter(name)?.add(1, labels)
  }

  private _histogram(name: string): Histogram | undefined {
    if (!this._meter) {
      this._startLoading()
      return undefined
    }
    let histogram = this._histograms.get(name)
    if (!histogram) {
      histogram = this._meter.createHistogram(name, HISTOGRAM_OPTIONS)
      this._histograms.set(name, histogram)
    }
    return histogram
  }

  private _counter(name: string): Counter | undefined {
    if (!this._meter) {
      this._startLoading()
      return undefined
    }
    let counter = this._counters.get(name)
    if (!counter) {
      counter = this._meter.createCounter(name, COUNTER_OPTIONS)
      this._counters.set(name, counter)
    }
    return counter
  }

  private _startLoading(): void {
    if (!this._initializing) {
      void this.initialize()
    }
  }
}
