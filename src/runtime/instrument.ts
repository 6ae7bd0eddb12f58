/**
 * Instrumentation without the transformer.
 *
 * For code that is not compiled through metric-weaver, `instrument` and
 * `instrumentAsync` wrap a function value at runtime. Metric names are derived
 * once, when the wrapper is created. The label extractor is chosen by the
 * caller and checked against the return type by the compiler, so an outcome
 * extractor cannot be attached to a function that does not return outcomes.
 */

import { UnsupportedDeclarationError } from '../errors.js'
import { deriveMetricNames, type MetricNames } from '../naming/metric-names.js'
import { noLabels, type LabelExtractor } from './labels.js'
import { track, trackAsync } from './track.js'

/**
 * Options for runtime instrumentation.
 */
export interface InstrumentOptions<R> {
  /**
   * Base metric name. Takes precedence over `path`.
   */
  name?: string

  /**
   * Declaration path the base name is joined from. Defaults to `[fn.name]`.
   */
  path?: readonly string[]

  /**
   * Label extractor for the produced value. Defaults to `noLabels`.
   */
  labels?: LabelExtractor<R>
}

/**
 * A wrapped function, exposing the metric names it reports under.
 */
export type InstrumentedFn<A extends unknown[], R> = ((...args: A) => R) & {
  readonly metricNames: MetricNames
}

function resolveNames(fn: { name: string }, options: { name?: string; path?: readonly string[] }): MetricNames {
  if (options.name === undefined && options.path === undefined && fn.name === '') {
    throw new UnsupportedDeclarationError('cannot derive a metric name for an anonymous function; pass a name')
  }
  return deriveMetricNames({ name: options.name }, options.path ?? [fn.name])
}

/**
 * Wraps a directly evaluated function.
 *
 * @param fn - The function to instrument
 * @param options - Naming and label options
 * @returns A function with the same parameters and return value that records metrics per call
 *
 * @example
 * ```typescript
 * const parseOrder = instrument((raw: string) => OrderSchema.safeParse(JSON.parse(raw)), {
 *   name: 'order_parse',
 *   labels: successLabels,
 * })
 * ```
 */
export function instrument<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: InstrumentOptions<R> = {}
): InstrumentedFn<A, R> {
  const metricNames = resolveNames(fn, options)
  const { counterName, histogramName } = metricNames
  const extractor: LabelExtractor<R> = options.labels ?? noLabels

  const wrapped = function (this: unknown, ...args: A): R {
    return track(counterName, histogramName, extractor, () => fn.apply(this, args))
  }
  return Object.assign(wrapped, { metricNames })
}

/**
 * Wraps an asynchronous function. The recorded duration runs until the
 * returned promise settles.
 *
 * @param fn - The function to instrument
 * @param options - Naming and label options; `labels` applies to the resolved value
 * @returns An async function that records metrics per call
 */
export function instrumentAsync<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: InstrumentOptions<R> = {}
): InstrumentedFn<A, Promise<R>> {
  const metricNames = resolveNames(fn, options)
  const { counterName, histogramName } = metricNames
  const extractor: LabelExtractor<R> = options.labels ?? noLabels

  const wrapped = function (this: unknown, ...args: A): Promise<R> {
    return trackAsync(counterName, histogramName, extractor, () => fn.apply(this, args))
  }
  return Object.assign(wrapped, { metricNames })
}
