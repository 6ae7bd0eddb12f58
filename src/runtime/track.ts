/**
 * Call tracking used by instrumented functions.
 *
 * The transformer rewrites the body of every annotated function into a call
 * to one of the three `track` variants below, chosen once per function at
 * build time:
 *
 * - `track` for bodies that evaluate directly
 * - `trackAsync` for `async` bodies, driven to completion before timing stops
 * - `trackThenable` for non-`async` functions returning a promise, which is
 *   observed on a side chain and handed back unchanged
 *
 * Each call records one histogram observation (elapsed seconds) and one
 * counter increment with the same labels, then returns or rethrows exactly
 * what the body produced.
 */

import { normalizeError } from '../errors.js'
import { logger } from '../logging/index.js'
import { EMPTY_LABELS, type LabelExtractor, type LabelSet } from './labels.js'
import { getMetricsSink } from './sink.js'

/**
 * Elapsed seconds since a `performance.now()` timestamp.
 */
function secondsSince(start: number): number {
  return (performance.now() - start) / 1000
}

/**
 * Applies an extractor to a produced value. A value that does not have the
 * shape its static type promised is reported without labels.
 */
function labelsOf<T>(extractor: LabelExtractor<T>, value: T): LabelSet {
  try {
    return extractor.labels(value)
  } catch (error) {
    logger.warn(`error=<${normalizeError(error).message}> | failed to extract labels, reporting without labels`)
    return EMPTY_LABELS
  }
}

/**
 * Reports one call to the metrics sink. Sink failures are logged and dropped
 * so they never change the outcome of the instrumented call.
 */
function emit(counterName: string, histogramName: string, duration: number, labels: LabelSet): void {
  const sink = getMetricsSink()
  try {
    sink.recordHistogram(histogramName, duration, labels)
  } catch (error) {
    logger.warn(`metric=<${histogramName}>, error=<${normalizeError(error).message}> | failed to record histogram`)
  }
  try {
    sink.incrementCounter(counterName, labels)
  } catch (error) {
    logger.warn(`metric=<${counterName}>, error=<${normalizeError(error).message}> | failed to increment counter`)
  }
}

/**
 * Times and counts a directly evaluated body.
 *
 * @param counterName - Name of the invocation counter
 * @param histogramName - Name of the duration histogram
 * @param extractor - Label extractor selected for the body's return type
 * @param body - The original function body
 * @returns The body's return value, unchanged
 */
export function track<T>(counterName: string, histogramName: string, extractor: LabelExtractor<T>, body: () => T): T {
  const start = performance.now()
  let value: T
  try {
    value = body()
  } catch (error) {
    emit(counterName, histogramName, secondsSince(start), extractor.thrown)
    throw error
  }
  emit(counterName, histogramName, secondsSince(start), labelsOf(extractor, value))
  return value
}

/**
 * Times and counts an `async` body. The duration covers every suspension of
 * the body, not only the time it spends running.
 *
 * @param counterName - Name of the invocation counter
 * @param histogramName - Name of the duration histogram
 * @param extractor - Label extractor selected for the body's awaited return type
 * @param body - The original function body, as an async function
 * @returns The body's resolved value, unchanged
 */
export async function trackAsync<T>(
  counterName: string,
  histogramName: string,
  extractor: LabelExtractor<T>,
  body: () => Promise<T>
): Promise<T> {
  const start = performance.now()
  let value: T
  try {
    value = await body()
  } catch (error) {
    emit(counterName, histogramName, secondsSince(start), extractor.thrown)
    throw error
  }
  emit(counterName, histogramName, secondsSince(start), labelsOf(extractor, value))
  return value
}

/**
 * Times and counts a non-`async` body that returns a promise.
 *
 * The promise the body returned is handed back as is, so its identity and any
 * extra members survive. Settlement is observed on a separate chain whose
 * rejection handler only records metrics; the caller remains responsible for
 * handling the rejection of the returned promise.
 *
 * A value that is not a native promise is never subscribed to, since calling
 * `then` on a lazy thenable would run its work again. It is recorded at once,
 * without labels, and returned untouched.
 *
 * @param counterName - Name of the invocation counter
 * @param histogramName - Name of the duration histogram
 * @param extractor - Label extractor selected for the promise's resolved type
 * @param body - The original function body
 * @returns The promise the body returned
 */
export function trackThenable<T, P extends PromiseLike<T>>(
  counterName: string,
  histogramName: string,
  extractor: LabelExtractor<T>,
  body: () => P
): P {
  const start = performance.now()
  let promise: P
  try {
    promise = body()
  } catch (error) {
    emit(counterName, histogramName, secondsSince(start), extractor.thrown)
    throw error
  }
  if (!(promise instanceof Promise)) {
    emit(counterName, histogramName, secondsSince(start), EMPTY_LABELS)
    return promise
  }
  void promise.then(
    (value) => emit(counterName, histogramName, secondsSince(start), labelsOf(extractor, value)),
    () => emit(counterName, histogramName, secondsSince(start), extractor.thrown)
  )
  return promise
}
