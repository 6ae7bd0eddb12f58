/**
 * Metric identifiers for instrumented functions.
 *
 * The suffixes below form a fixed external contract: dashboards and alerts
 * are written against `<base>_total` and `<base>_duration_seconds`.
 */

import type { InstrumentationConfig } from '../config/arguments.js'

export const COUNTER_SUFFIX = '_total'
export const HISTOGRAM_SUFFIX = '_duration_seconds'

/**
 * Separator that replaces path separators in derived base names.
 */
export const BASE_NAME_SEPARATOR = '_'

/**
 * Counter and histogram names of one instrumented function.
 */
export interface MetricNames {
  readonly counterName: string
  readonly histogramName: string
}

/**
 * Builds both metric names from a shared base name.
 */
export function metricNamesFromBase(baseName: string): MetricNames {
  return {
    counterName: `${baseName}${COUNTER_SUFFIX}`,
    histogramName: `${baseName}${HISTOGRAM_SUFFIX}`,
  }
}

/**
 * Joins declaration path segments into a base name.
 *
 * @param declarationPath - Nested scope names, outermost first
 * @returns The segments joined with underscores
 */
export function baseNameFromPath(declarationPath: readonly string[]): string {
  return declarationPath.join(BASE_NAME_SEPARATOR)
}

/**
 * Replaces every separator sequence of a qualified name with a single underscore.
 * Other characters pass through untouched, including ones a metrics backend
 * may reject.
 *
 * @param qualifiedName - A name such as `svc::create_user` or `svc.createUser`
 * @param separator - The path separator used in `qualifiedName`
 * @returns The base name
 *
 * @example
 * ```typescript
 * baseNameFromQualifiedName('svc::create_user', '::') // 'svc_create_user'
 * ```
 */
export function baseNameFromQualifiedName(qualifiedName: string, separator: string): string {
  if (separator === '') {
    return qualifiedName
  }
  return baseNameFromPath(qualifiedName.split(separator))
}

/**
 * Derives the metric names of a function.
 *
 * An explicit `name` argument is used verbatim as the base; otherwise the
 * declaration path is.
 *
 * @param config - Parsed annotation arguments
 * @param declarationPath - Nested scope names of the function, outermost first
 * @returns Counter and histogram names sharing one base
 */
export function deriveMetricNames(config: InstrumentationConfig, declarationPath: readonly string[]): MetricNames {
  return metricNamesFromBase(config.name ?? baseNameFromPath(declarationPath))
}
