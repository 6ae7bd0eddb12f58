/**
 * Types describing the result of rewriting annotated declarations.
 */

import type { MetricNames } from '../naming/metric-names.js'

/**
 * How an instrumented body produces its value.
 *
 * - `direct`: evaluated synchronously
 * - `async`: an `async` body, driven to completion before timing stops
 * - `thenable`: a non-`async` body returning a native promise, timed until it settles
 */
export type EvaluationKind = 'direct' | 'async' | 'thenable'

/**
 * Record of one rewritten declaration.
 */
export interface InstrumentedFunction {
  /** Source file the declaration lives in. */
  fileName: string
  /** 1-based line of the declaration. */
  line: number
  /** Module segments and enclosing scope names, outermost first. */
  declarationPath: string[]
  /** Names the generated code reports under. */
  metricNames: MetricNames
  /** Id of the label capability selected for the return type. */
  capability: string
  evaluation: EvaluationKind
}
