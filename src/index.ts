/**
 * Main entry point for metric-weaver.
 *
 * Build-time API: the transformer, the in-memory weaver, the label
 * capabilities it dispatches on, and the naming and argument helpers behind
 * them. Runtime helpers live in `metric-weaver/runtime` and are re-exported
 * here for convenience.
 */

// Error types
export {
  InstrumentArgumentError,
  DuplicateArgumentError,
  UnrecognizedArgumentError,
  MalformedArgumentError,
  UnsupportedDeclarationError,
  WeaverConfigError,
  normalizeError,
} from './errors.js'
export type { SourceLocation } from './errors.js'

// Logging
export { configureLogging, resetLogging } from './logging/index.js'
export type { Logger } from './logging/index.js'

// Configuration
export { parseInstrumentArguments, INSTRUMENT_ARGUMENTS } from './config/arguments.js'
export type { InstrumentationConfig } from './config/arguments.js'
export {
  WeaverOptionsSchema,
  resolveWeaverOptions,
  DEFAULT_RUNTIME_MODULE,
  DEFAULT_TAG_NAME,
} from './config/options.js'
export type { WeaverOptions, ResolvedWeaverOptions } from './config/options.js'

// Metric names
export {
  deriveMetricNames,
  metricNamesFromBase,
  baseNameFromPath,
  baseNameFromQualifiedName,
  COUNTER_SUFFIX,
  HISTOGRAM_SUFFIX,
} from './naming/metric-names.js'
export type { MetricNames } from './naming/metric-names.js'
export { declarationPathOf, findDeclarationPath, moduleSegments } from './naming/declaration-path.js'

// Label capabilities
export {
  outcomeCapability,
  successOutcomeCapability,
  defaultCapability,
  BUILTIN_CAPABILITIES,
  createCapabilityRegistry,
  resolveLabelCapability,
  isDiscriminatedOutcome,
} from './labels/capabilities.js'
export type { LabelCapability, LabelExtractorReference, CapabilityContext } from './labels/capabilities.js'

// Transformer
export { createInstrumentTransformer } from './transform/transformer.js'
export { weaveSource, DEFAULT_WEAVE_COMPILER_OPTIONS } from './transform/weave.js'
export type { WeaveSourceOptions, WeaveResult } from './transform/weave.js'
export type { InstrumentedFunction, EvaluationKind } from './transform/types.js'

// Runtime
export * from './runtime/index.js'
