import { z } from 'zod'
import { WeaverConfigError } from '../errors.js'
import type { LabelCapability } from '../labels/capabilities.js'
import type { InstrumentedFunction } from '../transform/types.js'

/**
 * Module specifier the generated code imports the runtime helpers from.
 */
export const DEFAULT_RUNTIME_MODULE = 'metric-weaver/runtime'

/**
 * JSDoc tag that marks a declaration for instrumentation.
 */
export const DEFAULT_TAG_NAME = 'instrument'

/**
 * Serializable transformer options. Unknown keys are stripped so the same
 * object can come straight from a compiler plugin entry.
 */
export const WeaverOptionsSchema = z.object({
  /**
   * Directory module paths are computed relative to. Defaults to the
   * compiler's `rootDir`, then to the program's current directory.
   */
  rootDir: z.string().min(1).optional(),
  runtimeModule: z.string().min(1).default(DEFAULT_RUNTIME_MODULE),
  tagName: z
    .string()
    .regex(/^[A-Za-z][\w-]*$/, 'tag names start with a letter and contain only letters, digits, `_` and `-`')
    .default(DEFAULT_TAG_NAME),
})

/**
 * Options accepted by the transformer.
 */
export type WeaverOptions = z.input<typeof WeaverOptionsSchema> & {
  /**
   * Extra label capabilities, consulted alongside the built-in ones.
   */
  capabilities?: readonly LabelCapability[]

  /**
   * Called once for every declaration the transformer rewrites.
   */
  onInstrumented?: (fn: InstrumentedFunction) => void
}

/**
 * Options after validation and defaulting.
 */
export type ResolvedWeaverOptions = z.output<typeof WeaverOptionsSchema> & {
  capabilities: readonly LabelCapability[]
  onInstrumented: ((fn: InstrumentedFunction) => void) | undefined
}

/**
 * Validates transformer options and applies defaults.
 *
 * @param options - Options as given by the caller
 * @returns The resolved options
 * @throws WeaverConfigError when a serializable option is invalid
 */
export function resolveWeaverOptions(options: WeaverOptions = {}): ResolvedWeaverOptions {
  const { capabilities, onInstrumented, ...rest } = options
  const parsed = WeaverOptionsSchema.safeParse(rest)
  if (!parsed.success) {
    throw new WeaverConfigError(`invalid metric-weaver options\n${z.prettifyError(parsed.error)}`)
  }
  return {
    ...parsed.data,
    capabilities: capabilities ?? [],
    onInstrumented,
  }
}
