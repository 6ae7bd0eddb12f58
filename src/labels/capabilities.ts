/**
 * Build-time label capability dispatch.
 *
 * Each capability describes a family of return types and names the runtime
 * extractor that labels values of that family. For every instrumented
 * function the transformer asks the type checker for the return type and
 * selects the most specific capability it satisfies, so the generated code
 * references one extractor directly and never inspects types at runtime.
 */

import ts from 'typescript'

/**
 * Reference to a runtime LabelExtractor export.
 */
export interface LabelExtractorReference {
  /**
   * Name of the exported extractor.
   */
  readonly exportName: string

  /**
   * Module the extractor is exported from. Defaults to the runtime module.
   */
  readonly module?: string
}

/**
 * Information a capability may use to decide whether it applies.
 */
export interface CapabilityContext {
  readonly checker: ts.TypeChecker

  /**
   * The declaration being instrumented.
   */
  readonly location: ts.Node
}

/**
 * A label-extraction capability.
 *
 * @example
 * ```typescript
 * const httpStatus: LabelCapability = {
 *   id: 'http-status',
 *   priority: 50,
 *   extractor: { exportName: 'statusClassLabels', module: './metrics/labels.js' },
 *   appliesTo: (type, { checker }) => checker.getPropertyOfType(type, 'status') !== undefined,
 * }
 * ```
 */
export interface LabelCapability {
  readonly id: string

  /**
   * Higher priorities are consulted first. Capabilities of equal priority are
   * consulted in the order they were declared.
   */
  readonly priority: number

  readonly extractor: LabelExtractorReference

  /**
   * Whether values of `type` can be labeled by this capability.
   *
   * @param type - The function's return type; for async functions and
   *   functions returning promises, the awaited type
   */
  appliesTo(type: ts.Type, context: CapabilityContext): boolean
}

/**
 * Values of a boolean-literal-typed property, or undefined when the type
 * holds anything but `true` and `false`.
 */
function booleanLiterals(type: ts.Type, checker: ts.TypeChecker): string[] | undefined {
  if (type.isUnion()) {
    const values: string[] = []
    for (const member of type.types) {
      const memberValues = booleanLiterals(member, checker)
      if (!memberValues) {
        return undefined
      }
      values.push(...memberValues)
    }
    return values
  }
  if (type.flags & ts.TypeFlags.BooleanLiteral) {
    return [checker.typeToString(type)]
  }
  return undefined
}

/**
 * Tests whether a type is a two-variant outcome discriminated by a boolean
 * property: a union whose every member carries `discriminant` typed with
 * boolean literals only, with both `true` and `false` present.
 *
 * @param type - Type to test
 * @param discriminant - Property name, such as `ok` or `success`
 * @param context - Checker and location
 */
export function isDiscriminatedOutcome(type: ts.Type, discriminant: string, context: CapabilityContext): boolean {
  if (!type.isUnion()) {
    return false
  }

  const { checker, location } = context
  const seen = new Set<string>()
  for (const member of type.types) {
    const property = checker.getPropertyOfType(member, discriminant)
    if (!property) {
      return false
    }
    const values = booleanLiterals(checker.getTypeOfSymbolAtLocation(property, location), checker)
    if (!values) {
      return false
    }
    values.forEach((value) => seen.add(value))
  }
  return seen.has('true') && seen.has('false')
}

/**
 * Outcomes discriminated by `ok`, such as `{ ok: true; value: T } | { ok: false; error: E }`.
 */
export const outcomeCapability: LabelCapability = {
  id: 'outcome',
  priority: 100,
  extractor: { exportName: 'outcomeLabels' },
  appliesTo: (type, context) => isDiscriminatedOutcome(type, 'ok', context),
}

/**
 * Outcomes discriminated by `success`, such as the result of zod's `safeParse`.
 */
export const successOutcomeCapability: LabelCapability = {
  id: 'success-outcome',
  priority: 90,
  extractor: { exportName: 'successLabels' },
  appliesTo: (type, context) => isDiscriminatedOutcome(type, 'success', context),
}

/**
 * Applies to every type and yields no labels.
 */
export const defaultCapability: LabelCapability = {
  id: 'default',
  priority: 0,
  extractor: { exportName: 'noLabels' },
  appliesTo: () => true,
}

export const BUILTIN_CAPABILITIES: readonly LabelCapability[] = [
  outcomeCapability,
  successOutcomeCapability,
  defaultCapability,
]

/**
 * Orders capabilities for resolution: custom ones join the built-ins, then
 * all are sorted by descending priority. The sort is stable, so declaration
 * order breaks ties and custom capabilities win ties against built-ins.
 *
 * @param custom - Additional capabilities
 * @returns Capabilities in the order they are consulted
 */
export function createCapabilityRegistry(custom: readonly LabelCapability[] = []): readonly LabelCapability[] {
  return [...custom, ...BUILTIN_CAPABILITIES].sort((a, b) => b.priority - a.priority)
}

/**
 * Selects the capability for a return type.
 *
 * @param type - The function's (awaited) return type
 * @param registry - Capabilities in consultation order
 * @param context - Checker and location
 * @returns The first applicable capability; the default when none applies
 */
export function resolveLabelCapability(
  type: ts.Type,
  registry: readonly LabelCapability[],
  context: CapabilityContext
): LabelCapability {
  return registry.find((capability) => capability.appliesTo(type, context)) ?? defaultCapability
}
