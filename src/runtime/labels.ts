/**
 * Runtime label extractors.
 *
 * The transformer picks one extractor per instrumented function from its
 * statically known return type, so no extractor here inspects the type of the
 * value it receives. Extractors return shared frozen label sets and never
 * allocate per call.
 */

/**
 * Ordered label key/value pairs attached to one observation.
 */
export type LabelSet = Readonly<Record<string, string>>

/**
 * Label key used for outcome-shaped return values.
 */
export const RESULT_LABEL = 'result'

export type ResultLabelValue = 'ok' | 'err'

/**
 * Derives labels from the value an instrumented function produced.
 */
export interface LabelExtractor<T> {
  /**
   * Labels for a value that was returned (or a promise that resolved).
   */
  readonly labels: (value: T) => LabelSet

  /**
   * Labels for a call that threw (or a promise that rejected).
   */
  readonly thrown: LabelSet
}

/**
 * Value carrying an `ok` discriminant, such as `{ ok: true; value } | { ok: false; error }`.
 */
export interface OkDiscriminated {
  readonly ok: boolean
}

/**
 * Value carrying a `success` discriminant, such as the result of zod's `safeParse`.
 */
export interface SuccessDiscriminated {
  readonly success: boolean
}

export const EMPTY_LABELS: LabelSet = Object.freeze({})
export const OK_LABELS: LabelSet = Object.freeze({ [RESULT_LABEL]: 'ok' })
export const ERR_LABELS: LabelSet = Object.freeze({ [RESULT_LABEL]: 'err' })

/**
 * Default extractor: applies to every value and yields no labels.
 */
export const noLabels: LabelExtractor<unknown> = {
  labels: () => EMPTY_LABELS,
  thrown: EMPTY_LABELS,
}

/**
 * Labels `ok`-discriminated outcomes with `result="ok"` or `result="err"`.
 * Only the discriminant is read; payloads are never touched.
 */
export const outcomeLabels: LabelExtractor<OkDiscriminated> = {
  labels: (value) => (value.ok ? OK_LABELS : ERR_LABELS),
  thrown: ERR_LABELS,
}

/**
 * Labels `success`-discriminated outcomes with `result="ok"` or `result="err"`.
 */
export const successLabels: LabelExtractor<SuccessDiscriminated> = {
  labels: (value) => (value.success ? OK_LABELS : ERR_LABELS),
  thrown: ERR_LABELS,
}
