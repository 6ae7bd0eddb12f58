import { describe, it, expect } from 'vitest'
import { EMPTY_LABELS, ERR_LABELS, OK_LABELS, noLabels, outcomeLabels, successLabels } from '../labels.js'

describe('noLabels', () => {
  it('yields no labels for values and throws', () => {
    expect(noLabels.labels({ ok: true })).toEqual({})
    expect(noLabels.thrown).toEqual({})
  })
})

describe('outcomeLabels', () => {
  it('labels by the ok discriminant', () => {
    expect(outcomeLabels.labels({ ok: true })).toEqual({ result: 'ok' })
    expect(outcomeLabels.labels({ ok: false })).toEqual({ result: 'err' })
  })

  it('labels a throw as an error', () => {
    expect(outcomeLabels.thrown).toEqual({ result: 'err' })
  })

  it('returns shared label sets', () => {
    expect(outcomeLabels.labels({ ok: true })).toBe(OK_LABELS)
    expect(outcomeLabels.labels({ ok: false })).toBe(ERR_LABELS)
  })
})

describe('successLabels', () => {
  it('labels by the success discriminant', () => {
    expect(successLabels.labels({ success: true })).toBe(OK_LABELS)
    expect(successLabels.labels({ success: false })).toBe(ERR_LABELS)
    expect(successLabels.thrown).toBe(ERR_LABELS)
  })
})

describe('label sets', () => {
  it('are frozen', () => {
    expect(Object.isFrozen(EMPTY_LABELS)).toBe(true)
    expect(Object.isFrozen(OK_LABELS)).toBe(true)
    expect(Object.isFrozen(ERR_LABELS)).toBe(true)
  })
})
