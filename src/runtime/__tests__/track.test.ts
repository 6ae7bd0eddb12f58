import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { configureLogging, resetLogging } from '../../logging/index.js'
import { EMPTY_LABELS, noLabels, outcomeLabels, type LabelExtractor } from '../labels.js'
import { InMemoryMetricsSink, configureMetricsSink, resetMetricsSink, type MetricsSink } from '../sink.js'
import { track, trackAsync, trackThenable } from '../track.js'

type Outcome = { ok: true; value: number } | { ok: false; error: string }

/**
 * Thenable that runs its work on every `then` call, like a query builder.
 */
class LazyQuery implements PromiseLike<number> {
  runs = 0

  then<A = number, B = never>(
    onfulfilled?: ((value: number) => A | PromiseLike<A>) | null,
    onrejected?: ((reason: unknown) => B | PromiseLike<B>) | null
  ): PromiseLike<A | B> {
    this.runs++
    return Promise.resolve(this.runs).then(onfulfilled, onrejected)
  }
}

const COUNTER = 'op_total'
const HISTOGRAM = 'op_duration_seconds'

function mockLogger() {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
  configureLogging(logger)
  return logger
}

describe('track', () => {
  let sink: InMemoryMetricsSink

  beforeEach(() => {
    sink = new InMemoryMetricsSink()
    configureMetricsSink(sink)
  })

  afterEach(() => {
    resetMetricsSink()
    resetLogging()
  })

  it('returns the body value and records one histogram and one counter', () => {
    vi.spyOn(performance, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1250)

    const value = track(COUNTER, HISTOGRAM, noLabels, () => 42)

    expect(value).toBe(42)
    expect(sink.records).toEqual([
      { kind: 'histogram', name: HISTOGRAM, value: 0.25, labels: {} },
      { kind: 'counter', name: COUNTER, labels: {} },
    ])
  })

  it('labels the value with the extractor', () => {
    const failure: Outcome = { ok: false, error: 'not found' }

    const value = track(COUNTER, HISTOGRAM, outcomeLabels, () => failure)

    expect(value).toBe(failure)
    expect(sink.counterValue(COUNTER, { result: 'err' })).toBe(1)
    expect(sink.records[0]).toMatchObject({ kind: 'histogram', labels: { result: 'err' } })
  })

  it('records and rethrows what the body throws', () => {
    const error = new Error('boom')

    expect(() =>
      track(COUNTER, HISTOGRAM, outcomeLabels, (): Outcome => {
        throw error
      })
    ).toThrow(error)
    expect(sink.counterValue(COUNTER, { result: 'err' })).toBe(1)
    expect(sink.histogramValues(HISTOGRAM)).toHaveLength(1)
  })

  it('uses empty labels for a throw when the extractor yields none', () => {
    expect(() =>
      track(COUNTER, HISTOGRAM, noLabels, () => {
        throw new Error('boom')
      })
    ).toThrow('boom')
    expect(sink.records[1]).toEqual({ kind: 'counter', name: COUNTER, labels: {} })
  })

  it('keeps the result when the sink fails', () => {
    const logger = mockLogger()
    const incrementCounter = vi.fn()
    const failing: MetricsSink = {
      recordHistogram: () => {
        throw new Error('sink down')
      },
      incrementCounter,
    }
    configureMetricsSink(failing)

    expect(track(COUNTER, HISTOGRAM, noLabels, () => 'value')).toBe('value')
    expect(logger.warn).toHaveBeenCalledWith('metric=<op_duration_seconds>, error=<sink down> | failed to record histogram')
    expect(incrementCounter).toHaveBeenCalledWith(COUNTER, EMPTY_LABELS)
  })

  it('reports without labels when the extractor fails', () => {
    const logger = mockLogger()
    const broken: LabelExtractor<number> = {
      labels: () => {
        throw new Error('bad shape')
      },
      thrown: EMPTY_LABELS,
    }

    expect(track(COUNTER, HISTOGRAM, broken, () => 1)).toBe(1)
    expect(logger.warn).toHaveBeenCalledWith('error=<bad shape> | failed to extract labels, reporting without labels')
    expect(sink.counterValue(COUNTER)).toBe(1)
  })
})

describe('trackAsync', () => {
  let sink: InMemoryMetricsSink

  beforeEach(() => {
    sink = new InMemoryMetricsSink()
    configureMetricsSink(sink)
  })

  afterEach(() => {
    resetMetricsSink()
  })

  it('resolves with the body value and labels it', async () => {
    const value = await trackAsync(COUNTER, HISTOGRAM, outcomeLabels, async (): Promise<Outcome> => ({ ok: true, value: 3 }))

    expect(value).toEqual({ ok: true, value: 3 })
    expect(sink.counterValue(COUNTER, { result: 'ok' })).toBe(1)
  })

  it('records nothing until the body settles', async () => {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const pending = trackAsync(COUNTER, HISTOGRAM, noLabels, async () => {
      await gate
      return 'done'
    })
    expect(sink.records).toEqual([])

    release()
    await expect(pending).resolves.toBe('done')
    expect(sink.counterValue(COUNTER)).toBe(1)
  })

  it('records and rethrows a rejection', async () => {
    await expect(
      trackAsync(COUNTER, HISTOGRAM, outcomeLabels, async (): Promise<Outcome> => {
        throw new Error('nope')
      })
    ).rejects.toThrow('nope')
    expect(sink.counterValue(COUNTER, { result: 'err' })).toBe(1)
  })
})

describe('trackThenable', () => {
  let sink: InMemoryMetricsSink

  beforeEach(() => {
    sink = new InMemoryMetricsSink()
    configureMetricsSink(sink)
  })

  afterEach(() => {
    resetMetricsSink()
  })

  it('returns the promise the body returned', async () => {
    const promise = Promise.resolve(7)

    const returned = trackThenable(COUNTER, HISTOGRAM, noLabels, () => promise)

    expect(returned).toBe(promise)
    await expect(returned).resolves.toBe(7)
    expect(sink.counterValue(COUNTER)).toBe(1)
  })

  it('labels the resolved value', async () => {
    const outcome: Outcome = { ok: false, error: 'missing' }

    await trackThenable(COUNTER, HISTOGRAM, outcomeLabels, () => Promise.resolve(outcome))

    expect(sink.counterValue(COUNTER, { result: 'err' })).toBe(1)
  })

  it('records a rejection and leaves it to the caller', async () => {
    const returned = trackThenable(COUNTER, HISTOGRAM, outcomeLabels, () => Promise.reject<Outcome>(new Error('nope')))

    await expect(returned).rejects.toThrow('nope')
    expect(sink.counterValue(COUNTER, { result: 'err' })).toBe(1)
  })

  it('returns other thenables without calling then', async () => {
    const query = new LazyQuery()

    const returned = trackThenable(COUNTER, HISTOGRAM, noLabels, () => query)

    expect(returned).toBe(query)
    expect(query.runs).toBe(0)
    expect(sink.records[1]).toEqual({ kind: 'counter', name: COUNTER, labels: {} })

    await expect(returned).resolves.toBe(1)
    expect(query.runs).toBe(1)
    expect(sink.counterValue(COUNTER)).toBe(1)
  })

  it('records and rethrows a synchronous throw', () => {
    expect(() =>
      trackThenable(COUNTER, HISTOGRAM, noLabels, (): Promise<number> => {
        throw new Error('early')
      })
    ).toThrow('early')
    expect(sink.counterValue(COUNTER)).toBe(1)
  })
})
