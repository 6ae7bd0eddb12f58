import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { configureLogging, resetLogging } from '../../logging/index.js'
import { InMemoryMetricsSink, configureMetricsSink, resetMetricsSink } from '../../runtime/sink.js'
import { constructExport, exportedFunction, invokeMethod, loadWovenModule } from '../../__fixtures__/woven-module.js'

const OUTCOME = 'type Outcome = { ok: true; value: number } | { ok: false; error: string }'

function source(...lines: string[]): string {
  return lines.join('\n')
}

describe('woven functions', () => {
  let sink: InMemoryMetricsSink

  beforeEach(() => {
    sink = new InMemoryMetricsSink()
    configureMetricsSink(sink)
  })

  afterEach(() => {
    resetMetricsSink()
    resetLogging()
  })

  it('return the original value and record one call', () => {
    const { exports } = loadWovenModule(
      source('/** @instrument */', 'export function add(a: number, b: number): number {', '  return a + b', '}')
    )

    expect(exportedFunction(exports, 'add')(2, 3)).toBe(5)
    expect(sink.counterValue('module_add_total')).toBe(1)
    expect(sink.histogramValues('module_add_duration_seconds')).toHaveLength(1)
  })

  it('label outcomes by their discriminant', () => {
    const { exports } = loadWovenModule(
      source(
        OUTCOME,
        '/** @instrument name="divide" */',
        'export function divide(a: number, b: number): Outcome {',
        "  return b === 0 ? { ok: false, error: 'division by zero' } : { ok: true, value: a / b }",
        '}'
      )
    )
    const divide = exportedFunction(exports, 'divide')

    expect(divide(6, 3)).toEqual({ ok: true, value: 2 })
    expect(divide(1, 0)).toEqual({ ok: false, error: 'division by zero' })
    expect(sink.counterValue('divide_total', { result: 'ok' })).toBe(1)
    expect(sink.counterValue('divide_total', { result: 'err' })).toBe(1)
    expect(sink.records.map(({ labels }) => labels)).toEqual([
      { result: 'ok' },
      { result: 'ok' },
      { result: 'err' },
      { result: 'err' },
    ])
  })

  it('leave values without an outcome type unlabeled', () => {
    const { exports } = loadWovenModule(
      source(
        'interface Status { ok: boolean }',
        '/** @instrument name="status" */',
        'export function status(): Status {',
        '  return { ok: false }',
        '}'
      )
    )

    exportedFunction(exports, 'status')()

    expect(sink.records[1]).toEqual({ kind: 'counter', name: 'status_total', labels: {} })
  })

  it('record and rethrow exceptions', () => {
    const { exports } = loadWovenModule(
      source(
        OUTCOME,
        '/** @instrument name="fail" */',
        'export function fail(): Outcome {',
        "  throw new Error('boom')",
        '}'
      )
    )

    expect(() => exportedFunction(exports, 'fail')()).toThrow('boom')
    expect(sink.counterValue('fail_total', { result: 'err' })).toBe(1)
  })

  it('time async functions until they complete', async () => {
    const { exports } = loadWovenModule(
      source(
        OUTCOME,
        'declare function setTimeout(callback: () => void, ms: number): unknown',
        '/** @instrument name="sleepy" */',
        'export async function sleepy(ms: number): Promise<Outcome> {',
        '  await new Promise<void>((resolve) => setTimeout(resolve, ms))',
        '  return { ok: true, value: ms }',
        '}'
      )
    )

    await expect(exportedFunction(exports, 'sleepy')(50)).resolves.toEqual({ ok: true, value: 50 })

    const [duration] = sink.histogramValues('sleepy_duration_seconds')
    expect(duration).toBeGreaterThanOrEqual(0.04)
    expect(sink.counterValue('sleepy_total', { result: 'ok' })).toBe(1)
  })

  it('record async rejections with error labels', async () => {
    const { exports } = loadWovenModule(
      source(
        OUTCOME,
        '/** @instrument name="reject" */',
        'export async function reject(): Promise<Outcome> {',
        "  throw new Error('nope')",
        '}'
      )
    )

    await expect(exportedFunction(exports, 'reject')()).rejects.toThrow('nope')
    expect(sink.counterValue('reject_total', { result: 'err' })).toBe(1)
  })

  it('return the same promise from non-async functions', async () => {
    const { exports } = loadWovenModule(
      source(
        'export const pending = Promise.resolve(7)',
        '/** @instrument name="later" */',
        'export function later(): Promise<number> {',
        '  return pending',
        '}'
      )
    )

    const returned = exportedFunction(exports, 'later')()

    expect(returned).toBe(exports.pending)
    await expect(returned).resolves.toBe(7)
    expect(sink.counterValue('later_total')).toBe(1)
  })

  it('return objects with a non-callable then untouched', () => {
    const { exports, result } = loadWovenModule(
      source(
        'interface Step { then: string }',
        '/** @instrument name="step" */',
        'export function step(): Step {',
        "  return { then: 'next' }",
        '}'
      )
    )

    expect(result.instrumented[0]?.evaluation).toBe('direct')
    expect(exportedFunction(exports, 'step')()).toEqual({ then: 'next' })
    expect(sink.counterValue('step_total')).toBe(1)
  })

  it('run lazy thenables only when the caller awaits them', async () => {
    const { exports, result } = loadWovenModule(
      source(
        'export class Query implements PromiseLike<number> {',
        '  runs = 0',
        '  then<A = number, B = never>(',
        '    onfulfilled?: ((value: number) => A | PromiseLike<A>) | null,',
        '    onrejected?: ((reason: unknown) => B | PromiseLike<B>) | null',
        '  ): PromiseLike<A | B> {',
        '    this.runs++',
        '    return Promise.resolve(this.runs * 10).then(onfulfilled, onrejected)',
        '  }',
        '}',
        '/** @instrument name="query" */',
        'export function query(): Query {',
        '  return new Query()',
        '}'
      )
    )

    const returned = exportedFunction(exports, 'query')()

    expect(result.instrumented[0]?.evaluation).toBe('direct')
    expect(returned).toHaveProperty('runs', 0)
    await expect(returned).resolves.toBe(10)
    expect(returned).toHaveProperty('runs', 1)
    expect(sink.counterValue('query_total')).toBe(1)
  })

  it('keep `this` for methods', () => {
    const { exports } = loadWovenModule(
      source(
        'export class Counter {',
        '  count = 0',
        '  /** @instrument */',
        '  increment(): number {',
        '    return ++this.count',
        '  }',
        '}'
      ),
      { fileName: 'counter.ts' }
    )
    const counter = constructExport(exports, 'Counter')

    expect(invokeMethod(counter, 'increment')).toBe(1)
    expect(invokeMethod(counter, 'increment')).toBe(2)
    expect(sink.counterValue('counter_Counter_increment_total')).toBe(2)
  })

  it('keep the arguments object', () => {
    const { exports } = loadWovenModule(
      source(
        '/** @instrument name="count_args" */',
        'export function countArgs(..._values: unknown[]): number {',
        '  return arguments.length',
        '}'
      )
    )

    expect(exportedFunction(exports, 'countArgs')(1, 2, 3)).toBe(3)
  })

  it('call extractors from custom capability modules', () => {
    const statusLabels = {
      labels: (value: { status: number }) => ({ status_class: `${Math.floor(value.status / 100)}xx` }),
      thrown: {},
    }
    const { exports } = loadWovenModule(
      source('interface Reply { status: number }', '/** @instrument */', 'export function reply(): Reply {', '  return { status: 404 }', '}'),
      {
        capabilities: [
          {
            id: 'http-status',
            priority: 50,
            extractor: { exportName: 'statusLabels', module: './labels.js' },
            appliesTo: (type, { checker }) => checker.getPropertyOfType(type, 'status') !== undefined,
          },
        ],
      },
      { './labels.js': { statusLabels } }
    )

    exportedFunction(exports, 'reply')()

    expect(sink.counterValue('module_reply_total', { status_class: '4xx' })).toBe(1)
  })

  it('return their value when the sink fails', () => {
    const warn = vi.fn()
    configureLogging({ debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() })
    configureMetricsSink({
      recordHistogram: () => {
        throw new Error('sink down')
      },
      incrementCounter: () => {
        throw new Error('sink down')
      },
    })
    const { exports } = loadWovenModule(
      source('/** @instrument name="safe" */', 'export function safe(): string {', "  return 'value'", '}')
    )

    expect(exportedFunction(exports, 'safe')()).toBe('value')
    expect(warn).toHaveBeenCalledTimes(2)
  })
})
