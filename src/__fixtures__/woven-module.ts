/**
 * Test helpers that weave a source text and evaluate the result in process.
 */

import * as vm from 'node:vm'
import ts from 'typescript'
import { DEFAULT_RUNTIME_MODULE } from '../config/options.js'
import * as runtime from '../runtime/index.js'
import { weaveSource, type WeaveResult, type WeaveSourceOptions } from '../transform/weave.js'

/**
 * A woven source text, compiled to CommonJS and evaluated.
 */
export interface WovenModule {
  exports: Record<string, unknown>
  result: WeaveResult
}

/**
 * Weaves `sourceText`, transpiles the output to CommonJS and runs it. Imports
 * of the runtime module resolve to the runtime sources; other imports must be
 * listed in `modules`.
 *
 * @param sourceText - TypeScript source with annotated declarations
 * @param options - Weaving options
 * @param modules - Additional modules the woven code may import, by specifier
 */
export function loadWovenModule(
  sourceText: string,
  options: WeaveSourceOptions = {},
  modules: Record<string, unknown> = {}
): WovenModule {
  const result = weaveSource(sourceText, options)
  const { outputText } = ts.transpileModule(result.code, {
    compilerOptions: { module: ts.ModuleKind.CommonJS, target: ts.ScriptTarget.ES2022 },
  })

  const moduleExports: Record<string, unknown> = {}
  const requireModule = (specifier: string): unknown => {
    if (specifier === (options.runtimeModule ?? DEFAULT_RUNTIME_MODULE)) {
      return runtime
    }
    if (specifier in modules) {
      return modules[specifier]
    }
    throw new Error(`unexpected import of ${specifier}`)
  }

  const factory: unknown = vm.runInThisContext(`(function (exports, require) {\n${outputText}\n})`)
  if (typeof factory !== 'function') {
    throw new Error('woven module did not compile to a function')
  }
  factory(moduleExports, requireModule)
  return { exports: moduleExports, result }
}

/**
 * Returns a callable for an exported function of a woven module.
 */
export function exportedFunction(moduleExports: Record<string, unknown>, name: string): (...args: unknown[]) => unknown {
  const value = moduleExports[name]
  if (typeof value !== 'function') {
    throw new Error(`export ${name} is not a function`)
  }
  return (...args: unknown[]): unknown => Reflect.apply(value, undefined, args)
}

/**
 * Constructs an exported class of a woven module.
 */
export function constructExport(moduleExports: Record<string, unknown>, name: string, args: unknown[] = []): object {
  const value = moduleExports[name]
  if (typeof value !== 'function') {
    throw new Error(`export ${name} is not a class`)
  }
  const instance: unknown = Reflect.construct(value, args)
  if (typeof instance !== 'object' || instance === null) {
    throw new Error(`export ${name} did not construct an object`)
  }
  return instance
}

/**
 * Calls a method on an instance with the instance as `this`.
 */
export function invokeMethod(instance: object, name: string, ...args: unknown[]): unknown {
  const method: unknown = Reflect.get(instance, name)
  if (typeof method !== 'function') {
    throw new Error(`${name} is not a method`)
  }
  return Reflect.apply(method, instance, args)
}
