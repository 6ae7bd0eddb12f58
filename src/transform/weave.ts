/**
 * In-memory weaving of a single source text.
 *
 * Builds a throwaway program around the text, so the transformer sees the
 * same types a real build would, and prints the rewritten file back as
 * TypeScript.
 */

import * as path from 'node:path'
import ts from 'typescript'
import type { WeaverOptions } from '../config/options.js'
import { createSourceProgram } from './program.js'
import { createInstrumentTransformer } from './transformer.js'
import type { InstrumentedFunction } from './types.js'

/**
 * Compiler options used when none are given. Only the ES2022 library is
 * loaded; pass `compilerOptions.lib` or `types` to see more.
 */
export const DEFAULT_WEAVE_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  lib: ['lib.es2022.d.ts'],
  types: [],
  strict: true,
  skipLibCheck: true,
  noEmit: true,
}

export type WeaveSourceOptions = WeaverOptions & {
  /**
   * Name of the source file, relative to `rootDir` (or the current directory).
   * Its module path is part of derived metric names. Defaults to `module.ts`.
   */
  fileName?: string

  /**
   * Compiler options merged over DEFAULT_WEAVE_COMPILER_OPTIONS.
   */
  compilerOptions?: ts.CompilerOptions
}

export interface WeaveResult {
  /**
   * The rewritten source file, printed as TypeScript.
   */
  code: string

  /**
   * One record per rewritten declaration, in source order of completion
   * (nested declarations before the ones enclosing them).
   */
  instrumented: InstrumentedFunction[]

  /**
   * Syntactic and semantic errors of the original source text.
   */
  diagnostics: readonly ts.Diagnostic[]
}

/**
 * Weaves metrics into the annotated declarations of a source text.
 *
 * @param sourceText - TypeScript source
 * @param options - Transformer options plus file name and compiler options
 * @returns The rewritten code and what was instrumented
 * @throws InstrumentArgumentError or UnsupportedDeclarationError for invalid annotations
 *
 * @example
 * ```typescript
 * const { code } = weaveSource(
 *   '/** @instrument name="req_latency" *\/ export function handle(): void {}'
 * )
 * ```
 */
export function weaveSource(sourceText: string, options: WeaveSourceOptions = {}): WeaveResult {
  const { fileName = 'module.ts', compilerOptions, onInstrumented, ...weaverOptions } = options
  const resolvedCompilerOptions: ts.CompilerOptions = { ...DEFAULT_WEAVE_COMPILER_OPTIONS, ...compilerOptions }

  const baseDir = path.resolve(ts.sys.getCurrentDirectory(), weaverOptions.rootDir ?? '.')
  const { program, sourceFile } = createSourceProgram(sourceText, path.resolve(baseDir, fileName), resolvedCompilerOptions)
  const diagnostics = [...program.getSyntacticDiagnostics(sourceFile), ...program.getSemanticDiagnostics(sourceFile)]

  const instrumented: InstrumentedFunction[] = []
  const transformer = createInstrumentTransformer(program, {
    ...weaverOptions,
    onInstrumented: (fn) => {
      instrumented.push(fn)
      onInstrumented?.(fn)
    },
  })

  const result = ts.transform(sourceFile, [transformer], resolvedCompilerOptions)
  try {
    const [transformed = sourceFile] = result.transformed
    const code = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed }).printFile(transformed)
    return { code, instrumented, diagnostics }
  } finally {
    result.dispose()
  }
}
