/**
 * Compiler plugin entry point (`metric-weaver/transformer`).
 *
 * Compilers that load `before` transformers by module path call the default
 * export with the program and the plugin's configuration entry:
 *
 * ```json
 * {
 *   "compilerOptions": {
 *     "plugins": [{ "transform": "metric-weaver/transformer", "rootDir": "src" }]
 *   }
 * }
 * ```
 */

import type ts from 'typescript'
import type { WeaverOptions } from './config/options.js'
import { createInstrumentTransformer } from './transform/transformer.js'

/**
 * A plugin configuration entry. Keys other than the weaver options, such as
 * `transform`, belong to the loader and are ignored.
 */
export type PluginConfig = WeaverOptions & Record<string, unknown>

/**
 * Creates the metric-weaver `before` transformer for a program.
 *
 * @param program - The program being emitted
 * @param config - Plugin configuration entry
 * @returns The transformer factory
 */
export default function metricWeaverPlugin(
  program: ts.Program,
  config: PluginConfig = {}
): ts.TransformerFactory<ts.SourceFile> {
  return createInstrumentTransformer(program, config)
}
