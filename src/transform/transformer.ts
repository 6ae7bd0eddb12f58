/**
 * TypeScript transformer that weaves metrics into annotated functions.
 *
 * A declaration marked with the `@instrument` JSDoc tag keeps its external
 * signature; only its body changes, into a call to one of the runtime `track`
 * helpers that receives the original body as an arrow function:
 *
 * ```typescript
 * /** @instrument *\/
 * export async function createUser(input: NewUser): Promise<Result<User, Error>> {
 *   return __weave.trackAsync("users_createUser_total", "users_createUser_duration_seconds",
 *     __weave.outcomeLabels, async () => { ... })
 * }
 * ```
 *
 * Metric names are string literals computed here, and the label extractor is
 * selected here from the return type, so the generated code does no naming or
 * type inspection of its own.
 */

import * as path from 'node:path'
import ts from 'typescript'
import { parseInstrumentArguments, type InstrumentationConfig } from '../config/arguments.js'
import { resolveWeaverOptions, type ResolvedWeaverOptions, type WeaverOptions } from '../config/options.js'
import { UnsupportedDeclarationError } from '../errors.js'
import {
  createCapabilityRegistry,
  defaultCapability,
  resolveLabelCapability,
  type LabelCapability,
} from '../labels/capabilities.js'
import { logger } from '../logging/index.js'
import { declarationPathOf, findDeclarationPath } from '../naming/declaration-path.js'
import { deriveMetricNames, type MetricNames } from '../naming/metric-names.js'
import { locationOf } from './location.js'
import type { EvaluationKind, InstrumentedFunction } from './types.js'

/**
 * Function-like declarations the transformer can rewrite.
 */
type InstrumentableFunction = ts.FunctionDeclaration | ts.MethodDeclaration | ts.FunctionExpression | ts.ArrowFunction

const RUNTIME_NAMESPACE = '__weave'
const CAPABILITY_NAMESPACE_PREFIX = '__weave_labels_'

const TRACK_HELPERS: Record<EvaluationKind, string> = {
  direct: 'track',
  async: 'trackAsync',
  thenable: 'trackThenable',
}

/**
 * Creates the transformer factory.
 *
 * The program must be the one the transformed source files belong to: its
 * type checker decides which label capability each return type gets.
 *
 * @param program - Program providing the type checker
 * @param options - Transformer options
 * @returns A `before` transformer for `program.emit` or `ts.transform`
 * @throws WeaverConfigError when the options are invalid
 *
 * @example
 * ```typescript
 * const program = ts.createProgram(rootNames, compilerOptions)
 * program.emit(undefined, undefined, undefined, false, {
 *   before: [createInstrumentTransformer(program, { rootDir: 'src' })],
 * })
 * ```
 */
export function createInstrumentTransformer(
  program: ts.Program,
  options: WeaverOptions = {}
): ts.TransformerFactory<ts.SourceFile> {
  const resolved = resolveWeaverOptions(options)
  const currentDirectory = program.getCurrentDirectory()
  const rootDir = path.resolve(currentDirectory, resolved.rootDir ?? program.getCompilerOptions().rootDir ?? '.')
  const shared: SharedState = {
    program,
    options: resolved,
    checker: program.getTypeChecker(),
    registry: createCapabilityRegistry(resolved.capabilities),
    rootDir,
  }

  return (context) => (sourceFile) => new SourceFileWeaver(shared, context).weave(sourceFile)
}

interface SharedState {
  program: ts.Program
  options: ResolvedWeaverOptions
  checker: ts.TypeChecker
  registry: readonly LabelCapability[]
  rootDir: string
}

/**
 * Rewrites the annotated declarations of one source file.
 */
class SourceFileWeaver {
  private readonly _factory: ts.NodeFactory
  private readonly _runtimeNamespace: ts.Identifier
  private readonly _capabilityNamespaces = new Map<string, ts.Identifier>()
  private _instrumented = 0

  constructor(
    private readonly _shared: SharedState,
    private readonly _context: ts.TransformationContext
  ) {
    this._factory = _context.factory
    this._runtimeNamespace = this._factory.createIdentifier(RUNTIME_NAMESPACE)
  }

  weave(sourceFile: ts.SourceFile): ts.SourceFile {
    const visited = ts.visitEachChild(sourceFile, this._visit, this._context)
    if (this._instrumented === 0) {
      return sourceFile
    }

    const statements = [...visited.statements]
    const prologueEnd = statements.findIndex((statement) => !(ts.isExpressionStatement(statement) && ts.isStringLiteral(statement.expression)))
    const insertAt = prologueEnd === -1 ? statements.length : prologueEnd
    statements.splice(insertAt, 0, ...this._imports())
    return this._factory.updateSourceFile(visited, statements)
  }

  private readonly _visit = (node: ts.Node): ts.VisitResult<ts.Node> => {
    if (ts.isFunctionDeclaration(node) || ts.isMethodDeclaration(node)) {
      const config = this._configOf(node)
      if (config) {
        return this._instrument(node, ts.visitEachChild(node, this._visit, this._context), config)
      }
    } else if (ts.isVariableStatement(node)) {
      const config = this._configOf(node)
      if (config) {
        return this._instrumentVariableStatement(node, config)
      }
    } else if (ts.isPropertyDeclaration(node)) {
      const config = this._configOf(node)
      if (config) {
        return this._instrumentProperty(node, config)
      }
    } else if (ts.isAccessor(node) || ts.isConstructorDeclaration(node)) {
      if (this._configOf(node)) {
        throw new UnsupportedDeclarationError(
          'accessors and constructors cannot be instrumented; annotate a method or function instead',
          locationOf(node)
        )
      }
    }
    return ts.visitEachChild(node, this._visit, this._context)
  }

  /**
   * Parses the annotation of a node, or returns undefined when it has none.
   * Repeated tags are read as one argument list, so a `name` given in two
   * tags is a duplicate.
   */
  private _configOf(node: ts.Node): InstrumentationConfig | undefined {
    const tags = ts.getJSDocTags(node).filter((tag) => tag.tagName.text === this._shared.options.tagName)
    const first = tags[0]
    if (!first) {
      return undefined
    }

    const argumentText = tags
      .map((tag) => ts.getTextOfJSDocComment(tag.comment)?.trim() ?? '')
      .filter((text) => text !== '')
      .join(', ')
    return parseInstrumentArguments(argumentText, locationOf(first))
  }

  private _instrumentVariableStatement(node: ts.VariableStatement, config: InstrumentationConfig): ts.VariableStatement {
    const declarations = node.declarationList.declarations
    const target = declarations[0]
    if (declarations.length !== 1 || !target?.initializer || !isFunctionExpressionLike(target.initializer)) {
      throw new UnsupportedDeclarationError(
        'an annotated variable statement must declare exactly one function or arrow function',
        locationOf(node)
      )
    }

    const original = target.initializer
    const visited = ts.visitEachChild(node, this._visit, this._context)
    const visitedDeclaration = visited.declarationList.declarations[0]
    const visitedInitializer = visitedDeclaration?.initializer
    if (!visitedDeclaration || !visitedInitializer || !isFunctionExpressionLike(visitedInitializer)) {
      return visited
    }

    const initializer = this._instrument(original, visitedInitializer, config)
    return this._factory.updateVariableStatement(
      visited,
      visited.modifiers,
      this._factory.updateVariableDeclarationList(visited.declarationList, [
        this._factory.updateVariableDeclaration(
          visitedDeclaration,
          visitedDeclaration.name,
          visitedDeclaration.exclamationToken,
          visitedDeclaration.type,
          initializer
        ),
      ])
    )
  }

  private _instrumentProperty(node: ts.PropertyDeclaration, config: InstrumentationConfig): ts.PropertyDeclaration {
    const original = node.initializer
    if (!original || !isFunctionExpressionLike(original)) {
      throw new UnsupportedDeclarationError(
        'an annotated property must be initialized with a function or arrow function',
        locationOf(node)
      )
    }

    const visited = ts.visitEachChild(node, this._visit, this._context)
    const visitedInitializer = visited.initializer
    if (!visitedInitializer || !isFunctionExpressionLike(visitedInitializer)) {
      return visited
    }

    return this._factory.updatePropertyDeclaration(
      visited,
      visited.modifiers,
      visited.name,
      visited.questionToken ?? visited.exclamationToken,
      visited.type,
      this._instrument(original, visitedInitializer, config)
    )
  }

  /**
   * Replaces the body of a function, keeping every other part of it.
   *
   * @param original - The parse tree node, used for type and position queries
   * @param visited - The node with its nested declarations already rewritten
   * @param config - Parsed annotation arguments
   */
  private _instrument<T extends InstrumentableFunction>(original: T, visited: T, config: InstrumentationConfig): T {
    if (original.asteriskToken) {
      throw new UnsupportedDeclarationError('generator functions cannot be instrumented', locationOf(original))
    }
    const body: ts.ConciseBody | undefined = visited.body
    if (!body) {
      throw new UnsupportedDeclarationError(
        'declarations without a body cannot be instrumented; annotate the implementation',
        locationOf(original)
      )
    }

    const declarationPath =
      config.name === undefined
        ? declarationPathOf(original, this._shared.rootDir)
        : (findDeclarationPath(original, this._shared.rootDir) ?? [])
    const metricNames = deriveMetricNames(config, declarationPath)
    const { evaluation, capability } = this._analyze(original)

    const call = this._trackCall(metricNames, evaluation, capability, body)
    const newBody = ts.isBlock(body) ? this._factory.createBlock([this._factory.createReturnStatement(call)], true) : call

    const { line } = locationOf(original)
    const record: InstrumentedFunction = {
      fileName: original.getSourceFile().fileName,
      line,
      declarationPath,
      metricNames,
      capability: capability.id,
      evaluation,
    }
    this._instrumented++
    logger.debug(
      `function=<${declarationPath.join('.')}>, counter=<${metricNames.counterName}>, capability=<${capability.id}>, evaluation=<${evaluation}> | instrumented function`
    )
    this._shared.options.onInstrumented?.(record)

    return this._withBody(visited, newBody)
  }

  /**
   * Decides how the body is evaluated and which capability labels its value.
   */
  private _analyze(original: InstrumentableFunction): { evaluation: EvaluationKind; capability: LabelCapability } {
    const { program, checker, registry } = this._shared
    const isAsync = ts.getModifiers(original)?.some((modifier) => modifier.kind === ts.SyntaxKind.AsyncKeyword) ?? false
    const signature = checker.getSignatureFromDeclaration(original)
    if (!signature) {
      return { evaluation: isAsync ? 'async' : 'direct', capability: defaultCapability }
    }

    const returnType = checker.getReturnTypeOfSignature(signature)
    const evaluation: EvaluationKind = isAsync ? 'async' : isNativePromise(returnType, checker, program) ? 'thenable' : 'direct'
    const labeledType = evaluation === 'direct' ? returnType : (checker.getAwaitedType(returnType) ?? returnType)
    const capability = resolveLabelCapability(labeledType, registry, { checker, location: original })
    return { evaluation, capability }
  }

  private _trackCall(
    metricNames: MetricNames,
    evaluation: EvaluationKind,
    capability: LabelCapability,
    body: ts.ConciseBody
  ): ts.CallExpression {
    const factory = this._factory
    const modifiers = evaluation === 'async' ? [factory.createModifier(ts.SyntaxKind.AsyncKeyword)] : undefined
    const thunk = factory.createArrowFunction(
      modifiers,
      undefined,
      [],
      undefined,
      factory.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
      body
    )

    return factory.createCallExpression(
      factory.createPropertyAccessExpression(this._runtimeNamespace, TRACK_HELPERS[evaluation]),
      undefined,
      [
        factory.createStringLiteral(metricNames.counterName),
        factory.createStringLiteral(metricNames.histogramName),
        this._extractorReference(capability),
        thunk,
      ]
    )
  }

  private _extractorReference(capability: LabelCapability): ts.Expression {
    const { exportName, module } = capability.extractor
    const namespace =
      module === undefined || module === this._shared.options.runtimeModule
        ? this._runtimeNamespace
        : this._capabilityNamespace(module)
    return this._factory.createPropertyAccessExpression(namespace, exportName)
  }

  private _capabilityNamespace(module: string): ts.Identifier {
    let namespace = this._capabilityNamespaces.get(module)
    if (!namespace) {
      namespace = this._factory.createIdentifier(`${CAPABILITY_NAMESPACE_PREFIX}${this._capabilityNamespaces.size}`)
      this._capabilityNamespaces.set(module, namespace)
    }
    return namespace
  }

  private _imports(): ts.ImportDeclaration[] {
    const namespaceImport = (namespace: ts.Identifier, module: string): ts.ImportDeclaration =>
      this._factory.createImportDeclaration(
        undefined,
        this._factory.createImportClause(false, undefined, this._factory.createNamespaceImport(namespace)),
        this._factory.createStringLiteral(module)
      )

    return [
      namespaceImport(this._runtimeNamespace, this._shared.options.runtimeModule),
      ...[...this._capabilityNamespaces].map(([module, namespace]) => namespaceImport(namespace, module)),
    ]
  }

  private _withBody<T extends InstrumentableFunction>(node: T, body: ts.ConciseBody): T {
    const updated = this._updateBody(node, body)
    if (!isSameKind(node, updated)) {
      throw new UnsupportedDeclarationError(`unexpected declaration kind ${ts.SyntaxKind[node.kind]}`)
    }
    return updated
  }

  private _updateBody(node: InstrumentableFunction, body: ts.ConciseBody): InstrumentableFunction {
    const factory = this._factory
    switch (node.kind) {
      case ts.SyntaxKind.FunctionDeclaration:
        return factory.updateFunctionDeclaration(
          node,
          node.modifiers,
          node.asteriskToken,
          node.name,
          node.typeParameters,
          node.parameters,
          node.type,
          asBlock(factory, body)
        )
      case ts.SyntaxKind.MethodDeclaration:
        return factory.updateMethodDeclaration(
          node,
          node.modifiers,
          node.asteriskToken,
          node.name,
          node.questionToken,
          node.typeParameters,
          node.parameters,
          node.type,
          asBlock(factory, body)
        )
      case ts.SyntaxKind.FunctionExpression:
        return factory.updateFunctionExpression(
          node,
          node.modifiers,
          node.asteriskToken,
          node.name,
          node.typeParameters,
          node.parameters,
          node.type,
          asBlock(factory, body)
        )
      case ts.SyntaxKind.ArrowFunction:
        return factory.updateArrowFunction(
          node,
          node.modifiers,
          node.typeParameters,
          node.parameters,
          node.type,
          node.equalsGreaterThanToken,
          body
        )
    }
  }
}

function isSameKind<T extends ts.Node>(node: T, other: ts.Node): other is T {
  return node.kind === other.kind
}

function asBlock(factory: ts.NodeFactory, body: ts.ConciseBody): ts.Block {
  return ts.isBlock(body) ? body : factory.createBlock([factory.createReturnStatement(body)], true)
}

function isFunctionExpressionLike(node: ts.Node): node is ts.FunctionExpression | ts.ArrowFunction {
  return ts.isFunctionExpression(node) || ts.isArrowFunction(node)
}

/**
 * Whether a type is the global `Promise` or a class or interface extending it.
 * Other thenables may start work on every `then` call, so they are evaluated
 * directly and returned without being observed.
 */
function isNativePromise(type: ts.Type, checker: ts.TypeChecker, program: ts.Program): boolean {
  const symbol = type.getSymbol()
  if (!symbol || type.flags & (ts.TypeFlags.Any | ts.TypeFlags.Unknown)) {
    return false
  }
  return extendsGlobalPromise(checker.getDeclaredTypeOfSymbol(symbol), checker, program, new Set())
}

function extendsGlobalPromise(
  type: ts.Type,
  checker: ts.TypeChecker,
  program: ts.Program,
  seen: Set<ts.Type>
): boolean {
  if (seen.has(type)) {
    return false
  }
  seen.add(type)

  const symbol = type.getSymbol()
  const isLibraryPromise =
    symbol?.getName() === 'Promise' &&
    (symbol.getDeclarations() ?? []).some((declaration) =>
      program.isSourceFileDefaultLibrary(declaration.getSourceFile())
    )
  if (isLibraryPromise) {
    return true
  }
  if (!type.isClassOrInterface()) {
    return false
  }
  return checker.getBaseTypes(type).some((base) => {
    const baseSymbol = base.getSymbol()
    const declared = baseSymbol ? checker.getDeclaredTypeOfSymbol(baseSymbol) : base
    return extendsGlobalPromise(declared, checker, program, seen)
  })
}
